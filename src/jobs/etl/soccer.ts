// 역할: 축구 스테이징 컬렉션을 스타 스키마(dim_league/dim_team/dim_venue/dim_referee/fact_match)로 적재한다.

import { parseSoccerFixture, type SoccerFixtureRecord } from "../../parsers/soccer/parseFixture";
import {
  parseSoccerLeague,
  parseSoccerTeam,
  type SoccerTeamRecord,
} from "../../parsers/soccer/parseDimensions";
import type { SoccerLeagueRow } from "../../types/warehouse";
import { defineFeed, suffixIs, type LoadContext, type SportDefinition } from "./feed";

async function loadLeague(row: SoccerLeagueRow, { writer, keys }: LoadContext) {
  await keys.resolve("dim_league", row, (r) => writer.upsertSoccerLeague(r));
}

async function loadTeam(record: SoccerTeamRecord, { writer, keys }: LoadContext) {
  await keys.resolve("dim_team", record.team, (r) => writer.upsertSoccerTeam(r));
  await keys.resolveOptional("dim_venue", record.venue, (r) => writer.upsertVenue(r));
}

// 역할: 차원 키를 모두 확정한 뒤 경기 팩트 한 행을 업서트한다.
async function loadFixture(record: SoccerFixtureRecord, { writer, keys }: LoadContext) {
  const leagueKey = await keys.resolveOptional("dim_league", record.league, (r) =>
    writer.upsertSoccerLeague(r),
  );
  const dateKey = await keys.resolveOptional("dim_date", record.date, (d) =>
    writer.upsertDate(d),
  );
  const venueKey = await keys.resolveOptional("dim_venue", record.venue, (r) =>
    writer.upsertVenue(r),
  );
  const refereeKey = await keys.resolveOptional("dim_referee", record.referee, (r) =>
    writer.upsertReferee(r),
  );
  const homeTeamKey = await keys.resolveOptional("dim_team", record.homeTeam, (r) =>
    writer.upsertSoccerTeam(r),
  );
  const awayTeamKey = await keys.resolveOptional("dim_team", record.awayTeam, (r) =>
    writer.upsertSoccerTeam(r),
  );

  await writer.upsertMatch({
    apiMatchId: record.apiMatchId,
    leagueKey,
    season: record.season,
    dateKey,
    venueKey,
    refereeKey,
    homeTeamKey,
    awayTeamKey,
    homeGoals: record.homeGoals,
    awayGoals: record.awayGoals,
    attendance: record.attendance,
    possessionHome: record.possessionHome,
    possessionAway: record.possessionAway,
    status: record.status,
  });
}

export const soccerDefinition: SportDefinition = {
  sport: "soccer",
  collectionPrefixes: ["soccer", "football"],
  feeds: [
    defineFeed({
      name: "soccer:leagues",
      kind: "dimension",
      matches: suffixIs("leagues"),
      parse: parseSoccerLeague,
      load: loadLeague,
    }),
    defineFeed({
      name: "soccer:teams",
      kind: "dimension",
      matches: suffixIs("teams"),
      parse: parseSoccerTeam,
      load: loadTeam,
    }),
    defineFeed({
      name: "soccer:fixtures",
      kind: "fact",
      matches: (suffix) =>
        suffix === "" || suffix.includes("fixtures") || suffix.includes("matches"),
      parse: parseSoccerFixture,
      load: loadFixture,
    }),
  ],
};
