// 역할: 농구 스테이징 컬렉션을 스타 스키마(*_basketball 차원, fact_game_basketball)로 적재한다.

import { parseBasketballGame, type BasketballGameRecord } from "../../parsers/basketball/parseGame";
import {
  parseBasketballLeague,
  parseBasketballPlayer,
  parseBasketballTeam,
} from "../../parsers/basketball/parseDimensions";
import { defineFeed, suffixIs, type LoadContext, type SportDefinition } from "./feed";

async function loadGame(record: BasketballGameRecord, { writer, keys }: LoadContext) {
  const leagueKey = await keys.resolveOptional(
    "dim_league_basketball",
    record.league,
    (r) => writer.upsertBasketballLeague(r),
  );
  const dateKey = await keys.resolveOptional("dim_date", record.date, (d) =>
    writer.upsertDate(d),
  );
  const homeTeamKey = await keys.resolveOptional(
    "dim_team_basketball",
    record.homeTeam,
    (r) => writer.upsertBasketballTeam(r),
  );
  const awayTeamKey = await keys.resolveOptional(
    "dim_team_basketball",
    record.awayTeam,
    (r) => writer.upsertBasketballTeam(r),
  );

  await writer.upsertGame({
    apiGameId: record.apiGameId,
    leagueKey,
    season: record.season,
    dateKey,
    homeTeamKey,
    awayTeamKey,
    homePoints: record.homePoints,
    awayPoints: record.awayPoints,
    status: record.status,
  });
}

export const basketballDefinition: SportDefinition = {
  sport: "basketball",
  collectionPrefixes: ["basketball"],
  feeds: [
    defineFeed({
      name: "basketball:leagues",
      kind: "dimension",
      matches: suffixIs("leagues"),
      parse: parseBasketballLeague,
      load: async (row, { writer, keys }) => {
        await keys.resolve("dim_league_basketball", row, (r) =>
          writer.upsertBasketballLeague(r),
        );
      },
    }),
    defineFeed({
      name: "basketball:teams",
      kind: "dimension",
      matches: suffixIs("teams"),
      parse: parseBasketballTeam,
      load: async (row, { writer, keys }) => {
        await keys.resolve("dim_team_basketball", row, (r) =>
          writer.upsertBasketballTeam(r),
        );
      },
    }),
    defineFeed({
      name: "basketball:players",
      kind: "dimension",
      matches: suffixIs("players"),
      parse: parseBasketballPlayer,
      load: async (row, { writer, keys }) => {
        await keys.resolve("dim_player_basketball", row, (r) =>
          writer.upsertBasketballPlayer(r),
        );
      },
    }),
    defineFeed({
      name: "basketball:games",
      kind: "fact",
      matches: (suffix) => suffix === "" || suffix.includes("games"),
      parse: parseBasketballGame,
      load: loadGame,
    }),
  ],
};
