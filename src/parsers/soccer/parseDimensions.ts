// 역할: 축구 leagues/teams 스테이징 문서를 차원 행으로 변환한다.

import { z } from "zod";
import type { Result, StagedDocument } from "../../types";
import type { SoccerLeagueRow, SoccerTeamRow, VenueRow } from "../../types/warehouse";
import { firstPresent, getRecord } from "../common/docPath";
import { toInt, toText } from "../common/values";
import {
  missingKey,
  soccerLeagueRowSchema,
  soccerTeamRowSchema,
  validateRecord,
  venueRowSchema,
} from "../common/rowSchemas";

export type SoccerTeamRecord = {
  team: SoccerTeamRow;
  venue: VenueRow | null;
};

const teamRecordSchema: z.ZodType<SoccerTeamRecord> = z.object({
  team: soccerTeamRowSchema,
  venue: venueRowSchema.nullable(),
});

// leagues 엔드포인트: { league: {...}, country: { name }, seasons: [...] }
export function parseSoccerLeague(doc: StagedDocument): Result<SoccerLeagueRow> {
  const apiLeagueId = toInt(firstPresent(doc, "league.id", "id"));
  if (apiLeagueId === null) return missingKey("soccer league", "league.id");

  return validateRecord(
    soccerLeagueRowSchema,
    {
      apiLeagueId,
      name: toText(firstPresent(doc, "league.name", "name")),
      country: toText(firstPresent(doc, "country.name", "league.country")),
      leagueType: toText(firstPresent(doc, "league.type", "type")),
    },
    "soccer league",
  );
}

// teams 엔드포인트: { team: {...}, venue: {...} }. 홈 경기장도 함께 적재한다.
export function parseSoccerTeam(doc: StagedDocument): Result<SoccerTeamRecord> {
  const apiTeamId = toInt(firstPresent(doc, "team.id", "id"));
  if (apiTeamId === null) return missingKey("soccer team", "team.id");

  const team = getRecord(doc, "team") ?? doc;
  const venue = getRecord(doc, "venue");
  const apiVenueId = toInt(venue?.id);

  return validateRecord(
    teamRecordSchema,
    {
      team: {
        apiTeamId,
        name: toText(team.name),
        shortCode: toText(team.code),
        country: toText(team.country),
        founded: toInt(team.founded),
        stadiumName: toText(venue?.name),
        city: toText(venue?.city),
      },
      venue:
        apiVenueId === null
          ? null
          : {
              apiVenueId,
              name: toText(venue?.name),
              city: toText(venue?.city),
              capacity: toInt(venue?.capacity),
            },
    },
    "soccer team",
  );
}
