// 역할: 농구 leagues/teams/players 스테이징 문서를 차원 행으로 변환한다.

import type { Result, StagedDocument } from "../../types";
import type {
  BasketballLeagueRow,
  BasketballPlayerRow,
  BasketballTeamRow,
} from "../../types/warehouse";
import { firstPresent } from "../common/docPath";
import { toInt, toText } from "../common/values";
import {
  basketballLeagueRowSchema,
  basketballPlayerRowSchema,
  basketballTeamRowSchema,
  missingKey,
  validateRecord,
} from "../common/rowSchemas";

export function parseBasketballLeague(doc: StagedDocument): Result<BasketballLeagueRow> {
  const apiLeagueId = toInt(firstPresent(doc, "id", "league.id"));
  if (apiLeagueId === null) return missingKey("basketball league", "id");

  return validateRecord(
    basketballLeagueRowSchema,
    {
      apiLeagueId,
      name: toText(firstPresent(doc, "name", "league.name")),
      country: toText(firstPresent(doc, "country.name", "country")),
      leagueType: toText(firstPresent(doc, "type", "league.type")),
    },
    "basketball league",
  );
}

export function parseBasketballTeam(doc: StagedDocument): Result<BasketballTeamRow> {
  const apiTeamId = toInt(firstPresent(doc, "id", "team.id"));
  if (apiTeamId === null) return missingKey("basketball team", "id");

  return validateRecord(
    basketballTeamRowSchema,
    {
      apiTeamId,
      name: toText(firstPresent(doc, "name", "team.name")),
      country: toText(firstPresent(doc, "country.name", "country")),
    },
    "basketball team",
  );
}

// players 엔드포인트: { id, name, number, country, position, age }
export function parseBasketballPlayer(doc: StagedDocument): Result<BasketballPlayerRow> {
  const apiPlayerId = toInt(firstPresent(doc, "id", "player.id"));
  if (apiPlayerId === null) return missingKey("basketball player", "id");

  return validateRecord(
    basketballPlayerRowSchema,
    {
      apiPlayerId,
      fullName: toText(firstPresent(doc, "name", "player.name")),
      position: toText(doc.position),
      nationality: toText(firstPresent(doc, "country.name", "country", "nationality")),
      jerseyNumber: toText(doc.number),
    },
    "basketball player",
  );
}
