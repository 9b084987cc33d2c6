// 역할: 농구 games 문서를 경기 팩트 레코드로 변환한다.

import { z } from "zod";
import type { CalendarDate, Result, StagedDocument } from "../../types";
import type { BasketballLeagueRow, BasketballTeamRow } from "../../types/warehouse";
import { firstPresent, getPath, getRecord } from "../common/docPath";
import { toCalendarDate, toInt, toText } from "../common/values";
import {
  apiIdSchema,
  basketballLeagueRowSchema,
  basketballTeamRowSchema,
  calendarDateSchema,
  missingKey,
  validateRecord,
} from "../common/rowSchemas";

export type BasketballGameRecord = {
  apiGameId: number;
  season: string | null;
  date: CalendarDate | null;
  league: BasketballLeagueRow | null;
  homeTeam: BasketballTeamRow | null;
  awayTeam: BasketballTeamRow | null;
  homePoints: number | null;
  awayPoints: number | null;
  status: string | null;
};

const points = z.number().int().nonnegative().nullable();

const gameRecordSchema: z.ZodType<BasketballGameRecord> = z.object({
  apiGameId: apiIdSchema,
  season: z.string().nullable(),
  date: calendarDateSchema.nullable(),
  league: basketballLeagueRowSchema.nullable(),
  homeTeam: basketballTeamRowSchema.nullable(),
  awayTeam: basketballTeamRowSchema.nullable(),
  homePoints: points,
  awayPoints: points,
  status: z.string().nullable(),
});

export function parseBasketballGame(doc: StagedDocument): Result<BasketballGameRecord> {
  const apiGameId = toInt(firstPresent(doc, "id", "game.id"));
  if (apiGameId === null) return missingKey("basketball game", "id");

  const leagueId = toInt(getPath(doc, "league.id"));
  const league: BasketballLeagueRow | null =
    leagueId === null
      ? null
      : {
          apiLeagueId: leagueId,
          name: toText(getPath(doc, "league.name")),
          country: toText(firstPresent(doc, "country.name", "league.country")),
          leagueType: toText(getPath(doc, "league.type")),
        };

  return validateRecord(
    gameRecordSchema,
    {
      apiGameId,
      season: toText(firstPresent(doc, "league.season", "season")),
      date: toCalendarDate(firstPresent(doc, "date", "fixture.date", "timestamp")),
      league,
      homeTeam: teamStub(getRecord(doc, "teams.home")),
      awayTeam: teamStub(getRecord(doc, "teams.away")),
      homePoints: toInt(firstPresent(doc, "scores.home.total", "scores.home")),
      awayPoints: toInt(firstPresent(doc, "scores.away.total", "scores.away")),
      status: toText(firstPresent(doc, "status.short", "status")),
    },
    "basketball game",
  );
}

function teamStub(team: Record<string, unknown> | null): BasketballTeamRow | null {
  const apiTeamId = toInt(team?.id);
  if (apiTeamId === null) return null;
  return { apiTeamId, name: toText(team?.name), country: null };
}
