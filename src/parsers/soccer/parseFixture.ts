// 역할: 축구 fixture 문서를 경기 팩트 레코드(차원 자연키 포함)로 변환한다.

import { z } from "zod";
import type { CalendarDate, Result, StagedDocument } from "../../types";
import type {
  RefereeRow,
  SoccerLeagueRow,
  SoccerTeamRow,
  VenueRow,
} from "../../types/warehouse";
import { firstPresent, getArray, getPath, getRecord, isRecord } from "../common/docPath";
import {
  parsePercent,
  splitRefereeLabel,
  toCalendarDate,
  toInt,
  toText,
} from "../common/values";
import {
  apiIdSchema,
  calendarDateSchema,
  missingKey,
  refereeRowSchema,
  soccerLeagueRowSchema,
  soccerTeamRowSchema,
  validateRecord,
  venueRowSchema,
} from "../common/rowSchemas";

export type SoccerFixtureRecord = {
  apiMatchId: number;
  season: number | null;
  date: CalendarDate | null;
  league: SoccerLeagueRow | null;
  venue: VenueRow | null;
  referee: RefereeRow | null;
  homeTeam: SoccerTeamRow | null;
  awayTeam: SoccerTeamRow | null;
  homeGoals: number | null;
  awayGoals: number | null;
  attendance: number | null;
  possessionHome: number | null;
  possessionAway: number | null;
  status: string | null;
};

const goals = z.number().int().nonnegative().nullable();
const possession = z.number().min(0).max(100).nullable();

const fixtureRecordSchema: z.ZodType<SoccerFixtureRecord> = z.object({
  apiMatchId: apiIdSchema,
  season: z.number().int().nullable(),
  date: calendarDateSchema.nullable(),
  league: soccerLeagueRowSchema.nullable(),
  venue: venueRowSchema.nullable(),
  referee: refereeRowSchema.nullable(),
  homeTeam: soccerTeamRowSchema.nullable(),
  awayTeam: soccerTeamRowSchema.nullable(),
  homeGoals: goals,
  awayGoals: goals,
  attendance: z.number().int().nonnegative().nullable(),
  possessionHome: possession,
  possessionAway: possession,
  status: z.string().nullable(),
});

const POSSESSION_TYPES = new Set(["ball possession", "possession"]);

export function parseSoccerFixture(doc: StagedDocument): Result<SoccerFixtureRecord> {
  const apiMatchId = toInt(firstPresent(doc, "fixture.id", "id"));
  if (apiMatchId === null) return missingKey("soccer fixture", "fixture.id");

  const leagueId = toInt(getPath(doc, "league.id"));
  const league: SoccerLeagueRow | null =
    leagueId === null
      ? null
      : {
          apiLeagueId: leagueId,
          name: toText(getPath(doc, "league.name")),
          country: toText(getPath(doc, "league.country")),
          leagueType: toText(getPath(doc, "league.type")),
        };

  const homeTeam = teamStub(getRecord(doc, "teams.home"));
  const awayTeam = teamStub(getRecord(doc, "teams.away"));
  const possessionShare = extractPossession(
    doc,
    homeTeam?.apiTeamId ?? null,
    awayTeam?.apiTeamId ?? null,
  );

  return validateRecord(
    fixtureRecordSchema,
    {
      apiMatchId,
      season: toInt(firstPresent(doc, "league.season", "season")),
      date: toCalendarDate(firstPresent(doc, "fixture.date", "date")),
      league,
      venue: extractVenue(getRecord(doc, "fixture.venue")),
      referee: extractReferee(getPath(doc, "fixture.referee")),
      homeTeam,
      awayTeam,
      homeGoals: toInt(getPath(doc, "goals.home")),
      awayGoals: toInt(getPath(doc, "goals.away")),
      attendance: toInt(getPath(doc, "fixture.attendance")),
      possessionHome: possessionShare.home,
      possessionAway: possessionShare.away,
      status: toText(firstPresent(doc, "fixture.status.short", "status")),
    },
    "soccer fixture",
  );
}

function teamStub(team: Record<string, unknown> | null): SoccerTeamRow | null {
  const apiTeamId = toInt(team?.id);
  if (apiTeamId === null) return null;
  return {
    apiTeamId,
    name: toText(team?.name),
    shortCode: null,
    country: null,
    founded: null,
    stadiumName: null,
    city: null,
  };
}

function extractVenue(venue: Record<string, unknown> | null): VenueRow | null {
  const apiVenueId = toInt(venue?.id);
  if (apiVenueId === null) return null;
  return {
    apiVenueId,
    name: toText(venue?.name),
    city: toText(venue?.city),
    capacity: toInt(venue?.capacity),
  };
}

// 심판은 "이름, 국가" 문자열 또는 { name, nationality } 객체로 온다.
function extractReferee(value: unknown): RefereeRow | null {
  if (typeof value === "string") {
    return splitRefereeLabel(value);
  }
  if (isRecord(value)) {
    const label = toText(value.name);
    if (!label) return null;
    const split = splitRefereeLabel(label);
    if (!split) return null;
    return {
      name: split.name,
      nationality: toText(value.nationality) ?? split.nationality,
    };
  }
  return null;
}

// 역할: statistics 배열에서 볼 점유율을 찾는다.
// 팀별 블록({ team, statistics: [{ type, value }] })과 평탄 형태({ type, home, away }) 모두 지원.
function extractPossession(
  doc: StagedDocument,
  homeTeamId: number | null,
  awayTeamId: number | null,
): { home: number | null; away: number | null } {
  const share: { home: number | null; away: number | null } = {
    home: null,
    away: null,
  };
  const stats = getArray(doc, "statistics");
  const items = stats.length > 0 ? stats : getArray(doc, "stats");

  for (const item of items) {
    if (!isRecord(item)) continue;

    const teamStats = item.statistics;
    if (Array.isArray(teamStats)) {
      const entry = teamStats.find((stat) => isPossessionType(getPath(stat, "type")));
      const value = parsePercent(getPath(entry, "value"));
      const teamId = toInt(getPath(item, "team.id"));
      if (teamId !== null && teamId === homeTeamId) share.home = value;
      else if (teamId !== null && teamId === awayTeamId) share.away = value;
      continue;
    }

    if (isPossessionType(item.type)) {
      share.home = parsePercent(firstPresent(item, "home.value", "home"));
      share.away = parsePercent(firstPresent(item, "away.value", "away"));
    }
  }
  return share;
}

function isPossessionType(value: unknown): boolean {
  const label = toText(value);
  return label !== null && POSSESSION_TYPES.has(label.toLowerCase());
}
