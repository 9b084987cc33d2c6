// 역할: 파서 출력(차원 행/날짜)을 검증하는 zod 스키마 모음.

import { z } from "zod";
import type { CalendarDate, Result } from "../../types";
import type {
  BasketballLeagueRow,
  BasketballPlayerRow,
  BasketballTeamRow,
  CircuitRow,
  DriverRow,
  F1TeamRow,
  RefereeRow,
  SoccerLeagueRow,
  SoccerTeamRow,
  VenueRow,
} from "../../types/warehouse";

export const apiIdSchema = z.number().int().positive();
const text = z.string().min(1).nullable();
const int = z.number().int().nullable();

export const calendarDateSchema: z.ZodType<CalendarDate> = z.object({
  iso: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
  weekday: z.string(),
  isWeekend: z.boolean(),
});

export const soccerLeagueRowSchema: z.ZodType<SoccerLeagueRow> = z.object({
  apiLeagueId: apiIdSchema,
  name: text,
  country: text,
  leagueType: text,
});

export const soccerTeamRowSchema: z.ZodType<SoccerTeamRow> = z.object({
  apiTeamId: apiIdSchema,
  name: text,
  shortCode: text,
  country: text,
  founded: int,
  stadiumName: text,
  city: text,
});

export const venueRowSchema: z.ZodType<VenueRow> = z.object({
  apiVenueId: apiIdSchema,
  name: text,
  city: text,
  capacity: z.number().int().nonnegative().nullable(),
});

export const refereeRowSchema: z.ZodType<RefereeRow> = z.object({
  name: z.string().min(1),
  nationality: text,
});

export const basketballLeagueRowSchema: z.ZodType<BasketballLeagueRow> = z.object({
  apiLeagueId: apiIdSchema,
  name: text,
  country: text,
  leagueType: text,
});

export const basketballTeamRowSchema: z.ZodType<BasketballTeamRow> = z.object({
  apiTeamId: apiIdSchema,
  name: text,
  country: text,
});

export const basketballPlayerRowSchema: z.ZodType<BasketballPlayerRow> = z.object({
  apiPlayerId: apiIdSchema,
  fullName: text,
  position: text,
  nationality: text,
  jerseyNumber: text,
});

export const circuitRowSchema: z.ZodType<CircuitRow> = z.object({
  apiCircuitId: apiIdSchema,
  name: text,
  location: text,
  country: text,
  lengthKm: z.number().positive().nullable(),
});

export const driverRowSchema: z.ZodType<DriverRow> = z.object({
  apiDriverId: apiIdSchema,
  name: text,
  abbr: text,
  nationality: text,
  birthdate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullable(),
  number: int,
});

export const f1TeamRowSchema: z.ZodType<F1TeamRow> = z.object({
  apiTeamId: apiIdSchema,
  name: text,
  base: text,
  director: text,
});

// 역할: 파서 결과를 스키마로 검증해 Result로 감싼다.
export function validateRecord<T>(
  schema: z.ZodType<T>,
  value: unknown,
  label: string,
): Result<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return {
      ok: false,
      error: {
        message: `${label} validation failed`,
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`,
        ),
      },
    };
  }
  return { ok: true, data: parsed.data };
}

export function missingKey<T>(label: string, path: string): Result<T> {
  return {
    ok: false,
    error: { message: `${label}: missing natural key ${path}` },
  };
}
