// 역할: F1 레이스 결과 문서(rankings/races)를 팩트 레코드로 변환한다.

import { z } from "zod";
import type { CalendarDate, Result, StagedDocument } from "../../types";
import type { DriverRow, F1TeamRow } from "../../types/warehouse";
import { firstPresent, getRecord } from "../common/docPath";
import { toCalendarDate, toDecimal, toInt, toText } from "../common/values";
import {
  calendarDateSchema,
  driverRowSchema,
  f1TeamRowSchema,
  missingKey,
  validateRecord,
} from "../common/rowSchemas";
import { raceInfoSchema, type RaceInfo } from "./parseDimensions";

export type F1RaceResultRecord = {
  race: RaceInfo;
  raceDate: CalendarDate | null;
  driver: DriverRow;
  team: F1TeamRow | null;
  position: number | null;
  grid: number | null;
  laps: number | null;
  raceTime: string | null;
  gap: string | null;
  pits: number | null;
  points: number | null;
};

const count = z.number().int().nonnegative().nullable();

const raceResultSchema: z.ZodType<F1RaceResultRecord> = z.object({
  race: raceInfoSchema,
  raceDate: calendarDateSchema.nullable(),
  driver: driverRowSchema,
  team: f1TeamRowSchema.nullable(),
  position: z.number().int().positive().nullable(),
  grid: count,
  laps: count,
  raceTime: z.string().nullable(),
  gap: z.string().nullable(),
  pits: count,
  points: z.number().nonnegative().nullable(),
});

export function parseF1RaceResult(doc: StagedDocument): Result<F1RaceResultRecord> {
  const apiRaceId = toInt(firstPresent(doc, "race.id", "raceId", "race_id"));
  if (apiRaceId === null) return missingKey("f1 race result", "race.id");
  const apiDriverId = toInt(firstPresent(doc, "driver.id", "driverId", "driver.driverId"));
  if (apiDriverId === null) return missingKey("f1 race result", "driver.id");

  const driver = getRecord(doc, "driver");
  const teamId = toInt(firstPresent(doc, "team.id", "teamId", "constructorId"));

  return validateRecord(
    raceResultSchema,
    {
      race: {
        apiRaceId,
        season: toInt(firstPresent(doc, "race.season", "season")),
        raceName: toText(firstPresent(doc, "race.name", "raceName")),
        raceType: toText(firstPresent(doc, "race.type")),
      },
      raceDate: toCalendarDate(firstPresent(doc, "race.date", "date")),
      driver: {
        apiDriverId,
        name: toText(driver?.name),
        abbr: toText(driver?.abbr),
        nationality: toText(driver?.nationality),
        birthdate: null,
        number: toInt(driver?.number),
      },
      team:
        teamId === null
          ? null
          : {
              apiTeamId: teamId,
              name: toText(firstPresent(doc, "team.name")),
              base: null,
              director: null,
            },
      position: toInt(firstPresent(doc, "position", "result.position")),
      grid: toInt(firstPresent(doc, "grid", "result.grid")),
      laps: toInt(firstPresent(doc, "laps", "result.laps")),
      raceTime: toText(firstPresent(doc, "time", "result.time")),
      gap: toText(doc.gap),
      pits: toInt(doc.pits),
      points: toDecimal(firstPresent(doc, "points", "result.points")),
    },
    "f1 race result",
  );
}
