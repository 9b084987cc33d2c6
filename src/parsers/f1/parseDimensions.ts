// 역할: F1 circuits/teams/drivers/races 스테이징 문서를 차원 레코드로 변환한다.

import { z } from "zod";
import type { CalendarDate, Result, StagedDocument } from "../../types";
import type { CircuitRow, DriverRow, F1TeamRow, RaceRow } from "../../types/warehouse";
import { firstPresent, getPath, getRecord } from "../common/docPath";
import { parseLeadingNumber, toCalendarDate, toInt, toText } from "../common/values";
import {
  apiIdSchema,
  calendarDateSchema,
  circuitRowSchema,
  driverRowSchema,
  f1TeamRowSchema,
  missingKey,
  validateRecord,
} from "../common/rowSchemas";

// 레이스 차원 중 날짜/서킷 대리키를 제외한 속성.
export type RaceInfo = Omit<RaceRow, "dateKey" | "circuitKey">;

export type F1DriverRecord = {
  driver: DriverRow;
  team: F1TeamRow | null;
};

export type F1RaceRecord = {
  race: RaceInfo;
  date: CalendarDate | null;
  circuit: CircuitRow | null;
};

export const raceInfoSchema: z.ZodType<RaceInfo> = z.object({
  apiRaceId: apiIdSchema,
  season: z.number().int().nullable(),
  raceName: z.string().min(1).nullable(),
  raceType: z.string().min(1).nullable(),
});

const driverRecordSchema: z.ZodType<F1DriverRecord> = z.object({
  driver: driverRowSchema,
  team: f1TeamRowSchema.nullable(),
});

const raceRecordSchema: z.ZodType<F1RaceRecord> = z.object({
  race: raceInfoSchema,
  date: calendarDateSchema.nullable(),
  circuit: circuitRowSchema.nullable(),
});

// circuits 엔드포인트: { id, name, competition: { location }, length: "5.412 Kms" }
export function parseF1Circuit(doc: StagedDocument): Result<CircuitRow> {
  const apiCircuitId = toInt(firstPresent(doc, "id", "circuit.id"));
  if (apiCircuitId === null) return missingKey("f1 circuit", "id");

  return validateRecord(
    circuitRowSchema,
    {
      apiCircuitId,
      name: toText(firstPresent(doc, "name", "circuit.name")),
      location: toText(firstPresent(doc, "competition.location.city", "location")),
      country: toText(firstPresent(doc, "competition.location.country", "country")),
      lengthKm: parseLeadingNumber(firstPresent(doc, "length", "length_km")),
    },
    "f1 circuit",
  );
}

// teams 엔드포인트({ id, base, director })와 rankings/teams({ team: {...} }) 모두 처리.
export function parseF1Team(doc: StagedDocument): Result<F1TeamRow> {
  const apiTeamId = toInt(firstPresent(doc, "team.id", "id"));
  if (apiTeamId === null) return missingKey("f1 team", "team.id");

  return validateRecord(
    f1TeamRowSchema,
    {
      apiTeamId,
      name: toText(firstPresent(doc, "team.name", "name")),
      base: toText(firstPresent(doc, "team.base", "base")),
      director: toText(firstPresent(doc, "team.director", "director")),
    },
    "f1 team",
  );
}

// drivers 엔드포인트(평탄 형태)와 rankings/drivers({ driver, team }) 모두 처리.
export function parseF1Driver(doc: StagedDocument): Result<F1DriverRecord> {
  const apiDriverId = toInt(firstPresent(doc, "driver.id", "id"));
  if (apiDriverId === null) return missingKey("f1 driver", "driver.id");

  const driver = getRecord(doc, "driver") ?? doc;
  const teamId = toInt(getPath(doc, "team.id"));

  return validateRecord(
    driverRecordSchema,
    {
      driver: {
        apiDriverId,
        name: toText(driver.name),
        abbr: toText(driver.abbr),
        nationality: toText(
          firstPresent(driver, "nationality", "country.name"),
        ),
        birthdate: toCalendarDate(driver.birthdate)?.iso ?? null,
        number: toInt(driver.number),
      },
      team:
        teamId === null
          ? null
          : {
              apiTeamId: teamId,
              name: toText(getPath(doc, "team.name")),
              base: null,
              director: null,
            },
    },
    "f1 driver",
  );
}

// races 엔드포인트: { id, competition: { name, location }, circuit: { id, name }, season, type, date }
export function parseF1Race(doc: StagedDocument): Result<F1RaceRecord> {
  const apiRaceId = toInt(firstPresent(doc, "id", "race.id"));
  if (apiRaceId === null) return missingKey("f1 race", "id");

  const circuitId = toInt(getPath(doc, "circuit.id"));

  return validateRecord(
    raceRecordSchema,
    {
      race: {
        apiRaceId,
        season: toInt(doc.season),
        raceName: toText(firstPresent(doc, "competition.name", "name")),
        raceType: toText(doc.type),
      },
      date: toCalendarDate(doc.date),
      circuit:
        circuitId === null
          ? null
          : {
              apiCircuitId: circuitId,
              name: toText(getPath(doc, "circuit.name")),
              location: toText(getPath(doc, "competition.location.city")),
              country: toText(getPath(doc, "competition.location.country")),
              lengthKm: null,
            },
    },
    "f1 race",
  );
}
