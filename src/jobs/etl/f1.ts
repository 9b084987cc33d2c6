// 역할: F1 스테이징 컬렉션을 스타 스키마(dim_circuit/dim_race/dim_driver/dim_team_f1, fact_race_results)로 적재한다.

import {
  parseF1Circuit,
  parseF1Driver,
  parseF1Race,
  parseF1Team,
  type F1DriverRecord,
  type F1RaceRecord,
} from "../../parsers/f1/parseDimensions";
import {
  parseF1RaceResult,
  type F1RaceResultRecord,
} from "../../parsers/f1/parseRaceResult";
import { defineFeed, suffixIs, type LoadContext, type SportDefinition } from "./feed";

async function loadDriver(record: F1DriverRecord, { writer, keys }: LoadContext) {
  await keys.resolve("dim_driver", record.driver, (r) => writer.upsertDriver(r));
  await keys.resolveOptional("dim_team_f1", record.team, (r) => writer.upsertF1Team(r));
}

async function loadRace(record: F1RaceRecord, { writer, keys }: LoadContext) {
  const dateKey = await keys.resolveOptional("dim_date", record.date, (d) =>
    writer.upsertDate(d),
  );
  const circuitKey = await keys.resolveOptional("dim_circuit", record.circuit, (r) =>
    writer.upsertCircuit(r),
  );
  await keys.resolve("dim_race", { ...record.race, dateKey, circuitKey }, (r) =>
    writer.upsertRace(r),
  );
}

// 역할: 레이스/드라이버/팀 키를 확정하고 (race, driver) 단위 결과 팩트를 업서트한다.
async function loadRaceResult(record: F1RaceResultRecord, { writer, keys }: LoadContext) {
  const dateKey = await keys.resolveOptional("dim_date", record.raceDate, (d) =>
    writer.upsertDate(d),
  );
  const raceKey = await keys.resolve(
    "dim_race",
    { ...record.race, dateKey, circuitKey: null },
    (r) => writer.upsertRace(r),
  );
  const driverKey = await keys.resolve("dim_driver", record.driver, (r) =>
    writer.upsertDriver(r),
  );
  const teamKey = await keys.resolveOptional("dim_team_f1", record.team, (r) =>
    writer.upsertF1Team(r),
  );

  await writer.upsertRaceResult({
    raceKey,
    driverKey,
    teamKey,
    position: record.position,
    grid: record.grid,
    laps: record.laps,
    raceTime: record.raceTime,
    gap: record.gap,
    pits: record.pits,
    points: record.points,
  });
}

export const f1Definition: SportDefinition = {
  sport: "f1",
  collectionPrefixes: ["f1", "formula1", "formula_1"],
  feeds: [
    defineFeed({
      name: "f1:circuits",
      kind: "dimension",
      matches: suffixIs("circuits"),
      parse: parseF1Circuit,
      load: async (row, { writer, keys }) => {
        await keys.resolve("dim_circuit", row, (r) => writer.upsertCircuit(r));
      },
    }),
    defineFeed({
      name: "f1:teams",
      kind: "dimension",
      matches: suffixIs("teams", "rankings_teams"),
      parse: parseF1Team,
      load: async (row, { writer, keys }) => {
        await keys.resolve("dim_team_f1", row, (r) => writer.upsertF1Team(r));
      },
    }),
    defineFeed({
      name: "f1:drivers",
      kind: "dimension",
      matches: suffixIs("drivers", "rankings_drivers"),
      parse: parseF1Driver,
      load: loadDriver,
    }),
    defineFeed({
      name: "f1:races",
      kind: "dimension",
      matches: suffixIs("races"),
      parse: parseF1Race,
      load: loadRace,
    }),
    defineFeed({
      name: "f1:results",
      kind: "fact",
      matches: (suffix) => suffix.includes("results") || suffix === "rankings_races",
      parse: parseF1RaceResult,
      load: loadRaceResult,
    }),
  ],
};
