// 역할: F1 차원(서킷/레이스/드라이버/팀)과 fact_race_results 업서트 레포지토리.

import { query, type DbClient } from "../client";
import type {
  CircuitRow,
  DriverRow,
  F1TeamRow,
  RaceResultFactRow,
  RaceRow,
} from "../../types/warehouse";

export async function upsertCircuit(
  row: CircuitRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ circuitKey: number }>(
    `insert into public.dim_circuit (api_circuit_id, name, location, country, length_km)
     values ($1, $2, $3, $4, $5)
     on conflict (api_circuit_id) do update set
       name = coalesce(excluded.name, dim_circuit.name),
       location = coalesce(excluded.location, dim_circuit.location),
       country = coalesce(excluded.country, dim_circuit.country),
       length_km = coalesce(excluded.length_km, dim_circuit.length_km)
     returning circuit_key as "circuitKey"`,
    [row.apiCircuitId, row.name, row.location, row.country, row.lengthKm],
    client,
  );
  return result.rows[0].circuitKey;
}

export async function upsertRace(
  row: RaceRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ raceKey: number }>(
    `insert into public.dim_race
      (api_race_id, season, race_name, race_type, date_key, circuit_key)
     values ($1, $2, $3, $4, $5, $6)
     on conflict (api_race_id) do update set
       season = coalesce(excluded.season, dim_race.season),
       race_name = coalesce(excluded.race_name, dim_race.race_name),
       race_type = coalesce(excluded.race_type, dim_race.race_type),
       date_key = coalesce(excluded.date_key, dim_race.date_key),
       circuit_key = coalesce(excluded.circuit_key, dim_race.circuit_key)
     returning race_key as "raceKey"`,
    [row.apiRaceId, row.season, row.raceName, row.raceType, row.dateKey, row.circuitKey],
    client,
  );
  return result.rows[0].raceKey;
}

export async function upsertDriver(
  row: DriverRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ driverKey: number }>(
    `insert into public.dim_driver
      (api_driver_id, name, abbr, nationality, birthdate, number)
     values ($1, $2, $3, $4, $5, $6)
     on conflict (api_driver_id) do update set
       name = coalesce(excluded.name, dim_driver.name),
       abbr = coalesce(excluded.abbr, dim_driver.abbr),
       nationality = coalesce(excluded.nationality, dim_driver.nationality),
       birthdate = coalesce(excluded.birthdate, dim_driver.birthdate),
       number = coalesce(excluded.number, dim_driver.number)
     returning driver_key as "driverKey"`,
    [row.apiDriverId, row.name, row.abbr, row.nationality, row.birthdate, row.number],
    client,
  );
  return result.rows[0].driverKey;
}

export async function upsertF1Team(
  row: F1TeamRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ teamKey: number }>(
    `insert into public.dim_team_f1 (api_team_id, name, base, director)
     values ($1, $2, $3, $4)
     on conflict (api_team_id) do update set
       name = coalesce(excluded.name, dim_team_f1.name),
       base = coalesce(excluded.base, dim_team_f1.base),
       director = coalesce(excluded.director, dim_team_f1.director)
     returning team_key as "teamKey"`,
    [row.apiTeamId, row.name, row.base, row.director],
    client,
  );
  return result.rows[0].teamKey;
}

// 역할: (race_key, driver_key) 기준으로 레이스 결과 팩트를 업서트한다.
export async function upsertRaceResult(
  row: RaceResultFactRow,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ resultKey: number }>(
    `insert into public.fact_race_results
      (race_key, driver_key, team_key, position, grid, laps, race_time, gap, pits, points)
     values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
     on conflict (race_key, driver_key) do update set
       team_key = coalesce(excluded.team_key, fact_race_results.team_key),
       position = excluded.position,
       grid = coalesce(excluded.grid, fact_race_results.grid),
       laps = coalesce(excluded.laps, fact_race_results.laps),
       race_time = coalesce(excluded.race_time, fact_race_results.race_time),
       gap = coalesce(excluded.gap, fact_race_results.gap),
       pits = coalesce(excluded.pits, fact_race_results.pits),
       points = coalesce(excluded.points, fact_race_results.points)
     returning result_key as "resultKey"`,
    [
      row.raceKey,
      row.driverKey,
      row.teamKey,
      row.position,
      row.grid,
      row.laps,
      row.raceTime,
      row.gap,
      row.pits,
      row.points,
    ],
    client,
  );
  return result.rows[0].resultKey;
}
