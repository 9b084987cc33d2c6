// 역할: 스타 스키마 DDL 적용과 자연키 유니크 인덱스 보장.

import { readFile } from "node:fs/promises";
import path from "node:path";
import { query, type DbClient } from "../client";

export const SCHEMA_FILE = path.join(__dirname, "..", "..", "..", "sql", "schema.sql");

// on conflict 대상이 되는 자연키. 미리 만들어진 스키마에도 인덱스를 보장한다.
export const NATURAL_KEY_INDEXES: ReadonlyArray<{
  name: string;
  table: string;
  columns: string[];
}> = [
  { name: "ux_dim_date_full_date", table: "dim_date", columns: ["full_date"] },
  { name: "ux_dim_league_api_league_id", table: "dim_league", columns: ["api_league_id"] },
  { name: "ux_dim_team_api_team_id", table: "dim_team", columns: ["api_team_id"] },
  { name: "ux_dim_venue_api_venue_id", table: "dim_venue", columns: ["api_venue_id"] },
  { name: "ux_dim_referee_name", table: "dim_referee", columns: ["name"] },
  { name: "ux_fact_match_api_match_id", table: "fact_match", columns: ["api_match_id"] },
  {
    name: "ux_dim_league_basket_api_league_id",
    table: "dim_league_basketball",
    columns: ["api_league_id"],
  },
  {
    name: "ux_dim_team_basket_api_team_id",
    table: "dim_team_basketball",
    columns: ["api_team_id"],
  },
  {
    name: "ux_dim_player_basket_api_player_id",
    table: "dim_player_basketball",
    columns: ["api_player_id"],
  },
  {
    name: "ux_fact_game_basket_api_game_id",
    table: "fact_game_basketball",
    columns: ["api_game_id"],
  },
  { name: "ux_dim_circuit_api_circuit_id", table: "dim_circuit", columns: ["api_circuit_id"] },
  { name: "ux_dim_race_api_race_id", table: "dim_race", columns: ["api_race_id"] },
  { name: "ux_dim_driver_api_driver_id", table: "dim_driver", columns: ["api_driver_id"] },
  { name: "ux_dim_team_f1_api_team_id", table: "dim_team_f1", columns: ["api_team_id"] },
  {
    name: "ux_fact_race_results_race_driver",
    table: "fact_race_results",
    columns: ["race_key", "driver_key"],
  },
];

export async function readSchemaSql(file: string = SCHEMA_FILE): Promise<string> {
  return readFile(file, "utf-8");
}

// 역할: schema.sql 전체를 한 번에 실행한다(모든 구문이 if not exists).
export async function applySchema(sql: string, client?: DbClient): Promise<void> {
  await query(sql, [], client);
}

export async function ensureNaturalKeyIndexes(client?: DbClient): Promise<number> {
  for (const index of NATURAL_KEY_INDEXES) {
    await query(
      `create unique index if not exists ${index.name}
       on public.${index.table} (${index.columns.join(", ")})`,
      [],
      client,
    );
  }
  return NATURAL_KEY_INDEXES.length;
}
