// 역할: 적재 후 스타 스키마의 행 수/자연키 중복/고아 외래키를 점검하는 레포지토리.

import { query, type DbClient } from "../client";
import { NATURAL_KEY_INDEXES } from "./schema.repo";

type ForeignKeyCheck = {
  table: string;
  column: string;
  references: { table: string; column: string };
};

export const FOREIGN_KEY_CHECKS: ForeignKeyCheck[] = [
  fk("fact_match", "league_key", "dim_league", "league_key"),
  fk("fact_match", "date_key", "dim_date", "date_key"),
  fk("fact_match", "venue_key", "dim_venue", "venue_key"),
  fk("fact_match", "referee_key", "dim_referee", "referee_key"),
  fk("fact_match", "home_team_key", "dim_team", "team_key"),
  fk("fact_match", "away_team_key", "dim_team", "team_key"),
  fk("fact_game_basketball", "league_key", "dim_league_basketball", "league_key"),
  fk("fact_game_basketball", "date_key", "dim_date", "date_key"),
  fk("fact_game_basketball", "home_team_key", "dim_team_basketball", "team_key"),
  fk("fact_game_basketball", "away_team_key", "dim_team_basketball", "team_key"),
  fk("dim_race", "date_key", "dim_date", "date_key"),
  fk("dim_race", "circuit_key", "dim_circuit", "circuit_key"),
  fk("fact_race_results", "race_key", "dim_race", "race_key"),
  fk("fact_race_results", "driver_key", "dim_driver", "driver_key"),
  fk("fact_race_results", "team_key", "dim_team_f1", "team_key"),
];

function fk(
  table: string,
  column: string,
  refTable: string,
  refColumn: string,
): ForeignKeyCheck {
  return { table, column, references: { table: refTable, column: refColumn } };
}

export type TableCount = { table: string; rows: number };
export type DuplicateKeyCount = { table: string; columns: string[]; duplicates: number };
export type OrphanCount = { table: string; column: string; orphans: number };

export type IntegrityReport = {
  tables: TableCount[];
  duplicateKeys: DuplicateKeyCount[];
  orphans: OrphanCount[];
};

export function listStarSchemaTables(): string[] {
  return Array.from(new Set(NATURAL_KEY_INDEXES.map((index) => index.table)));
}

export async function countRows(table: string, client?: DbClient): Promise<number> {
  const result = await query<{ count: string }>(
    `select count(*)::text as count from public.${table}`,
    [],
    client,
  );
  return Number(result.rows[0].count);
}

// 역할: 자연키가 같은 행이 두 개 이상인 그룹 수를 센다.
export async function countDuplicateNaturalKeys(
  table: string,
  columns: string[],
  client?: DbClient,
): Promise<number> {
  const cols = columns.join(", ");
  const result = await query<{ count: string }>(
    `select count(*)::text as count
     from (
       select ${cols}
       from public.${table}
       group by ${cols}
       having count(*) > 1
     ) dup`,
    [],
    client,
  );
  return Number(result.rows[0].count);
}

// 역할: 참조 대상 차원 행이 없는 외래키 값을 센다.
export async function countOrphans(
  check: ForeignKeyCheck,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ count: string }>(
    `select count(*)::text as count
     from public.${check.table} f
     left join public.${check.references.table} d
       on d.${check.references.column} = f.${check.column}
     where f.${check.column} is not null
       and d.${check.references.column} is null`,
    [],
    client,
  );
  return Number(result.rows[0].count);
}

export async function buildIntegrityReport(client?: DbClient): Promise<IntegrityReport> {
  const tables: TableCount[] = [];
  for (const table of listStarSchemaTables()) {
    tables.push({ table, rows: await countRows(table, client) });
  }

  const duplicateKeys: DuplicateKeyCount[] = [];
  for (const index of NATURAL_KEY_INDEXES) {
    duplicateKeys.push({
      table: index.table,
      columns: index.columns,
      duplicates: await countDuplicateNaturalKeys(index.table, index.columns, client),
    });
  }

  const orphans: OrphanCount[] = [];
  for (const check of FOREIGN_KEY_CHECKS) {
    orphans.push({
      table: check.table,
      column: check.column,
      orphans: await countOrphans(check, client),
    });
  }

  return { tables, duplicateKeys, orphans };
}

export function hasIntegrityProblems(report: IntegrityReport): boolean {
  return (
    report.duplicateKeys.some((entry) => entry.duplicates > 0) ||
    report.orphans.some((entry) => entry.orphans > 0)
  );
}
