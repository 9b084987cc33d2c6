import type { StarSchemaWriter, Transactor } from "../../src/db/warehouse";

type StoredRow = { key: number; row: Record<string, unknown> };

// 테스트용 인메모리 스타 스키마.
// - 자연키 기준 업서트, null 값은 기존 값을 유지(coalesce)
// - 트랜잭션 실패 시 행은 되돌리지만 시퀀스(대리키)는 되돌리지 않는다(PostgreSQL serial과 동일)
export class MemoryWarehouse {
  private tables = new Map<string, Map<string, StoredRow>>();
  private readonly sequences = new Map<string, number>();
  upsertCalls = 0;
  failWhen: ((table: string, row: Record<string, unknown>) => boolean) | null = null;

  readonly writer: StarSchemaWriter = {
    upsertDate: async (date) => this.upsert("dim_date", date.iso, date),
    upsertSoccerLeague: async (row) => this.upsert("dim_league", String(row.apiLeagueId), row),
    upsertSoccerTeam: async (row) => this.upsert("dim_team", String(row.apiTeamId), row),
    upsertVenue: async (row) => this.upsert("dim_venue", String(row.apiVenueId), row),
    upsertReferee: async (row) => this.upsert("dim_referee", row.name, row),
    upsertMatch: async (row) =>
      this.upsert("fact_match", String(row.apiMatchId), row, ["homeGoals", "awayGoals"]),
    upsertBasketballLeague: async (row) =>
      this.upsert("dim_league_basketball", String(row.apiLeagueId), row),
    upsertBasketballTeam: async (row) =>
      this.upsert("dim_team_basketball", String(row.apiTeamId), row),
    upsertBasketballPlayer: async (row) =>
      this.upsert("dim_player_basketball", String(row.apiPlayerId), row),
    upsertGame: async (row) =>
      this.upsert("fact_game_basketball", String(row.apiGameId), row, [
        "homePoints",
        "awayPoints",
      ]),
    upsertCircuit: async (row) => this.upsert("dim_circuit", String(row.apiCircuitId), row),
    upsertRace: async (row) => this.upsert("dim_race", String(row.apiRaceId), row),
    upsertDriver: async (row) => this.upsert("dim_driver", String(row.apiDriverId), row),
    upsertF1Team: async (row) => this.upsert("dim_team_f1", String(row.apiTeamId), row),
    upsertRaceResult: async (row) =>
      this.upsert("fact_race_results", `${row.raceKey}:${row.driverKey}`, row, ["position"]),
  };

  readonly transact: Transactor = async (fn) => {
    const snapshot = this.snapshot();
    try {
      return await fn(this.writer);
    } catch (error) {
      this.tables = snapshot;
      throw error;
    }
  };

  rows(table: string): Array<Record<string, unknown>> {
    return Array.from(this.tables.get(table)?.values() ?? []).map((stored) => stored.row);
  }

  find(table: string, naturalKey: string): StoredRow | undefined {
    return this.tables.get(table)?.get(naturalKey);
  }

  keysOf(table: string): Set<number> {
    return new Set(Array.from(this.tables.get(table)?.values() ?? []).map((stored) => stored.key));
  }

  size(table: string): number {
    return this.tables.get(table)?.size ?? 0;
  }

  private upsert(
    table: string,
    naturalKey: string,
    row: Record<string, unknown>,
    overwrite: string[] = [],
  ): number {
    this.upsertCalls += 1;
    if (this.failWhen?.(table, row)) {
      throw new Error(`injected failure on ${table}:${naturalKey}`);
    }

    let rows = this.tables.get(table);
    if (!rows) {
      rows = new Map();
      this.tables.set(table, rows);
    }

    const existing = rows.get(naturalKey);
    if (existing) {
      const merged: Record<string, unknown> = { ...existing.row };
      for (const [field, value] of Object.entries(row)) {
        if (overwrite.includes(field) || (value !== null && value !== undefined)) {
          merged[field] = value;
        }
      }
      rows.set(naturalKey, { key: existing.key, row: merged });
      return existing.key;
    }

    const key = (this.sequences.get(table) ?? 0) + 1;
    this.sequences.set(table, key);
    rows.set(naturalKey, { key, row: { ...row } });
    return key;
  }

  private snapshot(): Map<string, Map<string, StoredRow>> {
    const copy = new Map<string, Map<string, StoredRow>>();
    for (const [table, rows] of this.tables) {
      copy.set(table, new Map(rows));
    }
    return copy;
  }
}
