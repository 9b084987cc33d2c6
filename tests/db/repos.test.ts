import { beforeEach, describe, expect, it, vi } from "vitest";

const { queryMock } = vi.hoisted(() => ({ queryMock: vi.fn() }));

vi.mock("../../src/db/client", () => ({ query: queryMock }));

import { upsertDate } from "../../src/db/repos/dates.repo";
import { upsertMatch, upsertReferee, upsertTeam } from "../../src/db/repos/soccer.repo";
import { upsertGame } from "../../src/db/repos/basketball.repo";
import { upsertRaceResult } from "../../src/db/repos/f1.repo";
import {
  NATURAL_KEY_INDEXES,
  ensureNaturalKeyIndexes,
  readSchemaSql,
} from "../../src/db/repos/schema.repo";
import {
  FOREIGN_KEY_CHECKS,
  buildIntegrityReport,
  countOrphans,
  hasIntegrityProblems,
  listStarSchemaTables,
} from "../../src/db/repos/integrity.repo";

function compact(sql: unknown): string {
  return String(sql).replace(/\s+/g, " ").trim();
}

beforeEach(() => {
  queryMock.mockReset();
});

describe("dimension and fact upserts", () => {
  it("upserts a date by full_date and returns its key", async () => {
    queryMock.mockResolvedValueOnce({ rows: [{ dateKey: 11 }] });

    const key = await upsertDate({
      iso: "2023-08-12",
      year: 2023,
      month: 8,
      day: 12,
      weekday: "Saturday",
      isWeekend: true,
    });

    expect(key).toBe(11);
    const [sql, params] = queryMock.mock.calls[0];
    expect(compact(sql)).toContain("on conflict (full_date) do update set year = excluded.year");
    expect(params).toEqual(["2023-08-12", 2023, 8, 12, "Saturday", true]);
  });

  it("keeps existing team attributes when the incoming value is null", async () => {
    queryMock.mockResolvedValueOnce({ rows: [{ teamKey: 17 }] });

    const key = await upsertTeam({
      apiTeamId: 901,
      name: "Riverside FC",
      shortCode: null,
      country: null,
      founded: null,
      stadiumName: null,
      city: null,
    });

    expect(key).toBe(17);
    const [sql, params] = queryMock.mock.calls[0];
    expect(compact(sql)).toContain("on conflict (api_team_id) do update set");
    expect(compact(sql)).toContain("short_code = coalesce(excluded.short_code, dim_team.short_code)");
    expect(params).toEqual([901, "Riverside FC", null, null, null, null, null]);
  });

  it("keys referees by name", async () => {
    queryMock.mockResolvedValueOnce({ rows: [{ refereeKey: 3 }] });
    await upsertReferee({ name: "Alex Moreno", nationality: "Atlantis" });
    const [sql, params] = queryMock.mock.calls[0];
    expect(compact(sql)).toContain("on conflict (name) do update set");
    expect(params).toEqual(["Alex Moreno", "Atlantis"]);
  });

  it("overwrites match goals but coalesces the dimension keys", async () => {
    queryMock.mockResolvedValueOnce({ rows: [{ matchKey: 5 }] });

    await upsertMatch({
      apiMatchId: 5001,
      leagueKey: 1,
      season: 2023,
      dateKey: 2,
      venueKey: null,
      refereeKey: 4,
      homeTeamKey: 7,
      awayTeamKey: 8,
      homeGoals: 2,
      awayGoals: 1,
      attendance: 30000,
      possessionHome: 58,
      possessionAway: 42,
      status: "FT",
    });

    const [sql, params] = queryMock.mock.calls[0];
    const text = compact(sql);
    expect(text).toContain("on conflict (api_match_id)");
    expect(text).toContain("home_goals = excluded.home_goals");
    expect(text).toContain("venue_key = coalesce(excluded.venue_key, fact_match.venue_key)");
    expect(params).toEqual([5001, 1, 2023, 2, null, 4, 7, 8, 2, 1, 30000, 58, 42, "FT"]);
  });

  it("upserts basketball games by api_game_id", async () => {
    queryMock.mockResolvedValueOnce({ rows: [{ gameKey: 9 }] });

    const key = await upsertGame({
      apiGameId: 3001,
      leagueKey: 1,
      season: "2023-2024",
      dateKey: 3,
      homeTeamKey: 1,
      awayTeamKey: 2,
      homePoints: 110,
      awayPoints: 104,
      status: "FT",
    });

    expect(key).toBe(9);
    const [sql, params] = queryMock.mock.calls[0];
    expect(compact(sql)).toContain("on conflict (api_game_id)");
    expect(params).toEqual([3001, 1, "2023-2024", 3, 1, 2, 110, 104, "FT"]);
  });

  it("upserts race results by race and driver", async () => {
    queryMock.mockResolvedValueOnce({ rows: [{ resultKey: 21 }] });

    const key = await upsertRaceResult({
      raceKey: 1,
      driverKey: 2,
      teamKey: null,
      position: 2,
      grid: 3,
      laps: 57,
      raceTime: "+11.987s",
      gap: "+11.987",
      pits: 2,
      points: 18,
    });

    expect(key).toBe(21);
    const [sql, params] = queryMock.mock.calls[0];
    expect(compact(sql)).toContain("on conflict (race_key, driver_key) do update set");
    expect(params).toEqual([1, 2, null, 2, 3, 57, "+11.987s", "+11.987", 2, 18]);
  });
});

describe("schema", () => {
  it("creates one unique index per natural key", async () => {
    queryMock.mockResolvedValue({ rows: [] });

    expect(await ensureNaturalKeyIndexes()).toBe(15);
    expect(queryMock).toHaveBeenCalledTimes(15);
    expect(compact(queryMock.mock.calls[0][0])).toBe(
      "create unique index if not exists ux_dim_date_full_date on public.dim_date (full_date)",
    );
    expect(compact(queryMock.mock.calls[14][0])).toBe(
      "create unique index if not exists ux_fact_race_results_race_driver on public.fact_race_results (race_key, driver_key)",
    );
  });

  it("ships a DDL file for every star schema table", async () => {
    const sql = await readSchemaSql();
    for (const index of NATURAL_KEY_INDEXES) {
      expect(sql).toContain(`create table if not exists ${index.table} (`);
    }
  });
});

describe("integrity report", () => {
  it("lists each star schema table once", () => {
    expect(listStarSchemaTables()).toHaveLength(15);
  });

  it("counts orphaned foreign keys with a left join", async () => {
    queryMock.mockResolvedValueOnce({ rows: [{ count: "2" }] });

    expect(await countOrphans(FOREIGN_KEY_CHECKS[0])).toBe(2);
    expect(compact(queryMock.mock.calls[0][0])).toBe(
      "select count(*)::text as count from public.fact_match f left join public.dim_league d on d.league_key = f.league_key where f.league_key is not null and d.league_key is null",
    );
  });

  it("collects counts, duplicates and orphans", async () => {
    queryMock.mockResolvedValue({ rows: [{ count: "0" }] });

    const report = await buildIntegrityReport();

    expect(report.tables).toHaveLength(15);
    expect(report.duplicateKeys).toHaveLength(15);
    expect(report.orphans).toHaveLength(15);
    expect(queryMock).toHaveBeenCalledTimes(45);
    expect(hasIntegrityProblems(report)).toBe(false);
  });

  it("flags duplicate natural keys", () => {
    expect(
      hasIntegrityProblems({
        tables: [],
        duplicateKeys: [{ table: "fact_match", columns: ["api_match_id"], duplicates: 1 }],
        orphans: [],
      }),
    ).toBe(true);
  });
});
