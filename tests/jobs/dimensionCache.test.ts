import { describe, expect, it, vi } from "vitest";
import { DimensionKeyCache } from "../../src/jobs/etl/dimensionCache";

describe("DimensionKeyCache", () => {
  it("reuses a key for the same table and row within a scope", async () => {
    const cache = new DimensionKeyCache();
    const upsert = vi.fn(async () => 41);
    const scope = cache.begin();

    expect(await scope.resolve("dim_team", { apiTeamId: 1 }, upsert)).toBe(41);
    expect(await scope.resolve("dim_team", { apiTeamId: 1 }, upsert)).toBe(41);
    expect(upsert).toHaveBeenCalledTimes(1);
  });

  it("upserts again when the row carries different attributes", async () => {
    const cache = new DimensionKeyCache();
    const upsert = vi.fn(async () => 7);
    const scope = cache.begin();

    await scope.resolve("dim_team", { apiTeamId: 1, name: null }, upsert);
    await scope.resolve("dim_team", { apiTeamId: 1, name: "Riverside FC" }, upsert);
    expect(upsert).toHaveBeenCalledTimes(2);
  });

  it("separates tables with the same row", async () => {
    const scope = new DimensionKeyCache().begin();
    await scope.resolve("dim_team", { apiTeamId: 1 }, async () => 1);
    expect(await scope.resolve("dim_team_basketball", { apiTeamId: 1 }, async () => 9)).toBe(9);
  });

  it("shares keys with later scopes only after commit", async () => {
    const cache = new DimensionKeyCache();
    const first = cache.begin();
    await first.resolve("dim_date", { iso: "2023-08-12" }, async () => 3);

    const upsert = vi.fn(async () => 4);
    await cache.begin().resolve("dim_date", { iso: "2023-08-12" }, upsert);
    expect(upsert).toHaveBeenCalledTimes(1);

    first.commit();
    expect(await cache.begin().resolve("dim_date", { iso: "2023-08-12" }, upsert)).toBe(3);
    expect(upsert).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toEqual({ hits: 1, misses: 2, entries: 1 });
  });

  it("drops keys from a scope that never commits", async () => {
    const cache = new DimensionKeyCache();
    await cache.begin().resolve("dim_venue", { apiVenueId: 8 }, async () => 12);
    expect(cache.stats().entries).toBe(0);
  });

  it("returns null for absent optional rows without upserting", async () => {
    const upsert = vi.fn(async () => 1);
    const scope = new DimensionKeyCache().begin();
    expect(await scope.resolveOptional("dim_referee", null, upsert)).toBeNull();
    expect(upsert).not.toHaveBeenCalled();
  });
});
