import { describe, expect, it, vi } from "vitest";
import {
  STAGING_PLANS,
  buildUrl,
  collectionNameFor,
  readEnvelope,
  stageSport,
  type FetchLike,
  type SportStagingPlan,
} from "../../src/staging/apiSports";
import { MemoryStagingStore } from "../helpers/memoryStagingStore";
import { silentLogger } from "../helpers/fixtures";
import { createLogger } from "../../src/utils/logger";

type FakeReply = unknown | Error | number;

function jsonResponse(body: unknown) {
  return { ok: true, status: 200, json: async () => body };
}

// 경로+쿼리 → 응답 본문. 숫자는 HTTP 오류 코드, Error는 네트워크 실패.
function fakeFetch(routes: Record<string, FakeReply>) {
  const requests: Array<{ route: string; key: string | undefined }> = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const parsed = new URL(url);
    const route = `${parsed.pathname}${parsed.search}`;
    requests.push({ route, key: init.headers["x-apisports-key"] });

    const reply = routes[route];
    if (reply === undefined) return { ok: false, status: 404, json: async () => ({}) };
    if (reply instanceof Error) throw reply;
    if (typeof reply === "number") return { ok: false, status: reply, json: async () => ({}) };
    return jsonResponse(reply);
  };
  return { fetchImpl, requests };
}

describe("api helpers", () => {
  it("names staging collections after the endpoint", () => {
    expect(collectionNameFor("f1", "rankings/drivers")).toBe("f1_rankings_drivers");
    expect(collectionNameFor("soccer", "fixtures")).toBe("soccer_fixtures");
  });

  it("builds request urls", () => {
    expect(buildUrl("https://api.test/", "teams", { league: 39, season: 2023 })).toBe(
      "https://api.test/teams?league=39&season=2023",
    );
  });

  it("keeps only record items of the response array", () => {
    expect(readEnvelope({ errors: [], response: [{ id: 1 }, 2, null, [3]] })).toEqual({
      ok: true,
      data: [{ id: 1 }],
    });
  });

  it("fails on api errors or an unexpected shape", () => {
    expect(readEnvelope({ errors: ["rate limit"], response: [] })).toEqual({
      ok: false,
      error: { message: "api returned errors", issues: ["rate limit"] },
    });
    expect(readEnvelope({ errors: { token: "bad key" }, response: [] })).toEqual({
      ok: false,
      error: { message: "api returned errors", issues: ["token: bad key"] },
    });
    expect(readEnvelope({ message: "nope" })).toMatchObject({
      ok: false,
      error: { message: "unexpected api response shape" },
    });
  });
});

describe("stageSport", () => {
  it("replaces collections per endpoint and fans out over completed races", async () => {
    const store = new MemoryStagingStore({
      f1_competitions: [{ id: 0, stale: true }],
      f1_teams: [{ id: 99 }],
    });
    const { fetchImpl, requests } = fakeFetch({
      "/competitions": { response: [{ id: 1, name: "Atlantis Grand Prix" }] },
      "/circuits": { response: [] },
      "/teams": 500,
      "/rankings/drivers?season=2023": { errors: { token: "bad key" }, response: [] },
      "/rankings/teams?season=2023": new Error("socket hang up"),
      "/races?season=2023&type=Race": {
        response: [
          { id: 1700, status: "Completed" },
          { id: 1701, status: "Scheduled" },
          { id: 1702, status: "Completed" },
        ],
      },
      "/rankings/races?race=1700": { response: [{ driver: { id: 25 }, position: 1 }] },
      "/rankings/races?race=1702": { response: [{ race: { id: 1702 }, driver: { id: 26 } }] },
    });

    const stats = await stageSport(STAGING_PLANS.f1, {
      store,
      apiKey: "test-secret",
      fetchImpl,
      minTimeMs: 0,
      logger: silentLogger,
    });

    expect(stats).toEqual({
      sport: "f1",
      endpoints: 7,
      stored: 3,
      empty: 1,
      failed: 3,
      documents: 6,
    });
    expect(store.collections.get("f1_competitions")).toEqual([
      { id: 1, name: "Atlantis Grand Prix" },
    ]);
    expect(store.collections.get("f1_teams")).toEqual([{ id: 99 }]);
    expect(store.collections.has("f1_circuits")).toBe(false);
    expect(store.collections.get("f1_race_results")).toEqual([
      { driver: { id: 25 }, position: 1, race: { id: 1700 } },
      { race: { id: 1702 }, driver: { id: 26 } },
    ]);
    expect(requests.map((request) => request.route)).toEqual([
      "/competitions",
      "/circuits",
      "/teams",
      "/rankings/drivers?season=2023",
      "/rankings/teams?season=2023",
      "/races?season=2023&type=Race",
      "/rankings/races?race=1700",
      "/rankings/races?race=1702",
    ]);
    expect(new Set(requests.map((request) => request.key))).toEqual(new Set(["test-secret"]));
  });

  it("counts a fan-out as failed when every request fails", async () => {
    const plan: SportStagingPlan = {
      sport: "f1",
      baseUrl: "https://api.test",
      endpoints: [
        { endpoint: "races", params: {} },
        {
          endpoint: "rankings/races",
          params: {},
          collection: "race_results",
          fanOut: { fromEndpoint: "races", param: "race", idPath: "id" },
        },
      ],
    };
    const store = new MemoryStagingStore();
    const { fetchImpl } = fakeFetch({
      "/races": { response: [{ id: 1 }, { id: 2 }] },
      "/rankings/races?race=1": 503,
      "/rankings/races?race=2": 503,
    });

    const stats = await stageSport(plan, {
      store,
      apiKey: "test-secret",
      fetchImpl,
      logger: silentLogger,
    });

    expect(stats).toEqual({
      sport: "f1",
      endpoints: 2,
      stored: 1,
      empty: 0,
      failed: 1,
      documents: 2,
    });
    expect(store.collections.has("f1_race_results")).toBe(false);
  });

  it("keeps the staged results when part of a fan-out fails", async () => {
    const plan: SportStagingPlan = {
      sport: "f1",
      baseUrl: "https://api.test",
      endpoints: [
        { endpoint: "races", params: {} },
        {
          endpoint: "rankings/races",
          params: {},
          collection: "race_results",
          fanOut: { fromEndpoint: "races", param: "race", idPath: "id" },
        },
      ],
    };
    const store = new MemoryStagingStore({
      f1_race_results: [{ race: { id: 2 }, driver: { id: 26 }, position: 1 }],
    });
    const { fetchImpl } = fakeFetch({
      "/races": { response: [{ id: 1 }, { id: 2 }] },
      "/rankings/races?race=1": { response: [{ race: { id: 1 }, driver: { id: 25 } }] },
      "/rankings/races?race=2": 503,
    });
    const logger = createLogger("silent");
    const errorSpy = vi.spyOn(logger, "error");

    const stats = await stageSport(plan, {
      store,
      apiKey: "test-secret",
      fetchImpl,
      logger,
    });

    expect(stats).toEqual({
      sport: "f1",
      endpoints: 2,
      stored: 1,
      empty: 0,
      failed: 1,
      documents: 2,
    });
    expect(store.collections.get("f1_race_results")).toEqual([
      { race: { id: 2 }, driver: { id: 26 }, position: 1 },
    ]);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy.mock.calls[0]).toEqual([
      {
        job: "stage",
        sport: "f1",
        endpoint: "rankings/races",
        race: 2,
        error: { message: "http 503" },
      },
      "fan-out request failed",
    ]);
  });
});
