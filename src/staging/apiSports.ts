// 역할: API-Sports에서 시즌 통계를 받아 스테이징 컬렉션(<종목>_<엔드포인트>)으로 교체 저장한다.

import Bottleneck from "bottleneck";
import { z } from "zod";
import type { Result, SportName, StagedDocument } from "../types";
import { getPath, isRecord } from "../parsers/common/docPath";
import { toInt, toText } from "../parsers/common/values";
import { logger as defaultLogger, type Logger } from "../utils/logger";
import type { StagingStore } from "./store";

export type QueryParams = Record<string, string | number>;

export type StagingEndpoint = {
  endpoint: string;
  params: QueryParams;
  // 이미 저장된 컬렉션의 문서마다 한 번씩 호출하는 엔드포인트.
  fanOut?: {
    fromEndpoint: string;
    param: string;
    idPath: string;
    filter?: (doc: StagedDocument) => boolean;
    // 응답 문서에 원본 id를 남긴다(응답에 빠져 있을 때).
    stamp?: (doc: StagedDocument, id: number) => StagedDocument;
  };
  // fan-out 결과를 저장할 컬렉션 접미어. 기본값은 엔드포인트 이름.
  collection?: string;
};

export type SportStagingPlan = {
  sport: SportName;
  baseUrl: string;
  endpoints: StagingEndpoint[];
};

export const STAGING_PLANS: Record<SportName, SportStagingPlan> = {
  soccer: {
    sport: "soccer",
    baseUrl: "https://v3.football.api-sports.io",
    endpoints: [
      { endpoint: "leagues", params: {} },
      { endpoint: "teams", params: { league: 39, season: 2023 } },
      { endpoint: "players", params: { league: 39, season: 2023 } },
      { endpoint: "fixtures", params: { league: 39, season: 2023 } },
    ],
  },
  basketball: {
    sport: "basketball",
    baseUrl: "https://v1.basketball.api-sports.io",
    endpoints: [
      { endpoint: "leagues", params: {} },
      { endpoint: "teams", params: { league: 12, season: "2023-2024" } },
      { endpoint: "players", params: { team: 1, season: "2023-2024" } },
      { endpoint: "games", params: { league: 12, season: "2023-2024" } },
    ],
  },
  f1: {
    sport: "f1",
    baseUrl: "https://v1.formula-1.api-sports.io",
    endpoints: [
      { endpoint: "competitions", params: {} },
      { endpoint: "circuits", params: {} },
      { endpoint: "teams", params: {} },
      { endpoint: "rankings/drivers", params: { season: 2023 } },
      { endpoint: "rankings/teams", params: { season: 2023 } },
      { endpoint: "races", params: { season: 2023, type: "Race" } },
      {
        endpoint: "rankings/races",
        params: {},
        collection: "race_results",
        fanOut: {
          fromEndpoint: "races",
          param: "race",
          idPath: "id",
          filter: (doc) => toText(getPath(doc, "status")) === "Completed",
          stamp: (doc, id) => (isRecord(doc.race) ? doc : { ...doc, race: { id } }),
        },
      },
    ],
  },
};

const EnvelopeSchema = z.object({
  response: z.array(z.unknown()),
  errors: z.union([z.array(z.unknown()), z.record(z.unknown())]).optional(),
});

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string> },
) => Promise<{ ok: boolean; status: number; json: () => Promise<unknown> }>;

export type StageStats = {
  sport: SportName;
  endpoints: number;
  stored: number;
  empty: number;
  failed: number;
  documents: number;
};

export type StageDeps = {
  store: StagingStore;
  apiKey: string;
  fetchImpl?: FetchLike;
  minTimeMs?: number;
  logger?: Logger;
};

export function collectionNameFor(sport: SportName, endpoint: string): string {
  return `${sport}_${endpoint.replace(/\//g, "_")}`;
}

export function buildUrl(baseUrl: string, endpoint: string, params: QueryParams): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, "")}/${endpoint}`);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

// 역할: 응답 봉투를 검증하고 response 배열만 문서로 꺼낸다.
export function readEnvelope(body: unknown): Result<StagedDocument[]> {
  const parsed = EnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      error: {
        message: "unexpected api response shape",
        issues: parsed.error.issues.map((issue) => issue.message),
      },
    };
  }

  const errors = parsed.data.errors;
  const errorMessages = Array.isArray(errors)
    ? errors.map((entry) => String(entry))
    : Object.entries(errors ?? {}).map(([key, value]) => `${key}: ${String(value)}`);
  if (errorMessages.length > 0) {
    return { ok: false, error: { message: "api returned errors", issues: errorMessages } };
  }

  return { ok: true, data: parsed.data.response.filter(isRecord) };
}

// 역할: 종목 하나의 스테이징 계획을 순서대로 실행한다. 실패한 엔드포인트는 건너뛴다.
export async function stageSport(
  plan: SportStagingPlan,
  deps: StageDeps,
): Promise<StageStats> {
  const log = deps.logger ?? defaultLogger;
  const fetchImpl: FetchLike = deps.fetchImpl ?? fetch;
  const limiter = new Bottleneck({ maxConcurrent: 1, minTime: deps.minTimeMs ?? 0 });
  const headers = { "x-apisports-key": deps.apiKey };

  const stats: StageStats = {
    sport: plan.sport,
    endpoints: 0,
    stored: 0,
    empty: 0,
    failed: 0,
    documents: 0,
  };

  const fetchDocs = async (
    endpoint: string,
    params: QueryParams,
  ): Promise<Result<StagedDocument[]>> => {
    const url = buildUrl(plan.baseUrl, endpoint, params);
    log.info({ job: "stage", sport: plan.sport, endpoint, params }, "fetching");
    try {
      const response = await limiter.schedule(() => fetchImpl(url, { headers }));
      if (!response.ok) {
        return { ok: false, error: { message: `http ${response.status}` } };
      }
      return readEnvelope(await response.json());
    } catch (error) {
      return {
        ok: false,
        error: { message: error instanceof Error ? error.message : String(error) },
      };
    }
  };

  for (const entry of plan.endpoints) {
    stats.endpoints += 1;
    const collection = collectionNameFor(plan.sport, entry.collection ?? entry.endpoint);

    let result: Result<StagedDocument[]>;
    if (entry.fanOut) {
      result = await fetchFanOut(entry, plan, deps.store, fetchDocs, log);
    } else {
      result = await fetchDocs(entry.endpoint, entry.params);
    }

    if (!result.ok) {
      stats.failed += 1;
      log.error(
        { job: "stage", sport: plan.sport, endpoint: entry.endpoint, error: result.error },
        "failed to fetch endpoint",
      );
      continue;
    }

    if (result.data.length === 0) {
      stats.empty += 1;
      log.warn({ job: "stage", sport: plan.sport, endpoint: entry.endpoint }, "no data");
      continue;
    }

    const inserted = await deps.store.replaceCollection(collection, result.data);
    stats.stored += 1;
    stats.documents += inserted;
    log.info(
      { job: "stage", sport: plan.sport, collection, inserted },
      "replaced staging collection",
    );
  }

  return stats;
}

// 역할: 원본 컬렉션의 id마다 요청한다. 하나라도 실패하면 기존 컬렉션을 건드리지 않도록 엔드포인트 실패로 돌려준다.
async function fetchFanOut(
  entry: StagingEndpoint,
  plan: SportStagingPlan,
  store: StagingStore,
  fetchDocs: (endpoint: string, params: QueryParams) => Promise<Result<StagedDocument[]>>,
  log: Logger,
): Promise<Result<StagedDocument[]>> {
  const fanOut = entry.fanOut;
  if (!fanOut) return { ok: true, data: [] };

  const ids: number[] = [];
  const source = collectionNameFor(plan.sport, fanOut.fromEndpoint);
  for await (const doc of store.readCollection(source)) {
    if (fanOut.filter && !fanOut.filter(doc)) continue;
    const id = toInt(getPath(doc, fanOut.idPath));
    if (id !== null) ids.push(id);
  }

  const docs: StagedDocument[] = [];
  const failures: string[] = [];
  for (const id of ids) {
    const result = await fetchDocs(entry.endpoint, { ...entry.params, [fanOut.param]: id });
    if (!result.ok) {
      failures.push(`${fanOut.param}=${id}: ${result.error.message}`);
      log.error(
        {
          job: "stage",
          sport: plan.sport,
          endpoint: entry.endpoint,
          [fanOut.param]: id,
          error: result.error,
        },
        "fan-out request failed",
      );
      continue;
    }
    const stamp = fanOut.stamp;
    docs.push(...(stamp ? result.data.map((doc) => stamp(doc, id)) : result.data));
  }

  if (failures.length > 0) {
    return {
      ok: false,
      error: {
        message: `${failures.length} of ${ids.length} fan-out requests failed`,
        issues: failures,
      },
    };
  }
  return { ok: true, data: docs };
}

export async function stageSports(
  sports: SportName[],
  deps: StageDeps,
): Promise<StageStats[]> {
  const results: StageStats[] = [];
  for (const sport of sports) {
    results.push(await stageSport(STAGING_PLANS[sport], deps));
  }
  return results;
}
