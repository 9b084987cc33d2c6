// 역할: 종목별 피드 계획대로 스테이징 문서를 읽어 문서 단위 트랜잭션으로 스타 스키마에 적재한다.

import type { Transactor } from "../../db/warehouse";
import type { StagingStore } from "../../staging/store";
import type { SportName, StagedDocument } from "../../types";
import { logger as defaultLogger, type Logger } from "../../utils/logger";
import { DimensionKeyCache } from "./dimensionCache";
import { planCollections, type SportDefinition } from "./feed";
import { soccerDefinition } from "./soccer";
import { basketballDefinition } from "./basketball";
import { f1Definition } from "./f1";

export const SPORT_DEFINITIONS: Record<SportName, SportDefinition> = {
  soccer: soccerDefinition,
  basketball: basketballDefinition,
  f1: f1Definition,
};

export type SportEtlStats = {
  sport: SportName;
  collections: number;
  documents: number;
  loaded: number;
  skipped: number;
  failed: number;
};

export type EtlDeps = {
  store: StagingStore;
  transact: Transactor;
  cache?: DimensionKeyCache;
  logger?: Logger;
};

const SKIP_LOG_SAMPLE = 5;

export async function runSportEtl(
  definition: SportDefinition,
  deps: EtlDeps,
): Promise<SportEtlStats> {
  const log = deps.logger ?? defaultLogger;
  const cache = deps.cache ?? new DimensionKeyCache();
  const collectionNames = await deps.store.listCollectionNames();
  const plan = planCollections(definition, collectionNames);

  const stats: SportEtlStats = {
    sport: definition.sport,
    collections: plan.length,
    documents: 0,
    loaded: 0,
    skipped: 0,
    failed: 0,
  };

  if (plan.length === 0) {
    log.warn(
      { job: "etl", sport: definition.sport, available: collectionNames },
      "no staging collections matched",
    );
    return stats;
  }

  log.info(
    {
      job: "etl",
      sport: definition.sport,
      plan: plan.map((entry) => `${entry.feed.name} <- ${entry.collection}`),
    },
    "starting sport etl",
  );

  for (const { feed, collection } of plan) {
    let collectionSkips = 0;

    for await (const doc of deps.store.readCollection(collection)) {
      stats.documents += 1;

      const prepared = feed.prepare(doc);
      if (!prepared.ok) {
        stats.skipped += 1;
        collectionSkips += 1;
        if (collectionSkips <= SKIP_LOG_SAMPLE) {
          log.warn(
            {
              job: "etl",
              stage: "transform",
              feed: feed.name,
              collection,
              documentId: describeDocumentId(doc),
              error: prepared.error,
            },
            "skipping document",
          );
        }
        continue;
      }

      const scope = cache.begin();
      try {
        await deps.transact((writer) => prepared.data({ writer, keys: scope }));
        scope.commit();
        stats.loaded += 1;
      } catch (error) {
        stats.failed += 1;
        log.error(
          {
            job: "etl",
            stage: "load",
            feed: feed.name,
            collection,
            documentId: describeDocumentId(doc),
            error,
          },
          "failed to load document",
        );
      }
    }

    if (collectionSkips > SKIP_LOG_SAMPLE) {
      log.warn(
        { job: "etl", feed: feed.name, collection, skipped: collectionSkips },
        "more documents skipped than logged",
      );
    }
  }

  log.info({ job: "etl", ...stats, cache: cache.stats() }, "sport etl finished");
  return stats;
}

// 역할: 요청한 종목을 정해진 순서로 실행한다. 차원 키 캐시는 종목 간에 공유한다.
export async function runEtl(
  sports: SportName[],
  deps: EtlDeps,
): Promise<SportEtlStats[]> {
  const cache = deps.cache ?? new DimensionKeyCache();
  const results: SportEtlStats[] = [];
  for (const sport of sports) {
    results.push(await runSportEtl(SPORT_DEFINITIONS[sport], { ...deps, cache }));
  }
  return results;
}

export function describeDocumentId(doc: StagedDocument): string | null {
  const id = doc._id;
  if (id === undefined || id === null) return null;
  if (typeof id === "string" || typeof id === "number" || typeof id === "object") {
    return String(id);
  }
  return null;
}
