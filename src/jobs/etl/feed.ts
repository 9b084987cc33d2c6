// 역할: 컬렉션 → 파서 → 적재 함수를 묶는 ETL 피드 정의.

import type { Result, SportName, StagedDocument } from "../../types";
import type { StarSchemaWriter } from "../../db/warehouse";
import type { DimensionCacheScope } from "./dimensionCache";

export type LoadContext = {
  writer: StarSchemaWriter;
  keys: DimensionCacheScope;
};

export type LoadStep = (ctx: LoadContext) => Promise<void>;

export type FeedKind = "dimension" | "fact";

export type EtlFeed = {
  name: string;
  kind: FeedKind;
  // 종목 접두어를 뗀 컬렉션 이름("fixtures", "rankings_drivers")을 받는다.
  matches: (suffix: string) => boolean;
  prepare: (doc: StagedDocument) => Result<LoadStep>;
};

export type SportDefinition = {
  sport: SportName;
  collectionPrefixes: string[];
  // 같은 kind 안에서는 나열 순서대로 실행한다.
  feeds: EtlFeed[];
};

export function defineFeed<T>(options: {
  name: string;
  kind: FeedKind;
  matches: (suffix: string) => boolean;
  parse: (doc: StagedDocument) => Result<T>;
  load: (record: T, ctx: LoadContext) => Promise<void>;
}): EtlFeed {
  return {
    name: options.name,
    kind: options.kind,
    matches: options.matches,
    prepare: (doc) => {
      const parsed = options.parse(doc);
      if (!parsed.ok) return parsed;
      const record = parsed.data;
      return { ok: true, data: (ctx) => options.load(record, ctx) };
    },
  };
}

export function suffixIs(...names: string[]): (suffix: string) => boolean {
  return (suffix) => names.includes(suffix);
}

// 역할: 컬렉션 이름에서 종목 접두어를 떼어낸다. 종목 컬렉션이 아니면 null.
export function collectionSuffix(
  collection: string,
  prefixes: string[],
): string | null {
  const lowered = collection.toLowerCase();
  for (const prefix of prefixes) {
    if (lowered === prefix) return "";
    if (lowered.startsWith(`${prefix}_`)) return lowered.slice(prefix.length + 1);
  }
  return null;
}

export type CollectionAssignment = { feed: EtlFeed; collection: string };

// 역할: 차원 피드 → 팩트 피드 순서로 컬렉션을 배정한다. 한 컬렉션은 처음 일치한 피드 하나만 읽는다.
export function planCollections(
  definition: SportDefinition,
  collectionNames: string[],
): CollectionAssignment[] {
  const claimed = new Set<string>();
  const sorted = [...collectionNames].sort();
  const plan: CollectionAssignment[] = [];

  const ordered = [
    ...definition.feeds.filter((feed) => feed.kind === "dimension"),
    ...definition.feeds.filter((feed) => feed.kind === "fact"),
  ];

  for (const feed of ordered) {
    for (const collection of sorted) {
      if (claimed.has(collection)) continue;
      const suffix = collectionSuffix(collection, definition.collectionPrefixes);
      if (suffix === null || !feed.matches(suffix)) continue;
      claimed.add(collection);
      plan.push({ feed, collection });
    }
  }
  return plan;
}
