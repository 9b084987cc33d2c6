import staging from "../fixtures/staging.json";
import type { StagedDocument } from "../../src/types";
import { createLogger } from "../../src/utils/logger";

export const silentLogger = createLogger("silent");

// 컬렉션 이름 → 문서 목록. 테스트마다 새 사본을 돌려준다.
export function stagingFixture(
  only?: (name: string) => boolean,
): Record<string, StagedDocument[]> {
  const copy: Record<string, StagedDocument[]> = structuredClone(staging);
  if (!only) return copy;
  return Object.fromEntries(Object.entries(copy).filter(([name]) => only(name)));
}

export function fixtureDoc(collection: string, index: number): StagedDocument {
  const doc = stagingFixture()[collection]?.[index];
  if (!doc) throw new Error(`fixture ${collection}[${index}] not found`);
  return doc;
}
