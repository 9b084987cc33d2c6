// 역할: 스테이징 문서 저장소 추상화(읽기/컬렉션 교체).

import type { StagedDocument } from "../types";

export interface StagingStore {
  listCollectionNames(): Promise<string[]>;
  readCollection(name: string): AsyncIterable<StagedDocument>;
  // 컬렉션을 비우고 주어진 문서로 채운다. 저장한 문서 수를 반환.
  replaceCollection(name: string, docs: StagedDocument[]): Promise<number>;
}
