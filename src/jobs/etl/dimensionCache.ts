// 역할: 한 번의 ETL 실행 동안 차원 대리키를 (테이블, 입력 행) 기준으로 재사용한다.
// 트랜잭션 안에서 얻은 키는 커밋된 뒤에만 다른 문서에 보인다.

export type CacheStats = { hits: number; misses: number; entries: number };

export class DimensionKeyCache {
  private readonly committed = new Map<string, number>();
  private hits = 0;
  private misses = 0;

  begin(): DimensionCacheScope {
    return new DimensionCacheScope(this);
  }

  lookup(cacheKey: string): number | undefined {
    const key = this.committed.get(cacheKey);
    if (key !== undefined) this.hits += 1;
    return key;
  }

  recordMiss(): void {
    this.misses += 1;
  }

  absorb(entries: Map<string, number>): void {
    for (const [cacheKey, key] of entries) {
      this.committed.set(cacheKey, key);
    }
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, entries: this.committed.size };
  }
}

export class DimensionCacheScope {
  private readonly pending = new Map<string, number>();
  private closed = false;

  constructor(private readonly parent: DimensionKeyCache) {}

  async resolve<T>(
    table: string,
    row: T,
    upsert: (row: T) => Promise<number>,
  ): Promise<number> {
    const cacheKey = `${table}:${JSON.stringify(row)}`;
    const cached = this.pending.get(cacheKey) ?? this.parent.lookup(cacheKey);
    if (cached !== undefined) return cached;

    this.parent.recordMiss();
    const key = await upsert(row);
    this.pending.set(cacheKey, key);
    return key;
  }

  async resolveOptional<T>(
    table: string,
    row: T | null,
    upsert: (row: T) => Promise<number>,
  ): Promise<number | null> {
    if (row === null) return null;
    return this.resolve(table, row, upsert);
  }

  // 트랜잭션 커밋 이후에 호출한다. 롤백된 스코프는 그냥 버린다.
  commit(): void {
    if (this.closed) return;
    this.closed = true;
    this.parent.absorb(this.pending);
    this.pending.clear();
  }
}
