// 역할: 스키마가 없는 스테이징 문서에서 중첩 필드를 안전하게 꺼내는 유틸.

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// 역할: "fixture.venue.id" 같은 점 경로를 따라가며 값을 찾는다. 중간이 비면 undefined.
export function getPath(source: unknown, dottedPath: string): unknown {
  let current: unknown = source;
  for (const key of dottedPath.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

// 역할: 여러 후보 경로 중 처음으로 비어 있지 않은 값을 반환한다.
export function firstPresent(source: unknown, ...paths: string[]): unknown {
  for (const candidate of paths) {
    const value = getPath(source, candidate);
    if (value !== undefined && value !== null && value !== "") {
      return value;
    }
  }
  return undefined;
}

export function getRecord(source: unknown, dottedPath: string): UnknownRecord | null {
  const value = getPath(source, dottedPath);
  return isRecord(value) ? value : null;
}

export function getArray(source: unknown, dottedPath: string): unknown[] {
  const value = getPath(source, dottedPath);
  return Array.isArray(value) ? value : [];
}
