// 역할: 스테이징/ETL 파이프라인 전반에서 사용하는 공통 타입 정의.

export type Result<T> =
  | { ok: true; data: T }
  | { ok: false; error: { message: string; issues?: string[] } };

export type SportName = "soccer" | "basketball" | "f1";

export const SPORT_NAMES: readonly SportName[] = ["soccer", "basketball", "f1"];

// 문서 저장소에서 읽은 원본 문서. 스키마가 보장되지 않는다.
export type StagedDocument = Record<string, unknown>;

export type CalendarDate = {
  iso: string;
  year: number;
  month: number;
  day: number;
  weekday: string;
  isWeekend: boolean;
};
