// 역할: 느슨한 타입의 API 값을 숫자/문자열/날짜로 정규화하는 변환 유틸.

import type { CalendarDate } from "../../types";

const WEEKDAYS = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

export function toText(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

// 역할: 정수 또는 정수 문자열("38", " 7 ")만 받아들인다.
export function toInt(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!/^-?\d+$/.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

export function toDecimal(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim().replace(/,/g, "");
    if (!/^-?\d+(?:\.\d+)?$/.test(trimmed)) return null;
    return Number(trimmed);
  }
  return null;
}

// 역할: "55%" / "55" / 55 형태의 점유율을 숫자로 바꾼다. 0~100 범위만 허용.
export function parsePercent(value: unknown): number | null {
  const text = typeof value === "string" ? value.replace("%", "") : value;
  const parsed = toDecimal(text);
  if (parsed === null || parsed < 0 || parsed > 100) return null;
  return parsed;
}

// 역할: "5.412 Kms" 같은 길이 문자열에서 앞의 숫자를 꺼낸다.
export function parseLeadingNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") return null;
  const match = value.replace(/,/g, "").match(/^\s*(\d+(?:\.\d+)?)/);
  return match ? Number(match[1]) : null;
}

// 역할: ISO 문자열/Date/epoch 초를 달력 날짜로 바꾼다.
// 문자열은 적힌 날짜 부분을 그대로 쓰고 타임존 보정은 하지 않는다.
export function toCalendarDate(value: unknown): CalendarDate | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return buildCalendarDate(
      value.getUTCFullYear(),
      value.getUTCMonth() + 1,
      value.getUTCDate(),
    );
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    const date = new Date(value * 1000);
    if (Number.isNaN(date.getTime())) return null;
    return buildCalendarDate(
      date.getUTCFullYear(),
      date.getUTCMonth() + 1,
      date.getUTCDate(),
    );
  }
  if (typeof value !== "string") return null;

  const match = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (!match) return null;
  return buildCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function buildCalendarDate(
  year: number,
  month: number,
  day: number,
): CalendarDate | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  const weekdayIndex = date.getUTCDay();
  return {
    iso: `${String(year).padStart(4, "0")}-${pad2(month)}-${pad2(day)}`,
    year,
    month,
    day,
    weekday: WEEKDAYS[weekdayIndex],
    isWeekend: weekdayIndex === 0 || weekdayIndex === 6,
  };
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

// 역할: "Michael Oliver, England" 형태의 심판 표기를 이름/국적으로 나눈다.
export function splitRefereeLabel(
  label: string,
): { name: string; nationality: string | null } | null {
  const trimmed = label.trim();
  if (!trimmed) return null;
  const commaIndex = trimmed.lastIndexOf(",");
  if (commaIndex < 0) {
    return { name: trimmed, nationality: null };
  }
  const name = trimmed.slice(0, commaIndex).trim();
  const nationality = trimmed.slice(commaIndex + 1).trim();
  if (!name) return null;
  return { name, nationality: nationality || null };
}
