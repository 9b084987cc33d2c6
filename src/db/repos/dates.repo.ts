// 역할: dim_date(공통 날짜 차원) 업서트 레포지토리.

import { query, type DbClient } from "../client";
import type { CalendarDate } from "../../types";

// 역할: full_date 기준으로 날짜 행을 업서트하고 date_key를 반환한다.
export async function upsertDate(
  date: CalendarDate,
  client?: DbClient,
): Promise<number> {
  const result = await query<{ dateKey: number }>(
    `insert into public.dim_date
      (full_date, year, month, day, weekday, is_weekend)
     values ($1, $2, $3, $4, $5, $6)
     on conflict (full_date) do update set year = excluded.year
     returning date_key as "dateKey"`,
    [date.iso, date.year, date.month, date.day, date.weekday, date.isWeekend],
    client,
  );
  return result.rows[0].dateKey;
}
