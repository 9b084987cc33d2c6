// 역할: 환경변수를 zod로 검증해 파이프라인 설정 객체로 변환한다.

import { z } from "zod";
import { SPORT_NAMES, type SportName } from "../types";

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

// 빈 문자열("PG_PORT=")은 값이 없는 것으로 보고 기본값을 쓴다.
function blankAsMissing(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => (value ?? "false").trim().toLowerCase() === "true");

const EnvSchema = z.object({
  DATABASE_URL: optionalText,
  PG_HOST: optionalText,
  PG_PORT: z.preprocess(blankAsMissing, z.coerce.number().int().positive().default(5432)),
  PG_DB: optionalText,
  PG_USER: optionalText,
  PG_PASS: optionalText,
  PG_SSL: booleanFlag,
  MONGO_URI: optionalText,
  MONGO_DB: optionalText,
  API_SPORTS_KEY: optionalText,
  API_KEY: optionalText,
  API_SPORTS_MIN_TIME_MS: z.preprocess(
    blankAsMissing,
    z.coerce.number().int().nonnegative().default(7000),
  ),
  ETL_SPORTS: optionalText,
  LOG_LEVEL: optionalText,
});

export type PostgresConfig =
  | { connectionString: string; ssl: boolean }
  | {
      host: string;
      port: number;
      database: string;
      user: string;
      password: string;
      ssl: boolean;
    };

export type AppEnv = {
  postgres: PostgresConfig;
  mongo: { uri: string; dbName: string };
  apiSports: { key: string | null; minTimeMs: number };
  sports: SportName[];
  logLevel: string;
};

// 역할: process.env(또는 주입된 값)를 검증하고 기본값을 채운다.
export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`invalid environment: ${issues}`);
  }
  const env = parsed.data;

  const postgres: PostgresConfig = env.DATABASE_URL
    ? { connectionString: env.DATABASE_URL, ssl: env.PG_SSL }
    : {
        host: env.PG_HOST ?? "localhost",
        port: env.PG_PORT,
        database: env.PG_DB ?? "sports_dw",
        user: env.PG_USER ?? "postgres",
        password: env.PG_PASS ?? "postgres",
        ssl: env.PG_SSL,
      };

  return {
    postgres,
    mongo: {
      uri: env.MONGO_URI ?? "mongodb://localhost:27017",
      dbName: env.MONGO_DB ?? "sports_db",
    },
    apiSports: {
      key: env.API_SPORTS_KEY ?? env.API_KEY ?? null,
      minTimeMs: env.API_SPORTS_MIN_TIME_MS,
    },
    sports: parseSportList(env.ETL_SPORTS),
    logLevel: env.LOG_LEVEL ?? "info",
  };
}

// 역할: "soccer,f1" 같은 목록을 종목 배열로 바꾼다. 비어 있으면 전체 종목.
export function parseSportList(raw?: string | null): SportName[] {
  if (!raw) return [...SPORT_NAMES];
  const requested = raw
    .split(/[\s,]+/)
    .map((token) => token.trim().toLowerCase())
    .filter(Boolean);
  if (requested.length === 0) return [...SPORT_NAMES];

  const unknown = requested.filter((token) => !isSportName(token));
  if (unknown.length > 0) {
    throw new Error(`unknown sport(s): ${unknown.join(", ")}`);
  }
  return SPORT_NAMES.filter((sport) => requested.includes(sport));
}

export function isSportName(value: string): value is SportName {
  return SPORT_NAMES.some((sport) => sport === value);
}
