// 역할: 잡 공통 pino 로거를 만든다.
import pino, { type Logger } from "pino";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino({ level });
}

export const logger = createLogger();
