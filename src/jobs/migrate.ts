// 역할: MongoDB 스테이징 → PostgreSQL 스타 스키마 마이그레이션 엔트리.
// 사용법: tsx src/jobs/migrate.ts [soccer] [basketball] [f1]
import "dotenv/config";

import { loadEnv, parseSportList } from "../config/env";
import { closePool, withClient } from "../db/client";
import { pgTransactor } from "../db/warehouse";
import { ensureNaturalKeyIndexes } from "../db/repos/schema.repo";
import {
  buildIntegrityReport,
  hasIntegrityProblems,
} from "../db/repos/integrity.repo";
import { openMongoStagingStore } from "../staging/mongoStore";
import { runEtl } from "./etl/runner";
import { createLogger } from "../utils/logger";

console.log("[BOOT] migrate.ts loaded", new Date().toISOString());

async function main() {
  const env = loadEnv();
  const logger = createLogger(env.logLevel);
  const args = process.argv.slice(2);
  const sports = args.length > 0 ? parseSportList(args.join(",")) : env.sports;

  logger.info({ job: "etl", sports, mongoDb: env.mongo.dbName }, "etl job started");

  try {
    const indexes = await withClient((client) => ensureNaturalKeyIndexes(client));
    logger.info({ job: "etl", stage: "schema", indexes }, "natural key indexes ensured");

    const mongo = await openMongoStagingStore(env.mongo.uri, env.mongo.dbName);
    try {
      const results = await runEtl(sports, {
        store: mongo.store,
        transact: pgTransactor,
        logger,
      });

      const report = await withClient((client) => buildIntegrityReport(client));
      if (hasIntegrityProblems(report)) {
        logger.warn({ job: "etl", stage: "integrity", report }, "integrity problems found");
      } else {
        logger.info({ job: "etl", stage: "integrity", tables: report.tables }, "integrity ok");
      }

      logger.info({ job: "etl", results }, "etl job finished");
      console.log("[DONE]", results);
    } finally {
      await mongo.close();
    }
  } finally {
    await closePool();
  }
}

main().catch((error) => {
  console.error("[FATAL] etl job failed", error);
  process.exitCode = 1;
});
