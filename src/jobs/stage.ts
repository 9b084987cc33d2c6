// 역할: API-Sports → MongoDB 스테이징 엔트리.
// 사용법: tsx src/jobs/stage.ts [soccer] [basketball] [f1]
import "dotenv/config";

import { loadEnv, parseSportList } from "../config/env";
import { openMongoStagingStore } from "../staging/mongoStore";
import { stageSports } from "../staging/apiSports";
import { createLogger } from "../utils/logger";

console.log("[BOOT] stage.ts loaded", new Date().toISOString());

async function main() {
  const env = loadEnv();
  const logger = createLogger(env.logLevel);
  const args = process.argv.slice(2);
  const sports = args.length > 0 ? parseSportList(args.join(",")) : env.sports;

  if (!env.apiSports.key) {
    logger.error({ job: "stage" }, "API_SPORTS_KEY env is required to run staging");
    process.exitCode = 1;
    return;
  }

  logger.info({ job: "stage", sports, mongoDb: env.mongo.dbName }, "stage job started");
  const mongo = await openMongoStagingStore(env.mongo.uri, env.mongo.dbName);
  try {
    const results = await stageSports(sports, {
      store: mongo.store,
      apiKey: env.apiSports.key,
      minTimeMs: env.apiSports.minTimeMs,
      logger,
    });
    logger.info({ job: "stage", results }, "stage job finished");
    console.log("[DONE]", results);
  } finally {
    await mongo.close();
  }
}

main().catch((error) => {
  console.error("[FATAL] stage job failed", error);
  process.exitCode = 1;
});
