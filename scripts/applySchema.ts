// 역할: sql/schema.sql로 스타 스키마를 만들고 자연키 인덱스를 보장하는 스크립트.
import "dotenv/config";
import { closePool, withTx } from "../src/db/client";
import {
  applySchema,
  ensureNaturalKeyIndexes,
  readSchemaSql,
  SCHEMA_FILE,
} from "../src/db/repos/schema.repo";

async function main() {
  const sql = await readSchemaSql();
  try {
    await withTx(async (client) => {
      await applySchema(sql, client);
      const indexes = await ensureNaturalKeyIndexes(client);
      console.log(`[OK] applied ${SCHEMA_FILE} (${indexes} natural key indexes)`);
    });
  } finally {
    await closePool();
  }
}

main().catch((error) => {
  console.error("[FATAL] failed to apply schema", error);
  process.exitCode = 1;
});
