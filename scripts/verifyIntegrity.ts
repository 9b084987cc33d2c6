// 역할: 스타 스키마의 행 수/자연키 중복/고아 외래키를 출력하는 점검 스크립트.
import "dotenv/config";
import { closePool } from "../src/db/client";
import {
  buildIntegrityReport,
  hasIntegrityProblems,
  type IntegrityReport,
} from "../src/db/repos/integrity.repo";

async function main() {
  let report: IntegrityReport;
  try {
    report = await buildIntegrityReport();
  } finally {
    await closePool();
  }

  for (const { table, rows } of report.tables) {
    console.log(`${table.padEnd(24)} ${rows}`);
  }
  for (const entry of report.duplicateKeys.filter((item) => item.duplicates > 0)) {
    console.error(
      `✖ duplicate natural keys: ${entry.table} (${entry.columns.join(", ")}) x${entry.duplicates}`,
    );
  }
  for (const entry of report.orphans.filter((item) => item.orphans > 0)) {
    console.error(`✖ orphan foreign keys: ${entry.table}.${entry.column} x${entry.orphans}`);
  }

  if (hasIntegrityProblems(report)) {
    process.exitCode = 1;
    return;
  }
  console.log("✅ star schema integrity ok");
}

main().catch((error) => {
  console.error("✖ Unexpected failure:", error);
  process.exitCode = 1;
});
