// scripts/verify_integrity.ts
// Purpose: Check that every speech segment points at an existing person,
// topic and session. Exits 1 when orphans exist.
//
// Usage:
//   npm run verify
//   npm run verify -- --out=.reports/integrity.json

import fs from "node:fs";
import path from "node:path";
import { CliUsageError, parseReportFlags } from "../src/cli";
import { config } from "../src/config";
import { createAdapter, initSchema } from "../src/db";
import { verifyReferentialIntegrity } from "../src/ingest/reports";
import { createLogger } from "../src/observability";

const log = createLogger("scripts/verify_integrity");

async function main(): Promise<number> {
  const { out } = parseReportFlags(process.argv);
  const db = createAdapter(config.database);

  try {
    await initSchema(db);
    const report = await verifyReferentialIntegrity(db);
    console.log(JSON.stringify({ ok: report.ok, checked: report.checkedSpeeches, orphans: report.orphans.length }, null, 2));

    for (const orphan of report.orphans) {
      console.log(`  ORPHAN  ${orphan.speechId}  missing=${orphan.missing.join(",")}`);
    }

    if (out) {
      const dst = path.resolve(out);
      fs.mkdirSync(path.dirname(dst), { recursive: true });
      fs.writeFileSync(dst, JSON.stringify(report, null, 2), "utf8");
      log.info({ path: dst }, "Integrity report written");
    }

    return report.ok ? 0 : 1;
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err) => {
      if (err instanceof CliUsageError) {
        console.error(err.message);
        process.exit(2);
      }
      log.fatal({ err }, "Integrity check failed");
      process.exit(1);
    });
}
