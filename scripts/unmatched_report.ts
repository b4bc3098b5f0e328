// scripts/unmatched_report.ts
// Purpose: List placeholder speakers so they can be re-linked by hand.
//
// Usage:
//   npm run report:unmatched
//   npm run report:unmatched -- --out=.reports/unmatched.json

import fs from "node:fs";
import path from "node:path";
import { CliUsageError, parseReportFlags } from "../src/cli";
import { config } from "../src/config";
import { createAdapter, initSchema } from "../src/db";
import { buildUnmatchedSpeakersReport } from "../src/ingest/reports";
import { createLogger } from "../src/observability";

const log = createLogger("scripts/unmatched_report");

async function main() {
  const { out } = parseReportFlags(process.argv);
  const db = createAdapter(config.database);

  try {
    await initSchema(db);
    const report = await buildUnmatchedSpeakersReport(db);
    console.log(JSON.stringify(report, null, 2));

    if (out) {
      const dst = path.resolve(out);
      fs.mkdirSync(path.dirname(dst), { recursive: true });
      fs.writeFileSync(dst, JSON.stringify(report, null, 2), "utf8");
      log.info({ path: dst, totalUnmatched: report.totalUnmatched }, "Report written");
    }
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((err) => {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      process.exit(2);
    }
    log.fatal({ err }, "Unmatched speakers report failed");
    process.exit(1);
  });
}
