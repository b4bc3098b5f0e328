// scripts/run_pipeline.ts
// Purpose: Ingest raw profile and transcript files into the canonical store.
//
// Usage:
//   npm run pipeline
//   npm run pipeline -- --profiles=data/raw/openparlamento --transcripts=data/raw/camera
//   npm run pipeline -- --skip-profiles --chamber=S --metrics-out=.reports/metrics.prom
//
// Prints the run summary as JSON. Units that roll back are reported, not fatal.

import fs from "node:fs";
import path from "node:path";
import { CliUsageError, parseRunFlags } from "../src/cli";
import { config } from "../src/config";
import { createAdapter, initSchema } from "../src/db";
import { discoverProfileUnits } from "../src/ingest/readers/profileReader";
import { discoverTranscriptUnits } from "../src/ingest/readers/transcriptReader";
import { runPipeline } from "../src/ingest/pipeline";
import { createLogger, renderMetrics } from "../src/observability";

const log = createLogger("scripts/run_pipeline");

async function main() {
  const flags = parseRunFlags(process.argv);
  const profilesDir = path.resolve(flags.profiles ?? config.sources.profilesPath);
  const transcriptsDir = path.resolve(flags.transcripts ?? config.sources.transcriptsPath);

  const profileUnits = flags.skipProfiles ? [] : discoverProfileUnits(profilesDir);
  const transcriptUnits = flags.skipTranscripts ? [] : discoverTranscriptUnits(transcriptsDir);

  log.info(
    { profilesDir, transcriptsDir, profiles: profileUnits.length, transcripts: transcriptUnits.length },
    "Discovered raw units"
  );

  const db = createAdapter(config.database);
  try {
    await initSchema(db);
    const summary = await runPipeline({
      db,
      profileUnits,
      transcriptUnits,
      defaultChamber: flags.chamber ?? config.sources.defaultChamber,
    });

    console.log(JSON.stringify(summary, null, 2));

    if (flags.metricsOut) {
      const dst = path.resolve(flags.metricsOut);
      fs.mkdirSync(path.dirname(dst), { recursive: true });
      fs.writeFileSync(dst, await renderMetrics(), "utf8");
      log.info({ path: dst }, "Metrics written");
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
    log.fatal({ err }, "Pipeline run failed");
    process.exit(1);
  });
}
