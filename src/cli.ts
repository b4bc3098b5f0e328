// src/cli.ts
// `--flag=value` parsing shared by the scripts under scripts/.

import { isChamber, type Chamber } from "./config";

export interface RunFlags {
  profiles?: string;
  transcripts?: string;
  skipProfiles: boolean;
  skipTranscripts: boolean;
  chamber?: Chamber;
  metricsOut?: string;
}

export interface ReportFlags {
  out?: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function flagValue(arg: string): string {
  return arg.slice(arg.indexOf("=") + 1);
}

/** Parse process.argv (node and script path included) for run_pipeline */
export function parseRunFlags(argv: string[]): RunFlags {
  const f: RunFlags = { skipProfiles: false, skipTranscripts: false };

  for (const a of argv.slice(2)) {
    if (a.startsWith("--profiles=")) f.profiles = flagValue(a);
    else if (a.startsWith("--transcripts=")) f.transcripts = flagValue(a);
    else if (a === "--skip-profiles") f.skipProfiles = true;
    else if (a === "--skip-transcripts") f.skipTranscripts = true;
    else if (a.startsWith("--metrics-out=")) f.metricsOut = flagValue(a);
    else if (a.startsWith("--chamber=")) {
      const chamber = flagValue(a).toUpperCase();
      if (!isChamber(chamber)) {
        throw new CliUsageError(`--chamber must be C or S, got "${flagValue(a)}"`);
      }
      f.chamber = chamber;
    } else {
      throw new CliUsageError(`Unknown argument: ${a}`);
    }
  }

  return f;
}

/** Parse process.argv for the report scripts */
export function parseReportFlags(argv: string[]): ReportFlags {
  const f: ReportFlags = {};
  for (const a of argv.slice(2)) {
    if (a.startsWith("--out=")) f.out = flagValue(a);
    else throw new CliUsageError(`Unknown argument: ${a}`);
  }
  return f;
}
