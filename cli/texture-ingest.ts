#!/usr/bin/env -S tsx

import path from "node:path";
import { IngestJob, loadJobFile, runIngestJob } from "../tools/texture-jobs";
import { readPrepConfig } from "../tools/prep-config";
import { createConsoleLogger, silentLogger } from "../tools/prep-log";

type CliArgs = {
  job?: string;
  out?: string;
  quiet?: boolean;
};

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const parsed: CliArgs = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if ((token === "-j" || token === "--job") && args[i + 1]) {
      parsed.job = args[i + 1];
      i += 1;
    } else if ((token === "-o" || token === "--out") && args[i + 1]) {
      parsed.out = args[i + 1];
      i += 1;
    } else if (token === "-q" || token === "--quiet") {
      parsed.quiet = true;
    }
  }
  return parsed;
}

async function main() {
  const args = parseArgs();
  if (!args.job) {
    console.error("usage: texture-ingest --job <ingest-job.json> [--out dataset.dat] [--quiet]");
    process.exit(2);
  }
  const config = readPrepConfig();
  const logger = args.quiet || config.quiet ? silentLogger : createConsoleLogger("ingest");
  const jobPath = path.resolve(args.job);
  const job = loadJobFile(IngestJob, jobPath);
  if (args.out) job.output = path.resolve(args.out);

  const report = runIngestJob(job, config, { baseDir: path.dirname(jobPath), logger });
  console.log(JSON.stringify(report, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
