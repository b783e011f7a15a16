#!/usr/bin/env -S tsx

import path from "node:path";
import { ControlJob, loadJobFile, runControlJob } from "../tools/texture-jobs";
import { readPrepConfig } from "../tools/prep-config";
import { createConsoleLogger, silentLogger } from "../tools/prep-log";

type CliArgs = {
  job?: string;
  out?: string;
  template?: string;
  delimiter?: string;
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
    } else if ((token === "-t" || token === "--template") && args[i + 1]) {
      parsed.template = args[i + 1];
      i += 1;
    } else if (token === "--delimiter" && args[i + 1]) {
      parsed.delimiter = args[i + 1];
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
    console.error("usage: texture-control --job <control-job.json> [--out Texture2Par.in] [--template Texture2Par.tpl]");
    process.exit(2);
  }
  const config = readPrepConfig();
  const logger = args.quiet || config.quiet ? silentLogger : createConsoleLogger("control");
  const jobPath = path.resolve(args.job);
  const job = loadJobFile(ControlJob, jobPath);
  if (args.out) job.output = path.resolve(args.out);
  if (args.template) {
    job.template = { output: path.resolve(args.template), delimiter: args.delimiter ?? job.template?.delimiter };
  }

  const report = runControlJob(job, config, { baseDir: path.dirname(jobPath), logger });
  console.log(JSON.stringify(report, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
