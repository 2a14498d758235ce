#!/usr/bin/env node
// src/runner.ts
// Job launch wrapper. Interprets no flags: every argument goes to the training entry point as is.
//   JOBID=job42 trainbox-launch --epochs 10
// The child's stderr lands in $JOB_LOG_DIR/job42.txt; the wrapper exits with the child's status.
import 'dotenv/config';
import { loadConfig } from './config.js';
import { launchJob } from './launch/run.js';
import { resolveRouting } from './launch/routing.js';
import { LaunchError } from './errors.js';

async function main(): Promise<number> {
  const config = loadConfig();
  const result = await launchJob({
    entryPoint: { file: config.entryPoint },
    argv: process.argv.slice(2),
    envScript: config.cloudEnvScript,
    logDir: config.logDir,
    trace: config.trace,
    routing: resolveRouting(config.stdoutRoute),
    shell: config.shell,
  });
  return result.exitCode;
}

main().then(code => { process.exitCode = code; }).catch(err => {
  console.error('[fatal]', err instanceof Error ? err.message : err);
  process.exitCode = err instanceof LaunchError ? err.exitCode : 1;
});
