// src/launch/run.ts
// Job launch: load the cloud configuration, then run the training entry point with its
// stderr captured to <jobId>.txt and stdout routed per policy. The exit status is passed through.

import { spawn } from "node:child_process";
import { open } from "node:fs/promises";
import { join } from "node:path";
import type { JobInvocation, StreamRouting } from "../types/contracts.js";
import { formatCommand, spawnFailureCode, waitForExit, type ExitStatus } from "../process/exec.js";
import { createTracer } from "../log.js";
import { JobIdError, LaunchError } from "../errors.js";
import { loadEnvConfig } from "./envConfig.js";
import { resolveRouting, stdioFor, type CallerStdio } from "./routing.js";

export interface EntryPoint {
  file: string;
  /** Fixed arguments placed before the caller's argument vector. */
  args?: string[];
}

export interface LaunchOptions {
  entryPoint: EntryPoint;
  argv: string[];
  /** Cloud-environment configuration; omitted means the base environment is used as is. */
  envScript?: string;
  baseEnv?: NodeJS.ProcessEnv;
  /** Overrides JOBID from the resolved environment. */
  jobId?: string;
  logDir?: string;
  trace?: boolean;
  routing?: StreamRouting;
  /** Descriptors the child's stdout is routed to; defaults to this process's 1 and 2. */
  callerStdio?: CallerStdio;
  shell?: string;
  diagnostics?: NodeJS.WritableStream;
}

export interface LaunchResult extends JobInvocation {
  exitCode: number;
  signal: NodeJS.Signals | null;
}

export function jobLogPath(jobId: string, logDir = "."): string {
  if (!jobId) throw new JobIdError("no job identifier: set JOBID in the environment or the cloud configuration");
  if (/[\\/]/.test(jobId) || jobId === "." || jobId === "..") {
    throw new JobIdError(`job identifier ${JSON.stringify(jobId)} cannot name a file`);
  }
  return join(logDir, `${jobId}.txt`);
}

export async function launchJob(opts: LaunchOptions): Promise<LaunchResult> {
  const trace = createTracer(opts.trace ?? true, opts.diagnostics);
  const baseEnv = opts.baseEnv ?? process.env;
  const routing = opts.routing ?? resolveRouting();

  let env: Record<string, string>;
  if (opts.envScript) {
    trace(`source ${opts.envScript}`);
    env = await loadEnvConfig(opts.envScript, baseEnv, opts.shell, opts.diagnostics);
  } else {
    env = {};
    for (const [k, v] of Object.entries(baseEnv)) if (v !== undefined) env[k] = v;
  }

  const jobId = opts.jobId ?? env.JOBID ?? "";
  const logPath = jobLogPath(jobId, opts.logDir);
  const args = [...(opts.entryPoint.args ?? []), ...opts.argv];
  const redirect = routing.stdout === "caller-stderr" ? `2>${logPath} 1>&2` : `2>${logPath}`;
  trace(`${formatCommand({ file: opts.entryPoint.file, args })} ${redirect}`);

  const log = await open(logPath, "w");
  try {
    const child = spawn(opts.entryPoint.file, args, { env, stdio: stdioFor(routing, log.fd, opts.callerStdio) });
    let status: ExitStatus;
    try {
      status = await waitForExit(child);
    } catch (e) {
      throw new LaunchError(opts.entryPoint.file, spawnFailureCode(e), e);
    }
    return { jobId, argv: opts.argv, logPath, exitCode: status.exitCode, signal: status.signal };
  } finally {
    await log.close();
  }
}
