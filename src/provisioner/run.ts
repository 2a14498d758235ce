// src/provisioner/run.ts
// Walks a compiled plan in declared order. The first failing command aborts the build;
// nothing is retried and nothing already installed is undone.

import { mkdir } from "node:fs/promises";
import type { ProvisionPlan, StepId } from "../types/contracts.js";
import type { CommandRunner } from "../types/process.js";
import { createLedger, ensurePending, record, type Ledger } from "../ledger/index.js";
import { formatCommand } from "../process/exec.js";
import { ProvisionError } from "../errors.js";
import { COLOR, LOG_COMMANDS, LOG_STEPS, fmtMs } from "../log.js";

export interface ProvisionOptions {
  plan: ProvisionPlan;
  runner: CommandRunner;
  ledger?: Ledger;
  buildId?: string;
  /** Skip creating the workdir, e.g. for a dry run. */
  skipWorkdir?: boolean;
}

export interface ProvisionReport {
  buildId: string;
  ledger: Ledger;
  steps: Array<{ id: StepId; duration_ms: number }>;
}

export async function runProvision(opts: ProvisionOptions): Promise<ProvisionReport> {
  const { plan, runner } = opts;
  const ledger = opts.ledger ?? createLedger();
  const buildId = opts.buildId || new Date().toISOString().replace(/[:.]/g, "-");
  const total = plan.steps.length;
  const report: ProvisionReport = { buildId, ledger, steps: [] };

  if (!opts.skipWorkdir) await mkdir(plan.manifest.workdir, { recursive: true });
  if (LOG_STEPS) console.log(`${COLOR.cyan("build")} ${plan.manifest.name} ${COLOR.gray(`(${buildId}, ${total} steps)`)}`);

  let idx = 0;
  for (const { step, commands } of plan.steps) {
    ensurePending(ledger, step.id);
    const stepStart = Date.now();
    if (LOG_STEPS) {
      const what = (step.description || step.kind).slice(0, 96);
      console.log(`\n${COLOR.cyan("▶ step")} ${++idx}/${total} ${step.id} ${COLOR.gray("— " + what)}`);
    }
    for (const cmd of commands) {
      const line = formatCommand(cmd);
      if (LOG_COMMANDS) console.log(COLOR.yellow(`    $ ${line}`));
      const { exitCode } = await runner.run(cmd);
      if (exitCode !== 0) {
        if (LOG_STEPS) console.log(`${COLOR.red("✗ failed")} ${step.id} ${COLOR.gray(`(exit ${exitCode})`)}`);
        throw new ProvisionError(step.id, exitCode, cmd, line);
      }
    }
    const stepMs = Date.now() - stepStart;
    record(ledger, step.id, step.kind, stepMs);
    report.steps.push({ id: step.id, duration_ms: stepMs });
    if (LOG_STEPS) console.log(`${COLOR.green("✓ done")} ${step.id} ${COLOR.gray("(" + fmtMs(stepMs) + ")")}`);
  }
  return report;
}

/** Prints each command instead of running it. */
export function dryRunner(out: (line: string) => void = console.log): CommandRunner {
  return {
    async run(cmd) {
      out(formatCommand(cmd));
      return { exitCode: 0 };
    }
  };
}
