// src/process/exec.ts
// Spawns commands without a shell and reports exit status the way a shell would.
import { spawn, type ChildProcess, type StdioOptions } from "node:child_process";
import { constants } from "node:os";
import type { CommandOutcome, CommandRunner, CommandSpec } from "../types/process.js";

const SAFE_ARG = /^[A-Za-z0-9_./:=@%+,-]+$/;

export function shellQuote(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function formatCommand(cmd: Pick<CommandSpec, "file" | "args">): string {
  return [cmd.file, ...cmd.args].map(shellQuote).join(" ");
}

/** A child killed by a signal reports 128 + signal number, like bash does. */
export function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal) return 128 + (constants.signals[signal] ?? 0);
  return 1;
}

/** Maps a spawn failure to the status a shell would give it. */
export function spawnFailureCode(err: unknown): number {
  const code = err instanceof Error && "code" in err ? err.code : undefined;
  if (code === "EACCES" || code === "EISDIR") return 126;
  return 127;
}

export interface ExitStatus {
  exitCode: number;
  signal: NodeJS.Signals | null;
}

/** Resolves once the child has exited and its stdio is closed; rejects if it never started. */
export function waitForExit(child: ChildProcess): Promise<ExitStatus> {
  return new Promise((resolve, reject) => {
    child.once("error", reject);
    child.once("close", (code, signal) => resolve({ exitCode: exitCodeOf(code, signal), signal }));
  });
}

export interface SpawnRunnerOptions {
  stdio?: StdioOptions;
  onSpawnError?: (cmd: CommandSpec, err: Error) => void;
}

export function spawnRunner(opts: SpawnRunnerOptions = {}): CommandRunner {
  const stdio = opts.stdio ?? "inherit";
  return {
    async run(cmd: CommandSpec): Promise<CommandOutcome> {
      const child = spawn(cmd.file, cmd.args, { cwd: cmd.cwd, env: cmd.env, stdio });
      try {
        const { exitCode } = await waitForExit(child);
        return { exitCode };
      } catch (e) {
        const err = e instanceof Error ? e : new Error(String(e));
        opts.onSpawnError?.(cmd, err);
        return { exitCode: spawnFailureCode(err) };
      }
    }
  };
}
