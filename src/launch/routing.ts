import type { StdioOptions } from "node:child_process";
import type { StreamRouting } from "../types/contracts.js";

export type StdoutRoute = "stdout" | "stderr";

/**
 * `stderr` reproduces the historical wrapper, whose `2>log 1>&2` left the child's stdout on the wrapper's stderr.
 */
export function resolveRouting(route: StdoutRoute = "stdout"): StreamRouting {
  return { stdout: route === "stderr" ? "caller-stderr" : "caller-stdout", stderr: "job-log" };
}

/** The wrapper's own output descriptors. */
export interface CallerStdio {
  stdout: number;
  stderr: number;
}

export const PROCESS_STDIO: CallerStdio = { stdout: 1, stderr: 2 };

/** stdin is always inherited; stdout goes to one of the caller's descriptors. */
export function stdioFor(routing: StreamRouting, logFd: number, caller: CallerStdio = PROCESS_STDIO): StdioOptions {
  return ["inherit", routing.stdout === "caller-stderr" ? caller.stderr : caller.stdout, logFd];
}
