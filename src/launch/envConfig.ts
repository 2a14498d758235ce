import { execFile } from "node:child_process";
import { readFile } from "node:fs/promises";
import { promisify } from "node:util";
import { parse } from "dotenv";
import { resolveEnv } from "../manifest/compiler.js";
import { ConfigLoadError } from "../errors.js";

const exec = promisify(execFile);

// "$1" is the script path. Whatever the script prints goes to stderr; stdout carries only the
// NUL-separated environment dump, so values may hold newlines.
const SOURCE_AND_DUMP = 'set -e; source "$1" >&2; env -0';

export function parseEnvDump(dump: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const entry of dump.split("\0")) {
    const eq = entry.indexOf("=");
    if (eq > 0) out[entry.slice(0, eq)] = entry.slice(eq + 1);
  }
  return out;
}

/**
 * Resolves the environment the training child will see after the cloud configuration is applied.
 * `.env` files are parsed; anything else is sourced by `shell` and its exported variables read back.
 * The script's own output is passed on to `diagnostics`. The current process environment is left untouched.
 */
export async function loadEnvConfig(
  path: string,
  baseEnv: NodeJS.ProcessEnv,
  shell = "bash",
  diagnostics: NodeJS.WritableStream = process.stderr,
): Promise<Record<string, string>> {
  if (path.endsWith(".env")) {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (e) {
      throw new ConfigLoadError(path, e instanceof Error ? e.message : String(e));
    }
    return resolveEnv(baseEnv, parse(text));
  }
  try {
    const { stdout, stderr } = await exec(shell, ["-c", SOURCE_AND_DUMP, "cloud-env", path], {
      env: baseEnv,
      maxBuffer: 16 * 1024 * 1024,
    });
    if (stderr) diagnostics.write(stderr);
    return parseEnvDump(stdout);
  } catch (e) {
    throw new ConfigLoadError(path, failureDetail(e));
  }
}

function failureDetail(e: unknown): string {
  if (!(e instanceof Error)) return String(e);
  const stderr = "stderr" in e && typeof e.stderr === "string" ? e.stderr.trim() : "";
  return stderr || e.message;
}
