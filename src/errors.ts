import type { CommandSpec } from "./types/process.js";
import type { StepId } from "./types/contracts.js";

export class ManifestError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = "ManifestError";
  }
}

export class ProvisionError extends Error {
  constructor(readonly stepId: StepId, readonly exitCode: number, readonly command: CommandSpec, commandLine: string) {
    super(`step ${stepId} failed with exit code ${exitCode}: ${commandLine}`);
    this.name = "ProvisionError";
  }
}

export class ConfigLoadError extends Error {
  constructor(readonly path: string, readonly detail: string) {
    super(`failed to load environment configuration ${path}${detail ? `: ${detail}` : ""}`);
    this.name = "ConfigLoadError";
  }
}

export class JobIdError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JobIdError";
  }
}

// exitCode follows the shell: 127 not found, 126 not executable
export class LaunchError extends Error {
  constructor(readonly file: string, readonly exitCode: number, cause: unknown) {
    super(`failed to start ${file}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "LaunchError";
  }
}
