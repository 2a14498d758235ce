import { posix } from "node:path";
import type {
  DependencyStep,
  FileDownloadStep,
  GitCheckoutStep,
  ProvisionManifest,
  StepId,
} from "../types/contracts.js";
import type { CommandSpec } from "../types/process.js";

type Argv = [string, ...string[]];

export type StepLookup = (id: StepId) => DependencyStep | undefined;

export function checkoutDir(step: GitCheckoutStep): string {
  if (step.dir) return step.dir;
  const last = posix.basename(new URL(step.url).pathname);
  return last.endsWith(".git") ? last.slice(0, -".git".length) : last;
}

export function downloadFileName(step: FileDownloadStep): string {
  return step.save_as ?? posix.basename(new URL(step.url).pathname);
}

function checkoutOf(lookup: StepLookup, id: StepId, from: StepId): GitCheckoutStep {
  const step = lookup(id);
  if (step?.kind !== "git-checkout") throw new Error(`step ${from} expects ${id} to be a git-checkout step`);
  return step;
}

function downloadOf(lookup: StepLookup, id: StepId, from: StepId): FileDownloadStep {
  const step = lookup(id);
  if (step?.kind !== "file-download") throw new Error(`step ${from} expects ${id} to be a file-download step`);
  return step;
}

function stepArgv(step: DependencyStep, m: ProvisionManifest, lookup: StepLookup): Argv[] {
  const t = m.toolchain;
  switch (step.kind) {
    case "system-index":
      return [[t.apt, "-y", "update"]];
    case "system-repository":
      return [[t.add_apt_repository, "-y", step.repository]];
    case "system-package":
      return [[t.apt, "-y", "install", ...step.packages]];
    case "python-package": {
      const spec = step.version ? `${step.name}==${step.version}` : step.name;
      return [step.upgrade ? [t.pip, "install", "-U", spec] : [t.pip, "install", spec]];
    }
    case "python-requirements": {
      const dir = checkoutDir(checkoutOf(lookup, step.checkout, step.id));
      return [[t.pip, "install", "-r", posix.join(dir, step.file)]];
    }
    case "git-checkout": {
      const dir = checkoutDir(step);
      const clone: Argv = [t.git, "clone", step.url, dir];
      return step.ref ? [clone, [t.git, "-C", dir, "checkout", step.ref]] : [clone];
    }
    case "source-install": {
      const dir = checkoutDir(checkoutOf(lookup, step.checkout, step.id));
      return [[t.pip, "install", `./${dir}`]];
    }
    case "resource-download":
      return [[t.python, "-m", step.downloader ?? "nltk.downloader", step.name, "-d", step.dir]];
    case "file-download":
      return [step.save_as ? [t.wget, "-q", "-O", step.save_as, step.url] : [t.wget, "-q", step.url]];
    case "archive-unpack": {
      const file = downloadFileName(downloadOf(lookup, step.archive, step.id));
      return [step.dest ? [t.unzip, "-q", file, "-d", step.dest] : [t.unzip, "-q", file]];
    }
  }
}

/** Commands for one step, each carrying the manifest workdir and the resolved environment. */
export function stepCommands(
  step: DependencyStep, manifest: ProvisionManifest, lookup: StepLookup, env: Record<string, string>
): CommandSpec[] {
  return stepArgv(step, manifest, lookup).map(([file, ...args]) => ({ file, args, cwd: manifest.workdir, env }));
}

/** Steps a step refers to by attribute rather than through `needs`. */
export function implicitDependencies(step: DependencyStep): StepId[] {
  switch (step.kind) {
    case "python-requirements":
    case "source-install":
      return [step.checkout];
    case "archive-unpack":
      return [step.archive];
    default:
      return [];
  }
}
