import type { CommandSpec } from "./process.js";

export type StepId = string;

export type StepKind =
  | "system-index"
  | "system-repository"
  | "system-package"
  | "python-package"
  | "python-requirements"
  | "git-checkout"
  | "source-install"
  | "resource-download"
  | "file-download"
  | "archive-unpack";

interface StepBase {
  id: StepId;
  description?: string;
  needs?: StepId[];
}

export interface SystemIndexStep extends StepBase {
  kind: "system-index";
}

export interface SystemRepositoryStep extends StepBase {
  kind: "system-repository";
  repository: string;
}

export interface SystemPackageStep extends StepBase {
  kind: "system-package";
  packages: string[];
}

export interface PythonPackageStep extends StepBase {
  kind: "python-package";
  name: string;
  version?: string;
  upgrade?: boolean;
}

export interface PythonRequirementsStep extends StepBase {
  kind: "python-requirements";
  checkout: StepId;
  file: string;
}

export interface GitCheckoutStep extends StepBase {
  kind: "git-checkout";
  url: string;
  ref?: string;
  dir?: string;
  cache_bust?: boolean;
}

export interface SourceInstallStep extends StepBase {
  kind: "source-install";
  checkout: StepId;
}

export interface ResourceDownloadStep extends StepBase {
  kind: "resource-download";
  name: string;
  dir: string;
  downloader?: string;
}

export interface FileDownloadStep extends StepBase {
  kind: "file-download";
  url: string;
  save_as?: string;
}

export interface ArchiveUnpackStep extends StepBase {
  kind: "archive-unpack";
  archive: StepId;
  dest?: string;
}

export type DependencyStep =
  | SystemIndexStep
  | SystemRepositoryStep
  | SystemPackageStep
  | PythonPackageStep
  | PythonRequirementsStep
  | GitCheckoutStep
  | SourceInstallStep
  | ResourceDownloadStep
  | FileDownloadStep
  | ArchiveUnpackStep;

export interface Toolchain {
  apt: string;
  add_apt_repository: string;
  pip: string;
  python: string;
  git: string;
  wget: string;
  unzip: string;
}

export interface ProvisionManifest {
  name: string;
  base_image: string;
  workdir: string;
  env: Record<string, string>;
  toolchain: Toolchain;
  steps: DependencyStep[];
}

export interface PlannedStep {
  step: DependencyStep;
  depends_on: StepId[];
  commands: CommandSpec[];
}

export interface ProvisionPlan {
  manifest: ProvisionManifest;
  steps: PlannedStep[];
}

export type StreamDestination = "caller-stdout" | "caller-stderr" | "job-log";

/** Where each of the training child's output streams ends up. */
export interface StreamRouting {
  stdout: Exclude<StreamDestination, "job-log">;
  stderr: "job-log";
}

export interface JobInvocation {
  jobId: string;
  argv: string[];
  logPath: string;
}
