import { z } from "zod";

const StepIdSchema = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, "step ids are letters, digits, '_', '.' and '-'");

const base = {
  id: StepIdSchema,
  description: z.string().optional(),
  needs: z.array(StepIdSchema).optional(),
};

export const DependencyStepSchema = z.discriminatedUnion("kind", [
  z.object({ ...base, kind: z.literal("system-index") }).strict(),
  z.object({ ...base, kind: z.literal("system-repository"), repository: z.string().min(1) }).strict(),
  z.object({ ...base, kind: z.literal("system-package"), packages: z.array(z.string().min(1)).min(1) }).strict(),
  z.object({
    ...base,
    kind: z.literal("python-package"),
    name: z.string().min(1),
    version: z.string().min(1).optional(),
    upgrade: z.boolean().optional(),
  }).strict(),
  z.object({ ...base, kind: z.literal("python-requirements"), checkout: StepIdSchema, file: z.string().min(1) }).strict(),
  z.object({
    ...base,
    kind: z.literal("git-checkout"),
    url: z.string().url(),
    ref: z.string().min(1).optional(),
    dir: z.string().min(1).optional(),
    cache_bust: z.boolean().optional(),
  }).strict(),
  z.object({ ...base, kind: z.literal("source-install"), checkout: StepIdSchema }).strict(),
  z.object({
    ...base,
    kind: z.literal("resource-download"),
    name: z.string().min(1),
    dir: z.string().min(1),
    downloader: z.string().min(1).optional(),
  }).strict(),
  z.object({ ...base, kind: z.literal("file-download"), url: z.string().url(), save_as: z.string().min(1).optional() }).strict(),
  z.object({ ...base, kind: z.literal("archive-unpack"), archive: StepIdSchema, dest: z.string().min(1).optional() }).strict(),
]);

export const ToolchainSchema = z.object({
  apt: z.string().min(1).default("apt-get"),
  add_apt_repository: z.string().min(1).default("add-apt-repository"),
  pip: z.string().min(1).default("pip"),
  python: z.string().min(1).default("python"),
  git: z.string().min(1).default("git"),
  wget: z.string().min(1).default("wget"),
  unzip: z.string().min(1).default("unzip"),
}).strict();

export const ManifestSchema = z.object({
  name: z.string().min(1),
  base_image: z.string().min(1).default("ubuntu:14.04"),
  workdir: z.string().min(1).default("/workspace"),
  env: z.record(z.string(), z.string()).default({}),
  toolchain: ToolchainSchema.default({}),
  steps: z.array(DependencyStepSchema).min(1),
}).strict();
