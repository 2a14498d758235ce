import { z } from "zod";

const flag = z.enum(["0", "1"]).transform(v => v === "1");

const ConfigSchema = z.object({
  manifestPath: z.string().min(1).default("manifests/extractive-qa.json"),
  cloudEnvScript: z.string().min(1).default("/workspace/dict_based_learning/bin/cloud_env.sh"),
  entryPoint: z.string().min(1).default("/workspace/dict_based_learning/bin/train_extractive_qa.py"),
  logDir: z.string().min(1).default("."),
  trace: flag.default("1"),
  stdoutRoute: z.enum(["stdout", "stderr"]).default("stdout"),
  shell: z.string().min(1).default("bash"),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse({
    manifestPath: env.PROVISION_MANIFEST || undefined,
    cloudEnvScript: env.CLOUD_ENV_SCRIPT || undefined,
    entryPoint: env.TRAIN_ENTRY_POINT || undefined,
    logDir: env.JOB_LOG_DIR || undefined,
    trace: env.LAUNCH_TRACE || undefined,
    stdoutRoute: env.LAUNCH_STDOUT_ROUTE || undefined,
    shell: env.ENV_SHELL || undefined,
  });
}
