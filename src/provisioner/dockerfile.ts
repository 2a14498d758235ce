import type { ProvisionPlan } from "../types/contracts.js";
import { formatCommand, shellQuote } from "../process/exec.js";

export function renderDockerfile(plan: ProvisionPlan): string {
  const { manifest } = plan;
  const lines = [`FROM ${manifest.base_image}`, `WORKDIR ${manifest.workdir}`];
  for (const [k, v] of Object.entries(manifest.env)) lines.push(`ENV ${k}=${shellQuote(v)}`);
  for (const { step, commands } of plan.steps) {
    // later layers are rebuilt whenever CACHEBUST changes
    if (step.kind === "git-checkout" && step.cache_bust) lines.push("ARG CACHEBUST=1");
    lines.push(`RUN ${commands.map(formatCommand).join(" && ")}`);
  }
  return lines.join("\n") + "\n";
}

export function describePlan(plan: ProvisionPlan): string {
  return plan.steps.map(({ step, depends_on }, i) => {
    const deps = depends_on.length ? ` <- ${depends_on.join(", ")}` : "";
    return `${String(i + 1).padStart(2, " ")}. ${step.id} [${step.kind}]${deps}`;
  }).join("\n");
}
