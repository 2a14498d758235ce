import type { DependencyStep, PlannedStep, ProvisionManifest, ProvisionPlan, StepId } from "../types/contracts.js";
import { ManifestError } from "../errors.js";
import { implicitDependencies, stepCommands } from "./commands.js";

const IMPLICIT_KIND: Partial<Record<DependencyStep["kind"], DependencyStep["kind"]>> = {
  "python-requirements": "git-checkout",
  "source-install": "git-checkout",
  "archive-unpack": "file-download",
};

export function resolveEnv(base: NodeJS.ProcessEnv, overlay: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(base)) {
    if (v !== undefined) out[k] = v;
  }
  return { ...out, ...overlay };
}

/**
 * Validates ordering and expands every step into its commands.
 * A dependency must name a step declared strictly earlier, so declaration order is always a valid build order.
 */
export function compileManifest(manifest: ProvisionManifest, baseEnv: NodeJS.ProcessEnv = process.env): ProvisionPlan {
  const declared = new Map<StepId, DependencyStep>();
  const position = new Map<StepId, number>();
  manifest.steps.forEach((step, i) => {
    if (position.has(step.id)) throw new ManifestError(`duplicate step id ${step.id}`);
    position.set(step.id, i);
    declared.set(step.id, step);
  });

  const env = resolveEnv(baseEnv, manifest.env);
  const steps: PlannedStep[] = manifest.steps.map((step, i) => {
    const implicit = implicitDependencies(step);
    const depends_on = Array.from(new Set([...implicit, ...(step.needs ?? [])]));
    for (const dep of depends_on) {
      const at = position.get(dep);
      if (at === undefined) throw new ManifestError(`step ${step.id} depends on unknown step ${dep}`);
      if (at >= i) throw new ManifestError(`step ${step.id} has a forward reference to ${dep}; move ${dep} before it`);
    }
    const expected = IMPLICIT_KIND[step.kind];
    for (const dep of implicit) {
      const target = declared.get(dep);
      if (expected && target?.kind !== expected) {
        throw new ManifestError(`step ${step.id} expects ${dep} to be a ${expected} step, got ${target?.kind}`);
      }
    }
    return { step, depends_on, commands: stepCommands(step, manifest, id => declared.get(id), env) };
  });

  return { manifest, steps };
}
