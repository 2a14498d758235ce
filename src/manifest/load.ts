import { readFile } from "node:fs/promises";
import type { ProvisionManifest } from "../types/contracts.js";
import { ManifestError } from "../errors.js";
import { ManifestSchema } from "./schema.js";

export function parseManifest(raw: unknown, source?: string): ProvisionManifest {
  const res = ManifestSchema.safeParse(raw);
  if (!res.success) {
    const issues = res.error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ManifestError(`invalid manifest: ${issues}`, source);
  }
  return res.data;
}

export async function loadManifest(path: string): Promise<ProvisionManifest> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    throw new ManifestError(`cannot read manifest: ${e instanceof Error ? e.message : String(e)}`, path);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ManifestError(`manifest is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, path);
  }
  return parseManifest(raw, path);
}
