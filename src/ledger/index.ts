import type { StepId, StepKind } from "../types/contracts.js";

export interface LedgerEntry {
  kind: StepKind;
  seq: number;
  at: string; // ISO timestamp
  duration_ms: number;
}

export type Ledger = Map<StepId, LedgerEntry>;

export function createLedger(): Ledger {
  return new Map();
}

/** Throws if the step has been materialized already. */
export function ensurePending(ledger: Ledger, id: StepId): void {
  const prior = entry(ledger, id);
  if (prior) throw new Error(`step ${id} already materialized (#${prior.seq} at ${prior.at})`);
}

export function record(ledger: Ledger, id: StepId, kind: StepKind, durationMs: number): LedgerEntry {
  ensurePending(ledger, id);
  const rec = { kind, seq: ledger.size + 1, at: new Date().toISOString(), duration_ms: durationMs };
  ledger.set(id, rec);
  return rec;
}

export function entry(ledger: Ledger, id: StepId): LedgerEntry | undefined {
  return ledger.get(id);
}

export function installed(ledger: Ledger): StepId[] {
  return Array.from(ledger.keys());
}
