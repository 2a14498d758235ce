#!/usr/bin/env node
import 'dotenv/config';
import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { loadConfig } from './config.js';
import { loadManifest } from './manifest/load.js';
import { compileManifest } from './manifest/compiler.js';
import { runProvision, dryRunner } from './provisioner/run.js';
import { describePlan, renderDockerfile } from './provisioner/dockerfile.js';
import { spawnRunner } from './process/exec.js';
import { ProvisionError } from './errors.js';
import { COLOR } from './log.js';

const USAGE = 'Usage: trainbox <provision|plan|dockerfile> [--manifest path] [--dry-run] [--out path]';

function arg(name: string, fallback?: string): string | undefined {
  const ix = process.argv.findIndex(a => a === name || a.startsWith(name + '='));
  if (ix === -1) return fallback;
  const val = process.argv[ix];
  if (val.includes('=')) return val.slice(val.indexOf('=') + 1);
  return process.argv[ix+1] ?? fallback;
}

async function main(): Promise<number> {
  const command = process.argv[2];
  if (command !== 'provision' && command !== 'plan' && command !== 'dockerfile') {
    console.error(USAGE);
    return 2;
  }
  const config = loadConfig();
  const manifestPath = resolve(process.cwd(), arg('--manifest', config.manifestPath) ?? config.manifestPath);
  const plan = compileManifest(await loadManifest(manifestPath));

  switch (command) {
    case 'provision': {
      const dryRun = process.argv.includes('--dry-run');
      const runner = dryRun
        ? dryRunner()
        : spawnRunner({ onSpawnError: (cmd, err) => console.error(COLOR.red(`[spawn] ${cmd.file}: ${err.message}`)) });
      const report = await runProvision({ plan, runner, skipWorkdir: dryRun });
      console.log(`\n[done] ${report.steps.length} steps materialized`);
      return 0;
    }
    case 'plan':
      console.log(describePlan(plan));
      return 0;
    case 'dockerfile': {
      const out = arg('--out');
      const text = renderDockerfile(plan);
      if (out) writeFileSync(out, text, 'utf-8');
      else process.stdout.write(text);
      return 0;
    }
  }
}

main().then(code => { process.exitCode = code; }).catch(err => {
  console.error('[fatal]', err instanceof Error ? err.message : err);
  process.exitCode = err instanceof ProvisionError && err.exitCode !== 0 ? err.exitCode : 1;
});
