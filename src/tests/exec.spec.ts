import { describe, it, expect } from 'vitest';
import { exitCodeOf, formatCommand, shellQuote, spawnFailureCode, spawnRunner } from '../process/exec.js';

describe('shellQuote', () => {
  it('leaves plain words alone and single-quotes the rest', () => {
    expect(shellQuote('ppa:openjdk-r/ppa')).toBe('ppa:openjdk-r/ppa');
    expect(shellQuote('two words')).toBe("'two words'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
    expect(shellQuote('')).toBe("''");
  });

  it('formats a whole command line', () => {
    expect(formatCommand({ file: 'apt-get', args: ['-y', 'install', 'a b'] })).toBe("apt-get -y install 'a b'");
  });
});

describe('exit status', () => {
  it('reports signals as 128 + signal number', () => {
    expect(exitCodeOf(0, null)).toBe(0);
    expect(exitCodeOf(3, null)).toBe(3);
    expect(exitCodeOf(null, 'SIGKILL')).toBe(137);
    expect(exitCodeOf(null, 'SIGTERM')).toBe(143);
  });

  it('maps spawn failures like a shell', () => {
    expect(spawnFailureCode(Object.assign(new Error('spawn x ENOENT'), { code: 'ENOENT' }))).toBe(127);
    expect(spawnFailureCode(Object.assign(new Error('spawn x EACCES'), { code: 'EACCES' }))).toBe(126);
  });
});

describe('spawnRunner', () => {
  const runner = spawnRunner({ stdio: 'ignore' });

  it('returns the child exit code', async () => {
    expect(await runner.run({ file: process.execPath, args: ['-e', 'process.exitCode = 3'] })).toEqual({ exitCode: 3 });
  });

  it('passes the injected environment', async () => {
    const probe = 'process.exitCode = process.env.PROBE === "on" ? 0 : 9';
    expect(await runner.run({ file: process.execPath, args: ['-e', probe], env: { PROBE: 'on' } })).toEqual({ exitCode: 0 });
  });

  it('reports a missing program as 127', async () => {
    const seen: string[] = [];
    const r = spawnRunner({ stdio: 'ignore', onSpawnError: cmd => seen.push(cmd.file) });
    expect(await r.run({ file: '/nonexistent/trainbox-tool', args: [] })).toEqual({ exitCode: 127 });
    expect(seen).toEqual(['/nonexistent/trainbox-tool']);
  });
});
