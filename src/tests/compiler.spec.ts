import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { compileManifest } from '../manifest/compiler.js';
import { loadManifest, parseManifest } from '../manifest/load.js';
import { ManifestError } from '../errors.js';

const manifest = (steps: unknown[], extra: Record<string, unknown> = {}) =>
  parseManifest({ name: 'test-env', workdir: '/work', steps, ...extra });

describe('parseManifest', () => {
  it('fills defaults', () => {
    const m = manifest([{ id: 'idx', kind: 'system-index' }]);
    expect(m.base_image).toBe('ubuntu:14.04');
    expect(m.env).toEqual({});
    expect(m.toolchain).toEqual({ apt: 'apt-get', add_apt_repository: 'add-apt-repository', pip: 'pip', python: 'python', git: 'git', wget: 'wget', unzip: 'unzip' });
  });

  it('rejects unknown step kinds with the issue path', () => {
    expect(() => manifest([{ id: 'x', kind: 'conda-package', name: 'numpy' }])).toThrow(ManifestError);
    expect(() => manifest([{ id: 'x', kind: 'conda-package', name: 'numpy' }])).toThrow(/steps\.0\.kind/);
  });

  it('rejects attributes that do not belong to the kind', () => {
    expect(() => manifest([{ id: 'x', kind: 'system-index', version: '1' }])).toThrow(ManifestError);
  });
});

describe('compileManifest', () => {
  it('collects explicit and implicit dependencies', () => {
    const plan = compileManifest(manifest([
      { id: 'tools', kind: 'system-package', packages: ['git'] },
      { id: 'lib-src', kind: 'git-checkout', url: 'https://example.com/org/lib.git', ref: 'v1', needs: ['tools'] },
      { id: 'lib', kind: 'source-install', checkout: 'lib-src', needs: ['tools'] },
    ]), {});
    expect(plan.steps.map(s => s.depends_on)).toEqual([[], ['tools'], ['lib-src', 'tools']]);
    expect(plan.steps[2].commands).toEqual([{ file: 'pip', args: ['install', './lib'], cwd: '/work', env: {} }]);
  });

  it('injects the caller environment overlaid with the manifest env into every command', () => {
    const plan = compileManifest(
      manifest([{ id: 'idx', kind: 'system-index' }], { env: { NLTK_DATA: '/work/nltk_data', LANG: 'C' } }),
      { HOME: '/home/test', LANG: 'en_US.UTF-8', UNSET: undefined }
    );
    expect(plan.steps[0].commands[0].env).toEqual({ HOME: '/home/test', LANG: 'C', NLTK_DATA: '/work/nltk_data' });
  });

  it('rejects a forward reference', () => {
    const m = manifest([
      { id: 'numpy', kind: 'python-package', name: 'numpy', needs: ['pip'] },
      { id: 'pip', kind: 'system-package', packages: ['python-pip'] },
    ]);
    expect(() => compileManifest(m, {})).toThrow('step numpy has a forward reference to pip; move pip before it');
  });

  it('rejects a step that depends on itself', () => {
    const m = manifest([{ id: 'loop', kind: 'system-index', needs: ['loop'] }]);
    expect(() => compileManifest(m, {})).toThrow(/forward reference/);
  });

  it('rejects unknown dependencies', () => {
    const m = manifest([{ id: 'lib', kind: 'source-install', checkout: 'missing-src' }]);
    expect(() => compileManifest(m, {})).toThrow('step lib depends on unknown step missing-src');
  });

  it('rejects duplicate ids', () => {
    const m = manifest([
      { id: 'idx', kind: 'system-index' },
      { id: 'idx', kind: 'system-index' },
    ]);
    expect(() => compileManifest(m, {})).toThrow(ManifestError);
    expect(() => compileManifest(m, {})).toThrow('duplicate step id idx');
  });

  it('checks the kind of implicitly referenced steps', () => {
    const m = manifest([
      { id: 'zip', kind: 'system-package', packages: ['unzip'] },
      { id: 'unpack', kind: 'archive-unpack', archive: 'zip' },
    ]);
    expect(() => compileManifest(m, {})).toThrow('step unpack expects zip to be a file-download step, got system-package');
  });
});

describe('shipped manifest', () => {
  it('compiles and installs the research libraries in dependency order', async () => {
    const path = fileURLToPath(new URL('../../manifests/extractive-qa.json', import.meta.url));
    const plan = compileManifest(await loadManifest(path), {});
    const ids = plan.steps.map(s => s.step.id);
    expect(ids).toHaveLength(33);
    expect(ids.indexOf('theano')).toBeLessThan(ids.indexOf('fuel'));
    expect(ids.indexOf('fuel')).toBeLessThan(ids.indexOf('blocks'));
    expect(ids.indexOf('unzip')).toBeLessThan(ids.indexOf('corenlp'));
    expect(plan.manifest.env).toEqual({ NLTK_DATA: '/workspace/nltk_data' });
  });

  it('reports a missing manifest file', async () => {
    await expect(loadManifest('/nonexistent/manifest.json')).rejects.toThrow(ManifestError);
  });
});
