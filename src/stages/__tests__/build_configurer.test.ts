import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DEFAULT_BUILD_OPTIONS } from '../../config/build_options.js';
import { ConfigurationError } from '../../core/errors.js';
import type { WorkingTree } from '../../core/types.js';
import { createToolchainRunner } from '../../test/fake_runner.js';
import { makeTempDir, removeDir } from '../../test/fixtures.js';
import { BuildConfigurer } from '../build_configurer.js';

describe('BuildConfigurer', () => {
  let dir: string;
  let workingTree: WorkingTree;

  beforeEach(async () => {
    dir = await makeTempDir('pkgstage-configure');
    workingTree = { root: join(dir, 'source'), repositoryUrl: 'ssh://git.example.test/t.git', revision: 'abc', patchStatus: 'none' };
    await mkdir(workingTree.root);
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it('runs meson setup with the mapped options and returns a configured tree', async () => {
    const runner = createToolchainRunner();
    const buildDir = join(dir, 'build');

    const tree = await new BuildConfigurer({ runner }).configure(workingTree, DEFAULT_BUILD_OPTIONS, buildDir);

    expect(tree).toEqual({ root: buildDir, sourceRoot: workingTree.root, options: DEFAULT_BUILD_OPTIONS, status: 'configured' });
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0]).toMatchObject({
      command: 'meson',
      args: [
        'setup', buildDir, workingTree.root,
        '--prefix', '/usr',
        '--libexecdir', 'lib',
        '--sbindir', 'bin',
        '--buildtype', 'release',
        '--wrap-mode', 'nodownload',
        '-Db_lto=true',
        '-Db_pie=true',
        '-Doffline=false',
      ],
      cwd: workingTree.root,
    });
    expect(await readdir(buildDir)).toEqual(['build.ninja']);
  });

  it('always fails against a non-empty directory, and succeeds once it is emptied', async () => {
    const runner = createToolchainRunner();
    const configurer = new BuildConfigurer({ runner });
    const buildDir = join(dir, 'build');
    await mkdir(buildDir);
    await writeFile(join(buildDir, 'leftover.o'), '');

    for (let attempt = 0; attempt < 2; attempt++) {
      await expect(configurer.configure(workingTree, DEFAULT_BUILD_OPTIONS, buildDir)).rejects.toMatchObject({
        reason: 'build_dir_not_empty',
        exitCode: 12,
      });
    }
    expect(runner.calls).toHaveLength(0);

    await rm(join(buildDir, 'leftover.o'));
    const tree = await configurer.configure(workingTree, DEFAULT_BUILD_OPTIONS, buildDir);
    expect(tree.status).toBe('configured');
  });

  it('rejects unsupported options before touching the filesystem', async () => {
    const runner = createToolchainRunner();
    const buildDir = join(dir, 'build');

    const error = await new BuildConfigurer({ runner })
      .configure(workingTree, { ...DEFAULT_BUILD_OPTIONS, offline: true, wrapMode: 'allow-download' }, buildDir)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      reason: 'invalid_options',
      message: 'Unsupported build options: wrapMode: offline builds cannot allow wrap downloads',
    });
    expect(runner.calls).toHaveLength(0);
  });

  it('propagates the meson setup exit code', async () => {
    const runner = createToolchainRunner().fail('meson setup', 1, 'ERROR: Dependency "alsa" not found');

    await expect(
      new BuildConfigurer({ runner }).configure(workingTree, DEFAULT_BUILD_OPTIONS, join(dir, 'build')),
    ).rejects.toMatchObject({
      reason: 'tool_failed',
      exitCode: 1,
      diagnostics: 'ERROR: Dependency "alsa" not found',
    });
  });
});
