/**
 * @fileoverview Installer
 *
 * Stages the build outputs under an alternate root and places the license at
 * `<staging><prefix>/share/licenses/<package>/LICENSE`.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { InstallError } from '../core/errors.js';
import type { BuildTree, StagingRoot } from '../core/types.js';
import { diagnosticsOf, type ToolRunner } from '../process/tool_runner.js';
import { logInfo } from '../telemetry/logger.js';
import { pathExists } from '../utils/fs.js';

const LICENSE_MODE = 0o644;

export function licenseDestination(stagingRoot: string, prefix: string, packageName: string): string {
  return path.join(stagingRoot, prefix, 'share', 'licenses', packageName, 'LICENSE');
}

export async function listStagedEntries(stagingRoot: string): Promise<string[]> {
  const entries = await glob('**/*', { cwd: stagingRoot, nodir: true, dot: true, posix: true });
  return entries.sort();
}

export class Installer {
  private readonly meson: string;

  constructor(private readonly options: { runner: ToolRunner; meson?: string }) {
    this.meson = options.meson ?? 'meson';
  }

  async install(
    buildTree: BuildTree,
    stagingRoot: string,
    licenseFile: string,
    packageName: string,
    signal?: AbortSignal,
  ): Promise<StagingRoot> {
    if (buildTree.status !== 'compiled' && buildTree.status !== 'tested') {
      throw new InstallError('not_compiled', `Build tree ${buildTree.root} is ${buildTree.status}, nothing to install`);
    }
    if (!(await pathExists(licenseFile))) {
      throw new InstallError('license_missing', `License file ${licenseFile} does not exist`);
    }

    const root = path.resolve(stagingRoot);
    await fs.mkdir(root, { recursive: true });

    logInfo('[install] Staging build outputs', { destdir: root });
    const result = await this.options.runner.run({
      command: this.meson,
      args: ['install', '-C', buildTree.root, '--destdir', root],
      cwd: buildTree.root,
      signal,
    });
    if (result.exitCode !== 0) {
      throw new InstallError('tool_failed', `meson install exited with status ${result.exitCode}`, {
        exitCode: result.exitCode,
        diagnostics: diagnosticsOf(result),
      });
    }

    const licenseTarget = licenseDestination(root, buildTree.options.prefix, packageName);
    await fs.mkdir(path.dirname(licenseTarget), { recursive: true });
    await fs.copyFile(licenseFile, licenseTarget);
    await fs.chmod(licenseTarget, LICENSE_MODE);

    const entries = await listStagedEntries(root);
    logInfo('[install] Staging root populated', { destdir: root, files: entries.length });
    return { root, entries };
  }
}
