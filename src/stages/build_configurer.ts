/**
 * @fileoverview BuildConfigurer
 *
 * Runs the meta-build configuration step once against a fresh build
 * directory. Re-running against a populated directory is rejected before the
 * tool is invoked.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { BuildOptionsSchema, formatIssues, toMesonArgs, type BuildOptions } from '../config/build_options.js';
import { ConfigurationError } from '../core/errors.js';
import type { BuildTree, WorkingTree } from '../core/types.js';
import { diagnosticsOf, type ToolRunner } from '../process/tool_runner.js';
import { logInfo } from '../telemetry/logger.js';
import { isEmptyOrMissing } from '../utils/fs.js';

export interface BuildConfigurerOptions {
  runner: ToolRunner;
  meson?: string;
}

export class BuildConfigurer {
  private readonly meson: string;

  constructor(private readonly options: BuildConfigurerOptions) {
    this.meson = options.meson ?? 'meson';
  }

  async configure(
    workingTree: WorkingTree,
    options: BuildOptions,
    buildDir: string,
    signal?: AbortSignal,
  ): Promise<BuildTree> {
    const parsed = BuildOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError('invalid_options', `Unsupported build options: ${formatIssues(parsed.error)}`);
    }

    const root = path.resolve(buildDir);
    if (!(await isEmptyOrMissing(root))) {
      throw new ConfigurationError('build_dir_not_empty', `Build directory ${root} is not empty`);
    }
    await fs.mkdir(root, { recursive: true });

    const args = ['setup', root, workingTree.root, ...toMesonArgs(parsed.data)];
    logInfo('[configure] Configuring build', { buildDir: root, buildType: parsed.data.buildType });
    const result = await this.options.runner.run({ command: this.meson, args, cwd: workingTree.root, signal });
    if (result.exitCode !== 0) {
      throw new ConfigurationError('tool_failed', `meson setup exited with status ${result.exitCode}`, {
        exitCode: result.exitCode,
        diagnostics: diagnosticsOf(result),
      });
    }

    return { root, sourceRoot: workingTree.root, options: parsed.data, status: 'configured' };
  }
}
