/**
 * @fileoverview SourceAcquirer
 *
 * Clones the repository into a fresh directory, detaches at the pinned
 * revision and applies the local patch with forward-only, fuzz-tolerant
 * semantics.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SourceError, type SourceFailureReason } from '../core/errors.js';
import type { WorkingTree } from '../core/types.js';
import { diagnosticsOf, type ToolInvocation, type ToolRunner } from '../process/tool_runner.js';
import { logInfo } from '../telemetry/logger.js';
import { isEmptyOrMissing, pathExists } from '../utils/fs.js';

export interface SourceAcquirerOptions {
  runner: ToolRunner;
  git?: string;
  patch?: string;
  /** Maximum fuzz factor accepted when a hunk's context has drifted */
  fuzz?: number;
}

export class SourceAcquirer {
  private readonly git: string;
  private readonly patch: string;
  private readonly fuzz: number;

  constructor(private readonly options: SourceAcquirerOptions) {
    this.git = options.git ?? 'git';
    this.patch = options.patch ?? 'patch';
    this.fuzz = options.fuzz ?? 2;
  }

  async acquire(
    repositoryUrl: string,
    revision: string,
    patchFile: string | undefined,
    destination: string,
    signal?: AbortSignal,
  ): Promise<WorkingTree> {
    const root = path.resolve(destination);
    if (!(await isEmptyOrMissing(root))) {
      throw new SourceError('destination_not_empty', `Refusing to clone into non-empty directory ${root}`);
    }
    const patchPath = patchFile ? path.resolve(patchFile) : undefined;
    if (patchPath && !(await pathExists(patchPath))) {
      throw new SourceError('patch_missing', `Patch file ${patchPath} does not exist`);
    }

    await fs.mkdir(path.dirname(root), { recursive: true });

    logInfo('[acquire] Cloning repository', { repository: repositoryUrl, destination: root });
    await this.step('clone_failed', 'git clone', {
      command: this.git,
      args: ['clone', '--no-checkout', '--quiet', repositoryUrl, root],
      signal,
    });

    await this.step('checkout_failed', `git checkout ${revision}`, {
      command: this.git,
      args: ['checkout', '--detach', '--quiet', revision],
      cwd: root,
      signal,
    });

    const head = await this.step('checkout_failed', 'git rev-parse', {
      command: this.git,
      args: ['rev-parse', 'HEAD'],
      cwd: root,
      signal,
    });
    const resolved = head.trim() || revision;

    if (!patchPath) {
      logInfo('[acquire] Source ready (no patch)', { revision: resolved });
      return { root, repositoryUrl, revision: resolved, patchStatus: 'none' };
    }

    await this.step('patch_failed', `patch ${path.basename(patchPath)}`, {
      command: this.patch,
      args: ['--forward', '--batch', '--strip=1', `--fuzz=${this.fuzz}`, '--input', patchPath],
      cwd: root,
      signal,
    });

    logInfo('[acquire] Source ready', { revision: resolved, patch: path.basename(patchPath) });
    return { root, repositoryUrl, revision: resolved, patchStatus: 'applied' };
  }

  /** Run one tool step; any non-zero exit becomes a SourceError. Returns stdout. */
  private async step(reason: SourceFailureReason, label: string, invocation: ToolInvocation): Promise<string> {
    const result = await this.options.runner.run(invocation);
    if (result.exitCode !== 0) {
      throw new SourceError(reason, `${label} exited with status ${result.exitCode}`, {
        exitCode: result.exitCode,
        diagnostics: diagnosticsOf(result),
      });
    }
    return result.stdout;
  }
}
