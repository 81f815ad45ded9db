/**
 * @fileoverview Verifier
 *
 * Runs the project's test suite. Whether a failure stops the pipeline is the
 * pipeline's decision (verification mode), not this stage's.
 */

import { VerificationError } from '../core/errors.js';
import type { BuildTree, StageOutcome, TimeoutPolicy } from '../core/types.js';
import { diagnosticsOf, type ToolRunner } from '../process/tool_runner.js';
import { logInfo } from '../telemetry/logger.js';

/** meson treats a multiplier of 0 as "no per-test timeout". */
export function timeoutMultiplierArg(policy: TimeoutPolicy): string {
  return policy.kind === 'unbounded' ? '0' : String(policy.factor);
}

export class Verifier {
  private readonly meson: string;

  constructor(private readonly options: { runner: ToolRunner; meson?: string }) {
    this.meson = options.meson ?? 'meson';
  }

  async verify(buildTree: BuildTree, timeoutPolicy: TimeoutPolicy, signal?: AbortSignal): Promise<StageOutcome> {
    const args = [
      'test',
      '-C', buildTree.root,
      '--print-errorlogs',
      '--timeout-multiplier', timeoutMultiplierArg(timeoutPolicy),
    ];
    logInfo('[verify] Running test suite', { buildDir: buildTree.root, timeout: timeoutPolicy.kind });
    const result = await this.options.runner.run({ command: this.meson, args, cwd: buildTree.root, signal });
    if (result.exitCode !== 0) {
      throw new VerificationError(`meson test exited with status ${result.exitCode}`, {
        exitCode: result.exitCode,
        diagnostics: diagnosticsOf(result),
      });
    }
    return { stage: 'verify', status: 'succeeded', exitCode: 0, durationMs: result.durationMs };
  }
}
