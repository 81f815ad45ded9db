/**
 * @fileoverview External tool invocation
 *
 * Every stage talks to git, patch, meson and the ssh agent through the
 * `ToolRunner` interface. Production uses execa; tests use the scripted
 * runner in src/test/fake_runner.ts.
 */

import { execa } from 'execa';
import { logDebug } from '../telemetry/logger.js';

export interface ToolInvocation {
  command: string;
  args: readonly string[];
  cwd?: string;
  /** Extra variables layered over the inherited environment */
  env?: Readonly<Record<string, string>>;
  signal?: AbortSignal;
}

export interface ToolResult {
  /** Display form of the invocation */
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  /** The invocation was cancelled through its AbortSignal */
  aborted: boolean;
}

export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolResult>;
}

/** Reported when the tool never produced an exit status (not found, killed). */
export const SPAWN_FAILURE_EXIT_CODE = 127;

const DIAGNOSTIC_TAIL_LINES = 40;

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/[\s'"]/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

/**
 * Last lines of a failed invocation's output, stderr first.
 */
export function diagnosticsOf(result: Pick<ToolResult, 'stdout' | 'stderr'>, maxLines = DIAGNOSTIC_TAIL_LINES): string {
  const combined = [result.stderr, result.stdout].filter((part) => part.trim().length > 0).join('\n');
  const lines = combined.split('\n');
  return lines.slice(-maxLines).join('\n').trim();
}

export function createExecaRunner(): ToolRunner {
  return {
    async run(invocation: ToolInvocation): Promise<ToolResult> {
      const display = formatCommand(invocation.command, invocation.args);
      logDebug('[runner] Spawning', { command: display, cwd: invocation.cwd });
      const startedAt = Date.now();
      const result = await execa(invocation.command, [...invocation.args], {
        cwd: invocation.cwd,
        env: invocation.env,
        signal: invocation.signal,
        reject: false,
      });
      return {
        command: display,
        exitCode: typeof result.exitCode === 'number' ? result.exitCode : SPAWN_FAILURE_EXIT_CODE,
        stdout: result.stdout,
        stderr: result.stderr,
        durationMs: Date.now() - startedAt,
        aborted: result.isCanceled,
      };
    },
  };
}
