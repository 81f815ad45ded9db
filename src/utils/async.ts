/**
 * @fileoverview Async Utilities
 *
 * Deadline helpers shared by the pipeline driver and the credential transport.
 *
 * @packageDocumentation
 */

/**
 * Options for withDeadline.
 */
export interface WithDeadlineOptions {
  /** Context string for the default timeout error */
  context?: string;
  /** Builds the error thrown when the deadline passes; defaults to TimeoutError */
  createError?: (timeoutMs: number) => Error;
}

/**
 * Error thrown when a deadline passes.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Run `work` with an AbortSignal that fires after `timeoutMs`.
 *
 * Unlike a plain promise race, the signal reaches the work itself, so a
 * spawned tool or an in-flight request is cancelled rather than left running.
 * Any failure after the signal fired is reported as the deadline error.
 *
 * @param timeoutMs - Deadline in milliseconds (if <= 0 or undefined, no deadline is applied)
 *
 * @example
 * ```typescript
 * await withDeadline(60_000, (signal) => runner.run({ command: 'meson', args: ['compile'], signal }));
 * ```
 */
export async function withDeadline<T>(
  timeoutMs: number | undefined,
  work: (signal: AbortSignal | undefined) => Promise<T>,
  options: WithDeadlineOptions = {}
): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return work(undefined);
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await work(controller.signal);
  } catch (error) {
    if (controller.signal.aborted) {
      throw options.createError
        ? options.createError(timeoutMs)
        : new TimeoutError(timeoutMs, options.context);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
