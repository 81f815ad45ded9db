/**
 * @fileoverview pkgstage error hierarchy
 *
 * One typed error per pipeline stage, plus structural errors for stage
 * ordering, the pipeline deadline and invalid configuration. Every error knows
 * the process exit code the CLI reports for it: the failing tool's own exit
 * code when there is one, otherwise a fixed code per error class.
 *
 * Messages and diagnostics are redacted on construction, so no error can carry
 * key material or tokens out of the process.
 */

import { redactText } from '../security/redaction.js';
import type { StageName } from './types.js';
import type { PipelineState } from '../pipeline/state_machine.js';

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  exitCode: number;
  timestamp: number;
  stage?: StageName;
  stack?: string;
  details?: Record<string, unknown>;
}

/** Exit codes for failures that have no underlying tool exit code. */
export const FALLBACK_EXIT_CODES = {
  usage: 2,
  source: 10,
  credential: 11,
  configuration: 12,
  compile: 13,
  verification: 14,
  install: 15,
  order: 16,
  timeout: 124,
} as const;

export interface PipelineErrorOptions {
  /** Exit code of the external tool that failed, if any */
  exitCode?: number;
  /** Tail of the tool's output */
  diagnostics?: string;
  cause?: unknown;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class PipelineError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  abstract readonly stage: StageName | undefined;
  protected abstract readonly fallbackExitCode: number;
  readonly toolExitCode: number | undefined;
  readonly diagnostics: string;
  readonly timestamp = Date.now();

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(redactText(message).text, options.cause === undefined ? undefined : { cause: options.cause });
    this.toolExitCode = options.exitCode;
    this.diagnostics = redactText(options.diagnostics ?? '').text;
  }

  /** Tool exit code verbatim when non-zero, otherwise the class's fixed code. */
  get exitCode(): number {
    if (this.toolExitCode !== undefined && this.toolExitCode !== 0) {
      return this.toolExitCode;
    }
    return this.fallbackExitCode;
  }

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      exitCode: this.exitCode,
      timestamp: this.timestamp,
      stage: this.stage,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

// ============================================================================
// SOURCE ERRORS
// ============================================================================

export type SourceFailureReason =
  | 'destination_not_empty'
  | 'clone_failed'
  | 'checkout_failed'
  | 'patch_missing'
  | 'patch_failed';

export class SourceError extends PipelineError {
  readonly code = 'SOURCE_ERROR';
  readonly retryable = false;
  readonly stage = 'acquire' as const;
  protected readonly fallbackExitCode = FALLBACK_EXIT_CODES.source;

  constructor(readonly reason: SourceFailureReason, message: string, options?: PipelineErrorOptions) {
    super(message, options);
    this.name = 'SourceError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { reason: this.reason } };
  }
}

// ============================================================================
// CREDENTIAL ERRORS
// ============================================================================

export type CredentialFailureReason =
  | 'missing_token'
  | 'invalid_endpoint'
  | 'network'
  | 'http_status'
  | 'empty_body'
  | 'storage';

export class CredentialError extends PipelineError {
  readonly code = 'CREDENTIAL_ERROR';
  readonly retryable = false;
  readonly stage = 'provision' as const;
  protected readonly fallbackExitCode = FALLBACK_EXIT_CODES.credential;
  /** HTTP status of the key endpoint, for `http_status` failures */
  readonly status: number | undefined;

  constructor(
    readonly reason: CredentialFailureReason,
    message: string,
    options?: PipelineErrorOptions & { status?: number },
  ) {
    super(message, options);
    this.name = 'CredentialError';
    this.status = options?.status;
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { reason: this.reason, status: this.status } };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export type ConfigurationFailureReason = 'invalid_options' | 'build_dir_not_empty' | 'tool_failed';

export class ConfigurationError extends PipelineError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;
  readonly stage = 'configure' as const;
  protected readonly fallbackExitCode = FALLBACK_EXIT_CODES.configuration;

  constructor(readonly reason: ConfigurationFailureReason, message: string, options?: PipelineErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { reason: this.reason } };
  }
}

// ============================================================================
// COMPILE ERRORS
// ============================================================================

/**
 * - `network`: a private dependency could not be fetched; the whole pipeline may be retried
 * - `authentication`: the key or the agent session was rejected
 * - `source`: compile or link failure in the project itself
 */
export type CompileFailureKind = 'network' | 'authentication' | 'source';

export class CompileError extends PipelineError {
  readonly code = 'COMPILE_ERROR';
  readonly stage = 'compile' as const;
  protected readonly fallbackExitCode = FALLBACK_EXIT_CODES.compile;
  readonly retryable: boolean;

  constructor(readonly failureKind: CompileFailureKind, message: string, options?: PipelineErrorOptions) {
    super(message, options);
    this.name = 'CompileError';
    this.retryable = failureKind === 'network';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { failureKind: this.failureKind } };
  }
}

// ============================================================================
// VERIFICATION ERRORS
// ============================================================================

export class VerificationError extends PipelineError {
  readonly code = 'VERIFICATION_ERROR';
  readonly retryable = false;
  readonly stage = 'verify' as const;
  protected readonly fallbackExitCode = FALLBACK_EXIT_CODES.verification;

  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, options);
    this.name = 'VerificationError';
  }
}

// ============================================================================
// INSTALL ERRORS
// ============================================================================

export type InstallFailureReason = 'not_compiled' | 'license_missing' | 'tool_failed';

export class InstallError extends PipelineError {
  readonly code = 'INSTALL_ERROR';
  readonly retryable = false;
  readonly stage = 'install' as const;
  protected readonly fallbackExitCode = FALLBACK_EXIT_CODES.install;

  constructor(readonly reason: InstallFailureReason, message: string, options?: PipelineErrorOptions) {
    super(message, options);
    this.name = 'InstallError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { reason: this.reason } };
  }
}

// ============================================================================
// STRUCTURAL ERRORS
// ============================================================================

export class StageOrderError extends PipelineError {
  readonly code = 'STAGE_ORDER_ERROR';
  readonly retryable = false;
  readonly stage = undefined;
  protected readonly fallbackExitCode = FALLBACK_EXIT_CODES.order;

  constructor(readonly from: PipelineState, readonly to: PipelineState) {
    super(`Cannot move pipeline from '${from}' to '${to}'`);
    this.name = 'StageOrderError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { from: this.from, to: this.to } };
  }
}

export class PipelineTimeoutError extends PipelineError {
  readonly code = 'PIPELINE_TIMEOUT';
  readonly retryable = true;
  protected readonly fallbackExitCode = FALLBACK_EXIT_CODES.timeout;

  constructor(readonly timeoutMs: number, readonly stage: StageName | undefined) {
    super(`Pipeline exceeded its ${timeoutMs}ms deadline${stage ? ` during ${stage}` : ''}`);
    this.name = 'PipelineTimeoutError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { timeoutMs: this.timeoutMs } };
  }
}

export class InvalidConfigError extends PipelineError {
  readonly code = 'INVALID_CONFIG';
  readonly retryable = false;
  readonly stage = undefined;
  protected readonly fallbackExitCode = FALLBACK_EXIT_CODES.usage;

  constructor(readonly source: string, message: string, options?: PipelineErrorOptions) {
    super(`Invalid configuration in ${source}: ${message}`, options);
    this.name = 'InvalidConfigError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { source: this.source } };
  }
}
