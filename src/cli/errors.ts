/**
 * @fileoverview CLI error handling with recovery hints
 *
 * Every failure leaves the CLI as an ErrorEnvelope: a machine-readable code,
 * a redacted message, a retryability hint and recovery suggestions. With
 * `--json` the envelope is printed as-is for scripts.
 */

import {
  CompileError,
  ConfigurationError,
  CredentialError,
  InstallError,
  InvalidConfigError,
  PipelineTimeoutError,
  SourceError,
  StageOrderError,
  VerificationError,
  isPipelineError,
  type PipelineError,
} from '../core/errors.js';
import { redactContext, redactText } from '../security/redaction.js';

// ============================================================================
// ERROR CODES
// ============================================================================

export const ErrorCodes = {
  ESOURCE: 'Source could not be cloned, checked out or patched',
  ECREDENTIAL: 'Key material could not be fetched or installed',
  ECONFIGURE: 'Build directory could not be configured',
  ECOMPILE_NETWORK: 'A private dependency could not be fetched during compile',
  ECOMPILE_AUTH: 'The provisioned key was rejected during compile',
  ECOMPILE_SOURCE: 'The project failed to compile or link',
  EVERIFY: 'The project test suite failed',
  EINSTALL: 'Build outputs could not be staged',
  ESTAGE_ORDER: 'Sub-command invoked out of order',
  ETIMEOUT: 'Pipeline deadline exceeded',
  EINVALID_CONFIG: 'Configuration or state file is invalid',
  EINVALID_ARGUMENT: 'Invalid command-line argument',
  EUNKNOWN: 'Unexpected failure',
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export interface ErrorEnvelope {
  /** ErrorCode for known failures; any string is accepted from callers */
  code: string;
  message: string;
  /** Pipeline stage that failed, when the failure belongs to one */
  stage?: string;
  retryable: boolean;
  recoveryHints: string[];
  /** Process exit code; falls back to ExitCodes[code] */
  exitCode?: number;
  context?: Record<string, unknown>;
}

export const ErrorMetadata: Record<ErrorCode, { retryable: boolean; recoveryHints: string[] }> = {
  ESOURCE: {
    retryable: false,
    recoveryHints: [
      'Check that the repository URL and revision in pkgstage.yaml exist',
      'Remove the source directory if it holds a previous checkout',
      'Rebase the patch if it no longer applies to the pinned revision',
    ],
  },
  ECREDENTIAL: {
    retryable: false,
    recoveryHints: [
      'Export the auth token in the variable named by credentials.tokenEnv',
      'Check that the key endpoint is reachable and returns key material',
    ],
  },
  ECONFIGURE: {
    retryable: false,
    recoveryHints: [
      'Remove the build directory before configuring again',
      'Check the build options in pkgstage.yaml and PKGSTAGE_* variables',
    ],
  },
  ECOMPILE_NETWORK: {
    retryable: true,
    recoveryHints: ['Re-run the whole pipeline from `pkgstage prepare` once the network is back'],
  },
  ECOMPILE_AUTH: {
    retryable: false,
    recoveryHints: [
      'Run `pkgstage prepare` again to provision a fresh key',
      'Check that credentials.host matches the host of the private dependencies',
    ],
  },
  ECOMPILE_SOURCE: {
    retryable: false,
    recoveryHints: ['Read the compiler diagnostics above and fix the source or the patch'],
  },
  EVERIFY: {
    retryable: false,
    recoveryHints: [
      'Read the test logs above',
      'Set verification.mode to non-fatal to package despite failing tests',
    ],
  },
  EINSTALL: {
    retryable: false,
    recoveryHints: [
      'Check that install.license names a file in the source tree',
      'Run `pkgstage build` before `pkgstage package`',
    ],
  },
  ESTAGE_ORDER: {
    retryable: false,
    recoveryHints: [
      'Run `pkgstage status` to see the next sub-command',
      'Remove the state file to start over',
    ],
  },
  ETIMEOUT: {
    retryable: true,
    recoveryHints: ['Raise pipeline.timeoutMs in pkgstage.yaml, or remove it to run without a deadline'],
  },
  EINVALID_CONFIG: {
    retryable: false,
    recoveryHints: ['Fix the reported field and run the command again'],
  },
  EINVALID_ARGUMENT: {
    retryable: false,
    recoveryHints: ["Run 'pkgstage help' for usage information"],
  },
  EUNKNOWN: {
    retryable: false,
    recoveryHints: ['Re-run with PKGSTAGE_DEBUG=1 for detailed logs'],
  },
};

/** Exit codes used when no external tool reported its own. */
export const ExitCodes: Record<ErrorCode, number> = {
  ESOURCE: 10,
  ECREDENTIAL: 11,
  ECONFIGURE: 12,
  ECOMPILE_NETWORK: 13,
  ECOMPILE_AUTH: 13,
  ECOMPILE_SOURCE: 13,
  EVERIFY: 14,
  EINSTALL: 15,
  ESTAGE_ORDER: 16,
  ETIMEOUT: 124,
  EINVALID_CONFIG: 2,
  EINVALID_ARGUMENT: 2,
  EUNKNOWN: 1,
};

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code);
}

// ============================================================================
// ENVELOPES
// ============================================================================

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  overrides: Partial<Omit<ErrorEnvelope, 'code' | 'message'>> = {},
): ErrorEnvelope {
  const metadata = ErrorMetadata[code];
  return {
    code,
    message: redactText(message).text,
    retryable: overrides.retryable ?? metadata.retryable,
    recoveryHints: overrides.recoveryHints ?? [...metadata.recoveryHints],
    ...(overrides.stage !== undefined ? { stage: overrides.stage } : {}),
    ...(overrides.exitCode !== undefined ? { exitCode: overrides.exitCode } : {}),
    ...(overrides.context ? { context: redactContext(overrides.context) } : {}),
  };
}

export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  if (typeof value !== 'object' || value === null) return false;
  return 'code' in value && typeof value.code === 'string'
    && 'message' in value && typeof value.message === 'string'
    && 'retryable' in value && typeof value.retryable === 'boolean'
    && 'recoveryHints' in value && Array.isArray(value.recoveryHints);
}

/** Usage errors raised by the CLI itself. */
export class CliError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode = 'EINVALID_ARGUMENT',
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }

  toEnvelope(): ErrorEnvelope {
    return createErrorEnvelope(this.code, this.message, { context: this.details });
  }
}

function codeForPipelineError(error: PipelineError): ErrorCode {
  if (error instanceof SourceError) return 'ESOURCE';
  if (error instanceof CredentialError) return 'ECREDENTIAL';
  if (error instanceof ConfigurationError) return 'ECONFIGURE';
  if (error instanceof CompileError) {
    switch (error.failureKind) {
      case 'network':
        return 'ECOMPILE_NETWORK';
      case 'authentication':
        return 'ECOMPILE_AUTH';
      case 'source':
        return 'ECOMPILE_SOURCE';
    }
  }
  if (error instanceof VerificationError) return 'EVERIFY';
  if (error instanceof InstallError) return 'EINSTALL';
  if (error instanceof StageOrderError) return 'ESTAGE_ORDER';
  if (error instanceof PipelineTimeoutError) return 'ETIMEOUT';
  if (error instanceof InvalidConfigError) return 'EINVALID_CONFIG';
  return 'EUNKNOWN';
}

/**
 * Convert anything thrown into an ErrorEnvelope.
 */
export function classifyError(error: unknown): ErrorEnvelope {
  if (isErrorEnvelope(error)) return error;
  if (error instanceof CliError) return error.toEnvelope();

  if (isPipelineError(error)) {
    const json = error.toJSON();
    const context: Record<string, unknown> = { ...json.details };
    if (error.diagnostics) context.diagnostics = error.diagnostics;
    return createErrorEnvelope(codeForPipelineError(error), error.message, {
      stage: error.stage,
      retryable: error.retryable,
      exitCode: error.exitCode,
      context,
    });
  }

  if (error instanceof Error) {
    return createErrorEnvelope('EUNKNOWN', error.message);
  }
  return createErrorEnvelope('EUNKNOWN', String(error));
}

export function getExitCode(envelope: ErrorEnvelope): number {
  if (envelope.exitCode !== undefined) return envelope.exitCode;
  return isErrorCode(envelope.code) ? ExitCodes[envelope.code] : 1;
}

// ============================================================================
// FORMATTING
// ============================================================================

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.stage) {
    lines.push(`  Stage: ${envelope.stage}`);
  }
  lines.push(`  Exit code: ${getExitCode(envelope)}`);
  if (envelope.retryable) {
    lines.push('  (retryable)');
  }

  const diagnostics = envelope.context?.diagnostics;
  if (typeof diagnostics === 'string' && diagnostics.length > 0) {
    lines.push('', 'Diagnostics:');
    for (const line of diagnostics.split('\n')) {
      lines.push(`  ${line}`);
    }
  }

  if (envelope.recoveryHints.length > 0) {
    lines.push('', 'Recovery suggestions:');
    for (const hint of envelope.recoveryHints) {
      lines.push(`  - ${hint}`);
    }
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: { ...envelope, exitCode: getExitCode(envelope) } }, null, 2);
}
