/**
 * @fileoverview Entities passed between pipeline stages
 *
 * Each stage produces or advances exactly one of these values. They are
 * immutable: a stage that "mutates" a tree returns a new value with the next
 * status.
 */

import type { BuildOptions } from '../config/build_options.js';

export type StageName = 'acquire' | 'provision' | 'configure' | 'compile' | 'verify' | 'install';

export const STAGE_ORDER: readonly StageName[] = ['acquire', 'provision', 'configure', 'compile', 'verify', 'install'];

export type PatchStatus = 'applied' | 'none';

/** Checked-out, patched source directory. */
export interface WorkingTree {
  readonly root: string;
  readonly repositoryUrl: string;
  /** Commit id resolved from the pinned revision */
  readonly revision: string;
  readonly patchStatus: PatchStatus;
}

export type AgentRegistration = 'unregistered' | 'registered' | 'revoked';

/**
 * Ephemeral key plus its host-routing entry. Holds paths only; the key bytes
 * stay on disk in the key store and never travel through pipeline state.
 */
export interface CredentialBundle {
  readonly keyPath: string;
  readonly configPath: string;
  readonly hostPattern: string;
  readonly user: string;
  readonly agentRegistration: AgentRegistration;
}

export type BuildStatus = 'unconfigured' | 'configured' | 'compiled' | 'tested';

/** Out-of-source build directory. */
export interface BuildTree {
  readonly root: string;
  readonly sourceRoot: string;
  readonly options: BuildOptions;
  readonly status: BuildStatus;
}

export interface StagingRoot {
  readonly root: string;
  /** Installed files, relative to the root, sorted */
  readonly entries: readonly string[];
}

export type OutcomeStatus = 'succeeded' | 'failed' | 'tolerated' | 'skipped';

export interface StageOutcome {
  stage: StageName;
  status: OutcomeStatus;
  exitCode: number;
  durationMs: number;
}

export interface PipelineResult {
  outcomes: StageOutcome[];
}

export type TimeoutPolicy =
  | { kind: 'unbounded' }
  | { kind: 'multiplier'; factor: number };

export type VerificationMode = 'required' | 'non-fatal' | 'skip';
