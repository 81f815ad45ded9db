/**
 * @fileoverview Staged build pipeline
 *
 * Sequences the six stages behind four sub-commands:
 *
 *   prepare  = acquire + provision
 *   build    = configure + compile
 *   check    = verify
 *   package  = install
 *
 * Every stage is gated by the state machine, records exactly one outcome and
 * persists the snapshot before returning or throwing. The first failure
 * aborts the remaining stages; nothing is retried. Key material is discarded
 * when `build` finishes (whatever the result), when `prepare` fails, and at
 * the end of `run`.
 */

import * as path from 'node:path';
import type { ResolvedPipelineConfig } from '../config/pipeline_config.js';
import {
  CompileError,
  InvalidConfigError,
  PipelineTimeoutError,
  StageOrderError,
  VerificationError,
  isPipelineError,
} from '../core/errors.js';
import type {
  BuildTree,
  CredentialBundle,
  OutcomeStatus,
  PipelineResult,
  StageName,
  StagingRoot,
  WorkingTree,
} from '../core/types.js';
import type { ToolRunner } from '../process/tool_runner.js';
import {
  AuthenticatedCompiler,
  type KeyAgent,
} from '../stages/authenticated_compiler.js';
import { BuildConfigurer } from '../stages/build_configurer.js';
import {
  CredentialProvisioner,
  type KeyStore,
  type KeyTransport,
} from '../stages/credential_provisioner.js';
import { Installer } from '../stages/installer.js';
import { SourceAcquirer } from '../stages/source_acquirer.js';
import { Verifier } from '../stages/verifier.js';
import { logError, logInfo, logWarning } from '../telemetry/logger.js';
import { withDeadline } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { STAGE_TARGET_STATE, assertTransition, type PipelineState } from './state_machine.js';
import { emptySnapshot, type PipelineSnapshot, type StateStore } from './state_store.js';

export interface PipelinePaths {
  sourceDir: string;
  buildDir: string;
  stagingDir: string;
}

export interface PipelineDependencies {
  runner: ToolRunner;
  transport: KeyTransport;
  keyStore: KeyStore;
  agent: KeyAgent;
  stateStore: StateStore;
}

function exitCodeOf(error: unknown): number {
  return isPipelineError(error) ? error.exitCode : 1;
}

export class BuildPipeline {
  private snapshot: PipelineSnapshot;
  private activeStage: StageName | undefined;
  private readonly acquirer: SourceAcquirer;
  private readonly provisioner: CredentialProvisioner;
  private readonly configurer: BuildConfigurer;
  private readonly compiler: AuthenticatedCompiler;
  private readonly verifier: Verifier;
  private readonly installer: Installer;

  constructor(
    private readonly config: ResolvedPipelineConfig,
    private readonly paths: PipelinePaths,
    private readonly deps: PipelineDependencies,
    snapshot: PipelineSnapshot = emptySnapshot(),
  ) {
    this.snapshot = snapshot;
    const { runner } = deps;
    this.acquirer = new SourceAcquirer({ runner });
    this.provisioner = new CredentialProvisioner({
      transport: deps.transport,
      store: deps.keyStore,
      target: { hostPattern: config.credentials.host, user: config.credentials.user },
    });
    this.configurer = new BuildConfigurer({ runner });
    this.compiler = new AuthenticatedCompiler({ runner, agent: deps.agent });
    this.verifier = new Verifier({ runner });
    this.installer = new Installer({ runner });
  }

  /** Resume from the persisted snapshot, or start empty. */
  static async open(
    config: ResolvedPipelineConfig,
    paths: PipelinePaths,
    deps: PipelineDependencies,
  ): Promise<BuildPipeline> {
    const snapshot = (await deps.stateStore.load()) ?? emptySnapshot();
    return new BuildPipeline(config, paths, deps, snapshot);
  }

  get state(): PipelineState {
    return this.snapshot.state;
  }

  get result(): PipelineResult {
    return { outcomes: this.snapshot.outcomes.map((outcome) => ({ ...outcome })) };
  }

  get workingTree(): WorkingTree | undefined {
    return this.snapshot.workingTree;
  }

  get credential(): CredentialBundle | undefined {
    return this.snapshot.credential;
  }

  get buildTree(): BuildTree | undefined {
    return this.snapshot.buildTree;
  }

  get stagingRoot(): StagingRoot | undefined {
    return this.snapshot.stagingRoot;
  }

  // ==========================================================================
  // SUB-COMMANDS
  // ==========================================================================

  async prepare(authToken: string): Promise<void> {
    await this.withinDeadline((signal) => this.prepareStages(authToken, signal));
  }

  async build(): Promise<void> {
    await this.withinDeadline((signal) => this.buildStages(signal));
  }

  async check(): Promise<void> {
    await this.withinDeadline((signal) => this.checkStage(signal));
  }

  async package(): Promise<StagingRoot> {
    return this.withinDeadline((signal) => this.packageStage(signal));
  }

  /** All stages in one process, under a single deadline. */
  async run(authToken: string): Promise<PipelineResult> {
    try {
      await this.withinDeadline(async (signal) => {
        await this.prepareStages(authToken, signal);
        await this.buildStages(signal);
        await this.checkStage(signal);
        await this.packageStage(signal);
      });
    } finally {
      await this.discardCredentials();
    }
    logInfo('[pipeline] Pipeline complete', { stagingRoot: this.snapshot.stagingRoot?.root });
    return this.result;
  }

  // ==========================================================================
  // STAGES
  // ==========================================================================

  private async prepareStages(authToken: string, signal: AbortSignal | undefined): Promise<void> {
    const { source, credentials } = this.config;
    try {
      await this.runStage(
        'acquire',
        () => this.acquirer.acquire(source.repository, source.revision, source.patchFile, this.paths.sourceDir, signal),
        (workingTree) => ({ workingTree }),
      );
      await this.runStage(
        'provision',
        () => this.provisioner.provision(credentials.endpoint, authToken, signal),
        (credential) => ({ credential }),
      );
    } catch (error) {
      if (!(error instanceof StageOrderError)) {
        await this.discardCredentials();
      }
      throw error;
    }
  }

  private async buildStages(signal: AbortSignal | undefined): Promise<void> {
    try {
      await this.runStage(
        'configure',
        () => this.configurer.configure(this.require('workingTree'), this.config.buildOptions, this.paths.buildDir, signal),
        (buildTree) => ({ buildTree }),
      );
      await this.runStage(
        'compile',
        () => this.compiler.compile(this.require('buildTree'), this.requireCredential(), signal),
        (buildTree) => ({
          buildTree,
          credential: { ...this.requireCredential(), agentRegistration: 'registered' },
        }),
      );
    } finally {
      await this.discardCredentials();
    }
  }

  private async checkStage(signal: AbortSignal | undefined): Promise<void> {
    const { mode, timeout } = this.config.verification;
    if (mode === 'skip') {
      assertTransition(this.snapshot.state, 'verified');
      logWarning('[pipeline] Test suite skipped by configuration');
      this.snapshot = { ...this.snapshot, state: 'verified' };
      await this.record('verify', 'skipped', 0, Date.now());
      return;
    }

    try {
      await this.runStage(
        'verify',
        () => this.verifier.verify(this.require('buildTree'), timeout, signal),
        () => ({ buildTree: { ...this.require('buildTree'), status: 'tested' } }),
      );
    } catch (error) {
      if (mode !== 'non-fatal' || !(error instanceof VerificationError) || signal?.aborted) {
        throw error;
      }
      const outcomes = this.snapshot.outcomes.slice(0, -1);
      const failed = this.snapshot.outcomes[this.snapshot.outcomes.length - 1];
      this.snapshot = {
        ...this.snapshot,
        state: 'verified',
        outcomes: [...outcomes, { ...failed, status: 'tolerated' }],
      };
      await this.deps.stateStore.save(this.snapshot);
      logWarning('[pipeline] Test failures tolerated (verification mode non-fatal)', {
        exitCode: error.exitCode,
        diagnostics: error.diagnostics,
      });
    }
  }

  private async packageStage(signal: AbortSignal | undefined): Promise<StagingRoot> {
    return this.runStage(
      'install',
      () => {
        const workingTree = this.require('workingTree');
        const licenseFile = path.resolve(workingTree.root, this.config.licensePath);
        return this.installer.install(
          this.require('buildTree'),
          this.paths.stagingDir,
          licenseFile,
          this.config.packageName,
          signal,
        );
      },
      (stagingRoot) => ({ stagingRoot }),
    );
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  /**
   * Check the transition, run the stage, then record its outcome and persist.
   * State only advances when `work` resolves.
   */
  private async runStage<T>(
    stage: StageName,
    work: () => Promise<T>,
    apply: (value: T) => Partial<PipelineSnapshot>,
  ): Promise<T> {
    const target = STAGE_TARGET_STATE[stage];
    assertTransition(this.snapshot.state, target);
    this.activeStage = stage;
    const startedAt = Date.now();
    logInfo(`[pipeline] Stage ${stage} started`, { from: this.snapshot.state });

    let value: T;
    try {
      value = await work();
    } catch (error) {
      const exitCode = exitCodeOf(error);
      await this.record(stage, 'failed', exitCode, startedAt);
      logError(`[pipeline] Stage ${stage} failed`, { exitCode, error: getErrorMessage(error) });
      throw error;
    }

    this.snapshot = { ...this.snapshot, ...apply(value), state: target };
    await this.record(stage, 'succeeded', 0, startedAt);
    logInfo(`[pipeline] Stage ${stage} succeeded`, { state: target });
    return value;
  }

  private async record(stage: StageName, status: OutcomeStatus, exitCode: number, startedAt: number): Promise<void> {
    const outcome = { stage, status, exitCode, durationMs: Date.now() - startedAt };
    this.snapshot = { ...this.snapshot, outcomes: [...this.snapshot.outcomes, outcome] };
    await this.deps.stateStore.save(this.snapshot);
  }

  private require<K extends 'workingTree' | 'buildTree'>(key: K): NonNullable<PipelineSnapshot[K]> {
    const value = this.snapshot[key];
    if (value === undefined || value === null) {
      throw new InvalidConfigError('pipeline state', `state '${this.snapshot.state}' has no ${key}`);
    }
    return value;
  }

  private requireCredential(): CredentialBundle {
    const credential = this.snapshot.credential;
    if (!credential || credential.agentRegistration === 'revoked') {
      throw new CompileError('authentication', 'No provisioned credential is available for this build');
    }
    return credential;
  }

  private async discardCredentials(): Promise<void> {
    await this.deps.keyStore.discard();
    const credential = this.snapshot.credential;
    if (credential && credential.agentRegistration !== 'revoked') {
      this.snapshot = { ...this.snapshot, credential: { ...credential, agentRegistration: 'revoked' } };
      await this.deps.stateStore.save(this.snapshot);
    }
  }

  private withinDeadline<T>(work: (signal: AbortSignal | undefined) => Promise<T>): Promise<T> {
    return withDeadline(this.config.timeoutMs, work, {
      createError: (timeoutMs) => new PipelineTimeoutError(timeoutMs, this.activeStage),
    });
  }
}
