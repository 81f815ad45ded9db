/**
 * @fileoverview pkgstage - staged, credential-aware package build pipeline
 *
 * Turns a pinned upstream revision plus a local patch into a staged install
 * tree, fetching private build dependencies with an ephemeral key that lives
 * only as long as the compile stage needs it.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { BuildPipeline, createDefaultDependencies, loadPipelineConfig } from 'pkgstage';
 *
 * const config = await loadPipelineConfig('pkgstage.yaml');
 * const deps = createDefaultDependencies(config, {
 *   credentialsDir: '.pkgstage/credentials',
 *   statePath: '.pkgstage/state.json',
 * });
 * const pipeline = new BuildPipeline(config, {
 *   sourceDir: '.pkgstage/source',
 *   buildDir: '.pkgstage/build',
 *   stagingDir: '.pkgstage/stage',
 * }, deps);
 *
 * const result = await pipeline.run(process.env.PKGSTAGE_AUTH_TOKEN ?? '');
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// PIPELINE
// ============================================================================

export { BuildPipeline, type PipelineDependencies, type PipelinePaths } from './pipeline/pipeline.js';
export { createDefaultDependencies, type DependencyLocations } from './pipeline/dependencies.js';
export {
  PIPELINE_STATES,
  PIPELINE_TRANSITIONS,
  STAGE_TARGET_STATE,
  assertTransition,
  canTransition,
  nextStage,
  type PipelineState,
} from './pipeline/state_machine.js';
export {
  JsonStateStore,
  MemoryStateStore,
  emptySnapshot,
  type PipelineSnapshot,
  type StateStore,
} from './pipeline/state_store.js';

// ============================================================================
// STAGES
// ============================================================================

export { SourceAcquirer, type SourceAcquirerOptions } from './stages/source_acquirer.js';
export {
  CredentialProvisioner,
  FileKeyStore,
  HttpKeyTransport,
  renderHostStanza,
  upsertHostStanza,
  type KeyStore,
  type KeyTarget,
  type KeyTransport,
} from './stages/credential_provisioner.js';
export { BuildConfigurer } from './stages/build_configurer.js';
export {
  AuthenticatedCompiler,
  SshKeyAgent,
  classifyCompileFailure,
  withAgentSession,
  type AgentSession,
  type KeyAgent,
} from './stages/authenticated_compiler.js';
export { Verifier, timeoutMultiplierArg } from './stages/verifier.js';
export { Installer, licenseDestination } from './stages/installer.js';

// ============================================================================
// CONFIGURATION, TYPES AND ERRORS
// ============================================================================

export {
  DEFAULT_BUILD_OPTIONS,
  resolveBuildOptions,
  toMesonArgs,
  type BuildOptions,
  type BuildType,
  type WrapMode,
} from './config/build_options.js';
export {
  DEFAULT_CONFIG_FILE,
  loadPipelineConfig,
  resolvePipelineConfig,
  type ResolvedPipelineConfig,
} from './config/pipeline_config.js';
export type * from './core/types.js';
export { STAGE_ORDER } from './core/types.js';
export * from './core/errors.js';
export { createExecaRunner, type ToolInvocation, type ToolResult, type ToolRunner } from './process/tool_runner.js';
export { redactText, registerSecret, clearRegisteredSecrets } from './security/redaction.js';

// ============================================================================
// VERSION CONSTANTS
// ============================================================================

export const PKGSTAGE_VERSION = {
  major: 0,
  minor: 3,
  patch: 0,
  string: '0.3.0',
} as const;
