/**
 * @fileoverview Production collaborators for BuildPipeline
 */

import type { ResolvedPipelineConfig } from '../config/pipeline_config.js';
import { createExecaRunner } from '../process/tool_runner.js';
import { SshKeyAgent } from '../stages/authenticated_compiler.js';
import { FileKeyStore, HttpKeyTransport } from '../stages/credential_provisioner.js';
import type { PipelineDependencies } from './pipeline.js';
import { JsonStateStore } from './state_store.js';

export interface DependencyLocations {
  /** Directory holding the ephemeral key and its connection config */
  credentialsDir: string;
  statePath: string;
}

export function createDefaultDependencies(
  config: ResolvedPipelineConfig,
  locations: DependencyLocations,
): PipelineDependencies {
  const runner = createExecaRunner();
  return {
    runner,
    transport: new HttpKeyTransport({ tokenParam: config.credentials.tokenParam }),
    keyStore: new FileKeyStore(locations.credentialsDir),
    agent: new SshKeyAgent(runner),
    stateStore: new JsonStateStore(locations.statePath),
  };
}
