import type { ResolvedPipelineConfig } from '../../config/pipeline_config.js';
import type { BuildPipeline } from '../../pipeline/pipeline.js';

/** Global options shared by every sub-command, paths already absolute. */
export interface CliOptions {
  config: string;
  source: string;
  build: string;
  stage: string;
  state: string;
  credentials: string;
  json: boolean;
}

export interface CommandContext {
  options: CliOptions;
  config: ResolvedPipelineConfig;
  pipeline: BuildPipeline;
  env: NodeJS.ProcessEnv;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
