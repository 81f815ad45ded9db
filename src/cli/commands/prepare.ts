import type { ResolvedPipelineConfig } from '../../config/pipeline_config.js';
import { CredentialError } from '../../core/errors.js';
import { printKeyValue } from '../progress.js';
import { printJson, type CommandContext } from './context.js';

/**
 * The auth token only ever comes from the environment variable named by
 * `credentials.tokenEnv`; it is never accepted on the command line.
 */
export function readAuthToken(config: ResolvedPipelineConfig, env: NodeJS.ProcessEnv): string {
  const { tokenEnv } = config.credentials;
  const token = env[tokenEnv];
  if (token === undefined || token.trim() === '') {
    throw new CredentialError('missing_token', `Auth token variable ${tokenEnv} is not set`);
  }
  return token;
}

export async function prepareCommand(context: CommandContext): Promise<void> {
  const { pipeline, config, options } = context;
  await pipeline.prepare(readAuthToken(config, context.env));

  const workingTree = pipeline.workingTree;
  const credential = pipeline.credential;
  if (options.json) {
    printJson({ state: pipeline.state, workingTree, credential });
    return;
  }

  console.log('Source prepared');
  printKeyValue([
    { key: 'Working tree', value: workingTree?.root ?? null },
    { key: 'Revision', value: workingTree?.revision ?? null },
    { key: 'Patch', value: workingTree?.patchStatus ?? null },
    { key: 'Key host', value: credential?.hostPattern ?? null },
  ]);
  console.log('\nNext: pkgstage build');
}
