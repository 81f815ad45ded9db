import { printKeyValue } from '../progress.js';
import { printJson, type CommandContext } from './context.js';

export async function buildCommand(context: CommandContext): Promise<void> {
  const { pipeline, options } = context;
  await pipeline.build();

  const buildTree = pipeline.buildTree;
  if (options.json) {
    printJson({ state: pipeline.state, buildTree });
    return;
  }

  console.log('Build complete');
  printKeyValue([
    { key: 'Build directory', value: buildTree?.root ?? null },
    { key: 'Build type', value: buildTree?.options.buildType ?? null },
    { key: 'Prefix', value: buildTree?.options.prefix ?? null },
  ]);
  console.log('\nNext: pkgstage check');
}
