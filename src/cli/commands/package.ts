import { printKeyValue } from '../progress.js';
import { printJson, type CommandContext } from './context.js';

export async function packageCommand(context: CommandContext): Promise<void> {
  const { pipeline, options } = context;
  const stagingRoot = await pipeline.package();

  if (options.json) {
    printJson({ state: pipeline.state, stagingRoot });
    return;
  }

  console.log('Package staged');
  printKeyValue([
    { key: 'Staging root', value: stagingRoot.root },
    { key: 'Files', value: stagingRoot.entries.length },
  ]);
  for (const entry of stagingRoot.entries) {
    console.log(`    ${entry}`);
  }
}
