import { printOutcomes, printKeyValue } from '../progress.js';
import { printJson, type CommandContext } from './context.js';
import { readAuthToken } from './prepare.js';

export async function runCommand(context: CommandContext): Promise<void> {
  const { pipeline, config, options } = context;
  const result = await pipeline.run(readAuthToken(config, context.env));

  if (options.json) {
    printJson({ state: pipeline.state, stagingRoot: pipeline.stagingRoot, outcomes: result.outcomes });
    return;
  }

  console.log('Pipeline complete\n');
  printOutcomes(result.outcomes);
  console.log();
  printKeyValue([
    { key: 'Package', value: config.packageName },
    { key: 'Staging root', value: pipeline.stagingRoot?.root ?? null },
    { key: 'Files', value: pipeline.stagingRoot?.entries.length ?? 0 },
  ]);
}
