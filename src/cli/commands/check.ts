import { printKeyValue } from '../progress.js';
import { printJson, type CommandContext } from './context.js';

export async function checkCommand(context: CommandContext): Promise<void> {
  const { pipeline, options } = context;
  await pipeline.check();

  const outcome = pipeline.result.outcomes.filter((entry) => entry.stage === 'verify').at(-1);
  if (options.json) {
    printJson({ state: pipeline.state, outcome });
    return;
  }

  console.log('Verification finished');
  printKeyValue([
    { key: 'Mode', value: context.config.verification.mode },
    { key: 'Result', value: outcome?.status ?? null },
  ]);
  console.log('\nNext: pkgstage package');
}
