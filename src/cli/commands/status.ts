import { nextStage } from '../../pipeline/state_machine.js';
import { emptySnapshot, JsonStateStore } from '../../pipeline/state_store.js';
import { printKeyValue, printOutcomes } from '../progress.js';
import { printJson } from './context.js';

export interface StatusCommandOptions {
  statePath: string;
  json: boolean;
}

export async function statusCommand(options: StatusCommandOptions): Promise<void> {
  const store = new JsonStateStore(options.statePath);
  const loaded = await store.load();
  const snapshot = loaded ?? emptySnapshot();
  const next = nextStage(snapshot.state);
  const lastOutcome = snapshot.outcomes.at(-1);

  if (options.json) {
    printJson({ ...snapshot, nextStage: next, stateFile: loaded ? options.statePath : null });
    return;
  }

  console.log('Pipeline Status');
  console.log('===============\n');
  printKeyValue([
    { key: 'State file', value: loaded ? options.statePath : 'not found' },
    { key: 'State', value: snapshot.state },
    { key: 'Next stage', value: next ?? 'none (installed)' },
    { key: 'Working tree', value: snapshot.workingTree?.root ?? null },
    { key: 'Build tree', value: snapshot.buildTree ? `${snapshot.buildTree.root} (${snapshot.buildTree.status})` : null },
    { key: 'Credential', value: snapshot.credential?.agentRegistration ?? null },
    { key: 'Staging root', value: snapshot.stagingRoot?.root ?? null },
  ]);

  console.log('\nStage Outcomes:');
  printOutcomes(snapshot.outcomes);

  if (lastOutcome?.status === 'failed') {
    console.log(`\nLast stage (${lastOutcome.stage}) failed with exit code ${lastOutcome.exitCode}.`);
    console.log('Remove the state file and the pipeline directories to start over.');
  }
}
