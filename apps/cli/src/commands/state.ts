import { Command } from 'commander';
import debug from 'debug';
import { parseEnv } from '../env';
import { formatState } from '../format';
import { describeError, openStateStore, resolveStatePath } from '../setup';

const debugState = debug('cli:state');

export function registerStateCommand(program: Command): void {
  program
    .command('state')
    .description('List the integrations recorded in the state store')
    .option('-s, --state <path>', 'State file; defaults to CONVERGE_STATE')
    .option('--json', 'Print records as JSON')
    .action(async (options: { state?: string; json?: boolean }) => {
      await runStateCommand(options);
    });
}

async function runStateCommand(options: { state?: string; json?: boolean }): Promise<void> {
  try {
    const env = parseEnv(process.env);
    const opened = openStateStore(resolveStatePath(env, options.state));
    const state = await opened.store.load();
    debugState(`Loaded ${state.size} records from ${opened.location}`);

    if (options.json) {
      console.log(JSON.stringify(Object.fromEntries(state), null, 2));
    } else {
      for (const line of formatState(state)) {
        console.log(line);
      }
    }
  } catch (error) {
    console.error('❌ Reading state failed:', describeError(error));
    debugState('Reading state failed', error);
    process.exitCode = 1;
  }
}
