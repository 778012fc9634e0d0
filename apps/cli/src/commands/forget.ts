import { Command } from 'commander';
import debug from 'debug';
import { parseEnv } from '../env';
import { describeError, openStateStore, resolveStatePath } from '../setup';

const debugForget = debug('cli:forget');

export function registerForgetCommand(program: Command): void {
  program
    .command('forget <configurationId>')
    .description('Drop a state record without touching the instance on the host')
    .option('-s, --state <path>', 'State file; defaults to CONVERGE_STATE')
    .action(async (configurationId: string, options: { state?: string }) => {
      await runForgetCommand(configurationId, options);
    });
}

async function runForgetCommand(configurationId: string, options: { state?: string }): Promise<void> {
  try {
    const env = parseEnv(process.env);
    const opened = openStateStore(resolveStatePath(env, options.state));

    const state = await opened.store.load();
    const record = state.get(configurationId);
    if (!record) {
      console.error(`❌ No record for ${configurationId} in ${opened.location}`);
      process.exitCode = 1;
      return;
    }

    await opened.store.remove(configurationId);
    debugForget(`Forgot ${configurationId} (${record.instanceHandle})`);
    console.log(`Forgot ${configurationId}; instance ${record.instanceHandle} was left on the host`);
  } catch (error) {
    console.error('❌ Forget failed:', describeError(error));
    debugForget('Forget failed', error);
    process.exitCode = 1;
  }
}
