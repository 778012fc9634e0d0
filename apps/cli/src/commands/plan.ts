import { Command } from 'commander';
import debug from 'debug';
import { isConverged, planReconciliation } from '@converge/engine';
import { parseEnv } from '../env';
import { formatPlan } from '../format';
import { describeError, openStateStore, readDesiredState, resolveStatePath } from '../setup';

const debugPlan = debug('cli:plan');

export function registerPlanCommand(program: Command): void {
  program
    .command('plan <file>')
    .description('Show what apply would change, without changing anything')
    .option('-s, --state <path>', 'State file; defaults to CONVERGE_STATE')
    .action(async (file: string, options: { state?: string }) => {
      await runPlanCommand(file, options);
    });
}

async function runPlanCommand(file: string, options: { state?: string }): Promise<void> {
  try {
    const env = parseEnv(process.env);
    const desired = await readDesiredState(file);
    const opened = openStateStore(resolveStatePath(env, options.state));

    const stored = await opened.store.load();
    const plan = planReconciliation(desired, stored);
    debugPlan(`Planned ${plan.length} operations against ${opened.location}`);

    for (const line of formatPlan(plan)) {
      console.log(line);
    }
    if (isConverged(plan)) {
      console.log('✅ Nothing to do');
    }
  } catch (error) {
    console.error('❌ Plan failed:', describeError(error));
    debugPlan('Plan failed', error);
    process.exitCode = 1;
  }
}
