import { Command, InvalidArgumentError } from 'commander';
import debug from 'debug';
import { Reconciler, hasErrors } from '@converge/engine';
import { parseEnv } from '../env';
import { formatReport } from '../format';
import {
  createStepper,
  describeError,
  openStateStore,
  readDesiredState,
  resolveStatePath,
} from '../setup';

const debugApply = debug('cli:apply');

interface ApplyOptions {
  state?: string;
  concurrency?: number;
  timeout?: number;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function registerApplyCommand(program: Command): void {
  program
    .command('apply <file>')
    .description('Converge the host onto the desired-state document')
    .option('-s, --state <path>', 'State file; defaults to CONVERGE_STATE')
    .option('-c, --concurrency <n>', 'Operations running at once', parsePositiveInt)
    .option('-t, --timeout <ms>', 'Timeout for each host call in milliseconds', parsePositiveInt)
    .action(async (file: string, options: ApplyOptions) => {
      await runApplyCommand(file, options);
    });
}

async function runApplyCommand(file: string, options: ApplyOptions): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = () => {
    console.log('⏹️  Interrupted, finishing operations in flight...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const env = parseEnv(process.env);
    const desired = await readDesiredState(file);
    const stepper = createStepper(env);
    const opened = openStateStore(resolveStatePath(env, options.state));
    debugApply(`Applying ${desired.length} integrations with state at ${opened.location}`);

    const reconciler = new Reconciler({
      store: opened.store,
      stepper,
      concurrency: options.concurrency ?? env.CONVERGE_CONCURRENCY,
      operationTimeoutMs: options.timeout ?? env.CONVERGE_TIMEOUT_MS,
    });

    const report = await reconciler.run(desired, { signal: controller.signal });
    for (const line of formatReport(report)) {
      console.log(line);
    }

    if (hasErrors(report)) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error('❌ Apply failed:', describeError(error));
    debugApply('Apply failed', error);
    process.exitCode = 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
