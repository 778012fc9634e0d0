import * as fs from 'fs/promises';
import * as path from 'path';
import debug from 'debug';
import {
  ValidationError,
  isClassifiedError,
  parseDesiredState,
  type DesiredItem,
  type StateStore,
  type StepperAdapter,
} from '@converge/proto';
import { FileStateStore, getDefaultStatePath } from '@converge/node';
import { FlowStepper, HttpFlowHost, RetryingStepper } from '@converge/connectors';
import type { ConvergeEnv } from './env';

const debugSetup = debug('cli:setup');

export interface OpenedStore {
  store: StateStore;
  /** Where the state lives, for messages */
  location: string;
}

/**
 * Resolve the state file: explicit option, then CONVERGE_STATE, then the default lock file.
 */
export function resolveStatePath(env: ConvergeEnv, override?: string): string {
  const statePath = override ?? env.CONVERGE_STATE;
  return statePath === undefined ? getDefaultStatePath() : path.resolve(statePath);
}

export function openStateStore(statePath: string): OpenedStore {
  debugSetup('Using JSON state file at', statePath);
  return {
    store: new FileStateStore(statePath),
    location: statePath,
  };
}

/**
 * Stepper talking to the configured host, with transient failures retried.
 */
export function createStepper(env: ConvergeEnv): StepperAdapter {
  if (!env.CONVERGE_HOST_URL) {
    throw new ValidationError('CONVERGE_HOST_URL is not set', { source: 'env', field: 'CONVERGE_HOST_URL' });
  }
  if (!env.CONVERGE_HOST_TOKEN) {
    throw new ValidationError('CONVERGE_HOST_TOKEN is not set', { source: 'env', field: 'CONVERGE_HOST_TOKEN' });
  }

  const host = new HttpFlowHost({ baseUrl: env.CONVERGE_HOST_URL, token: env.CONVERGE_HOST_TOKEN });
  return new RetryingStepper(new FlowStepper(host), { maxAttempts: env.CONVERGE_RETRY_ATTEMPTS });
}

/**
 * Read and validate a desired-state YAML document.
 */
export async function readDesiredState(file: string): Promise<DesiredItem[]> {
  const text = await fs.readFile(path.resolve(file), 'utf8');
  return parseDesiredState(text);
}

/**
 * Message for a failed command; classified errors carry their type.
 */
export function describeError(error: unknown): string {
  if (isClassifiedError(error)) {
    return `${error.message} [${error.type}]`;
  }
  return error instanceof Error ? error.message : String(error);
}
