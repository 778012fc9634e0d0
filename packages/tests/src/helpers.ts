/**
 * Scripted in-process stepper for reconciler tests.
 *
 * Instances live in a map; hooks let a test fail or delay individual calls.
 */

import type { Answers, DesiredItem, InstanceHandle, Options, StepperAdapter } from "@converge/proto";

export interface FakeInstance {
  platform: string;
  answers: Answers;
  options: Options;
}

type Hook<Args extends unknown[]> = (...args: Args) => Promise<void> | void;

export class FakeStepper implements StepperAdapter {
  instances = new Map<InstanceHandle, FakeInstance>();
  /** Every call in order, e.g. "begin:broadlink", "delete:entry-1" */
  calls: string[] = [];
  optionsSupported = true;

  onBegin?: Hook<[string, Answers]>;
  onDelete?: Hook<[InstanceHandle]>;
  onUpdateOptions?: Hook<[InstanceHandle, Options]>;
  onExists?: Hook<[InstanceHandle]>;

  private counter = 0;

  async begin(platform: string, answers: Answers): Promise<InstanceHandle> {
    this.calls.push(`begin:${platform}`);
    await this.onBegin?.(platform, answers);
    const handle = `entry-${++this.counter}`;
    this.instances.set(handle, { platform, answers, options: [] });
    return handle;
  }

  async delete(handle: InstanceHandle): Promise<void> {
    this.calls.push(`delete:${handle}`);
    await this.onDelete?.(handle);
    this.instances.delete(handle);
  }

  async updateOptions(handle: InstanceHandle, options: Options): Promise<void> {
    this.calls.push(`updateOptions:${handle}`);
    await this.onUpdateOptions?.(handle, options);
    const instance = this.instances.get(handle);
    if (instance) {
      instance.options = options;
    }
  }

  async supportsOptions(handle: InstanceHandle): Promise<boolean> {
    this.calls.push(`supportsOptions:${handle}`);
    return this.optionsSupported;
  }

  async exists(handle: InstanceHandle): Promise<boolean> {
    this.calls.push(`exists:${handle}`);
    await this.onExists?.(handle);
    return this.instances.has(handle);
  }

  /** Calls whose name starts with `prefix`, e.g. "begin" */
  callsTo(prefix: string): string[] {
    return this.calls.filter((call) => call.startsWith(`${prefix}:`));
  }
}

export function item(
  configurationId: string,
  platform: string,
  answers: Answers,
  extra: Partial<Pick<DesiredItem, "options" | "recreateOnOptionsChange">> = {}
): DesiredItem {
  return {
    configurationId,
    platform,
    answers,
    options: extra.options ?? [],
    recreateOnOptionsChange: extra.recreateOnOptionsChange ?? false,
  };
}

/**
 * Promise plus its resolve function, for holding a call open.
 */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));
