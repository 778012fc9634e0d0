/**
 * RetryingStepper - retries transient stepper failures with exponential backoff.
 *
 * Only TransientError is retried; every other failure, and the last transient
 * one, propagates unchanged.
 */

import createDebug from "debug";
import {
  isErrorType,
  type Answers,
  type InstanceHandle,
  type Options,
  type StepperAdapter,
} from "@converge/proto";

const debug = createDebug("converge:connectors:retry");

export interface RetryPolicy {
  /** Attempts per call, including the first */
  maxAttempts: number;
  /** Base backoff delay in milliseconds */
  baseBackoffMs: number;
  /** Maximum backoff delay in milliseconds */
  maxBackoffMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseBackoffMs: 1_000, // 1 second
  maxBackoffMs: 30_000, // 30 seconds
};

/**
 * Calculate exponential backoff delay.
 *
 * @param attempt - Attempt that just failed (1-indexed)
 * @returns Delay in milliseconds before the next attempt
 */
export function calculateBackoff(attempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  // Exponential backoff: base * 2^(attempt-1)
  const exponentialDelayMs = policy.baseBackoffMs * Math.pow(2, attempt - 1);
  return Math.min(exponentialDelayMs, policy.maxBackoffMs);
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class RetryingStepper implements StepperAdapter {
  readonly exists?: (handle: InstanceHandle) => Promise<boolean>;
  private policy: RetryPolicy;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private inner: StepperAdapter,
    policy: Partial<RetryPolicy> = {},
    sleepFn: (ms: number) => Promise<void> = sleep
  ) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
    if (!Number.isInteger(this.policy.maxAttempts) || this.policy.maxAttempts < 1) {
      throw new Error(`Invalid maxAttempts: ${this.policy.maxAttempts}`);
    }
    this.sleep = sleepFn;

    // Only offer verification when the wrapped stepper can answer it
    const exists = inner.exists;
    if (exists) {
      this.exists = (handle) => this.retry("exists", () => exists.call(inner, handle));
    }
  }

  begin(platform: string, answers: Answers): Promise<InstanceHandle> {
    return this.retry("begin", () => this.inner.begin(platform, answers));
  }

  delete(handle: InstanceHandle): Promise<void> {
    return this.retry("delete", () => this.inner.delete(handle));
  }

  updateOptions(handle: InstanceHandle, options: Options): Promise<void> {
    return this.retry("updateOptions", () => this.inner.updateOptions(handle, options));
  }

  supportsOptions(handle: InstanceHandle): Promise<boolean> {
    return this.retry("supportsOptions", () => this.inner.supportsOptions(handle));
  }

  private async retry<T>(name: string, fn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!isErrorType(error, "transient") || attempt >= this.policy.maxAttempts) {
          throw error;
        }
        const delayMs = calculateBackoff(attempt, this.policy);
        debug(`${name} failed (attempt ${attempt}/${this.policy.maxAttempts}), retrying in ${delayMs}ms: ${error.message}`);
        await this.sleep(delayMs);
      }
    }
  }
}
