/**
 * Reconciler - drives one convergence pass.
 *
 * load state → plan → execute every operation through the stepper → write the
 * state store after each successful step. Item-level failures become report
 * entries; only state store failures abort the pass.
 *
 * Execution happens in two phases so no create races a delete in the external
 * system: phase 1 runs deletes and the delete half of recreates, phase 2 runs
 * creates, create halves and options updates. Within a phase, distinct ids
 * run concurrently up to `concurrency`, each under its per-id lock.
 */

import debug from "debug";
import pLimit from "p-limit";
import {
  ClassifiedError,
  StateStoreError,
  ensureClassified,
  isErrorType,
  type DesiredItem,
  type InstanceHandle,
  type Options,
  type StateStore,
  type StepperAdapter,
  type StoredRecord,
  type StoredState,
} from "@converge/proto";
import { planReconciliation, type Operation, type OperationKind, type ReconciliationPlan } from "./diff";
import { fingerprintAnswers, fingerprintOptions } from "./fingerprint";
import { KeyedLock } from "./keyed-lock";
import type { ReconciliationReport, ReportEntry } from "./report";
import { withTimeout } from "./timeout";

const log = debug("converge:engine:reconciler");

/** Default number of operations running at once */
export const DEFAULT_CONCURRENCY = 4;

export interface ReconcilerConfig {
  store: StateStore;
  stepper: StepperAdapter;
  /** Maximum operations in flight within one phase (default: 4) */
  concurrency?: number;
  /**
   * Bound on each stepper call; expiry is reported as a TransientError. The
   * id stays locked, and the pass open, until the abandoned call settles.
   */
  operationTimeoutMs?: number;
  /**
   * Probe stored instances with `stepper.exists` before planning and forget
   * records whose instance is gone (default: true, when the stepper supports it)
   */
  verifyInstances?: boolean;
  /** Clock for record timestamps */
  now?: () => number;
}

export interface RunOptions {
  /** Cancels the pass between operations; in-flight operations complete */
  signal?: AbortSignal;
}

type StepperCall = "begin" | "delete" | "updateOptions" | "supportsOptions" | "exists";

function errorEntry(
  configurationId: string,
  operation: OperationKind,
  error: ClassifiedError,
  prefix?: string
): ReportEntry {
  return {
    configurationId,
    operation,
    outcome: "error",
    detail: prefix ? `${prefix}: ${error.message}` : error.message,
    errorType: error.type,
    error,
  };
}

export class Reconciler {
  private store: StateStore;
  private stepper: StepperAdapter;
  private concurrency: number;
  private operationTimeoutMs?: number;
  private verifyInstances: boolean;
  private now: () => number;
  private locks = new KeyedLock();
  /** Timed-out stepper calls still running, per configurationId */
  private lateCalls = new Map<string, Promise<void>[]>();
  private passQueue: Promise<void> = Promise.resolve();

  constructor(config: ReconcilerConfig) {
    const concurrency = config.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Invalid concurrency: ${concurrency}`);
    }

    this.store = config.store;
    this.stepper = config.stepper;
    this.concurrency = concurrency;
    this.operationTimeoutMs = config.operationTimeoutMs;
    this.verifyInstances = config.verifyInstances ?? true;
    this.now = config.now ?? Date.now;
  }

  /**
   * Compute the plan for `desired` without touching the stepper or the store.
   *
   * The CLI `plan` command calls planReconciliation on a store snapshot
   * itself, so it needs no host credentials to build a Reconciler.
   */
  async preview(desired: ReadonlyArray<DesiredItem>): Promise<ReconciliationPlan> {
    const stored = await this.loadState(false);
    return planReconciliation(desired, stored);
  }

  /**
   * Run one reconciliation pass.
   *
   * Passes on the same Reconciler run one after another, so a pass never
   * plans from a snapshot another pass is still writing to.
   *
   * @throws StateStoreError when the store cannot be read or written
   */
  run(desired: ReadonlyArray<DesiredItem>, options: RunOptions = {}): Promise<ReconciliationReport> {
    const result = this.passQueue.then(() => this.runPass(desired, options));
    this.passQueue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async runPass(
    desired: ReadonlyArray<DesiredItem>,
    { signal }: RunOptions
  ): Promise<ReconciliationReport> {
    const startedAt = this.now();
    const stored = await this.loadState(this.verifyInstances);
    const plan = planReconciliation(desired, stored);
    log(`Planned ${plan.length} operations for ${desired.length} desired / ${stored.size} stored items`);

    const results = new Map<Operation, ReportEntry[]>();
    const deletedForRecreate = new Set<string>();
    const limit = pLimit(this.concurrency);
    const pass: { fatal?: ClassifiedError; cancelled: boolean } = { cancelled: false };

    const execute = (op: Operation, task: () => Promise<ReportEntry[] | undefined>) =>
      limit(async () => {
        if (pass.fatal) return;
        if (signal?.aborted) {
          pass.cancelled = true;
          return;
        }

        try {
          const entries = await this.locks.runExclusive(op.configurationId, async () => {
            try {
              return await task();
            } finally {
              await this.settleLateCalls(op.configurationId);
            }
          });
          if (entries) {
            results.set(op, entries);
          }
        } catch (error) {
          if (isErrorType(error, "state")) {
            pass.fatal = pass.fatal ?? error;
            return;
          }
          results.set(op, [errorEntry(op.configurationId, op.kind, ensureClassified(error, "reconciler"))]);
        }
      });

    // Phase 1: deletes and delete halves
    await Promise.all(
      plan.map((op) => {
        if (op.kind === "delete") {
          return execute(op, async () => [await this.deleteInstance(op.configurationId, stored, "delete")]);
        }
        if (op.kind === "recreate") {
          return execute(op, async () => {
            const entry = await this.deleteInstance(op.configurationId, stored, "recreate");
            if (entry.outcome !== "success") {
              return [entry];
            }
            deletedForRecreate.add(op.configurationId);
            return undefined;
          });
        }
        return Promise.resolve();
      })
    );

    // Phase 2: creates, create halves, options
    await Promise.all(
      plan.map((op) => {
        switch (op.kind) {
          case "create": {
            const { item } = op;
            return execute(op, () => this.createInstance(item, "create"));
          }
          case "recreate": {
            const { item } = op;
            if (!deletedForRecreate.has(item.configurationId)) {
              return Promise.resolve();
            }
            return execute(op, () => this.createInstance(item, "recreate"));
          }
          case "update-options": {
            const { configurationId, options } = op;
            return execute(op, () => this.updateOptions(configurationId, options, stored));
          }
          default:
            return Promise.resolve();
        }
      })
    );

    if (pass.fatal) {
      log(`Pass aborted: ${pass.fatal.message}`);
      throw pass.fatal;
    }

    const entries: ReportEntry[] = [];
    for (const op of plan) {
      if (op.kind === "noop") {
        entries.push({ configurationId: op.configurationId, operation: "noop", outcome: "success" });
        continue;
      }

      const opEntries = results.get(op);
      if (opEntries) {
        entries.push(...opEntries);
      } else if (deletedForRecreate.has(op.configurationId)) {
        entries.push({
          configurationId: op.configurationId,
          operation: op.kind,
          outcome: "skipped",
          detail: "cancelled after delete; will be created on the next pass",
        });
      } else {
        entries.push({
          configurationId: op.configurationId,
          operation: op.kind,
          outcome: "skipped",
          detail: "cancelled",
        });
      }
    }

    for (const entry of entries) {
      if (entry.outcome !== "success" || entry.operation !== "noop") {
        log(`${entry.configurationId} ${entry.operation}: ${entry.outcome}${entry.detail ? ` (${entry.detail})` : ""}`);
      }
    }

    return {
      plan,
      entries,
      cancelled: pass.cancelled,
      startedAt,
      finishedAt: this.now(),
    };
  }

  /**
   * Load the store snapshot, optionally dropping records whose instance is
   * definitely gone.
   */
  private async loadState(verify: boolean): Promise<StoredState> {
    let stored: StoredState;
    try {
      stored = await this.store.load();
    } catch (error) {
      throw this.toStateError(error, "Failed to load state");
    }

    const exists = this.stepper.exists;
    if (!verify || !exists) {
      return stored;
    }

    const limit = pLimit(this.concurrency);
    const missing: string[] = [];
    await Promise.all(
      Array.from(stored, ([configurationId, record]) =>
        limit(async () => {
          try {
            const present = await this.call(configurationId, "exists", () =>
              exists.call(this.stepper, record.instanceHandle)
            );
            if (!present) {
              missing.push(configurationId);
            }
          } catch (error) {
            // Unknown means present: only a definite answer may drop a record
            log(`Could not verify ${configurationId}, keeping record: ${ensureClassified(error).message}`);
          }
        })
      )
    );
    await Promise.all(Array.from(stored.keys(), (configurationId) => this.settleLateCalls(configurationId)));

    for (const configurationId of missing) {
      log(`Instance for ${configurationId} no longer exists, forgetting record`);
      await this.removeRecord(configurationId);
      stored.delete(configurationId);
    }

    return stored;
  }

  /**
   * Delete the stored instance and forget its record.
   */
  private async deleteInstance(
    configurationId: string,
    stored: StoredState,
    operation: OperationKind
  ): Promise<ReportEntry> {
    const record = stored.get(configurationId);
    let detail: string | undefined;

    if (record) {
      try {
        await this.call(configurationId, "delete", () => this.stepper.delete(record.instanceHandle));
      } catch (error) {
        const classified = ensureClassified(error, "stepper.delete");
        if (classified.type !== "not_found") {
          return errorEntry(
            configurationId,
            operation,
            classified,
            operation === "recreate" ? "delete failed" : undefined
          );
        }
        detail = "already removed";
      }
    }

    await this.removeRecord(configurationId);
    return { configurationId, operation, outcome: "success", detail };
  }

  /**
   * Set up a new instance, record it, then apply options best-effort.
   */
  private async createInstance(item: DesiredItem, operation: OperationKind): Promise<ReportEntry[]> {
    const { configurationId } = item;

    let handle: InstanceHandle;
    try {
      handle = await this.call(
        configurationId,
        "begin",
        () => this.stepper.begin(item.platform, item.answers),
        async (lateHandle) => {
          // The instance exists now; record it so the next pass does not create another
          log(`Late begin for ${configurationId} returned ${lateHandle}, recording it`);
          await this.saveRecord(configurationId, this.newRecord(item, lateHandle));
        }
      );
    } catch (error) {
      return [
        errorEntry(
          configurationId,
          operation,
          ensureClassified(error, "stepper.begin"),
          operation === "recreate" ? "deleted, create failed" : undefined
        ),
      ];
    }

    const record = this.newRecord(item, handle);
    await this.saveRecord(configurationId, record);

    const entries: ReportEntry[] = [
      { configurationId, operation, outcome: "success", detail: `instance ${handle}` },
    ];

    if (item.options.length > 0) {
      const optionsEntry = await this.applyOptions(configurationId, record, item.options);
      if (optionsEntry.outcome === "success") {
        entries[0].detail = `instance ${handle}, options applied`;
      } else {
        entries.push(optionsEntry);
      }
    }

    return entries;
  }

  private newRecord(item: DesiredItem, handle: InstanceHandle): StoredRecord {
    const timestamp = this.now();
    // Nothing applied yet: a failed options step leaves an update for the next pass
    return {
      platform: item.platform,
      answersFingerprint: fingerprintAnswers(item.answers),
      optionsFingerprint: fingerprintOptions([]),
      instanceHandle: handle,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  private async updateOptions(
    configurationId: string,
    options: Options,
    stored: StoredState
  ): Promise<ReportEntry[]> {
    const record = stored.get(configurationId);
    if (!record) {
      // Planned from this snapshot, so unreachable unless the store lied
      return [
        {
          configurationId,
          operation: "update-options",
          outcome: "skipped",
          detail: "no stored record",
        },
      ];
    }
    return [await this.applyOptions(configurationId, record, options)];
  }

  private async applyOptions(
    configurationId: string,
    record: StoredRecord,
    options: Options
  ): Promise<ReportEntry> {
    const handle = record.instanceHandle;

    // An empty patch leaves the instance as it is
    if (options.length === 0) {
      await this.saveRecord(configurationId, {
        ...record,
        optionsFingerprint: fingerprintOptions(options),
        updatedAt: this.now(),
      });
      return { configurationId, operation: "update-options", outcome: "success", detail: "no options to apply" };
    }

    let supported: boolean;
    try {
      supported = await this.call(configurationId, "supportsOptions", () => this.stepper.supportsOptions(handle));
    } catch (error) {
      return errorEntry(configurationId, "update-options", ensureClassified(error, "stepper.supportsOptions"));
    }

    if (!supported) {
      return {
        configurationId,
        operation: "update-options",
        outcome: "skipped",
        detail: "options not supported",
      };
    }

    try {
      await this.call(configurationId, "updateOptions", () => this.stepper.updateOptions(handle, options));
    } catch (error) {
      return errorEntry(configurationId, "update-options", ensureClassified(error, "stepper.updateOptions"));
    }

    await this.saveRecord(configurationId, {
      ...record,
      optionsFingerprint: fingerprintOptions(options),
      updatedAt: this.now(),
    });

    return { configurationId, operation: "update-options", outcome: "success" };
  }

  /**
   * Bounded stepper call. A call that outlives its timeout is tracked under
   * `configurationId` until it settles; `onLateResult` sees its value.
   */
  private call<T>(
    configurationId: string,
    name: StepperCall,
    fn: () => Promise<T>,
    onLateResult?: (value: T) => Promise<void>
  ): Promise<T> {
    return withTimeout(fn, this.operationTimeoutMs, `stepper.${name}`, (late) => {
      const settled = late.then(
        (value) => onLateResult?.(value),
        (error: unknown) => {
          log(`Late ${name} for ${configurationId} failed: ${ensureClassified(error).message}`);
        }
      );
      const calls = this.lateCalls.get(configurationId) ?? [];
      calls.push(settled);
      this.lateCalls.set(configurationId, calls);
    });
  }

  /**
   * Wait for every timed-out call of `configurationId` to settle.
   *
   * @throws StateStoreError when a late result could not be recorded
   */
  private async settleLateCalls(configurationId: string): Promise<void> {
    let calls = this.lateCalls.get(configurationId);
    while (calls) {
      this.lateCalls.delete(configurationId);
      log(`Waiting for ${calls.length} timed-out calls of ${configurationId}`);
      await Promise.all(calls);
      calls = this.lateCalls.get(configurationId);
    }
  }

  private async saveRecord(configurationId: string, record: StoredRecord): Promise<void> {
    try {
      await this.store.save(configurationId, record);
    } catch (error) {
      throw this.toStateError(error, `Failed to save record for ${configurationId}`);
    }
  }

  private async removeRecord(configurationId: string): Promise<void> {
    try {
      await this.store.remove(configurationId);
    } catch (error) {
      throw this.toStateError(error, `Failed to remove record for ${configurationId}`);
    }
  }

  private toStateError(error: unknown, message: string): ClassifiedError {
    if (isErrorType(error, "state")) {
      return error;
    }
    return new StateStoreError(`${message}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error instanceof Error ? error : undefined,
      source: "state-store",
    });
  }
}
