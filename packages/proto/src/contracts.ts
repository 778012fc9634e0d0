/**
 * Boundaries between the reconciliation engine and its collaborators.
 *
 * Both interfaces are injected into the Reconciler, never imported by it,
 * so any durable keyed storage and any setup protocol can be plugged in.
 */

import type {
  Answers,
  InstanceHandle,
  Options,
  StoredRecord,
  StoredState,
} from "./schemas";

/**
 * Durable record of previously-applied state.
 *
 * Every write must be durable before its promise resolves (no write-behind).
 * Implementations throw StateStoreError on infrastructure failure.
 * Single-writer discipline is enforced by the caller.
 */
export interface StateStore {
  load(): Promise<StoredState>;
  save(configurationId: string, record: StoredRecord): Promise<void>;
  remove(configurationId: string): Promise<void>;
}

/**
 * Create / delete / options capability of the external system.
 *
 * - begin: drives the whole ordered answers protocol; throws ValidationError
 *   (field + step) on rejected input, ConflictError when the target is
 *   already configured out of band.
 * - delete: must treat an instance that is already gone as success.
 * - updateOptions: partial patch; unset keys are left unchanged.
 * - exists: optional; lets the reconciler drop records whose instance was
 *   removed out of band before planning.
 */
export interface StepperAdapter {
  begin(platform: string, answers: Answers): Promise<InstanceHandle>;
  delete(handle: InstanceHandle): Promise<void>;
  updateOptions(handle: InstanceHandle, options: Options): Promise<void>;
  supportsOptions(handle: InstanceHandle): Promise<boolean>;
  exists?(handle: InstanceHandle): Promise<boolean>;
}
