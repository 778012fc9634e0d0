/**
 * Types for the connectors package.
 *
 * A flow host runs multi-step configuration flows: it shows a form, takes the
 * answers for that form, and either shows the next form, finishes by creating
 * an entry, or aborts. Options flows work the same way against an existing
 * entry.
 */

import type { Step } from "@converge/proto";

/**
 * Which flow manager a flow runs in: "config" creates entries, "options"
 * reconfigures an existing entry.
 */
export type FlowKind = "config" | "options";

/**
 * One field declared by a flow form.
 */
export interface FlowField {
  name: string;
  required: boolean;
  /** Whether the host fills the field in when it is omitted */
  hasDefault: boolean;
}

export interface FlowForm {
  type: "form";
  flowId: string;
  stepId: string;
  fields: FlowField[];
  /** Field name (or "base") -> error key; empty values are not errors */
  errors: Record<string, string | null>;
}

export interface FlowCreateEntry {
  type: "create_entry";
  flowId: string;
  /** Id of the created entry; options flows don't create one */
  entryId?: string;
}

export interface FlowAbort {
  type: "abort";
  flowId: string;
  reason: string;
}

export type FlowResult = FlowForm | FlowCreateEntry | FlowAbort;

/**
 * A configured entry as the host reports it.
 */
export interface FlowEntry {
  entryId: string;
  domain: string;
  title?: string;
  supportsOptions: boolean;
}

/**
 * Host running configuration flows.
 *
 * Implementations throw classified errors: NotFoundError for an unknown
 * flow, handler or entry, TransientError when the host is unreachable.
 */
export interface FlowHost {
  /** Start a flow; `handler` is the platform for config flows, the entry id for options flows */
  startFlow(kind: FlowKind, handler: string): Promise<FlowResult>;
  submitStep(kind: FlowKind, flowId: string, data: Step): Promise<FlowResult>;
  abortFlow(kind: FlowKind, flowId: string): Promise<void>;
  removeEntry(entryId: string): Promise<void>;
  /** Returns null when no such entry exists */
  getEntry(entryId: string): Promise<FlowEntry | null>;
}
