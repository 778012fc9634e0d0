/**
 * HttpFlowHost - FlowHost over the config-entries REST API.
 *
 * Endpoints (relative to the base URL):
 *   POST   /api/config/config_entries/flow                  start a config flow
 *   POST   /api/config/config_entries/flow/{flow_id}        submit a step
 *   DELETE /api/config/config_entries/flow/{flow_id}        abort
 *   POST   /api/config/config_entries/options/flow          start an options flow
 *   POST   /api/config/config_entries/options/flow/{id}     submit a step
 *   DELETE /api/config/config_entries/options/flow/{id}     abort
 *   GET    /api/config/config_entries/entry                 list entries
 *   DELETE /api/config/config_entries/entry/{entry_id}      remove an entry
 */

import createDebug from "debug";
import { z } from "zod";
import { InternalError, TransientError, classifyHttpError, type Step } from "@converge/proto";
import type { FlowEntry, FlowHost, FlowKind, FlowResult } from "./types";

const debug = createDebug("converge:connectors:http");

const fieldSchema = z.object({
  name: z.string(),
  required: z.boolean().optional(),
  default: z.unknown().optional(),
});

const formSchema = z.object({
  type: z.literal("form"),
  flow_id: z.string(),
  step_id: z.string(),
  data_schema: z.array(fieldSchema).nullish(),
  errors: z.record(z.string(), z.string().nullable()).nullish(),
});

const createEntrySchema = z.object({
  type: z.literal("create_entry"),
  flow_id: z.string(),
  result: z.unknown().optional(),
});

const abortSchema = z.object({
  type: z.literal("abort"),
  flow_id: z.string(),
  reason: z.string(),
});

const flowResponseSchema = z.union([formSchema, createEntrySchema, abortSchema]);

// Config flows return the created entry; options flows return no entry
const createdEntrySchema = z.object({ entry_id: z.string() });

const entryListSchema = z.array(
  z.object({
    entry_id: z.string(),
    domain: z.string(),
    title: z.string().optional(),
    supports_options: z.boolean().optional(),
  })
);

export interface HttpFlowHostConfig {
  /** Base URL of the host, e.g. http://localhost:8123 */
  baseUrl: string;
  /** Long-lived bearer token */
  token: string;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

type FlowResponse = z.infer<typeof flowResponseSchema>;

export function toFlowResult(response: FlowResponse): FlowResult {
  switch (response.type) {
    case "form":
      return {
        type: "form",
        flowId: response.flow_id,
        stepId: response.step_id,
        fields: (response.data_schema ?? []).map((field) => ({
          name: field.name,
          required: field.required ?? false,
          hasDefault: field.default !== undefined,
        })),
        errors: response.errors ?? {},
      };
    case "create_entry": {
      const created = createdEntrySchema.safeParse(response.result);
      return {
        type: "create_entry",
        flowId: response.flow_id,
        entryId: created.success ? created.data.entry_id : undefined,
      };
    }
    case "abort":
      return { type: "abort", flowId: response.flow_id, reason: response.reason };
  }
}

export class HttpFlowHost implements FlowHost {
  private baseUrl: string;
  private token: string;
  private fetchImpl: typeof fetch;

  constructor(config: HttpFlowHostConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.token = config.token;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async startFlow(kind: FlowKind, handler: string): Promise<FlowResult> {
    const body = kind === "config" ? { handler, show_advanced_options: true } : { handler };
    const response = await this.request("POST", flowPath(kind), body);
    return this.parseFlow(response, `start ${kind} flow for ${handler}`);
  }

  async submitStep(kind: FlowKind, flowId: string, data: Step): Promise<FlowResult> {
    const response = await this.request("POST", flowPath(kind, flowId), data);
    return this.parseFlow(response, `${kind} flow ${flowId}`);
  }

  async abortFlow(kind: FlowKind, flowId: string): Promise<void> {
    await this.request("DELETE", flowPath(kind, flowId));
  }

  async removeEntry(entryId: string): Promise<void> {
    await this.request("DELETE", `/api/config/config_entries/entry/${encodeURIComponent(entryId)}`);
  }

  async getEntry(entryId: string): Promise<FlowEntry | null> {
    const response = await this.request("GET", "/api/config/config_entries/entry");
    const parsed = entryListSchema.safeParse(response);
    if (!parsed.success) {
      throw new InternalError(`Unexpected entry list: ${parsed.error.message}`, { source: "http-flow-host" });
    }

    const entry = parsed.data.find((candidate) => candidate.entry_id === entryId);
    if (!entry) {
      return null;
    }
    return {
      entryId: entry.entry_id,
      domain: entry.domain,
      title: entry.title,
      supportsOptions: entry.supports_options ?? false,
    };
  }

  private parseFlow(response: unknown, what: string): FlowResult {
    const parsed = flowResponseSchema.safeParse(response);
    if (!parsed.success) {
      debug("Unexpected response for %s: %o", what, response);
      throw new InternalError(`Unsupported response for ${what}`, { source: "http-flow-host" });
    }
    return toFlowResult(parsed.data);
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const source = `http-flow-host.${method} ${path}`;
    debug("%s %s", method, path);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          "Content-Type": "application/json",
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error) {
      throw new TransientError(
        `${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
        { source, cause: error instanceof Error ? error : undefined }
      );
    }

    const text = await response.text();
    if (!response.ok) {
      debug("%s %s failed: %s %s", method, path, response.status, text);
      throw classifyHttpError(response.status, `${method} ${path} returned ${response.status}: ${text || response.statusText}`, {
        source,
      });
    }

    if (!text) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new InternalError(`${method} ${path} returned invalid JSON`, {
        source,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}

function flowPath(kind: FlowKind, flowId?: string): string {
  const base = kind === "config" ? "/api/config/config_entries/flow" : "/api/config/config_entries/options/flow";
  return flowId === undefined ? base : `${base}/${encodeURIComponent(flowId)}`;
}
