import { describe, it, expect, beforeEach } from "vitest";
import {
  ConflictError,
  InternalError,
  NotFoundError,
  TransientError,
  ValidationError,
  type Step,
} from "@converge/proto";
import {
  FlowStepper,
  dataForForm,
  type FlowEntry,
  type FlowField,
  type FlowForm,
  type FlowHost,
  type FlowKind,
  type FlowResult,
} from "@converge/connectors";

function field(name: string, required = true, hasDefault = false): FlowField {
  return { name, required, hasDefault };
}

function form(flowId: string, stepId: string, fields: FlowField[], errors: Record<string, string | null> = {}): FlowForm {
  return { type: "form", flowId, stepId, fields, errors };
}

/**
 * In-process host: each flow replays a script of results, one per call.
 */
class ScriptedHost implements FlowHost {
  /** Results returned by startFlow then each submitStep, per handler */
  scripts = new Map<string, FlowResult[]>();
  entries = new Map<string, FlowEntry>();
  submitted: Array<{ kind: FlowKind; flowId: string; data: Step }> = [];
  aborted: string[] = [];
  removed: string[] = [];
  abortError?: Error;

  private open = new Map<string, FlowResult[]>();

  async startFlow(kind: FlowKind, handler: string): Promise<FlowResult> {
    const script = [...(this.scripts.get(`${kind}:${handler}`) ?? [])];
    const first = script.shift();
    if (!first) {
      throw new NotFoundError(`No ${kind} flow for ${handler}`);
    }
    this.open.set(first.flowId, script);
    return first;
  }

  async submitStep(kind: FlowKind, flowId: string, data: Step): Promise<FlowResult> {
    this.submitted.push({ kind, flowId, data });
    const next = this.open.get(flowId)?.shift();
    if (!next) {
      throw new NotFoundError(`Unknown flow ${flowId}`);
    }
    return next;
  }

  async abortFlow(kind: FlowKind, flowId: string): Promise<void> {
    this.aborted.push(`${kind}:${flowId}`);
    if (this.abortError) {
      throw this.abortError;
    }
  }

  async removeEntry(entryId: string): Promise<void> {
    this.removed.push(entryId);
    if (!this.entries.delete(entryId)) {
      throw new NotFoundError(`Unknown entry ${entryId}`);
    }
  }

  async getEntry(entryId: string): Promise<FlowEntry | null> {
    return this.entries.get(entryId) ?? null;
  }
}

describe("dataForForm", () => {
  it("should send only declared fields", () => {
    const data = dataForForm(
      form("f1", "user", [field("host"), field("port", false)]),
      { host: "10.0.0.5", name: "ignored" },
      0,
      "Setting up broadlink"
    );
    expect(data).toEqual({ host: "10.0.0.5" });
  });

  it("should allow a missing required field that has a default", () => {
    expect(dataForForm(form("f1", "user", [field("timeout", true, true)]), {}, 0, "x")).toEqual({});
  });

  it("should name the missing required field and step", () => {
    try {
      dataForForm(form("f1", "user", [field("host")]), { name: "Office" }, 1, "Setting up broadlink");
      throw new Error("expected failure");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        field: "host",
        step: 1,
        message: 'Setting up broadlink: step 1 (form "user") is missing required field "host"',
      });
    }
  });
});

describe("FlowStepper", () => {
  let host: ScriptedHost;
  let stepper: FlowStepper;

  beforeEach(() => {
    host = new ScriptedHost();
    stepper = new FlowStepper(host);
  });

  describe("begin", () => {
    it("should walk every form and return the created entry", async () => {
      host.scripts.set("config:broadlink", [
        form("f1", "user", [field("host")]),
        form("f1", "finish", [field("name")]),
        { type: "create_entry", flowId: "f1", entryId: "entry-9" },
      ]);

      const handle = await stepper.begin("broadlink", [{ host: "192.168.3.146" }, { name: "Office Broadlink" }]);

      expect(handle).toBe("entry-9");
      expect(host.submitted).toEqual([
        { kind: "config", flowId: "f1", data: { host: "192.168.3.146" } },
        { kind: "config", flowId: "f1", data: { name: "Office Broadlink" } },
      ]);
      expect(host.aborted).toEqual([]);
    });

    it("should ignore empty error values on the first form", async () => {
      host.scripts.set("config:androidtv", [
        form("f2", "user", [field("host")], { base: null }),
        { type: "create_entry", flowId: "f2", entryId: "entry-3" },
      ]);

      expect(await stepper.begin("androidtv", [{ host: "10.0.0.9" }])).toBe("entry-3");
    });

    it("should stop at extra answer steps once the flow finishes", async () => {
      host.scripts.set("config:hue", [
        form("f3", "user", [field("host")]),
        { type: "create_entry", flowId: "f3", entryId: "entry-4" },
      ]);

      expect(await stepper.begin("hue", [{ host: "a" }, { unused: true }])).toBe("entry-4");
      expect(host.submitted).toHaveLength(1);
    });

    it("should fail with the step the host rejected and abort the flow", async () => {
      host.scripts.set("config:broadlink", [
        form("f1", "user", [field("host")]),
        form("f1", "user", [field("host")], { host: "cannot_connect" }),
      ]);

      const result = stepper.begin("broadlink", [{ host: "10.0.0.1" }, { name: "Office" }]);

      await expect(result).rejects.toBeInstanceOf(ValidationError);
      await expect(result).rejects.toMatchObject({
        field: "host",
        step: 0,
        message: "Setting up broadlink: step 0 rejected (host: cannot_connect)",
      });
      expect(host.aborted).toEqual(["config:f1"]);
    });

    it("should not name a field for base errors", async () => {
      host.scripts.set("config:broadlink", [
        form("f1", "user", [field("host")]),
        form("f1", "user", [field("host")], { base: "unknown" }),
      ]);

      await expect(stepper.begin("broadlink", [{ host: "10.0.0.1" }])).rejects.toMatchObject({
        field: undefined,
        step: 0,
        message: "Setting up broadlink: step 0 rejected (base: unknown)",
      });
    });

    it("should fail when answers run out before the flow finishes", async () => {
      host.scripts.set("config:broadlink", [form("f1", "user", [field("host")]), form("f1", "finish", [field("name")])]);

      await expect(stepper.begin("broadlink", [{ host: "10.0.0.1" }])).rejects.toMatchObject({
        step: 1,
        message: 'Setting up broadlink: flow still expects input at form "finish" after 1 steps',
      });
      expect(host.aborted).toEqual(["config:f1"]);
    });

    it("should abort the flow when a required field is missing", async () => {
      host.scripts.set("config:broadlink", [form("f1", "user", [field("host")])]);

      await expect(stepper.begin("broadlink", [{ name: "Office" }])).rejects.toMatchObject({ field: "host", step: 0 });
      expect(host.submitted).toEqual([]);
      expect(host.aborted).toEqual(["config:f1"]);
    });

    it("should report already-configured aborts as conflicts", async () => {
      host.scripts.set("config:broadlink", [
        form("f1", "user", [field("host")]),
        { type: "abort", flowId: "f1", reason: "already_configured" },
      ]);

      await expect(stepper.begin("broadlink", [{ host: "10.0.0.1" }])).rejects.toBeInstanceOf(ConflictError);
      expect(host.aborted).toEqual([]);
    });

    it("should report other aborts as validation errors", async () => {
      host.scripts.set("config:broadlink", [{ type: "abort", flowId: "f1", reason: "no_devices_found" }]);

      await expect(stepper.begin("broadlink", [])).rejects.toThrow(
        "Setting up broadlink: flow aborted (no_devices_found)"
      );
    });

    it("should keep the original error when aborting fails", async () => {
      host.abortError = new TransientError("host went away");
      host.scripts.set("config:broadlink", [form("f1", "user", [field("host")])]);

      await expect(stepper.begin("broadlink", [{}])).rejects.toBeInstanceOf(ValidationError);
      expect(host.aborted).toEqual(["config:f1"]);
    });

    it("should abort when submitting a step fails", async () => {
      host.scripts.set("config:broadlink", [form("f1", "user", [field("host")])]);

      await expect(stepper.begin("broadlink", [{ host: "a" }])).rejects.toBeInstanceOf(NotFoundError);
      expect(host.aborted).toEqual(["config:f1"]);
    });

    it("should fail when the flow finishes without an entry", async () => {
      host.scripts.set("config:broadlink", [{ type: "create_entry", flowId: "f1" }]);

      await expect(stepper.begin("broadlink", [])).rejects.toBeInstanceOf(InternalError);
    });
  });

  describe("delete", () => {
    it("should remove the entry", async () => {
      host.entries.set("entry-1", { entryId: "entry-1", domain: "broadlink", supportsOptions: false });

      await stepper.delete("entry-1");

      expect(host.entries.size).toBe(0);
    });

    it("should treat a missing entry as deleted", async () => {
      await expect(stepper.delete("entry-404")).resolves.toBeUndefined();
      expect(host.removed).toEqual(["entry-404"]);
    });
  });

  describe("options", () => {
    it("should run the options flow against the entry", async () => {
      host.scripts.set("options:entry-1", [
        form("o1", "init", [field("scan_interval", false)]),
        { type: "create_entry", flowId: "o1" },
      ]);

      await stepper.updateOptions("entry-1", [{ scan_interval: 30 }]);

      expect(host.submitted).toEqual([{ kind: "options", flowId: "o1", data: { scan_interval: 30 } }]);
    });

    it("should label options failures with the entry", async () => {
      host.scripts.set("options:entry-1", [
        form("o1", "init", [field("scan_interval")]),
        form("o1", "init", [field("scan_interval")], { scan_interval: "out_of_range" }),
      ]);

      await expect(stepper.updateOptions("entry-1", [{ scan_interval: -1 }])).rejects.toThrow(
        "Configuring options of entry-1: step 0 rejected (scan_interval: out_of_range)"
      );
      expect(host.aborted).toEqual(["options:o1"]);
    });

    it("should read options support from the entry", async () => {
      host.entries.set("entry-1", { entryId: "entry-1", domain: "hue", supportsOptions: true });
      host.entries.set("entry-2", { entryId: "entry-2", domain: "broadlink", supportsOptions: false });

      expect(await stepper.supportsOptions("entry-1")).toBe(true);
      expect(await stepper.supportsOptions("entry-2")).toBe(false);
      await expect(stepper.supportsOptions("entry-3")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("exists", () => {
    it("should check the entry list", async () => {
      host.entries.set("entry-1", { entryId: "entry-1", domain: "hue", supportsOptions: true });

      expect(await stepper.exists("entry-1")).toBe(true);
      expect(await stepper.exists("entry-2")).toBe(false);
    });
  });
});
