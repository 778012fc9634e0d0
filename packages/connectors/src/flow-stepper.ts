/**
 * FlowStepper - StepperAdapter driving configuration flows on a FlowHost.
 *
 * Each answers (or options) step is matched against the form the host is
 * currently showing: only the fields the form declares are submitted, so a
 * step may carry keys for several hosts' variants of the same form.
 */

import createDebug from "debug";
import {
  ConflictError,
  InternalError,
  NotFoundError,
  ValidationError,
  isErrorType,
  type Answers,
  type InstanceHandle,
  type Options,
  type Step,
  type StepperAdapter,
} from "@converge/proto";
import type { FlowForm, FlowHost, FlowKind, FlowResult } from "./types";

const debug = createDebug("converge:connectors:flow");

/**
 * Pick the entries of `step` the form declares.
 *
 * @throws ValidationError naming the first required field the step lacks
 */
export function dataForForm(form: FlowForm, step: Step, stepIndex: number, label: string): Step {
  const data: Step = {};
  for (const field of form.fields) {
    if (Object.prototype.hasOwnProperty.call(step, field.name)) {
      data[field.name] = step[field.name];
    } else if (field.required && !field.hasDefault) {
      throw new ValidationError(
        `${label}: step ${stepIndex} (form "${form.stepId}") is missing required field "${field.name}"`,
        { source: "flow-stepper", field: field.name, step: stepIndex }
      );
    }
  }
  return data;
}

/**
 * Errors the form reports; keys with an empty value are ignored.
 */
export function formErrors(form: FlowForm): Array<[string, string]> {
  const errors: Array<[string, string]> = [];
  for (const [field, error] of Object.entries(form.errors)) {
    if (error) {
      errors.push([field, error]);
    }
  }
  return errors;
}

function checkFormErrors(form: FlowForm, stepIndex: number, label: string): void {
  const errors = formErrors(form);
  if (errors.length === 0) return;

  const described = errors.map(([field, error]) => `${field}: ${error}`).join(", ");
  const [firstField] = errors[0];
  // Errors show up on the form that follows the rejected step
  const step = stepIndex > 0 ? stepIndex - 1 : undefined;
  throw new ValidationError(
    `${label}: ${step === undefined ? "flow reported errors" : `step ${step} rejected`} (${described})`,
    {
      source: "flow-stepper",
      field: firstField === "base" ? undefined : firstField,
      step,
    }
  );
}

export class FlowStepper implements StepperAdapter {
  constructor(private host: FlowHost) {}

  async begin(platform: string, answers: Answers): Promise<InstanceHandle> {
    debug("Creating entry for platform %s", platform);
    const result = await this.runFlow("config", platform, answers, `Setting up ${platform}`);
    if (result.type !== "create_entry" || !result.entryId) {
      throw new InternalError(`Setting up ${platform} finished without an entry id`, {
        source: "flow-stepper",
      });
    }
    debug("Created entry %s for platform %s", result.entryId, platform);
    return result.entryId;
  }

  async delete(handle: InstanceHandle): Promise<void> {
    try {
      await this.host.removeEntry(handle);
      debug("Removed entry %s", handle);
    } catch (error) {
      if (isErrorType(error, "not_found")) {
        debug("Entry %s already gone", handle);
        return;
      }
      throw error;
    }
  }

  async updateOptions(handle: InstanceHandle, options: Options): Promise<void> {
    debug("Configuring options of entry %s", handle);
    await this.runFlow("options", handle, options, `Configuring options of ${handle}`);
  }

  async supportsOptions(handle: InstanceHandle): Promise<boolean> {
    const entry = await this.host.getEntry(handle);
    if (!entry) {
      throw new NotFoundError(`Entry ${handle} does not exist`, { source: "flow-stepper" });
    }
    return entry.supportsOptions;
  }

  async exists(handle: InstanceHandle): Promise<boolean> {
    return (await this.host.getEntry(handle)) !== null;
  }

  /**
   * Feed `steps` into a new flow, one step per form, until the flow finishes.
   * The flow is aborted if anything fails while it is still open.
   */
  private async runFlow(
    kind: FlowKind,
    handler: string,
    steps: ReadonlyArray<Step>,
    label: string
  ): Promise<FlowResult> {
    let result: FlowResult = await this.host.startFlow(kind, handler);
    const flowId = result.flowId;

    try {
      for (let index = 0; index < steps.length && result.type === "form"; index++) {
        checkFormErrors(result, index, label);
        const data = dataForForm(result, steps[index], index, label);
        debug("%s: submitting step %d to form %s", label, index, result.stepId);
        result = await this.host.submitStep(kind, flowId, data);
      }

      if (result.type === "form") {
        checkFormErrors(result, steps.length, label);
        throw new ValidationError(
          `${label}: flow still expects input at form "${result.stepId}" after ${steps.length} steps`,
          { source: "flow-stepper", step: steps.length }
        );
      }

      if (result.type === "abort") {
        if (result.reason === "already_configured") {
          throw new ConflictError(`${label}: already configured for these answers, but not recorded in state`, {
            source: "flow-stepper",
          });
        }
        throw new ValidationError(`${label}: flow aborted (${result.reason})`, { source: "flow-stepper" });
      }

      return result;
    } catch (error) {
      if (result.type === "form") {
        await this.abortQuietly(kind, flowId);
      }
      throw error;
    }
  }

  private async abortQuietly(kind: FlowKind, flowId: string): Promise<void> {
    try {
      await this.host.abortFlow(kind, flowId);
      debug("Aborted %s flow %s", kind, flowId);
    } catch (error) {
      // The original failure is what gets reported
      debug("Failed to abort %s flow %s: %s", kind, flowId, error);
    }
  }
}
