/**
 * @converge/connectors - stepper adapters for configuration-flow hosts.
 *
 * This package provides:
 * - FlowStepper: drives multi-step config and options flows on any FlowHost
 * - HttpFlowHost: FlowHost over the config-entries REST API
 * - RetryingStepper: exponential-backoff retries of transient failures
 *
 * The host is injected, not imported, so the stepper can be tested against an
 * in-process host.
 */

// Types
export * from "./types";

// Flow driver
export { FlowStepper, dataForForm, formErrors } from "./flow-stepper";

// REST host
export { HttpFlowHost, toFlowResult, type HttpFlowHostConfig } from "./http-flow-host";

// Retries
export { RetryingStepper, calculateBackoff, DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retry";
