/**
 * Deterministic digests of answers/options sequences.
 *
 * Canonical encoding: keys inside a mapping are sorted, array (step) order is
 * preserved, then the JSON text is hashed with sha256. The result is stable
 * across process restarts and across implementations of the same encoding.
 */

import { createHash } from "crypto";
import type { JsonValue, Step } from "@converge/proto";

/** Prefix identifying the canonical encoding in stored fingerprints */
export const FINGERPRINT_VERSION = "v1";

const FINGERPRINT_PATTERN = /^v1:[0-9a-f]{64}$/;

/**
 * Encode a JSON value with sorted mapping keys.
 */
export function canonicalize(value: JsonValue): string {
  // JSON.stringify turns NaN and ±Infinity into null; keep them apart
  if (typeof value === "number" && !Number.isFinite(value)) {
    return String(value);
  }

  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map(canonicalize).join(",")}]`;
  }

  const keys = Object.keys(value).sort();
  const members = keys.map((key) => `${JSON.stringify(key)}:${canonicalize(value[key])}`);
  return `{${members.join(",")}}`;
}

/**
 * Fingerprint an ordered sequence of steps.
 */
export function fingerprintSteps(steps: ReadonlyArray<Step>): string {
  const hash = createHash("sha256");
  hash.update(canonicalize([...steps]));
  return `${FINGERPRINT_VERSION}:${hash.digest("hex")}`;
}

export function fingerprintAnswers(answers: ReadonlyArray<Step>): string {
  return fingerprintSteps(answers);
}

export function fingerprintOptions(options: ReadonlyArray<Step>): string {
  return fingerprintSteps(options);
}

/**
 * True when a stored value looks like a fingerprint produced by this encoding.
 * Anything else (legacy, truncated, hand-edited) must compare as changed.
 */
export function isFingerprint(value: unknown): value is string {
  return typeof value === "string" && FINGERPRINT_PATTERN.test(value);
}
