import { z } from "zod";

/**
 * Any JSON value an answer or option field may carry. Most steps use
 * scalars; multi-select steps send lists.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

/** One step of a setup or options protocol: field name → value. */
export const stepSchema = z.record(z.string(), jsonValueSchema);
export type Step = z.infer<typeof stepSchema>;

/** Ordered answers for the setup protocol, one mapping per step. */
export const answersSchema = z.array(stepSchema);
export type Answers = z.infer<typeof answersSchema>;

/** Ordered options steps applied after setup. */
export const optionsSchema = z.array(stepSchema);
export type Options = z.infer<typeof optionsSchema>;

/**
 * One declared integration.
 */
export const desiredItemSchema = z.object({
  platform: z.string().min(1),
  configurationId: z.string().min(1),
  answers: answersSchema,
  options: optionsSchema.default([]),
  recreateOnOptionsChange: z.boolean().default(false),
});
export type DesiredItem = z.infer<typeof desiredItemSchema>;

/**
 * Opaque value returned by the stepper identifying the live instance.
 * Owned by the state store; the diff engine never interprets it.
 */
export type InstanceHandle = string;

/**
 * Persisted per configurationId.
 */
export const storedRecordSchema = z.object({
  platform: z.string(),
  answersFingerprint: z.string(),
  optionsFingerprint: z.string(),
  instanceHandle: z.string(),
  createdAt: z.number(),
  updatedAt: z.number(),
});
export type StoredRecord = z.infer<typeof storedRecordSchema>;

/** Snapshot of the state store, keyed by configurationId. */
export type StoredState = Map<string, StoredRecord>;
