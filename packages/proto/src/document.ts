/**
 * Desired-state document loader.
 *
 * The document is YAML with snake_case keys; the engine works on camelCase
 * DesiredItem records. Shape errors and duplicate configuration ids are
 * reported together in one ValidationError.
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ValidationError } from "./errors";
import { answersSchema, optionsSchema, type DesiredItem } from "./schemas";

const documentItemSchema = z.object({
  platform: z.string().min(1),
  configuration_id: z.string().min(1),
  answers: answersSchema,
  options: optionsSchema.optional(),
  recreate_on_options_change: z.boolean().default(false),
});

export const desiredStateDocumentSchema = z
  .object({
    integrations: z.array(documentItemSchema).default([]),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.integrations.forEach((item, index) => {
      if (seen.has(item.configuration_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["integrations", index, "configuration_id"],
          message: `Duplicate configuration_id "${item.configuration_id}"`,
        });
      }
      seen.add(item.configuration_id);
    });
  });

export type DesiredStateDocument = z.infer<typeof desiredStateDocumentSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate an already-parsed document and convert it to DesiredItem records,
 * preserving declaration order.
 */
export function toDesiredItems(input: unknown): DesiredItem[] {
  const result = desiredStateDocumentSchema.safeParse(input ?? {});
  if (!result.success) {
    const first = result.error.issues[0];
    throw new ValidationError(`Invalid desired-state document: ${formatIssues(result.error)}`, {
      source: "document",
      field: first?.path.join("."),
    });
  }

  return result.data.integrations.map((item) => ({
    platform: item.platform,
    configurationId: item.configuration_id,
    answers: item.answers,
    options: item.options ?? [],
    recreateOnOptionsChange: item.recreate_on_options_change,
  }));
}

/**
 * Parse YAML text into DesiredItem records.
 */
export function parseDesiredState(text: string): DesiredItem[] {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    throw new ValidationError(
      `Desired-state document is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
      { source: "document", cause: error instanceof Error ? error : undefined }
    );
  }
  return toDesiredItems(parsed);
}
