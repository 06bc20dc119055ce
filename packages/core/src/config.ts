import { z } from "zod";
import type { FinalizationMode, InferenceOptions } from "./model";
import { configurationConflictError, invalidConfigurationError } from "./errors";

/** Raw options, as they appear in tagsql.config.json or on the command line. */
export const inferenceConfigSchema = z
  .object({
    duplicateKeys: z.boolean().optional(),
    maxColumnsThreshold: z.number().int().nonnegative().optional(),
    skipColumns: z.boolean().optional(),
    header: z.string().optional(),
    relationReport: z.boolean().optional(),
    annotateRelations: z.boolean().optional(),
  })
  .strict();

export type InferenceConfig = z.infer<typeof inferenceConfigSchema>;

export function parseInferenceConfig(raw: unknown): InferenceConfig {
  const result = inferenceConfigSchema.safeParse(raw);
  if (result.success) return result.data;

  const detail = result.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  throw invalidConfigurationError(detail, result.error);
}

/**
 * Validate raw options once and turn them into the explicit option set the
 * engine runs with.
 */
export function resolveOptions(raw: unknown = {}): InferenceOptions {
  const config = parseInferenceConfig(raw);

  if (config.duplicateKeys && config.maxColumnsThreshold !== undefined) {
    throw configurationConflictError("duplicateKeys", "maxColumnsThreshold");
  }

  let finalization: FinalizationMode = { kind: "default" };
  if (config.duplicateKeys) {
    finalization = { kind: "duplicate-keys" };
  } else if (config.maxColumnsThreshold !== undefined) {
    finalization = { kind: "max-columns", threshold: config.maxColumnsThreshold };
  }

  return {
    finalization,
    skipColumns: config.skipColumns ?? false,
    ...(config.header !== undefined ? { header: config.header } : {}),
    output: config.relationReport ? "relations" : "ddl",
    annotateRelations: config.annotateRelations ?? false,
  };
}
