/**
 * Response Schema Registry
 *
 * Each stage's expected response payload is declared once as a zod schema.
 * The same declaration validates what comes back and, converted to JSON
 * Schema, is embedded in the model instructions. Schemas are strict (no
 * undeclared properties) and inlined (no `$ref`), so the text can be pasted
 * verbatim into a prompt.
 */

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Stage } from './types.js';

// ============================================================================
// Stage payload schemas
// ============================================================================

export const FileOperation = {
  Update: 0,
  Create: 1,
  Remove: -1,
} as const;

export type FileOperationCode = (typeof FileOperation)[keyof typeof FileOperation];

export const fileOperationSchema = z
  .union([z.literal(FileOperation.Update), z.literal(FileOperation.Create), z.literal(FileOperation.Remove)])
  .describe('0 = update an existing file, 1 = create a new file, -1 = remove the file');

export const fileChangeSchema = z
  .object({
    path: z.string().min(1).describe('Path relative to the codebase root'),
    operation: fileOperationSchema,
    reason: z.string().describe('Why this file is needed'),
  })
  .strict();

export const loadAckSchema = z
  .object({
    stage: z.literal('load'),
    status: z.string().min(1),
  })
  .strict();

export const fileChangePlanSchema = z
  .object({
    files: z.array(fileChangeSchema).describe('Files to update, create or remove'),
    additionalContextFiles: z
      .array(fileChangeSchema)
      .describe('Files whose content helps but which are not edited'),
  })
  .strict()
  .superRefine((plan, ctx) => {
    const seen = new Map<string, string>();
    const lists = [
      ['files', plan.files],
      ['additionalContextFiles', plan.additionalContextFiles],
    ] as const;

    for (const [listName, entries] of lists) {
      entries.forEach((entry, index) => {
        const previous = seen.get(entry.path);
        if (previous !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `path "${entry.path}" already listed in ${previous}`,
            path: [listName, index, 'path'],
          });
          return;
        }
        seen.set(entry.path, listName);
      });
    }
  });

export const patchDataSchema = z
  .object({
    path: z.string().min(1).describe('The single file this patch modifies'),
    patch: z.string().describe('Unified git patch restricted to `path`'),
    summary: z.string().describe('One-paragraph description of the change'),
  })
  .strict();

export type FileChange = z.infer<typeof fileChangeSchema>;
export type LoadAck = z.infer<typeof loadAckSchema>;
export type FileChangePlan = z.infer<typeof fileChangePlanSchema>;
export type PatchData = z.infer<typeof patchDataSchema>;

export interface StageDataMap {
  load: LoadAck;
  select: FileChangePlan;
  work: PatchData;
}

const STAGE_SCHEMAS: { [S in Stage]: z.ZodType<StageDataMap[S]> } = {
  load: loadAckSchema,
  select: fileChangePlanSchema,
  work: patchDataSchema,
};

/** Same schemas, erased to the shape the JSON Schema converter takes */
const RENDERED_SCHEMAS: Record<Stage, z.ZodTypeAny> = {
  load: loadAckSchema,
  select: fileChangePlanSchema,
  work: patchDataSchema,
};

// ============================================================================
// Registry operations
// ============================================================================

export type JsonSchema = ReturnType<typeof zodToJsonSchema>;

const jsonSchemaCache = new Map<Stage, JsonSchema>();

/**
 * Structural description of the response expected for a stage.
 */
export function schemaFor(stage: Stage): JsonSchema {
  let schema = jsonSchemaCache.get(stage);
  if (!schema) {
    schema = zodToJsonSchema(RENDERED_SCHEMAS[stage], {
      $refStrategy: 'none',
      target: 'jsonSchema7',
    });
    jsonSchemaCache.set(stage, schema);
  }
  return schema;
}

/** `schemaFor` rendered as indented JSON for embedding in instructions */
export function describeSchema(stage: Stage): string {
  return JSON.stringify(schemaFor(stage), null, 2);
}

export type StageValidation<T> =
  | { ok: true; data: T }
  | { ok: false; issues: string[] };

export function validateStageData<S extends Stage>(stage: S, value: unknown): StageValidation<StageDataMap[S]> {
  const schema: z.ZodType<StageDataMap[S]> = STAGE_SCHEMAS[stage];
  const result = schema.safeParse(value);
  if (result.success) {
    return { ok: true, data: result.data };
  }
  return { ok: false, issues: formatIssues(result.error) };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
