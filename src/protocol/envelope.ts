/**
 * Envelope codec
 *
 * Every WebSocket text frame carries exactly one JSON document: a
 * StageRequest going to the server or a StageResponse coming back. Decoding
 * checks the envelope shape and the per-stage prompt rules; the stage payload
 * inside a response is validated separately against the schema registry.
 */

import { z } from 'zod';
import { EnvelopeDecodeError, errorMessage } from '../errors.js';
import type { CodebaseContext, SnapshotNode } from '../snapshot/types.js';
import { formatIssues, validateStageData, type StageDataMap } from './schemas.js';
import {
  STAGES,
  STATUS_OK,
  type ErrorPayload,
  type Stage,
  type StageOutcome,
  type StageRequest,
  type StageResponse,
} from './types.js';

// ============================================================================
// Envelope schemas
// ============================================================================

const snapshotNodeSchema: z.ZodType<SnapshotNode> = z.lazy(() =>
  z
    .object({
      isDirectory: z.boolean(),
      excluded: z.boolean(),
      children: z.record(snapshotNodeSchema).optional(),
      identifiers: z.array(z.string()).optional(),
    })
    .strict()
    .superRefine((node, ctx) => {
      if (node.children !== undefined && node.identifiers !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'a node carries either children or identifiers, not both',
        });
      }
      if (node.children !== undefined && !node.isDirectory) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'only directories carry children' });
      }
      if (node.identifiers !== undefined && node.isDirectory) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'only files carry identifiers' });
      }
    })
);

const codebaseContextSchema: z.ZodType<CodebaseContext> = z
  .object({
    snapshot: z.record(snapshotNodeSchema),
    notes: z.array(z.string()),
    fileContents: z.record(z.string()),
  })
  .strict();

const stageSchema = z.enum(STAGES);

const requestSchema = z
  .object({
    clientID: z.string().min(1),
    stage: stageSchema,
    context: codebaseContextSchema,
    taskPrompt: z.string().optional(),
    fileWorkPrompt: z.string().optional(),
  })
  .strict()
  .superRefine((request, ctx) => {
    const needsTask = request.stage !== 'load';
    const needsFile = request.stage === 'work';

    if (needsTask && request.taskPrompt === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['taskPrompt'], message: `required for ${request.stage}` });
    }
    if (!needsTask && request.taskPrompt !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['taskPrompt'], message: 'not allowed for load' });
    }
    if (needsFile && request.fileWorkPrompt === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fileWorkPrompt'], message: 'required for work' });
    }
    if (!needsFile && request.fileWorkPrompt !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fileWorkPrompt'],
        message: `not allowed for ${request.stage}`,
      });
    }
  });

const responseSchema = z
  .object({
    timestamp: z.string().datetime({ offset: true }),
    stage: stageSchema,
    status: z.string().min(1),
    data: z.unknown(),
  })
  .strict();

// ============================================================================
// Codec
// ============================================================================

/** RFC 3339 at second precision, e.g. 2024-05-01T10:20:30Z */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function encodeRequest(request: StageRequest): string {
  return JSON.stringify(request);
}

export function encodeResponse(response: StageResponse): string {
  return JSON.stringify(response);
}

/**
 * @throws EnvelopeDecodeError when the frame is not JSON or breaks the envelope rules
 */
export function decodeRequest(raw: string): StageRequest {
  const result = requestSchema.safeParse(parseJson(raw));
  if (!result.success) {
    throw new EnvelopeDecodeError(`invalid request envelope: ${formatIssues(result.error).join('; ')}`);
  }
  return result.data;
}

/**
 * @throws EnvelopeDecodeError when the frame is not JSON or breaks the envelope rules
 */
export function decodeResponse(raw: string): StageResponse {
  const result = responseSchema.safeParse(parseJson(raw));
  if (!result.success) {
    throw new EnvelopeDecodeError(`invalid response envelope: ${formatIssues(result.error).join('; ')}`);
  }
  const { timestamp, stage, status, data } = result.data;
  return { timestamp, stage, status, data };
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new EnvelopeDecodeError(`malformed JSON: ${errorMessage(error)}`, { cause: error });
  }
}

export function okResponse(stage: Stage, data: unknown, now: Date = new Date()): StageResponse {
  return { timestamp: formatTimestamp(now), stage, status: STATUS_OK, data };
}

export function errorResponse(stage: Stage, status: string, payload: ErrorPayload, now: Date = new Date()): StageResponse {
  return { timestamp: formatTimestamp(now), stage, status, data: payload };
}

/**
 * Check a decoded response against the stage it answers and that stage's
 * payload schema. Nothing from a failing response is used.
 */
export function interpretResponse<S extends Stage>(response: StageResponse, expected: S): StageOutcome<StageDataMap[S]> {
  if (response.stage !== expected) {
    return { ok: false, reason: `stage mismatch: expected ${expected}, got ${response.stage}` };
  }
  if (response.status !== STATUS_OK) {
    return { ok: false, reason: `status ${response.status}${describeErrorData(response.data)}` };
  }

  const validation = validateStageData(expected, response.data);
  if (!validation.ok) {
    return { ok: false, reason: `schema validation failed: ${validation.issues.join('; ')}` };
  }
  return { ok: true, data: validation.data };
}

function describeErrorData(data: unknown): string {
  if (typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string') {
    return `: ${data.message}`;
  }
  return '';
}
