/**
 * Session protocol types shared by the client and the server.
 */

import type { CodebaseContext } from '../snapshot/types.js';

// ============================================================================
// Stages
// ============================================================================

/** The three stages, in the only order a conversation may take */
export const STAGES = ['load', 'select', 'work'] as const;

export type Stage = (typeof STAGES)[number];

export const STATUS_OK = 'ok';

/** Status tags a server uses when it cannot produce a stage payload */
export const ResponseStatus = {
  Ok: STATUS_OK,
  InvalidResponse: 'invalid_response',
  InvalidRequest: 'invalid_request',
} as const;

// ============================================================================
// Envelopes
// ============================================================================

export interface StageRequest {
  clientID: string;
  stage: Stage;
  context: CodebaseContext;
  /** Present for select and work */
  taskPrompt?: string;
  /** Present for work only */
  fileWorkPrompt?: string;
}

export interface StageResponse {
  /** RFC 3339 */
  timestamp: string;
  stage: Stage;
  /** "ok" or an error tag */
  status: string;
  /** Stage payload when status is "ok"; otherwise an error description */
  data: unknown;
}

/** Body sent with a non-ok status */
export interface ErrorPayload {
  message: string;
  issues?: string[];
}

// ============================================================================
// Client session
// ============================================================================

export type SessionState =
  | 'IDLE'
  | 'AWAITING_LOAD_ACK'
  | 'LOADED'
  | 'AWAITING_SELECT_RESPONSE'
  | 'SELECTED'
  | 'AWAITING_WORK_RESPONSE'
  | 'DONE'
  | 'FAILED'
  | 'CLOSED';

export type StageOutcome<T> =
  | { ok: true; data: T }
  | { ok: false; reason: string };

export function isStage(value: unknown): value is Stage {
  return typeof value === 'string' && STAGES.some((stage) => stage === value);
}
