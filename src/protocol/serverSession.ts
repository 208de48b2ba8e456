/**
 * Server Session
 *
 * Handles the requests of one connection, one at a time:
 * - decodes the envelope and checks the stage order
 * - forwards context plus stage instructions to the model
 * - validates the model output against the stage schema before replying
 *
 * A model failure ends the connection; everything else is answered with a
 * response whose status says what went wrong.
 */

import { EnvelopeDecodeError, errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { ModelClient } from '../model/modelClient.js';
import type { CodebaseContext } from '../snapshot/types.js';
import { CLOSE_REASON_MODEL_FAILED, CloseCode } from '../transport/closeCodes.js';
import { decodeRequest, errorResponse, okResponse } from './envelope.js';
import { buildModelParts, extractJsonFromResponse } from './prompts.js';
import { validateStageData, type StageValidation } from './schemas.js';
import { ResponseStatus, isStage, type Stage, type StageRequest, type StageResponse } from './types.js';

export type ServerAction =
  | { kind: 'reply'; response: StageResponse }
  | { kind: 'close'; code: number; reason: string }
  | { kind: 'ignore' };

/** Receives each loaded context; implemented by DebugSnapshotWriter */
export interface ContextRecorder {
  schedule(context: CodebaseContext): void;
}

export interface ServerSessionOptions {
  model: ModelClient;
  logger: Logger;
  debugSnapshot?: ContextRecorder;
  now?: () => Date;
}

export class ServerSession {
  private readonly model: ModelClient;
  private readonly logger: Logger;
  private readonly debugSnapshot: ContextRecorder | undefined;
  private readonly now: () => Date;
  private loaded = false;

  constructor(options: ServerSessionOptions) {
    this.model = options.model;
    this.logger = options.logger;
    this.debugSnapshot = options.debugSnapshot;
    this.now = options.now ?? (() => new Date());
  }

  get hasLoaded(): boolean {
    return this.loaded;
  }

  async handle(raw: string): Promise<ServerAction> {
    let request: StageRequest;
    try {
      request = decodeRequest(raw);
    } catch (error) {
      if (!(error instanceof EnvelopeDecodeError)) {
        throw error;
      }
      return this.rejectUndecodable(raw, error);
    }

    const logger = this.logger.child(undefined, { client_id: request.clientID, stage: request.stage });
    logger.info('Request received');

    if (request.stage !== 'load' && !this.loaded) {
      logger.warn('Rejecting request sent before load');
      return this.reply(
        errorResponse(request.stage, ResponseStatus.InvalidRequest, {
          message: `${request.stage} requires a completed load on this connection`,
        }, this.now())
      );
    }

    if (request.stage === 'load') {
      this.debugSnapshot?.schedule(request.context);
    }

    let output: string;
    try {
      output = await this.model.generate(buildModelParts(request), { jsonMode: true });
    } catch (error) {
      logger.error('Model call failed', { error: errorMessage(error) });
      return { kind: 'close', code: CloseCode.InternalServerError, reason: CLOSE_REASON_MODEL_FAILED };
    }

    if (request.stage === 'load') {
      this.loaded = true;
    }

    const validation = parseModelOutput(request.stage, output);
    if (!validation.ok) {
      logger.warn('Model output failed validation', { issues: validation.issues });
      return this.reply(
        errorResponse(request.stage, ResponseStatus.InvalidResponse, {
          message: 'model output does not match the stage schema',
          issues: validation.issues,
        }, this.now())
      );
    }

    logger.debug('Replying');
    return this.reply(okResponse(request.stage, validation.data, this.now()));
  }

  /**
   * A frame that is not a valid request is dropped, unless it names a stage,
   * in which case the sender is told the request was invalid.
   */
  private rejectUndecodable(raw: string, error: EnvelopeDecodeError): ServerAction {
    const stage = peekStage(raw);
    if (stage === undefined) {
      this.logger.warn('Dropping undecodable message', { error: error.message });
      return { kind: 'ignore' };
    }
    this.logger.warn('Rejecting invalid request', { stage, error: error.message });
    return this.reply(errorResponse(stage, ResponseStatus.InvalidRequest, { message: error.message }, this.now()));
  }

  private reply(response: StageResponse): ServerAction {
    return { kind: 'reply', response };
  }
}

export function parseModelOutput(stage: Stage, output: string): StageValidation<unknown> {
  const json = extractJsonFromResponse(output);
  if (json === null) {
    return { ok: false, issues: ['model output contains no JSON document'] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return { ok: false, issues: [`model output is not valid JSON: ${errorMessage(error)}`] };
  }

  return validateStageData(stage, parsed);
}

function peekStage(raw: string): Stage | undefined {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof value === 'object' && value !== null && 'stage' in value && isStage(value.stage)) {
    return value.stage;
  }
  return undefined;
}
