/**
 * Client Session
 *
 * Drives one staged conversation over a MessageChannel:
 *
 *   IDLE → AWAITING_LOAD_ACK → LOADED → AWAITING_SELECT_RESPONSE → SELECTED
 *        → (AWAITING_WORK_RESPONSE → SELECTED) once per target file → DONE
 *
 * FAILED ends the session when the connection drops or the server gives up;
 * CLOSED when the caller closes it. One request is outstanding at a time and
 * a stage can only be entered from the state the previous stage left behind.
 */

import * as path from 'path';
import { ConnectionClosedError, EnvelopeDecodeError, StageOrderError, errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { FileReader } from '../client/fileStore.js';
import type { MessageChannel } from '../transport/channel.js';
import { CloseCode } from '../transport/closeCodes.js';
import type { CodebaseContextStore } from './context.js';
import { decodeResponse, encodeRequest, interpretResponse } from './envelope.js';
import { buildFileWorkPrompt } from './prompts.js';
import {
  FileOperation,
  type FileChange,
  type FileChangePlan,
  type FileOperationCode,
  type LoadAck,
  type PatchData,
  type StageDataMap,
} from './schemas.js';
import type { SessionState, Stage, StageOutcome, StageRequest, StageResponse } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ClientSessionOptions {
  clientID: string;
  channel: MessageChannel;
  context: CodebaseContextStore;
  files: FileReader;
  logger: Logger;
}

export type FilePatchResult =
  | { path: string; operation: FileOperationCode; status: 'ok'; patch: PatchData }
  | { path: string; operation: FileOperationCode; status: 'failed'; reason: string };

export type SessionOutcome = 'completed' | 'select_failed' | 'failed' | 'closed';

export interface SessionResult {
  outcome: SessionOutcome;
  ack: StageOutcome<LoadAck> | null;
  plan: FileChangePlan | null;
  /** One entry per updated or created file, in plan order */
  patches: FilePatchResult[];
  /** Planned removals; no patch is requested for these */
  removals: FileChange[];
  error?: string;
}

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  IDLE: ['AWAITING_LOAD_ACK', 'FAILED', 'CLOSED'],
  AWAITING_LOAD_ACK: ['LOADED', 'FAILED', 'CLOSED'],
  LOADED: ['AWAITING_SELECT_RESPONSE', 'FAILED', 'CLOSED'],
  AWAITING_SELECT_RESPONSE: ['SELECTED', 'DONE', 'FAILED', 'CLOSED'],
  SELECTED: ['AWAITING_WORK_RESPONSE', 'DONE', 'FAILED', 'CLOSED'],
  AWAITING_WORK_RESPONSE: ['SELECTED', 'FAILED', 'CLOSED'],
  DONE: [],
  FAILED: [],
  CLOSED: [],
};

const TERMINAL_STATES: ReadonlySet<SessionState> = new Set(['DONE', 'FAILED', 'CLOSED']);

// ============================================================================
// Session
// ============================================================================

export class ClientSession {
  private readonly clientID: string;
  private readonly channel: MessageChannel;
  private readonly context: CodebaseContextStore;
  private readonly files: FileReader;
  private readonly logger: Logger;

  private currentState: SessionState = 'IDLE';
  private taskPrompt: string | null = null;

  constructor(options: ClientSessionOptions) {
    this.clientID = options.clientID;
    this.channel = options.channel;
    this.context = options.context;
    this.files = options.files;
    this.logger = options.logger.child('ClientSession', { client_id: options.clientID });
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Send the full context and wait for the acknowledgement. An invalid
   * acknowledgement is logged and the session still advances.
   */
  async load(): Promise<StageOutcome<LoadAck>> {
    this.enterStage('load', 'IDLE', 'AWAITING_LOAD_ACK');

    const outcome = await this.exchange('load', {});
    this.assertNotClosed();

    if (outcome.ok) {
      this.logger.info('Context loaded', { status: outcome.data.status });
    } else {
      this.logger.warn('Load acknowledgement rejected', { reason: outcome.reason });
    }
    this.transition('LOADED');
    return outcome;
  }

  /**
   * Ask which files the task touches, then read every listed file that
   * already exists into the context. A rejected plan ends the session.
   */
  async select(taskPrompt: string): Promise<StageOutcome<FileChangePlan>> {
    this.enterStage('select', 'LOADED', 'AWAITING_SELECT_RESPONSE');
    this.taskPrompt = taskPrompt;

    const outcome = await this.exchange('select', { taskPrompt });
    this.assertNotClosed();

    if (!outcome.ok) {
      this.logger.warn('File selection rejected', { reason: outcome.reason });
      this.transition('DONE');
      return outcome;
    }

    const plan = outcome.data;
    this.logger.info(`Plan received: ${plan.files.length} files, ${plan.additionalContextFiles.length} context files`);
    await this.gatherFileContents(plan);
    this.assertNotClosed();
    this.transition('SELECTED');
    return outcome;
  }

  /**
   * Request a patch for one planned file. A rejected patch is reported in
   * the result; the session stays ready for the next file.
   */
  async work(change: FileChange): Promise<FilePatchResult> {
    this.enterStage('work', 'SELECTED', 'AWAITING_WORK_RESPONSE');
    const taskPrompt = this.taskPrompt ?? '';
    const fileWorkPrompt = buildFileWorkPrompt(change, this.context.getFileContent(change.path));

    if (change.operation === FileOperation.Update && !this.context.hasFileContent(change.path)) {
      this.logger.warn(`No content available for ${change.path}; sending header only`);
    }

    const outcome = await this.exchange('work', { taskPrompt, fileWorkPrompt });
    this.assertNotClosed();
    this.transition('SELECTED');

    const base = { path: change.path, operation: change.operation };
    if (!outcome.ok) {
      this.logger.warn(`Patch rejected for ${change.path}`, { reason: outcome.reason });
      return { ...base, status: 'failed', reason: outcome.reason };
    }
    if (!samePath(outcome.data.path, change.path)) {
      const reason = `patch targets ${outcome.data.path}, expected ${change.path}`;
      this.logger.warn(`Patch rejected for ${change.path}`, { reason });
      return { ...base, status: 'failed', reason };
    }

    this.logger.info(`Patch received for ${change.path}`);
    return { ...base, status: 'ok', patch: outcome.data };
  }

  /** Mark the conversation complete once every file has been worked */
  finish(): void {
    this.transition('DONE');
  }

  /**
   * Run the whole conversation for one task: load, select, then one WORK
   * exchange per updated or created file in plan order.
   */
  async run(taskPrompt: string): Promise<SessionResult> {
    const result: SessionResult = {
      outcome: 'completed',
      ack: null,
      plan: null,
      patches: [],
      removals: [],
    };

    try {
      result.ack = await this.load();

      const selection = await this.select(taskPrompt);
      if (!selection.ok) {
        result.outcome = 'select_failed';
        result.error = selection.reason;
        return result;
      }
      result.plan = selection.data;

      for (const change of selection.data.files) {
        if (change.operation === FileOperation.Remove) {
          result.removals.push(change);
          continue;
        }
        result.patches.push(await this.work(change));
      }

      this.finish();
      return result;
    } catch (error) {
      if (error instanceof ConnectionClosedError) {
        result.outcome = this.currentState === 'CLOSED' ? 'closed' : 'failed';
        result.error = error.message;
        return result;
      }
      throw error;
    }
  }

  /**
   * Stop the conversation: no further stage requests are issued and a
   * normal-closure frame is sent. A request already in flight is not
   * cancelled on the remote side.
   */
  async close(code: number = CloseCode.NormalClosure, reason = ''): Promise<void> {
    if (!TERMINAL_STATES.has(this.currentState)) {
      this.transition('CLOSED');
    }
    if (!this.channel.closed) {
      await this.channel.close(code, reason);
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private enterStage(stage: Stage, required: SessionState, next: SessionState): void {
    this.assertNotClosed();
    if (this.currentState !== required) {
      throw new StageOrderError(`cannot start ${stage} in state ${this.currentState}`);
    }
    this.transition(next);
  }

  private assertNotClosed(): void {
    if (this.currentState === 'CLOSED') {
      throw new ConnectionClosedError(CloseCode.NormalClosure, 'session closed');
    }
  }

  private transition(next: SessionState): void {
    const allowed = TRANSITIONS[this.currentState];
    if (!allowed.includes(next)) {
      throw new StageOrderError(`invalid transition ${this.currentState} -> ${next}`);
    }
    this.logger.debug(`${this.currentState} -> ${next}`);
    this.currentState = next;
  }

  private async exchange<S extends Stage>(
    stage: S,
    prompts: Pick<StageRequest, 'taskPrompt' | 'fileWorkPrompt'>
  ): Promise<StageOutcome<StageDataMap[S]>> {
    const request: StageRequest = {
      clientID: this.clientID,
      stage,
      context: this.context.toContext(),
      ...prompts,
    };

    try {
      await this.channel.send(encodeRequest(request));
      this.logger.debug(`Sent ${stage} request`);
      const response = await this.awaitResponse();
      return interpretResponse(response, stage);
    } catch (error) {
      if (this.currentState !== 'CLOSED') {
        this.logger.error(`${stage} exchange failed`, { error: errorMessage(error) });
        this.transition('FAILED');
      }
      throw error;
    }
  }

  /** Wait for the next well-formed response, dropping frames that fail to decode */
  private async awaitResponse(): Promise<StageResponse> {
    for (;;) {
      const raw = await this.channel.receive();
      try {
        return decodeResponse(raw);
      } catch (error) {
        if (!(error instanceof EnvelopeDecodeError)) {
          throw error;
        }
        this.logger.warn('Dropping undecodable response', { error: error.message });
      }
    }
  }

  private async gatherFileContents(plan: FileChangePlan): Promise<void> {
    const entries = [...plan.files, ...plan.additionalContextFiles];

    for (const entry of entries) {
      if (entry.operation === FileOperation.Create || this.context.hasFileContent(entry.path)) {
        continue;
      }
      try {
        const content = await this.files.readFile(entry.path);
        this.context.addFileContent(entry.path, content);
        this.logger.debug(`Loaded file content: ${entry.path}`);
      } catch (error) {
        this.logger.warn(`Failed to read file: ${entry.path}`, { error: errorMessage(error) });
      }
    }
  }
}

function samePath(a: string, b: string): boolean {
  return path.normalize(a) === path.normalize(b);
}
