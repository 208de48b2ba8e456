/**
 * Unit tests for ServerSession
 *
 * The model is replaced by a mock; each test feeds raw frames and checks
 * the action the session asks the connection to take.
 */

import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { ServerSession, parseModelOutput, type ServerAction } from '../../src/protocol/serverSession.js';
import { encodeRequest } from '../../src/protocol/envelope.js';
import { ModelCallError } from '../../src/errors.js';
import { silentLogger } from '../../src/logging/logger.js';
import type { GenerateOptions, ModelClient } from '../../src/model/modelClient.js';
import type { StageRequest } from '../../src/protocol/types.js';
import type { CodebaseContext } from '../../src/snapshot/types.js';

const CONTEXT: CodebaseContext = {
  snapshot: { '/repo': { isDirectory: true, excluded: false, children: {} } },
  notes: [],
  fileContents: {},
};

const NOW = new Date('2024-05-01T10:20:30.456Z');

function frame(request: Partial<StageRequest> & Pick<StageRequest, 'stage'>): string {
  return encodeRequest({ clientID: 'client-1', context: CONTEXT, ...request });
}

function replyOf(action: ServerAction) {
  if (action.kind !== 'reply') {
    throw new Error(`expected a reply, got ${action.kind}`);
  }
  return action.response;
}

describe('ServerSession', () => {
  let generate: jest.Mock<(parts: string[], options?: GenerateOptions) => Promise<string>>;
  let model: ModelClient;
  let schedule: jest.Mock<(context: CodebaseContext) => void>;
  let session: ServerSession;

  beforeEach(() => {
    generate = jest.fn<(parts: string[], options?: GenerateOptions) => Promise<string>>(
      async () => '{"stage":"load","status":"ok"}'
    );
    model = { modelName: 'test-model', generate };
    schedule = jest.fn<(context: CodebaseContext) => void>();
    session = new ServerSession({
      model,
      logger: silentLogger(),
      debugSnapshot: { schedule },
      now: () => NOW,
    });
  });

  it('should acknowledge a load with the validated model output', async () => {
    const response = replyOf(await session.handle(frame({ stage: 'load' })));

    expect(response).toEqual({
      timestamp: '2024-05-01T10:20:30Z',
      stage: 'load',
      status: 'ok',
      data: { stage: 'load', status: 'ok' },
    });
    expect(session.hasLoaded).toBe(true);
  });

  it('should put the serialized context first and ask for JSON', async () => {
    await session.handle(frame({ stage: 'load' }));

    const [parts, options] = generate.mock.calls[0];
    expect(parts[0]).toBe(JSON.stringify(CONTEXT));
    expect(parts.length).toBeGreaterThan(1);
    expect(options).toEqual({ jsonMode: true });
  });

  it('should schedule a debug snapshot for every load', async () => {
    await session.handle(frame({ stage: 'load' }));

    expect(schedule).toHaveBeenCalledWith(CONTEXT);
  });

  it('should reject select before load without calling the model', async () => {
    const response = replyOf(await session.handle(frame({ stage: 'select', taskPrompt: 'task' })));

    expect(response.status).toBe('invalid_request');
    expect(response.stage).toBe('select');
    expect(generate).not.toHaveBeenCalled();
  });

  it('should embed the task prompt in select instructions', async () => {
    await session.handle(frame({ stage: 'load' }));
    generate.mockResolvedValueOnce('{"files":[],"additionalContextFiles":[]}');

    const response = replyOf(await session.handle(frame({ stage: 'select', taskPrompt: 'rename foo' })));

    expect(response.status).toBe('ok');
    expect(response.data).toEqual({ files: [], additionalContextFiles: [] });
    const [parts] = generate.mock.calls[1];
    expect(parts[1]).toContain('Your task: rename foo');
  });

  it('should accept model output wrapped in a code fence', async () => {
    await session.handle(frame({ stage: 'load' }));
    generate.mockResolvedValueOnce('```json\n{"path":"a.go","patch":"diff","summary":"s"}\n```');

    const response = replyOf(
      await session.handle(frame({ stage: 'work', taskPrompt: 'task', fileWorkPrompt: 'File: a.go' }))
    );

    expect(response.status).toBe('ok');
    expect(response.data).toEqual({ path: 'a.go', patch: 'diff', summary: 's' });
  });

  it('should answer invalid_response when the model output fails the schema', async () => {
    await session.handle(frame({ stage: 'load' }));
    generate.mockResolvedValueOnce('{"files":[]}');

    const response = replyOf(await session.handle(frame({ stage: 'select', taskPrompt: 'task' })));

    expect(response.status).toBe('invalid_response');
    expect(response.data).toEqual({
      message: 'model output does not match the stage schema',
      issues: ['additionalContextFiles: Required'],
    });
  });

  it('should close with an internal error when the model call fails', async () => {
    generate.mockRejectedValueOnce(new ModelCallError('quota exceeded'));

    const action = await session.handle(frame({ stage: 'load' }));

    expect(action).toEqual({ kind: 'close', code: 1011, reason: 'ai generation failed' });
    expect(session.hasLoaded).toBe(false);
  });

  it('should ignore frames that are not JSON', async () => {
    const action = await session.handle('garbage');

    expect(action).toEqual({ kind: 'ignore' });
    expect(generate).not.toHaveBeenCalled();
  });

  it('should answer invalid_request when a stage is named but the envelope is wrong', async () => {
    const response = replyOf(await session.handle(frame({ stage: 'load', taskPrompt: 'not allowed' })));

    expect(response.status).toBe('invalid_request');
    expect(response.stage).toBe('load');
    expect(generate).not.toHaveBeenCalled();
  });
});

describe('parseModelOutput', () => {
  it('should report output without a JSON document', () => {
    expect(parseModelOutput('load', 'no json here')).toEqual({
      ok: false,
      issues: ['model output contains no JSON document'],
    });
  });

  it('should validate against the requested stage', () => {
    expect(parseModelOutput('work', '{"path":"a.go","patch":"p","summary":"s"}')).toEqual({
      ok: true,
      data: { path: 'a.go', patch: 'p', summary: 's' },
    });
  });
});
