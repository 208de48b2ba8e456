/**
 * Unit tests for the envelope codec
 */

import { describe, it, expect } from '@jest/globals';
import {
  decodeRequest,
  decodeResponse,
  encodeRequest,
  encodeResponse,
  errorResponse,
  formatTimestamp,
  interpretResponse,
  okResponse,
} from '../../src/protocol/envelope.js';
import { EnvelopeDecodeError } from '../../src/errors.js';
import type { StageRequest } from '../../src/protocol/types.js';
import type { CodebaseContext } from '../../src/snapshot/types.js';

const CONTEXT: CodebaseContext = {
  snapshot: {
    '/repo': {
      isDirectory: true,
      excluded: false,
      children: {
        'main.go': { isDirectory: false, excluded: false, identifiers: ['main', 'foo'] },
        vendor: { isDirectory: true, excluded: true },
        pkg: { isDirectory: true, excluded: false, children: {} },
      },
    },
  },
  notes: ['excluded entries exist but are not expanded'],
  fileContents: { 'main.go': 'package main\n' },
};

const NOW = new Date('2024-05-01T10:20:30.999Z');

describe('Envelope codec', () => {
  describe('requests', () => {
    it('should round-trip a work request', () => {
      const request: StageRequest = {
        clientID: 'client-1',
        stage: 'work',
        context: CONTEXT,
        taskPrompt: 'rename foo',
        fileWorkPrompt: 'File: main.go\n1: package main',
      };

      expect(decodeRequest(encodeRequest(request))).toEqual(request);
    });

    it('should reject malformed JSON', () => {
      expect(() => decodeRequest('{"clientID":')).toThrow(EnvelopeDecodeError);
    });

    it('should reject an unknown stage', () => {
      const raw = JSON.stringify({ clientID: 'c', stage: 'preload', context: CONTEXT });

      expect(() => decodeRequest(raw)).toThrow(EnvelopeDecodeError);
    });

    it('should reject a task prompt on load', () => {
      const raw = JSON.stringify({ clientID: 'c', stage: 'load', context: CONTEXT, taskPrompt: 'x' });

      expect(() => decodeRequest(raw)).toThrow('invalid request envelope: taskPrompt: not allowed for load');
    });

    it('should require a file prompt on work', () => {
      const raw = JSON.stringify({ clientID: 'c', stage: 'work', context: CONTEXT, taskPrompt: 'x' });

      expect(() => decodeRequest(raw)).toThrow('invalid request envelope: fileWorkPrompt: required for work');
    });

    it('should reject a snapshot node with both children and identifiers', () => {
      const raw = JSON.stringify({
        clientID: 'c',
        stage: 'load',
        context: {
          snapshot: { '/repo': { isDirectory: true, excluded: false, children: {}, identifiers: [] } },
          notes: [],
          fileContents: {},
        },
      });

      expect(() => decodeRequest(raw)).toThrow(EnvelopeDecodeError);
    });
  });

  describe('responses', () => {
    it('should format timestamps as RFC 3339 at second precision', () => {
      expect(formatTimestamp(NOW)).toBe('2024-05-01T10:20:30Z');
    });

    it('should round-trip an ok response', () => {
      const response = okResponse('load', { stage: 'load', status: 'ok' }, NOW);

      expect(decodeResponse(encodeResponse(response))).toEqual({
        timestamp: '2024-05-01T10:20:30Z',
        stage: 'load',
        status: 'ok',
        data: { stage: 'load', status: 'ok' },
      });
    });

    it('should accept timestamps with an offset', () => {
      const raw = JSON.stringify({ timestamp: '2024-05-01T12:20:30+02:00', stage: 'load', status: 'ok', data: {} });

      expect(decodeResponse(raw).timestamp).toBe('2024-05-01T12:20:30+02:00');
    });

    it('should reject a response without a timestamp', () => {
      expect(() => decodeResponse('{"stage":"load","status":"ok","data":{}}')).toThrow(EnvelopeDecodeError);
    });
  });

  describe('interpretResponse', () => {
    it('should return the validated payload', () => {
      const response = okResponse('work', { path: 'a.go', patch: 'p', summary: 's' }, NOW);

      expect(interpretResponse(response, 'work')).toEqual({
        ok: true,
        data: { path: 'a.go', patch: 'p', summary: 's' },
      });
    });

    it('should fail on a stage mismatch', () => {
      const response = okResponse('load', { stage: 'load', status: 'ok' }, NOW);

      expect(interpretResponse(response, 'select')).toEqual({
        ok: false,
        reason: 'stage mismatch: expected select, got load',
      });
    });

    it('should fail on a non-ok status', () => {
      const response = errorResponse('select', 'invalid_response', { message: 'bad output' }, NOW);

      expect(interpretResponse(response, 'select')).toEqual({
        ok: false,
        reason: 'status invalid_response: bad output',
      });
    });

    it('should fail when the payload breaks the stage schema', () => {
      const response = okResponse('work', { path: 'a.go' }, NOW);

      expect(interpretResponse(response, 'work')).toEqual({
        ok: false,
        reason: 'schema validation failed: patch: Required; summary: Required',
      });
    });
  });
});
