/**
 * Unit tests for stage instructions and per-file prompts
 */

import { describe, it, expect } from '@jest/globals';
import {
  buildFileWorkPrompt,
  buildModelParts,
  extractJsonFromResponse,
  numberLines,
  selectInstructions,
  serializeContext,
} from '../../src/protocol/prompts.js';
import { describeSchema } from '../../src/protocol/schemas.js';
import type { CodebaseContext } from '../../src/snapshot/types.js';

const CONTEXT: CodebaseContext = {
  snapshot: { '/repo': { isDirectory: true, excluded: false, children: {} } },
  notes: [],
  fileContents: {},
};

describe('Stage Instructions', () => {
  describe('numberLines', () => {
    it('should number lines from 1', () => {
      expect(numberLines('a\nb')).toBe('1: a\n2: b');
    });

    it('should not add a line for the trailing newline', () => {
      expect(numberLines('a\n\nb\n')).toBe('1: a\n2: \n3: b');
    });

    it('should return nothing for empty content', () => {
      expect(numberLines('')).toBe('');
    });
  });

  describe('buildFileWorkPrompt', () => {
    it('should include numbered content for updates', () => {
      expect(buildFileWorkPrompt({ path: 'a.go', operation: 0, reason: 'r' }, 'package a\n')).toBe(
        'File: a.go\n1: package a'
      );
    });

    it('should send only the header for created files', () => {
      expect(buildFileWorkPrompt({ path: 'new.go', operation: 1, reason: 'r' }, undefined)).toBe('File: new.go');
    });

    it('should send only the header when update content is missing', () => {
      expect(buildFileWorkPrompt({ path: 'a.go', operation: 0, reason: 'r' }, undefined)).toBe('File: a.go');
    });
  });

  describe('buildModelParts', () => {
    it('should put the serialized context first for every stage', () => {
      const load = buildModelParts({ clientID: 'c', stage: 'load', context: CONTEXT });
      const work = buildModelParts({
        clientID: 'c',
        stage: 'work',
        context: CONTEXT,
        taskPrompt: 'task',
        fileWorkPrompt: 'File: a.go',
      });

      expect(load[0]).toBe(serializeContext(CONTEXT));
      expect(work[0]).toBe(serializeContext(CONTEXT));
    });

    it('should embed the stage schema in the load instructions', () => {
      const parts = buildModelParts({ clientID: 'c', stage: 'load', context: CONTEXT });

      expect(parts).toEqual([
        serializeContext(CONTEXT),
        'Acknowledge the application context above and respond with stage "load" and status "ok".',
        `Respond using this JSON schema:\n${describeSchema('load')}`,
      ]);
    });

    it('should end the work instructions with the file prompt', () => {
      const parts = buildModelParts({
        clientID: 'c',
        stage: 'work',
        context: CONTEXT,
        taskPrompt: 'task',
        fileWorkPrompt: 'File: a.go\n1: package a',
      });

      expect(parts[parts.length - 1]).toBe('The file to work on:\n\nFile: a.go\n1: package a');
    });

    it('should explain the operation codes in the select instructions', () => {
      const text = selectInstructions('task').join('\n');

      expect(text).toContain('Your task: task');
      expect(text).toContain('0 to update an existing file, 1 to create a new file or -1 to remove a file');
      expect(text).toContain('A path may appear in only one of the two lists.');
    });
  });

  describe('extractJsonFromResponse', () => {
    it('should extract raw JSON object', () => {
      expect(extractJsonFromResponse('{"a": 1}')).toBe('{"a": 1}');
    });

    it('should extract JSON from markdown code fence', () => {
      expect(extractJsonFromResponse('Here:\n```json\n{"a": 1}\n```\nDone')).toBe('{"a": 1}');
    });

    it('should handle JSON with leading/trailing text', () => {
      expect(extractJsonFromResponse('The answer is {"a": {"b": 2}} ok')).toBe('{"a": {"b": 2}}');
    });

    it('should return null when there is no JSON', () => {
      expect(extractJsonFromResponse('no json')).toBeNull();
    });
  });
});
