/**
 * Stage Instructions
 *
 * Text handed to the model with each stage. The serialized codebase context
 * always goes first; the instructions that follow tell the model which role
 * to play and which JSON schema its answer must satisfy.
 */

import type { CodebaseContext } from '../snapshot/types.js';
import { describeSchema, FileOperation, type FileChange } from './schemas.js';
import type { StageRequest } from './types.js';

// ============================================================================
// Instruction text
// ============================================================================

const SENIOR_ENGINEER = 'You are a senior software engineer with many years of experience.';

const QUALITY_BAR =
  'Write production-ready code that follows the conventions already present in the codebase. ' +
  'Keep the change as small as the task allows.';

/** Appended as a system instruction when the caller asks for JSON output */
export const JSON_ONLY_INSTRUCTION =
  'Respond with a single JSON document and nothing else: no prose, no markdown fences.';

export function loadInstructions(): string[] {
  return [
    'Acknowledge the application context above and respond with stage "load" and status "ok".',
    `Respond using this JSON schema:\n${describeSchema('load')}`,
  ];
}

export function selectInstructions(taskPrompt: string): string[] {
  return [
    `${SENIOR_ENGINEER} Your task: ${taskPrompt}`,
    'List in "files" every file that must change to complete the task. Set "operation" to ' +
      `${FileOperation.Update} to update an existing file, ${FileOperation.Create} to create a new file ` +
      `or ${FileOperation.Remove} to remove a file.`,
    'List in "additionalContextFiles" the existing files whose full content you need to read, ' +
      'but which will not change.',
    'A path may appear in only one of the two lists. Paths are relative to the codebase root.',
    `Respond using this JSON schema:\n${describeSchema('select')}`,
  ];
}

export function workInstructions(taskPrompt: string, fileWorkPrompt: string): string[] {
  return [
    `${SENIOR_ENGINEER} Your task: ${taskPrompt}`,
    QUALITY_BAR,
    `Respond with a properly formatted git patch for this one file, honoring the following schema:\n${describeSchema('work')}`,
    `The file to work on:\n\n${fileWorkPrompt}`,
  ];
}

/**
 * The ordered parts sent to the model for a request: serialized context
 * first, then the stage instructions.
 */
export function buildModelParts(request: StageRequest): string[] {
  const parts = [serializeContext(request.context)];
  switch (request.stage) {
    case 'load':
      parts.push(...loadInstructions());
      break;
    case 'select':
      parts.push(...selectInstructions(request.taskPrompt ?? ''));
      break;
    case 'work':
      parts.push(...workInstructions(request.taskPrompt ?? '', request.fileWorkPrompt ?? ''));
      break;
  }
  return parts;
}

export function serializeContext(context: CodebaseContext): string {
  return JSON.stringify(context);
}

// ============================================================================
// Per-file prompt
// ============================================================================

/**
 * Number each line from 1 as `<n>: <line>`. A trailing newline does not
 * produce an extra empty line.
 */
export function numberLines(content: string): string {
  if (content === '') {
    return '';
  }
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line, index) => `${index + 1}: ${line}`).join('\n');
}

/**
 * Header naming the file, followed for updates by its numbered content.
 * Created files, and updates whose content could not be read, send only
 * the header.
 */
export function buildFileWorkPrompt(change: FileChange, content: string | undefined): string {
  const header = `File: ${change.path}`;
  if (change.operation !== FileOperation.Update || content === undefined) {
    return header;
  }
  return `${header}\n${numberLines(content)}`;
}

// ============================================================================
// Response Parsing
// ============================================================================

/**
 * Pull the JSON document out of a model reply, tolerating a markdown fence
 * or leading prose around it.
 */
export function extractJsonFromResponse(response: string): string | null {
  const jsonBlockMatch = response.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonBlockMatch) {
    return jsonBlockMatch[1].trim();
  }

  const jsonMatch = response.match(/\{[\s\S]*\}/);
  if (jsonMatch) {
    return jsonMatch[0].trim();
  }

  return null;
}
