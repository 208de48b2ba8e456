/**
 * Generative model backend
 *
 * The server only needs `generate(parts, options) -> text`. The shipped
 * implementation goes through the AI SDK with the Google provider.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { generateText, type CoreMessage, type LanguageModel } from 'ai';
import { ModelCallError, errnoCode, errorMessage, isErrorLike } from '../errors.js';
import type { ModelSettings } from '../config/settings.js';
import type { Logger } from '../logging/logger.js';
import { JSON_ONLY_INSTRUCTION } from '../protocol/prompts.js';

export interface GenerateOptions {
  temperature?: number;
  /** Ask for a bare JSON document */
  jsonMode?: boolean;
  timeoutMs?: number;
}

export interface ModelClient {
  readonly modelName: string;
  /**
   * @throws ModelCallError when the backend fails, times out or returns nothing
   */
  generate(parts: string[], options?: GenerateOptions): Promise<string>;
}

export interface TextGenerationRequest {
  model: LanguageModel;
  system?: string;
  messages: CoreMessage[];
  temperature: number;
  abortSignal: AbortSignal;
}

export type TextGenerator = (request: TextGenerationRequest) => Promise<{ text: string }>;

const defaultTextGenerator: TextGenerator = (request) => generateText(request);

export interface AiSdkModelClientOptions {
  model: LanguageModel;
  modelName: string;
  settings: Pick<ModelSettings, 'temperature' | 'timeoutMs'>;
  logger: Logger;
  generateText?: TextGenerator;
}

export class AiSdkModelClient implements ModelClient {
  readonly modelName: string;
  private readonly model: LanguageModel;
  private readonly settings: Pick<ModelSettings, 'temperature' | 'timeoutMs'>;
  private readonly logger: Logger;
  private readonly generateText: TextGenerator;

  constructor(options: AiSdkModelClientOptions) {
    this.model = options.model;
    this.modelName = options.modelName;
    this.settings = options.settings;
    this.logger = options.logger.child('Model', { model: options.modelName });
    this.generateText = options.generateText ?? defaultTextGenerator;
  }

  async generate(parts: string[], options: GenerateOptions = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.settings.timeoutMs;
    const startTime = Date.now();

    let text: string;
    try {
      const result = await this.generateText({
        model: this.model,
        system: options.jsonMode === false ? undefined : JSON_ONLY_INSTRUCTION,
        messages: [{ role: 'user', content: parts.map((part) => ({ type: 'text' as const, text: part })) }],
        temperature: options.temperature ?? this.settings.temperature,
        abortSignal: AbortSignal.timeout(timeoutMs),
      });
      text = result.text;
    } catch (error) {
      if (isErrorLike(error) && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new ModelCallError(`model call timed out after ${timeoutMs}ms`, { cause: error });
      }
      throw new ModelCallError(`model call failed: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.debug('Model responded', { elapsed_ms: Date.now() - startTime, chars: text.length });

    if (text.trim() === '') {
      throw new ModelCallError('model returned an empty response');
    }
    return text;
  }
}

// ============================================================================
// Construction
// ============================================================================

/** Key file consulted when no key is set in the environment */
export const API_KEY_FILE = path.join('.secrets', 'GCP_AI_API_KEY');

/**
 * @throws ModelCallError when no key is configured
 */
export async function resolveApiKey(settings: Pick<ModelSettings, 'apiKey'>, homeDir: string = os.homedir()): Promise<string> {
  if (settings.apiKey) {
    return settings.apiKey;
  }

  const keyPath = path.join(homeDir, API_KEY_FILE);
  try {
    const key = (await fs.readFile(keyPath, 'utf-8')).trim();
    if (key !== '') {
      return key;
    }
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') {
      throw new ModelCallError(`failed to read API key file ${keyPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  throw new ModelCallError(`no API key: set GOOGLE_GENERATIVE_AI_API_KEY or write the key to ${keyPath}`);
}

export async function createModelClient(settings: ModelSettings, logger: Logger): Promise<ModelClient> {
  const apiKey = await resolveApiKey(settings);
  const google = createGoogleGenerativeAI({ apiKey });

  logger.info(`Using model ${settings.modelName}`, { temperature: settings.temperature, timeout_ms: settings.timeoutMs });

  return new AiSdkModelClient({
    model: google(settings.modelName),
    modelName: settings.modelName,
    settings,
    logger,
  });
}
