/**
 * Runtime configuration
 *
 * Built once at startup from environment variables and CLI flags, then
 * passed explicitly to the components that need it.
 */

import { randomUUID } from 'crypto';
import { envBool, envInt, envMs, envString, type EnvSource } from './env.js';
import { isLogLevel, type LogLevel } from '../logging/logger.js';

export const DEFAULT_ADDR = 'localhost:8000';
export const DEFAULT_IGNORE_FILE = '.ctxignore';
export const DEFAULT_DEBUG_SNAPSHOT_FILE = 'code.ctx';
export const DEFAULT_MODEL_NAME = 'gemini-2.0-flash';
export const DEFAULT_TEMPERATURE = 0.8;

/** Files larger than this keep a node but are not parsed (1MB) */
export const DEFAULT_MAX_FILE_BYTES = 1 * 1024 * 1024;

const DEFAULT_MODEL_TIMEOUT_MS = 120_000;
const MIN_MODEL_TIMEOUT_MS = 10_000;
const MAX_MODEL_TIMEOUT_MS = 30 * 60 * 1000;

export interface SnapshotSettings {
  /** Ignore file name, resolved against the root being snapshotted */
  ignoreFile: string;
  /** Also read patterns from the root's .gitignore */
  includeGitignore: boolean;
  /** Add the built-in exclusion list (.git, node_modules, ...) */
  useDefaultExcludes: boolean;
  maxFileBytes: number;
}

export interface ModelSettings {
  modelName: string;
  temperature: number;
  timeoutMs: number;
  /** Explicit key; when absent the key file under the home directory is tried */
  apiKey?: string;
}

export interface AppConfig {
  /** host:port of the server */
  addr: string;
  logLevel: LogLevel;
  clientID: string;
  snapshot: SnapshotSettings;
  model: ModelSettings;
  /** Server-side debug dump of each LOAD context; empty string disables it */
  debugSnapshotFile: string;
}

export interface ConfigOverrides {
  addr?: string;
  debug?: boolean;
}

export interface LoadedConfig {
  config: AppConfig;
  /** Problems found while reading the environment, to be logged once a logger exists */
  warnings: string[];
}

export function resolveLogLevel(raw: string | undefined, debug: boolean): { level: LogLevel; warning?: string } {
  if (raw === undefined || raw.trim() === '') {
    return { level: debug ? 'debug' : 'info' };
  }
  const normalized = raw.trim().toLowerCase();
  if (isLogLevel(normalized)) {
    return { level: normalized };
  }
  return { level: 'info', warning: `Invalid log level: ${raw}` };
}

export function loadConfig(overrides: ConfigOverrides = {}, env: EnvSource = process.env): LoadedConfig {
  const warnings: string[] = [];

  const { level, warning } = resolveLogLevel(env.CTX_LOG, overrides.debug ?? false);
  if (warning) {
    warnings.push(warning);
  }

  const apiKey = env.GOOGLE_GENERATIVE_AI_API_KEY?.trim();

  const config: AppConfig = {
    addr: overrides.addr ?? envString('CTX_ADDR', DEFAULT_ADDR, env),
    logLevel: level,
    clientID: envString('CTX_CLIENT_ID', randomUUID(), env),
    snapshot: {
      ignoreFile: envString('CTX_IGNORE_FILE', DEFAULT_IGNORE_FILE, env),
      includeGitignore: envBool('CTX_INCLUDE_GITIGNORE', false, env),
      useDefaultExcludes: envBool('CTX_DEFAULT_EXCLUDES', false, env),
      maxFileBytes: envInt('CTX_MAX_FILE_BYTES', DEFAULT_MAX_FILE_BYTES, { min: 1 }, env),
    },
    model: {
      modelName: envString('CTX_MODEL', DEFAULT_MODEL_NAME, env),
      temperature: DEFAULT_TEMPERATURE,
      timeoutMs: envMs('CTX_MODEL_TIMEOUT_MS', DEFAULT_MODEL_TIMEOUT_MS, {
        min: MIN_MODEL_TIMEOUT_MS,
        max: MAX_MODEL_TIMEOUT_MS,
      }, env),
      apiKey: apiKey ? apiKey : undefined,
    },
    // An explicitly empty value disables the dump, so envString's defaulting is not used here.
    debugSnapshotFile: env.CTX_DEBUG_SNAPSHOT_FILE !== undefined
      ? env.CTX_DEBUG_SNAPSHOT_FILE.trim()
      : DEFAULT_DEBUG_SNAPSHOT_FILE,
  };

  return { config, warnings };
}
