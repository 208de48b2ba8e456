#!/usr/bin/env node

/**
 * context-sync
 *
 * Staged context synchronization between a local codebase and a generative
 * model:
 * 1. client: snapshots the codebase and drives load → select → work
 * 2. server: forwards each stage to the model and validates what comes back
 */

import { loadConfig } from './config/settings.js';
import { runClient } from './client/runClient.js';
import { errorMessage } from './errors.js';
import { Logger } from './logging/logger.js';
import { runServer } from './server/runServer.js';

const USAGE = `
context-sync: staged codebase context synchronization

Usage: context-sync <client|server> [options]

Commands:
  server                   Accept client sessions and forward stages to the model
  client                   Snapshot a codebase and request patches for a task

Options:
  --addr <host:port>       Server address (default: localhost:8000)
  --root, -r <path>        Codebase root for the client (default: current directory)
  --task, -t <text>        Task for the client; prompted on stdin when omitted
  --debug                  Log at debug level
  --help, -h               Show this help message

Environment Variables:
  CTX_ADDR                       Server address
  CTX_LOG                        Log level: trace, debug, info, warn, error
  CTX_IGNORE_FILE                Ignore file name (default: .ctxignore)
  CTX_INCLUDE_GITIGNORE          Also apply .gitignore patterns
  CTX_DEFAULT_EXCLUDES           Also apply the built-in exclusion list
  CTX_MAX_FILE_BYTES             Files above this size are not parsed
  CTX_MODEL                      Model name (default: gemini-2.0-flash)
  CTX_MODEL_TIMEOUT_MS           Model call timeout
  CTX_DEBUG_SNAPSHOT_FILE        Server-side dump of each loaded snapshot (empty disables)
  CTX_CLIENT_ID                  Client identifier (default: random UUID)
  GOOGLE_GENERATIVE_AI_API_KEY   Model API key (or ~/.secrets/GCP_AI_API_KEY)

Examples:
  context-sync server --addr localhost:8000
  context-sync client --root ./my-project --task "Add a --verbose flag"
`;

export interface CliArgs {
  command: 'client' | 'server' | 'help';
  addr?: string;
  rootDir: string;
  taskPrompt?: string;
  debug: boolean;
}

export function parseArgs(args: string[], cwd: string = process.cwd()): CliArgs {
  const parsed: CliArgs = { command: 'help', rootDir: cwd, debug: false };
  let commandSeen = false;

  const valueAfter = (index: number, flag: string): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      return { ...parsed, command: 'help' };
    } else if (arg === '--addr') {
      parsed.addr = valueAfter(i, arg);
      i++;
    } else if (arg === '--root' || arg === '-r') {
      parsed.rootDir = valueAfter(i, arg);
      i++;
    } else if (arg === '--task' || arg === '-t') {
      parsed.taskPrompt = valueAfter(i, arg);
      i++;
    } else if (arg === '--debug') {
      parsed.debug = true;
    } else if (!commandSeen && (arg === 'client' || arg === 'server')) {
      parsed.command = arg;
      commandSeen = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return parsed;
}

/** Resolves with an exit code, or null while a server keeps running */
async function main(): Promise<number | null> {
  const args = parseArgs(process.argv.slice(2));
  if (args.command === 'help') {
    console.error(USAGE);
    return 0;
  }

  const { config, warnings } = loadConfig({ addr: args.addr, debug: args.debug });
  const logger = new Logger({ level: config.logLevel });
  for (const warning of warnings) {
    logger.warn(warning);
  }

  if (args.command === 'server') {
    const server = await runServer(config, logger);
    const shutdown = (): void => {
      logger.info('Shutting down');
      void server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
    return null;
  }

  const result = await runClient(config, logger, { rootDir: args.rootDir, taskPrompt: args.taskPrompt });
  return result.outcome === 'completed' ? 0 : 1;
}

if (require.main === module) {
  main().then(
    (code) => {
      if (code !== null) {
        process.exit(code);
      }
    },
    (error: unknown) => {
      console.error('Fatal error:', errorMessage(error));
      process.exit(1);
    }
  );
}
