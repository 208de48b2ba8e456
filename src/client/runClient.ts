/**
 * Client runner
 *
 * Snapshots the codebase, asks for a task when none was given, runs one
 * staged conversation against the server and prints the resulting patches.
 */

import * as path from 'path';
import * as readline from 'readline/promises';
import type { AppConfig } from '../config/settings.js';
import type { Logger } from '../logging/logger.js';
import { CodebaseContextStore } from '../protocol/context.js';
import { ClientSession, type SessionResult } from '../protocol/session.js';
import { SnapshotBuilder } from '../snapshot/builder.js';
import { IdentifierExtractor } from '../snapshot/extractor.js';
import { loadIgnoreSources } from '../snapshot/ignore.js';
import { TreeSitterParser } from '../snapshot/parser.js';
import type { SnapshotResult } from '../snapshot/types.js';
import { DATA_PATH } from '../http/server.js';
import { WebSocketChannel } from '../transport/wsChannel.js';
import { LocalFileStore } from './fileStore.js';

export interface ClientRunOptions {
  rootDir: string;
  taskPrompt?: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export async function snapshotCodebase(config: AppConfig, rootDir: string, logger: Logger): Promise<SnapshotResult> {
  const patterns = await loadIgnoreSources(rootDir, config.snapshot, logger);
  const parser = new TreeSitterParser();
  try {
    const builder = new SnapshotBuilder({
      extractor: new IdentifierExtractor(parser),
      logger,
      maxFileBytes: config.snapshot.maxFileBytes,
    });
    return await builder.build(rootDir, patterns);
  } finally {
    parser.dispose();
  }
}

export async function promptForTask(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): Promise<string> {
  const rl = readline.createInterface({ input, output, terminal: false });
  try {
    return (await rl.question('Task: ')).trim();
  } finally {
    rl.close();
  }
}

export async function runClient(config: AppConfig, logger: Logger, options: ClientRunOptions): Promise<SessionResult> {
  const rootDir = path.resolve(options.rootDir);
  const output = options.output ?? process.stdout;

  const { snapshot, notes, stats } = await snapshotCodebase(config, rootDir, logger);
  logger.info(`Snapshot ready in ${stats.durationMs}ms`, { root: rootDir });

  const taskPrompt = options.taskPrompt ?? (await promptForTask(options.input ?? process.stdin, output));
  if (taskPrompt === '') {
    throw new Error('No task given');
  }

  const channel = await WebSocketChannel.connect(`ws://${config.addr}${DATA_PATH}`, logger.child('Channel'));
  const session = new ClientSession({
    clientID: config.clientID,
    channel,
    context: new CodebaseContextStore(snapshot, notes),
    files: new LocalFileStore(rootDir, { maxFileBytes: config.snapshot.maxFileBytes }),
    logger,
  });

  const onInterrupt = (): void => {
    logger.info('Interrupted, closing session');
    void session.close();
  };
  process.once('SIGINT', onInterrupt);
  process.once('SIGTERM', onInterrupt);

  try {
    const result = await session.run(taskPrompt);
    output.write(formatSessionResult(result));
    return result;
  } finally {
    process.off('SIGINT', onInterrupt);
    process.off('SIGTERM', onInterrupt);
    await session.close();
  }
}

/**
 * Human-readable report of a finished session: removals first, then one
 * block per patched file.
 */
export function formatSessionResult(result: SessionResult): string {
  const lines: string[] = [`Outcome: ${result.outcome}`];
  if (result.error) {
    lines.push(`Error: ${result.error}`);
  }

  for (const removal of result.removals) {
    lines.push(`Remove: ${removal.path} (${removal.reason})`);
  }

  for (const entry of result.patches) {
    if (entry.status === 'failed') {
      lines.push(`--- ${entry.path}: failed (${entry.reason})`);
      continue;
    }
    lines.push(`--- ${entry.path}`);
    lines.push(entry.patch.summary);
    lines.push(entry.patch.patch);
  }

  return `${lines.join('\n')}\n`;
}
