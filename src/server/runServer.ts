import * as path from 'path';
import type { AppConfig } from '../config/settings.js';
import { ContextSyncServer } from '../http/server.js';
import type { Logger } from '../logging/logger.js';
import { createModelClient, type ModelClient } from '../model/modelClient.js';
import { DebugSnapshotWriter } from './debugSnapshot.js';

export interface ServerRunOptions {
  /** Use this model instead of building one from the configuration */
  model?: ModelClient;
}

/**
 * Build the model client and start listening on the configured address.
 * The returned server is already accepting connections.
 */
export async function runServer(config: AppConfig, logger: Logger, options: ServerRunOptions = {}): Promise<ContextSyncServer> {
  const model = options.model ?? (await createModelClient(config.model, logger));
  const debugSnapshot = config.debugSnapshotFile
    ? new DebugSnapshotWriter(path.resolve(config.debugSnapshotFile), logger)
    : undefined;

  const server = new ContextSyncServer({ model, logger, debugSnapshot });
  await server.listen(config.addr);
  return server;
}
