import * as fs from 'fs/promises';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { ContextRecorder } from '../protocol/serverSession.js';
import type { CodebaseContext } from '../snapshot/types.js';

/**
 * Dumps each loaded context to a file for inspection. Writes run detached
 * from the request path; their failures are logged, never propagated.
 */
export class DebugSnapshotWriter implements ContextRecorder {
  private readonly filePath: string;
  private readonly logger: Logger;
  /** Each write starts once the previous one has settled */
  private tail: Promise<void> = Promise.resolve();

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger.child('DebugSnapshot');
  }

  schedule(context: CodebaseContext): void {
    this.tail = this.tail
      .then(() => this.write(context))
      .catch((error: unknown) => {
        this.logger.error(`Failed to write debug snapshot: ${this.filePath}`, { error: errorMessage(error) });
      });
  }

  /** Wait for every scheduled write to settle */
  async flush(): Promise<void> {
    await this.tail;
  }

  private async write(context: CodebaseContext): Promise<void> {
    await fs.writeFile(this.filePath, JSON.stringify(context.snapshot, null, 2), 'utf-8');
    this.logger.debug(`Wrote debug snapshot: ${this.filePath}`);
  }
}
