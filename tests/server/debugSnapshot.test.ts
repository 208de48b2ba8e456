import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { DebugSnapshotWriter } from '../../src/server/debugSnapshot.js';
import { Logger } from '../../src/logging/logger.js';
import type { CodebaseContext, SnapshotNode } from '../../src/snapshot/types.js';

const CONTEXT: CodebaseContext = {
  snapshot: {
    '/repo': {
      isDirectory: true,
      excluded: false,
      children: { 'main.go': { isDirectory: false, excluded: false, identifiers: ['main'] } },
    },
  },
  notes: ['note'],
  fileContents: { 'main.go': 'package main\n' },
};

describe('DebugSnapshotWriter', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'debug-snapshot-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should write the snapshot as indented JSON', async () => {
    const filePath = path.join(tmpDir, 'code.ctx');
    const writer = new DebugSnapshotWriter(filePath, new Logger({ level: 'silent' }));

    writer.schedule(CONTEXT);
    await writer.flush();

    await expect(fs.readFile(filePath, 'utf-8')).resolves.toBe(JSON.stringify(CONTEXT.snapshot, null, 2));
  });

  it('should apply writes in the order they were scheduled', async () => {
    const filePath = path.join(tmpDir, 'code.ctx');
    const writer = new DebugSnapshotWriter(filePath, new Logger({ level: 'silent' }));
    const children: Record<string, SnapshotNode> = {};
    for (let i = 0; i < 2000; i++) {
      children[`file${i}.go`] = { isDirectory: false, excluded: false, identifiers: [`name${i}`] };
    }
    const large: CodebaseContext = {
      snapshot: { '/large': { isDirectory: true, excluded: false, children } },
      notes: [],
      fileContents: {},
    };

    writer.schedule(large);
    writer.schedule(CONTEXT);
    await writer.flush();

    await expect(fs.readFile(filePath, 'utf-8')).resolves.toBe(JSON.stringify(CONTEXT.snapshot, null, 2));
  });

  it('should log write failures instead of raising them', async () => {
    const lines: string[] = [];
    const logger = new Logger({ level: 'error', sink: (line) => lines.push(line) });
    const writer = new DebugSnapshotWriter(path.join(tmpDir, 'missing', 'code.ctx'), logger);

    writer.schedule(CONTEXT);
    await writer.flush();

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[ERROR] [DebugSnapshot] Failed to write debug snapshot:');
    expect(lines[0]).toContain('ENOENT');
  });

  it('should keep writing after a failed write', async () => {
    const dir = path.join(tmpDir, 'later');
    const filePath = path.join(dir, 'code.ctx');
    const writer = new DebugSnapshotWriter(filePath, new Logger({ level: 'silent' }));

    writer.schedule(CONTEXT);
    await writer.flush();
    await fs.mkdir(dir);
    writer.schedule(CONTEXT);
    await writer.flush();

    await expect(fs.readFile(filePath, 'utf-8')).resolves.toBe(JSON.stringify(CONTEXT.snapshot, null, 2));
  });
});
