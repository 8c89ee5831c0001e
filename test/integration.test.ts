import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { ScanEngine } from '../src/engine';
import { deletePaths, selectRedundant } from '../src/delete';
import { filterDuplicates, sortGroups } from '../src/filters';
import { formatDuplicatesReport, summarizeDuplicates } from '../src/report';
import {
  createTempDir,
  cleanupTempDir,
  createTestFile,
  createDuplicateStructure,
  createDir,
  createIndex
} from './setup';

function sha256(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

describe('End-to-end duplicate detection', () => {
  let tempDir: string;
  let root: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    root = path.join(tempDir, 'root');
    await createDir(root);
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should complete full workflow with known duplicates', async () => {
    const structure = await createDuplicateStructure(root);
    const index = createIndex(tempDir);

    await new ScanEngine({ index }).scanOptimized(root);
    const report = formatDuplicatesReport(index.detectDuplicates());

    const [first, second] = structure.duplicates;
    expect(report).toBe(
      'Duplicate files:\n\n' +
        `Hash: ${sha256(first.content)}\n` +
        first.files.map((f) => `- ${f}\n`).join('') +
        '\n' +
        `Hash: ${sha256(second.content)}\n` +
        second.files.map((f) => `- ${f}\n`).join('') +
        '\n'
    );
    for (const uniqueFile of structure.unique) {
      expect(index.detectDuplicates().files.has(index.hashOf('files', uniqueFile) ?? '')).toBe(false);
    }
  });

  it('should pick up changes on a later scan', async () => {
    const a = path.join(root, 'a.txt');
    const b = path.join(root, 'b.txt');
    await createTestFile(a, 'version 1');
    await createTestFile(b, 'version 1');
    const index = createIndex(tempDir);
    const engine = new ScanEngine({ index });
    await engine.scanOptimized(root);

    await createTestFile(b, 'version 2');
    await createTestFile(path.join(root, 'c.txt'), 'version 2');
    await engine.scanOptimized(root);

    const duplicates = index.detectDuplicates();
    expect([...duplicates.files.entries()]).toEqual([[sha256('version 2'), [b, path.join(root, 'c.txt')]]]);
    expect(index.bucket('files', sha256('version 1'))).toEqual([a]);
  });

  it('should filter, sort and summarize detected groups', async () => {
    await createTestFile(path.join(root, 'photos/a.jpg'), 'picture data');
    await createTestFile(path.join(root, 'photos/b.jpg'), 'picture data');
    await createTestFile(path.join(root, 'docs/a.txt'), 'text');
    await createTestFile(path.join(root, 'docs/b.txt'), 'text');
    await createTestFile(path.join(root, 'docs/c.txt'), 'text');
    const index = createIndex(tempDir);
    await new ScanEngine({ index }).scanOptimized(root);

    const images = await filterDuplicates(index.detectDuplicates(), { fileType: 'images', sortBy: 'name', reverse: false });
    expect([...images.files.values()]).toEqual([[path.join(root, 'photos/a.jpg'), path.join(root, 'photos/b.jpg')]]);

    const byCount = await sortGroups(index.detectDuplicates(), 'count');
    expect([...byCount.files.keys()]).toEqual([sha256('text'), sha256('picture data')]);

    const summary = await summarizeDuplicates(index.detectDuplicates());
    expect(summary).toEqual({
      fileGroups: 2,
      dirGroups: 0,
      duplicateFiles: 5,
      duplicateDirs: 0,
      recoverableBytes: 12 + 4 + 4
    });
  });

  it('should find duplicate folder trees and delete the redundant copy', async () => {
    const album = path.join(root, 'album');
    const albumCopy = path.join(root, 'album-copy');
    for (const dir of [album, albumCopy]) {
      await createTestFile(path.join(dir, 'one.jpg'), 'first image');
      await createTestFile(path.join(dir, 'nested/two.jpg'), 'second image');
    }
    const index = createIndex(tempDir);
    await new ScanEngine({ index }).scanOptimized(root, { includeDirs: true });

    const duplicates = index.detectDuplicates();
    expect([...duplicates.dirs.values()]).toEqual([
      [album, albumCopy],
      [path.join(album, 'nested'), path.join(albumCopy, 'nested')]
    ]);

    const targets = selectRedundant(duplicates, 'all');
    expect(targets[0]).toBe(albumCopy);

    const report = await deletePaths(index, [albumCopy]);
    expect(report.deleted).toBe(1);
    expect(fs.existsSync(albumCopy)).toBe(false);

    const remaining = index.detectDuplicates();
    expect(remaining.dirs.size).toBe(0);
    expect(remaining.files.size).toBe(0);
  });
});
