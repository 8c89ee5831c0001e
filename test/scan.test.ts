import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { walkDirectory, collectSizeGroups, countItems, isExcludedFolder, ensureDirectory } from '../src/scan';
import { IOError, NotFoundError } from '../src/errors';
import {
  createTempDir,
  cleanupTempDir,
  createTestFile,
  createSymlink,
  createDir
} from './setup';

describe('walkDirectory', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should find all files in directory tree', async () => {
    await createTestFile(path.join(tempDir, 'file1.txt'), 'content1');
    await createTestFile(path.join(tempDir, 'subdir/file2.txt'), 'content2');
    await createTestFile(path.join(tempDir, 'subdir/nested/file3.txt'), 'content3');

    const foundFiles: string[] = [];
    await walkDirectory(tempDir, async (filePath) => {
      foundFiles.push(filePath);
    });

    expect(foundFiles).toEqual([
      path.join(tempDir, 'file1.txt'),
      path.join(tempDir, 'subdir/file2.txt'),
      path.join(tempDir, 'subdir/nested/file3.txt')
    ]);
  });

  it('should visit entries in name order', async () => {
    await createTestFile(path.join(tempDir, 'c.txt'), 'c');
    await createTestFile(path.join(tempDir, 'a.txt'), 'a');
    await createTestFile(path.join(tempDir, 'b.txt'), 'b');

    const foundFiles: string[] = [];
    await walkDirectory(tempDir, (filePath) => {
      foundFiles.push(path.basename(filePath));
    });

    expect(foundFiles).toEqual(['a.txt', 'b.txt', 'c.txt']);
  });

  it('should handle empty directory', async () => {
    const foundFiles: string[] = [];
    await walkDirectory(tempDir, async (filePath) => {
      foundFiles.push(filePath);
    });

    expect(foundFiles).toHaveLength(0);
  });

  it('should skip symbolic links', async () => {
    const realFile = path.join(tempDir, 'real.txt');
    const link = path.join(tempDir, 'link.txt');

    await createTestFile(realFile, 'content');
    await createSymlink(realFile, link);

    const foundFiles: string[] = [];
    await walkDirectory(tempDir, async (filePath) => {
      foundFiles.push(filePath);
    });

    expect(foundFiles).toEqual([realFile]);
  });

  it('should report folders through onDirectory', async () => {
    await createTestFile(path.join(tempDir, 'a/b/file.txt'), 'content');
    await createDir(path.join(tempDir, 'c'));

    const dirs: string[] = [];
    await walkDirectory(tempDir, () => undefined, { onDirectory: (d) => dirs.push(d) });

    expect(dirs).toEqual([path.join(tempDir, 'a'), path.join(tempDir, 'a/b'), path.join(tempDir, 'c')]);
  });

  it('should not descend when scanSubfolders is false', async () => {
    await createTestFile(path.join(tempDir, 'top.txt'), 'top');
    await createTestFile(path.join(tempDir, 'sub/deep.txt'), 'deep');

    const foundFiles: string[] = [];
    const dirs: string[] = [];
    await walkDirectory(tempDir, (filePath) => {
      foundFiles.push(filePath);
    }, { scanSubfolders: false, onDirectory: (d) => dirs.push(d) });

    expect(foundFiles).toEqual([path.join(tempDir, 'top.txt')]);
    expect(dirs).toEqual([path.join(tempDir, 'sub')]);
  });

  it('should report an unreadable root through onError and keep going', async () => {
    const missing = path.join(tempDir, 'missing');
    const errors: string[] = [];

    await walkDirectory(missing, () => undefined, { onError: (p) => errors.push(p) });

    expect(errors).toEqual([missing]);
  });

  it('should stop once the signal is aborted', async () => {
    await createTestFile(path.join(tempDir, 'a.txt'), 'a');
    await createTestFile(path.join(tempDir, 'b.txt'), 'b');
    await createTestFile(path.join(tempDir, 'c.txt'), 'c');
    const controller = new AbortController();

    const foundFiles: string[] = [];
    await walkDirectory(tempDir, (filePath) => {
      foundFiles.push(filePath);
      controller.abort();
    }, { signal: controller.signal });

    expect(foundFiles).toEqual([path.join(tempDir, 'a.txt')]);
  });
});

describe('isExcludedFolder', () => {
  it('should match bare names as case-insensitive substrings of the folder name', () => {
    expect(isExcludedFolder('/data/project/Node_Modules', ['node_modules'])).toBe(true);
    expect(isExcludedFolder('/data/project/build-cache', ['cache'])).toBe(true);
    expect(isExcludedFolder('/data/cache/project', ['cache'])).toBe(false);
  });

  it('should match patterns with a separator against the full path', () => {
    expect(isExcludedFolder('/data/Photos/Raw', ['photos/raw'])).toBe(true);
    expect(isExcludedFolder('/data/raw', ['photos/raw'])).toBe(false);
  });

  it('should not exclude anything without patterns', () => {
    expect(isExcludedFolder('/data/anything', [])).toBe(false);
  });
});

describe('ensureDirectory', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should accept a folder', async () => {
    await expect(ensureDirectory(tempDir)).resolves.toBeUndefined();
  });

  it('should reject a missing path with NotFoundError', async () => {
    await expect(ensureDirectory(path.join(tempDir, 'nope'))).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should reject a file', async () => {
    const file = path.join(tempDir, 'file.txt');
    await createTestFile(file, 'content');

    await expect(ensureDirectory(file)).rejects.toBeInstanceOf(IOError);
  });
});

describe('collectSizeGroups', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should group files by size', async () => {
    await createTestFile(path.join(tempDir, 'small1.txt'), 'hi');
    await createTestFile(path.join(tempDir, 'small2.txt'), 'yo');
    await createTestFile(path.join(tempDir, 'large.txt'), 'hello world');

    const { sizeGroups, filesSeen } = await collectSizeGroups(tempDir);

    expect(sizeGroups.size).toBe(2);
    expect(sizeGroups.get(2)).toEqual([path.join(tempDir, 'small1.txt'), path.join(tempDir, 'small2.txt')]);
    expect(sizeGroups.get(11)).toEqual([path.join(tempDir, 'large.txt')]);
    expect(filesSeen).toBe(3);
  });

  it('should scan a root whose own path matches a bare excluded name', async () => {
    const root = path.join(tempDir, 'tmp', 'photos');
    await createTestFile(path.join(root, 'a.jpg'), 'hi');
    await createTestFile(path.join(root, 'tmp-cache', 'b.jpg'), 'yo');

    const { sizeGroups, directories } = await collectSizeGroups(root, { excludeFolders: ['tmp'] });

    expect(sizeGroups.get(2)).toEqual([path.join(root, 'a.jpg')]);
    expect(directories).toEqual([root]);
  });

  it('should exclude specified paths', async () => {
    const file1 = path.join(tempDir, 'file1.txt');
    const file2 = path.join(tempDir, 'file2.txt');
    const exclude = path.join(tempDir, 'exclude.txt');

    await createTestFile(file1, 'content');
    await createTestFile(file2, 'content');
    await createTestFile(exclude, 'content');

    const { sizeGroups } = await collectSizeGroups(tempDir, { excludePaths: [exclude] });

    expect(sizeGroups.get(7)).toEqual([file1, file2]); // "content" is 7 bytes
  });

  it('should filter by extensions case-insensitively', async () => {
    await createTestFile(path.join(tempDir, 'file1.TXT'), 'content');
    await createTestFile(path.join(tempDir, 'file2.txt'), 'content');
    await createTestFile(path.join(tempDir, 'file3.jpg'), 'content');

    const { sizeGroups } = await collectSizeGroups(tempDir, { fileTypeAllowList: ['TXT'] });

    expect(sizeGroups.get(7)).toEqual([path.join(tempDir, 'file1.TXT'), path.join(tempDir, 'file2.txt')]);
  });

  it('should handle multiple extensions', async () => {
    await createTestFile(path.join(tempDir, 'file1.txt'), 'content');
    await createTestFile(path.join(tempDir, 'file2.jpg'), 'content');
    await createTestFile(path.join(tempDir, 'file3.png'), 'content');
    await createTestFile(path.join(tempDir, 'file4.pdf'), 'content');

    const { sizeGroups } = await collectSizeGroups(tempDir, { fileTypeAllowList: ['.txt', '.jpg'] });

    expect(sizeGroups.get(7)).toEqual([path.join(tempDir, 'file1.txt'), path.join(tempDir, 'file2.jpg')]);
  });

  it('should drop files below the minimum size', async () => {
    await createTestFile(path.join(tempDir, 'tiny.txt'), 'ab');
    await createTestFile(path.join(tempDir, 'big.txt'), 'abcdefghij');

    const { sizeGroups } = await collectSizeGroups(tempDir, { minSizeBytes: 5 });

    expect([...sizeGroups.keys()]).toEqual([10]);
  });

  it('should skip hidden entries unless asked', async () => {
    await createTestFile(path.join(tempDir, 'visible.txt'), 'content');
    await createTestFile(path.join(tempDir, '.hidden.txt'), 'content');
    await createTestFile(path.join(tempDir, '.git/config.txt'), 'content');

    const hiddenSkipped = await collectSizeGroups(tempDir);
    expect(hiddenSkipped.sizeGroups.get(7)).toEqual([path.join(tempDir, 'visible.txt')]);
    expect(hiddenSkipped.directories).toEqual([tempDir]);

    const withHidden = await collectSizeGroups(tempDir, { includeHidden: true });
    expect(withHidden.sizeGroups.get(7)).toEqual([
      path.join(tempDir, '.hidden.txt'),
      path.join(tempDir, 'visible.txt'),
      path.join(tempDir, '.git/config.txt')
    ]);
  });

  it('should skip excluded folders with their subtree', async () => {
    await createTestFile(path.join(tempDir, 'src/a.txt'), 'content');
    await createTestFile(path.join(tempDir, 'node_modules/pkg/a.txt'), 'content');

    const { sizeGroups, directories } = await collectSizeGroups(tempDir, { excludeFolders: ['NODE_MODULES'] });

    expect(sizeGroups.get(7)).toEqual([path.join(tempDir, 'src/a.txt')]);
    expect(directories).toEqual([tempDir, path.join(tempDir, 'src')]);
  });

  it('should list folders root first in pre-order', async () => {
    await createTestFile(path.join(tempDir, 'a/b/f.txt'), 'f');
    await createTestFile(path.join(tempDir, 'c/g.txt'), 'g');

    const { directories } = await collectSizeGroups(tempDir);

    expect(directories).toEqual([
      tempDir,
      path.join(tempDir, 'a'),
      path.join(tempDir, 'a/b'),
      path.join(tempDir, 'c')
    ]);
  });

  it('should record but not descend into subfolders when scanSubfolders is false', async () => {
    await createTestFile(path.join(tempDir, 'top.txt'), 'top');
    await createTestFile(path.join(tempDir, 'a/b/deep.txt'), 'top');

    const { sizeGroups, directories } = await collectSizeGroups(tempDir, { scanSubfolders: false });

    expect(sizeGroups.get(3)).toEqual([path.join(tempDir, 'top.txt')]);
    expect(directories).toEqual([tempDir, path.join(tempDir, 'a')]);
  });

  it('should fail when the root is inaccessible', async () => {
    await expect(collectSizeGroups(path.join(tempDir, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should handle empty directory', async () => {
    const { sizeGroups, directories, errors } = await collectSizeGroups(tempDir);
    expect(sizeGroups.size).toBe(0);
    expect(directories).toEqual([tempDir]);
    expect(errors).toEqual([]);
  });

  it('should handle zero-byte files', async () => {
    await createTestFile(path.join(tempDir, 'empty1.txt'), '');
    await createTestFile(path.join(tempDir, 'empty2.txt'), '');

    const { sizeGroups } = await collectSizeGroups(tempDir);

    expect(sizeGroups.get(0)).toHaveLength(2);
  });
});

describe('countItems', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should count files and folders below the root', async () => {
    await createTestFile(path.join(tempDir, 'a.txt'), 'a');
    await createTestFile(path.join(tempDir, 'sub/b.txt'), 'b');
    await createTestFile(path.join(tempDir, 'sub/inner/c.txt'), 'c');
    await createDir(path.join(tempDir, 'empty'));

    expect(await countItems(tempDir)).toEqual({ files: 3, dirs: 3 });
  });

  it('should return zero counts for a missing root', async () => {
    expect(await countItems(path.join(tempDir, 'missing'))).toEqual({ files: 0, dirs: 0 });
  });
});
