import fs from "fs";
import path from "path";
import { resolveScanOptions } from "./config";
import { errorMessage, IOError, toIOError } from "./errors";
import type { Logger } from "./logger";
import type { ProgressReporter } from "./progress";
import type { ItemCounts, ItemError, ScanOptions, SizeIndex } from "./types";

const fsp = fs.promises;

export interface WalkOptions {
  /** Folder names or path fragments to skip with their whole subtree */
  excludeFolders?: readonly string[];
  includeHidden?: boolean;
  /** When false only the root's own entries are visited */
  scanSubfolders?: boolean;
  signal?: AbortSignal;
  /** Called for every folder below the root that is not excluded */
  onDirectory?: (dirPath: string) => void;
  /** Called for entries that could not be read; the walk continues */
  onError?: (itemPath: string, err: unknown) => void;
}

export interface ChildEntries {
  files: string[];
  dirs: string[];
}

export function isHidden(name: string): boolean {
  return name.startsWith(".");
}

/**
 * Case-insensitive folder exclusion. A pattern with a path separator is looked
 * for in the full path; a bare name is looked for in the folder's own name.
 *
 * A bare name is not matched against the full path. Every folder inside the
 * scan root is checked on its own as the walk reaches it, so the only folders
 * this leaves out are the root and its ancestors: scanning below `/tmp` with
 * `tmp` excluded still scans.
 */
export function isExcludedFolder(dirPath: string, excludeFolders: readonly string[]): boolean {
  if (excludeFolders.length === 0) {
    return false;
  }

  const name = path.basename(dirPath).toLowerCase();
  const fullPath = dirPath.toLowerCase();
  return excludeFolders.some((pattern) => {
    const needle = pattern.toLowerCase();
    return /[\\/]/.test(needle) ? fullPath.includes(needle) : name.includes(needle);
  });
}

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Throws unless the path is a real folder (symbolic links are refused).
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  let stats: fs.Stats;
  try {
    stats = await fsp.lstat(dirPath);
  } catch (err) {
    throw toIOError(err, dirPath);
  }

  if (stats.isSymbolicLink()) {
    throw new IOError(`${dirPath}: refusing to follow a symbolic link as the root directory`, dirPath);
  }

  if (!stats.isDirectory()) {
    throw new IOError(`${dirPath}: not a directory`, dirPath, { code: "ENOTDIR" });
  }
}

/**
 * Lists the immediate children of a folder, sorted by name, with the same
 * hidden/excluded/symlink rules the walk applies.
 *
 * @throws IOError when the folder cannot be read
 */
export async function readChildren(dirPath: string, options: WalkOptions = {}): Promise<ChildEntries> {
  const { excludeFolders = [], includeHidden = false } = options;

  let entries: fs.Dirent[];
  try {
    entries = await fsp.readdir(dirPath, { withFileTypes: true });
  } catch (err) {
    throw toIOError(err, dirPath);
  }
  entries.sort(byName);

  const children: ChildEntries = { files: [], dirs: [] };
  for (const entry of entries) {
    if (!includeHidden && isHidden(entry.name)) continue;
    if (entry.isSymbolicLink()) continue;

    const fullPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      if (!isExcludedFolder(fullPath, excludeFolders)) {
        children.dirs.push(fullPath);
      }
    } else if (entry.isFile()) {
      children.files.push(fullPath);
    }
  }
  return children;
}

/**
 * Walks a folder tree and invokes a callback for each regular file.
 *
 * Entries are visited in name order, so discovery order is stable across runs.
 * Symbolic links are never followed. Unreadable folders are reported through
 * `onError` and skipped; the walk never stops on a single bad entry.
 *
 * @example
 * await walkDirectory('/path/to/dir', async (filePath) => {
 *   console.log(`Found: ${filePath}`);
 * });
 */
export async function walkDirectory(
  rootDir: string,
  onFile: (filePath: string) => Promise<void> | void,
  options: WalkOptions = {}
): Promise<void> {
  const { scanSubfolders = true, signal } = options;

  async function walk(dirPath: string): Promise<void> {
    let children: ChildEntries;
    try {
      children = await readChildren(dirPath, options);
    } catch (err) {
      options.onError?.(dirPath, err);
      return;
    }

    for (const filePath of children.files) {
      if (signal?.aborted) return;
      await onFile(filePath);
    }

    for (const subDir of children.dirs) {
      if (signal?.aborted) return;
      options.onDirectory?.(subDir);
      if (scanSubfolders) {
        await walk(subDir);
      }
    }
  }

  await walk(rootDir);
}

export interface CollectContext {
  progress?: ProgressReporter;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Walks a folder and groups files by size without reading any content.
 *
 * Only files whose size is shared by another file can be duplicates, so the
 * size groups decide which files get hashed at all.
 *
 * @param rootDir - Folder to scan
 * @param options - Walk filters; unspecified fields take their defaults
 * @returns Size groups in discovery order, every folder seen (root first) and skipped entries
 * @throws IOError when the root itself is missing or not a folder
 *
 * @example
 * const { sizeGroups } = await collectSizeGroups('/path/to/dir', { fileTypeAllowList: ['.jpg'] });
 * for (const [size, files] of sizeGroups) {
 *   if (files.length > 1) console.log(`${files.length} files of size ${size} bytes`);
 * }
 */
export async function collectSizeGroups(
  rootDir: string,
  options: Partial<ScanOptions> = {},
  context: CollectContext = {}
): Promise<SizeIndex> {
  const opts = resolveScanOptions(options);
  const { progress, logger, signal } = context;
  const root = path.resolve(rootDir);
  await ensureDirectory(root);

  const sizeGroups = new Map<number, string[]>();
  const directories: string[] = [root];
  const errors: ItemError[] = [];
  const extSet = opts.fileTypeAllowList ? new Set(opts.fileTypeAllowList) : undefined;
  const excluded = new Set(opts.excludePaths);
  let fileCount = 0;

  const recordError = (itemPath: string, err: unknown) => {
    const message = errorMessage(err);
    logger?.warn(`Skipping ${itemPath}: ${message}`);
    errors.push({ path: itemPath, error: message });
  };

  progress?.startScanning();

  await walkDirectory(
    root,
    async (filePath) => {
      if (excluded.has(filePath)) {
        return;
      }

      if (extSet && !extSet.has(path.extname(filePath).toLowerCase())) {
        return;
      }

      let stats: fs.Stats;
      try {
        stats = await fsp.stat(filePath);
      } catch (err) {
        recordError(filePath, err);
        return;
      }

      if (!stats.isFile() || stats.size < opts.minSizeBytes) {
        return;
      }

      fileCount++;
      progress?.updateScanning(fileCount);

      const group = sizeGroups.get(stats.size);
      if (group) {
        group.push(filePath);
      } else {
        sizeGroups.set(stats.size, [filePath]);
      }
    },
    {
      excludeFolders: opts.excludeFolders,
      includeHidden: opts.includeHidden,
      scanSubfolders: opts.scanSubfolders,
      signal,
      onDirectory: (dirPath) => directories.push(dirPath),
      onError: recordError
    }
  );

  progress?.endScanning(fileCount);

  return { sizeGroups, directories, filesSeen: fileCount, errors };
}

/**
 * Counts files and folders below a root for progress sizing. The root itself
 * is not counted. Unreadable entries are ignored, so counts may be partial.
 */
export async function countItems(rootDir: string, options: Partial<ScanOptions> = {}): Promise<ItemCounts> {
  const opts = resolveScanOptions(options);
  const counts: ItemCounts = { files: 0, dirs: 0 };

  await walkDirectory(
    path.resolve(rootDir),
    () => {
      counts.files++;
    },
    {
      excludeFolders: opts.excludeFolders,
      includeHidden: opts.includeHidden,
      scanSubfolders: opts.scanSubfolders,
      onDirectory: () => {
        counts.dirs++;
      }
    }
  );

  return counts;
}
