import os from "os";
import path from "path";
import type { ScanOptions } from "./types";

export const HASH_CONCURRENCY = Math.max(2, Math.min(8, os.cpus().length || 2));

/** Read size for streamed full hashes */
export const HASH_CHUNK_SIZE = 256 * 1024;

/** Prefix length digested by the quick hash */
export const QUICK_HASH_BYTES = 8192;

/** Files above this size are quick-hashed before any full hash */
export const LARGE_FILE_THRESHOLD = 1024 * 1024;

export const MAX_SKIPPED_ITEMS = 100;

export const DEFAULT_INDEX_FILE = "hashes.json";
export const INDEX_FILE_ENV = "DUPINDEX_FILE";
export const INDEX_FORMAT_VERSION = 1;

export const DEFAULT_SCAN_OPTIONS: ScanOptions = {
  excludeFolders: [],
  fileTypeAllowList: null,
  minSizeBytes: 0,
  scanSubfolders: true,
  includeHidden: false,
  includeDirs: false,
  excludePaths: [],
  checkpoints: false
};

/**
 * Lowercases an extension and gives it a leading dot ("JPG" -> ".jpg").
 */
export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

export function resolveScanOptions(options: Partial<ScanOptions> = {}): ScanOptions {
  const merged: ScanOptions = { ...DEFAULT_SCAN_OPTIONS, ...options };
  return {
    ...merged,
    excludeFolders: merged.excludeFolders.map((f) => f.trim()).filter((f) => f.length > 0),
    fileTypeAllowList: merged.fileTypeAllowList
      ? merged.fileTypeAllowList.filter((e) => e.trim().length > 0).map(normalizeExtension)
      : null,
    minSizeBytes: Math.max(0, Math.floor(merged.minSizeBytes)),
    excludePaths: merged.excludePaths.map((p) => path.resolve(p))
  };
}

/**
 * Index location: explicit argument, then $DUPINDEX_FILE, then ./hashes.json.
 */
export function resolveIndexPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  const candidate = explicit || env[INDEX_FILE_ENV] || DEFAULT_INDEX_FILE;
  return path.resolve(candidate);
}
