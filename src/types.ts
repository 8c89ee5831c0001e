/**
 * Hex-encoded SHA-256 digest (64 characters) identifying file or folder content.
 */
export type ContentHash = string;

/** Which mapping of the index an entry belongs to. */
export type IndexKind = "files" | "dirs";

/**
 * Both mappings of the duplicate index. Bucket order is insertion order:
 * the first path of a bucket is its canonical member.
 */
export interface IndexData {
  files: Map<ContentHash, string[]>;
  dirs: Map<ContentHash, string[]>;
}

/**
 * Buckets holding two or more paths. Same shape as the index itself.
 */
export type DuplicateGroups = IndexData;

/**
 * Options controlling which entries a scan considers.
 */
export interface ScanOptions {
  /** Folder names or path fragments to skip (case-insensitive substring match) */
  excludeFolders: string[];
  /** Normalized extensions (".jpg"); null scans every file type */
  fileTypeAllowList: string[] | null;
  /** Files smaller than this are ignored */
  minSizeBytes: number;
  /** Descend into subfolders of the root */
  scanSubfolders: boolean;
  /** Include dot-files and dot-folders */
  includeHidden: boolean;
  /** Compute folder hashes after the file phases */
  includeDirs: boolean;
  /** Absolute paths that are never scanned (typically the index file) */
  excludePaths: string[];
  /** Save the index after every hashing phase, not only at the end */
  checkpoints: boolean;
}

/**
 * An entry that was skipped because it could not be read.
 */
export interface ItemError {
  path: string;
  error: string;
}

/**
 * Output of the size-bucketing walk.
 */
export interface SizeIndex {
  /** File size in bytes to the paths of that size, in discovery order */
  sizeGroups: Map<number, string[]>;
  /** Every folder seen, root first, in pre-order */
  directories: string[];
  /** Number of files that passed the filters */
  filesSeen: number;
  /** Entries skipped because of I/O errors */
  errors: ItemError[];
}

export interface ItemCounts {
  files: number;
  dirs: number;
}

export type ScanState =
  | "idle"
  | "collecting"
  | "hashing-small"
  | "quick-hashing"
  | "full-hashing"
  | "dir-hashing"
  | "flushing"
  | "done"
  | "cancelled";

/**
 * Counters collected during a scan.
 */
export interface ScanStats {
  /** Files hashed and recorded in the index */
  fileCount: number;
  /** Folders hashed and recorded in the index */
  dirCount: number;
  /** Entries that failed with an I/O error */
  errorCount: number;
  /** Paths of skipped entries, bounded by MAX_SKIPPED_ITEMS */
  skippedItems: string[];
  /** Files that passed the walk filters */
  filesScanned: number;
  /** Files skipped because no other file had the same size */
  uniqueBySize: number;
  /** Large files whose quick hash succeeded */
  quickHashed: number;
  /** Large files skipped because their quick hash was unique */
  uniqueByQuickHash: number;
}

export interface ScanSummary {
  state: "done" | "cancelled";
  stats: ScanStats;
}

/**
 * Result of mapping items with concurrency, including both successes and errors.
 */
export interface MappedResult<T, R> {
  /** Array of results (null for failed items) */
  results: (R | null)[];
  /** Array of errors that occurred during mapping */
  errors: Array<{
    /** Index of the item that failed */
    index: number;
    /** The item that failed */
    item: T;
    /** The error that occurred */
    error: Error;
  }>;
}
