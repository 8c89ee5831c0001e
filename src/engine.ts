import fs from "fs";
import path from "path";
import { HASH_CONCURRENCY, LARGE_FILE_THRESHOLD, MAX_SKIPPED_ITEMS, resolveScanOptions } from "./config";
import type { DuplicateIndex } from "./duplicate-index";
import { errorMessage, ScanInProgressError, toIOError } from "./errors";
import { ContentHasher, EMPTY_HASH, HASH_CANCELLED, mapWithConcurrency, type HashOutcome } from "./hash";
import { silentLogger, type Logger } from "./logger";
import type { HashPhase, ProgressReporter } from "./progress";
import { collectSizeGroups, countItems, readChildren, type ChildEntries } from "./scan";
import type { ContentHash, ItemCounts, ScanOptions, ScanState, ScanStats, ScanSummary } from "./types";

const fsp = fs.promises;

export interface ScanEngineOptions {
  index: DuplicateIndex;
  hasher?: ContentHasher;
  logger?: Logger;
  progress?: ProgressReporter;
  /** Files hashed in parallel within a phase */
  concurrency?: number;
}

export interface RecursiveHashOptions {
  signal?: AbortSignal;
  /** Paths left out of the tree hash, in addition to the index file */
  excludePaths?: string[];
}

interface TreeFrame {
  dirPath: string;
  children: Array<{ itemPath: string; isDirectory: boolean }>;
  next: number;
  childHashes: ContentHash[];
}

function emptyStats(): ScanStats {
  return {
    fileCount: 0,
    dirCount: 0,
    errorCount: 0,
    skippedItems: [],
    filesScanned: 0,
    uniqueBySize: 0,
    quickHashed: 0,
    uniqueByQuickHash: 0
  };
}

/**
 * Finds duplicate content below a root and records it in a {@link DuplicateIndex}.
 *
 * An optimized scan runs through these states:
 * collecting -> hashing-small -> quick-hashing -> full-hashing -> [dir-hashing]
 * -> flushing -> done. Aborting the signal leads to `cancelled` from any of
 * them, after the work done so far has been flushed.
 *
 * One scan at a time per engine. `stats` and `state` may be read while a
 * scan is running; `stats` returns a snapshot.
 */
export class ScanEngine {
  private readonly index: DuplicateIndex;
  private readonly hasher: ContentHasher;
  private readonly logger: Logger;
  private readonly progress: ProgressReporter | undefined;
  private readonly concurrency: number;
  private currentState: ScanState = "idle";
  private counters: ScanStats = emptyStats();
  private running = false;

  constructor(options: ScanEngineOptions) {
    this.index = options.index;
    this.hasher = options.hasher ?? new ContentHasher();
    this.logger = options.logger ?? silentLogger;
    this.progress = options.progress;
    this.concurrency = Math.max(1, options.concurrency ?? HASH_CONCURRENCY);
  }

  get state(): ScanState {
    return this.currentState;
  }

  get stats(): ScanStats {
    return { ...this.counters, skippedItems: [...this.counters.skippedItems] };
  }

  /**
   * Size-bucketed scan: only files sharing a size with another file are read,
   * and files above 1 MiB are quick-hashed first so that a unique prefix spares
   * the full hash.
   *
   * Entries already indexed below the root are forgotten once the walk has
   * succeeded, so after the scan only hashes confirmed by it remain there. A
   * file that changed or vanished since the last scan is never reported from
   * stale data. Entries outside the root are kept.
   *
   * @throws IOError when the root is inaccessible or the index cannot be saved
   */
  async scanOptimized(
    rootDir: string,
    options: Partial<ScanOptions> = {},
    signal?: AbortSignal
  ): Promise<ScanSummary> {
    this.begin();
    try {
      await this.index.load();
      const resolved = resolveScanOptions(options);
      const opts: ScanOptions = {
        ...resolved,
        excludePaths: [...resolved.excludePaths, this.index.indexPath]
      };

      this.transition("collecting");
      const collected = await collectSizeGroups(rootDir, opts, {
        progress: this.progress,
        logger: this.logger,
        signal
      });
      this.counters.filesScanned = collected.filesSeen;
      for (const item of collected.errors) {
        this.recordSkip(item.path);
      }
      if (signal?.aborted) {
        return await this.finish("cancelled");
      }
      const forgotten = this.index.removeTree(rootDir, { collapse: false });
      this.logger.debug(`Forgot ${forgotten} indexed entries below ${path.resolve(rootDir)}`);

      const small: string[] = [];
      const largeGroups: string[][] = [];
      for (const [size, files] of collected.sizeGroups) {
        if (files.length < 2) {
          this.counters.uniqueBySize += files.length;
        } else if (size > LARGE_FILE_THRESHOLD) {
          largeGroups.push(files);
        } else {
          small.push(...files);
        }
      }

      const fileHashes = new Map<string, ContentHash>();

      this.transition("hashing-small");
      await this.hashAndRecord(small, "small files", fileHashes, signal);
      if (signal?.aborted) {
        return await this.finish("cancelled");
      }
      await this.checkpoint(opts);

      this.transition("quick-hashing");
      const confirmed = await this.prefilterByQuickHash(largeGroups, signal);
      if (signal?.aborted) {
        return await this.finish("cancelled");
      }

      this.transition("full-hashing");
      await this.hashAndRecord(confirmed, "full hashes", fileHashes, signal);
      if (signal?.aborted) {
        return await this.finish("cancelled");
      }

      if (opts.includeDirs) {
        await this.checkpoint(opts);
        this.transition("dir-hashing");
        await this.hashDirectories(collected.directories, opts, fileHashes, signal);
        if (signal?.aborted) {
          return await this.finish("cancelled");
        }
      }

      return await this.finish("done");
    } catch (err) {
      this.currentState = "idle";
      throw err;
    } finally {
      this.running = false;
    }
  }

  /**
   * Hashes every file and folder below a path, bottom-up, without any size
   * pre-filter. Hidden entries are included; symbolic links are not followed.
   * Entries that vanish or cannot be read are skipped and left out of their
   * parent's hash.
   *
   * @returns Hash of the path, or null when the scan was cancelled
   * @throws IOError when the path itself is inaccessible (for a file root, also
   *   when it cannot be read) or the index cannot be saved
   */
  async recursiveHash(targetPath: string, options: RecursiveHashOptions = {}): Promise<ContentHash | null> {
    const { signal } = options;
    this.begin();
    try {
      await this.index.load();
      const root = path.resolve(targetPath);
      const excluded = new Set([this.index.indexPath, ...(options.excludePaths ?? []).map((p) => path.resolve(p))]);

      let rootStats: fs.Stats;
      try {
        rootStats = await fsp.lstat(root);
      } catch (err) {
        throw toIOError(err, root);
      }

      this.transition("full-hashing");
      if (!rootStats.isDirectory()) {
        let hash: HashOutcome;
        try {
          hash = await this.hasher.fullHash(root, signal);
        } catch (err) {
          throw toIOError(err, root);
        }
        if (hash === HASH_CANCELLED) {
          await this.finish("cancelled");
          return null;
        }
        this.index.insert("files", hash, root);
        this.counters.fileCount++;
        await this.finish("done");
        return hash;
      }

      const openFrame = async (dirPath: string): Promise<TreeFrame> => {
        const entries = await readChildren(dirPath, { includeHidden: true });
        return {
          dirPath,
          children: [
            ...entries.files.map((itemPath) => ({ itemPath, isDirectory: false })),
            ...entries.dirs.map((itemPath) => ({ itemPath, isDirectory: true }))
          ],
          next: 0,
          childHashes: []
        };
      };

      const stack: TreeFrame[] = [await openFrame(root)];
      let rootHash: ContentHash | null = null;

      while (stack.length > 0) {
        if (signal?.aborted) {
          await this.finish("cancelled");
          return null;
        }

        const frame = stack[stack.length - 1];
        if (frame.next >= frame.children.length) {
          stack.pop();
          const dirHash = this.hasher.hashOfHashes(frame.childHashes);
          this.index.insert("dirs", dirHash, frame.dirPath);
          this.counters.dirCount++;
          const parent = stack[stack.length - 1];
          if (parent) {
            parent.childHashes.push(dirHash);
          } else {
            rootHash = dirHash;
          }
          continue;
        }

        const child = frame.children[frame.next];
        frame.next++;
        if (excluded.has(child.itemPath)) {
          continue;
        }

        if (child.isDirectory) {
          try {
            stack.push(await openFrame(child.itemPath));
          } catch (err) {
            this.recordFailure(child.itemPath, err);
          }
          continue;
        }

        const hash = await this.hashOne(child.itemPath, signal);
        if (hash !== null) {
          this.index.insert("files", hash, child.itemPath);
          this.counters.fileCount++;
          frame.childHashes.push(hash);
        }
      }

      await this.finish("done");
      return rootHash;
    } catch (err) {
      this.currentState = "idle";
      throw err;
    } finally {
      this.running = false;
    }
  }

  /** Cheap pre-pass for progress sizing; see {@link countItems}. */
  countItems(rootDir: string, options: Partial<ScanOptions> = {}): Promise<ItemCounts> {
    return countItems(rootDir, options);
  }

  private begin(): void {
    if (this.running) {
      throw new ScanInProgressError();
    }
    this.running = true;
    this.counters = emptyStats();
    this.currentState = "idle";
  }

  private transition(next: ScanState): void {
    this.logger.debug(`Scan state: ${this.currentState} -> ${next}`);
    this.currentState = next;
  }

  private async finish(state: "done" | "cancelled"): Promise<ScanSummary> {
    this.transition("flushing");
    await this.index.save();
    this.transition(state);

    const { fileCount, dirCount, errorCount } = this.counters;
    const verb = state === "cancelled" ? "cancelled" : "finished";
    this.logger.info(`Scan ${verb}: ${fileCount} files and ${dirCount} folders hashed, ${errorCount} skipped`);
    return { state, stats: this.stats };
  }

  private async checkpoint(opts: ScanOptions): Promise<void> {
    if (opts.checkpoints) {
      await this.index.save();
    }
  }

  private recordSkip(itemPath: string): void {
    this.counters.errorCount++;
    if (this.counters.skippedItems.length < MAX_SKIPPED_ITEMS) {
      this.counters.skippedItems.push(itemPath);
    }
  }

  private recordFailure(itemPath: string, err: unknown): void {
    this.logger.warn(`Skipping ${itemPath}: ${errorMessage(err)}`);
    this.recordSkip(itemPath);
  }

  /** Full hash of one file; null when it failed (recorded) or was cancelled. */
  private async hashOne(filePath: string, signal?: AbortSignal): Promise<ContentHash | null> {
    try {
      const outcome = await this.hasher.fullHash(filePath, signal);
      return outcome === HASH_CANCELLED ? null : outcome;
    } catch (err) {
      this.recordFailure(filePath, err);
      return null;
    }
  }

  /**
   * Full-hashes a batch and records the results in discovery order. Files that
   * fail are skipped; once the signal aborts no new file is started.
   */
  private async hashAndRecord(
    files: string[],
    phase: HashPhase,
    fileHashes: Map<string, ContentHash>,
    signal?: AbortSignal
  ): Promise<void> {
    if (files.length === 0) {
      return;
    }

    this.progress?.startHashing(phase, files.length);
    const { results } = await mapWithConcurrency(
      files,
      this.concurrency,
      async (filePath) => (signal?.aborted ? null : this.hashOne(filePath, signal)),
      (completed, filePath) => this.progress?.updateHashing(completed, files.length, filePath)
    );
    this.progress?.endHashing();

    files.forEach((filePath, i) => {
      const hash = results[i];
      if (hash) {
        this.index.insert("files", hash, filePath);
        fileHashes.set(filePath, hash);
        this.counters.fileCount++;
      }
    });
  }

  /**
   * Quick-hashes large same-size files and keeps only those whose quick hash
   * is shared within their size group. When a quick hash fails (the empty
   * digest, which no file above the threshold can have) its whole size group
   * goes on to full hashing instead. Survivors keep discovery order.
   */
  private async prefilterByQuickHash(sizeGroups: string[][], signal?: AbortSignal): Promise<string[]> {
    const files = sizeGroups.flat();
    if (files.length === 0) {
      return [];
    }

    this.progress?.startHashing("quick hashes", files.length);
    const { results } = await mapWithConcurrency(
      files,
      this.concurrency,
      async (filePath) => (signal?.aborted ? null : this.hasher.quickHash(filePath)),
      (completed, filePath) => this.progress?.updateHashing(completed, files.length, filePath)
    );
    this.progress?.endHashing();

    const failedGroups = new Set<number>();
    const quickGroups = new Map<string, { groupIndex: number; members: string[] }>();
    let offset = 0;
    sizeGroups.forEach((group, groupIndex) => {
      for (const filePath of group) {
        const quick = results[offset];
        offset++;
        if (quick === null) {
          continue;
        }
        if (quick === EMPTY_HASH) {
          this.logger.debug(`Quick hash failed for ${filePath}, hashing its size group in full`);
          failedGroups.add(groupIndex);
          continue;
        }
        this.counters.quickHashed++;
        const key = `${groupIndex}:${quick}`;
        const entry = quickGroups.get(key);
        if (entry) {
          entry.members.push(filePath);
        } else {
          quickGroups.set(key, { groupIndex, members: [filePath] });
        }
      }
    });

    const confirmed = new Set<string>();
    for (const { groupIndex, members } of quickGroups.values()) {
      if (members.length < 2 && !failedGroups.has(groupIndex)) {
        this.counters.uniqueByQuickHash += members.length;
      } else {
        members.forEach((filePath) => confirmed.add(filePath));
      }
    }
    failedGroups.forEach((groupIndex) => sizeGroups[groupIndex].forEach((filePath) => confirmed.add(filePath)));
    return files.filter((filePath) => confirmed.has(filePath));
  }

  /**
   * Folder hashes computed bottom-up over the pre-order folder list, then
   * recorded in discovery order. A subfolder without a hash (unreadable, or
   * not descended into) is left out of its parent's hash.
   */
  private async hashDirectories(
    directories: string[],
    opts: ScanOptions,
    fileHashes: Map<string, ContentHash>,
    signal?: AbortSignal
  ): Promise<void> {
    const excluded = new Set(opts.excludePaths);
    const dirHashes = new Map<string, ContentHash>();

    this.progress?.startHashing("folders", directories.length);
    let completed = 0;
    for (let i = directories.length - 1; i >= 0; i--) {
      if (signal?.aborted) {
        break;
      }

      const dirPath = directories[i];
      let children: ChildEntries;
      try {
        children = await readChildren(dirPath, opts);
      } catch (err) {
        this.recordFailure(dirPath, err);
        continue;
      }

      const childHashes: Array<ContentHash | null> = [];
      for (const filePath of children.files) {
        if (excluded.has(filePath)) continue;
        let hash = fileHashes.get(filePath) ?? null;
        if (hash === null) {
          hash = await this.hashOne(filePath, signal);
          if (hash !== null) {
            fileHashes.set(filePath, hash);
          }
        }
        childHashes.push(hash);
      }
      for (const subDir of children.dirs) {
        childHashes.push(dirHashes.get(subDir) ?? null);
      }
      if (signal?.aborted) {
        break;
      }

      dirHashes.set(dirPath, this.hasher.hashOfHashes(childHashes));
      completed++;
      this.progress?.updateHashing(completed, directories.length, dirPath);
    }
    this.progress?.endHashing();

    for (const dirPath of directories) {
      const hash = dirHashes.get(dirPath);
      if (hash !== undefined) {
        this.index.insert("dirs", hash, dirPath);
        this.counters.dirCount++;
      }
    }
  }
}
