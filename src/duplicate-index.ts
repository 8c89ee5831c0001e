import fs from "fs";
import path from "path";
import { z } from "zod";
import { INDEX_FORMAT_VERSION } from "./config";
import { CorruptStateError, errorMessage, NotFoundError, toIOError } from "./errors";
import { silentLogger, type Logger } from "./logger";
import type { ContentHash, DuplicateGroups, IndexData, IndexKind } from "./types";

const fsp = fs.promises;

const INDEX_KINDS: readonly IndexKind[] = ["files", "dirs"];

const bucketsSchema = z.record(z.string(), z.array(z.string()));

/**
 * On-disk shape of the index. Both mappings must be present; anything else is
 * treated as corrupt.
 */
export const persistedIndexSchema = z.object({
  version: z.number().int().optional(),
  files: bucketsSchema,
  dirs: bucketsSchema
});

export type PersistedIndex = z.infer<typeof persistedIndexSchema>;

export function createEmptyIndex(): IndexData {
  return { files: new Map(), dirs: new Map() };
}

/**
 * The first-discovered path of a bucket. By convention it is the copy that is
 * kept when the others are deleted.
 */
export function canonicalMember(paths: readonly string[]): string | undefined {
  return paths[0];
}

/** Every member except the canonical one, in bucket order. */
export function redundantMembers(paths: readonly string[]): string[] {
  return paths.slice(1);
}

/**
 * Parses the serialized index.
 *
 * @throws CorruptStateError on invalid JSON or a schema mismatch
 */
export function parseIndex(raw: string, statePath: string): PersistedIndex {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CorruptStateError(`Index ${statePath} is not valid JSON: ${errorMessage(err)}`, statePath, err);
  }

  const parsed = persistedIndexSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "root";
    throw new CorruptStateError(
      `Index ${statePath} has an unexpected shape at ${where}: ${issue?.message ?? "invalid"}`,
      statePath,
      parsed.error
    );
  }
  return parsed.data;
}

export interface DuplicateIndexOptions {
  /** File the index is loaded from and saved to */
  indexPath: string;
  logger?: Logger;
}

/**
 * Persisted hash -> paths store for files and folders.
 *
 * A path lives in at most one bucket per mapping and at most once in that
 * bucket. Buckets keep insertion order, which is discovery order, so the
 * first member is the canonical one.
 *
 * The store is advisory: a missing or unreadable file loads as an empty index.
 * Only one writer should use a given index file at a time.
 */
export class DuplicateIndex {
  readonly indexPath: string;
  private readonly logger: Logger;
  private data: IndexData = createEmptyIndex();
  private readonly owners: Record<IndexKind, Map<string, ContentHash>> = {
    files: new Map(),
    dirs: new Map()
  };

  constructor(options: DuplicateIndexOptions) {
    this.indexPath = path.resolve(options.indexPath);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Replaces the in-memory state with the persisted one. A missing, corrupt or
   * mismatched file yields an empty index instead of an error.
   */
  async load(): Promise<IndexData> {
    this.reset();

    let raw: string;
    try {
      raw = await fsp.readFile(this.indexPath, "utf8");
    } catch (err) {
      const ioError = toIOError(err, this.indexPath);
      if (ioError instanceof NotFoundError) {
        this.logger.debug(`No index at ${this.indexPath}, starting empty`);
      } else {
        this.logger.warn(`Cannot read index: ${ioError.message}; starting empty`);
      }
      return this.data;
    }

    let persisted: PersistedIndex;
    try {
      persisted = parseIndex(raw, this.indexPath);
    } catch (err) {
      this.logger.warn(`${errorMessage(err)}; starting with an empty index`);
      return this.data;
    }

    for (const kind of INDEX_KINDS) {
      for (const [hash, paths] of Object.entries(persisted[kind])) {
        for (const itemPath of paths) {
          this.insert(kind, hash, itemPath);
        }
      }
    }
    this.logger.debug(
      `Loaded index ${this.indexPath}: ${this.data.files.size} file buckets, ${this.data.dirs.size} folder buckets`
    );
    return this.data;
  }

  /**
   * Writes the whole index to a temporary file and renames it over the old
   * one, so a crash never leaves a half-written index behind.
   *
   * @throws IOError when the index cannot be written
   */
  async save(): Promise<void> {
    const payload: PersistedIndex = {
      version: INDEX_FORMAT_VERSION,
      files: Object.fromEntries(this.data.files),
      dirs: Object.fromEntries(this.data.dirs)
    };
    const tempPath = `${this.indexPath}.${process.pid}.tmp`;

    try {
      await fsp.mkdir(path.dirname(this.indexPath), { recursive: true });
      await fsp.writeFile(tempPath, JSON.stringify(payload), "utf8");
      await fsp.rename(tempPath, this.indexPath);
    } catch (err) {
      await fsp.rm(tempPath, { force: true }).catch(() => undefined);
      throw toIOError(err, this.indexPath);
    }
  }

  /** Empties both mappings and persists the empty index. */
  async clear(): Promise<void> {
    this.reset();
    await this.save();
  }

  /**
   * Appends a path to a bucket, creating the bucket if needed. A path already
   * recorded under another hash moves to the new bucket.
   */
  insert(kind: IndexKind, hash: ContentHash, itemPath: string): void {
    const previous = this.owners[kind].get(itemPath);
    if (previous === hash) {
      return;
    }
    if (previous !== undefined) {
      this.detach(kind, previous, itemPath, 1);
    }

    const bucket = this.data[kind].get(hash);
    if (bucket) {
      bucket.push(itemPath);
    } else {
      this.data[kind].set(hash, [itemPath]);
    }
    this.owners[kind].set(itemPath, hash);
  }

  /**
   * Drops a path from the first mapping (files, then folders) that holds it.
   * A bucket left with fewer than two members is deleted entirely.
   *
   * @returns The mapping the path was removed from, or null when it was not indexed
   */
  removePath(itemPath: string): IndexKind | null {
    const target = path.resolve(itemPath);
    for (const kind of INDEX_KINDS) {
      const hash = this.owners[kind].get(target);
      if (hash !== undefined) {
        this.detach(kind, hash, target, 2);
        return kind;
      }
    }
    return null;
  }

  /**
   * Drops a folder and every indexed path beneath it, from both mappings.
   *
   * By default a bucket is collapsed as in {@link removePath}. With
   * `collapse: false` a bucket is deleted only once it is empty, so partners
   * outside the folder stay indexed; a rescan uses this to forget what it is
   * about to hash again.
   *
   * @returns Number of entries removed (collapsed partners not included)
   */
  removeTree(dirPath: string, options: { collapse?: boolean } = {}): number {
    const root = path.resolve(dirPath);
    const prefix = root.endsWith(path.sep) ? root : root + path.sep;
    const minRemaining = options.collapse === false ? 1 : 2;
    let removed = 0;

    for (const kind of INDEX_KINDS) {
      const inside = [...this.owners[kind].keys()].filter((p) => p === root || p.startsWith(prefix));
      for (const itemPath of inside) {
        const hash = this.owners[kind].get(itemPath);
        if (hash !== undefined) {
          this.detach(kind, hash, itemPath, minRemaining);
          removed++;
        }
      }
    }
    return removed;
  }

  /** Buckets with two or more members, copied so callers cannot mutate the index. */
  detectDuplicates(): DuplicateGroups {
    const duplicates = createEmptyIndex();
    for (const kind of INDEX_KINDS) {
      for (const [hash, paths] of this.data[kind]) {
        if (paths.length > 1) {
          duplicates[kind].set(hash, [...paths]);
        }
      }
    }
    return duplicates;
  }

  /** Hash a path is currently recorded under, if any. */
  hashOf(kind: IndexKind, itemPath: string): ContentHash | undefined {
    return this.owners[kind].get(path.resolve(itemPath));
  }

  bucket(kind: IndexKind, hash: ContentHash): readonly string[] | undefined {
    return this.data[kind].get(hash);
  }

  bucketCount(kind: IndexKind): number {
    return this.data[kind].size;
  }

  private reset(): void {
    this.data = createEmptyIndex();
    this.owners.files.clear();
    this.owners.dirs.clear();
  }

  private detach(kind: IndexKind, hash: ContentHash, itemPath: string, minRemaining: number): void {
    const bucket = this.data[kind].get(hash);
    this.owners[kind].delete(itemPath);
    if (!bucket) {
      return;
    }

    const position = bucket.indexOf(itemPath);
    if (position >= 0) {
      bucket.splice(position, 1);
    }

    if (bucket.length < minRemaining) {
      for (const remaining of bucket) {
        this.owners[kind].delete(remaining);
      }
      this.data[kind].delete(hash);
    }
  }
}
