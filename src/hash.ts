import crypto from "crypto";
import fs from "fs";
import type { FileHandle } from "fs/promises";
import { HASH_CHUNK_SIZE, QUICK_HASH_BYTES } from "./config";
import { toIOError } from "./errors";
import type { ContentHash, MappedResult } from "./types";

const fsp = fs.promises;

/**
 * Returned by {@link ContentHasher.fullHash} when the signal aborted mid-stream.
 * Never equal to a real hash.
 */
export const HASH_CANCELLED = Symbol("hash-cancelled");

export type HashOutcome = ContentHash | typeof HASH_CANCELLED;

/** SHA-256 of zero bytes */
export const EMPTY_HASH: ContentHash = crypto.createHash("sha256").digest("hex");

/**
 * Content fingerprints for files and folders.
 *
 * All digests are SHA-256 in lowercase hex. Two inputs with the same digest are
 * treated as having identical content.
 */
export class ContentHasher {
  constructor(
    private readonly chunkSize: number = HASH_CHUNK_SIZE,
    private readonly quickHashBytes: number = QUICK_HASH_BYTES
  ) {}

  /**
   * Streams the whole file through SHA-256 without loading it into memory.
   *
   * The signal is checked before each chunk is digested; once aborted the
   * stream is torn down and {@link HASH_CANCELLED} is returned instead of a hash.
   *
   * @throws IOError (or NotFoundError / PermissionError) when the file cannot
   *   be opened or a read fails, including when the path is a folder
   *
   * @example
   * const hash = await hasher.fullHash('/path/to/file.txt');
   * if (hash !== HASH_CANCELLED) console.log(hash);
   */
  fullHash(filePath: string, signal?: AbortSignal): Promise<HashOutcome> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        resolve(HASH_CANCELLED);
        return;
      }

      const hash = crypto.createHash("sha256");
      const stream = fs.createReadStream(filePath, { highWaterMark: this.chunkSize });

      stream.on("error", (err) => reject(toIOError(err, filePath)));
      stream.on("data", (chunk) => {
        if (signal?.aborted) {
          stream.destroy();
          resolve(HASH_CANCELLED);
          return;
        }
        hash.update(chunk);
      });
      stream.on("end", () => resolve(hash.digest("hex")));
    });
  }

  /**
   * Digests at most the first 8192 bytes of a file.
   *
   * Only a pre-filter: equal quick hashes still need a full hash to confirm.
   * Any I/O failure yields {@link EMPTY_HASH}, so an unreadable file simply
   * loses the optimization and falls through to full hashing.
   */
  async quickHash(filePath: string): Promise<ContentHash> {
    let handle: FileHandle | undefined;
    try {
      handle = await fsp.open(filePath, "r");
      const buffer = Buffer.alloc(this.quickHashBytes);
      let filled = 0;
      while (filled < buffer.length) {
        const { bytesRead } = await handle.read(buffer, filled, buffer.length - filled, filled);
        if (bytesRead === 0) break;
        filled += bytesRead;
      }
      return crypto.createHash("sha256").update(buffer.subarray(0, filled)).digest("hex");
    } catch {
      return EMPTY_HASH;
    } finally {
      await handle?.close().catch(() => undefined);
    }
  }

  /**
   * Folder fingerprint: sorts the child hashes, concatenates them and digests the result.
   *
   * Null entries (children that failed to hash) are left out. With nothing left
   * the result is {@link EMPTY_HASH}, the same value an empty folder gets.
   * Child names play no part, so two folders whose children have the same
   * contents under different names hash the same.
   */
  hashOfHashes(hashes: ReadonlyArray<ContentHash | null | undefined>): ContentHash {
    const valid = hashes.filter((h): h is ContentHash => typeof h === "string").sort();
    const hash = crypto.createHash("sha256");
    for (const item of valid) {
      hash.update(item, "utf8");
    }
    return hash.digest("hex");
  }
}

/**
 * Maps items through an async function with controlled concurrency.
 *
 * This function processes items in parallel with a configurable concurrency limit,
 * preventing resource exhaustion while maintaining good throughput. All errors are
 * captured and returned rather than thrown, allowing partial results.
 *
 * @template T - Type of input items
 * @template R - Type of output results
 * @param items - Array of items to process
 * @param limit - Maximum number of concurrent operations (must be > 0)
 * @param mapper - Async function to transform each item (may return null or throw)
 * @param onProgress - Optional callback invoked after each item completes (completed count, current item)
 * @returns Results in input order (null for failed items) and the errors with their index and item
 *
 * @example
 * const { results, errors } = await mapWithConcurrency(
 *   files,
 *   4,
 *   async (file) => hasher.quickHash(file),
 *   (completed, file) => console.log(`Progress: ${completed}`)
 * );
 */
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  mapper: (item: T) => Promise<R | null>,
  onProgress?: (completed: number, item: T) => void
): Promise<MappedResult<T, R>> {
  const results: (R | null)[] = new Array(items.length).fill(null);
  const errors: MappedResult<T, R>["errors"] = [];
  let index = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        return;
      }

      try {
        results[current] = await mapper(items[current]);
      } catch (err) {
        results[current] = null;
        errors.push({
          index: current,
          item: items[current],
          error: err instanceof Error ? err : new Error(String(err))
        });
      }

      completed++;
      onProgress?.(completed, items[current]);
    }
  }

  const workers = Array.from({ length: Math.max(1, limit) }, () => worker());
  await Promise.all(workers);
  return { results, errors };
}
