import fs from "fs";
import path from "path";
import { redundantMembers, type DuplicateIndex } from "./duplicate-index";
import { errorMessage, NotFoundError, toIOError } from "./errors";
import { getPathSize } from "./filters";
import { silentLogger, type Logger } from "./logger";
import type { DuplicateGroups } from "./types";

const fsp = fs.promises;

/**
 * `all` picks every non-canonical member. `smart` picks the non-canonical
 * members that sit in temp, download, cache or trash locations, or failing
 * that the most deeply nested ones.
 */
export type SelectionStrategy = "all" | "smart";

const DISPOSABLE_LOCATIONS = ["temp", "tmp", "cache", "download", "recyclebin", "recycle.bin", "trash"];

export type DeletionStatus = "deleted" | "missing" | "failed" | "dry-run";

export interface DeletionResult {
  path: string;
  status: DeletionStatus;
  /** Size before deletion; 0 when unknown */
  bytes: number;
  error?: string;
}

export interface DeletionReport {
  results: DeletionResult[];
  deleted: number;
  failed: number;
  freedBytes: number;
}

export interface DeleteOptions {
  dryRun?: boolean;
  logger?: Logger;
}

export function isDisposableLocation(itemPath: string): boolean {
  const lower = itemPath.toLowerCase();
  return DISPOSABLE_LOCATIONS.some((marker) => lower.includes(marker));
}

function pathDepth(itemPath: string): number {
  return itemPath.split(/[\\/]/).filter((part) => part.length > 0).length;
}

function pickSmart(candidates: string[]): string[] {
  if (candidates.length === 0) {
    return [];
  }

  const disposable = candidates.filter(isDisposableLocation);
  if (disposable.length > 0) {
    return disposable;
  }

  const deepest = Math.max(...candidates.map(pathDepth));
  return candidates.filter((p) => pathDepth(p) === deepest);
}

/**
 * Paths to delete from each group, folders first. The canonical member of a
 * group is never selected.
 */
export function selectRedundant(groups: DuplicateGroups, strategy: SelectionStrategy = "all"): string[] {
  const selected: string[] = [];
  for (const paths of [...groups.dirs.values(), ...groups.files.values()]) {
    const candidates = redundantMembers(paths);
    selected.push(...(strategy === "smart" ? pickSmart(candidates) : candidates));
  }
  return selected;
}

/**
 * Deletes each path (folders recursively) and drops it from the index right
 * after, so a following `detectDuplicates` never reports it. A failure is
 * recorded for that path and the batch carries on. Paths that no longer exist
 * are dropped from the index as well. The index is saved once at the end.
 *
 * @throws IOError when the index cannot be saved
 */
export async function deletePaths(
  index: DuplicateIndex,
  paths: string[],
  options: DeleteOptions = {}
): Promise<DeletionReport> {
  const { dryRun = false } = options;
  const logger = options.logger ?? silentLogger;
  const report: DeletionReport = { results: [], deleted: 0, failed: 0, freedBytes: 0 };

  for (const target of paths.map((p) => path.resolve(p))) {
    let stats: fs.Stats;
    try {
      stats = await fsp.lstat(target);
    } catch (err) {
      const ioError = toIOError(err, target);
      if (ioError instanceof NotFoundError) {
        if (!dryRun) {
          index.removeTree(target);
        }
        report.results.push({ path: target, status: "missing", bytes: 0 });
      } else {
        logger.error(`Error deleting ${target}: ${ioError.message}`);
        report.failed++;
        report.results.push({ path: target, status: "failed", bytes: 0, error: ioError.message });
      }
      continue;
    }

    const bytes = await getPathSize(target);
    if (dryRun) {
      report.results.push({ path: target, status: "dry-run", bytes });
      continue;
    }

    try {
      if (stats.isDirectory()) {
        await fsp.rm(target, { recursive: true });
      } else {
        await fsp.unlink(target);
      }
    } catch (err) {
      const message = errorMessage(err);
      logger.error(`Error deleting ${target}: ${message}`);
      report.failed++;
      report.results.push({ path: target, status: "failed", bytes, error: message });
      continue;
    }

    if (stats.isDirectory()) {
      index.removeTree(target);
    } else {
      index.removePath(target);
    }
    logger.info(`Deleted ${target}`);
    report.deleted++;
    report.freedBytes += bytes;
    report.results.push({ path: target, status: "deleted", bytes });
  }

  if (!dryRun) {
    await index.save();
  }
  return report;
}
