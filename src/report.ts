import { redundantMembers } from "./duplicate-index";
import { PathStats } from "./filters";
import type { DuplicateGroups } from "./types";

const SIZE_LABELS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Statistics about a set of duplicate groups.
 */
export interface DuplicateSummary {
  /** Number of duplicate file groups */
  fileGroups: number;
  /** Number of duplicate folder groups */
  dirGroups: number;
  /** Total number of duplicate files (sum across all groups) */
  duplicateFiles: number;
  /** Total number of duplicate folders (sum across all groups) */
  duplicateDirs: number;
  /** Bytes freed by deleting every member except the canonical one */
  recoverableBytes: number;
}

/**
 * Human-readable size with two decimals, e.g. `formatSize(1536)` is "1.50 KB".
 */
export function formatSize(bytes: number): string {
  let value = bytes;
  for (const label of SIZE_LABELS) {
    if (value < 1024) {
      return `${value.toFixed(2)} ${label}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}

function formatSection(title: string, groups: Map<string, string[]>): string {
  if (groups.size === 0) {
    return "";
  }

  let section = `${title}:\n\n`;
  for (const [hash, paths] of groups) {
    section += `Hash: ${hash}\n`;
    for (const itemPath of paths) {
      section += `- ${itemPath}\n`;
    }
    section += "\n";
  }
  return section;
}

/**
 * Plain-text report: folder groups first, then file groups, each as a
 * `Hash:` line followed by one `- path` line per member. Empty when there
 * are no duplicates.
 */
export function formatDuplicatesReport(groups: DuplicateGroups): string {
  return formatSection("Duplicate folders", groups.dirs) + formatSection("Duplicate files", groups.files);
}

/**
 * Counts groups and members and adds up the recoverable space. Paths that
 * vanished count as 0 bytes.
 */
export async function summarizeDuplicates(groups: DuplicateGroups): Promise<DuplicateSummary> {
  const stats = new PathStats();
  const summary: DuplicateSummary = {
    fileGroups: groups.files.size,
    dirGroups: groups.dirs.size,
    duplicateFiles: 0,
    duplicateDirs: 0,
    recoverableBytes: 0
  };

  for (const paths of groups.files.values()) {
    summary.duplicateFiles += paths.length;
    for (const itemPath of redundantMembers(paths)) {
      summary.recoverableBytes += await stats.size(itemPath);
    }
  }

  for (const paths of groups.dirs.values()) {
    summary.duplicateDirs += paths.length;
    for (const itemPath of redundantMembers(paths)) {
      summary.recoverableBytes += await stats.size(itemPath);
    }
  }

  return summary;
}
