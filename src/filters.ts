import fs from "fs";
import path from "path";
import fileTypes from "./file-types.json";
import type { DuplicateGroups, IndexKind } from "./types";

const fsp = fs.promises;

export type FileTypeCategory = keyof typeof fileTypes;
export type FileTypeFilter = FileTypeCategory | "all";

export const PATH_SORT_KEYS = ["size", "name", "date-modified", "path", "none"] as const;
export type PathSortKey = (typeof PATH_SORT_KEYS)[number];

export const GROUP_SORT_KEYS = ["group_size", "count", "none"] as const;
export type GroupSortKey = (typeof GROUP_SORT_KEYS)[number];

export const FILE_TYPE_CATEGORIES = [
  "images",
  "videos",
  "documents",
  "audio",
  "archives",
  "code"
] as const satisfies readonly FileTypeCategory[];

export interface FilterOptions {
  /** Extension category applied to file groups; folder groups ignore it */
  fileType: FileTypeFilter;
  /** Bytes; file size for files, recursive total for folders */
  minSize: number;
  /** Substring looked for in the full path; empty matches everything */
  searchQuery: string;
  caseSensitive: boolean;
  sortBy: PathSortKey;
  /** Descending order (largest, newest, Z first) */
  reverse: boolean;
}

export const DEFAULT_FILTER_OPTIONS: FilterOptions = {
  fileType: "all",
  minSize: 0,
  searchQuery: "",
  caseSensitive: false,
  sortBy: "size",
  reverse: true
};

const SIZE_UNITS: Record<string, number> = {
  "": 1,
  B: 1,
  K: 1024,
  KB: 1024,
  M: 1024 ** 2,
  MB: 1024 ** 2,
  G: 1024 ** 3,
  GB: 1024 ** 3,
  T: 1024 ** 4,
  TB: 1024 ** 4
};

/**
 * Parses sizes such as "500", "10MB" or "5.5 gb" into bytes (powers of 1024).
 * Unparsable input gives 0.
 */
export function parseSize(input: string): number {
  const match = /^([\d.]+)\s*([KMGT]?B?)$/.exec(input.trim().toUpperCase());
  if (!match) {
    return 0;
  }

  const value = Number(match[1]);
  const multiplier = SIZE_UNITS[match[2]] ?? 1;
  return Number.isFinite(value) ? Math.floor(value * multiplier) : 0;
}

export function isFileTypeCategory(value: string): value is FileTypeCategory {
  return FILE_TYPE_CATEGORIES.some((category) => category === value);
}

export function isPathSortKey(value: string): value is PathSortKey {
  return PATH_SORT_KEYS.some((key) => key === value);
}

export function isGroupSortKey(value: string): value is GroupSortKey {
  return GROUP_SORT_KEYS.some((key) => key === value);
}

/**
 * Size of a file, or the summed size of every file below a folder. Symbolic
 * links are not followed. Paths that cannot be read count as 0.
 */
export async function getPathSize(itemPath: string): Promise<number> {
  let stats: fs.Stats;
  try {
    stats = await fsp.lstat(itemPath);
  } catch {
    return 0;
  }

  if (stats.isFile()) {
    return stats.size;
  }
  if (!stats.isDirectory()) {
    return 0;
  }

  let total = 0;
  const pending = [itemPath];
  while (pending.length > 0) {
    const dirPath = pending.pop();
    if (dirPath === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = await fsp.readdir(dirPath, { withFileTypes: true });
    } catch {
      continue;
    }

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.isFile()) {
        total += await fsp.stat(fullPath).then(
          (s) => s.size,
          () => 0
        );
      }
    }
  }
  return total;
}

export async function getModifiedTime(itemPath: string): Promise<number> {
  try {
    return (await fsp.stat(itemPath)).mtimeMs;
  } catch {
    return 0;
  }
}

export function filterByType(paths: string[], fileType: FileTypeFilter): string[] {
  if (fileType === "all") {
    return paths;
  }
  const extensions = new Set<string>(fileTypes[fileType]);
  return paths.filter((p) => extensions.has(path.extname(p).toLowerCase()));
}

export function searchPaths(paths: string[], query: string, caseSensitive = false): string[] {
  if (!query) {
    return paths;
  }
  if (caseSensitive) {
    return paths.filter((p) => p.includes(query));
  }
  const needle = query.toLowerCase();
  return paths.filter((p) => p.toLowerCase().includes(needle));
}

/** Memoized size and mtime lookups for one filter/sort pass. */
export class PathStats {
  private readonly sizes = new Map<string, Promise<number>>();
  private readonly mtimes = new Map<string, Promise<number>>();

  size(itemPath: string): Promise<number> {
    let size = this.sizes.get(itemPath);
    if (!size) {
      size = getPathSize(itemPath);
      this.sizes.set(itemPath, size);
    }
    return size;
  }

  modified(itemPath: string): Promise<number> {
    let mtime = this.mtimes.get(itemPath);
    if (!mtime) {
      mtime = getModifiedTime(itemPath);
      this.mtimes.set(itemPath, mtime);
    }
    return mtime;
  }
}

function compareKeys(a: number | string, b: number | string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function filterByMinSize(paths: string[], minSize: number, stats: PathStats): Promise<string[]> {
  if (minSize <= 0) {
    return paths;
  }
  const sizes = await Promise.all(paths.map((p) => stats.size(p)));
  return paths.filter((_, i) => sizes[i] >= minSize);
}

async function sortKey(itemPath: string, sortBy: PathSortKey, stats: PathStats): Promise<number | string> {
  switch (sortBy) {
    case "size":
      return stats.size(itemPath);
    case "date-modified":
      return stats.modified(itemPath);
    case "name":
      return path.basename(itemPath).toLowerCase();
    case "path":
      return itemPath.toLowerCase();
    case "none":
      return 0;
  }
}

/**
 * Sorts paths by the given key; ties keep their original order.
 */
export async function sortPaths(
  paths: string[],
  sortBy: PathSortKey,
  reverse = false,
  stats: PathStats = new PathStats()
): Promise<string[]> {
  if (sortBy === "none") {
    return [...paths];
  }
  const keys = await Promise.all(paths.map((p) => sortKey(p, sortBy, stats)));
  const order = paths.map((_, i) => i);
  order.sort((a, b) => {
    const cmp = compareKeys(keys[a], keys[b]);
    return reverse ? -cmp : cmp;
  });
  return order.map((i) => paths[i]);
}

/**
 * Narrows and orders duplicate groups for display.
 *
 * File groups go through the type filter, the minimum size and the path
 * search, in that order; folder groups skip the type filter. A group with
 * fewer than two surviving paths is dropped. Survivors are sorted within
 * their group; the groups themselves keep their order.
 */
export async function filterDuplicates(
  duplicates: DuplicateGroups,
  options: Partial<FilterOptions> = {}
): Promise<DuplicateGroups> {
  const opts: FilterOptions = { ...DEFAULT_FILTER_OPTIONS, ...options };
  const stats = new PathStats();
  const filtered: DuplicateGroups = { files: new Map(), dirs: new Map() };

  const kinds: IndexKind[] = ["files", "dirs"];
  for (const kind of kinds) {
    for (const [hash, paths] of duplicates[kind]) {
      let survivors = kind === "files" ? filterByType(paths, opts.fileType) : paths;
      survivors = await filterByMinSize(survivors, opts.minSize, stats);
      survivors = searchPaths(survivors, opts.searchQuery, opts.caseSensitive);

      if (survivors.length > 1) {
        filtered[kind].set(hash, await sortPaths(survivors, opts.sortBy, opts.reverse, stats));
      }
    }
  }

  return filtered;
}

/**
 * Reorders the groups themselves, largest first: by summed member size
 * (`group_size`) or by member count (`count`). `none` keeps insertion order.
 */
export async function sortGroups(duplicates: DuplicateGroups, sortBy: GroupSortKey = "none"): Promise<DuplicateGroups> {
  const stats = new PathStats();
  const sorted: DuplicateGroups = { files: new Map(), dirs: new Map() };

  const kinds: IndexKind[] = ["files", "dirs"];
  for (const kind of kinds) {
    const groups = [...duplicates[kind].entries()];
    let weights: number[];
    if (sortBy === "group_size") {
      weights = await Promise.all(
        groups.map(async ([, paths]) => {
          const sizes = await Promise.all(paths.map((p) => stats.size(p)));
          return sizes.reduce((sum, size) => sum + size, 0);
        })
      );
    } else if (sortBy === "count") {
      weights = groups.map(([, paths]) => paths.length);
    } else {
      weights = groups.map(() => 0);
    }

    const order = groups.map((_, i) => i);
    order.sort((a, b) => weights[b] - weights[a]);
    for (const i of order) {
      const [hash, paths] = groups[i];
      sorted[kind].set(hash, [...paths]);
    }
  }

  return sorted;
}
