#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { Command, Option } from "commander";
import { resolveIndexPath } from "./config";
import { deletePaths, selectRedundant } from "./delete";
import { DuplicateIndex } from "./duplicate-index";
import { ScanEngine } from "./engine";
import { errorMessage } from "./errors";
import {
  FILE_TYPE_CATEGORIES,
  filterDuplicates,
  GROUP_SORT_KEYS,
  isFileTypeCategory,
  isGroupSortKey,
  isPathSortKey,
  parseSize,
  PATH_SORT_KEYS,
  sortGroups,
  type FilterOptions
} from "./filters";
import { ConsoleLogger, type Logger } from "./logger";
import { createProgressReporter } from "./progress";
import { formatDuplicatesReport, formatSize, summarizeDuplicates } from "./report";
import type { DuplicateGroups } from "./types";

const fsp = fs.promises;

interface CommonOptions {
  index?: string;
  verbose: boolean;
}

interface ScanCommandOptions extends CommonOptions {
  exclude: string[];
  types: string[];
  minSize: number;
  subfolders: boolean;
  hidden: boolean;
  dirs: boolean;
  simple: boolean;
  checkpoints: boolean;
  progress: boolean;
}

interface FilterCommandOptions extends CommonOptions {
  type: string;
  minSize: number;
  search: string;
  caseSensitive: boolean;
}

interface DetectCommandOptions extends FilterCommandOptions {
  sort: string;
  groupSort: string;
  ascending: boolean;
  output?: string;
}

interface DeleteCommandOptions extends FilterCommandOptions {
  smart: boolean;
  dryRun: boolean;
}

function collectList(value: string, previous: string[]): string[] {
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return [...previous, ...items];
}

function createLogger(options: CommonOptions): Logger {
  return new ConsoleLogger(options.verbose ? "debug" : "info");
}

async function openIndex(options: CommonOptions, logger: Logger): Promise<DuplicateIndex> {
  const index = new DuplicateIndex({ indexPath: resolveIndexPath(options.index), logger });
  await index.load();
  return index;
}

function toFilterOptions(options: FilterCommandOptions): Partial<FilterOptions> {
  return {
    fileType: isFileTypeCategory(options.type) ? options.type : "all",
    minSize: options.minSize,
    searchQuery: options.search,
    caseSensitive: options.caseSensitive
  };
}

function printGroups(groups: DuplicateGroups): void {
  if (groups.dirs.size === 0) {
    console.log("No duplicate folders found.");
  }
  if (groups.files.size === 0) {
    console.log("No duplicate files found.");
  }
  const report = formatDuplicatesReport(groups);
  if (report) {
    process.stdout.write(report);
  }
}

async function runScan(dirs: string[], options: ScanCommandOptions): Promise<void> {
  const logger = createLogger(options);
  const index = new DuplicateIndex({ indexPath: resolveIndexPath(options.index), logger });
  const progress = createProgressReporter(options.progress && Boolean(process.stderr.isTTY));
  const engine = new ScanEngine({ index, logger, progress });

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn("Stopping scan, keeping results so far...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    for (const dir of dirs) {
      if (controller.signal.aborted) break;
      const rootDir = path.resolve(dir);
      logger.info(`Processing directory: ${rootDir}`);

      if (options.simple) {
        await engine.recursiveHash(rootDir, { signal: controller.signal });
        continue;
      }

      const summary = await engine.scanOptimized(
        rootDir,
        {
          excludeFolders: options.exclude,
          fileTypeAllowList: options.types.length > 0 ? options.types : null,
          minSizeBytes: options.minSize,
          scanSubfolders: options.subfolders,
          includeHidden: options.hidden,
          includeDirs: options.dirs,
          checkpoints: options.checkpoints
        },
        controller.signal
      );

      const { stats } = summary;
      logger.info(
        `${stats.filesScanned} files scanned, ${stats.uniqueBySize} unique by size, ` +
          `${stats.uniqueByQuickHash} unique by quick hash`
      );
      if (stats.errorCount > 0) {
        logger.warn(`${stats.errorCount} items skipped`);
        for (const skipped of stats.skippedItems) {
          logger.debug(`Skipped: ${skipped}`);
        }
      }
    }
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

async function runDetect(options: DetectCommandOptions): Promise<void> {
  const logger = createLogger(options);
  const index = await openIndex(options, logger);

  const filtered = await filterDuplicates(index.detectDuplicates(), {
    ...toFilterOptions(options),
    sortBy: isPathSortKey(options.sort) ? options.sort : "size",
    reverse: !options.ascending
  });
  const groups = await sortGroups(filtered, isGroupSortKey(options.groupSort) ? options.groupSort : "none");

  if (options.output) {
    const outputPath = path.resolve(options.output);
    await fsp.writeFile(outputPath, formatDuplicatesReport(groups), "utf8");
    console.log(`Duplicate report written to: ${outputPath}`);
  } else {
    printGroups(groups);
  }

  const summary = await summarizeDuplicates(groups);
  console.log(
    `\n${summary.fileGroups} file groups (${summary.duplicateFiles} files), ` +
      `${summary.dirGroups} folder groups (${summary.duplicateDirs} folders), ` +
      `${formatSize(summary.recoverableBytes)} recoverable`
  );
}

async function runDelete(options: DeleteCommandOptions): Promise<void> {
  const logger = createLogger(options);
  const index = await openIndex(options, logger);

  const groups = await filterDuplicates(index.detectDuplicates(), { ...toFilterOptions(options), sortBy: "none" });
  const targets = selectRedundant(groups, options.smart ? "smart" : "all");
  if (targets.length === 0) {
    console.log("Nothing to delete.");
    return;
  }

  const report = await deletePaths(index, targets, { dryRun: options.dryRun, logger });
  for (const result of report.results) {
    const suffix = result.error ? `: ${result.error}` : "";
    console.log(`${result.status.padEnd(8)} ${result.path}${suffix}`);
  }
  console.log(`\nDeleted ${report.deleted} item(s), freed ${formatSize(report.freedBytes)}`);
  if (report.failed > 0) {
    console.log(`Failed to delete ${report.failed} item(s)`);
    process.exitCode = 1;
  }
}

function addFilterOptions(command: Command): Command {
  return command
    .addOption(
      new Option("--type <category>", "only file groups of this type")
        .choices(["all", ...FILE_TYPE_CATEGORIES])
        .default("all")
    )
    .option("--min-size <size>", "minimum size, e.g. 500KB or 1MB", parseSize, 0)
    .option("--search <text>", "only paths containing this text", "")
    .option("--case-sensitive", "make --search case-sensitive", false);
}

function buildProgram(): Command {
  const program = new Command()
    .name("dupindex")
    .description("Find duplicate files and folders by content, incrementally.");

  program
    .command("scan")
    .description("Hash the given directories into the index")
    .argument("<dirs...>", "directories to scan")
    .option("--index <file>", "index file (default: $DUPINDEX_FILE or ./hashes.json)")
    .option("-e, --exclude <folders>", "folder names or paths to skip (repeat or comma-separated)", collectList, [])
    .option("-t, --types <extensions>", "only these extensions (repeat or comma-separated)", collectList, [])
    .option("--min-size <size>", "ignore files smaller than this, e.g. 10KB", parseSize, 0)
    .option("--no-subfolders", "do not descend into subfolders")
    .option("--hidden", "include hidden files and folders", false)
    .option("--dirs", "also detect duplicate folders", false)
    .option("--simple", "hash every file and folder without size pre-filtering", false)
    .option("--checkpoints", "save the index after every hashing phase", false)
    .option("--no-progress", "do not show progress")
    .option("-v, --verbose", "enable verbose output", false)
    .action((dirs: string[], options: ScanCommandOptions) => runScan(dirs, options));

  addFilterOptions(
    program
      .command("detect")
      .description("Print duplicate groups recorded in the index")
      .option("--index <file>", "index file (default: $DUPINDEX_FILE or ./hashes.json)")
  )
    .addOption(new Option("--sort <key>", "order of paths within a group").choices(PATH_SORT_KEYS).default("size"))
    .addOption(new Option("--group-sort <key>", "order of the groups").choices(GROUP_SORT_KEYS).default("none"))
    .option("--ascending", "sort smallest/oldest/A first", false)
    .option("-o, --output <file>", "write the report to a file")
    .option("-v, --verbose", "enable verbose output", false)
    .action((options: DetectCommandOptions) => runDetect(options));

  addFilterOptions(
    program
      .command("delete")
      .description("Delete redundant copies, keeping the first-discovered member of each group")
      .option("--index <file>", "index file (default: $DUPINDEX_FILE or ./hashes.json)")
  )
    .option("--smart", "only delete copies in temp/download/trash locations or the deepest copies", false)
    .option("--dry-run", "list what would be deleted", false)
    .option("-v, --verbose", "enable verbose output", false)
    .action((options: DeleteCommandOptions) => runDelete(options));

  program
    .command("count")
    .description("Count files and folders below a directory")
    .argument("<dir>", "directory to count")
    .option("--hidden", "include hidden files and folders", false)
    .action(async (dir: string, options: { hidden: boolean }) => {
      const engine = new ScanEngine({ index: new DuplicateIndex({ indexPath: resolveIndexPath() }) });
      const counts = await engine.countItems(dir, { includeHidden: options.hidden });
      console.log(`${counts.files} files, ${counts.dirs} folders`);
    });

  program
    .command("clear")
    .description("Clear all stored hashes")
    .option("--index <file>", "index file (default: $DUPINDEX_FILE or ./hashes.json)")
    .option("-v, --verbose", "enable verbose output", false)
    .action(async (options: CommonOptions) => {
      const logger = createLogger(options);
      const index = new DuplicateIndex({ indexPath: resolveIndexPath(options.index), logger });
      await index.clear();
      logger.info(`Cleared ${index.indexPath}`);
    });

  return program;
}

async function main(): Promise<void> {
  await buildProgram().parseAsync(process.argv);
}

main().catch((err) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
