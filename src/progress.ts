import path from "path";

/** Hashing phases reported to the progress display. */
export type HashPhase = "small files" | "quick hashes" | "full hashes" | "folders";

/**
 * Receives walk and hashing events from the engine. Calls come from the
 * scanning task only.
 */
export interface ProgressReporter {
  startScanning(): void;

  /** Files accepted by the walk filters so far */
  updateScanning(filesFound: number): void;

  endScanning(totalFiles: number): void;

  startHashing(phase: HashPhase, total: number): void;

  /** `completed` of `total` items done in the current phase */
  updateHashing(completed: number, total: number, currentFile?: string): void;

  endHashing(): void;
}

/**
 * Rewrites a single stderr line, at most every 100 ms, except for phase
 * boundaries which are always printed.
 */
class StderrProgressReporter implements ProgressReporter {
  private lastUpdate = 0;
  private phase: HashPhase = "small files";
  private readonly UPDATE_INTERVAL_MS = 100;

  startScanning(): void {
    process.stderr.write("Scanning directory...\n");
  }

  updateScanning(filesFound: number): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.UPDATE_INTERVAL_MS) return;
    this.lastUpdate = now;

    process.stderr.write(`\rFiles found: ${filesFound}`);
  }

  endScanning(totalFiles: number): void {
    process.stderr.write(`\rFiles found: ${totalFiles}\n`);
  }

  startHashing(phase: HashPhase, total: number): void {
    this.phase = phase;
    process.stderr.write(`Hashing ${total} ${phase}...\n`);
  }

  updateHashing(completed: number, total: number, currentFile?: string): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.UPDATE_INTERVAL_MS) return;
    this.lastUpdate = now;

    const percent = total > 0 ? ((completed / total) * 100).toFixed(1) : "100.0";
    const fileName = currentFile ? path.basename(currentFile) : "";
    const display = fileName
      ? `\r${this.phase}: ${completed}/${total} (${percent}%) - ${fileName}`
      : `\r${this.phase}: ${completed}/${total} (${percent}%)`;

    process.stderr.write(display + " ".repeat(20));
  }

  endHashing(): void {
    process.stderr.write(`\r${this.phase} done.` + " ".repeat(50) + "\n");
  }
}

class NoOpProgressReporter implements ProgressReporter {
  startScanning(): void {}
  updateScanning(_filesFound: number): void {}
  endScanning(_totalFiles: number): void {}
  startHashing(_phase: HashPhase, _total: number): void {}
  updateHashing(_completed: number, _total: number, _currentFile?: string): void {}
  endHashing(): void {}
}

/** The CLI enables it only when stderr is a terminal. */
export function createProgressReporter(enabled: boolean): ProgressReporter {
  return enabled ? new StderrProgressReporter() : new NoOpProgressReporter();
}
