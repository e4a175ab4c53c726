import path from "path";

/**
 * Interface for progress reporting during a duration run.
 */
export interface ProgressReporter {
  /** Called when directory scanning begins */
  startScanning(): void;

  /** Called periodically during directory scanning with the audio file count */
  updateScanning(filesFound: number): void;

  /** Called when directory scanning completes */
  endScanning(totalFiles: number): void;

  /** Called before the first job is handed to the workers */
  startProcessing(totalFiles: number, workerCount: number): void;

  /** Called once per finished job, failed or not. Workers call it concurrently. */
  advance(currentFile?: string): void;

  /** Called after the last result has been collected */
  endProcessing(): void;
}

const BAR_WIDTH = 40;

/**
 * Renders a `[=====>    ] completed/total` bar.
 */
export function renderBar(completed: number, total: number, width = BAR_WIDTH): string {
  const ratio = total > 0 ? Math.min(1, completed / total) : 1;
  const filled = Math.floor(ratio * width);
  const head = filled < width ? ">" : "";
  const body = "=".repeat(filled);
  const padding = " ".repeat(width - filled - head.length);
  const percent = (ratio * 100).toFixed(1);
  return `[${body}${head}${padding}] ${completed}/${total} (${percent}%)`;
}

/**
 * Progress reporter that outputs to stderr with throttled updates.
 * Updates are throttled to avoid excessive I/O during fast operations.
 */
class StderrProgressReporter implements ProgressReporter {
  private lastUpdate = 0;
  private readonly UPDATE_INTERVAL_MS = 100; // Throttle to 10 updates/sec
  private completed = 0;
  private total = 0;

  startScanning(): void {
    process.stderr.write("Scanning directory...\n");
  }

  updateScanning(filesFound: number): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.UPDATE_INTERVAL_MS) return;
    this.lastUpdate = now;

    process.stderr.write(`\rAudio files found: ${filesFound}`);
  }

  endScanning(totalFiles: number): void {
    process.stderr.write(`\rAudio files found: ${totalFiles}\n`);
  }

  startProcessing(totalFiles: number, _workerCount: number): void {
    this.completed = 0;
    this.total = totalFiles;
    this.lastUpdate = 0;
  }

  advance(currentFile?: string): void {
    this.completed++;

    const now = Date.now();
    const finished = this.completed >= this.total;
    if (!finished && now - this.lastUpdate < this.UPDATE_INTERVAL_MS) return;
    this.lastUpdate = now;

    const fileName = currentFile && !finished ? ` ${path.basename(currentFile)}` : "";
    // Pad with spaces to clear previous line
    process.stderr.write(`\r${renderBar(this.completed, this.total)}${fileName}` + " ".repeat(20));
  }

  endProcessing(): void {
    process.stderr.write("\n");
  }
}

/**
 * No-op progress reporter that produces no output.
 * Used when progress reporting is disabled (e.g., when stderr is not a terminal).
 */
class NoOpProgressReporter implements ProgressReporter {
  startScanning(): void {}
  updateScanning(_filesFound: number): void {}
  endScanning(_totalFiles: number): void {}
  startProcessing(_totalFiles: number, _workerCount: number): void {}
  advance(_currentFile?: string): void {}
  endProcessing(): void {}
}

/**
 * Creates a progress reporter based on whether progress should be enabled.
 *
 * @param enabled - Whether to enable progress reporting
 * @returns A ProgressReporter instance
 */
export function createProgressReporter(enabled: boolean): ProgressReporter {
  return enabled ? new StderrProgressReporter() : new NoOpProgressReporter();
}
