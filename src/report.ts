import { aggregate } from "./aggregate";
import { Channel } from "./channel";
import { AUDIO_EXTENSIONS, resolveRunOptions } from "./config";
import { DurationResolver, runPool } from "./pool";
import { ProgressReporter } from "./progress";
import { collectAudioFiles } from "./scan";
import {
  AggregateOutcome,
  DurationReport,
  FileFailure,
  Job,
  Result,
  RunOptions,
  StatisticsRecord
} from "./types";

export interface PipelineOptions extends Partial<RunOptions> {
  progress?: ProgressReporter;
  /** Replaces the extension dispatcher, mainly for tests */
  resolve?: DurationResolver;
  /** Called once the run options are resolved, before the first job starts */
  onStart?: (totalFiles: number, workerCount: number) => void;
}

/**
 * Measures every file in `files` concurrently and aggregates the results.
 *
 * The jobs channel is filled and closed before any result is awaited; the
 * aggregator then drains the results channel while the pool works.
 *
 * @param files - Discovery-ordered paths; each path's position is its job index
 * @param options - Worker count, timeout, success criterion and collaborators
 * @returns The aggregate outcome, with failures in index order
 */
export async function runDurationPipeline(
  files: string[],
  options: PipelineOptions = {}
): Promise<AggregateOutcome> {
  const { workerCount, jobTimeoutMs, successCriterion } = resolveRunOptions(options);

  const jobs = new Channel<Job>(files.length);
  const results = new Channel<Result>(files.length);

  for (const [index, filePath] of files.entries()) {
    await jobs.send({ path: filePath, index });
  }
  jobs.close();

  options.onStart?.(files.length, workerCount);
  options.progress?.startProcessing(files.length, workerCount);

  const pool = runPool(jobs, results, {
    workerCount,
    jobTimeoutMs,
    resolve: options.resolve,
    progress: options.progress
  });

  const [outcome] = await Promise.all([
    aggregate(results, files.length, { successCriterion }),
    pool
  ]);

  options.progress?.endProcessing();

  return outcome;
}

/**
 * Builds a duration report by scanning a directory and measuring every audio
 * file found.
 *
 * Process:
 * 1. Collect audio files (mp3, wav, ogg, flac, m4a) in discovery order
 * 2. Measure them on a worker pool
 * 3. Aggregate durations and failures by file index
 *
 * @param rootDir - Absolute path to directory to scan
 * @param options - Run options and optional progress reporter
 * @returns The discovered files, the aggregate outcome and per-file failures
 * @throws Error if no audio file is found
 *
 * @example
 * const report = await buildDurationReport('/path/to/music', { workerCount: 4 });
 * console.log(formatStatistics(report.outcome.stats));
 */
export async function buildDurationReport(
  rootDir: string,
  options: PipelineOptions = {}
): Promise<DurationReport> {
  const files = await collectAudioFiles(rootDir, AUDIO_EXTENSIONS, options.progress);
  if (files.length === 0) {
    throw new Error("No audio files found in the folder.");
  }

  const outcome = await runDurationPipeline(files, options);

  const failures: FileFailure[] = outcome.failures.map(({ index, error }) => ({
    filePath: files[index],
    code: error.code,
    error: error.message
  }));

  return { files, outcome, failures };
}

export function formatProcessingStart(totalFiles: number, workerCount: number): string {
  return `Found ${totalFiles} audio files. Processing with ${workerCount} workers...`;
}

/**
 * Renders the statistics block printed at the end of a run.
 */
export function formatStatistics(stats: StatisticsRecord): string {
  const totalHours = stats.totalSeconds / 3600;
  const meanHours = stats.meanSecondsPerFile / 3600;

  return [
    "=== Results ===",
    `Total files found: ${stats.totalFiles}`,
    `Successfully processed: ${stats.successCount}`,
    `Errors: ${stats.errorCount}`,
    `Total audio duration: ${totalHours.toFixed(2)} hours`,
    `Mean audio duration per file: ${meanHours.toFixed(4)} hours (${(meanHours * 60).toFixed(2)} minutes)`
  ].join("\n");
}

/**
 * Renders one line per failed file.
 */
export function formatFailures(failures: FileFailure[]): string {
  return failures.map((f) => `- ${f.filePath}: ${f.error}`).join("\n");
}
