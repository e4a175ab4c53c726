import type { DurationError, DurationErrorCode } from "./errors";

/**
 * Audio formats recognized by extension. Only mp3, wav and m4a have parsers.
 */
export type AudioFormat = "mp3" | "wav" | "m4a" | "ogg" | "flac";

/**
 * Duration read from one file's headers.
 */
export interface DurationReading {
  seconds: number;
  /** MP3 only: frame decoding stopped before the end of the file */
  stoppedEarly?: boolean;
}

/**
 * One file queued for processing. `index` is its position in the
 * discovery-ordered file list.
 */
export interface Job {
  path: string;
  index: number;
}

/**
 * Outcome of one job, produced exactly once by the worker that took it.
 */
export interface Result {
  index: number;
  /** Seconds; 0 when `error` is set */
  duration: number;
  error?: DurationError;
  stoppedEarly?: boolean;
}

/**
 * How the aggregator decides which results count as successes.
 *
 * - `no-error`: every result without a failure, zero-length files included
 * - `positive-duration`: only results whose duration is above zero
 */
export type SuccessCriterion = "no-error" | "positive-duration";

/**
 * Totals derived once every result has been collected.
 */
export interface StatisticsRecord {
  totalFiles: number;
  successCount: number;
  errorCount: number;
  totalSeconds: number;
  meanSecondsPerFile: number;
}

/**
 * Everything the aggregator learned from the result stream.
 */
export interface AggregateOutcome {
  stats: StatisticsRecord;
  /** One slot per discovered file, indexed by job index */
  durations: number[];
  failures: Array<{ index: number; error: DurationError }>;
  /** Number of MP3 readings whose frame decoding stopped early */
  earlyStops: number;
}

/**
 * A failed file, as listed after the results.
 */
export interface FileFailure {
  filePath: string;
  code: DurationErrorCode;
  error: string;
}

/**
 * Complete result of a duration run over a directory.
 */
export interface DurationReport {
  /** Discovery-ordered list of the files that were processed */
  files: string[];
  outcome: AggregateOutcome;
  failures: FileFailure[];
}

/**
 * Options that shape a run. All fields are filled in by `resolveRunOptions`.
 */
export interface RunOptions {
  /** Number of concurrent workers */
  workerCount: number;
  /** Per-file parse timeout in milliseconds; 0 disables it */
  jobTimeoutMs: number;
  successCriterion: SuccessCriterion;
}

/**
 * Arguments accepted on the command line.
 */
export interface ParsedArgs {
  directory?: string;
  workerCount?: number;
  jobTimeoutMs?: number;
  successCriterion?: SuccessCriterion;
  progress: boolean;
  showErrors: boolean;
  help: boolean;
  version: boolean;
}
