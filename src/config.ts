import os from "os";
import { RunOptions, SuccessCriterion } from "./types";

export const AUDIO_EXTENSIONS = [".mp3", ".wav", ".ogg", ".flac", ".m4a"];
export const DEFAULT_WORKER_COUNT = Math.max(1, os.cpus().length);
export const DEFAULT_SUCCESS_CRITERION: SuccessCriterion = "no-error";
export const SUCCESS_CRITERIA: readonly SuccessCriterion[] = ["no-error", "positive-duration"];

export function isSuccessCriterion(value: string): value is SuccessCriterion {
  return SUCCESS_CRITERIA.some((criterion) => criterion === value);
}

/**
 * Fills in defaults for a run and validates what the caller supplied.
 *
 * @throws Error if workerCount is not a positive integer or jobTimeoutMs is negative
 */
export function resolveRunOptions(options: Partial<RunOptions> = {}): RunOptions {
  const workerCount = options.workerCount ?? DEFAULT_WORKER_COUNT;
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new Error(`Worker count must be a positive integer, got ${workerCount}`);
  }

  const jobTimeoutMs = options.jobTimeoutMs ?? 0;
  if (!Number.isFinite(jobTimeoutMs) || jobTimeoutMs < 0) {
    throw new Error(`Timeout must be a non-negative number of milliseconds, got ${jobTimeoutMs}`);
  }

  return {
    workerCount,
    jobTimeoutMs,
    successCriterion: options.successCriterion ?? DEFAULT_SUCCESS_CRITERION
  };
}
