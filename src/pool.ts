import { Channel } from "./channel";
import { resolveDuration } from "./dispatch";
import { DurationError, DurationErrorCode, toDurationError } from "./errors";
import { ProgressReporter } from "./progress";
import { DurationReading, Job, Result } from "./types";

export type DurationResolver = (filePath: string) => Promise<DurationReading>;

export interface PoolOptions {
  /** Number of concurrent workers; values below 1 run a single worker */
  workerCount: number;
  /** Reads one file's duration. Defaults to the extension dispatcher. */
  resolve?: DurationResolver;
  progress?: ProgressReporter;
  /** Fail a job that has not settled after this many milliseconds; 0 or unset waits forever */
  jobTimeoutMs?: number;
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number, filePath: string): Promise<T> {
  if (timeoutMs <= 0) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new DurationError(
        DurationErrorCode.PARSE_TIMEOUT,
        `timed out after ${timeoutMs}ms`,
        filePath
      ));
    }, timeoutMs);
  });

  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Turns one job into its result. Never rejects: failures are carried in
 * `Result.error`.
 */
export async function processJob(
  job: Job,
  resolve: DurationResolver,
  jobTimeoutMs = 0
): Promise<Result> {
  try {
    const reading = await withTimeout(resolve(job.path), jobTimeoutMs, job.path);
    return { index: job.index, duration: reading.seconds, stoppedEarly: reading.stoppedEarly };
  } catch (err) {
    return { index: job.index, duration: 0, error: toDurationError(err, job.path) };
  }
}

/**
 * Runs `workerCount` workers that pull jobs until `jobs` is closed and
 * drained, sending exactly one result per job to `results`.
 *
 * `results` is closed once every worker has exited, so a consumer iterating
 * it sees every result followed by a clean end of stream. Progress is
 * advanced once per job, after its result has been sent.
 *
 * @example
 * const jobs = new Channel<Job>(files.length);
 * const results = new Channel<Result>(files.length);
 * for (const [index, path] of files.entries()) {
 *   await jobs.send({ path, index });
 * }
 * jobs.close();
 * const pool = runPool(jobs, results, { workerCount: 4 });
 * const outcome = await aggregate(results, files.length);
 * await pool;
 */
export async function runPool(
  jobs: Channel<Job>,
  results: Channel<Result>,
  options: PoolOptions
): Promise<void> {
  const resolve = options.resolve ?? resolveDuration;
  const workerCount = Math.max(1, Math.floor(options.workerCount));
  const jobTimeoutMs = options.jobTimeoutMs ?? 0;

  async function worker(): Promise<void> {
    for await (const job of jobs) {
      const result = await processJob(job, resolve, jobTimeoutMs);
      await results.send(result);
      options.progress?.advance(job.path);
    }
  }

  try {
    const workers = Array.from({ length: workerCount }, () => worker());
    await Promise.all(workers);
  } finally {
    results.close();
  }
}
