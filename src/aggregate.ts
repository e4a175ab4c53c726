import { DEFAULT_SUCCESS_CRITERION } from "./config";
import { AggregateOutcome, Result, StatisticsRecord, SuccessCriterion } from "./types";

export interface AggregateOptions {
  successCriterion?: SuccessCriterion;
}

/**
 * Derives the run statistics from a filled duration table.
 *
 * Slots are visited in index order so the floating-point sum does not depend
 * on the order in which results arrived.
 *
 * @param durations - One slot per file, 0 where nothing was written
 * @param failed - Indices whose result carried an error
 * @param criterion - Which slots count as successes
 */
export function computeStatistics(
  durations: number[],
  failed: Set<number>,
  criterion: SuccessCriterion = DEFAULT_SUCCESS_CRITERION
): StatisticsRecord {
  let totalSeconds = 0;
  let successCount = 0;

  durations.forEach((seconds, index) => {
    const counted = criterion === "positive-duration" ? seconds > 0 : !failed.has(index);
    if (counted) {
      totalSeconds += seconds;
      successCount++;
    }
  });

  return {
    totalFiles: durations.length,
    successCount,
    errorCount: failed.size,
    totalSeconds,
    meanSecondsPerFile: successCount > 0 ? totalSeconds / successCount : 0
  };
}

/**
 * Consumes a result stream until it ends and rebuilds per-file outcomes by
 * job index.
 *
 * @param results - Stream that yields one result per job and then ends
 * @param totalJobCount - Number of jobs that were sent
 * @throws Error if an index is out of range or repeated, or if the stream
 *   ends with a different number of results than jobs
 */
export async function aggregate(
  results: AsyncIterable<Result>,
  totalJobCount: number,
  options: AggregateOptions = {}
): Promise<AggregateOutcome> {
  const durations = new Array<number>(totalJobCount).fill(0);
  const seen = new Set<number>();
  const failed = new Set<number>();
  const failures: AggregateOutcome["failures"] = [];
  let earlyStops = 0;

  for await (const result of results) {
    const { index } = result;
    if (!Number.isInteger(index) || index < 0 || index >= totalJobCount) {
      throw new Error(`Result index ${index} is outside 0..${totalJobCount - 1}`);
    }
    if (seen.has(index)) {
      throw new Error(`Received more than one result for index ${index}`);
    }
    seen.add(index);

    if (result.error) {
      failed.add(index);
      failures.push({ index, error: result.error });
      continue;
    }

    durations[index] = result.duration;
    if (result.stoppedEarly) {
      earlyStops++;
    }
  }

  if (seen.size !== totalJobCount) {
    throw new Error(`Expected ${totalJobCount} results, received ${seen.size}`);
  }

  failures.sort((a, b) => a.index - b.index);

  return {
    stats: computeStatistics(durations, failed, options.successCriterion),
    durations,
    failures,
    earlyStops
  };
}
