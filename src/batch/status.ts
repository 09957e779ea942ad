import { sleep } from "../utils/timeout.js";

import {
  BATCH_RECORD_STATUSES,
  type BatchRecordStatus,
  type StoredBatchRecord,
  type TrajectoryStore,
} from "./store.js";

export type ScoreStats = {
  readonly mean: number;
  readonly min: number;
  readonly max: number;
};

export type StatusSummary = {
  readonly totalCases: number | null;
  /** Distinct cases with at least one record. */
  readonly recordedCases: number;
  readonly byStatus: Readonly<Record<BatchRecordStatus, number>>;
  /** Cases without a trajectory record yet; `null` when the case count is unknown. */
  readonly pending: number | null;
  readonly scores: ScoreStats | null;
  readonly meanAgentTurns: number | null;
};

/** Later records win, so a retried harness error is replaced by its retry. */
export function latestRecordsByCase(
  records: readonly StoredBatchRecord[],
): Map<string, StoredBatchRecord> {
  const latest = new Map<string, StoredBatchRecord>();
  for (const record of records) {
    latest.set(record.caseId, record);
  }
  return latest;
}

export function emptyStatusCounts(): Record<BatchRecordStatus, number> {
  return {
    completed: 0,
    max_turns_exceeded: 0,
    agent_error: 0,
    user_error: 0,
    tool_error: 0,
    harness_error: 0,
  };
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function summarizeRecords(
  records: readonly StoredBatchRecord[],
  totalCases?: number,
): StatusSummary {
  const latest = [...latestRecordsByCase(records).values()];
  const byStatus = emptyStatusCounts();
  const totals: number[] = [];
  const agentTurns: number[] = [];
  for (const record of latest) {
    byStatus[record.status] += 1;
    if (record.evaluation) {
      totals.push(record.evaluation.weightedTotal);
    }
    if (record.trajectory) {
      agentTurns.push(record.trajectory.agentTurns);
    }
  }
  const withTrajectory = latest.length - byStatus.harness_error;
  const meanScore = mean(totals);
  return {
    totalCases: totalCases ?? null,
    recordedCases: latest.length,
    byStatus,
    pending: totalCases === undefined ? null : Math.max(0, totalCases - withTrajectory),
    scores:
      meanScore === null
        ? null
        : { mean: meanScore, min: Math.min(...totals), max: Math.max(...totals) },
    meanAgentTurns: mean(agentTurns),
  };
}

export function formatStatusSummary(summary: StatusSummary): string {
  const lines: string[] = [];
  const total = summary.totalCases === null ? "" : ` / ${summary.totalCases}`;
  lines.push(`cases recorded: ${summary.recordedCases}${total}`);
  if (summary.pending !== null) {
    lines.push(`pending: ${summary.pending}`);
  }
  for (const status of BATCH_RECORD_STATUSES) {
    const count = summary.byStatus[status];
    if (count > 0) {
      lines.push(`  ${status}: ${count}`);
    }
  }
  if (summary.scores) {
    const { mean: avg, min, max } = summary.scores;
    lines.push(`score: mean ${avg.toFixed(3)} | min ${min.toFixed(3)} | max ${max.toFixed(3)}`);
  }
  if (summary.meanAgentTurns !== null) {
    lines.push(`mean agent turns: ${summary.meanAgentTurns.toFixed(2)}`);
  }
  return lines.join("\n");
}

export type WatchProgressOptions = {
  readonly store: TrajectoryStore;
  readonly totalCases?: number;
  readonly intervalMs?: number;
  readonly signal?: AbortSignal;
  readonly onUpdate: (summary: StatusSummary, skippedLines: number) => void;
};

/**
 * Polls the store until the signal aborts or, when `totalCases` is known, nothing is pending.
 * Returns the last summary seen.
 */
export async function watchProgress(options: WatchProgressOptions): Promise<StatusSummary> {
  const intervalMs = Math.max(10, options.intervalMs ?? 5_000);
  for (;;) {
    const { records, skippedLines } = await options.store.load();
    const summary = summarizeRecords(records, options.totalCases);
    options.onUpdate(summary, skippedLines);
    if (options.signal?.aborted || summary.pending === 0) {
      return summary;
    }
    try {
      await sleep(intervalMs, options.signal);
    } catch (error) {
      if (options.signal?.aborted) {
        return summary;
      }
      throw error;
    }
  }
}
