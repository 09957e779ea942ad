import type { AgentAdapter } from "../agent/adapter.js";
import type { RunConfig } from "../config.js";
import { errorMessage, toError, TrajectoryCancelledError } from "../errors.js";
import { defineRubric, evaluateTrajectory, type Rubric } from "../evaluation/scorer.js";
import type { FaultAttributor } from "../evaluation/faultAttribution.js";
import { runTrajectory } from "../orchestrator/trajectory.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { Case, EvaluationResult, Trajectory } from "../types.js";
import type { UserSimulator } from "../user/simulator.js";
import { createAsyncQueue } from "../utils/asyncQueue.js";
import { createCallScheduler } from "../utils/scheduler.js";

import { emptyStatusCounts, latestRecordsByCase } from "./status.js";
import type { BatchRecord, BatchRecordStatus, TrajectoryStore } from "./store.js";
import {
  createBatchTelemetrySession,
  type BatchEvent,
  type BatchTelemetrySession,
  type BatchTelemetrySink,
} from "./telemetry.js";

export type BatchOptions = {
  readonly cases: readonly Case[];
  readonly registry: ToolRegistry;
  /** Called once per trajectory, so stateful adapters are never shared. */
  readonly createAgent: (caseData: Case) => AgentAdapter;
  readonly createUser: (caseData: Case) => UserSimulator;
  readonly rubric: Rubric;
  readonly config: RunConfig;
  readonly store: TrajectoryStore;
  readonly attribution?: FaultAttributor;
  readonly signal?: AbortSignal;
  readonly telemetry?: BatchTelemetrySink;
  readonly clock?: () => Date;
};

export type BatchSummary = {
  readonly totalCases: number;
  /** Cases that already had a trajectory record before this run. */
  readonly skipped: number;
  readonly attempted: number;
  /** Trajectories finished and persisted by this run. */
  readonly finished: number;
  readonly harnessErrors: number;
  /** Trajectories interrupted or never started because the batch was aborted. */
  readonly cancelled: number;
  readonly byStatus: Readonly<Record<BatchRecordStatus, number>>;
  readonly interrupted: boolean;
  readonly durationMs: number;
};

type CaseOutcome = BatchRecordStatus | "cancelled";

async function runCase(
  caseData: Case,
  rubric: Rubric,
  options: BatchOptions,
  telemetry: BatchTelemetrySession,
): Promise<CaseOutcome> {
  const { config, signal, store } = options;
  const clock = options.clock ?? (() => new Date());
  const startedAtMs = Date.now();
  const startedAt = clock().toISOString();
  telemetry.emit({ type: "trajectory.started", caseId: caseData.id });

  let trajectory: Trajectory;
  try {
    trajectory = await runTrajectory(caseData, {
      registry: options.registry,
      agent: options.createAgent(caseData),
      user: options.createUser(caseData),
      config,
      signal,
      clock,
      onTurn: (turn) => telemetry.emit({ type: "trajectory.turn", caseId: caseData.id, turn }),
    });
  } catch (error) {
    if (error instanceof TrajectoryCancelledError || signal?.aborted) {
      telemetry.emit({
        type: "trajectory.failed",
        caseId: caseData.id,
        status: "cancelled",
        error: errorMessage(error),
        durationMs: Date.now() - startedAtMs,
      });
      return "cancelled";
    }
    const failure = toError(error);
    const record: BatchRecord = {
      version: 1,
      caseId: caseData.id,
      status: "harness_error",
      error: { name: failure.name, message: failure.message },
      startedAt,
      finishedAt: clock().toISOString(),
      durationMs: Date.now() - startedAtMs,
    };
    await store.append(record);
    telemetry.emit({
      type: "trajectory.failed",
      caseId: caseData.id,
      status: "harness_error",
      error: failure.message,
      durationMs: record.durationMs,
    });
    return record.status;
  }

  // A finished trajectory is always persisted; a failed evaluation is recorded beside it.
  let evaluation: EvaluationResult | undefined;
  let evaluationError: BatchRecord["evaluationError"];
  try {
    evaluation = await evaluateTrajectory(trajectory, caseData, {
      rubric,
      attribution: options.attribution,
      attributionThreshold: config.attributionThreshold,
      signal,
    });
  } catch (error) {
    const failure = toError(error);
    evaluationError = { name: failure.name, message: failure.message };
  }

  const record: BatchRecord = {
    version: 1,
    caseId: caseData.id,
    status: trajectory.status,
    trajectory,
    ...(evaluation ? { evaluation } : {}),
    ...(evaluationError ? { evaluationError } : {}),
    startedAt,
    finishedAt: clock().toISOString(),
    durationMs: Date.now() - startedAtMs,
  };
  await store.append(record);
  telemetry.emit({
    type: "trajectory.finished",
    caseId: caseData.id,
    status: trajectory.status,
    agentTurns: trajectory.agentTurns,
    weightedTotal: evaluation?.weightedTotal ?? null,
    ...(evaluationError ? { evaluationError: evaluationError.message } : {}),
    durationMs: record.durationMs,
  });
  return record.status;
}

/**
 * Runs every case that has no trajectory record yet, at most `config.maxConcurrency` at a
 * time, appending one record per finished trajectory. Re-running with the same store
 * resumes: cases with a trajectory record are skipped, harness errors are retried.
 *
 * The rubric is validated before anything runs. Per-case failures never reject; only store
 * write failures do, after all cases settle.
 */
export async function runBatch(options: BatchOptions): Promise<BatchSummary> {
  const { cases, config, signal } = options;
  const clock = options.clock ?? (() => new Date());
  const startedAtMs = Date.now();
  const telemetry = createBatchTelemetrySession(
    options.telemetry ? [options.telemetry] : [],
    clock,
  );
  const rubric = defineRubric(options.rubric);

  const { records } = await options.store.load();
  const latest = latestRecordsByCase(records);
  const pending: Case[] = [];
  let skipped = 0;
  for (const caseData of cases) {
    const previous = latest.get(caseData.id);
    if (previous && previous.status !== "harness_error") {
      skipped += 1;
      telemetry.emit({ type: "trajectory.skipped", caseId: caseData.id, status: previous.status });
    } else {
      pending.push(caseData);
    }
  }
  telemetry.emit({
    type: "batch.started",
    totalCases: cases.length,
    pendingCases: pending.length,
    skippedCases: skipped,
    maxConcurrency: config.maxConcurrency,
  });

  const pool = createCallScheduler({
    maxParallelRequests: config.maxConcurrency,
    initialParallelRequests: config.maxConcurrency,
    isOverloadError: () => false,
  });
  const settled = await Promise.allSettled(
    pending.map((caseData) =>
      pool.run(() => runCase(caseData, rubric, options, telemetry), { signal }),
    ),
  );

  const byStatus = emptyStatusCounts();
  let cancelled = 0;
  const storeFailures: Error[] = [];
  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      if (signal?.aborted) {
        cancelled += 1;
      } else {
        storeFailures.push(toError(outcome.reason));
      }
    } else if (outcome.value === "cancelled") {
      cancelled += 1;
    } else {
      byStatus[outcome.value] += 1;
    }
  }

  const harnessErrors = byStatus.harness_error;
  const finished = pending.length - cancelled - harnessErrors - storeFailures.length;
  const summary: BatchSummary = {
    totalCases: cases.length,
    skipped,
    attempted: pending.length,
    finished,
    harnessErrors,
    cancelled,
    byStatus,
    interrupted: signal?.aborted === true,
    durationMs: Date.now() - startedAtMs,
  };
  telemetry.emit({
    type: "batch.finished",
    finished,
    harnessErrors,
    cancelled,
    interrupted: summary.interrupted,
    durationMs: summary.durationMs,
  });
  await telemetry.flush();

  const [firstFailure] = storeFailures;
  if (firstFailure) {
    throw firstFailure;
  }
  return summary;
}

export type BatchStream = {
  readonly events: AsyncIterable<BatchEvent>;
  readonly result: Promise<BatchSummary>;
};

/** `runBatch` with its telemetry exposed as an async iterable. */
export function streamBatch(options: BatchOptions): BatchStream {
  const queue = createAsyncQueue<BatchEvent>();
  const forward = options.telemetry;
  const result = runBatch({
    ...options,
    telemetry: {
      emit: (event) => {
        queue.push(event);
        return forward?.emit(event);
      },
      flush: () => forward?.flush?.(),
    },
  }).then(
    (summary) => {
      queue.close();
      return summary;
    },
    (error: unknown) => {
      const failure = toError(error);
      queue.fail(failure);
      throw failure;
    },
  );
  return { events: queue.iterable, result };
}
