import type { TerminalStatus, Turn } from "../types.js";

import type { BatchRecordStatus } from "./store.js";

type BatchTelemetryBaseEvent = {
  readonly timestamp: string;
};

export type BatchStartedEvent = BatchTelemetryBaseEvent & {
  readonly type: "batch.started";
  readonly totalCases: number;
  readonly pendingCases: number;
  readonly skippedCases: number;
  readonly maxConcurrency: number;
};

export type TrajectoryStartedEvent = BatchTelemetryBaseEvent & {
  readonly type: "trajectory.started";
  readonly caseId: string;
};

export type TrajectoryTurnEvent = BatchTelemetryBaseEvent & {
  readonly type: "trajectory.turn";
  readonly caseId: string;
  readonly turn: Turn;
};

export type TrajectoryFinishedEvent = BatchTelemetryBaseEvent & {
  readonly type: "trajectory.finished";
  readonly caseId: string;
  readonly status: TerminalStatus;
  readonly agentTurns: number;
  /** `null` when evaluation failed; see `evaluationError`. */
  readonly weightedTotal: number | null;
  readonly evaluationError?: string;
  readonly durationMs: number;
};

export type TrajectoryFailedEvent = BatchTelemetryBaseEvent & {
  readonly type: "trajectory.failed";
  readonly caseId: string;
  /** Cancelled trajectories are not persisted; harness errors are. */
  readonly status: Extract<BatchRecordStatus, "harness_error"> | "cancelled";
  readonly error: string;
  readonly durationMs: number;
};

export type TrajectorySkippedEvent = BatchTelemetryBaseEvent & {
  readonly type: "trajectory.skipped";
  readonly caseId: string;
  readonly status: BatchRecordStatus;
};

export type BatchFinishedEvent = BatchTelemetryBaseEvent & {
  readonly type: "batch.finished";
  readonly finished: number;
  readonly harnessErrors: number;
  readonly cancelled: number;
  readonly interrupted: boolean;
  readonly durationMs: number;
};

export type BatchEvent =
  | BatchStartedEvent
  | TrajectoryStartedEvent
  | TrajectoryTurnEvent
  | TrajectoryFinishedEvent
  | TrajectoryFailedEvent
  | TrajectorySkippedEvent
  | BatchFinishedEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type BatchEventPayload = DistributiveOmit<BatchEvent, "timestamp">;

export type BatchTelemetrySink = {
  readonly emit: (event: BatchEvent) => void | Promise<void>;
  readonly flush?: () => void | Promise<void>;
};

export type BatchTelemetrySession = {
  readonly emit: (event: BatchEventPayload) => void;
  readonly flush: () => Promise<void>;
};

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof (value as { then?: unknown }).then === "function"
  );
}

/** Wraps sinks so that a throwing or rejecting sink never affects the batch. */
export function createBatchTelemetrySession(
  sinks: readonly BatchTelemetrySink[],
  clock: () => Date = () => new Date(),
): BatchTelemetrySession {
  const pending = new Set<Promise<void>>();

  const emit = (payload: BatchEventPayload): void => {
    const event = { ...payload, timestamp: clock().toISOString() } satisfies BatchEvent;
    for (const sink of sinks) {
      try {
        const output = sink.emit(event);
        if (isPromiseLike(output)) {
          const task: Promise<void> = Promise.resolve(output)
            .then(() => undefined)
            .catch(() => undefined)
            .finally(() => {
              pending.delete(task);
            });
          pending.add(task);
        }
      } catch {
        // Sink failures are ignored.
      }
    }
  };

  const flush = async (): Promise<void> => {
    while (pending.size > 0) {
      await Promise.allSettled([...pending]);
    }
    for (const sink of sinks) {
      try {
        await sink.flush?.();
      } catch {
        // Sink failures are ignored.
      }
    }
  };

  return { emit, flush };
}
