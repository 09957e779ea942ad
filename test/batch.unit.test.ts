import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it, vi } from "vitest";

import { createScriptedAgentAdapter } from "../src/agent/scripted.js";
import { runBatch, streamBatch, type BatchOptions } from "../src/batch/runner.js";
import { createJsonlStore } from "../src/batch/store.js";
import type { BatchEvent } from "../src/batch/telemetry.js";
import { completedStatus, requiredToolsCalled } from "../src/evaluation/criteria.js";
import { createToolRegistry } from "../src/tools/registry.js";
import { createScriptedUserSimulator } from "../src/user/simulator.js";

import { makeCase, makeConfig, TEST_TOOLS } from "./fixtures.js";

function makeCases(count: number) {
  return Array.from({ length: count }, (_, index) => makeCase({ id: `case-${String(index + 1).padStart(3, "0")}` }));
}

function storePath(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "staging-bench-batch-"));
  return path.join(dir, "trajectories.jsonl");
}

function readLines(file: string): string[] {
  return fs
    .readFileSync(file, "utf8")
    .split("\n")
    .filter((line) => line.trim().length > 0);
}

function batchOptions(file: string, overrides: Partial<BatchOptions> = {}): BatchOptions {
  return {
    cases: makeCases(3),
    registry: createToolRegistry(TEST_TOOLS),
    createAgent: () => createScriptedAgentAdapter([{ type: "message", text: "CEA 8.5, likely stage IB." }]),
    createUser: () => createScriptedUserSimulator([]),
    rubric: [completedStatus()],
    config: makeConfig({ maxConcurrency: 2 }),
    store: createJsonlStore(file),
    ...overrides,
  };
}

describe("runBatch", () => {
  it("runs every case once and records one line each", async () => {
    const file = storePath();
    const summary = await runBatch(batchOptions(file));

    expect(summary).toMatchObject({
      totalCases: 3,
      skipped: 0,
      attempted: 3,
      finished: 3,
      harnessErrors: 0,
      cancelled: 0,
      interrupted: false,
    });
    expect(summary.byStatus.completed).toBe(3);
    expect(readLines(file)).toHaveLength(3);
    const { records } = await createJsonlStore(file).load();
    expect(records.map((record) => record.caseId).sort()).toEqual(["case-001", "case-002", "case-003"]);
    expect(new Set(records.map((record) => record.status))).toEqual(new Set(["completed"]));
  });

  it("resumes an interrupted batch without duplicating or losing cases", async () => {
    const file = storePath();
    const cases = makeCases(86);
    const config = makeConfig({ maxConcurrency: 10 });
    const controller = new AbortController();
    let finishedEvents = 0;

    const first = await runBatch(
      batchOptions(file, {
        cases,
        config,
        signal: controller.signal,
        telemetry: {
          emit: (event) => {
            if (event.type === "trajectory.finished") {
              finishedEvents += 1;
              if (finishedEvents === 40) {
                controller.abort();
              }
            }
          },
        },
      }),
    );

    expect(first.interrupted).toBe(true);
    expect(first.finished).toBeGreaterThanOrEqual(40);
    expect(first.finished).toBeLessThan(86);
    expect(first.finished + first.cancelled).toBe(86);
    expect(readLines(file)).toHaveLength(first.finished);

    const second = await runBatch(batchOptions(file, { cases, config }));

    expect(second.skipped).toBe(first.finished);
    expect(second.finished).toBe(86 - first.finished);
    expect(second.interrupted).toBe(false);
    expect(readLines(file)).toHaveLength(86);
    const caseIds = (await createJsonlStore(file).load()).records.map((record) => record.caseId);
    expect(new Set(caseIds).size).toBe(86);
  });

  it("records harness errors and retries them on the next run", async () => {
    const file = storePath();
    let failNext = true;
    const options = batchOptions(file, {
      createAgent: (caseData) => {
        if (caseData.id === "case-002" && failNext) {
          failNext = false;
          throw new Error("adapter factory failed");
        }
        return createScriptedAgentAdapter([{ type: "message", text: "Stage IB." }]);
      },
    });

    const first = await runBatch(options);
    expect(first).toMatchObject({ finished: 2, harnessErrors: 1 });
    const failed = (await options.store.load()).records.find((record) => record.caseId === "case-002");
    expect(failed).toMatchObject({ status: "harness_error", error: { name: "Error", message: "adapter factory failed" } });

    const second = await runBatch(options);
    expect(second).toMatchObject({ skipped: 2, attempted: 1, finished: 1, harnessErrors: 0 });
    const { records } = await options.store.load();
    expect(records).toHaveLength(4);
    expect(records.at(-1)).toMatchObject({ caseId: "case-002", status: "completed" });
  });

  it("rejects an invalid rubric before any case starts", async () => {
    const file = storePath();
    const createAgent = vi.fn(() => createScriptedAgentAdapter([{ type: "message", text: "Stage IB." }]));
    const options = batchOptions(file, {
      cases: makeCases(2),
      createAgent,
      rubric: [requiredToolsCalled(["get_tumor_markers"], 1), requiredToolsCalled(["get_tumor_markers"], 2)],
    });

    await expect(runBatch(options)).rejects.toThrow(
      "Duplicate rubric criterion id: required_tools_called:get_tumor_markers",
    );
    expect(createAgent).not.toHaveBeenCalled();
    expect(fs.existsSync(file)).toBe(false);
  });

  it("persists the trajectory when its evaluation fails", async () => {
    const file = storePath();
    const controller = new AbortController();
    const events: BatchEvent[] = [];
    const summary = await runBatch(
      batchOptions(file, {
        cases: makeCases(1),
        signal: controller.signal,
        rubric: [
          completedStatus(),
          {
            id: "stops_the_batch",
            description: "Aborts the batch while scoring.",
            weight: 1,
            score: () => {
              controller.abort();
              throw new Error("scoring interrupted");
            },
          },
        ],
        telemetry: { emit: (event) => void events.push(event) },
      }),
    );

    expect(summary).toMatchObject({ attempted: 1, finished: 1, cancelled: 0, interrupted: true });
    const { records } = await createJsonlStore(file).load();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      caseId: "case-001",
      status: "completed",
      trajectory: { caseId: "case-001", agentTurns: 1 },
      evaluationError: { name: "Error", message: "scoring interrupted" },
    });
    expect(records[0]).not.toHaveProperty("evaluation");
    const finished = events.find((event) => event.type === "trajectory.finished");
    expect(finished).toMatchObject({ weightedTotal: null, evaluationError: "scoring interrupted" });
  });

  it("ignores telemetry sinks that throw", async () => {
    const file = storePath();
    const summary = await runBatch(
      batchOptions(file, {
        telemetry: {
          emit: () => {
            throw new Error("sink down");
          },
        },
      }),
    );
    expect(summary.finished).toBe(3);
  });
});

describe("streamBatch", () => {
  it("yields batch events and resolves the summary", async () => {
    const file = storePath();
    const stream = streamBatch(batchOptions(file, { cases: makeCases(2) }));

    const events: BatchEvent[] = [];
    for await (const event of stream.events) {
      events.push(event);
    }
    const summary = await stream.result;

    expect(summary.finished).toBe(2);
    expect(events[0]?.type).toBe("batch.started");
    expect(events.at(-1)?.type).toBe("batch.finished");
    expect(events.filter((event) => event.type === "trajectory.finished")).toHaveLength(2);
    const turnsForFirst = events.filter(
      (event) => event.type === "trajectory.turn" && event.caseId === "case-001",
    );
    expect(turnsForFirst.map((event) => (event.type === "trajectory.turn" ? event.turn.type : null))).toEqual([
      "user_utterance",
      "agent_message",
      "system_termination",
    ]);
  });

  it("reports skipped cases on resume", async () => {
    const file = storePath();
    await runBatch(batchOptions(file, { cases: makeCases(1) }));
    const stream = streamBatch(batchOptions(file, { cases: makeCases(2) }));
    const types: string[] = [];
    for await (const event of stream.events) {
      types.push(event.type);
    }
    await expect(stream.result).resolves.toMatchObject({ skipped: 1, finished: 1 });
    expect(types.slice(0, 2)).toEqual(["trajectory.skipped", "batch.started"]);
  });
});
