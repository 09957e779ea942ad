import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { EvaluationResult, TerminalStatus, Trajectory } from "../types.js";

export const BATCH_RECORD_STATUSES = [
  "completed",
  "max_turns_exceeded",
  "agent_error",
  "user_error",
  "tool_error",
  "harness_error",
] as const satisfies readonly (TerminalStatus | "harness_error")[];

export type BatchRecordStatus = (typeof BATCH_RECORD_STATUSES)[number];

/** One line of the results file. `harness_error` records are retried on resume. */
export type BatchRecord = {
  readonly version: 1;
  readonly caseId: string;
  readonly status: BatchRecordStatus;
  readonly trajectory?: Trajectory;
  readonly evaluation?: EvaluationResult;
  readonly error?: { readonly name: string; readonly message: string };
  /** Set when the trajectory finished but scoring it failed. */
  readonly evaluationError?: { readonly name: string; readonly message: string };
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
};

// Only the fields resume and status reporting rely on are checked.
const storedRecordSchema = z.looseObject({
  version: z.literal(1),
  caseId: z.string().min(1),
  status: z.enum(BATCH_RECORD_STATUSES),
  trajectory: z
    .looseObject({ agentTurns: z.number(), turns: z.array(z.unknown()) })
    .optional(),
  evaluation: z.looseObject({ weightedTotal: z.number() }).optional(),
  error: z.looseObject({ message: z.string() }).optional(),
  evaluationError: z.looseObject({ message: z.string() }).optional(),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number(),
});

export type StoredBatchRecord = z.infer<typeof storedRecordSchema>;

export type LoadedRecords = {
  readonly records: readonly StoredBatchRecord[];
  /** Unparseable lines, e.g. a line cut short by a crash mid-write. */
  readonly skippedLines: number;
};

export type TrajectoryStore = {
  readonly location: string;
  readonly load: () => Promise<LoadedRecords>;
  readonly append: (record: BatchRecord) => Promise<void>;
};

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException)?.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export function parseRecordLines(text: string): LoadedRecords {
  const records: StoredBatchRecord[] = [];
  let skippedLines = 0;
  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      skippedLines += 1;
      continue;
    }
    const parsed = storedRecordSchema.safeParse(raw);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      skippedLines += 1;
    }
  }
  return { records, skippedLines };
}

/**
 * Append-only JSON Lines store. Appends from concurrent trajectories are serialized in
 * process; a crash loses at most the line being written.
 */
export function createJsonlStore(filePath: string): TrajectoryStore {
  let chain: Promise<void> = Promise.resolve();
  let prepared = false;

  // A previous crash can leave a partial last line; start new records on a fresh line.
  async function prepare(): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    const existing = await readIfExists(filePath);
    if (existing && !existing.endsWith("\n")) {
      await appendFile(filePath, "\n", "utf8");
    }
    prepared = true;
  }

  const append = (record: BatchRecord): Promise<void> => {
    const line = `${JSON.stringify(record)}\n`;
    const task = chain.then(async () => {
      if (!prepared) {
        await prepare();
      }
      await appendFile(filePath, line, "utf8");
    });
    chain = task.catch(() => undefined);
    return task;
  };

  const load = async (): Promise<LoadedRecords> => {
    await chain;
    const text = await readIfExists(filePath);
    return text === null ? { records: [], skippedLines: 0 } : parseRecordLines(text);
  };

  return { location: filePath, load, append };
}
