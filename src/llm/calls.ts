import type OpenAI from "openai";

import { loadLocalEnv, readEnvPositiveInt } from "../utils/env.js";
import {
  createCallScheduler,
  isOverloadError,
  type CallScheduler,
  type CallSchedulerRunOptions,
} from "../utils/scheduler.js";

import { getChatClient } from "./client.js";

const DEFAULT_SCHEDULER_KEY = "__default__";
const DEFAULT_MODEL_CONCURRENCY = 8;
const MAX_MODEL_CONCURRENCY = 64;
const OVERLOAD_RETRY_ATTEMPTS = 4;

const schedulerByModel = new Map<string, CallScheduler>();

function resolveModelConcurrencyCap(): number {
  loadLocalEnv();
  const configured = readEnvPositiveInt(process.env, "BENCH_MODEL_CONCURRENCY");
  return Math.min(MAX_MODEL_CONCURRENCY, configured ?? DEFAULT_MODEL_CONCURRENCY);
}

function getSchedulerForModel(modelId?: string): CallScheduler {
  const normalizedModelId = modelId?.trim().toLowerCase();
  const schedulerKey =
    normalizedModelId && normalizedModelId.length > 0 ? normalizedModelId : DEFAULT_SCHEDULER_KEY;
  const existing = schedulerByModel.get(schedulerKey);
  if (existing) {
    return existing;
  }
  const cap = resolveModelConcurrencyCap();
  const created = createCallScheduler({
    maxParallelRequests: cap,
    initialParallelRequests: cap,
    minIntervalBetweenStartMs: 50,
    startJitterMs: 50,
    // Only rate limiting is retried here; everything else surfaces to the actor retry loop.
    retry: {
      maxAttempts: OVERLOAD_RETRY_ATTEMPTS,
      getDelayMs: (attempt, error) => (isOverloadError(error) ? 1_000 * 2 ** (attempt - 1) : null),
    },
  });
  schedulerByModel.set(schedulerKey, created);
  return created;
}

/** Runs `fn` against the shared client under the per-model in-flight cap. */
export async function runChatCall<T>(
  fn: (client: OpenAI) => Promise<T>,
  modelId?: string,
  runOptions?: CallSchedulerRunOptions,
): Promise<T> {
  return getSchedulerForModel(modelId).run(async () => fn(getChatClient()), runOptions);
}
