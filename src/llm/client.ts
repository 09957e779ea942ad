import OpenAI from "openai";
import { Agent, fetch as undiciFetch } from "undici";

import { loadLocalEnv, readEnvPositiveInt, readEnvString } from "../utils/env.js";

export const DEFAULT_CHAT_BASE_URL = "https://openrouter.ai/api/v1";
const DEFAULT_HTTP_TIMEOUT_MS = 15 * 60_000;

export type ChatClientSettings = {
  readonly apiKey: string;
  readonly baseURL: string;
  readonly timeoutMs: number;
};

let cachedClient: OpenAI | null = null;
let cachedSettings: ChatClientSettings | null = null;

/**
 * Connection settings for the OpenAI-compatible endpoint. The key is read from
 * `BENCH_API_KEY`, then `OPENROUTER_API_KEY`, then `OPENAI_API_KEY`.
 */
export function resolveChatClientSettings(
  env: Record<string, string | undefined> = process.env,
): ChatClientSettings {
  const apiKey =
    readEnvString(env, "BENCH_API_KEY") ??
    readEnvString(env, "OPENROUTER_API_KEY") ??
    readEnvString(env, "OPENAI_API_KEY");
  if (!apiKey) {
    throw new Error(
      "BENCH_API_KEY (or OPENROUTER_API_KEY / OPENAI_API_KEY) must be set for the chat backend.",
    );
  }
  return {
    apiKey,
    baseURL: readEnvString(env, "BENCH_BASE_URL") ?? DEFAULT_CHAT_BASE_URL,
    timeoutMs: readEnvPositiveInt(env, "BENCH_HTTP_TIMEOUT_MS") ?? DEFAULT_HTTP_TIMEOUT_MS,
  };
}

function createDispatcherFetch(timeoutMs: number): typeof fetch {
  const dispatcher = new Agent({
    bodyTimeout: timeoutMs,
    headersTimeout: timeoutMs,
  });
  return ((input: any, init?: any) => {
    return undiciFetch(input, {
      ...(init ?? {}),
      dispatcher,
    });
  }) as typeof fetch;
}

export function getChatClient(): OpenAI {
  if (cachedClient) {
    return cachedClient;
  }
  loadLocalEnv();
  cachedSettings = resolveChatClientSettings();
  cachedClient = new OpenAI({
    apiKey: cachedSettings.apiKey,
    baseURL: cachedSettings.baseURL,
    timeout: cachedSettings.timeoutMs,
    // The request-level retry budget lives in the orchestrator.
    maxRetries: 0,
    fetch: createDispatcherFetch(cachedSettings.timeoutMs),
  });
  return cachedClient;
}
