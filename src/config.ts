import { z } from "zod";

import { formatZodIssues } from "./errors.js";
import type { Case, Turn } from "./types.js";
import {
  type EnvRecord,
  loadLocalEnv,
  readEnvPositiveInt,
  readEnvString,
} from "./utils/env.js";

export const USER_STRATEGIES = ["direct", "reasoning", "verify", "reflect"] as const;
export type UserStrategy = (typeof USER_STRATEGIES)[number];

export type TerminalPredicateContext = {
  readonly caseData: Case;
  readonly history: readonly Turn[];
  readonly agentTurn: number;
};

export type TerminalPredicate = (text: string, context: TerminalPredicateContext) => boolean;

const terminalPolicySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("always") }),
  z.object({ type: z.literal("never") }),
  z.object({
    type: z.literal("marker"),
    marker: z.string().min(1),
    caseSensitive: z.boolean().optional(),
  }),
  z.object({
    type: z.literal("predicate"),
    test: z.custom<TerminalPredicate>((value) => typeof value === "function", {
      message: "Expected a function",
    }),
  }),
]);

export type TerminalPolicy = z.infer<typeof terminalPolicySchema>;

export const DEFAULT_AGENT_MODEL = "openai/gpt-4o";
export const DEFAULT_USER_MODEL = "openai/gpt-4o-mini";
export const DEFAULT_JUDGE_MODEL = "openai/gpt-4o-mini";

const runConfigSchema = z.object({
  maxTurns: z.number().int().positive().default(10),
  maxInvalidToolCalls: z.number().int().positive().default(3),
  maxConcurrency: z.number().int().positive().default(8),
  openingTurn: z.enum(["case_prompt", "simulated"]).default("case_prompt"),
  terminalPolicy: terminalPolicySchema.default({ type: "always" }),
  missingToolData: z.enum(["feedback", "terminate"]).default("feedback"),
  callTimeoutMs: z.number().int().positive().default(300_000),
  maxCallAttempts: z.number().int().positive().default(5),
  retryBaseDelayMs: z.number().int().nonnegative().default(200),
  attributionThreshold: z.number().min(0).max(1).nullable().default(0.6),
  userStrategy: z.enum(USER_STRATEGIES).default("direct"),
  temperature: z.number().min(0).max(2).optional(),
  models: z
    .object({
      agent: z.string().min(1).default(DEFAULT_AGENT_MODEL),
      user: z.string().min(1).default(DEFAULT_USER_MODEL),
      judge: z.string().min(1).default(DEFAULT_JUDGE_MODEL),
    })
    .default({ agent: DEFAULT_AGENT_MODEL, user: DEFAULT_USER_MODEL, judge: DEFAULT_JUDGE_MODEL }),
});

/** Fully resolved settings for one batch or trajectory run. */
export type RunConfig = z.infer<typeof runConfigSchema>;

export type RunConfigOverrides = Omit<z.input<typeof runConfigSchema>, "models"> & {
  readonly models?: Partial<RunConfig["models"]>;
};

function readEnvOverrides(env: EnvRecord): RunConfigOverrides {
  const models: Partial<RunConfig["models"]> = {};
  const agent = readEnvString(env, "BENCH_AGENT_MODEL");
  const user = readEnvString(env, "BENCH_USER_MODEL");
  const judge = readEnvString(env, "BENCH_JUDGE_MODEL");
  if (agent) {
    models.agent = agent;
  }
  if (user) {
    models.user = user;
  }
  if (judge) {
    models.judge = judge;
  }
  return {
    models,
    maxConcurrency: readEnvPositiveInt(env, "BENCH_MAX_CONCURRENCY"),
    maxTurns: readEnvPositiveInt(env, "BENCH_MAX_TURNS"),
    callTimeoutMs: readEnvPositiveInt(env, "BENCH_CALL_TIMEOUT_MS"),
  };
}

// Later sources win; `undefined` never clobbers an earlier value.
function mergeDefined(...sources: readonly object[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

/**
 * Merges defaults, environment and explicit overrides (highest precedence).
 * When `env` is omitted, `.env.local` is loaded into `process.env` first.
 */
export function resolveRunConfig(
  overrides: RunConfigOverrides = {},
  env?: EnvRecord,
): RunConfig {
  if (!env) {
    loadLocalEnv();
  }
  const fromEnv = readEnvOverrides(env ?? process.env);
  const merged = {
    ...mergeDefined(fromEnv, overrides),
    models: mergeDefined(fromEnv.models ?? {}, overrides.models ?? {}),
  };
  const parsed = runConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new Error(`Invalid run configuration: ${formatZodIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}
