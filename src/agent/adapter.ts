import type { LlmUsageTokens } from "../llm/usage.js";
import type { AgentToolSchema } from "../tools/registry.js";
import type { Turn } from "../types.js";

export type AgentToolCallRequest = {
  /** Provider call id; filled in deterministically by the orchestrator when absent. */
  readonly id?: string;
  readonly name: string;
  readonly arguments: unknown;
  /** Set when the raw argument text could not be parsed. */
  readonly parseError?: string;
};

type AgentResponseMeta = {
  readonly usage?: LlmUsageTokens;
  readonly modelVersion?: string;
};

export type AgentResponse =
  | (AgentResponseMeta & { readonly type: "message"; readonly text: string })
  | (AgentResponseMeta & {
      readonly type: "tool_calls";
      readonly calls: readonly AgentToolCallRequest[];
      /** Text the model produced alongside the calls. */
      readonly text?: string;
    });

export type AgentRespondInput = {
  readonly history: readonly Turn[];
  readonly tools: readonly AgentToolSchema[];
  readonly signal?: AbortSignal;
};

/** The system under test. Implementations must not rely on orchestrator internals. */
export type AgentAdapter = {
  readonly respond: (input: AgentRespondInput) => Promise<AgentResponse>;
};
