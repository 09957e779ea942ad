import { ActorError } from "../errors.js";

import type { AgentAdapter, AgentResponse } from "./adapter.js";

export type ScriptedAgentStep =
  | AgentResponse
  | ((input: Parameters<AgentAdapter["respond"]>[0]) => AgentResponse | Promise<AgentResponse>);

/**
 * Replays recorded responses in order. Each trajectory needs its own instance; running out
 * of steps is a non-retryable agent failure.
 */
export function createScriptedAgentAdapter(steps: readonly ScriptedAgentStep[]): AgentAdapter {
  let cursor = 0;
  return {
    respond: async (input) => {
      const step = steps[cursor];
      if (step === undefined) {
        throw new ActorError("agent", `Scripted agent has no response for step ${cursor + 1}`, {
          retryable: false,
        });
      }
      cursor += 1;
      return typeof step === "function" ? step(input) : step;
    },
  };
}
