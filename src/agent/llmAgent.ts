import { ActorError } from "../errors.js";
import type { ChatBackend, ChatMessage, ChatToolCall } from "../llm/chat.js";
import { parseToolArguments } from "../llm/chat.js";
import { renderPrompt } from "../prompts.js";
import type { Turn } from "../types.js";

import type { AgentAdapter, AgentToolCallRequest } from "./adapter.js";

export type LlmAgentOptions = {
  readonly backend: ChatBackend;
  readonly model: string;
  /** Defaults to the bundled staging-assistant prompt. */
  readonly instructions?: string;
  readonly temperature?: number;
};

type PendingAssistant = {
  readonly agentTurn: number;
  text: string;
  readonly calls: ChatToolCall[];
  readonly results: ChatMessage[];
};

function serializeArguments(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value ?? {});
}

function serializeOutput(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Maps the trajectory to chat messages. Calls from one agent response become a single
 * assistant message followed by one tool message per result, in call order.
 */
export function trajectoryToChatMessages(history: readonly Turn[]): ChatMessage[] {
  const messages: ChatMessage[] = [];
  let pending: PendingAssistant | null = null;

  const flush = () => {
    if (!pending) {
      return;
    }
    messages.push(
      pending.calls.length > 0
        ? { role: "assistant", content: pending.text, toolCalls: pending.calls }
        : { role: "assistant", content: pending.text },
    );
    messages.push(...pending.results);
    pending = null;
  };

  for (const turn of history) {
    switch (turn.type) {
      case "user_utterance":
        flush();
        messages.push({ role: "user", content: turn.text });
        break;
      case "agent_message":
        flush();
        pending = { agentTurn: turn.agentTurn, text: turn.text, calls: [], results: [] };
        break;
      case "agent_tool_call":
        if (!pending || pending.agentTurn !== turn.agentTurn) {
          flush();
          pending = { agentTurn: turn.agentTurn, text: "", calls: [], results: [] };
        }
        pending.calls.push({
          id: turn.callId,
          name: turn.toolName,
          arguments: serializeArguments(turn.arguments),
        });
        break;
      case "tool_result":
        pending?.results.push({
          role: "tool",
          toolCallId: turn.callId,
          content: serializeOutput(turn.output),
        });
        break;
      case "system_termination":
        break;
    }
  }
  flush();
  return messages;
}

export function createLlmAgentAdapter(options: LlmAgentOptions): AgentAdapter {
  const instructions = options.instructions ?? renderPrompt("agent_system");
  return {
    respond: async ({ history, tools, signal }) => {
      const response = await options.backend.complete({
        model: options.model,
        messages: [{ role: "system", content: instructions }, ...trajectoryToChatMessages(history)],
        tools,
        temperature: options.temperature,
        signal,
      });
      const meta = { usage: response.usage, modelVersion: response.modelVersion };
      if (response.toolCalls.length > 0) {
        const calls = response.toolCalls.map((call): AgentToolCallRequest => {
          const parsed = parseToolArguments(call.arguments);
          return {
            ...(call.id ? { id: call.id } : {}),
            name: call.name,
            arguments: parsed.value,
            ...(parsed.error ? { parseError: parsed.error } : {}),
          };
        });
        const text = response.text.trim();
        return { type: "tool_calls", calls, ...(text ? { text } : {}), ...meta };
      }
      const text = response.text.trim();
      if (!text) {
        throw new ActorError("agent", `Agent model ${options.model} returned an empty response`);
      }
      return { type: "message", text, ...meta };
    },
  };
}
