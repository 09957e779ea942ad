import type OpenAI from "openai";
import type { z } from "zod";

import { LlmJsonCallError, toError } from "../errors.js";

import { runChatCall } from "./calls.js";
import { extractUsageTokens, type LlmUsageTokens } from "./usage.js";

export type ChatToolCall = {
  readonly id: string;
  readonly name: string;
  /** Raw JSON argument text as produced by the model. */
  readonly arguments: string;
};

export type ChatMessage =
  | { readonly role: "system"; readonly content: string }
  | { readonly role: "user"; readonly content: string }
  | {
      readonly role: "assistant";
      readonly content: string;
      readonly toolCalls?: readonly ChatToolCall[];
    }
  | { readonly role: "tool"; readonly toolCallId: string; readonly content: string };

export type ChatToolDefinition = {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, unknown>>;
};

export type ChatRequest = {
  readonly model: string;
  readonly messages: readonly ChatMessage[];
  readonly tools?: readonly ChatToolDefinition[];
  readonly responseFormat?: "text" | "json";
  readonly temperature?: number;
  readonly signal?: AbortSignal;
};

export type ChatResponse = {
  readonly modelVersion: string;
  readonly text: string;
  readonly toolCalls: readonly ChatToolCall[];
  readonly finishReason?: string;
  readonly usage?: LlmUsageTokens;
};

/** Provider-agnostic completion endpoint used by the agent, the user simulator and the judges. */
export type ChatBackend = {
  readonly complete: (request: ChatRequest) => Promise<ChatResponse>;
};

function toOpenAiMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: message.content.length > 0 ? message.content : null,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      }
      return { role: "assistant", content: message.content };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
  }
}

function extractMessageText(message: unknown): string {
  if (!message || typeof message !== "object") {
    return "";
  }
  const content = (message as { content?: unknown }).content;
  if (typeof content === "string") {
    return content;
  }
  if (!Array.isArray(content)) {
    return "";
  }
  let text = "";
  for (const part of content) {
    const textPart = (part as { text?: unknown }).text;
    if (typeof textPart === "string") {
      text += textPart;
    }
  }
  return text;
}

function extractToolCalls(message: unknown): ChatToolCall[] {
  if (!message || typeof message !== "object") {
    return [];
  }
  const toolCalls = (message as { tool_calls?: unknown }).tool_calls;
  if (!Array.isArray(toolCalls)) {
    return [];
  }
  const calls: ChatToolCall[] = [];
  for (const call of toolCalls) {
    if (!call || typeof call !== "object") {
      continue;
    }
    const id = (call as { id?: unknown }).id;
    const fn = (call as { function?: unknown }).function;
    if (!fn || typeof fn !== "object") {
      continue;
    }
    const name = (fn as { name?: unknown }).name;
    const args = (fn as { arguments?: unknown }).arguments;
    if (typeof name === "string" && name.length > 0) {
      calls.push({
        id: typeof id === "string" ? id : "",
        name,
        arguments: typeof args === "string" ? args : "",
      });
    }
  }
  return calls;
}

/**
 * Chat-completions backend for any OpenAI-compatible endpoint (OpenRouter by default).
 * Requests for one model share a call scheduler, see `runChatCall`.
 */
export function createOpenAiCompatibleBackend(): ChatBackend {
  return {
    complete: async (request) => {
      const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
        model: request.model,
        messages: request.messages.map(toOpenAiMessage),
        ...(request.tools && request.tools.length > 0
          ? {
              tools: request.tools.map((tool) => ({
                type: "function" as const,
                function: {
                  name: tool.name,
                  description: tool.description,
                  parameters: { ...tool.parameters },
                },
              })),
            }
          : {}),
        ...(request.responseFormat === "json"
          ? { response_format: { type: "json_object" as const } }
          : {}),
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      };
      const response = await runChatCall(
        async (client) => client.chat.completions.create(params, { signal: request.signal }),
        request.model,
        { signal: request.signal },
      );
      const choice = response.choices?.[0];
      const message: unknown = choice?.message;
      return {
        modelVersion: typeof response.model === "string" ? response.model : request.model,
        text: extractMessageText(message),
        toolCalls: extractToolCalls(message),
        finishReason: typeof choice?.finish_reason === "string" ? choice.finish_reason : undefined,
        usage: extractUsageTokens(response.usage),
      };
    },
  };
}

export type LlmTextRequest = {
  readonly backend: ChatBackend;
  readonly model: string;
  readonly instructions?: string;
  readonly input: string | readonly ChatMessage[];
  readonly temperature?: number;
  readonly signal?: AbortSignal;
};

function buildMessages(request: LlmTextRequest): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (request.instructions) {
    messages.push({ role: "system", content: request.instructions });
  }
  if (typeof request.input === "string") {
    messages.push({ role: "user", content: request.input });
  } else {
    messages.push(...request.input);
  }
  return messages;
}

export async function generateText(request: LlmTextRequest): Promise<ChatResponse> {
  return request.backend.complete({
    model: request.model,
    messages: buildMessages(request),
    temperature: request.temperature,
    signal: request.signal,
  });
}

function normalizeJsonText(rawText: string): string {
  let text = rawText.trim();

  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/iu.exec(text);
  if (fenced?.[1]) {
    text = fenced[1].trim();
  }

  if (!text.startsWith("{") && !text.startsWith("[")) {
    const firstBrace = text.indexOf("{");
    const lastBrace = text.lastIndexOf("}");
    if (firstBrace !== -1 && lastBrace > firstBrace) {
      text = text.slice(firstBrace, lastBrace + 1).trim();
    }
  }
  return text;
}

function escapeNewlinesInStrings(jsonText: string): string {
  let output = "";
  let inString = false;
  let escaped = false;
  for (const char of jsonText) {
    if (!inString) {
      inString = char === '"';
      output += char;
      continue;
    }
    if (escaped) {
      escaped = false;
      output += char;
    } else if (char === "\\") {
      escaped = true;
      output += char;
    } else if (char === '"') {
      inString = false;
      output += char;
    } else if (char === "\n") {
      output += "\\n";
    } else if (char === "\r") {
      output += "\\r";
    } else {
      output += char;
    }
  }
  return output;
}

/** Parses JSON out of model text: code fences, surrounding prose and raw newlines in strings. */
export function parseJsonFromLlmText(rawText: string): unknown {
  return JSON.parse(escapeNewlinesInStrings(normalizeJsonText(rawText)));
}

/** Empty argument text means "no arguments". */
export function parseToolArguments(raw: string): { value: unknown; error?: string } {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return { value: {} };
  }
  try {
    return { value: JSON.parse(trimmed) };
  } catch (error) {
    return { value: raw, error: toError(error).message };
  }
}

export type LlmJsonRequest<T> = LlmTextRequest & {
  readonly schema: z.ZodType<T>;
  readonly maxAttempts?: number;
};

export async function generateJson<T>(request: LlmJsonRequest<T>): Promise<{
  readonly value: T;
  readonly rawText: string;
  readonly response: ChatResponse;
}> {
  const maxAttempts = Math.max(1, Math.floor(request.maxAttempts ?? 2));
  const failures: Array<{ attempt: number; rawText: string; error: unknown }> = [];

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    let rawText = "";
    try {
      const response = await request.backend.complete({
        model: request.model,
        messages: buildMessages(request),
        responseFormat: "json",
        temperature: request.temperature,
        signal: request.signal,
      });
      rawText = response.text;
      const value = request.schema.parse(parseJsonFromLlmText(rawText));
      return { value, rawText, response };
    } catch (error) {
      if (request.signal?.aborted) {
        throw toError(error);
      }
      failures.push({ attempt, rawText, error: toError(error) });
    }
  }

  throw new LlmJsonCallError(`LLM JSON call failed after ${maxAttempts} attempt(s)`, failures);
}
