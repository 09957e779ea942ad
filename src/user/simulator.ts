import { z } from "zod";

import type { UserStrategy } from "../config.js";
import { ActorError } from "../errors.js";
import { generateJson, generateText, type ChatBackend, type ChatMessage } from "../llm/chat.js";
import {
  addUsage,
  emptyUsageSummary,
  type LlmUsageTokens,
  type UsageSummary,
} from "../llm/usage.js";
import { renderPrompt, STOP_TOKEN } from "../prompts.js";
import { renderTranscript } from "../orchestrator/queries.js";
import type { Case, Turn, UtteranceVerification } from "../types.js";

export type SimulatedUtterance = {
  readonly type: "utterance";
  readonly text: string;
  readonly rationale?: string;
  /** Candidate utterances generated for this turn. */
  readonly generations: number;
  readonly verifications?: readonly UtteranceVerification[];
  readonly usage: UsageSummary;
};

export type EndConversation = {
  readonly type: "end_conversation";
  readonly usage: UsageSummary;
};

export type UserSimulatorResult = SimulatedUtterance | EndConversation;

export type UserSimulatorInput = {
  readonly caseData: Case;
  readonly history: readonly Turn[];
  readonly signal?: AbortSignal;
};

export type UserSimulator = {
  readonly strategy: UserStrategy | "scripted";
  readonly nextUtterance: (input: UserSimulatorInput) => Promise<UserSimulatorResult>;
};

export type UserSimulatorOptions = {
  readonly strategy: UserStrategy;
  readonly backend: ChatBackend;
  readonly model: string;
  /** Model for verify/reflect judgments; defaults to `model`. */
  readonly verifierModel?: string;
  readonly temperature?: number;
  /** Regenerations allowed after a rejected candidate (verify/reflect). */
  readonly maxRetries?: number;
};

const reasoningSchema = z.object({
  rationale: z.string(),
  utterance: z.string(),
});

const judgmentSchema = z.object({
  accept: z.boolean(),
  score: z.coerce.number().min(0).max(10),
  feedback: z.string().default(""),
});

type Candidate = {
  readonly text: string;
  readonly rationale?: string;
};

/**
 * The simulator plays the user, so roles are mirrored: its own past utterances are
 * `assistant` messages and the agent's replies are `user` messages. Tool traffic is hidden.
 */
export function toSimulatorMessages(history: readonly Turn[]): ChatMessage[] {
  const messages: ChatMessage[] = [];
  for (const turn of history) {
    if (turn.type === "user_utterance") {
      messages.push({ role: "assistant", content: turn.text });
    } else if (turn.type === "agent_message") {
      messages.push({ role: "user", content: turn.text });
    }
  }
  if (messages.length === 0) {
    messages.push({ role: "user", content: "(The assistant is waiting for your first message.)" });
  }
  return messages;
}

export function isStopUtterance(text: string): boolean {
  return text.includes(STOP_TOKEN);
}

export function createUserSimulator(options: UserSimulatorOptions): UserSimulator {
  const maxRetries = Math.max(0, Math.floor(options.maxRetries ?? 1));
  const verifierModel = options.verifierModel ?? options.model;

  async function generateCandidate(
    input: UserSimulatorInput,
    track: (usage: LlmUsageTokens | undefined) => void,
    reflection?: { readonly previous: string; readonly feedback: string },
  ): Promise<Candidate> {
    const { caseData, history, signal } = input;
    const instructionParts = [
      renderPrompt("user_simulator", {
        USER_INSTRUCTION: caseData.userInstruction,
        INITIAL_PROMPT: caseData.initialPrompt,
      }),
    ];
    if (options.strategy === "reasoning") {
      instructionParts.push(renderPrompt("user_reasoning"));
    }
    if (reflection) {
      instructionParts.push(
        renderPrompt("user_reflection", {
          PREVIOUS_CANDIDATE: reflection.previous,
          FEEDBACK: reflection.feedback,
        }),
      );
    }
    const request = {
      backend: options.backend,
      model: options.model,
      instructions: instructionParts.join("\n\n"),
      input: toSimulatorMessages(history),
      temperature: options.temperature,
      signal,
    };
    if (options.strategy === "reasoning") {
      const { value, response } = await generateJson({ ...request, schema: reasoningSchema });
      track(response.usage);
      return { text: value.utterance.trim(), rationale: value.rationale.trim() };
    }
    const response = await generateText(request);
    track(response.usage);
    return { text: response.text.trim() };
  }

  async function judgeCandidate(
    input: UserSimulatorInput,
    candidate: string,
    track: (usage: LlmUsageTokens | undefined) => void,
  ): Promise<UtteranceVerification> {
    const { value, response } = await generateJson({
      backend: options.backend,
      model: verifierModel,
      input: renderPrompt("user_verifier", {
        USER_INSTRUCTION: input.caseData.userInstruction,
        CONVERSATION: renderTranscript(input.history, { userView: true }) || "(empty)",
        CANDIDATE: candidate,
      }),
      schema: judgmentSchema,
      signal: input.signal,
    });
    track(response.usage);
    return { accept: value.accept, score: value.score, feedback: value.feedback };
  }

  const nextUtterance = async (input: UserSimulatorInput): Promise<UserSimulatorResult> => {
    let usage = emptyUsageSummary();
    const track = (tokens: LlmUsageTokens | undefined) => {
      usage = addUsage(usage, tokens);
    };
    const finish = (
      candidate: Candidate,
      extra: Omit<SimulatedUtterance, "type" | "text" | "usage">,
    ): UserSimulatorResult => {
      if (isStopUtterance(candidate.text)) {
        return { type: "end_conversation", usage };
      }
      if (!candidate.text) {
        throw new ActorError("user", "User simulator produced an empty utterance");
      }
      return {
        type: "utterance",
        text: candidate.text,
        ...(candidate.rationale ? { rationale: candidate.rationale } : {}),
        ...extra,
        usage,
      };
    };

    if (options.strategy === "direct" || options.strategy === "reasoning") {
      return finish(await generateCandidate(input, track), { generations: 1 });
    }

    const verifications: UtteranceVerification[] = [];
    let best: { readonly candidate: Candidate; readonly score: number } | null = null;
    let reflection: { readonly previous: string; readonly feedback: string } | undefined;
    for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
      const candidate = await generateCandidate(input, track, reflection);
      if (isStopUtterance(candidate.text)) {
        return finish(candidate, { generations: attempt + 1, verifications });
      }
      const verdict = await judgeCandidate(input, candidate.text, track);
      verifications.push(verdict);
      if (verdict.accept) {
        return finish(candidate, { generations: attempt + 1, verifications });
      }
      if (!best || verdict.score > best.score) {
        best = { candidate, score: verdict.score };
      }
      if (options.strategy === "reflect") {
        reflection = { previous: candidate.text, feedback: verdict.feedback };
      }
    }
    if (!best) {
      throw new ActorError("user", "User simulator produced no candidate", { retryable: false });
    }
    return finish(best.candidate, { generations: maxRetries + 1, verifications });
  };

  return { strategy: options.strategy, nextUtterance };
}

/** Replays fixed utterances, then ends the conversation. */
export function createScriptedUserSimulator(utterances: readonly string[]): UserSimulator {
  let cursor = 0;
  return {
    strategy: "scripted",
    nextUtterance: async () => {
      const text = utterances[cursor];
      cursor += 1;
      if (text === undefined || isStopUtterance(text)) {
        return { type: "end_conversation", usage: emptyUsageSummary() };
      }
      return { type: "utterance", text, generations: 1, usage: emptyUsageSummary() };
    },
  };
}
