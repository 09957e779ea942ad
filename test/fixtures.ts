import { resolveRunConfig, type RunConfig, type RunConfigOverrides } from "../src/config.js";
import type { ChatBackend, ChatRequest, ChatResponse } from "../src/llm/chat.js";
import type { Case, ToolSpec } from "../src/types.js";

export const TEST_TOOLS: readonly ToolSpec[] = [
  {
    id: "LC002",
    name: "get_tumor_markers",
    description: "Tumour marker panel.",
    parameters: {
      test_date: { type: "string", description: "Test date.", required: false },
    },
  },
  {
    id: "LC003",
    name: "get_pathology_data",
    description: "Pathology findings.",
    parameters: {},
  },
  {
    id: "LC006",
    name: "get_tnm_staging_details",
    description: "TNM staging measurements.",
    parameters: {},
  },
  {
    id: "LC011",
    name: "get_treatment_history",
    description: "Treatment history.",
    parameters: {
      treatment_type: { type: "string", description: "Treatment type.", required: true },
      limit: { type: "integer", description: "Maximum entries.", required: false },
    },
  },
];

export function makeCase(overrides: Partial<Case> = {}): Case {
  return {
    id: "case-1",
    initialPrompt: "Patient, 65, right upper lobe mass. What stage is this?",
    userInstruction: "You are the patient's son. Ask for a staging opinion.",
    goldFacts: ["CEA 8.5"],
    rubric: [],
    toolResponses: {
      get_tumor_markers: { CEA: 8.5 },
      get_pathology_data: { histology_type: "adenocarcinoma" },
    },
    ...overrides,
  };
}

export function makeConfig(overrides: RunConfigOverrides = {}): RunConfig {
  return resolveRunConfig({ retryBaseDelayMs: 0, callTimeoutMs: 1_000, ...overrides }, {});
}

/** Clock that advances one second per reading, starting at 2024-01-01T00:00:00Z. */
export function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
}

export type ScriptedReply = Partial<ChatResponse> | ((request: ChatRequest) => Partial<ChatResponse>);

export type ScriptedBackend = {
  readonly backend: ChatBackend;
  readonly requests: ChatRequest[];
};

/** Replays replies in order and records every request. Running out of replies throws. */
export function createScriptedBackend(replies: readonly ScriptedReply[]): ScriptedBackend {
  const requests: ChatRequest[] = [];
  let cursor = 0;
  const backend: ChatBackend = {
    complete: async (request) => {
      requests.push(request);
      const reply = replies[cursor];
      cursor += 1;
      if (reply === undefined) {
        throw new Error(`No scripted reply for request ${cursor}`);
      }
      const partial = typeof reply === "function" ? reply(request) : reply;
      return {
        modelVersion: request.model,
        text: "",
        toolCalls: [],
        ...partial,
      };
    },
  };
  return { backend, requests };
}
