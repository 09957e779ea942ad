import { z } from "zod";

import { generateJson, type ChatBackend } from "../llm/chat.js";
import {
  agentMessages,
  finalAgentMessage,
  firstSuccessfulResultIndex,
  renderTranscript,
  toolCalls,
  toolResults,
} from "../orchestrator/queries.js";
import { renderPrompt } from "../prompts.js";
import type { CaseRubricItem } from "../types.js";

import { defineRubric, type Rubric, type RubricCriterion } from "./scorer.js";

export function completedStatus(weight = 1): RubricCriterion {
  return {
    id: "completed_status",
    description: "The conversation reached a completed terminal status.",
    weight,
    score: ({ trajectory }) => (trajectory.status === "completed" ? 1 : 0),
  };
}

/** Fraction of `tools` with at least one successful lookup. */
export function requiredToolsCalled(tools: readonly string[], weight = 1): RubricCriterion {
  return {
    id: `required_tools_called:${[...tools].sort().join(",")}`,
    description: `The agent retrieved data from: ${tools.join(", ")}.`,
    weight,
    score: ({ trajectory }) => {
      if (tools.length === 0) {
        return 1;
      }
      const succeeded = new Set(
        toolResults(trajectory.turns)
          .filter((turn) => turn.status === "ok")
          .map((turn) => turn.toolName),
      );
      return tools.filter((tool) => succeeded.has(tool)).length / tools.length;
    },
  };
}

function matchesClaim(text: string, claim: string | RegExp): boolean {
  return typeof claim === "string"
    ? text.toLowerCase().includes(claim.toLowerCase())
    : claim.test(text);
}

/**
 * 1 when the agent never asserts `claim`, or only asserts it after a successful lookup of
 * `tool`; 0 when the claim appears before any such lookup.
 */
export function toolCalledBeforeClaim(options: {
  readonly tool: string;
  readonly claim: string | RegExp;
  readonly weight?: number;
}): RubricCriterion {
  const label = typeof options.claim === "string" ? options.claim : options.claim.source;
  return {
    id: `tool_before_claim:${options.tool}:${label}`,
    description: `The agent called ${options.tool} before asserting "${label}".`,
    weight: options.weight ?? 1,
    score: ({ trajectory }) => {
      const claimTurn = agentMessages(trajectory.turns).find((turn) =>
        matchesClaim(turn.text, options.claim),
      );
      if (!claimTurn) {
        return 1;
      }
      const lookupIndex = firstSuccessfulResultIndex(trajectory.turns, options.tool);
      return lookupIndex >= 0 && lookupIndex < claimTurn.index ? 1 : 0;
    },
  };
}

/** Fraction of the case's gold facts mentioned (case-insensitively) by the agent. */
export function goldFactsMentioned(weight = 1): RubricCriterion {
  return {
    id: "gold_facts_mentioned",
    description: "The agent's messages state the case's reference facts.",
    weight,
    score: ({ trajectory, caseData }) => {
      if (caseData.goldFacts.length === 0) {
        return 1;
      }
      const said = agentMessages(trajectory.turns)
        .map((turn) => turn.text.toLowerCase())
        .join("\n");
      const hits = caseData.goldFacts.filter((fact) => said.includes(fact.toLowerCase()));
      return hits.length / caseData.goldFacts.length;
    },
  };
}

/** Share of tool calls that passed validation; 1 when the agent made none. */
export function toolCallValidity(weight = 1): RubricCriterion {
  return {
    id: "tool_call_validity",
    description: "The agent's tool calls named real tools with well-formed arguments.",
    weight,
    score: ({ trajectory }) => {
      const calls = toolCalls(trajectory.turns);
      if (calls.length === 0) {
        return 1;
      }
      return calls.filter((call) => call.valid).length / calls.length;
    },
  };
}

const rubricJudgeSchema = z.object({
  scores: z.array(
    z.object({
      criterion: z.string(),
      score: z.coerce.number().min(0).max(10),
      comment: z.string().optional(),
    }),
  ),
});

function formatRubricItem(item: CaseRubricItem): string {
  const description = item.description ? `: ${item.description}` : "";
  return `- ${item.criterion} (weight ${item.weight})${description}`;
}

/**
 * LLM-graded case rubric: each item is scored 0-10 and the items are weight-normalized.
 * Items the judge leaves out score 0. Cases without rubric items score 1.
 */
export function caseRubricJudge(options: {
  readonly backend: ChatBackend;
  readonly model: string;
  readonly weight?: number;
}): RubricCriterion {
  return {
    id: "case_rubric_judge",
    description: "Case-specific rubric graded by an LLM judge.",
    weight: options.weight ?? 1,
    score: async ({ trajectory, caseData, signal }) => {
      const items = caseData.rubric;
      const totalWeight = items.reduce((sum, item) => sum + item.weight, 0);
      if (items.length === 0 || totalWeight <= 0) {
        return 1;
      }
      const { value } = await generateJson({
        backend: options.backend,
        model: options.model,
        input: renderPrompt("rubric_judge", {
          INITIAL_PROMPT: caseData.initialPrompt,
          REFERENCE_CONCLUSION: caseData.referenceConclusion ?? "",
          RUBRIC: items.map(formatRubricItem).join("\n"),
          TRANSCRIPT: renderTranscript(trajectory.turns),
          FINAL_ANSWER: finalAgentMessage(trajectory.turns)?.text ?? "",
        }),
        schema: rubricJudgeSchema,
        signal,
      });
      const byCriterion = new Map(
        value.scores.map((entry) => [entry.criterion.trim().toLowerCase(), entry.score]),
      );
      let weighted = 0;
      for (const item of items) {
        weighted += item.weight * (byCriterion.get(item.criterion.trim().toLowerCase()) ?? 0);
      }
      return weighted / (10 * totalWeight);
    },
  };
}

export function createDefaultRubric(options: {
  readonly backend?: ChatBackend;
  readonly judgeModel?: string;
} = {}): Rubric {
  const criteria: RubricCriterion[] = [
    completedStatus(1),
    toolCallValidity(1),
    goldFactsMentioned(1),
  ];
  if (options.backend && options.judgeModel) {
    criteria.push(
      caseRubricJudge({ backend: options.backend, model: options.judgeModel, weight: 3 }),
    );
  }
  return defineRubric(criteria);
}
