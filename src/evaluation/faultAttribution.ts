import { z } from "zod";

import { generateJson, type ChatBackend } from "../llm/chat.js";
import { renderTranscript } from "../orchestrator/queries.js";
import { renderPrompt } from "../prompts.js";
import {
  FAULT_TYPES,
  RESPONSIBLE_ACTORS,
  type Case,
  type FaultAttribution,
  type Trajectory,
} from "../types.js";

export type FaultAttributionInput = {
  readonly trajectory: Trajectory;
  readonly caseData: Case;
  readonly weightedTotal: number;
  readonly signal?: AbortSignal;
};

export type FaultAttributor = {
  readonly attribute: (input: FaultAttributionInput) => Promise<FaultAttribution>;
};

const attributionSchema = z.object({
  responsible_actor: z.enum(RESPONSIBLE_ACTORS),
  fault_type: z.enum(FAULT_TYPES),
  justification: z.string().min(1),
});

/**
 * LLM judge that names the actor and failure mode behind a weak trajectory. Its verdict is
 * a diagnostic hint only.
 */
export function createFaultAttributor(options: {
  readonly backend: ChatBackend;
  readonly model: string;
  readonly maxAttempts?: number;
}): FaultAttributor {
  return {
    attribute: async ({ trajectory, caseData, weightedTotal, signal }) => {
      const { value } = await generateJson({
        backend: options.backend,
        model: options.model,
        input: renderPrompt("fault_attribution", {
          USER_INSTRUCTION: caseData.userInstruction,
          STATUS: trajectory.status,
          REASON: trajectory.terminationReason,
          SCORE: weightedTotal.toFixed(3),
          TRANSCRIPT: renderTranscript(trajectory.turns),
          ACTORS: RESPONSIBLE_ACTORS.join(", "),
          FAULT_TYPES: FAULT_TYPES.join(", "),
        }),
        schema: attributionSchema,
        maxAttempts: options.maxAttempts ?? 2,
        signal,
      });
      return {
        responsibleActor: value.responsible_actor,
        faultType: value.fault_type,
        justification: value.justification.trim(),
        model: options.model,
      };
    },
  };
}
