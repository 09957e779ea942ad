import type { ToolErrorIssue, ToolErrorKind } from "./errors.js";
import type { UsageSummary } from "./llm/usage.js";

export type ToolParameterType = "string" | "number" | "integer" | "boolean" | "object" | "array";

export type ToolParameterSpec = {
  readonly type: ToolParameterType;
  readonly description: string;
  readonly required: boolean;
};

export type ToolSpec = {
  /** Stable short id, e.g. `LC002`. */
  readonly id: string;
  /** Globally unique name exposed to the agent. */
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ToolParameterSpec>>;
};

export type CaseRubricItem = {
  readonly criterion: string;
  readonly weight: number;
  readonly description?: string;
};

export type Case = {
  readonly id: string;
  /** First-contact information shown to the agent. */
  readonly initialPrompt: string;
  /** Hidden goal given to the user simulator. */
  readonly userInstruction: string;
  readonly goldFacts: readonly string[];
  readonly referenceConclusion?: string;
  readonly rubric: readonly CaseRubricItem[];
  /** Precomputed tool responses keyed by tool name. */
  readonly toolResponses: Readonly<Record<string, unknown>>;
  readonly metadata?: Readonly<Record<string, unknown>>;
};

export type TerminalStatus =
  | "completed"
  | "max_turns_exceeded"
  | "agent_error"
  | "user_error"
  | "tool_error";

export const TERMINAL_STATUSES: readonly TerminalStatus[] = [
  "completed",
  "max_turns_exceeded",
  "agent_error",
  "user_error",
  "tool_error",
];

type TurnBase = {
  readonly index: number;
  readonly timestamp: string;
  /** Number of agent responses produced before or by this turn. */
  readonly agentTurn: number;
};

/** Judgment of one candidate utterance. Rejected candidate text is not kept. */
export type UtteranceVerification = {
  readonly accept: boolean;
  readonly score: number;
  readonly feedback: string;
};

export type UserUtteranceTurn = TurnBase & {
  readonly type: "user_utterance";
  readonly source: "case" | "simulator";
  readonly text: string;
  readonly rationale?: string;
  readonly generations?: number;
  readonly verifications?: readonly UtteranceVerification[];
};

export type AgentMessageTurn = TurnBase & {
  readonly type: "agent_message";
  readonly text: string;
  readonly terminal: boolean;
};

export type AgentToolCallTurn = TurnBase & {
  readonly type: "agent_tool_call";
  readonly callId: string;
  readonly toolName: string;
  readonly arguments: unknown;
  readonly valid: boolean;
};

export type ToolResultStatus = "ok" | "invalid_call" | "unavailable";

export type ToolResultTurn = TurnBase & {
  readonly type: "tool_result";
  readonly callId: string;
  readonly toolName: string;
  readonly status: ToolResultStatus;
  /** Payload fed back to the agent. */
  readonly output: unknown;
  readonly errorKind?: ToolErrorKind;
  readonly issues?: readonly ToolErrorIssue[];
};

export type SystemTerminationTurn = TurnBase & {
  readonly type: "system_termination";
  readonly status: TerminalStatus;
  readonly reason: string;
};

export type Turn =
  | UserUtteranceTurn
  | AgentMessageTurn
  | AgentToolCallTurn
  | ToolResultTurn
  | SystemTerminationTurn;

export type TrajectoryUsage = {
  readonly agent: UsageSummary;
  readonly user: UsageSummary;
};

export type Trajectory = {
  readonly caseId: string;
  readonly turns: readonly Turn[];
  readonly status: TerminalStatus;
  readonly terminationReason: string;
  readonly agentTurns: number;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly usage: TrajectoryUsage;
  readonly modelVersions: readonly string[];
};

export type CriterionScore = {
  readonly id: string;
  readonly description: string;
  readonly weight: number;
  readonly score: number;
  readonly error?: string;
};

export const RESPONSIBLE_ACTORS = ["user", "agent", "environment"] as const;
export type ResponsibleActor = (typeof RESPONSIBLE_ACTORS)[number];

export const FAULT_TYPES = [
  "goal_partially_completed",
  "used_wrong_tool",
  "used_wrong_tool_argument",
  "took_unintended_action",
  "other",
] as const;
export type FaultType = (typeof FAULT_TYPES)[number];

/** Advisory only: produced by a generative judge and never used as ground truth. */
export type FaultAttribution = {
  readonly responsibleActor: ResponsibleActor;
  readonly faultType: FaultType;
  readonly justification: string;
  readonly model: string;
};

export type EvaluationResult = {
  readonly caseId: string;
  readonly scores: readonly CriterionScore[];
  readonly weightedTotal: number;
  readonly faultAttribution?: FaultAttribution;
  readonly attributionError?: string;
};
