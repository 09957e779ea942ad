export {
  ActorError,
  ActorTimeoutError,
  EvaluationError,
  LlmJsonCallError,
  LoaderError,
  ToolError,
  TrajectoryCancelledError,
} from "./errors.js";

export type { Actor, ActorErrorOptions, ToolErrorIssue, ToolErrorKind } from "./errors.js";

export {
  DEFAULT_AGENT_MODEL,
  DEFAULT_JUDGE_MODEL,
  DEFAULT_USER_MODEL,
  resolveRunConfig,
  USER_STRATEGIES,
} from "./config.js";

export type {
  RunConfig,
  RunConfigOverrides,
  TerminalPolicy,
  TerminalPredicate,
  TerminalPredicateContext,
  UserStrategy,
} from "./config.js";

export { FAULT_TYPES, RESPONSIBLE_ACTORS, TERMINAL_STATUSES } from "./types.js";

export type {
  AgentMessageTurn,
  AgentToolCallTurn,
  Case,
  CaseRubricItem,
  CriterionScore,
  EvaluationResult,
  FaultAttribution,
  FaultType,
  ResponsibleActor,
  SystemTerminationTurn,
  TerminalStatus,
  ToolParameterSpec,
  ToolParameterType,
  ToolResultStatus,
  ToolResultTurn,
  ToolSpec,
  Trajectory,
  TrajectoryUsage,
  Turn,
  UserUtteranceTurn,
  UtteranceVerification,
} from "./types.js";

export { loadDataset, loadToolSpecs, parseCases, parseToolSpecs } from "./data/loader.js";
export type { LoadedDataset } from "./data/loader.js";

export { argumentParseError, createToolRegistry, toolErrorPayload } from "./tools/registry.js";
export type { AgentToolSchema, ToolLookup, ToolRegistry } from "./tools/registry.js";

export {
  createOpenAiCompatibleBackend,
  generateJson,
  generateText,
  parseJsonFromLlmText,
  parseToolArguments,
} from "./llm/chat.js";

export type {
  ChatBackend,
  ChatMessage,
  ChatRequest,
  ChatResponse,
  ChatToolCall,
  ChatToolDefinition,
  LlmJsonRequest,
  LlmTextRequest,
} from "./llm/chat.js";

export type { LlmUsageTokens, UsageSummary } from "./llm/usage.js";

export { createLlmAgentAdapter, trajectoryToChatMessages } from "./agent/llmAgent.js";
export { createScriptedAgentAdapter } from "./agent/scripted.js";
export type {
  AgentAdapter,
  AgentRespondInput,
  AgentResponse,
  AgentToolCallRequest,
} from "./agent/adapter.js";
export type { LlmAgentOptions } from "./agent/llmAgent.js";
export type { ScriptedAgentStep } from "./agent/scripted.js";

export { createScriptedUserSimulator, createUserSimulator } from "./user/simulator.js";
export type {
  EndConversation,
  SimulatedUtterance,
  UserSimulator,
  UserSimulatorInput,
  UserSimulatorOptions,
  UserSimulatorResult,
} from "./user/simulator.js";

export { runTrajectory } from "./orchestrator/trajectory.js";
export type { OrchestratorState, TrajectoryDeps } from "./orchestrator/trajectory.js";
export { isTerminalMessage, parseTerminalPolicy } from "./orchestrator/terminal.js";
export {
  agentMessages,
  checkTrajectoryInvariants,
  finalAgentMessage,
  renderTranscript,
  toolCalls,
  toolResults,
} from "./orchestrator/queries.js";

export {
  defineRubric,
  evaluateTrajectory,
  needsAttribution,
  scoreTrajectory,
} from "./evaluation/scorer.js";
export type {
  CriterionContext,
  EvaluateOptions,
  Rubric,
  RubricCriterion,
} from "./evaluation/scorer.js";
export {
  caseRubricJudge,
  completedStatus,
  createDefaultRubric,
  goldFactsMentioned,
  requiredToolsCalled,
  toolCallValidity,
  toolCalledBeforeClaim,
} from "./evaluation/criteria.js";
export { createFaultAttributor } from "./evaluation/faultAttribution.js";
export type { FaultAttributionInput, FaultAttributor } from "./evaluation/faultAttribution.js";

export { runBatch, streamBatch } from "./batch/runner.js";
export type { BatchOptions, BatchStream, BatchSummary } from "./batch/runner.js";
export { createJsonlStore, parseRecordLines } from "./batch/store.js";
export type {
  BatchRecord,
  BatchRecordStatus,
  LoadedRecords,
  StoredBatchRecord,
  TrajectoryStore,
} from "./batch/store.js";
export { formatStatusSummary, summarizeRecords, watchProgress } from "./batch/status.js";
export type { StatusSummary, WatchProgressOptions } from "./batch/status.js";
export type { BatchEvent, BatchTelemetrySink } from "./batch/telemetry.js";

export { renderPrompt, STOP_TOKEN } from "./prompts.js";
