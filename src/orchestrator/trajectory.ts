import type { AgentAdapter, AgentResponse, AgentToolCallRequest } from "../agent/adapter.js";
import type { RunConfig } from "../config.js";
import {
  type Actor,
  ActorError,
  ActorTimeoutError,
  errorMessage,
  TrajectoryCancelledError,
} from "../errors.js";
import { addUsage, emptyUsageSummary, sumUsageSummaries, type UsageSummary } from "../llm/usage.js";
import {
  argumentParseError,
  toolErrorPayload,
  type ToolLookup,
  type ToolRegistry,
} from "../tools/registry.js";
import type { Case, TerminalStatus, Trajectory, Turn } from "../types.js";
import type { UserSimulator, UserSimulatorResult } from "../user/simulator.js";
import { deepFreeze } from "../utils/deepFreeze.js";
import { runWithTimeout, sleep } from "../utils/timeout.js";

import { isTerminalMessage } from "./terminal.js";

export type OrchestratorState = "awaiting_user" | "awaiting_agent" | "awaiting_tool" | "terminated";

export type TrajectoryDeps = {
  readonly registry: ToolRegistry;
  readonly agent: AgentAdapter;
  readonly user: UserSimulator;
  readonly config: RunConfig;
  readonly signal?: AbortSignal;
  /** Injectable for reproducible timestamps. */
  readonly clock?: () => Date;
  readonly onTurn?: (turn: Turn) => void;
};

type ActorOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ActorError };

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

type TurnPayload = DistributiveOmit<Turn, "index" | "timestamp" | "agentTurn">;

/**
 * Drives one case through the user/agent/tool turn protocol until a terminal status.
 *
 * Never throws for actor or tool failures: those become typed terminal statuses. The only
 * error that escapes is `TrajectoryCancelledError`, raised once `deps.signal` aborts.
 */
export async function runTrajectory(caseData: Case, deps: TrajectoryDeps): Promise<Trajectory> {
  const { registry, agent, user, config, signal } = deps;
  const clock = deps.clock ?? (() => new Date());
  const tools = registry.schemas();

  const turns: Turn[] = [];
  const modelVersions = new Set<string>();
  const startedAt = clock().toISOString();
  let agentUsage: UsageSummary = emptyUsageSummary();
  let userUsage: UsageSummary = emptyUsageSummary();
  let agentTurns = 0;
  let consecutiveInvalidCalls = 0;
  let pendingCalls: readonly AgentToolCallRequest[] = [];

  const append = (payload: TurnPayload): Turn => {
    const turn = {
      ...payload,
      index: turns.length,
      timestamp: clock().toISOString(),
      agentTurn: agentTurns,
    } satisfies Turn;
    turns.push(deepFreeze(turn));
    deps.onTurn?.(turn);
    return turn;
  };

  const terminate = (status: TerminalStatus, reason: string): OrchestratorState => {
    append({ type: "system_termination", status, reason });
    return "terminated";
  };

  const throwIfCancelled = (cause?: unknown): void => {
    if (signal?.aborted) {
      throw new TrajectoryCancelledError(caseData.id, { cause: cause ?? signal.reason });
    }
  };

  async function invokeActor<T>(
    actor: Actor,
    call: (callSignal: AbortSignal) => Promise<T>,
  ): Promise<ActorOutcome<T>> {
    for (let attempt = 1; ; attempt += 1) {
      throwIfCancelled();
      try {
        const value = await runWithTimeout(call, {
          timeoutMs: config.callTimeoutMs,
          signal,
          createTimeoutError: () =>
            new ActorTimeoutError(actor, config.callTimeoutMs, { attempts: attempt }),
        });
        return { ok: true, value };
      } catch (error) {
        throwIfCancelled(error);
        const retryable = error instanceof ActorError ? error.retryable : true;
        if (!retryable || attempt >= config.maxCallAttempts) {
          return {
            ok: false,
            error:
              error instanceof ActorError && error.attempts === attempt
                ? error
                : new ActorError(actor, errorMessage(error), {
                    retryable,
                    attempts: attempt,
                    cause: error,
                  }),
          };
        }
        try {
          await sleep(config.retryBaseDelayMs * 2 ** (attempt - 1), signal);
        } catch (sleepError) {
          throwIfCancelled(sleepError);
          throw sleepError;
        }
      }
    }
  }

  /** Appends the call and its result; returns true when the trajectory must stop. */
  const dispatchToolCall = (request: AgentToolCallRequest, callId: string): boolean => {
    const lookup: ToolLookup =
      request.parseError && registry.get(request.name)
        ? {
            ok: false,
            toolName: request.name,
            error: argumentParseError(request.name, request.parseError),
          }
        : registry.execute(request.name, request.arguments, caseData);

    if (lookup.ok) {
      consecutiveInvalidCalls = 0;
      append({
        type: "agent_tool_call",
        callId,
        toolName: request.name,
        arguments: request.arguments,
        valid: true,
      });
      append({
        type: "tool_result",
        callId,
        toolName: request.name,
        status: "ok",
        output: lookup.value,
      });
      return false;
    }

    const { error } = lookup;
    // Missing case data is an environment gap, not an agent mistake.
    const missingData = error.kind === "UnknownCaseForTool";
    append({
      type: "agent_tool_call",
      callId,
      toolName: request.name,
      arguments: request.arguments,
      valid: missingData,
    });
    append({
      type: "tool_result",
      callId,
      toolName: request.name,
      status: missingData ? "unavailable" : "invalid_call",
      output: toolErrorPayload(error),
      errorKind: error.kind,
      ...(error.issues.length > 0 ? { issues: error.issues } : {}),
    });

    if (missingData) {
      if (config.missingToolData === "terminate") {
        terminate("tool_error", error.message);
        return true;
      }
      return false;
    }
    consecutiveInvalidCalls += 1;
    if (consecutiveInvalidCalls >= config.maxInvalidToolCalls) {
      const last = `${error.kind} ${request.name}`;
      const reason = `${consecutiveInvalidCalls} consecutive invalid tool calls (last: ${last})`;
      terminate("agent_error", reason);
      return true;
    }
    return false;
  };

  const stepUser = async (): Promise<OrchestratorState> => {
    if (agentTurns >= config.maxTurns) {
      return terminate("max_turns_exceeded", `Reached the limit of ${config.maxTurns} agent turns`);
    }
    const history = [...turns];
    const outcome = await invokeActor("user", (callSignal) =>
      user.nextUtterance({ caseData, history, signal: callSignal }),
    );
    if (!outcome.ok) {
      return terminate("user_error", outcome.error.message);
    }
    const result: UserSimulatorResult = outcome.value;
    userUsage = sumUsageSummaries([userUsage, result.usage]);
    if (result.type === "end_conversation") {
      return terminate("completed", "user_ended_conversation");
    }
    append({
      type: "user_utterance",
      source: "simulator",
      text: result.text,
      ...(result.rationale !== undefined ? { rationale: result.rationale } : {}),
      generations: result.generations,
      ...(result.verifications !== undefined ? { verifications: result.verifications } : {}),
    });
    return "awaiting_agent";
  };

  const stepAgent = async (): Promise<OrchestratorState> => {
    if (agentTurns >= config.maxTurns) {
      return terminate("max_turns_exceeded", `Reached the limit of ${config.maxTurns} agent turns`);
    }
    const history = [...turns];
    const outcome = await invokeActor("agent", (callSignal) =>
      agent.respond({ history, tools, signal: callSignal }),
    );
    if (!outcome.ok) {
      return terminate("agent_error", outcome.error.message);
    }
    const response: AgentResponse = outcome.value;
    agentTurns += 1;
    agentUsage = addUsage(agentUsage, response.usage);
    if (response.modelVersion) {
      modelVersions.add(response.modelVersion);
    }
    if (response.type === "message") {
      const isFinal = isTerminalMessage(config.terminalPolicy, response.text, {
        caseData,
        history: turns,
        agentTurn: agentTurns,
      });
      append({ type: "agent_message", text: response.text, terminal: isFinal });
      return isFinal ? terminate("completed", "agent_final_response") : "awaiting_user";
    }
    if (response.calls.length === 0) {
      return terminate("agent_error", "Agent requested tool calls but supplied none");
    }
    if (response.text) {
      append({ type: "agent_message", text: response.text, terminal: false });
    }
    pendingCalls = response.calls;
    return "awaiting_tool";
  };

  const stepTools = (): OrchestratorState => {
    const calls = pendingCalls;
    pendingCalls = [];
    for (const [position, request] of calls.entries()) {
      if (dispatchToolCall(request, request.id || `call_${agentTurns}_${position + 1}`)) {
        return "terminated";
      }
    }
    return "awaiting_agent";
  };

  let state: OrchestratorState = "awaiting_user";
  if (config.openingTurn === "case_prompt") {
    append({ type: "user_utterance", source: "case", text: caseData.initialPrompt });
    state = "awaiting_agent";
  }
  while (state !== "terminated") {
    switch (state) {
      case "awaiting_user":
        state = await stepUser();
        break;
      case "awaiting_agent":
        state = await stepAgent();
        break;
      case "awaiting_tool":
        state = stepTools();
        break;
    }
  }

  const last = turns.at(-1);
  if (last?.type !== "system_termination") {
    throw new Error("Trajectory loop exited without a termination turn");
  }
  return deepFreeze({
    caseId: caseData.id,
    turns,
    status: last.status,
    terminationReason: last.reason,
    agentTurns,
    startedAt,
    finishedAt: clock().toISOString(),
    usage: { agent: agentUsage, user: userUsage },
    modelVersions: [...modelVersions].sort(),
  });
}
