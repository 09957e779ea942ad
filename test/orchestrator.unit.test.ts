import { describe, expect, it } from "vitest";

import type { AgentAdapter, AgentResponse } from "../src/agent/adapter.js";
import { createScriptedAgentAdapter } from "../src/agent/scripted.js";
import { TrajectoryCancelledError } from "../src/errors.js";
import { emptyUsageSummary } from "../src/llm/usage.js";
import { agentMessages, checkTrajectoryInvariants } from "../src/orchestrator/queries.js";
import { runTrajectory, type TrajectoryDeps } from "../src/orchestrator/trajectory.js";
import { createToolRegistry } from "../src/tools/registry.js";
import type { Turn } from "../src/types.js";
import { createScriptedUserSimulator, type UserSimulator } from "../src/user/simulator.js";

import { makeCase, makeConfig, steppingClock, TEST_TOOLS } from "./fixtures.js";

const registry = createToolRegistry(TEST_TOOLS);

function callTool(name: string, args: unknown = {}, id?: string): AgentResponse {
  return { type: "tool_calls", calls: [{ ...(id ? { id } : {}), name, arguments: args }] };
}

function say(text: string): AgentResponse {
  return { type: "message", text };
}

function deps(overrides: Partial<TrajectoryDeps> & Pick<TrajectoryDeps, "agent">): TrajectoryDeps {
  return {
    registry,
    user: createScriptedUserSimulator([]),
    config: makeConfig(),
    clock: steppingClock(),
    ...overrides,
  };
}

function shape(turns: readonly Turn[]): string[] {
  return turns.map((turn) => `${turn.index}:${turn.type}`);
}

describe("runTrajectory", () => {
  it("feeds a tool result back before the agent's final answer", async () => {
    const agent = createScriptedAgentAdapter([
      callTool("get_tumor_markers"),
      say("CEA is 8.5 ng/mL, mildly elevated."),
    ]);
    const trajectory = await runTrajectory(makeCase(), deps({ agent }));

    expect(shape(trajectory.turns)).toEqual([
      "0:user_utterance",
      "1:agent_tool_call",
      "2:tool_result",
      "3:agent_message",
      "4:system_termination",
    ]);
    expect(trajectory.turns[1]).toMatchObject({
      callId: "call_1_1",
      toolName: "get_tumor_markers",
      valid: true,
      agentTurn: 1,
    });
    expect(trajectory.turns[2]).toMatchObject({
      type: "tool_result",
      callId: "call_1_1",
      status: "ok",
      output: { CEA: 8.5 },
    });
    expect(trajectory.turns[3]).toMatchObject({ terminal: true, agentTurn: 2 });
    expect(trajectory.status).toBe("completed");
    expect(trajectory.terminationReason).toBe("agent_final_response");
    expect(trajectory.agentTurns).toBe(2);
    expect(checkTrajectoryInvariants(trajectory, 10)).toEqual([]);
  });

  it("ends with agent_error after three consecutive unknown tools", async () => {
    const agent = createScriptedAgentAdapter([callTool("LC999"), callTool("LC999"), callTool("LC999")]);
    const trajectory = await runTrajectory(makeCase(), deps({ agent }));

    expect(shape(trajectory.turns)).toEqual([
      "0:user_utterance",
      "1:agent_tool_call",
      "2:tool_result",
      "3:agent_tool_call",
      "4:tool_result",
      "5:agent_tool_call",
      "6:tool_result",
      "7:system_termination",
    ]);
    for (const index of [2, 4, 6]) {
      expect(trajectory.turns[index]).toMatchObject({
        status: "invalid_call",
        errorKind: "UnknownTool",
        output: { error: "Unknown tool: LC999", kind: "UnknownTool" },
      });
    }
    expect(trajectory.turns[1]).toMatchObject({ valid: false });
    expect(trajectory.status).toBe("agent_error");
    expect(trajectory.terminationReason).toBe("3 consecutive invalid tool calls (last: UnknownTool LC999)");
    expect(checkTrajectoryInvariants(trajectory)).toEqual([]);
  });

  it("resets the invalid-call counter on a valid call", async () => {
    const agent = createScriptedAgentAdapter([
      callTool("LC999"),
      callTool("get_tumor_markers"),
      callTool("LC999"),
      callTool("get_treatment_history", { limit: 1 }),
      say("Done."),
    ]);
    const trajectory = await runTrajectory(makeCase(), deps({ agent }));
    expect(trajectory.status).toBe("completed");
    expect(trajectory.agentTurns).toBe(5);
  });

  it("stops at the agent turn budget", async () => {
    const agent = createScriptedAgentAdapter([callTool("get_tumor_markers"), callTool("get_pathology_data")]);
    const trajectory = await runTrajectory(makeCase(), deps({ agent, config: makeConfig({ maxTurns: 2 }) }));

    expect(trajectory.status).toBe("max_turns_exceeded");
    expect(trajectory.terminationReason).toBe("Reached the limit of 2 agent turns");
    expect(trajectory.agentTurns).toBe(2);
    expect(trajectory.turns).toHaveLength(6);
    expect(checkTrajectoryInvariants(trajectory, 2)).toEqual([]);
  });

  it("hands non-final messages to the user and completes when the user stops", async () => {
    const agent = createScriptedAgentAdapter([say("Could you share the smoking history?"), say("Stage IB.")]);
    const user = createScriptedUserSimulator(["40 pack-years."]);
    const trajectory = await runTrajectory(
      makeCase(),
      deps({ agent, user, config: makeConfig({ terminalPolicy: { type: "never" } }) }),
    );

    expect(shape(trajectory.turns)).toEqual([
      "0:user_utterance",
      "1:agent_message",
      "2:user_utterance",
      "3:agent_message",
      "4:system_termination",
    ]);
    expect(trajectory.turns[0]).toMatchObject({ source: "case" });
    expect(trajectory.turns[2]).toMatchObject({
      source: "simulator",
      text: "40 pack-years.",
      generations: 1,
      agentTurn: 1,
    });
    expect(trajectory.status).toBe("completed");
    expect(trajectory.terminationReason).toBe("user_ended_conversation");
  });

  it("treats only marked messages as final under a marker policy", async () => {
    const agent = createScriptedAgentAdapter([say("Let me think."), say("final answer: stage IB")]);
    const user = createScriptedUserSimulator(["Go on."]);
    const trajectory = await runTrajectory(
      makeCase(),
      deps({ agent, user, config: makeConfig({ terminalPolicy: { type: "marker", marker: "FINAL ANSWER" } }) }),
    );
    expect(agentMessages(trajectory.turns).map((turn) => turn.terminal)).toEqual([false, true]);
    expect(trajectory.terminationReason).toBe("agent_final_response");
  });

  it("passes the trajectory context to a predicate policy", async () => {
    const seen: number[] = [];
    const agent = createScriptedAgentAdapter([say("one"), say("two")]);
    const user = createScriptedUserSimulator(["next"]);
    const trajectory = await runTrajectory(
      makeCase(),
      deps({
        agent,
        user,
        config: makeConfig({
          terminalPolicy: {
            type: "predicate",
            test: (_text, context) => {
              seen.push(context.agentTurn);
              return context.agentTurn >= 2;
            },
          },
        }),
      }),
    );
    expect(seen).toEqual([1, 2]);
    expect(trajectory.status).toBe("completed");
  });

  it("opens with the simulator when configured", async () => {
    const agent = createScriptedAgentAdapter([say("Hello, how can I help?")]);
    const user = createScriptedUserSimulator(["My father has a lung mass."]);
    const trajectory = await runTrajectory(
      makeCase(),
      deps({ agent, user, config: makeConfig({ openingTurn: "simulated" }) }),
    );
    expect(trajectory.turns[0]).toMatchObject({
      type: "user_utterance",
      source: "simulator",
      text: "My father has a lung mass.",
      agentTurn: 0,
    });
  });

  it("records text sent alongside tool calls and dispatches calls in order", async () => {
    const agent = createScriptedAgentAdapter([
      {
        type: "tool_calls",
        text: "Checking labs and pathology.",
        calls: [
          { id: "a", name: "get_tumor_markers", arguments: {} },
          { id: "b", name: "get_pathology_data", arguments: {} },
        ],
      },
      say("Adenocarcinoma, CEA 8.5."),
    ]);
    const trajectory = await runTrajectory(makeCase(), deps({ agent }));
    expect(shape(trajectory.turns)).toEqual([
      "0:user_utterance",
      "1:agent_message",
      "2:agent_tool_call",
      "3:tool_result",
      "4:agent_tool_call",
      "5:tool_result",
      "6:agent_message",
      "7:system_termination",
    ]);
    expect(trajectory.turns[1]).toMatchObject({ text: "Checking labs and pathology.", terminal: false });
    expect(trajectory.turns[3]).toMatchObject({ callId: "a", toolName: "get_tumor_markers" });
    expect(trajectory.turns[5]).toMatchObject({ callId: "b", toolName: "get_pathology_data" });
  });

  it("feeds back unavailable data without counting it as invalid", async () => {
    const agent = createScriptedAgentAdapter([
      callTool("get_tnm_staging_details"),
      callTool("get_tnm_staging_details"),
      callTool("get_tnm_staging_details"),
      say("Staging data is not available."),
    ]);
    const trajectory = await runTrajectory(makeCase(), deps({ agent }));
    expect(trajectory.status).toBe("completed");
    expect(trajectory.turns[1]).toMatchObject({ valid: true });
    expect(trajectory.turns[2]).toMatchObject({
      status: "unavailable",
      errorKind: "UnknownCaseForTool",
      output: {
        error: "No get_tnm_staging_details data is available for case case-1",
        kind: "UnknownCaseForTool",
      },
    });
  });

  it("terminates with tool_error on missing data when configured", async () => {
    const agent = createScriptedAgentAdapter([callTool("get_tnm_staging_details")]);
    const trajectory = await runTrajectory(
      makeCase(),
      deps({ agent, config: makeConfig({ missingToolData: "terminate" }) }),
    );
    expect(shape(trajectory.turns)).toEqual([
      "0:user_utterance",
      "1:agent_tool_call",
      "2:tool_result",
      "3:system_termination",
    ]);
    expect(trajectory.status).toBe("tool_error");
    expect(trajectory.terminationReason).toBe("No get_tnm_staging_details data is available for case case-1");
  });

  it("reports unparseable arguments as schema violations", async () => {
    const agent = createScriptedAgentAdapter([
      {
        type: "tool_calls",
        calls: [{ name: "get_tumor_markers", arguments: "{bad", parseError: "Unexpected token b" }],
      },
      say("Sorry."),
    ]);
    const trajectory = await runTrajectory(makeCase(), deps({ agent }));
    expect(trajectory.turns[2]).toMatchObject({
      status: "invalid_call",
      errorKind: "SchemaViolation",
      issues: [{ path: [], message: "Unexpected token b", code: "invalid_json" }],
    });
  });

  it("rejects an empty tool-call response", async () => {
    const agent = createScriptedAgentAdapter([{ type: "tool_calls", calls: [] }]);
    const trajectory = await runTrajectory(makeCase(), deps({ agent }));
    expect(trajectory.status).toBe("agent_error");
    expect(trajectory.terminationReason).toBe("Agent requested tool calls but supplied none");
  });

  it("retries failing agent calls and then records agent_error", async () => {
    let calls = 0;
    const agent: AgentAdapter = {
      respond: async () => {
        calls += 1;
        throw new Error("upstream 500");
      },
    };
    const trajectory = await runTrajectory(makeCase(), deps({ agent, config: makeConfig({ maxCallAttempts: 3 }) }));
    expect(calls).toBe(3);
    expect(trajectory.status).toBe("agent_error");
    expect(trajectory.terminationReason).toBe("upstream 500");
    expect(trajectory.agentTurns).toBe(0);
  });

  it("does not retry non-retryable actor errors", async () => {
    const agent = createScriptedAgentAdapter([]);
    const trajectory = await runTrajectory(makeCase(), deps({ agent, config: makeConfig({ maxCallAttempts: 5 }) }));
    expect(trajectory.status).toBe("agent_error");
    expect(trajectory.terminationReason).toBe("Scripted agent has no response for step 1");
  });

  it("times out a stalled agent call and aborts its signal", async () => {
    const signals: AbortSignal[] = [];
    const agent: AgentAdapter = {
      respond: ({ signal }) =>
        new Promise<AgentResponse>((_, reject) => {
          if (signal) {
            signals.push(signal);
            signal.addEventListener("abort", () => reject(signal.reason), { once: true });
          }
        }),
    };
    const trajectory = await runTrajectory(
      makeCase(),
      deps({ agent, config: makeConfig({ callTimeoutMs: 20, maxCallAttempts: 2 }) }),
    );
    expect(trajectory.status).toBe("agent_error");
    expect(trajectory.terminationReason).toBe("agent call timed out after 20ms");
    expect(signals).toHaveLength(2);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
  });

  it("records user_error when the simulator keeps failing", async () => {
    const user: UserSimulator = {
      strategy: "direct",
      nextUtterance: async () => {
        throw new Error("simulator backend down");
      },
    };
    const agent = createScriptedAgentAdapter([]);
    const trajectory = await runTrajectory(
      makeCase(),
      deps({ agent, user, config: makeConfig({ openingTurn: "simulated", maxCallAttempts: 2 }) }),
    );
    expect(shape(trajectory.turns)).toEqual(["0:system_termination"]);
    expect(trajectory.status).toBe("user_error");
    expect(trajectory.terminationReason).toBe("simulator backend down");
  });

  it("raises TrajectoryCancelledError when the parent signal aborts", async () => {
    const controller = new AbortController();
    const agent: AgentAdapter = {
      respond: ({ signal }) =>
        new Promise<AgentResponse>((_, reject) => {
          signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
          controller.abort(new Error("shutdown"));
        }),
    };
    await expect(
      runTrajectory(makeCase(), deps({ agent, signal: controller.signal })),
    ).rejects.toBeInstanceOf(TrajectoryCancelledError);
  });

  it("produces identical trajectories from identical scripts", async () => {
    const script = (): AgentResponse[] => [
      callTool("get_tumor_markers"),
      { ...say("CEA 8.5."), usage: { promptTokens: 120, responseTokens: 8 }, modelVersion: "m-1" },
    ];
    const first = await runTrajectory(
      makeCase(),
      deps({ agent: createScriptedAgentAdapter(script()), clock: steppingClock() }),
    );
    const second = await runTrajectory(
      makeCase(),
      deps({ agent: createScriptedAgentAdapter(script()), clock: steppingClock() }),
    );
    expect(second).toEqual(first);
    expect(first.startedAt).toBe("2024-01-01T00:00:00.000Z");
    expect(first.modelVersions).toEqual(["m-1"]);
    expect(first.usage).toEqual({
      agent: {
        calls: 2,
        promptTokens: 120,
        cachedTokens: 0,
        responseTokens: 8,
        thinkingTokens: 0,
        totalTokens: 128,
      },
      user: emptyUsageSummary(),
    });
  });

  it("emits every appended turn through onTurn", async () => {
    const seen: string[] = [];
    const agent = createScriptedAgentAdapter([say("Stage IB.")]);
    const trajectory = await runTrajectory(
      makeCase(),
      deps({ agent, onTurn: (turn) => seen.push(turn.type) }),
    );
    expect(seen).toEqual(trajectory.turns.map((turn) => turn.type));
  });

  it("returns a frozen trajectory and hands frozen turns to onTurn", async () => {
    const seen: Turn[] = [];
    const agent = createScriptedAgentAdapter([callTool("get_tumor_markers", {}), say("CEA 8.5, stage IB.")]);
    const trajectory = await runTrajectory(makeCase(), deps({ agent, onTurn: (turn) => seen.push(turn) }));

    expect(Object.isFrozen(trajectory)).toBe(true);
    expect(Object.isFrozen(trajectory.turns)).toBe(true);
    expect(trajectory.turns.every((turn) => Object.isFrozen(turn))).toBe(true);
    expect(seen.every((turn) => Object.isFrozen(turn))).toBe(true);
    const [call] = trajectory.turns.flatMap((turn) => (turn.type === "agent_tool_call" ? [turn] : []));
    expect(call?.arguments).toEqual({});
    expect(Object.isFrozen(call?.arguments)).toBe(true);
    expect(Object.isFrozen(trajectory.usage.agent)).toBe(true);
  });
});
