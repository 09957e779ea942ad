import { describe, expect, it } from "vitest";

import { createScriptedAgentAdapter } from "../src/agent/scripted.js";
import { renderTranscript } from "../src/orchestrator/queries.js";
import { runTrajectory } from "../src/orchestrator/trajectory.js";
import { createToolRegistry } from "../src/tools/registry.js";
import type { Turn } from "../src/types.js";
import {
  createScriptedUserSimulator,
  createUserSimulator,
  toSimulatorMessages,
} from "../src/user/simulator.js";

import { createScriptedBackend, makeCase, makeConfig, steppingClock, TEST_TOOLS } from "./fixtures.js";

const caseData = makeCase();

const history: Turn[] = [
  {
    type: "user_utterance",
    source: "case",
    text: "What stage is this?",
    index: 0,
    timestamp: "2024-01-01T00:00:00.000Z",
    agentTurn: 0,
  },
  {
    type: "agent_tool_call",
    callId: "call_1_1",
    toolName: "get_tumor_markers",
    arguments: {},
    valid: true,
    index: 1,
    timestamp: "2024-01-01T00:00:01.000Z",
    agentTurn: 1,
  },
  {
    type: "tool_result",
    callId: "call_1_1",
    toolName: "get_tumor_markers",
    status: "ok",
    output: { CEA: 8.5 },
    index: 2,
    timestamp: "2024-01-01T00:00:02.000Z",
    agentTurn: 1,
  },
  {
    type: "agent_message",
    text: "How long has the cough lasted?",
    terminal: false,
    index: 3,
    timestamp: "2024-01-01T00:00:03.000Z",
    agentTurn: 2,
  },
];

describe("toSimulatorMessages", () => {
  it("mirrors roles and hides tool traffic", () => {
    expect(toSimulatorMessages(history)).toEqual([
      { role: "assistant", content: "What stage is this?" },
      { role: "user", content: "How long has the cough lasted?" },
    ]);
  });

  it("adds a kickoff message to an empty conversation", () => {
    expect(toSimulatorMessages([])).toEqual([
      { role: "user", content: "(The assistant is waiting for your first message.)" },
    ]);
  });
});

describe("createUserSimulator", () => {
  it("direct: one call with the hidden instruction in the system prompt", async () => {
    const { backend, requests } = createScriptedBackend([
      { text: "  About a month.  ", usage: { promptTokens: 50, responseTokens: 4 } },
    ]);
    const simulator = createUserSimulator({ strategy: "direct", backend, model: "user-model" });

    const result = await simulator.nextUtterance({ caseData, history });

    expect(result).toMatchObject({ type: "utterance", text: "About a month.", generations: 1 });
    expect(result.usage).toMatchObject({ calls: 1, promptTokens: 50, responseTokens: 4, totalTokens: 54 });
    expect(requests).toHaveLength(1);
    const system = requests[0]?.messages[0];
    expect(system?.role).toBe("system");
    expect(system?.content).toContain(caseData.userInstruction);
    expect(system?.content).toContain("###STOP###");
    expect(system?.content).not.toContain("{{");
    expect(requests[0]?.model).toBe("user-model");
  });

  it("ends the conversation on the stop token", async () => {
    const { backend } = createScriptedBackend([{ text: "Thanks, that answers it. ###STOP###" }]);
    const simulator = createUserSimulator({ strategy: "direct", backend, model: "user-model" });
    const result = await simulator.nextUtterance({ caseData, history });
    expect(result.type).toBe("end_conversation");
    expect(result.usage.calls).toBe(1);
  });

  it("rejects an empty utterance as an actor error", async () => {
    const { backend } = createScriptedBackend([{ text: "   " }]);
    const simulator = createUserSimulator({ strategy: "direct", backend, model: "user-model" });
    await expect(simulator.nextUtterance({ caseData, history })).rejects.toThrow(
      "User simulator produced an empty utterance",
    );
  });

  it("reasoning: keeps the rationale beside the utterance", async () => {
    const { backend, requests } = createScriptedBackend([
      {
        text: '```json\n{"rationale": "The assistant asked about symptoms.", "utterance": "Four weeks."}\n```',
      },
    ]);
    const simulator = createUserSimulator({ strategy: "reasoning", backend, model: "user-model" });
    const result = await simulator.nextUtterance({ caseData, history });

    expect(result).toMatchObject({
      type: "utterance",
      text: "Four weeks.",
      rationale: "The assistant asked about symptoms.",
      generations: 1,
    });
    expect(requests[0]?.responseFormat).toBe("json");
  });

  it("verify: regenerates after a rejection and keeps only the accepted text", async () => {
    const { backend, requests } = createScriptedBackend([
      { text: "It is stage IV, I read it online." },
      { text: '{"accept": false, "score": 2, "feedback": "Invents a stage."}' },
      { text: "About a month, and it is getting worse." },
      { text: '{"accept": true, "score": 9, "feedback": ""}' },
    ]);
    const simulator = createUserSimulator({
      strategy: "verify",
      backend,
      model: "user-model",
      verifierModel: "judge-model",
    });

    const result = await simulator.nextUtterance({ caseData, history });

    expect(result).toEqual({
      type: "utterance",
      text: "About a month, and it is getting worse.",
      generations: 2,
      verifications: [
        { accept: false, score: 2, feedback: "Invents a stage." },
        { accept: true, score: 9, feedback: "" },
      ],
      usage: {
        calls: 4,
        promptTokens: 0,
        cachedTokens: 0,
        responseTokens: 0,
        thinkingTokens: 0,
        totalTokens: 0,
      },
    });
    expect(requests.map((request) => request.model)).toEqual([
      "user-model",
      "judge-model",
      "user-model",
      "judge-model",
    ]);
    const verifierPrompt = requests[1]?.messages[0]?.content ?? "";
    expect(verifierPrompt).toContain("It is stage IV, I read it online.");
    expect(verifierPrompt).not.toContain("get_tumor_markers");
  });

  it("verify: falls back to the best-scoring candidate", async () => {
    const { backend } = createScriptedBackend([
      { text: "first" },
      { text: '{"accept": false, "score": 6, "feedback": "ok-ish"}' },
      { text: "second" },
      { text: '{"accept": false, "score": 4, "feedback": "worse"}' },
    ]);
    const simulator = createUserSimulator({ strategy: "verify", backend, model: "user-model" });
    const result = await simulator.nextUtterance({ caseData, history });
    expect(result).toMatchObject({ type: "utterance", text: "first", generations: 2 });
  });

  it("reflect: feeds the judge's feedback into the next attempt", async () => {
    const { backend, requests } = createScriptedBackend([
      { text: "Just tell me everything." },
      { text: '{"accept": false, "score": 3, "feedback": "Answer the question about the cough."}' },
      { text: "The cough started a month ago." },
      { text: '{"accept": true, "score": 8, "feedback": "Good."}' },
    ]);
    const simulator = createUserSimulator({ strategy: "reflect", backend, model: "user-model" });
    const result = await simulator.nextUtterance({ caseData, history });

    expect(result).toMatchObject({ text: "The cough started a month ago.", generations: 2 });
    const firstSystem = requests[0]?.messages[0]?.content ?? "";
    const retrySystem = requests[2]?.messages[0]?.content ?? "";
    expect(firstSystem).not.toContain("Answer the question about the cough.");
    expect(retrySystem).toContain("Answer the question about the cough.");
    expect(retrySystem).toContain("Just tell me everything.");
  });

  it("records one user turn with two generations inside a trajectory", async () => {
    const { backend } = createScriptedBackend([
      { text: "Is it cancer? My neighbour says stage IV." },
      { text: '{"accept": false, "score": 1, "feedback": "Leaks invented facts."}' },
      { text: "My father has had a cough for a month. What stage could this be?" },
      { text: '{"accept": true, "score": 9, "feedback": ""}' },
    ]);
    const trajectory = await runTrajectory(caseData, {
      registry: createToolRegistry(TEST_TOOLS),
      agent: createScriptedAgentAdapter([{ type: "message", text: "We need imaging and pathology first." }]),
      user: createUserSimulator({ strategy: "verify", backend, model: "user-model" }),
      config: makeConfig({ openingTurn: "simulated" }),
      clock: steppingClock(),
    });

    const userTurns = trajectory.turns.filter((turn) => turn.type === "user_utterance");
    expect(userTurns).toHaveLength(1);
    expect(userTurns[0]).toMatchObject({
      text: "My father has had a cough for a month. What stage could this be?",
      generations: 2,
    });
    expect(JSON.stringify(trajectory)).not.toContain("stage IV");
    expect(renderTranscript(trajectory.turns, { userView: true })).toBe(
      [
        "[0] USER: My father has had a cough for a month. What stage could this be?",
        "[1] ASSISTANT: We need imaging and pathology first.",
      ].join("\n"),
    );
    expect(trajectory.usage.user.calls).toBe(4);
  });
});

describe("createScriptedUserSimulator", () => {
  it("replays utterances then ends", async () => {
    const simulator = createScriptedUserSimulator(["one", "###STOP###", "never"]);
    await expect(simulator.nextUtterance({ caseData, history })).resolves.toMatchObject({ text: "one" });
    await expect(simulator.nextUtterance({ caseData, history })).resolves.toMatchObject({
      type: "end_conversation",
    });
  });
});
