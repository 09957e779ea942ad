#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import { createLlmAgentAdapter } from "./agent/llmAgent.js";
import { runBatch } from "./batch/runner.js";
import { formatStatusSummary, summarizeRecords, watchProgress } from "./batch/status.js";
import { createJsonlStore } from "./batch/store.js";
import type { BatchEvent } from "./batch/telemetry.js";
import {
  resolveRunConfig,
  USER_STRATEGIES,
  type RunConfigOverrides,
  type UserStrategy,
} from "./config.js";
import { loadDataset } from "./data/loader.js";
import { errorMessage } from "./errors.js";
import { createDefaultRubric } from "./evaluation/criteria.js";
import { createFaultAttributor } from "./evaluation/faultAttribution.js";
import { createOpenAiCompatibleBackend } from "./llm/chat.js";
import { parseTerminalPolicy } from "./orchestrator/terminal.js";
import { createToolRegistry } from "./tools/registry.js";
import { createUserSimulator } from "./user/simulator.js";

const COMMANDS = ["run", "status", "monitor", "validate"] as const;
type Command = (typeof COMMANDS)[number];

const DEFAULT_TOOLS_PATH = fileURLToPath(new URL("../data/tools.json", import.meta.url));
const DEFAULT_OUT_PATH = "results/trajectories.jsonl";

function printUsage(): void {
  console.log(`
Multi-turn tool-use dialogue evaluation harness.

Usage:
  dialogue-bench <command> [options]

Commands:
  run        Run and score every pending case, appending records to --out
  status     Print the aggregate status of a results file
  monitor    Poll a results file and print progress until every case has a record
  validate   Load the tool and case files and report problems

Options:
  --cases <path>             Case file (required for run, validate; optional for status, monitor)
  --tools <path>             Tool specification file (default: bundled data/tools.json)
  --out <path>               JSONL results file (default: ${DEFAULT_OUT_PATH})
  --concurrency <n>          Trajectories in flight at once (default: 8)
  --max-turns <n>            Agent turn budget per trajectory (default: 10)
  --agent-model <id>         Model for the agent under test
  --user-model <id>          Model for the user simulator
  --judge-model <id>         Model for the rubric judge and fault attribution
  --user-strategy <name>     ${USER_STRATEGIES.join(", ")} (default: direct)
  --opening <mode>           case_prompt or simulated (default: case_prompt)
  --terminal <policy>        always, never or marker:<text> (default: always)
  --limit <n>                Only run the first n cases
  --interval <ms>            Poll interval for monitor (default: 5000)
  --no-attribution           Skip fault attribution
  --help                     Show this help
`);
}

function parsePositiveInt(raw: string, optionName: string): number {
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new Error(`Invalid ${optionName}: ${raw}`);
  }
  return parsed;
}

function parseCommand(raw: string | undefined): Command {
  const match = COMMANDS.find((command) => command === raw);
  if (!match) {
    throw new Error(`Unknown command: ${raw ?? "<none>"} (expected ${COMMANDS.join(", ")})`);
  }
  return match;
}

function parseUserStrategy(raw: string): UserStrategy {
  const match = USER_STRATEGIES.find((strategy) => strategy === raw);
  if (!match) {
    throw new Error(`Invalid --user-strategy value: ${raw}`);
  }
  return match;
}

function parseOpening(raw: string): "case_prompt" | "simulated" {
  if (raw === "case_prompt" || raw === "simulated") {
    return raw;
  }
  throw new Error(`Invalid --opening value: ${raw}`);
}

function requireOption(value: string | undefined, optionName: string): string {
  if (!value) {
    throw new Error(`${optionName} is required`);
  }
  return value;
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

function logBatchEvent(event: BatchEvent): void {
  switch (event.type) {
    case "batch.started":
      console.log(
        [
          `Cases: ${event.totalCases}`,
          `pending ${event.pendingCases}`,
          `already recorded ${event.skippedCases}`,
          `concurrency ${event.maxConcurrency}`,
        ].join(" | "),
      );
      return;
    case "trajectory.finished": {
      const score =
        event.weightedTotal === null
          ? `evaluation failed: ${event.evaluationError ?? "unknown error"}`
          : `score ${event.weightedTotal.toFixed(3)}`;
      const duration = formatSeconds(event.durationMs);
      console.log(
        `[${event.status}] ${event.caseId} | ${event.agentTurns} turns | ${score} | ${duration}`,
      );
      return;
    }
    case "trajectory.failed":
      console.log(
        `[${event.status}] ${event.caseId} | ${event.error} | ${formatSeconds(event.durationMs)}`,
      );
      return;
    case "batch.finished":
      console.log(
        [
          `Finished ${event.finished}`,
          `harness errors ${event.harnessErrors}`,
          `cancelled ${event.cancelled}`,
          `${formatSeconds(event.durationMs)}${event.interrupted ? " (interrupted)" : ""}`,
        ].join(" | "),
      );
      return;
    case "trajectory.started":
    case "trajectory.turn":
    case "trajectory.skipped":
      return;
  }
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      cases: { type: "string" },
      tools: { type: "string", default: DEFAULT_TOOLS_PATH },
      out: { type: "string", default: DEFAULT_OUT_PATH },
      concurrency: { type: "string" },
      "max-turns": { type: "string" },
      "agent-model": { type: "string" },
      "user-model": { type: "string" },
      "judge-model": { type: "string" },
      "user-strategy": { type: "string" },
      opening: { type: "string" },
      terminal: { type: "string" },
      limit: { type: "string" },
      interval: { type: "string", default: "5000" },
      "no-attribution": { type: "boolean", default: false },
      help: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help || positionals.length === 0) {
    printUsage();
    return;
  }

  const command = parseCommand(positionals[0]);
  const toolsPath = path.resolve(values.tools ?? DEFAULT_TOOLS_PATH);
  const store = createJsonlStore(path.resolve(values.out ?? DEFAULT_OUT_PATH));

  if (command === "validate") {
    const casesPath = path.resolve(requireOption(values.cases, "--cases"));
    const { tools, cases } = await loadDataset({ toolsPath, casesPath });
    console.log(`OK: ${tools.length} tools, ${cases.length} cases`);
    return;
  }

  if (command === "status" || command === "monitor") {
    const totalCases = values.cases
      ? (await loadDataset({ toolsPath, casesPath: path.resolve(values.cases) })).cases.length
      : undefined;
    if (command === "status") {
      const { records, skippedLines } = await store.load();
      console.log(formatStatusSummary(summarizeRecords(records, totalCases)));
      if (skippedLines > 0) {
        console.log(`unreadable lines: ${skippedLines}`);
      }
      return;
    }
    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());
    await watchProgress({
      store,
      totalCases,
      intervalMs: parsePositiveInt(values.interval ?? "5000", "--interval"),
      signal: controller.signal,
      onUpdate: (summary) => {
        console.log(`\n${new Date().toISOString()}\n${formatStatusSummary(summary)}`);
      },
    });
    return;
  }

  const casesPath = path.resolve(requireOption(values.cases, "--cases"));
  const dataset = await loadDataset({ toolsPath, casesPath });
  const limit = values.limit ? parsePositiveInt(values.limit, "--limit") : undefined;
  const cases = limit === undefined ? dataset.cases : dataset.cases.slice(0, limit);

  const overrides: RunConfigOverrides = {
    ...(values.concurrency
      ? { maxConcurrency: parsePositiveInt(values.concurrency, "--concurrency") }
      : {}),
    ...(values["max-turns"]
      ? { maxTurns: parsePositiveInt(values["max-turns"], "--max-turns") }
      : {}),
    ...(values["user-strategy"]
      ? { userStrategy: parseUserStrategy(values["user-strategy"]) }
      : {}),
    ...(values.opening ? { openingTurn: parseOpening(values.opening) } : {}),
    ...(values.terminal ? { terminalPolicy: parseTerminalPolicy(values.terminal) } : {}),
    ...(values["no-attribution"] ? { attributionThreshold: null } : {}),
    models: {
      agent: values["agent-model"],
      user: values["user-model"],
      judge: values["judge-model"],
    },
  };
  const config = resolveRunConfig(overrides);

  const backend = createOpenAiCompatibleBackend();
  const registry = createToolRegistry(dataset.tools);
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("Interrupt received; finishing in-flight writes. Re-run to resume.");
    controller.abort();
  });

  console.log(`Agent model: ${config.models.agent}`);
  console.log(`User model: ${config.models.user} (${config.userStrategy})`);
  console.log(`Judge model: ${config.models.judge}`);
  console.log(`Results: ${store.location}`);

  const summary = await runBatch({
    cases,
    registry,
    createAgent: () =>
      createLlmAgentAdapter({
        backend,
        model: config.models.agent,
        temperature: config.temperature,
      }),
    createUser: () =>
      createUserSimulator({
        strategy: config.userStrategy,
        backend,
        model: config.models.user,
        verifierModel: config.models.judge,
        temperature: config.temperature,
      }),
    rubric: createDefaultRubric({ backend, judgeModel: config.models.judge }),
    config,
    store,
    attribution:
      config.attributionThreshold === null
        ? undefined
        : createFaultAttributor({ backend, model: config.models.judge }),
    signal: controller.signal,
    telemetry: { emit: logBatchEvent },
  });

  const { records } = await store.load();
  console.log(`\n${formatStatusSummary(summarizeRecords(records, dataset.cases.length))}`);
  if (summary.interrupted) {
    console.log(
      `Interrupted with ${summary.cancelled} case(s) left; run the same command to resume.`,
    );
  }
}

void main().catch((error) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});
