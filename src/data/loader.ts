import { readFile } from "node:fs/promises";

import type { z } from "zod";

import { LoaderError } from "../errors.js";
import type { Case, ToolSpec } from "../types.js";
import { deepFreeze } from "../utils/deepFreeze.js";

import {
  casesFileSchema,
  toolsFileSchema,
  type CaseFileEntry,
  type ToolSpecFileEntry,
} from "./schemas.js";

export type LoadedDataset = {
  readonly tools: readonly ToolSpec[];
  readonly cases: readonly Case[];
};

function formatIssues(issues: readonly z.core.$ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "<root>";
    return `${path}: ${issue.message}`;
  });
}

async function readJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException)?.code;
    throw new LoaderError(code === "ENOENT" ? "File not found" : "Unable to read file", filePath);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new LoaderError("Malformed JSON", filePath, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

function toToolSpec(entry: ToolSpecFileEntry): ToolSpec {
  return {
    id: entry.tool_id,
    name: entry.tool_name,
    description: entry.tool_description,
    parameters: entry.parameters,
  };
}

export function parseToolSpecs(raw: unknown, filePath = "<tools>"): readonly ToolSpec[] {
  const parsed = toolsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LoaderError(
      "Invalid tool specification file",
      filePath,
      formatIssues(parsed.error.issues),
    );
  }
  const issues: string[] = [];
  const ids = new Set<string>();
  const names = new Set<string>();
  for (const [index, tool] of parsed.data.tools.entries()) {
    if (ids.has(tool.tool_id)) {
      issues.push(`tools.${index}: duplicate tool id ${tool.tool_id}`);
    }
    if (names.has(tool.tool_name)) {
      issues.push(`tools.${index}: duplicate tool name ${tool.tool_name}`);
    }
    ids.add(tool.tool_id);
    names.add(tool.tool_name);
  }
  // Case files key responses by id or name, so one tool's id must not name another tool.
  for (const [index, tool] of parsed.data.tools.entries()) {
    if (tool.tool_id !== tool.tool_name && names.has(tool.tool_id)) {
      issues.push(`tools.${index}: tool id ${tool.tool_id} is the name of another tool`);
    }
  }
  if (issues.length > 0) {
    throw new LoaderError("Invalid tool specification file", filePath, issues);
  }
  return deepFreeze(parsed.data.tools.map(toToolSpec));
}

function toCase(
  entry: CaseFileEntry,
  index: number,
  toolNameByKey: ReadonlyMap<string, string>,
  issues: string[],
): Case {
  const toolResponses: Record<string, unknown> = {};
  for (const [key, response] of Object.entries(entry.tool_call_results_map)) {
    const toolName = toolNameByKey.get(key);
    if (!toolName) {
      issues.push(`${index}.tool_call_results_map.${key}: unknown tool`);
      continue;
    }
    if (Object.hasOwn(toolResponses, toolName)) {
      issues.push(`${index}.tool_call_results_map.${key}: duplicate response for ${toolName}`);
      continue;
    }
    toolResponses[toolName] = response;
  }
  return {
    id: entry.patient_id,
    initialPrompt: entry.initial_query,
    userInstruction: entry.user_instruction ?? entry.initial_query,
    goldFacts: entry.gold_facts,
    ...(entry.reference_conclusion !== undefined
      ? { referenceConclusion: entry.reference_conclusion }
      : {}),
    rubric: entry.evaluation_rubrics,
    toolResponses,
    ...(entry.metadata !== undefined ? { metadata: entry.metadata } : {}),
  };
}

/** Response-map keys may be tool ids or tool names; both resolve to the tool name. */
export function parseCases(
  raw: unknown,
  tools: readonly ToolSpec[],
  filePath = "<cases>",
): readonly Case[] {
  const parsed = casesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LoaderError("Invalid case file", filePath, formatIssues(parsed.error.issues));
  }
  const toolNameByKey = new Map<string, string>();
  for (const tool of tools) {
    toolNameByKey.set(tool.id, tool.name);
    toolNameByKey.set(tool.name, tool.name);
  }
  const issues: string[] = [];
  const seen = new Set<string>();
  const cases = parsed.data.map((entry, index) => {
    if (seen.has(entry.patient_id)) {
      issues.push(`${index}.patient_id: duplicate case id ${entry.patient_id}`);
    }
    seen.add(entry.patient_id);
    return toCase(entry, index, toolNameByKey, issues);
  });
  if (issues.length > 0) {
    throw new LoaderError("Invalid case file", filePath, issues);
  }
  return deepFreeze(cases);
}

export async function loadToolSpecs(filePath: string): Promise<readonly ToolSpec[]> {
  return parseToolSpecs(await readJsonFile(filePath), filePath);
}

/** Loads and cross-checks both files. Any problem is fatal before a trajectory starts. */
export async function loadDataset(params: {
  readonly toolsPath: string;
  readonly casesPath: string;
}): Promise<LoadedDataset> {
  const tools = await loadToolSpecs(params.toolsPath);
  const cases = parseCases(await readJsonFile(params.casesPath), tools, params.casesPath);
  return { tools, cases };
}
