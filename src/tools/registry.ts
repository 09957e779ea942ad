import type { z } from "zod";

import { ToolError, toToolErrorIssues } from "../errors.js";
import type { Case, ToolSpec } from "../types.js";

import { compileToolParameters, toolParametersJsonSchema } from "./parameters.js";

/** Tool description handed to the agent adapter. */
export type AgentToolSchema = {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, unknown>>;
};

export type ToolLookup =
  | { readonly ok: true; readonly toolName: string; readonly value: unknown }
  | { readonly ok: false; readonly toolName: string; readonly error: ToolError };

export type ToolRegistry = {
  readonly specs: readonly ToolSpec[];
  readonly get: (toolName: string) => ToolSpec | undefined;
  readonly schemas: () => readonly AgentToolSchema[];
  /** Returns `null` when the call is well-formed. */
  readonly validate: (toolName: string, args: unknown) => ToolError | null;
  /**
   * Pure lookup of the case's precomputed response. Arguments are validated but never
   * influence the value returned.
   */
  readonly execute: (toolName: string, args: unknown, caseData: Case) => ToolLookup;
};

type CompiledTool = {
  readonly spec: ToolSpec;
  readonly schema: z.ZodType;
  readonly jsonSchema: AgentToolSchema;
};

export function createToolRegistry(specs: readonly ToolSpec[]): ToolRegistry {
  const byName = new Map<string, CompiledTool>();
  for (const spec of specs) {
    if (byName.has(spec.name)) {
      throw new Error(`Duplicate tool name: ${spec.name}`);
    }
    const schema = compileToolParameters(spec);
    byName.set(spec.name, {
      spec,
      schema,
      jsonSchema: Object.freeze({
        name: spec.name,
        description: spec.description,
        parameters: Object.freeze(toolParametersJsonSchema(schema)),
      }),
    });
  }
  const schemaList = Object.freeze([...byName.values()].map((tool) => tool.jsonSchema));

  const validate = (toolName: string, args: unknown): ToolError | null => {
    const tool = byName.get(toolName);
    if (!tool) {
      return new ToolError("UnknownTool", `Unknown tool: ${toolName}`);
    }
    const parsed = tool.schema.safeParse(args ?? {});
    if (!parsed.success) {
      return new ToolError(
        "SchemaViolation",
        `Invalid arguments for ${toolName}`,
        toToolErrorIssues(parsed.error.issues),
      );
    }
    return null;
  };

  const execute = (toolName: string, args: unknown, caseData: Case): ToolLookup => {
    const error = validate(toolName, args);
    if (error) {
      return { ok: false, toolName, error };
    }
    if (!Object.hasOwn(caseData.toolResponses, toolName)) {
      return {
        ok: false,
        toolName,
        error: new ToolError(
          "UnknownCaseForTool",
          `No ${toolName} data is available for case ${caseData.id}`,
        ),
      };
    }
    return { ok: true, toolName, value: caseData.toolResponses[toolName] };
  };

  return {
    specs,
    get: (toolName) => byName.get(toolName)?.spec,
    schemas: () => schemaList,
    validate,
    execute,
  };
}

/** For argument text the agent produced that is not JSON. */
export function argumentParseError(toolName: string, detail: string): ToolError {
  return new ToolError(
    "SchemaViolation",
    `Arguments for ${toolName} are not valid JSON: ${detail}`,
    [{ path: [], message: detail, code: "invalid_json" }],
  );
}

/** Payload shown to the agent for a failed lookup. */
export function toolErrorPayload(error: ToolError): Record<string, unknown> {
  const payload: Record<string, unknown> = { error: error.message, kind: error.kind };
  if (error.issues.length > 0) {
    payload.issues = error.issues;
  }
  return payload;
}
