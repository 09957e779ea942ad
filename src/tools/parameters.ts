import { z } from "zod";

import type { ToolParameterSpec, ToolParameterType, ToolSpec } from "../types.js";

function parameterSchema(type: ToolParameterType): z.ZodType {
  switch (type) {
    case "string":
      return z.string();
    case "number":
      return z.number();
    case "integer":
      return z.number().int();
    case "boolean":
      return z.boolean();
    case "object":
      return z.record(z.string(), z.unknown());
    case "array":
      return z.array(z.unknown());
  }
}

function compileParameter(spec: ToolParameterSpec): z.ZodType {
  const base = parameterSchema(spec.type).describe(spec.description);
  return spec.required ? base : base.optional();
}

/**
 * Object schema for a tool's declared parameters. Undeclared keys pass through untouched:
 * lookups are case-scoped, so extra arguments cannot change the result.
 */
export function compileToolParameters(tool: ToolSpec): z.ZodType {
  const shape: Record<string, z.ZodType> = {};
  for (const [name, spec] of Object.entries(tool.parameters)) {
    shape[name] = compileParameter(spec);
  }
  return z.looseObject(shape);
}

export function toolParametersJsonSchema(schema: z.ZodType): Record<string, unknown> {
  const { $schema: _ignored, ...jsonSchema } = z.toJSONSchema(schema, { io: "input" });
  return jsonSchema;
}
