import { z } from "zod";

const toolParameterFileSchema = z.object({
  type: z.enum(["string", "number", "integer", "boolean", "object", "array"]),
  description: z.string().default(""),
  required: z.boolean().default(false),
});

export const toolSpecFileSchema = z.object({
  tool_id: z.string().min(1),
  tool_name: z.string().regex(/^[A-Za-z0-9_-]{1,64}$/u, "must be 1-64 letters, digits, _ or -"),
  tool_description: z.string().min(1),
  parameters: z.record(z.string(), toolParameterFileSchema).default({}),
});

export const toolsFileSchema = z.object({
  tools: z.array(toolSpecFileSchema).min(1),
});

const rubricItemFileSchema = z.object({
  criterion: z.string().min(1),
  weight: z.number().nonnegative(),
  description: z.string().optional(),
});

export const caseFileEntrySchema = z.object({
  patient_id: z.union([z.string().min(1), z.number()]).transform(String),
  initial_query: z.string().min(1),
  user_instruction: z.string().optional(),
  gold_facts: z.array(z.string()).default([]),
  reference_conclusion: z.string().optional(),
  evaluation_rubrics: z.array(rubricItemFileSchema).default([]),
  tool_call_results_map: z.record(z.string(), z.unknown()),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export const casesFileSchema = z.union([
  z.array(caseFileEntrySchema),
  z.object({ cases: z.array(caseFileEntrySchema) }).transform((file) => file.cases),
]);

export type ToolSpecFileEntry = z.infer<typeof toolSpecFileSchema>;
export type CaseFileEntry = z.infer<typeof caseFileEntrySchema>;
