import type { z } from "zod";

export type ToolErrorKind = "UnknownTool" | "UnknownCaseForTool" | "SchemaViolation";

export type ToolErrorIssue = {
  readonly path: readonly string[];
  readonly message: string;
  readonly code: string;
};

/**
 * Failure of a single tool lookup. The executor returns these instead of throwing so the
 * orchestrator can feed them back to the agent.
 */
export class ToolError extends Error {
  constructor(
    readonly kind: ToolErrorKind,
    message: string,
    readonly issues: readonly ToolErrorIssue[] = [],
  ) {
    super(message);
    this.name = "ToolError";
  }
}

export type Actor = "user" | "agent";

export type ActorErrorOptions = {
  readonly retryable?: boolean;
  readonly attempts?: number;
  readonly cause?: unknown;
};

export class ActorError extends Error {
  readonly retryable: boolean;
  readonly attempts: number;

  constructor(
    readonly actor: Actor,
    message: string,
    options: ActorErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ActorError";
    this.retryable = options.retryable ?? true;
    this.attempts = options.attempts ?? 1;
  }
}

export class ActorTimeoutError extends ActorError {
  constructor(
    actor: Actor,
    readonly timeoutMs: number,
    options: Omit<ActorErrorOptions, "retryable"> = {},
  ) {
    super(actor, `${actor} call timed out after ${timeoutMs}ms`, { ...options, retryable: true });
    this.name = "ActorTimeoutError";
  }
}

export class LoaderError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    readonly issues: readonly string[] = [],
  ) {
    super(
      issues.length > 0
        ? `${message} (${filePath}): ${issues.join("; ")}`
        : `${message} (${filePath})`,
    );
    this.name = "LoaderError";
  }
}

export class EvaluationError extends Error {
  constructor(
    readonly criterionId: string,
    message: string,
    options: { readonly cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "EvaluationError";
  }
}

export class TrajectoryCancelledError extends Error {
  constructor(
    readonly caseId: string,
    options: { readonly cause?: unknown } = {},
  ) {
    super(
      `Trajectory for case ${caseId} was cancelled`,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = "TrajectoryCancelledError";
  }
}

export class LlmJsonCallError extends Error {
  constructor(
    message: string,
    readonly attempts: ReadonlyArray<{
      readonly attempt: number;
      readonly rawText: string;
      readonly error: unknown;
    }>,
  ) {
    super(message);
    this.name = "LlmJsonCallError";
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === "string") {
    return new Error(value);
  }
  return new Error("Unknown error");
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

export function formatZodIssues(issues: readonly z.core.$ZodIssue[]): string {
  const messages: string[] = [];
  for (const issue of issues) {
    const path = issue.path.length > 0 ? issue.path.map(String).join(".") : "input";
    messages.push(`${path}: ${issue.message}`);
  }
  return messages.join("; ");
}

export function toToolErrorIssues(issues: readonly z.core.$ZodIssue[]): ToolErrorIssue[] {
  return issues.map((issue) => ({
    path: issue.path.map(String),
    message: issue.message,
    code: issue.code,
  }));
}
