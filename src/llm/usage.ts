export type LlmUsageTokens = {
  readonly promptTokens?: number;
  readonly cachedTokens?: number;
  readonly responseTokens?: number;
  readonly thinkingTokens?: number;
  readonly totalTokens?: number;
};

export type UsageSummary = {
  readonly calls: number;
  readonly promptTokens: number;
  readonly cachedTokens: number;
  readonly responseTokens: number;
  readonly thinkingTokens: number;
  readonly totalTokens: number;
};

function toMaybeNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toNonNegativeInt(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return 0;
  }
  const floored = Math.floor(value);
  return floored > 0 ? floored : 0;
}

/**
 * Reads chat-completions style usage (`prompt_tokens`, `completion_tokens`, ...) or the
 * responses-style equivalents. Reasoning tokens are reported separately from response tokens.
 */
export function extractUsageTokens(usage: unknown): LlmUsageTokens | undefined {
  if (!usage || typeof usage !== "object") {
    return undefined;
  }
  const promptTokens = toMaybeNumber(
    (usage as { prompt_tokens?: unknown }).prompt_tokens ??
      (usage as { input_tokens?: unknown }).input_tokens,
  );
  const cachedTokens = toMaybeNumber(
    (usage as { prompt_tokens_details?: { cached_tokens?: unknown } }).prompt_tokens_details
      ?.cached_tokens ??
      (usage as { input_tokens_details?: { cached_tokens?: unknown } }).input_tokens_details
        ?.cached_tokens,
  );
  const outputTokensRaw = toMaybeNumber(
    (usage as { completion_tokens?: unknown }).completion_tokens ??
      (usage as { output_tokens?: unknown }).output_tokens,
  );
  const reasoningTokens = toMaybeNumber(
    (usage as { completion_tokens_details?: { reasoning_tokens?: unknown } })
      .completion_tokens_details?.reasoning_tokens ??
      (usage as { output_tokens_details?: { reasoning_tokens?: unknown } }).output_tokens_details
        ?.reasoning_tokens,
  );
  const totalTokens = toMaybeNumber((usage as { total_tokens?: unknown }).total_tokens);
  let responseTokens: number | undefined;
  if (outputTokensRaw !== undefined) {
    const adjusted = outputTokensRaw - (reasoningTokens ?? 0);
    responseTokens = adjusted >= 0 ? adjusted : 0;
  }
  if (
    promptTokens === undefined &&
    cachedTokens === undefined &&
    responseTokens === undefined &&
    reasoningTokens === undefined &&
    totalTokens === undefined
  ) {
    return undefined;
  }
  return {
    promptTokens,
    cachedTokens,
    responseTokens,
    thinkingTokens: reasoningTokens,
    totalTokens,
  };
}

export function emptyUsageSummary(): UsageSummary {
  return {
    calls: 0,
    promptTokens: 0,
    cachedTokens: 0,
    responseTokens: 0,
    thinkingTokens: 0,
    totalTokens: 0,
  };
}

/** Counts one call, with or without reported usage. */
export function addUsage(summary: UsageSummary, usage: LlmUsageTokens | undefined): UsageSummary {
  const promptTokens = toNonNegativeInt(usage?.promptTokens);
  const responseTokens = toNonNegativeInt(usage?.responseTokens);
  const thinkingTokens = toNonNegativeInt(usage?.thinkingTokens);
  const totalTokens =
    usage?.totalTokens !== undefined
      ? toNonNegativeInt(usage.totalTokens)
      : promptTokens + responseTokens + thinkingTokens;
  return {
    calls: summary.calls + 1,
    promptTokens: summary.promptTokens + promptTokens,
    cachedTokens: summary.cachedTokens + toNonNegativeInt(usage?.cachedTokens),
    responseTokens: summary.responseTokens + responseTokens,
    thinkingTokens: summary.thinkingTokens + thinkingTokens,
    totalTokens: summary.totalTokens + totalTokens,
  };
}

export function sumUsageSummaries(values: readonly UsageSummary[]): UsageSummary {
  const total = {
    calls: 0,
    promptTokens: 0,
    cachedTokens: 0,
    responseTokens: 0,
    thinkingTokens: 0,
    totalTokens: 0,
  };
  for (const value of values) {
    total.calls += value.calls;
    total.promptTokens += value.promptTokens;
    total.cachedTokens += value.cachedTokens;
    total.responseTokens += value.responseTokens;
    total.thinkingTokens += value.thinkingTokens;
    total.totalTokens += value.totalTokens;
  }
  return total;
}
