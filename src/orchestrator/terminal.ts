import type { TerminalPolicy, TerminalPredicateContext } from "../config.js";

/**
 * Decides whether a plain agent message ends the conversation or hands the turn to the
 * user. Which messages count as final is domain-specific, so it is always configured.
 */
export function isTerminalMessage(
  policy: TerminalPolicy,
  text: string,
  context: TerminalPredicateContext,
): boolean {
  switch (policy.type) {
    case "always":
      return true;
    case "never":
      return false;
    case "marker":
      return policy.caseSensitive
        ? text.includes(policy.marker)
        : text.toLowerCase().includes(policy.marker.toLowerCase());
    case "predicate":
      return policy.test(text, context);
  }
}

/** Parses the `--terminal` CLI form: `always`, `never` or `marker:<text>`. */
export function parseTerminalPolicy(raw: string): TerminalPolicy {
  const trimmed = raw.trim();
  if (trimmed === "always" || trimmed === "never") {
    return { type: trimmed };
  }
  if (trimmed.startsWith("marker:") && trimmed.length > "marker:".length) {
    return { type: "marker", marker: trimmed.slice("marker:".length) };
  }
  throw new Error(`Invalid terminal policy: ${raw} (expected always, never or marker:<text>)`);
}
