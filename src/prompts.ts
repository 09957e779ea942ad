import fs from "node:fs";

export const STOP_TOKEN = "###STOP###";

export type PromptName =
  | "agent_system"
  | "user_simulator"
  | "user_reasoning"
  | "user_verifier"
  | "user_reflection"
  | "rubric_judge"
  | "fault_attribution";

const PROMPTS_DIR = new URL("../prompts/", import.meta.url);
const promptCache = new Map<PromptName, string>();

export function loadPrompt(name: PromptName): string {
  const cached = promptCache.get(name);
  if (cached !== undefined) {
    return cached;
  }
  const text = fs.readFileSync(new URL(`${name}.md`, PROMPTS_DIR), "utf8").trim();
  promptCache.set(name, text);
  return text;
}

/** Replaces `{{KEY}}` placeholders; unknown keys render empty. */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/{{([A-Z0-9_]+)}}/g, (_match, key: string) => values[key] ?? "");
}

export function renderPrompt(name: PromptName, values: Record<string, string> = {}): string {
  return renderTemplate(loadPrompt(name), { STOP_TOKEN, ...values });
}
