import fs from "node:fs";
import path from "node:path";

export type EnvRecord = Record<string, string | undefined>;

let envLoaded = false;

/**
 * Loads `.env.local` from `process.cwd()` into `process.env` once.
 *
 * - Does not override already-set values.
 * - A missing file is ignored.
 */
export function loadLocalEnv(): void {
  if (envLoaded) {
    return;
  }
  loadEnvFromFile(path.join(process.cwd(), ".env.local"), { override: false });
  envLoaded = true;
}

/** Returns the keys that were written to `target`. */
export function loadEnvFromFile(
  filePath: string,
  { override = false, target = process.env }: { override?: boolean; target?: EnvRecord } = {},
): string[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException)?.code === "ENOENT") {
      return [];
    }
    throw error;
  }

  const written: string[] = [];
  for (const line of content.split(/\r?\n/u)) {
    const entry = parseEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (override || target[key] === undefined) {
      target[key] = value;
      written.push(key);
    }
  }
  return written;
}

export function parseEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }
  const match = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_\-.]*)\s*=\s*(.*)$/u.exec(trimmed);
  const key = match?.[1];
  if (!match || !key) {
    return null;
  }
  return [key, unquoteEnvValue(match[2] ?? "")];
}

function unquoteEnvValue(raw: string): string {
  for (const quote of ['"', "'"]) {
    if (raw.length >= 2 && raw.startsWith(quote) && raw.endsWith(quote)) {
      return raw.slice(1, -1);
    }
  }
  const commentIndex = raw.indexOf(" #");
  return (commentIndex >= 0 ? raw.slice(0, commentIndex) : raw).trim();
}

/** Trimmed value, or `undefined` when unset or blank. */
export function readEnvString(env: EnvRecord, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function readEnvPositiveInt(env: EnvRecord, key: string): number | undefined {
  const raw = readEnvString(env, key);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Invalid ${key}: expected a positive integer, got "${raw}".`);
  }
  return parsed;
}
