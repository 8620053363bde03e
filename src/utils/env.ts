import fs from "node:fs";
import path from "node:path";

const loadedPaths = new Set<string>();

/**
 * Loads `.env.local` from the working directory once per path.
 *
 * - Never overrides variables that are already set.
 * - A missing file is ignored.
 *
 * Returns the keys that were applied.
 */
export function loadLocalEnv({
  cwd = process.cwd(),
  env = process.env,
}: {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
} = {}): readonly string[] {
  const envPath = path.join(cwd, ".env.local");
  if (loadedPaths.has(envPath)) {
    return [];
  }
  loadedPaths.add(envPath);

  const entries = readEnvFile(envPath);
  const applied: string[] = [];
  for (const [key, value] of entries) {
    if (env[key] === undefined) {
      env[key] = value;
      applied.push(key);
    }
  }
  return applied;
}

export function readEnvFile(filePath: string): ReadonlyMap<string, string> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException)?.code === "ENOENT") {
      return new Map();
    }
    throw error;
  }
  return parseEnvContent(content);
}

export function parseEnvContent(content: string): ReadonlyMap<string, string> {
  const entries = new Map<string, string>();
  for (const line of content.split(/\r?\n/u)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const match = trimmed.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/u);
    const key = match?.[1];
    if (!key) {
      continue;
    }
    entries.set(key, unquote(match?.[2] ?? ""));
  }
  return entries;
}

function unquote(raw: string): string {
  if (raw.length >= 2 && (raw.startsWith('"') || raw.startsWith("'")) && raw.endsWith(raw[0] ?? "")) {
    return raw.slice(1, -1);
  }
  const commentIndex = raw.indexOf(" #");
  return (commentIndex >= 0 ? raw.slice(0, commentIndex) : raw).trim();
}
