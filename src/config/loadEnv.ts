import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

type EnvEntry = { key: string; value: string };

const parseLine = (line: string): EnvEntry | null => {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith("#")) return null;

  const withoutExport = trimmed.startsWith("export ") ? trimmed.slice(7).trim() : trimmed;
  const idx = withoutExport.indexOf("=");
  if (idx <= 0) return null;

  const key = withoutExport.slice(0, idx).trim();
  let value = withoutExport.slice(idx + 1).trim();

  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    value = value.slice(1, -1);
  }

  return { key, value };
};

export const parseEnvText = (content: string): EnvEntry[] =>
  content
    .split(/\r?\n/)
    .map(parseLine)
    .filter((entry): entry is EnvEntry => entry !== null);

/**
 * Copies `KEY=value` pairs from a dotenv file into `env` without overriding keys that are
 * already set. Returns the keys it set; a missing file sets nothing.
 */
export const loadEnvFile = (filePath = ".env", env: NodeJS.ProcessEnv = process.env): string[] => {
  const absolute = resolve(process.cwd(), filePath);
  if (!existsSync(absolute)) return [];

  const loaded: string[] = [];
  for (const { key, value } of parseEnvText(readFileSync(absolute, "utf8"))) {
    if (env[key] === undefined) {
      env[key] = value;
      loaded.push(key);
    }
  }
  return loaded;
};
