import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { DEFAULT_MARKERS } from "../diagnostics/markers.js";

export const KEY_FILE_NAME = "openai_key.txt";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const oracleConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default("https://api.openai.com/v1"),
  model: z.string().min(1).default("gpt-4.1-mini"),
  timeoutMs: positiveInt(600_000)
});

export const agentConfigSchema = z.object({
  oracle: oracleConfigSchema,
  toolchain: z.object({
    buildTimeoutMs: positiveInt(1_200_000),
    checkTimeoutMs: positiveInt(60_000)
  }),
  markers: z.array(z.string().min(1)).default(DEFAULT_MARKERS),
  runsDir: z.string().min(1).default(".agent_runs")
});

export type OracleConfig = z.infer<typeof oracleConfigSchema>;
export type AgentConfig = z.infer<typeof agentConfigSchema>;

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const readKeyFile = (path: string): string | undefined => {
  if (!existsSync(path)) return undefined;
  return nonEmpty(readFileSync(path, "utf8"));
};

const parseMarkers = (raw: string | undefined): string[] | undefined => {
  const value = nonEmpty(raw);
  if (!value) return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

/**
 * Builds the run configuration from an environment map. The API key comes from
 * `OPENAI_API_KEY`, else from `openai_key.txt` in `projectRoot` (or `keyFile`).
 * Throws a ZodError when a value is malformed.
 */
export const loadConfig = (args: {
  env?: NodeJS.ProcessEnv;
  projectRoot?: string;
  keyFile?: string;
} = {}): AgentConfig => {
  const env = args.env ?? process.env;
  const keyPath = args.keyFile ?? (args.projectRoot ? join(args.projectRoot, KEY_FILE_NAME) : undefined);
  const apiKey = nonEmpty(env.OPENAI_API_KEY) ?? (keyPath ? readKeyFile(keyPath) : undefined);

  return agentConfigSchema.parse({
    oracle: {
      apiKey,
      baseUrl: nonEmpty(env.OPENAI_BASE_URL),
      model: nonEmpty(env.OPENAI_MODEL),
      timeoutMs: nonEmpty(env.LEANMEND_ORACLE_TIMEOUT_MS)
    },
    toolchain: {
      buildTimeoutMs: nonEmpty(env.LEANMEND_BUILD_TIMEOUT_MS),
      checkTimeoutMs: nonEmpty(env.LEANMEND_CHECK_TIMEOUT_MS)
    },
    markers: parseMarkers(env.LEANMEND_MARKERS)
  });
};
