/**
 * Render settings: one zod schema, parsed from a plain object, a JSON file and
 * `FASTBLOCKS_*` environment variables (environment wins).
 */

import { readFile } from "node:fs/promises";
import { delimiter } from "node:path";
import { z } from "zod";
import { SettingsError } from "./errors";
import { LOG_LEVELS, describeError } from "./util/logger";

const positiveMs = z.number().int().positive();

export const RenderSettingsSchema = z.object({
  /** Component search roots, highest precedence first. */
  searchPaths: z.array(z.string().min(1)).default([]),
  /** Block template roots, highest precedence first. */
  templatePaths: z.array(z.string().min(1)).default([]),
  /** First segment of every distributed cache key. */
  cacheNamespace: z.string().min(1).default("htmy"),
  /** Prefix of component keys in blob storage. Empty keeps root-relative paths. */
  storagePrefix: z.string().default("templates"),
  bytecodeCache: z.boolean().default(true),
  cacheTimeoutMs: positiveMs.optional(),
  storageTimeoutMs: positiveMs.optional(),
  evaluationTimeoutMs: positiveMs.default(1000),
  autoescape: z.boolean().default(true),
  inlineInteropErrors: z.boolean().default(false),
  debugComponents: z.boolean().default(false),
  enableLifecycleHooks: z.boolean().default(true),
  logLevel: z.enum(LOG_LEVELS).default("warn")
});

export type RenderSettings = z.infer<typeof RenderSettingsSchema>;
export type RenderSettingsInput = z.input<typeof RenderSettingsSchema>;

const ENV_PREFIX = "FASTBLOCKS_";

type EnvReader = (raw: string) => unknown;

const asList: EnvReader = (raw) =>
  raw
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter(Boolean);

const asBoolean: EnvReader = (raw) => {
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return raw;
};

const asNumber: EnvReader = (raw) => {
  const parsed = Number(raw);
  return Number.isNaN(parsed) ? raw : parsed;
};

const asString: EnvReader = (raw) => raw;

const ENV_FIELDS: Record<keyof RenderSettings, EnvReader> = {
  searchPaths: asList,
  templatePaths: asList,
  cacheNamespace: asString,
  storagePrefix: asString,
  bytecodeCache: asBoolean,
  cacheTimeoutMs: asNumber,
  storageTimeoutMs: asNumber,
  evaluationTimeoutMs: asNumber,
  autoescape: asBoolean,
  inlineInteropErrors: asBoolean,
  debugComponents: asBoolean,
  enableLifecycleHooks: asBoolean,
  logLevel: asString
};

const toEnvName = (field: string): string =>
  ENV_PREFIX + field.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase();

export function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [field, read] of Object.entries(ENV_FIELDS)) {
    const raw = env[toEnvName(field)];
    if (raw !== undefined && raw !== "") {
      overrides[field] = read(raw);
    }
  }
  return overrides;
}

export function loadSettings(input: unknown = {}, env: NodeJS.ProcessEnv = process.env): RenderSettings {
  const base = typeof input === "object" && input !== null ? input : {};
  const result = RenderSettingsSchema.safeParse({ ...base, ...readEnvOverrides(env) });
  if (!result.success) {
    throw new SettingsError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

export async function readSettingsFile(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<RenderSettings> {
  const raw = await readFile(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SettingsError([`${filePath}: ${describeError(error)}`]);
  }
  return loadSettings(parsed, env);
}
