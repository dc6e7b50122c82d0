// src/core/config.ts
import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigurationError, MissingCredentialError } from "./errors.js";
import { DEFAULT_POLICY } from "../services/commitmsg.js";
import { DEFAULT_BASE_URL, DEFAULT_RETRY } from "../services/llm.js";

export const CONFIG_FILE = ".diffscribe.yml";

const PolicySchema = z
  .object({
    types: z.array(z.string().min(1)).min(1).default(() => [...DEFAULT_POLICY.types]),
    requireScope: z.boolean().default(DEFAULT_POLICY.requireScope),
    maxDescriptionLength: z.number().int().positive().default(DEFAULT_POLICY.maxDescriptionLength),
  })
  .strict();

const RetrySchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10).default(DEFAULT_RETRY.maxAttempts),
    baseDelayMs: z.number().int().min(0).default(DEFAULT_RETRY.baseDelayMs),
    maxDelayMs: z.number().int().min(0).default(DEFAULT_RETRY.maxDelayMs),
    timeoutMs: z.number().int().positive().default(DEFAULT_RETRY.timeoutMs),
  })
  .strict();

export const SettingsSchema = z
  .object({
    // Model tier used when -m is not given
    model: z.string().optional(),
    // Name of the env var holding the API key
    apiKeyEnv: z.string().min(1).default("OPENAI_API_KEY"),
    baseUrl: z.string().url().default(DEFAULT_BASE_URL),
    temperature: z.number().min(0).max(2).default(0.2),
    // Always excluded, in addition to -e
    exclude: z.array(z.string()).default([]),
    // Backend model name per tier
    models: z
      .object({
        default: z.string().min(1).optional(),
        advanced: z.string().min(1).optional(),
        "advanced-fast": z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    policy: PolicySchema.default({}),
    retry: RetrySchema.default({}),
  })
  .strict();

export type Settings = z.infer<typeof SettingsSchema>;

export function parseSettings(raw: string, source = CONFIG_FILE): Settings {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message.split("\n")[0] : String(e);
    throw new ConfigurationError(`${source} is not valid YAML: ${reason}`, { cause: e });
  }
  const result = SettingsSchema.safeParse(doc ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`${source} is invalid: ${issues}`);
  }
  return result.data;
}

export async function findRoot(start: string): Promise<string | null> {
  let dir = path.resolve(start);
  while (true) {
    if (fs.existsSync(path.join(dir, ".git"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Settings from `.diffscribe.yml` at the repo root (or cwd), or the defaults. */
export async function loadSettings(cwd: string): Promise<{ settings: Settings; file?: string }> {
  const root = (await findRoot(cwd)) ?? cwd;
  const file = path.join(root, CONFIG_FILE);
  if (!fs.existsSync(file)) return { settings: SettingsSchema.parse({}) };
  const raw = await fs.promises.readFile(file, "utf8");
  return { settings: parseSettings(raw, path.relative(cwd, file) || CONFIG_FILE), file };
}

/** Read the API key once; its absence is fatal before any request is made. */
export function readCredential(settings: Settings, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[settings.apiKeyEnv]?.trim();
  if (!value) throw new MissingCredentialError(settings.apiKeyEnv);
  return value;
}
