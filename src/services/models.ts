import { UnknownModelError } from "../core/errors.js";

export const MODEL_IDS = ["default", "advanced", "advanced-fast"] as const;

export type ModelId = (typeof MODEL_IDS)[number];

export type ModelSpec = {
  id: ModelId;
  backendModel: string;
  contextTokens: number;
  maxOutputTokens: number;
  /** Characters of prompt the model accepts, estimated at 4 chars per token. */
  inputBudgetChars: number;
};

export type ModelOverrides = Partial<Record<ModelId, string>>;

const CHARS_PER_TOKEN = 4;

const TIERS: Record<ModelId, { backendModel: string; contextTokens: number; maxOutputTokens: number }> = {
  default: { backendModel: "gpt-3.5-turbo", contextTokens: 16_385, maxOutputTokens: 512 },
  advanced: { backendModel: "gpt-4", contextTokens: 8_192, maxOutputTokens: 512 },
  "advanced-fast": { backendModel: "gpt-4-turbo", contextTokens: 128_000, maxOutputTokens: 512 },
};

// Names accepted by earlier releases of the CLI.
const ALIASES = new Map<string, ModelId>([
  ["gpt3.5", "default"],
  ["gpt4", "advanced"],
  ["gpt4-turbo", "advanced-fast"],
]);

function isModelId(value: string): value is ModelId {
  return (MODEL_IDS as readonly string[]).includes(value);
}

export function knownModelIdentifiers(): string[] {
  return [...MODEL_IDS, ...ALIASES.keys()];
}

function specFor(id: ModelId, overrides: ModelOverrides): ModelSpec {
  const tier = TIERS[id];
  return {
    id,
    backendModel: overrides[id] ?? tier.backendModel,
    contextTokens: tier.contextTokens,
    maxOutputTokens: tier.maxOutputTokens,
    inputBudgetChars: (tier.contextTokens - tier.maxOutputTokens) * CHARS_PER_TOKEN,
  };
}

/**
 * Map a user-facing model name to its tier. Blank or missing selects `default`;
 * anything outside the known names is a caller error.
 */
export function resolveModel(identifier?: string, overrides: ModelOverrides = {}): ModelSpec {
  const key = (identifier ?? "").trim().toLowerCase();
  if (!key) return specFor("default", overrides);
  if (isModelId(key)) return specFor(key, overrides);
  const aliased = ALIASES.get(key);
  if (aliased) return specFor(aliased, overrides);
  throw new UnknownModelError(identifier ?? "", knownModelIdentifiers());
}

export function listModels(overrides: ModelOverrides = {}): ModelSpec[] {
  return MODEL_IDS.map((id) => specFor(id, overrides));
}
