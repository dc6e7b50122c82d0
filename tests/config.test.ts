import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import { CONFIG_FILE, loadSettings, parseSettings, readCredential, SettingsSchema } from "../src/core/config.js";
import { ConfigurationError, MissingCredentialError } from "../src/core/errors.js";
import { DEFAULT_POLICY } from "../src/services/commitmsg.js";
import { DEFAULT_RETRY } from "../src/services/llm.js";

describe("parseSettings", () => {
  it("fills in defaults for an empty file", () => {
    expect(parseSettings("")).toEqual({
      apiKeyEnv: "OPENAI_API_KEY",
      baseUrl: "https://api.openai.com/v1",
      temperature: 0.2,
      exclude: [],
      models: {},
      policy: DEFAULT_POLICY,
      retry: DEFAULT_RETRY,
    });
  });

  it("reads nested sections", () => {
    const settings = parseSettings(
      [
        "model: advanced",
        "apiKeyEnv: MY_KEY",
        "exclude:",
        "  - package-lock.json",
        "models:",
        "  advanced: gpt-4o",
        "policy:",
        "  requireScope: true",
        "  maxDescriptionLength: 50",
        "retry:",
        "  maxAttempts: 2",
      ].join("\n")
    );
    expect(settings.model).toBe("advanced");
    expect(settings.apiKeyEnv).toBe("MY_KEY");
    expect(settings.exclude).toEqual(["package-lock.json"]);
    expect(settings.models).toEqual({ advanced: "gpt-4o" });
    expect(settings.policy).toEqual({ types: DEFAULT_POLICY.types, requireScope: true, maxDescriptionLength: 50 });
    expect(settings.retry).toEqual({ ...DEFAULT_RETRY, maxAttempts: 2 });
  });

  it("rejects invalid YAML", () => {
    expect(() => parseSettings("model: [unclosed")).toThrow(ConfigurationError);
    expect(() => parseSettings("model: [unclosed")).toThrow(/^\.diffscribe\.yml is not valid YAML: /);
  });

  it("names the offending field", () => {
    expect(() => parseSettings("retry:\n  maxAttempts: 0\n")).toThrow(/^\.diffscribe\.yml is invalid: retry\.maxAttempts: /);
  });

  it("rejects unknown keys", () => {
    expect(() => parseSettings("modle: advanced\n", "cfg.yml")).toThrow(/^cfg\.yml is invalid: \(root\): Unrecognized key/);
  });
});

describe("readCredential", () => {
  const settings = SettingsSchema.parse({});

  it("reads the configured variable", () => {
    expect(readCredential(settings, { OPENAI_API_KEY: " test-secret " })).toBe("test-secret");
    expect(readCredential({ ...settings, apiKeyEnv: "MY_KEY" }, { MY_KEY: "test-secret" })).toBe("test-secret");
  });

  it("fails before any request when the key is missing", () => {
    expect(() => readCredential(settings, {})).toThrow(MissingCredentialError);
    expect(() => readCredential(settings, { OPENAI_API_KEY: "  " })).toThrow(
      "OPENAI_API_KEY is not set. Export your API key, e.g. `export OPENAI_API_KEY=...`."
    );
  });
});

describe("loadSettings", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
  });

  function tempRepo() {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "diffscribe-"));
    dirs.push(root);
    fs.mkdirSync(path.join(root, ".git"));
    fs.mkdirSync(path.join(root, "src", "deep"), { recursive: true });
    return root;
  }

  it("finds the file at the repository root", async () => {
    const root = tempRepo();
    fs.writeFileSync(path.join(root, CONFIG_FILE), "model: advanced-fast\n");
    const { settings, file } = await loadSettings(path.join(root, "src", "deep"));
    expect(settings.model).toBe("advanced-fast");
    expect(file).toBe(path.join(root, CONFIG_FILE));
  });

  it("falls back to defaults without a file", async () => {
    const root = tempRepo();
    const { settings, file } = await loadSettings(root);
    expect(file).toBeUndefined();
    expect(settings.apiKeyEnv).toBe("OPENAI_API_KEY");
  });
});
