import { Command } from "commander";
import { loadSettings } from "../core/config.js";
import { describeError, exitCodeFor } from "../core/errors.js";
import { log } from "../core/logger.js";
import { listModels, type ModelOverrides } from "../services/models.js";

export function formatModelTable(overrides: ModelOverrides = {}): string {
  const rows = listModels(overrides);
  const width = Math.max(...rows.map((m) => m.id.length));
  return rows
    .map((m) => `${m.id.padEnd(width)}  ${m.backendModel} (${m.contextTokens} tokens)`)
    .join("\n");
}

export const modelsCommand = new Command("models")
  .description("List the model tiers accepted by -m")
  .action(async () => {
    try {
      const { settings } = await loadSettings(process.cwd());
      process.stdout.write(`${formatModelTable(settings.models)}\n`);
    } catch (e: unknown) {
      log.err(describeError(e));
      process.exitCode = exitCodeFor(e);
    }
  });
