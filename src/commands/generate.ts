import { Command } from "commander";
import { loadSettings, readCredential } from "../core/config.js";
import { CancelledError, DiffscribeError, describeError, exitCodeFor, rawOutputOf } from "../core/errors.js";
import { log, setVerbose } from "../core/logger.js";
import { commitWithMessage, GitDiffSource, type DiffSource, type GitDiffOptions } from "../services/git.js";
import { ChatCompletionsGenerator, type ChatCompletionsOptions, type Generator } from "../services/llm.js";
import { runPipeline, type Stage } from "../services/pipeline.js";
import { Spinner } from "../utils/spinner.js";

type GenerateOptions = {
  context?: string;
  exclude?: string[];
  model?: string;
  all?: boolean;
  commit?: boolean;
  debug?: boolean;
};

export type GenerateDeps = {
  cwd: () => string;
  env: NodeJS.ProcessEnv;
  loadSettings: typeof loadSettings;
  makeSource: (opts: GitDiffOptions) => DiffSource;
  makeGenerator: (opts: ChatCompletionsOptions) => Generator;
  commit: (message: string, cwd: string) => Promise<void>;
  write: (text: string) => void;
};

const defaultDeps: GenerateDeps = {
  cwd: () => process.cwd(),
  env: process.env,
  loadSettings,
  makeSource: (opts) => new GitDiffSource(opts),
  makeGenerator: (opts) => new ChatCompletionsGenerator(opts),
  commit: commitWithMessage,
  write: (text) => {
    process.stdout.write(text);
  },
};

const STAGE_TEXT: Record<Stage, string> = {
  resolving: "Resolving model",
  collecting: "Collecting changes",
  composing: "Composing prompt",
  generating: "Generating commit message",
  normalizing: "Checking message",
  done: "Commit message ready",
};

function report(e: unknown) {
  log.err(describeError(e));
  const raw = rawOutputOf(e);
  if (raw !== undefined) {
    log.info("Raw output:");
    console.error(raw);
  }
  if (!(e instanceof DiffscribeError) && e instanceof Error && e.stack) {
    log.debug(e.stack);
  }
}

export function buildGenerateCommand(deps: GenerateDeps = defaultDeps): Command {
  return new Command("generate")
    .description("Write a conventional commit message for the staged changes")
    .option("-c, --context <text>", "Extra context for the model, added to the prompt verbatim")
    .option("-e, --exclude <paths...>", "Files or directories to leave out of the diff")
    .option("-m, --model <id>", "Model tier: default, advanced or advanced-fast")
    .option("-a, --all", "Describe every tracked change against HEAD, not just staged ones", false)
    .option("--commit", "Create the commit with the generated message", false)
    .option("--debug", "Verbose logging on stderr", false)
    .action(async (opts: GenerateOptions) => {
      if (opts.debug) setVerbose(true);
      const cwd = deps.cwd();

      const ac = new AbortController();
      const onSigInt = () => ac.abort();
      process.once("SIGINT", onSigInt);
      const spinner = new Spinner();

      try {
        const { settings, file } = await deps.loadSettings(cwd);
        if (file) log.debug(`settings from ${file}`);
        const apiKey = readCredential(settings, deps.env);

        const generator = deps.makeGenerator({
          apiKey,
          baseUrl: settings.baseUrl,
          temperature: settings.temperature,
          retry: settings.retry,
        });
        const source = deps.makeSource({ cwd, all: opts.all });

        spinner.start(STAGE_TEXT.resolving);
        const result = await runPipeline(
          { source, generator },
          {
            exclusions: [...settings.exclude, ...(opts.exclude ?? [])],
            context: opts.context,
            model: opts.model ?? settings.model,
            modelOverrides: settings.models,
            policy: settings.policy,
            signal: ac.signal,
            onStage: (stage) => spinner.update(STAGE_TEXT[stage]),
          }
        );
        spinner.stop(true);
        if (ac.signal.aborted) throw new CancelledError();

        log.debug(`model ${result.model.id} (${result.model.backendModel})`);
        deps.write(`${result.text}\n`);

        if (opts.commit) {
          await deps.commit(result.text, cwd);
          log.ok("Committed.");
        }
      } catch (e: unknown) {
        spinner.stop(false);
        report(e);
        process.exitCode = exitCodeFor(e);
      } finally {
        process.removeListener("SIGINT", onSigInt);
      }
    });
}

export const generateCommand = buildGenerateCommand();
