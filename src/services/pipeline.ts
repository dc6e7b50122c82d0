import { CancelledError } from "../core/errors.js";
import { log } from "../core/logger.js";
import { DEFAULT_POLICY, formatCommitMessage, normalizeCommitMessage, type CommitMessage, type CommitPolicy } from "./commitmsg.js";
import { collectChanges, type DiffSource } from "./git.js";
import type { Generator } from "./llm.js";
import { resolveModel, type ModelOverrides, type ModelSpec } from "./models.js";
import { compose } from "./prompt.js";

export type Stage = "resolving" | "collecting" | "composing" | "generating" | "normalizing" | "done";

export type PipelineDeps = {
  source: DiffSource;
  generator: Generator;
};

export type PipelineInput = {
  exclusions?: Iterable<string>;
  context?: string;
  model?: string;
  modelOverrides?: ModelOverrides;
  policy?: CommitPolicy;
  signal?: AbortSignal;
  onStage?: (stage: Stage) => void;
};

export type PipelineResult = {
  message: CommitMessage;
  text: string;
  model: ModelSpec;
  truncated: readonly string[];
};

/**
 * One invocation: resolve the model, collect the diff, compose, generate,
 * normalize. The first failing stage ends the run with its error.
 */
export async function runPipeline(deps: PipelineDeps, input: PipelineInput = {}): Promise<PipelineResult> {
  const enter = (stage: Stage) => {
    if (input.signal?.aborted) throw new CancelledError();
    log.debug(`stage: ${stage}`);
    input.onStage?.(stage);
  };
  const policy = input.policy ?? DEFAULT_POLICY;

  enter("resolving");
  const model = resolveModel(input.model, input.modelOverrides);

  enter("collecting");
  const changes = await collectChanges(deps.source, new Set(input.exclusions ?? []));

  enter("composing");
  const request = compose(changes, input.context, model, policy);

  enter("generating");
  const raw = await deps.generator.generate(request, input.signal);

  enter("normalizing");
  const message = normalizeCommitMessage(raw, policy);

  enter("done");
  return { message, text: formatCommitMessage(message), model, truncated: request.truncated };
}
