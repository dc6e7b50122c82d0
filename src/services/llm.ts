// src/services/llm.ts
import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import {
  AuthError,
  CancelledError,
  MalformedResponseError,
  RequestRejectedError,
  TimeoutError,
  TransientServiceError,
  describeError,
} from "../core/errors.js";
import { log } from "../core/logger.js";
import type { GenerationRequest } from "./prompt.js";

export interface Generator {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Wall-clock budget for every attempt and backoff together. */
  timeoutMs: number;
};

export const DEFAULT_RETRY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  timeoutMs: 60_000,
};

export const DEFAULT_BASE_URL = "https://api.openai.com/v1";

export type ChatCompletionsOptions = {
  apiKey: string;
  baseUrl?: string;
  temperature?: number;
  retry?: Partial<RetryPolicy>;
  fetch?: typeof fetch;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  now?: () => number;
};

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

type Attempt =
  | { kind: "ok"; text: string }
  | { kind: "retry"; reason: string; retryAfterMs?: number };

async function defaultSleep(ms: number, signal?: AbortSignal) {
  await delay(ms, undefined, { signal });
}

/** `Retry-After` as milliseconds; accepts delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | null, now: number): number | undefined {
  if (!value) return undefined;
  const secs = Number(value);
  if (Number.isFinite(secs) && secs >= 0) return secs * 1000;
  const at = Date.parse(value);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

/** Full-jitter exponential backoff for the retry following `attempt` (1-based). */
export function backoffDelay(attempt: number, retry: RetryPolicy, random: () => number): number {
  const ceiling = Math.min(retry.maxDelayMs, retry.baseDelayMs * 2 ** (attempt - 1));
  return Math.floor(random() * ceiling);
}

/**
 * OpenAI-compatible chat completions client. Retries 429/5xx and network
 * failures with backoff, all inside one deadline.
 */
export class ChatCompletionsGenerator implements Generator {
  private readonly url: string;
  private readonly retry: RetryPolicy;
  private readonly fetchFn: typeof fetch;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(private readonly opts: ChatCompletionsOptions) {
    this.url = `${(opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "")}/chat/completions`;
    this.retry = { ...DEFAULT_RETRY, ...opts.retry };
    this.fetchFn = opts.fetch ?? fetch;
    this.sleep = opts.sleep ?? defaultSleep;
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? Date.now;
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const key = this.opts.apiKey;
    if (!key.trim() || /\s/.test(key)) {
      throw new AuthError("The API key is malformed (empty or contains whitespace).");
    }

    const body = JSON.stringify({
      model: request.model.backendModel,
      messages: [
        { role: "system", content: request.instructions },
        { role: "user", content: request.prompt },
      ],
      temperature: this.opts.temperature ?? 0.2,
      max_tokens: request.model.maxOutputTokens,
    });

    const { maxAttempts, timeoutMs } = this.retry;
    const deadline = this.now() + timeoutMs;
    let lastReason = "no attempt made";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) throw new CancelledError();
      const remaining = deadline - this.now();
      if (remaining <= 0) throw new TimeoutError(`Generation timed out after ${timeoutMs}ms (${lastReason}).`);

      const outcome = await this.attempt(body, remaining, timeoutMs, signal);
      if (outcome.kind === "ok") return outcome.text;

      lastReason = outcome.reason;
      log.debug(`attempt ${attempt}/${maxAttempts} failed: ${outcome.reason}`);
      if (attempt === maxAttempts) break;

      const wait =
        outcome.retryAfterMs !== undefined
          ? Math.min(outcome.retryAfterMs, this.retry.maxDelayMs)
          : backoffDelay(attempt, this.retry, this.random);
      if (this.now() + wait >= deadline) {
        throw new TimeoutError(`Generation timed out after ${timeoutMs}ms (${lastReason}).`);
      }
      log.debug(`retrying in ${wait}ms`);
      await this.pause(wait, signal);
    }

    throw new TransientServiceError(
      `The generation service kept failing after ${maxAttempts} attempt(s): ${lastReason}.`,
      maxAttempts
    );
  }

  private async pause(ms: number, signal?: AbortSignal) {
    try {
      await this.sleep(ms, signal);
    } catch (e: unknown) {
      if (signal?.aborted) throw new CancelledError();
      throw e;
    }
  }

  private redact(text: string): string {
    return text.split(this.opts.apiKey).join("***");
  }

  private async attempt(body: string, remaining: number, timeoutMs: number, signal?: AbortSignal): Promise<Attempt> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, remaining);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let status: number;
    let text: string;
    let retryAfter: string | null;
    try {
      const res = await this.fetchFn(this.url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.opts.apiKey}`,
          "Content-Type": "application/json",
        },
        body,
        signal: controller.signal,
      });
      status = res.status;
      retryAfter = res.headers.get("retry-after");
      text = await res.text();
    } catch (e: unknown) {
      if (signal?.aborted) throw new CancelledError();
      if (timedOut) throw new TimeoutError(`Generation timed out after ${timeoutMs}ms (request still in flight).`);
      return { kind: "retry", reason: `network error: ${this.redact(describeError(e))}` };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    if (status >= 200 && status < 300) return { kind: "ok", text: this.parse(text) };

    if (status === 429 || status >= 500) {
      return {
        kind: "retry",
        reason: `HTTP ${status}`,
        retryAfterMs: parseRetryAfter(retryAfter, this.now()),
      };
    }

    if (status === 401 || status === 403) {
      throw new AuthError(`The generation service rejected the API key (HTTP ${status}).`);
    }

    const detail = this.serviceMessage(text);
    throw new RequestRejectedError(
      `The generation service rejected the request (HTTP ${status})${detail ? `: ${detail}` : "."}`,
      status
    );
  }

  private serviceMessage(text: string): string | undefined {
    try {
      const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
      return parsed.success ? this.redact(parsed.data.error.message) : undefined;
    } catch {
      return undefined;
    }
  }

  private parse(text: string): string {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new MalformedResponseError("The generation service returned a body that is not JSON.", text);
    }
    const parsed = ChatCompletionSchema.safeParse(json);
    if (!parsed.success) {
      throw new MalformedResponseError("The generation service response has no message content.", text);
    }
    return parsed.data.choices[0].message.content;
  }
}
