// src/core/errors.ts

export type ErrorKind =
  | "configuration"
  | "vcs-unavailable"
  | "no-changes"
  | "transient-service"
  | "auth"
  | "request-rejected"
  | "timeout"
  | "malformed-response"
  | "invalid-message-format"
  | "cancelled";

export const EXIT_CODES = {
  ok: 0,
  unexpected: 1,
  configuration: 2,
  vcsUnavailable: 3,
  noChanges: 4,
  generation: 5,
  invalidMessage: 6,
  cancelled: 130,
} as const;

/**
 * Base for every failure the pipeline reports on purpose. The CLI renders
 * `message` as-is and exits with `exitCode`; nothing else is inspected.
 */
export abstract class DiffscribeError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends DiffscribeError {
  readonly kind = "configuration";
  readonly exitCode: number = EXIT_CODES.configuration;
}

export class MissingCredentialError extends ConfigurationError {
  constructor(readonly variable: string) {
    super(`${variable} is not set. Export your API key, e.g. \`export ${variable}=...\`.`);
  }
}

export class UnknownModelError extends ConfigurationError {
  constructor(readonly identifier: string, known: readonly string[]) {
    super(`Unknown model "${identifier}". Choose one of: ${known.join(", ")}.`);
  }
}

export class VcsUnavailableError extends DiffscribeError {
  readonly kind = "vcs-unavailable";
  readonly exitCode: number = EXIT_CODES.vcsUnavailable;
}

export class NoChangesError extends DiffscribeError {
  readonly kind = "no-changes";
  readonly exitCode: number = EXIT_CODES.noChanges;

  constructor(message = "No changes to describe. Stage some files with `git add` first.") {
    super(message);
  }
}

export class TransientServiceError extends DiffscribeError {
  readonly kind = "transient-service";
  readonly exitCode: number = EXIT_CODES.generation;

  constructor(message: string, readonly attempts: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class AuthError extends DiffscribeError {
  readonly kind = "auth";
  readonly exitCode: number = EXIT_CODES.generation;
}

export class RequestRejectedError extends DiffscribeError {
  readonly kind = "request-rejected";
  readonly exitCode: number = EXIT_CODES.generation;

  constructor(message: string, readonly status: number) {
    super(message);
  }
}

export class TimeoutError extends DiffscribeError {
  readonly kind = "timeout";
  readonly exitCode: number = EXIT_CODES.generation;
}

export class MalformedResponseError extends DiffscribeError {
  readonly kind = "malformed-response";
  readonly exitCode: number = EXIT_CODES.generation;

  constructor(message: string, readonly raw: string) {
    super(message);
  }
}

export class InvalidMessageFormatError extends DiffscribeError {
  readonly kind = "invalid-message-format";
  readonly exitCode: number = EXIT_CODES.invalidMessage;

  constructor(message: string, readonly raw: string) {
    super(message);
  }
}

export class CancelledError extends DiffscribeError {
  readonly kind = "cancelled";
  readonly exitCode: number = EXIT_CODES.cancelled;

  constructor(message = "Cancelled.") {
    super(message);
  }
}

export function exitCodeFor(err: unknown): number {
  return err instanceof DiffscribeError ? err.exitCode : EXIT_CODES.unexpected;
}

/** Raw model output attached to an error, if any. */
export function rawOutputOf(err: unknown): string | undefined {
  if (err instanceof MalformedResponseError || err instanceof InvalidMessageFormatError) {
    return err.raw;
  }
  return undefined;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
