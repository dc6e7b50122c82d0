import { InvalidMessageFormatError } from "../core/errors.js";

export const DEFAULT_TYPES = [
  "feat",
  "fix",
  "docs",
  "style",
  "refactor",
  "perf",
  "test",
  "build",
  "ci",
  "chore",
  "revert",
] as const;

export type CommitPolicy = {
  types: string[];
  requireScope: boolean;
  maxDescriptionLength: number;
};

export const DEFAULT_POLICY: CommitPolicy = {
  types: [...DEFAULT_TYPES],
  requireScope: false,
  maxDescriptionLength: 72,
};

export type CommitMessage = {
  type: string;
  scope?: string;
  breaking: boolean;
  description: string;
  body?: string;
};

// How far into the header a misplaced `type:` may start and still be recovered,
// e.g. "Commit message: fix: ...".
const NEAR_START = 24;

const HEADER = /^([A-Za-z][\w-]*)(?:\(([^()\n]*)\))?(!)?:[ \t]*(.*)$/;

const QUOTES = new Set(['"', "'", "`"]);

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Remove code fences and wrapping quotes the model may have added. */
export function stripArtifacts(raw: string): string {
  let text = raw.replace(/\r\n/g, "\n").trim();
  let prev: string;
  do {
    prev = text;
    const unfenced = text.replace(/^```[\w-]*[ \t]*(?:\n|$)/, "");
    // a closing fence only goes with an opening one; otherwise it belongs to the body
    if (unfenced !== text) text = unfenced.replace(/(?:^|\n)```$/, "").trim();
    const first = text.charAt(0);
    if (text.length >= 2 && QUOTES.has(first) && text.endsWith(first)) {
      text = text.slice(1, -1).trim();
    }
  } while (text !== prev);
  return text;
}

type Header = { type: string; scope?: string; breaking: boolean; description: string };

const SUFFIXES = ["s", "es", "d", "ed", "ing"];

/** Spellings of a type the model sometimes writes instead: "fixed", "tests", "styling", "feature". */
function inflectionsOf(type: string): string[] {
  const forms = SUFFIXES.map((suffix) => type + suffix);
  if (type.endsWith("e")) forms.push(`${type.slice(0, -1)}ing`);
  if (type === "feat") forms.push("feature", "features");
  return forms;
}

function canonicalType(token: string, policy: CommitPolicy): string | undefined {
  const lower = token.toLowerCase();
  const types = policy.types.map((t) => t.toLowerCase());
  if (types.includes(lower)) return lower;
  return types.find((t) => inflectionsOf(t).includes(lower));
}

function toHeader(type: string, scope: string | undefined, bang: string | undefined, description: string): Header {
  const s = scope?.trim();
  return { type, scope: s ? s : undefined, breaking: bang === "!", description: description.trim() };
}

function parseHeader(line: string, policy: CommitPolicy): Header | undefined {
  const m = HEADER.exec(line);
  if (m) {
    const type = canonicalType(m[1], policy);
    if (type) return toHeader(type, m[2], m[3], m[4]);
  }

  if (policy.types.length === 0) return undefined;
  const alternatives = policy.types.map(escapeRegex).join("|");
  const loose = new RegExp(`\\b(${alternatives})(?:\\(([^()\\n]*)\\))?(!)?:[ \\t]*(.*)$`, "i");
  const found = loose.exec(line);
  if (found && found.index <= NEAR_START) {
    return toHeader(found[1].toLowerCase(), found[2], found[3], found[4]);
  }
  return undefined;
}

/**
 * Parse model output into a conventional commit. Fixes cosmetic damage
 * (fences, quotes, a stray prefix, a misspelt type) and rejects anything else.
 */
export function normalizeCommitMessage(raw: string, policy: CommitPolicy = DEFAULT_POLICY): CommitMessage {
  const text = stripArtifacts(raw);
  if (!text) throw new InvalidMessageFormatError("The model returned an empty message.", raw);

  const lines = text.split("\n");
  const header = parseHeader(lines[0].trim(), policy);
  if (!header) {
    throw new InvalidMessageFormatError(
      `Not a conventional commit header (expected "type(scope): description" with type one of ${policy.types.join(", ")}).`,
      raw
    );
  }
  if (!header.description) {
    throw new InvalidMessageFormatError("Commit description is empty.", raw);
  }
  if (header.description.length > policy.maxDescriptionLength) {
    throw new InvalidMessageFormatError(
      `Commit description is ${header.description.length} characters; the limit is ${policy.maxDescriptionLength}.`,
      raw
    );
  }
  if (policy.requireScope && !header.scope) {
    throw new InvalidMessageFormatError("Commit header has no scope, but a scope is required.", raw);
  }

  const body = lines.slice(1).join("\n").replace(/^\s*\n/, "").trimEnd();
  return {
    type: header.type,
    ...(header.scope ? { scope: header.scope } : {}),
    breaking: header.breaking,
    description: header.description,
    ...(body ? { body } : {}),
  };
}

export function formatCommitMessage(msg: CommitMessage): string {
  const scope = msg.scope ? `(${msg.scope})` : "";
  const bang = msg.breaking ? "!" : "";
  const header = `${msg.type}${scope}${bang}: ${msg.description}`;
  return msg.body ? `${header}\n\n${msg.body}` : header;
}
