import { execa } from "execa";
import { minimatch } from "minimatch";
import { NoChangesError, VcsUnavailableError } from "../core/errors.js";
import { log } from "../core/logger.js";

export type FileDiff = {
  path: string;
  /** The whole per-file section, starting at its `diff --git` line. */
  hunkText: string;
};

export type ChangeSet = readonly FileDiff[];

export interface DiffSource {
  readDiff(): Promise<string>;
}

export type GitDiffOptions = {
  cwd?: string;
  /** Diff every tracked change against HEAD instead of the index. */
  all?: boolean;
};

function stderrOf(err: unknown): string {
  if (typeof err === "object" && err !== null && "stderr" in err && typeof err.stderr === "string") {
    return err.stderr;
  }
  return "";
}

function firstLine(text: string): string {
  return text.split("\n").map((l) => l.trim()).find(Boolean) ?? "";
}

async function shOut(args: string[], cwd?: string): Promise<string> {
  try {
    const res = await execa("git", args, { cwd, stripFinalNewline: false });
    return res.stdout;
  } catch (e: unknown) {
    const reason = firstLine(stderrOf(e)) || (e instanceof Error ? e.message : String(e));
    throw new VcsUnavailableError(`git ${args[0]} failed: ${reason}`, { cause: e });
  }
}

export class GitDiffSource implements DiffSource {
  constructor(private readonly opts: GitDiffOptions = {}) {}

  readDiff(): Promise<string> {
    const args = ["diff", "--no-color", "--no-ext-diff"];
    args.push(this.opts.all ? "HEAD" : "--cached");
    log.debug(`running git ${args.join(" ")}`);
    return shOut(args, this.opts.cwd);
  }
}

export async function commitWithMessage(message: string, cwd?: string) {
  try {
    const res = await execa("git", ["commit", "-F", "-"], { cwd, input: message });
    log.debug(res.stdout);
  } catch (e: unknown) {
    const reason = firstLine(stderrOf(e)) || (e instanceof Error ? e.message : String(e));
    throw new VcsUnavailableError(`git commit failed: ${reason}`, { cause: e });
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * unified diff parsing
 * ──────────────────────────────────────────────────────────────────────────── */

const ESCAPES: Record<string, number> = { n: 10, t: 9, '"': 34, "\\": 92, a: 7, b: 8, f: 12, r: 13, v: 11 };

/** Undo git's C-style quoting (`core.quotePath`), including octal UTF-8 bytes. */
export function unquoteGitPath(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) return raw;
  const body = raw.slice(1, -1);
  const bytes: number[] = [];
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== "\\") {
      bytes.push(...Buffer.from(ch, "utf8"));
      continue;
    }
    const next = body[i + 1] ?? "";
    const octal = /^[0-7]{3}/.exec(body.slice(i + 1, i + 4));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 3;
    } else if (next in ESCAPES) {
      bytes.push(ESCAPES[next]);
      i += 1;
    } else {
      bytes.push(92);
    }
  }
  return Buffer.from(bytes).toString("utf8");
}

function stripSide(p: string): string {
  const unquoted = unquoteGitPath(p.replace(/\t.*$/, ""));
  return unquoted.replace(/^[ab]\//, "");
}

function pathFromHeader(header: string): string {
  const rest = header.slice("diff --git ".length);
  const quoted = /"b\/((?:[^"\\]|\\.)*)"$/.exec(rest);
  if (quoted) return unquoteGitPath(`"${quoted[1]}"`);
  const idx = rest.lastIndexOf(" b/");
  return idx >= 0 ? rest.slice(idx + 3) : rest;
}

function pathOfSection(section: string): string {
  const lines = section.split("\n");
  let plus: string | undefined;
  let minus: string | undefined;
  let renamed: string | undefined;
  for (const line of lines.slice(1)) {
    if (line.startsWith("@@")) break;
    if (line.startsWith("+++ ")) plus = line.slice(4);
    else if (line.startsWith("--- ")) minus = line.slice(4);
    else if (line.startsWith("rename to ")) renamed = line.slice("rename to ".length);
  }
  if (plus && plus !== "/dev/null") return stripSide(plus);
  if (renamed) return unquoteGitPath(renamed);
  if (minus && minus !== "/dev/null") return stripSide(minus);
  return pathFromHeader(lines[0]);
}

/** Split `git diff` output into one record per file, in the order git printed them. */
export function parseUnifiedDiff(text: string): FileDiff[] {
  return text
    .split(/^(?=diff --git )/m)
    .filter((section) => section.startsWith("diff --git "))
    .map((section) => {
      const hunkText = section.replace(/\n+$/, "");
      return { path: pathOfSection(hunkText), hunkText };
    });
}

/* ────────────────────────────────────────────────────────────────────────────
 * exclusions
 * ──────────────────────────────────────────────────────────────────────────── */

const GLOB_CHARS = /[*?[]/;

function cleanEntry(entry: string): string {
  return entry.trim().replace(/^(\.\/)+/, "").replace(/\/+$/, "");
}

/**
 * Every entry matches itself and, when it names a directory, everything under
 * it. Entries with glob characters also match as gitignore-style patterns.
 */
export function buildExclusionMatcher(exclusions: ReadonlySet<string>): (path: string) => boolean {
  const entries: string[] = [];
  for (const raw of exclusions) {
    const entry = cleanEntry(raw);
    if (entry) entries.push(entry);
  }
  const globs = entries.filter((e) => GLOB_CHARS.test(e));
  return (path: string) => {
    const p = cleanEntry(path);
    if (entries.some((e) => p === e || p.startsWith(`${e}/`))) return true;
    return globs.some((g) => minimatch(p, g, { dot: true, matchBase: !g.includes("/") }));
  };
}

export async function collectChanges(source: DiffSource, exclusions: ReadonlySet<string>): Promise<ChangeSet> {
  const raw = await source.readDiff();
  const isExcluded = buildExclusionMatcher(exclusions);
  const kept: FileDiff[] = [];
  for (const file of parseUnifiedDiff(raw)) {
    if (isExcluded(file.path)) {
      log.debug(`excluded ${file.path}`);
      continue;
    }
    kept.push(file);
  }
  if (kept.length === 0) throw new NoChangesError();
  log.debug(`collected ${kept.length} file(s)`);
  return kept;
}
