import { describe, it, expect, vi, beforeEach } from "vitest";
vi.mock("execa", () => ({ execa: vi.fn() }));
import { execa } from "execa";
import {
  GitDiffSource,
  buildExclusionMatcher,
  collectChanges,
  commitWithMessage,
  parseUnifiedDiff,
  unquoteGitPath,
  type DiffSource,
} from "../src/services/git.js";
import { NoChangesError, VcsUnavailableError } from "../src/core/errors.js";
import { BINARY_DIFF, DOCS_DIFF, FULL_DIFF, GO_DIFF, README_DIFF } from "./fixtures.js";

function source(text: string): DiffSource {
  return { readDiff: async () => text };
}

const ALL_PATHS = ["README.md", "src/a.go", "docs/x.md", "new name.txt", "img.png"];

describe("parseUnifiedDiff", () => {
  it("splits one record per file in git order", () => {
    const files = parseUnifiedDiff(FULL_DIFF);
    expect(files.map((f) => f.path)).toEqual(ALL_PATHS);
  });

  it("keeps each section verbatim without the trailing newline", () => {
    const files = parseUnifiedDiff(FULL_DIFF);
    expect(files[0].hunkText).toBe(README_DIFF);
    expect(files[1].hunkText).toBe(GO_DIFF);
    expect(files[2].hunkText).toBe(DOCS_DIFF);
    expect(files[4].hunkText).toBe(BINARY_DIFF);
  });

  it("returns nothing for empty output", () => {
    expect(parseUnifiedDiff("")).toEqual([]);
  });

  it("decodes quoted paths", () => {
    const diff = [
      'diff --git "a/caf\\303\\251.txt" "b/caf\\303\\251.txt"',
      "index 1..2 100644",
      '--- "a/caf\\303\\251.txt"',
      '+++ "b/caf\\303\\251.txt"',
      "@@ -1 +1 @@",
      "-a",
      "+b",
    ].join("\n");
    expect(parseUnifiedDiff(diff)[0].path).toBe("café.txt");
  });
});

describe("unquoteGitPath", () => {
  it("leaves unquoted paths alone", () => {
    expect(unquoteGitPath("src/a.go")).toBe("src/a.go");
  });

  it("handles escaped quotes and tabs", () => {
    expect(unquoteGitPath('"a\\"b\\tc"')).toBe('a"b\tc');
  });
});

describe("buildExclusionMatcher", () => {
  it("matches exact paths and directory prefixes only", () => {
    const isExcluded = buildExclusionMatcher(new Set(["docs/", "src/a.go"]));
    expect(isExcluded("docs/x.md")).toBe(true);
    expect(isExcluded("src/a.go")).toBe(true);
    expect(isExcluded("src/a.go.bak")).toBe(false);
    expect(isExcluded("README.md")).toBe(false);
  });

  it("does not treat a name prefix as a directory", () => {
    const isExcluded = buildExclusionMatcher(new Set(["doc"]));
    expect(isExcluded("docs/x.md")).toBe(false);
    expect(isExcluded("doc/y.md")).toBe(true);
  });

  it("ignores a leading ./", () => {
    expect(buildExclusionMatcher(new Set(["./src/a.go"]))("src/a.go")).toBe(true);
  });

  it("treats entries with glob characters as patterns", () => {
    const isExcluded = buildExclusionMatcher(new Set(["*.md", "dist/**"]));
    expect(isExcluded("README.md")).toBe(true);
    expect(isExcluded("docs/x.md")).toBe(true);
    expect(isExcluded("dist/app.js")).toBe(true);
    expect(isExcluded("src/a.go")).toBe(false);
  });

  it("matches paths with bracket characters exactly", () => {
    expect(buildExclusionMatcher(new Set(["app/[id]/page.tsx"]))("app/[id]/page.tsx")).toBe(true);
    const byDir = buildExclusionMatcher(new Set(["app/[id]"]));
    expect(byDir("app/[id]/page.tsx")).toBe(true);
    expect(byDir("app/[id]x/page.tsx")).toBe(false);
  });
});

const ROUTE_DIFF = [
  "diff --git a/app/[id]/page.tsx b/app/[id]/page.tsx",
  "index 1111111..2222222 100644",
  "--- a/app/[id]/page.tsx",
  "+++ b/app/[id]/page.tsx",
  "@@ -1 +1 @@",
  "-export default function Page() {}",
  "+export default function Page() { return null; }",
  "",
].join("\n");

describe("collectChanges", () => {
  it("partitions the diff by the exclusion set", async () => {
    const subsets = [[], ["README.md"], ["src/a.go", "img.png"], ["docs/x.md", "new name.txt", "README.md"]];
    for (const excluded of subsets) {
      const changes = await collectChanges(source(FULL_DIFF), new Set(excluded));
      expect(changes.map((c) => c.path)).toEqual(ALL_PATHS.filter((p) => !excluded.includes(p)));
    }
  });

  it("fails with NoChangesError when everything is excluded", async () => {
    await expect(collectChanges(source(README_DIFF), new Set(["README.md"]))).rejects.toBeInstanceOf(NoChangesError);
  });

  it("excludes a bracketed route path named exactly", async () => {
    await expect(collectChanges(source(ROUTE_DIFF), new Set(["app/[id]/page.tsx"]))).rejects.toBeInstanceOf(
      NoChangesError
    );
  });

  it("fails with NoChangesError on an empty diff", async () => {
    await expect(collectChanges(source(""), new Set())).rejects.toBeInstanceOf(NoChangesError);
  });
});

describe("GitDiffSource", () => {
  beforeEach(() => {
    vi.mocked(execa).mockReset();
  });

  it("reads the staged diff by default", async () => {
    vi.mocked(execa).mockResolvedValue({ stdout: FULL_DIFF } as never);
    const text = await new GitDiffSource({ cwd: "/repo" }).readDiff();
    expect(text).toBe(FULL_DIFF);
    expect(execa).toHaveBeenCalledWith("git", ["diff", "--no-color", "--no-ext-diff", "--cached"], {
      cwd: "/repo",
      stripFinalNewline: false,
    });
  });

  it("diffs against HEAD with all", async () => {
    vi.mocked(execa).mockResolvedValue({ stdout: "" } as never);
    await new GitDiffSource({ all: true }).readDiff();
    expect(vi.mocked(execa).mock.calls[0][1]).toEqual(["diff", "--no-color", "--no-ext-diff", "HEAD"]);
  });

  it("reports git failures as VcsUnavailableError", async () => {
    vi.mocked(execa).mockRejectedValue(
      Object.assign(new Error("Command failed with exit code 128"), {
        stderr: "fatal: not a git repository (or any of the parent directories): .git\n",
        exitCode: 128,
      })
    );
    const err = await new GitDiffSource().readDiff().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(VcsUnavailableError);
    expect(err).toHaveProperty(
      "message",
      "git diff failed: fatal: not a git repository (or any of the parent directories): .git"
    );
  });

  it("reports a missing git binary as VcsUnavailableError", async () => {
    vi.mocked(execa).mockRejectedValue(new Error("spawn git ENOENT"));
    await expect(new GitDiffSource().readDiff()).rejects.toThrow("git diff failed: spawn git ENOENT");
  });
});

describe("commitWithMessage", () => {
  it("passes the message on stdin", async () => {
    vi.mocked(execa).mockReset();
    vi.mocked(execa).mockResolvedValue({ stdout: "[main abc123] feat: add login" } as never);
    await commitWithMessage("feat: add login", "/repo");
    expect(execa).toHaveBeenCalledWith("git", ["commit", "-F", "-"], { cwd: "/repo", input: "feat: add login" });
  });
});
