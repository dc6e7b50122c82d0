import type { ModelSpec } from "../src/services/models.js";

export const README_DIFF = [
  "diff --git a/README.md b/README.md",
  "index 1111111..2222222 100644",
  "--- a/README.md",
  "+++ b/README.md",
  "@@ -1 +1,2 @@",
  " # demo",
  "+more",
].join("\n");

export const GO_DIFF = [
  "diff --git a/src/a.go b/src/a.go",
  "new file mode 100644",
  "index 0000000..3333333",
  "--- /dev/null",
  "+++ b/src/a.go",
  "@@ -0,0 +1,3 @@",
  "+package a",
  "+",
  "+func Add(x, y int) int { return x + y }",
].join("\n");

export const DOCS_DIFF = [
  "diff --git a/docs/x.md b/docs/x.md",
  "deleted file mode 100644",
  "index 4444444..0000000",
  "--- a/docs/x.md",
  "+++ /dev/null",
  "@@ -1 +0,0 @@",
  "-old",
].join("\n");

export const RENAME_DIFF = [
  "diff --git a/old name.txt b/new name.txt",
  "similarity index 100%",
  "rename from old name.txt",
  "rename to new name.txt",
].join("\n");

export const BINARY_DIFF = [
  "diff --git a/img.png b/img.png",
  "index 5555555..6666666 100644",
  "Binary files a/img.png and b/img.png differ",
].join("\n");

export const FULL_DIFF = [README_DIFF, GO_DIFF, DOCS_DIFF, RENAME_DIFF, BINARY_DIFF].join("\n") + "\n";

export function tinyModel(inputBudgetChars: number): ModelSpec {
  return {
    id: "default",
    backendModel: "test-model",
    contextTokens: 1000,
    maxOutputTokens: 100,
    inputBudgetChars,
  };
}
