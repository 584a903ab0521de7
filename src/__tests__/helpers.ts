import { vi } from "vitest";
import type { GitInterface } from "../git";
import type { ChangedFile, Classification, ChangeType, Prompt } from "../types";
import { addedLines, removedLines } from "../utils/diff-parser";

export function fakeGit(overrides: Partial<GitInterface> = {}): GitInterface {
  return {
    isRepository: vi.fn(async () => true),
    getStagedDiff: vi.fn(async () => ""),
    getUnstagedDiff: vi.fn(async () => ""),
    listChangedFiles: vi.fn(async () => []),
    stageFiles: vi.fn(async () => undefined),
    unstageAll: vi.fn(async () => undefined),
    writeIndexTree: vi.fn(async () => "tree-1"),
    restoreStaged: vi.fn(async () => undefined),
    commit: vi.fn(async () => ({ hash: "abc1234", branch: "main" })),
    ...overrides,
  };
}

/**
 * ChangedFile whose counts are derived from its diff
 */
export function changedFile(
  path: string,
  diff = "",
  extra: Partial<Omit<ChangedFile, "path" | "diff">> = {}
): ChangedFile {
  return {
    path,
    status: "modified",
    diff,
    added: addedLines(diff).length,
    removed: removedLines(diff).length,
    binary: false,
    staged: false,
    ...extra,
  };
}

export function addedDiff(count: number, text = "line"): string {
  return Array.from({ length: count }, (_, i) => `+${text} ${i + 1}`).join("\n");
}

export function classification(
  type: ChangeType,
  file: ChangedFile,
  breaking = false
): Classification {
  return { type, breaking, files: [file], reasons: [] };
}

export function prompt(overrides: Partial<Prompt> = {}): Prompt {
  return {
    template: "simple",
    system: "test-system",
    text: "test-prompt",
    totalLines: 2,
    budget: { maxChars: 12000, maxLinesPerFile: 100 },
    ...overrides,
  };
}

/**
 * `git diff` section for a modified file
 */
export function modifiedSection(path: string, body: string[]): string {
  return [
    `diff --git a/${path} b/${path}`,
    "index 1111111..2222222 100644",
    `--- a/${path}`,
    `+++ b/${path}`,
    `@@ -1,${body.length} +1,${body.length} @@`,
    ...body,
  ].join("\n");
}

export function newFileSection(path: string, lines: string[]): string {
  return [
    `diff --git a/${path} b/${path}`,
    "new file mode 100644",
    "--- /dev/null",
    `+++ b/${path}`,
    `@@ -0,0 +1,${lines.length} @@`,
    ...lines.map((line) => `+${line}`),
  ].join("\n");
}

export function deletedFileSection(path: string, lines: string[]): string {
  return [
    `diff --git a/${path} b/${path}`,
    "deleted file mode 100644",
    `--- a/${path}`,
    "+++ /dev/null",
    `@@ -1,${lines.length} +0,0 @@`,
    ...lines.map((line) => `-${line}`),
  ].join("\n");
}
