import { describe, expect, it } from "vitest";
import { ChangeClassifier } from "../classifier";
import { DEFAULT_CONFIG } from "../config";
import { capText, getCommitSystemPrompt, PromptBuilder, truncateDiff } from "../prompts";
import { ChangedFile } from "../types";
import { addedDiff, changedFile } from "./helpers";

const classifier = new ChangeClassifier();

function buildPrompt(files: ChangedFile[], settings = DEFAULT_CONFIG) {
  const { aggregate } = classifier.classify(files);
  return new PromptBuilder(settings).build(files, aggregate);
}

describe("PromptBuilder", () => {
  it.each([
    [79, "simple"],
    [80, "comprehensive"],
    [81, "comprehensive"],
  ] as const)("uses the %s-line threshold to pick a %s template", (lines, template) => {
    const result = buildPrompt([changedFile("src/list.ts", addedDiff(lines))]);
    expect(result.totalLines).toBe(lines);
    expect(result.template).toBe(template);
  });

  it("sums added and removed lines across files", () => {
    const result = buildPrompt([
      changedFile("a.ts", "-x\n+y"),
      changedFile("b.ts", "+z"),
    ]);
    expect(result.totalLines).toBe(3);
  });

  it("carries the fixed system prompt", () => {
    expect(buildPrompt([changedFile("a.ts", "+x")]).system).toBe(getCommitSystemPrompt());
  });

  it("truncates a 10,000-line diff with exactly one marker", () => {
    const result = buildPrompt([changedFile("src/big.ts", addedDiff(10000))]);
    const markers = result.text.match(/…truncated \d+ lines…/g) || [];
    expect(markers).toEqual(["…truncated 9900 lines…"]);
    expect(result.text).toContain("+line 50\n…truncated 9900 lines…\n+line 9951");
    expect(result.text.length).toBeLessThanOrEqual(DEFAULT_CONFIG.maxPromptLength);
  });

  it("halves the per-file budget until the prompt fits", () => {
    const files = [0, 1, 2].map((k) => changedFile(`src/mod${k}.ts`, addedDiff(300, "x".repeat(20))));
    const result = buildPrompt(files, { ...DEFAULT_CONFIG, maxPromptLength: 1500 });
    expect(result.budget).toEqual({ maxChars: 1500, maxLinesPerFile: 12 });
    expect(result.text.length).toBeLessThanOrEqual(1500);
    expect(result.text.match(/…truncated 288 lines…/g)).toHaveLength(3);
    expect(result.text).not.toContain("characters…");
  });

  it("stops halving at the first and last two lines of each file", () => {
    const files = [changedFile("src/mod.ts", addedDiff(300))];
    const smallest = buildPrompt(files, { ...DEFAULT_CONFIG, diffMaxLines: 4, maxPromptLength: 100000 });
    const result = buildPrompt(files, { ...DEFAULT_CONFIG, maxPromptLength: smallest.text.length });
    expect(result.budget.maxLinesPerFile).toBe(4);
    expect(result.text).toBe(smallest.text);
    expect(result.text).toContain("+line 1\n+line 2\n…truncated 296 lines…\n+line 299\n+line 300");
  });

  it("caps the text when the smallest per-file budget does not fit", () => {
    const files = [0, 1, 2].map((k) => changedFile(`src/mod${k}.ts`, addedDiff(300)));
    const result = buildPrompt(files, { ...DEFAULT_CONFIG, maxPromptLength: 200 });
    expect(result.budget.maxLinesPerFile).toBe(4);
    expect(result.text.length).toBeLessThanOrEqual(200);
    expect(result.text).toMatch(/…truncated \d+ characters…$/);
  });

  it("asks for a breaking-change footer when the changes break compatibility", () => {
    const diff = [
      "-export function connect(url: string) {",
      "+export function connect(url: string, retries: number) {",
      addedDiff(80),
    ].join("\n");
    const result = buildPrompt([changedFile("src/client.ts", diff)]);
    expect(result.template).toBe("comprehensive");
    expect(result.text).toContain('"BREAKING CHANGE: <what breaks>" footer');
  });

  it("asks for a scope when scopes are required", () => {
    const result = buildPrompt([changedFile("a.ts", "+x")], { ...DEFAULT_CONFIG, forceScope: true });
    expect(result.text).toContain("- Always include a scope in parentheses after the type");
  });

  it("describes binary files without their content", () => {
    const result = buildPrompt([changedFile("logo.png", "", { binary: true })]);
    expect(result.text).toContain("### logo.png\nBinary file changed");
  });

  it("is deterministic", () => {
    const files = [changedFile("a.ts", addedDiff(120)), changedFile("b.md", "+docs")];
    expect(buildPrompt(files)).toEqual(buildPrompt(files));
  });
});

describe("truncateDiff", () => {
  it("keeps head and tail around one marker", () => {
    expect(truncateDiff("a\nb\nc\nd\ne", 2)).toBe("a\n…truncated 3 lines…\ne");
  });

  it("leaves short diffs untouched", () => {
    expect(truncateDiff("a\nb", 2)).toBe("a\nb");
  });

  it("reduces a diff to the marker with no line budget", () => {
    expect(truncateDiff("a\nb\nc", 0)).toBe("…truncated 3 lines…");
  });
});

describe("capText", () => {
  it("fits the marker inside the limit", () => {
    const text = "abcdefghij".repeat(10);
    expect(capText(text, 40)).toBe("abcdefghijabcd\n…truncated 86 characters…");
  });

  it("returns short text unchanged", () => {
    expect(capText("short", 40)).toBe("short");
  });
});
