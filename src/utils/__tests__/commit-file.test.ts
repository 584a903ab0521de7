import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterAll, describe, expect, it } from "vitest";
import {
  mergeEditedCommits,
  parseCommitContent,
  parseCommitFile,
  validateCommits,
  writeCommitFile,
} from "../commit-file";

describe("commit file", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "git-scribe-commit-file-"));

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes messages that parse back unchanged", () => {
    const file = path.join(dir, "COMMIT_EDITMSG");
    writeCommitFile(file, [
      { number: 1, description: "fix changes in src/", files: ["src/a.ts"], text: "fix: a\n\n- one" },
      { number: 2, description: "docs changes in docs/", files: ["docs/b.md"], text: "docs: b" },
    ]);

    const content = fs.readFileSync(file, "utf8");
    expect(content).toContain("# Commit 1: fix changes in src/\n# Files: src/a.ts\nfix: a");
    expect(parseCommitFile(file)).toEqual(["fix: a\n\n- one", "docs: b"]);
  });
});

describe("parseCommitContent", () => {
  it("ignores comments and blank edges", () => {
    expect(parseCommitContent("# header\n\nfix: a  \n\n\n\n- b\n")).toEqual(["fix: a\n\n- b"]);
  });

  it("returns an empty entry for a cleared section", () => {
    expect(parseCommitContent("fix: a\n# ========\n# Commit 2\n\n# ========\ndocs: c")).toEqual([
      "fix: a",
      "",
      "docs: c",
    ]);
  });
});

describe("validateCommits", () => {
  it("flags long subjects and skips empty entries", () => {
    expect(validateCommits(["", "fix: " + "a".repeat(20)], 20)).toEqual({
      valid: false,
      errors: ["Commit 2: Subject too long (25 chars, max 20 recommended)"],
    });
  });
});

describe("mergeEditedCommits", () => {
  it("replaces texts by position and drops removed commits", () => {
    const originals = [
      { id: "a", text: "fix: a" },
      { id: "b", text: "fix: b" },
      { id: "c", text: "fix: c" },
    ];
    expect(mergeEditedCommits(originals, ["fix: A", ""])).toEqual([
      { id: "a", text: "fix: A" },
      null,
      null,
    ]);
  });
});
