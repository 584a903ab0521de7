import { describe, expect, it, vi } from "vitest";
import { commitPlan, pathsToStage } from "../commit";
import type { GitInterface } from "../git";
import { changedFile, fakeGit } from "./helpers";

describe("pathsToStage", () => {
  it("includes rename sources once", () => {
    expect(
      pathsToStage([
        changedFile("lib/util.ts", "", { status: "renamed", oldPath: "old/util.ts" }),
        changedFile("src/a.ts"),
        changedFile("src/a.ts"),
      ])
    ).toEqual(["old/util.ts", "lib/util.ts", "src/a.ts"]);
  });
});

describe("commitPlan", () => {
  it("commits grouped staged changes from the index snapshot", async () => {
    const calls: string[] = [];
    const git = fakeGit({
      unstageAll: vi.fn(async () => {
        calls.push("reset");
      }),
      restoreStaged: vi.fn(async (tree: string, paths: string[]) => {
        calls.push(`restore ${tree} ${paths.join(",")}`);
      }),
      commit: vi.fn(async (message: string) => {
        calls.push(`commit ${message}`);
        return { hash: "abc1234", branch: "main" };
      }),
    });

    const results = await commitPlan(
      git,
      [
        { files: [changedFile("src/a.ts", "", { staged: true })], text: "fix: a" },
        { files: [changedFile("docs/b.md", "", { staged: true })], text: "docs: b" },
      ],
      true
    );

    expect(results.map((r) => r.success)).toEqual([true, true]);
    expect(git.stageFiles).not.toHaveBeenCalled();
    expect(calls).toEqual([
      "reset",
      "restore tree-1 src/a.ts",
      "commit fix: a",
      "reset",
      "restore tree-1 docs/b.md",
      "commit docs: b",
    ]);
  });

  it("restores the staged content of groups that failed", async () => {
    const git = fakeGit({
      commit: vi
        .fn<GitInterface["commit"]>()
        .mockResolvedValueOnce({ hash: "abc1234", branch: "main" })
        .mockRejectedValueOnce(new Error("hook failed")),
    });

    const results = await commitPlan(
      git,
      [
        { files: [changedFile("src/a.ts", "", { staged: true })], text: "fix: a" },
        { files: [changedFile("docs/b.md", "", { staged: true })], text: "docs: b" },
      ],
      true
    );

    expect(results[1]).toEqual({ success: false, message: "docs: b", files: 1, error: "hook failed" });
    expect(git.restoreStaged).toHaveBeenLastCalledWith("tree-1", ["docs/b.md"]);
  });

  it("stages working tree groups by path", async () => {
    const git = fakeGit();

    await commitPlan(git, [{ files: [changedFile("src/a.ts")], text: "fix: a" }], true);

    expect(git.writeIndexTree).not.toHaveBeenCalled();
    expect(git.stageFiles).toHaveBeenCalledWith(["src/a.ts"]);
  });

  it("commits a staged single plan as it is", async () => {
    const git = fakeGit();

    await commitPlan(git, [{ files: [changedFile("src/a.ts", "", { staged: true })], text: "fix: a" }], false);

    expect(git.unstageAll).not.toHaveBeenCalled();
    expect(git.stageFiles).not.toHaveBeenCalled();
    expect(git.commit).toHaveBeenCalledWith("fix: a");
  });
});
