import simpleGit, { SimpleGit } from "simple-git";
import * as fs from "fs";
import * as path from "path";
import { StatusEntry } from "./types";
import { getErrorMessage } from "./utils/errors";

export interface CommitOutcome {
  hash: string;
  branch: string;
}

/**
 * Version-control collaborator used by the pipeline and the CLI
 */
export interface GitInterface {
  isRepository(): Promise<boolean>;
  getStagedDiff(): Promise<string>;
  getUnstagedDiff(): Promise<string>;
  listChangedFiles(): Promise<StatusEntry[]>;
  stageFiles(paths: string[]): Promise<void>;
  unstageAll(): Promise<void>;
  /** Record the current index as a tree object and return its id */
  writeIndexTree(): Promise<string>;
  /** Set the index entries of `paths` to their content in `tree`, leaving the working tree alone */
  restoreStaged(tree: string, paths: string[]): Promise<void>;
  commit(message: string): Promise<CommitOutcome>;
}

// Non-ASCII paths are printed as they are; tabs, quotes and backslashes stay C-quoted
const DIFF_COMMAND = ["-c", "core.quotePath=false", "diff"];

/**
 * Create git repository instance
 */
function getGitInstance(repoPath: string): SimpleGit {
  return simpleGit(repoPath);
}

/**
 * Build a diff for a new (untracked) file, which `git diff` does not show
 */
export function getNewFileDiff(repoPath: string, filePath: string): string {
  const fullPath = path.resolve(repoPath, filePath);
  if (!fs.existsSync(fullPath) || !fs.statSync(fullPath).isFile()) {
    return "";
  }
  const content = fs.readFileSync(fullPath);
  const header = `diff --git a/${filePath} b/${filePath}\nnew file mode 100644\n`;
  if (content.includes(0)) {
    return `${header}Binary files /dev/null and b/${filePath} differ`;
  }
  const lines = content.toString("utf8").split("\n");
  // Remove trailing empty line if exists
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  const diffLines = lines.map((line) => `+${line}`);
  return `${header}--- /dev/null\n+++ b/${filePath}\n@@ -0,0 +1,${lines.length} @@\n${diffLines.join("\n")}`;
}

/**
 * Create the simple-git backed collaborator for a repository
 */
export function createGitClient(repoPath: string = process.cwd()): GitInterface {
  const git = getGitInstance(repoPath);

  return {
    async isRepository(): Promise<boolean> {
      try {
        return await git.checkIsRepo();
      } catch (error) {
        return false;
      }
    },

    async getStagedDiff(): Promise<string> {
      try {
        return await git.raw([...DIFF_COMMAND, "--cached", "--find-renames"]);
      } catch (error) {
        throw new Error(`Error getting staged diff: ${getErrorMessage(error)}`);
      }
    },

    async getUnstagedDiff(): Promise<string> {
      try {
        const status = await git.status(["--untracked-files=all"]);
        const trackedDiff = await git.raw([...DIFF_COMMAND, "--find-renames"]);

        const newFilesDiff = status.not_added
          .filter((file) => !file.endsWith("/"))
          .map((file) => getNewFileDiff(repoPath, file))
          .filter((diff) => diff.length > 0)
          .join("\n");

        return [trackedDiff, newFilesDiff]
          .filter((part) => part.length > 0)
          .join("\n");
      } catch (error) {
        throw new Error(`Error getting unstaged diff: ${getErrorMessage(error)}`);
      }
    },

    async listChangedFiles(): Promise<StatusEntry[]> {
      try {
        const status = await git.status(["--untracked-files=all"]);
        return status.files.map((file) => ({
          path: file.path,
          from: file.from && file.from !== file.path ? file.from : undefined,
          index: file.index,
          workingDir: file.working_dir,
        }));
      } catch (error) {
        throw new Error(`Error getting changed files: ${getErrorMessage(error)}`);
      }
    },

    async stageFiles(paths: string[]): Promise<void> {
      if (paths.length === 0) return;
      try {
        // -A stages deletions of paths that no longer exist
        await git.raw(["add", "-A", "--", ...paths]);
      } catch (error) {
        throw new Error(`Error staging files: ${getErrorMessage(error)}`);
      }
    },

    async unstageAll(): Promise<void> {
      try {
        await git.reset(["--quiet"]);
      } catch (error) {
        throw new Error(`Error unstaging: ${getErrorMessage(error)}`);
      }
    },

    async writeIndexTree(): Promise<string> {
      try {
        return (await git.raw(["write-tree"])).trim();
      } catch (error) {
        throw new Error(`Error reading the index: ${getErrorMessage(error)}`);
      }
    },

    async restoreStaged(tree: string, paths: string[]): Promise<void> {
      if (paths.length === 0) return;
      try {
        await git.raw(["restore", "--staged", `--source=${tree}`, "--", ...paths]);
      } catch (error) {
        throw new Error(`Error restoring staged files: ${getErrorMessage(error)}`);
      }
    },

    async commit(message: string): Promise<CommitOutcome> {
      try {
        const result = await git.commit(message);
        return { hash: result.commit, branch: result.branch };
      } catch (error) {
        throw new Error(`Error creating commit: ${getErrorMessage(error)}`);
      }
    },
  };
}
