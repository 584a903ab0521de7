import { GitInterface } from "./git";
import { ChangedFile, StatusEntry } from "./types";
import { addedLines, FileDiff, parseDiff, removedLines } from "./utils/diff-parser";
import { NoChangesError } from "./utils/errors";

/**
 * Minimum share of common lines for a delete + add pair to count as a rename
 */
export const RENAME_SIMILARITY = 0.5;

const CLEAN = new Set([" ", "?", "!", ""]);

export function isStagedEntry(entry: StatusEntry): boolean {
  return !CLEAN.has(entry.index);
}

function toChangedFile(file: FileDiff, staged: boolean): ChangedFile {
  return {
    path: file.path,
    oldPath: file.oldPath,
    status: file.status,
    diff: file.binary ? "" : file.lines.join("\n"),
    added: file.binary ? 0 : file.added,
    removed: file.binary ? 0 : file.removed,
    binary: file.binary,
    staged,
    similarity: file.similarity,
  };
}

function countLines(lines: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const line of lines) {
    counts.set(line, (counts.get(line) || 0) + 1);
  }
  return counts;
}

/**
 * Share of lines two contents have in common, by the larger side
 */
export function lineSimilarity(before: string[], after: string[]): number {
  const size = Math.max(before.length, after.length);
  if (size === 0) return 0;
  const remaining = countLines(before);
  let common = 0;
  for (const line of after) {
    const left = remaining.get(line) || 0;
    if (left > 0) {
      common++;
      remaining.set(line, left - 1);
    }
  }
  return common / size;
}

/**
 * Lines of `lines` not matched by `other`, order kept
 */
function subtractLines(lines: string[], other: string[]): string[] {
  const remaining = countLines(other);
  return lines.filter((line) => {
    const left = remaining.get(line) || 0;
    if (left > 0) {
      remaining.set(line, left - 1);
      return false;
    }
    return true;
  });
}

function mergeRename(deleted: ChangedFile, added: ChangedFile, similarity: number): ChangedFile {
  const before = removedLines(deleted.diff);
  const after = addedLines(added.diff);
  const minus = subtractLines(before, after).map((line) => `-${line}`);
  const plus = subtractLines(after, before).map((line) => `+${line}`);
  return {
    path: added.path,
    oldPath: deleted.path,
    status: "renamed",
    diff: [...minus, ...plus].join("\n"),
    added: plus.length,
    removed: minus.length,
    binary: false,
    staged: added.staged,
    similarity: `similarity ${Math.round(similarity * 100)}%`,
  };
}

/**
 * Pair working-tree deletions with untracked additions of similar content.
 * Each deletion takes its most similar addition; ties go to the first path.
 */
export function pairRenames(files: ChangedFile[]): ChangedFile[] {
  const deleted = files.filter((f) => f.status === "deleted" && !f.binary);
  const added = files.filter((f) => f.status === "added" && !f.binary);
  const merged = new Map<ChangedFile, ChangedFile>();
  const consumed = new Set<ChangedFile>();

  for (const del of deleted) {
    const before = removedLines(del.diff);
    let best: ChangedFile | null = null;
    let bestScore = 0;
    for (const add of added) {
      if (consumed.has(add)) continue;
      const score = lineSimilarity(before, addedLines(add.diff));
      if (score >= RENAME_SIMILARITY && score > bestScore) {
        best = add;
        bestScore = score;
      }
    }
    if (best) {
      consumed.add(best);
      merged.set(del, mergeRename(del, best, bestScore));
    }
  }

  const result: ChangedFile[] = [];
  for (const file of files) {
    if (consumed.has(file)) continue;
    result.push(merged.get(file) || file);
  }
  return result;
}

function byPath(a: ChangedFile, b: ChangedFile): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

/**
 * Turns the repository's pending changes into ChangedFile values.
 * When anything is staged only the index is summarized, as `git commit` would.
 */
export class DiffCollector {
  constructor(private readonly git: GitInterface) {}

  async collect(): Promise<ChangedFile[]> {
    const entries = await this.git.listChangedFiles();
    if (entries.length === 0) {
      throw new NoChangesError();
    }

    const stagedMode = entries.some(isStagedEntry);
    let files: ChangedFile[];
    if (stagedMode) {
      const staged = parseDiff(await this.git.getStagedDiff());
      files = staged.map((file) => toChangedFile(file, true));
    } else {
      const unstaged = parseDiff(await this.git.getUnstagedDiff());
      files = pairRenames(unstaged.map((file) => toChangedFile(file, false)));
    }

    // Later sections for the same path replace earlier ones
    const byFile = new Map<string, ChangedFile>();
    for (const file of files) {
      byFile.set(file.path, file);
    }
    const result = Array.from(byFile.values()).sort(byPath);

    if (result.length === 0) {
      throw new NoChangesError();
    }
    return result;
  }
}
