/**
 * Git diff parser
 * Splits `git diff` output into one section per file with line counts
 */

import type { FileStatus } from "../types";

export interface FileDiff {
  path: string;
  oldPath?: string;
  status: FileStatus;
  binary: boolean;
  similarity?: string;
  lines: string[]; // Hunk lines, including @@ headers
  added: number;
  removed: number;
}

const FILE_HEADER_PREFIX = "diff --git ";
const SIMILARITY_REGEX = /^similarity index (\d+)%$/;

const ESCAPES: Record<string, number> = {
  a: 7,
  b: 8,
  t: 9,
  n: 10,
  v: 11,
  f: 12,
  r: 13,
  '"': 34,
  "\\": 92,
};

/**
 * Decode a path git printed in C-quoted form ("caf\303\251.md").
 * Unquoted paths are returned as they are.
 */
export function unquotePath(value: string): string {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) return value;

  const bytes: number[] = [];
  const body = value.slice(1, -1);
  let i = 0;
  while (i < body.length) {
    const char = body[i];
    if (char !== "\\" || i + 1 >= body.length) {
      const end = (char.codePointAt(0) ?? 0) > 0xffff ? i + 2 : i + 1;
      bytes.push(...Buffer.from(body.slice(i, end), "utf8"));
      i = end;
      continue;
    }
    const octal = body.slice(i + 1, i + 4);
    if (/^[0-7]{3}$/.test(octal)) {
      bytes.push(parseInt(octal, 8));
      i += 4;
      continue;
    }
    const next = body[i + 1];
    bytes.push(ESCAPES[next] ?? next.charCodeAt(0));
    i += 2;
  }
  return Buffer.from(bytes).toString("utf8");
}

/**
 * Index just past the closing quote of a C-quoted string starting at `start`
 */
function quotedEnd(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === "\\") {
      i += 2;
    } else if (text[i] === '"') {
      return i + 1;
    } else {
      i++;
    }
  }
  return -1;
}

function stripPrefix(path: string, prefix: string): string | null {
  return path.startsWith(prefix) ? path.substring(prefix.length) : null;
}

/**
 * Split the `diff --git` paths into their a/ and b/ sides.
 * Unquoted paths may contain " b/"; equal sides are preferred, and the
 * --- / +++ and rename lines correct the result otherwise.
 */
export function parseHeaderPaths(rest: string): { oldPath: string; path: string } | null {
  if (rest.startsWith('"')) {
    const end = quotedEnd(rest, 0);
    if (end < 0 || rest[end] !== " ") return null;
    const oldPath = stripPrefix(unquotePath(rest.substring(0, end)), "a/");
    const path = stripPrefix(unquotePath(rest.substring(end + 1)), "b/");
    return oldPath !== null && path !== null ? { oldPath, path } : null;
  }

  if (rest.endsWith('"')) {
    const split = rest.lastIndexOf(' "b/');
    if (split < 0) return null;
    const oldPath = stripPrefix(rest.substring(0, split), "a/");
    const path = stripPrefix(unquotePath(rest.substring(split + 1)), "b/");
    return oldPath !== null && path !== null ? { oldPath, path } : null;
  }

  if (!rest.startsWith("a/")) return null;
  const half = (rest.length - 1) / 2;
  if (Number.isInteger(half) && rest.substring(half, half + 3) === " b/") {
    const oldPath = rest.substring(2, half);
    if (oldPath === rest.substring(half + 3)) return { oldPath, path: oldPath };
  }
  const split = rest.lastIndexOf(" b/");
  if (split < 2) return null;
  return { oldPath: rest.substring(2, split), path: rest.substring(split + 3) };
}

/**
 * Path from a `--- a/x` or `+++ b/x` line, null for /dev/null
 */
function markerPath(line: string, prefix: string): string | null {
  const value = line.substring(4);
  if (value === "/dev/null") return null;
  return stripPrefix(unquotePath(value), prefix);
}

/**
 * Parse git diff output into per-file sections
 */
export function parseDiff(diffOutput: string): FileDiff[] {
  const files: FileDiff[] = [];
  const lines = diffOutput.split("\n");

  let current: FileDiff | null = null;
  let inBody = false;

  for (const line of lines) {
    if (line.startsWith(FILE_HEADER_PREFIX)) {
      const paths = parseHeaderPaths(line.substring(FILE_HEADER_PREFIX.length));
      if (!paths) continue;
      if (current) files.push(current);
      current = {
        path: paths.path,
        oldPath: paths.oldPath !== paths.path ? paths.oldPath : undefined,
        status: "modified",
        binary: false,
        lines: [],
        added: 0,
        removed: 0,
      };
      inBody = false;
      continue;
    }

    if (!current) continue;

    if (!inBody) {
      parseHeaderLine(current, line);
      // Body starts after the +++ header or at the first hunk
      if (line.startsWith("+++ ")) {
        inBody = true;
        continue;
      }
      if (!line.startsWith("@@")) continue;
      inBody = true;
    }

    if (line.startsWith("@@")) {
      current.lines.push(line);
    } else if (line.startsWith("+")) {
      current.lines.push(line);
      current.added++;
    } else if (line.startsWith("-")) {
      current.lines.push(line);
      current.removed++;
    } else if (line.startsWith(" ") || line.startsWith("\\")) {
      current.lines.push(line);
    }
  }

  if (current) files.push(current);

  return files;
}

function parseHeaderLine(file: FileDiff, line: string): void {
  if (line.startsWith("new file mode")) {
    file.status = "added";
  } else if (line.startsWith("deleted file mode")) {
    file.status = "deleted";
  } else if (line.startsWith("rename from ")) {
    file.status = "renamed";
    file.oldPath = unquotePath(line.substring("rename from ".length));
  } else if (line.startsWith("rename to ")) {
    file.status = "renamed";
    file.path = unquotePath(line.substring("rename to ".length));
  } else if (line.startsWith("Binary files ")) {
    file.binary = true;
  } else if (line.startsWith("--- ")) {
    const oldPath = markerPath(line, "a/");
    if (oldPath !== null && file.status !== "renamed") {
      file.oldPath = oldPath !== file.path ? oldPath : undefined;
    }
  } else if (line.startsWith("+++ ")) {
    const path = markerPath(line, "b/");
    if (path !== null) {
      file.path = path;
      if (file.oldPath === path) file.oldPath = undefined;
    }
  } else {
    const similarity = line.match(SIMILARITY_REGEX);
    if (similarity) {
      file.similarity = `similarity ${similarity[1]}%`;
    }
  }
}

/**
 * Lines added by a section, without the leading "+"
 */
export function addedLines(diff: string): string[] {
  return diff
    .split("\n")
    .filter((line) => line.startsWith("+"))
    .map((line) => line.substring(1));
}

/**
 * Lines removed by a section, without the leading "-"
 */
export function removedLines(diff: string): string[] {
  return diff
    .split("\n")
    .filter((line) => line.startsWith("-"))
    .map((line) => line.substring(1));
}

/**
 * Get summary of parsed sections for display
 */
export function getDiffSummary(files: Array<{ added: number; removed: number }>): string {
  const added = files.reduce((sum, f) => sum + f.added, 0);
  const removed = files.reduce((sum, f) => sum + f.removed, 0);
  return `${files.length} file(s), +${added}/-${removed} lines`;
}
