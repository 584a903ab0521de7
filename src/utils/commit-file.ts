import * as fs from "fs";

const SEPARATOR = "# ========";
const COMMENT_PREFIX = "#";

export interface EditableMessage {
  number: number;
  description: string;
  files: string[];
  text: string;
}

/**
 * Write commit messages to a file for editing
 */
export function writeCommitFile(filePath: string, messages: EditableMessage[]): void {
  const lines: string[] = [];

  lines.push("# git-scribe commit messages");
  lines.push("# Edit the messages below. Lines starting with # are ignored.");
  if (messages.length > 1) {
    lines.push(`# Each commit is separated by: ${SEPARATOR}`);
    lines.push("# Delete a commit section entirely (keep its separator) to skip that commit.");
  } else {
    lines.push("# Leave the message empty to skip the commit.");
  }
  lines.push("");

  messages.forEach((entry, index) => {
    if (index > 0) {
      lines.push("");
      lines.push(SEPARATOR);
      lines.push("");
    }
    lines.push(`# Commit ${entry.number}: ${entry.description}`);
    lines.push(`# Files: ${entry.files.join(", ")}`);
    lines.push(entry.text);
  });

  fs.writeFileSync(filePath, lines.join("\n") + "\n", "utf8");
}

/**
 * Split edited content into one message per section; a removed section yields ""
 */
export function parseCommitContent(content: string): string[] {
  const sections: string[][] = [[]];

  for (const line of content.replace(/\r\n/g, "\n").split("\n")) {
    if (line.trim() === SEPARATOR) {
      sections.push([]);
      continue;
    }
    if (line.trim().startsWith(COMMENT_PREFIX)) {
      continue;
    }
    sections[sections.length - 1].push(line.trimEnd());
  }

  return sections.map((section) => section.join("\n").replace(/\n{3,}/g, "\n\n").trim());
}

/**
 * Parse edited commit file
 */
export function parseCommitFile(filePath: string): string[] {
  return parseCommitContent(fs.readFileSync(filePath, "utf8"));
}

/**
 * Validate edited messages; warnings only, empty ones are skipped commits
 */
export function validateCommits(
  texts: string[],
  maxSubjectLength: number
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  texts.forEach((text, index) => {
    if (!text) return;
    const subject = text.split("\n")[0];
    if (subject.length > maxSubjectLength) {
      errors.push(
        `Commit ${index + 1}: Subject too long (${subject.length} chars, max ${maxSubjectLength} recommended)`
      );
    }
  });

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Apply edited texts by position; null marks a commit the user removed
 */
export function mergeEditedCommits<T extends { text: string }>(
  originals: T[],
  edited: string[]
): Array<T | null> {
  return originals.map((original, index) => {
    const text = index < edited.length ? edited[index] : "";
    return text ? { ...original, text } : null;
  });
}
