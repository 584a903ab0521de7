import {
  AggregateClassification,
  ChangedFile,
  PipelineConfig,
  Prompt,
  PromptTemplate,
} from "./types";

export type PromptSettings = Pick<
  PipelineConfig,
  "promptThreshold" | "diffMaxLines" | "maxPromptLength" | "maxSubjectLength" | "forceScope"
>;

/**
 * Get system prompt for commit message generation
 */
export function getCommitSystemPrompt(): string {
  return `You are a git commit expert. You read git diffs and write commit messages in the Conventional Commits format.

Conventional Commits format:
<type>(<scope>): <description>

<body>

<footer>

Types:
- feat: New feature
- fix: Bug fix
- refactor: Code refactoring
- perf: Performance improvement
- style: Formatting, styling changes
- docs: Documentation
- test: Tests
- build: Build system and dependencies
- ci: Continuous integration
- chore: Maintenance tasks

Rules:
- Use the imperative mood ("add", not "added")
- Do not end the subject with a period
- Reply with the commit message only: no code fences, no explanation`;
}

function describeRequirements(settings: PromptSettings, aggregate: AggregateClassification): string[] {
  const lines = [
    `- The changes were classified as "${aggregate.type}"; use that type unless the diff clearly says otherwise`,
    `- Keep the first line under ${settings.maxSubjectLength} characters`,
  ];
  if (settings.forceScope) {
    lines.push("- Always include a scope in parentheses after the type");
  }
  return lines;
}

/**
 * Get user prompt for a small change: one subject line
 */
export function getSimpleUserPrompt(
  settings: PromptSettings,
  aggregate: AggregateClassification,
  fileSummary: string
): string {
  return `Write a single-line commit message for the following changes.

Requirements:
${describeRequirements(settings, aggregate).join("\n")}
- Respond with the subject line only

Changed files:
${fileSummary}

Diff:
`;
}

/**
 * Get user prompt for a larger change: subject plus bulleted body
 */
export function getComprehensiveUserPrompt(
  settings: PromptSettings,
  aggregate: AggregateClassification,
  fileSummary: string
): string {
  const requirements = describeRequirements(settings, aggregate);
  requirements.push(
    "- After the subject, add an empty line and a bulleted body (\"- \") describing the main changes"
  );
  if (aggregate.breaking) {
    requirements.push(
      `- These changes break compatibility (${aggregate.reasons.join(", ")}): mark the type with "!" and end with a "BREAKING CHANGE: <what breaks>" footer`
    );
  }

  return `Write a detailed commit message for the following changes.

Requirements:
${requirements.join("\n")}

Changed files:
${fileSummary}

Diff:
`;
}

/**
 * Keep head and tail of a diff around a single truncation marker
 */
export function truncateDiff(diff: string, maxLines: number): string {
  const lines = diff.split("\n");
  if (lines.length <= maxLines) {
    return diff;
  }
  const head = Math.ceil(maxLines / 2);
  const tail = Math.floor(maxLines / 2);
  const dropped = lines.length - head - tail;
  return [
    ...lines.slice(0, head),
    `…truncated ${dropped} lines…`,
    ...lines.slice(lines.length - tail),
  ].join("\n");
}

/**
 * Trim text to maxChars, ending with a character-count marker
 */
export function capText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  let keep = maxChars;
  for (;;) {
    const marker = `\n…truncated ${text.length - keep} characters…`;
    if (keep + marker.length <= maxChars) {
      return text.slice(0, keep) + marker;
    }
    keep = maxChars - marker.length;
    if (keep <= 0) {
      return text.slice(0, maxChars);
    }
  }
}

function describeFile(file: ChangedFile, aggregate: AggregateClassification): string {
  const classification = aggregate.perFile.find((c) => c.files.includes(file));
  const details: string[] = [file.status];
  if (file.oldPath) details.push(`from ${file.oldPath}`);
  if (file.similarity) details.push(file.similarity);
  if (file.binary) details.push("binary");
  const type = classification ? ` [${classification.type}${classification.breaking ? ", breaking" : ""}]` : "";
  return `- ${file.path} (${details.join(", ")}) +${file.added} -${file.removed}${type}`;
}

function renderDiffs(files: readonly ChangedFile[], maxLinesPerFile: number): string {
  return files
    .map((file) => {
      const header = `### ${file.path}`;
      if (file.binary) {
        return `${header}\nBinary file changed`;
      }
      if (!file.diff) {
        return `${header}\n(no content changes)`;
      }
      return `${header}\n${truncateDiff(file.diff, maxLinesPerFile)}`;
    })
    .join("\n\n");
}

// First and last two lines of each file survive halving
const MIN_LINES_PER_FILE = 4;

/**
 * Renders the generation prompt for a changeset within a character budget
 */
export class PromptBuilder {
  constructor(private readonly settings: PromptSettings) {}

  selectTemplate(totalLines: number): PromptTemplate {
    return totalLines < this.settings.promptThreshold ? "simple" : "comprehensive";
  }

  build(files: readonly ChangedFile[], aggregate: AggregateClassification): Prompt {
    const totalLines = files.reduce((sum, f) => sum + f.added + f.removed, 0);
    const template = this.selectTemplate(totalLines);
    const fileSummary = files.map((file) => describeFile(file, aggregate)).join("\n");
    const intro =
      template === "simple"
        ? getSimpleUserPrompt(this.settings, aggregate, fileSummary)
        : getComprehensiveUserPrompt(this.settings, aggregate, fileSummary);

    const maxChars = this.settings.maxPromptLength;
    let maxLinesPerFile = this.settings.diffMaxLines;
    let text = intro + renderDiffs(files, maxLinesPerFile);

    // Halve the per-file budget until the prompt fits; capText handles the rest
    while (text.length > maxChars && maxLinesPerFile > MIN_LINES_PER_FILE) {
      maxLinesPerFile = Math.max(MIN_LINES_PER_FILE, Math.floor(maxLinesPerFile / 2));
      text = intro + renderDiffs(files, maxLinesPerFile);
    }

    return {
      template,
      system: getCommitSystemPrompt(),
      text: capText(text, maxChars),
      totalLines,
      budget: { maxChars, maxLinesPerFile },
    };
  }
}
