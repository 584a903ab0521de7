import { COMMIT_TYPES, CommitMessage, CommitType, PromptTemplate } from "./types";

export const SUBJECT_REGEX = /^(\w+)(?:\(([^()\s]+)\))?(!)?: (\S.*)$/;
const FOOTER_REGEX = /^BREAKING[ -]CHANGE:\s*(.*)$/;
const BULLET_REGEX = /^\s*[-*•]\s+/;

export const TYPE_ICONS: Readonly<Record<CommitType, string>> = {
  feat: "✨",
  fix: "🐛",
  docs: "📝",
  style: "💄",
  refactor: "♻️",
  perf: "⚡",
  test: "✅",
  build: "👷",
  ci: "🔧",
  chore: "🔨",
  revert: "⏪",
};

export function isCommitType(value: string): value is CommitType {
  return (COMMIT_TYPES as readonly string[]).includes(value);
}

/**
 * Parse conventional-commit text; null when the subject is not conventional
 */
export function parseMessage(text: string): CommitMessage | null {
  const lines = text.replace(/\r\n/g, "\n").split("\n");
  const match = lines[0].trim().match(SUBJECT_REGEX);
  if (!match) return null;

  const type = match[1].toLowerCase();
  if (!isCommitType(type)) return null;

  const body: string[] = [];
  const footer: string[] = [];
  let inFooter = false;
  let continues = false;

  for (const line of lines.slice(1)) {
    const footerMatch = line.trim().match(FOOTER_REGEX);
    if (footerMatch) {
      inFooter = true;
      footer.push(footerMatch[1].trim());
      continue;
    }
    if (inFooter) {
      if (line.trim()) footer.push(line.trim());
      continue;
    }
    if (!line.trim()) {
      continues = false;
      continue;
    }
    if (BULLET_REGEX.test(line) || !continues || body.length === 0) {
      body.push(line.replace(BULLET_REGEX, "").trim());
    } else {
      // Wrapped line of the previous bullet or paragraph
      body[body.length - 1] = `${body[body.length - 1]} ${line.trim()}`;
    }
    continues = true;
  }

  const footerText = footer.join(" ").trim();
  return {
    type,
    scope: match[2],
    bang: match[3] === "!",
    description: match[4].trim(),
    body,
    footer: inFooter ? footerText || "breaking change" : undefined,
  };
}

export interface FormatOptions {
  icons?: boolean;
}

export function formatSubject(message: CommitMessage, options: FormatOptions = {}): string {
  const scope = message.scope ? `(${message.scope})` : "";
  const bang = message.bang ? "!" : "";
  const icon = options.icons ? `${TYPE_ICONS[message.type]} ` : "";
  return `${message.type}${scope}${bang}: ${icon}${message.description}`;
}

/**
 * Render the full message: subject, bulleted body, breaking-change footer
 */
export function formatMessage(message: CommitMessage, options: FormatOptions = {}): string {
  const sections = [formatSubject(message, options)];
  if (message.body.length > 0) {
    sections.push(message.body.map((item) => `- ${item}`).join("\n"));
  }
  if (message.footer) {
    sections.push(`BREAKING CHANGE: ${message.footer}`);
  }
  return sections.join("\n\n");
}

export function hasBreakingMarker(message: CommitMessage): boolean {
  return message.bang || message.footer !== undefined;
}

/**
 * Add `!` to a breaking message that carries no marker yet
 */
export function ensureBreakingMarker(message: CommitMessage): CommitMessage {
  return hasBreakingMarker(message) ? message : { ...message, bang: true };
}

export interface MessageRules {
  maxSubjectLength: number;
  minComprehensiveLength: number;
  forceScope: boolean;
  template: PromptTemplate;
}

/**
 * Check a parsed message against subject and length rules
 */
export function validateMessage(
  message: CommitMessage,
  rules: MessageRules
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const subject = formatSubject(message);

  if (!message.description) {
    errors.push("Empty description");
  }
  if (subject.length > rules.maxSubjectLength) {
    errors.push(
      `Subject too long (${subject.length} chars, max ${rules.maxSubjectLength})`
    );
  }
  if (rules.forceScope && !message.scope) {
    errors.push("Missing scope");
  }
  if (rules.template === "comprehensive") {
    const length = formatMessage(message).length;
    if (length < rules.minComprehensiveLength) {
      errors.push(
        `Message too short for the change size (${length} chars, min ${rules.minComprehensiveLength})`
      );
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
