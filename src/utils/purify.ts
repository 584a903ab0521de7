/**
 * Clean-up of raw model output before it is parsed as a commit message.
 * Each step is exported so it can be tested on its own.
 */

const LANGUAGE_TAG = /^[\w+-]*$/;

/**
 * Keep only the content of the first fenced block, dropping a language tag
 */
export function stripCodeFences(text: string): string {
  const match = text.match(/```([\s\S]*?)```/);
  if (!match) {
    return text.replace(/```/g, "");
  }
  let inner = match[1];
  const newline = inner.indexOf("\n");
  if (newline >= 0 && LANGUAGE_TAG.test(inner.slice(0, newline).trim())) {
    inner = inner.slice(newline + 1);
  }
  return inner.trim();
}

export function stripHtmlTags(text: string): string {
  return text.replace(/<\/?[A-Za-z][\w-]*(?:\s[^<>]*)?\/?>/g, "");
}

const LEAD_IN =
  /^\s*(?:(?:sure[,!.]?\s*)?here(?:'s| is) (?:the |a |your )?(?:suggested |proposed )?commit message[^:\n]*:|(?:suggested |proposed )?commit(?: message)?:)[ \t]*/i;

/**
 * Remove "Here is the commit message:" style introductions
 */
export function stripLeadIn(text: string): string {
  return text.replace(LEAD_IN, "").replace(/^\s*\n/, "");
}

export function stripQuotes(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(/^(["'`])([\s\S]*)\1$/);
  return match ? match[2].trim() : trimmed;
}

const EXPLANATION = /^\s*(?:explanation|note|notes|reasoning|rationale)\b[^:\n]*:/im;

/**
 * Cut everything from an "Explanation:" or "Note:" line onward
 */
export function stripExplanation(text: string): string {
  const match = EXPLANATION.exec(text);
  if (!match) return text;
  return text.slice(0, match.index).trimEnd();
}

const DISCLAIMER = /\b(let me know|please review|i hope|hope this helps|feel free)\b/i;

export function stripDisclaimers(text: string): string {
  return text
    .split("\n")
    .filter((line) => !DISCLAIMER.test(line))
    .join("\n")
    .trimEnd();
}

const ICON_RUN = /(?:\p{Extended_Pictographic}\uFE0F?\s*)+/u;
const LEADING_ICONS = new RegExp(`^\\s*${ICON_RUN.source}`, "u");
const ICON_AFTER_TYPE = new RegExp(`^(\\w+(?:\\([^)]*\\))?!?:\\s*)${ICON_RUN.source}`, "u");

/**
 * Drop type icons from the subject, before the type or after the colon
 */
export function stripIcons(text: string): string {
  return text.replace(LEADING_ICONS, "").replace(ICON_AFTER_TYPE, "$1");
}

/**
 * Run every clean-up step in order
 */
export function purify(raw: string): string {
  let text = raw.replace(/\r\n/g, "\n");
  text = stripCodeFences(text);
  text = stripHtmlTags(text);
  text = stripLeadIn(text.trim());
  text = stripQuotes(text);
  text = stripExplanation(text);
  text = stripDisclaimers(text);
  text = stripIcons(text);
  return text
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
