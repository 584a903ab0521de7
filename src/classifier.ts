import defaultRulesJson from "./classification-rules.json";
import {
  AggregateClassification,
  CHANGE_TYPES,
  ChangedFile,
  ChangeType,
  Classification,
  ClassificationResult,
  ClassificationRules,
  PathRule,
} from "./types";
import { addedLines, removedLines } from "./utils/diff-parser";
import { ConfigError, getErrorMessage } from "./utils/errors";

/**
 * Tie-break order for the aggregate type, by conventional-commit weight
 */
export const TYPE_PRIORITY: readonly ChangeType[] = [
  "feat",
  "fix",
  "refactor",
  "build",
  "test",
  "style",
  "docs",
  "chore",
];

const COMMENT_LINE = /^\s*(\/\/|#|\/\*|\*|--|<!--)/;

export function isChangeType(value: unknown): value is ChangeType {
  return typeof value === "string" && (CHANGE_TYPES as readonly string[]).includes(value);
}

interface RawRules {
  pathRules: Array<{ type: string; pattern: string }>;
  symbolPatterns: string[];
  testSymbolPattern: string;
  breakingMarker: string;
  fixKeywords: string;
  smallDeltaMax: number;
}

function compile(pattern: string, flags = ""): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new ConfigError(`Invalid rule pattern "${pattern}": ${getErrorMessage(error)}`);
  }
}

/**
 * Validate a rule table; extra path rules take precedence over the table's own
 */
export function loadRules(raw: RawRules, extraPathRules: PathRule[] = []): ClassificationRules {
  const pathRules = [...extraPathRules, ...raw.pathRules].map((rule) => {
    if (!isChangeType(rule.type)) {
      throw new ConfigError(`Unknown change type "${rule.type}" in path rule ${rule.pattern}`);
    }
    compile(rule.pattern);
    return { type: rule.type, pattern: rule.pattern };
  });
  raw.symbolPatterns.forEach((pattern) => compile(pattern));
  compile(raw.testSymbolPattern);
  compile(raw.breakingMarker);
  compile(raw.fixKeywords);
  if (!Number.isInteger(raw.smallDeltaMax) || raw.smallDeltaMax < 0) {
    throw new ConfigError("smallDeltaMax must be a non-negative integer");
  }

  return {
    pathRules,
    symbolPatterns: [...raw.symbolPatterns],
    testSymbolPattern: raw.testSymbolPattern,
    breakingMarker: raw.breakingMarker,
    fixKeywords: raw.fixKeywords,
    smallDeltaMax: raw.smallDeltaMax,
  };
}

export const DEFAULT_RULES: ClassificationRules = loadRules(defaultRulesJson);

export interface SymbolDefinition {
  name: string;
  signature: string; // Definition line with whitespace collapsed
}

/**
 * Find public definitions in diff lines
 */
export function extractSymbols(lines: string[], patterns: RegExp[]): SymbolDefinition[] {
  const symbols: SymbolDefinition[] = [];
  for (const line of lines) {
    for (const pattern of patterns) {
      const match = line.match(pattern);
      if (match && match[1]) {
        symbols.push({
          name: match[1],
          signature: line.trim().replace(/\s+/g, " ").replace(/\s*[{:]\s*$/, ""),
        });
        break;
      }
    }
  }
  return symbols;
}

function isWhitespaceOnly(added: string[], removed: string[]): boolean {
  const normalize = (lines: string[]) =>
    lines
      .map((line) => line.replace(/\s+/g, ""))
      .filter((line) => line.length > 0)
      .sort();
  const a = normalize(added);
  const r = normalize(removed);
  return a.length === r.length && a.every((line, i) => line === r[i]);
}

/**
 * Assigns conventional-commit types to changed files.
 * Path rules take precedence over content signals.
 */
export class ChangeClassifier {
  private readonly pathRules: Array<{ type: ChangeType; pattern: string; regex: RegExp }>;
  private readonly symbolPatterns: RegExp[];
  private readonly testSymbol: RegExp;
  private readonly breakingMarker: RegExp;
  private readonly fixKeywords: RegExp;
  private readonly smallDeltaMax: number;

  constructor(rules: ClassificationRules = DEFAULT_RULES) {
    this.pathRules = rules.pathRules.map((rule) => ({ ...rule, regex: compile(rule.pattern) }));
    this.symbolPatterns = rules.symbolPatterns.map((pattern) => compile(pattern));
    this.testSymbol = compile(rules.testSymbolPattern);
    this.breakingMarker = compile(rules.breakingMarker);
    this.fixKeywords = compile(rules.fixKeywords, "i");
    this.smallDeltaMax = rules.smallDeltaMax;
  }

  classify(files: readonly ChangedFile[]): ClassificationResult {
    const perFile = files.map((file) => this.classifyFile(file));
    return { perFile, aggregate: this.aggregate(perFile) };
  }

  classifyFile(file: ChangedFile): Classification {
    const reasons: string[] = [];
    const added = addedLines(file.diff);
    const removed = removedLines(file.diff);
    const pathRule = this.pathRules.find((rule) => rule.regex.test(file.path));

    let breaking = false;
    if (added.some((line) => this.breakingMarker.test(line))) {
      breaking = true;
      reasons.push("explicit breaking-change marker");
    }

    const addedSymbols = extractSymbols(added, this.symbolPatterns);
    const removedSymbols = extractSymbols(removed, this.symbolPatterns);

    // Only source files expose a public API
    if (!pathRule) {
      for (const symbol of removedSymbols) {
        const redefined = addedSymbols.filter((a) => a.name === symbol.name);
        if (redefined.length === 0) {
          breaking = true;
          reasons.push(`removes public symbol ${symbol.name}`);
        } else if (!redefined.some((a) => a.signature === symbol.signature)) {
          breaking = true;
          reasons.push(`changes signature of ${symbol.name}`);
        }
      }
    }

    if (pathRule) {
      reasons.unshift(`path matches ${pathRule.pattern}`);
      return { type: pathRule.type, breaking, files: [file], reasons };
    }

    const removedNames = new Set(removedSymbols.map((s) => s.name));
    const newSymbols = addedSymbols.filter(
      (s) => !removedNames.has(s.name) && !this.testSymbol.test(s.name)
    );
    const type = this.classifyContent(file, added, removed, newSymbols, reasons);
    return { type, breaking, files: [file], reasons };
  }

  private classifyContent(
    file: ChangedFile,
    added: string[],
    removed: string[],
    newSymbols: SymbolDefinition[],
    reasons: string[]
  ): ChangeType {
    const delta = added.length + removed.length;

    if (delta > 0 && isWhitespaceOnly(added, removed)) {
      reasons.push("whitespace-only change");
      return "style";
    }
    if (newSymbols.length > 0) {
      reasons.push(`adds ${newSymbols.map((s) => s.name).join(", ")}`);
      return "feat";
    }
    if (file.status === "added" && added.length > 0) {
      reasons.push("adds new source file");
      return "feat";
    }
    const comments = added.filter((line) => COMMENT_LINE.test(line));
    if (comments.some((line) => this.fixKeywords.test(line))) {
      reasons.push("fix keyword in added comment");
      return "fix";
    }
    if (delta > 0 && delta <= this.smallDeltaMax && file.status !== "deleted") {
      reasons.push(`small change (${delta} lines) to existing code`);
      return "fix";
    }
    if (removed.length > 0) {
      reasons.push(added.length > 0 ? "reworks existing code" : "removes code");
      return "refactor";
    }
    if (added.length > 0) {
      reasons.push("extends existing code");
      return "feat";
    }
    if (file.status === "renamed") {
      reasons.push("moves file");
      return "refactor";
    }
    reasons.push("no content signal");
    return "chore";
  }

  /**
   * Plurality type across files, ties broken by TYPE_PRIORITY.
   * Any breaking file marks the aggregate breaking without changing its type.
   */
  aggregate(perFile: readonly Classification[]): AggregateClassification {
    const counts: Partial<Record<ChangeType, number>> = {};
    for (const classification of perFile) {
      counts[classification.type] = (counts[classification.type] || 0) + 1;
    }

    let type: ChangeType = "chore";
    let best = 0;
    for (const candidate of TYPE_PRIORITY) {
      const count = counts[candidate] || 0;
      if (count > best) {
        type = candidate;
        best = count;
      }
    }

    const breaking = perFile.some((c) => c.breaking);
    const reasons = TYPE_PRIORITY.filter((t) => counts[t]).map((t) => `${t}: ${counts[t]}`);
    if (breaking) {
      reasons.push("breaking");
    }

    return {
      type,
      breaking,
      files: perFile.flatMap((c) => c.files),
      reasons,
      perFile: [...perFile],
      counts,
    };
  }
}
