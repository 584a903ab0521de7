export const CHANGE_TYPES = [
  "feat",
  "fix",
  "docs",
  "style",
  "refactor",
  "test",
  "chore",
  "build",
] as const;

export type ChangeType = (typeof CHANGE_TYPES)[number];

/**
 * Types a generated message may carry on top of the classifier's vocabulary
 */
export const COMMIT_TYPES = [...CHANGE_TYPES, "perf", "ci", "revert"] as const;

export type CommitType = (typeof COMMIT_TYPES)[number];

export type FileStatus = "added" | "modified" | "deleted" | "renamed";

/**
 * Raw status line from the git collaborator
 */
export interface StatusEntry {
  path: string;
  from?: string; // Source path of a staged rename
  index: string; // Index (staged) status letter, " " when clean
  workingDir: string; // Working tree status letter, " " when clean
}

export interface ChangedFile {
  readonly path: string;
  readonly oldPath?: string;
  readonly status: FileStatus;
  readonly diff: string; // Hunk text, empty for binary files
  readonly added: number;
  readonly removed: number;
  readonly binary: boolean;
  readonly staged: boolean;
  readonly similarity?: string; // e.g. "similarity 92%"
}

export interface Classification {
  readonly type: ChangeType;
  readonly breaking: boolean;
  readonly files: readonly ChangedFile[];
  readonly reasons: readonly string[];
}

export interface AggregateClassification extends Classification {
  readonly perFile: readonly Classification[];
  readonly counts: Readonly<Partial<Record<ChangeType, number>>>;
}

export interface ClassificationResult {
  perFile: Classification[];
  aggregate: AggregateClassification;
}

export type PromptTemplate = "simple" | "comprehensive";

export interface PromptBudget {
  maxChars: number;
  maxLinesPerFile: number;
}

export interface Prompt {
  readonly template: PromptTemplate;
  readonly system: string;
  readonly text: string;
  readonly totalLines: number;
  readonly budget: PromptBudget;
}

export type AttemptOutcome =
  | "success"
  | "timeout"
  | "backend-error"
  | "validation-failure";

export interface GenerationAttempt {
  index: number;
  elapsedMs: number;
  outcome: AttemptOutcome;
  raw?: string;
  error?: string;
}

export interface CommitMessage {
  readonly type: CommitType;
  readonly scope?: string;
  readonly bang: boolean;
  readonly description: string;
  readonly body: readonly string[];
  readonly footer?: string; // Text after "BREAKING CHANGE: "
}

export type MessageSource = "generated" | "fallback";

export interface PipelineResult {
  message: CommitMessage;
  text: string;
  source: MessageSource;
  files: readonly ChangedFile[];
  classification: AggregateClassification;
  prompt: Prompt;
  attempts: GenerationAttempt[];
}

export interface PipelineConfig {
  promptThreshold: number;
  fallbackTimeout: number; // Seconds
  minComprehensiveLength: number;
  attempts: number;
  model: string;
  maxSubjectLength: number;
  diffMaxLines: number;
  maxPromptLength: number;
  backoffMs: number;
  forceScope: boolean;
  icons: boolean;
}

export interface PathRule {
  type: ChangeType;
  pattern: string;
}

export interface ClassificationRules {
  pathRules: PathRule[];
  symbolPatterns: string[];
  testSymbolPattern: string;
  breakingMarker: string;
  fixKeywords: string;
  smallDeltaMax: number;
}

/**
 * Settings stored in the user's config file
 */
export interface Config {
  openaiKey?: string;
  baseUrl?: string;
  editor?: string | null;
  settings?: Partial<PipelineConfig>;
  rules?: {
    pathRules?: PathRule[];
  };
}
