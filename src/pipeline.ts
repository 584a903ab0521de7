import { ChangeClassifier, DEFAULT_RULES } from "./classifier";
import { DiffCollector } from "./collector";
import { FallbackComposer } from "./fallback";
import { GenerationEngine, Sleep } from "./generator";
import { GitInterface } from "./git";
import { formatMessage } from "./message";
import { TextBackend } from "./openai";
import { PromptBuilder } from "./prompts";
import { Reporter, silentReporter } from "./reporter";
import {
  ChangedFile,
  Classification,
  ClassificationRules,
  GenerationAttempt,
  PipelineConfig,
  PipelineResult,
} from "./types";
import { getDiffSummary } from "./utils/diff-parser";
import { GenerationExhaustedError, getErrorMessage, NoChangesError } from "./utils/errors";

export interface PipelineDependencies {
  git: GitInterface;
  backend: TextBackend | null; // null: no API key, always fall back
  config: PipelineConfig;
  reporter?: Reporter;
  rules?: ClassificationRules;
  sleep?: Sleep;
}

/**
 * Collect → classify → prompt → generate, falling back to a deterministic
 * message whenever generation is unavailable or fails
 */
export class MessagePipeline {
  readonly classifier: ChangeClassifier;
  private readonly collector: DiffCollector;
  private readonly builder: PromptBuilder;
  private readonly engine: GenerationEngine | null;
  private readonly composer: FallbackComposer;
  private readonly reporter: Reporter;
  private readonly config: PipelineConfig;

  constructor(deps: PipelineDependencies) {
    this.config = deps.config;
    this.reporter = deps.reporter || silentReporter;
    this.collector = new DiffCollector(deps.git);
    this.classifier = new ChangeClassifier(deps.rules || DEFAULT_RULES);
    this.builder = new PromptBuilder(deps.config);
    this.composer = new FallbackComposer(deps.config);
    this.engine = deps.backend
      ? new GenerationEngine(deps.backend, deps.config, {
          sleep: deps.sleep,
          onAttempt: (attempt) => this.reportAttempt(attempt),
        })
      : null;
  }

  /**
   * Only NoChangesError escapes; generation problems end in a fallback message
   */
  async run(): Promise<PipelineResult> {
    const files = await this.collect();
    return this.generateFor(files);
  }

  async collect(): Promise<ChangedFile[]> {
    const files = await this.collector.collect();
    const mode = files[0].staged ? "staged" : "working tree";
    this.reporter.report("info", `Collected ${getDiffSummary(files)} (${mode})`);
    return files;
  }

  async generateFor(files: readonly ChangedFile[]): Promise<PipelineResult> {
    if (files.length === 0) {
      throw new NoChangesError();
    }

    const perFile: Classification[] = [];
    for (const file of this.reporter.track(files, "Classifying changes")) {
      perFile.push(this.classifier.classifyFile(file));
    }
    const classification = this.classifier.aggregate(perFile);
    this.reporter.report(
      "debug",
      `Classified as ${classification.type}${classification.breaking ? " (breaking)" : ""}: ${classification.reasons.join(", ")}`
    );

    const prompt = this.builder.build(files, classification);
    this.reporter.report(
      "debug",
      `Using ${prompt.template} prompt for ${prompt.totalLines} changed line(s)`
    );

    if (this.engine) {
      try {
        const generated = await this.engine.generate(prompt, classification);
        return {
          message: generated.message,
          text: generated.text,
          source: "generated",
          files,
          classification,
          prompt,
          attempts: generated.attempts,
        };
      } catch (error) {
        const attempts = error instanceof GenerationExhaustedError ? error.attempts : [];
        this.reporter.report("warning", `${getErrorMessage(error)}; using fallback message`);
        return this.fallback(files, classification, prompt, attempts);
      }
    }

    this.reporter.report("warning", "No generation backend configured; using fallback message");
    return this.fallback(files, classification, prompt, []);
  }

  private fallback(
    files: readonly ChangedFile[],
    classification: PipelineResult["classification"],
    prompt: PipelineResult["prompt"],
    attempts: GenerationAttempt[]
  ): PipelineResult {
    const message = this.composer.compose(classification, prompt.template);
    return {
      message,
      text: formatMessage(message, { icons: this.config.icons }),
      source: "fallback",
      files,
      classification,
      prompt,
      attempts,
    };
  }

  private reportAttempt(attempt: GenerationAttempt): void {
    const label = `Attempt ${attempt.index}/${this.config.attempts}`;
    if (attempt.outcome === "success") {
      this.reporter.report("debug", `${label} succeeded in ${attempt.elapsedMs}ms`);
    } else {
      this.reporter.report("debug", `${label} failed (${attempt.outcome}): ${attempt.error}`);
    }
  }
}
