import {
  ensureBreakingMarker,
  formatMessage,
  parseMessage,
  validateMessage,
} from "./message";
import { TextBackend } from "./openai";
import {
  AttemptOutcome,
  Classification,
  CommitMessage,
  GenerationAttempt,
  PipelineConfig,
  Prompt,
} from "./types";
import {
  AttemptTimeoutError,
  GenerationExhaustedError,
  getErrorMessage,
  ValidationFailure,
} from "./utils/errors";
import { purify } from "./utils/purify";

export interface GenerationSuccess {
  message: CommitMessage;
  text: string;
  attempts: GenerationAttempt[];
}

export type Sleep = (ms: number) => Promise<void>;

export interface GenerationEngineOptions {
  onAttempt?: (attempt: GenerationAttempt) => void;
  sleep?: Sleep;
}

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

function outcomeOf(error: unknown): AttemptOutcome {
  if (error instanceof AttemptTimeoutError) return "timeout";
  if (error instanceof ValidationFailure) return "validation-failure";
  return "backend-error";
}

/**
 * Asks the backend for a message under an attempt, timeout and backoff policy.
 * Wall-clock is bounded by attempts × timeout + backoffMs × attempts(attempts − 1) / 2.
 */
export class GenerationEngine {
  private readonly onAttempt: (attempt: GenerationAttempt) => void;
  private readonly sleep: Sleep;

  constructor(
    private readonly backend: TextBackend,
    private readonly config: PipelineConfig,
    options: GenerationEngineOptions = {}
  ) {
    this.onAttempt = options.onAttempt || (() => undefined);
    this.sleep = options.sleep || defaultSleep;
  }

  async generate(prompt: Prompt, aggregate: Classification): Promise<GenerationSuccess> {
    const attempts: GenerationAttempt[] = [];

    for (let index = 1; index <= this.config.attempts; index++) {
      const started = Date.now();
      try {
        const raw = await this.runAttempt(prompt);
        const message = this.accept(raw, prompt, aggregate);
        const attempt: GenerationAttempt = {
          index,
          elapsedMs: Date.now() - started,
          outcome: "success",
          raw,
        };
        attempts.push(attempt);
        this.onAttempt(attempt);
        return {
          message,
          text: formatMessage(message, { icons: this.config.icons }),
          attempts,
        };
      } catch (error) {
        const attempt: GenerationAttempt = {
          index,
          elapsedMs: Date.now() - started,
          outcome: outcomeOf(error),
          raw: error instanceof ValidationFailure ? error.raw : undefined,
          error: getErrorMessage(error),
        };
        attempts.push(attempt);
        this.onAttempt(attempt);
      }

      if (index < this.config.attempts && this.config.backoffMs > 0) {
        await this.sleep(this.config.backoffMs * index);
      }
    }

    throw new GenerationExhaustedError(attempts);
  }

  /**
   * One backend call, aborted once the timeout elapses
   */
  private async runAttempt(prompt: Prompt): Promise<string> {
    const timeoutMs = Math.round(this.config.fallbackTimeout * 1000);
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new AttemptTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.backend.complete(prompt.text, {
          model: this.config.model,
          system: prompt.system,
          timeoutMs,
          signal: controller.signal,
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private accept(raw: string, prompt: Prompt, aggregate: Classification): CommitMessage {
    const parsed = parseMessage(purify(raw));
    if (!parsed) {
      throw new ValidationFailure("Response is not a conventional commit message", raw);
    }
    const message = aggregate.breaking ? ensureBreakingMarker(parsed) : parsed;
    const validation = validateMessage(message, {
      maxSubjectLength: this.config.maxSubjectLength,
      minComprehensiveLength: this.config.minComprehensiveLength,
      forceScope: this.config.forceScope,
      template: prompt.template,
    });
    if (!validation.valid) {
      throw new ValidationFailure(validation.errors.join("; "), raw);
    }
    return message;
  }
}
