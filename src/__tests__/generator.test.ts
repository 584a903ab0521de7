import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "../config";
import { GenerationEngine } from "../generator";
import { CompletionOptions, TextBackend } from "../openai";
import { GenerationAttempt, PipelineConfig } from "../types";
import { BackendError, GenerationExhaustedError } from "../utils/errors";
import { changedFile, classification, prompt } from "./helpers";

const aggregate = classification("fix", changedFile("src/input.ts", "-a\n+b"));

function scriptedBackend(replies: Array<string | Error>) {
  const complete = vi.fn(async (_prompt: string, _options: CompletionOptions) => {
    const next = replies.length > 1 ? replies.shift() : replies[0];
    if (next instanceof Error) throw next;
    return next ?? "";
  });
  const backend: TextBackend = { complete };
  return { backend, complete };
}

function engine(backend: TextBackend, config: Partial<PipelineConfig> = {}) {
  const sleep = vi.fn(async (_ms: number) => undefined);
  return {
    sleep,
    engine: new GenerationEngine(backend, { ...DEFAULT_CONFIG, ...config }, { sleep }),
  };
}

describe("GenerationEngine", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the first valid message", async () => {
    const { backend, complete } = scriptedBackend(["feat(parser): add streaming mode"]);
    const { engine: subject, sleep } = engine(backend);

    const result = await subject.generate(prompt(), aggregate);

    expect(result.text).toBe("feat(parser): add streaming mode");
    expect(result.attempts.map((a) => a.outcome)).toEqual(["success"]);
    expect(complete).toHaveBeenCalledWith(
      "test-prompt",
      expect.objectContaining({ model: "gpt-4o-mini", system: "test-system", timeoutMs: 10000 })
    );
    expect(sleep).not.toHaveBeenCalled();
  });

  it("cleans the response before parsing", async () => {
    const { backend } = scriptedBackend(['```\n"fix: handle empty input"\n```']);
    const result = await engine(backend).engine.generate(prompt(), aggregate);
    expect(result.text).toBe("fix: handle empty input");
  });

  it("retries after an unusable response with backoff", async () => {
    const { backend } = scriptedBackend(["I cannot help with that", "fix: handle empty input"]);
    const { engine: subject, sleep } = engine(backend);

    const result = await subject.generate(prompt(), aggregate);

    expect(result.text).toBe("fix: handle empty input");
    expect(result.attempts).toHaveLength(2);
    expect(result.attempts[0]).toMatchObject({
      index: 1,
      outcome: "validation-failure",
      raw: "I cannot help with that",
      error: "Response is not a conventional commit message",
    });
    expect(sleep.mock.calls).toEqual([[250]]);
  });

  it("gives up after the configured attempts", async () => {
    const { backend, complete } = scriptedBackend(["fix: a bug"]);
    const { engine: subject, sleep } = engine(backend);

    const error = await subject
      .generate(prompt({ template: "comprehensive" }), aggregate)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationExhaustedError);
    const attempts = error instanceof GenerationExhaustedError ? error.attempts : [];
    expect(attempts.map((a) => a.error)).toEqual([
      "Message too short for the change size (10 chars, min 50)",
      "Message too short for the change size (10 chars, min 50)",
      "Message too short for the change size (10 chars, min 50)",
    ]);
    expect(complete).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[250], [500]]);
  });

  it("records backend errors", async () => {
    const { backend } = scriptedBackend([new BackendError("OpenAI API error: boom")]);
    const { engine: subject } = engine(backend, { attempts: 2 });

    const error = await subject.generate(prompt(), aggregate).catch((e: unknown) => e);

    const attempts = error instanceof GenerationExhaustedError ? error.attempts : [];
    expect(attempts.map((a) => [a.outcome, a.error])).toEqual([
      ["backend-error", "OpenAI API error: boom"],
      ["backend-error", "OpenAI API error: boom"],
    ]);
  });

  it("skips backoff when it is disabled", async () => {
    const { backend } = scriptedBackend(["nope"]);
    const { engine: subject, sleep } = engine(backend, { backoffMs: 0 });
    await expect(subject.generate(prompt(), aggregate)).rejects.toBeInstanceOf(
      GenerationExhaustedError
    );
    expect(sleep).not.toHaveBeenCalled();
  });

  it("marks the message breaking when the changes are", async () => {
    const { backend } = scriptedBackend(["feat: drop legacy endpoint"]);
    const breaking = classification("feat", changedFile("src/api.ts"), true);
    const result = await engine(backend).engine.generate(prompt(), breaking);
    expect(result.text).toBe("feat!: drop legacy endpoint");
  });

  it("requires a scope when configured", async () => {
    const { backend } = scriptedBackend(["fix: handle empty input", "fix(core): handle empty input"]);
    const result = await engine(backend, { forceScope: true }).engine.generate(prompt(), aggregate);
    expect(result.text).toBe("fix(core): handle empty input");
    expect(result.attempts[0].error).toBe("Missing scope");
  });

  it("renders icons when enabled", async () => {
    const { backend } = scriptedBackend(["fix: handle empty input"]);
    const result = await engine(backend, { icons: true }).engine.generate(prompt(), aggregate);
    expect(result.text).toBe("fix: 🐛 handle empty input");
    expect(result.message.description).toBe("handle empty input");
  });

  it("reports every attempt", async () => {
    const { backend } = scriptedBackend(["nope", "fix: handle empty input"]);
    const seen: GenerationAttempt[] = [];
    const subject = new GenerationEngine(backend, DEFAULT_CONFIG, {
      onAttempt: (attempt) => seen.push(attempt),
      sleep: async () => undefined,
    });

    await subject.generate(prompt(), aggregate);

    expect(seen.map((a) => a.outcome)).toEqual(["validation-failure", "success"]);
  });

  it("bounds a hanging backend by timeouts plus backoff", async () => {
    vi.useFakeTimers();
    const signals: AbortSignal[] = [];
    const backend: TextBackend = {
      complete: (_prompt, options) => {
        signals.push(options.signal);
        return new Promise<string>(() => undefined);
      },
    };
    const subject = new GenerationEngine(backend, DEFAULT_CONFIG);

    let settled = false;
    const result = subject.generate(prompt(), aggregate).catch((e: unknown) => {
      settled = true;
      return e;
    });

    await vi.advanceTimersByTimeAsync(30749);
    expect(settled).toBe(false);
    await vi.advanceTimersByTimeAsync(1);

    const error = await result;
    expect(error).toBeInstanceOf(GenerationExhaustedError);
    const attempts = error instanceof GenerationExhaustedError ? error.attempts : [];
    expect(attempts.map((a) => [a.outcome, a.error])).toEqual([
      ["timeout", "Model response timed out after 10000ms"],
      ["timeout", "Model response timed out after 10000ms"],
      ["timeout", "Model response timed out after 10000ms"],
    ]);
    expect(signals).toHaveLength(3);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
  });
});
