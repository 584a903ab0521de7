import OpenAI from "openai";
import { BackendError, getErrorMessage } from "./utils/errors";

export interface CompletionOptions {
  model: string;
  system: string;
  timeoutMs: number;
  signal: AbortSignal;
}

/**
 * Text-generation backend used by the generation engine
 */
export interface TextBackend {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

/**
 * Create an OpenAI client, optionally for an OpenAI-compatible endpoint
 */
export function initOpenAI(apiKey: string, baseUrl?: string | null): OpenAI {
  if (!apiKey) {
    throw new BackendError("OpenAI API key is required");
  }
  return new OpenAI({ apiKey, baseURL: baseUrl || undefined });
}

/**
 * Chat-completions backend; retries and timeouts are left to the caller
 */
export function createOpenAIBackend(apiKey: string, baseUrl?: string | null): TextBackend {
  const client = initOpenAI(apiKey, baseUrl);

  return {
    async complete(prompt: string, options: CompletionOptions): Promise<string> {
      try {
        const response = await client.chat.completions.create(
          {
            model: options.model,
            messages: [
              { role: "system", content: options.system },
              { role: "user", content: prompt },
            ],
            temperature: 0.3,
          },
          { signal: options.signal, timeout: options.timeoutMs, maxRetries: 0 }
        );

        const content = response.choices[0]?.message?.content;
        if (!content) {
          throw new BackendError("No response from OpenAI");
        }
        return content;
      } catch (error) {
        if (error instanceof BackendError) {
          throw error;
        }
        const message = getErrorMessage(error);
        if (message.includes("API key")) {
          throw new BackendError("Invalid OpenAI API key", error);
        }
        throw new BackendError(`OpenAI API error: ${message}`, error);
      }
    },
  };
}
