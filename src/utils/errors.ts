/**
 * Error handling utilities
 */

import type { GenerationAttempt } from "../types";

/**
 * Safely convert unknown error to Error instance
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === "string") {
    return new Error(error);
  }
  return new Error("Unknown error occurred");
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  return toError(error).message;
}

/**
 * Working tree and index are both clean
 */
export class NoChangesError extends Error {
  constructor(message = "No changes to commit") {
    super(message);
    this.name = "NoChangesError";
  }
}

/**
 * Transport or API failure of the text-generation backend
 */
export class BackendError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "BackendError";
  }
}

export class AttemptTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Model response timed out after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

/**
 * Generated text that does not form a usable commit message
 */
export class ValidationFailure extends Error {
  constructor(message: string, readonly raw: string) {
    super(message);
    this.name = "ValidationFailure";
  }
}

export class GenerationExhaustedError extends Error {
  constructor(readonly attempts: GenerationAttempt[]) {
    super(`Generation failed after ${attempts.length} attempt(s)`);
    this.name = "GenerationExhaustedError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
