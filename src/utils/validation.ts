/**
 * Validation utilities for user input
 */

import { InvalidArgumentError } from "commander";

/**
 * Validate OpenAI API key format
 */
export function validateOpenAIKey(input: string): string | true {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return "OpenAI API Key is required!";
  }
  if (/\s/.test(trimmed)) {
    return "OpenAI API Key cannot contain spaces!";
  }
  return true;
}

/**
 * Validate an OpenAI-compatible endpoint; empty means the default endpoint
 */
export function validateBaseUrl(input: string): string | true {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return true;
  }
  if (!/^https?:\/\/[^\s/]+/.test(trimmed)) {
    return "Base URL must start with http:// or https://";
  }
  return true;
}

export function validateModel(input: string): string | true {
  return input.trim().length > 0 ? true : "Model name is required!";
}

/**
 * Commander parser for whole-number options such as --attempts
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Commander parser for --timeout (seconds, fractions allowed)
 */
export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number.");
  }
  return parsed;
}
