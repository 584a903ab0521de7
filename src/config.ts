import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { Config, PathRule, PipelineConfig } from "./types";
import { ConfigError, getErrorMessage } from "./utils/errors";

export const DEFAULT_CONFIG: Readonly<PipelineConfig> = Object.freeze({
  promptThreshold: 80,
  fallbackTimeout: 10,
  minComprehensiveLength: 50,
  attempts: 3,
  model: "gpt-4o-mini",
  maxSubjectLength: 72,
  diffMaxLines: 100,
  maxPromptLength: 12000,
  backoffMs: 250,
  forceScope: false,
  icons: false,
});

export const SETTING_KEYS: ReadonlyArray<keyof PipelineConfig> = [
  "promptThreshold",
  "fallbackTimeout",
  "minComprehensiveLength",
  "attempts",
  "model",
  "maxSubjectLength",
  "diffMaxLines",
  "maxPromptLength",
  "backoffMs",
  "forceScope",
  "icons",
];

/**
 * Directory holding config.json; GIT_SCRIBE_HOME overrides the default
 */
export function getConfigDir(): string {
  return process.env.GIT_SCRIBE_HOME || path.join(os.homedir(), ".git-scribe");
}

export function getConfigFile(): string {
  return path.join(getConfigDir(), "config.json");
}

/**
 * Read config file
 */
function readConfig(): Config | null {
  const configFile = getConfigFile();
  if (!fs.existsSync(configFile)) {
    return null;
  }
  try {
    const content = fs.readFileSync(configFile, "utf8");
    return JSON.parse(content) as Config;
  } catch (error) {
    throw new ConfigError(
      `Could not read ${configFile}: ${getErrorMessage(error)}`
    );
  }
}

/**
 * Write config file
 */
function writeConfig(config: Config): boolean {
  try {
    const configDir = getConfigDir();
    if (!fs.existsSync(configDir)) {
      fs.mkdirSync(configDir, { recursive: true });
    }
    fs.writeFileSync(getConfigFile(), JSON.stringify(config, null, 2), "utf8");
    return true;
  } catch (error) {
    console.error("Config write error:", getErrorMessage(error));
    return false;
  }
}

/**
 * Check if config exists
 */
export function configExists(): boolean {
  return fs.existsSync(getConfigFile());
}

/**
 * Get OpenAI key, preferring the OPENAI_API_KEY environment variable
 */
export function getOpenAIKey(): string | null {
  const fromEnv = process.env.OPENAI_API_KEY;
  if (fromEnv && fromEnv.trim()) {
    return fromEnv.trim();
  }
  return readConfig()?.openaiKey || null;
}

/**
 * Save OpenAI key
 */
export function setOpenAIKey(key: string): boolean {
  const config = readConfig() || {};
  config.openaiKey = key;
  return writeConfig(config);
}

/**
 * Base URL of an OpenAI-compatible endpoint, if configured
 */
export function getBaseUrl(): string | null {
  return readConfig()?.baseUrl || null;
}

export function setBaseUrl(baseUrl: string | null): boolean {
  const config = readConfig() || {};
  if (baseUrl) {
    config.baseUrl = baseUrl;
  } else {
    delete config.baseUrl;
  }
  return writeConfig(config);
}

/**
 * Pipeline settings stored in the config file
 */
export function getStoredSettings(): Partial<PipelineConfig> {
  return readConfig()?.settings || {};
}

export function setStoredSettings(settings: Partial<PipelineConfig>): boolean {
  const config = readConfig() || {};
  config.settings = { ...config.settings, ...settings };
  return writeConfig(config);
}

/**
 * Extra path rules stored in the config file
 */
export function getStoredPathRules(): PathRule[] {
  return readConfig()?.rules?.pathRules || [];
}

/**
 * Get editor preference
 */
export function getEditor(): string | null {
  return readConfig()?.editor || null;
}

/**
 * Save editor preference
 */
export function setEditor(editor: string): boolean {
  const config = readConfig() || {};
  config.editor = editor;
  return writeConfig(config);
}

/**
 * Reset config
 */
export function resetConfig(): boolean {
  try {
    const configFile = getConfigFile();
    if (fs.existsSync(configFile)) {
      fs.unlinkSync(configFile);
    }
    return true;
  } catch (error) {
    console.error("Config reset error:", getErrorMessage(error));
    return false;
  }
}

function requirePositive(name: string, value: number, integer: boolean): void {
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigError(
      `${name} must be a positive ${integer ? "integer" : "number"} (got ${value})`
    );
  }
}

/**
 * Merge defaults, stored settings and CLI overrides into a validated config.
 * Later layers win; undefined values are ignored.
 */
export function resolvePipelineConfig(
  ...layers: Array<Partial<PipelineConfig> | undefined>
): PipelineConfig {
  const merged: PipelineConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    if (!layer) continue;
    for (const key of SETTING_KEYS) {
      const value = layer[key];
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }

  requirePositive("promptThreshold", merged.promptThreshold, true);
  requirePositive("fallbackTimeout", merged.fallbackTimeout, false);
  requirePositive("minComprehensiveLength", merged.minComprehensiveLength, true);
  requirePositive("attempts", merged.attempts, true);
  requirePositive("maxSubjectLength", merged.maxSubjectLength, true);
  requirePositive("diffMaxLines", merged.diffMaxLines, true);
  requirePositive("maxPromptLength", merged.maxPromptLength, true);
  if (!Number.isInteger(merged.backoffMs) || merged.backoffMs < 0) {
    throw new ConfigError(`backoffMs must be a non-negative integer (got ${merged.backoffMs})`);
  }
  if (typeof merged.model !== "string" || !merged.model.trim()) {
    throw new ConfigError("model must be a non-empty string");
  }

  return merged;
}
