import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as config from "../config";
import { ConfigError } from "../utils/errors";

describe("config file", () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "git-scribe-config-"));
    vi.stubEnv("GIT_SCRIBE_HOME", home);
    vi.stubEnv("OPENAI_API_KEY", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(home, { recursive: true, force: true });
  });

  it("lives under GIT_SCRIBE_HOME", () => {
    expect(config.getConfigFile()).toBe(path.join(home, "config.json"));
    expect(config.configExists()).toBe(false);
  });

  it("stores and reads the key", () => {
    expect(config.setOpenAIKey("test-secret")).toBe(true);
    expect(config.getOpenAIKey()).toBe("test-secret");
    expect(config.configExists()).toBe(true);
  });

  it("prefers OPENAI_API_KEY", () => {
    config.setOpenAIKey("test-secret");
    vi.stubEnv("OPENAI_API_KEY", " test-env-secret ");
    expect(config.getOpenAIKey()).toBe("test-env-secret");
  });

  it("merges stored settings", () => {
    config.setStoredSettings({ attempts: 5 });
    config.setStoredSettings({ icons: true });
    expect(config.getStoredSettings()).toEqual({ attempts: 5, icons: true });
  });

  it("keeps other values when the base URL is cleared", () => {
    config.setEditor("vim");
    config.setBaseUrl("http://localhost:1234/v1");
    expect(config.getBaseUrl()).toBe("http://localhost:1234/v1");
    config.setBaseUrl(null);
    expect(config.getBaseUrl()).toBeNull();
    expect(config.getEditor()).toBe("vim");
  });

  it("reads custom path rules", () => {
    fs.writeFileSync(
      config.getConfigFile(),
      JSON.stringify({ rules: { pathRules: [{ type: "chore", pattern: "^generated/" }] } })
    );
    expect(config.getStoredPathRules()).toEqual([{ type: "chore", pattern: "^generated/" }]);
  });

  it("reports unreadable files", () => {
    fs.writeFileSync(config.getConfigFile(), "{not json");
    expect(() => config.getStoredSettings()).toThrow(ConfigError);
  });

  it("resets by removing the file", () => {
    config.setEditor("nano");
    expect(config.resetConfig()).toBe(true);
    expect(config.configExists()).toBe(false);
    expect(config.getEditor()).toBeNull();
  });
});

describe("resolvePipelineConfig", () => {
  it("returns the defaults", () => {
    expect(config.resolvePipelineConfig()).toEqual(config.DEFAULT_CONFIG);
  });

  it("lets later layers win and ignores undefined values", () => {
    const resolved = config.resolvePipelineConfig(
      { attempts: 5, model: "test-model" },
      { attempts: 2, model: undefined }
    );
    expect(resolved.attempts).toBe(2);
    expect(resolved.model).toBe("test-model");
  });

  it.each([
    [{ attempts: 0 }, "attempts must be a positive integer (got 0)"],
    [{ promptThreshold: 1.5 }, "promptThreshold must be a positive integer (got 1.5)"],
    [{ fallbackTimeout: -1 }, "fallbackTimeout must be a positive number (got -1)"],
    [{ backoffMs: -5 }, "backoffMs must be a non-negative integer (got -5)"],
    [{ model: " " }, "model must be a non-empty string"],
  ] as const)("rejects %j", (layer, message) => {
    expect(() => config.resolvePipelineConfig(layer)).toThrow(message);
  });

  it("accepts fractional timeouts", () => {
    expect(config.resolvePipelineConfig({ fallbackTimeout: 0.5 }).fallbackTimeout).toBe(0.5);
  });
});
