import chalk from "chalk";
import * as config from "./config";

/**
 * Hide the middle of a key, keeping its prefix and last four characters
 */
export function maskKey(key: string): string {
  if (key.length <= 8) {
    return "*".repeat(key.length);
  }
  return `${key.slice(0, 3)}${"*".repeat(key.length - 7)}${key.slice(-4)}`;
}

/**
 * Print the effective settings and where they come from
 */
export function showConfig(): void {
  console.log(chalk.blue.bold("\n⚙️  git-scribe Configuration\n"));
  console.log(chalk.gray(`Config file: ${config.getConfigFile()}${config.configExists() ? "" : " (not created)"}\n`));

  const key = config.getOpenAIKey();
  const keySource = process.env.OPENAI_API_KEY ? " (from OPENAI_API_KEY)" : "";
  console.log(chalk.cyan("OpenAI API key: ") + (key ? `${maskKey(key)}${keySource}` : chalk.yellow("not set")));
  console.log(chalk.cyan("Base URL:       ") + (config.getBaseUrl() || chalk.gray("default")));
  console.log(chalk.cyan("Editor:         ") + (config.getEditor() || chalk.gray("not set")));

  const stored = config.getStoredSettings();
  const settings = config.resolvePipelineConfig(stored);
  console.log(chalk.bold("\nPipeline settings:"));
  config.SETTING_KEYS.forEach((name) => {
    const marker = stored[name] !== undefined ? "" : chalk.gray(" (default)");
    console.log(`  ${chalk.cyan(name.padEnd(24))}${String(settings[name])}${marker}`);
  });

  const rules = config.getStoredPathRules();
  if (rules.length > 0) {
    console.log(chalk.bold("\nCustom path rules:"));
    rules.forEach((rule) => {
      console.log(`  ${chalk.cyan(rule.type.padEnd(10))}${rule.pattern}`);
    });
  }
  console.log("");
}
