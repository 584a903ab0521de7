#!/usr/bin/env node

import { Command, Help } from "commander";
import chalk from "chalk";
import * as setup from "./setup";
import * as commit from "./commit";
import * as reset from "./reset";
import * as setEditor from "./set-editor";
import * as showConfig from "./show-config";
import packageJson from "../package.json";
import { ConfigError, getErrorMessage } from "./utils/errors";
import { parsePositiveInt, parsePositiveNumber } from "./utils/validation";

const program = new Command();

/**
 * Handle command errors consistently
 */
function handleError(error: unknown, showStack = false): void {
  const err =
    error instanceof Error ? error : new Error(getErrorMessage(error));
  console.error(chalk.red(`\n❌ Error: ${err.message}\n`));
  if (showStack && err.stack && !(err instanceof ConfigError)) {
    console.error(chalk.gray(err.stack));
  }
  process.exit(1);
}

const COMMAND_GROUPS: Array<{ title: string; names: string[] }> = [
  { title: "Git Operations", names: ["commit"] },
  { title: "Setup & Configuration", names: ["setup", "config", "set-editor", "reset"] },
];

function formatEntry(term: string, plainLength: number, description: string): string {
  const padding = " ".repeat(Math.max(1, 30 - plainLength));
  return `  ${term}${padding}${chalk.gray(description)}\n`;
}

function formatHelp(cmd: Command, helper: Help): string {
  let output = "\n";
  output += `  ${chalk.bold.white("git-scribe")} ${chalk.gray(`v${packageJson.version}`)}\n`;
  output += `  ${chalk.gray("Conventional commit messages from your pending changes")}\n\n`;

  output += chalk.bold("Usage:\n");
  output += `  ${helper.commandUsage(cmd)}\n\n`;

  const options = helper.visibleOptions(cmd);
  if (options.length > 0) {
    output += chalk.bold("Options:\n");
    options.forEach((option) => {
      output += formatEntry(chalk.cyan(option.flags), option.flags.length, option.description);
    });
    output += "\n";
  }

  const commands = helper.visibleCommands(cmd);
  const listed = new Set<string>();
  COMMAND_GROUPS.forEach((group) => {
    const members = commands.filter((sub) => group.names.includes(sub.name()));
    if (members.length === 0) return;
    output += chalk.bold.white(`${group.title}:\n`);
    members.forEach((sub) => {
      listed.add(sub.name());
      const aliases = sub.aliases().length > 0 ? ` (${sub.aliases().join(", ")})` : "";
      output += formatEntry(
        chalk.cyan(sub.name()) + chalk.gray(aliases),
        sub.name().length + aliases.length,
        sub.description()
      );
    });
    output += "\n";
  });
  commands
    .filter((sub) => !listed.has(sub.name()))
    .forEach((sub) => {
      output += formatEntry(chalk.cyan(sub.name()), sub.name().length, sub.description());
    });

  output += chalk.gray(
    "Run 'git-scribe <command> --help' for more information on a command.\n"
  );
  return output;
}

program
  .name("git-scribe")
  .description("Generate conventional commit messages from staged or unstaged changes")
  .version(packageJson.version)
  .option("--no-color", "Disable colored output")
  .hook("preAction", () => {
    if (program.opts<{ color?: boolean }>().color === false) {
      chalk.level = 0;
    }
  })
  .configureHelp({
    helpWidth: 100,
    sortSubcommands: true,
    commandUsage: (cmd) => {
      const name = cmd.name() === "git-scribe" ? "git-scribe" : `git-scribe ${cmd.name()}`;
      return chalk.bold.cyan(`${name} ${cmd.usage()}`);
    },
    formatHelp,
  });

program
  .command("commit")
  .alias("c")
  .description("Generate a commit message for pending changes and commit")
  .option("-y, --yes", "Commit without asking for confirmation")
  .option("--dry-run", "Print the generated message(s) without committing")
  .option("-g, --group", "Split changes into related groups, one commit each")
  .option("-m, --model <model>", "Model to use for generation")
  .option("-p, --path <path>", "Repository path (default: current directory)")
  .option(
    "-t, --threshold <lines>",
    "Changed lines at which detailed messages are requested (default: 80)",
    parsePositiveInt
  )
  .option(
    "--timeout <seconds>",
    "Seconds to wait for each model response (default: 10)",
    parsePositiveNumber
  )
  .option("-a, --attempts <count>", "Generation attempts before falling back (default: 3)", parsePositiveInt)
  .option("--icons", "Add a type icon to the subject")
  .option("--force-scope", "Require a scope in every message")
  .option("-v, --verbose", "Show classification and per-attempt details")
  .action(async (options: commit.CommitOptions) => {
    try {
      await commit.runCommit(options);
    } catch (error) {
      handleError(error, true);
    }
  });

program
  .command("setup")
  .description("Initial setup - OpenAI API key, endpoint and model")
  .action(async () => {
    try {
      await setup.runSetup();
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("config")
  .description("Show the effective configuration")
  .action(() => {
    try {
      showConfig.showConfig();
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("reset")
  .description("Reset all configuration (deletes the saved key and settings)")
  .option("-y, --yes", "Do not ask for confirmation")
  .action(async (options: { yes?: boolean }) => {
    try {
      await reset.resetConfig(options);
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("set-editor [command]")
  .alias("editor")
  .description("Change your preferred editor for commit messages")
  .action(async (command?: string) => {
    try {
      await setEditor.setEditorPreference(command);
    } catch (error) {
      handleError(error);
    }
  });

if (process.argv.length === 2) {
  program.help();
}

program.parseAsync(process.argv).catch((error: unknown) => handleError(error));
