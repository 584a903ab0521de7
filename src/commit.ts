import inquirer from "inquirer";
import chalk from "chalk";
import * as config from "./config";
import { DEFAULT_RULES, loadRules } from "./classifier";
import { createGitClient, GitInterface } from "./git";
import { describeGroup, groupChanges } from "./grouping";
import { createOpenAIBackend } from "./openai";
import { MessagePipeline } from "./pipeline";
import { createConsoleReporter } from "./reporter";
import { ChangedFile, PipelineConfig, PipelineResult } from "./types";
import { getErrorMessage, NoChangesError } from "./utils/errors";
import * as editor from "./utils/editor";
import * as commitFile from "./utils/commit-file";

export interface CommitOptions {
  yes?: boolean;
  dryRun?: boolean;
  group?: boolean;
  model?: string;
  path?: string;
  threshold?: number;
  timeout?: number;
  attempts?: number;
  icons?: boolean;
  forceScope?: boolean;
  verbose?: boolean;
}

interface PlannedCommit {
  number: number;
  description: string;
  files: ChangedFile[];
  result: PipelineResult;
  text: string;
}

export interface CommitResult {
  success: boolean;
  message: string;
  files: number;
  hash?: string;
  error?: string;
}

/**
 * Paths to stage for a set of changes, including rename sources
 */
export function pathsToStage(files: readonly ChangedFile[]): string[] {
  const paths = files.flatMap((file) => (file.oldPath ? [file.oldPath, file.path] : [file.path]));
  return Array.from(new Set(paths));
}

function printPlan(plan: PlannedCommit[]): void {
  console.log(chalk.blue("\n📋 Commit Plan:\n"));

  plan.forEach((entry) => {
    const source = entry.result.source === "fallback" ? chalk.gray(" (fallback message)") : "";
    console.log(chalk.cyan(`Commit ${entry.number}: ${entry.description}${source}`));
    console.log(chalk.gray(`Files: ${entry.files.map((f) => f.path).join(", ")}`));
    const [subject, ...rest] = entry.text.split("\n");
    console.log(chalk.yellow(subject));
    rest.forEach((line) => {
      console.log(chalk.gray(`  ${line}`));
    });
    console.log("");
  });
}

async function editMessages(
  entries: PlannedCommit[],
  settings: PipelineConfig
): Promise<PlannedCommit[]> {
  const tempFile = editor.createTempFile("git-scribe-commit");
  try {
    commitFile.writeCommitFile(
      tempFile,
      entries.map((entry) => ({
        number: entry.number,
        description: entry.description,
        files: entry.files.map((f) => f.path),
        text: entry.text,
      }))
    );

    console.log(chalk.blue("\n✏️  Opening editor...\n"));
    await editor.openEditor(tempFile);

    const edited = commitFile.parseCommitFile(tempFile);
    const validation = commitFile.validateCommits(edited, settings.maxSubjectLength);
    if (!validation.valid) {
      console.log(chalk.yellow("\n⚠️  Validation warnings:\n"));
      validation.errors.forEach((error) => {
        console.log(chalk.yellow(`  - ${error}`));
      });
      console.log(chalk.gray("\nContinuing with edited messages...\n"));
    }

    const merged = commitFile.mergeEditedCommits(entries, edited);
    const kept = merged.filter((entry): entry is PlannedCommit => entry !== null);
    const skipped = entries.length - kept.length;
    if (skipped > 0) {
      console.log(chalk.yellow(`⚠ Skipping ${skipped} commit(s) removed in the editor.`));
    }
    return kept;
  } catch (error) {
    console.log(chalk.red(`\n❌ Editor error: ${getErrorMessage(error)}\n`));
    console.log(chalk.yellow("Proceeding with original commit messages...\n"));
    return entries;
  } finally {
    editor.cleanupTempFile(tempFile);
  }
}

async function reviewEach(plan: PlannedCommit[], settings: PipelineConfig): Promise<PlannedCommit[]> {
  const approved: PlannedCommit[] = [];

  for (let i = 0; i < plan.length; i++) {
    const entry = plan[i];
    const { action } = await inquirer.prompt<{ action: string }>([
      {
        type: "list",
        name: "action",
        message: `Commit ${entry.number}: ${entry.text.split("\n")[0]}`,
        choices: [
          { name: "Commit", value: "commit" },
          { name: "Edit message", value: "edit" },
          { name: "Skip", value: "skip" },
          { name: "Accept all remaining", value: "all" },
        ],
      },
    ]);

    if (action === "commit") {
      approved.push(entry);
    } else if (action === "edit") {
      approved.push(...(await editMessages([entry], settings)));
    } else if (action === "all") {
      approved.push(...plan.slice(i));
      break;
    }
  }

  return approved;
}

async function review(plan: PlannedCommit[], settings: PipelineConfig): Promise<PlannedCommit[]> {
  const choices =
    plan.length === 1
      ? [
          { name: "Commit", value: "commit" },
          { name: "Edit message", value: "edit" },
          { name: "Cancel", value: "cancel" },
        ]
      : [
          { name: `Commit all ${plan.length}`, value: "commit" },
          { name: "Review one by one", value: "each" },
          { name: "Edit all messages", value: "edit" },
          { name: "Cancel", value: "cancel" },
        ];

  const { action } = await inquirer.prompt<{ action: string }>([
    {
      type: "list",
      name: "action",
      message: "What would you like to do?",
      choices,
    },
  ]);

  switch (action) {
    case "commit":
      return plan;
    case "each":
      return reviewEach(plan, settings);
    case "edit":
      return editMessages(plan, settings);
    default:
      return [];
  }
}

/**
 * Commit each planned entry in order.
 * Grouped staged changes are committed from a snapshot of the index, so each
 * group gets exactly the content that was staged when it was collected.
 */
export async function commitPlan(
  git: GitInterface,
  plan: ReadonlyArray<Pick<PlannedCommit, "files" | "text">>,
  grouped: boolean
): Promise<CommitResult[]> {
  const results: CommitResult[] = [];
  const snapshot =
    grouped && plan.some((entry) => entry.files.some((f) => f.staged))
      ? await git.writeIndexTree()
      : null;
  const failed: string[] = [];

  for (const entry of plan) {
    const subject = entry.text.split("\n")[0];
    const paths = pathsToStage(entry.files);
    try {
      if (snapshot) {
        await git.unstageAll();
        await git.restoreStaged(snapshot, paths);
      } else if (grouped) {
        await git.unstageAll();
        await git.stageFiles(paths);
      } else if (!entry.files.some((f) => f.staged)) {
        await git.stageFiles(paths);
      }
      const outcome = await git.commit(entry.text);
      results.push({ success: true, message: subject, files: entry.files.length, hash: outcome.hash });
    } catch (error) {
      failed.push(...paths);
      results.push({
        success: false,
        message: subject,
        files: entry.files.length,
        error: getErrorMessage(error),
      });
    }
  }

  // Groups that failed stay staged as they were
  if (snapshot && failed.length > 0) {
    await git.unstageAll();
    await git.restoreStaged(snapshot, Array.from(new Set(failed)));
  }

  return results;
}

function printSummary(results: CommitResult[]): void {
  const successful = results.filter((r) => r.success).length;

  console.log(chalk.blue.bold("\n📊 Summary Report\n"));
  console.log(chalk.cyan(`Successful: ${successful}`));
  console.log(chalk.cyan(`Failed: ${results.length - successful}\n`));

  results.forEach((result) => {
    if (result.success) {
      const hash = result.hash ? chalk.gray(` [${result.hash}]`) : "";
      console.log(chalk.green(`  ✓ ${result.message} - ${result.files} file(s)${hash}`));
    } else {
      console.log(chalk.red(`  ❌ ${result.message} - Error: ${result.error}`));
    }
  });

  if (successful > 0) {
    console.log(chalk.yellow("\n⚠ Note: Commits were not pushed. You can push manually.\n"));
  }
}

/**
 * Run commit command
 */
export async function runCommit(options: CommitOptions = {}): Promise<void> {
  console.log(chalk.blue.bold("\n📝 git-scribe\n"));

  const settings = config.resolvePipelineConfig(config.getStoredSettings(), {
    model: options.model,
    promptThreshold: options.threshold,
    fallbackTimeout: options.timeout,
    attempts: options.attempts,
    icons: options.icons,
    forceScope: options.forceScope,
  });

  const git = createGitClient(options.path || process.cwd());
  if (!(await git.isRepository())) {
    console.log(chalk.red("❌ This directory is not a git repository!\n"));
    process.exitCode = 1;
    return;
  }

  const apiKey = config.getOpenAIKey();
  if (!apiKey) {
    console.log(
      chalk.yellow("⚠ OpenAI API key not found. Messages will be composed without the model.")
    );
    console.log(chalk.blue("Run: git-scribe setup\n"));
  }

  const pipeline = new MessagePipeline({
    git,
    backend: apiKey ? createOpenAIBackend(apiKey, config.getBaseUrl()) : null,
    config: settings,
    reporter: createConsoleReporter({ verbose: options.verbose }),
    rules: loadRules(DEFAULT_RULES, config.getStoredPathRules()),
  });

  const plan: PlannedCommit[] = [];
  try {
    if (options.group) {
      const files = await pipeline.collect();
      const groups = groupChanges(files, pipeline.classifier);
      console.log(chalk.green.bold(`\n✓ ${groups.length} commit group(s) created\n`));
      for (const group of groups) {
        console.log(chalk.blue(`Group ${group.number}: ${describeGroup(group)}`));
        const result = await pipeline.generateFor(group.files);
        plan.push({
          number: group.number,
          description: describeGroup(group),
          files: group.files,
          result,
          text: result.text,
        });
      }
    } else {
      const result = await pipeline.run();
      plan.push({
        number: 1,
        description: `${result.classification.type} changes in ${result.files.length} file(s)`,
        files: [...result.files],
        result,
        text: result.text,
      });
    }
  } catch (error) {
    if (error instanceof NoChangesError) {
      console.log(chalk.yellow("⚠ No changes to commit.\n"));
      return;
    }
    throw error;
  }

  printPlan(plan);

  if (options.dryRun) {
    console.log(chalk.gray("Dry run: nothing was committed.\n"));
    return;
  }

  const approved = options.yes ? plan : await review(plan, settings);
  if (approved.length === 0) {
    console.log(chalk.yellow("\n❌ Operation cancelled.\n"));
    return;
  }

  const results = await commitPlan(git, approved, Boolean(options.group));
  printSummary(results);
  if (results.some((r) => !r.success)) {
    process.exitCode = 1;
  }
}
