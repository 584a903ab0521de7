import * as childProcess from "child_process";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import inquirer from "inquirer";
import chalk from "chalk";
import * as config from "../config";
import { getErrorMessage } from "./errors";

const KNOWN_EDITORS = [
  { name: "VS Code", command: "code" },
  { name: "Vim", command: "vim" },
  { name: "Neovim", command: "nvim" },
  { name: "Nano", command: "nano" },
  { name: "Emacs", command: "emacs" },
  { name: "Sublime Text", command: "subl" },
];

// GUI editors return immediately unless asked to wait
const WAIT_FLAGS: Record<string, string> = {
  code: "--wait",
  "code-insiders": "--wait",
  subl: "--wait",
  zed: "--wait",
  mate: "-w",
};

/**
 * Detect system editor from environment variables
 */
export function detectSystemEditor(): string {
  const editorVars = [process.env.GIT_EDITOR, process.env.VISUAL, process.env.EDITOR];
  for (const editor of editorVars) {
    if (editor && editor.trim()) {
      return editor.trim();
    }
  }
  return process.platform === "win32" ? "notepad" : "vi";
}

/**
 * Check if an editor command is on PATH
 */
export function isEditorAvailable(editorCommand: string): boolean {
  const lookup = process.platform === "win32" ? "where" : "which";
  const binary = editorCommand.split(" ")[0];
  const result = childProcess.spawnSync(lookup, [binary], { stdio: "ignore" });
  return result.status === 0;
}

/**
 * Editor command with the wait flag a GUI editor needs
 */
export function getEditorCommand(editor: string): string {
  const binary = path.basename(editor.split(" ")[0]).replace(/\.exe$/i, "");
  const flag = WAIT_FLAGS[binary];
  if (flag && !editor.includes(flag)) {
    return `${editor} ${flag}`;
  }
  return editor;
}

/**
 * Prompt user to select an editor
 */
export async function promptForEditor(): Promise<string> {
  const systemEditor = detectSystemEditor();
  const choices: Array<{ name: string; value: string }> = KNOWN_EDITORS.filter((editor) =>
    isEditorAvailable(editor.command)
  ).map((editor) => ({
    name: editor.command === systemEditor ? `${editor.name} (System Default)` : editor.name,
    value: editor.command,
  }));

  if (!choices.find((c) => c.value === systemEditor)) {
    choices.unshift({ name: `System Default (${systemEditor})`, value: systemEditor });
  }
  choices.push({ name: "Other (enter custom command)", value: "custom" });

  const { editorChoice } = await inquirer.prompt<{ editorChoice: string }>([
    {
      type: "list",
      name: "editorChoice",
      message: "Select your preferred editor for commit messages:",
      choices,
      default: systemEditor,
    },
  ]);

  if (editorChoice !== "custom") {
    return editorChoice;
  }

  const { customEditor } = await inquirer.prompt<{ customEditor: string }>([
    {
      type: "input",
      name: "customEditor",
      message: "Enter editor command:",
      validate: (input: string) => (input.trim() ? true : "Editor command cannot be empty"),
    },
  ]);
  return customEditor.trim();
}

/**
 * Configured editor, asking once and saving the answer when unset
 */
export async function getOrPromptEditor(): Promise<string> {
  const saved = config.getEditor();
  if (saved) {
    return saved;
  }

  console.log(chalk.blue("\n⚙️  Editor preference not set.\n"));
  const editor = await promptForEditor();
  if (config.setEditor(editor)) {
    console.log(chalk.green(`\n✓ Editor preference saved: ${editor}\n`));
  }
  return editor;
}

/**
 * Open a file in the configured editor and wait for it to close
 */
export async function openEditor(filePath: string): Promise<void> {
  const editorCommand = getEditorCommand(await getOrPromptEditor());

  await new Promise<void>((resolve, reject) => {
    const editorProcess = childProcess.spawn(editorCommand, [JSON.stringify(filePath)], {
      stdio: "inherit",
      shell: true,
    });
    editorProcess.on("exit", (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`Editor exited with code ${code}`));
      }
    });
    editorProcess.on("error", (error) => {
      reject(new Error(`Failed to open editor: ${getErrorMessage(error)}`));
    });
  });
}

/**
 * Path for a temporary file to edit
 */
export function createTempFile(prefix: string = "git-scribe"): string {
  const random = Math.random().toString(36).substring(2, 8);
  return path.join(os.tmpdir(), `${prefix}-${Date.now()}-${random}.txt`);
}

export function cleanupTempFile(filePath: string): void {
  try {
    fs.rmSync(filePath, { force: true });
  } catch (error) {
    console.log(chalk.gray(`Could not remove ${filePath}: ${getErrorMessage(error)}`));
  }
}
