import chalk from "chalk";
import * as config from "./config";
import * as editorUtils from "./utils/editor";

/**
 * Save the editor used for `commit` edits, prompting when no command is given
 */
export async function setEditorPreference(command?: string): Promise<void> {
  console.log(chalk.blue.bold("\n⚙️  Editor Configuration\n"));

  const saved = config.getEditor();
  console.log(
    chalk.gray(
      saved
        ? `Current editor: ${saved}\n`
        : `No editor saved; using ${editorUtils.detectSystemEditor()} from the environment\n`
    )
  );

  const chosen = command?.trim() || (await editorUtils.promptForEditor());
  if (!editorUtils.isEditorAvailable(chosen)) {
    console.log(chalk.yellow(`⚠ "${chosen.split(" ")[0]}" was not found on PATH; saving it anyway.`));
  }

  if (!config.setEditor(chosen)) {
    console.log(chalk.red("❌ Could not save editor preference.\n"));
    return;
  }

  console.log(chalk.green(`\n✓ Editor saved: ${chosen}`));
  console.log(chalk.gray(`Messages will open with: ${editorUtils.getEditorCommand(chosen)}\n`));
}
