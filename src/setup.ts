import inquirer from 'inquirer';
import chalk from 'chalk';
import * as config from './config';
import { validateBaseUrl, validateModel, validateOpenAIKey } from './utils/validation';

/**
 * Run setup command
 */
export async function runSetup(): Promise<void> {
  console.log(chalk.blue.bold('\n🔧 git-scribe Setup\n'));

  if (process.env.OPENAI_API_KEY) {
    console.log(chalk.gray('OPENAI_API_KEY is set in the environment and takes precedence over the saved key.\n'));
  }

  const { openaiKey } = await inquirer.prompt<{ openaiKey: string }>([
    {
      type: 'password',
      name: 'openaiKey',
      message: 'Enter OpenAI API Key:',
      validate: validateOpenAIKey
    }
  ]);

  if (!config.setOpenAIKey(openaiKey.trim())) {
    console.log(chalk.red('❌ Could not save OpenAI API Key.\n'));
    return;
  }
  console.log(chalk.green('✓ OpenAI API Key saved\n'));

  const settings = config.getStoredSettings();
  const { baseUrl, model } = await inquirer.prompt<{ baseUrl: string; model: string }>([
    {
      type: 'input',
      name: 'baseUrl',
      message: 'OpenAI-compatible base URL (leave empty for api.openai.com):',
      default: config.getBaseUrl() || '',
      validate: validateBaseUrl
    },
    {
      type: 'input',
      name: 'model',
      message: 'Model:',
      default: settings.model || config.DEFAULT_CONFIG.model,
      validate: validateModel
    }
  ]);

  config.setBaseUrl(baseUrl.trim() || null);
  config.setStoredSettings({ model: model.trim() });
  console.log(chalk.green(`✓ Using model ${model.trim()}${baseUrl.trim() ? ` at ${baseUrl.trim()}` : ''}\n`));

  const { useIcons } = await inquirer.prompt<{ useIcons: boolean }>([
    {
      type: 'confirm',
      name: 'useIcons',
      message: 'Add type icons to commit subjects (feat: ✨ ...)?',
      default: settings.icons || false
    }
  ]);
  config.setStoredSettings({ icons: useIcons });

  console.log(chalk.green.bold('✓ Setup completed!\n'));
  console.log(chalk.gray(`Configuration saved to ${config.getConfigFile()}\n`));
  console.log(chalk.blue('Usage: git-scribe commit\n'));
}
