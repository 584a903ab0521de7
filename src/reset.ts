import chalk from 'chalk';
import inquirer from 'inquirer';
import * as config from './config';

/**
 * Reset configuration
 */
export async function resetConfig(options: { yes?: boolean } = {}): Promise<void> {
  if (!config.configExists()) {
    console.log(chalk.yellow('⚠ No configuration found.\n'));
    return;
  }

  console.log(chalk.red.bold('\n⚠️  Reset Configuration\n'));
  console.log(chalk.yellow(`This will delete ${config.getConfigFile()}, including:`));
  console.log(chalk.yellow('  - OpenAI API key and base URL'));
  console.log(chalk.yellow('  - Model, threshold and timeout settings'));
  console.log(chalk.yellow('  - Custom classification rules'));
  console.log(chalk.yellow('  - Editor preference\n'));

  if (!options.yes) {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: 'Are you sure you want to reset all configuration?',
        default: false
      }
    ]);

    if (!confirm) {
      console.log(chalk.yellow('⚠ Reset cancelled.\n'));
      return;
    }
  }

  if (config.resetConfig()) {
    console.log(chalk.green('✓ Configuration reset successfully.\n'));
    console.log(chalk.blue('Run "git-scribe setup" to configure again.\n'));
  } else {
    console.log(chalk.red('❌ Failed to reset configuration.\n'));
  }
}
