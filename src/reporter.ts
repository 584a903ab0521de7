import chalk from "chalk";
import ora from "ora";

export type ReportStatus = "info" | "success" | "warning" | "error" | "debug";

/**
 * Progress and status output; never affects pipeline results
 */
export interface Reporter {
  track<T>(items: readonly T[], description: string): Iterable<T>;
  report(status: ReportStatus, detail: string): void;
}

export const silentReporter: Reporter = {
  track<T>(items: readonly T[]): Iterable<T> {
    return items;
  },
  report(): void {
    // Silent
  },
};

/**
 * Reporter writing ora spinners and chalk lines to the terminal
 */
export function createConsoleReporter(options: { verbose?: boolean } = {}): Reporter {
  return {
    *track<T>(items: readonly T[], description: string): Iterable<T> {
      const spinner = ora(description).start();
      try {
        for (let i = 0; i < items.length; i++) {
          spinner.text = `${description} (${i + 1}/${items.length})`;
          yield items[i];
        }
        spinner.succeed(`${description}: ${items.length} done`);
      } finally {
        if (spinner.isSpinning) {
          spinner.stop();
        }
      }
    },

    report(status: ReportStatus, detail: string): void {
      switch (status) {
        case "success":
          console.log(chalk.green(`✓ ${detail}`));
          break;
        case "warning":
          console.log(chalk.yellow(`⚠ ${detail}`));
          break;
        case "error":
          console.log(chalk.red(`❌ ${detail}`));
          break;
        case "debug":
          if (options.verbose) {
            console.log(chalk.gray(`  ${detail}`));
          }
          break;
        default:
          console.log(chalk.blue(detail));
      }
    },
  };
}
