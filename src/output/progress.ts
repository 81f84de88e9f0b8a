import ora, { Ora } from 'ora';
import chalk from 'chalk';

// [NOTE]: Spinner + console reporter for long-running commands (scan, suggest)
export class ProgressReporter {
  private spinner: Ora | null = null;
  private verbose: boolean;
  private silent: boolean;

  constructor(options?: { verbose?: boolean; silent?: boolean }) {
    this.verbose = options?.verbose ?? false;
    this.silent = options?.silent ?? false;
  }

  start(message: string): void {
    if (this.silent) return;

    this.spinner?.stop();
    this.spinner = ora({ text: message, color: 'cyan' }).start();
  }

  update(message: string): void {
    if (this.silent) return;

    if (this.spinner) {
      this.spinner.text = message;
    } else if (this.verbose) {
      console.log(chalk.gray(`  ${message}`));
    }
  }

  succeed(message: string): void {
    if (this.silent) return;

    if (this.spinner) {
      this.spinner.succeed(chalk.green(message));
      this.spinner = null;
    } else {
      console.log(chalk.green(`✓ ${message}`));
    }
  }

  warn(message: string): void {
    if (this.silent) return;

    if (this.spinner) {
      this.spinner.warn(chalk.yellow(message));
      this.spinner = null;
    } else {
      console.log(chalk.yellow(`⚠ ${message}`));
    }
  }

  // [NOTE]: Detail lines pause the spinner so they do not interleave with it
  verboseLog(message: string): void {
    if (!this.verbose || this.silent) return;

    const spinnerText = this.spinner?.isSpinning ? this.spinner.text : null;
    this.spinner?.stop();

    console.log(chalk.gray(`  ${message}`));

    if (spinnerText) {
      this.spinner = ora({ text: spinnerText, color: 'cyan' }).start();
    }
  }

  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}
