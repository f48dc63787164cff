import chalk from 'chalk';

class Logger {
  private debugEnabled = false;
  private quiet = false;

  enableDebug(): void {
    this.debugEnabled = true;
  }

  disableDebug(): void {
    this.debugEnabled = false;
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  /** Suppress info/success banners; warnings and errors still print */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      console.error(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.quiet) {
      console.log(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`[ERROR] ${message}`), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    if (!this.quiet) {
      console.log(chalk.green(`[SUCCESS] ${message}`), ...args);
    }
  }
}

export const logger = new Logger();
