import chalk from 'chalk';

class Logger {
  /**
   * Check if debug mode is enabled
   * Debug mode controls console output of debug messages
   * @returns true if AUTHFORWARD_DEBUG environment variable is set to 'true' or '1'
   */
  isDebugMode(): boolean {
    return process.env.AUTHFORWARD_DEBUG === 'true' || process.env.AUTHFORWARD_DEBUG === '1';
  }

  /**
   * Write one request log block to stdout.
   * A block is emitted with a single write so concurrent requests never
   * interleave inside each other's output.
   */
  block(text: string): void {
    process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isDebugMode()) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    console.log(chalk.white(message), ...args);
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`✓ ${message}`), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`⚠ ${message}`), ...args);
  }

  error(message: string, error?: Error | unknown): void {
    console.error(chalk.red(`✗ ${message}`));
    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.message));
        if (error.stack && this.isDebugMode()) {
          console.error(chalk.white(error.stack));
        }
      } else {
        console.error(chalk.red(String(error)));
      }
    }
  }
}

export const logger = new Logger();
