/**
 * Status output for CLI commands
 *
 * Results go to stdout through the command's own renderer. When that result is
 * machine readable (JSON, CSV) every status line moves to stderr so the
 * document stays parseable.
 */

import chalk from 'chalk';

export interface OutputManagerOptions {
  debug?: boolean;
  /** stdout carries a JSON or CSV document */
  machineReadable?: boolean;
}

export class OutputManager {
  private readonly isDebugMode: boolean;
  private readonly notice: (line: string) => void;

  constructor(options: OutputManagerOptions = {}) {
    this.isDebugMode = options.debug ?? false;
    this.notice = options.machineReadable ? (line) => console.error(line) : (line) => console.log(line);
  }

  get debugEnabled(): boolean {
    return this.isDebugMode;
  }

  info(message: string): void {
    this.notice(message);
  }

  warn(message: string): void {
    this.notice(chalk.yellow(`⚠️  ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  }

  /**
   * Shown with --debug only; context is printed as one JSON line
   */
  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.isDebugMode) return;
    const line = chalk.blue(`[DEBUG] ${message}`);
    this.notice(context ? `${line} ${JSON.stringify(context)}` : line);
  }
}
