import chalk from "chalk";
import type { LogLevel } from "../types.js";

export class Logger {
  private readonly verbose: boolean;

  constructor(verbose: boolean) {
    this.verbose = verbose;
  }

  info(message: string): void {
    console.log(chalk.cyan(`[INFO] ${message}`));
  }

  success(message: string): void {
    console.log(chalk.green(message));
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`[WARN] ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`[ERROR] ${message}`));
  }

  verboseLog(message: string): void {
    if (this.verbose) {
      console.log(chalk.gray(`[VERBOSE] ${message}`));
    }
  }

  /** Write a line on behalf of a channel, tagged with its name, at the given level. */
  channel(source: string, level: LogLevel, message: string): void {
    const line = `${chalk.bold(`[${source}]`)} ${message}`;
    switch (level) {
      case "error":
        this.error(line);
        break;
      case "warn":
        this.warn(line);
        break;
      case "verbose":
        this.verboseLog(line);
        break;
      default:
        this.info(line);
    }
  }
}
