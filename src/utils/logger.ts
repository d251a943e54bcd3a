import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
   debug: 0,
   info: 1,
   warn: 2,
   error: 3,
   silent: 4,
};

/** Levelled console logger used by the pipeline and the CLI. */
class Logger {
   private level: LogLevel = "info";

   setLevel(level: LogLevel): void {
      this.level = level;
   }

   private shouldLog(level: LogLevel): boolean {
      return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
   }

   debug(message: string, data?: Record<string, unknown>): void {
      if (!this.shouldLog("debug")) return;
      console.log(chalk.gray(`[DEBUG] ${message}`));
      if (data) console.log(chalk.gray(JSON.stringify(data, null, 2)));
   }

   info(message: string): void {
      if (!this.shouldLog("info")) return;
      console.log(message);
   }

   warn(message: string): void {
      if (!this.shouldLog("warn")) return;
      console.warn(chalk.yellow(message));
   }

   error(message: string, error?: unknown): void {
      if (!this.shouldLog("error")) return;
      console.error(chalk.red(message));
      if (error instanceof Error && this.shouldLog("debug")) {
         console.error(chalk.red(error.stack ?? error.message));
      }
   }

   success(message: string): void {
      if (!this.shouldLog("info")) return;
      console.log(chalk.green(`✅ ${message}`));
   }
}

export const logger = new Logger();
