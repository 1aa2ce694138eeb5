import chalk from "chalk";

export type LogStyle = "info" | "err" | "warn" | "done" | undefined;

const clock = (date: Date): string =>
  [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => String(part).padStart(2, "0"))
    .join(":");

/**
 * Logs a message with timestamp and optional styling
 * @param message - The message to log
 * @param style - The style/type of log message
 */
const log = (message: string, style?: LogStyle): void => {
  const stamp = clock(new Date());

  switch (style) {
    case "info": {
      console.log(chalk.blue(`[INFO] ${stamp} • ${message}`));
      break;
    }

    case "err": {
      console.error(chalk.red(`[ERROR] ${stamp} • ${message}`));
      break;
    }

    case "warn": {
      console.warn(chalk.yellow(`[WARNING] ${stamp} • ${message}`));
      break;
    }

    case "done": {
      console.log(chalk.green(`[SUCCESS] ${stamp} • ${message}`));
      break;
    }

    default: {
      console.log(`${stamp} • ${message}`);
      break;
    }
  }
};

/** Message of an unknown thrown value, for log lines. */
const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export { log, describeError };
