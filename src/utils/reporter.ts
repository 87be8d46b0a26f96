// Console reporters for headline and progress output.
import chalk from "chalk";
import type { Reporter } from "../generator/types";

export interface ConsoleReporterOptions {
  /** Force colour on or off. Defaults to chalk's terminal detection. */
  color?: boolean;
  /** Line sink, console.log by default. */
  write?: (line: string) => void;
}

/**
 * Headlines print bold cyan after a blank line; progress lines print dim and indented.
 */
export function createConsoleReporter(options: ConsoleReporterOptions = {}): Reporter {
  const style =
    options.color === undefined ? chalk : new chalk.Instance({ level: options.color ? 1 : 0 });
  const write = options.write ?? ((line: string) => console.log(line));

  return {
    headline(message: string) {
      write("");
      write(style.bold.cyan(message.trimEnd()));
    },
    progress(message: string) {
      write(style.dim(`  ${message}`));
    },
  };
}

export const silentReporter: Reporter = {
  headline() {},
  progress() {},
};
