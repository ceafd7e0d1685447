import { confirm } from "@inquirer/prompts";
import { supportsColor } from "chalk";

/**
 * Everything the commands read from or write to the terminal. Reports go
 * to stdout; prompts and logs go to stderr so that `--json` output can be
 * piped.
 */
export interface CliIO {
  write(text: string): void;
  writeError(text: string): void;
  confirm(message: string): Promise<boolean>;
  colors: boolean;
}

export function processIO(): CliIO {
  return {
    write: (text) => {
      process.stdout.write(text);
    },
    writeError: (text) => {
      process.stderr.write(text);
    },
    confirm: (message) => confirm({ message, default: false }, { output: process.stderr }),
    colors: supportsColor !== false,
  };
}
