import readline from "readline";
import { ora } from "../utils";

export interface Logger {
  start(text: string): void;
  succeed(text: string): void;
  warn(text: string): void;
  fail(text: string): void;
  info(text: string): void;
}

type Step = "succeed" | "warn" | "fail" | "info";

/** An ora spinner, or plain lines when verbose output would interleave with it. */
export const createLogger = (verbose: boolean): Logger => {
  const spinner = verbose ? null : ora();

  const finish =
    (step: Step) =>
    (text: string): void => {
      if (spinner) {
        spinner[step](text);
      } else {
        console.log(text);
      }
    };

  return {
    start: (text: string) => {
      if (spinner) {
        spinner.start(text);
      } else {
        console.log(text);
      }
    },
    succeed: finish("succeed"),
    warn: finish("warn"),
    fail: finish("fail"),
    info: finish("info"),
  };
};

export const confirmPrompt = (message: string): Promise<boolean> => {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    rl.question(`${message} (y/N): `, (answer) => {
      rl.close();
      const normalized = answer.trim().toLowerCase();
      resolve(normalized === "y" || normalized === "yes");
    });
  });
};
