import { spawn } from "child_process";
import fsExtra from "fs-extra";
import ora from "ora";
import { CommandError } from "./errors";

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

const normalizeEnv = (env?: NodeJS.ProcessEnv): NodeJS.ProcessEnv => {
  if (!env) {
    return process.env;
  }
  return { ...process.env, ...env };
};

export const runCommand = (
  command: string,
  args: string[] = [],
  options: CommandOptions = {},
): Promise<CommandResult> =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: normalizeEnv(options.env),
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (err) => {
      reject(err);
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve({ stdout: stdout.trim(), stderr: stderr.trim() });
      } else {
        reject(new CommandError(command, args, code ?? 1, stdout, stderr));
      }
    });
  });

export const ensureDir = async (dirPath: string): Promise<void> => {
  await fsExtra.mkdirp(dirPath);
};

/** Relative paths are reported with forward slashes on every platform. */
export const toPosixPath = (value: string): string => value.split("\\").join("/");

export { ora };
