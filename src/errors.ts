export class CommandError extends Error {
  command: string;
  args: string[];
  code: number;
  stdout: string;
  stderr: string;

  constructor(command: string, args: string[], code: number, stdout: string, stderr: string) {
    super(`${command} ${args.join(" ")} failed with code ${code}`);
    this.name = "CommandError";
    this.command = command;
    this.args = args;
    this.code = code;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/** Raised while splitting or decoding a document's front matter. `line` is 1-based. */
export class FrontMatterError extends Error {
  line: number;

  constructor(message: string, line: number) {
    super(message);
    this.name = "FrontMatterError";
    this.line = line;
  }
}

export class ConfigError extends Error {
  key: string;

  constructor(key: string, message: string) {
    super(`Invalid config value for "${key}": ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
