import path from "path";
import os from "os";
import yaml from "yaml";
import fsExtra from "fs-extra";
import { ConfigError } from "./errors";
import { runCommand } from "./utils";
import type { SchemaOptions } from "./content/types";

export const DEFAULT_CONFIG_FILENAME = ".postshelf.yml";
export const DEFAULT_CONTENT_DIR = "_posts";
export const DEFAULT_LAYOUTS = ["post"];
export const DEFAULT_PORT = 5172;

interface ServerConfig {
  port?: number;
  corsOrigin?: string;
}

export interface ShelfConfig {
  contentDir?: string;
  layouts?: string[];
  assetsDir?: string;
  strictKeys?: boolean;
  requireDescription?: boolean;
  server?: ServerConfig;
  [key: string]: unknown;
}

/** A config file as decoded, before validation. */
export type RawShelfConfig = Record<string, unknown>;

export interface ResolvedShelfConfig {
  raw: RawShelfConfig;
  paths: {
    projectDir: string;
    configFile: string;
  };
  content: {
    dir: string;
    assetsDir: string | null;
  };
  schema: SchemaOptions;
  server: {
    port: number;
    corsOrigin: string;
  };
}

interface FindProjectOptions {
  path?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const discoverRepoRoot = async (cwd: string = process.cwd()): Promise<string> => {
  try {
    const { stdout } = await runCommand("git", ["rev-parse", "--show-toplevel"], {
      cwd,
    });
    return stdout || cwd;
  } catch {
    return cwd;
  }
};

export const findProjectDir = async (options: FindProjectOptions = {}): Promise<string> => {
  const startDir = options.path ? path.resolve(options.path) : process.cwd();
  const repoRoot = await discoverRepoRoot(startDir);
  const homeDir = os.homedir();

  let currentDir = startDir;

  while (true) {
    const configPath = path.join(currentDir, DEFAULT_CONFIG_FILENAME);
    if (await fsExtra.pathExists(configPath)) {
      return currentDir;
    }

    if (currentDir === repoRoot || currentDir === homeDir || currentDir === "/") {
      break;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  throw new Error(
    `No ${DEFAULT_CONFIG_FILENAME} found from ${startDir} to ${repoRoot}. ` +
      `Run \`postshelf init\` in the directory that holds your posts.`,
  );
};

export const buildDefaultConfig = (): ShelfConfig => ({
  contentDir: DEFAULT_CONTENT_DIR,
  layouts: [...DEFAULT_LAYOUTS],
  strictKeys: false,
  requireDescription: false,
  server: {
    port: DEFAULT_PORT,
    corsOrigin: "*",
  },
});

export const configExists = async (
  configDir: string,
  filename: string = DEFAULT_CONFIG_FILENAME,
): Promise<boolean> => fsExtra.pathExists(path.join(configDir, filename));

export const writeConfig = async (
  configDir: string,
  config: ShelfConfig,
  options: { filename?: string } = {},
): Promise<string> => {
  const configPath = path.join(configDir, options.filename || DEFAULT_CONFIG_FILENAME);
  const yamlContents = yaml.stringify(config, { indent: 2 });
  await fsExtra.writeFile(configPath, yamlContents, "utf8");
  return configPath;
};

export const loadConfig = async (
  configDir: string,
  filename: string = DEFAULT_CONFIG_FILENAME,
): Promise<RawShelfConfig> => {
  const configPath = path.join(configDir, filename);
  const contents = await fsExtra.readFile(configPath, "utf8");
  const parsed: unknown = yaml.parse(contents);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(filename, "expected a mapping at the top level");
  }
  return parsed;
};

const readString = (value: unknown, key: string): string | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(key, "expected a non-empty string");
  }
  return value;
};

const readBoolean = (value: unknown, key: string, fallback: boolean): boolean => {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(key, "expected true or false");
  }
  return value;
};

const readPort = (value: unknown, key: string): number | undefined => {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  const port = typeof value === "number" ? value : Number.parseInt(String(value), 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(key, `expected a port number, got ${String(value)}`);
  }
  return port;
};

const readLayouts = (value: unknown): string[] => {
  if (value === undefined || value === null) {
    return [...DEFAULT_LAYOUTS];
  }
  if (typeof value === "string") {
    return [value];
  }
  if (!Array.isArray(value) || value.some((layout) => typeof layout !== "string" || !layout.trim())) {
    throw new ConfigError("layouts", "expected a list of layout names");
  }
  return value.map((layout: string) => layout.trim());
};

const resolvePath = (value: string, projectDir: string): string => {
  const expanded = value.startsWith("~/") ? path.join(os.homedir(), value.slice(2)) : value;
  return path.isAbsolute(expanded) ? expanded : path.join(projectDir, expanded);
};

export const resolveConfig = (
  config: RawShelfConfig,
  projectDir: string,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedShelfConfig => {
  const contentDir = readString(config.contentDir, "contentDir") ?? DEFAULT_CONTENT_DIR;
  const assetsDir = readString(config.assetsDir, "assetsDir");

  const server: unknown = config.server ?? {};
  if (!isRecord(server)) {
    throw new ConfigError("server", "expected a mapping");
  }

  const port =
    readPort(env.POSTSHELF_PORT, "POSTSHELF_PORT") ?? readPort(server.port, "server.port") ?? DEFAULT_PORT;
  const corsOrigin =
    readString(env.POSTSHELF_CORS_ORIGIN || undefined, "POSTSHELF_CORS_ORIGIN") ??
    readString(server.corsOrigin, "server.corsOrigin") ??
    "*";

  return {
    raw: config,
    paths: {
      projectDir,
      configFile: path.join(projectDir, DEFAULT_CONFIG_FILENAME),
    },
    content: {
      dir: resolvePath(contentDir, projectDir),
      assetsDir: assetsDir ? resolvePath(assetsDir, projectDir) : null,
    },
    schema: {
      layouts: readLayouts(config.layouts),
      strictKeys: readBoolean(config.strictKeys, "strictKeys", false),
      requireDescription: readBoolean(config.requireDescription, "requireDescription", false),
    },
    server: {
      port,
      corsOrigin,
    },
  };
};
