import path from "path";
import type { Server } from "http";
import fsExtra from "fs-extra";
import { InvalidOptionArgumentError } from "commander";
import { DEFAULT_CONFIG_FILENAME, buildDefaultConfig, configExists, writeConfig } from "../config";
import { checkCollection, formatIssue } from "../content/check";
import { findPostBySlug, getAllTags, getPostsByTag, groupByYear, searchPosts } from "../content/collection";
import { parsePostDate } from "../content/dates";
import { toSummary } from "../content/post";
import { renderPost } from "../content/render";
import { createPostDocument, writeNewPost } from "../content/scaffold";
import type { Post } from "../content/types";
import { withCollection, withConfig } from "../project/context";
import type { BaseCommandOptions } from "../project/context";
import { createApp, startServer } from "../server/app";
import { confirmPrompt, createLogger } from "./ui";

/** Each command resolves to the exit code the process should end with. */
export type ExitCode = 0 | 1;

export const parseCount = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidOptionArgumentError("Not a number.");
  }
  return parsed;
};

export const parseLimit = (value: string): number => {
  const parsed = parseCount(value);
  if (parsed === 0) {
    throw new InvalidOptionArgumentError("The limit must be at least 1.");
  }
  return parsed;
};

export const parseDateOption = (value: string): Date => {
  const parsed = parsePostDate(value);
  if (!parsed) {
    throw new InvalidOptionArgumentError("Expected a date such as 2024-05-01 or 2024-05-01 09:30:00 +0200.");
  }
  return parsed;
};

export const collectTag = (value: string, previous: string[] = []): string[] => [...previous, value];

const formatListDate = (post: Post): string => post.date.toISOString().slice(0, 10);

const printPostLine = (post: Post): void => {
  const tags = post.tags.length ? `  [${post.tags.join(", ")}]` : "";
  console.log(`  ${formatListDate(post)}  ${post.slug}  ${post.title}${tags}`);
};

export interface InitOptions {
  force: boolean;
}

export interface ListOptions extends BaseCommandOptions {
  tag?: string;
  json: boolean;
  limit?: number;
  byYear: boolean;
}

export interface JsonOptions extends BaseCommandOptions {
  json: boolean;
}

export interface ShowOptions extends BaseCommandOptions {
  html: boolean;
}

export interface CheckCommandOptions extends JsonOptions {
  maxWarnings?: number;
}

export interface NewOptions extends BaseCommandOptions {
  tag?: string[];
  description?: string;
  image?: string;
  date?: Date;
  force: boolean;
  dryRun: boolean;
}

export interface ServeOptions extends BaseCommandOptions {
  port?: number;
}

export const initCommand = async (targetDir: string, options: InitOptions): Promise<ExitCode> => {
  const configPath = path.join(targetDir, DEFAULT_CONFIG_FILENAME);

  if (await configExists(targetDir)) {
    if (!options.force) {
      console.error(`Config file already exists: ${configPath}`);
      console.error("Use --force to overwrite.");
      return 1;
    }
    console.log(`Overwriting existing config: ${configPath}`);
  }

  const config = buildDefaultConfig();
  const writtenPath = await writeConfig(targetDir, config);
  console.log(`Created config: ${writtenPath}`);
  console.log("");
  console.log("Configuration scaffold:");
  console.log(`  contentDir: ${config.contentDir}`);
  console.log(`  layouts: ${(config.layouts ?? []).join(", ")}`);
  console.log("");
  console.log("Edit the config file to customize:");
  console.log("  - Point 'assetsDir' at the site root to check post images");
  console.log("  - Set 'strictKeys' to flag unknown front matter keys");
  console.log("");
  console.log("Check your posts with: postshelf check");
  return 0;
};

export const listCommand = async (options: ListOptions): Promise<ExitCode> => {
  const { collection } = await withCollection(options);
  let posts = options.tag ? getPostsByTag(collection.posts, options.tag) : collection.posts;
  if (options.limit !== undefined) {
    posts = posts.slice(0, options.limit);
  }

  if (options.json) {
    console.log(JSON.stringify(posts.map(toSummary), null, 2));
    return 0;
  }

  if (posts.length === 0) {
    console.log(options.tag ? `No posts tagged '${options.tag}'.` : "No posts found.");
    console.log("Create one with: postshelf new <title>");
    return 0;
  }

  if (options.byYear) {
    for (const group of groupByYear(posts)) {
      console.log(`${group.year}`);
      group.posts.forEach(printPostLine);
    }
    return 0;
  }

  console.log(`Found ${posts.length} post(s):\n`);
  posts.forEach(printPostLine);
  return 0;
};

export const tagsCommand = async (options: JsonOptions): Promise<ExitCode> => {
  const { collection } = await withCollection(options);
  const tags = getAllTags(collection.posts);

  if (options.json) {
    console.log(JSON.stringify(tags, null, 2));
    return 0;
  }
  if (tags.length === 0) {
    console.log("No tags found.");
    return 0;
  }
  for (const tag of tags) {
    console.log(`  ${tag.name} (${tag.count})`);
  }
  return 0;
};

export const searchCommand = async (query: string, options: JsonOptions): Promise<ExitCode> => {
  const { collection } = await withCollection(options);
  const posts = searchPosts(collection.posts, query);

  if (options.json) {
    console.log(JSON.stringify(posts.map(toSummary), null, 2));
    return 0;
  }
  if (posts.length === 0) {
    console.log(`No posts match '${query}'.`);
    return 0;
  }
  posts.forEach(printPostLine);
  return 0;
};

export const showCommand = async (slug: string, options: ShowOptions): Promise<ExitCode> => {
  const { collection } = await withCollection(options);
  const post = findPostBySlug(collection.posts, slug);
  if (!post) {
    console.error(`Post '${slug}' not found.`);
    return 1;
  }

  console.log(`Title       : ${post.title}`);
  console.log(`Date        : ${post.date.toISOString()}`);
  console.log(`Layout      : ${post.layout}`);
  console.log(`File        : ${post.id}`);
  console.log(`Tags        : ${post.tags.length ? post.tags.join(", ") : "(none)"}`);
  if (post.description) {
    console.log(`Description : ${post.description}`);
  }
  if (post.image) {
    console.log(`Image       : ${post.image}`);
  }
  console.log("");

  if (options.html) {
    const { html } = await renderPost(post);
    console.log(html);
  } else {
    console.log(post.body.trim());
  }
  return 0;
};

export const checkCommand = async (options: CheckCommandOptions): Promise<ExitCode> => {
  const { collection, resolved } = await withCollection(options);
  const logger = createLogger(Boolean(options.verbose) || options.json);

  if (!options.json) {
    logger.start(`Checking ${collection.files.length} document(s)...`);
  }
  const report = await checkCollection(collection, { assetsDir: resolved.content.assetsDir });
  const tooManyWarnings = options.maxWarnings !== undefined && report.warningCount > options.maxWarnings;
  const failed = report.errorCount > 0 || tooManyWarnings;

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return failed ? 1 : 0;
  }

  const summary = `${report.files} document(s), ${report.errorCount} error(s), ${report.warningCount} warning(s)`;
  if (failed) {
    logger.fail(summary);
  } else if (report.warningCount > 0) {
    logger.warn(summary);
  } else {
    logger.succeed(summary);
  }

  for (const issue of report.issues) {
    console.log(formatIssue(issue));
  }
  if (tooManyWarnings) {
    console.log(`Warning limit of ${options.maxWarnings} exceeded.`);
  }
  return failed ? 1 : 0;
};

export const newCommand = async (title: string, options: NewOptions): Promise<ExitCode> => {
  const { resolved } = await withConfig(options);
  const layout = resolved.schema.layouts[0] ?? "post";
  const input = {
    title,
    date: options.date,
    description: options.description,
    image: options.image,
    tags: options.tag,
  };

  if (options.dryRun) {
    const document = createPostDocument(input, layout);
    console.log(`# ${document.fileName}`);
    console.log(document.contents);
    return 0;
  }

  let force = options.force;
  const { fileName } = createPostDocument(input, layout);
  const target = path.join(resolved.content.dir, fileName);
  if (!force && (await fsExtra.pathExists(target))) {
    force = await confirmPrompt(`${target} already exists. Overwrite?`);
    if (!force) {
      console.log("Aborted.");
      return 0;
    }
  }

  const written = await writeNewPost(resolved.content.dir, input, { layout, force });
  console.log(`Created post: ${written}`);
  return 0;
};

export const serveCommand = async (options: ServeOptions): Promise<Server> => {
  const logger = createLogger(Boolean(options.verbose));
  logger.start("Loading posts...");

  try {
    const { collection, resolved } = await withCollection(options);
    if (collection.issues.length > 0) {
      logger.info(`${collection.issues.length} issue(s) found while loading; run \`postshelf check\` for details`);
    }

    const app = createApp(collection, { corsOrigin: resolved.server.corsOrigin });
    const port = options.port ?? resolved.server.port;
    const server = await startServer(app, port);
    logger.succeed(`API server listening on http://localhost:${port} (${collection.posts.length} posts)`);
    return server;
  } catch (err) {
    logger.fail("Failed to start API server");
    throw err;
  }
};
