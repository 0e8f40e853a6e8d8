#!/usr/bin/env node

import { Command } from "commander";
import updateNotifier from "update-notifier";
import pkg from "../package.json";
import { DEFAULT_CONFIG_FILENAME } from "./config";
import {
  checkCommand,
  collectTag,
  initCommand,
  listCommand,
  newCommand,
  parseCount,
  parseDateOption,
  parseLimit,
  searchCommand,
  serveCommand,
  showCommand,
  tagsCommand,
} from "./cli/commands";
import type {
  CheckCommandOptions,
  InitOptions,
  JsonOptions,
  ListOptions,
  NewOptions,
  ServeOptions,
  ShowOptions,
} from "./cli/commands";
import { errorMessage } from "./errors";

const notifier = updateNotifier({
  pkg,
  updateCheckInterval: 1000 * 60 * 60 * 24,
});
notifier.notify({
  isGlobal: true,
});

const program = new Command();
program.name("postshelf").description("Front-matter checks, listings and previews for a folder of posts").version(pkg.version);

program
  .command("init")
  .description(`Create a ${DEFAULT_CONFIG_FILENAME} config file in the current directory`)
  .option("-f, --force", "overwrite existing config file", false)
  .action(async (options: InitOptions) => {
    process.exitCode = await initCommand(process.cwd(), options);
  });

program
  .command("list")
  .alias("ls")
  .description("List posts, newest first")
  .option("-t, --tag <tag>", "only posts carrying this tag")
  .option("-n, --limit <count>", "show at most this many posts", parseLimit)
  .option("--by-year", "group the listing by year", false)
  .option("--json", "print JSON", false)
  .option("-v, --verbose", "show configuration and loading details", false)
  .option("--path <path>", "use the project configuration from a specific path")
  .action(async (options: ListOptions) => {
    process.exitCode = await listCommand(options);
  });

program
  .command("tags")
  .description("List tags with the number of posts using each")
  .option("--json", "print JSON", false)
  .option("-v, --verbose", "show configuration and loading details", false)
  .option("--path <path>", "use the project configuration from a specific path")
  .action(async (options: JsonOptions) => {
    process.exitCode = await tagsCommand(options);
  });

program
  .command("search")
  .description("Find posts whose title, description or tags match a query")
  .argument("<query>", "text to look for")
  .option("--json", "print JSON", false)
  .option("-v, --verbose", "show configuration and loading details", false)
  .option("--path <path>", "use the project configuration from a specific path")
  .action(async (query: string, options: JsonOptions) => {
    process.exitCode = await searchCommand(query, options);
  });

program
  .command("show")
  .description("Print a post's metadata and body")
  .argument("<slug>", "post slug (file name without the date prefix)")
  .option("--html", "print the rendered HTML instead of the Markdown body", false)
  .option("-v, --verbose", "show configuration and loading details", false)
  .option("--path <path>", "use the project configuration from a specific path")
  .action(async (slug: string, options: ShowOptions) => {
    process.exitCode = await showCommand(slug, options);
  });

program
  .command("check")
  .description("Validate front matter, dates, ordering and links of every post")
  .option("--max-warnings <count>", "fail when there are more warnings than this", parseCount)
  .option("--json", "print the report as JSON", false)
  .option("-v, --verbose", "show configuration and loading details", false)
  .option("--path <path>", "use the project configuration from a specific path")
  .action(async (options: CheckCommandOptions) => {
    process.exitCode = await checkCommand(options);
  });

program
  .command("new")
  .description("Scaffold a new post with valid front matter")
  .argument("<title>", "title of the post")
  .option("-t, --tag <tag>", "tag the post (repeatable)", collectTag)
  .option("-d, --description <text>", "short summary")
  .option("--image <path>", "illustrative image reference")
  .option("--date <date>", "publication date (defaults to now)", parseDateOption)
  .option("-f, --force", "overwrite an existing file with the same name", false)
  .option("--dry-run", "print the document instead of writing it", false)
  .option("-v, --verbose", "show configuration and loading details", false)
  .option("--path <path>", "use the project configuration from a specific path")
  .action(async (title: string, options: NewOptions) => {
    process.exitCode = await newCommand(title, options);
  });

program
  .command("serve")
  .description("Serve the posts as a read-only JSON API")
  .option("-p, --port <port>", "port to listen on", parseCount)
  .option("-v, --verbose", "show configuration and loading details", false)
  .option("--path <path>", "use the project configuration from a specific path")
  .action(async (options: ServeOptions) => {
    await serveCommand(options);
  });

program.configureHelp({
  sortSubcommands: true,
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
