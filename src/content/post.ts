import path from "path";
import fsExtra from "fs-extra";
import { FrontMatterError } from "../errors";
import { toPosixPath } from "../utils";
import { splitFrontMatter, type FrontMatterResult } from "./frontmatter";
import { extractCodeBlocks } from "./markdown";
import { DEFAULT_SCHEMA_OPTIONS, validateFrontMatter } from "./schema";
import type { Issue, Post, PostSummary, SchemaOptions } from "./types";

const FILENAME_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}-/;
const MARKDOWN_EXTENSION = /\.(md|markdown)$/i;

export interface LoadResult {
  post?: Post;
  issues: Issue[];
}

export const slugFromFilename = (fileName: string): string =>
  path.basename(fileName).replace(MARKDOWN_EXTENSION, "").replace(FILENAME_DATE_PREFIX, "");

export const parsePost = (
  source: string,
  id: string,
  options: SchemaOptions = DEFAULT_SCHEMA_OPTIONS,
): LoadResult => {
  let document: FrontMatterResult;
  try {
    document = splitFrontMatter(source);
  } catch (error) {
    if (error instanceof FrontMatterError) {
      return {
        issues: [{ file: id, line: error.line, severity: "error", rule: "front-matter", message: error.message }],
      };
    }
    throw error;
  }

  const { metadata, problems } = validateFrontMatter(document.data, options);
  const issues: Issue[] = problems.map((problem) => ({
    file: id,
    line: (problem.key && document.keyLines[problem.key]) || 1,
    severity: problem.severity,
    rule: problem.rule,
    message: problem.message,
  }));

  if (!metadata) {
    return { issues };
  }

  return {
    post: {
      ...metadata,
      id,
      slug: slugFromFilename(id),
      body: document.body,
      bodyLine: document.bodyLine,
      codeBlocks: extractCodeBlocks(document.body, document.bodyLine),
    },
    issues,
  };
};

export const loadPost = async (
  filePath: string,
  contentDir: string,
  options: SchemaOptions = DEFAULT_SCHEMA_OPTIONS,
): Promise<LoadResult> => {
  const source = await fsExtra.readFile(filePath, "utf8");
  return parsePost(source, toPosixPath(path.relative(contentDir, filePath)), options);
};

export const toSummary = (post: Post): PostSummary => ({
  id: post.id,
  slug: post.slug,
  layout: post.layout,
  title: post.title,
  date: post.date.toISOString(),
  description: post.description,
  image: post.image,
  tags: post.tags,
});
