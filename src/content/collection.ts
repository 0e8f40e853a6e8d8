import fs from "fs";
import path from "path";
import fsExtra from "fs-extra";
import { NotFoundError } from "../errors";
import { loadPost } from "./post";
import { DEFAULT_SCHEMA_OPTIONS } from "./schema";
import type { Issue, Post, SchemaOptions } from "./types";

const MARKDOWN_FILE = /\.(md|markdown)$/i;

export interface Collection {
  contentDir: string;
  files: string[];
  posts: Post[];
  issues: Issue[];
}

export interface TagWithCount {
  name: string;
  count: number;
}

export interface YearGroup {
  year: number;
  posts: Post[];
}

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Newest first. Posts sharing a timestamp fall back to file name order. */
export const sortPosts = (posts: Post[]): Post[] =>
  [...posts].sort((a, b) => b.date.getTime() - a.date.getTime() || compareIds(a.id, b.id));

export const listMarkdownFiles = async (contentDir: string): Promise<string[]> => {
  if (!(await fsExtra.pathExists(contentDir))) {
    throw new NotFoundError(`Content directory not found: ${contentDir}`);
  }
  const entries = await fs.promises.readdir(contentDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && MARKDOWN_FILE.test(entry.name))
    .filter((entry) => !entry.name.startsWith(".") && !entry.name.startsWith("_"))
    .map((entry) => entry.name)
    .sort(compareIds);
};

export const loadCollection = async (
  contentDir: string,
  options: SchemaOptions = DEFAULT_SCHEMA_OPTIONS,
): Promise<Collection> => {
  const files = await listMarkdownFiles(contentDir);
  const results = await Promise.all(files.map((file) => loadPost(path.join(contentDir, file), contentDir, options)));

  const posts: Post[] = [];
  const issues: Issue[] = [];
  for (const result of results) {
    if (result.post) {
      posts.push(result.post);
    }
    issues.push(...result.issues);
  }

  return { contentDir, files, posts: sortPosts(posts), issues };
};

export const findPostBySlug = (posts: Post[], slug: string): Post | undefined =>
  posts.find((post) => post.slug === slug);

/** Tags compare case-insensitively, as in `getPostsByTag`; the newest post's spelling names the tag. */
export const getAllTags = (posts: Post[]): TagWithCount[] => {
  const tagMap = new Map<string, TagWithCount>();

  sortPosts(posts).forEach((post) => {
    post.tags.forEach((tag) => {
      const key = tag.toLowerCase();
      const entry = tagMap.get(key);
      if (entry) {
        entry.count += 1;
      } else {
        tagMap.set(key, { name: tag, count: 1 });
      }
    });
  });

  return Array.from(tagMap.values()).sort((a, b) => b.count - a.count || compareIds(a.name, b.name));
};

export const getPostsByTag = (posts: Post[], tag: string): Post[] => {
  const wanted = tag.toLowerCase();
  return sortPosts(posts.filter((post) => post.tags.some((candidate) => candidate.toLowerCase() === wanted)));
};

export const searchPosts = (posts: Post[], query: string): Post[] => {
  if (!query.trim()) {
    return [];
  }

  const lowerQuery = query.trim().toLowerCase();

  return sortPosts(
    posts.filter((post) => {
      const matchTitle = post.title.toLowerCase().includes(lowerQuery);
      const matchDescription = (post.description ?? "").toLowerCase().includes(lowerQuery);
      const matchTags = post.tags.some((tag) => tag.toLowerCase().includes(lowerQuery));

      return matchTitle || matchDescription || matchTags;
    }),
  );
};

export const groupByYear = (posts: Post[]): YearGroup[] => {
  const groups: YearGroup[] = [];
  for (const post of sortPosts(posts)) {
    const year = post.date.getUTCFullYear();
    const current = groups[groups.length - 1];
    if (current && current.year === year) {
      current.posts.push(post);
    } else {
      groups.push({ year, posts: [post] });
    }
  }
  return groups;
};
