import path from "path";
import fsExtra from "fs-extra";
import type { Collection } from "./collection";
import { dateFromFilename } from "./dates";
import { checkLinkTarget, isExternalLink } from "./links";
import { extractLinks } from "./markdown";
import type { Issue, Post } from "./types";

export interface CheckOptions {
  /** Site root that absolute `img` paths resolve against. Image checks are skipped without it. */
  assetsDir?: string | null;
}

export interface CheckReport {
  files: number;
  posts: number;
  issues: Issue[];
  errorCount: number;
  warningCount: number;
}

const compareIssues = (a: Issue, b: Issue): number => {
  if (a.file !== b.file) {
    return a.file < b.file ? -1 : 1;
  }
  return (a.line ?? 0) - (b.line ?? 0);
};

const checkBody = (post: Post): Issue[] => {
  const issues: Issue[] = [];

  for (const link of extractLinks(post.body, post.bodyLine)) {
    const problem = checkLinkTarget(link.target, { enclosed: link.enclosed });
    if (problem) {
      issues.push({ file: post.id, line: link.line, severity: "error", rule: "link-target", message: problem });
    }
  }

  for (const block of post.codeBlocks) {
    if (!block.closed) {
      issues.push({
        file: post.id,
        line: block.line,
        severity: "error",
        rule: "unclosed-fence",
        message: "Code fence is never closed",
      });
    } else if (!block.language) {
      issues.push({
        file: post.id,
        line: block.line,
        severity: "warning",
        rule: "code-language",
        message: "Code block has no language tag",
      });
    }
  }

  return issues;
};

const checkFilenameDate = (post: Post): Issue | null => {
  const fromName = dateFromFilename(path.basename(post.id));
  if (!fromName || fromName === post.calendarDate) {
    return null;
  }
  return {
    file: post.id,
    line: 1,
    severity: "warning",
    rule: "filename-date",
    message: `File name date ${fromName} does not match front matter date ${post.calendarDate}`,
  };
};

const checkImage = async (post: Post, assetsDir: string): Promise<Issue | null> => {
  if (!post.image || isExternalLink(post.image)) {
    return null;
  }
  const imagePath = path.join(assetsDir, post.image.replace(/^\/+/, ""));
  if (await fsExtra.pathExists(imagePath)) {
    return null;
  }
  return {
    file: post.id,
    line: 1,
    severity: "warning",
    rule: "missing-image",
    message: `Image "${post.image}" not found under ${assetsDir}`,
  };
};

const checkOrdering = (posts: Post[]): Issue[] => {
  const issues: Issue[] = [];
  const bySlug = new Map<string, string>();
  const byTime = new Map<number, string>();

  const ordered = [...posts].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  for (const post of ordered) {
    const slugOwner = bySlug.get(post.slug);
    if (slugOwner) {
      issues.push({
        file: post.id,
        line: 1,
        severity: "error",
        rule: "duplicate-slug",
        message: `Slug "${post.slug}" is already used by ${slugOwner}`,
      });
    } else {
      bySlug.set(post.slug, post.id);
    }

    const time = post.date.getTime();
    const timeOwner = byTime.get(time);
    if (timeOwner) {
      issues.push({
        file: post.id,
        line: 1,
        severity: "warning",
        rule: "date-tie",
        message: `Published at the same instant as ${timeOwner}; listing falls back to file name order`,
      });
    } else {
      byTime.set(time, post.id);
    }
  }

  return issues;
};

export const checkCollection = async (collection: Collection, options: CheckOptions = {}): Promise<CheckReport> => {
  const issues: Issue[] = [...collection.issues];

  for (const post of collection.posts) {
    issues.push(...checkBody(post));

    const filenameIssue = checkFilenameDate(post);
    if (filenameIssue) {
      issues.push(filenameIssue);
    }

    if (options.assetsDir) {
      const imageIssue = await checkImage(post, options.assetsDir);
      if (imageIssue) {
        issues.push(imageIssue);
      }
    }
  }

  issues.push(...checkOrdering(collection.posts));
  issues.sort(compareIssues);

  return {
    files: collection.files.length,
    posts: collection.posts.length,
    issues,
    errorCount: issues.filter((issue) => issue.severity === "error").length,
    warningCount: issues.filter((issue) => issue.severity === "warning").length,
  };
};

export const formatIssue = (issue: Issue): string => {
  const location = issue.line ? `${issue.file}:${issue.line}` : issue.file;
  return `${location}: ${issue.severity}: ${issue.message} [${issue.rule}]`;
};
