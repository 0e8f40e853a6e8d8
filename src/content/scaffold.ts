import path from "path";
import fsExtra from "fs-extra";
import GithubSlugger from "github-slugger";
import { calendarDateOf, formatPostDate } from "./dates";
import { stringifyFrontMatter } from "./frontmatter";
import { ensureDir } from "../utils";

export interface NewPostInput {
  title: string;
  date?: Date;
  description?: string;
  image?: string;
  tags?: string[];
  body?: string;
}

export interface NewPostDocument {
  fileName: string;
  contents: string;
}

export const slugifyTitle = (title: string): string => new GithubSlugger().slug(title.trim()) || "untitled";

export const createPostDocument = (input: NewPostInput, layout = "post"): NewPostDocument => {
  const title = input.title.trim();
  if (!title) {
    throw new Error("A post needs a title");
  }

  const date = input.date ?? new Date();
  const data: Record<string, unknown> = {
    layout,
    title,
    date: formatPostDate(date),
  };
  if (input.description) {
    data.description = input.description;
  }
  if (input.image) {
    data.img = input.image;
  }
  const tags = [...new Set((input.tags ?? []).map((tag) => tag.trim()))].filter(Boolean);
  if (tags.length > 0) {
    data.tags = tags;
  }

  return {
    fileName: `${calendarDateOf(date)}-${slugifyTitle(title)}.md`,
    contents: stringifyFrontMatter(data, input.body ?? ""),
  };
};

export const writeNewPost = async (
  contentDir: string,
  input: NewPostInput,
  { layout = "post", force = false }: { layout?: string; force?: boolean } = {},
): Promise<string> => {
  const { fileName, contents } = createPostDocument(input, layout);
  const target = path.join(contentDir, fileName);

  if (!force && (await fsExtra.pathExists(target))) {
    throw new Error(`Post already exists: ${target}`);
  }

  await ensureDir(contentDir);
  await fsExtra.writeFile(target, contents, "utf8");
  return target;
};
