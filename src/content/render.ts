import GithubSlugger from "github-slugger";
import { Marked } from "marked";
import { extractHeadings } from "./markdown";
import type { Heading, Post } from "./types";

export interface RenderedPost {
  html: string;
  headings: Heading[];
}

/** Heading ids follow the same slugging as `extractHeadings`, so a table of contents links up. */
export const renderMarkdown = async (markdown: string): Promise<string> => {
  const slugger = new GithubSlugger();
  const parser = new Marked({
    gfm: true,
    renderer: {
      heading(text, level, raw) {
        return `<h${level} id="${slugger.slug(raw)}">${text}</h${level}>\n`;
      },
    },
  });
  return parser.parse(markdown);
};

export const renderPost = async (post: Post): Promise<RenderedPost> => ({
  html: await renderMarkdown(post.body),
  headings: extractHeadings(post.body),
});
