import GithubSlugger from "github-slugger";
import { Marked } from "marked";
import type { Tokens, TokensList } from "marked";
import type { CodeBlock, Heading, Link } from "./types";

const HEADING = /^ {0,3}(#{1,6})\s+(.+?)(?:\s+#+)?\s*$/;
const REFERENCE_DEFINITION = /^[ >]*\[([^\]]+)\]:\s*(\S+)/;
const UNPARSED_LINK = /(!?)(?:\[([^\]]*))?\]\(([^)]*)\)/g;
const ENCLOSED_DESTINATION = /\]\(\s*<[^>]*>(?:\s+(?:"[^"]*"|'[^']*'|\([^)]*\)))?\s*\)$/;
const TARGET_WITH_TITLE = /^(\S*)\s+("[^"]*"|'[^']*'|\([^)]*\))$/;
const FENCE_OPEN = /^ *(`{3,}|~{3,})/;

// CommonMark rules only: GFM's bare-URL literals would split a malformed
// destination into a link and loose text.
const markdown = new Marked({ gfm: false });

interface LocatedCode {
  block: CodeBlock;
  /** Zero-based body lines covered, fences included. */
  first: number;
  last: number;
  fenced: boolean;
}

interface BodyScan {
  tokens: TokensList;
  code: LocatedCode[];
  /** Line numbers are zero-based. */
  links: Link[];
}

/**
 * Maps tokens back to body lines. Tokens arrive in document order, so each
 * lookup only searches forward from the previous one. Nested tokens are
 * de-indented by the lexer, hence the second, trimmed attempt.
 */
const createLocator = (source: string) => {
  let cursor = 0;

  const lineOf = (offset: number): number => source.slice(0, offset).split("\n").length - 1;

  const find = (raw: string): number => {
    const firstLine = raw.split("\n")[0];
    for (const needle of [firstLine, firstLine.trimStart()]) {
      const index = needle ? source.indexOf(needle, cursor) : -1;
      if (index !== -1) {
        return index;
      }
    }
    return cursor;
  };

  return {
    mark: (raw: string): number => {
      const index = find(raw);
      cursor = index + 1;
      return lineOf(index);
    },
    skipSpan: (raw: string): void => {
      cursor = find(raw) + raw.length;
    },
    skipLines: (raw: string, count: number): number => {
      const index = find(raw);
      let end = index;
      for (let line = 0; line < count; line += 1) {
        const next = source.indexOf("\n", end);
        end = next === -1 ? source.length : next + 1;
      }
      cursor = end;
      return lineOf(index);
    },
  };
};

const isClosedFence = (lines: string[]): boolean => {
  const marker = FENCE_OPEN.exec(lines[0])?.[1];
  if (!marker || lines.length < 2) {
    return false;
  }
  const closer = new RegExp(`^ {0,3}${marker[0]}{${marker.length},}\\s*$`);
  return closer.test(lines[lines.length - 1]);
};

const parseInlineTarget = (destination: string): { target: string; enclosed: boolean } => {
  const trimmed = destination.trim();
  if (trimmed.startsWith("<")) {
    const close = trimmed.indexOf(">");
    return { target: close === -1 ? trimmed.slice(1) : trimmed.slice(1, close), enclosed: true };
  }
  const titled = TARGET_WITH_TITLE.exec(trimmed);
  return { target: titled ? titled[1] : trimmed, enclosed: false };
};

const readLinkToken = (token: Tokens.Link | Tokens.Image | Tokens.Generic): Omit<Link, "line"> | null => {
  const { raw } = token;
  if (raw.startsWith("[") || raw.startsWith("!")) {
    // `[text][ref]` and friends are checked once, at their definition.
    if (!raw.endsWith(")")) {
      return null;
    }
    return {
      target: token.href,
      text: token.text,
      kind: token.type === "image" ? "image" : "inline",
      enclosed: ENCLOSED_DESTINATION.test(raw),
    };
  }
  return { target: token.href, text: token.text, kind: "autolink", enclosed: raw.startsWith("<") };
};

const scanBody = (body: string): BodyScan => {
  const tokens = markdown.lexer(body);
  const locator = createLocator(body);
  const code: LocatedCode[] = [];
  const links: Link[] = [];

  markdown.walkTokens(tokens, (token) => {
    switch (token.type) {
      case "code": {
        const raw = token.raw.replace(/\n+$/, "");
        const lines = raw.split("\n");
        const first = locator.skipLines(raw, lines.length);
        const fenced = token.codeBlockStyle !== "indented";
        const info: string = (token.lang ?? "").trim();
        code.push({
          first,
          last: first + lines.length - 1,
          fenced,
          block: {
            language: info ? info.split(/\s+/)[0] : null,
            code: token.text,
            line: first,
            closed: fenced && isClosedFence(lines),
          },
        });
        break;
      }
      case "codespan":
        locator.skipSpan(token.raw);
        break;
      case "link":
      case "image": {
        const link = readLinkToken(token);
        const line = locator.mark(token.raw);
        if (link) {
          links.push({ ...link, line });
        }
        break;
      }
      case "text":
        if ("tokens" in token && token.tokens) {
          break;
        }
        // A `](target)` left in plain text is a link the lexer could not read.
        for (const match of token.raw.matchAll(UNPARSED_LINK)) {
          links.push({
            ...parseInlineTarget(match[3]),
            text: match[2] ?? "",
            line: locator.mark(match[0]),
            kind: match[1] ? "image" : "inline",
          });
        }
        break;
      default:
        break;
    }
  });

  return { tokens, code, links };
};

const isInCode = (code: LocatedCode[], line: number): boolean =>
  code.some((block) => line >= block.first && line <= block.last);

const readDefinitions = (body: string, scan: BodyScan): Link[] => {
  const seen = new Set<string>();
  const definitions: Link[] = [];

  body.split("\n").forEach((text, line) => {
    const match = REFERENCE_DEFINITION.exec(text);
    if (!match || isInCode(scan.code, line)) {
      return;
    }
    const tag = match[1].toLowerCase().replace(/\s+/g, " ");
    const definition = scan.tokens.links[tag];
    if (!definition || seen.has(tag)) {
      return;
    }
    seen.add(tag);
    definitions.push({
      target: definition.href,
      text: match[1],
      line,
      kind: "reference",
      enclosed: match[2].startsWith("<"),
    });
  });

  return definitions;
};

/** Fenced blocks with their language tag. Lines are reported relative to `startLine`. */
export const extractCodeBlocks = (body: string, startLine = 1): CodeBlock[] => {
  const { code } = scanBody(body);
  return code.filter((located) => located.fenced).map(({ block }) => ({ ...block, line: block.line + startLine }));
};

/** Every link target in the body, in line order. Code blocks and code spans are never read. */
export const extractLinks = (body: string, startLine = 1): Link[] => {
  const scan = scanBody(body);
  return [...scan.links, ...readDefinitions(body, scan)]
    .sort((a, b) => a.line - b.line)
    .map((link) => ({ ...link, line: link.line + startLine }));
};

export const extractHeadings = (body: string): Heading[] => {
  const { code } = scanBody(body);
  const slugger = new GithubSlugger();
  const headings: Heading[] = [];

  body.split("\n").forEach((line, index) => {
    if (isInCode(code, index)) {
      return;
    }
    const match = HEADING.exec(line);
    if (!match) {
      return;
    }
    const text = match[2].trim();
    headings.push({ id: slugger.slug(text), text, level: match[1].length });
  });

  return headings;
};
