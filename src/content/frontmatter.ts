import { LineCounter, isMap, isScalar, parseDocument, stringify } from "yaml";
import { FrontMatterError } from "../errors";

const OPENING_DELIMITER = "---";
const CLOSING_DELIMITERS = new Set(["---", "..."]);

export interface FrontMatterResult {
  data: Record<string, unknown>;
  body: string;
  /** 1-based line on which the body starts. */
  bodyLine: number;
  /** 1-based document line of each top-level key. */
  keyLines: Record<string, number>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const decodeBlock = (block: string): Pick<FrontMatterResult, "data" | "keyLines"> => {
  const lineCounter = new LineCounter();
  const doc = parseDocument(block, { lineCounter });

  // The block starts on document line 2.
  if (doc.errors.length > 0) {
    const [first] = doc.errors;
    const line = (first.linePos?.[0].line ?? 1) + 1;
    const summary = first.message.split("\n")[0];
    throw new FrontMatterError(`Invalid YAML in front matter: ${summary}`, line);
  }

  const value: unknown = doc.toJS();
  if (value === null || value === undefined) {
    return { data: {}, keyLines: {} };
  }
  if (!isRecord(value)) {
    throw new FrontMatterError("Front matter must be a mapping of keys to values", 2);
  }

  const keyLines: Record<string, number> = {};
  if (isMap(doc.contents)) {
    for (const pair of doc.contents.items) {
      if (isScalar(pair.key) && pair.key.range) {
        keyLines[String(pair.key.value)] = lineCounter.linePos(pair.key.range[0]).line + 1;
      }
    }
  }

  return { data: value, keyLines };
};

export const splitFrontMatter = (source: string): FrontMatterResult => {
  const text = source.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  const lines = text.split("\n");

  if (lines[0].trimEnd() !== OPENING_DELIMITER) {
    throw new FrontMatterError("Missing front matter: the document must start with ---", 1);
  }

  let closing = -1;
  for (let index = 1; index < lines.length; index += 1) {
    if (CLOSING_DELIMITERS.has(lines[index].trimEnd())) {
      closing = index;
      break;
    }
  }

  if (closing === -1) {
    throw new FrontMatterError("Front matter is never closed with --- or ...", 1);
  }

  const { data, keyLines } = decodeBlock(lines.slice(1, closing).join("\n"));

  return {
    data,
    body: lines.slice(closing + 1).join("\n"),
    bodyLine: closing + 2,
    keyLines,
  };
};

export const stringifyFrontMatter = (data: Record<string, unknown>, body = ""): string => {
  const header = `${OPENING_DELIMITER}\n${stringify(data)}${OPENING_DELIMITER}\n`;
  return body ? `${header}\n${body}` : header;
};
