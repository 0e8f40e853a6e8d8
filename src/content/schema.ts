import type { PostMetadata, SchemaOptions, Severity } from "./types";
import { calendarDateOf, parsePostDate } from "./dates";

export const KNOWN_KEYS = ["layout", "title", "date", "description", "img", "tags"] as const;
export const REQUIRED_KEYS = ["layout", "title", "date"] as const;

export const DEFAULT_SCHEMA_OPTIONS: SchemaOptions = {
  layouts: ["post"],
  strictKeys: false,
  requireDescription: false,
};

export interface FrontMatterProblem {
  severity: Severity;
  rule: string;
  message: string;
  key?: string;
}

export interface ValidationResult {
  metadata?: PostMetadata;
  problems: FrontMatterProblem[];
}

const CALENDAR_PREFIX = /^(\d{4}-\d{2}-\d{2})/;

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || (typeof value === "string" && value.trim() === "");

const describe = (value: unknown): string => (Array.isArray(value) ? "list" : typeof value);

/** `tags` is either a YAML list or a whitespace-separated string. Returns null when neither. */
export const normalizeTags = (value: unknown): string[] | null => {
  if (value === undefined || value === null) {
    return [];
  }

  let entries: string[];
  if (typeof value === "string") {
    entries = value.split(/\s+/);
  } else if (Array.isArray(value)) {
    if (value.some((entry) => typeof entry !== "string" && typeof entry !== "number")) {
      return null;
    }
    entries = value.map((entry) => String(entry));
  } else {
    return null;
  }

  const tags: string[] = [];
  for (const entry of entries) {
    const tag = entry.trim();
    if (tag && !tags.includes(tag)) {
      tags.push(tag);
    }
  }
  return tags;
};

export const validateFrontMatter = (
  data: Record<string, unknown>,
  options: SchemaOptions = DEFAULT_SCHEMA_OPTIONS,
): ValidationResult => {
  const problems: FrontMatterProblem[] = [];
  const error = (key: string, rule: string, message: string) => {
    problems.push({ severity: "error", rule, message, key });
  };
  const warn = (key: string, rule: string, message: string) => {
    problems.push({ severity: "warning", rule, message, key });
  };

  for (const key of REQUIRED_KEYS) {
    if (!(key in data) || data[key] === undefined) {
      error(key, "required-key", `Missing required front matter key "${key}"`);
    } else if (isBlank(data[key])) {
      error(key, "required-key", `Front matter key "${key}" is empty`);
    }
  }

  const readString = (key: string, allowNumber = false): string | undefined => {
    const value = data[key];
    if (isBlank(value)) {
      return undefined;
    }
    if (typeof value === "string") {
      return value.trim();
    }
    if (allowNumber && typeof value === "number") {
      return String(value);
    }
    error(key, "invalid-type", `Front matter key "${key}" must be a string, got ${describe(value)}`);
    return undefined;
  };

  const layout = readString("layout");
  const title = readString("title", true);
  const description = readString("description");
  const image = readString("img");

  if (layout && options.layouts.length > 0 && !options.layouts.includes(layout)) {
    error(
      "layout",
      "unknown-layout",
      `Layout "${layout}" is not one of the configured layouts (${options.layouts.join(", ")})`,
    );
  }

  let date: Date | null = null;
  let calendarDate = "";
  const rawDate = data.date;
  if (!isBlank(rawDate)) {
    date = parsePostDate(rawDate);
    if (!date) {
      error("date", "invalid-date", `Front matter date "${String(rawDate)}" is not a valid calendar date`);
    } else if (typeof rawDate === "string") {
      calendarDate = CALENDAR_PREFIX.exec(rawDate.trim())?.[1] ?? calendarDateOf(date);
    } else {
      calendarDate = calendarDateOf(date);
    }
  }

  const tags = normalizeTags(data.tags);
  if (!tags) {
    error("tags", "invalid-type", "Front matter key \"tags\" must be a list of strings or a space-separated string");
  }

  if (options.requireDescription && description === undefined) {
    warn("description", "missing-description", "Post has no description");
  }

  const extra: Record<string, unknown> = {};
  const known: readonly string[] = KNOWN_KEYS;
  for (const [key, value] of Object.entries(data)) {
    if (known.includes(key)) {
      continue;
    }
    extra[key] = value;
    if (options.strictKeys) {
      warn(key, "unknown-key", `Unknown front matter key "${key}"`);
    }
  }

  if (problems.some((problem) => problem.severity === "error") || !layout || !title || !date || !tags) {
    return { problems };
  }

  return {
    metadata: {
      layout,
      title,
      date,
      calendarDate,
      description,
      image,
      tags,
      extra,
    },
    problems,
  };
};
