export type Severity = "error" | "warning";

export interface Issue {
  file: string;
  line?: number;
  severity: Severity;
  rule: string;
  message: string;
}

export interface CodeBlock {
  language: string | null;
  code: string;
  line: number;
  closed: boolean;
}

export type LinkKind = "inline" | "image" | "reference" | "autolink";

export interface Link {
  target: string;
  text: string;
  line: number;
  kind: LinkKind;
  /** Target was written inside angle brackets, so whitespace is allowed. */
  enclosed: boolean;
}

export interface Heading {
  id: string;
  text: string;
  level: number;
}

export interface PostMetadata {
  layout: string;
  title: string;
  date: Date;
  /** `YYYY-MM-DD` exactly as written in the front matter, before any zone shift. */
  calendarDate: string;
  description?: string;
  image?: string;
  tags: string[];
  extra: Record<string, unknown>;
}

export type Post = PostMetadata & {
  id: string;
  slug: string;
  body: string;
  bodyLine: number;
  codeBlocks: CodeBlock[];
};

export type PostSummary = {
  id: string;
  slug: string;
  layout: string;
  title: string;
  date: string;
  description?: string;
  image?: string;
  tags: string[];
};

export interface SchemaOptions {
  layouts: string[];
  strictKeys: boolean;
  requireDescription: boolean;
}
