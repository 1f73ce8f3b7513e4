export type PageKind = "home" | "section" | "page";

export type FrontMatterState = "ok" | "missing" | "unterminated";

export interface ParseError {
  message: string;
  /** 1-based line in the source file */
  line?: number;
}

export interface ContentDocument {
  /** Absolute file path */
  path: string;
  /** Path relative to the content directory, with forward slashes */
  relPath: string;
  /** First directory below the content directory, "" for top-level pages */
  section: string;
  kind: PageKind;
  /** `index.md` inside its own directory, with sibling resources */
  isBundle: boolean;
  frontMatterState: FrontMatterState;
  frontmatter: Record<string, unknown>;
  body: string;
  /** Line on which the markdown body starts */
  bodyLine: number;
  parseError?: ParseError;
}
