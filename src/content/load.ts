import matter from "gray-matter";
import fg from "fast-glob";
import yaml from "js-yaml";
import { readFile } from "fs/promises";
import { toPosixRelative } from "../fs";
import type { ContentDocument, FrontMatterState, PageKind, ParseError } from "./model";
import { CANONICAL_FRONT_MATTER_KEYS } from "./schema";

export interface MarkdownDocument {
  frontmatter: Record<string, unknown>;
  body: string;
}

export const DEFAULT_SOURCE_PATTERNS = ["**/*.md"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Front matter is read with the YAML 1.2 core schema: `date: 2024-02-30` stays the
 * string the author wrote instead of being rolled over into March by the timestamp type.
 */
function parseYamlFrontMatter(input: string): Record<string, unknown> {
  const data = yaml.load(input, { schema: yaml.CORE_SCHEMA });
  if (data === undefined || data === null) {
    return {};
  }
  if (!isRecord(data)) {
    throw new Error("Front matter must be a mapping of keys to values");
  }
  return data;
}

const MATTER_OPTIONS = { engines: { yaml: parseYamlFrontMatter } };

function stripBom(raw: string): string {
  return raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
}

export async function readMarkdownFile(filePath: string): Promise<MarkdownDocument> {
  const raw = stripBom(await readFile(filePath, "utf8"));
  const { data, content } = matter(raw, MATTER_OPTIONS);
  return { frontmatter: data, body: content };
}

const CANONICAL_KEYS = new Map(CANONICAL_FRONT_MATTER_KEYS.map((key) => [key.toLowerCase(), key]));

/** Rename top-level keys to their documented spelling (`Title` -> `title`, `showtoc` -> `ShowToc`) */
export function canonicalizeFrontMatterKeys(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    result[CANONICAL_KEYS.get(key.toLowerCase()) ?? key] = value;
  }
  return result;
}

export interface FrontMatterInspection {
  state: FrontMatterState;
  /** 1-based line of the closing delimiter, 0 when there is none */
  closingLine: number;
}

/** Check the `---` delimiters without parsing the YAML between them */
export function inspectFrontMatter(raw: string): FrontMatterInspection {
  const lines = stripBom(raw).split(/\r?\n/);
  if (lines[0]?.trimEnd() !== "---") {
    return { state: "missing", closingLine: 0 };
  }
  const closing = lines.findIndex((line, index) => index > 0 && line.trimEnd() === "---");
  if (closing === -1) {
    return { state: "unterminated", closingLine: 0 };
  }
  return { state: "ok", closingLine: closing + 1 };
}

function describeParseError(err: unknown): ParseError {
  if (err instanceof yaml.YAMLException) {
    // gray-matter hands the engine everything after the opening `---`, newline included,
    // so YAML line n (0-based) is file line n + 1.
    return { message: `Invalid front matter YAML: ${err.reason}`, line: err.mark.line + 1 };
  }
  if (err instanceof Error) {
    return { message: err.message, line: 1 };
  }
  throw err;
}

function classify(relPath: string): { section: string; kind: PageKind; isBundle: boolean } {
  const parts = relPath.split("/");
  const fileName = parts.at(-1) ?? "";
  const dirs = parts.slice(0, -1);

  let kind: PageKind = "page";
  if (fileName === "_index.md") {
    kind = dirs.length === 0 ? "home" : "section";
  }

  return {
    section: dirs[0] ?? "",
    kind,
    isBundle: fileName === "index.md" && dirs.length > 0,
  };
}

/** Load one document; malformed front matter is recorded on the document, never thrown */
export async function loadContentDocument(
  filePath: string,
  contentDir: string
): Promise<ContentDocument> {
  const raw = stripBom(await readFile(filePath, "utf8"));
  const relPath = toPosixRelative(contentDir, filePath);
  const { state, closingLine } = inspectFrontMatter(raw);

  const doc: ContentDocument = {
    path: filePath,
    relPath,
    ...classify(relPath),
    frontMatterState: state,
    frontmatter: {},
    body: raw,
    bodyLine: 1,
  };

  if (state !== "ok") {
    return doc;
  }

  doc.bodyLine = closingLine + 1;
  try {
    const { data, content } = matter(raw, MATTER_OPTIONS);
    doc.frontmatter = canonicalizeFrontMatterKeys(data);
    doc.body = content;
  } catch (err) {
    doc.parseError = describeParseError(err);
    doc.body = raw.split(/\r?\n/).slice(closingLine).join("\n");
  }
  return doc;
}

/** Absolute paths of every file matched by the patterns, deduplicated and sorted */
export async function resolveContentDocuments(
  patterns: string[],
  contentDir: string,
  ignore: string[] = []
): Promise<string[]> {
  const files = await fg(patterns, { cwd: contentDir, absolute: true, onlyFiles: true, ignore });
  return Array.from(new Set(files)).sort((a, b) => a.localeCompare(b));
}

export interface LoadContentOptions {
  contentDir: string;
  source?: string[];
  ignore?: string[];
}

export async function loadContent(options: LoadContentOptions): Promise<ContentDocument[]> {
  const files = await resolveContentDocuments(
    options.source ?? DEFAULT_SOURCE_PATTERNS,
    options.contentDir,
    options.ignore
  );
  const documents: ContentDocument[] = [];
  for (const file of files) {
    documents.push(await loadContentDocument(file, options.contentDir));
  }
  return documents;
}
