import nunjucks from "nunjucks";
import yaml from "js-yaml";
import { mkdir, readFile, writeFile } from "fs/promises";
import { basename, dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import { resolveSitePaths, type ContentKitConfig } from "../config";
import { formatIsoDate, parseIsoDate } from "../content/dates";
import { inspectFrontMatter } from "../content/load";
import { isFile, toPosixRelative } from "../fs";

export const BUILTIN_ARCHETYPE = fileURLToPath(new URL("../../templates/archetype.md.njk", import.meta.url));

export const ARCHETYPE_EXTENSION = ".md.njk";

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Tokens: YYYY, YY, MMMM, MMM, MM, M, DD, D; evaluated in UTC */
export function formatDate(date: Date, format: string): string {
  const month = MONTHS[date.getUTCMonth()] ?? "";
  const replacements: Record<string, string> = {
    YYYY: String(date.getUTCFullYear()),
    YY: String(date.getUTCFullYear()).slice(-2),
    MMMM: month,
    MMM: month.slice(0, 3),
    MM: pad(date.getUTCMonth() + 1),
    M: String(date.getUTCMonth() + 1),
    DD: pad(date.getUTCDate()),
    D: String(date.getUTCDate()),
  };
  return format.replace(/YYYY|YY|MMMM|MMM|MM|M|DD|D/g, (token) => replacements[token] ?? token);
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/<[^>]+>/g, "")
    .replace(/[^a-z0-9\s-]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
}

/** `my-first_post` -> `My First Post` */
export function titleize(value: string): string {
  return value
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function createArchetypeEnvironment(): nunjucks.Environment {
  const env = new nunjucks.Environment(undefined, { autoescape: false });

  env.addFilter("date", (value: unknown, format = "YYYY-MM-DD") => {
    const date = typeof value === "string" ? parseIsoDate(value) : value;
    if (!(date instanceof Date) || Number.isNaN(date.getTime())) {
      return String(value ?? "");
    }
    return formatDate(date, String(format));
  });
  env.addFilter("slugify", (value: unknown) => slugify(String(value ?? "")));
  env.addFilter("titleize", (value: unknown) => titleize(String(value ?? "")));

  return env;
}

const INTERPOLATION_RE = /\{\{\s*([^}]+?)\s*\}\}/g;
const KEYWORDS = new Set(["true", "false", "null", "none", "and", "or", "not", "in", "if", "else"]);

/** Variables an archetype interpolates that the render context does not provide */
export function findMissingArchetypeVariables(
  template: string,
  context: Record<string, unknown>
): string[] {
  const missing = new Set<string>();
  for (const match of template.matchAll(INTERPOLATION_RE)) {
    // Only the value before the first filter is looked up in the context.
    const primary = (match[1] ?? "").split("|")[0]?.trim() ?? "";
    if (!/^[A-Za-z_][\w.]*$/.test(primary) || KEYWORDS.has(primary)) {
      continue;
    }
    const root = primary.split(".")[0] ?? primary;
    if (!(root in context)) {
      missing.add(primary);
    }
  }
  return Array.from(missing).sort();
}

/** Append default front matter keys the rendered archetype did not set itself */
export function applyFrontMatterDefaults(rendered: string, defaults: Record<string, unknown>): string {
  const entries = Object.entries(defaults);
  if (entries.length === 0) {
    return rendered;
  }

  const { state, closingLine } = inspectFrontMatter(rendered);
  if (state === "missing") {
    const block = entries.map(([key, value]) => `${key}: ${JSON.stringify(value)}`);
    return ["---", ...block, "---", "", rendered].join("\n");
  }
  if (state === "unterminated") {
    throw new Error("Archetype front matter is not closed by a --- line");
  }

  const lines = rendered.split("\n");
  const data = yaml.load(lines.slice(1, closingLine - 1).join("\n"), { schema: yaml.CORE_SCHEMA });
  const present = typeof data === "object" && data !== null ? Object.keys(data) : [];
  const additions = entries
    .filter(([key]) => !present.includes(key))
    .map(([key, value]) => `${key}: ${JSON.stringify(value)}`);

  lines.splice(closingLine - 1, 0, ...additions);
  return lines.join("\n");
}

/** `archetypes/<section>.md.njk`, then `archetypes/default.md.njk`, then the built-in one */
export async function findArchetype(archetypeDir: string, section: string): Promise<string> {
  const candidates = [
    ...(section ? [join(archetypeDir, `${section}${ARCHETYPE_EXTENSION}`)] : []),
    join(archetypeDir, `default${ARCHETYPE_EXTENSION}`),
  ];
  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return BUILTIN_ARCHETYPE;
}

export interface CreateContentOptions {
  root: string;
  /** Path below the content directory: `posts/my-post.md`, or `posts/my-post` for a page bundle */
  target: string;
  title?: string;
  now?: Date;
  config?: ContentKitConfig;
}

export interface CreatedContent {
  path: string;
  archetype: string;
  missingVariables: string[];
}

function normalizeTarget(target: string): string {
  const cleaned = target.replace(/\\/g, "/").replace(/^\.?\/+/, "").replace(/\/+$/, "");
  if (cleaned === "") {
    throw new Error("A content path is required, e.g. posts/my-post.md");
  }
  return cleaned.endsWith(".md") ? cleaned : `${cleaned}/index.md`;
}

/** Render an archetype into a new content file; never overwrites an existing file */
export async function createContent(options: CreateContentOptions): Promise<CreatedContent> {
  const config = options.config ?? {};
  const paths = resolveSitePaths(options.root, config);
  const relPath = normalizeTarget(options.target);
  const path = resolve(paths.contentDir, relPath);

  if (toPosixRelative(paths.contentDir, path).startsWith("..")) {
    throw new Error(`${options.target} is outside the content directory`);
  }

  const parts = relPath.split("/");
  const section = parts.length > 1 ? parts[0] ?? "" : "";
  const fileStem = basename(relPath, ".md");
  const slug = fileStem === "index" || fileStem === "_index" ? parts.at(-2) ?? fileStem : fileStem;

  const archetype = await findArchetype(paths.archetypeDir, section);
  const template = await readFile(archetype, "utf8");
  const context: Record<string, unknown> = {
    title: options.title ?? titleize(slug),
    date: formatIsoDate(options.now ?? new Date()),
    section,
    slug,
  };

  const rendered = createArchetypeEnvironment().renderString(template, context);
  const content = applyFrontMatterDefaults(rendered, config.frontmatter ?? {});

  await mkdir(dirname(path), { recursive: true });
  try {
    await writeFile(path, content, { flag: "wx" });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      throw new Error(`${toPosixRelative(paths.root, path)} already exists`);
    }
    throw err;
  }

  return { path, archetype, missingVariables: findMissingArchetypeVariables(template, context) };
}
