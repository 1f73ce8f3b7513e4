import { readFile } from "fs/promises";
import { resolve } from "path";
import yaml from "js-yaml";
import { isFile } from "../fs";
import { CANONICAL_SITE_KEYS, siteConfigSchema, type MenuEntry, type SiteConfig } from "./schema";

/** Hugo's lookup order for the project configuration file */
export const SITE_CONFIG_FILENAMES = ["hugo.yaml", "hugo.yml", "config.yaml", "config.yml"] as const;

export class SiteConfigError extends Error {
  constructor(
    message: string,
    readonly path: string,
    readonly line?: number
  ) {
    super(message);
    this.name = "SiteConfigError";
  }
}

export interface SiteSettings {
  buildDrafts: boolean;
  buildFuture: boolean;
  buildExpired: boolean;
  mainSections: string[];
  /** singular -> plural, e.g. { tag: "tags" } */
  taxonomies: Record<string, string>;
  menus: MenuEntry[];
  outputs: NonNullable<SiteConfig["outputs"]>;
}

const DEFAULT_TAXONOMIES: Record<string, string> = { category: "categories", tag: "tags" };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function findSiteConfigFile(root: string, explicit?: string): Promise<string | null> {
  const candidates = explicit ? [explicit] : SITE_CONFIG_FILENAMES;
  for (const filename of candidates) {
    const path = resolve(root, filename);
    if (await isFile(path)) {
      return path;
    }
  }
  return null;
}

/** Parse the site configuration YAML into a plain mapping */
export async function readSiteConfig(path: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SiteConfigError(`Cannot read site config: ${reason}`, path);
  }

  let data: unknown;
  try {
    data = yaml.load(raw, { filename: path });
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      throw new SiteConfigError(`Invalid YAML: ${err.reason}`, path, err.mark.line + 1);
    }
    throw err;
  }

  if (data === undefined || data === null) {
    return {};
  }
  if (!isRecord(data)) {
    throw new SiteConfigError("Site config must be a mapping of keys to values", path);
  }
  return canonicalizeSiteKeys(data);
}

/** Rename top-level keys to their documented spelling (`baseurl` -> `baseURL`) */
export function canonicalizeSiteKeys(data: Record<string, unknown>): Record<string, unknown> {
  const canonical = new Map(CANONICAL_SITE_KEYS.map((key) => [key.toLowerCase(), key]));
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    result[canonical.get(key.toLowerCase()) ?? key] = value;
  }
  return result;
}

export function formatSchemaIssues(issues: { path: (string | number)[]; message: string }[]): string[] {
  return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/** Find, read and validate the site configuration */
export async function loadSiteConfig(root: string, explicit?: string): Promise<{ path: string; config: SiteConfig }> {
  const path = await findSiteConfigFile(root, explicit);
  if (!path) {
    const expected = explicit ?? SITE_CONFIG_FILENAMES.join(", ");
    throw new SiteConfigError(`No site config found (looked for ${expected})`, resolve(root));
  }

  const data = await readSiteConfig(path);
  const parsed = siteConfigSchema.safeParse(data);
  if (!parsed.success) {
    const lines = formatSchemaIssues(parsed.error.issues);
    throw new SiteConfigError(`Invalid site config:\n  ${lines.join("\n  ")}`, path);
  }
  return { path, config: parsed.data };
}

function defaultLanguage(config: SiteConfig) {
  const languages = Object.entries(config.languages ?? {});
  if (languages.length === 0) {
    return undefined;
  }
  const preferred = languages.find(([code]) => code === config.defaultContentLanguage);
  if (preferred) {
    return preferred[1];
  }
  const byWeight = [...languages].sort(([, a], [, b]) => (a.weight ?? 0) - (b.weight ?? 0));
  return byWeight[0]?.[1];
}

/** Effective build settings, with Hugo's defaults for everything left unset */
export function siteSettings(config: SiteConfig): SiteSettings {
  const language = defaultLanguage(config);
  const menus = [
    ...Object.values(config.menu ?? {}).flat(),
    ...Object.values(config.languages ?? {}).flatMap((lang) => Object.values(lang.menu ?? {}).flat()),
  ];

  return {
    buildDrafts: config.buildDrafts ?? false,
    buildFuture: config.buildFuture ?? false,
    buildExpired: config.buildExpired ?? false,
    mainSections: config.mainsections ?? config.params?.mainSections ?? [],
    taxonomies: config.taxonomies ?? language?.taxonomies ?? DEFAULT_TAXONOMIES,
    menus,
    outputs: config.outputs ?? {},
  };
}
