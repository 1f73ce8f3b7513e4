import { readFile } from "fs/promises";
import { resolve } from "path";
import { pathToFileURL } from "url";
import { z } from "zod";
import { isFile } from "./fs";

export const SEVERITY_SETTINGS = ["error", "warning", "off"] as const;
export type SeveritySetting = (typeof SEVERITY_SETTINGS)[number];

export interface ContentKitConfig {
  /** Site configuration filename, relative to the site root (default: Hugo lookup order) */
  siteConfig?: string;
  /** Content directory (default "content") */
  contentDir?: string;
  /** Static files directory, served from the site root (default "static") */
  staticDir?: string;
  /** Archetype templates used by `new` (default "archetypes") */
  archetypeDir?: string;
  /** Installed themes (default "themes") */
  themesDir?: string;
  /** Glob patterns, relative to contentDir, selecting the documents to check */
  source?: string[];
  /** Glob patterns, relative to contentDir, excluded from every command */
  ignore?: string[];
  /** Per-rule severity overrides, e.g. { "draft": "off" } */
  rules?: Record<string, SeveritySetting>;
  /** Default frontmatter values written into new documents */
  frontmatter?: Record<string, unknown>;
}

export interface SitePaths {
  root: string;
  contentDir: string;
  staticDir: string;
  archetypeDir: string;
  themesDir: string;
}

/** Identity helper for type-safe config files */
export function defineConfig(config: ContentKitConfig): ContentKitConfig {
  return config;
}

export const CONFIG_FILENAMES = ["contentkit.config.ts", "contentkit.config.json"] as const;

const contentKitConfigSchema = z
  .object({
    siteConfig: z.string().optional(),
    contentDir: z.string().optional(),
    staticDir: z.string().optional(),
    archetypeDir: z.string().optional(),
    themesDir: z.string().optional(),
    source: z.array(z.string()).optional(),
    ignore: z.array(z.string()).optional(),
    rules: z.record(z.enum(SEVERITY_SETTINGS)).optional(),
    frontmatter: z.record(z.unknown()).optional(),
  })
  .strict() satisfies z.ZodType<ContentKitConfig>;

/** Load config from the site root, returns empty config if no config file exists */
export async function loadConfig(root: string): Promise<ContentKitConfig> {
  for (const filename of CONFIG_FILENAMES) {
    const configPath = resolve(root, filename);
    if (!(await isFile(configPath))) {
      continue;
    }

    let loaded: unknown;
    try {
      if (filename.endsWith(".json")) {
        loaded = JSON.parse(await readFile(configPath, "utf8"));
      } else {
        const mod: { default?: unknown } = await import(pathToFileURL(configPath).href);
        loaded = mod.default ?? {};
      }
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to load ${filename}: ${reason}`);
    }

    const parsed = contentKitConfigSchema.safeParse(loaded);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      );
      throw new Error(`Invalid ${filename}:\n  ${issues.join("\n  ")}`);
    }
    return parsed.data;
  }

  return {};
}

export function resolveSitePaths(root: string, config: ContentKitConfig): SitePaths {
  const siteRoot = resolve(root);
  return {
    root: siteRoot,
    contentDir: resolve(siteRoot, config.contentDir ?? "content"),
    staticDir: resolve(siteRoot, config.staticDir ?? "static"),
    archetypeDir: resolve(siteRoot, config.archetypeDir ?? "archetypes"),
    themesDir: resolve(siteRoot, config.themesDir ?? "themes"),
  };
}
