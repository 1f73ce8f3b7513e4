import { join } from "path";
import { isDirectory, isFile, toPosixRelative } from "../fs";
import { isExternalTarget } from "../content/images";
import type { FindingDraft, LintContext, RuleId, SiteRule } from "./model";

function siteFile(ctx: LintContext): string {
  return ctx.siteConfigFile ?? "";
}

/** Paths in params that PaperMod serves straight from the static directory */
function paramImagePaths(ctx: LintContext): { key: string; path: string }[] {
  const params = ctx.site?.params;
  if (!params) return [];

  const paths: { key: string; path: string }[] = [];
  (params.images ?? []).forEach((path, index) => paths.push({ key: `params.images.${index}`, path }));

  const assets = params.assets;
  if (assets) {
    for (const key of ["favicon", "favicon16x16", "favicon32x32", "apple_touch_icon", "safari_pinned_tab"] as const) {
      const path = assets[key];
      if (path) paths.push({ key: `params.assets.${key}`, path });
    }
  }

  if (params.label?.icon) {
    paths.push({ key: "params.label.icon", path: params.label.icon });
  }
  const imageUrl = params.profileMode?.imageUrl;
  if (params.profileMode?.enabled && imageUrl && imageUrl !== "#") {
    paths.push({ key: "params.profileMode.imageUrl", path: imageUrl });
  }

  return paths.filter(({ path }) => !isExternalTarget(path));
}

const configImages: SiteRule = async (ctx) => {
  const findings: FindingDraft[] = [];
  for (const { key, path } of paramImagePaths(ctx)) {
    const clean = path.replace(/[?#].*$/, "");
    if (!(await isFile(join(ctx.paths.staticDir, clean)))) {
      findings.push({ file: siteFile(ctx), message: `${key} "${path}" not found in the static directory` });
    }
  }
  return findings;
};

const mainSections: SiteRule = async (ctx) => {
  const findings: FindingDraft[] = [];
  for (const section of ctx.settings.mainSections) {
    const hasDocuments = ctx.documents.some((doc) => doc.section === section);
    if (!hasDocuments && !(await isDirectory(join(ctx.paths.contentDir, section)))) {
      findings.push({
        file: siteFile(ctx),
        message: `Main section "${section}" has no content directory`,
      });
    }
  }
  return findings;
};

function isSearchEntry(target: string | undefined): boolean {
  return target !== undefined && /^\/?search\/?$/i.test(target.trim());
}

const searchOutput: SiteRule = (ctx) => {
  const hasSearchMenu = ctx.settings.menus.some(
    (entry) => isSearchEntry(entry.url) || isSearchEntry(entry.pageRef)
  );
  if (!hasSearchMenu) return [];

  const findings: FindingDraft[] = [];
  const homeOutputs = ctx.settings.outputs.home ?? [];
  if (!homeOutputs.some((format) => format.toLowerCase() === "json")) {
    findings.push({
      file: siteFile(ctx),
      message: "The menu links to search/ but outputs.home does not include JSON, so the search index is never built",
    });
  }
  if (!ctx.documents.some((doc) => doc.frontmatter.layout === "search")) {
    findings.push({
      file: siteFile(ctx),
      message: 'The menu links to search/ but no page has "layout: search"',
    });
  }
  return findings;
};

const themeInstalled: SiteRule = async (ctx) => {
  const site = ctx.site;
  // Themes imported as Hugo modules are resolved by hugo itself.
  if (!site || site.module !== undefined) return [];

  const themes = Array.isArray(site.theme) ? site.theme : [site.theme];
  const findings: FindingDraft[] = [];
  for (const theme of themes) {
    if (!(await isDirectory(join(ctx.paths.themesDir, theme)))) {
      findings.push({
        file: siteFile(ctx),
        message: `Theme "${theme}" is not installed in ${toPosixRelative(ctx.paths.root, ctx.paths.themesDir)}/`,
      });
    }
  }
  return findings;
};

export const SITE_RULES: Partial<Record<RuleId, SiteRule>> = {
  "config-images": configImages,
  "main-sections": mainSections,
  "search-output": searchOutput,
  "theme-installed": themeInstalled,
};
