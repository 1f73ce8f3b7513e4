import type { SitePaths } from "../config";
import type { ContentDocument } from "../content/model";
import type { SiteSettings } from "../site/load";
import type { SiteConfig } from "../site/schema";

export type Severity = "error" | "warning";

export interface Finding {
  rule: RuleId;
  severity: Severity;
  /** Path relative to the site root, with forward slashes */
  file: string;
  message: string;
  line?: number;
}

export type RuleScope = "site" | "document" | "collection";

interface RuleInfo {
  scope: RuleScope;
  severity: Severity;
  description: string;
}

export const RULES = {
  "config-missing": {
    scope: "site",
    severity: "error",
    description: "A site configuration file exists",
  },
  "config-yaml": {
    scope: "site",
    severity: "error",
    description: "The site configuration parses as a YAML mapping",
  },
  "config-schema": {
    scope: "site",
    severity: "error",
    description: "Site configuration keys have the types Hugo and PaperMod expect",
  },
  "config-images": {
    scope: "site",
    severity: "error",
    description: "Images and icons named in params exist under the static directory",
  },
  "main-sections": {
    scope: "site",
    severity: "warning",
    description: "Every main section has a content directory",
  },
  "search-output": {
    scope: "site",
    severity: "error",
    description: "A search menu entry is backed by a JSON home output",
  },
  "theme-installed": {
    scope: "site",
    severity: "warning",
    description: "Every configured theme is present in the themes directory",
  },
  "frontmatter-delimiter": {
    scope: "document",
    severity: "error",
    description: "Documents start with a front matter block delimited by --- lines",
  },
  "frontmatter-yaml": {
    scope: "document",
    severity: "error",
    description: "Front matter parses as a YAML mapping",
  },
  "frontmatter-schema": {
    scope: "document",
    severity: "error",
    description: "Front matter has a title, a date and correctly typed fields",
  },
  "date-format": {
    scope: "document",
    severity: "error",
    description: "date, lastmod, publishDate and expiryDate are valid ISO dates",
  },
  "lastmod-order": {
    scope: "document",
    severity: "warning",
    description: "lastmod is not earlier than date",
  },
  "future-date": {
    scope: "document",
    severity: "warning",
    description: "Pages dated in the future are skipped while buildFuture is off",
  },
  expired: {
    scope: "document",
    severity: "warning",
    description: "Pages past their expiryDate are skipped while buildExpired is off",
  },
  draft: {
    scope: "document",
    severity: "warning",
    description: "Draft pages are skipped while buildDrafts is off",
  },
  "image-exists": {
    scope: "document",
    severity: "error",
    description: "Referenced local images exist",
  },
  "duplicate-url": {
    scope: "collection",
    severity: "error",
    description: "No two published pages or aliases claim the same path",
  },
  "tag-case": {
    scope: "collection",
    severity: "warning",
    description: "Taxonomy terms are not spelled in several cases",
  },
} as const satisfies Record<string, RuleInfo>;

export type RuleId = keyof typeof RULES;

export const RULE_IDS = Object.keys(RULES).filter((id): id is RuleId => id in RULES);

export function isRuleId(value: string): value is RuleId {
  return value in RULES;
}

export interface LintContext {
  paths: SitePaths;
  /** Relative path of the site config file, when one was found */
  siteConfigFile: string | null;
  /** Validated site config; null when missing or invalid */
  site: SiteConfig | null;
  settings: SiteSettings;
  documents: ContentDocument[];
  now: Date;
}

export type FindingDraft = Omit<Finding, "severity" | "rule">;

export type DocumentRule = (doc: ContentDocument, ctx: LintContext) => FindingDraft[] | Promise<FindingDraft[]>;
export type SiteRule = (ctx: LintContext) => FindingDraft[] | Promise<FindingDraft[]>;
