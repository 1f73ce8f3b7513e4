import { loadConfig, resolveSitePaths, type ContentKitConfig } from "../config";
import { loadContent } from "../content/load";
import { toPosixRelative } from "../fs";
import { filterDocumentsByName } from "../source-filter";
import {
  SITE_CONFIG_FILENAMES,
  SiteConfigError,
  findSiteConfigFile,
  formatSchemaIssues,
  readSiteConfig,
  siteSettings,
  type SiteSettings,
} from "../site/load";
import { siteConfigSchema, type SiteConfig } from "../site/schema";
import { COLLECTION_RULES, DOCUMENT_RULES } from "./content-rules";
import { RULES, isRuleId, type Finding, type FindingDraft, type LintContext, type RuleId } from "./model";
import { SITE_RULES } from "./site-rules";

export interface LintOptions {
  root: string;
  /** Overrides the config file in the site root when given */
  config?: ContentKitConfig;
  /** Only check the document with this file name (with or without .md) */
  name?: string;
  now?: Date;
}

export interface LintResult {
  findings: Finding[];
  documentCount: number;
}

const HUGO_DEFAULT_SETTINGS: SiteSettings = {
  buildDrafts: false,
  buildFuture: false,
  buildExpired: false,
  mainSections: [],
  taxonomies: { category: "categories", tag: "tags" },
  menus: [],
  outputs: {},
};

interface LoadedSite {
  file: string | null;
  site: SiteConfig | null;
  findings: { rule: RuleId; draft: FindingDraft }[];
}

async function loadSite(root: string, explicit: string | undefined): Promise<LoadedSite> {
  const path = await findSiteConfigFile(root, explicit);
  if (!path) {
    const expected = explicit ?? SITE_CONFIG_FILENAMES.join(", ");
    return {
      file: null,
      site: null,
      findings: [{ rule: "config-missing", draft: { file: explicit ?? "", message: `No site config found (looked for ${expected})` } }],
    };
  }

  const file = toPosixRelative(root, path);
  let data: Record<string, unknown>;
  try {
    data = await readSiteConfig(path);
  } catch (err) {
    if (err instanceof SiteConfigError) {
      return { file, site: null, findings: [{ rule: "config-yaml", draft: { file, message: err.message, line: err.line } }] };
    }
    throw err;
  }

  const parsed = siteConfigSchema.safeParse(data);
  if (!parsed.success) {
    return {
      file,
      site: null,
      findings: formatSchemaIssues(parsed.error.issues).map((message) => ({
        rule: "config-schema",
        draft: { file, message },
      })),
    };
  }
  return { file, site: parsed.data, findings: [] };
}

function compareFindings(a: Finding, b: Finding): number {
  return (
    a.file.localeCompare(b.file) ||
    (a.line ?? 0) - (b.line ?? 0) ||
    a.rule.localeCompare(b.rule) ||
    a.message.localeCompare(b.message)
  );
}

/** Load the site, run every enabled rule and return the findings in file order */
export async function lintSite(options: LintOptions): Promise<LintResult> {
  const config = options.config ?? (await loadConfig(options.root));
  const paths = resolveSitePaths(options.root, config);

  const overrides = config.rules ?? {};
  for (const rule of Object.keys(overrides)) {
    if (!isRuleId(rule)) {
      throw new Error(`Unknown rule in config: ${rule}`);
    }
  }

  const findings: Finding[] = [];
  const report = (rule: RuleId, drafts: FindingDraft[]) => {
    const setting = overrides[rule] ?? RULES[rule].severity;
    if (setting === "off") return;
    for (const draft of drafts) {
      findings.push({ rule, severity: setting, ...draft });
    }
  };
  const enabled = (rule: RuleId) => overrides[rule] !== "off";

  const loaded = await loadSite(paths.root, config.siteConfig);
  for (const { rule, draft } of loaded.findings) {
    report(rule, [draft]);
  }

  let documents = await loadContent({
    contentDir: paths.contentDir,
    source: config.source,
    ignore: config.ignore,
  });
  const allDocuments = documents;
  if (options.name) {
    documents = filterDocumentsByName(documents, options.name);
  }

  const ctx: LintContext = {
    paths,
    siteConfigFile: loaded.file,
    site: loaded.site,
    settings: loaded.site ? siteSettings(loaded.site) : HUGO_DEFAULT_SETTINGS,
    documents: allDocuments,
    now: options.now ?? new Date(),
  };

  if (loaded.site && !options.name) {
    for (const [rule, check] of Object.entries(SITE_RULES)) {
      if (check && isRuleId(rule) && enabled(rule)) {
        report(rule, await check(ctx));
      }
    }
  }

  for (const doc of documents) {
    for (const [rule, check] of Object.entries(DOCUMENT_RULES)) {
      if (check && isRuleId(rule) && enabled(rule)) {
        report(rule, await check(doc, ctx));
      }
    }
  }

  const checkedFiles = new Set(documents.map((doc) => toPosixRelative(paths.root, doc.path)));
  for (const [rule, check] of Object.entries(COLLECTION_RULES)) {
    if (check && isRuleId(rule) && enabled(rule)) {
      report(
        rule,
        (await check(ctx)).filter((draft) => checkedFiles.has(draft.file))
      );
    }
  }

  return { findings: findings.sort(compareFindings), documentCount: documents.length };
}

export function countBySeverity(findings: Finding[]): Record<Finding["severity"], number> {
  return {
    error: findings.filter((finding) => finding.severity === "error").length,
    warning: findings.filter((finding) => finding.severity === "warning").length,
  };
}
