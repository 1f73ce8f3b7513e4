import { isFile, toPosixRelative } from "../fs";
import { parseIsoDate } from "../content/dates";
import { collectImageReferences, imageCandidates } from "../content/images";
import { aliasPaths, pagePath } from "../content/permalink";
import { publicationDate, publishState } from "../content/publish";
import { DATE_FIELDS, frontMatterSchema, sectionFrontMatterSchema } from "../content/schema";
import type { ContentDocument } from "../content/model";
import { formatSchemaIssues } from "../site/load";
import type { DocumentRule, FindingDraft, LintContext, RuleId, SiteRule } from "./model";

export function documentFile(doc: ContentDocument, ctx: LintContext): string {
  return toPosixRelative(ctx.paths.root, doc.path);
}

/** Front matter that later rules can trust */
function isParsed(doc: ContentDocument): boolean {
  return doc.frontMatterState === "ok" && !doc.parseError;
}

function stringField(doc: ContentDocument, key: string): string | undefined {
  const value = doc.frontmatter[key];
  return typeof value === "string" ? value : undefined;
}

const frontmatterDelimiter: DocumentRule = (doc, ctx) => {
  if (doc.frontMatterState === "missing") {
    return [{ file: documentFile(doc, ctx), line: 1, message: "Missing front matter: the file must start with a --- line" }];
  }
  if (doc.frontMatterState === "unterminated") {
    return [{ file: documentFile(doc, ctx), line: 1, message: "Front matter is not closed by a --- line" }];
  }
  return [];
};

const frontmatterYaml: DocumentRule = (doc, ctx) => {
  if (!doc.parseError) return [];
  return [{ file: documentFile(doc, ctx), line: doc.parseError.line, message: doc.parseError.message }];
};

const frontmatterSchemaRule: DocumentRule = (doc, ctx) => {
  if (!isParsed(doc)) return [];
  const schema = doc.kind === "page" ? frontMatterSchema : sectionFrontMatterSchema;
  const parsed = schema.safeParse(doc.frontmatter);
  if (parsed.success) return [];
  return formatSchemaIssues(parsed.error.issues).map((message) => ({
    file: documentFile(doc, ctx),
    message,
  }));
};

const dateFormat: DocumentRule = (doc, ctx) => {
  if (!isParsed(doc)) return [];
  const findings: FindingDraft[] = [];
  for (const field of DATE_FIELDS) {
    const value = stringField(doc, field);
    if (value !== undefined && parseIsoDate(value) === null) {
      findings.push({
        file: documentFile(doc, ctx),
        message: `${field} "${value}" is not a valid ISO 8601 date`,
      });
    }
  }
  return findings;
};

const lastmodOrder: DocumentRule = (doc, ctx) => {
  const date = parseIsoDate(stringField(doc, "date") ?? "");
  const lastmod = parseIsoDate(stringField(doc, "lastmod") ?? "");
  if (!date || !lastmod || lastmod.getTime() >= date.getTime()) return [];
  return [
    {
      file: documentFile(doc, ctx),
      message: `lastmod ${stringField(doc, "lastmod")} is earlier than date ${stringField(doc, "date")}`,
    },
  ];
};

const futureDate: DocumentRule = (doc, ctx) => {
  if (ctx.settings.buildFuture || doc.frontmatter.draft === true) return [];
  const published = publicationDate(doc.frontmatter);
  if (!published || published.getTime() <= ctx.now.getTime()) return [];
  return [
    {
      file: documentFile(doc, ctx),
      message: `Dated ${published.toISOString()}, in the future; hugo skips it until then (buildFuture is off)`,
    },
  ];
};

const expired: DocumentRule = (doc, ctx) => {
  if (ctx.settings.buildExpired) return [];
  const expiry = parseIsoDate(stringField(doc, "expiryDate") ?? "");
  if (!expiry || expiry.getTime() > ctx.now.getTime()) return [];
  return [
    {
      file: documentFile(doc, ctx),
      message: `Expired on ${expiry.toISOString()}; hugo no longer publishes it (buildExpired is off)`,
    },
  ];
};

const draft: DocumentRule = (doc, ctx) => {
  if (ctx.settings.buildDrafts || doc.frontmatter.draft !== true) return [];
  return [{ file: documentFile(doc, ctx), message: "Marked as draft; hugo skips it (buildDrafts is off)" }];
};

const imageExists: DocumentRule = async (doc, ctx) => {
  if (!isParsed(doc)) return [];
  const findings: FindingDraft[] = [];
  for (const ref of collectImageReferences(doc)) {
    const candidates = imageCandidates(ref, doc, ctx.paths.staticDir);
    let found = false;
    for (const candidate of candidates) {
      if (await isFile(candidate)) {
        found = true;
        break;
      }
    }
    if (!found) {
      const looked = candidates.map((candidate) => toPosixRelative(ctx.paths.root, candidate)).join(", ");
      findings.push({
        file: documentFile(doc, ctx),
        line: ref.line,
        message: `${ref.source} image "${ref.target}" not found (looked for ${looked})`,
      });
    }
  }
  return findings;
};

export const DOCUMENT_RULES: Partial<Record<RuleId, DocumentRule>> = {
  "frontmatter-delimiter": frontmatterDelimiter,
  "frontmatter-yaml": frontmatterYaml,
  "frontmatter-schema": frontmatterSchemaRule,
  "date-format": dateFormat,
  "lastmod-order": lastmodOrder,
  "future-date": futureDate,
  expired,
  draft,
  "image-exists": imageExists,
};

const duplicateUrl: SiteRule = (ctx) => {
  const owners = new Map<string, string>();
  const findings: FindingDraft[] = [];

  // Drafts, future and expired pages are not built, so they claim no path.
  const published = ctx.documents.filter(
    (doc) => isParsed(doc) && publishState(doc.frontmatter, ctx.settings, ctx.now) === "published"
  );
  for (const doc of published) {
    const file = documentFile(doc, ctx);
    const claims = [
      { path: pagePath(doc), via: "page" },
      ...aliasPaths(doc).map((path) => ({ path, via: "alias" })),
    ];
    for (const { path, via } of claims) {
      const owner = owners.get(path);
      if (owner === undefined) {
        owners.set(path, file);
      } else if (owner !== file) {
        findings.push({ file, message: `${via === "alias" ? "Alias" : "Page"} ${path} is already published by ${owner}` });
      }
    }
  }
  return findings;
};

function termsOf(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return value.filter((term): term is string => typeof term === "string");
  return [];
}

function termKey(term: string): string {
  return term.trim().toLowerCase().replace(/\s+/g, "-");
}

const tagCase: SiteRule = (ctx) => {
  const findings: FindingDraft[] = [];

  for (const plural of Object.values(ctx.settings.taxonomies)) {
    const firstSeen = new Map<string, { term: string; file: string }>();
    const reported = new Set<string>();
    for (const doc of ctx.documents.filter(isParsed)) {
      const file = documentFile(doc, ctx);
      for (const term of termsOf(doc.frontmatter[plural])) {
        const key = termKey(term);
        const first = firstSeen.get(key);
        if (!first) {
          firstSeen.set(key, { term, file });
        } else if (first.term !== term && !reported.has(`${key}\u0000${term}`)) {
          reported.add(`${key}\u0000${term}`);
          findings.push({
            file,
            message: `${plural} term "${term}" is also spelled "${first.term}" (${first.file})`,
          });
        }
      }
    }
  }
  return findings;
};

export const COLLECTION_RULES: Partial<Record<RuleId, SiteRule>> = {
  "duplicate-url": duplicateUrl,
  "tag-case": tagCase,
};
