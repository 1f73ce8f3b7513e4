import type { ContentDocument } from "./content/model";
import { formatDay } from "./content/dates";
import { pagePath } from "./content/permalink";
import { publicationDate, publishState, type PublishState } from "./content/publish";
import type { SiteSettings } from "./site/load";
import { filterDocumentsByName } from "./source-filter";

export interface InventoryEntry {
  file: string;
  section: string;
  title: string;
  /** `YYYY-MM-DD`, or null when the document has no valid date */
  date: string | null;
  state: PublishState;
  tags: string[];
  series: string[];
  path: string;
}

export interface InventoryOptions {
  section?: string;
  name?: string;
  /** Include pages hugo would skip (drafts, future, expired) */
  all?: boolean;
  now?: Date;
}

function stringList(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === "string");
  return [];
}

/** Regular pages with readable front matter, newest first; undated pages sort last */
export function buildInventory(
  documents: ContentDocument[],
  settings: Pick<SiteSettings, "buildDrafts" | "buildFuture" | "buildExpired">,
  options: InventoryOptions = {}
): InventoryEntry[] {
  const now = options.now ?? new Date();
  let selected = documents.filter(
    (doc) => doc.kind === "page" && doc.frontMatterState === "ok" && !doc.parseError
  );
  if (options.section !== undefined) {
    selected = selected.filter((doc) => doc.section === options.section);
  }
  if (options.name) {
    selected = filterDocumentsByName(selected, options.name);
  }

  const entries = selected.map((doc) => {
    const published = publicationDate(doc.frontmatter);
    const title = doc.frontmatter.title;
    return {
      sortKey: published?.getTime() ?? Number.NEGATIVE_INFINITY,
      entry: {
        file: doc.relPath,
        section: doc.section,
        title: typeof title === "string" ? title : doc.relPath,
        date: published ? formatDay(published) : null,
        state: publishState(doc.frontmatter, settings, now),
        tags: stringList(doc.frontmatter.tags),
        series: stringList(doc.frontmatter.series),
        path: pagePath(doc),
      } satisfies InventoryEntry,
    };
  });

  return entries
    .filter(({ entry }) => options.all || entry.state === "published")
    .sort((a, b) => b.sortKey - a.sortKey || a.entry.file.localeCompare(b.entry.file))
    .map(({ entry }) => entry);
}

/** Aligned columns: date, state, section, title */
export function formatInventory(entries: InventoryEntry[]): string {
  if (entries.length === 0) {
    return "No documents";
  }
  const rows = entries.map((entry) => [
    entry.date ?? "----------",
    entry.state,
    entry.section || "-",
    entry.title,
  ]);
  const widths = [0, 1, 2].map((column) => Math.max(...rows.map((row) => (row[column] ?? "").length)));
  return rows
    .map((row) =>
      row
        .map((cell, column) => (column < 3 ? cell.padEnd(widths[column] ?? 0) : cell))
        .join("  ")
    )
    .join("\n");
}
