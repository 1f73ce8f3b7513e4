import type { ContentDocument } from "./content/model";

export function normalizeSourceName(name: string): string {
  return name.replace(/\.md$/i, "");
}

/** Name a document is addressed by: file stem, or the directory name of a page bundle */
export function documentName(doc: Pick<ContentDocument, "relPath">): string {
  const parts = doc.relPath.split("/");
  const stem = normalizeSourceName(parts.at(-1) ?? "");
  if ((stem === "index" || stem === "_index") && parts.length > 1) {
    return parts.at(-2) ?? stem;
  }
  return stem;
}

/**
 * Match on the document name, or on the path below the content directory when the
 * requested name contains a slash (`posts/hello` vs `notes/hello`).
 */
export function filterDocumentsByName<T extends Pick<ContentDocument, "relPath">>(
  documents: T[],
  name: string
): T[] {
  const requested = normalizeSourceName(name).replace(/^\.?\/+/, "");
  if (requested.includes("/")) {
    return documents.filter((doc) => {
      const relPath = normalizeSourceName(doc.relPath);
      return relPath === requested || relPath === `${requested}/index`;
    });
  }
  return documents.filter((doc) => documentName(doc) === requested);
}
