import type { ContentDocument } from "./model";

function urlize(segment: string): string {
  return segment.trim().toLowerCase().replace(/\s+/g, "-");
}

/** `/a/b/` for section-like paths, `/feed.xml` kept as-is when the url names a file */
export function normalizeUrlPath(url: string): string {
  const withLeading = url.startsWith("/") ? url : `/${url}`;
  const lastSegment = withLeading.split("/").at(-1) ?? "";
  if (lastSegment.includes(".") || withLeading.endsWith("/")) {
    return withLeading;
  }
  return `${withLeading}/`;
}

/** Path Hugo publishes the document at under its default permalink configuration */
export function pagePath(doc: Pick<ContentDocument, "relPath" | "frontmatter">): string {
  const { url, slug } = doc.frontmatter;
  if (typeof url === "string" && url.trim() !== "") {
    return normalizeUrlPath(url.trim().toLowerCase());
  }

  const parts = doc.relPath.split("/");
  const fileName = parts.pop() ?? "";
  const stem = fileName.replace(/\.md$/i, "");
  const customSlug = typeof slug === "string" && slug.trim() !== "" ? slug : undefined;

  if (stem === "_index") {
    return parts.length === 0 ? "/" : `/${parts.map(urlize).join("/")}/`;
  }

  if (stem === "index" && parts.length > 0) {
    const bundleName = parts.pop() ?? "";
    parts.push(customSlug ?? bundleName);
  } else {
    parts.push(customSlug ?? stem);
  }

  return `/${parts.map(urlize).join("/")}/`;
}

/** Alias paths from front matter, normalized the way Hugo writes its redirect pages */
export function aliasPaths(doc: Pick<ContentDocument, "frontmatter">): string[] {
  const { aliases } = doc.frontmatter;
  if (!Array.isArray(aliases)) {
    return [];
  }
  return aliases
    .filter((alias): alias is string => typeof alias === "string" && alias.trim() !== "")
    .map((alias) => normalizeUrlPath(alias.trim().toLowerCase()));
}
