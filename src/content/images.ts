import { marked, type Token } from "marked";
import { dirname, join, resolve } from "path";
import type { ContentDocument } from "./model";
import { pagePath } from "./permalink";

export type ImageSource = "cover" | "markdown" | "shortcode" | "html";

export interface ImageReference {
  source: ImageSource;
  /** The path as written, without query string or fragment */
  target: string;
  line?: number;
}

const FIGURE_SHORTCODE_RE = /\{\{[<%]\s*figure\b[^}]*?\bsrc=(?:"([^"]+)"|'([^']+)'|([^\s"'>%]+))/g;
const HTML_IMG_RE = /<img\b[^>]*?\bsrc=(?:"([^"]+)"|'([^']+)'|([^\s"'>]+))/gi;

export function isExternalTarget(target: string): boolean {
  return target.startsWith("//") || /^[a-z][a-z0-9+.-]*:/i.test(target);
}

function cleanTarget(target: string): string {
  const withoutSuffix = target.trim().replace(/[?#].*$/, "");
  try {
    return decodeURI(withoutSuffix);
  } catch {
    return withoutSuffix;
  }
}

function lineOf(doc: Pick<ContentDocument, "body" | "bodyLine">, needle: string): number | undefined {
  const index = doc.body.indexOf(needle);
  if (index === -1) return undefined;
  return doc.bodyLine + doc.body.slice(0, index).split("\n").length - 1;
}

function matchAll(re: RegExp, text: string): { target: string; raw: string }[] {
  const found: { target: string; raw: string }[] = [];
  for (const match of text.matchAll(re)) {
    const target = match[1] ?? match[2] ?? match[3];
    if (target) {
      found.push({ target, raw: match[0] });
    }
  }
  return found;
}

/** Every local image the page needs at build time: cover, markdown images, figures and <img> tags */
export function collectImageReferences(
  doc: Pick<ContentDocument, "frontmatter" | "body" | "bodyLine">
): ImageReference[] {
  const refs: ImageReference[] = [];
  const push = (source: ImageSource, target: string, raw: string) => {
    if (target.trim() === "" || isExternalTarget(target)) return;
    refs.push({ source, target: cleanTarget(target), line: lineOf(doc, raw) });
  };

  const { cover } = doc.frontmatter;
  if (typeof cover === "object" && cover !== null && "image" in cover && typeof cover.image === "string") {
    if (cover.image.trim() !== "" && !isExternalTarget(cover.image)) {
      refs.push({ source: "cover", target: cleanTarget(cover.image) });
    }
  }

  const tokens = marked.lexer(doc.body);
  const htmlChunks: string[] = [];
  marked.walkTokens(tokens, (token: Token) => {
    if (token.type === "image" && typeof token.href === "string") {
      push("markdown", token.href, token.raw);
    } else if (token.type === "html" && typeof token.raw === "string") {
      htmlChunks.push(token.raw);
    }
  });

  for (const chunk of htmlChunks) {
    for (const { target, raw } of matchAll(HTML_IMG_RE, chunk)) {
      push("html", target, raw);
    }
  }

  // Shortcodes inside fenced code are examples, not page content.
  const prose = tokens
    .filter((token) => token.type !== "code")
    .map((token) => token.raw)
    .join("");
  for (const { target, raw } of matchAll(FIGURE_SHORTCODE_RE, prose)) {
    push("shortcode", target, raw);
  }

  return refs;
}

/** Directory URL a relative link on the page resolves against */
function pageBaseUrl(doc: Pick<ContentDocument, "relPath" | "frontmatter">): string {
  const path = pagePath(doc);
  return path.endsWith("/") ? path : path.slice(0, path.lastIndexOf("/") + 1);
}

/**
 * Files that would satisfy the reference, in the order Hugo looks for them. A relative
 * link is requested below the page URL, so it is served from the page's own resources
 * (bundles and list pages only) or from the same path under the static directory.
 */
export function imageCandidates(
  ref: ImageReference,
  doc: Pick<ContentDocument, "path" | "relPath" | "kind" | "isBundle" | "frontmatter">,
  staticDir: string
): string[] {
  const docDir = dirname(doc.path);
  const { cover } = doc.frontmatter;
  const relativeCover =
    ref.source === "cover" &&
    typeof cover === "object" &&
    cover !== null &&
    "relative" in cover &&
    cover.relative === true;

  if (relativeCover) {
    return [resolve(docDir, ref.target)];
  }
  if (ref.target.startsWith("/")) {
    return [join(staticDir, ref.target)];
  }

  const served = join(staticDir, pageBaseUrl(doc), ref.target);
  const hasResources = doc.isBundle || doc.kind !== "page";
  return hasResources ? [resolve(docDir, ref.target), served] : [served];
}
