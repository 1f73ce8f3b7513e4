import type { SiteSettings } from "../site/load";
import { parseIsoDate } from "./dates";

export type PublishState = "published" | "draft" | "future" | "expired";

/** Whether `hugo` with the given build flags would render the page, and if not, why */
export function publishState(
  frontmatter: Record<string, unknown>,
  settings: Pick<SiteSettings, "buildDrafts" | "buildFuture" | "buildExpired">,
  now: Date
): PublishState {
  if (frontmatter.draft === true && !settings.buildDrafts) {
    return "draft";
  }

  const published = publicationDate(frontmatter);
  if (published && published.getTime() > now.getTime() && !settings.buildFuture) {
    return "future";
  }

  const expiry = typeof frontmatter.expiryDate === "string" ? parseIsoDate(frontmatter.expiryDate) : null;
  if (expiry && expiry.getTime() <= now.getTime() && !settings.buildExpired) {
    return "expired";
  }

  return "published";
}

/** `publishDate` wins over `date`, as in Hugo's default front matter date config */
export function publicationDate(frontmatter: Record<string, unknown>): Date | null {
  for (const key of ["publishDate", "date"]) {
    const value = frontmatter[key];
    if (typeof value === "string") {
      const parsed = parseIsoDate(value);
      if (parsed) return parsed;
    }
  }
  return null;
}
