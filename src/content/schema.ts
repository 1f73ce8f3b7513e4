import { z } from "zod";

export const DATE_FIELDS = ["date", "lastmod", "publishDate", "expiryDate"] as const;

const stringList = z.array(z.string().min(1));
const stringOrList = z.union([z.string().min(1), stringList]);

export const coverSchema = z
  .object({
    image: z.string().min(1),
    alt: z.string().optional(),
    caption: z.string().optional(),
    relative: z.boolean().optional(),
    hidden: z.boolean().optional(),
    hiddenInList: z.boolean().optional(),
    hiddenInSingle: z.boolean().optional(),
  })
  .passthrough();

/** PaperMod page switches (ShowToc, hidemeta...) are typed; other keys pass through */
const baseFrontMatter = z
  .object({
    title: z.string().trim().min(1, "must not be empty"),
    date: z.string().optional(),
    lastmod: z.string().optional(),
    publishDate: z.string().optional(),
    expiryDate: z.string().optional(),
    description: z.string().optional(),
    summary: z.string().optional(),
    slug: z.string().min(1).optional(),
    url: z.string().min(1).optional(),
    draft: z.boolean().optional(),
    tags: stringList.optional(),
    categories: stringList.optional(),
    keywords: stringList.optional(),
    aliases: stringList.optional(),
    series: stringOrList.optional(),
    author: stringOrList.optional(),
    weight: z.number().int().optional(),
    cover: coverSchema.optional(),
    ShowToc: z.boolean().optional(),
    TocOpen: z.boolean().optional(),
    hidemeta: z.boolean().optional(),
    comments: z.boolean().optional(),
    disableShare: z.boolean().optional(),
    searchHidden: z.boolean().optional(),
    ShowReadingTime: z.boolean().optional(),
    ShowBreadCrumbs: z.boolean().optional(),
    ShowPostNavLinks: z.boolean().optional(),
    ShowWordCount: z.boolean().optional(),
    ShowRssButtonInSectionTermList: z.boolean().optional(),
  })
  .passthrough();

/** Section list pages (`_index.md`) need no date */
export const sectionFrontMatterSchema = baseFrontMatter;

export const frontMatterSchema = baseFrontMatter.extend({
  date: z.string(),
});

/** Documented spelling of front matter keys; Hugo matches them case-insensitively */
export const CANONICAL_FRONT_MATTER_KEYS: readonly string[] = Object.keys(baseFrontMatter.shape);
