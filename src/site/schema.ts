import { z } from "zod";

export const OUTPUT_FORMATS = [
  "HTML",
  "RSS",
  "JSON",
  "AMP",
  "Calendar",
  "CSS",
  "CSV",
  "ROBOTS",
  "SITEMAP",
  "WebAppManifest",
] as const;

export const CHANGE_FREQUENCIES = [
  "always",
  "hourly",
  "daily",
  "weekly",
  "monthly",
  "yearly",
  "never",
] as const;

const stringOrList = z.union([z.string(), z.array(z.string())]);

const httpUrl = z.string().regex(/^https?:\/\/[^\s/]+/i, "Must be an absolute http(s) URL");

/** Output formats are matched case-insensitively by Hugo */
const outputFormat = z
  .string()
  .refine(
    (value) => OUTPUT_FORMATS.some((format) => format.toLowerCase() === value.toLowerCase()),
    { message: `Unknown output format (expected one of ${OUTPUT_FORMATS.join(", ")})` }
  );

export const menuEntrySchema = z
  .object({
    name: z.string().min(1),
    url: z.string().optional(),
    pageRef: z.string().optional(),
    identifier: z.string().optional(),
    parent: z.string().optional(),
    weight: z.number().int().optional(),
    pre: z.string().optional(),
    post: z.string().optional(),
  })
  .passthrough()
  .refine((entry) => entry.url !== undefined || entry.pageRef !== undefined, {
    message: "Menu entry needs a url or pageRef",
  });

const menusSchema = z.record(z.array(menuEntrySchema));

const taxonomiesSchema = z.record(z.string().min(1));

const socialIconSchema = z
  .object({
    name: z.string().min(1),
    url: z.string().min(1),
    title: z.string().optional(),
  })
  .passthrough();

const paramsSchema = z
  .object({
    env: z.enum(["production", "development"]).optional(),
    description: z.string().optional(),
    keywords: z.array(z.string()).optional(),
    author: stringOrList.optional(),
    images: z.array(z.string()).optional(),
    mainSections: z.array(z.string()).optional(),
    defaultTheme: z.enum(["auto", "light", "dark"]).optional(),
    disableThemeToggle: z.boolean().optional(),
    ShowShareButtons: z.boolean().optional(),
    ShowReadingTime: z.boolean().optional(),
    displayFullLangName: z.boolean().optional(),
    ShowPostNavLinks: z.boolean().optional(),
    ShowBreadCrumbs: z.boolean().optional(),
    ShowCodeCopyButtons: z.boolean().optional(),
    ShowRssButtonInSectionTermList: z.boolean().optional(),
    ShowAllPagesInArchive: z.boolean().optional(),
    ShowPageNums: z.boolean().optional(),
    ShowToc: z.boolean().optional(),
    ShowWordCount: z.boolean().optional(),
    disableSpecial1stPost: z.boolean().optional(),
    comments: z.boolean().optional(),
    opengraph: z.boolean().optional(),
    twitter_cards: z.boolean().optional(),
    footer: z
      .object({ text: z.string().optional(), hideCopyright: z.boolean().optional() })
      .passthrough()
      .optional(),
    profileMode: z
      .object({
        enabled: z.boolean().optional(),
        title: z.string().optional(),
        subtitle: z.string().optional(),
        imageUrl: z.string().optional(),
        imageTitle: z.string().optional(),
        imageWidth: z.number().int().positive().optional(),
        imageHeight: z.number().int().positive().optional(),
        buttons: z.array(z.object({ name: z.string(), url: z.string() }).passthrough()).optional(),
      })
      .passthrough()
      .optional(),
    homeInfoParams: z
      .object({ Title: z.string().optional(), Content: z.string().optional() })
      .passthrough()
      .optional(),
    socialIcons: z.array(socialIconSchema).optional(),
    editPost: z
      .object({
        URL: httpUrl,
        Text: z.string().optional(),
        appendFilePath: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    label: z
      .object({
        text: z.string().optional(),
        icon: z.string().optional(),
        iconSVG: z.string().optional(),
        iconHeight: z.number().positive().optional(),
      })
      .passthrough()
      .optional(),
    assets: z
      .object({
        disableHLJS: z.boolean().optional(),
        disableFingerprinting: z.boolean().optional(),
        favicon: z.string().optional(),
        favicon16x16: z.string().optional(),
        favicon32x32: z.string().optional(),
        apple_touch_icon: z.string().optional(),
        safari_pinned_tab: z.string().optional(),
      })
      .passthrough()
      .optional(),
    cover: z
      .object({
        hidden: z.boolean().optional(),
        hiddenInList: z.boolean().optional(),
        hiddenInSingle: z.boolean().optional(),
        linkFullImages: z.boolean().optional(),
        responsiveImages: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    fuseOpts: z
      .object({
        isCaseSensitive: z.boolean().optional(),
        shouldSort: z.boolean().optional(),
        location: z.number().int().nonnegative().optional(),
        distance: z.number().int().nonnegative().optional(),
        threshold: z.number().min(0).max(1).optional(),
        minMatchCharLength: z.number().int().nonnegative().optional(),
        keys: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const languageSchema = z
  .object({
    languageName: z.string().optional(),
    languageCode: z.string().optional(),
    weight: z.number().int().optional(),
    title: z.string().optional(),
    taxonomies: taxonomiesSchema.optional(),
    menu: menusSchema.optional(),
    params: paramsSchema.optional(),
  })
  .passthrough();

const outputsSchema = z
  .object({
    home: z.array(outputFormat).optional(),
    page: z.array(outputFormat).optional(),
    section: z.array(outputFormat).optional(),
    taxonomy: z.array(outputFormat).optional(),
    term: z.array(outputFormat).optional(),
  })
  .strict();

export const siteConfigSchema = z
  .object({
    baseURL: httpUrl,
    title: z.string().min(1),
    theme: stringOrList,
    languageCode: z.string().optional(),
    defaultContentLanguage: z.string().optional(),
    copyright: z.string().optional(),
    buildDrafts: z.boolean().optional(),
    buildFuture: z.boolean().optional(),
    buildExpired: z.boolean().optional(),
    enableRobotsTXT: z.boolean().optional(),
    enableEmoji: z.boolean().optional(),
    enableInlineShortcodes: z.boolean().optional(),
    enableGitInfo: z.boolean().optional(),
    pygmentsUseClasses: z.boolean().optional(),
    mainsections: z.array(z.string()).optional(),
    minify: z
      .object({ disableXML: z.boolean().optional(), minifyOutput: z.boolean().optional() })
      .passthrough()
      .optional(),
    pagination: z
      .object({
        disableAliases: z.boolean().optional(),
        pagerSize: z.number().int().positive().optional(),
        path: z.string().optional(),
      })
      .passthrough()
      .optional(),
    languages: z.record(languageSchema).optional(),
    menu: menusSchema.optional(),
    outputs: outputsSchema.optional(),
    sitemap: z
      .object({
        changefreq: z.enum(CHANGE_FREQUENCIES).optional(),
        priority: z.number().min(0).max(1).optional(),
        filename: z.string().min(1).optional(),
      })
      .passthrough()
      .optional(),
    taxonomies: taxonomiesSchema.optional(),
    params: paramsSchema.optional(),
    markup: z.record(z.unknown()).optional(),
    services: z
      .object({
        googleAnalytics: z.object({ id: z.string().min(1) }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type SiteConfig = z.infer<typeof siteConfigSchema>;
export type MenuEntry = z.infer<typeof menuEntrySchema>;

/** Documented spelling of top-level keys; Hugo matches config keys case-insensitively */
export const CANONICAL_SITE_KEYS: readonly string[] = Object.keys(siteConfigSchema.shape);
