import { test, expect, describe, beforeAll, afterAll } from "vitest";
import { mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { resolve } from "path";
import { fileURLToPath } from "url";
import {
  SiteConfigError,
  canonicalizeSiteKeys,
  findSiteConfigFile,
  loadSiteConfig,
  readSiteConfig,
  siteSettings,
} from "./load";
import { siteConfigSchema } from "./schema";

const repoRoot = resolve(fileURLToPath(new URL(".", import.meta.url)), "../..");
const cleanSite = resolve(repoRoot, "fixtures/clean-site");
const tempRoot = resolve(tmpdir(), `contentkit-site-fixture-${Date.now()}`);

const MINIMAL = `baseURL: "https://example.org/"
title: Example
theme: PaperMod
`;

beforeAll(async () => {
  await mkdir(resolve(tempRoot, "both"), { recursive: true });
  await mkdir(resolve(tempRoot, "yaml-error"), { recursive: true });
  await mkdir(resolve(tempRoot, "scalar"), { recursive: true });
  await mkdir(resolve(tempRoot, "invalid"), { recursive: true });
  await mkdir(resolve(tempRoot, "lowercase"), { recursive: true });

  await writeFile(resolve(tempRoot, "both/config.yml"), MINIMAL);
  await writeFile(resolve(tempRoot, "both/hugo.yaml"), MINIMAL.replace("Example", "From hugo.yaml"));
  await writeFile(resolve(tempRoot, "yaml-error/config.yml"), `title: Example\ntitle: Again\n`);
  await writeFile(resolve(tempRoot, "scalar/config.yml"), "just a string\n");
  await writeFile(
    resolve(tempRoot, "invalid/config.yml"),
    `baseURL: example.org
title: Example
theme: PaperMod
pagination:
  pagerSize: 0
`
  );
  await writeFile(
    resolve(tempRoot, "lowercase/config.yml"),
    `baseurl: "https://example.org/"
title: Example
theme: PaperMod
buildfuture: true
`
  );
});

afterAll(async () => {
  await rm(tempRoot, { recursive: true, force: true });
});

describe("findSiteConfigFile", () => {
  test("prefers hugo.yaml over config.yml", async () => {
    expect(await findSiteConfigFile(resolve(tempRoot, "both"))).toBe(resolve(tempRoot, "both/hugo.yaml"));
  });

  test("uses an explicit filename when given", async () => {
    expect(await findSiteConfigFile(resolve(tempRoot, "both"), "config.yml")).toBe(
      resolve(tempRoot, "both/config.yml")
    );
  });

  test("returns null when no config exists", async () => {
    expect(await findSiteConfigFile(resolve(tempRoot, "nowhere"))).toBeNull();
  });
});

describe("readSiteConfig", () => {
  test("reports YAML errors with a 1-based line", async () => {
    const path = resolve(tempRoot, "yaml-error/config.yml");
    const error = await readSiteConfig(path).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SiteConfigError);
    expect(error).toMatchObject({ path, line: 2 });
  });

  test("rejects a document that is not a mapping", async () => {
    await expect(readSiteConfig(resolve(tempRoot, "scalar/config.yml"))).rejects.toThrow(
      "Site config must be a mapping of keys to values"
    );
  });

  test("maps top-level keys to their documented spelling", async () => {
    const data = await readSiteConfig(resolve(tempRoot, "lowercase/config.yml"));
    expect(data.baseURL).toBe("https://example.org/");
    expect(data.buildFuture).toBe(true);
    expect(data).not.toHaveProperty("baseurl");
  });
});

describe("canonicalizeSiteKeys", () => {
  test("keeps unknown keys as written", () => {
    expect(canonicalizeSiteKeys({ MAINSECTIONS: ["posts"], customKey: 1 })).toEqual({
      mainsections: ["posts"],
      customKey: 1,
    });
  });
});

describe("siteConfigSchema", () => {
  test("accepts unknown keys next to the typed ones", () => {
    const parsed = siteConfigSchema.safeParse({
      baseURL: "https://example.org/",
      title: "Example",
      theme: ["PaperMod"],
      enableGitInfo: false,
      somethingNew: { nested: true },
    });
    expect(parsed.success).toBe(true);
  });

  test("rejects unknown output formats", () => {
    const parsed = siteConfigSchema.safeParse({
      baseURL: "https://example.org/",
      title: "Example",
      theme: "PaperMod",
      outputs: { home: ["HTML", "ATOM"] },
    });
    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues.map((issue) => issue.path.join("."))).toEqual(["outputs.home.1"]);
  });

  test("accepts output formats in any case", () => {
    const parsed = siteConfigSchema.safeParse({
      baseURL: "https://example.org/",
      title: "Example",
      theme: "PaperMod",
      outputs: { home: ["html", "rss", "json"] },
    });
    expect(parsed.success).toBe(true);
  });
});

describe("loadSiteConfig", () => {
  test("loads and validates the fixture site", async () => {
    const { path, config } = await loadSiteConfig(cleanSite);
    expect(path).toBe(resolve(cleanSite, "config.yml"));
    expect(config.title).toBe("Example Notes");
    expect(config.params?.fuseOpts?.threshold).toBe(0.4);
  });

  test("lists every schema issue", async () => {
    await expect(loadSiteConfig(resolve(tempRoot, "invalid"))).rejects.toThrow(
      "Invalid site config:\n  baseURL: Must be an absolute http(s) URL\n  pagination.pagerSize: Number must be greater than 0"
    );
  });

  test("fails when no config exists", async () => {
    await expect(loadSiteConfig(resolve(tempRoot, "nowhere"))).rejects.toThrow(
      "No site config found (looked for hugo.yaml, hugo.yml, config.yaml, config.yml)"
    );
  });
});

describe("siteSettings", () => {
  test("reads menus and taxonomies from the default language", async () => {
    const { config } = await loadSiteConfig(cleanSite);
    const settings = siteSettings(config);
    expect(settings.mainSections).toEqual(["posts", "javascript"]);
    expect(settings.taxonomies).toEqual({ category: "categories", tag: "tags", series: "series" });
    expect(settings.menus.map((entry) => entry.name)).toEqual(["Archive", "Search", "Tags"]);
    expect(settings.outputs.home).toEqual(["HTML", "RSS", "JSON"]);
    expect(settings.buildDrafts).toBe(false);
  });

  test("falls back to Hugo's defaults", () => {
    const settings = siteSettings(
      siteConfigSchema.parse({ baseURL: "https://example.org/", title: "Example", theme: "PaperMod" })
    );
    expect(settings).toEqual({
      buildDrafts: false,
      buildFuture: false,
      buildExpired: false,
      mainSections: [],
      taxonomies: { category: "categories", tag: "tags" },
      menus: [],
      outputs: {},
    });
  });

  test("reads mainSections from params", () => {
    const settings = siteSettings(
      siteConfigSchema.parse({
        baseURL: "https://example.org/",
        title: "Example",
        theme: "PaperMod",
        params: { mainSections: ["notes"] },
      })
    );
    expect(settings.mainSections).toEqual(["notes"]);
  });
});
