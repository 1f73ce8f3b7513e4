import { test, expect, describe, beforeAll, afterAll } from "vitest";
import { mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { resolve } from "path";
import {
  inspectFrontMatter,
  loadContent,
  canonicalizeFrontMatterKeys,
  loadContentDocument,
  readMarkdownFile,
  resolveContentDocuments,
} from "./load";

const fixtureDir = resolve(tmpdir(), `contentkit-content-fixture-${Date.now()}`);
const contentDir = resolve(fixtureDir, "content");

describe("content documents", () => {
  beforeAll(async () => {
    await mkdir(resolve(contentDir, "posts/bundle"), { recursive: true });
    await mkdir(resolve(contentDir, "drafts"), { recursive: true });

    await writeFile(
      resolve(contentDir, "posts/first.md"),
      `---
title: First
date: 2024-02-30
tags: [rust, async]
published: yes
---

# One
`
    );
    await writeFile(resolve(contentDir, "posts/bundle/index.md"), `---\ntitle: Bundle\ndate: 2024-01-01\n---\nBody\n`);
    await writeFile(resolve(contentDir, "posts/_index.md"), `---\ntitle: Posts\n---\n`);
    await writeFile(resolve(contentDir, "_index.md"), `---\ntitle: Home\n---\n`);
    await writeFile(resolve(contentDir, "about.md"), `# About\n`);
    await writeFile(resolve(contentDir, "open.md"), `---\ntitle: Open\n\nNo closing line\n`);
    await writeFile(
      resolve(contentDir, "dup.md"),
      `---\ntitle: One\ntitle: Two\n---\n\nBody line\n`
    );
    await writeFile(resolve(contentDir, "list.md"), `---\n- a\n- b\n---\n`);
    await writeFile(resolve(contentDir, "bom.md"), `\uFEFF---\ntitle: Bom\ndate: 2024-01-01\n---\n`);
    await writeFile(
      resolve(contentDir, "upper.md"),
      `---\nTitle: Upper Keys\nDate: 2024-01-01\nTags: [Rust]\nshowtoc: true\nCustomKey: kept\n---\n`
    );
    await writeFile(resolve(contentDir, "drafts/wip.md"), `---\ntitle: WIP\n---\n`);
  });

  afterAll(async () => {
    await rm(fixtureDir, { recursive: true, force: true });
  });

  test("keeps dates as the strings the author wrote", async () => {
    const { frontmatter, body } = await readMarkdownFile(resolve(contentDir, "posts/first.md"));
    expect(frontmatter).toEqual({
      title: "First",
      date: "2024-02-30",
      tags: ["rust", "async"],
      published: "yes",
    });
    expect(body).toBe("\n# One\n");
  });

  test("throws on invalid YAML when reading a single file", async () => {
    await expect(readMarkdownFile(resolve(contentDir, "dup.md"))).rejects.toThrow("duplicated mapping key");
  });

  test("classifies pages, sections, the home page and bundles", async () => {
    const page = await loadContentDocument(resolve(contentDir, "posts/first.md"), contentDir);
    expect(page).toMatchObject({ relPath: "posts/first.md", section: "posts", kind: "page", isBundle: false, bodyLine: 7 });

    const bundle = await loadContentDocument(resolve(contentDir, "posts/bundle/index.md"), contentDir);
    expect(bundle).toMatchObject({ section: "posts", kind: "page", isBundle: true });

    const section = await loadContentDocument(resolve(contentDir, "posts/_index.md"), contentDir);
    expect(section.kind).toBe("section");

    const home = await loadContentDocument(resolve(contentDir, "_index.md"), contentDir);
    expect(home).toMatchObject({ kind: "home", section: "" });
  });

  test("records YAML errors with the file line instead of throwing", async () => {
    const doc = await loadContentDocument(resolve(contentDir, "dup.md"), contentDir);
    expect(doc.parseError).toEqual({ message: "Invalid front matter YAML: duplicated mapping key", line: 3 });
    expect(doc.frontmatter).toEqual({});
    expect(doc.body).toBe("\nBody line\n");
  });

  test("rejects front matter that is not a mapping", async () => {
    const doc = await loadContentDocument(resolve(contentDir, "list.md"), contentDir);
    expect(doc.parseError).toEqual({ message: "Front matter must be a mapping of keys to values", line: 1 });
  });

  test("tracks missing and unterminated front matter", async () => {
    const about = await loadContentDocument(resolve(contentDir, "about.md"), contentDir);
    expect(about.frontMatterState).toBe("missing");
    expect(about.body).toBe("# About\n");

    const open = await loadContentDocument(resolve(contentDir, "open.md"), contentDir);
    expect(open.frontMatterState).toBe("unterminated");
    expect(open.frontmatter).toEqual({});
  });

  test("matches front matter keys case-insensitively", async () => {
    const doc = await loadContentDocument(resolve(contentDir, "upper.md"), contentDir);
    expect(doc.frontmatter).toEqual({
      title: "Upper Keys",
      date: "2024-01-01",
      tags: ["Rust"],
      ShowToc: true,
      CustomKey: "kept",
    });
  });

  test("strips a byte order mark before the delimiter", async () => {
    const doc = await loadContentDocument(resolve(contentDir, "bom.md"), contentDir);
    expect(doc.frontMatterState).toBe("ok");
    expect(doc.frontmatter.title).toBe("Bom");
  });

  test("deduplicates files across overlapping glob patterns", async () => {
    const files = await resolveContentDocuments(["posts/*.md", "posts/first.*"], contentDir);
    expect(files).toEqual([resolve(contentDir, "posts/_index.md"), resolve(contentDir, "posts/first.md")]);
  });

  test("loads every markdown file except ignored ones", async () => {
    const docs = await loadContent({ contentDir, ignore: ["drafts/**"] });
    expect(docs.map((doc) => doc.relPath)).toEqual([
      "_index.md",
      "about.md",
      "bom.md",
      "dup.md",
      "list.md",
      "open.md",
      "posts/_index.md",
      "posts/bundle/index.md",
      "posts/first.md",
      "upper.md",
    ]);
  });
});

test("canonicalizeFrontMatterKeys leaves unknown keys alone", () => {
  expect(canonicalizeFrontMatterKeys({ DRAFT: true, expirydate: "2025-01-01", myParam: 1 })).toEqual({
    draft: true,
    expiryDate: "2025-01-01",
    myParam: 1,
  });
});

describe("inspectFrontMatter", () => {
  test("reports the closing delimiter line", () => {
    expect(inspectFrontMatter("---\ntitle: x\n---\nbody")).toEqual({ state: "ok", closingLine: 3 });
    expect(inspectFrontMatter("---\r\ntitle: x\r\n---\r\n")).toEqual({ state: "ok", closingLine: 3 });
  });

  test("does not treat TOML front matter as YAML", () => {
    expect(inspectFrontMatter("+++\ntitle = 'x'\n+++\n")).toEqual({ state: "missing", closingLine: 0 });
  });
});
