import { describe, expect, test } from "vitest";
import { aliasPaths, normalizeUrlPath, pagePath } from "./permalink";

describe("pagePath", () => {
  test("uses the file path below the content directory", () => {
    expect(pagePath({ relPath: "posts/hello-rust.md", frontmatter: {} })).toBe("/posts/hello-rust/");
    expect(pagePath({ relPath: "about.md", frontmatter: {} })).toBe("/about/");
  });

  test("names a page bundle after its directory", () => {
    expect(pagePath({ relPath: "posts/ownership/index.md", frontmatter: {} })).toBe("/posts/ownership/");
    expect(pagePath({ relPath: "posts/ownership/index.md", frontmatter: { slug: "borrowing" } })).toBe(
      "/posts/borrowing/"
    );
  });

  test("publishes list pages at the directory path", () => {
    expect(pagePath({ relPath: "posts/_index.md", frontmatter: {} })).toBe("/posts/");
    expect(pagePath({ relPath: "_index.md", frontmatter: {} })).toBe("/");
  });

  test("lets url override the path", () => {
    expect(pagePath({ relPath: "posts/a.md", frontmatter: { url: "/Custom/Path" } })).toBe("/custom/path/");
    expect(pagePath({ relPath: "posts/a.md", frontmatter: { url: "feed.xml" } })).toBe("/feed.xml");
  });

  test("lowercases and replaces spaces", () => {
    expect(pagePath({ relPath: "My Notes/First Post.md", frontmatter: {} })).toBe("/my-notes/first-post/");
  });
});

describe("aliasPaths", () => {
  test("normalizes string aliases and drops the rest", () => {
    expect(aliasPaths({ frontmatter: { aliases: ["/js/Event-Loop", "old/", 3, ""] } })).toEqual([
      "/js/event-loop/",
      "/old/",
    ]);
    expect(aliasPaths({ frontmatter: { aliases: "/not-a-list/" } })).toEqual([]);
  });

  test("normalizeUrlPath adds the leading and trailing slash", () => {
    expect(normalizeUrlPath("tags/rust")).toBe("/tags/rust/");
    expect(normalizeUrlPath("/index.xml")).toBe("/index.xml");
  });
});
