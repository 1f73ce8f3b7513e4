import { defineConfig } from "../../src/config";

export default defineConfig({
  contentDir: "posts",
  rules: {
    draft: "off",
  },
  frontmatter: {
    author: "Example Author",
  },
});
