import { createIgnorer, normalizeIgnorePatterns } from "../ignore";

describe("createIgnorer", () => {
  test("no rules ignores nothing", () => {
    const ig = createIgnorer();
    expect(ig.ignoresFile("a.txt")).toBe(false);
    expect(ig.ignoresDir("vendor")).toBe(false);
  });

  test("gitignore semantics for files and directories", () => {
    const ig = createIgnorer(["*.log", "vendor/", "  ", "docs/draft.md"]);
    expect(ig.ignoresFile("build.log")).toBe(true);
    expect(ig.ignoresFile("nested/run.log")).toBe(true);
    expect(ig.ignoresDir("vendor")).toBe(true);
    expect(ig.ignoresFile("vendor")).toBe(false);
    expect(ig.ignoresFile("docs/draft.md")).toBe(true);
    expect(ig.ignoresFile("docs/final.md")).toBe(false);
    expect(ig.ignoresDir("docs")).toBe(false);
  });

  test("patterns are trimmed and deduplicated", () => {
    expect(normalizeIgnorePatterns([" a/ ", "a/", "b\\c", ""])).toEqual([
      "a/",
      "b/c",
    ]);
  });
});
