import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { rmSync, writeFileSync } from "fs";
import {
  synthesizeHeader,
  renderTags,
  renderSummary,
  removeTags,
  isUnlisted,
  loadTemplate,
  type FrontmatterFields,
  type FrontmatterOptions,
} from "../src/frontmatter.js";
import { DEFAULT_TEMPLATES_DIR } from "../src/config.js";
import { makeTempDir } from "./helpers.js";

const TEMPLATE = `---
title: {{title}}
author: {{author}}
type: post
unlisted: {{unlisted}}
date: {{date}}
url: /{{slug}}/
summary: {{summary}}
categories:
  - {{tag}}
---`;

const createFields = (overrides: Partial<FrontmatterFields> = {}): FrontmatterFields => ({
  title: "Test Note",
  subtitle: "Subtitle",
  author: "Author",
  date: "2023-09-01T02:33:35+00:00",
  tags: ["tag1", "tag2"],
  ...overrides,
});

const createOptions = (overrides: Partial<FrontmatterOptions> = {}): FrontmatterOptions => ({
  scopeTag: "scope:blog",
  unlistedTags: ["thoughts"],
  summarySubstitutions: [],
  ...overrides,
});

describe("synthesizeHeader", () => {
  test("renders every field", () => {
    const header = synthesizeHeader(TEMPLATE, createFields(), createOptions());

    expect(header.warnings).toEqual([]);
    expect(header.lines).toEqual([
      "---",
      "title: Test Note",
      "author: Author",
      "type: post",
      "unlisted: false",
      "date: 2023-09-01T02:33:35+00:00",
      "url: /test-note/",
      "summary: ",
      "categories:",
      "  - tag1",
      "  - tag2",
      "---",
    ]);
  });

  test("marks notes with an unlisted tag", () => {
    const header = synthesizeHeader(
      TEMPLATE,
      createFields({ title: "Test Note - Thought", tags: ["tag1", "thoughts"] }),
      createOptions(),
    );

    expect(header.lines).toEqual([
      "---",
      "title: Test Note - Thought",
      "author: Author",
      "type: post",
      "unlisted: true",
      "date: 2023-09-01T02:33:35+00:00",
      "url: /test-note-thought/",
      "summary: ",
      "categories:",
      "  - tag1",
      "  - thoughts",
      "---",
    ]);
  });

  test("removes the scope tag and blog tag everywhere", () => {
    const header = synthesizeHeader(
      "categories:\n  - {{tag}}",
      createFields({ tags: ["scope:blog", "essay", "scope:blog", "blog"] }),
      createOptions(),
    );
    expect(header.lines).toEqual(["categories:", "  - essay"]);
  });

  test("falls back to Uncategorized", () => {
    const header = synthesizeHeader("  - {{tag}}", createFields({ tags: ["scope:blog"] }), createOptions());
    expect(header.lines).toEqual(["  - Uncategorized"]);
  });

  test("unlisted looks at tags before filtering", () => {
    const header = synthesizeHeader(
      "unlisted: {{unlisted}}",
      createFields({ tags: ["blog", "essay"] }),
      createOptions({ unlistedTags: ["blog"] }),
    );
    expect(header.lines).toEqual(["unlisted: true"]);
  });

  test("fills the summary from the first matching substitution", () => {
    const header = synthesizeHeader(
      "summary: {{summary}}",
      createFields({ title: "Quote: Patience", tags: ["quote", "thought"] }),
      createOptions({
        summarySubstitutions: [
          { pattern: "quote", replacement: "A quote about" },
          { pattern: "thought", replacement: "Thinking about" },
        ],
      }),
    );
    expect(header.lines).toEqual(["summary: A quote about: Patience"]);
  });

  test("substituted values are inserted literally", () => {
    const header = synthesizeHeader("title: {{title}}", createFields({ title: "Price $& {{tag}}" }), createOptions());
    expect(header.lines).toEqual(["title: Price $& {{tag}}"]);
  });

  test("keeps going when the summary pattern is invalid", () => {
    const header = synthesizeHeader(
      "title: {{title}}\nsummary: {{summary}}",
      createFields({ tags: ["("] }),
      createOptions({ summarySubstitutions: [{ pattern: "(", replacement: "x" }] }),
    );

    expect(header.lines).toEqual(["title: Test Note", "summary: {{summary}}"]);
    expect(header.warnings).toHaveLength(1);
    expect(header.warnings[0]).toMatch(/^failed to render \{\{summary\}\}: /);
  });

  test("warns about placeholders nobody supplies", () => {
    const header = synthesizeHeader("weather: {{weather}} {{weather}}\nsub: {{subtitle}}", createFields(), createOptions());
    expect(header.lines).toEqual(["weather: {{weather}} {{weather}}", "sub: Subtitle"]);
    expect(header.warnings).toEqual(["template field {{weather}} has no value"]);
  });
});

describe("tag helpers", () => {
  test("renderTags", () => {
    expect(renderTags([])).toBe("Uncategorized");
    expect(renderTags(["a"])).toBe("a");
    expect(renderTags(["a", "b", "c"])).toBe("a\n  - b\n  - c");
  });

  test("removeTags keeps order", () => {
    expect(removeTags(["x", "drop", "y", "drop"], ["drop"])).toEqual(["x", "y"]);
  });

  test("isUnlisted", () => {
    expect(isUnlisted(["a", "b"], ["b"])).toBe(true);
    expect(isUnlisted(["a"], [])).toBe(false);
  });

  test("renderSummary is case-insensitive and empty without a match", () => {
    expect(renderSummary("QUOTE: x", ["quote"], [{ pattern: "quote", replacement: "Quoted" }])).toBe("Quoted: x");
    expect(renderSummary("anything", ["other"], [{ pattern: "quote", replacement: "Quoted" }])).toBe("");
  });
});

describe("loadTemplate", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("templates");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads the template without its final newline", () => {
    writeFileSync(`${dir}/site.md`, "---\ntitle: {{title}}\n---\n");
    expect(loadTemplate(dir, "site")._unsafeUnwrap()).toBe("---\ntitle: {{title}}\n---\n");
  });

  test("reports a missing template", () => {
    const error = loadTemplate(dir, "missing")._unsafeUnwrapErr();
    expect(error._tag).toBe("template.read");
    expect(error.path).toBe(`${dir}/missing.md`);
  });

  test("ships a hugo template", () => {
    const template = loadTemplate(DEFAULT_TEMPLATES_DIR, "hugo")._unsafeUnwrap();
    expect(template.split("\n")[0]).toBe("---");
    expect(template).toContain("  - {{tag}}");
  });
});
