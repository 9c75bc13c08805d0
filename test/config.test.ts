import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { rmSync, writeFileSync } from "fs";
import { join } from "path";
import {
  loadConfig,
  parseUnlistedTags,
  parseSummarySubstitutions,
  tagSuffix,
  DEFAULT_TEMPLATES_DIR,
} from "../src/config.js";
import { makeTempDir } from "./helpers.js";

describe("loadConfig", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = makeTempDir("config");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(cwd, { recursive: true, force: true });
  });

  test("fills defaults around the required scope tag", () => {
    const config = loadConfig({ env: { TAG_TO_DOWNLOAD: "scope:blog" }, cwd })._unsafeUnwrap();

    expect(config).toEqual({
      scope: { tag: "scope:blog", unlistedTags: [], summarySubstitutions: [] },
      retry: { maxRetries: 5, baseDelaySeconds: 1, maxDelaySeconds: 300 },
      site: { type: "hugo", author: "root", templatesDir: DEFAULT_TEMPLATES_DIR },
      paths: { inputDir: join(cwd, "in"), outputDir: join(cwd, "out") },
      dump: { command: "sncli", args: ["--config=/dev/null", "-r", "dump"] },
      schedule: { pollingIntervalSeconds: 3600 },
      notify: {},
      debug: false,
    });
  });

  test("reads every environment variable", () => {
    const config = loadConfig({
      env: {
        TAG_TO_DOWNLOAD: "scope:blog",
        UNLISTED_TAGS: "scope:thoughts, scope:drafts",
        TITLE_SUBSTITUTIONS: "quote:Quoted,til:Today I learned",
        CONTINUOUS_NOTE_TAG: "scope:list",
        MAX_RETRIES: "3",
        BASE_DELAY: "0.5",
        MAX_DELAY: "20",
        AUTHOR: "tester",
        SSG_TYPE: "zola",
        TEMPLATES_DIR: "tpl",
        INPUT_DIR: "dumps",
        OUTPUT_DIR: "site/content",
        SNCLI_PATH: "/opt/sncli",
        POLLING_CYCLE: "60",
        GOTIFY_URL: "http://notify.test",
        GOTIFY_TOKEN: "test-token",
        DEBUG: "yes",
      },
      cwd,
    })._unsafeUnwrap();

    expect(config).toEqual({
      scope: {
        tag: "scope:blog",
        unlistedTags: ["thoughts", "drafts"],
        summarySubstitutions: [
          { pattern: "quote", replacement: "Quoted" },
          { pattern: "til", replacement: "Today I learned" },
        ],
        continuous: { tag: "scope:list", replacement: "list" },
      },
      retry: { maxRetries: 3, baseDelaySeconds: 0.5, maxDelaySeconds: 20 },
      site: { type: "zola", author: "tester", templatesDir: join(cwd, "tpl") },
      paths: { inputDir: join(cwd, "dumps"), outputDir: join(cwd, "site", "content") },
      dump: { command: "/opt/sncli", args: ["--config=/dev/null", "-r", "dump"] },
      schedule: { pollingIntervalSeconds: 60 },
      notify: { url: "http://notify.test", token: "test-token" },
      debug: true,
    });
  });

  test("requires a scope tag", () => {
    const error = loadConfig({ env: {}, cwd })._unsafeUnwrapErr();
    expect(error._tag).toBe("config.invalid");
  });

  test("rejects a non-numeric retry count", () => {
    const result = loadConfig({ env: { TAG_TO_DOWNLOAD: "scope:blog", MAX_RETRIES: "abc" }, cwd });
    expect(result._unsafeUnwrapErr()._tag).toBe("config.invalid");
  });

  test("rejects a malformed substitution list", () => {
    const result = loadConfig({ env: { TAG_TO_DOWNLOAD: "scope:blog", TITLE_SUBSTITUTIONS: "nocolon" }, cwd });
    expect(result._unsafeUnwrapErr()).toEqual({
      _tag: "config.env",
      variable: "TITLE_SUBSTITUTIONS",
      message: 'expected pattern:replacement, got "nocolon"',
    });
  });

  test("reads the config file in the working directory, env wins", () => {
    writeFileSync(
      join(cwd, "notes-to-ssg.config.json"),
      JSON.stringify({
        scope: { tag: "scope:file", continuousTag: "scope:list" },
        retry: { maxRetries: 7 },
        site: { author: "file author" },
      }),
    );

    const config = loadConfig({ env: { AUTHOR: "env author" }, cwd })._unsafeUnwrap();

    expect(config.scope.tag).toBe("scope:file");
    expect(config.scope.continuous).toEqual({ tag: "scope:list", replacement: "list" });
    expect(config.retry.maxRetries).toBe(7);
    expect(config.site.author).toBe("env author");
  });

  test("ignores an invalid config file with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeFileSync(join(cwd, "notes-to-ssg.config.json"), JSON.stringify({ retry: { maxRetries: "many" } }));

    const config = loadConfig({ env: { TAG_TO_DOWNLOAD: "scope:blog" }, cwd })._unsafeUnwrap();

    expect(config.retry.maxRetries).toBe(5);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test("an explicit config path wins over the working directory", () => {
    const other = makeTempDir("config-explicit");
    try {
      const path = join(other, "custom.json");
      writeFileSync(path, JSON.stringify({ scope: { tag: "scope:explicit" } }));
      writeFileSync(join(cwd, "notes-to-ssg.config.json"), JSON.stringify({ scope: { tag: "scope:cwd" } }));

      const config = loadConfig({ env: { NOTES_TO_SSG_CONFIG: path }, cwd })._unsafeUnwrap();

      expect(config.scope.tag).toBe("scope:explicit");
    } finally {
      rmSync(other, { recursive: true, force: true });
    }
  });

  test("caps the polling interval at the timer limit", () => {
    const load = (value: string) => loadConfig({ env: { TAG_TO_DOWNLOAD: "scope:blog", POLLING_CYCLE: value }, cwd });
    expect(load("2147483")._unsafeUnwrap().schedule.pollingIntervalSeconds).toBe(2147483);
    expect(load("2147484")._unsafeUnwrapErr()._tag).toBe("config.invalid");
  });

  test("DEBUG accepts common truthy spellings only", () => {
    const debug = (value: string) =>
      loadConfig({ env: { TAG_TO_DOWNLOAD: "scope:blog", DEBUG: value }, cwd })._unsafeUnwrap().debug;
    expect([debug("true"), debug("1"), debug("YES"), debug("false"), debug("0")]).toEqual([
      true,
      true,
      true,
      false,
      false,
    ]);
  });
});

describe("env list parsing", () => {
  test("tagSuffix keeps the text after the first colon", () => {
    expect(tagSuffix("scope:thoughts")).toBe("thoughts");
    expect(tagSuffix("a:b:c")).toBe("b:c");
    expect(tagSuffix("plain")).toBe("plain");
  });

  test("parseUnlistedTags trims and drops empty items", () => {
    expect(parseUnlistedTags(" scope:a , ,b,")).toEqual(["a", "b"]);
  });

  test("parseSummarySubstitutions splits on the first colon", () => {
    expect(parseSummarySubstitutions("time:At: noon")._unsafeUnwrap()).toEqual([
      { pattern: "time", replacement: "At: noon" },
    ]);
    expect(parseSummarySubstitutions("")._unsafeUnwrap()).toEqual([]);
  });
});
