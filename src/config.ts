/**
 * configuration system — defaults, then a JSON config file, then environment variables.
 * searches: $NOTES_TO_SSG_CONFIG, ./notes-to-ssg.config.json, ~/.config/notes-to-ssg/config.json
 *
 * loadConfig() is the only place that looks at the environment. everything
 * downstream receives the resolved struct.
 */

import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";
import { homedir } from "os";
import { fileURLToPath } from "url";
import { type } from "arktype";
import { ok, err, type Result } from "neverthrow";

const SubstitutionSchema = type({
  pattern: "string > 0",
  replacement: "string",
});

const ScopeSchema = type({
  "tag?": "string",
  "unlistedTags?": "string[]",
  "summarySubstitutions?": SubstitutionSchema.array(),
  "continuousTag?": "string",
});

const RetrySchema = type({
  "maxRetries?": "number >= 1",
  "baseDelaySeconds?": "number > 0",
  "maxDelaySeconds?": "number > 0",
});

const SiteSchema = type({
  "type?": "string",
  "author?": "string",
  "templatesDir?": "string",
});

const PathsSchema = type({
  "inputDir?": "string",
  "outputDir?": "string",
});

const DumpSchema = type({
  "command?": "string",
  "args?": "string[]",
});

const ScheduleSchema = type({
  "pollingIntervalSeconds?": "0 <= number <= 2147483",
});

const NotifySchema = type({
  "url?": "string",
  "token?": "string",
});

const ConfigSchema = type({
  "scope?": ScopeSchema,
  "retry?": RetrySchema,
  "site?": SiteSchema,
  "paths?": PathsSchema,
  "dump?": DumpSchema,
  "schedule?": ScheduleSchema,
  "notify?": NotifySchema,
  "debug?": "boolean",
});

export type Config = typeof ConfigSchema.infer;

const ResolvedConfigSchema = type({
  scope: {
    tag: "string > 0",
    unlistedTags: "string[]",
    summarySubstitutions: SubstitutionSchema.array(),
    "continuous?": {
      tag: "string > 0",
      replacement: "string > 0",
    },
  },
  retry: {
    maxRetries: "number >= 1",
    baseDelaySeconds: "number > 0",
    maxDelaySeconds: "number > 0",
  },
  site: {
    type: "string > 0",
    author: "string",
    templatesDir: "string > 0",
  },
  paths: {
    inputDir: "string > 0",
    outputDir: "string > 0",
  },
  dump: {
    command: "string > 0",
    args: "string[]",
  },
  schedule: {
    /** setTimeout takes at most 2^31 - 1 ms */
    pollingIntervalSeconds: "0 <= number <= 2147483",
  },
  notify: {
    "url?": "string > 0",
    "token?": "string > 0",
  },
  debug: "boolean",
});

export type ResolvedConfig = typeof ResolvedConfigSchema.infer;
export type SummarySubstitution = ResolvedConfig["scope"]["summarySubstitutions"][number];

export type ConfigError =
  | { _tag: "config.invalid"; message: string }
  | { _tag: "config.env"; variable: string; message: string };

export type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  env: Env;
  cwd: string;
}

export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL("../templates", import.meta.url));

export const DEFAULTS = {
  retry: {
    maxRetries: 5,
    baseDelaySeconds: 1,
    maxDelaySeconds: 300,
  },
  site: {
    type: "hugo",
    author: "root",
  },
  paths: {
    inputDir: "in",
    outputDir: "out",
  },
  dump: {
    command: "sncli",
    args: ["--config=/dev/null", "-r", "dump"],
  },
  schedule: {
    pollingIntervalSeconds: 3600,
  },
} as const;

function findConfigFile(env: Env, cwd: string): string | null {
  const explicit = env.NOTES_TO_SSG_CONFIG;
  if (explicit) return expandPath(explicit);

  const cwdConfig = join(cwd, "notes-to-ssg.config.json");
  if (existsSync(cwdConfig)) return cwdConfig;

  const homeConfig = join(homedir(), ".config", "notes-to-ssg", "config.json");
  if (existsSync(homeConfig)) return homeConfig;

  return null;
}

function readConfigFile(env: Env, cwd: string): Config {
  const configPath = findConfigFile(env, cwd);
  if (!configPath) return {};

  try {
    const text = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(text);
    const validated = ConfigSchema(parsed);

    if (validated instanceof type.errors) {
      console.warn(`config validation failed: ${validated.summary}, ignoring ${configPath}`);
      return {};
    }
    return validated;
  } catch (e) {
    console.warn(`failed to load config: ${e instanceof Error ? e.message : String(e)}, ignoring ${configPath}`);
    return {};
  }
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** text after the first ":", so `scope:thoughts` names the tag `thoughts` */
export function tagSuffix(item: string): string {
  const idx = item.indexOf(":");
  return idx === -1 ? item : item.slice(idx + 1);
}

export function parseUnlistedTags(value: string): string[] {
  return splitList(value).map(tagSuffix);
}

/** `pattern:replacement,pattern:replacement` */
export function parseSummarySubstitutions(value: string): Result<SummarySubstitution[], ConfigError> {
  const pairs: SummarySubstitution[] = [];
  for (const item of splitList(value)) {
    const idx = item.indexOf(":");
    if (idx <= 0) {
      return err({
        _tag: "config.env",
        variable: "TITLE_SUBSTITUTIONS",
        message: `expected pattern:replacement, got "${item}"`,
      });
    }
    pairs.push({ pattern: item.slice(0, idx), replacement: item.slice(idx + 1) });
  }
  return ok(pairs);
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function booleanFromEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ["true", "1", "yes"].includes(value.trim().toLowerCase());
}

export function loadConfig(options: LoadConfigOptions): Result<ResolvedConfig, ConfigError> {
  const { env, cwd } = options;
  const file = readConfigFile(env, cwd);

  let summarySubstitutions = file.scope?.summarySubstitutions ?? [];
  if (env.TITLE_SUBSTITUTIONS !== undefined) {
    const parsed = parseSummarySubstitutions(env.TITLE_SUBSTITUTIONS);
    if (parsed.isErr()) return err(parsed.error);
    summarySubstitutions = parsed.value;
  }

  const unlistedTags =
    env.UNLISTED_TAGS !== undefined
      ? parseUnlistedTags(env.UNLISTED_TAGS)
      : (file.scope?.unlistedTags ?? []);

  const continuousTag = env.CONTINUOUS_NOTE_TAG || file.scope?.continuousTag;

  const notifyUrl = env.GOTIFY_URL || file.notify?.url;
  const notifyToken = env.GOTIFY_TOKEN || file.notify?.token;

  const candidate = {
    scope: {
      tag: env.TAG_TO_DOWNLOAD ?? file.scope?.tag ?? "",
      unlistedTags,
      summarySubstitutions,
      ...(continuousTag ? { continuous: { tag: continuousTag, replacement: tagSuffix(continuousTag) } } : {}),
    },
    retry: {
      maxRetries: Math.floor(
        numberFromEnv(env.MAX_RETRIES) ?? file.retry?.maxRetries ?? DEFAULTS.retry.maxRetries,
      ),
      baseDelaySeconds:
        numberFromEnv(env.BASE_DELAY) ?? file.retry?.baseDelaySeconds ?? DEFAULTS.retry.baseDelaySeconds,
      maxDelaySeconds:
        numberFromEnv(env.MAX_DELAY) ?? file.retry?.maxDelaySeconds ?? DEFAULTS.retry.maxDelaySeconds,
    },
    site: {
      type: env.SSG_TYPE ?? file.site?.type ?? DEFAULTS.site.type,
      author: env.AUTHOR ?? file.site?.author ?? DEFAULTS.site.author,
      templatesDir: resolve(cwd, expandPath(env.TEMPLATES_DIR ?? file.site?.templatesDir ?? DEFAULT_TEMPLATES_DIR)),
    },
    paths: {
      inputDir: resolve(cwd, expandPath(env.INPUT_DIR ?? file.paths?.inputDir ?? DEFAULTS.paths.inputDir)),
      outputDir: resolve(cwd, expandPath(env.OUTPUT_DIR ?? file.paths?.outputDir ?? DEFAULTS.paths.outputDir)),
    },
    dump: {
      command: env.SNCLI_PATH ?? file.dump?.command ?? DEFAULTS.dump.command,
      args: file.dump?.args ?? [...DEFAULTS.dump.args],
    },
    schedule: {
      pollingIntervalSeconds:
        numberFromEnv(env.POLLING_CYCLE) ??
        file.schedule?.pollingIntervalSeconds ??
        DEFAULTS.schedule.pollingIntervalSeconds,
    },
    notify: {
      ...(notifyUrl ? { url: notifyUrl } : {}),
      ...(notifyToken ? { token: notifyToken } : {}),
    },
    debug: booleanFromEnv(env.DEBUG) ?? file.debug ?? false,
  };

  const validated = ResolvedConfigSchema(candidate);
  if (validated instanceof type.errors) {
    return err({ _tag: "config.invalid", message: validated.summary });
  }
  return ok(validated);
}

export function expandPath(path: string): string {
  if (path.startsWith("~")) {
    return join(homedir(), path.slice(1));
  }
  return path;
}
