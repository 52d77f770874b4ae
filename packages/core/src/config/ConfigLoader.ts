import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { createConfigInvalidError, createConfigUnreadableError } from "../errors/BlockpatchError.js";
import {
  DEFAULT_LOGGING,
  DEFAULT_MATCHING,
  DEFAULT_PARSER,
  DEFAULT_PROMPT,
  isEmptySearchPolicy,
  isReplyFormatOption,
  validateMatching,
  type BlockpatchConfig,
  type LoggingConfig,
  type MatchingConfig,
  type ParserConfig,
  type PromptConfig,
} from "./Config.js";

export interface ConfigSource {
  workspaceRoot?: string;
  parser?: Partial<ParserConfig>;
  matching?: Partial<MatchingConfig>;
  prompt?: Partial<PromptConfig>;
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  configPath?: string;
}

export const CONFIG_FILE_NAMES = [
  "blockpatch.config.json",
  ".blockpatchrc",
  "blockpatch.config.yaml",
  "blockpatch.config.yml",
] as const;

type Fields = Record<string, unknown>;

const isRecord = (value: unknown): value is Fields =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigInvalidError([label]);
  }
  return parsed;
};

const parseBooleanStrict = (value: string | undefined, label: string): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw createConfigInvalidError([label]);
};

const parseEnumStrict = <T extends string>(
  value: string | undefined,
  label: string,
  guard: (candidate: string) => candidate is T,
): T | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (!guard(normalized)) {
    throw createConfigInvalidError([label]);
  }
  return normalized;
};

/** Reads typed fields out of an untrusted section, recording the labels of bad ones. */
class FieldReader {
  constructor(
    private readonly fields: Fields,
    private readonly label: string,
    private readonly errors: string[],
  ) {}

  private fail(key: string): undefined {
    this.errors.push(`${this.label}.${key}`);
    return undefined;
  }

  number(key: string): number | undefined {
    const value = this.fields[key];
    if (value === undefined) return undefined;
    return typeof value === "number" && Number.isFinite(value) ? value : this.fail(key);
  }

  boolean(key: string): boolean | undefined {
    const value = this.fields[key];
    if (value === undefined) return undefined;
    return typeof value === "boolean" ? value : this.fail(key);
  }

  string(key: string): string | undefined {
    const value = this.fields[key];
    if (value === undefined) return undefined;
    return typeof value === "string" ? value : this.fail(key);
  }

  oneOf<T extends string>(key: string, guard: (candidate: string) => candidate is T): T | undefined {
    const value = this.fields[key];
    if (value === undefined) return undefined;
    return typeof value === "string" && guard(value) ? value : this.fail(key);
  }
}

const sectionOf = (raw: Fields, key: string, label: string, errors: string[]): FieldReader | undefined => {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    errors.push(`${label}.${key}`);
    return undefined;
  }
  return new FieldReader(value, `${label}.${key}`, errors);
};

/** Validates a parsed config file into a `ConfigSource`. */
export const normalizeConfigSource = (raw: unknown, label = "config"): ConfigSource => {
  if (!isRecord(raw)) {
    throw createConfigInvalidError([label]);
  }
  const errors: string[] = [];
  const root = new FieldReader(raw, label, errors);
  const source: ConfigSource = {};

  const workspaceRoot = root.string("workspaceRoot");
  if (workspaceRoot !== undefined) source.workspaceRoot = workspaceRoot;

  const parser = sectionOf(raw, "parser", label, errors);
  if (parser) {
    source.parser = {
      format: parser.oneOf("format", isReplyFormatOption),
      stripLineNumbers: parser.boolean("stripLineNumbers"),
    };
  }
  const matching = sectionOf(raw, "matching", label, errors);
  if (matching) {
    source.matching = {
      fuzzyThreshold: matching.number("fuzzyThreshold"),
      lineTolerance: matching.number("lineTolerance"),
      inferAnchorRange: matching.boolean("inferAnchorRange"),
      emptySearch: matching.oneOf("emptySearch", isEmptySearchPolicy),
    };
  }
  const prompt = sectionOf(raw, "prompt", label, errors);
  if (prompt) {
    source.prompt = { lineNumberThreshold: prompt.number("lineNumberThreshold") };
  }
  const logging = sectionOf(raw, "logging", label, errors);
  if (logging) {
    source.logging = {
      enabled: logging.boolean("enabled"),
      directory: logging.string("directory"),
    };
  }

  if (errors.length) {
    throw createConfigInvalidError(errors);
  }
  return source;
};

const findConfigFile = (cwd: string): string | undefined => {
  for (const candidate of CONFIG_FILE_NAMES) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const parseConfigContent = (configPath: string, content: string): unknown => {
  const extension = path.extname(configPath).toLowerCase();
  try {
    if (extension === ".yaml" || extension === ".yml") {
      const parsed: unknown = YAML.parse(content);
      return parsed;
    }
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw createConfigUnreadableError(configPath, error);
  }
};

const readConfigFile = async (configPath: string | undefined, explicit: boolean): Promise<ConfigSource | undefined> => {
  if (!configPath) return undefined;
  if (!existsSync(configPath)) {
    if (explicit) throw createConfigUnreadableError(configPath, new Error("file not found"));
    return undefined;
  }
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  return normalizeConfigSource(parseConfigContent(configPath, content), "config");
};

const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => ({
  workspaceRoot: env.BLOCKPATCH_WORKSPACE_ROOT || undefined,
  parser: {
    format: parseEnumStrict(env.BLOCKPATCH_FORMAT, "env.BLOCKPATCH_FORMAT", isReplyFormatOption),
    stripLineNumbers: parseBooleanStrict(env.BLOCKPATCH_STRIP_LINE_NUMBERS, "env.BLOCKPATCH_STRIP_LINE_NUMBERS"),
  },
  matching: {
    fuzzyThreshold: parseNumberStrict(env.BLOCKPATCH_FUZZY_THRESHOLD, "env.BLOCKPATCH_FUZZY_THRESHOLD"),
    lineTolerance: parseNumberStrict(env.BLOCKPATCH_LINE_TOLERANCE, "env.BLOCKPATCH_LINE_TOLERANCE"),
    inferAnchorRange: parseBooleanStrict(env.BLOCKPATCH_INFER_ANCHOR_RANGE, "env.BLOCKPATCH_INFER_ANCHOR_RANGE"),
    emptySearch: parseEnumStrict(env.BLOCKPATCH_EMPTY_SEARCH, "env.BLOCKPATCH_EMPTY_SEARCH", isEmptySearchPolicy),
  },
  prompt: {
    lineNumberThreshold: parseNumberStrict(
      env.BLOCKPATCH_LINE_NUMBER_THRESHOLD,
      "env.BLOCKPATCH_LINE_NUMBER_THRESHOLD",
    ),
  },
  logging: {
    enabled: parseBooleanStrict(env.BLOCKPATCH_LOG_ENABLED, "env.BLOCKPATCH_LOG_ENABLED"),
    directory: env.BLOCKPATCH_LOG_DIR || undefined,
  },
});

/** Later sources win field by field; an undefined field keeps the earlier value. */
const mergeConfigs = (defaults: BlockpatchConfig, ...sources: Array<ConfigSource | undefined>): BlockpatchConfig =>
  sources.reduce<BlockpatchConfig>((merged, source) => {
    if (!source) return merged;
    const { parser, matching, prompt, logging } = source;
    return {
      workspaceRoot: source.workspaceRoot ?? merged.workspaceRoot,
      parser: {
        format: parser?.format ?? merged.parser.format,
        stripLineNumbers: parser?.stripLineNumbers ?? merged.parser.stripLineNumbers,
      },
      matching: {
        fuzzyThreshold: matching?.fuzzyThreshold ?? merged.matching.fuzzyThreshold,
        lineTolerance: matching?.lineTolerance ?? merged.matching.lineTolerance,
        inferAnchorRange: matching?.inferAnchorRange ?? merged.matching.inferAnchorRange,
        emptySearch: matching?.emptySearch ?? merged.matching.emptySearch,
      },
      prompt: {
        lineNumberThreshold: prompt?.lineNumberThreshold ?? merged.prompt.lineNumberThreshold,
      },
      logging: {
        enabled: logging?.enabled ?? merged.logging.enabled,
        directory: logging?.directory ?? merged.logging.directory,
      },
    };
  }, defaults);

const assertValid = (config: BlockpatchConfig): void => {
  const errors = validateMatching(config.matching);
  if (!isReplyFormatOption(config.parser.format)) errors.push("parser.format");
  const { lineNumberThreshold } = config.prompt;
  if (!Number.isInteger(lineNumberThreshold) || lineNumberThreshold < 0) {
    errors.push("prompt.lineNumberThreshold");
  }
  if (!config.logging.directory.trim()) errors.push("logging.directory");
  if (errors.length) {
    throw createConfigInvalidError(errors);
  }
};

/** Defaults, then the config file, then environment, then CLI flags; later sources win. */
export const loadConfig = async (options: LoadConfigOptions = {}): Promise<BlockpatchConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ? path.resolve(cwd, options.configPath) : undefined;
  const fileConfig = await readConfigFile(explicitPath ?? findConfigFile(cwd), explicitPath !== undefined);
  const envConfig = loadEnvConfig(env);

  const defaults: BlockpatchConfig = {
    workspaceRoot: ".",
    parser: DEFAULT_PARSER,
    matching: DEFAULT_MATCHING,
    prompt: DEFAULT_PROMPT,
    logging: DEFAULT_LOGGING,
  };
  const merged = mergeConfigs(defaults, fileConfig, envConfig, options.cli);
  const finalized = { ...merged, workspaceRoot: path.resolve(cwd, merged.workspaceRoot) };
  assertValid(finalized);
  return finalized;
};
