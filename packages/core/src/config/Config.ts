import type { ReplyFormatOption } from "../edits/EditTypes.js";

export type EmptySearchPolicy = "append" | "reject";

export interface ParserConfig {
  format: ReplyFormatOption;
  stripLineNumbers: boolean;
}

export interface MatchingConfig {
  fuzzyThreshold: number;
  lineTolerance: number;
  inferAnchorRange: boolean;
  emptySearch: EmptySearchPolicy;
}

export interface PromptConfig {
  lineNumberThreshold: number;
}

export interface LoggingConfig {
  enabled: boolean;
  directory: string;
}

export interface BlockpatchConfig {
  workspaceRoot: string;
  parser: ParserConfig;
  matching: MatchingConfig;
  prompt: PromptConfig;
  logging: LoggingConfig;
}

export const DEFAULT_LOG_DIR = "logs/blockpatch";

export const DEFAULT_PARSER: ParserConfig = {
  format: "auto",
  stripLineNumbers: true,
};

// 0.80 and one line of slack are starting points; tune them against real replies.
export const DEFAULT_MATCHING: MatchingConfig = {
  fuzzyThreshold: 0.8,
  lineTolerance: 1,
  inferAnchorRange: true,
  emptySearch: "append",
};

export const DEFAULT_PROMPT: PromptConfig = {
  lineNumberThreshold: 300,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  enabled: true,
  directory: DEFAULT_LOG_DIR,
};

export const REPLY_FORMAT_OPTIONS: readonly ReplyFormatOption[] = ["auto", "markers", "tags"];

export const EMPTY_SEARCH_POLICIES: readonly EmptySearchPolicy[] = ["append", "reject"];

export const isReplyFormatOption = (value: string): value is ReplyFormatOption =>
  REPLY_FORMAT_OPTIONS.some((option) => option === value);

export const isEmptySearchPolicy = (value: string): value is EmptySearchPolicy =>
  EMPTY_SEARCH_POLICIES.some((policy) => policy === value);

/** Field names of `matching` that fail validation; empty when the values are usable. */
export const validateMatching = (matching: MatchingConfig): string[] => {
  const errors: string[] = [];
  if (
    !Number.isFinite(matching.fuzzyThreshold) ||
    matching.fuzzyThreshold <= 0 ||
    matching.fuzzyThreshold > 1
  ) {
    errors.push("matching.fuzzyThreshold");
  }
  if (!Number.isInteger(matching.lineTolerance) || matching.lineTolerance < 0) {
    errors.push("matching.lineTolerance");
  }
  if (!isEmptySearchPolicy(matching.emptySearch)) {
    errors.push("matching.emptySearch");
  }
  return errors;
};
