export type BlockpatchErrorCode = "config_invalid" | "config_unreadable" | "input_unreadable";

export type BlockpatchErrorDetails = Record<string, unknown>;

type BlockpatchErrorInput = {
  code: BlockpatchErrorCode;
  message: string;
  details?: BlockpatchErrorDetails;
  cause?: unknown;
};

export class BlockpatchError extends Error {
  readonly code: BlockpatchErrorCode;
  readonly details?: BlockpatchErrorDetails;

  constructor({ code, message, details, cause }: BlockpatchErrorInput) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "BlockpatchError";
    this.code = code;
    this.details = details;
  }
}

export const createConfigInvalidError = (fields: string[]): BlockpatchError =>
  new BlockpatchError({
    code: "config_invalid",
    message: `Invalid config values: ${fields.join(", ")}`,
    details: { fields },
  });

export const createConfigUnreadableError = (configPath: string, cause: unknown): BlockpatchError => {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new BlockpatchError({
    code: "config_unreadable",
    message: `Config file ${configPath} could not be parsed: ${reason}`,
    details: { configPath },
    cause,
  });
};

export const createInputUnreadableError = (label: string, target: string, cause: unknown): BlockpatchError => {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new BlockpatchError({
    code: "input_unreadable",
    message: `Unable to read ${label} ${target}: ${reason}`,
    details: { label, target },
    cause,
  });
};

export const isBlockpatchError = (error: unknown): error is BlockpatchError => error instanceof BlockpatchError;
