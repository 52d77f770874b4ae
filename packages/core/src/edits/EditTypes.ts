/** Half-open `[start, end)` range of UTF-16 offsets into the original text. */
export interface TextSpan {
  start: number;
  end: number;
}

/** 1-based, inclusive line range the model pointed at. */
export interface LineHint {
  startLine: number;
  endLine?: number;
}

export interface EditInstruction {
  search: string;
  replace: string;
  orderIndex: number;
  lineHint?: LineHint;
}

export type LocatedStatus = "exact" | "normalized" | "fuzzy" | "line_range";

export type MatchStatus = "pending" | LocatedStatus | "not_found";

export type NotFoundReason = "no_match" | "overlap_conflict" | "invalid_line_hint";

export interface LocatedOutcome {
  status: LocatedStatus;
  span: TextSpan;
  confidence: number;
}

export interface PendingOutcome {
  status: "pending";
}

export interface NotFoundOutcome {
  status: "not_found";
  reason: NotFoundReason;
  conflictsWith?: number;
}

export type MatchOutcome = LocatedOutcome | PendingOutcome | NotFoundOutcome;

export interface AppliedBlock {
  readonly instruction: EditInstruction;
  readonly outcome: MatchOutcome;
}

export interface PatchResult {
  newContent: string;
  appliedBlocks: AppliedBlock[];
  totalApplied: number;
  totalFailed: number;
  /** 1-based positions in `appliedBlocks` of the blocks that did not apply. */
  failedBlockNumbers: number[];
  isFullyApplied: boolean;
  statusMessage: string;
}

export type ReplyFormat = "markers" | "tags";

export type ReplyFormatOption = "auto" | ReplyFormat;

export interface ParseDiagnostic {
  code: "parse_skipped";
  message: string;
  /** 1-based line in the reply where the dropped block started. */
  line: number;
}

export interface ParsedReply {
  instructions: EditInstruction[];
  diagnostics: ParseDiagnostic[];
  format?: ReplyFormat;
  summary?: string;
}

export const isLocated = (outcome: MatchOutcome): outcome is LocatedOutcome =>
  outcome.status === "exact" ||
  outcome.status === "normalized" ||
  outcome.status === "fuzzy" ||
  outcome.status === "line_range";

export const PENDING_OUTCOME: PendingOutcome = { status: "pending" };
