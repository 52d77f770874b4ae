import { createTwoFilesPatch, diffLines } from "diff";
import { isLocated, type AppliedBlock, type MatchOutcome, type MatchStatus, type PatchResult } from "./EditTypes.js";
import { bodyLines } from "./TextLines.js";

export type StatusTone = "success" | "warning" | "caution" | "error" | "neutral";

export interface PatchSummary {
  headline: string;
  counts: Record<MatchStatus, number>;
  /** Some block landed through a fuzzy or line-range match and deserves a look. */
  needsReview: boolean;
  lines: string[];
}

export interface RenderReportOptions {
  fileName?: string;
  /** Needed for `diff`; the text the patch was applied to. */
  originalContent?: string;
  diff?: boolean;
  previews?: boolean;
}

const BADGES: Record<MatchStatus, string> = {
  pending: "PENDING",
  exact: "EXACT",
  normalized: "NORM",
  fuzzy: "FUZZY",
  line_range: "RANGE",
  not_found: "NOT FOUND",
};

const PREVIEW_WIDTH = 60;

export const formatStatusBadge = (status: MatchStatus): string => BADGES[status];

export const statusTone = (status: MatchStatus): StatusTone => {
  switch (status) {
    case "exact":
    case "normalized":
      return "success";
    case "fuzzy":
      return "warning";
    case "line_range":
      return "caution";
    case "not_found":
      return "error";
    case "pending":
      return "neutral";
  }
};

const blockNumbers = (blocks: readonly AppliedBlock[], predicate: (outcome: MatchOutcome) => boolean): string[] =>
  blocks.flatMap((block, index) => (predicate(block.outcome) ? [`#${index + 1}`] : []));

export const buildStatusMessage = (blocks: readonly AppliedBlock[]): string => {
  if (blocks.length === 0) return "No changes proposed";
  const applied = blocks.filter((block) => isLocated(block.outcome)).length;
  const missing = blockNumbers(
    blocks,
    (outcome) => outcome.status === "not_found" && outcome.reason !== "overlap_conflict",
  );
  const overlapping = blockNumbers(
    blocks,
    (outcome) => outcome.status === "not_found" && outcome.reason === "overlap_conflict",
  );
  const pending = blockNumbers(blocks, (outcome) => outcome.status === "pending");

  const parts = [`${applied}/${blocks.length} edits applied`];
  if (missing.length) parts.push(`${missing.length} not found (${missing.join(", ")})`);
  if (overlapping.length) parts.push(`${overlapping.length} overlapping (${overlapping.join(", ")})`);
  if (pending.length) parts.push(`${pending.length} pending (${pending.join(", ")})`);
  return parts.join(", ");
};

const previewOf = (search: string): string => {
  const firstLine = bodyLines(search).find((line) => line.trim() !== "");
  if (firstLine === undefined) return "(insertion)";
  const trimmed = firstLine.trim();
  return trimmed.length > PREVIEW_WIDTH ? `${trimmed.slice(0, PREVIEW_WIDTH - 3)}...` : trimmed;
};

const outcomeLabel = (blocks: readonly AppliedBlock[], block: AppliedBlock): string => {
  const { outcome } = block;
  const badge = formatStatusBadge(outcome.status);
  if (outcome.status === "fuzzy") {
    return `${badge} ${Math.round(outcome.confidence * 100)}%`;
  }
  if (outcome.status !== "not_found") return badge;
  if (outcome.reason === "overlap_conflict") {
    const position = blocks.findIndex((entry) => entry.instruction.orderIndex === outcome.conflictsWith);
    return position >= 0 ? `${badge} (overlaps #${position + 1})` : `${badge} (overlap)`;
  }
  if (outcome.reason === "invalid_line_hint") return `${badge} (line hint out of range)`;
  return badge;
};

/** One line per block: position, badge and the first line of its search text. */
export const describeBlocks = (blocks: readonly AppliedBlock[]): string[] =>
  blocks.map((block, index) => `#${index + 1} ${outcomeLabel(blocks, block)}  ${previewOf(block.instruction.search)}`);

export const summarizePatch = (result: PatchResult): PatchSummary => {
  const counts: Record<MatchStatus, number> = {
    pending: 0,
    exact: 0,
    normalized: 0,
    fuzzy: 0,
    line_range: 0,
    not_found: 0,
  };
  for (const block of result.appliedBlocks) {
    counts[block.outcome.status] += 1;
  }
  return {
    headline: result.statusMessage,
    counts,
    needsReview: counts.fuzzy > 0 || counts.line_range > 0,
    lines: describeBlocks(result.appliedBlocks),
  };
};

const prefixLines = (value: string, prefix: string): string[] => bodyLines(value).map((line) => `${prefix}${line}`);

export const renderBlockPreview = (block: AppliedBlock, position: number): string => {
  const header = `@@ #${position} ${formatStatusBadge(block.outcome.status)} @@`;
  const body = diffLines(block.instruction.search, block.instruction.replace).flatMap((change) => {
    if (change.added) return prefixLines(change.value, "+");
    if (change.removed) return prefixLines(change.value, "-");
    return prefixLines(change.value, " ");
  });
  return [header, ...body].join("\n");
};

export const renderUnifiedDiff = (fileName: string, original: string, updated: string): string =>
  createTwoFilesPatch(`a/${fileName}`, `b/${fileName}`, original, updated, undefined, undefined, { context: 3 });

export const renderReport = (result: PatchResult, options: RenderReportOptions = {}): string => {
  const summary = summarizePatch(result);
  const sections: string[] = [];
  const title = options.fileName ? `${options.fileName}: ${summary.headline}` : summary.headline;
  sections.push([title, ...summary.lines].join("\n"));
  if (summary.needsReview) {
    sections.push("Review FUZZY and RANGE blocks before writing the result.");
  }
  if (options.previews) {
    sections.push(...result.appliedBlocks.map((block, index) => renderBlockPreview(block, index + 1)));
  }
  if (options.diff && options.originalContent !== undefined && result.newContent !== options.originalContent) {
    sections.push(renderUnifiedDiff(options.fileName ?? "file", options.originalContent, result.newContent).trimEnd());
  }
  return sections.join("\n\n");
};
