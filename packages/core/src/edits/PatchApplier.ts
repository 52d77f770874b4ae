import type { MatchingConfig } from "../config/Config.js";
import {
  isLocated,
  type AppliedBlock,
  type EditInstruction,
  type LocatedOutcome,
  type MatchOutcome,
  type PatchResult,
  type TextSpan,
} from "./EditTypes.js";
import { MatchEngine, isInsertion } from "./MatchEngine.js";
import { buildStatusMessage } from "./OutcomeReporter.js";
import {
  bodyLines,
  convertLineEndings,
  detectLineEnding,
  endsWithLineBreak,
  isLineStart,
  leadingWhitespace,
  lineEndingOf,
  type LineEnding,
} from "./TextLines.js";

export interface PatchApplierOptions {
  matching?: Partial<MatchingConfig>;
  engine?: MatchEngine;
}

interface PlannedEdit {
  orderIndex: number;
  span: TextSpan;
  replacement: string;
}

interface ApplyState {
  accepted: PlannedEdit[];
  anchor: number;
  blocks: AppliedBlock[];
}

const overlaps = (left: TextSpan, right: TextSpan): boolean => {
  if (left.start === left.end && right.start === right.end) return false;
  if (left.start === left.end) return right.start < left.start && left.start < right.end;
  if (right.start === right.end) return left.start < right.start && right.start < left.end;
  return left.start < right.end && right.start < left.end;
};

const firstIndent = (value: string): string | undefined => {
  const line = bodyLines(value).find((entry) => entry.trim() !== "");
  return line === undefined ? undefined : leadingWhitespace(line);
};

/** Moves lines of `replace` from the indentation the model used to the file's. */
const reindent = (replace: string, from: string, to: string): string => {
  if (from === to) return replace;
  return replace
    .split(/(\r\n|\r|\n)/)
    .map((part, index) => {
      if (index % 2 === 1 || part.trim() === "" || !part.startsWith(from)) return part;
      return `${to}${part.slice(from.length)}`;
    })
    .join("");
};

const planInsertion = (text: string, span: TextSpan, replace: string, eol: LineEnding): string => {
  if (replace === "" || text === "") return replace;
  if (span.start >= text.length) {
    if (endsWithLineBreak(text)) return endsWithLineBreak(replace) ? replace : `${replace}${eol}`;
    return `${eol}${replace}`;
  }
  return endsWithLineBreak(replace) ? replace : `${replace}${eol}`;
};

/**
 * Turns a located outcome into the slice of text to swap. The span is spliced as
 * located; the replacement takes the line ending of the text it replaces and,
 * for non-exact matches, that text's indentation.
 */
const planEdit = (text: string, instruction: EditInstruction, outcome: LocatedOutcome, eol: LineEnding): PlannedEdit => {
  const { orderIndex } = instruction;
  const span = outcome.span;

  if (isInsertion(instruction)) {
    const replace = convertLineEndings(instruction.replace, eol);
    return { orderIndex, span, replacement: planInsertion(text, span, replace, eol) };
  }

  const matched = text.slice(span.start, span.end);
  const style = lineEndingOf(matched);
  // Mixed endings in the target leave the replacement as written.
  let replacement = style === "mixed" ? instruction.replace : convertLineEndings(instruction.replace, style ?? eol);

  if (outcome.status !== "exact" && isLineStart(text, span.start)) {
    const from = firstIndent(instruction.search);
    if (from !== undefined) replacement = reindent(replacement, from, firstIndent(matched) ?? "");
  }

  return { orderIndex, span, replacement };
};

const applyPlanned = (text: string, edits: PlannedEdit[]): string => {
  const ordered = [...edits].sort(
    (left, right) =>
      right.span.start - left.span.start || right.span.end - left.span.end || right.orderIndex - left.orderIndex,
  );
  return ordered.reduce(
    (result, edit) => `${result.slice(0, edit.span.start)}${edit.replacement}${result.slice(edit.span.end)}`,
    text,
  );
};

export class PatchApplier {
  private readonly engine: MatchEngine;

  constructor(options: PatchApplierOptions = {}) {
    this.engine = options.engine ?? new MatchEngine(options.matching);
  }

  apply(originalText: string, instructions: readonly EditInstruction[]): PatchResult {
    const eol = detectLineEnding(originalText);
    const ordered = [...instructions].sort((left, right) => left.orderIndex - right.orderIndex);

    const state = ordered.reduce<ApplyState>(
      (current, instruction) => {
        const outcome = this.engine.locate(originalText, instruction, { anchor: current.anchor });
        if (!isLocated(outcome)) {
          return { ...current, blocks: [...current.blocks, { instruction, outcome }] };
        }
        const planned = planEdit(originalText, instruction, outcome, eol);
        const conflict = current.accepted.find((edit) => overlaps(edit.span, planned.span));
        if (conflict) {
          const rejected: MatchOutcome = {
            status: "not_found",
            reason: "overlap_conflict",
            conflictsWith: conflict.orderIndex,
          };
          return { ...current, blocks: [...current.blocks, { instruction, outcome: rejected }] };
        }
        return {
          accepted: [...current.accepted, planned],
          anchor: planned.span.end,
          blocks: [...current.blocks, { instruction, outcome }],
        };
      },
      { accepted: [], anchor: 0, blocks: [] },
    );

    const totalApplied = state.accepted.length;
    const failedBlockNumbers = state.blocks.flatMap((block, index) => (isLocated(block.outcome) ? [] : [index + 1]));
    return {
      newContent: applyPlanned(originalText, state.accepted),
      appliedBlocks: state.blocks,
      totalApplied,
      totalFailed: failedBlockNumbers.length,
      failedBlockNumbers,
      isFullyApplied: failedBlockNumbers.length === 0,
      statusMessage: buildStatusMessage(state.blocks),
    };
  }
}

export const applyEdits = (
  originalText: string,
  instructions: readonly EditInstruction[],
  options: PatchApplierOptions = {},
): PatchResult => new PatchApplier(options).apply(originalText, instructions);
