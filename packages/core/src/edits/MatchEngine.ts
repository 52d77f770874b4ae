import { DEFAULT_MATCHING, validateMatching, type MatchingConfig } from "../config/Config.js";
import { createConfigInvalidError } from "../errors/BlockpatchError.js";
import type {
  EditInstruction,
  LineHint,
  LocatedOutcome,
  MatchOutcome,
  NotFoundReason,
  TextSpan,
} from "./EditTypes.js";
import { normalizeForMatch, toOriginalSpan } from "./TextNormalizer.js";
import { collapseWhitespace, similarity, similarityCeiling } from "./Similarity.js";
import { bodyLines, endsWithLineBreak, splitLines, type TextLine } from "./TextLines.js";

export interface LocateContext {
  /** End offset of the span accepted for the previous instruction. */
  anchor?: number;
}

interface FuzzyCandidate {
  score: number;
  start: number;
  firstLine: number;
  size: number;
}

const located = (status: LocatedOutcome["status"], span: TextSpan, confidence: number): LocatedOutcome => ({
  status,
  span,
  confidence,
});

const notFound = (reason: NotFoundReason): MatchOutcome => ({ status: "not_found", reason });

const lineSpan = (lines: TextLine[], first: number, last: number, includeBreak: boolean): TextSpan => ({
  start: lines[first].start,
  end: includeBreak ? lines[last].breakEnd : lines[last].end,
});

/** A search with nothing but whitespace marks an insertion, not a target to replace. */
export const isInsertion = (instruction: EditInstruction): boolean => instruction.search.trim() === "";

export class MatchEngine {
  readonly options: MatchingConfig;

  constructor(options: Partial<MatchingConfig> = {}) {
    this.options = { ...DEFAULT_MATCHING, ...options };
    const invalid = validateMatching(this.options);
    if (invalid.length) {
      throw createConfigInvalidError(invalid);
    }
  }

  locate(originalText: string, instruction: EditInstruction, context: LocateContext = {}): MatchOutcome {
    const anchor = context.anchor ?? 0;
    if (isInsertion(instruction)) {
      return this.locateInsertion(originalText, instruction.lineHint);
    }
    const lines = splitLines(originalText);
    const byContent =
      this.matchExact(originalText, instruction.search, anchor) ??
      this.matchNormalized(originalText, instruction.search, anchor) ??
      this.matchFuzzy(lines, instruction.search);
    if (byContent) return byContent;

    if (instruction.lineHint) {
      return this.matchHintedRange(lines, instruction.search, instruction.lineHint);
    }
    if (this.options.inferAnchorRange) {
      const inferred = this.matchAnchorLines(lines, instruction.search);
      if (inferred) return inferred;
    }
    return notFound("no_match");
  }

  private matchExact(text: string, search: string, anchor: number): LocatedOutcome | undefined {
    const first = text.indexOf(search);
    if (first < 0) return undefined;
    let start = first;
    if (first < anchor) {
      const afterAnchor = text.indexOf(search, anchor);
      if (afterAnchor >= 0) start = afterAnchor;
    }
    return located("exact", { start, end: start + search.length }, 1);
  }

  private matchNormalized(text: string, search: string, anchor: number): LocatedOutcome | undefined {
    const needle = normalizeForMatch(search).text;
    if (!needle.trim()) return undefined;
    const haystack = normalizeForMatch(text);
    const first = haystack.text.indexOf(needle);
    if (first < 0) return undefined;

    let start = first;
    if (haystack.starts[first] < anchor) {
      const from = haystack.starts.findIndex((offset) => offset >= anchor);
      const afterAnchor = from >= 0 ? haystack.text.indexOf(needle, from) : -1;
      if (afterAnchor >= 0) start = afterAnchor;
    }
    return located("normalized", toOriginalSpan(text, haystack, start, start + needle.length), 1);
  }

  private matchFuzzy(lines: TextLine[], search: string): LocatedOutcome | undefined {
    const searchLines = bodyLines(search);
    const target = collapseWhitespace(searchLines.join("\n"));
    if (!target || lines.length === 0) return undefined;

    const collapsed = lines.map((line) => collapseWhitespace(line.text));
    const size = searchLines.length;
    const { fuzzyThreshold, lineTolerance } = this.options;
    let best: FuzzyCandidate | undefined;

    const isBetter = (candidate: FuzzyCandidate): boolean => {
      if (!best) return true;
      if (candidate.score !== best.score) return candidate.score > best.score;
      if (candidate.start !== best.start) return candidate.start < best.start;
      const candidateGap = Math.abs(candidate.size - size);
      const bestGap = Math.abs(best.size - size);
      if (candidateGap !== bestGap) return candidateGap < bestGap;
      return candidate.size < best.size;
    };

    for (let windowSize = Math.max(1, size - lineTolerance); windowSize <= size + lineTolerance; windowSize += 1) {
      for (let first = 0; first + windowSize <= lines.length; first += 1) {
        const window = collapsed
          .slice(first, first + windowSize)
          .filter(Boolean)
          .join(" ");
        if (similarityCeiling(window.length, target.length) < fuzzyThreshold) continue;
        const score = similarity(window, target);
        if (score < fuzzyThreshold) continue;
        const candidate = { score, start: lines[first].start, firstLine: first, size: windowSize };
        if (isBetter(candidate)) best = candidate;
      }
    }
    if (!best) return undefined;

    const span = lineSpan(lines, best.firstLine, best.firstLine + best.size - 1, endsWithLineBreak(search));
    return located("fuzzy", span, best.score);
  }

  private matchHintedRange(lines: TextLine[], search: string, hint: LineHint): MatchOutcome {
    const { startLine } = hint;
    if (!Number.isInteger(startLine) || startLine < 1 || startLine > lines.length) {
      return notFound("invalid_line_hint");
    }
    const requestedEnd = hint.endLine ?? startLine + Math.max(bodyLines(search).length, 1) - 1;
    const endLine = Math.min(Math.max(requestedEnd, startLine), lines.length);
    return located("line_range", lineSpan(lines, startLine - 1, endLine - 1, endsWithLineBreak(search)), 0);
  }

  /**
   * Infers the range from the first, middle and last non-blank search lines,
   * found in order and no further apart than twice the search's size.
   */
  private matchAnchorLines(lines: TextLine[], search: string): LocatedOutcome | undefined {
    const significant = bodyLines(search).filter((line) => line.trim() !== "");
    if (significant.length < 3) return undefined;

    const keys = [
      significant[0].trim(),
      significant[Math.floor(significant.length / 2)].trim(),
      significant[significant.length - 1].trim(),
    ];
    const found: number[] = [];
    let from = 0;
    for (const key of keys) {
      let index = -1;
      for (let candidate = from; candidate < lines.length; candidate += 1) {
        if (lines[candidate].text.trim() === key) {
          index = candidate;
          break;
        }
      }
      if (index < 0) return undefined;
      found.push(index);
      from = index + 1;
    }

    const first = found[0];
    const last = found[found.length - 1];
    if (last - first + 1 > significant.length * 2) return undefined;
    return located("line_range", lineSpan(lines, first, last, endsWithLineBreak(search)), 0);
  }

  private locateInsertion(text: string, hint: LineHint | undefined): MatchOutcome {
    if (!hint) {
      if (this.options.emptySearch === "reject") return notFound("no_match");
      return located("exact", { start: text.length, end: text.length }, 1);
    }
    const lines = splitLines(text);
    const { startLine } = hint;
    if (!Number.isInteger(startLine) || startLine < 1 || startLine > lines.length + 1) {
      return notFound("invalid_line_hint");
    }
    const offset = startLine > lines.length ? text.length : lines[startLine - 1].start;
    return located("line_range", { start: offset, end: offset }, 0);
  }
}
