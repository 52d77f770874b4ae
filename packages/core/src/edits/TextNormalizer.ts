import type { TextSpan } from "./EditTypes.js";
import { isHorizontalWhitespace, lineStartAt, splitLines } from "./TextLines.js";

export interface NormalizedText {
  text: string;
  /** Original offset of each normalized character. */
  starts: number[];
  /** Original offset just past each normalized character. */
  ends: number[];
}

/**
 * Line endings become `\n`, each line loses its leading and trailing horizontal
 * whitespace and inner runs of it collapse to a single space. Every emitted
 * character remembers the original range it stands for.
 */
export const normalizeForMatch = (input: string): NormalizedText => {
  let text = "";
  const starts: number[] = [];
  const ends: number[] = [];
  const emit = (char: string, start: number, end: number): void => {
    text += char;
    starts.push(start);
    ends.push(end);
  };

  for (const line of splitLines(input)) {
    let index = line.start;
    while (index < line.end && isHorizontalWhitespace(input[index])) index += 1;
    let contentEnd = line.end;
    while (contentEnd > index && isHorizontalWhitespace(input[contentEnd - 1])) contentEnd -= 1;

    while (index < contentEnd) {
      if (isHorizontalWhitespace(input[index])) {
        let runEnd = index;
        while (runEnd < contentEnd && isHorizontalWhitespace(input[runEnd])) runEnd += 1;
        emit(" ", index, runEnd);
        index = runEnd;
        continue;
      }
      emit(input[index], index, index + 1);
      index += 1;
    }
    if (line.breakEnd > line.end) {
      emit("\n", line.end, line.breakEnd);
    }
  }

  return { text, starts, ends };
};

/**
 * Maps `[start, end)` of `normalized.text` back onto the original text. A match
 * that begins a normalized line takes that line's indentation with it; one that
 * ends a line takes the trailing whitespace.
 */
export const toOriginalSpan = (
  original: string,
  normalized: NormalizedText,
  start: number,
  end: number,
): TextSpan => {
  let spanStart = normalized.starts[start];
  let spanEnd = normalized.ends[end - 1];
  if (start === 0 || normalized.text[start - 1] === "\n") {
    spanStart = lineStartAt(original, spanStart);
  }
  const endsWithBreak = normalized.text[end - 1] === "\n";
  const atLineEnd = end === normalized.text.length || normalized.text[end] === "\n";
  if (!endsWithBreak && atLineEnd) {
    while (isHorizontalWhitespace(original[spanEnd])) spanEnd += 1;
  }
  return { start: spanStart, end: spanEnd };
};
