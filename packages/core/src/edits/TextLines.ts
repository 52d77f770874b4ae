export type LineEnding = "\n" | "\r\n";

export interface TextLine {
  /** Offset of the first character of the line. */
  start: number;
  /** Offset just past the last character, before the line break. */
  end: number;
  /** Offset just past the line break (equals `end` on a last line without one). */
  breakEnd: number;
  text: string;
}

export const HORIZONTAL_WHITESPACE = /[ \t\f\v\u00a0]/;

export const isHorizontalWhitespace = (char: string | undefined): boolean =>
  char !== undefined && HORIZONTAL_WHITESPACE.test(char);

/**
 * Splits text into lines with their offsets. A trailing line break does not open
 * an extra empty line, so `"a\nb\n"` has two lines and `""` has none.
 */
export const splitLines = (text: string): TextLine[] => {
  const lines: TextLine[] = [];
  let start = 0;
  for (const match of text.matchAll(/\r\n|\r|\n/g)) {
    const index = match.index ?? 0;
    lines.push({
      start,
      end: index,
      breakEnd: index + match[0].length,
      text: text.slice(start, index),
    });
    start = index + match[0].length;
  }
  if (start < text.length) {
    lines.push({ start, end: text.length, breakEnd: text.length, text: text.slice(start) });
  }
  return lines;
};

export const detectLineEnding = (text: string): LineEnding => {
  const crlf = (text.match(/\r\n/g) ?? []).length;
  const lf = (text.match(/(?<!\r)\n/g) ?? []).length;
  return crlf > lf ? "\r\n" : "\n";
};

/** The one line ending `value` uses, `"mixed"` when it has both, undefined when it has none. */
export const lineEndingOf = (value: string): LineEnding | "mixed" | undefined => {
  const crlf = /\r\n/.test(value);
  const lf = /(?<!\r)\n/.test(value);
  if (crlf && lf) return "mixed";
  if (crlf) return "\r\n";
  return lf ? "\n" : undefined;
};

export const convertLineEndings = (value: string, eol: LineEnding): string =>
  value.replace(/\r\n|\r|\n/g, eol);

export const endsWithLineBreak = (value: string): boolean => /(\r\n|\r|\n)$/.test(value);

export const stripTrailingLineBreak = (value: string): string => value.replace(/(\r\n|\r|\n)$/, "");

export const leadingWhitespace = (line: string): string => {
  let index = 0;
  while (index < line.length && isHorizontalWhitespace(line[index])) index += 1;
  return line.slice(0, index);
};

export const lineStartAt = (text: string, offset: number): number => {
  let index = offset;
  while (index > 0 && text[index - 1] !== "\n" && text[index - 1] !== "\r") index -= 1;
  return index;
};

export const isLineStart = (text: string, offset: number): boolean => lineStartAt(text, offset) === offset;

/** Lines of a search/replace body, ignoring one trailing line break. */
export const bodyLines = (value: string): string[] => {
  if (value === "") return [];
  return stripTrailingLineBreak(value).split(/\r\n|\r|\n/);
};
