import { DEFAULT_PARSER, type ParserConfig } from "../config/Config.js";
import type {
  EditInstruction,
  LineHint,
  ParseDiagnostic,
  ParsedReply,
  ReplyFormat,
} from "./EditTypes.js";
import { detectLineEnding } from "./TextLines.js";

export type ParseOptions = Partial<ParserConfig>;

interface RawBlock {
  line: number;
  search: string;
  replace: string;
  lineHint?: LineHint;
}

interface RawParse {
  blocks: RawBlock[];
  diagnostics: ParseDiagnostic[];
}

type Marker = "search" | "replace" | "end";

interface OpenBlock {
  line: number;
  section: "search" | "replace";
  search: string[];
  replace: string[];
  lineHint?: LineHint;
}

export interface StrippedSection {
  text: string;
  /** Prefix numbers of the lines that carried one, in order. */
  lineNumbers: number[];
}

const LINE_NUMBER_PREFIX = /^(\d{1,5})\|\s/;
const HINT_COMMENT = /^\s*(?:#|\/\/)\s*near\s+lines?\s+(\d+)(?:\s*-\s*(\d+))?\s*$/i;
const HINT_ATTRIBUTE = /\blines?\s*=\s*["'](\d+)(?:\s*-\s*(\d+))?["']/i;

const skipped = (line: number, reason: string): ParseDiagnostic => ({
  code: "parse_skipped",
  message: `Block at line ${line} skipped: ${reason}`,
  line,
});

const toLineHint = (start: string, end: string | undefined): LineHint => {
  const startLine = Number.parseInt(start, 10);
  const endLine = end === undefined ? undefined : Number.parseInt(end, 10);
  return endLine === undefined || endLine === startLine ? { startLine } : { startLine, endLine };
};

/** Reads `# near line 42` or `// near lines 10-14`. */
export const parseHintComment = (line: string): LineHint | undefined => {
  const match = HINT_COMMENT.exec(line);
  return match ? toLineHint(match[1], match[2]) : undefined;
};

/**
 * Removes `N| ` prefixes when more than half of the lines carry one, which is
 * how a numbered file view leaks into a reply.
 */
export const stripLineNumberPrefixes = (section: string): StrippedSection => {
  if (!section.trim()) return { text: section, lineNumbers: [] };
  const lines = section.split("\n");
  const numbered = lines.filter((line) => LINE_NUMBER_PREFIX.test(line)).length;
  if (numbered * 2 <= lines.length) return { text: section, lineNumbers: [] };

  const lineNumbers: number[] = [];
  const text = lines
    .map((line) => {
      const match = LINE_NUMBER_PREFIX.exec(line);
      if (!match) return line;
      lineNumbers.push(Number.parseInt(match[1], 10));
      return line.slice(match[0].length);
    })
    .join("\n");
  return { text, lineNumbers };
};

const markerOf = (line: string): Marker | undefined => {
  switch (line.trim()) {
    case "<<<SEARCH>>>":
      return "search";
    case "<<<REPLACE>>>":
      return "replace";
    case "<<<END>>>":
      return "end";
    default:
      return undefined;
  }
};

const parseMarkerBlocks = (reply: string): RawParse => {
  const eol = detectLineEnding(reply);
  const lines = reply.split(/\r?\n/);
  const blocks: RawBlock[] = [];
  const diagnostics: ParseDiagnostic[] = [];
  let open: OpenBlock | undefined;

  const openAt = (index: number): OpenBlock => ({
    line: index + 1,
    section: "search",
    search: [],
    replace: [],
    lineHint: index > 0 ? parseHintComment(lines[index - 1]) : undefined,
  });

  const close = (block: OpenBlock): void => {
    let searchLines = block.search;
    let lineHint = block.lineHint;
    const inlineHint = searchLines.length ? parseHintComment(searchLines[0]) : undefined;
    if (inlineHint) {
      searchLines = searchLines.slice(1);
      lineHint = lineHint ?? inlineHint;
    }
    blocks.push({
      line: block.line,
      search: searchLines.join(eol),
      replace: block.replace.join(eol),
      lineHint,
    });
  };

  for (const [index, line] of lines.entries()) {
    const marker = markerOf(line);
    if (!open) {
      if (marker === "search") {
        open = openAt(index);
      } else if (marker) {
        diagnostics.push(skipped(index + 1, `stray ${line.trim()} outside a block`));
      }
      continue;
    }
    if (!marker) {
      open[open.section].push(line);
      continue;
    }
    if (marker === "search") {
      diagnostics.push(skipped(open.line, "a new <<<SEARCH>>> started before <<<END>>>"));
      open = openAt(index);
      continue;
    }
    if (marker === "replace") {
      if (open.section === "replace") {
        diagnostics.push(skipped(open.line, "duplicate <<<REPLACE>>>"));
        open = undefined;
        continue;
      }
      open.section = "replace";
      continue;
    }
    if (open.section === "search") {
      diagnostics.push(skipped(open.line, "missing <<<REPLACE>>> section"));
    } else {
      close(open);
    }
    open = undefined;
  }

  if (open) {
    diagnostics.push(skipped(open.line, "unterminated block"));
  }
  return { blocks, diagnostics };
};

const lineAt = (text: string, offset: number): number => {
  let line = 1;
  for (let index = 0; index < offset; index += 1) {
    if (text[index] === "\n") line += 1;
  }
  return line;
};

/** Drops one leading and one trailing line break inside a tag. */
const trimTagNewlines = (value: string): string => value.replace(/^\r?\n/, "").replace(/\r?\n$/, "");

const parseTagBlocks = (reply: string): RawParse => {
  const blocks: RawBlock[] = [];
  const diagnostics: ParseDiagnostic[] = [];
  const openings = [...reply.matchAll(/<block\b([^>]*)>/g)];

  openings.forEach((opening, position) => {
    const openedAt = opening.index ?? 0;
    const line = lineAt(reply, openedAt);
    const bodyStart = openedAt + opening[0].length;
    const closedAt = reply.indexOf("</block>", bodyStart);
    const nextOpening = openings[position + 1]?.index ?? reply.length;
    if (closedAt < 0 || closedAt > nextOpening) {
      diagnostics.push(skipped(line, "missing </block>"));
      return;
    }
    const body = reply.slice(bodyStart, closedAt);
    const search = /<search>([\s\S]*?)<\/search>/.exec(body);
    if (!search) {
      diagnostics.push(skipped(line, "missing <search> section"));
      return;
    }
    const replace = /<replace>([\s\S]*?)<\/replace>/.exec(body);
    if (!replace) {
      diagnostics.push(skipped(line, "missing <replace> section"));
      return;
    }
    const hint = HINT_ATTRIBUTE.exec(opening[1]);
    blocks.push({
      line,
      search: trimTagNewlines(search[1]),
      replace: trimTagNewlines(replace[1]),
      lineHint: hint ? toLineHint(hint[1], hint[2]) : undefined,
    });
  });

  return { blocks, diagnostics };
};

const extractSummary = (reply: string): string | undefined => {
  const match = /<summary>\s*([\s\S]*?)\s*<\/summary>/.exec(reply);
  const summary = match?.[1].trim();
  return summary ? summary : undefined;
};

export const detectReplyFormat = (reply: string): ReplyFormat | undefined => {
  if (reply.split(/\r?\n/).some((line) => markerOf(line) === "search")) return "markers";
  if (/<block\b/.test(reply)) return "tags";
  return undefined;
};

const toInstruction = (block: RawBlock, orderIndex: number, stripLineNumbers: boolean): EditInstruction => {
  if (!stripLineNumbers) {
    return { search: block.search, replace: block.replace, orderIndex, lineHint: block.lineHint };
  }
  const search = stripLineNumberPrefixes(block.search);
  const replace = stripLineNumberPrefixes(block.replace);
  let lineHint = block.lineHint;
  if (!lineHint && search.lineNumbers.length) {
    const first = search.lineNumbers[0];
    const last = search.lineNumbers[search.lineNumbers.length - 1];
    lineHint = toLineHint(String(first), last > first ? String(last) : undefined);
  }
  return { search: search.text, replace: replace.text, orderIndex, lineHint };
};

const withoutUndefinedHint = (instruction: EditInstruction): EditInstruction => {
  if (instruction.lineHint) return instruction;
  const { search, replace, orderIndex } = instruction;
  return { search, replace, orderIndex };
};

/**
 * Turns a model reply into ordered edit instructions. Malformed blocks are
 * dropped with a `parse_skipped` diagnostic; the rest still parse.
 */
export const parseEditReply = (reply: string, options: ParseOptions = {}): ParsedReply => {
  const { format, stripLineNumbers } = { ...DEFAULT_PARSER, ...options };
  if (!reply.trim()) return { instructions: [], diagnostics: [] };

  const resolved = format === "auto" ? detectReplyFormat(reply) : format;
  const summary = extractSummary(reply);
  if (!resolved) {
    return summary ? { instructions: [], diagnostics: [], summary } : { instructions: [], diagnostics: [] };
  }

  const raw = resolved === "markers" ? parseMarkerBlocks(reply) : parseTagBlocks(reply);
  const instructions = raw.blocks.map((block, index) =>
    withoutUndefinedHint(toInstruction(block, index, stripLineNumbers)),
  );
  const parsed: ParsedReply = { instructions, diagnostics: raw.diagnostics, format: resolved };
  if (summary) parsed.summary = summary;
  return parsed;
};
