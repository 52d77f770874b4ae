import { DEFAULT_PROMPT } from "../config/Config.js";
import type { ReplyFormat } from "./EditTypes.js";
import { splitLines } from "./TextLines.js";

export interface EditPromptInput {
  fileName: string;
  content: string;
  instructions: string;
  format?: ReplyFormat;
  lineNumberThreshold?: number;
}

export interface EditPrompt {
  system: string;
  user: string;
  /** The file was sent with `N| ` prefixes. */
  numbered: boolean;
}

const TAG_FORMAT = [
  "<edits>",
  "<block>",
  "<search>",
  "exact lines copied from the original file",
  "</search>",
  "<replace>",
  "new replacement lines",
  "</replace>",
  "</block>",
  "</edits>",
  "<summary>One-line description of all changes made</summary>",
].join("\n");

const MARKER_FORMAT = [
  "<<<SEARCH>>>",
  "exact lines copied from the original file",
  "<<<REPLACE>>>",
  "new replacement lines",
  "<<<END>>>",
].join("\n");

const sectionNames = (format: ReplyFormat): { search: string; replace: string; block: string } =>
  format === "tags"
    ? { search: "<search>", replace: "<replace>", block: "<block>" }
    : { search: "the SEARCH section", replace: "the REPLACE section", block: "block" };

const buildRules = (format: ReplyFormat): string[] => {
  const names = sectionNames(format);
  const noChanges =
    format === "tags"
      ? "If no changes are needed, return: <edits></edits><summary>No changes needed: [reason]</summary>"
      : "If no changes are needed, return no blocks and one line starting with: No changes needed:";
  return [
    "RULE 1: EXACT COPY",
    `The content of ${names.search} must be a character-perfect copy from the original file.`,
    "- Preserve every space, tab, newline, comma, semicolon and bracket.",
    `- Do not fix typos, reformat or add or remove blank lines inside ${names.search}.`,
    '- If the file has line number prefixes like "42| ", strip them and write only the raw code.',
    "",
    "RULE 2: UNIQUE CONTEXT",
    `Each ${names.search} must match exactly one location in the file.`,
    "- Include 3-7 surrounding context lines to make it unique.",
    '- If a line like "}" or "return null" appears many times, include more lines above or below.',
    "",
    "RULE 3: MINIMAL CHANGES",
    "- Change only what the user asked for. Do not refactor, rename or reformat anything else.",
    "- Do not touch imports, comments or code outside the requested scope.",
    "",
    "RULE 4: MULTIPLE BLOCKS",
    `- Use a separate ${names.block} for changes in different parts of the file.`,
    "- Order blocks from the top of the file to the bottom.",
    "- Blocks must not overlap or share lines.",
    "",
    "RULE 5: SPECIAL OPERATIONS",
    `- Delete code: put it in ${names.search} and leave ${names.replace} empty.`,
    `- Insert after line N: put line N in ${names.search}, and line N followed by the new code in ${names.replace}.`,
    `- Insert before line N: put lines N-1 and N in ${names.search}, and line N-1, the new code and line N in ${names.replace}.`,
    "- Replace an entire function: include its full signature and body.",
    "",
    "RULE 6: OUTPUT DISCIPLINE",
    "- Output only the format above. No markdown fences, no explanations.",
    `- ${noChanges}`,
    "- Never output the entire file, only the changed blocks.",
    "",
    "RULE 7: INDENTATION",
    "- Match the exact indentation style of the surrounding code, tabs or spaces.",
    `- In ${names.replace}, new code follows the indent level of the code it replaces.`,
    "",
    "RULE 8: LANGUAGE AWARENESS",
    "- Keep brackets balanced and handle trailing commas in lists and parameters.",
    "- When removing a function, remove its annotations and doc comment too.",
  ];
};

const buildLineNumberRules = (format: ReplyFormat): string[] => {
  const names = sectionNames(format);
  return [
    "LINE NUMBERS",
    'The file is shown with "N| " prefixes (for example "42| val x = 1") so you can navigate it.',
    `Never include those prefixes in ${names.search} or ${names.replace}; write only the raw source.`,
    "You may mention line numbers in the summary, for example: Changed variable name at lines 42-43.",
  ];
};

export const buildSystemPrompt = (format: ReplyFormat, numbered: boolean): string => {
  const sections = [
    "You are a precision code editor. Your only job is to produce exact search/replace blocks for a given source file.",
    ["RESPONSE FORMAT", format === "tags" ? TAG_FORMAT : MARKER_FORMAT].join("\n"),
    buildRules(format).join("\n"),
  ];
  if (numbered) sections.push(buildLineNumberRules(format).join("\n"));
  return sections.join("\n\n");
};

/** Prefixes every line with its 1-based number, as `N| line`. */
export const numberLines = (content: string): string =>
  splitLines(content)
    .map((line, index) => `${index + 1}| ${line.text}`)
    .join("\n");

export const buildEditPrompt = (input: EditPromptInput): EditPrompt => {
  const format = input.format ?? "tags";
  const threshold = input.lineNumberThreshold ?? DEFAULT_PROMPT.lineNumberThreshold;
  const numbered = splitLines(input.content).length > threshold;
  const body = numbered ? numberLines(input.content) : input.content.replace(/\r?\n$/, "");
  const user = [`File: \`${input.fileName}\``, "", "```", body, "```", "", "INSTRUCTIONS", input.instructions].join(
    "\n",
  );
  return { system: buildSystemPrompt(format, numbered), user, numbered };
};
