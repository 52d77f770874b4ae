import { readFileSync } from "node:fs";
import { ApplyCommand } from "../commands/apply/ApplyCommand.js";
import { ParseCommand } from "../commands/parse/ParseCommand.js";
import { PromptCommand } from "../commands/prompt/PromptCommand.js";

export const usage = [
  "Usage: blockpatch <apply|parse|prompt> [...args]",
  "  apply <file> --reply <path|->    apply a model reply of search/replace blocks to a file",
  "  parse --reply <path|->           print the parsed edit instructions as JSON",
  "  prompt <file> --instructions <t> print the system prompt and user message for an edit request",
  "Run `blockpatch <command> --help` for the options of a command.",
].join("\n");

export const readVersion = (): string => {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf8"));
    if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
      return raw.version;
    }
    return "dev";
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return "dev";
    throw error;
  }
};

export class BlockpatchEntrypoint {
  static async run(argv: string[] = process.argv.slice(2)): Promise<void> {
    const [command, ...rest] = argv;
    if (command === "--version" || command === "-v" || command === "version") {
      // eslint-disable-next-line no-console
      console.log(readVersion());
      return;
    }
    if (command === "--help" || command === "-h" || command === "help") {
      // eslint-disable-next-line no-console
      console.log(usage);
      return;
    }
    if (!command) {
      throw new Error(usage);
    }
    if (command === "apply") {
      await ApplyCommand.run(rest);
      return;
    }
    if (command === "parse") {
      await ParseCommand.run(rest);
      return;
    }
    if (command === "prompt") {
      await PromptCommand.run(rest);
      return;
    }
    throw new Error(`Unknown command: ${command}\n${usage}`);
  }
}
