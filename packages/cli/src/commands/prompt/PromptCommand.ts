import path from "node:path";
import { buildEditPrompt, loadConfig, type ReplyFormat } from "@blockpatch/core";
import { parseOptionalNumber, readInput } from "../shared/InputSources.js";

export interface ParsedPromptArgs {
  file?: string;
  instructions?: string;
  format?: ReplyFormat;
  lineNumberThreshold?: number;
  configPath?: string;
  json: boolean;
  help: boolean;
}

export const promptUsage = `blockpatch prompt <file> --instructions <text> [--format markers|tags] [--line-number-threshold N] [--config <path>] [--json]`;

export const parsePromptArgs = (argv: string[]): ParsedPromptArgs => {
  const parsed: ParsedPromptArgs = { json: false, help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--instructions":
      case "-i":
        parsed.instructions = argv[i + 1];
        i += 1;
        break;
      case "--format": {
        const value = argv[i + 1];
        if (value !== "markers" && value !== "tags") {
          throw new Error(`Invalid --format: ${value ?? "(missing)"}. Expected markers or tags.`);
        }
        parsed.format = value;
        i += 1;
        break;
      }
      case "--line-number-threshold":
        parsed.lineNumberThreshold = parseOptionalNumber(argv[i + 1]);
        i += 1;
        break;
      case "--config":
        parsed.configPath = argv[i + 1];
        i += 1;
        break;
      case "--json":
        parsed.json = true;
        break;
      case "--help":
      case "-h":
        parsed.help = true;
        break;
      default:
        if (!arg.startsWith("-") && parsed.file === undefined) {
          parsed.file = arg;
        }
        break;
    }
  }
  return parsed;
};

export class PromptCommand {
  static async run(argv: string[]): Promise<void> {
    try {
      const args = parsePromptArgs(argv);
      if (args.help) {
        // eslint-disable-next-line no-console
        console.log(promptUsage);
        return;
      }
      if (!args.file || !args.instructions) {
        console.error(`Missing ${args.file ? "--instructions" : "<file>"}.\nUsage: ${promptUsage}`);
        process.exitCode = 1;
        return;
      }
      const config = await loadConfig({
        configPath: args.configPath,
        cli: { prompt: { lineNumberThreshold: args.lineNumberThreshold } },
      });
      const content = await readInput("file", args.file);
      const configured = config.parser.format === "auto" ? undefined : config.parser.format;
      const prompt = buildEditPrompt({
        fileName: path.basename(args.file),
        content,
        instructions: args.instructions,
        format: args.format ?? configured,
        lineNumberThreshold: config.prompt.lineNumberThreshold,
      });
      if (args.json) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(prompt, null, 2));
        return;
      }
      // eslint-disable-next-line no-console
      console.log(["=== SYSTEM ===", prompt.system, "", "=== USER ===", prompt.user].join("\n"));
    } catch (error) {
      console.error(`prompt failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  }
}
