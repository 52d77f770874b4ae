import path from "node:path";
import { isReplyFormatOption, loadConfig, parseEditReply, type ReplyFormatOption } from "@blockpatch/core";
import { readInput } from "../shared/InputSources.js";

export interface ParsedParseArgs {
  reply?: string;
  format?: ReplyFormatOption;
  keepLineNumbers: boolean;
  configPath?: string;
  workspaceRoot?: string;
  help: boolean;
}

export const parseUsage = `blockpatch parse --reply <path|-> [--format auto|markers|tags] [--keep-line-numbers] [--config <path>] [--workspace-root <path>]`;

export const parseParseArgs = (argv: string[]): ParsedParseArgs => {
  const parsed: ParsedParseArgs = { keepLineNumbers: false, help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if ((arg === "--reply" || arg === "-r") && argv[i + 1]) {
      parsed.reply = argv[++i];
    } else if (arg === "--format") {
      const value = argv[i + 1] ?? "";
      if (!isReplyFormatOption(value)) {
        throw new Error(`Invalid --format: ${value || "(missing)"}. Expected auto, markers or tags.`);
      }
      parsed.format = value;
      i += 1;
    } else if (arg === "--keep-line-numbers") {
      parsed.keepLineNumbers = true;
    } else if (arg === "--config" && argv[i + 1]) {
      parsed.configPath = argv[++i];
    } else if (arg === "--workspace-root" && argv[i + 1]) {
      parsed.workspaceRoot = path.resolve(argv[++i]);
    } else if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    }
  }
  return parsed;
};

export class ParseCommand {
  static async run(argv: string[]): Promise<void> {
    try {
      const args = parseParseArgs(argv);
      if (args.help) {
        // eslint-disable-next-line no-console
        console.log(parseUsage);
        return;
      }
      if (!args.reply) {
        console.error(`Missing --reply.\nUsage: ${parseUsage}`);
        process.exitCode = 1;
        return;
      }
      const config = await loadConfig({
        cwd: args.workspaceRoot ?? process.cwd(),
        configPath: args.configPath,
        cli: {
          parser: {
            format: args.format,
            stripLineNumbers: args.keepLineNumbers ? false : undefined,
          },
        },
      });
      const reply = await readInput("reply", args.reply);
      const parsed = parseEditReply(reply, config.parser);
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(parsed, null, 2));
    } catch (error) {
      console.error(`parse failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  }
}
