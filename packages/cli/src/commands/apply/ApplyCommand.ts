import { writeFile } from "node:fs/promises";
import path from "node:path";
import {
  PatchApplier,
  RunLogger,
  createRunId,
  isReplyFormatOption,
  loadConfig,
  parseEditReply,
  renderReport,
  type ParsedReply,
  type PatchResult,
  type ReplyFormatOption,
} from "@blockpatch/core";
import { parseOptionalNumber, readInput } from "../shared/InputSources.js";

export interface ParsedApplyArgs {
  file?: string;
  reply?: string;
  write: boolean;
  out?: string;
  json: boolean;
  diff: boolean;
  format?: ReplyFormatOption;
  threshold?: number;
  lineTolerance?: number;
  configPath?: string;
  workspaceRoot?: string;
  runId?: string;
  quiet: boolean;
  help: boolean;
}

export const applyUsage = `blockpatch apply <file> --reply <path|-> [--write] [--out <path>] [--json] [--diff] [--format auto|markers|tags] [--threshold N] [--line-tolerance N] [--config <path>] [--workspace-root <path>] [--run-id <id>] [--quiet]`;

export const parseApplyArgs = (argv: string[]): ParsedApplyArgs => {
  const parsed: ParsedApplyArgs = { write: false, json: false, diff: false, quiet: false, help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--reply":
      case "-r":
        parsed.reply = argv[i + 1];
        i += 1;
        break;
      case "--write":
      case "-w":
        parsed.write = true;
        break;
      case "--out":
        parsed.out = argv[i + 1];
        i += 1;
        break;
      case "--json":
        parsed.json = true;
        break;
      case "--diff":
        parsed.diff = true;
        break;
      case "--format": {
        const value = argv[i + 1] ?? "";
        if (!isReplyFormatOption(value)) {
          throw new Error(`Invalid --format: ${value || "(missing)"}. Expected auto, markers or tags.`);
        }
        parsed.format = value;
        i += 1;
        break;
      }
      case "--threshold":
        parsed.threshold = parseOptionalNumber(argv[i + 1]);
        i += 1;
        break;
      case "--line-tolerance":
        parsed.lineTolerance = parseOptionalNumber(argv[i + 1]);
        i += 1;
        break;
      case "--config":
        parsed.configPath = argv[i + 1];
        i += 1;
        break;
      case "--workspace-root":
        parsed.workspaceRoot = argv[i + 1] ? path.resolve(argv[i + 1]) : undefined;
        i += 1;
        break;
      case "--run-id":
        parsed.runId = argv[i + 1];
        i += 1;
        break;
      case "--quiet":
      case "-q":
        parsed.quiet = true;
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

const toJson = (file: string, parsed: ParsedReply, result: PatchResult, written: string | undefined) => ({
  file,
  format: parsed.format ?? null,
  summary: parsed.summary ?? null,
  diagnostics: parsed.diagnostics,
  statusMessage: result.statusMessage,
  isFullyApplied: result.isFullyApplied,
  totalApplied: result.totalApplied,
  totalFailed: result.totalFailed,
  failedBlockNumbers: result.failedBlockNumbers,
  blocks: result.appliedBlocks.map((block, index) => ({ position: index + 1, ...block })),
  written: written ?? null,
  newContent: result.newContent,
});

export class ApplyCommand {
  static async run(argv: string[]): Promise<void> {
    try {
      const args = parseApplyArgs(argv);
      if (args.help) {
        // eslint-disable-next-line no-console
        console.log(applyUsage);
        return;
      }
      if (!args.file || !args.reply) {
        console.error(`Missing ${args.file ? "--reply" : "<file>"}.\nUsage: ${applyUsage}`);
        process.exitCode = 1;
        return;
      }

      const cwd = args.workspaceRoot ?? process.cwd();
      const config = await loadConfig({
        cwd,
        configPath: args.configPath,
        cli: {
          workspaceRoot: args.workspaceRoot,
          parser: { format: args.format },
          matching: { fuzzyThreshold: args.threshold, lineTolerance: args.lineTolerance },
        },
      });
      const original = await readInput("file", args.file);
      const reply = await readInput("reply", args.reply);

      const parsed = parseEditReply(reply, config.parser);
      const result = new PatchApplier({ matching: config.matching }).apply(original, parsed.instructions);

      let written: string | undefined;
      if ((args.write || args.out) && result.totalApplied > 0) {
        written = path.resolve(args.out ?? args.file);
        await writeFile(written, result.newContent, "utf8");
      }

      if (config.logging.enabled) {
        const logger = new RunLogger(config.workspaceRoot, config.logging.directory, args.runId ?? createRunId());
        await logger.writePhaseArtifact("apply", "reply", reply);
        await logger.writePhaseArtifact("apply", "content", result.newContent);
        await logger.logPatchRun(args.file, parsed, result);
        if (written) {
          await logger.log("write", { target: written, bytes: Buffer.byteLength(result.newContent, "utf8") });
        }
      }

      if (args.json) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(toJson(args.file, parsed, result, written), null, 2));
      } else if (!args.quiet) {
        const lines = parsed.diagnostics.map((diagnostic) => `Skipped: ${diagnostic.message}`);
        lines.push(
          renderReport(result, {
            fileName: path.basename(args.file),
            originalContent: original,
            diff: args.diff,
          }),
        );
        if (written) lines.push(`Wrote ${written}`);
        // eslint-disable-next-line no-console
        console.log(lines.join("\n"));
      }
      if (!result.isFullyApplied) {
        process.exitCode = 1;
      }
    } catch (error) {
      console.error(`apply failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  }
}
