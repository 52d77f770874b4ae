import { promises as fs } from "node:fs";
import path from "node:path";
import {
  isLocated,
  type AppliedBlock,
  type MatchStatus,
  type NotFoundReason,
  type ParseDiagnostic,
  type ParsedReply,
  type PatchResult,
  type ReplyFormat,
  type TextSpan,
} from "../edits/EditTypes.js";

/** Payload carried by each kind of run event. */
export interface RunLogPayloads {
  parse: {
    target: string;
    format: ReplyFormat | null;
    instructions: number;
    diagnostics: ParseDiagnostic[];
    summary: string | null;
  };
  block: {
    position: number;
    orderIndex: number;
    status: MatchStatus;
    span?: TextSpan;
    confidence?: number;
    reason?: NotFoundReason;
    conflictsWith?: number | null;
  };
  summary: Pick<PatchResult, "totalApplied" | "totalFailed" | "failedBlockNumbers" | "isFullyApplied" | "statusMessage"> & {
    target: string;
  };
  write: { target: string; bytes: number };
}

export type RunLogEventType = keyof RunLogPayloads;

export interface RunLogEvent<T extends RunLogEventType = RunLogEventType> {
  type: T;
  timestamp: string;
  runId: string;
  data: RunLogPayloads[T];
}

const fileSafe = (value: string): string => value.replace(/[^a-z0-9_-]/gi, "_");

export const createRunId = (now: Date = new Date()): string =>
  `run-${now.toISOString().replace(/[:.]/g, "-")}`;

const blockPayload = (position: number, { instruction, outcome }: AppliedBlock): RunLogPayloads["block"] => {
  const base = { position, orderIndex: instruction.orderIndex, status: outcome.status };
  if (isLocated(outcome)) return { ...base, span: outcome.span, confidence: outcome.confidence };
  if (outcome.status === "not_found") {
    return { ...base, reason: outcome.reason, conflictsWith: outcome.conflictsWith ?? null };
  }
  return base;
};

/** Appends run events to `<logDir>/<runId>.jsonl`; artifacts land in `<logDir>/phase`. */
export class RunLogger {
  readonly runId: string;
  readonly logDir: string;
  readonly logPath: string;
  private readonly artifactDir: string;

  constructor(workspaceRoot: string, logDir: string, runId: string) {
    this.runId = fileSafe(runId);
    this.logDir = path.resolve(workspaceRoot, logDir);
    this.logPath = path.join(this.logDir, `${this.runId}.jsonl`);
    this.artifactDir = path.join(this.logDir, "phase");
  }

  async log<T extends RunLogEventType>(type: T, data: RunLogPayloads[T]): Promise<void> {
    const event: RunLogEvent<T> = { type, timestamp: new Date().toISOString(), runId: this.runId, data };
    await fs.mkdir(this.logDir, { recursive: true });
    await fs.appendFile(this.logPath, `${JSON.stringify(event)}\n`, "utf8");
  }

  /** Strings are saved as `.txt`, anything else as pretty `.json`. Returns the file path. */
  async writePhaseArtifact(phase: string, kind: string, payload: unknown): Promise<string> {
    const name = [this.runId, fileSafe(phase), fileSafe(kind), Date.now()].join("-");
    const body = typeof payload === "string" ? { ext: "txt", text: payload } : { ext: "json", text: JSON.stringify(payload, null, 2) };
    const filePath = path.join(this.artifactDir, `${name}.${body.ext}`);
    await fs.mkdir(this.artifactDir, { recursive: true });
    await fs.writeFile(filePath, body.text, "utf8");
    return filePath;
  }

  /** One `parse` event, one `block` event per instruction, then a `summary`. */
  async logPatchRun(target: string, parsed: ParsedReply, result: PatchResult): Promise<void> {
    await this.log("parse", {
      target,
      format: parsed.format ?? null,
      instructions: parsed.instructions.length,
      diagnostics: parsed.diagnostics,
      summary: parsed.summary ?? null,
    });
    for (const [index, block] of result.appliedBlocks.entries()) {
      await this.log("block", blockPayload(index + 1, block));
    }
    const { totalApplied, totalFailed, failedBlockNumbers, isFullyApplied, statusMessage } = result;
    await this.log("summary", { target, totalApplied, totalFailed, failedBlockNumbers, isFullyApplied, statusMessage });
  }
}
