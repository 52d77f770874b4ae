import { readFile } from "node:fs/promises";
import path from "node:path";
import { createInputUnreadableError } from "@blockpatch/core";

export const STDIN_TARGET = "-";

const readStdin = async (stream: NodeJS.ReadableStream): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
};

/** Reads a file relative to `cwd`, or standard input when `target` is `-`. */
export const readInput = async (
  label: string,
  target: string,
  cwd: string = process.cwd(),
  stdin: NodeJS.ReadableStream = process.stdin,
): Promise<string> => {
  try {
    if (target === STDIN_TARGET) return await readStdin(stdin);
    return await readFile(path.resolve(cwd, target), "utf8");
  } catch (error) {
    throw createInputUnreadableError(label, target, error);
  }
};

export const parseOptionalNumber = (value: string | undefined): number | undefined =>
  value === undefined ? undefined : Number(value);
