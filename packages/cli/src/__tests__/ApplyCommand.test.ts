import test from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ApplyCommand, parseApplyArgs } from "../commands/apply/ApplyCommand.js";
import { runCaptured } from "./captureOutput.js";

const setupWorkspace = (content: string, reply: string): { root: string; file: string; reply: string } => {
  const root = mkdtempSync(path.join(os.tmpdir(), "blockpatch-apply-"));
  const file = path.join(root, "sample.ts");
  const replyPath = path.join(root, "reply.txt");
  writeFileSync(file, content);
  writeFileSync(replyPath, reply);
  return { root, file, reply: replyPath };
};

test("parseApplyArgs reads the file, flags and overrides", { concurrency: false }, () => {
  assert.deepEqual(
    parseApplyArgs(["f.ts", "--reply", "r.txt", "--threshold", "0.9", "--format", "tags", "--diff", "--line-tolerance", "2"]),
    {
      file: "f.ts",
      reply: "r.txt",
      threshold: 0.9,
      lineTolerance: 2,
      format: "tags",
      diff: true,
      write: false,
      json: false,
      quiet: false,
      help: false,
    },
  );
  assert.throws(() => parseApplyArgs(["--format", "xml"]), /Invalid --format: xml/);
});

test("apply writes the patched file and logs the run", { concurrency: false }, async () => {
  const workspace = setupWorkspace(
    "const a = 1;\nconst b = 2;\n",
    "<<<SEARCH>>>\nconst b = 2;\n<<<REPLACE>>>\nconst b = 3;\n<<<END>>>\n",
  );
  const output = await runCaptured(() =>
    ApplyCommand.run([
      workspace.file,
      "--reply",
      workspace.reply,
      "--workspace-root",
      workspace.root,
      "--run-id",
      "run-1",
      "--write",
    ]),
  );

  assert.equal(output.exitCode, undefined);
  assert.deepEqual(output.logs, [`sample.ts: 1/1 edits applied\n#1 EXACT  const b = 2;\nWrote ${workspace.file}`]);
  assert.equal(readFileSync(workspace.file, "utf8"), "const a = 1;\nconst b = 3;\n");

  const logPath = path.join(workspace.root, "logs", "blockpatch", "run-1.jsonl");
  const types = readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line).type);
  assert.deepEqual(types, ["parse", "block", "summary", "write"]);
});

test("apply reports failures as JSON and leaves the file alone", { concurrency: false }, async () => {
  const original = "const a = 1;\nconst b = 2;\n";
  const workspace = setupWorkspace(original, "<<<SEARCH>>>\nmissing_token\n<<<REPLACE>>>\nx\n<<<END>>>\n");
  const output = await runCaptured(() =>
    ApplyCommand.run([workspace.file, "--reply", workspace.reply, "--workspace-root", workspace.root, "--json", "--write"]),
  );

  assert.equal(output.exitCode, 1);
  const payload = JSON.parse(output.logs.join("\n"));
  assert.equal(payload.isFullyApplied, false);
  assert.deepEqual(payload.failedBlockNumbers, [1]);
  assert.equal(payload.statusMessage, "0/1 edits applied, 1 not found (#1)");
  assert.equal(payload.written, null);
  assert.equal(payload.blocks[0].outcome.reason, "no_match");
  assert.equal(readFileSync(workspace.file, "utf8"), original);
});

test("apply --out leaves the source untouched and skips logging when disabled", { concurrency: false }, async () => {
  const workspace = setupWorkspace("x\n", "<block><search>x</search><replace>y</replace></block>");
  writeFileSync(path.join(workspace.root, "blockpatch.config.json"), JSON.stringify({ logging: { enabled: false } }));
  const outPath = path.join(workspace.root, "out.txt");
  const output = await runCaptured(() =>
    ApplyCommand.run([workspace.file, "--reply", workspace.reply, "--workspace-root", workspace.root, "--out", outPath, "--quiet"]),
  );

  assert.equal(output.exitCode, undefined);
  assert.deepEqual(output.logs, []);
  assert.equal(readFileSync(outPath, "utf8"), "y\n");
  assert.equal(readFileSync(workspace.file, "utf8"), "x\n");
  assert.equal(existsSync(path.join(workspace.root, "logs")), false);
});

test("apply without a reply prints usage and fails", { concurrency: false }, async () => {
  const output = await runCaptured(() => ApplyCommand.run(["sample.ts"]));
  assert.equal(output.exitCode, 1);
  assert.ok(output.errors[0].startsWith("Missing --reply."));
});

test("apply reports unreadable input", { concurrency: false }, async () => {
  const root = mkdtempSync(path.join(os.tmpdir(), "blockpatch-apply-"));
  const missing = path.join(root, "nope.ts");
  const output = await runCaptured(() =>
    ApplyCommand.run([missing, "--reply", missing, "--workspace-root", root]),
  );
  assert.equal(output.exitCode, 1);
  assert.ok(output.errors[0].startsWith(`apply failed: Unable to read file ${missing}:`));
});
