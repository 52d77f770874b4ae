import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ParseCommand, parseParseArgs } from "../commands/parse/ParseCommand.js";
import { runCaptured } from "./captureOutput.js";

test("parseParseArgs reads reply, format and line number handling", { concurrency: false }, () => {
  assert.deepEqual(parseParseArgs(["--reply", "-", "--format", "markers", "--keep-line-numbers"]), {
    reply: "-",
    format: "markers",
    keepLineNumbers: true,
    help: false,
  });
});

test("parse prints instructions and diagnostics as JSON", { concurrency: false }, async () => {
  const root = mkdtempSync(path.join(os.tmpdir(), "blockpatch-parse-"));
  const replyPath = path.join(root, "reply.txt");
  writeFileSync(
    replyPath,
    '<edits>\n<block line="4">\n<search>\n10| a\n11| b\n</search>\n<replace>\nc\n</replace>\n</block>\n<block>\n</edits>\n<summary>Merged a and b</summary>',
  );
  const output = await runCaptured(() => ParseCommand.run(["--reply", replyPath, "--workspace-root", root]));

  assert.equal(output.exitCode, undefined);
  assert.deepEqual(JSON.parse(output.logs.join("\n")), {
    instructions: [{ search: "a\nb", replace: "c", orderIndex: 0, lineHint: { startLine: 4 } }],
    diagnostics: [{ code: "parse_skipped", message: "Block at line 11 skipped: missing </block>", line: 11 }],
    format: "tags",
    summary: "Merged a and b",
  });
});

test("parse without a reply fails", { concurrency: false }, async () => {
  const output = await runCaptured(() => ParseCommand.run([]));
  assert.equal(output.exitCode, 1);
  assert.ok(output.errors[0].startsWith("Missing --reply."));
});
