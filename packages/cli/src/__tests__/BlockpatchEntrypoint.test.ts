import test from "node:test";
import assert from "node:assert/strict";
import { BlockpatchEntrypoint, readVersion, usage } from "../bin/BlockpatchEntrypoint.js";
import { runCaptured } from "./captureOutput.js";

test("--version prints the package version", { concurrency: false }, async () => {
  const output = await runCaptured(() => BlockpatchEntrypoint.run(["--version"]));
  assert.deepEqual(output.logs, [readVersion()]);
  assert.equal(readVersion(), "0.1.0");
});

test("--help prints the command list", { concurrency: false }, async () => {
  const output = await runCaptured(() => BlockpatchEntrypoint.run(["--help"]));
  assert.deepEqual(output.logs, [usage]);
});

test("unknown or missing commands are rejected", { concurrency: false }, async () => {
  await assert.rejects(() => BlockpatchEntrypoint.run(["nope"]), /Unknown command: nope/);
  await assert.rejects(() => BlockpatchEntrypoint.run([]), /Usage: blockpatch/);
});

test("subcommand help is routed to the command", { concurrency: false }, async () => {
  const output = await runCaptured(() => BlockpatchEntrypoint.run(["apply", "--help"]));
  assert.equal(output.logs.length, 1);
  assert.ok(output.logs[0].startsWith("blockpatch apply <file> --reply"));
});
