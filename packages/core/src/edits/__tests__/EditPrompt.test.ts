import test from "node:test";
import assert from "node:assert/strict";
import { buildEditPrompt, numberLines } from "../EditPrompt.js";

test("buildEditPrompt sends small files verbatim", { concurrency: false }, () => {
  const prompt = buildEditPrompt({ fileName: "a.py", content: "x = 1\n", instructions: "rename x" });
  assert.equal(prompt.numbered, false);
  assert.equal(prompt.user, "File: `a.py`\n\n```\nx = 1\n```\n\nINSTRUCTIONS\nrename x");
  assert.ok(prompt.system.includes("<edits>"));
  assert.ok(prompt.system.includes("RULE 8: LANGUAGE AWARENESS"));
  assert.equal(prompt.system.includes("LINE NUMBERS"), false);
});

test("buildEditPrompt numbers lines past the threshold", { concurrency: false }, () => {
  const prompt = buildEditPrompt({
    fileName: "b.ts",
    content: "a\nb\nc",
    instructions: "edit",
    lineNumberThreshold: 2,
  });
  assert.equal(prompt.numbered, true);
  assert.ok(prompt.user.includes("```\n1| a\n2| b\n3| c\n```"));
  assert.ok(prompt.system.includes("LINE NUMBERS"));
});

test("buildEditPrompt describes the marker grammar on request", { concurrency: false }, () => {
  const prompt = buildEditPrompt({ fileName: "c.go", content: "package c\n", instructions: "x", format: "markers" });
  assert.ok(prompt.system.includes("<<<SEARCH>>>\nexact lines copied from the original file\n<<<REPLACE>>>"));
  assert.equal(prompt.system.includes("<edits>"), false);
});

test("numberLines keeps blank lines", { concurrency: false }, () => {
  assert.equal(numberLines("a\n\nb\n"), "1| a\n2| \n3| b");
});
