import test from "node:test";
import assert from "node:assert/strict";
import type { AppliedBlock } from "../EditTypes.js";
import { PENDING_OUTCOME } from "../EditTypes.js";
import {
  buildStatusMessage,
  describeBlocks,
  formatStatusBadge,
  renderBlockPreview,
  renderReport,
  renderUnifiedDiff,
  statusTone,
  summarizePatch,
} from "../OutcomeReporter.js";
import { applyEdits } from "../PatchApplier.js";

const block = (search: string, orderIndex: number, outcome: AppliedBlock["outcome"]): AppliedBlock => ({
  instruction: { search, replace: "", orderIndex },
  outcome,
});

test("badges and tones per status", { concurrency: false }, () => {
  assert.equal(formatStatusBadge("exact"), "EXACT");
  assert.equal(formatStatusBadge("normalized"), "NORM");
  assert.equal(formatStatusBadge("line_range"), "RANGE");
  assert.equal(formatStatusBadge("not_found"), "NOT FOUND");
  assert.equal(statusTone("normalized"), "success");
  assert.equal(statusTone("fuzzy"), "warning");
  assert.equal(statusTone("line_range"), "caution");
  assert.equal(statusTone("not_found"), "error");
  assert.equal(statusTone("pending"), "neutral");
});

test("buildStatusMessage lists failed blocks by position", { concurrency: false }, () => {
  const span = { start: 0, end: 1 };
  const blocks = [
    block("a", 0, { status: "exact", span, confidence: 1 }),
    block("b", 1, { status: "not_found", reason: "no_match" }),
    block("c", 2, { status: "not_found", reason: "overlap_conflict", conflictsWith: 0 }),
    block("d", 3, PENDING_OUTCOME),
  ];
  assert.equal(
    buildStatusMessage(blocks),
    "1/4 edits applied, 1 not found (#2), 1 overlapping (#3), 1 pending (#4)",
  );
  assert.equal(buildStatusMessage([]), "No changes proposed");
});

test("describeBlocks shows badge, confidence and search preview", { concurrency: false }, () => {
  const span = { start: 0, end: 1 };
  const lines = describeBlocks([
    block("\n  const value = compute();\n", 0, { status: "fuzzy", span, confidence: 0.874 }),
    block("", 1, { status: "exact", span, confidence: 1 }),
    block("return x;", 2, { status: "not_found", reason: "overlap_conflict", conflictsWith: 0 }),
    block("x".repeat(70), 3, { status: "not_found", reason: "invalid_line_hint" }),
  ]);
  assert.deepEqual(lines, [
    "#1 FUZZY 87%  const value = compute();",
    "#2 EXACT  (insertion)",
    "#3 NOT FOUND (overlaps #1)  return x;",
    `#4 NOT FOUND (line hint out of range)  ${"x".repeat(57)}...`,
  ]);
});

test("summarizePatch counts statuses and flags review", { concurrency: false }, () => {
  const result = applyEdits("one\ntwo\nthree\nfour\n", [
    { search: "one", replace: "1", orderIndex: 0 },
    { search: "completely different\ntext here", replace: "2", orderIndex: 1, lineHint: { startLine: 2 } },
  ]);
  const summary = summarizePatch(result);
  assert.equal(summary.headline, "2/2 edits applied");
  assert.equal(summary.counts.exact, 1);
  assert.equal(summary.counts.line_range, 1);
  assert.equal(summary.needsReview, true);
});

test("renderBlockPreview diffs search against replace", { concurrency: false }, () => {
  const preview = renderBlockPreview(
    { instruction: { search: "a\nb", replace: "a\nc", orderIndex: 0 }, outcome: { status: "exact", span: { start: 0, end: 3 }, confidence: 1 } },
    1,
  );
  assert.equal(preview, "@@ #1 EXACT @@\n a\n-b\n+c");
});

test("renderUnifiedDiff produces a/ and b/ headers and hunks", { concurrency: false }, () => {
  const lines = renderUnifiedDiff("f.txt", "a\nb\n", "a\nc\n").split("\n");
  assert.ok(lines.includes("--- a/f.txt"));
  assert.ok(lines.includes("+++ b/f.txt"));
  assert.ok(lines.includes("@@ -1,2 +1,2 @@"));
  assert.ok(lines.includes("-b"));
  assert.ok(lines.includes("+c"));
});

test("renderReport titles the block list with the file name", { concurrency: false }, () => {
  const result = applyEdits("a\nb\n", [{ search: "b", replace: "c", orderIndex: 0 }]);
  assert.equal(renderReport(result, { fileName: "f.txt" }), "f.txt: 1/1 edits applied\n#1 EXACT  b");
  const withDiff = renderReport(result, { fileName: "f.txt", originalContent: "a\nb\n", diff: true });
  assert.ok(withDiff.startsWith("f.txt: 1/1 edits applied\n#1 EXACT  b\n\n"));
  assert.ok(withDiff.endsWith("+c"));
});
