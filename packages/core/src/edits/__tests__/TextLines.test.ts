import test from "node:test";
import assert from "node:assert/strict";
import {
  bodyLines,
  convertLineEndings,
  detectLineEnding,
  isLineStart,
  leadingWhitespace,
  lineEndingOf,
  splitLines,
} from "../TextLines.js";

test("splitLines keeps offsets and ignores a trailing line break", { concurrency: false }, () => {
  assert.deepEqual(splitLines("a\nb\n"), [
    { start: 0, end: 1, breakEnd: 2, text: "a" },
    { start: 2, end: 3, breakEnd: 4, text: "b" },
  ]);
  assert.deepEqual(splitLines("a\r\nb"), [
    { start: 0, end: 1, breakEnd: 3, text: "a" },
    { start: 3, end: 4, breakEnd: 4, text: "b" },
  ]);
  assert.deepEqual(splitLines(""), []);
});

test("detectLineEnding picks the dominant break", { concurrency: false }, () => {
  assert.equal(detectLineEnding("a\r\nb\r\nc\n"), "\r\n");
  assert.equal(detectLineEnding("a\nb\r\nc\n"), "\n");
  assert.equal(detectLineEnding("single line"), "\n");
});

test("convertLineEndings rewrites every break", { concurrency: false }, () => {
  assert.equal(convertLineEndings("a\nb\r\nc\rd", "\r\n"), "a\r\nb\r\nc\r\nd");
});

test("lineEndingOf reports the single style or mixed", { concurrency: false }, () => {
  assert.equal(lineEndingOf("c\r\nd"), "\r\n");
  assert.equal(lineEndingOf("c\nd\n"), "\n");
  assert.equal(lineEndingOf("a\r\nb\nc"), "mixed");
  assert.equal(lineEndingOf("no break"), undefined);
});

test("line boundary helpers", { concurrency: false }, () => {
  const text = "ab\r\ncd";
  assert.equal(isLineStart(text, 0), true);
  assert.equal(isLineStart(text, 1), false);
  assert.equal(isLineStart(text, 4), true);
  assert.equal(leadingWhitespace(" \t x"), " \t ");
});

test("bodyLines drops one trailing break", { concurrency: false }, () => {
  assert.deepEqual(bodyLines("x\ny\n"), ["x", "y"]);
  assert.deepEqual(bodyLines("x\n\n"), ["x", ""]);
  assert.deepEqual(bodyLines(""), []);
});
