import test from "node:test";
import assert from "node:assert/strict";
import { classifyAnswerKind, isBodyDetailKind } from "./answer_kind.js";
import { loadLexicons } from "./lexicons.js";

const lexicons = loadLexicons();

test("emotion is detected before body location", () => {
  assert.equal(classifyAnswerKind("i feel anxious in my chest", lexicons), "emotion");
});

test("body location, then sensation quality", () => {
  assert.equal(classifyAnswerKind("in my chest", lexicons), "bodyLocation");
  assert.equal(classifyAnswerKind("it is tight", lexicons), "sensationQuality");
});

test("affirmation, confusion and nothing-more", () => {
  assert.equal(classifyAnswerKind("yes that's right", lexicons), "affirmation");
  assert.equal(classifyAnswerKind("i do not know", lexicons), "confusion");
  assert.equal(classifyAnswerKind("nothing else", lexicons), "nothingMore");
});

test("word boundaries: 'no' inside 'know' is not nothing-more", () => {
  assert.equal(classifyAnswerKind("you know what", lexicons), "general");
});

test("isBodyDetailKind", () => {
  assert.equal(isBodyDetailKind("bodyLocation"), true);
  assert.equal(isBodyDetailKind("sensationQuality"), true);
  assert.equal(isBodyDetailKind("emotion"), false);
});
