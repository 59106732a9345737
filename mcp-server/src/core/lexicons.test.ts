import test from "node:test";
import assert from "node:assert/strict";
import {
  containsTerm,
  findTerms,
  firstTerm,
  hasAnyTerm,
  hasUnnegatedTerm,
  loadLexicons,
  topicFamily,
} from "./lexicons.js";

test("shipped lexicons load and validate", () => {
  const lexicons = loadLexicons();
  assert.ok(lexicons.emotion.includes("anxious"));
  assert.ok(lexicons.checkpoint.calm.includes("calm"));
  assert.equal(loadLexicons(), lexicons);
});

test("containsTerm matches whole words only", () => {
  assert.equal(containsTerm("I know it", "no"), false);
  assert.equal(containsTerm("nothing at all", "no"), false);
  assert.equal(containsTerm("no, not really", "no"), true);
  assert.equal(containsTerm("that's fine", "that"), false);
  assert.equal(containsTerm("My chest", "chest"), true);
  assert.equal(containsTerm("headache", "head"), false);
});

test("multi-word terms tolerate extra whitespace and curly quotes", () => {
  assert.equal(containsTerm("it is  right   now", "right now"), true);
  assert.equal(containsTerm("That’s right", "that's right"), true);
});

test("findTerms keeps lexicon order and firstTerm returns the earliest listed", () => {
  const terms = ["calm", "peaceful", "safe"];
  assert.deepEqual(findTerms("safe and calm", terms), ["calm", "safe"]);
  assert.equal(firstTerm("safe and calm", terms), "calm");
  assert.equal(firstTerm("", terms), "");
  assert.equal(hasAnyTerm("nothing here", terms), false);
});

test("topicFamily folds inflections onto one family", () => {
  const { topicGroups } = loadLexicons();
  assert.equal(topicFamily("stressed", topicGroups), "stress");
  assert.equal(topicFamily("Stress", topicGroups), "stress");
  assert.equal(topicFamily("anxious", topicGroups), "anxiety");
  assert.equal(topicFamily("boss", topicGroups), "boss");
});

test("hasUnnegatedTerm ignores terms right after a negator", () => {
  const negators = ["not", "don't"];
  assert.equal(hasUnnegatedTerm("not calm at all", ["calm"], negators), false);
  assert.equal(hasUnnegatedTerm("i don't feel calm", ["calm"], negators), false);
  assert.equal(hasUnnegatedTerm("not tense at all, calm now", ["calm"], negators), true);
  assert.equal(hasUnnegatedTerm("not sure, maybe a bit calm", ["calm"], negators, 2), true);
});
