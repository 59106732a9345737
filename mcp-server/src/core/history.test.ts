import test from "node:test";
import assert from "node:assert/strict";
import { extractQuestions, isSimilarQuestion, lastAskedTurn, recordQuestions, wasAskedRecently } from "./history.js";

test("extractQuestions pulls every question and strips fillers", () => {
  assert.deepEqual(extractQuestions("That's right. Yeah. Where do you feel that? Take your time."), [
    "where do you feel that?",
  ]);
  assert.deepEqual(extractQuestions("Okay. What's happening now? And what else?"), [
    "what's happening now?",
    "what else?",
  ]);
  assert.deepEqual(extractQuestions("No questions here."), []);
});

test("isSimilarQuestion uses word overlap above 70%", () => {
  assert.equal(isSimilarQuestion("Where do you feel that?", "where do you feel that?"), true);
  assert.equal(isSimilarQuestion("Where do you feel that in your body?", "Where do you feel it in your body?"), true);
  assert.equal(isSimilarQuestion("What else?", "What is happening in your body right now?"), false);
});

test("wasAskedRecently honours the turn window", () => {
  const asked = recordQuestions({}, "Where do you feel that?", 2);
  assert.equal(wasAskedRecently(asked, "Where do you feel that?", 6, 5), true);
  assert.equal(wasAskedRecently(asked, "Where do you feel that?", 7, 5), false);
  assert.equal(lastAskedTurn(asked, "where do you feel that?"), 2);
});

test("questions stamped with turn 0 never count as recent", () => {
  assert.equal(wasAskedRecently({ "what else?": 0 }, "What else?", 1, 5), false);
});
