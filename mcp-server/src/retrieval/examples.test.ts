import test from "node:test";
import assert from "node:assert/strict";
import { NavigationDecisionZod, type NavigationDecision } from "../contracts/decisions.js";
import { KeywordExampleRetriever, loadExampleCorpus } from "./examples.js";

function decisionTagged(retrievalTag: string): NavigationDecision {
  return NavigationDecisionZod.parse({
    decision: "bodyLocationInquiry",
    situationType: "bodyEnquiry",
    retrievalTag,
    readyForNext: false,
    blockedBy: [],
    reasoning: "",
    ruleOverrideApplied: false,
    fallbackUsed: true,
    ruleId: "fallback",
    substate: "problem_and_body",
    affirmFirst: false,
    topic: "",
  });
}

const retriever = new KeywordExampleRetriever();

test("corpus loads and every id is unique", () => {
  const corpus = loadExampleCorpus();
  const ids = corpus.examples.map((e) => e.id);
  assert.equal(new Set(ids).size, ids.length);
});

test("retrieveExamples: tag match plus word overlap ranks first", () => {
  const results = retriever.retrieveExamples(decisionTagged("body_location"), "work deadlines stress me", 3);
  assert.deepEqual(
    results.map((r) => [r.id, r.score]),
    [
      ["ex-06", 2],
      ["ex-05", 1],
      ["ex-02", 0.333],
    ]
  );
  assert.equal(results[0]?.text, "Where in your body do you notice the stress?");
});

test("retrieveExamples: nothing relevant yields an empty list", () => {
  assert.deepEqual(retriever.retrieveExamples(decisionTagged("closing"), "xyz", 3), []);
  assert.deepEqual(retriever.retrieveExamples(decisionTagged("body_location"), "work", 0), []);
});
