import test from "node:test";
import assert from "node:assert/strict";
import type { AnswerKind } from "../contracts/decisions.js";
import { assessEngagement, classifyEngagement, type EngagementAssessment } from "./engagement.js";
import { loadLexicons } from "./lexicons.js";
import { getDefaultEngagement } from "./state.js";

const lexicons = loadLexicons();

/** Feeds replies from turn 1 on and returns every assessment. */
function replay(replies: Array<[string, AnswerKind]>): EngagementAssessment[] {
  let engagement = getDefaultEngagement();
  return replies.map(([text, kind], i) => {
    const assessment = assessEngagement(engagement, text, kind, i + 1, lexicons);
    engagement = assessment.engagement;
    return assessment;
  });
}

test("classifyEngagement separates silence, withdrawal, confirmations and content", () => {
  assert.equal(classifyEngagement("   ", "general", lexicons), "silence");
  assert.equal(classifyEngagement("what do you mean", "confusion", lexicons), "confused");
  assert.equal(classifyEngagement("idk", "general", lexicons), "disengaged");
  assert.equal(classifyEngagement("...", "general", lexicons), "disengaged");
  assert.equal(classifyEngagement("yeah ok", "affirmation", lexicons), "minimalConfirmation");
  assert.equal(classifyEngagement("yes, my chest gets tight at work", "affirmation", lexicons), "confirmationWithContent");
  assert.equal(classifyEngagement("my chest", "bodyLocation", lexicons), "minimal");
  assert.equal(classifyEngagement("my chest feels tight today", "bodyLocation", lexicons), "moderate");
  assert.equal(
    classifyEngagement("when my boss calls me in my chest goes tight and my hands shake", "bodyLocation", lexicons),
    "engaged"
  );
});

test("silence escalates to a handoff recommendation on the third quiet turn", () => {
  const [first, second, third] = replay([
    ["", "general"],
    ["", "general"],
    ["", "general"],
  ]);
  assert.equal(first.intervention, "silenceCheck");
  assert.equal(first.level, "low");
  assert.equal(second.engagement.handoffRecommended, false);
  assert.equal(third.level, "critical");
  assert.equal(third.engagement.consecutiveSilent, 3);
  assert.equal(third.engagement.handoffRecommended, true);
});

test("a substantive reply ends the silent streak and withdraws the handoff", () => {
  const results = replay([
    ["", "general"],
    ["", "general"],
    ["", "general"],
    ["i think it is my chest that feels heavy", "bodyLocation"],
  ]);
  const last = results[3];
  assert.equal(last.intervention, "none");
  assert.equal(last.engagement.consecutiveSilent, 0);
  assert.equal(last.engagement.handoffRecommended, false);
  assert.deepEqual(last.engagement.recentLevels, ["low", "low", "critical", "medium"]);
});

test("a second disengaged reply in a row asks about pulling back", () => {
  const [first, second] = replay([
    ["whatever", "general"],
    ["fine", "general"],
  ]);
  assert.equal(first.intervention, "none");
  assert.equal(second.intervention, "disengagementCheck");
});

test("four bare confirmations in a row trigger an engagement check", () => {
  const results = replay([
    ["yes", "affirmation"],
    ["ok", "affirmation"],
    ["sure", "affirmation"],
    ["yeah", "affirmation"],
  ]);
  assert.deepEqual(
    results.map((r) => r.intervention),
    ["none", "none", "none", "engagementCheck"]
  );
  assert.equal(results[3].engagement.consecutiveConfirmations, 4);
});

test("the confirmation check waits for spacing after an earlier intervention", () => {
  const previous = { ...getDefaultEngagement(), consecutiveConfirmations: 3, lastInterventionTurn: 8 };
  const early = assessEngagement(previous, "ok", "affirmation", 10, lexicons);
  assert.equal(early.intervention, "none");
  const later = assessEngagement(previous, "ok", "affirmation", 11, lexicons);
  assert.equal(later.intervention, "engagementCheck");
});

test("repeated confusion recommends a handoff", () => {
  const results = replay(Array.from({ length: 5 }, (): [string, AnswerKind] => ["i don't understand", "confusion"]));
  assert.equal(results[3].engagement.handoffRecommended, false);
  assert.equal(results[4].engagement.confusionCount, 5);
  assert.equal(results[4].engagement.handoffRecommended, true);
});

test("seven low turns out of the last ten recommend a handoff", () => {
  const replies: Array<[string, AnswerKind]> = [
    ["my chest feels tight today", "bodyLocation"],
    ["my chest feels tight today", "bodyLocation"],
    ["my chest feels tight today", "bodyLocation"],
    ...Array.from({ length: 7 }, (): [string, AnswerKind] => ["tight", "sensationQuality"]),
  ];
  const results = replay(replies);
  assert.equal(results[8].engagement.handoffRecommended, false);
  assert.equal(results[9].engagement.recentLevels.length, 10);
  assert.equal(results[9].engagement.handoffRecommended, true);
});
