import test from "node:test";
import assert from "node:assert/strict";
import { neutralClassification, type DecisionGenerator, type GeneratedDecision } from "../contracts/collaborators.js";
import { NavigationEngine, type DecideResult } from "./engine.js";
import { GenerativeCallFailedError } from "./errors.js";
import { createSessionState, type SessionState } from "./state.js";

const NOW = new Date("2026-01-05T10:00:00.000Z");

class UnavailableGenerator implements DecisionGenerator {
  calls = 0;

  async generateDecision(): Promise<GeneratedDecision> {
    this.calls += 1;
    throw new GenerativeCallFailedError("provider_error: unavailable");
  }
}

type Conversation = {
  engine: NavigationEngine;
  state: SessionState;
  say(input: string): Promise<DecideResult>;
};

function conversation(state: SessionState, generator: DecisionGenerator | null = null): Conversation {
  const engine = new NavigationEngine({ generator, now: () => NOW });
  const convo: Conversation = {
    engine,
    state,
    async say(input) {
      const result = await engine.decide(input, null, convo.state);
      convo.state = engine.recordExchange(result.state, { input, output: `(${result.decision.decision})` });
      return result;
    },
  };
  return convo;
}

test("full session: goal to closing with the generator unavailable", async () => {
  const generator = new UnavailableGenerator();
  const convo = conversation(createSessionState("scenario-full", NOW), generator);

  const t1 = await convo.say("I want to feel calm");
  assert.equal(t1.decision.decision, "buildVision");

  const t2 = await convo.say("yes that's right");
  assert.equal(t2.decision.decision, "providePsychoEducation");
  assert.equal(t2.state.substate, "psycho_education");
  assert.equal(t2.state.completion.visionAcceptanceEvidence, 'explicit: "yes"');

  const t3 = await convo.say("work stress, tight chest");
  assert.equal(t3.state.substate, "problem_and_body");
  assert.equal(t3.decision.decision, "anythingElseInquiry");
  assert.equal(t3.decision.fallbackUsed, true);
  assert.equal(t3.meta.generative.failure, "GenerativeCallFailed");
  assert.equal(t3.state.completion.problemContent, "work stress, tight chest");
  assert.equal(t3.state.counters.bodyEnquiryCycles, 1);

  const t4 = await convo.say("nothing else");
  assert.equal(t4.decision.decision, "assessReadiness");
  assert.equal(t4.decision.ruleId, "nothing_else");
  assert.equal(t4.state.substate, "readiness_assessment");
  assert.equal(t4.state.counters.bodyQuestionsAsked, 0);

  const t5 = await convo.say("nothing else");
  assert.equal(t5.decision.decision, "requestPermission");
  assert.equal(t5.state.substate, "alpha_permission");
  assert.equal(t5.state.stage, "down_regulation");

  const t6 = await convo.say("yes i'm ready");
  assert.equal(t6.decision.decision, "startCheckpoint");

  const t7 = await convo.say("calmer, I took a breath");
  assert.equal(t7.decision.decision, "checkpointStep");
  assert.equal(t7.decision.checkpoint?.stepId, "relax_tongue");
  assert.equal(t7.decision.checkpoint?.stepIndex, 1);

  const t8 = await convo.say("more tense");
  assert.equal(t8.decision.decision, "normalizeResistance");
  assert.equal(t8.decision.checkpoint?.stepId, "relax_tongue");

  const t9 = await convo.say("softer now");
  assert.equal(t9.decision.decision, "checkpointStep");
  assert.equal(t9.decision.checkpoint?.stepId, "breathe_slower");

  const t10 = await convo.say("calm");
  assert.equal(t10.decision.decision, "closeSession");
  assert.deepEqual(t10.decision.checkpoint, {
    stepIndex: 2,
    stepId: "breathe_slower",
    totalSteps: 3,
    outcome: "complete",
    downRegulated: true,
  });
  assert.equal(t10.state.substate, "complete");
  assert.equal(t10.state.stage, "closed");
  assert.equal(t10.decision.readyForNext, true);
  assert.deepEqual(t10.state.checkpointState?.indicators, ["slow_deep_breath", "muscle_softening"]);

  const t11 = await convo.say("thanks");
  assert.equal(t11.decision.decision, "closeSession");
  assert.equal(t11.decision.ruleId, "session_complete");

  assert.equal(generator.calls, 1);
  assert.equal(convo.state.conversationHistory.length, 11);
});

test("repeated body detail: questions are capped and the session moves to readiness", async () => {
  const start = createSessionState("scenario-cap", NOW);
  start.substate = "problem_and_body";
  Object.assign(start.completion, {
    goalStated: true,
    goalStatedTurn: 2,
    visionPresented: true,
    visionAccepted: true,
    psychoEducationProvided: true,
  });
  const convo = conversation(start);
  for (const input of ["hello there", "i want to feel calm", "yes"]) {
    convo.state = convo.engine.recordExchange(convo.state, { input, output: "(earlier)" });
  }

  const t1 = await convo.say("chest is tight");
  assert.equal(t1.decision.decision, "presentMomentInquiry");
  assert.equal(t1.decision.affirmFirst, true);
  assert.equal(t1.state.completion.problemContent, "body-led: chest is tight");
  assert.equal(t1.state.counters.bodyQuestionsAsked, 1);

  const t2 = await convo.say("chest is tight");
  assert.equal(t2.decision.decision, "bodyAwarenessInquiry");
  assert.equal(t2.state.counters.bodyQuestionsAsked, 2);

  const t3 = await convo.say("chest is tight");
  assert.equal(t3.decision.decision, "presentMomentCheck");
  assert.equal(t3.state.substate, "readiness_assessment");
  assert.equal(t3.state.counters.bodyQuestionsAsked, 3);

  const t4 = await convo.say("chest is tight");
  assert.equal(t4.decision.decision, "assessReadiness");
  assert.equal(t4.state.counters.readinessPrompts, 1);
  assert.equal(t4.state.counters.bodyQuestionsAsked, 3);
});

test("crisis: the session stays on safety until the user says they are safe", async () => {
  const convo = conversation(createSessionState("scenario-safety", NOW));

  const crisisText = "i want to kill myself tonight";
  const neutral = neutralClassification(crisisText);
  const crisis = await convo.engine.decide(
    crisisText,
    { ...neutral, inputCategory: "crisis", safetyFlags: { ...neutral.safetyFlags, crisis: true } },
    convo.state
  );
  assert.equal(crisis.decision.decision, "safetyEscalation");
  convo.state = convo.engine.recordExchange(crisis.state, { input: crisisText, output: "(safetyEscalation)" });

  const unsure = await convo.say("i'm not sure");
  assert.equal(unsure.decision.decision, "safetyFollowUp");
  assert.equal(unsure.decision.ruleId, "safety_followup");
  assert.equal(unsure.decision.riskLevel, "low_risk");

  const unsafe = await convo.say("no, i'm not safe");
  assert.equal(unsafe.decision.decision, "safetyFollowUp");

  const safe = await convo.say("yes, i'm safe");
  assert.equal(safe.decision.decision, "acknowledgeSafety");
  assert.equal(safe.state.substate, "goal_and_vision");

  const resumed = await convo.say("I want to feel calm");
  assert.equal(resumed.decision.decision, "buildVision");
  assert.equal(resumed.decision.ruleId, "build_vision");
});

test("silence: repeated quiet turns are checked in on and flag a handoff", async () => {
  const convo = conversation(createSessionState("scenario-silence", NOW));

  const first = await convo.say("");
  assert.equal(first.decision.decision, "silenceCheck");
  assert.equal(first.decision.ruleId, "engagement_check");
  assert.equal(first.state.engagement.lastInterventionTurn, 1);

  await convo.say("");
  const third = await convo.say("");
  assert.equal(third.decision.decision, "silenceCheck");
  assert.equal(third.state.engagement.consecutiveSilent, 3);
  assert.equal(third.state.engagement.handoffRecommended, true);

  const back = await convo.say("I want to feel calm");
  assert.equal(back.decision.decision, "buildVision");
  assert.equal(back.state.engagement.handoffRecommended, false);
});
