import type { DecisionKind } from "../contracts/decisions.js";
import type { SessionState } from "./state.js";

/**
 * Next item of the active body enquiry cycle, used after the user gives a fresh body detail:
 * location, sensation, present moment, anything else, pattern (once), then deepen.
 */
export function nextBodyCycleAction(state: SessionState): DecisionKind {
  const { bodyCycle, completion, counters } = state;
  if (!bodyCycle.locationCaptured) return "bodyLocationInquiry";
  if (!bodyCycle.sensationCaptured) return "sensationInquiry";
  if (!completion.presentMomentFocus && !bodyCycle.presentMomentAsked) return "presentMomentInquiry";
  if (!bodyCycle.anythingElseAsked) return "anythingElseInquiry";
  if (!counters.howDoYouKnowAsked) return "patternInquiry";
  return "bodyAwarenessInquiry";
}

function problemAndBodyDefault(state: SessionState): DecisionKind {
  const { bodyCycle, completion, counters } = state;
  if (!completion.problemIdentified && counters.problemQuestionTurn === 0) return "exploreProblem";
  if (!bodyCycle.locationCaptured) return "bodyLocationInquiry";
  if (!bodyCycle.sensationCaptured) return "sensationInquiry";
  if (!bodyCycle.anythingElseAsked) return "anythingElseInquiry";
  if (!counters.howDoYouKnowAsked) return "patternInquiry";
  return "bodyAwarenessInquiry";
}

/** Deterministic decision for the substate; used whenever generation is off or fails. */
export function canonicalDecision(state: SessionState): DecisionKind {
  switch (state.substate) {
    case "goal_and_vision":
      return state.completion.goalStated ? "buildVision" : "clarifyGoal";
    case "psycho_education":
      return "providePsychoEducation";
    case "problem_and_body":
      return problemAndBodyDefault(state);
    case "readiness_assessment":
      return "assessReadiness";
    case "alpha_permission":
      return "requestPermission";
    case "alpha_sequence":
      return state.checkpointState ? "repeatCheckpoint" : "startCheckpoint";
    case "complete":
      return "closeSession";
  }
}

/** Decisions a generator may propose in the current substate. Once-only questions drop out after use. */
export function allowedGenerativeDecisions(state: SessionState): DecisionKind[] {
  const { completion, counters, bodyCycle } = state;
  switch (state.substate) {
    case "goal_and_vision":
      return completion.goalStated ? ["buildVision", "offerOutcomeMenu"] : ["clarifyGoal", "offerOutcomeMenu", "generalInquiry"];
    case "problem_and_body": {
      const allowed: DecisionKind[] = [];
      if (!completion.problemIdentified && counters.problemQuestionTurn === 0) allowed.push("exploreProblem");
      allowed.push("bodyLocationInquiry", "sensationInquiry", "presentMomentInquiry", "bodyAwarenessInquiry");
      if (!bodyCycle.anythingElseAsked) allowed.push("anythingElseInquiry");
      if (!counters.howDoYouKnowAsked) allowed.push("patternInquiry");
      allowed.push("generalInquiry");
      return allowed;
    }
    default:
      return [canonicalDecision(state)];
  }
}
