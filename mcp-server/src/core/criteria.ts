import type { AnswerKind } from "../contracts/decisions.js";
import type { Substate } from "../contracts/substates.js";
import type { EngineConfig } from "./config.js";
import { findTerms, firstTerm, hasAnyTerm, type Lexicons } from "./lexicons.js";
import type { BodyCycle, Completion, Criterion, Exchange, SessionState } from "./state.js";
import { truncate, wordCount } from "./text.js";

export type DetectionContext = {
  /** Corrected text of the current turn. */
  text: string;
  substate: Substate;
  answerKind: AnswerKind;
  completion: Completion;
  history: readonly Exchange[];
  /** 1-based number of the current turn. */
  turn: number;
  bodyCycle: BodyCycle;
  lexicons: Lexicons;
  config: EngineConfig;
};

export type CriterionMet = { criterion: Criterion; evidence: string };

export type CriteriaUpdate = {
  completion: Partial<Completion>;
  met: CriterionMet[];
};

export type ImplicitAcceptance = {
  accepted: boolean;
  evidence: string[];
};

type TurnText = { turn: number; text: string };

function windowTurns(ctx: DetectionContext, size: number): TurnText[] {
  const prior = ctx.history.slice(-(size - 1)).map((e) => ({ turn: e.turn, text: e.input }));
  return [...prior, { turn: ctx.turn, text: ctx.text }];
}

/**
 * Vision acceptance without an explicit "yes": emotional or body language in at least
 * `implicitAcceptanceMinTurns` of the last `implicitAcceptanceWindowTurns` turns at or
 * after the goal turn, and no negation now.
 */
export function implicitVisionAcceptance(ctx: DetectionContext, goalTurn: number): ImplicitAcceptance {
  if (goalTurn <= 0) return { accepted: false, evidence: [] };
  if (hasAnyTerm(ctx.text, ctx.lexicons.negation)) return { accepted: false, evidence: [] };
  const evidence: string[] = [];
  for (const { turn, text } of windowTurns(ctx, ctx.config.implicitAcceptanceWindowTurns)) {
    if (turn < goalTurn) continue;
    const term = firstTerm(text, ctx.lexicons.emotionalSharing);
    if (term) evidence.push(`turn ${turn}: "${term}"`);
  }
  return { accepted: evidence.length >= ctx.config.implicitAcceptanceMinTurns, evidence };
}

export type ProblemEvidence = {
  identified: boolean;
  content: string;
  stressorTurns: number;
  bodyTurns: number;
};

/** 2-of-N evidence over the recent window, with a body-led fallback for longer sessions. */
export function evaluateProblemEvidence(ctx: DetectionContext): ProblemEvidence {
  const { lexicons } = ctx;
  const bodyTerms = [...lexicons.bodyLocation, ...lexicons.sensationQuality];
  let stressorTurns = 0;
  let bodyTurns = 0;
  let content = "";
  for (const { text } of windowTurns(ctx, ctx.config.problemEvidenceWindowTurns)) {
    if (hasAnyTerm(text, lexicons.stressor)) {
      stressorTurns += 1;
      content = text;
    }
    if (hasAnyTerm(text, bodyTerms)) bodyTurns += 1;
  }
  if (stressorTurns >= 1 && stressorTurns + bodyTurns >= 2) {
    return { identified: true, content: truncate(content, 120), stressorTurns, bodyTurns };
  }
  if (
    ctx.turn >= ctx.config.minTurnsForBodyOnlyProblem &&
    ctx.bodyCycle.locationCaptured &&
    ctx.bodyCycle.sensationCaptured
  ) {
    return { identified: true, content: `body-led: ${truncate(ctx.text, 100)}`, stressorTurns, bodyTurns };
  }
  return { identified: false, content: "", stressorTurns, bodyTurns };
}

/**
 * Runs every detector on the current turn. Idempotent: criteria already met are left
 * alone, so running it twice on the same turn reports nothing new.
 */
export function detectCriteria(ctx: DetectionContext): CriteriaUpdate {
  const { text, lexicons, completion } = ctx;
  const update: Partial<Completion> = {};
  const met: CriterionMet[] = [];
  const negated = hasAnyTerm(text, lexicons.negation);

  const mark = (criterion: Criterion, evidence: string) => {
    if (completion[criterion] || update[criterion]) return;
    update[criterion] = true;
    met.push({ criterion, evidence });
  };

  const goalTerms = findTerms(text, [...lexicons.goalPhrase, ...lexicons.goalState]);
  if (goalTerms.length > 0 && !completion.goalStated) {
    mark("goalStated", goalTerms[0]);
    update.goalContent = truncate(text, 200);
    update.goalStatedTurn = ctx.turn;
  }

  const goalTurn = completion.goalStatedTurn || update.goalStatedTurn || 0;
  if ((completion.goalStated || update.goalStated) && !completion.visionAccepted) {
    const acceptance = firstTerm(text, lexicons.visionAcceptance);
    if (completion.visionPresented && acceptance && !negated) {
      mark("visionAccepted", `explicit: "${acceptance}"`);
      update.visionAcceptanceEvidence = `explicit: "${acceptance}"`;
    } else if (ctx.config.implicitVisionAcceptance) {
      const implicit = implicitVisionAcceptance(ctx, goalTurn);
      if (implicit.accepted) {
        const evidence = `implicit: ${implicit.evidence.join("; ")}`;
        mark("visionAccepted", evidence);
        update.visionAcceptanceEvidence = evidence;
      }
    }
  }

  const emotion = firstTerm(text, lexicons.emotion);
  if (emotion) {
    mark("emotionIdentified", emotion);
    if (!completion.emotionContent) update.emotionContent = emotion;
  }

  if (!completion.problemIdentified) {
    const problem = evaluateProblemEvidence(ctx);
    if (problem.identified) {
      mark("problemIdentified", `stressor turns ${problem.stressorTurns}, body turns ${problem.bodyTurns}`);
      update.problemContent = problem.content;
    }
  }

  const awareness = firstTerm(text, lexicons.bodyAwareness);
  if (awareness) mark("bodyAwarenessPresent", awareness);

  const present = firstTerm(text, lexicons.presentMoment);
  if (present) mark("presentMomentFocus", present);

  const pattern = firstTerm(text, lexicons.pattern);
  const patternNow = Boolean(pattern) && wordCount(text) > ctx.config.patternMinWords;
  if (patternNow) mark("patternUnderstood", pattern);

  if (ctx.substate === "readiness_assessment" && (ctx.answerKind === "nothingMore" || patternNow)) {
    mark("readinessConfirmed", ctx.answerKind === "nothingMore" ? "nothing more to add" : "pattern understood");
  }

  if (ctx.substate === "alpha_permission" && !negated) {
    const permission = firstTerm(text, lexicons.permission);
    if (permission) mark("permissionGranted", permission);
  }

  return { completion: update, met };
}

type Requirement = Criterion | "cycleLocationCaptured" | "cycleSensationCaptured";

export const ADVANCEMENT_REQUIREMENTS: Record<Exclude<Substate, "complete">, readonly Requirement[]> = {
  goal_and_vision: ["goalStated", "visionAccepted"],
  psycho_education: ["psychoEducationProvided"],
  problem_and_body: [
    "problemIdentified",
    "bodyAwarenessPresent",
    "presentMomentFocus",
    "cycleLocationCaptured",
    "cycleSensationCaptured",
  ],
  readiness_assessment: ["readinessConfirmed"],
  alpha_permission: ["permissionGranted"],
  alpha_sequence: ["readyForNextStage"],
};

/** Requirements of the current substate that are still unmet; empty means it may advance. */
export function missingRequirements(state: SessionState): Requirement[] {
  if (state.substate === "complete") return [];
  return ADVANCEMENT_REQUIREMENTS[state.substate].filter((req) => {
    if (req === "cycleLocationCaptured") return !state.bodyCycle.locationCaptured;
    if (req === "cycleSensationCaptured") return !state.bodyCycle.sensationCaptured;
    return !state.completion[req];
  });
}
