import type { ClassifiedInput } from "../contracts/collaborators.js";
import type { AnswerKind, CheckpointInfo, DecisionKind, MenuTopic, RiskLevel } from "../contracts/decisions.js";
import { isConversationalSubstate, type Substate } from "../contracts/substates.js";
import type { ForcedTransitionReason, TransitionEvent } from "../contracts/transitions.js";
import { isBodyDetailKind } from "./answer_kind.js";
import { CheckpointSequence, type CheckpointStep } from "./checkpoint.js";
import type { EngineConfig } from "./config.js";
import { nextBodyCycleAction } from "./defaults.js";
import type { EngagementAssessment } from "./engagement.js";
import { hasAnyTerm, type Lexicons } from "./lexicons.js";
import { BODY_ENQUIRY_CYCLE_CAP, getDefaultBodyCycle, type SessionState } from "./state.js";

/** Working context of one turn. `draft` is the engine's private copy of the session. */
export type TurnContext = {
  draft: SessionState;
  input: string;
  text: string;
  classified: ClassifiedInput;
  answerKind: AnswerKind;
  turn: number;
  newBodyDetail: boolean;
  /** Stressor/emotion words of this turn not raised earlier in the session. */
  newTopics: string[];
  engagement: EngagementAssessment;
  lexicons: Lexicons;
  config: EngineConfig;
  checkpointSteps: readonly CheckpointStep[];
  events: TransitionEvent[];
};

export type RuleAction = {
  decision: DecisionKind;
  reasoning: string;
  situationType?: string;
  topic?: string;
  affirmFirst?: boolean;
  riskLevel?: RiskLevel;
  checkpoint?: CheckpointInfo;
};

export type Rule = {
  id: string;
  applies: (ctx: TurnContext) => boolean;
  act: (ctx: TurnContext) => RuleAction;
};

/** Leaves problem_and_body with the active cycle counted as done. */
export function closeBodyCycle(draft: SessionState): void {
  draft.counters.bodyEnquiryCycles = Math.min(
    BODY_ENQUIRY_CYCLE_CAP,
    Math.max(draft.counters.bodyEnquiryCycles, draft.bodyCycle.active)
  );
}

export function forceTransition(ctx: TurnContext, to: Substate, reason: ForcedTransitionReason): void {
  const from = ctx.draft.substate;
  if (from === "problem_and_body" && to !== "problem_and_body") closeBodyCycle(ctx.draft);
  ctx.draft.substate = to;
  ctx.events.push({ type: "FORCED_TRANSITION", from, to, reason });
}

export function assessRiskLevel(text: string, lexicons: Lexicons): RiskLevel {
  if (hasAnyTerm(text, lexicons.riskLevels.immediate_danger)) return "immediate_danger";
  if (hasAnyTerm(text, lexicons.riskLevels.high_risk)) return "high_risk";
  if (hasAnyTerm(text, lexicons.riskLevels.moderate_risk)) return "moderate_risk";
  return "low_risk";
}

/** A clear "I'm safe" with nothing in the reply that takes it back. */
export function isSafeReply(text: string, lexicons: Lexicons): boolean {
  return hasAnyTerm(text, lexicons.safetyReply.safe) && !hasAnyTerm(text, lexicons.safetyReply.unsafe);
}

export function isAwaitingSafetyReply(state: SessionState): boolean {
  return state.lastDecision === "safetyEscalation" || state.lastDecision === "safetyFollowUp";
}

export function resolveMenuTopic(ctx: TurnContext): MenuTopic {
  const fromWords = ctx.classified.uncertaintyTopic;
  if (fromWords !== "general") return fromWords;
  switch (ctx.draft.substate) {
    case "goal_and_vision":
      return "goal";
    case "problem_and_body":
      return "body";
    default:
      return "feelings";
  }
}

function checkpointInfo(
  sequence: CheckpointSequence,
  stepIndex: number,
  outcome: CheckpointInfo["outcome"]
): CheckpointInfo {
  const snap = sequence.snapshot;
  return {
    stepIndex,
    stepId: sequence.currentStep.id,
    totalSteps: snap.totalSteps,
    outcome,
    downRegulated: sequence.isDownRegulated(),
  };
}

export const SAFETY_RULE: Rule = {
  id: "safety",
  applies: (ctx) => ctx.classified.safetyFlags.crisis,
  act: (ctx) => {
    const riskLevel = assessRiskLevel(ctx.text, ctx.lexicons);
    return {
      decision: "safetyEscalation",
      riskLevel,
      reasoning: `Crisis language detected (${riskLevel}); safety response replaces the session flow.`,
    };
  },
};

/** After an escalation the session stays on safety until the user says they are safe. */
const safetyFollowUp: Rule = {
  id: "safety_followup",
  applies: (ctx) => isAwaitingSafetyReply(ctx.draft),
  act: (ctx) => {
    if (isSafeReply(ctx.text, ctx.lexicons)) {
      return { decision: "acknowledgeSafety", reasoning: "User says they are safe; acknowledge and resume the session." };
    }
    const riskLevel = assessRiskLevel(ctx.text, ctx.lexicons);
    return {
      decision: "safetyFollowUp",
      riskLevel,
      reasoning: `Safety not confirmed (${riskLevel}); stay with safety before resuming.`,
    };
  },
};

const pastTenseRedirect: Rule = {
  id: "past_tense_redirect",
  applies: (ctx) => isConversationalSubstate(ctx.draft.substate) && ctx.classified.safetyFlags.pastTense,
  act: () => ({ decision: "redirectPastToPresent", reasoning: "User is talking about the past; bring focus to now." }),
};

const thinkingModeRedirect: Rule = {
  id: "thinking_mode_redirect",
  applies: (ctx) => isConversationalSubstate(ctx.draft.substate) && ctx.classified.safetyFlags.thinkingMode,
  act: () => ({ decision: "redirectThinkingToFeeling", reasoning: "User is analysing; redirect to what they feel." }),
};

const uncertaintyMenu: Rule = {
  id: "uncertainty_menu",
  applies: (ctx) => isConversationalSubstate(ctx.draft.substate) && ctx.classified.safetyFlags.uncertain,
  act: (ctx) => {
    const topic = resolveMenuTopic(ctx);
    return { decision: "offerOutcomeMenu", topic, reasoning: `User is unsure; offer a menu of ${topic} options.` };
  },
};

const engagementCheck: Rule = {
  id: "engagement_check",
  applies: (ctx) => isConversationalSubstate(ctx.draft.substate) && ctx.engagement.intervention !== "none",
  act: (ctx) => {
    const { intervention, engagement } = ctx.engagement;
    const handoff = engagement.handoffRecommended ? " Handoff to a person recommended." : "";
    switch (intervention) {
      case "silenceCheck":
        return {
          decision: "silenceCheck",
          reasoning: `No reply (${engagement.consecutiveSilent} in a row); check in gently.${handoff}`,
        };
      case "disengagementCheck":
        return {
          decision: "disengagementCheck",
          reasoning: `User seems to be pulling back; ask what is happening and offer a break.${handoff}`,
        };
      default:
        return {
          decision: "engagementCheck",
          reasoning: `${engagement.consecutiveConfirmations} bare confirmations in a row; check the user is still with us.`,
        };
    }
  },
};

const clarifyGoal: Rule = {
  id: "clarify_goal",
  applies: (ctx) =>
    ctx.draft.substate === "goal_and_vision" &&
    !ctx.draft.completion.goalStated &&
    ctx.draft.conversationHistory.length < ctx.config.clarifyGoalTurnLimit,
  act: (ctx) => {
    const problemFirst = hasAnyTerm(ctx.text, ctx.lexicons.problemWords);
    return {
      decision: "clarifyGoal",
      situationType: problemFirst ? "problemWithoutGoal" : "goalUnclear",
      reasoning: problemFirst
        ? "User led with a problem; ask what they want instead."
        : "No goal stated yet; ask what they want from the session.",
    };
  },
};

const buildVision: Rule = {
  id: "build_vision",
  applies: (ctx) =>
    ctx.draft.substate === "goal_and_vision" &&
    ctx.draft.completion.goalStated &&
    !ctx.draft.completion.visionAccepted,
  act: () => ({ decision: "buildVision", reasoning: "Goal stated; paint the vision and wait for acceptance." }),
};

const psychoEducation: Rule = {
  id: "psycho_education",
  applies: (ctx) => ctx.draft.substate === "psycho_education" && !ctx.draft.completion.psychoEducationProvided,
  act: () => ({ decision: "providePsychoEducation", reasoning: "Vision accepted; explain how the process works." }),
};

const exploreProblem: Rule = {
  id: "explore_problem",
  applies: (ctx) =>
    ctx.draft.substate === "problem_and_body" &&
    !ctx.draft.completion.problemIdentified &&
    !isBodyDetailKind(ctx.answerKind) &&
    ctx.draft.counters.problemQuestionTurn === 0,
  act: () => ({ decision: "exploreProblem", reasoning: "No problem identified yet; ask what is getting in the way." }),
};

const nothingElse: Rule = {
  id: "nothing_else",
  applies: (ctx) =>
    ctx.draft.substate === "problem_and_body" &&
    ((ctx.answerKind === "nothingMore" && ctx.draft.lastDecision === "anythingElseInquiry") ||
      ctx.draft.counters.bodyEnquiryCycles >= BODY_ENQUIRY_CYCLE_CAP),
  act: (ctx) => {
    const capped = ctx.draft.counters.bodyEnquiryCycles >= BODY_ENQUIRY_CYCLE_CAP;
    forceTransition(ctx, "readiness_assessment", capped ? "cycle_cap" : "nothing_else");
    return {
      decision: "assessReadiness",
      reasoning: capped
        ? "Body enquiry cycle cap reached; move to readiness."
        : "Nothing more to add after 'what else'; move to readiness.",
    };
  },
};

const affirmAndProceed: Rule = {
  id: "affirm_and_proceed",
  applies: (ctx) => ctx.draft.substate === "problem_and_body" && isBodyDetailKind(ctx.answerKind),
  act: (ctx) => {
    if (!ctx.newBodyDetail) {
      return { decision: "bodyAwarenessInquiry", reasoning: "Same body detail repeated; deepen awareness instead." };
    }
    const decision = nextBodyCycleAction(ctx.draft);
    return { decision, affirmFirst: true, reasoning: `New body detail; affirm and continue with ${decision}.` };
  },
};

const readinessReentry: Rule = {
  id: "readiness_reentry",
  applies: (ctx) =>
    ctx.draft.substate === "readiness_assessment" &&
    ctx.newTopics.length > 0 &&
    ctx.draft.counters.bodyEnquiryCycles < BODY_ENQUIRY_CYCLE_CAP,
  act: (ctx) => {
    const { draft } = ctx;
    const cycle = draft.counters.bodyEnquiryCycles + 1;
    forceTransition(ctx, "problem_and_body", "readiness_reentry");
    draft.bodyCycle = getDefaultBodyCycle(cycle);
    draft.bodyCycle.locationCaptured = hasAnyTerm(ctx.text, ctx.lexicons.bodyLocation);
    draft.bodyCycle.sensationCaptured = hasAnyTerm(ctx.text, ctx.lexicons.sensationQuality);
    draft.counters.bodyQuestionsAsked = 0;
    ctx.events.push({ type: "BODY_CYCLE_STARTED", cycle, via: "readiness_reentry" });
    const topic = ctx.newTopics[0];
    return {
      decision: nextBodyCycleAction(draft),
      topic,
      reasoning: `New topic "${topic}" raised during readiness; open body enquiry cycle ${cycle}.`,
    };
  },
};

const assessReadiness: Rule = {
  id: "assess_readiness",
  applies: (ctx) => ctx.draft.substate === "readiness_assessment",
  act: (ctx) => {
    if (ctx.draft.counters.readinessPrompts >= ctx.config.maxReadinessPrompts) {
      forceTransition(ctx, "alpha_permission", "readiness_prompt_cap");
      return { decision: "requestPermission", reasoning: "Readiness asked enough times; ask permission to begin." };
    }
    return { decision: "assessReadiness", reasoning: "Check whether anything else needs saying before we begin." };
  },
};

const requestPermission: Rule = {
  id: "request_permission",
  applies: (ctx) => ctx.draft.substate === "alpha_permission",
  act: () => ({ decision: "requestPermission", reasoning: "Ask permission before guiding the relaxation sequence." }),
};

const checkpointStart: Rule = {
  id: "checkpoint_start",
  applies: (ctx) => ctx.draft.substate === "alpha_sequence" && !ctx.draft.checkpointState,
  act: (ctx) => {
    const sequence = new CheckpointSequence(ctx.checkpointSteps, ctx.lexicons.checkpoint);
    sequence.start();
    ctx.draft.checkpointState = sequence.snapshot;
    return {
      decision: "startCheckpoint",
      checkpoint: checkpointInfo(sequence, 0, "started"),
      reasoning: "Permission granted; start the first step.",
    };
  },
};

const checkpointAdvance: Rule = {
  id: "checkpoint_advance",
  applies: (ctx) => ctx.draft.substate === "alpha_sequence" && ctx.draft.checkpointState?.status === "active",
  act: (ctx) => {
    const { draft } = ctx;
    const sequence = new CheckpointSequence(ctx.checkpointSteps, ctx.lexicons.checkpoint, draft.checkpointState);
    const outcome = sequence.advance(ctx.text);
    draft.checkpointState = sequence.snapshot;
    switch (outcome.kind) {
      case "advanced":
        return {
          decision: "checkpointStep",
          checkpoint: checkpointInfo(sequence, outcome.stepIndex, "advanced"),
          reasoning: `Calm reported; move to step ${outcome.stepIndex + 1}.`,
        };
      case "resistance":
        return {
          decision: "normalizeResistance",
          checkpoint: checkpointInfo(sequence, outcome.stepIndex, "resistance"),
          reasoning: "Tension reported; normalize and stay on the same step.",
        };
      case "neutral":
        return {
          decision: "repeatCheckpoint",
          checkpoint: checkpointInfo(sequence, outcome.stepIndex, "neutral"),
          reasoning: "No change reported; re-ask without pressure.",
        };
      case "unclear":
        return {
          decision: "clarifyCheckpoint",
          checkpoint: checkpointInfo(sequence, outcome.stepIndex, "unclear"),
          reasoning: "Reply was not calm or tense; rephrase the check.",
        };
      case "complete": {
        draft.completion.readyForNextStage = true;
        ctx.events.push({ type: "SUBSTATE_ADVANCED", from: "alpha_sequence", to: "complete" });
        draft.substate = "complete";
        return {
          decision: "closeSession",
          checkpoint: checkpointInfo(sequence, ctx.checkpointSteps.length - 1, "complete"),
          reasoning: outcome.downRegulated
            ? "All steps calm with physiological signs of down-regulation; close the session."
            : "All steps completed; close the session.",
        };
      }
    }
  },
};

const sessionComplete: Rule = {
  id: "session_complete",
  applies: (ctx) => ctx.draft.substate === "complete",
  act: () => ({ decision: "closeSession", reasoning: "Sequence finished." }),
};

/** Rules evaluated after substate advancement, in priority order. First match wins. */
export const RULE_LADDER: readonly Rule[] = [
  safetyFollowUp,
  pastTenseRedirect,
  thinkingModeRedirect,
  uncertaintyMenu,
  engagementCheck,
  clarifyGoal,
  buildVision,
  psychoEducation,
  exploreProblem,
  nothingElse,
  affirmAndProceed,
  readinessReentry,
  assessReadiness,
  requestPermission,
  checkpointStart,
  checkpointAdvance,
  sessionComplete,
];

export function firstMatchingRule(rules: readonly Rule[], ctx: TurnContext): Rule | null {
  return rules.find((rule) => rule.applies(ctx)) ?? null;
}
