import { z } from "zod";
import { SubstateZod } from "./substates.js";

export const DECISION_KINDS = [
  "safetyEscalation",
  "safetyFollowUp",
  "acknowledgeSafety",
  "silenceCheck",
  "disengagementCheck",
  "engagementCheck",
  "redirectPastToPresent",
  "redirectThinkingToFeeling",
  "offerOutcomeMenu",
  "clarifyGoal",
  "buildVision",
  "providePsychoEducation",
  "exploreProblem",
  "bodyLocationInquiry",
  "sensationInquiry",
  "presentMomentInquiry",
  "bodyAwarenessInquiry",
  "anythingElseInquiry",
  "patternInquiry",
  "presentMomentCheck",
  "assessReadiness",
  "requestPermission",
  "startCheckpoint",
  "checkpointStep",
  "normalizeResistance",
  "repeatCheckpoint",
  "clarifyCheckpoint",
  "closeSession",
  "generalInquiry",
] as const;

export type DecisionKind = (typeof DECISION_KINDS)[number];
export const DecisionKindZod = z.enum(DECISION_KINDS);

export function isDecisionKind(x: unknown): x is DecisionKind {
  return typeof x === "string" && DECISION_KINDS.some((kind) => kind === x);
}

export const ANSWER_KINDS = [
  "bodyLocation",
  "sensationQuality",
  "emotion",
  "affirmation",
  "confusion",
  "nothingMore",
  "general",
] as const;

export type AnswerKind = (typeof ANSWER_KINDS)[number];
export const AnswerKindZod = z.enum(ANSWER_KINDS);

export const MENU_TOPICS = ["goal", "feelings", "body"] as const;
export type MenuTopic = (typeof MENU_TOPICS)[number];

export const RISK_LEVELS = ["immediate_danger", "high_risk", "moderate_risk", "low_risk"] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];
export const RiskLevelZod = z.enum(RISK_LEVELS);

export const CheckpointInfoZod = z.object({
  stepIndex: z.number().int().min(0),
  stepId: z.string(),
  totalSteps: z.number().int().min(1),
  outcome: z.enum(["started", "advanced", "resistance", "neutral", "unclear", "complete"]),
  downRegulated: z.boolean(),
});
export type CheckpointInfo = z.infer<typeof CheckpointInfoZod>;

export const NavigationDecisionZod = z.object({
  decision: DecisionKindZod,
  situationType: z.string().min(1),
  retrievalTag: z.string().min(1),
  readyForNext: z.boolean(),
  blockedBy: z.array(z.string()),
  reasoning: z.string(),
  ruleOverrideApplied: z.boolean(),
  fallbackUsed: z.boolean(),
  ruleId: z.string().min(1),
  substate: SubstateZod,
  affirmFirst: z.boolean(),
  topic: z.string(),
  riskLevel: RiskLevelZod.optional(),
  checkpoint: CheckpointInfoZod.optional(),
});

export type NavigationDecision = Readonly<z.infer<typeof NavigationDecisionZod>>;

export type DecisionProfile = {
  situationType: string;
  retrievalTag: string;
};

/**
 * Canonical situation/retrieval profile per decision kind. Used to fill fields a
 * generated decision leaves out and as the default for rule decisions.
 */
export const DECISION_PROFILES = {
  safetyEscalation: { situationType: "crisis", retrievalTag: "safety" },
  safetyFollowUp: { situationType: "safetyUnresolved", retrievalTag: "safety" },
  acknowledgeSafety: { situationType: "safetyConfirmed", retrievalTag: "safety_confirmed" },
  silenceCheck: { situationType: "silence", retrievalTag: "engagement" },
  disengagementCheck: { situationType: "disengaged", retrievalTag: "engagement" },
  engagementCheck: { situationType: "minimalEngagement", retrievalTag: "engagement" },
  redirectPastToPresent: { situationType: "pastFocus", retrievalTag: "present_redirect" },
  redirectThinkingToFeeling: { situationType: "thinkingMode", retrievalTag: "feeling_redirect" },
  offerOutcomeMenu: { situationType: "uncertainty", retrievalTag: "outcome_menu" },
  clarifyGoal: { situationType: "goalUnclear", retrievalTag: "goal_inquiry" },
  buildVision: { situationType: "goalStated", retrievalTag: "vision_building" },
  providePsychoEducation: { situationType: "visionAccepted", retrievalTag: "psycho_education" },
  exploreProblem: { situationType: "problemUnclear", retrievalTag: "problem_inquiry" },
  bodyLocationInquiry: { situationType: "bodyEnquiry", retrievalTag: "body_location" },
  sensationInquiry: { situationType: "bodyEnquiry", retrievalTag: "body_sensation" },
  presentMomentInquiry: { situationType: "bodyEnquiry", retrievalTag: "present_moment" },
  bodyAwarenessInquiry: { situationType: "bodyEnquiry", retrievalTag: "body_awareness" },
  anythingElseInquiry: { situationType: "bodyEnquiry", retrievalTag: "anything_else" },
  patternInquiry: { situationType: "patternExploration", retrievalTag: "pattern_inquiry" },
  presentMomentCheck: { situationType: "bodyQuestionCap", retrievalTag: "present_moment" },
  assessReadiness: { situationType: "readinessForAlpha", retrievalTag: "readiness" },
  requestPermission: { situationType: "alphaPermission", retrievalTag: "permission" },
  startCheckpoint: { situationType: "alphaSequence", retrievalTag: "checkpoint_start" },
  checkpointStep: { situationType: "alphaSequence", retrievalTag: "checkpoint_step" },
  normalizeResistance: { situationType: "alphaResistance", retrievalTag: "checkpoint_resistance" },
  repeatCheckpoint: { situationType: "alphaNeutral", retrievalTag: "checkpoint_repeat" },
  clarifyCheckpoint: { situationType: "alphaUnclear", retrievalTag: "checkpoint_clarify" },
  closeSession: { situationType: "sessionComplete", retrievalTag: "closing" },
  generalInquiry: { situationType: "general", retrievalTag: "general" },
} as const satisfies Record<DecisionKind, DecisionProfile>;

/** Question categories counted by the body-question guard. */
export type BodyQuestionCategory = "bodyLocation" | "sensationQuality" | "presentMoment" | "awareness";

const BODY_QUESTION_CATEGORIES: Partial<Record<DecisionKind, BodyQuestionCategory>> = {
  bodyLocationInquiry: "bodyLocation",
  sensationInquiry: "sensationQuality",
  presentMomentInquiry: "presentMoment",
  bodyAwarenessInquiry: "awareness",
};

export function bodyQuestionCategory(kind: DecisionKind): BodyQuestionCategory | null {
  return BODY_QUESTION_CATEGORIES[kind] ?? null;
}

/**
 * Shape accepted from a decision generator. Every field is optional here; the engine
 * decides whether a missing or unknown `decision` makes the output unusable.
 */
export const GeneratedDecisionFieldsZod = z.object({
  decision: z.string().optional(),
  situationType: z.string().optional(),
  retrievalTag: z.string().optional(),
  readyForNext: z.boolean().optional(),
  blockedBy: z.array(z.string()).optional(),
  reasoning: z.string().optional(),
});
export type GeneratedDecisionFields = z.infer<typeof GeneratedDecisionFieldsZod>;
