// src/core/state.ts
import { z } from "zod";
import {
  AnswerKindZod,
  DecisionKindZod,
  type AnswerKind,
  type DecisionKind,
} from "../contracts/decisions.js";
import {
  StageZod,
  SubstateZod,
  isSubstate,
  stageForSubstate,
  type Substate,
} from "../contracts/substates.js";
import { CheckpointStateZod } from "./checkpoint.js";
import { normalizeQuestion } from "./text.js";

/** Hard loop-prevention caps. Not configurable. */
export const BODY_QUESTION_CAP = 3;
export const BODY_ENQUIRY_CYCLE_CAP = 2;

export const CRITERIA = [
  "goalStated",
  "visionPresented",
  "visionAccepted",
  "psychoEducationProvided",
  "emotionIdentified",
  "problemIdentified",
  "bodyAwarenessPresent",
  "presentMomentFocus",
  "patternUnderstood",
  "readinessConfirmed",
  "permissionGranted",
  "readyForNextStage",
] as const;

export type Criterion = (typeof CRITERIA)[number];

export const CompletionZod = z.object({
  goalStated: z.boolean(),
  visionPresented: z.boolean(),
  visionAccepted: z.boolean(),
  psychoEducationProvided: z.boolean(),
  emotionIdentified: z.boolean(),
  problemIdentified: z.boolean(),
  bodyAwarenessPresent: z.boolean(),
  presentMomentFocus: z.boolean(),
  patternUnderstood: z.boolean(),
  readinessConfirmed: z.boolean(),
  permissionGranted: z.boolean(),
  readyForNextStage: z.boolean(),

  // evidence (first value wins)
  goalContent: z.string(),
  emotionContent: z.string(),
  problemContent: z.string(),
  visionAcceptanceEvidence: z.string(),
  goalStatedTurn: z.number().int().min(0),
});
export type Completion = z.infer<typeof CompletionZod>;

export const CountersZod = z.object({
  bodyQuestionsAsked: z.number().int().min(0).max(BODY_QUESTION_CAP),
  bodyEnquiryCycles: z.number().int().min(0).max(BODY_ENQUIRY_CYCLE_CAP),
  anythingElseAskedCount: z.number().int().min(0),
  howDoYouKnowAsked: z.boolean(),
  problemQuestionTurn: z.number().int().min(0),
  readinessPrompts: z.number().int().min(0),
});
export type Counters = z.infer<typeof CountersZod>;

export const BodyCycleZod = z.object({
  active: z.number().int().min(1).max(BODY_ENQUIRY_CYCLE_CAP),
  locationCaptured: z.boolean(),
  sensationCaptured: z.boolean(),
  presentMomentAsked: z.boolean(),
  anythingElseAsked: z.boolean(),
});
export type BodyCycle = z.infer<typeof BodyCycleZod>;

export const ENGAGEMENT_LEVELS = ["high", "medium", "low", "critical"] as const;
export type EngagementLevel = (typeof ENGAGEMENT_LEVELS)[number];
export const EngagementLevelZod = z.enum(ENGAGEMENT_LEVELS);

export const EngagementZod = z.object({
  consecutiveConfirmations: z.number().int().min(0),
  consecutiveSilent: z.number().int().min(0),
  confusionCount: z.number().int().min(0),
  lastInterventionTurn: z.number().int().min(0),
  /** Levels of the most recent turns, oldest first. */
  recentLevels: z.array(EngagementLevelZod),
  handoffRecommended: z.boolean(),
});
export type Engagement = z.infer<typeof EngagementZod>;

export const ExchangeZod = z.object({
  turn: z.number().int().min(1),
  input: z.string(),
  output: z.string(),
  substateAtTime: SubstateZod,
  decision: z.union([DecisionKindZod, z.literal("")]),
});
export type Exchange = z.infer<typeof ExchangeZod>;

export const SessionStateZod = z.object({
  stateVersion: z.string(),
  sessionId: z.string().min(1),
  createdAt: z.string(),
  updatedAt: z.string(),

  stage: StageZod,
  substate: SubstateZod,
  completion: CompletionZod,
  counters: CountersZod,
  lastAnswerKind: AnswerKindZod,
  lastDecision: z.union([DecisionKindZod, z.literal("")]),
  bodyCycle: BodyCycleZod,
  engagement: EngagementZod,
  coveredTopics: z.array(z.string()),
  askedQuestions: z.record(z.string(), z.number().int().min(0)),
  conversationHistory: z.array(ExchangeZod),
  checkpointState: CheckpointStateZod.optional(),
  metadata: z.record(z.string(), z.string()),
});

export type SessionState = z.infer<typeof SessionStateZod>;

/**
 * Current state schema version
 * Bump when you change defaults/fields in a way that needs migration.
 */
export const CURRENT_STATE_VERSION = "2";

export function getDefaultCompletion(): Completion {
  return {
    goalStated: false,
    visionPresented: false,
    visionAccepted: false,
    psychoEducationProvided: false,
    emotionIdentified: false,
    problemIdentified: false,
    bodyAwarenessPresent: false,
    presentMomentFocus: false,
    patternUnderstood: false,
    readinessConfirmed: false,
    permissionGranted: false,
    readyForNextStage: false,
    goalContent: "",
    emotionContent: "",
    problemContent: "",
    visionAcceptanceEvidence: "",
    goalStatedTurn: 0,
  };
}

export function getDefaultCounters(): Counters {
  return {
    bodyQuestionsAsked: 0,
    bodyEnquiryCycles: 0,
    anythingElseAskedCount: 0,
    howDoYouKnowAsked: false,
    problemQuestionTurn: 0,
    readinessPrompts: 0,
  };
}

export function getDefaultBodyCycle(active = 1): BodyCycle {
  return {
    active,
    locationCaptured: false,
    sensationCaptured: false,
    presentMomentAsked: false,
    anythingElseAsked: false,
  };
}

export function getDefaultEngagement(): Engagement {
  return {
    consecutiveConfirmations: 0,
    consecutiveSilent: 0,
    confusionCount: 0,
    lastInterventionTurn: 0,
    recentLevels: [],
    handoffRecommended: false,
  };
}

export function createSessionState(
  sessionId: string,
  now: Date = new Date(),
  metadata: Record<string, string> = {}
): SessionState {
  const iso = now.toISOString();
  return SessionStateZod.parse({
    stateVersion: CURRENT_STATE_VERSION,
    sessionId,
    createdAt: iso,
    updatedAt: iso,
    stage: "safety_building",
    substate: "goal_and_vision",
    completion: getDefaultCompletion(),
    counters: getDefaultCounters(),
    lastAnswerKind: "general",
    lastDecision: "",
    bodyCycle: getDefaultBodyCycle(),
    engagement: getDefaultEngagement(),
    coveredTopics: [],
    askedQuestions: {},
    conversationHistory: [],
    metadata: { ...metadata },
  });
}

function asRecord(raw: unknown): Record<string, unknown> {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return {};
  return Object.fromEntries(Object.entries(raw));
}

function toBool(raw: unknown): boolean {
  return raw === true || raw === "true";
}

function toCount(raw: unknown, max = Number.MAX_SAFE_INTEGER): number {
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) return 0;
  return Math.min(Math.floor(n), max);
}

function toStringList(raw: unknown): string[] {
  if (!Array.isArray(raw)) return [];
  return raw.map((item) => String(item ?? "").trim()).filter(Boolean);
}

function toAnswerKind(raw: unknown): AnswerKind {
  const parsed = AnswerKindZod.safeParse(raw);
  return parsed.success ? parsed.data : "general";
}

function toDecision(raw: unknown): DecisionKind | "" {
  const parsed = DecisionKindZod.safeParse(raw);
  return parsed.success ? parsed.data : "";
}

function normalizeCompletion(raw: unknown): Completion {
  const r = asRecord(raw);
  const d = getDefaultCompletion();
  return {
    goalStated: toBool(r.goalStated),
    visionPresented: toBool(r.visionPresented),
    visionAccepted: toBool(r.visionAccepted),
    psychoEducationProvided: toBool(r.psychoEducationProvided),
    emotionIdentified: toBool(r.emotionIdentified),
    problemIdentified: toBool(r.problemIdentified),
    bodyAwarenessPresent: toBool(r.bodyAwarenessPresent),
    presentMomentFocus: toBool(r.presentMomentFocus),
    patternUnderstood: toBool(r.patternUnderstood),
    readinessConfirmed: toBool(r.readinessConfirmed),
    permissionGranted: toBool(r.permissionGranted),
    readyForNextStage: toBool(r.readyForNextStage),
    goalContent: String(r.goalContent ?? d.goalContent),
    emotionContent: String(r.emotionContent ?? d.emotionContent),
    problemContent: String(r.problemContent ?? d.problemContent),
    visionAcceptanceEvidence: String(r.visionAcceptanceEvidence ?? d.visionAcceptanceEvidence),
    goalStatedTurn: toCount(r.goalStatedTurn),
  };
}

function normalizeCounters(raw: unknown): Counters {
  const r = asRecord(raw);
  return {
    bodyQuestionsAsked: toCount(r.bodyQuestionsAsked, BODY_QUESTION_CAP),
    bodyEnquiryCycles: toCount(r.bodyEnquiryCycles, BODY_ENQUIRY_CYCLE_CAP),
    anythingElseAskedCount: toCount(r.anythingElseAskedCount),
    howDoYouKnowAsked: toBool(r.howDoYouKnowAsked),
    problemQuestionTurn: toCount(r.problemQuestionTurn),
    readinessPrompts: toCount(r.readinessPrompts),
  };
}

function normalizeBodyCycle(raw: unknown): BodyCycle {
  const r = asRecord(raw);
  const active = Math.max(1, toCount(r.active, BODY_ENQUIRY_CYCLE_CAP));
  return {
    active,
    locationCaptured: toBool(r.locationCaptured),
    sensationCaptured: toBool(r.sensationCaptured),
    presentMomentAsked: toBool(r.presentMomentAsked),
    anythingElseAsked: toBool(r.anythingElseAsked),
  };
}

function normalizeEngagement(raw: unknown): Engagement {
  const r = asRecord(raw);
  const levels = Array.isArray(r.recentLevels) ? r.recentLevels : [];
  return {
    consecutiveConfirmations: toCount(r.consecutiveConfirmations),
    consecutiveSilent: toCount(r.consecutiveSilent),
    confusionCount: toCount(r.confusionCount),
    lastInterventionTurn: toCount(r.lastInterventionTurn),
    recentLevels: levels.flatMap((level) => {
      const parsed = EngagementLevelZod.safeParse(level);
      return parsed.success ? [parsed.data] : [];
    }),
    handoffRecommended: toBool(r.handoffRecommended),
  };
}

function normalizeHistory(raw: unknown): Exchange[] {
  if (!Array.isArray(raw)) return [];
  const out: Exchange[] = [];
  for (const item of raw) {
    const r = asRecord(item);
    const substate = String(r.substateAtTime ?? "");
    out.push({
      turn: out.length + 1,
      input: String(r.input ?? ""),
      output: String(r.output ?? ""),
      substateAtTime: isSubstate(substate) ? substate : "goal_and_vision",
      decision: toDecision(r.decision),
    });
  }
  return out;
}

function normalizeAskedQuestions(raw: unknown): Record<string, number> {
  return Object.fromEntries(
    Object.entries(asRecord(raw))
      .map(([question, turn]): [string, number] => [normalizeQuestion(question), toCount(turn)])
      .filter(([question]) => Boolean(question))
  );
}

function normalizeMetadata(raw: unknown): Record<string, string> {
  return Object.fromEntries(Object.entries(asRecord(raw)).map(([k, v]) => [String(k), String(v ?? "")]));
}

/**
 * Normalize any incoming raw state to canonical shape:
 * - Ensures required keys exist
 * - Coerces types and clamps counters to their caps
 * - Derives the stage from the substate
 */
export function normalizeSessionState(raw: unknown): SessionState {
  const r = asRecord(raw);
  const now = new Date().toISOString();

  const substateRaw = String(r.substate ?? "").trim();
  const substate: Substate = isSubstate(substateRaw) ? substateRaw : "goal_and_vision";
  const checkpointParsed = CheckpointStateZod.safeParse(r.checkpointState);

  const normalized: SessionState = {
    stateVersion: String(r.stateVersion ?? CURRENT_STATE_VERSION).trim() || CURRENT_STATE_VERSION,
    sessionId: String(r.sessionId ?? "").trim(),
    createdAt: String(r.createdAt ?? "").trim() || now,
    updatedAt: String(r.updatedAt ?? "").trim() || now,
    stage: stageForSubstate(substate),
    substate,
    completion: normalizeCompletion(r.completion),
    counters: normalizeCounters(r.counters),
    lastAnswerKind: toAnswerKind(r.lastAnswerKind),
    lastDecision: toDecision(r.lastDecision),
    bodyCycle: normalizeBodyCycle(r.bodyCycle),
    engagement: normalizeEngagement(r.engagement),
    coveredTopics: Array.from(new Set(toStringList(r.coveredTopics))),
    askedQuestions: normalizeAskedQuestions(r.askedQuestions),
    conversationHistory: normalizeHistory(r.conversationHistory),
    metadata: normalizeMetadata(r.metadata),
  };
  if (checkpointParsed.success) normalized.checkpointState = checkpointParsed.data;

  // final Zod check (rejects an empty sessionId)
  return SessionStateZod.parse(normalized);
}

/**
 * Migrate state from older versions to CURRENT_STATE_VERSION.
 * Keep this function deterministic and side-effect free.
 */
export function migrateSessionState(raw: unknown): SessionState {
  const r = asRecord(raw);
  const version = String(r.stateVersion ?? "1").trim() || "1";
  if (version === CURRENT_STATE_VERSION) return normalizeSessionState(r);

  // v1 -> v2: asked questions were a plain list; stamp them with turn 0 so they fall out
  // of the repeat window.
  if (version === "1") {
    const asked = Array.isArray(r.askedQuestions)
      ? Object.fromEntries(toStringList(r.askedQuestions).map((q) => [q, 0]))
      : r.askedQuestions;
    return normalizeSessionState({ ...r, askedQuestions: asked, stateVersion: CURRENT_STATE_VERSION });
  }

  throw new Error(`Unsupported session state version: ${version}`);
}

/** Monotonic merge: booleans OR together, text evidence keeps its first non-empty value. */
export function mergeCompletion(prev: Completion, update: Partial<Completion>): Completion {
  const merged: Completion = { ...prev };
  for (const key of CRITERIA) {
    if (update[key] === true) merged[key] = true;
  }
  if (!merged.goalContent && update.goalContent) merged.goalContent = update.goalContent;
  if (!merged.emotionContent && update.emotionContent) merged.emotionContent = update.emotionContent;
  if (!merged.problemContent && update.problemContent) merged.problemContent = update.problemContent;
  if (!merged.visionAcceptanceEvidence && update.visionAcceptanceEvidence) {
    merged.visionAcceptanceEvidence = update.visionAcceptanceEvidence;
  }
  if (!merged.goalStatedTurn && update.goalStatedTurn) merged.goalStatedTurn = update.goalStatedTurn;
  return merged;
}

export function completedCriteria(completion: Completion): Criterion[] {
  return CRITERIA.filter((key) => completion[key]);
}

export type ProgressSummary = {
  sessionId: string;
  stage: SessionState["stage"];
  substate: Substate;
  turns: number;
  completedCriteria: Criterion[];
  bodyQuestionsAsked: number;
  bodyEnquiryCycles: number;
  handoffRecommended: boolean;
  checkpoint: { stepIndex: number; totalSteps: number; status: string } | null;
};

export function summarizeProgress(state: SessionState): ProgressSummary {
  return {
    sessionId: state.sessionId,
    stage: state.stage,
    substate: state.substate,
    turns: state.conversationHistory.length,
    completedCriteria: completedCriteria(state.completion),
    bodyQuestionsAsked: state.counters.bodyQuestionsAsked,
    bodyEnquiryCycles: state.counters.bodyEnquiryCycles,
    handoffRecommended: state.engagement.handoffRecommended,
    checkpoint: state.checkpointState
      ? {
          stepIndex: state.checkpointState.stepIndex,
          totalSteps: state.checkpointState.totalSteps,
          status: state.checkpointState.status,
        }
      : null,
  };
}
