import type { AnswerKind } from "../contracts/decisions.js";
import type { Lexicons } from "./lexicons.js";
import type { Engagement, EngagementLevel } from "./state.js";
import { normalizeForMatching, wordCount } from "./text.js";

/** Bare confirmations in a row before the user is asked whether they are still with us. */
export const CONFIRMATION_STREAK_LIMIT = 4;
/** Turns that must pass after an engagement intervention before a confirmation check. */
export const INTERVENTION_SPACING_TURNS = 3;
export const HANDOFF_SILENT_TURNS = 3;
export const HANDOFF_CONFUSION_COUNT = 5;
export const LEVEL_WINDOW = 10;
export const HANDOFF_LOW_LEVELS = 7;

export type EngagementKind =
  | "silence"
  | "confused"
  | "disengaged"
  | "minimalConfirmation"
  | "confirmationWithContent"
  | "engaged"
  | "moderate"
  | "minimal";

export type EngagementIntervention = "none" | "silenceCheck" | "disengagementCheck" | "engagementCheck";

export type EngagementAssessment = {
  kind: EngagementKind;
  level: EngagementLevel;
  intervention: EngagementIntervention;
  engagement: Engagement;
};

function startsWithPhrase(text: string, phrases: readonly string[]): boolean {
  const words = text.replace(/[^a-z0-9' ]/g, " ").split(" ").filter(Boolean);
  return phrases.some((phrase) => {
    const target = normalizeForMatching(phrase).split(" ");
    return target.every((word, i) => words[i] === word);
  });
}

export function classifyEngagement(rawText: string, answerKind: AnswerKind, lexicons: Lexicons): EngagementKind {
  const text = normalizeForMatching(rawText);
  if (!text) return "silence";
  if (answerKind === "confusion") return "confused";
  if (lexicons.engagement.disengaged.some((term) => normalizeForMatching(term) === text)) return "disengaged";
  const words = wordCount(text);
  if (startsWithPhrase(text, lexicons.engagement.confirmation)) {
    return words <= 3 ? "minimalConfirmation" : "confirmationWithContent";
  }
  if (words >= 10) return "engaged";
  if (words >= 5) return "moderate";
  return "minimal";
}

export function engagementLevel(kind: EngagementKind, consecutiveSilent: number): EngagementLevel {
  switch (kind) {
    case "engaged":
    case "confirmationWithContent":
      return "high";
    case "moderate":
    case "minimalConfirmation":
      return "medium";
    case "minimal":
    case "confused":
      return "low";
    case "silence":
      return consecutiveSilent >= HANDOFF_SILENT_TURNS ? "critical" : "low";
    case "disengaged":
      return "critical";
  }
}

function handoffRecommended(engagement: Engagement): boolean {
  if (engagement.consecutiveSilent >= HANDOFF_SILENT_TURNS) return true;
  if (engagement.confusionCount >= HANDOFF_CONFUSION_COUNT) return true;
  if (engagement.recentLevels.length < LEVEL_WINDOW) return false;
  const low = engagement.recentLevels.filter((level) => level === "low" || level === "critical").length;
  return low >= HANDOFF_LOW_LEVELS;
}

/**
 * Reads one reply against the running engagement record. Silence and empty replies count
 * toward the silent streak along with disengaged one-word replies; any other reply ends it.
 */
export function assessEngagement(
  previous: Engagement,
  rawText: string,
  answerKind: AnswerKind,
  turn: number,
  lexicons: Lexicons
): EngagementAssessment {
  const kind = classifyEngagement(rawText, answerKind, lexicons);
  const next: Engagement = structuredClone(previous);

  next.consecutiveConfirmations = kind === "minimalConfirmation" ? previous.consecutiveConfirmations + 1 : 0;
  next.consecutiveSilent = kind === "silence" || kind === "disengaged" ? previous.consecutiveSilent + 1 : 0;
  if (kind === "confused") next.confusionCount += 1;

  const level = engagementLevel(kind, next.consecutiveSilent);
  next.recentLevels = [...previous.recentLevels, level].slice(-LEVEL_WINDOW);
  next.handoffRecommended = handoffRecommended(next);

  let intervention: EngagementIntervention = "none";
  if (kind === "silence") {
    intervention = "silenceCheck";
  } else if (kind === "disengaged" && next.consecutiveSilent >= 2) {
    intervention = "disengagementCheck";
  } else if (
    next.consecutiveConfirmations >= CONFIRMATION_STREAK_LIMIT &&
    turn - previous.lastInterventionTurn >= INTERVENTION_SPACING_TURNS
  ) {
    intervention = "engagementCheck";
  }
  return { kind, level, intervention, engagement: next };
}
