import { z } from "zod";
import type { AnswerKind, DecisionKind, NavigationDecision } from "./decisions.js";
import type { Stage, Substate } from "./substates.js";
import type { BodyCycle, Completion, Counters } from "../core/state.js";

export const EMOTIONAL_TAGS = [
  "negative_high",
  "negative_medium",
  "negative_low",
  "positive",
  "neutral",
] as const;
export type EmotionalTag = (typeof EMOTIONAL_TAGS)[number];

export const INPUT_CATEGORIES = [
  "crisis",
  "emotional_expression",
  "goal_statement",
  "body_awareness",
  "confusion",
  "affirmation",
  "thinking_mode",
  "past_focus",
  "general",
] as const;
export type InputCategory = (typeof INPUT_CATEGORIES)[number];

export const UNCERTAINTY_TOPICS = ["goal", "feelings", "body", "general"] as const;
export type UncertaintyTopic = (typeof UNCERTAINTY_TOPICS)[number];

export const SafetyFlagsZod = z.object({
  crisis: z.boolean(),
  thinkingMode: z.boolean(),
  pastTense: z.boolean(),
  uncertain: z.boolean(),
});
export type SafetyFlags = z.infer<typeof SafetyFlagsZod>;

export const ClassifiedInputZod = z.object({
  originalText: z.string(),
  correctedText: z.string(),
  corrections: z.array(z.object({ from: z.string(), to: z.string() })),
  emotionalState: z.object({
    primary: z.enum(EMOTIONAL_TAGS),
    intensity: z.number().int().min(0).max(3),
    categories: z.record(z.string(), z.array(z.string())),
  }),
  inputCategory: z.enum(INPUT_CATEGORIES),
  safetyFlags: SafetyFlagsZod,
  uncertaintyTopic: z.enum(UNCERTAINTY_TOPICS),
});
export type ClassifiedInput = z.infer<typeof ClassifiedInputZod>;

export interface TextSignalClassifier {
  classify(rawText: string): ClassifiedInput;
}

/** Classification used when the classifier is unavailable: no flags, no corrections. */
export function neutralClassification(rawText: string): ClassifiedInput {
  return {
    originalText: rawText,
    correctedText: rawText.trim().toLowerCase(),
    corrections: [],
    emotionalState: { primary: "neutral", intensity: 0, categories: {} },
    inputCategory: "general",
    safetyFlags: { crisis: false, thinkingMode: false, pastTense: false, uncertain: false },
    uncertaintyTopic: "general",
  };
}

export type TokenUsage = {
  input_tokens: number | null;
  output_tokens: number | null;
  total_tokens: number | null;
  provider_available: boolean;
};

export type ExchangeSummary = {
  turn: number;
  input: string;
  output: string;
};

export type PromptContext = {
  stage: Stage;
  substate: Substate;
  completion: Completion;
  counters: Counters;
  bodyCycle: BodyCycle;
  lastAnswerKind: AnswerKind;
  recentExchanges: ExchangeSummary[];
  allowedDecisions: readonly DecisionKind[];
  userText: string;
};

export type GeneratedDecision = {
  fields: unknown;
  model: string;
  usage: TokenUsage;
};

export interface DecisionGenerator {
  generateDecision(context: PromptContext): Promise<GeneratedDecision>;
}

export type RetrievedExample = {
  id: string;
  tag: string;
  text: string;
  score: number;
};

export interface ExampleRetriever {
  retrieveExamples(decision: NavigationDecision, rawText: string, limit: number): RetrievedExample[];
}
