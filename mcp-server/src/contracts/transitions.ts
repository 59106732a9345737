import { z } from "zod";
import { SubstateZod } from "./substates.js";

export const FORCED_TRANSITION_REASONS = [
  "nothing_else",
  "cycle_cap",
  "body_question_cap",
  "readiness_prompt_cap",
  "readiness_reentry",
] as const;
export type ForcedTransitionReason = (typeof FORCED_TRANSITION_REASONS)[number];

export const SubstateAdvancedEventZod = z.object({
  type: z.literal("SUBSTATE_ADVANCED"),
  from: SubstateZod,
  to: SubstateZod,
});

export const ForcedTransitionEventZod = z.object({
  type: z.literal("FORCED_TRANSITION"),
  from: SubstateZod,
  to: SubstateZod,
  reason: z.enum(FORCED_TRANSITION_REASONS),
});

export const BodyCycleStartedEventZod = z.object({
  type: z.literal("BODY_CYCLE_STARTED"),
  cycle: z.number().int().min(1),
  via: z.enum(["anything_else", "readiness_reentry"]),
});

export const CriterionMetEventZod = z.object({
  type: z.literal("CRITERION_MET"),
  criterion: z.string(),
  evidence: z.string(),
});

export const TransitionEventZod = z.discriminatedUnion("type", [
  SubstateAdvancedEventZod,
  ForcedTransitionEventZod,
  BodyCycleStartedEventZod,
  CriterionMetEventZod,
]);

export type TransitionEvent = z.infer<typeof TransitionEventZod>;
