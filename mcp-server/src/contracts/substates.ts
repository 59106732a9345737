import { z } from "zod";

/**
 * Ordered substates of a session. Advancement only ever moves one position forward,
 * except for the documented forced transitions and the readiness re-entry.
 */
export const SUBSTATES = [
  "goal_and_vision",
  "psycho_education",
  "problem_and_body",
  "readiness_assessment",
  "alpha_permission",
  "alpha_sequence",
  "complete",
] as const;

export type Substate = (typeof SUBSTATES)[number];
export const SubstateZod = z.enum(SUBSTATES);

export const STAGES = ["safety_building", "down_regulation", "closed"] as const;
export type Stage = (typeof STAGES)[number];
export const StageZod = z.enum(STAGES);

export function isSubstate(x: unknown): x is Substate {
  return typeof x === "string" && SUBSTATES.some((substate) => substate === x);
}

/** Substates where open conversation happens; redirects and the outcome menu only apply here. */
export const CONVERSATIONAL_SUBSTATES: readonly Substate[] = [
  "goal_and_vision",
  "psycho_education",
  "problem_and_body",
];

export function isConversationalSubstate(substate: Substate): boolean {
  return CONVERSATIONAL_SUBSTATES.includes(substate);
}

export function stageForSubstate(substate: Substate): Stage {
  switch (substate) {
    case "goal_and_vision":
    case "psycho_education":
    case "problem_and_body":
    case "readiness_assessment":
      return "safety_building";
    case "alpha_permission":
    case "alpha_sequence":
      return "down_regulation";
    case "complete":
      return "closed";
  }
}

export function substateIndex(substate: Substate): number {
  return SUBSTATES.indexOf(substate);
}

export function successorOf(substate: Substate): Substate | null {
  const idx = substateIndex(substate);
  if (idx < 0 || idx >= SUBSTATES.length - 1) return null;
  return SUBSTATES[idx + 1];
}
