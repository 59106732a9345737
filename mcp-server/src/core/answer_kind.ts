import type { AnswerKind } from "../contracts/decisions.js";
import { hasAnyTerm, type Lexicons } from "./lexicons.js";

/**
 * First lexicon hit wins, in this order. Emotion comes first: "my anxious chest" is an
 * emotional answer before it is a location.
 */
const ANSWER_KIND_ORDER = [
  "emotion",
  "bodyLocation",
  "sensationQuality",
  "affirmation",
  "confusion",
  "nothingMore",
] as const satisfies readonly Exclude<AnswerKind, "general">[];

export function classifyAnswerKind(text: string, lexicons: Lexicons): AnswerKind {
  for (const kind of ANSWER_KIND_ORDER) {
    if (hasAnyTerm(text, lexicons[kind])) return kind;
  }
  return "general";
}

export function isBodyDetailKind(kind: AnswerKind): boolean {
  return kind === "bodyLocation" || kind === "sensationQuality";
}
