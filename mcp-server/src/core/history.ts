import type { Exchange, SessionState } from "./state.js";
import { normalizeQuestion } from "./text.js";

/** Every substring of `output` that ends in "?", normalized. */
export function extractQuestions(output: string): string[] {
  const matches = String(output ?? "").match(/[^.?!]*\?/g) ?? [];
  const out: string[] = [];
  for (const match of matches) {
    const q = normalizeQuestion(match);
    if (q && q !== "?" && !out.includes(q)) out.push(q);
  }
  return out;
}

function wordSet(question: string): Set<string> {
  return new Set(question.replace(/\?/g, "").split(" ").filter(Boolean));
}

/** Word overlap above 70% of the longer question. */
export function isSimilarQuestion(a: string, b: string): boolean {
  const qa = normalizeQuestion(a);
  const qb = normalizeQuestion(b);
  if (!qa || !qb) return false;
  if (qa === qb) return true;
  const wa = wordSet(qa);
  const wb = wordSet(qb);
  if (wa.size === 0 || wb.size === 0) return false;
  let shared = 0;
  for (const w of wa) if (wb.has(w)) shared += 1;
  return shared / Math.max(wa.size, wb.size) > 0.7;
}

/**
 * True when the question (or a near-duplicate of it) was asked within the last `window`
 * turns, counting the current one.
 */
export function wasAskedRecently(
  asked: Record<string, number>,
  question: string,
  currentTurn: number,
  window: number
): boolean {
  for (const [previous, turn] of Object.entries(asked)) {
    if (turn <= 0 || currentTurn - turn >= window) continue;
    if (isSimilarQuestion(previous, question)) return true;
  }
  return false;
}

/** Most recent turn a similar question was asked, or 0. */
export function lastAskedTurn(asked: Record<string, number>, question: string): number {
  let last = 0;
  for (const [previous, turn] of Object.entries(asked)) {
    if (turn > last && isSimilarQuestion(previous, question)) last = turn;
  }
  return last;
}

export function recordQuestions(
  asked: Record<string, number>,
  output: string,
  turn: number
): Record<string, number> {
  const next = { ...asked };
  for (const q of extractQuestions(output)) next[q] = turn;
  return next;
}

export function recentExchanges(state: SessionState, count: number): Exchange[] {
  if (count <= 0) return [];
  return state.conversationHistory.slice(-count);
}
