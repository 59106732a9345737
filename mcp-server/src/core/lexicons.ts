import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { normalizeForMatching } from "./text.js";

const TermsZod = z.array(z.string().min(1));

export const LexiconsZod = z.object({
  version: z.string(),
  emotion: TermsZod,
  stressor: TermsZod,
  topicGroups: z.record(z.string(), TermsZod),
  bodyLocation: TermsZod,
  sensationQuality: TermsZod,
  affirmation: TermsZod,
  confusion: TermsZod,
  nothingMore: TermsZod,
  goalPhrase: TermsZod,
  goalState: TermsZod,
  visionAcceptance: TermsZod,
  negation: TermsZod,
  emotionalSharing: TermsZod,
  bodyAwareness: TermsZod,
  presentMoment: TermsZod,
  pattern: TermsZod,
  permission: TermsZod,
  problemWords: TermsZod,
  riskLevels: z.object({
    immediate_danger: TermsZod,
    high_risk: TermsZod,
    moderate_risk: TermsZod,
  }),
  uncertaintyTopics: z.object({
    feelings: TermsZod,
    goal: TermsZod,
    body: TermsZod,
  }),
  engagement: z.object({
    confirmation: TermsZod,
    /** Whole replies that signal pulling back. */
    disengaged: TermsZod,
  }),
  safetyReply: z.object({
    safe: TermsZod,
    unsafe: TermsZod,
  }),
  checkpoint: z.object({
    calm: TermsZod,
    tense: TermsZod,
    neutral: TermsZod,
    negators: TermsZod,
    physiological: z.record(z.string(), TermsZod),
  }),
});

export type Lexicons = z.infer<typeof LexiconsZod>;
export type CheckpointVocabulary = Lexicons["checkpoint"];

const DEFAULT_LEXICONS_PATH = fileURLToPath(new URL("../../config/lexicons.json", import.meta.url));
const lexiconCache = new Map<string, Lexicons>();

/** Loaded once per path; later edits to the file need a restart. */
export function loadLexicons(filePath: string = DEFAULT_LEXICONS_PATH): Lexicons {
  const cached = lexiconCache.get(filePath);
  if (cached) return cached;
  const parsed = LexiconsZod.parse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
  lexiconCache.set(filePath, parsed);
  return parsed;
}

const patternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function termPattern(term: string): RegExp {
  const key = normalizeForMatching(term);
  const cached = patternCache.get(key);
  if (cached) return cached;
  const body = key.split(" ").map(escapeRegExp).join("\\s+");
  const re = new RegExp(`(?<![a-z0-9'])${body}(?![a-z0-9'])`);
  patternCache.set(key, re);
  return re;
}

/**
 * Whole-word (or whole-phrase) membership test. "no" does not match "know" or "nothing",
 * and "that" does not match inside "that's".
 */
export function containsTerm(text: string, term: string): boolean {
  return termPattern(term).test(normalizeForMatching(text));
}

export function findTerms(text: string, terms: readonly string[]): string[] {
  const normalized = normalizeForMatching(text);
  if (!normalized) return [];
  return terms.filter((term) => termPattern(term).test(normalized));
}

export function hasAnyTerm(text: string, terms: readonly string[]): boolean {
  const normalized = normalizeForMatching(text);
  if (!normalized) return false;
  return terms.some((term) => termPattern(term).test(normalized));
}

/**
 * Like `hasAnyTerm`, but a match directly preceded (within `window` words) by one of the
 * negators does not count: "not calm at all" has no calm term, "calmer, not tense" has one.
 */
export function hasUnnegatedTerm(
  text: string,
  terms: readonly string[],
  negators: readonly string[],
  window = 2
): boolean {
  const normalized = normalizeForMatching(text);
  if (!normalized) return false;
  const negatorSet = new Set(negators.map(normalizeForMatching));
  for (const term of terms) {
    const re = new RegExp(termPattern(term).source, "g");
    for (const match of normalized.matchAll(re)) {
      const before = normalized.slice(0, match.index).split(/[^a-z0-9']+/).filter(Boolean).slice(-window);
      if (!before.some((word) => negatorSet.has(word))) return true;
    }
  }
  return false;
}

/** Family a topic term belongs to ("stressed" → "stress"); ungrouped terms are their own family. */
export function topicFamily(term: string, groups: Record<string, readonly string[]>): string {
  const key = normalizeForMatching(term);
  for (const [family, members] of Object.entries(groups)) {
    if (family === key || members.includes(key)) return family;
  }
  return key;
}

export function firstTerm(text: string, terms: readonly string[]): string {
  return findTerms(text, terms)[0] ?? "";
}
