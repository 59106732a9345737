import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  EMOTIONAL_TAGS,
  type ClassifiedInput,
  type EmotionalTag,
  type InputCategory,
  type TextSignalClassifier,
  type UncertaintyTopic,
} from "../contracts/collaborators.js";
import { ClassificationUnavailableError, errorMessage } from "../core/errors.js";
import { findTerms, hasAnyTerm, loadLexicons, type Lexicons } from "../core/lexicons.js";
import { normalizeForMatching } from "../core/text.js";

const TermsZod = z.array(z.string().min(1));

export const SignalsZod = z.object({
  version: z.string(),
  contractions: z.record(z.string(), z.string()),
  corrections: z.record(z.string(), z.string()),
  vocabulary: TermsZod,
  similarityCutoff: z.number().min(0).max(1),
  contextProtected: z.record(z.string(), TermsZod),
  emotionalCategories: z.object({
    negative_high: TermsZod,
    negative_medium: TermsZod,
    negative_low: TermsZod,
    positive: TermsZod,
    neutral: TermsZod,
  }),
  crisis: TermsZod,
  thinkingMode: TermsZod,
  pastTense: TermsZod,
  presentMarkers: TermsZod,
  uncertain: TermsZod,
  goalOpeners: TermsZod,
});

export type Signals = z.infer<typeof SignalsZod>;

const DEFAULT_SIGNALS_PATH = fileURLToPath(new URL("../../config/signals.json", import.meta.url));
const signalsCache = new Map<string, Signals>();

export function loadSignals(filePath: string = DEFAULT_SIGNALS_PATH): Signals {
  const cached = signalsCache.get(filePath);
  if (cached) return cached;
  const parsed = SignalsZod.parse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
  signalsCache.set(filePath, parsed);
  return parsed;
}

/** 2·LCS / (|a| + |b|), in [0, 1]. */
export function similarity(a: string, b: string): number {
  if (!a.length && !b.length) return 1;
  const prev = new Array<number>(b.length + 1).fill(0);
  const curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    for (let j = 0; j <= b.length; j++) prev[j] = curr[j];
  }
  return (2 * prev[b.length]) / (a.length + b.length);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Lowercase, fold repeated punctuation, expand contractions as whole words. */
export function cleanupInput(raw: string, contractions: Record<string, string>): string {
  let text = normalizeForMatching(raw).replace(/\.+/g, ".").replace(/\?+/g, "?").replace(/!+/g, "!");
  for (const [contraction, expansion] of Object.entries(contractions)) {
    const re = new RegExp(`(?<![a-z0-9'])${escapeRegExp(contraction)}(?![a-z0-9'])`, "g");
    text = text.replace(re, expansion);
  }
  return text;
}

type Correction = { from: string; to: string };

const EMOTION_PRIORITY: readonly EmotionalTag[] = ["negative_high", "negative_medium", "negative_low", "positive", "neutral"];
const INTENSITY: Record<EmotionalTag, number> = {
  negative_high: 3,
  negative_medium: 2,
  negative_low: 1,
  positive: 0,
  neutral: 0,
};
const TOPIC_ORDER = ["feelings", "goal", "body"] as const;

/**
 * Lexicon-driven TextSignalClassifier: spelling repair against a small vocabulary, then
 * phrase lookups for the safety flags, emotional tone and input category.
 */
export class LexiconTextClassifier implements TextSignalClassifier {
  private signals: Signals | null;
  private lexicons: Lexicons | null;
  private readonly signalsPath: string | undefined;

  constructor(deps: { signals?: Signals; lexicons?: Lexicons; signalsPath?: string } = {}) {
    this.signals = deps.signals ?? null;
    this.lexicons = deps.lexicons ?? null;
    this.signalsPath = deps.signalsPath;
  }

  classify(rawText: string): ClassifiedInput {
    const { signals, lexicons } = this.resources();
    const cleaned = cleanupInput(rawText, signals.contractions);
    const { text, corrections } = this.correct(cleaned, signals);

    // Flags read both forms so a repaired word cannot hide a phrase ("i thought" -> "i thoughts").
    const either = (terms: readonly string[]) => hasAnyTerm(text, terms) || hasAnyTerm(cleaned, terms);
    const crisis = either(signals.crisis);
    const thinkingMode = either(signals.thinkingMode);
    const pastTense = !either(signals.presentMarkers) && either(signals.pastTense);
    const uncertain = either(signals.uncertain);

    const categories: Record<string, string[]> = {};
    let intensity = 0;
    for (const tag of EMOTIONAL_TAGS) {
      const found = findTerms(text, signals.emotionalCategories[tag]);
      if (!found.length) continue;
      categories[tag] = found;
      intensity = Math.max(intensity, INTENSITY[tag]);
    }
    const primary: EmotionalTag = EMOTION_PRIORITY.find((tag) => categories[tag]) ?? "neutral";

    return {
      originalText: rawText,
      correctedText: text,
      corrections,
      emotionalState: { primary, intensity, categories },
      inputCategory: this.categorize(text, lexicons, signals, { crisis, thinkingMode, pastTense, uncertain }),
      safetyFlags: { crisis, thinkingMode, pastTense, uncertain },
      uncertaintyTopic: uncertain ? this.uncertaintyTopic(text, lexicons) : "general",
    };
  }

  private resources(): { signals: Signals; lexicons: Lexicons } {
    try {
      this.signals ??= loadSignals(this.signalsPath);
      this.lexicons ??= loadLexicons();
      return { signals: this.signals, lexicons: this.lexicons };
    } catch (err) {
      throw new ClassificationUnavailableError(`signal lexicons could not be loaded: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private correct(cleaned: string, signals: Signals): { text: string; corrections: Correction[] } {
    const words = cleaned.split(" ").filter(Boolean);
    const vocabulary = new Set(signals.vocabulary);
    const corrections: Correction[] = [];
    const out = words.map((word, i) => {
      const bare = word.replace(/[^a-z0-9]/g, "");
      if (!bare || word.includes("'")) return word;
      const next = words[i + 1] ?? "";
      const protectedBy = Object.hasOwn(signals.contextProtected, bare) ? signals.contextProtected[bare] : undefined;
      if (protectedBy && protectedBy.some((p) => next.startsWith(p))) return word;

      let replacement = Object.hasOwn(signals.corrections, bare) ? signals.corrections[bare] : undefined;
      if (!replacement && !vocabulary.has(bare) && bare.length > 2) {
        replacement = this.closestWord(bare, signals);
      }
      if (!replacement || replacement === bare) return word;
      corrections.push({ from: bare, to: replacement });
      return word.replace(bare, replacement);
    });
    return { text: out.join(" "), corrections };
  }

  private closestWord(word: string, signals: Signals): string | undefined {
    let best: string | undefined;
    let bestScore = signals.similarityCutoff;
    for (const candidate of signals.vocabulary) {
      const score = similarity(word, candidate);
      if (score >= bestScore && (best === undefined || score > bestScore)) {
        best = candidate;
        bestScore = score;
      }
    }
    return best;
  }

  private categorize(
    text: string,
    lexicons: Lexicons,
    signals: Signals,
    flags: { crisis: boolean; thinkingMode: boolean; pastTense: boolean; uncertain: boolean }
  ): InputCategory {
    if (flags.crisis) return "crisis";
    if (flags.thinkingMode) return "thinking_mode";
    if (flags.pastTense) return "past_focus";
    if (hasAnyTerm(text, signals.goalOpeners) || hasAnyTerm(text, lexicons.goalPhrase)) return "goal_statement";
    if (flags.uncertain) return "confusion";
    if (hasAnyTerm(text, lexicons.emotion)) return "emotional_expression";
    if (hasAnyTerm(text, lexicons.bodyLocation) || hasAnyTerm(text, lexicons.sensationQuality)) {
      return "body_awareness";
    }
    if (hasAnyTerm(text, lexicons.affirmation)) return "affirmation";
    return "general";
  }

  private uncertaintyTopic(text: string, lexicons: Lexicons): UncertaintyTopic {
    return TOPIC_ORDER.find((topic) => hasAnyTerm(text, lexicons.uncertaintyTopics[topic])) ?? "general";
  }
}
