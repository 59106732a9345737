import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { DECISION_KINDS, type DecisionKind, type NavigationDecision } from "../contracts/decisions.js";
import { CHECKPOINT_QUESTION, DEFAULT_CHECKPOINT_STEPS, type CheckpointStep } from "../core/checkpoint.js";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../core/config.js";
import { extractQuestions, lastAskedTurn, wasAskedRecently } from "../core/history.js";
import { firstTerm, loadLexicons, type Lexicons } from "../core/lexicons.js";
import type { SessionState } from "../core/state.js";

const VariantsZod = z.array(z.string().min(1)).min(1);

export const PhrasebookZod = z.object({
  version: z.string(),
  affirmations: VariantsZod,
  topicLead: z.string(),
  opening: z.string().min(1),
  decisions: z.record(z.string(), VariantsZod),
  menus: z.object({ goal: z.string(), feelings: z.string(), body: z.string() }),
  safety: z.object({
    immediate_danger: z.string(),
    high_risk: z.string(),
    moderate_risk: z.string(),
    low_risk: z.string(),
  }),
  safetyFollowUp: z.object({ concern: z.string(), askGoal: z.string(), resume: z.string() }),
  checkpoint: z.object({ intro: z.string(), clarify: z.string() }),
});

export type Phrasebook = z.infer<typeof PhrasebookZod>;

const DEFAULT_PHRASEBOOK_PATH = fileURLToPath(new URL("../../config/phrasebook.json", import.meta.url));
const phrasebookCache = new Map<string, Phrasebook>();

export function loadPhrasebook(filePath: string = DEFAULT_PHRASEBOOK_PATH): Phrasebook {
  const cached = phrasebookCache.get(filePath);
  if (cached) return cached;
  const parsed = PhrasebookZod.parse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
  phrasebookCache.set(filePath, parsed);
  return parsed;
}

/** Kinds whose wording is built from structured parts rather than phrasebook variants. */
export const STRUCTURED_KINDS: readonly DecisionKind[] = [
  "safetyEscalation",
  "safetyFollowUp",
  "acknowledgeSafety",
  "offerOutcomeMenu",
  "startCheckpoint",
  "checkpointStep",
  "normalizeResistance",
  "clarifyCheckpoint",
];

/** Decision kinds that need phrasebook variants but have none. */
export function missingPhrasebookKinds(phrasebook: Phrasebook): DecisionKind[] {
  return DECISION_KINDS.filter((kind) => !STRUCTURED_KINDS.includes(kind) && !phrasebook.decisions[kind]);
}

const TOPIC_LEAD_KINDS: readonly DecisionKind[] = [
  "bodyLocationInquiry",
  "sensationInquiry",
  "presentMomentInquiry",
  "bodyAwarenessInquiry",
  "anythingElseInquiry",
];

export type ComposedReply = {
  text: string;
  /** Normalized questions the text asks, in order. */
  questions: string[];
};

export type ResponseComposerDeps = {
  phrasebook?: Phrasebook;
  lexicons?: Lexicons;
  config?: EngineConfig;
  checkpointSteps?: readonly CheckpointStep[];
};

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole: string, key: string) => values[key] ?? whole);
}

export class ResponseComposer {
  private readonly phrasebook: Phrasebook;
  private readonly lexicons: Lexicons;
  private readonly config: EngineConfig;
  private readonly steps: readonly CheckpointStep[];

  constructor(deps: ResponseComposerDeps = {}) {
    this.phrasebook = deps.phrasebook ?? loadPhrasebook();
    this.lexicons = deps.lexicons ?? loadLexicons();
    this.config = deps.config ?? DEFAULT_ENGINE_CONFIG;
    this.steps = deps.checkpointSteps ?? DEFAULT_CHECKPOINT_STEPS;
  }

  opening(): ComposedReply {
    const text = this.phrasebook.opening;
    return { text, questions: extractQuestions(text) };
  }

  /** Text for `decision`, given the state `decide` returned (before the exchange is recorded). */
  compose(decision: NavigationDecision, state: SessionState): ComposedReply {
    const turn = state.conversationHistory.length + 1;
    const parts: string[] = [];
    if (decision.affirmFirst) {
      parts.push(this.phrasebook.affirmations[turn % this.phrasebook.affirmations.length]);
    }
    if (decision.topic && TOPIC_LEAD_KINDS.includes(decision.decision)) {
      parts.push(fill(this.phrasebook.topicLead, { topic: decision.topic }));
    }
    parts.push(this.body(decision, state, turn));
    const text = parts.filter(Boolean).join(" ");
    return { text, questions: extractQuestions(text) };
  }

  private body(decision: NavigationDecision, state: SessionState, turn: number): string {
    const pb = this.phrasebook;
    switch (decision.decision) {
      case "safetyEscalation":
        return pb.safety[decision.riskLevel ?? "low_risk"];
      case "safetyFollowUp":
        return pb.safetyFollowUp.concern;
      case "acknowledgeSafety":
        return state.completion.goalStated ? pb.safetyFollowUp.resume : pb.safetyFollowUp.askGoal;
      case "offerOutcomeMenu": {
        const topic = decision.topic === "feelings" || decision.topic === "body" ? decision.topic : "goal";
        return pb.menus[topic];
      }
      case "startCheckpoint":
        return `${pb.checkpoint.intro} ${this.step(decision).instruction} ${CHECKPOINT_QUESTION}`;
      case "checkpointStep":
        return `${this.step(decision).instruction} ${CHECKPOINT_QUESTION}`;
      case "normalizeResistance":
        return `${this.step(decision).normalization} ${CHECKPOINT_QUESTION}`;
      case "clarifyCheckpoint":
        return fill(pb.checkpoint.clarify, { action: this.step(decision).action });
      case "repeatCheckpoint":
        return `${this.pickVariant("repeatCheckpoint", state, turn)} ${CHECKPOINT_QUESTION}`;
      default:
        return this.pickVariant(decision.decision, state, turn);
    }
  }

  private step(decision: NavigationDecision): CheckpointStep {
    const id = decision.checkpoint?.stepId;
    return this.steps.find((s) => s.id === id) ?? this.steps[0];
  }

  /**
   * First variant none of whose questions was asked within the no-repeat window. When every
   * variant repeats, the one whose questions were asked longest ago.
   */
  private pickVariant(kind: DecisionKind, state: SessionState, turn: number): string {
    const variants = this.phrasebook.decisions[kind] ?? this.phrasebook.decisions.generalInquiry ?? [];
    const values = {
      goalState: firstTerm(state.completion.goalContent, this.lexicons.goalState) || "at ease",
      emotion: state.completion.emotionContent || "that",
    };
    const filled = variants.map((v) => fill(v, values));
    if (!filled.length) return "";

    const window = this.config.noRepeatWindowTurns;
    const fresh = filled.find((text) =>
      extractQuestions(text).every((q) => !wasAskedRecently(state.askedQuestions, q, turn, window))
    );
    if (fresh) return fresh;

    let best = filled[0];
    let bestTurn = Number.POSITIVE_INFINITY;
    for (const text of filled) {
      const asked = Math.max(0, ...extractQuestions(text).map((q) => lastAskedTurn(state.askedQuestions, q)));
      if (asked < bestTurn) {
        best = text;
        bestTurn = asked;
      }
    }
    return best;
  }
}
