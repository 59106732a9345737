import {
  neutralClassification,
  type ClassifiedInput,
  type DecisionGenerator,
  type PromptContext,
  type TokenUsage,
} from "../contracts/collaborators.js";
import {
  DECISION_PROFILES,
  GeneratedDecisionFieldsZod,
  NavigationDecisionZod,
  bodyQuestionCategory,
  isDecisionKind,
  type AnswerKind,
  type DecisionKind,
  type NavigationDecision,
} from "../contracts/decisions.js";
import { stageForSubstate, successorOf } from "../contracts/substates.js";
import type { TransitionEvent } from "../contracts/transitions.js";
import { classifyAnswerKind } from "./answer_kind.js";
import { DEFAULT_CHECKPOINT_STEPS, type CheckpointStep } from "./checkpoint.js";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "./config.js";
import { detectCriteria, missingRequirements } from "./criteria.js";
import { allowedGenerativeDecisions, canonicalDecision } from "./defaults.js";
import { assessEngagement } from "./engagement.js";
import { MalformedGenerativeResponseError, errorMessage, isEngineError, type EngineErrorKind } from "./errors.js";
import { recentExchanges, recordQuestions } from "./history.js";
import { findTerms, hasAnyTerm, loadLexicons, topicFamily, type Lexicons } from "./lexicons.js";
import {
  RULE_LADDER,
  SAFETY_RULE,
  closeBodyCycle,
  firstMatchingRule,
  forceTransition,
  isAwaitingSafetyReply,
  type RuleAction,
  type TurnContext,
} from "./rules.js";
import {
  BODY_QUESTION_CAP,
  BODY_ENQUIRY_CYCLE_CAP,
  SessionStateZod,
  getDefaultBodyCycle,
  mergeCompletion,
  type SessionState,
} from "./state.js";
import { normalizeForMatching, wordCount } from "./text.js";

export type EngineDependencies = {
  generator?: DecisionGenerator | null;
  lexicons?: Lexicons;
  config?: EngineConfig;
  checkpointSteps?: readonly CheckpointStep[];
  now?: () => Date;
};

export type GenerativeFailure = EngineErrorKind | "rejected" | "disabled";

export type GenerativeMeta = {
  attempted: boolean;
  model: string;
  usage: TokenUsage | null;
  failure: GenerativeFailure | "";
  message: string;
};

export type DecideMeta = {
  turn: number;
  answerKind: AnswerKind;
  ruleId: string;
  events: TransitionEvent[];
  generative: GenerativeMeta;
};

export type DecideResult = {
  decision: NavigationDecision;
  state: SessionState;
  meta: DecideMeta;
};

type Selection = {
  action: RuleAction;
  ruleId: string;
  ruleOverrideApplied: boolean;
  fallbackUsed: boolean;
  situationType?: string;
  retrievalTag?: string;
};

type GenerativeOutcome =
  | { ok: true; kind: DecisionKind; situationType: string; retrievalTag: string; reasoning: string }
  | { ok: false; failure: GenerativeFailure; message: string };

/**
 * Owns every mutation of a session: `decide` for the navigation step of a turn and
 * `recordExchange` once the reply text exists. Neither mutates its input.
 */
export class NavigationEngine {
  private readonly generator: DecisionGenerator | null;
  private readonly lexicons: Lexicons;
  private readonly config: EngineConfig;
  private readonly checkpointSteps: readonly CheckpointStep[];
  private readonly now: () => Date;

  constructor(deps: EngineDependencies = {}) {
    this.generator = deps.generator ?? null;
    this.lexicons = deps.lexicons ?? loadLexicons();
    this.config = deps.config ?? DEFAULT_ENGINE_CONFIG;
    this.checkpointSteps = deps.checkpointSteps ?? DEFAULT_CHECKPOINT_STEPS;
    this.now = deps.now ?? (() => new Date());
  }

  async decide(input: string, classified: ClassifiedInput | null, session: SessionState): Promise<DecideResult> {
    const signals = classified ?? neutralClassification(input);
    const draft = structuredClone(session);
    const turn = draft.conversationHistory.length + 1;
    const text = normalizeForMatching(signals.correctedText || input);
    const answerKind = classifyAnswerKind(text, this.lexicons);
    const events: TransitionEvent[] = [];

    this.startCycleInPlace(draft, answerKind, text, events);
    const newBodyDetail = this.captureBodyDetail(draft, text);

    const detected = detectCriteria({
      text,
      substate: draft.substate,
      answerKind,
      completion: draft.completion,
      history: draft.conversationHistory,
      turn,
      bodyCycle: draft.bodyCycle,
      lexicons: this.lexicons,
      config: this.config,
    });
    // Crisis turns and replies to a safety question say nothing about the session's criteria.
    if (!signals.safetyFlags.crisis && !isAwaitingSafetyReply(draft)) {
      draft.completion = mergeCompletion(draft.completion, detected.completion);
      for (const met of detected.met) events.push({ type: "CRITERION_MET", ...met });
    }
    draft.lastAnswerKind = answerKind;
    const engagement = assessEngagement(draft.engagement, text, answerKind, turn, this.lexicons);
    draft.engagement = engagement.engagement;

    const groups = this.lexicons.topicGroups;
    const topicFamilies = [
      ...new Set(findTerms(text, [...this.lexicons.stressor, ...this.lexicons.emotion]).map((t) => topicFamily(t, groups))),
    ];
    const coveredFamilies = new Set(draft.coveredTopics.map((t) => topicFamily(t, groups)));
    const ctx: TurnContext = {
      draft,
      input,
      text,
      classified: signals,
      answerKind,
      turn,
      newBodyDetail,
      newTopics: topicFamilies.filter((t) => !coveredFamilies.has(t)),
      engagement,
      lexicons: this.lexicons,
      config: this.config,
      checkpointSteps: this.checkpointSteps,
      events,
    };

    const generative: GenerativeMeta = { attempted: false, model: "", usage: null, failure: "", message: "" };
    let selection: Selection | null = null;

    if (SAFETY_RULE.applies(ctx)) {
      selection = { action: SAFETY_RULE.act(ctx), ruleId: SAFETY_RULE.id, ruleOverrideApplied: true, fallbackUsed: false };
    } else {
      this.advanceWhileSatisfied(draft, events);
      const rule = firstMatchingRule(RULE_LADDER, ctx);
      if (rule) {
        selection = { action: rule.act(ctx), ruleId: rule.id, ruleOverrideApplied: true, fallbackUsed: false };
      }
    }

    if (!selection) {
      const outcome = await this.generate(draft, text, generative);
      if (outcome.ok) {
        selection = {
          action: { decision: outcome.kind, reasoning: outcome.reasoning || "Generated next step." },
          ruleId: "generative",
          ruleOverrideApplied: false,
          fallbackUsed: false,
          situationType: outcome.situationType,
          retrievalTag: outcome.retrievalTag,
        };
      } else {
        generative.failure = outcome.failure;
        generative.message = outcome.message;
        if (outcome.failure !== "disabled") {
          console.warn("[decide] generative fallback", {
            session_id: draft.sessionId,
            substate: draft.substate,
            failure: outcome.failure,
            message: outcome.message,
          });
        }
        const kind = canonicalDecision(draft);
        selection = {
          action: { decision: kind, reasoning: `Fallback (${outcome.failure}): canonical next step for ${draft.substate}.` },
          ruleId: "fallback",
          ruleOverrideApplied: false,
          fallbackUsed: true,
        };
      }
    }

    if (selection.action.decision !== "safetyEscalation") {
      selection = this.guardBodyQuestions(ctx, selection);
    }

    for (const family of topicFamilies) {
      if (!coveredFamilies.has(family)) draft.coveredTopics.push(family);
    }
    this.applyDecisionEffects(draft, selection.action.decision, turn);
    draft.stage = stageForSubstate(draft.substate);
    draft.updatedAt = this.now().toISOString();

    const missing = missingRequirements(draft);
    const profile = DECISION_PROFILES[selection.action.decision];
    const decision: NavigationDecision = Object.freeze(
      NavigationDecisionZod.parse({
        decision: selection.action.decision,
        situationType: selection.action.situationType || selection.situationType || profile.situationType,
        retrievalTag: selection.retrievalTag || profile.retrievalTag,
        readyForNext: missing.length === 0,
        blockedBy: missing,
        reasoning: selection.action.reasoning,
        ruleOverrideApplied: selection.ruleOverrideApplied,
        fallbackUsed: selection.fallbackUsed,
        ruleId: selection.ruleId,
        substate: draft.substate,
        affirmFirst: selection.action.affirmFirst ?? false,
        topic: selection.action.topic ?? "",
        riskLevel: selection.action.riskLevel,
        checkpoint: selection.action.checkpoint,
      })
    );

    // Commit: the schema enforces the caps, so a violation throws before anything is returned.
    const state = SessionStateZod.parse(draft);
    return {
      decision,
      state,
      meta: { turn, answerKind, ruleId: selection.ruleId, events, generative },
    };
  }

  /** Appends the exchange and stamps the questions the reply asked. */
  recordExchange(session: SessionState, exchange: { input: string; output: string }): SessionState {
    const draft = structuredClone(session);
    const turn = draft.conversationHistory.length + 1;
    draft.conversationHistory.push({
      turn,
      input: exchange.input,
      output: exchange.output,
      substateAtTime: draft.substate,
      decision: draft.lastDecision,
    });
    draft.askedQuestions = recordQuestions(draft.askedQuestions, exchange.output, turn);
    draft.updatedAt = this.now().toISOString();
    return SessionStateZod.parse(draft);
  }

  /** A substantive answer to "what else?" opens the next cycle without leaving problem_and_body. */
  private startCycleInPlace(draft: SessionState, answerKind: AnswerKind, text: string, events: TransitionEvent[]): void {
    if (draft.substate !== "problem_and_body") return;
    if (draft.lastDecision !== "anythingElseInquiry") return;
    if (answerKind === "nothingMore" || wordCount(text) <= 2) return;
    if (draft.counters.bodyEnquiryCycles >= BODY_ENQUIRY_CYCLE_CAP) return;
    const cycle = draft.counters.bodyEnquiryCycles + 1;
    draft.bodyCycle = getDefaultBodyCycle(cycle);
    events.push({ type: "BODY_CYCLE_STARTED", cycle, via: "anything_else" });
  }

  /** Returns true when the turn captured a location or sensation the active cycle did not have. */
  private captureBodyDetail(draft: SessionState, text: string): boolean {
    let captured = false;
    if (!draft.bodyCycle.locationCaptured && hasAnyTerm(text, this.lexicons.bodyLocation)) {
      draft.bodyCycle.locationCaptured = true;
      captured = true;
    }
    if (!draft.bodyCycle.sensationCaptured && hasAnyTerm(text, this.lexicons.sensationQuality)) {
      draft.bodyCycle.sensationCaptured = true;
      captured = true;
    }
    return captured;
  }

  private advanceWhileSatisfied(draft: SessionState, events: TransitionEvent[]): void {
    for (;;) {
      const from = draft.substate;
      const to = successorOf(from);
      if (!to || missingRequirements(draft).length > 0) return;
      if (from === "problem_and_body") closeBodyCycle(draft);
      draft.substate = to;
      events.push({ type: "SUBSTATE_ADVANCED", from, to });
    }
  }

  private guardBodyQuestions(ctx: TurnContext, selection: Selection): Selection {
    const { draft } = ctx;
    if (draft.substate !== "problem_and_body") return selection;
    const category = bodyQuestionCategory(selection.action.decision);
    if (!category) return selection;
    if (category !== ctx.answerKind) {
      draft.counters.bodyQuestionsAsked = Math.min(BODY_QUESTION_CAP, draft.counters.bodyQuestionsAsked + 1);
    }
    if (draft.counters.bodyQuestionsAsked < BODY_QUESTION_CAP) return selection;
    forceTransition(ctx, "readiness_assessment", "body_question_cap");
    return {
      action: {
        decision: "presentMomentCheck",
        reasoning: `Body question cap (${BODY_QUESTION_CAP}) reached; check the present moment and move to readiness.`,
      },
      ruleId: "body_question_cap",
      ruleOverrideApplied: true,
      fallbackUsed: selection.fallbackUsed,
    };
  }

  private applyDecisionEffects(draft: SessionState, kind: DecisionKind, turn: number): void {
    draft.lastDecision = kind;
    switch (kind) {
      case "buildVision":
        draft.completion.visionPresented = true;
        break;
      case "providePsychoEducation":
        draft.completion.psychoEducationProvided = true;
        break;
      case "exploreProblem":
        draft.counters.problemQuestionTurn = turn;
        break;
      case "presentMomentInquiry":
        draft.bodyCycle.presentMomentAsked = true;
        break;
      case "anythingElseInquiry":
        draft.counters.anythingElseAskedCount += 1;
        draft.bodyCycle.anythingElseAsked = true;
        closeBodyCycle(draft);
        break;
      case "patternInquiry":
        draft.counters.howDoYouKnowAsked = true;
        break;
      case "silenceCheck":
      case "disengagementCheck":
      case "engagementCheck":
        draft.engagement.lastInterventionTurn = turn;
        break;
      case "assessReadiness":
        if (draft.substate === "readiness_assessment") draft.counters.readinessPrompts += 1;
        break;
      default:
        break;
    }
  }

  private async generate(draft: SessionState, text: string, meta: GenerativeMeta): Promise<GenerativeOutcome> {
    if (!this.generator) return { ok: false, failure: "disabled", message: "no decision generator configured" };
    const allowed = allowedGenerativeDecisions(draft);
    const context: PromptContext = {
      stage: stageForSubstate(draft.substate),
      substate: draft.substate,
      completion: structuredClone(draft.completion),
      counters: structuredClone(draft.counters),
      bodyCycle: structuredClone(draft.bodyCycle),
      lastAnswerKind: draft.lastAnswerKind,
      recentExchanges: recentExchanges(draft, this.config.promptHistoryExchanges).map((e) => ({
        turn: e.turn,
        input: e.input,
        output: e.output,
      })),
      allowedDecisions: allowed,
      userText: text,
    };

    meta.attempted = true;
    let fields: unknown;
    try {
      const generated = await this.generator.generateDecision(context);
      meta.model = generated.model;
      meta.usage = generated.usage;
      fields = generated.fields;
    } catch (err) {
      const failure: GenerativeFailure =
        isEngineError(err) && err.kind === "MalformedGenerativeResponse" ? err.kind : "GenerativeCallFailed";
      return { ok: false, failure, message: errorMessage(err) };
    }

    const parsed = GeneratedDecisionFieldsZod.safeParse(fields);
    if (!parsed.success) {
      const err = new MalformedGenerativeResponseError("generated output is not a decision object");
      return { ok: false, failure: err.kind, message: err.message };
    }
    const proposed = String(parsed.data.decision ?? "").trim();
    if (!isDecisionKind(proposed)) {
      const err = new MalformedGenerativeResponseError(`missing or unknown decision "${proposed}"`);
      return { ok: false, failure: err.kind, message: err.message };
    }
    if (!allowed.includes(proposed)) {
      return { ok: false, failure: "rejected", message: `"${proposed}" is not allowed in ${draft.substate}` };
    }
    const profile = DECISION_PROFILES[proposed];
    return {
      ok: true,
      kind: proposed,
      situationType: String(parsed.data.situationType ?? "").trim() || profile.situationType,
      retrievalTag: String(parsed.data.retrievalTag ?? "").trim() || profile.retrievalTag,
      reasoning: String(parsed.data.reasoning ?? "").trim(),
    };
  }
}
