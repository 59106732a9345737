import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  neutralClassification,
  type ClassifiedInput,
  type ExampleRetriever,
  type RetrievedExample,
  type TextSignalClassifier,
  type TokenUsage,
} from "../contracts/collaborators.js";
import type { NavigationDecision } from "../contracts/decisions.js";
import type { ResponseComposer } from "../compose/composer.js";
import { isLocalDev } from "../core/config.js";
import type { NavigationEngine } from "../core/engine.js";
import { errorMessage, isEngineError } from "../core/errors.js";
import { appendSessionTurnLog, closeSessionTurnLog } from "../core/session_turn_log.js";
import { createSessionState, summarizeProgress, type ProgressSummary, type SessionState } from "../core/state.js";
import type { SessionStore } from "../store/session_store.js";

export const StartSessionArgsZod = z.object({
  session_id: z.string().trim().min(1).max(120).optional(),
  metadata: z.record(z.string(), z.string()).optional(),
});

export const RunTurnArgsZod = z.object({
  session_id: z.string().trim().min(1).max(120),
  user_text: z.string().max(4000),
  example_limit: z.number().int().min(0).max(10).optional(),
});

export const SessionRefArgsZod = z.object({
  session_id: z.string().trim().min(1).max(120),
});

export type StartSessionArgs = z.infer<typeof StartSessionArgsZod>;
export type RunTurnArgs = z.infer<typeof RunTurnArgsZod>;
export type SessionRefArgs = z.infer<typeof SessionRefArgsZod>;

export type RetryAction = "none" | "retry_same_action" | "start_session";

export type ServiceErrorType =
  | "invalid_input"
  | "session_not_found"
  | "session_exists"
  | "persistence_unavailable"
  | "internal_error";

export type ServiceError = {
  ok: false;
  error: { type: ServiceErrorType; message: string; retry_action: RetryAction };
};

export type StartSessionSuccess = {
  ok: true;
  session_id: string;
  text: string;
  state: SessionState;
  progress: ProgressSummary;
};

export type RunTurnSuccess = {
  ok: true;
  session_id: string;
  decision: NavigationDecision;
  text: string;
  examples: RetrievedExample[];
  state: SessionState;
  progress: ProgressSummary;
  debug?: {
    rule_id: string;
    answer_kind: string;
    generative_failure: string;
    classifier_available: boolean;
  };
};

export type SessionStatusSuccess = {
  ok: true;
  session_id: string;
  progress: ProgressSummary;
  last_decision: string;
  updated_at: string;
};

export type EndSessionSuccess = {
  ok: true;
  session_id: string;
  ended: true;
  progress: ProgressSummary;
  turn_log_file: string | null;
};

export type SessionServiceDeps = {
  engine: NavigationEngine;
  composer: ResponseComposer;
  store: SessionStore;
  classifier?: TextSignalClassifier | null;
  retriever?: ExampleRetriever | null;
  turnLog?: { enabled: boolean; logDir?: string };
  defaultExampleLimit?: number;
  newSessionId?: () => string;
  now?: () => Date;
};

function failure(type: ServiceErrorType, message: string, retryAction: RetryAction = "none"): ServiceError {
  return { ok: false, error: { type, message, retry_action: retryAction } };
}

function persistenceFailure(err: unknown): ServiceError | null {
  if (isEngineError(err) && err.kind === "PersistenceUnavailable") {
    return failure("persistence_unavailable", err.message, "retry_same_action");
  }
  return null;
}

function invalidInput(error: z.ZodError): ServiceError {
  const message = error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ");
  return failure("invalid_input", message);
}

/**
 * One request in, one payload out. Nothing here throws to the caller: every failure comes
 * back as `{ ok: false, error }`. Turns of the same session run strictly one after another.
 */
export class SessionService {
  private readonly deps: SessionServiceDeps;
  private readonly queues = new Map<string, Promise<void>>();

  constructor(deps: SessionServiceDeps) {
    this.deps = deps;
  }

  async startSession(rawArgs: unknown): Promise<StartSessionSuccess | ServiceError> {
    const parsed = StartSessionArgsZod.safeParse(rawArgs ?? {});
    if (!parsed.success) return invalidInput(parsed.error);
    const sessionId = parsed.data.session_id || (this.deps.newSessionId ?? randomUUID)();

    return this.serialize(sessionId, async () => {
      try {
        const existing = await this.deps.store.loadSession(sessionId);
        if (existing) return failure("session_exists", `session ${sessionId} already exists`);
        const state = createSessionState(sessionId, this.now(), parsed.data.metadata ?? {});
        await this.deps.store.saveSession(state);
        console.log("[run_turn] session started", { sessionId });
        return {
          ok: true as const,
          session_id: sessionId,
          text: this.deps.composer.opening().text,
          state,
          progress: summarizeProgress(state),
        };
      } catch (err) {
        return this.unexpected("startSession", sessionId, err);
      }
    });
  }

  async runTurn(rawArgs: unknown): Promise<RunTurnSuccess | ServiceError> {
    const parsed = RunTurnArgsZod.safeParse(rawArgs);
    if (!parsed.success) return invalidInput(parsed.error);
    const args = parsed.data;
    return this.serialize(args.session_id, () => this.runTurnSerialized(args));
  }

  async getSessionStatus(rawArgs: unknown): Promise<SessionStatusSuccess | ServiceError> {
    const parsed = SessionRefArgsZod.safeParse(rawArgs);
    if (!parsed.success) return invalidInput(parsed.error);
    const sessionId = parsed.data.session_id;
    try {
      const state = await this.deps.store.loadSession(sessionId);
      if (!state) return failure("session_not_found", `no session ${sessionId}`, "start_session");
      return {
        ok: true,
        session_id: sessionId,
        progress: summarizeProgress(state),
        last_decision: state.lastDecision,
        updated_at: state.updatedAt,
      };
    } catch (err) {
      return this.unexpected("getSessionStatus", sessionId, err);
    }
  }

  async endSession(rawArgs: unknown): Promise<EndSessionSuccess | ServiceError> {
    const parsed = SessionRefArgsZod.safeParse(rawArgs);
    if (!parsed.success) return invalidInput(parsed.error);
    const sessionId = parsed.data.session_id;

    return this.serialize(sessionId, async () => {
      try {
        const state = await this.deps.store.loadSession(sessionId);
        if (!state) return failure("session_not_found", `no session ${sessionId}`, "start_session");
        const turnLogFile = this.closeTurnLog(state);
        await this.deps.store.deleteSession(sessionId);
        console.log("[run_turn] session ended", { sessionId, turns: state.conversationHistory.length });
        return {
          ok: true as const,
          session_id: sessionId,
          ended: true as const,
          progress: summarizeProgress(state),
          turn_log_file: turnLogFile,
        };
      } catch (err) {
        return this.unexpected("endSession", sessionId, err);
      }
    });
  }

  private async runTurnSerialized(args: RunTurnArgs): Promise<RunTurnSuccess | ServiceError> {
    const sessionId = args.session_id;
    try {
      const session = await this.deps.store.loadSession(sessionId);
      if (!session) return failure("session_not_found", `no session ${sessionId}`, "start_session");

      const classified = this.classify(args.user_text);
      const { decision, state: decided, meta } = await this.deps.engine.decide(
        args.user_text,
        classified,
        session
      );
      const reply = this.deps.composer.compose(decision, decided);
      const next = this.deps.engine.recordExchange(decided, { input: args.user_text, output: reply.text });
      const examples = this.retrieve(decision, args.user_text, args.example_limit);

      // The pre-turn state stays authoritative when this save fails.
      await this.deps.store.saveSession(next);

      this.appendTurnLog(next, decision, meta.generative.model, meta.generative.usage);

      if (isLocalDev()) {
        console.log("[run_turn]", {
          sessionId,
          turn: meta.turn,
          substate: next.substate,
          decision: decision.decision,
          ruleId: decision.ruleId,
          fallbackUsed: decision.fallbackUsed,
        });
      }

      const result: RunTurnSuccess = {
        ok: true,
        session_id: sessionId,
        decision,
        text: reply.text,
        examples,
        state: next,
        progress: summarizeProgress(next),
      };
      if (isLocalDev()) {
        result.debug = {
          rule_id: meta.ruleId,
          answer_kind: meta.answerKind,
          generative_failure: meta.generative.failure,
          classifier_available: classified !== null,
        };
      }
      return result;
    } catch (err) {
      return this.unexpected("runTurn", sessionId, err);
    }
  }

  /** Any classifier failure degrades to the neutral reading. */
  private classify(userText: string): ClassifiedInput | null {
    const classifier = this.deps.classifier;
    if (!classifier) return neutralClassification(userText);
    try {
      return classifier.classify(userText);
    } catch (err) {
      if (isEngineError(err) && err.kind === "ClassificationUnavailable") {
        console.warn("[run_turn] classifier unavailable, using neutral signals", { error: err.message });
      } else {
        console.error("[run_turn] classifier failed, using neutral signals", { error: errorMessage(err) });
      }
      return null;
    }
  }

  private retrieve(decision: NavigationDecision, userText: string, requested?: number): RetrievedExample[] {
    const retriever = this.deps.retriever;
    if (!retriever) return [];
    const limit = requested ?? this.deps.defaultExampleLimit ?? 3;
    try {
      return retriever.retrieveExamples(decision, userText, limit);
    } catch (err) {
      console.warn("[run_turn] retrieval failed", { decision: decision.decision, error: errorMessage(err) });
      return [];
    }
  }

  private appendTurnLog(
    state: SessionState,
    decision: NavigationDecision,
    model: string,
    usage: TokenUsage | null
  ): void {
    if (!this.deps.turnLog?.enabled) return;
    try {
      appendSessionTurnLog({
        sessionId: state.sessionId,
        sessionStartedAt: state.createdAt,
        logDir: this.deps.turnLog.logDir,
        turn: {
          turn_id: `turn-${state.conversationHistory.length}`,
          timestamp: this.now().toISOString(),
          substate: decision.substate,
          decision: decision.decision,
          rule_id: decision.ruleId,
          model,
          fallback_used: decision.fallbackUsed,
          usage: usage ?? { input_tokens: null, output_tokens: null, total_tokens: null, provider_available: false },
        },
      });
    } catch (err) {
      console.warn("[session_turn_log_write_failed]", { message: errorMessage(err) });
    }
  }

  private closeTurnLog(state: SessionState): string | null {
    if (!this.deps.turnLog?.enabled) return null;
    try {
      return closeSessionTurnLog({
        sessionId: state.sessionId,
        sessionStartedAt: state.createdAt,
        endedAt: this.now().toISOString(),
        logDir: this.deps.turnLog.logDir,
      });
    } catch (err) {
      console.warn("[session_turn_log_write_failed]", { message: errorMessage(err) });
      return null;
    }
  }

  private unexpected(operation: string, sessionId: string, err: unknown): ServiceError {
    const persistence = persistenceFailure(err);
    if (persistence) {
      console.warn("[run_turn] persistence unavailable", { operation, sessionId, error: errorMessage(err) });
      return persistence;
    }
    console.error("[run_turn] unexpected failure", { operation, sessionId, error: errorMessage(err) });
    return failure("internal_error", errorMessage(err));
  }

  private serialize<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail: Promise<void> = run
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.queues.get(sessionId) === tail) this.queues.delete(sessionId);
      });
    this.queues.set(sessionId, tail);
    return run;
  }

  private now(): Date {
    return (this.deps.now ?? (() => new Date()))();
  }
}
