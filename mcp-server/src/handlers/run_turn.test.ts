import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import {
  neutralClassification,
  type ClassifiedInput,
  type ExampleRetriever,
  type RetrievedExample,
  type TextSignalClassifier,
} from "../contracts/collaborators.js";
import { ResponseComposer, loadPhrasebook } from "../compose/composer.js";
import { NavigationEngine } from "../core/engine.js";
import { ClassificationUnavailableError, PersistenceUnavailableError } from "../core/errors.js";
import type { SessionState } from "../core/state.js";
import { KeywordExampleRetriever } from "../retrieval/examples.js";
import { InMemorySessionStore, type SessionStore } from "../store/session_store.js";
import { SessionService, type SessionServiceDeps } from "./run_turn.js";

const NOW = new Date("2026-03-02T09:00:00.000Z");

function service(overrides: Partial<SessionServiceDeps> = {}): SessionService {
  return new SessionService({
    engine: new NavigationEngine({ now: () => NOW }),
    composer: new ResponseComposer(),
    store: new InMemorySessionStore(),
    classifier: null,
    retriever: new KeywordExampleRetriever(),
    newSessionId: () => "s-fixed",
    now: () => NOW,
    ...overrides,
  });
}

class OfflineClassifier implements TextSignalClassifier {
  classify(): ClassifiedInput {
    throw new ClassificationUnavailableError("signals file missing");
  }
}

class BuggyClassifier implements TextSignalClassifier {
  classify(): ClassifiedInput {
    throw new TypeError("cannot read properties of undefined");
  }
}

class BrokenRetriever implements ExampleRetriever {
  retrieveExamples(): RetrievedExample[] {
    throw new Error("example index offline");
  }
}

class CrisisClassifier implements TextSignalClassifier {
  classify(rawText: string): ClassifiedInput {
    const base = neutralClassification(rawText);
    return { ...base, inputCategory: "crisis", safetyFlags: { ...base.safetyFlags, crisis: true } };
  }
}

/** Saves succeed until `failSaves` is flipped. */
class FlakyStore implements SessionStore {
  failSaves = false;
  private readonly inner = new InMemorySessionStore();

  async saveSession(state: SessionState): Promise<void> {
    if (this.failSaves) throw new PersistenceUnavailableError("disk full");
    await this.inner.saveSession(state);
  }
  loadSession(sessionId: string): Promise<SessionState | null> {
    return this.inner.loadSession(sessionId);
  }
  deleteSession(sessionId: string): Promise<boolean> {
    return this.inner.deleteSession(sessionId);
  }
  listSessions(): Promise<string[]> {
    return this.inner.listSessions();
  }
}

test("startSession: creates the session and returns the opening text", async () => {
  const store = new InMemorySessionStore();
  const svc = service({ store });
  const started = await svc.startSession({});
  assert.equal(started.ok, true);
  if (!started.ok) return;
  assert.equal(started.session_id, "s-fixed");
  assert.equal(started.text, loadPhrasebook().opening);
  assert.equal(started.progress.substate, "goal_and_vision");
  assert.deepEqual(await store.listSessions(), ["s-fixed"]);
});

test("startSession: an id already in use is refused", async () => {
  const svc = service();
  await svc.startSession({ session_id: "s-twice" });
  const again = await svc.startSession({ session_id: "s-twice" });
  assert.deepEqual(again, {
    ok: false,
    error: { type: "session_exists", message: "session s-twice already exists", retry_action: "none" },
  });
});

test("runTurn: unknown session asks the caller to start one", async () => {
  const result = await service().runTurn({ session_id: "nope", user_text: "hello" });
  assert.deepEqual(result, {
    ok: false,
    error: { type: "session_not_found", message: "no session nope", retry_action: "start_session" },
  });
});

test("runTurn: malformed arguments come back as invalid_input", async () => {
  const result = await service().runTurn({ session_id: "s-fixed" });
  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.error.type, "invalid_input");
  assert.match(result.error.message, /^user_text: /);
});

test("runTurn: decides, composes, records and saves the turn", async () => {
  const store = new InMemorySessionStore();
  const svc = service({ store });
  await svc.startSession({});

  const result = await svc.runTurn({ session_id: "s-fixed", user_text: "I want to feel calm", example_limit: 2 });
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.decision.decision, "buildVision");
  assert.ok(result.text.startsWith("Imagine feeling calm."));
  assert.ok(result.examples.length <= 2);
  assert.equal(result.progress.turns, 1);

  const saved = await store.loadSession("s-fixed");
  assert.equal(saved?.conversationHistory.length, 1);
  assert.equal(saved?.conversationHistory[0]?.output, result.text);
  assert.equal(saved?.lastDecision, "buildVision");
});

test("runTurn: a classifier outage falls back to neutral signals", async () => {
  const svc = service({ classifier: new OfflineClassifier() });
  await svc.startSession({});
  const result = await svc.runTurn({ session_id: "s-fixed", user_text: "I want to feel calm" });
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.decision.decision, "buildVision");
});

test("runTurn: an unexpected classifier error also falls back to neutral signals", async () => {
  const svc = service({ classifier: new BuggyClassifier() });
  await svc.startSession({});
  const result = await svc.runTurn({ session_id: "s-fixed", user_text: "I want to feel calm" });
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.decision.decision, "buildVision");
});

test("runTurn: a retriever failure returns no examples and saves the turn once", async () => {
  const store = new InMemorySessionStore();
  const svc = service({ store, retriever: new BrokenRetriever() });
  await svc.startSession({});

  const result = await svc.runTurn({ session_id: "s-fixed", user_text: "I want to feel calm" });
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.deepEqual(result.examples, []);
  assert.equal(result.decision.decision, "buildVision");
  const saved = await store.loadSession("s-fixed");
  assert.equal(saved?.conversationHistory.length, 1);
});

test("runTurn: classifier crisis flag reaches the engine", async () => {
  const svc = service({ classifier: new CrisisClassifier() });
  await svc.startSession({});
  const result = await svc.runTurn({ session_id: "s-fixed", user_text: "I can't go on" });
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.decision.decision, "safetyEscalation");
  assert.equal(result.decision.ruleId, "safety");
});

test("runTurn: a failed save keeps the previous state and asks for a retry", async () => {
  const store = new FlakyStore();
  const svc = service({ store });
  await svc.startSession({});
  store.failSaves = true;

  const result = await svc.runTurn({ session_id: "s-fixed", user_text: "I want to feel calm" });
  assert.deepEqual(result, {
    ok: false,
    error: { type: "persistence_unavailable", message: "disk full", retry_action: "retry_same_action" },
  });
  const saved = await store.loadSession("s-fixed");
  assert.equal(saved?.conversationHistory.length, 0);
});

test("runTurn: concurrent turns of one session run in order", async () => {
  const svc = service();
  await svc.startSession({});
  const [first, second] = await Promise.all([
    svc.runTurn({ session_id: "s-fixed", user_text: "I want to feel calm" }),
    svc.runTurn({ session_id: "s-fixed", user_text: "yes that's right" }),
  ]);
  assert.equal(first.ok && first.decision.decision, "buildVision");
  assert.equal(second.ok && second.decision.decision, "providePsychoEducation");
  assert.equal(second.ok && second.state.conversationHistory.length, 2);
});

test("getSessionStatus: reports progress without changing the session", async () => {
  const svc = service();
  await svc.startSession({});
  await svc.runTurn({ session_id: "s-fixed", user_text: "I want to feel calm" });

  const status = await svc.getSessionStatus({ session_id: "s-fixed" });
  assert.equal(status.ok, true);
  if (!status.ok) return;
  assert.equal(status.last_decision, "buildVision");
  assert.equal(status.progress.turns, 1);
  assert.deepEqual(status.progress.completedCriteria, ["goalStated", "visionPresented"]);
});

test("endSession: closes the turn log and removes the session", async () => {
  const logDir = fs.mkdtempSync(path.join(os.tmpdir(), "service-log-"));
  const store = new InMemorySessionStore();
  const svc = service({ store, turnLog: { enabled: true, logDir } });
  await svc.startSession({});
  await svc.runTurn({ session_id: "s-fixed", user_text: "I want to feel calm" });

  const ended = await svc.endSession({ session_id: "s-fixed" });
  assert.equal(ended.ok, true);
  if (!ended.ok) return;
  assert.equal(ended.turn_log_file, path.join(logDir, "session-2026-03-02-090000-s-fixed.md"));
  const markdown = fs.readFileSync(path.join(logDir, "session-2026-03-02-090000-s-fixed.md"), "utf-8");
  assert.match(markdown, /\| turn-1 \| goal_and_vision \| buildVision \| build_vision \|/);
  assert.match(markdown, /- ended_at: 2026-03-02T09:00:00.000Z/);
  assert.equal(await store.loadSession("s-fixed"), null);
});
