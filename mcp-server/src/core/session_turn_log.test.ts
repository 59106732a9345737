import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import {
  appendSessionTurnLog,
  closeSessionTurnLog,
  __parseSessionLogDataForTests,
  type SessionTurnLogEntry,
} from "./session_turn_log.js";

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "turn-log-"));
}

function entry(overrides: Partial<SessionTurnLogEntry> = {}): SessionTurnLogEntry {
  return {
    turn_id: "turn-1",
    timestamp: "2026-03-02T09:15:01.000Z",
    substate: "goal_and_vision",
    decision: "buildVision",
    rule_id: "goal_detected",
    model: "-",
    fallback_used: false,
    usage: { input_tokens: null, output_tokens: null, total_tokens: null, provider_available: false },
    ...overrides,
  };
}

test("turn log file is named from the start time and session id", () => {
  const dir = tempDir();
  const result = appendSessionTurnLog({
    sessionId: "sess/abc",
    sessionStartedAt: "2026-03-02T09:15:00.000Z",
    logDir: dir,
    turn: entry(),
  });
  assert.equal(result.filePath, path.join(dir, "session-2026-03-02-091500-sess-abc.md"));
  assert.equal(result.duplicate, false);
});

test("turn log groups turns by substate and sums known usage", () => {
  const dir = tempDir();
  const startedAt = "2026-03-02T09:15:00.000Z";
  appendSessionTurnLog({
    sessionId: "session-sum",
    sessionStartedAt: startedAt,
    logDir: dir,
    turn: entry({
      turn_id: "turn-1",
      fallback_used: true,
      model: "gpt-4o-mini",
      substate: "problem_and_body",
      decision: "bodyLocationInquiry",
      rule_id: "generative",
      usage: { input_tokens: 120, output_tokens: 30, total_tokens: 150, provider_available: true },
    }),
  });
  const second = appendSessionTurnLog({
    sessionId: "session-sum",
    sessionStartedAt: startedAt,
    logDir: dir,
    turn: entry({
      turn_id: "turn-2",
      timestamp: "2026-03-02T09:16:00.000Z",
      fallback_used: true,
      model: "gpt-4o-mini",
      substate: "problem_and_body",
      decision: "sensationQualityInquiry",
      rule_id: "generative",
      usage: { input_tokens: 80, output_tokens: 20, total_tokens: 100, provider_available: true },
    }),
  });

  const markdown = fs.readFileSync(second.filePath, "utf-8");
  assert.match(markdown, /\| problem_and_body \| 2 \| 2 \| 200 \| 50 \| 250 \|/);
  assert.match(markdown, /- turns: 2/);
  assert.match(markdown, /- fallbacks: 2/);
  assert.match(markdown, /- total_tokens: 250/);
  assert.equal(__parseSessionLogDataForTests(second.filePath)?.turns.length, 2);
});

test("turn log ignores a repeated turn id", () => {
  const dir = tempDir();
  const first = appendSessionTurnLog({
    sessionId: "session-dup",
    sessionStartedAt: "2026-03-02T10:00:00.000Z",
    logDir: dir,
    turn: entry({ turn_id: "same" }),
  });
  const second = appendSessionTurnLog({
    sessionId: "session-dup",
    sessionStartedAt: "2026-03-02T10:00:00.000Z",
    filePath: first.filePath,
    turn: entry({ turn_id: "same", decision: "clarifyGoal" }),
  });
  assert.equal(second.duplicate, true);
  const parsed = __parseSessionLogDataForTests(first.filePath);
  assert.equal(parsed?.turns.length, 1);
  assert.equal(parsed?.turns[0]?.decision, "buildVision");
});

test("turn log reports unknown totals when usage is missing", () => {
  const dir = tempDir();
  const result = appendSessionTurnLog({
    sessionId: "session-unknown",
    sessionStartedAt: "2026-03-02T11:00:00.000Z",
    logDir: dir,
    turn: entry(),
  });
  const markdown = fs.readFileSync(result.filePath, "utf-8");
  assert.match(markdown, /\| goal_and_vision \| 1 \| 0 \| unknown \| unknown \| unknown \|/);
  assert.match(markdown, /- total_tokens: unknown/);
});

test("closing a turn log stamps ended_at and keeps the turns", () => {
  const dir = tempDir();
  const startedAt = "2026-03-02T12:00:00.000Z";
  appendSessionTurnLog({ sessionId: "session-end", sessionStartedAt: startedAt, logDir: dir, turn: entry() });
  const closed = closeSessionTurnLog({
    sessionId: "session-end",
    sessionStartedAt: startedAt,
    endedAt: "2026-03-02T12:30:00.000Z",
    logDir: dir,
  });
  assert.ok(closed);
  const markdown = fs.readFileSync(closed, "utf-8");
  assert.match(markdown, /- ended_at: 2026-03-02T12:30:00.000Z/);
  assert.equal(__parseSessionLogDataForTests(closed)?.turns.length, 1);
});

test("closing a session that never logged returns null", () => {
  const dir = tempDir();
  assert.equal(
    closeSessionTurnLog({ sessionId: "nobody", sessionStartedAt: "2026-03-02T12:00:00.000Z", logDir: dir }),
    null
  );
});
