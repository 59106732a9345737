import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { TokenUsage } from "../contracts/collaborators.js";

export type SessionTurnLogEntry = {
  turn_id: string;
  timestamp: string;
  substate: string;
  decision: string;
  rule_id: string;
  model: string;
  fallback_used: boolean;
  usage: TokenUsage;
};

const TokenZod = z.number().nullable().catch(null);

const SessionTurnLogEntryZod = z.object({
  turn_id: z.string().catch(""),
  timestamp: z.string().catch(""),
  substate: z.string().catch("unknown"),
  decision: z.string().catch("unknown"),
  rule_id: z.string().catch("unknown"),
  model: z.string().catch(""),
  fallback_used: z.boolean().catch(false),
  usage: z
    .object({
      input_tokens: TokenZod,
      output_tokens: TokenZod,
      total_tokens: TokenZod,
      provider_available: z.boolean().catch(false),
    })
    .catch({ input_tokens: null, output_tokens: null, total_tokens: null, provider_available: false }),
});

const SessionLogDataZod = z.object({
  session_id: z.string(),
  started_at: z.string(),
  ended_at: z.string().optional(),
  turns: z.array(SessionTurnLogEntryZod),
});

type SessionLogData = z.infer<typeof SessionLogDataZod>;

export type AppendSessionTurnLogParams = {
  sessionId: string;
  sessionStartedAt: string;
  turn: SessionTurnLogEntry;
  logDir?: string;
  filePath?: string;
};

export type AppendSessionTurnLogResult = {
  filePath: string;
  duplicate: boolean;
};

const DATA_MARKER_PREFIX = "SESSION_LOG_DATA:";

function normalizeToken(value: number | null): number | null {
  if (typeof value !== "number" || !Number.isFinite(value)) return null;
  if (value < 0) return null;
  return Math.round(value);
}

function normalizeTurn(turn: SessionTurnLogEntry): SessionTurnLogEntry {
  return {
    turn_id: String(turn.turn_id || "").trim(),
    timestamp: String(turn.timestamp || "").trim() || new Date().toISOString(),
    substate: String(turn.substate || "").trim() || "unknown",
    decision: String(turn.decision || "").trim() || "unknown",
    rule_id: String(turn.rule_id || "").trim() || "unknown",
    model: String(turn.model || "").trim() || "-",
    fallback_used: Boolean(turn.fallback_used),
    usage: {
      input_tokens: normalizeToken(turn.usage.input_tokens),
      output_tokens: normalizeToken(turn.usage.output_tokens),
      total_tokens: normalizeToken(turn.usage.total_tokens),
      provider_available: Boolean(turn.usage.provider_available),
    },
  };
}

function safeSessionId(sessionId: string): string {
  return (
    String(sessionId || "session")
      .trim()
      .replace(/[^a-zA-Z0-9_-]/g, "-")
      .slice(0, 80) || "session"
  );
}

function toDateParts(iso: string): { yyyyMmDd: string; hhmmss: string } {
  const parsed = new Date(iso);
  const d = Number.isFinite(parsed.getTime()) ? parsed : new Date();
  const yyyy = String(d.getUTCFullYear());
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(d.getUTCDate()).padStart(2, "0");
  const hh = String(d.getUTCHours()).padStart(2, "0");
  const mi = String(d.getUTCMinutes()).padStart(2, "0");
  const ss = String(d.getUTCSeconds()).padStart(2, "0");
  return { yyyyMmDd: `${yyyy}-${mm}-${dd}`, hhmmss: `${hh}${mi}${ss}` };
}

function defaultLogDir(): string {
  const raw = String(process.env.SESSION_LOG_DIR || "").trim();
  if (!raw) return path.resolve(process.cwd(), "session-logs");
  return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
}

export function resolveTurnLogPath(
  sessionId: string,
  startedAt: string,
  explicitPath?: string,
  explicitDir?: string
): string {
  if (explicitPath && String(explicitPath).trim()) return String(explicitPath).trim();
  const logDir = explicitDir && String(explicitDir).trim() ? String(explicitDir).trim() : defaultLogDir();
  const resolvedDir = path.isAbsolute(logDir) ? logDir : path.resolve(process.cwd(), logDir);
  const parts = toDateParts(startedAt);
  const fileName = `session-${parts.yyyyMmDd}-${parts.hhmmss}-${safeSessionId(sessionId)}.md`;
  return path.join(resolvedDir, fileName);
}

function parseDataFromFile(filePath: string): SessionLogData | null {
  if (!fs.existsSync(filePath)) return null;
  const content = fs.readFileSync(filePath, "utf-8");
  const marker = content.match(/<!--\s*SESSION_LOG_DATA:([\s\S]*?)\s*-->/);
  if (!marker || !marker[1]) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(marker[1]);
  } catch (err) {
    console.warn("[session_turn_log] unreadable data marker, starting fresh", {
      filePath,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
  const parsed = SessionLogDataZod.safeParse(raw);
  if (!parsed.success) return null;
  return { ...parsed.data, turns: parsed.data.turns.map((turn) => normalizeTurn(turn)) };
}

function formatToken(value: number | null): string {
  return value === null ? "unknown" : String(value);
}

type Totals = {
  turns: number;
  fallbacks: number;
  input_tokens: number | null;
  output_tokens: number | null;
  total_tokens: number | null;
};

function addToken(sum: number | null, value: number | null, first: boolean): number | null {
  if (value === null) return null;
  if (first) return value;
  return sum === null ? null : sum + value;
}

function aggregate(turns: SessionTurnLogEntry[]): Totals {
  const totals: Totals = { turns: 0, fallbacks: 0, input_tokens: 0, output_tokens: 0, total_tokens: 0 };
  turns.forEach((turn, i) => {
    totals.turns += 1;
    if (turn.fallback_used) totals.fallbacks += 1;
    totals.input_tokens = addToken(totals.input_tokens, turn.usage.input_tokens, i === 0);
    totals.output_tokens = addToken(totals.output_tokens, turn.usage.output_tokens, i === 0);
    totals.total_tokens = addToken(totals.total_tokens, turn.usage.total_tokens, i === 0);
  });
  return totals;
}

function aggregateBySubstate(turns: SessionTurnLogEntry[]): Map<string, Totals> {
  const groups = new Map<string, SessionTurnLogEntry[]>();
  for (const turn of turns) {
    const list = groups.get(turn.substate) ?? [];
    list.push(turn);
    groups.set(turn.substate, list);
  }
  return new Map([...groups.entries()].map(([key, list]) => [key, aggregate(list)]));
}

function renderMarkdown(data: SessionLogData): string {
  const updatedAt = new Date().toISOString();
  const turns = [...data.turns].sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  const bySubstate = aggregateBySubstate(turns);
  const grand = aggregate(turns);

  const turnRows = turns.length
    ? turns
        .map(
          (turn) =>
            `| ${turn.timestamp} | ${turn.turn_id} | ${turn.substate} | ${turn.decision} | ${turn.rule_id} | ${turn.model} | ${
              turn.fallback_used ? "yes" : "no"
            } | ${formatToken(turn.usage.input_tokens)} | ${formatToken(turn.usage.output_tokens)} | ${formatToken(
              turn.usage.total_tokens
            )} |`
        )
        .join("\n")
    : "| - | - | - | - | - | - | - | - | - | - |";

  const substateRows = bySubstate.size
    ? [...bySubstate.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(
          ([substate, t]) =>
            `| ${substate} | ${t.turns} | ${t.fallbacks} | ${formatToken(t.input_tokens)} | ${formatToken(
              t.output_tokens
            )} | ${formatToken(t.total_tokens)} |`
        )
        .join("\n")
    : "| - | 0 | 0 | 0 | 0 | 0 |";

  return [
    `<!-- ${DATA_MARKER_PREFIX}${JSON.stringify(data)} -->`,
    "# Session Turn Report",
    "",
    `- session_id: ${data.session_id}`,
    `- started_at: ${data.started_at}`,
    `- updated_at: ${updatedAt}`,
    ...(data.ended_at ? [`- ended_at: ${data.ended_at}`] : []),
    "",
    "## Turn Log",
    "",
    "| timestamp | turn_id | substate | decision | rule | model | fallback | input_tokens | output_tokens | total_tokens |",
    "| --- | --- | --- | --- | --- | --- | --- | --- | --- | --- |",
    turnRows,
    "",
    "## Substate Summary",
    "",
    "| substate | turns | fallbacks | input_tokens | output_tokens | total_tokens |",
    "| --- | --- | --- | --- | --- | --- |",
    substateRows,
    "",
    "## Totals",
    "",
    `- turns: ${grand.turns}`,
    `- fallbacks: ${grand.fallbacks}`,
    `- input_tokens: ${formatToken(turns.length ? grand.input_tokens : 0)}`,
    `- output_tokens: ${formatToken(turns.length ? grand.output_tokens : 0)}`,
    `- total_tokens: ${formatToken(turns.length ? grand.total_tokens : 0)}`,
    "",
  ].join("\n");
}

export function appendSessionTurnLog(params: AppendSessionTurnLogParams): AppendSessionTurnLogResult {
  const sessionId = String(params.sessionId || "").trim();
  if (!sessionId) {
    throw new Error("appendSessionTurnLog requires sessionId");
  }
  const sessionStartedAt = String(params.sessionStartedAt || "").trim() || new Date().toISOString();
  const normalizedTurn = normalizeTurn(params.turn);
  if (!normalizedTurn.turn_id) {
    throw new Error("appendSessionTurnLog requires turn.turn_id");
  }

  const filePath = resolveTurnLogPath(sessionId, sessionStartedAt, params.filePath, params.logDir);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const existing = parseDataFromFile(filePath);
  const base: SessionLogData =
    existing && existing.session_id === sessionId
      ? existing
      : { session_id: sessionId, started_at: sessionStartedAt, turns: [] };

  const duplicate = base.turns.some((turn) => turn.turn_id === normalizedTurn.turn_id);
  if (!duplicate) base.turns.push(normalizedTurn);

  fs.writeFileSync(filePath, renderMarkdown(base), "utf-8");
  return { filePath, duplicate };
}

/** Stamps `ended_at` on an existing log. Returns null when the session never logged a turn. */
export function closeSessionTurnLog(params: {
  sessionId: string;
  sessionStartedAt: string;
  endedAt?: string;
  logDir?: string;
  filePath?: string;
}): string | null {
  const filePath = resolveTurnLogPath(params.sessionId, params.sessionStartedAt, params.filePath, params.logDir);
  const existing = parseDataFromFile(filePath);
  if (!existing) return null;
  existing.ended_at = params.endedAt ?? new Date().toISOString();
  fs.writeFileSync(filePath, renderMarkdown(existing), "utf-8");
  return filePath;
}

export function __parseSessionLogDataForTests(filePath: string): SessionLogData | null {
  return parseDataFromFile(filePath);
}
