import fs from "node:fs";
import path from "node:path";
import { isLocalDev } from "../core/config.js";
import { PersistenceUnavailableError, errorMessage } from "../core/errors.js";
import { migrateSessionState, type SessionState } from "../core/state.js";

export interface SessionStore {
  saveSession(state: SessionState): Promise<void>;
  loadSession(sessionId: string): Promise<SessionState | null>;
  deleteSession(sessionId: string): Promise<boolean>;
  listSessions(): Promise<string[]>;
}

type Clock = () => number;

type MemoryEntry = {
  state: SessionState;
  expiresAt: number;
};

/**
 * Process-local store. Entries expire `ttlSeconds` after their last save. Expired entries are
 * dropped when read and swept on every save.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly ttlMs: number;
  private readonly now: Clock;

  constructor(options: { ttlSeconds?: number; now?: Clock } = {}) {
    this.ttlMs = Math.max(1, options.ttlSeconds ?? 86400) * 1000;
    this.now = options.now ?? Date.now;
  }

  /** Entries held, expired ones not yet swept included. */
  get size(): number {
    return this.entries.size;
  }

  async saveSession(state: SessionState): Promise<void> {
    this.sweepExpired();
    this.entries.set(state.sessionId, {
      state: structuredClone(state),
      expiresAt: this.now() + this.ttlMs,
    });
  }

  async loadSession(sessionId: string): Promise<SessionState | null> {
    const entry = this.liveEntry(sessionId);
    return entry ? structuredClone(entry.state) : null;
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.entries.delete(sessionId);
  }

  async listSessions(): Promise<string[]> {
    return [...this.entries.keys()].filter((id) => this.liveEntry(id) !== null).sort();
  }

  private liveEntry(sessionId: string): MemoryEntry | null {
    const entry = this.entries.get(sessionId);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(sessionId);
      if (isLocalDev()) console.log("[session_store] expired", { sessionId });
      return null;
    }
    return entry;
  }

  private sweepExpired(): void {
    const now = this.now();
    for (const [sessionId, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(sessionId);
    }
  }
}

/** base64url keeps distinct ids distinct on disk ("client.a" and "client_a" included). */
export function sessionFileName(sessionId: string): string {
  return `${Buffer.from(sessionId, "utf-8").toString("base64url")}.json`;
}

function sessionIdFromFileName(name: string): string {
  return Buffer.from(name.slice(0, -".json".length), "base64url").toString("utf-8");
}

/** One JSON file per session. Older state versions are migrated on load. */
export class FileSessionStore implements SessionStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = path.isAbsolute(dir) ? dir : path.resolve(process.cwd(), dir);
  }

  private filePath(sessionId: string): string {
    return path.join(this.dir, sessionFileName(sessionId));
  }

  async saveSession(state: SessionState): Promise<void> {
    const target = this.filePath(state.sessionId);
    const tmp = `${target}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(this.dir, { recursive: true });
      await fs.promises.writeFile(tmp, JSON.stringify(state, null, 2), "utf-8");
      await fs.promises.rename(tmp, target);
    } catch (err) {
      console.error("[session_store] save failed", { sessionId: state.sessionId, error: errorMessage(err) });
      throw new PersistenceUnavailableError(`could not save session ${state.sessionId}`, { cause: err });
    }
  }

  async loadSession(sessionId: string): Promise<SessionState | null> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath(sessionId), "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      console.error("[session_store] load failed", { sessionId, error: errorMessage(err) });
      throw new PersistenceUnavailableError(`could not load session ${sessionId}`, { cause: err });
    }
    let state: SessionState;
    try {
      state = migrateSessionState(JSON.parse(raw));
    } catch (err) {
      console.error("[session_store] unreadable session file", { sessionId, error: errorMessage(err) });
      throw new PersistenceUnavailableError(`session ${sessionId} is unreadable`, { cause: err });
    }
    if (state.sessionId !== sessionId) {
      console.error("[session_store] session file holds another session", { sessionId, found: state.sessionId });
      throw new PersistenceUnavailableError(`session file for ${sessionId} holds session ${state.sessionId}`);
    }
    return state;
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    try {
      await fs.promises.unlink(this.filePath(sessionId));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new PersistenceUnavailableError(`could not delete session ${sessionId}`, { cause: err });
    }
  }

  async listSessions(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new PersistenceUnavailableError("could not list sessions", { cause: err });
    }
    return names
      .filter((name) => name.endsWith(".json"))
      .map(sessionIdFromFileName)
      .sort();
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function createSessionStore(kind: "memory" | "file", options: { dir: string; ttlSeconds: number }): SessionStore {
  if (kind === "file") return new FileSessionStore(options.dir);
  return new InMemorySessionStore({ ttlSeconds: options.ttlSeconds });
}
