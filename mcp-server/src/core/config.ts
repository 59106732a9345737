import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { errorMessage } from "./errors.js";

type Env = Record<string, string | undefined>;

export function envFlagEnabled(name: string, fallback: boolean, env: Env = process.env): boolean {
  const raw = String(env[name] ?? "").trim().toLowerCase();
  if (!raw) return fallback;
  return !["0", "false", "off", "no"].includes(raw);
}

export function envNumber(name: string, fallback: number, env: Env = process.env): number {
  const raw = Number(env[name]);
  return Number.isFinite(raw) && raw > 0 ? raw : fallback;
}

export function envString(name: string, fallback: string, env: Env = process.env): string {
  const raw = String(env[name] ?? "").trim();
  return raw || fallback;
}

export function isLocalDev(env: Env = process.env): boolean {
  return envFlagEnabled("LOCAL_DEV", false, env);
}

/**
 * Soft limits of the navigation engine. The hard caps on body questions and enquiry
 * cycles live in state.ts and are not configurable.
 */
export const EngineConfigZod = z.object({
  version: z.string().default("v1"),
  noRepeatWindowTurns: z.number().int().min(1).default(5),
  problemEvidenceWindowTurns: z.number().int().min(1).default(5),
  clarifyGoalTurnLimit: z.number().int().min(1).default(3),
  minTurnsForBodyOnlyProblem: z.number().int().min(1).default(4),
  maxReadinessPrompts: z.number().int().min(1).default(3),
  implicitVisionAcceptance: z.boolean().default(true),
  implicitAcceptanceWindowTurns: z.number().int().min(1).default(3),
  implicitAcceptanceMinTurns: z.number().int().min(1).default(2),
  patternMinWords: z.number().int().min(1).default(10),
  promptHistoryExchanges: z.number().int().min(0).default(3),
});

export type EngineConfig = z.infer<typeof EngineConfigZod>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigZod.parse({});

export type EngineConfigLoad = {
  config: EngineConfig;
  loaded: boolean;
  error?: string;
};

type CacheEntry = {
  mtimeMs: number;
  result: EngineConfigLoad;
};

const DEFAULT_CONFIG_PATH = fileURLToPath(new URL("../../config/engine.json", import.meta.url));
const cache = new Map<string, CacheEntry>();

export function loadEngineConfig(configPath?: string): EngineConfigLoad {
  const filePath = String(configPath || process.env.ENGINE_CONFIG_PATH || DEFAULT_CONFIG_PATH).trim();
  let stat: fs.Stats;
  try {
    stat = fs.statSync(filePath);
  } catch {
    return { config: DEFAULT_ENGINE_CONFIG, loaded: false, error: `config not found: ${filePath}` };
  }
  const cached = cache.get(filePath);
  if (cached && cached.mtimeMs === stat.mtimeMs) {
    return cached.result;
  }
  let result: EngineConfigLoad;
  try {
    const parsed = EngineConfigZod.safeParse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
    result = parsed.success
      ? { config: parsed.data, loaded: true }
      : { config: DEFAULT_ENGINE_CONFIG, loaded: false, error: parsed.error.message };
  } catch (err) {
    result = { config: DEFAULT_ENGINE_CONFIG, loaded: false, error: errorMessage(err) || "invalid JSON" };
  }
  if (!result.loaded) {
    console.warn("[engine_config] using defaults", { path: filePath, error: result.error });
  }
  cache.set(filePath, { mtimeMs: stat.mtimeMs, result });
  return result;
}

export function __clearEngineConfigCacheForTests(): void {
  cache.clear();
}

export type SessionStoreKind = "memory" | "file";

export type RuntimeSettings = {
  model: string;
  generativeFallbackEnabled: boolean;
  sessionStore: SessionStoreKind;
  sessionStoreDir: string;
  sessionTtlSeconds: number;
  turnLogEnabled: boolean;
};

export function resolveRuntimeSettings(env: Env = process.env): RuntimeSettings {
  const storeRaw = envString("SESSION_STORE", "memory", env).toLowerCase();
  return {
    model: envString("OPENAI_MODEL", "gpt-4.1", env),
    generativeFallbackEnabled:
      envFlagEnabled("GENERATIVE_FALLBACK_ENABLED", true, env) && Boolean(String(env.OPENAI_API_KEY ?? "").trim()),
    sessionStore: storeRaw === "file" ? "file" : "memory",
    sessionStoreDir: envString("SESSION_STORE_DIR", ".sessions", env),
    sessionTtlSeconds: envNumber("SESSION_TTL_SECONDS", 86400, env),
    turnLogEnabled: envFlagEnabled("SESSION_TURN_LOG", false, env),
  };
}
