import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  DEFAULT_ENGINE_CONFIG,
  __clearEngineConfigCacheForTests,
  envFlagEnabled,
  envNumber,
  loadEngineConfig,
  resolveRuntimeSettings,
} from "./config.js";

function writeTempConfig(payload: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "engine-config-"));
  const file = path.join(dir, "engine.json");
  fs.writeFileSync(file, payload, "utf-8");
  return file;
}

test("envFlagEnabled treats 0/false/off/no as disabled and empty as fallback", () => {
  assert.equal(envFlagEnabled("FLAG", true, {}), true);
  assert.equal(envFlagEnabled("FLAG", false, { FLAG: "" }), false);
  assert.equal(envFlagEnabled("FLAG", true, { FLAG: "off" }), false);
  assert.equal(envFlagEnabled("FLAG", false, { FLAG: "1" }), true);
  assert.equal(envFlagEnabled("FLAG", false, { FLAG: " YES " }), true);
});

test("envNumber only accepts positive finite numbers", () => {
  assert.equal(envNumber("N", 7, { N: "12" }), 12);
  assert.equal(envNumber("N", 7, { N: "-1" }), 7);
  assert.equal(envNumber("N", 7, { N: "abc" }), 7);
});

test("default engine config carries the documented limits", () => {
  assert.equal(DEFAULT_ENGINE_CONFIG.noRepeatWindowTurns, 5);
  assert.equal(DEFAULT_ENGINE_CONFIG.problemEvidenceWindowTurns, 5);
  assert.equal(DEFAULT_ENGINE_CONFIG.maxReadinessPrompts, 3);
  assert.equal(DEFAULT_ENGINE_CONFIG.implicitVisionAcceptance, true);
});

test("loadEngineConfig reads overrides and fills defaults", () => {
  __clearEngineConfigCacheForTests();
  const file = writeTempConfig(JSON.stringify({ version: "test", implicitVisionAcceptance: false }));
  const result = loadEngineConfig(file);
  assert.equal(result.loaded, true);
  assert.equal(result.config.version, "test");
  assert.equal(result.config.implicitVisionAcceptance, false);
  assert.equal(result.config.clarifyGoalTurnLimit, 3);
});

test("loadEngineConfig falls back to defaults on invalid values", () => {
  __clearEngineConfigCacheForTests();
  const file = writeTempConfig(JSON.stringify({ maxReadinessPrompts: 0 }));
  const result = loadEngineConfig(file);
  assert.equal(result.loaded, false);
  assert.deepEqual(result.config, DEFAULT_ENGINE_CONFIG);
});

test("loadEngineConfig reports a missing file", () => {
  const result = loadEngineConfig(path.join(os.tmpdir(), "does-not-exist", "engine.json"));
  assert.equal(result.loaded, false);
  assert.match(String(result.error), /config not found/);
});

test("the shipped engine.json parses", () => {
  __clearEngineConfigCacheForTests();
  const result = loadEngineConfig(fileURLToPath(new URL("../../config/engine.json", import.meta.url)));
  assert.equal(result.loaded, true);
});

test("resolveRuntimeSettings disables the generator without an API key", () => {
  const settings = resolveRuntimeSettings({ SESSION_STORE: "FILE" });
  assert.equal(settings.generativeFallbackEnabled, false);
  assert.equal(settings.sessionStore, "file");
  assert.equal(settings.model, "gpt-4.1");
  assert.equal(settings.sessionTtlSeconds, 86400);
  const withKey = resolveRuntimeSettings({ OPENAI_API_KEY: "test-secret" });
  assert.equal(withKey.generativeFallbackEnabled, true);
  assert.equal(withKey.sessionStore, "memory");
});
