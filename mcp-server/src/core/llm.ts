// src/core/llm.ts
import { z } from "zod";
import { OpenAI } from "openai";
import type { TokenUsage } from "../contracts/collaborators.js";
import { envFlagEnabled, envNumber } from "./config.js";

/** Instance type to avoid "Cannot use namespace 'OpenAI' as a type" (OpenAI is class + namespace). */
type OpenAIClient = InstanceType<typeof OpenAI>;

export type StrictJsonSchema = {
  type: "object";
  additionalProperties: boolean;
  // allow readonly arrays (when schemas are defined with `as const`)
  required: readonly string[];
  properties: Record<string, unknown>;
};

export type StrictJsonCallArgs<T> = {
  model: string;
  /** System instructions. */
  instructions: string;
  /**
   * The planner input, e.g.
   * "SUBSTATE: problem_and_body | USER_MESSAGE: my chest is tight"
   */
  plannerInput: string;

  /** OpenAI structured output parameters */
  schemaName: string;
  jsonSchema: StrictJsonSchema;

  /** Zod validator for final safety check */
  zodSchema: z.ZodType<T>;

  temperature?: number;
  topP?: number;
  maxOutputTokens?: number;

  /** Debug label that you can log upstream */
  debugLabel?: string;
};

export type ResponsesRequest = {
  model: string;
  input: Array<{ role: "system" | "user"; content: string }>;
  text: { format: { type: "json_schema"; name: string; strict: true; schema: StrictJsonSchema } };
  temperature: number;
  top_p: number;
  max_output_tokens: number;
};

export type ResponsesResult = {
  output_text?: string;
  output?: unknown;
  usage?: { input_tokens?: number; output_tokens?: number; total_tokens?: number } | null;
};

/** The one slice of the OpenAI client this module uses; tests substitute a plain object. */
export interface ResponsesClient {
  responses: {
    create(body: ResponsesRequest, options: { signal: AbortSignal }): Promise<ResponsesResult>;
  };
}

export type LlmErrorType = "timeout" | "rate_limited" | "provider_error" | "invalid_output";
export type RetryAction = "retry_same_action" | "none";

export class LlmCallError extends Error {
  readonly type: LlmErrorType;
  readonly retry_action: RetryAction;
  readonly status: number | null;
  readonly retry_after_ms: number | null;
  readonly timeout_ms: number | null;
  readonly debugLabel: string;

  constructor(
    type: LlmErrorType,
    message: string,
    details: {
      debugLabel?: string;
      status?: number | null;
      retryAfterMs?: number | null;
      timeoutMs?: number | null;
      cause?: unknown;
    } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = "LlmCallError";
    this.type = type;
    this.retry_action = type === "invalid_output" ? "none" : "retry_same_action";
    this.status = details.status ?? null;
    this.retry_after_ms = details.retryAfterMs ?? null;
    this.timeout_ms = details.timeoutMs ?? null;
    this.debugLabel = details.debugLabel ?? "";
  }
}

function getApiKey(): string {
  const apiKey = process.env.OPENAI_API_KEY;
  if (!apiKey) throw new Error("Missing env OPENAI_API_KEY");
  return apiKey;
}

function wrapOpenAI(client: OpenAIClient): ResponsesClient {
  return {
    responses: {
      create: async (body, options) => {
        const resp = await client.responses.create(
          { ...body, stream: false },
          { signal: options.signal, maxRetries: 0 }
        );
        return {
          output_text: resp.output_text,
          output: resp.output,
          usage: resp.usage
            ? {
                input_tokens: resp.usage.input_tokens,
                output_tokens: resp.usage.output_tokens,
                total_tokens: resp.usage.total_tokens,
              }
            : null,
        };
      },
    },
  };
}

let _client: ResponsesClient | null = null;
function getClient(): ResponsesClient {
  if (_client) return _client;
  _client = wrapOpenAI(new OpenAI({ apiKey: getApiKey() }));
  return _client;
}

export function __setTestClient(client: ResponsesClient | null): void {
  _client = client;
}

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

function extractOutputText(resp: ResponsesResult): string {
  // Responses API provides output_text at top level
  if (typeof resp.output_text === "string" && resp.output_text.trim().length) {
    return resp.output_text.trim();
  }

  // Fallback: attempt to reconstruct from output array
  if (Array.isArray(resp.output)) {
    for (const item of resp.output) {
      const content = field(item, "content");
      if (!Array.isArray(content)) continue;
      for (const c of content) {
        const t = field(c, "text");
        if (typeof t === "string" && t.trim().length) return t.trim();
      }
    }
  }

  throw new Error("OpenAI response did not contain output_text");
}

const DEFAULT_TIMEOUT_MS = 25000;

function getTimeoutMs(): number {
  return envNumber("LLM_TIMEOUT_MS", DEFAULT_TIMEOUT_MS);
}

function parseRetryAfterMs(value: unknown, msg: string): number | null {
  const raw = typeof value === "number" || typeof value === "string" ? String(value) : "";
  if (raw) {
    const n = Number(raw);
    if (!isNaN(n) && n > 0) {
      return n < 1000 ? Math.round(n * 1000) : Math.round(n);
    }
  }
  const fromMsg = msg.match(/retry after\s*(\d+(?:\.\d+)?)\s*(ms|s)?/i);
  if (fromMsg && fromMsg[1]) {
    const n = Number(fromMsg[1]);
    if (!isNaN(n) && n > 0) {
      const unit = (fromMsg[2] || "ms").toLowerCase();
      return unit === "s" ? Math.round(n * 1000) : Math.round(n);
    }
  }
  return null;
}

function getErrorMessage(err: unknown): string {
  const direct = field(err, "message");
  if (typeof direct === "string" && direct) return direct;
  const nested = field(field(err, "error"), "message");
  if (typeof nested === "string" && nested) return nested;
  return "OpenAI API error";
}

function getErrorStatus(err: unknown): number | null {
  const status = field(err, "status") ?? field(field(err, "response"), "status") ?? field(field(err, "error"), "status");
  return typeof status === "number" ? status : null;
}

function getErrorCode(err: unknown): string {
  const code = field(err, "code") ?? field(field(err, "error"), "code") ?? field(err, "type");
  return typeof code === "string" ? code : "";
}

function isRateLimitError(err: unknown): boolean {
  return getErrorStatus(err) === 429 || getErrorCode(err) === "rate_limit_exceeded";
}

function getRetryAfterMs(err: unknown, msg: string): number {
  const headers = field(err, "headers") ?? field(field(err, "response"), "headers");
  const retryFromHeader = field(headers, "retry-after") ?? field(headers, "retry-after-ms");
  return parseRetryAfterMs(retryFromHeader, msg) ?? 1500;
}

function toProviderError(err: unknown, debugLabel: string): LlmCallError {
  if (err instanceof LlmCallError) return err;
  const msg = getErrorMessage(err);
  if (isRateLimitError(err)) {
    return new LlmCallError("rate_limited", msg, {
      debugLabel,
      status: getErrorStatus(err),
      retryAfterMs: getRetryAfterMs(err, msg),
      cause: err,
    });
  }
  return new LlmCallError("provider_error", msg, { debugLabel, status: getErrorStatus(err), cause: err });
}

async function createResponseWithTimeout(
  client: ResponsesClient,
  body: ResponsesRequest,
  debugLabel: string
): Promise<ResponsesResult> {
  const timeoutMs = getTimeoutMs();
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(
          new LlmCallError("timeout", `OpenAI request timed out after ${timeoutMs}ms`, { debugLabel, timeoutMs })
        );
      }, timeoutMs);
    });
    return await Promise.race([client.responses.create(body, { signal: controller.signal }), timeoutPromise]);
  } catch (err) {
    if (controller.signal.aborted) {
      throw new LlmCallError("timeout", `OpenAI request timed out after ${timeoutMs}ms`, {
        debugLabel,
        timeoutMs,
        cause: err,
      });
    }
    throw toProviderError(err, debugLabel);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

function normalizeUsage(resp: ResponsesResult): TokenUsage {
  const usage = resp.usage;
  const pick = (v: unknown): number | null => (typeof v === "number" && Number.isFinite(v) ? v : null);
  const input_tokens = pick(usage?.input_tokens);
  const output_tokens = pick(usage?.output_tokens);
  const total_tokens =
    pick(usage?.total_tokens) ?? (input_tokens !== null && output_tokens !== null ? input_tokens + output_tokens : null);
  return {
    input_tokens,
    output_tokens,
    total_tokens,
    provider_available: input_tokens !== null || output_tokens !== null || total_tokens !== null,
  };
}

/**
 * Strict JSON call:
 * - Enforces json_schema strict at the source
 * - Validates with Zod
 * - Exactly one attempt; the caller owns any fallback
 */
export async function callStrictJson<T>(args: StrictJsonCallArgs<T>): Promise<{
  data: T;
  rawText: string;
  usage: TokenUsage;
}> {
  const debugLabel = args.debugLabel ?? args.schemaName;
  const client = getClient();
  const debug = envFlagEnabled("LOCAL_DEV", false) || envFlagEnabled("LLM_DEBUG", false);
  if (debug) {
    console.log("[llm] request", { debugLabel, model: args.model, input_chars: args.plannerInput.length });
  }

  const resp = await createResponseWithTimeout(
    client,
    {
      model: args.model,
      input: [
        { role: "system", content: args.instructions },
        { role: "user", content: args.plannerInput },
      ],
      // In the Responses API, `response_format` lives under `text.format`.
      text: {
        format: {
          type: "json_schema",
          name: args.schemaName,
          strict: true,
          schema: args.jsonSchema,
        },
      },
      temperature: args.temperature ?? 0.2,
      top_p: args.topP ?? 1,
      max_output_tokens: args.maxOutputTokens ?? 2048,
    },
    debugLabel
  );

  let rawText: string;
  let parsedJson: unknown;
  try {
    rawText = extractOutputText(resp);
    parsedJson = JSON.parse(rawText);
  } catch (err) {
    throw new LlmCallError("invalid_output", `Unparseable output for ${debugLabel}`, { debugLabel, cause: err });
  }

  const parsed = args.zodSchema.safeParse(parsedJson);
  if (!parsed.success) {
    throw new LlmCallError("invalid_output", `Output for ${debugLabel} failed validation: ${parsed.error.message}`, {
      debugLabel,
    });
  }
  const usage = normalizeUsage(resp);
  if (debug) console.log("[llm] usage", { debugLabel, ...usage });
  return { data: parsed.data, rawText, usage };
}
