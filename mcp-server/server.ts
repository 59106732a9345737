// mcp-server/server.ts
import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { createHash, randomUUID } from "node:crypto";
import { readFileSync } from "node:fs";

import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createSessionMcpServer, createSessionService } from "./src/app.js";
import { envNumber, isLocalDev as localDevEnabled, resolveRuntimeSettings } from "./src/core/config.js";
import { errorMessage } from "./src/core/errors.js";
import { safeString } from "./src/core/text.js";
import { applySecurityHeaders } from "./src/middleware/security.js";

function loadDotEnv() {
  let raw: string;
  try {
    raw = readFileSync(new URL("./.env", import.meta.url), "utf-8");
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      console.warn("[boot] .env unreadable", { error: errorMessage(err) });
    }
    return;
  }
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const idx = trimmed.indexOf("=");
    if (idx === -1) continue;
    const key = trimmed.slice(0, idx).trim();
    let value = trimmed.slice(idx + 1).trim();
    if (!key) continue;
    // Strip surrounding quotes if present.
    if (
      (value.startsWith("\"") && value.endsWith("\"")) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

loadDotEnv();

process.on("uncaughtException", (err) => {
  console.error("[FATAL] Uncaught exception:", err);
  process.exit(1);
});

process.on("unhandledRejection", (reason, promise) => {
  console.error("[FATAL] Unhandled rejection at:", promise, "reason:", reason);
  process.exit(1);
});

const port = Number(process.env.PORT || 3000);
const host = process.env.HOST || "0.0.0.0";
const isLocalDev = localDevEnabled();

const VERSION = safeString(process.env.VERSION ?? "").trim() || "v1";

const MCP_PATH = "/mcp";
const MAX_REQUEST_SIZE_BYTES = envNumber("MAX_REQUEST_SIZE_BYTES", 1024 * 1024);
const REQUEST_TIMEOUT_MS = envNumber("REQUEST_TIMEOUT_MS", 30000);

const settings = resolveRuntimeSettings();
const service = createSessionService(settings);

function getHeader(req: IncomingMessage, name: string): string {
  const value = req.headers[name.toLowerCase()];
  return safeString(Array.isArray(value) ? value.join(",") : value ?? "");
}

function getCorrelationId(req: IncomingMessage): string {
  const existing =
    getHeader(req, "x-correlation-id") ||
    getHeader(req, "x-request-id") ||
    getHeader(req, "traceparent");
  return existing || randomUUID();
}

function jsonRpcErrorResponse(
  status: number,
  message: string,
  data: Record<string, unknown>,
  code = -32700
) {
  return {
    status,
    payload: {
      jsonrpc: "2.0",
      error: { code, message, data },
      id: null,
    },
  };
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(payload));
}

class BodyReadError extends Error {
  constructor(readonly code: "body_too_large" | "aborted") {
    super(code);
  }
}

async function readBodyWithLimit(req: IncomingMessage, maxBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let done = false;

    const cleanup = () => {
      req.off("data", onData);
      req.off("end", onEnd);
      req.off("error", onError);
      req.off("aborted", onAborted);
    };

    const onData = (chunk: Buffer) => {
      if (done) return;
      size += chunk.length;
      if (size > maxBytes) {
        done = true;
        cleanup();
        // Drain remaining data without destroying the request
        req.resume();
        reject(new BodyReadError("body_too_large"));
        return;
      }
      chunks.push(chunk);
    };
    const onEnd = () => {
      if (done) return;
      done = true;
      cleanup();
      resolve(Buffer.concat(chunks, size));
    };
    const onError = (err: Error) => {
      if (done) return;
      done = true;
      cleanup();
      reject(err);
    };
    const onAborted = () => {
      if (done) return;
      done = true;
      cleanup();
      reject(new BodyReadError("aborted"));
    };

    req.on("data", onData);
    req.on("end", onEnd);
    req.on("error", onError);
    req.on("aborted", onAborted);
  });
}

/** Local dev bridge: plain JSON in, service payload out. */
async function handleLocalJson(
  req: IncomingMessage,
  res: ServerResponse,
  run: (args: unknown) => Promise<unknown>
): Promise<void> {
  let args: unknown;
  try {
    const raw = await readBodyWithLimit(req, MAX_REQUEST_SIZE_BYTES);
    args = JSON.parse(raw.toString("utf-8") || "{}");
  } catch (err) {
    sendJson(res, 400, { ok: false, error: { type: "invalid_input", message: errorMessage(err), retry_action: "none" } });
    return;
  }
  sendJson(res, 200, await run(args));
}

async function handleMcp(req: IncomingMessage, res: ServerResponse): Promise<void> {
  const correlationId = getCorrelationId(req);
  if (!res.headersSent) res.setHeader("X-Correlation-Id", correlationId);

  const acceptHeader = getHeader(req, "accept");
  const contentType = getHeader(req, "content-type");

  const mcpServer = createSessionMcpServer(service, VERSION);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined, enableJsonResponse: true });

  const closeAll = () => {
    transport.close().catch((err: unknown) => console.warn("[mcp] transport close failed", { error: errorMessage(err) }));
    mcpServer.close().catch((err: unknown) => console.warn("[mcp] server close failed", { error: errorMessage(err) }));
  };
  res.on("close", closeAll);

  let timeout: NodeJS.Timeout | null = null;
  try {
    let parsedBody: unknown = undefined;

    // Pre-parse only when headers are compliant, otherwise let the SDK answer 406/415.
    const shouldPreParse =
      req.method === "POST" &&
      acceptHeader.includes("application/json") &&
      acceptHeader.includes("text/event-stream") &&
      contentType.includes("application/json");

    if (shouldPreParse) {
      let raw: Buffer;
      try {
        raw = await readBodyWithLimit(req, MAX_REQUEST_SIZE_BYTES);
      } catch (err) {
        const tooLarge = err instanceof BodyReadError && err.code === "body_too_large";
        const errPayload = tooLarge
          ? jsonRpcErrorResponse(413, "Request entity too large", {
              error_code: "body_too_large",
              correlation_id: correlationId,
              max_size: MAX_REQUEST_SIZE_BYTES,
            }, -32000)
          : jsonRpcErrorResponse(400, "Request aborted", {
              error_code: "request_aborted",
              correlation_id: correlationId,
            }, -32000);
        sendJson(res, errPayload.status, errPayload.payload);
        return;
      }
      if (isLocalDev) {
        const hashPrefix = createHash("sha256").update(raw.subarray(0, 256)).digest("hex");
        console.log("[mcp] request", { correlationId, method: req.method, bodySize: raw.length, bodyHashPrefix: hashPrefix });
      }
      try {
        parsedBody = JSON.parse(raw.toString("utf-8"));
      } catch {
        const errPayload = jsonRpcErrorResponse(400, "Parse error: Invalid JSON", {
          error_code: "invalid_json",
          correlation_id: correlationId,
        });
        sendJson(res, errPayload.status, errPayload.payload);
        return;
      }
    }

    timeout = setTimeout(() => {
      if (!res.headersSent) {
        const errPayload = jsonRpcErrorResponse(408, "Request timeout", {
          error_code: "timeout",
          correlation_id: correlationId,
        }, -32000);
        sendJson(res, errPayload.status, errPayload.payload);
      }
      closeAll();
    }, REQUEST_TIMEOUT_MS);

    await mcpServer.connect(transport);
    await transport.handleRequest(req, res, parsedBody);
  } catch (error) {
    console.error("[mcp] request failed", { correlationId, error: errorMessage(error) });
    if (!res.headersSent) {
      const errPayload = jsonRpcErrorResponse(500, "Internal server error", {
        error_code: "server_error",
        correlation_id: correlationId,
      }, -32000);
      sendJson(res, errPayload.status, errPayload.payload);
    }
  } finally {
    if (timeout) clearTimeout(timeout);
  }
}

const MCP_METHODS = new Set(["POST", "GET", "DELETE"]);

async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
  const hostHeader = getHeader(req, "host") || "localhost";
  const url = new URL(req.url || "/", `http://${hostHeader}`);

  applySecurityHeaders(res);

  if ((req.method === "GET" || req.method === "HEAD") && url.pathname === "/version") {
    res.writeHead(200, { "content-type": "text/plain" });
    res.end(req.method === "GET" ? `VERSION=${VERSION}` : undefined);
    return;
  }

  if (req.method === "GET" && url.pathname === "/health") {
    sendJson(res, 200, {
      ok: true,
      version: VERSION,
      store: settings.sessionStore,
      generative_fallback: settings.generativeFallbackEnabled,
    });
    return;
  }

  // --- Local dev only: plain JSON bridge to the same service as the MCP tools ---
  if (isLocalDev && req.method === "POST") {
    if (url.pathname === "/session") {
      await handleLocalJson(req, res, (args) => service.startSession(args));
      return;
    }
    if (url.pathname === "/turn") {
      await handleLocalJson(req, res, (args) => service.runTurn(args));
      return;
    }
  }

  if (url.pathname === MCP_PATH && req.method && MCP_METHODS.has(req.method)) {
    await handleMcp(req, res);
    return;
  }

  res.writeHead(404).end("Not Found");
}

const httpServer = createServer((req, res) => {
  handleRequest(req, res).catch((err: unknown) => {
    console.error("[http] unhandled request failure", { url: req.url, error: errorMessage(err) });
    if (!res.headersSent) sendJson(res, 500, { ok: false, error: { type: "internal_error", message: "server error", retry_action: "none" } });
  });
});

httpServer.listen(port, host, () => {
  console.log(`Guided session MCP server listening on http://${host}:${port}${MCP_PATH} (${VERSION})`);
  console.log("[boot] settings", {
    model: settings.model,
    generativeFallbackEnabled: settings.generativeFallbackEnabled,
    sessionStore: settings.sessionStore,
    turnLogEnabled: settings.turnLogEnabled,
  });
  if (isLocalDev) {
    console.log(`Local dev: POST http://localhost:${port}/session  POST http://localhost:${port}/turn`);
  }
});
