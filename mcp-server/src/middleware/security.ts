// Security headers for the JSON and MCP endpoints

export type CSPOptions = {
  frameAncestors?: string[];
  connectSources?: string[];
};

/** The server returns JSON only, so nothing may be loaded, framed or posted from it. */
export const DEFAULT_CSP_OPTIONS: CSPOptions = {
  frameAncestors: [],
  connectSources: [],
};

export function buildCSPHeader(options: CSPOptions = DEFAULT_CSP_OPTIONS): string {
  const directives: string[] = [];

  directives.push("default-src 'none'");

  const connectSrc: string[] = ["'self'"];
  if (options.connectSources) {
    connectSrc.push(...options.connectSources);
  }
  directives.push(`connect-src ${connectSrc.join(" ")}`);

  directives.push("base-uri 'none'");
  directives.push("form-action 'none'");

  if (options.frameAncestors && options.frameAncestors.length > 0) {
    directives.push(`frame-ancestors ${options.frameAncestors.join(" ")}`);
  } else {
    directives.push("frame-ancestors 'none'");
  }

  return directives.join("; ");
}

/** The part of `http.ServerResponse` this module touches. */
type HeaderTarget = {
  readonly headersSent: boolean;
  setHeader(name: string, value: string): unknown;
};

/**
 * Apply security headers to response
 * Note: Headers must be set before writeHead() is called
 */
export function applySecurityHeaders(res: HeaderTarget, options?: CSPOptions): void {
  if (res.headersSent) return;
  res.setHeader("Content-Security-Policy", buildCSPHeader(options));
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("Referrer-Policy", "no-referrer");
  // session payloads carry personal conversation text
  res.setHeader("Cache-Control", "no-store");
}
