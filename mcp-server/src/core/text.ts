import { inspect } from "node:util";

export function safeString(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return value.toString();
  }
  let json: string | undefined;
  try {
    json = JSON.stringify(value);
  } catch {
    json = undefined;
  }
  if (typeof json === "string") return json;
  try {
    return inspect(value, { depth: 5, breakLength: 120 });
  } catch {
    return "[unstringifiable]";
  }
}

/**
 * Lowercase, straighten curly quotes and collapse whitespace. Every lexicon lookup runs
 * against text in this form.
 */
export function normalizeForMatching(text: string): string {
  return String(text ?? "")
    .replace(/[‘’ʼ]/g, "'")
    .replace(/[“”]/g, '"')
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

export function wordCount(text: string): number {
  const trimmed = String(text ?? "").trim();
  if (!trimmed) return 0;
  return trimmed.split(/\s+/).length;
}

export function truncate(text: string, maxChars: number): string {
  const value = String(text ?? "").trim();
  if (value.length <= maxChars) return value;
  return `${value.slice(0, Math.max(0, maxChars - 3)).trimEnd()}...`;
}

/** Words of three or more letters, lowercased. */
export function tokenize(text: string): string[] {
  return normalizeForMatching(text)
    .split(/[^a-z0-9']+/)
    .map((w) => w.replace(/^'+|'+$/g, ""))
    .filter((w) => w.length >= 3);
}

const LEADING_FILLERS = ["that's right", "that is right", "yeah", "okay", "ok", "good", "so", "and"];

/**
 * Canonical form of an asked question: lowercase, leading affirmation fillers removed,
 * punctuation other than the final "?" dropped.
 */
export function normalizeQuestion(question: string): string {
  let q = normalizeForMatching(question);
  let changed = true;
  while (changed) {
    changed = false;
    for (const filler of LEADING_FILLERS) {
      if (q.startsWith(`${filler} `) || q.startsWith(`${filler}.`) || q.startsWith(`${filler},`)) {
        q = q.slice(filler.length).replace(/^[\s.,!]+/, "");
        changed = true;
      }
    }
  }
  q = q.replace(/[^a-z0-9'?\s]/g, " ").replace(/\s+/g, " ").trim();
  return q;
}
