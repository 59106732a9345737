import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { ExampleRetriever, RetrievedExample } from "../contracts/collaborators.js";
import type { NavigationDecision } from "../contracts/decisions.js";
import { tokenize } from "../core/text.js";

export const ExampleCorpusZod = z.object({
  version: z.string(),
  examples: z.array(
    z.object({
      id: z.string().min(1),
      tag: z.string().min(1),
      userText: z.string(),
      reply: z.string().min(1),
    })
  ),
});

export type ExampleCorpus = z.infer<typeof ExampleCorpusZod>;
type CorpusEntry = ExampleCorpus["examples"][number];

const DEFAULT_EXAMPLES_PATH = fileURLToPath(new URL("../../config/examples.json", import.meta.url));

export function loadExampleCorpus(filePath: string = DEFAULT_EXAMPLES_PATH): ExampleCorpus {
  return ExampleCorpusZod.parse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
}

const TAG_WEIGHT = 1;

/**
 * Ranks corpus entries for a decision: a matching retrieval tag scores 1, plus the share
 * of the user's words (3+ letters) that also occur in the example's user text.
 */
export class KeywordExampleRetriever implements ExampleRetriever {
  private readonly entries: Array<CorpusEntry & { tokens: Set<string> }>;

  constructor(corpus: ExampleCorpus = loadExampleCorpus()) {
    this.entries = corpus.examples.map((e) => ({ ...e, tokens: new Set(tokenize(e.userText)) }));
  }

  retrieveExamples(decision: NavigationDecision, rawText: string, limit: number): RetrievedExample[] {
    if (limit <= 0) return [];
    const query = Array.from(new Set(tokenize(rawText)));
    const scored: RetrievedExample[] = [];
    for (const entry of this.entries) {
      const tagScore = entry.tag === decision.retrievalTag ? TAG_WEIGHT : 0;
      const shared = query.filter((w) => entry.tokens.has(w)).length;
      const score = tagScore + (query.length ? shared / query.length : 0);
      if (score <= 0) continue;
      scored.push({ id: entry.id, tag: entry.tag, text: entry.reply, score: Math.round(score * 1000) / 1000 });
    }
    scored.sort((a, b) => b.score - a.score || a.id.localeCompare(b.id));
    return scored.slice(0, limit);
  }
}
