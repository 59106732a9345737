// mcp-server/src/core/generative.ts
import { z } from "zod";
import type { DecisionGenerator, GeneratedDecision, PromptContext } from "../contracts/collaborators.js";
import { DECISION_KINDS } from "../contracts/decisions.js";
import { GenerativeCallFailedError, MalformedGenerativeResponseError } from "./errors.js";
import { LlmCallError, callStrictJson } from "./llm.js";
import { truncate } from "./text.js";

export const NAVIGATOR_SCHEMA_NAME = "NavigationDecision" as const;

/**
 * Zod schema (strict, no nulls, all fields required)
 */
export const NavigatorZodSchema = z.object({
  decision: z.enum(DECISION_KINDS),
  situationType: z.string(),
  retrievalTag: z.string(),
  readyForNext: z.boolean(),
  blockedBy: z.array(z.string()),
  reasoning: z.string(),
});

export type NavigatorOutput = z.infer<typeof NavigatorZodSchema>;

/**
 * OpenAI Strict JSON Schema (for text.format: json_schema, strict:true)
 */
export const NavigatorJsonSchema = {
  type: "object",
  additionalProperties: false,
  required: ["decision", "situationType", "retrievalTag", "readyForNext", "blockedBy", "reasoning"],
  properties: {
    decision: { type: "string", enum: DECISION_KINDS },
    situationType: { type: "string" },
    retrievalTag: { type: "string" },
    readyForNext: { type: "boolean" },
    blockedBy: { type: "array", items: { type: "string" } },
    reasoning: { type: "string" },
  },
} as const;

export const NAVIGATOR_INSTRUCTIONS = `NAVIGATOR (ONE DECISION PER TURN, STRICT JSON, NO NULLS)

Role
- You choose the next conversational move of a guided body-awareness session.
- You never write the reply itself. Another component turns your decision into words.

Session flow
- goal_and_vision: find out what the person wants to feel, then paint that outcome.
- psycho_education: a short explanation of how the process works.
- problem_and_body: what is in the way, where it sits in the body and how it feels right now.
- readiness_assessment, alpha_permission, alpha_sequence: handled without you.

Hard rules
- "decision" MUST be one of ALLOWED_DECISIONS. Anything else is discarded.
- Ask about one thing at a time. Prefer the present moment over the past.
- Do not repeat a question from RECENT_EXCHANGES when another allowed decision fits.
- If the person just named a body location, do not ask for the location again.

Output
Return ONLY this JSON structure and ALWAYS include ALL fields:
{
  "decision": "<one of ALLOWED_DECISIONS>",
  "situationType": "short camelCase label of the situation",
  "retrievalTag": "snake_case tag for example lookup",
  "readyForNext": true | false,
  "blockedBy": ["criteria still missing"],
  "reasoning": "one sentence"
}`;

function yesNo(value: boolean): string {
  return value ? "yes" : "no";
}

/**
 * Single string the navigator receives as user content. Keys are upper-case labels,
 * one per line, followed by the recent exchanges oldest first.
 */
export function buildNavigatorInput(context: PromptContext): string {
  const c = context.completion;
  const lines = [
    `STAGE: ${context.stage}`,
    `SUBSTATE: ${context.substate}`,
    `ALLOWED_DECISIONS: ${context.allowedDecisions.join(", ")}`,
    `GOAL: ${c.goalContent || "(none)"}`,
    `PROBLEM: ${c.problemContent || "(none)"}`,
    `EMOTION: ${c.emotionContent || "(none)"}`,
    `BODY_CYCLE: ${context.bodyCycle.active} | location ${yesNo(context.bodyCycle.locationCaptured)} | sensation ${yesNo(
      context.bodyCycle.sensationCaptured
    )}`,
    `BODY_QUESTIONS_ASKED: ${context.counters.bodyQuestionsAsked}`,
    `LAST_ANSWER_KIND: ${context.lastAnswerKind}`,
    "RECENT_EXCHANGES:",
    ...(context.recentExchanges.length
      ? context.recentExchanges.map(
          (e) => `- [${e.turn}] USER: ${truncate(e.input, 200)} | REPLY: ${truncate(e.output, 200)}`
        )
      : ["- (none)"]),
    `USER_MESSAGE: ${context.userText}`,
  ];
  return lines.join("\n");
}

export type OpenAIDecisionGeneratorOptions = {
  model: string;
  temperature?: number;
  maxOutputTokens?: number;
};

/** DecisionGenerator backed by one strict-JSON Responses API call per turn. */
export class OpenAIDecisionGenerator implements DecisionGenerator {
  constructor(private readonly options: OpenAIDecisionGeneratorOptions) {}

  async generateDecision(context: PromptContext): Promise<GeneratedDecision> {
    try {
      const result = await callStrictJson<NavigatorOutput>({
        model: this.options.model,
        instructions: NAVIGATOR_INSTRUCTIONS,
        plannerInput: buildNavigatorInput(context),
        schemaName: NAVIGATOR_SCHEMA_NAME,
        jsonSchema: NavigatorJsonSchema,
        zodSchema: NavigatorZodSchema,
        temperature: this.options.temperature ?? 0.2,
        maxOutputTokens: this.options.maxOutputTokens ?? 400,
        debugLabel: `navigator:${context.substate}`,
      });
      return { fields: result.data, model: this.options.model, usage: result.usage };
    } catch (err) {
      if (err instanceof LlmCallError && err.type === "invalid_output") {
        throw new MalformedGenerativeResponseError(err.message, { cause: err });
      }
      if (err instanceof LlmCallError) {
        throw new GenerativeCallFailedError(`${err.type}: ${err.message}`, { cause: err });
      }
      throw new GenerativeCallFailedError(err instanceof Error ? err.message : String(err), { cause: err });
    }
  }
}
