import test from "node:test";
import assert from "node:assert/strict";
import type { PromptContext } from "../contracts/collaborators.js";
import { GenerativeCallFailedError, MalformedGenerativeResponseError } from "./errors.js";
import { NavigatorJsonSchema, OpenAIDecisionGenerator, buildNavigatorInput } from "./generative.js";
import { __setTestClient, type ResponsesClient, type ResponsesRequest } from "./llm.js";
import { getDefaultBodyCycle, getDefaultCompletion, getDefaultCounters } from "./state.js";

function context(overrides: Partial<PromptContext> = {}): PromptContext {
  return {
    stage: "safety_building",
    substate: "problem_and_body",
    completion: { ...getDefaultCompletion(), goalContent: "i want to feel calm" },
    counters: getDefaultCounters(),
    bodyCycle: { ...getDefaultBodyCycle(), locationCaptured: true },
    lastAnswerKind: "bodyLocation",
    recentExchanges: [{ turn: 3, input: "my chest", output: "What do you notice there?" }],
    allowedDecisions: ["sensationInquiry", "generalInquiry"],
    userText: "my chest",
    ...overrides,
  };
}

async function withClient<T>(client: ResponsesClient, fn: () => Promise<T>): Promise<T> {
  const previous = process.env.OPENAI_API_KEY;
  process.env.OPENAI_API_KEY = "test-secret";
  __setTestClient(client);
  try {
    return await fn();
  } finally {
    __setTestClient(null);
    if (previous === undefined) delete process.env.OPENAI_API_KEY;
    else process.env.OPENAI_API_KEY = previous;
  }
}

test("buildNavigatorInput lists allowed decisions, cycle flags and recent exchanges", () => {
  const input = buildNavigatorInput(context());
  const lines = input.split("\n");
  assert.equal(lines[0], "STAGE: safety_building");
  assert.equal(lines[1], "SUBSTATE: problem_and_body");
  assert.equal(lines[2], "ALLOWED_DECISIONS: sensationInquiry, generalInquiry");
  assert.equal(lines[3], "GOAL: i want to feel calm");
  assert.equal(lines[4], "PROBLEM: (none)");
  assert.equal(lines[6], "BODY_CYCLE: 1 | location yes | sensation no");
  assert.equal(lines[10], "- [3] USER: my chest | REPLY: What do you notice there?");
  assert.equal(lines[11], "USER_MESSAGE: my chest");
});

test("buildNavigatorInput marks an empty history", () => {
  const input = buildNavigatorInput(context({ recentExchanges: [] }));
  assert.ok(input.includes("RECENT_EXCHANGES:\n- (none)\nUSER_MESSAGE: my chest"));
});

test("the strict schema requires every field and enumerates decisions", () => {
  assert.deepEqual(
    [...NavigatorJsonSchema.required].sort(),
    Object.keys(NavigatorJsonSchema.properties).sort()
  );
  assert.ok(NavigatorJsonSchema.properties.decision.enum.includes("sensationInquiry"));
});

test("generateDecision returns the parsed fields with model and usage", async () => {
  const seen: ResponsesRequest[] = [];
  const generator = new OpenAIDecisionGenerator({ model: "gpt-4.1" });
  const result = await withClient(
    {
      responses: {
        create: async (body) => {
          seen.push(body);
          return {
            output_text: JSON.stringify({
              decision: "sensationInquiry",
              situationType: "bodyEnquiry",
              retrievalTag: "body_sensation",
              readyForNext: false,
              blockedBy: ["problemIdentified"],
              reasoning: "Location known; ask how it feels.",
            }),
            usage: { input_tokens: 40, output_tokens: 12, total_tokens: 52 },
          };
        },
      },
    },
    () => generator.generateDecision(context())
  );
  assert.equal(result.model, "gpt-4.1");
  assert.deepEqual(result.usage, { input_tokens: 40, output_tokens: 12, total_tokens: 52, provider_available: true });
  assert.deepEqual(result.fields, {
    decision: "sensationInquiry",
    situationType: "bodyEnquiry",
    retrievalTag: "body_sensation",
    readyForNext: false,
    blockedBy: ["problemIdentified"],
    reasoning: "Location known; ask how it feels.",
  });
  assert.equal(seen.length, 1);
  assert.equal(seen[0]?.text.format.name, "NavigationDecision");
  assert.equal(seen[0]?.input[0]?.role, "system");
});

test("generateDecision maps schema failures to MalformedGenerativeResponseError", async () => {
  const generator = new OpenAIDecisionGenerator({ model: "gpt-4.1" });
  await withClient({ responses: { create: async () => ({ output_text: '{"decision":"dance"}' }) } }, async () => {
    await assert.rejects(generator.generateDecision(context()), MalformedGenerativeResponseError);
  });
});

test("generateDecision maps provider failures to GenerativeCallFailedError", async () => {
  const generator = new OpenAIDecisionGenerator({ model: "gpt-4.1" });
  await withClient(
    {
      responses: {
        create: async () => {
          throw Object.assign(new Error("bad gateway"), { status: 502 });
        },
      },
    },
    async () => {
      await assert.rejects(generator.generateDecision(context()), (err: unknown) => {
        assert.ok(err instanceof GenerativeCallFailedError);
        assert.equal(err.message, "provider_error: bad gateway");
        return true;
      });
    }
  );
});
