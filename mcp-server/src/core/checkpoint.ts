import { z } from "zod";
import { hasAnyTerm, hasUnnegatedTerm, type CheckpointVocabulary } from "./lexicons.js";

export type CheckpointStep = {
  id: string;
  /** Short verb phrase used in clarifying rephrases ("lower your jaw"). */
  action: string;
  instruction: string;
  normalization: string;
};

export const DEFAULT_CHECKPOINT_STEPS: readonly CheckpointStep[] = [
  {
    id: "lower_jaw",
    action: "lower your jaw",
    instruction:
      "Lower your jaw slightly. Just let it drop a little, not all the way, enough to release the tension.",
    normalization:
      "Of course it feels different, you've never done this before. The unfamiliar feeling is your brain noticing the change. Can you stay with it for a moment?",
  },
  {
    id: "relax_tongue",
    action: "relax your tongue",
    instruction: "Now relax your tongue. Let it rest gently in your mouth, not pressed against anything.",
    normalization:
      "That makes sense. Your body is not used to this yet. The tension you notice is resistance to change. Breathe and stay with it.",
  },
  {
    id: "breathe_slower",
    action: "let your breath slow down",
    instruction: "Now breathe a little slower. Not forcing it, just allowing your breath to slow down on its own.",
    normalization:
      "I understand. Slowing down can feel strange at first when your body is used to being activated. Just allow the breath to slow.",
  },
];

export const CHECKPOINT_QUESTION = "More tense or more calm?";

export const CHECKPOINT_REPLY_KINDS = ["calm", "tense", "neutral", "unclear"] as const;
export type CheckpointReplyKind = (typeof CHECKPOINT_REPLY_KINDS)[number];

export const CheckpointStateZod = z.object({
  stepIndex: z.number().int().min(0),
  totalSteps: z.number().int().min(1),
  status: z.enum(["active", "complete"]),
  responses: z.record(z.string(), z.enum(["calm", "tense"])),
  indicators: z.array(z.string()),
  resistanceEncountered: z.boolean(),
  retries: z.number().int().min(0),
  replies: z.number().int().min(0),
});

export type CheckpointState = z.infer<typeof CheckpointStateZod>;

export type CheckpointOutcome =
  | { kind: "advanced"; step: CheckpointStep; stepIndex: number }
  | { kind: "complete"; downRegulated: boolean }
  | { kind: "resistance"; step: CheckpointStep; stepIndex: number }
  | { kind: "neutral"; step: CheckpointStep; stepIndex: number }
  | { kind: "unclear"; step: CheckpointStep; stepIndex: number };

function freshState(totalSteps: number): CheckpointState {
  return {
    stepIndex: 0,
    totalSteps,
    status: "active",
    responses: {},
    indicators: [],
    resistanceEncountered: false,
    retries: 0,
    replies: 0,
  };
}

/**
 * Guided relaxation sub-sequence: each step is confirmed with "more tense or more calm?"
 * before moving on. Tense replies keep the sequence on the same step.
 */
export class CheckpointSequence {
  private state: CheckpointState;

  constructor(
    private readonly steps: readonly CheckpointStep[],
    private readonly vocabulary: CheckpointVocabulary,
    state?: CheckpointState
  ) {
    if (steps.length === 0) throw new Error("checkpoint sequence needs at least one step");
    if (state && state.totalSteps !== steps.length) {
      throw new Error(`checkpoint state has ${state.totalSteps} steps, configured sequence has ${steps.length}`);
    }
    this.state = state ? CheckpointStateZod.parse(structuredClone(state)) : freshState(steps.length);
  }

  /** Resets the sequence and returns the first step. */
  start(): CheckpointStep {
    this.state = freshState(this.steps.length);
    return this.steps[0];
  }

  get snapshot(): CheckpointState {
    return structuredClone(this.state);
  }

  get currentStep(): CheckpointStep {
    return this.steps[Math.min(this.state.stepIndex, this.steps.length - 1)];
  }

  isComplete(): boolean {
    return this.state.status === "complete";
  }

  calmSteps(): number {
    return Object.values(this.state.responses).filter((r) => r === "calm").length;
  }

  isDownRegulated(): boolean {
    return this.calmSteps() >= 2 && this.state.indicators.length >= 1;
  }

  /**
   * Calm is tested before tense: "calmer but still a bit tense" counts as calm.
   * A negated calm term ("not calm at all") is not calm.
   */
  classifyReply(reply: string): CheckpointReplyKind {
    const { calm, tense, neutral, negators } = this.vocabulary;
    if (hasUnnegatedTerm(reply, calm, negators)) return "calm";
    if (hasAnyTerm(reply, tense)) return "tense";
    if (hasAnyTerm(reply, neutral)) return "neutral";
    return "unclear";
  }

  advance(reply: string): CheckpointOutcome {
    if (this.isComplete()) {
      return { kind: "complete", downRegulated: this.isDownRegulated() };
    }
    this.state.replies += 1;
    const step = this.currentStep;
    const stepIndex = this.state.stepIndex;
    const kind = this.classifyReply(reply);

    if (kind !== "calm") {
      this.state.retries += 1;
      if (kind === "tense") {
        this.state.responses[step.id] = "tense";
        this.state.resistanceEncountered = true;
        return { kind: "resistance", step, stepIndex };
      }
      return { kind, step, stepIndex };
    }

    this.state.responses[step.id] = "calm";
    this.collectIndicators(reply);
    if (stepIndex + 1 >= this.steps.length) {
      this.state.stepIndex = this.steps.length;
      this.state.status = "complete";
      return { kind: "complete", downRegulated: this.isDownRegulated() };
    }
    this.state.stepIndex = stepIndex + 1;
    return { kind: "advanced", step: this.steps[stepIndex + 1], stepIndex: stepIndex + 1 };
  }

  private collectIndicators(reply: string): void {
    for (const [id, phrases] of Object.entries(this.vocabulary.physiological)) {
      if (!this.state.indicators.includes(id) && hasAnyTerm(reply, phrases)) {
        this.state.indicators.push(id);
      }
    }
  }
}
