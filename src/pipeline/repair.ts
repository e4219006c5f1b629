import { buildRepairPrompt, type PromptInstance } from "./prompt.js";
import type { GenerationProvider, GenerationResult, ModelConfig } from "./providers/index.js";
import type { StepName } from "./schemas.js";
import { validateOutput, type ValidationInput, type ValidationIssue, type ValidationOutcome } from "./validation.js";

export const MAX_GENERATION_ATTEMPTS = 2;

export type OutcomeKind = "pass" | "ValidationFailure" | "PersistentValidationFailure";

export type AttemptRecord = {
  attempt: number;
  prompt: PromptInstance;
  result: GenerationResult;
  validation: ValidationOutcome;
  kind: OutcomeKind;
};

export type RepairOutcome = {
  /** The later attempt, always the one persisted. */
  final: AttemptRecord;
  attempts: AttemptRecord[];
  retryUsed: boolean;
};

type GenerationStep = Extract<StepName, "GENERATE" | "VALIDATE" | "REPAIR">;

export type RepairHooks = {
  /** Wraps each phase so callers can track progress; defaults to calling `fn` directly. */
  step?: <T>(name: GenerationStep, fn: () => Promise<T>) => Promise<T>;
  /** Called with the corrective prompt before the second generation call. */
  onRetryPrompt?: (prompt: PromptInstance, issues: ValidationIssue[]) => Promise<void>;
};

export type RepairOptions = {
  provider: GenerationProvider;
  modelConfig: ModelConfig;
  repairTemplate: string;
  validation: ValidationInput;
  hooks?: RepairHooks;
};

/**
 * Generate, validate, and on failure retry exactly once with a corrective
 * prompt. The second result is accepted whatever its validation says; the
 * provider is never called more than twice.
 */
export async function generateWithRepair(initial: PromptInstance, options: RepairOptions): Promise<RepairOutcome> {
  const { provider, modelConfig, repairTemplate, validation, hooks } = options;
  const step = hooks?.step ?? (<T>(_name: GenerationStep, fn: () => Promise<T>) => fn());

  const firstResult = await step("GENERATE", () => provider.generate(initial.text, modelConfig));
  const firstValidation = await step("VALIDATE", async () => validateOutput(firstResult.text, validation));
  const first: AttemptRecord = {
    attempt: 1,
    prompt: initial,
    result: firstResult,
    validation: firstValidation,
    kind: firstValidation.status === "pass" ? "pass" : "ValidationFailure"
  };

  if (first.validation.status === "pass") {
    return { final: first, attempts: [first], retryUsed: false };
  }

  const second = await step("REPAIR", async (): Promise<AttemptRecord> => {
    const retryPrompt = buildRepairPrompt(initial, repairTemplate, first.validation.issues);
    await hooks?.onRetryPrompt?.(retryPrompt, first.validation.issues);
    const result = await provider.generate(retryPrompt.text, modelConfig);
    const outcome = validateOutput(result.text, validation);
    return {
      attempt: 2,
      prompt: retryPrompt,
      result,
      validation: outcome,
      kind: outcome.status === "pass" ? "pass" : "PersistentValidationFailure"
    };
  });

  return { final: second, attempts: [first, second], retryUsed: true };
}
