import path from "node:path";
import type { AppConfig } from "../config.js";
import { InputNotFound } from "../errors.js";
import { RunManager, type RunEventType } from "../run_manager.js";
import { detectInputType, extractIr, formatIrFacts, renderIrSummary } from "./ir.js";
import { initialPrompt, usedPlaceholders, type PromptBindings } from "./prompt.js";
import { createProvider, type GenerationProvider } from "./providers/index.js";
import { MAX_GENERATION_ATTEMPTS, generateWithRepair, type AttemptRecord, type RepairOutcome } from "./repair.js";
import { retrieveContext } from "./retriever.js";
import type { RunStatus, StepName } from "./schemas.js";
import {
  artifactAbsPath,
  clipText,
  copyFileAtomic,
  fileExists,
  readTextFile,
  toErrorMessage,
  writeJsonFile,
  writeTextFile
} from "./utils.js";
import { describeIssue, extractExemplarFacts, type ValidationIssue } from "./validation.js";

export const ARTIFACTS = {
  ir: "ir.json",
  irSummary: "ir_summary.txt",
  retrieved: "retrieved.json",
  prompt: "prompt.txt",
  retryPrompt: "prompt_retry_1.txt",
  generation: "generation.json",
  output: "output.md"
} as const;

export type PipelineInput = {
  inputPath: string;
  config: AppConfig;
  /** Defaults to the backend named by `config.provider`. */
  provider?: GenerationProvider;
  /** Share a manager to observe runs (the HTTP API does); defaults to one over `config.outputRoot`. */
  runs?: RunManager;
  /** Receives this run's events from creation until the run ends. */
  onEvent?: (type: RunEventType, payload: unknown) => void;
};

export type PipelineResult = {
  runId: string;
  runDir: string;
  status: "succeeded" | "validation_failed";
  artifacts: string[];
  generationCalls: number;
  /** Issues of the persisted (final) output; empty on success. */
  issues: ValidationIssue[];
  run: RunStatus;
};

function inputSnapshotName(inputPath: string): string {
  return `input${path.extname(inputPath).toLowerCase() || ".txt"}`;
}

function attemptLog(record: AttemptRecord, promptFile: string) {
  return {
    attempt: record.attempt,
    prompt_file: promptFile,
    metadata: record.result.metadata,
    validation: {
      status: record.validation.status,
      kind: record.kind,
      issues: record.validation.issues
    }
  };
}

function generationRecord(outcome: RepairOutcome, config: AppConfig, provider: GenerationProvider) {
  const { final } = outcome;
  return {
    provider: provider.name,
    model: config.model,
    max_tokens: config.maxTokens,
    attempts: outcome.attempts.length,
    retry_used: outcome.retryUsed,
    retry_prompt_file: outcome.retryUsed ? ARTIFACTS.retryPrompt : null,
    attempt_log: outcome.attempts.map((a) => attemptLog(a, a.attempt === 1 ? ARTIFACTS.prompt : ARTIFACTS.retryPrompt)),
    validation: {
      ok: final.validation.status === "pass",
      kind: final.kind,
      missing: final.validation.issues.map(describeIssue),
      issues: final.validation.issues
    }
  };
}

/**
 * One run: snapshot the input, extract facts, retrieve corpus context, pack
 * the prompt, generate (with at most one corrective retry) and persist.
 *
 * Fatal errors mark the run `error` and propagate. A failed validation is
 * recorded in the run, never thrown.
 */
export async function runPartPipeline(input: PipelineInput): Promise<PipelineResult> {
  const { config } = input;
  const inputPath = path.resolve(input.inputPath);
  if (!(await fileExists(inputPath))) throw new InputNotFound(inputPath);

  const provider = input.provider ?? createProvider(config);
  const runs = input.runs ?? new RunManager(config.outputRoot);
  const created = await runs.createRun({ inputPath, provider: provider.name, model: config.model });
  const { runId } = created;
  const unsubscribe = input.onEvent ? runs.subscribe(runId, input.onEvent) : null;
  let generationCalls = 0;

  async function runStep<T>(step: StepName, fn: () => Promise<T>): Promise<T> {
    await runs.startStep(runId, step);
    try {
      const out = await fn();
      await runs.finishStep(runId, step, true);
      return out;
    } catch (err) {
      await runs.finishStep(runId, step, false, toErrorMessage(err));
      throw err;
    }
  }

  async function writeTextArtifact(step: StepName, name: string, text: string): Promise<void> {
    await writeTextFile(artifactAbsPath(runs.outputRoot, runId, name), text);
    await runs.addArtifact(runId, step, name);
  }

  async function writeJsonArtifact(step: StepName, name: string, obj: unknown): Promise<void> {
    await writeJsonFile(artifactAbsPath(runs.outputRoot, runId, name), obj);
    await runs.addArtifact(runId, step, name);
  }

  const counted: GenerationProvider = {
    name: provider.name,
    generate: async (promptText, modelConfig) => {
      generationCalls += 1;
      await runs.setAttempts(runId, generationCalls);
      runs.log(runId, `Generation call ${generationCalls}/${MAX_GENERATION_ATTEMPTS} (${provider.name}, ${modelConfig.model})`);
      return await provider.generate(promptText, modelConfig);
    }
  };

  try {
    const snapshot = inputSnapshotName(inputPath);
    await runStep("SNAPSHOT", async () => {
      await copyFileAtomic(inputPath, artifactAbsPath(runs.outputRoot, runId, snapshot));
      await runs.addArtifact(runId, "SNAPSHOT", snapshot);
      await runs.setInputSnapshot(runId, snapshot);
    });

    const rawInput = await readTextFile(inputPath);
    const ir = await runStep("IR", async () => {
      const extracted = extractIr(rawInput, { sourcePath: inputPath, sourceType: detectInputType(inputPath) });
      await writeJsonArtifact("IR", ARTIFACTS.ir, extracted);
      await writeTextArtifact("IR", ARTIFACTS.irSummary, renderIrSummary(extracted));
      runs.log(runId, `IR: part=${extracted.part.name ?? "?"} source=${extracted.source.type}`, "IR");
      return extracted;
    });

    const retrieval = await runStep("RETRIEVE", async () => {
      const result = await retrieveContext(config.corpusRoot, {
        maxExemplars: config.maxExemplars,
        maxCharsPerDoc: config.maxCharsPerDoc
      });
      await writeJsonArtifact("RETRIEVE", ARTIFACTS.retrieved, result.log);
      runs.log(runId, `Retrieved ${result.log.files_used.join(", ")}`, "RETRIEVE");
      return result;
    });

    const { prompt, repairTemplate } = await runStep("PROMPT", async () => {
      const template = await readTextFile(config.promptTemplatePath);
      const repair = await readTextFile(config.repairTemplatePath);
      const bindings: PromptBindings = {
        request: clipText(rawInput.trim(), config.maxCharsPerDoc),
        facts: formatIrFacts(ir),
        approved_defaults: retrieval.approvedDefaults,
        context: retrieval.context,
        ir_json: JSON.stringify(ir, null, 2)
      };
      const packed = initialPrompt(template, bindings);
      runs.log(runId, `Template placeholders: ${usedPlaceholders(template).join(", ") || "(none)"}`, "PROMPT");
      await writeTextArtifact("PROMPT", ARTIFACTS.prompt, packed.text);
      return { prompt: packed, repairTemplate: repair };
    });

    const { bindings } = prompt;
    const exemplarText = retrieval.selection
      .filter((doc) => doc.category === "exemplar")
      .map((doc) => doc.content)
      .join("\n");

    const outcome = await generateWithRepair(prompt, {
      provider: counted,
      modelConfig: { model: config.model, maxTokens: config.maxTokens },
      repairTemplate,
      validation: {
        facts: extractExemplarFacts(exemplarText),
        sourceText: [bindings.request, bindings.facts, bindings.approved_defaults, bindings.context].join("\n"),
        disallowedPhrases: config.disallowedPhrases
      },
      hooks: {
        step: runStep,
        onRetryPrompt: async (retryPrompt, issues) => {
          runs.log(runId, `Validation failed (${issues.length} issue(s)); retrying once`, "REPAIR");
          await writeTextArtifact("REPAIR", ARTIFACTS.retryPrompt, retryPrompt.text);
        }
      }
    });
    if (!outcome.retryUsed) await runs.skipStep(runId, "REPAIR");

    await runStep("PERSIST", async () => {
      await writeJsonArtifact("PERSIST", ARTIFACTS.generation, generationRecord(outcome, config, provider));
      await writeTextArtifact("PERSIST", ARTIFACTS.output, outcome.final.result.text);
    });

    const status = outcome.final.validation.status === "pass" ? "succeeded" : "validation_failed";
    for (const issue of outcome.final.validation.issues) runs.error(runId, describeIssue(issue), "VALIDATE");
    await runs.setRunStatus(runId, status);
    runs.log(runId, `Run ${status}`);

    const run = runs.getRun(runId) ?? created;
    return {
      runId,
      runDir: runs.runDir(runId),
      status,
      artifacts: runs.artifacts(runId),
      generationCalls,
      issues: outcome.final.validation.issues,
      run
    };
  } catch (err) {
    await runs.setRunStatus(runId, "error", err);
    runs.error(runId, toErrorMessage(err));
    throw err;
  } finally {
    unsubscribe?.();
  }
}
