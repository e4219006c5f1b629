import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import {
  RUN_STEPS,
  RunStatusSchema,
  type RunState,
  type RunStatus,
  type StepName,
  type StepRecord
} from "./pipeline/schemas.js";
import { ensureDir, nowIso, runDirAbs, slug, toErrorMessage, tryReadJsonFile, utcStamp, writeJsonFile } from "./pipeline/utils.js";

export { RUN_STEPS } from "./pipeline/schemas.js";
export type { RunState, RunStatus, StepName, StepRecord } from "./pipeline/schemas.js";

export const RUN_RECORD_FILE = "run.json";

type RunInternal = RunStatus & {
  emitter: EventEmitter;
};

export type RunListItem = Pick<RunStatus, "runId" | "inputPath" | "status" | "startedAt" | "finishedAt">;

export type CreateRunInput = {
  inputPath: string;
  provider: string;
  model: string;
};

export type RunEventType = "step_started" | "step_finished" | "artifact_written" | "log" | "error";

const RUN_EVENT_TYPES: readonly RunEventType[] = ["step_started", "step_finished", "artifact_written", "log", "error"];

const RUN_ID_SUFFIX_LEN = 4;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += RUN_ID_SUFFIX_ALPHABET[bytes[i] % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

export function isTerminalRunState(status: RunState): boolean {
  return status !== "running";
}

// A run left "running" on disk belongs to a process that died mid-run.
function recoverStaleLoadedRun(run: RunStatus): RunStatus {
  if (isTerminalRunState(run.status)) return run;
  const recoveredAt = nowIso();
  const recoveredSteps = { ...run.steps };

  for (const stepName of RUN_STEPS) {
    const step = recoveredSteps[stepName];
    if (step.status === "running") {
      recoveredSteps[stepName] = {
        ...step,
        status: "error",
        error: step.error ?? "Recovered after restart while run was active.",
        finishedAt: step.finishedAt ?? recoveredAt
      };
    }
  }

  return {
    ...run,
    status: "error",
    finishedAt: run.finishedAt ?? recoveredAt,
    error: run.error ?? { name: "Interrupted", message: "Run was interrupted before it finished." },
    steps: recoveredSteps
  };
}

function quietEmitter(): EventEmitter {
  const emitter = new EventEmitter();
  // Unobserved "error" events would otherwise throw.
  emitter.on("error", () => undefined);
  return emitter;
}

/**
 * Owns the run folders under one output root: allocates run ids, keeps each
 * run's `run.json` current and fans progress out to subscribers.
 */
export class RunManager {
  private runs = new Map<string, RunInternal>();
  readonly outputRoot: string;

  constructor(outputRoot: string) {
    this.outputRoot = outputRoot;
  }

  runDir(runId: string): string {
    return runDirAbs(this.outputRoot, runId);
  }

  async initFromDisk(): Promise<void> {
    await ensureDir(this.outputRoot);
    const entries = await fs.readdir(this.outputRoot, { withFileTypes: true });
    for (const ent of entries) {
      if (!ent.isDirectory() || this.runs.has(ent.name)) continue;
      const runJsonPath = path.join(this.runDir(ent.name), RUN_RECORD_FILE);
      const parsed = RunStatusSchema.safeParse(await tryReadJsonFile(runJsonPath));
      if (!parsed.success || parsed.data.runId !== ent.name) continue;
      const recovered = recoverStaleLoadedRun(parsed.data);
      if (recovered !== parsed.data) await writeJsonFile(runJsonPath, recovered);
      this.runs.set(ent.name, { ...recovered, emitter: quietEmitter() });
    }
  }

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map((r) => ({ runId: r.runId, inputPath: r.inputPath, status: r.status, startedAt: r.startedAt, finishedAt: r.finishedAt }))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : a.startedAt > b.startedAt ? -1 : a.runId < b.runId ? 1 : -1));
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    return r ? this.snapshot(r) : null;
  }

  // The non-recursive mkdir is the claim; whoever creates the folder owns the id.
  private async tryClaimRunDir(runId: string): Promise<boolean> {
    if (this.runs.has(runId)) return false;
    try {
      await fs.mkdir(this.runDir(runId));
      return true;
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") return false;
      throw err;
    }
  }

  private async claimRunId(inputPath: string, startedAt: Date): Promise<string> {
    await ensureDir(this.outputRoot);
    const base = `${utcStamp(startedAt)}_${slug(path.parse(inputPath).name)}`;
    if (await this.tryClaimRunDir(base)) return base;
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `${base}_${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (await this.tryClaimRunDir(runId)) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  async createRun(input: CreateRunInput): Promise<RunStatus> {
    const started = new Date();
    const runId = await this.claimRunId(input.inputPath, started);

    const steps = Object.fromEntries(
      RUN_STEPS.map((name): [StepName, StepRecord] => [name, { name, status: "pending", artifacts: [] }])
    );

    const run: RunInternal = {
      runId,
      inputPath: input.inputPath,
      provider: input.provider,
      model: input.model,
      status: "running",
      startedAt: started.toISOString(),
      attempts: 0,
      steps: RunStatusSchema.shape.steps.parse(steps),
      outputFolder: this.runDir(runId),
      emitter: quietEmitter()
    };

    this.runs.set(runId, run);
    await this.persist(run);
    return this.snapshot(run);
  }

  async setInputSnapshot(runId: string, name: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.inputSnapshot = name;
    await this.persist(r);
  }

  async setAttempts(runId: string, attempts: number): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.attempts = attempts;
    await this.persist(r);
  }

  async setRunStatus(runId: string, status: RunState, error?: unknown): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (isTerminalRunState(status)) r.finishedAt = nowIso();
    if (error !== undefined) {
      r.error = {
        name: error instanceof Error ? error.name : "Error",
        ...(hasCode(error) ? { code: error.code } : {}),
        message: toErrorMessage(error)
      };
    }
    await this.persist(r);
  }

  async startStep(runId: string, step: StepName): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = "running";
    s.startedAt = nowIso();
    await this.persist(r);
    r.emitter.emit("step_started", { step, at: s.startedAt });
  }

  async finishStep(runId: string, step: StepName, ok: boolean, error?: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = ok ? "done" : "error";
    s.finishedAt = nowIso();
    if (!ok && error) s.error = error;
    await this.persist(r);
    r.emitter.emit("step_finished", { step, at: s.finishedAt, ok });
    if (!ok && error) r.emitter.emit("error", { step, message: error, at: s.finishedAt });
  }

  async skipStep(runId: string, step: StepName): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.steps[step].status = "skipped";
    await this.persist(r);
  }

  async addArtifact(runId: string, step: StepName, name: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    if (!s.artifacts.includes(name)) s.artifacts.push(name);
    await this.persist(r);
    r.emitter.emit("artifact_written", { step, name, at: nowIso() });
  }

  /** Artifact names across all steps, in step order. */
  artifacts(runId: string): string[] {
    const r = this.runs.get(runId);
    if (!r) return [];
    return RUN_STEPS.flatMap((step) => r.steps[step].artifacts);
  }

  log(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("log", { message, step, at: nowIso() });
  }

  error(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("error", { message, step, at: nowIso() });
  }

  subscribe(runId: string, onEvent: (type: RunEventType, payload: unknown) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const handlers = RUN_EVENT_TYPES.map((type) => [type, (payload: unknown) => onEvent(type, payload)] as const);
    for (const [type, fn] of handlers) r.emitter.on(type, fn);

    return () => {
      for (const [type, fn] of handlers) r.emitter.off(type, fn);
    };
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, ...pub } = run;
    return structuredClone(pub);
  }

  private async persist(run: RunInternal): Promise<void> {
    await writeJsonFile(path.join(this.runDir(run.runId), RUN_RECORD_FILE), this.snapshot(run));
  }
}

function hasCode(err: unknown): err is { code: string } {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string";
}
