import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { RUN_STEPS, RunManager } from "../src/run_manager.js";
import { RunStatusSchema } from "../src/pipeline/schemas.js";
import { MissingCorpusCategory } from "../src/errors.js";
import { makeTmpDir } from "./fixtures.js";

let tmpOut: string | null = null;

beforeEach(async () => {
  tmpOut = await makeTmpDir("partdoc-out-");
});

afterEach(async () => {
  vi.useRealTimers();
  if (tmpOut) await fs.rm(tmpOut, { recursive: true, force: true });
  tmpOut = null;
});

function outRoot(): string {
  if (!tmpOut) throw new Error("tmpOut not set");
  return tmpOut;
}

const input = { inputPath: "/in/Widget Housing.txt", provider: "stub", model: "m" };

describe("RunManager", () => {
  it("createRun names the run after the UTC time and input stem and writes run.json", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-10-19T08:15:02.345Z"));

    const runs = new RunManager(outRoot());
    const run = await runs.createRun(input);

    expect(run.runId).toBe("20261019T081502Z_widget-housing");
    expect(run.status).toBe("running");
    expect(run.attempts).toBe(0);
    expect(run.outputFolder).toBe(path.join(outRoot(), run.runId));

    const onDisk = RunStatusSchema.parse(JSON.parse(await fs.readFile(path.join(run.outputFolder, "run.json"), "utf8")));
    expect(onDisk.runId).toBe(run.runId);
    for (const s of RUN_STEPS) {
      expect(onDisk.steps[s]).toEqual({ name: s, status: "pending", artifacts: [] });
    }
  });

  it("adds a random suffix when the run folder already exists", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-10-19T08:15:02.000Z"));

    const runs = new RunManager(outRoot());
    const first = await runs.createRun(input);
    const second = await runs.createRun(input);

    expect(first.runId).toBe("20261019T081502Z_widget-housing");
    expect(second.runId).toMatch(/^20261019T081502Z_widget-housing_[a-z0-9]{4}$/);
  });

  it("gives concurrent runs with the same stem separate folders", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-10-19T08:15:02.000Z"));

    const runs = new RunManager(outRoot());
    const [a, b] = await Promise.all([
      runs.createRun({ ...input, inputPath: "/a/request.txt" }),
      runs.createRun({ ...input, inputPath: "/b/request.txt" })
    ]);

    expect(a.runId).not.toBe(b.runId);
    expect([a.runId, b.runId].sort()[0]).toBe("20261019T081502Z_request");
    expect(runs.listRuns()).toHaveLength(2);
    for (const run of [a, b]) {
      const onDisk = RunStatusSchema.parse(JSON.parse(await fs.readFile(path.join(run.outputFolder, "run.json"), "utf8")));
      expect(onDisk.inputPath).toBe(run.inputPath);
    }
  });

  it("does not reuse a folder claimed by another manager", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-10-19T08:15:02.000Z"));

    const [a, b] = await Promise.all([new RunManager(outRoot()).createRun(input), new RunManager(outRoot()).createRun(input)]);

    expect(a.runId).not.toBe(b.runId);
  });

  it("emits step + artifact events to subscribers", async () => {
    const runs = new RunManager(outRoot());
    const run = await runs.createRun(input);

    const events: Array<{ type: string; payload: unknown }> = [];
    const unsub = runs.subscribe(run.runId, (type, payload) => {
      events.push({ type, payload });
    });
    expect(unsub).toBeTypeOf("function");

    await runs.startStep(run.runId, "IR");
    await runs.addArtifact(run.runId, "IR", "ir.json");
    await runs.finishStep(run.runId, "IR", true);
    runs.log(run.runId, "hello", "IR");

    unsub?.();
    runs.log(run.runId, "after unsubscribe");

    expect(events.map((e) => e.type)).toEqual(["step_started", "artifact_written", "step_finished", "log"]);
    expect(runs.artifacts(run.runId)).toEqual(["ir.json"]);
    expect(runs.getRun(run.runId)?.steps.IR.status).toBe("done");
  });

  it("error events never crash the process when unobserved", async () => {
    const runs = new RunManager(outRoot());
    const run = await runs.createRun(input);
    expect(() => runs.error(run.runId, "boom")).not.toThrow();
  });

  it("records a failed step and the fatal error on the run", async () => {
    const runs = new RunManager(outRoot());
    const run = await runs.createRun(input);

    await runs.startStep(run.runId, "RETRIEVE");
    await runs.finishStep(run.runId, "RETRIEVE", false, "no exemplars");
    await runs.setRunStatus(run.runId, "error", new MissingCorpusCategory("exemplar", "/c/exemplars"));

    const loaded = runs.getRun(run.runId);
    expect(loaded?.status).toBe("error");
    expect(loaded?.finishedAt).toBeTypeOf("string");
    expect(loaded?.steps.RETRIEVE).toMatchObject({ status: "error", error: "no exemplars" });
    expect(loaded?.error).toEqual({
      name: "MissingCorpusCategory",
      code: "MISSING_CORPUS_CATEGORY",
      message: 'Corpus category "exemplar" has no files (/c/exemplars)'
    });
  });

  it("getRun returns a copy that callers cannot mutate", async () => {
    const runs = new RunManager(outRoot());
    const run = await runs.createRun(input);
    const copy = runs.getRun(run.runId);
    copy?.steps.IR.artifacts.push("tampered");
    expect(runs.getRun(run.runId)?.steps.IR.artifacts).toEqual([]);
  });

  it("initFromDisk loads prior runs and skips folders without a valid run.json", async () => {
    const runs1 = new RunManager(outRoot());
    const r1 = await runs1.createRun(input);
    await runs1.setRunStatus(r1.runId, "succeeded");
    await fs.mkdir(path.join(outRoot(), "not-a-run"));
    await fs.mkdir(path.join(outRoot(), "bad-json"));
    await fs.writeFile(path.join(outRoot(), "bad-json", "run.json"), "{", "utf8");

    const runs2 = new RunManager(outRoot());
    await runs2.initFromDisk();

    expect(runs2.listRuns().map((r) => r.runId)).toEqual([r1.runId]);
    expect(runs2.getRun(r1.runId)?.status).toBe("succeeded");
  });

  it("initFromDisk marks runs left running as error", async () => {
    const runs1 = new RunManager(outRoot());
    const r1 = await runs1.createRun(input);
    await runs1.startStep(r1.runId, "GENERATE");

    const runs2 = new RunManager(outRoot());
    await runs2.initFromDisk();

    const recovered = runs2.getRun(r1.runId);
    expect(recovered?.status).toBe("error");
    expect(recovered?.steps.GENERATE.status).toBe("error");
    expect(recovered?.error?.name).toBe("Interrupted");

    const onDisk = RunStatusSchema.parse(JSON.parse(await fs.readFile(path.join(r1.outputFolder, "run.json"), "utf8")));
    expect(onDisk.status).toBe("error");
  });

  it("listRuns returns newest first", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    const runs = new RunManager(outRoot());
    vi.setSystemTime(new Date("2026-10-19T08:00:00.000Z"));
    const older = await runs.createRun({ ...input, inputPath: "/in/a.txt" });
    vi.setSystemTime(new Date("2026-10-19T09:00:00.000Z"));
    const newer = await runs.createRun({ ...input, inputPath: "/in/b.txt" });

    expect(runs.listRuns().map((r) => r.runId)).toEqual([newer.runId, older.runId]);
  });
});
