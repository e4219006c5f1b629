import { describe, expect, it } from "vitest";
import { IrSchema, RUN_STEPS, RunStatusSchema } from "../src/pipeline/schemas.js";

function makeSteps() {
  return Object.fromEntries(RUN_STEPS.map((name) => [name, { name, status: "pending", artifacts: [] }]));
}

function makeRun(overrides: Record<string, unknown> = {}) {
  return {
    runId: "20261019T081502Z_widget",
    inputPath: "/in/widget.txt",
    provider: "stub",
    model: "gpt-4o-mini",
    status: "running",
    startedAt: "2026-10-19T08:15:02.000Z",
    attempts: 0,
    steps: makeSteps(),
    outputFolder: "/out/20261019T081502Z_widget",
    ...overrides
  };
}

describe("pipeline/schemas", () => {
  it("accepts a fresh run record", () => {
    expect(RunStatusSchema.safeParse(makeRun()).success).toBe(true);
  });

  it("rejects more than two generation attempts", () => {
    expect(RunStatusSchema.safeParse(makeRun({ attempts: 3 })).success).toBe(false);
  });

  it("rejects unknown run states and missing steps", () => {
    expect(RunStatusSchema.safeParse(makeRun({ status: "queued" })).success).toBe(false);
    const steps = makeSteps();
    delete steps.REPAIR;
    expect(RunStatusSchema.safeParse(makeRun({ steps })).success).toBe(false);
  });

  it("requires evidence on every IR fact", () => {
    const ir = {
      ir_version: "v1",
      source: { type: "text", path: "/in/widget.txt" },
      part: { name: null, units: null, name_source: null },
      materials: [{ value: "6061-T6 aluminum", evidence: "" }],
      tolerances: [],
      features: [],
      parameters: [],
      evidence: { notes: "" }
    };
    expect(IrSchema.safeParse(ir).success).toBe(false);
    expect(IrSchema.safeParse({ ...ir, materials: [{ value: "6061-T6 aluminum", evidence: "line 1" }] }).success).toBe(true);
  });
});
