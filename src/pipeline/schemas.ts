import { z } from "zod";

export const IrSourceTypeSchema = z.enum(["text", "markdown", "nxopen_python", "unknown"]);
export type IrSourceType = z.infer<typeof IrSourceTypeSchema>;

const EvidenceString = z.string().min(1);

export const IrSchema = z.object({
  ir_version: z.literal("v1"),
  source: z.object({
    type: IrSourceTypeSchema,
    path: z.string()
  }),
  part: z.object({
    name: z.string().min(1).nullable(),
    units: z.enum(["mm", "in"]).nullable(),
    name_source: z.string().nullable()
  }),
  materials: z.array(z.object({ value: z.string().min(1), evidence: EvidenceString })),
  tolerances: z.array(z.object({ value: z.string().min(1), evidence: EvidenceString })),
  features: z.array(z.object({ kind: z.string().min(1), evidence: EvidenceString })),
  parameters: z.array(z.object({ name: z.string().min(1), value: z.string(), evidence: EvidenceString })),
  evidence: z.object({ notes: z.string() })
});

export type Ir = z.infer<typeof IrSchema>;

export const RUN_STEPS = ["SNAPSHOT", "IR", "RETRIEVE", "PROMPT", "GENERATE", "VALIDATE", "REPAIR", "PERSIST"] as const;

export const StepNameSchema = z.enum(RUN_STEPS);
export type StepName = z.infer<typeof StepNameSchema>;

export const StepRecordSchema = z.object({
  name: StepNameSchema,
  status: z.enum(["pending", "running", "done", "skipped", "error"]),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  error: z.string().optional(),
  artifacts: z.array(z.string())
});

export type StepRecord = z.infer<typeof StepRecordSchema>;

export const RunStateSchema = z.enum(["running", "succeeded", "validation_failed", "error"]);
export type RunState = z.infer<typeof RunStateSchema>;

export const RunStatusSchema = z.object({
  runId: z.string().min(1),
  inputPath: z.string(),
  inputSnapshot: z.string().optional(),
  provider: z.string(),
  model: z.string(),
  status: RunStateSchema,
  startedAt: z.string(),
  finishedAt: z.string().optional(),
  error: z
    .object({
      name: z.string(),
      code: z.string().optional(),
      message: z.string()
    })
    .optional(),
  attempts: z.number().int().min(0).max(2),
  steps: z.object({
    SNAPSHOT: StepRecordSchema,
    IR: StepRecordSchema,
    RETRIEVE: StepRecordSchema,
    PROMPT: StepRecordSchema,
    GENERATE: StepRecordSchema,
    VALIDATE: StepRecordSchema,
    REPAIR: StepRecordSchema,
    PERSIST: StepRecordSchema
  }),
  outputFolder: z.string()
});

export type RunStatus = z.infer<typeof RunStatusSchema>;
