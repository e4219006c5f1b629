import express from "express";
import cors from "cors";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import archiver from "archiver";
import { z } from "zod";
import type { AppConfig } from "./config.js";
import { MissingCorpusCategory, PartDocError, ProviderUnavailable } from "./errors.js";
import type { RunManager } from "./run_manager.js";
import { runPartPipeline } from "./pipeline/part_pipeline.js";
import { createProvider, type GenerationProvider } from "./pipeline/providers/index.js";
import { isSafeArtifactName, resolveArtifactPathAbs, toErrorMessage, writeTextFile } from "./pipeline/utils.js";

const CreateRunBodySchema = z
  .object({
    request: z.string().trim().min(1).max(20000),
    filename: z
      .string()
      .trim()
      .regex(/^[A-Za-z0-9._-]+\.(txt|md|py)$/, "filename must be a plain .txt, .md or .py name")
      .optional()
  })
  .strict();

export type AppOptions = {
  /** Backend used for runs started over HTTP; defaults to the configured one. */
  providerFactory?: (config: AppConfig) => GenerationProvider;
};

function errorBody(err: unknown) {
  return {
    error: {
      name: err instanceof Error ? err.name : "Error",
      ...(err instanceof PartDocError ? { code: err.code } : {}),
      message: toErrorMessage(err)
    }
  };
}

function statusForError(err: unknown): number {
  if (err instanceof MissingCorpusCategory) return 422;
  if (err instanceof ProviderUnavailable) return 503;
  return 500;
}

export function createApp(runs: RunManager, config: AppConfig, options: AppOptions = {}) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));
  const providerFactory = options.providerFactory ?? createProvider;

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      provider: config.provider,
      model: config.model,
      hasKey: Boolean(config.apiKey),
      corpusRoot: config.corpusRoot
    });
  });

  app.post("/api/runs", async (req, res) => {
    const parsed = CreateRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "partdoc-request-"));
    try {
      const inputPath = path.join(tmpDir, parsed.data.filename ?? "request.txt");
      await writeTextFile(inputPath, parsed.data.request);
      const result = await runPartPipeline({ inputPath, config, provider: providerFactory(config), runs });
      res.json({
        runId: result.runId,
        status: result.status,
        artifacts: result.artifacts,
        generationCalls: result.generationCalls,
        issues: result.issues,
        run: result.run
      });
    } catch (err) {
      res.status(statusForError(err)).json(errorBody(err));
    } finally {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });

  app.get("/api/runs", (_req, res) => {
    res.json(runs.listRuns());
  });

  app.get("/api/runs/:runId", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(run);
  });

  app.get("/api/runs/:runId/export", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="run-${runId}.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      runs.log(runId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      runs.error(runId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.directory(runs.runDir(runId), false);
    void archive.finalize();
  });

  app.get("/api/runs/:runId/artifacts", async (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const dir = runs.runDir(runId);
    const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
    const infos: Array<{ name: string; size: number; mtimeMs: number }> = [];
    for (const ent of entries) {
      if (!ent.isFile() || !isSafeArtifactName(ent.name)) continue;
      const st = await fs.stat(path.join(dir, ent.name)).catch(() => null);
      if (st) infos.push({ name: ent.name, size: st.size, mtimeMs: st.mtimeMs });
    }
    infos.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    res.json(infos);
  });

  app.get("/api/runs/:runId/artifacts/:name", async (req, res) => {
    const runId = req.params.runId;
    const name = req.params.name;

    if (!isSafeArtifactName(name)) {
      res.status(400).send("invalid artifact name");
      return;
    }

    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).send("run not found");
      return;
    }

    const filePath = await resolveArtifactPathAbs(runs.outputRoot, runId, name);
    if (!filePath) {
      res.status(404).send("artifact not found");
      return;
    }

    try {
      const data = await fs.readFile(filePath);
      const lower = name.toLowerCase();
      if (lower.endsWith(".json")) res.setHeader("Content-Type", "application/json; charset=utf-8");
      else if (lower.endsWith(".md")) res.setHeader("Content-Type", "text/markdown; charset=utf-8");
      else res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.send(data);
    } catch {
      res.status(404).send("artifact not found");
    }
  });

  return app;
}
