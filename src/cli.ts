import { Command } from "commander";
import { readFileSync } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { createApp } from "./app.js";
import { loadConfig, type AppConfig } from "./config.js";
import { exportRunArchive, exportTargetPath } from "./export.js";
import { PartDocError } from "./errors.js";
import { runPartPipeline, type PipelineResult } from "./pipeline/part_pipeline.js";
import { toErrorMessage } from "./pipeline/utils.js";
import { RunManager, type RunEventType } from "./run_manager.js";
import { describeIssue } from "./pipeline/validation.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_VALIDATION_FAILED = 2;

export type CliIO = {
  log: (line: string) => void;
  error: (line: string) => void;
};

const consoleIO: CliIO = {
  log: (line) => console.log(line),
  error: (line) => console.error(line)
};

const PackageJsonSchema = z.object({ version: z.string() });

function packageVersion(): string {
  // src/cli.ts and dist/cli.ts both sit one level below package.json
  const here = path.dirname(fileURLToPath(import.meta.url));
  try {
    return PackageJsonSchema.parse(JSON.parse(readFileSync(path.join(here, "..", "package.json"), "utf8"))).version;
  } catch {
    return "0.0.0";
  }
}

export function exitCodeFor(status: PipelineResult["status"]): number {
  return status === "succeeded" ? EXIT_OK : EXIT_VALIDATION_FAILED;
}

function hints(err: unknown): string[] {
  if (!(err instanceof PartDocError)) return [];
  switch (err.code) {
    case "MISSING_CORPUS_CATEGORY":
      return ["Add at least one file to each of templates/, exemplars/, style_rules/ and glossary/ under the corpus root"];
    case "PROVIDER_UNAVAILABLE":
      return ["Set OPENAI_API_KEY, or run with PARTDOC_LLM_PROVIDER=stub"];
    case "CONFIG_INVALID":
      return ["Check configs/app.yaml (or the file named by --config / PARTDOC_CONFIG)"];
    case "INPUT_NOT_FOUND":
      return [];
  }
}

export function reportError(io: CliIO, err: unknown): void {
  io.error(`✗ ${toErrorMessage(err)}`);
  const next = hints(err);
  if (next.length > 0) {
    io.error("");
    for (const step of next) io.error(`→ ${step}`);
  }
}

function field(payload: unknown, key: string): string | undefined {
  if (typeof payload !== "object" || payload === null || !(key in payload)) return undefined;
  const value: unknown = Reflect.get(payload, key);
  return typeof value === "string" ? value : undefined;
}

export function formatRunEvent(type: RunEventType, payload: unknown): string | null {
  const step = field(payload, "step");
  const tag = `[${step ?? "run"}]`;
  switch (type) {
    case "step_started":
      return `${tag} started`;
    case "step_finished":
      return null;
    case "artifact_written":
      return `${tag} wrote ${field(payload, "name") ?? "?"}`;
    case "log":
    case "error":
      return `${tag} ${field(payload, "message") ?? ""}`.trimEnd();
  }
}

function printResult(io: CliIO, result: PipelineResult): void {
  io.log(`Run folder: ${result.runDir}`);
  io.log(`Status: ${result.status} (${result.generationCalls} generation call(s))`);
  io.log("Artifacts:");
  for (const name of result.artifacts) io.log(`  - ${name}`);
  if (result.issues.length > 0) {
    io.log("Remaining issues:");
    for (const issue of result.issues) io.log(`  - ${describeIssue(issue)}`);
  }
}

type CommonOptions = { config?: string; quiet?: boolean };

async function runOne(io: CliIO, inputPath: string, config: AppConfig, quiet: boolean | undefined): Promise<PipelineResult> {
  return await runPartPipeline({
    inputPath,
    config,
    onEvent: quiet
      ? undefined
      : (type, payload) => {
          const line = formatRunEvent(type, payload);
          if (line === null) return;
          if (type === "error") io.error(line);
          else io.log(line);
        }
  });
}

export function buildProgram(io: CliIO = consoleIO): Command {
  const program = new Command();

  program.name("partdoc").description("Grounded part-description generator").version(packageVersion());

  program
    .command("run")
    .description("Generate a part description for one input file")
    .argument("<input>", "Request text, markdown or NX Open Python file")
    .option("-c, --config <path>", "Config YAML (default: configs/app.yaml or PARTDOC_CONFIG)")
    .option("-q, --quiet", "Only print the result")
    .action(async (input: string, options: CommonOptions) => {
      try {
        const config = await loadConfig(options.config);
        const result = await runOne(io, input, config, options.quiet);
        printResult(io, result);
        process.exitCode = exitCodeFor(result.status);
      } catch (err) {
        reportError(io, err);
        process.exitCode = EXIT_FATAL;
      }
    });

  program
    .command("batch")
    .description("Run every file in a directory, in name order, one after another")
    .argument("<dir>", "Directory of input files")
    .option("-c, --config <path>", "Config YAML (default: configs/app.yaml or PARTDOC_CONFIG)")
    .option("-q, --quiet", "Only print the summary")
    .action(async (dir: string, options: CommonOptions) => {
      let config: AppConfig;
      let files: string[];
      try {
        config = await loadConfig(options.config);
        const entries = await fs.readdir(dir, { withFileTypes: true });
        files = entries
          .filter((ent) => ent.isFile() && !ent.name.startsWith("."))
          .map((ent) => ent.name)
          .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
      } catch (err) {
        reportError(io, err);
        process.exitCode = EXIT_FATAL;
        return;
      }

      let exitCode = EXIT_OK;
      const summary: string[] = [];
      for (const name of files) {
        try {
          const result = await runOne(io, path.join(dir, name), config, options.quiet);
          summary.push(`${name}\t${result.status}\t${result.runId}`);
          if (result.status !== "succeeded" && exitCode === EXIT_OK) exitCode = EXIT_VALIDATION_FAILED;
        } catch (err) {
          reportError(io, err);
          summary.push(`${name}\terror\t-`);
          exitCode = EXIT_FATAL;
        }
      }

      io.log(`Batch: ${files.length} file(s)`);
      for (const line of summary) io.log(`  ${line}`);
      process.exitCode = exitCode;
    });

  program
    .command("export")
    .description("Zip a run folder")
    .argument("<runId>", "Run id (folder name under the outputs root)")
    .argument("<dest>", "Destination .zip file or directory")
    .option("-c, --config <path>", "Config YAML (default: configs/app.yaml or PARTDOC_CONFIG)")
    .action(async (runId: string, dest: string, options: CommonOptions) => {
      try {
        const config = await loadConfig(options.config);
        const runs = new RunManager(config.outputRoot);
        const result = await exportRunArchive(runs.runDir(runId), exportTargetPath(dest, runId), (msg) => io.error(msg));
        io.log(`Exported ${result.file} (${result.bytes} bytes)`);
        process.exitCode = EXIT_OK;
      } catch (err) {
        reportError(io, err);
        process.exitCode = EXIT_FATAL;
      }
    });

  program
    .command("serve")
    .description("Start the HTTP API")
    .option("-c, --config <path>", "Config YAML (default: configs/app.yaml or PARTDOC_CONFIG)")
    .option("-p, --port <number>", "Port (default: PORT or 5050)")
    .action(async (options: CommonOptions & { port?: string }) => {
      try {
        const config = await loadConfig(options.config);
        const runs = new RunManager(config.outputRoot);
        await runs.initFromDisk();
        const port = portFrom(options.port ?? process.env.PORT);
        createApp(runs, config).listen(port, () => {
          io.log(`server listening on http://localhost:${port} (provider: ${config.provider})`);
        });
      } catch (err) {
        reportError(io, err);
        process.exitCode = EXIT_FATAL;
      }
    });

  return program;
}

export function portFrom(raw: string | undefined): number {
  const port = raw ? Number(raw) : 5050;
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : 5050;
}
