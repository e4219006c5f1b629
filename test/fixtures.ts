import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { resolveConfig, type AppConfig } from "../src/config.js";
import type { GenerationProvider, GenerationResult, ModelConfig } from "../src/pipeline/providers/index.js";
import { repoRoot } from "../src/pipeline/utils.js";

export type CorpusDir = "templates" | "exemplars" | "style_rules" | "glossary";
export type CorpusFiles = Record<CorpusDir, Record<string, string>>;

export const WIDGET_EXEMPLAR = [
  "# Exemplar: widget housing",
  "",
  "## Materials & tolerances",
  "- Housing machined from 6061-T6 aluminum.",
  "",
  "## Vibration reliability practices",
  "- M5 fasteners with blue threadlocker at every mounting point.",
  ""
].join("\n");

export function defaultCorpus(): CorpusFiles {
  return {
    templates: { "part.md": "# <Part>\n\n## Overview\n\n## Materials & tolerances\n\n## Vibration reliability practices\n" },
    exemplars: { "01_widget.md": WIDGET_EXEMPLAR },
    style_rules: { "style.md": "Plain, factual sentences.\n" },
    glossary: { "terms.md": "Threadlocker: thread adhesive.\n" }
  };
}

export async function makeTmpDir(prefix: string): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeCorpus(root: string, files: CorpusFiles): Promise<void> {
  for (const [dir, entries] of Object.entries(files)) {
    await fs.mkdir(path.join(root, dir), { recursive: true });
    for (const [name, content] of Object.entries(entries)) {
      await fs.writeFile(path.join(root, dir, name), content, "utf8");
    }
  }
}

/** Temp workspace with a corpus, an outputs root and the shipped prompt templates. */
export async function makeWorkspace(files: CorpusFiles = defaultCorpus()): Promise<{ root: string; config: AppConfig }> {
  const root = await makeTmpDir("partdoc-ws-");
  await writeCorpus(path.join(root, "corpus"), files);
  const config = resolveConfig(
    {
      paths: {
        corpus: "corpus",
        outputs: "runs",
        prompt_template: path.join(repoRoot(), "configs/prompts/part_description.md"),
        repair_template: path.join(repoRoot(), "configs/prompts/part_description_repair.md")
      }
    },
    { env: {}, baseDir: root }
  );
  return { root, config };
}

export async function writeInput(root: string, name: string, text: string): Promise<string> {
  const p = path.join(root, name);
  await fs.writeFile(p, text, "utf8");
  return p;
}

/** Returns canned outputs in order and records every prompt it was given. */
export class ScriptedProvider implements GenerationProvider {
  readonly name = "stub" as const;
  readonly prompts: string[] = [];
  private readonly outputs: string[];

  constructor(outputs: string[]) {
    this.outputs = outputs;
  }

  async generate(promptText: string, config: ModelConfig): Promise<GenerationResult> {
    const text = this.outputs[Math.min(this.prompts.length, this.outputs.length - 1)];
    this.prompts.push(promptText);
    return { text, metadata: { provider: this.name, model: config.model, maxTokens: config.maxTokens, latencyMs: 0 } };
  }
}

export function markdown(sections: Record<string, string>): string {
  return Object.entries(sections)
    .map(([heading, body]) => `## ${heading}\n\n${body}\n`)
    .join("\n");
}
