import { FACT_SECTIONS, FALLBACK_PHRASE, REQUIRED_SECTIONS, extractExemplarFacts, type RequiredSection } from "../validation.js";
import type { GenerationProvider, GenerationResult, ModelConfig } from "./types.js";

const REQUEST_MARKER = "REQUEST:";
const EXEMPLAR_BLOCK_RE = /^### EXEMPLAR: [^\n]*\n([\s\S]*?)\n---$/gm;

function requestLine(prompt: string): string | null {
  const idx = prompt.indexOf(REQUEST_MARKER);
  if (idx === -1) return null;
  const line = prompt
    .slice(idx + REQUEST_MARKER.length)
    .split("\n")
    .map((l) => l.trim())
    .find((l) => l.length > 0);
  return line ?? null;
}

function exemplarBlocks(prompt: string): string[] {
  return [...prompt.matchAll(EXEMPLAR_BLOCK_RE)].map((m) => m[1]);
}

/**
 * Lines of the exemplars that carry at least one recognised fact, grouped
 * under the section where the line's first fact belongs.
 */
function factLinesBySection(prompt: string): Map<RequiredSection, string[]> {
  const bySection = new Map<RequiredSection, string[]>(REQUIRED_SECTIONS.map((s) => [s, []]));
  const seen = new Set<string>();

  for (const block of exemplarBlocks(prompt)) {
    for (const raw of block.split("\n")) {
      const line = raw.replace(/^\s*(?:#+|[-*]|\d+\.)\s+/, "").trim();
      if (!line || seen.has(line)) continue;
      const facts = extractExemplarFacts(line);
      if (facts.length === 0) continue;
      seen.add(line);
      bySection.get(FACT_SECTIONS[facts[0].category])?.push(line);
    }
  }
  return bySection;
}

function bullets(lines: string[] | undefined): string {
  if (!lines || lines.length === 0) return `- ${FALLBACK_PHRASE}`;
  return lines.map((l) => `- ${l}`).join("\n");
}

/**
 * Offline backend. Output depends only on the prompt text: the request line
 * becomes the overview and exemplar lines that carry facts are echoed into
 * their sections. Sections with nothing to echo get the fallback phrase.
 */
export function renderStubMarkdown(prompt: string): string {
  const request = requestLine(prompt);
  const bySection = factLinesBySection(prompt);
  const title = request ?? "Part";

  return [
    `# Part description: ${title}`,
    "",
    "## Overview",
    "",
    request ? `${request}. Details below are restricted to the provided input and approved defaults.` : FALLBACK_PHRASE,
    "",
    "## Materials & tolerances",
    "",
    bullets(bySection.get("Materials & tolerances")),
    "",
    "## Vibration reliability practices",
    "",
    bullets(bySection.get("Vibration reliability practices")),
    ""
  ].join("\n");
}

export class StubProvider implements GenerationProvider {
  readonly name = "stub" as const;

  async generate(promptText: string, config: ModelConfig): Promise<GenerationResult> {
    const started = Date.now();
    const text = renderStubMarkdown(promptText);
    return {
      text,
      metadata: {
        provider: this.name,
        model: config.model,
        maxTokens: config.maxTokens,
        latencyMs: Date.now() - started
      }
    };
  }
}
