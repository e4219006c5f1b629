import { describeIssue, type ValidationIssue } from "./validation.js";

export const PROMPT_PLACEHOLDERS = ["request", "facts", "approved_defaults", "context", "ir_json"] as const;
export type PromptPlaceholder = (typeof PROMPT_PLACEHOLDERS)[number];

export type PromptBindings = Record<PromptPlaceholder, string>;

export type PromptInstance =
  | { kind: "initial"; bindings: PromptBindings; text: string }
  | { kind: "retry"; bindings: PromptBindings; text: string; missingItems: string[] };

const PLACEHOLDER_RE = new RegExp(`\\{(${PROMPT_PLACEHOLDERS.join("|")})\\}`, "g");

function isPlaceholder(name: string): name is PromptPlaceholder {
  return PROMPT_PLACEHOLDERS.some((p) => p === name);
}

/**
 * Single-pass substitution: each recognised `{name}` is replaced verbatim and
 * inserted values are never scanned again. Other braces are left untouched.
 */
export function packPrompt(template: string, bindings: PromptBindings): string {
  return template.replace(PLACEHOLDER_RE, (whole: string, name: string) => (isPlaceholder(name) ? bindings[name] : whole));
}

export function usedPlaceholders(template: string): PromptPlaceholder[] {
  const found = new Set<PromptPlaceholder>();
  for (const m of template.matchAll(PLACEHOLDER_RE)) {
    if (isPlaceholder(m[1])) found.add(m[1]);
  }
  return PROMPT_PLACEHOLDERS.filter((p) => found.has(p));
}

export function initialPrompt(template: string, bindings: PromptBindings): PromptInstance {
  return { kind: "initial", bindings, text: packPrompt(template, bindings) };
}

/**
 * Repair variant: the original prompt followed by the repair template with
 * `{missing_items}` bound to a bullet list.
 */
export function buildRepairPrompt(original: PromptInstance, repairTemplate: string, issues: ValidationIssue[]): PromptInstance {
  const missingItems = issues.map(describeIssue);
  const list = missingItems.map((item) => `- ${item}`).join("\n");
  const repair = repairTemplate.split("{missing_items}").join(list);
  return {
    kind: "retry",
    bindings: original.bindings,
    text: `${original.text.trimEnd()}\n\n---\n\n${repair.trim()}\n`,
    missingItems
  };
}
