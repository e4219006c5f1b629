import { describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { buildRepairPrompt, initialPrompt, packPrompt, usedPlaceholders, type PromptBindings } from "../src/pipeline/prompt.js";
import { repoRoot } from "../src/pipeline/utils.js";

const bindings: PromptBindings = {
  request: "widget housing",
  facts: "- Part name: widget housing",
  approved_defaults: "EXEMPLARS",
  context: "CONTEXT",
  ir_json: "{}"
};

describe("packPrompt", () => {
  it("substitutes every known placeholder verbatim", () => {
    const out = packPrompt("R={request}|F={facts}|A={approved_defaults}|C={context}|J={ir_json}|R2={request}", bindings);
    expect(out).toBe("R=widget housing|F=- Part name: widget housing|A=EXEMPLARS|C=CONTEXT|J={}|R2=widget housing");
  });

  it("leaves unknown braces alone", () => {
    expect(packPrompt("{unknown} {request} {}", bindings)).toBe("{unknown} widget housing {}");
  });

  it("never expands placeholders that arrive inside a value", () => {
    const out = packPrompt("{request} / {context}", { ...bindings, request: "see {context}", context: "$& and $1" });
    expect(out).toBe("see {context} / $& and $1");
  });

  it("lists the placeholders a template uses", () => {
    expect(usedPlaceholders("{context} {request} {context} {nope}")).toEqual(["request", "context"]);
  });
});

describe("buildRepairPrompt", () => {
  it("appends the repair template with the issues as a bullet list", () => {
    const initial = initialPrompt("Write it.\n\nREQUEST:\n{request}\n", bindings);
    const retry = buildRepairPrompt(initial, "Fix these:\n{missing_items}\n", [
      { kind: "MissingSection", section: "Overview", reason: "absent" },
      { kind: "UnsupportedClaim", phrase: "industry-leading" }
    ]);

    expect(retry.kind).toBe("retry");
    expect(retry.text).toBe(
      [
        "Write it.",
        "",
        "REQUEST:",
        "widget housing",
        "",
        "---",
        "",
        "Fix these:",
        '- MissingSection(Overview): add the heading "## Overview" with content below it',
        "- UnsupportedClaim(industry-leading): remove this phrase; it is not supported by the provided input",
        ""
      ].join("\n")
    );
    expect(retry.kind === "retry" ? retry.missingItems : []).toHaveLength(2);
    expect(retry.bindings).toEqual(bindings);
  });

  it("works with the shipped templates", async () => {
    const template = await fs.readFile(path.join(repoRoot(), "configs/prompts/part_description.md"), "utf8");
    const repair = await fs.readFile(path.join(repoRoot(), "configs/prompts/part_description_repair.md"), "utf8");

    expect(usedPlaceholders(template)).toEqual(["request", "facts", "approved_defaults", "context"]);
    const initial = initialPrompt(template, bindings);
    expect(initial.text).toContain("REQUEST:\nwidget housing\n");

    const retry = buildRepairPrompt(initial, repair, [{ kind: "MissingSection", section: "Overview", reason: "empty" }]);
    expect(retry.text.startsWith(initial.text.trimEnd())).toBe(true);
    expect(retry.text).toContain('- MissingSection(Overview): the section "## Overview" is empty\n');
    expect(retry.text).not.toContain("{missing_items}");
  });
});
