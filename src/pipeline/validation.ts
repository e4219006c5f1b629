export const REQUIRED_SECTIONS = ["Overview", "Materials & tolerances", "Vibration reliability practices"] as const;
export type RequiredSection = (typeof REQUIRED_SECTIONS)[number];

export const FALLBACK_PHRASE = "Not specified in provided input";

export type FactCategory = "material" | "tolerance" | "torque" | "fastener" | "fastening_practice";

export type ExemplarFact = {
  category: FactCategory;
  value: string;
};

/** Section in which a fact of each category is expected (or excused). */
export const FACT_SECTIONS: Record<FactCategory, RequiredSection> = {
  material: "Materials & tolerances",
  tolerance: "Materials & tolerances",
  torque: "Vibration reliability practices",
  fastener: "Vibration reliability practices",
  fastening_practice: "Vibration reliability practices"
};

const FACT_PATTERNS: Array<[FactCategory, RegExp]> = [
  [
    "material",
    /\b(?:(?:6061|7075|2024|5052)[-\s]?T\d{1,3}(?:\s+(?:aluminum|aluminium))?|(?:303|304|316)\s+stainless\s+steel|stainless\s+steel|titanium\s+grade\s+\d+|inconel\s+\d+)\b/gi
  ],
  ["tolerance", /±\s*\d+(?:\.\d+)?\s*(?:mm|in)\b/gi],
  ["torque", /\b\d+(?:\.\d+)?\s*N[·. ]?m\b/gi],
  ["fastener", /\bM\d+(?:\.\d+)?\s+(?:fasteners?|screws?|bolts?|socket head cap screws)\b/gi],
  [
    "fastening_practice",
    /\b(?:(?:blue|red|medium[- ]strength)\s+)?threadlocker\b|\banti-seize\b|\bsafety wire\b|\bnylon[- ]insert lock ?nuts?\b|\bsplit lock washers?\b/gi
  ]
];

export type ValidationIssue =
  | { kind: "MissingSection"; section: RequiredSection; reason: "absent" | "duplicated" | "empty" }
  | { kind: "OmittedExemplarFact"; value: string; category: FactCategory; section: RequiredSection }
  | { kind: "UnsupportedClaim"; phrase: string };

export type ValidationOutcome = { status: "pass" | "fail"; issues: ValidationIssue[] };

export type ValidationInput = {
  /** Facts drawn from the selected exemplars. */
  facts: ExemplarFact[];
  /** Everything the prompt was built from: request, facts, context, exemplars. */
  sourceText: string;
  disallowedPhrases: readonly string[];
};

/** Lowercase, collapse whitespace, unify hyphen/space variants so "6061 T6" matches "6061-T6". */
export function normalizeForMatch(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‐‑‒–—]/g, "-")
    .replace(/[-\s]+/g, " ")
    .replace(/\s*±\s*/g, "±")
    .trim();
}

export function extractExemplarFacts(exemplarText: string): ExemplarFact[] {
  const hits: Array<ExemplarFact & { index: number }> = [];
  for (const [category, re] of FACT_PATTERNS) {
    for (const m of exemplarText.matchAll(re)) {
      hits.push({ category, value: m[0].replace(/\s+/g, " ").trim(), index: m.index ?? 0 });
    }
  }
  hits.sort((a, b) => a.index - b.index);

  const seen = new Set<string>();
  const out: ExemplarFact[] = [];
  for (const hit of hits) {
    const key = normalizeForMatch(hit.value);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push({ category: hit.category, value: hit.value });
  }
  return out;
}

function headingLine(section: RequiredSection): string {
  return `## ${section}`;
}

/**
 * Splits markdown into top-level (`## `) sections keyed by heading line.
 * Repeated headings keep every occurrence.
 */
export function splitSections(markdown: string): Array<{ heading: string; body: string }> {
  const lines = markdown.replace(/\r\n/g, "\n").split("\n");
  const sections: Array<{ heading: string; body: string }> = [];
  let current: { heading: string; body: string[] } | null = null;

  for (const line of lines) {
    if (line.startsWith("## ")) {
      if (current) sections.push({ heading: current.heading, body: current.body.join("\n").trim() });
      current = { heading: line.trim(), body: [] };
      continue;
    }
    current?.body.push(line);
  }
  if (current) sections.push({ heading: current.heading, body: current.body.join("\n").trim() });
  return sections;
}

export function sectionBody(markdown: string, section: RequiredSection): string | null {
  const match = splitSections(markdown).find((s) => s.heading === headingLine(section));
  return match ? match.body : null;
}

function checkStructure(text: string): ValidationIssue[] {
  const sections = splitSections(text);
  const issues: ValidationIssue[] = [];
  for (const section of REQUIRED_SECTIONS) {
    const matches = sections.filter((s) => s.heading === headingLine(section));
    if (matches.length === 0) issues.push({ kind: "MissingSection", section, reason: "absent" });
    else if (matches.length > 1) issues.push({ kind: "MissingSection", section, reason: "duplicated" });
    else if (matches[0].body.length === 0) issues.push({ kind: "MissingSection", section, reason: "empty" });
  }
  return issues;
}

function checkExemplarCoverage(text: string, facts: ExemplarFact[]): ValidationIssue[] {
  const normalized = normalizeForMatch(text);
  const issues: ValidationIssue[] = [];
  for (const fact of facts) {
    if (normalized.includes(normalizeForMatch(fact.value))) continue;
    const section = FACT_SECTIONS[fact.category];
    const body = sectionBody(text, section);
    if (body !== null && body.includes(FALLBACK_PHRASE)) continue;
    issues.push({ kind: "OmittedExemplarFact", value: fact.value, category: fact.category, section });
  }
  return issues;
}

function checkUnsupportedClaims(text: string, sourceText: string, phrases: readonly string[]): ValidationIssue[] {
  const out = text.toLowerCase();
  const source = sourceText.toLowerCase();
  return phrases
    .filter((phrase) => out.includes(phrase.toLowerCase()) && !source.includes(phrase.toLowerCase()))
    .map((phrase): ValidationIssue => ({ kind: "UnsupportedClaim", phrase }));
}

export function validateOutput(text: string, input: ValidationInput): ValidationOutcome {
  const issues = [
    ...checkStructure(text),
    ...checkExemplarCoverage(text, input.facts),
    ...checkUnsupportedClaims(text, input.sourceText, input.disallowedPhrases)
  ];
  return issues.length === 0 ? { status: "pass", issues: [] } : { status: "fail", issues };
}

export function describeIssue(issue: ValidationIssue): string {
  switch (issue.kind) {
    case "MissingSection":
      return issue.reason === "absent"
        ? `MissingSection(${issue.section}): add the heading "## ${issue.section}" with content below it`
        : issue.reason === "duplicated"
          ? `MissingSection(${issue.section}): the heading "## ${issue.section}" must appear exactly once`
          : `MissingSection(${issue.section}): the section "## ${issue.section}" is empty`;
    case "OmittedExemplarFact":
      return `OmittedExemplarFact(${issue.value}): mention it in "## ${issue.section}" or write "${FALLBACK_PHRASE}" there`;
    case "UnsupportedClaim":
      return `UnsupportedClaim(${issue.phrase}): remove this phrase; it is not supported by the provided input`;
  }
}
