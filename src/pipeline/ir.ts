import path from "node:path";
import { IrSchema, type Ir, type IrSourceType } from "./schemas.js";

export const NOT_DETECTED = "Not detected";

const SOURCE_TYPES_BY_EXT: Record<string, IrSourceType> = {
  ".txt": "text",
  ".md": "markdown",
  ".py": "nxopen_python"
};

export function detectInputType(filePath: string): IrSourceType {
  return SOURCE_TYPES_BY_EXT[path.extname(filePath).toLowerCase()] ?? "unknown";
}

const IMPORT_NXOPEN_RE = /^\s*(import\s+NXOpen|from\s+NXOpen\b)/im;

const UNITS_ENUM_MM_RE = /NXOpen\.\w*\.Units\.(Millimeters|Millimetres)\b/i;
const UNITS_ENUM_IN_RE = /NXOpen\.\w*\.Units\.Inches\b/i;
const UNITS_ASSIGN_MM_RE = /\bPartUnits\s*=\s*.*Millimeters\b/i;
const UNITS_ASSIGN_IN_RE = /\bPartUnits\s*=\s*.*Inches\b/i;
const UNITS_MM_RE = /\b(Millimeters|Millimetres|mm)\b/i;
const UNITS_IN_RE = /\b(Inches|inch|in)\b/i;

const PART_NAME_SET_RE = /\b(SetPartName|SetName)\s*\(\s*['"]([^'"]+)['"]\s*\)/;
const PART_NAME_COMMENT_RE = /^\s*#\s*Part\s*[:=]\s*(.+?)\s*$/im;

const MATERIAL_RE = /\b(6061[-\s]?T6|7075[-\s]?T6|stainless\s+steel|steel|aluminum|aluminium|titanium|inconel)\b/i;
const MATERIAL_API_RE = /(LoadFromLibrary|FindMaterial|AssignMaterial)\s*\(/i;

const TOL_PM_RE = /±\s*\d+(?:\.\d+)?\s*(?:mm|in)?\b/i;
const TOL_PLUS_MINUS_RE = /\+\s*\d+(?:\.\d+)?\s*\/\s*-\s*\d+(?:\.\d+)?\s*(?:mm|in)?\b/i;
const TOL_API_RE = /\b(Tolerance|PlusMinus|SetTolerance|ToleranceType)\b/i;

const FEATURE_BUILDERS: Array<[kind: string, re: RegExp]> = [
  ["hole", /\b(CreateHoleBuilder|HoleBuilder)\b/],
  ["fillet", /\b(CreateEdgeBlendBuilder|EdgeBlendBuilder)\b/],
  ["chamfer", /\b(CreateChamferBuilder|ChamferBuilder)\b/],
  ["block", /\b(CreateBlockFeatureBuilder|BlockFeatureBuilder|CreateBlockBuilder)\b/],
  ["extrude", /\b(CreateExtrudeBuilder|ExtrudeBuilder)\b/],
  ["revolve", /\b(CreateRevolveBuilder|RevolveBuilder)\b/],
  ["sketch", /\b(CreateSketch|SketchBuilder)\b/],
  ["pocket", /\b(CreatePocketBuilder|PocketBuilder)\b/],
  ["pattern", /\b(CreatePatternFeatureBuilder|PatternFeatureBuilder)\b/]
];

// e.g. `holeBuilder.Diameter.RightHandSide = "10"`
const PARAM_ASSIGN_RE = /(\b[A-Za-z_]\w*(?:\.[A-Za-z_]\w*){1,6})\s*=\s*(["'][^"']+["']|\d+(?:\.\d+)?)/;
const GEOMETRY_PARAM_HINTS = ["diam", "radius", "length", "width", "height", "thick", "tol", "angle"];

export function looksLikeNxOpenPython(text: string): boolean {
  return IMPORT_NXOPEN_RE.test(text);
}

function lineEvidence(lineNo: number, line: string): string {
  return `L${lineNo}: ${line.trim()}`;
}

function detectUnits(text: string): "mm" | "in" | null {
  if (UNITS_ENUM_MM_RE.test(text) || UNITS_ASSIGN_MM_RE.test(text)) return "mm";
  if (UNITS_ENUM_IN_RE.test(text) || UNITS_ASSIGN_IN_RE.test(text)) return "in";
  // Plain tokens are weaker evidence.
  if (UNITS_MM_RE.test(text)) return "mm";
  if (UNITS_IN_RE.test(text)) return "in";
  return null;
}

function detectPartName(text: string, sourcePath: string): { name: string | null; source: string | null } {
  const setter = PART_NAME_SET_RE.exec(text);
  if (setter) return { name: setter[2].trim(), source: `call:${setter[1]}(...)` };

  const comment = PART_NAME_COMMENT_RE.exec(text);
  if (comment) return { name: comment[1].trim(), source: "comment:# Part: ..." };

  const stem = path.parse(sourcePath).name;
  if (stem) return { name: stem, source: "fallback:file_stem" };
  return { name: null, source: null };
}

function emptyIr(sourcePath: string, sourceType: IrSourceType): Ir {
  return {
    ir_version: "v1",
    source: { type: sourceType, path: sourcePath },
    part: { name: null, units: null, name_source: null },
    materials: [],
    tolerances: [],
    features: [],
    parameters: [],
    evidence: { notes: "" }
  };
}

function extractFromNxOpen(text: string, ir: Ir): Ir {
  const partName = detectPartName(text, ir.source.path);
  ir.part = { name: partName.name, units: detectUnits(text), name_source: partName.source };

  const lines = text.split("\n");
  lines.forEach((line, i) => {
    if (!line.trim()) return;
    const evidence = lineEvidence(i + 1, line);

    const feature = FEATURE_BUILDERS.find(([, re]) => re.test(line));
    if (feature) ir.features.push({ kind: feature[0], evidence });

    const material = MATERIAL_RE.exec(line);
    if (material || MATERIAL_API_RE.test(line)) {
      ir.materials.push({ value: material ? material[0] : "material_api_call", evidence });
    }

    const pm = TOL_PM_RE.exec(line);
    const plusMinus = TOL_PLUS_MINUS_RE.exec(line);
    if (pm || plusMinus || TOL_API_RE.test(line)) {
      const value = pm ? pm[0].trim() : plusMinus ? plusMinus[0].trim() : "tolerance_api_usage";
      ir.tolerances.push({ value, evidence });
    }

    const assign = PARAM_ASSIGN_RE.exec(line);
    if (assign) {
      const lhs = assign[1];
      const rhs = assign[2].trim().replace(/^["']|["']$/g, "");
      if (GEOMETRY_PARAM_HINTS.some((hint) => lhs.toLowerCase().includes(hint))) {
        ir.parameters.push({ name: lhs, value: rhs, evidence });
      }
    }
  });

  ir.evidence.notes =
    "IR extracted from NX Open Python with a heuristic line parser. " +
    "Features, materials and tolerances are best-effort and backed by line evidence.";
  return ir;
}

/**
 * Conservative fact extraction: only emits what the input text supports.
 * Plain-text requests yield a part name (first non-empty line) and nothing else.
 */
export function extractIr(rawText: string, options: { sourcePath: string; sourceType: IrSourceType }): Ir {
  const text = rawText.replace(/\r\n/g, "\n");
  const ir = emptyIr(options.sourcePath, options.sourceType);

  if (options.sourceType === "nxopen_python" || looksLikeNxOpenPython(text)) {
    return IrSchema.parse(extractFromNxOpen(text, ir));
  }

  const firstLine = text.split("\n").find((line) => line.trim().length > 0);
  if (firstLine) ir.part = { name: firstLine.trim(), units: null, name_source: "first_line" };

  ir.evidence.notes =
    "IR extracted from plain text. Materials, tolerances and features are not inferred from free text.";
  return IrSchema.parse(ir);
}

export function formatIrFacts(ir: Ir): string {
  const lines = [`- Part name: ${ir.part.name ?? NOT_DETECTED}`, `- Units: ${ir.part.units ?? NOT_DETECTED}`];

  if (ir.materials.length === 0) lines.push(`- Material: ${NOT_DETECTED}`);
  for (const m of ir.materials) lines.push(`- Material: ${m.value}  [evidence: ${m.evidence}]`);

  if (ir.tolerances.length === 0) lines.push(`- Tolerance: ${NOT_DETECTED}`);
  for (const t of ir.tolerances) lines.push(`- Tolerance: ${t.value}  [evidence: ${t.evidence}]`);

  if (ir.features.length === 0) lines.push(`- Feature: ${NOT_DETECTED}`);
  for (const f of ir.features) lines.push(`- Feature: ${f.kind}  [evidence: ${f.evidence}]`);

  return lines.join("\n");
}

function listOrNone<T>(items: T[], render: (item: T) => string): string[] {
  return items.length > 0 ? items.map(render) : ["- (none)"];
}

export function renderIrSummary(ir: Ir): string {
  return [
    `IR version: ${ir.ir_version}`,
    `Source: ${ir.source.type}  (${ir.source.path})`,
    "",
    `Part name: ${ir.part.name ?? NOT_DETECTED}`,
    `Units: ${ir.part.units ?? NOT_DETECTED}`,
    "",
    "Materials:",
    ...listOrNone(ir.materials, (m) => `- ${m.value}  [${m.evidence}]`),
    "",
    "Tolerances:",
    ...listOrNone(ir.tolerances, (t) => `- ${t.value}  [${t.evidence}]`),
    "",
    "Features:",
    ...listOrNone(ir.features, (f) => `- ${f.kind}  [${f.evidence}]`),
    "",
    "Parameters:",
    ...listOrNone(ir.parameters, (p) => `- ${p.name} = ${p.value}  [${p.evidence}]`),
    "",
    `Notes: ${ir.evidence.notes}`.trim(),
    ""
  ].join("\n");
}
