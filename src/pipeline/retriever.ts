import fs from "node:fs/promises";
import path from "node:path";
import { MissingCorpusCategory, type CorpusCategory } from "../errors.js";
import { clipText, readTextFile } from "./utils.js";

export const RETRIEVER_ID = "static_v1";

export const CORPUS_DIRS: Record<CorpusCategory, string> = {
  template: "templates",
  exemplar: "exemplars",
  style_rule: "style_rules",
  glossary: "glossary"
};

const BLOCK_LABELS: Record<CorpusCategory, string> = {
  template: "TEMPLATE",
  exemplar: "EXEMPLAR",
  style_rule: "STYLE RULES",
  glossary: "GLOSSARY"
};

export type RetrievedDoc = {
  category: CorpusCategory;
  filename: string;
  /** Path relative to the corpus root, posix separators. */
  relPath: string;
  content: string;
  truncated: boolean;
};

export type RetrievalLog = {
  retriever: typeof RETRIEVER_ID;
  corpus_root: string;
  dirs: Record<CorpusCategory, string>;
  selected: {
    template: string;
    exemplars: string[];
    style_rules: string;
    glossary: string;
  };
  files_used: string[];
  counts: Record<CorpusCategory, number>;
  truncated: string[];
  limits: { max_exemplars: number; max_chars_per_doc: number };
};

export type RetrievalResult = {
  /** Ordered: template, exemplars, style rule, glossary. */
  selection: RetrievedDoc[];
  /** Template + style rules + glossary blocks. */
  context: string;
  /** Exemplar blocks; the validator reads its facts from the same text. */
  approvedDefaults: string;
  log: RetrievalLog;
};

export type RetrieveOptions = {
  maxExemplars?: number;
  maxCharsPerDoc?: number;
};

async function sortedFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
  return entries
    .filter((ent) => ent.isFile() && !ent.name.startsWith("."))
    .map((ent) => ent.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

async function readDoc(corpusRoot: string, category: CorpusCategory, filename: string, maxChars: number): Promise<RetrievedDoc> {
  const relPath = `${CORPUS_DIRS[category]}/${filename}`;
  const raw = await readTextFile(path.join(corpusRoot, CORPUS_DIRS[category], filename));
  const content = clipText(raw, maxChars);
  return { category, filename, relPath, content, truncated: content !== raw };
}

function renderBlock(doc: RetrievedDoc): string {
  return `### ${BLOCK_LABELS[doc.category]}: ${doc.relPath}\n\n${doc.content.trim()}\n\n---\n`;
}

async function readDocs(
  corpusRoot: string,
  category: CorpusCategory,
  files: string[],
  maxChars: number
): Promise<RetrievedDoc[]> {
  const docs: RetrievedDoc[] = [];
  for (const name of files) {
    docs.push(await readDoc(corpusRoot, category, name, maxChars));
  }
  return docs;
}

async function listCategory(corpusRoot: string, category: CorpusCategory): Promise<string[]> {
  const dir = path.join(corpusRoot, CORPUS_DIRS[category]);
  const files = await sortedFiles(dir);
  if (files.length === 0) throw new MissingCorpusCategory(category, dir);
  return files;
}

/**
 * Deterministic retrieval: first file by name for template, style rules and
 * glossary, first `maxExemplars` files for exemplars. No scoring.
 */
export async function retrieveContext(corpusRoot: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
  const maxExemplars = options.maxExemplars ?? 2;
  const maxCharsPerDoc = options.maxCharsPerDoc ?? 2000;

  // Every category is listed before anything is read so a broken corpus fails fast.
  const listing: Record<CorpusCategory, string[]> = {
    template: await listCategory(corpusRoot, "template"),
    exemplar: await listCategory(corpusRoot, "exemplar"),
    style_rule: await listCategory(corpusRoot, "style_rule"),
    glossary: await listCategory(corpusRoot, "glossary")
  };

  const [template] = await readDocs(corpusRoot, "template", listing.template.slice(0, 1), maxCharsPerDoc);
  const exemplars = await readDocs(corpusRoot, "exemplar", listing.exemplar.slice(0, maxExemplars), maxCharsPerDoc);
  const [styleRule] = await readDocs(corpusRoot, "style_rule", listing.style_rule.slice(0, 1), maxCharsPerDoc);
  const [glossary] = await readDocs(corpusRoot, "glossary", listing.glossary.slice(0, 1), maxCharsPerDoc);

  const selection = [template, ...exemplars, styleRule, glossary];
  const context = [template, styleRule, glossary].map(renderBlock).join("\n").trim();
  const approvedDefaults = exemplars.map(renderBlock).join("\n").trim();

  const log: RetrievalLog = {
    retriever: RETRIEVER_ID,
    corpus_root: corpusRoot,
    dirs: { ...CORPUS_DIRS },
    selected: {
      template: template.relPath,
      exemplars: exemplars.map((d) => d.relPath),
      style_rules: styleRule.relPath,
      glossary: glossary.relPath
    },
    files_used: selection.map((d) => d.relPath),
    counts: {
      template: 1,
      exemplar: exemplars.length,
      style_rule: 1,
      glossary: 1
    },
    truncated: selection.filter((d) => d.truncated).map((d) => d.relPath),
    limits: { max_exemplars: maxExemplars, max_chars_per_doc: maxCharsPerDoc }
  };

  return { selection, context, approvedDefaults, log };
}
