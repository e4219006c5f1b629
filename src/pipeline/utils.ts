import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export function nowIso(): string {
  return new Date().toISOString();
}

// 2026-10-19T08:15:02.123Z -> 20261019T081502Z
export function utcStamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z").replace(/[-:]/g, "");
}

export function repoRoot(): string {
  // This file lives at src/pipeline/utils.ts
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../..");
}

export function runDirAbs(outputRoot: string, runId: string): string {
  return path.join(outputRoot, runId);
}

export function artifactAbsPath(outputRoot: string, runId: string, name: string): string {
  return path.join(runDirAbs(outputRoot, runId), name);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function dirExists(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

export async function resolveArtifactPathAbs(outputRoot: string, runId: string, name: string): Promise<string | null> {
  if (!isSafeArtifactName(name)) return null;
  const candidate = artifactAbsPath(outputRoot, runId, name);
  return (await fileExists(candidate)) ? candidate : null;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

let tmpSeq = 0;

async function atomicWrite(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  tmpSeq += 1;
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}.${tmpSeq}`;
  await fs.writeFile(tmpPath, data);
  await fs.rename(tmpPath, filePath);
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  const out = text.endsWith("\n") ? text : `${text}\n`;
  await atomicWrite(filePath, out);
}

export async function writeJsonFile(filePath: string, obj: unknown): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(obj, null, 2)}\n`);
}

export async function copyFileAtomic(src: string, dst: string): Promise<void> {
  await atomicWrite(dst, await fs.readFile(src));
}

export async function readTextFile(filePath: string): Promise<string> {
  const raw = await fs.readFile(filePath, "utf8");
  return raw.replace(/\r\n/g, "\n");
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export async function tryReadJsonFile(filePath: string): Promise<unknown> {
  try {
    return await readJsonFile(filePath);
  } catch {
    return null;
  }
}

export function isSafeArtifactName(name: string): boolean {
  // Prevent path traversal and keep filenames predictable.
  if (name.includes("/") || name.includes("\\") || name.includes("..")) return false;
  return /^[A-Za-z0-9._-]+$/.test(name);
}

export function slug(input: string): string {
  const s = input
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return s.slice(0, 60) || "untitled";
}

export function clipText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}\n\n[TRUNCATED]\n`;
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
