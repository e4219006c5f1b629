import archiver from "archiver";
import { createWriteStream, type WriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { dirExists, ensureDir } from "./pipeline/utils.js";

export type ExportResult = {
  file: string;
  bytes: number;
};

export class RunFolderNotFound extends Error {
  constructor(runDir: string) {
    super(`Run folder not found: ${runDir}`);
    this.name = "RunFolderNotFound";
  }
}

/** `dest` may be a `.zip` path or a directory, in which case `<runId>.zip` is written inside it. */
export function exportTargetPath(dest: string, runId: string): string {
  const abs = path.resolve(dest);
  if (abs.toLowerCase().endsWith(".zip")) return abs;
  return path.join(abs, `${runId}.zip`);
}

function discard(output: WriteStream): Promise<void> {
  return new Promise((resolve) => {
    if (output.closed) {
      resolve();
      return;
    }
    output.once("close", () => resolve());
    output.destroy();
  });
}

/** Zips a run folder (contents at the archive root). */
export async function exportRunArchive(
  runDir: string,
  destFile: string,
  onWarning?: (message: string) => void
): Promise<ExportResult> {
  if (!(await dirExists(runDir))) throw new RunFolderNotFound(runDir);
  await ensureDir(path.dirname(destFile));

  const output = createWriteStream(destFile);
  const archive = archiver("zip", { zlib: { level: 9 } });

  const closed = new Promise<void>((resolve, reject) => {
    output.on("close", () => resolve());
    output.on("error", reject);
    archive.on("error", reject);
  });
  archive.on("warning", (err) => {
    onWarning?.(`zip warning: ${err.message}`);
  });

  archive.pipe(output);
  archive.directory(runDir, false);
  try {
    await Promise.all([archive.finalize(), closed]);
  } catch (err) {
    // No half-written archive is left behind.
    await discard(output);
    await fs.rm(destFile, { force: true });
    throw err;
  }
  return { file: destFile, bytes: archive.pointer() };
}
