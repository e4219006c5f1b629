import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { RunFolderNotFound, exportRunArchive, exportTargetPath } from "../src/export.js";
import { makeTmpDir } from "./fixtures.js";

let tmp = "";

beforeEach(async () => {
  tmp = await makeTmpDir("partdoc-export-");
});

afterEach(async () => {
  await fs.rm(tmp, { recursive: true, force: true });
});

describe("exportTargetPath", () => {
  it("uses a .zip destination as is", () => {
    expect(exportTargetPath("/out/bundle.ZIP", "r1")).toBe("/out/bundle.ZIP");
  });

  it("names the archive after the run inside a directory", () => {
    expect(exportTargetPath("/out", "20261019T081502Z_widget")).toBe("/out/20261019T081502Z_widget.zip");
  });
});

describe("exportRunArchive", () => {
  it("writes a zip of the run folder", async () => {
    const runDir = path.join(tmp, "runs", "r1");
    await fs.mkdir(runDir, { recursive: true });
    await fs.writeFile(path.join(runDir, "output.md"), "# Part\n", "utf8");

    const dest = path.join(tmp, "exports", "r1.zip");
    const result = await exportRunArchive(runDir, dest);

    expect(result.file).toBe(dest);
    const bytes = await fs.readFile(dest);
    expect(result.bytes).toBe(bytes.length);
    expect(bytes.subarray(0, 2).toString("utf8")).toBe("PK");
  });

  it("fails with RunFolderNotFound for an unknown run", async () => {
    const missing = path.join(tmp, "runs", "nope");
    await expect(exportRunArchive(missing, path.join(tmp, "x.zip"))).rejects.toBeInstanceOf(RunFolderNotFound);
    await expect(fs.stat(path.join(tmp, "x.zip")).catch(() => null)).resolves.toBeNull();
  });
});
