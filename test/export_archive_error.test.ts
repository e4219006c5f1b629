import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";

vi.mock("archiver", () => {
  return {
    default: () => {
      const handlers: Record<string, ((err: Error) => void) | undefined> = {};
      let target: NodeJS.WritableStream | null = null;
      return {
        on: (evt: string, cb: (err: Error) => void) => {
          handlers[evt] = cb;
        },
        pipe: (dest: NodeJS.WritableStream) => {
          target = dest;
        },
        directory: () => undefined,
        pointer: () => 0,
        finalize: async () => {
          target?.write("PK\u0003\u0004partial");
          await new Promise((resolve) => setImmediate(resolve));
          handlers.error?.(new Error("disk full"));
        }
      };
    }
  };
});

import { exportRunArchive } from "../src/export.js";
import { makeTmpDir } from "./fixtures.js";

let tmp = "";

beforeEach(async () => {
  tmp = await makeTmpDir("partdoc-export-err-");
});

afterEach(async () => {
  await fs.rm(tmp, { recursive: true, force: true });
});

describe("exportRunArchive error handling", () => {
  it("rejects and removes the partial archive when archiver fails", async () => {
    const runDir = path.join(tmp, "runs", "r1");
    await fs.mkdir(runDir, { recursive: true });
    await fs.writeFile(path.join(runDir, "output.md"), "# Part\n", "utf8");
    const dest = path.join(tmp, "exports", "r1.zip");

    await expect(exportRunArchive(runDir, dest)).rejects.toThrow("disk full");
    await expect(fs.stat(dest).catch(() => null)).resolves.toBeNull();
  });
});
