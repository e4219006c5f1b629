#!/usr/bin/env node
import dotenv from "dotenv";
import path from "node:path";

dotenv.config({ path: path.resolve(process.cwd(), ".env") });

// Dynamic import so `.env` is loaded before any module reads process.env.
const { buildProgram } = await import("./cli.js");

await buildProgram().parseAsync(process.argv);
