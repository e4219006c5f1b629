import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseYAML } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_CONFIG_PATH = path.join("configs", "app.yaml");

export const DEFAULT_DISALLOWED_PHRASES = [
  "known for strength",
  "corrosion resistant",
  "ensures reliability",
  "industry-leading",
  "guaranteed performance",
  "maintenance-free"
] as const;

const ProviderNameSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["stub", "hosted", "openai"]))
  .transform((p): ProviderName => (p === "openai" ? "hosted" : p));

export type ProviderName = "stub" | "hosted";

/**
 * On-disk shape of `configs/app.yaml`. Every key is optional; the defaults
 * below match the repository layout.
 *
 * ```yaml
 * app:
 *   default_model: gpt-4o-mini
 * paths:
 *   corpus: data/corpus
 *   outputs: var/runs
 * llm:
 *   provider: stub
 * ```
 */
const RawConfigSchema = z
  .object({
    app: z
      .object({
        name: z.string().min(1).default("partdoc"),
        default_model: z.string().min(1).default("gpt-4o-mini")
      })
      .default({}),
    paths: z
      .object({
        corpus: z.string().min(1).default("data/corpus"),
        outputs: z.string().min(1).default("var/runs"),
        prompt_template: z.string().min(1).default("configs/prompts/part_description.md"),
        repair_template: z.string().min(1).default("configs/prompts/part_description_repair.md")
      })
      .default({}),
    limits: z
      .object({
        max_tokens: z.number().int().positive().default(2000),
        max_exemplars: z.number().int().min(1).max(10).default(2),
        max_chars_per_doc: z.number().int().positive().default(2000)
      })
      .default({}),
    llm: z
      .object({
        provider: ProviderNameSchema.default("stub")
      })
      .default({}),
    validation: z
      .object({
        disallowed_phrases: z.array(z.string().trim().min(1)).default([...DEFAULT_DISALLOWED_PHRASES])
      })
      .default({})
  })
  .strict();

export type AppConfig = {
  appName: string;
  model: string;
  provider: ProviderName;
  maxTokens: number;
  maxExemplars: number;
  maxCharsPerDoc: number;
  corpusRoot: string;
  outputRoot: string;
  promptTemplatePath: string;
  repairTemplatePath: string;
  disallowedPhrases: string[];
  /** Credential for the hosted provider; never written to run artifacts. */
  apiKey?: string;
};

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  baseDir?: string;
};

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function resolveConfig(raw: unknown, options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const baseDir = options.baseDir ?? process.cwd();

  const parsed = RawConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) throw new ConfigError("Invalid configuration", formatIssues(parsed.error));
  const cfg = parsed.data;

  let provider = cfg.llm.provider;
  const envProvider = nonEmpty(env.PARTDOC_LLM_PROVIDER);
  if (envProvider) {
    const fromEnv = ProviderNameSchema.safeParse(envProvider);
    if (!fromEnv.success) {
      throw new ConfigError(`Invalid PARTDOC_LLM_PROVIDER "${envProvider}" (expected stub or hosted)`);
    }
    provider = fromEnv.data;
  }

  const outputs = nonEmpty(env.PARTDOC_OUTPUT_DIR) ?? cfg.paths.outputs;

  return {
    appName: cfg.app.name,
    model: nonEmpty(env.PARTDOC_MODEL) ?? cfg.app.default_model,
    provider,
    maxTokens: cfg.limits.max_tokens,
    maxExemplars: cfg.limits.max_exemplars,
    maxCharsPerDoc: cfg.limits.max_chars_per_doc,
    corpusRoot: path.resolve(baseDir, cfg.paths.corpus),
    outputRoot: path.resolve(baseDir, outputs),
    promptTemplatePath: path.resolve(baseDir, cfg.paths.prompt_template),
    repairTemplatePath: path.resolve(baseDir, cfg.paths.repair_template),
    disallowedPhrases: cfg.validation.disallowed_phrases,
    apiKey: nonEmpty(env.OPENAI_API_KEY)
  };
}

export async function loadConfig(configPath?: string, options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const baseDir = options.baseDir ?? process.cwd();
  const file = path.resolve(baseDir, configPath ?? nonEmpty(env.PARTDOC_CONFIG) ?? DEFAULT_CONFIG_PATH);

  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Unable to read config file ${file}: ${msg}`);
  }

  let raw: unknown;
  try {
    raw = parseYAML(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file ${file} is not valid YAML: ${msg}`);
  }

  return resolveConfig(raw, { env, baseDir });
}
