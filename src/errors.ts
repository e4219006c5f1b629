export type PartDocErrorCode =
  | "MISSING_CORPUS_CATEGORY"
  | "PROVIDER_UNAVAILABLE"
  | "CONFIG_INVALID"
  | "INPUT_NOT_FOUND";

export class PartDocError extends Error {
  readonly code: PartDocErrorCode;
  constructor(code: PartDocErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PartDocError";
    this.code = code;
  }
}

export type CorpusCategory = "template" | "exemplar" | "style_rule" | "glossary";

/** A required corpus category has no files. Raised before any generation call. */
export class MissingCorpusCategory extends PartDocError {
  readonly category: CorpusCategory;
  readonly dir: string;
  constructor(category: CorpusCategory, dir: string) {
    super("MISSING_CORPUS_CATEGORY", `Corpus category "${category}" has no files (${dir})`);
    this.name = "MissingCorpusCategory";
    this.category = category;
    this.dir = dir;
  }
}

export class ProviderUnavailable extends PartDocError {
  readonly provider: string;
  constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super("PROVIDER_UNAVAILABLE", `Provider "${provider}" unavailable: ${message}`, options);
    this.name = "ProviderUnavailable";
    this.provider = provider;
  }
}

export class ConfigError extends PartDocError {
  readonly issues: string[];
  constructor(message: string, issues: string[] = []) {
    super("CONFIG_INVALID", issues.length > 0 ? `${message}\n- ${issues.join("\n- ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class InputNotFound extends PartDocError {
  readonly inputPath: string;
  constructor(inputPath: string) {
    super("INPUT_NOT_FOUND", `Input not found: ${inputPath}`);
    this.name = "InputNotFound";
    this.inputPath = inputPath;
  }
}
