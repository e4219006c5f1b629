import type { ProviderName } from "../../config.js";

export type ModelConfig = {
  model: string;
  maxTokens: number;
};

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
};

export type GenerationMetadata = {
  provider: ProviderName;
  model: string;
  maxTokens: number;
  latencyMs: number;
  usage?: TokenUsage;
};

export type GenerationResult = {
  text: string;
  metadata: GenerationMetadata;
};

/**
 * A generation backend. Implementations either return generated markdown or
 * throw `ProviderUnavailable`; they never return partial text on failure.
 */
export interface GenerationProvider {
  readonly name: ProviderName;
  generate(promptText: string, config: ModelConfig): Promise<GenerationResult>;
}
