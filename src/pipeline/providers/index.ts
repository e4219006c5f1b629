import type { AppConfig } from "../../config.js";
import { HostedProvider } from "./hosted.js";
import { StubProvider } from "./stub.js";
import type { GenerationProvider } from "./types.js";

export { HostedProvider } from "./hosted.js";
export { StubProvider, renderStubMarkdown } from "./stub.js";
export type { GenerationMetadata, GenerationProvider, GenerationResult, ModelConfig, TokenUsage } from "./types.js";

export function createProvider(config: Pick<AppConfig, "provider" | "apiKey">): GenerationProvider {
  switch (config.provider) {
    case "stub":
      return new StubProvider();
    case "hosted":
      return new HostedProvider(config.apiKey);
  }
}
