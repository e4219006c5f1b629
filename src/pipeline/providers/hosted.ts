import { Agent, Runner, setDefaultOpenAIKey } from "@openai/agents";
import { ProviderUnavailable } from "../../errors.js";
import { toErrorMessage } from "../utils.js";
import type { GenerationProvider, GenerationResult, ModelConfig, TokenUsage } from "./types.js";

const INSTRUCTIONS = `You write engineering part descriptions in markdown.

Rules:
- Follow the prompt exactly. Use ONLY facts present in the prompt.
- Output exactly three "## " sections, in this order: "Overview", "Materials & tolerances", "Vibration reliability practices".
- If a detail is not supported by the prompt, write "Not specified in provided input" in that section instead of guessing.
- Return ONLY the markdown document.`;

type UsageLike = { inputTokens?: number; outputTokens?: number; totalTokens?: number };

function sumUsage(responses: ReadonlyArray<{ usage?: UsageLike }> | undefined): TokenUsage | undefined {
  if (!responses || responses.length === 0) return undefined;
  return responses.reduce<TokenUsage>(
    (acc, r) => ({
      inputTokens: acc.inputTokens + (r.usage?.inputTokens ?? 0),
      outputTokens: acc.outputTokens + (r.usage?.outputTokens ?? 0),
      totalTokens: acc.totalTokens + (r.usage?.totalTokens ?? 0)
    }),
    { inputTokens: 0, outputTokens: 0, totalTokens: 0 }
  );
}

/**
 * Remote backend on the OpenAI Agents SDK. Any failure to obtain text
 * (missing key, transport error, empty answer) surfaces as ProviderUnavailable.
 */
export class HostedProvider implements GenerationProvider {
  readonly name = "hosted" as const;
  private readonly apiKey: string | undefined;

  constructor(apiKey: string | undefined) {
    this.apiKey = apiKey;
  }

  async generate(promptText: string, config: ModelConfig): Promise<GenerationResult> {
    if (!this.apiKey) {
      throw new ProviderUnavailable(this.name, "OPENAI_API_KEY is not set");
    }
    setDefaultOpenAIKey(this.apiKey);

    const agent = new Agent({
      name: "Part Description Writer",
      model: config.model,
      instructions: INSTRUCTIONS,
      modelSettings: { temperature: 0.2, maxTokens: config.maxTokens }
    });
    const runner = new Runner();

    const started = Date.now();
    let finalOutput: string | undefined;
    let usage: TokenUsage | undefined;
    try {
      const result = await runner.run(agent, promptText, { maxTurns: 1 });
      finalOutput = result.finalOutput;
      usage = sumUsage(result.rawResponses);
    } catch (err) {
      throw new ProviderUnavailable(this.name, toErrorMessage(err), { cause: err });
    }

    const text = finalOutput?.trim() ?? "";
    if (text.length === 0) {
      throw new ProviderUnavailable(this.name, "model returned an empty response");
    }

    return {
      text: `${text}\n`,
      metadata: {
        provider: this.name,
        model: config.model,
        maxTokens: config.maxTokens,
        latencyMs: Date.now() - started,
        ...(usage ? { usage } : {})
      }
    };
  }
}
