export const MODEL_PROVIDERS = ["openai", "anthropic", "google"] as const;

export type ModelProvider = (typeof MODEL_PROVIDERS)[number];

export interface ChatModelConfig {
  provider: ModelProvider;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Defaults for the two chat collaborators of an evaluation run. The
 * responder answers questions; the judge grades answers deterministically
 * with a short, capped reply.
 */
export const MODEL_CONFIG = {
  responder: {
    provider: "openai",
    model: "gpt-4o",
    temperature: 0.1,
  },
  judge: {
    provider: "openai",
    model: "gpt-4o",
    temperature: 0,
    maxTokens: 120,
  },
} as const satisfies Record<string, ChatModelConfig>;

/**
 * Environment variables holding each provider's API key, primary first.
 */
export const PROVIDER_CREDENTIALS: Record<
  ModelProvider,
  readonly [string, ...string[]]
> = {
  openai: ["OPENAI_API_KEY"],
  anthropic: ["ANTHROPIC_API_KEY"],
  google: ["GOOGLE_API_KEY", "GEMINI_API_KEY"],
};
