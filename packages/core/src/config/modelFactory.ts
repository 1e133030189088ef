import { ChatAnthropic } from "@langchain/anthropic";
import { ChatOpenAI } from "@langchain/openai";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { getSecretValue } from "@medeval/shared";
import {
  PROVIDER_CREDENTIALS,
  type ChatModelConfig,
  type ModelProvider,
} from "./models.js";

/**
 * Resolves the API key for a provider.
 *
 * @throws {MissingCredentialsError} When none of the provider's variables is set
 */
export function resolveProviderApiKey(provider: ModelProvider): string {
  const [primary, ...aliases] = PROVIDER_CREDENTIALS[provider];
  return getSecretValue(primary, ...aliases);
}

/**
 * Checks credentials for every distinct provider up front so a run fails
 * before any stage starts rather than on its first request.
 */
export function assertProviderCredentials(
  providers: Iterable<ModelProvider>,
): void {
  for (const provider of new Set(providers)) {
    resolveProviderApiKey(provider);
  }
}

/**
 * Creates a chat model instance for the configured provider.
 *
 * Only this file imports concrete provider classes.
 */
export function createChatModel(config: ChatModelConfig): BaseChatModel {
  const apiKey = resolveProviderApiKey(config.provider);
  const common = {
    model: config.model,
    apiKey,
    ...(config.temperature !== undefined && {
      temperature: config.temperature,
    }),
  };

  switch (config.provider) {
    case "openai":
      return new ChatOpenAI({
        ...common,
        ...(config.maxTokens !== undefined && { maxTokens: config.maxTokens }),
      });
    case "google":
      return new ChatGoogleGenerativeAI({
        ...common,
        ...(config.maxTokens !== undefined && {
          maxOutputTokens: config.maxTokens,
        }),
      });
    case "anthropic":
      return new ChatAnthropic({
        ...common,
        ...(config.maxTokens !== undefined && { maxTokens: config.maxTokens }),
      });
  }
}
