import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  type BaseMessage,
} from "@langchain/core/messages";
import { createChatModel } from "../config/modelFactory.js";
import type { ChatModelConfig } from "../config/models.js";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

/**
 * Chat-completion collaborator: ordered turns in, one text completion out.
 *
 * Model identifier, temperature and output cap are fixed when the handle is
 * built. Build one per collaborator per run and pass it to every stage.
 */
export interface ChatClient {
  readonly model: string;
  complete(turns: readonly ChatTurn[]): Promise<string>;
}

export function toMessages(turns: readonly ChatTurn[]): BaseMessage[] {
  return turns.map((turn) => {
    switch (turn.role) {
      case "system":
        return new SystemMessage(turn.content);
      case "assistant":
        return new AIMessage(turn.content);
      case "user":
        return new HumanMessage(turn.content);
    }
  });
}

/**
 * Extracts text content from a model response. Array content keeps only
 * text blocks.
 */
export function extractTextFromResponse(response: BaseMessage): string {
  if (typeof response.content === "string") {
    return response.content;
  }

  if (Array.isArray(response.content)) {
    return response.content
      .filter(
        (block): block is { type: "text"; text: string } =>
          typeof block === "object" &&
          block !== null &&
          "type" in block &&
          block.type === "text",
      )
      .map((block) => block.text)
      .join("");
  }

  return "";
}

export class LangChainChatClient implements ChatClient {
  constructor(
    private readonly chatModel: BaseChatModel,
    readonly model: string,
  ) {}

  async complete(turns: readonly ChatTurn[]): Promise<string> {
    const response = await this.chatModel.invoke(toMessages(turns));
    return extractTextFromResponse(response);
  }
}

/**
 * Builds a chat client from model configuration.
 *
 * @throws {MissingCredentialsError} When the provider's API key is not set
 */
export function createChatClient(config: ChatModelConfig): ChatClient {
  return new LangChainChatClient(createChatModel(config), config.model);
}
