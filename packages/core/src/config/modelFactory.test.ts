import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { MockChatOpenAI, MockChatAnthropic, MockChatGoogle } = vi.hoisted(
  () => ({
    MockChatOpenAI: vi.fn(),
    MockChatAnthropic: vi.fn(),
    MockChatGoogle: vi.fn(),
  }),
);

vi.mock("@langchain/openai", () => ({ ChatOpenAI: MockChatOpenAI }));
vi.mock("@langchain/anthropic", () => ({ ChatAnthropic: MockChatAnthropic }));
vi.mock("@langchain/google-genai", () => ({
  ChatGoogleGenerativeAI: MockChatGoogle,
}));

import {
  assertProviderCredentials,
  createChatModel,
  resolveProviderApiKey,
} from "./modelFactory.js";
import { MissingCredentialsError } from "@medeval/shared";

describe("modelFactory", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.clearAllMocks();
    process.env = { ...originalEnv };
    process.env.OPENAI_API_KEY = "test-openai-key";
    process.env.ANTHROPIC_API_KEY = "test-anthropic-key";
    delete process.env.GOOGLE_API_KEY;
    delete process.env.GEMINI_API_KEY;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe("createChatModel", () => {
    it("builds an OpenAI model with temperature and token cap", () => {
      createChatModel({
        provider: "openai",
        model: "judge-model",
        temperature: 0,
        maxTokens: 120,
      });

      expect(MockChatOpenAI).toHaveBeenCalledWith({
        model: "judge-model",
        apiKey: "test-openai-key",
        temperature: 0,
        maxTokens: 120,
      });
    });

    it("omits unset sampling options", () => {
      createChatModel({ provider: "anthropic", model: "answer-model" });

      expect(MockChatAnthropic).toHaveBeenCalledWith({
        model: "answer-model",
        apiKey: "test-anthropic-key",
      });
    });

    it("maps maxTokens to maxOutputTokens for Google", () => {
      process.env.GEMINI_API_KEY = "test-gemini-key";
      createChatModel({
        provider: "google",
        model: "gemini-model",
        maxTokens: 64,
      });

      expect(MockChatGoogle).toHaveBeenCalledWith({
        model: "gemini-model",
        apiKey: "test-gemini-key",
        maxOutputTokens: 64,
      });
    });

    it("throws MissingCredentialsError without a key", () => {
      delete process.env.OPENAI_API_KEY;

      expect(() =>
        createChatModel({ provider: "openai", model: "m" }),
      ).toThrow(MissingCredentialsError);
      expect(MockChatOpenAI).not.toHaveBeenCalled();
    });
  });

  describe("resolveProviderApiKey", () => {
    it("names every checked variable in the error", () => {
      expect(() => resolveProviderApiKey("google")).toThrow(
        "Missing required secret. Checked: GOOGLE_API_KEY, GEMINI_API_KEY",
      );
    });
  });

  describe("assertProviderCredentials", () => {
    it("passes when every provider has a key", () => {
      expect(() =>
        assertProviderCredentials(["openai", "anthropic", "openai"]),
      ).not.toThrow();
    });

    it("fails on the first provider without a key", () => {
      expect(() => assertProviderCredentials(["openai", "google"])).toThrow(
        MissingCredentialsError,
      );
    });
  });
});
