import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig, LLMConfig } from "../config/types";
import type { ChatProvider, EmbeddingProvider, LLMClientBundle } from "./types";
import { LocalEmbeddingProvider } from "./providers/local";
import { FormattingChatProvider } from "./providers/formatting";
import { OpenAIChatProvider, OpenAIEmbeddingProvider } from "./providers/openai";
import { GoogleChatProvider, GoogleEmbeddingProvider } from "./providers/google";
import { AnthropicChatProvider } from "./providers/anthropic";
import { OllamaChatProvider } from "./providers/ollama";

function providerLogger(logger: Logger | undefined, scope: "chat" | "embedding", provider: string): Logger | undefined {
    return logger?.child({ module: "llm", scope, provider });
}

export function createEmbeddingProvider(config: EmbeddingModelConfig, logger?: Logger): EmbeddingProvider {
    const scopedLogger = providerLogger(logger, "embedding", config.provider);

    switch (config.provider) {
        case "local":
            return new LocalEmbeddingProvider(config.dimension);
        case "openai":
            return new OpenAIEmbeddingProvider(config, scopedLogger);
        case "google":
            return new GoogleEmbeddingProvider(config, scopedLogger);
    }
}

export function createChatProvider(config: ChatModelConfig, logger?: Logger): ChatProvider {
    const scopedLogger = providerLogger(logger, "chat", config.provider);

    switch (config.provider) {
        case "mock":
            return new FormattingChatProvider();
        case "openai":
            return new OpenAIChatProvider(config, scopedLogger);
        case "google":
            return new GoogleChatProvider(config, scopedLogger);
        case "anthropic":
            return new AnthropicChatProvider(config, scopedLogger);
        case "ollama":
            return new OllamaChatProvider(config, scopedLogger);
    }
}

export function createLLMClient(config: LLMConfig, logger?: Logger): LLMClientBundle {
    return {
        embedding: createEmbeddingProvider(config.embedding, logger),
        chat: createChatProvider(config.chat, logger),
    };
}
