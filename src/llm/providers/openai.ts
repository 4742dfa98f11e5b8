import type { Logger } from "pino";
import { createOpenAI } from "@ai-sdk/openai";
import { embedMany, generateText } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider } from "../base";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type { GenerateAnswerOptions } from "../types";
import { buildPromptMessages } from "../prompt";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";

const OPENAI_DEFAULT_BASE_URL = "https://api.openai.com/v1/";

export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("OpenAI API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 100,
                    concurrency: 4,
                    maxRequestsPerMinute: 1_500,
                    maxTokensPerMinute: 1_000_000,
                    retries: 3,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, OPENAI_DEFAULT_BASE_URL),
        });
    }

    protected async sendEmbeddingRequest(texts: string[], signal: AbortSignal): Promise<number[][]> {
        const model = this.sdk.embedding(this.config.model, { dimensions: this.dimension });
        const { embeddings } = await embedMany({
            model,
            values: texts,
            abortSignal: signal,
            maxRetries: 0,
        });

        return embeddings;
    }
}

export class OpenAIChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("OpenAI API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 3,
                    maxRequestsPerMinute: 500,
                    maxTokensPerMinute: 90_000,
                    retries: 2,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, OPENAI_DEFAULT_BASE_URL),
        });
    }

    protected async complete(options: GenerateAnswerOptions & { signal: AbortSignal }): Promise<string> {
        const { system, user } = buildPromptMessages(options);

        const { text } = await generateText({
            model: this.sdk(this.config.model),
            system,
            prompt: user,
            temperature: this.temperatureFor(options),
            maxTokens: this.maxTokensFor(options),
            abortSignal: options.signal,
            maxRetries: 0,
        });

        return text;
    }
}
