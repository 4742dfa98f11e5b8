import type { Logger } from "pino";
import { createAnthropic } from "@ai-sdk/anthropic";
import { generateText } from "ai";
import { BaseChatProvider } from "../base";
import type { ChatModelConfig } from "../../config/types";
import type { GenerateAnswerOptions } from "../types";
import { buildPromptMessages } from "../prompt";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";

const ANTHROPIC_DEFAULT_BASE_URL = "https://api.anthropic.com/v1/";

export class AnthropicChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createAnthropic>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("Anthropic API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 3,
                    maxRequestsPerMinute: 200,
                    maxTokensPerMinute: 200_000,
                    retries: 2,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createAnthropic({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, ANTHROPIC_DEFAULT_BASE_URL),
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
