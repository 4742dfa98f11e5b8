import type { Logger } from "pino";
import { BaseChatProvider } from "../base";
import type { ChatModelConfig } from "../../config/types";
import type { GenerateAnswerOptions } from "../types";
import { buildCombinedPrompt } from "../prompt";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";

// 127.0.0.1 rather than localhost to avoid IPv6 resolution of the local daemon
const OLLAMA_DEFAULT_BASE_URL = "http://127.0.0.1:11434/";

interface OllamaGenerateResponse {
    response?: string;
    error?: string;
}

function errorDetail(body: string): string {
    try {
        const parsed = JSON.parse(body) as OllamaGenerateResponse;
        return parsed.error ?? "";
    } catch {
        return body.trim();
    }
}

async function parseOllamaError(response: Response): Promise<never> {
    const detail = errorDetail(await response.text());
    const status = `Ollama request failed with status ${response.status}.`;
    throw new Error(detail ? `${status} ${detail}` : status);
}

function extractResponseText(payload: OllamaGenerateResponse): string {
    if (typeof payload.response !== "string") {
        throw new Error("Ollama response is missing the generated text.");
    }
    return payload.response;
}

/**
 * Local Ollama daemon through its non-streaming `/api/generate` endpoint.
 * No API key.
 */
export class OllamaChatProvider extends BaseChatProvider {
    private readonly baseUrl: string;

    constructor(config: ChatModelConfig, logger?: Logger) {
        super(
            config,
            mergeLimits(
                {
                    concurrency: 2,
                    retries: 1,
                },
                config.limits
            ),
            logger
        );

        this.baseUrl = resolveBaseUrl(config.baseUrl, OLLAMA_DEFAULT_BASE_URL);
    }

    protected async complete(options: GenerateAnswerOptions & { signal: AbortSignal }): Promise<string> {
        const url = new URL("api/generate", this.baseUrl);
        const body: Record<string, unknown> = {
            model: this.config.model,
            prompt: buildCombinedPrompt(options),
            stream: false,
            options: {
                temperature: this.temperatureFor(options),
                num_predict: this.maxTokensFor(options),
            },
        };

        const response = await fetch(url, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify(body),
            signal: options.signal,
        });

        if (!response.ok) {
            await parseOllamaError(response);
        }

        const payload = (await response.json()) as OllamaGenerateResponse;
        return extractResponseText(payload);
    }
}
