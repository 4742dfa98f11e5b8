import pLimit from "p-limit";
import pRetry from "p-retry";
import type Bottleneck from "bottleneck";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { batchChunks } from "../utils/batchChunks";
import { createRateLimiter } from "../utils/rateLimiter";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import { describeError, type ProviderRateLimits } from "../utils/providerUtils";
import { l2Normalize } from "./fingerprint/fingerprint";
import {
    GENERATION_ERROR_MARKER,
    type ChatProvider,
    type EmbedOptions,
    type EmbeddingProvider,
    type GenerateAnswerOptions,
} from "./types";

export function withTimeout(timeoutMs: number, signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Request and token budgets shared by the remote providers. Each scheduled
 * task reserves its estimated tokens, waits for a request slot and is retried
 * with back-off on failure.
 */
class RequestScheduler {
    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;

    constructor(
        concurrency: number,
        private readonly limits: ProviderRateLimits,
        private readonly logPrefix: string,
        private readonly logger?: Logger
    ) {
        this.requestLimiter = createRateLimiter(concurrency, limits.maxRequestsPerMinute);

        if (limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            const tokenConcurrency = Math.max(concurrency, Math.ceil(limits.maxTokensPerMinute));
            this.tokenLimiter = createRateLimiter(tokenConcurrency, limits.maxTokensPerMinute);
        }
    }

    async schedule<T>(tokens: number, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        await this.reserveTokens(tokens);
        return this.requestLimiter.schedule(() =>
            pRetry(task, {
                retries: this.limits.retries,
                signal,
                onFailedAttempt: (error) => {
                    this.logger?.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        `${this.logPrefix} failed attempt`
                    );
                },
            })
        );
    }

    private async reserveTokens(tokens: number): Promise<void> {
        if (!this.tokenLimiter || tokens <= 0) {
            return;
        }

        const weight = Math.max(1, Math.ceil(tokens));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}

export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
    readonly name: string;
    readonly dimension: number;
    protected readonly batchSize: number;
    protected readonly concurrencyLimit: number;

    private readonly scheduler: RequestScheduler;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.name = config.provider;
        this.dimension = config.dimension;
        this.batchSize = Math.max(1, limits.batchSize ?? 50);
        this.concurrencyLimit = Math.max(1, limits.concurrency);
        this.scheduler = new RequestScheduler(this.concurrencyLimit, limits, `${config.provider}:embed`, logger);
    }

    async embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const batches = batchChunks(texts, this.batchSize).map((batch, idx) => ({
            idx,
            batch,
            tokens: countTokensInBatch(batch),
        }));

        const limit = pLimit(this.concurrencyLimit);
        const results = await Promise.all(
            batches.map(({ batch, idx, tokens }) =>
                limit(async () => {
                    const vectors = await this.scheduler.schedule(
                        tokens,
                        () => this.sendEmbeddingRequest(batch, withTimeout(this.config.timeoutMs, options?.signal)),
                        options?.signal
                    );
                    if (vectors.length !== batch.length) {
                        throw new Error(
                            `${this.name} returned ${vectors.length} embeddings for a batch of ${batch.length}.`
                        );
                    }
                    return { idx, vectors: vectors.map((vector) => this.checkVector(vector)) };
                })
            )
        );

        return results
            .sort((a, b) => a.idx - b.idx)
            .flatMap((entry) => entry.vectors);
    }

    async embed(text: string, options?: EmbedOptions): Promise<number[]> {
        const [embedding] = await this.embedBatch([text], options);
        return embedding;
    }

    protected abstract sendEmbeddingRequest(texts: string[], signal: AbortSignal): Promise<number[][]>;

    private checkVector(vector: number[]): number[] {
        if (vector.length !== this.dimension) {
            throw new Error(
                `${this.name} returned a ${vector.length}-dimension embedding, expected ${this.dimension}.`
            );
        }
        return l2Normalize(vector);
    }
}

export abstract class BaseChatProvider implements ChatProvider {
    readonly name: string;

    private readonly scheduler: RequestScheduler;

    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.name = config.provider;
        this.scheduler = new RequestScheduler(Math.max(1, limits.concurrency), limits, `${config.provider}:chat`, logger);
    }

    async generate(options: GenerateAnswerOptions): Promise<string> {
        const tokens = this.estimateChatTokens(options);

        try {
            const answer = await this.scheduler.schedule(
                tokens,
                () => this.complete({ ...options, signal: withTimeout(this.config.timeoutMs, options.signal) }),
                options.signal
            );
            const trimmed = answer.trim();
            if (!trimmed) {
                throw new Error(`${this.name} returned an empty response.`);
            }
            return trimmed;
        } catch (error) {
            this.logger?.error({ err: error }, `${this.name} generation failed`);
            return `${GENERATION_ERROR_MARKER} ${describeError(error)}`;
        }
    }

    protected temperatureFor(options: GenerateAnswerOptions): number {
        return options.temperature ?? this.config.temperature;
    }

    protected maxTokensFor(options: GenerateAnswerOptions): number | undefined {
        return options.maxTokens ?? this.config.maxOutputTokens;
    }

    protected estimateChatTokens(options: GenerateAnswerOptions): number {
        return countTokens(options.systemPrompt)
            + countTokens(options.query)
            + countTokens(options.context)
            + (this.maxTokensFor(options) ?? 1000);
    }

    /** Sends one request; `options.signal` already carries the provider timeout. */
    protected abstract complete(options: GenerateAnswerOptions & { signal: AbortSignal }): Promise<string>;
}
