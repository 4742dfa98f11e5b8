export interface EmbedOptions {
    signal?: AbortSignal;
}

export interface GenerateAnswerOptions {
    systemPrompt: string;
    query: string;
    context: string;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

/** Text to fixed-dimension vector. Every vector it returns has `dimension` entries. */
export interface EmbeddingProvider {
    readonly name: string;
    readonly dimension: number;
    embed(text: string, options?: EmbedOptions): Promise<number[]>;
    embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

/**
 * Produces answer text from a system prompt, a user query and assembled
 * context. Implementations never reject: backend failures come back as an
 * answer starting with {@link GENERATION_ERROR_MARKER}.
 */
export interface ChatProvider {
    readonly name: string;
    generate(options: GenerateAnswerOptions): Promise<string>;
}

export interface LLMClientBundle {
    embedding: EmbeddingProvider;
    chat: ChatProvider;
}

export const GENERATION_ERROR_MARKER = "Error generating response:";

export function isGenerationError(answer: string): boolean {
    return answer.startsWith(GENERATION_ERROR_MARKER);
}
