import type { EmbedOptions, EmbeddingProvider } from "../types";
import { fingerprint } from "../fingerprint/fingerprint";

/**
 * In-process fingerprint embeddings. No network, no model weights; the same
 * text always yields the same vector.
 */
export class LocalEmbeddingProvider implements EmbeddingProvider {
    readonly name = "local";

    constructor(readonly dimension: number) {
        if (!Number.isInteger(dimension) || dimension <= 0) {
            throw new Error(`Embedding dimension must be a positive integer, got: ${dimension}`);
        }
    }

    async embed(text: string, _options?: EmbedOptions): Promise<number[]> {
        return fingerprint(text, this.dimension);
    }

    async embedBatch(texts: string[], _options?: EmbedOptions): Promise<number[][]> {
        return texts.map((text) => fingerprint(text, this.dimension));
    }
}
