import { get_encoding, type Tiktoken } from "tiktoken";

const TOKENIZER = "cl100k_base";

let encoder: Tiktoken | null = null;

function getEncoder(): Tiktoken {
    if (!encoder) {
        encoder = get_encoding(TOKENIZER);
    }
    return encoder;
}

/**
 * Token estimate used to weigh requests against a provider's per-minute token
 * budget. Special-token literals in banking text are encoded as plain text.
 */
export function countTokens(text: string): number {
    if (!text) return 0;
    try {
        return getEncoder().encode(text, [], []).length;
    } catch {
        // ~4 characters per token for English prose
        return Math.ceil(text.length / 4);
    }
}

export function countTokensInBatch(texts: string[]): number {
    return texts.reduce((sum, current) => sum + countTokens(current), 0);
}
