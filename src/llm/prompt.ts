import type { GenerateAnswerOptions } from "./types";

export const BANKING_SYSTEM_PROMPT = [
    "You are a knowledgeable banking assistant with access to customer accounts, transaction data, and banking policies.",
    "Answer questions accurately based on the provided context.",
    "If the context doesn't contain enough information to answer fully, say so clearly.",
    "Always be helpful and professional.",
    "",
    "When discussing specific customers or accounts, reference them by their IDs.",
    "When discussing policies, cite the specific policy. For numerical data, be precise.",
    "If asked about trends, analyze the transaction patterns provided.",
    "",
    "Important: Never fabricate data. Only reference information present in the context below.",
].join("\n");

/** System and user messages for chat-style APIs. */
export function buildPromptMessages(options: GenerateAnswerOptions): { system: string; user: string } {
    return {
        system: options.systemPrompt,
        user: `Context:\n${options.context}\n\nQuestion: ${options.query.trim()}`,
    };
}

/** One prompt string for completion-style APIs without a system role. */
export function buildCombinedPrompt(options: GenerateAnswerOptions): string {
    return `${options.systemPrompt}\n\nContext:\n${options.context}\n\nUser Question: ${options.query.trim()}`;
}
