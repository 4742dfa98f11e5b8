import type { ConversationStore, ConversationTurn, RankedResult } from "../database/types";

export const NO_CONTEXT_SENTINEL = "No relevant information found in the knowledge base.";
export const DOCUMENT_SEPARATOR = "---\n";
export const DEFAULT_HISTORY_WINDOW = 6;

function formatEntry(result: RankedResult): string {
    return `[Source: ${result.sourceType} | ID: ${result.sourceId} | Relevance: ${result.similarity.toFixed(2)}]\n${result.content}\n`;
}

/** Ranked documents in retrieval order, or the sentinel when there are none. */
export function buildContext(results: RankedResult[]): string {
    if (results.length === 0) {
        return NO_CONTEXT_SENTINEL;
    }
    return results.map(formatEntry).join(DOCUMENT_SEPARATOR);
}

export function formatConversation(turns: ConversationTurn[]): string {
    return turns.map((turn) => `${turn.role.toUpperCase()}: ${turn.content}\n`).join("");
}

export async function buildConversationContext(
    store: ConversationStore,
    sessionId: string,
    limit = DEFAULT_HISTORY_WINDOW
): Promise<string> {
    const turns = await store.recentBySession(sessionId, limit);
    return formatConversation(turns);
}

export function assembleContext(documentContext: string, conversationContext: string): string {
    if (!conversationContext) {
        return documentContext;
    }
    return `Previous conversation:\n${conversationContext}\n\nRelevant data:\n${documentContext}`;
}
