import { cosineSimilarity } from "../llm/fingerprint/fingerprint";
import {
    assertDimension,
    CHAT_SOURCE_TYPE,
    type ConversationStore,
    type ConversationTurn,
    type DocumentStore,
    type NewConversationTurn,
    type NewDocument,
    type RankedResult,
    type SearchOptions,
} from "./types";

interface StoredDocument extends NewDocument {
    id: string;
}

/**
 * Exact-cosine store held in process memory. Filtering, thresholding and
 * ordering match {@link PostgresVectorStore}; used by tests and local runs.
 */
export class InMemoryVectorStore implements DocumentStore, ConversationStore {
    private readonly documents: StoredDocument[] = [];
    private readonly turns: ConversationTurn[] = [];
    private nextId = 1;

    constructor(readonly dimension: number) {}

    async insert(document: NewDocument): Promise<void> {
        assertDimension(document.embedding, this.dimension);
        this.documents.push({ ...document, id: String(this.nextId) });
        this.nextId += 1;
    }

    async batchInsert(documents: NewDocument[]): Promise<void> {
        documents.forEach((document) => assertDimension(document.embedding, this.dimension));
        for (const document of documents) {
            await this.insert(document);
        }
    }

    async search(embedding: number[], options: SearchOptions): Promise<RankedResult[]> {
        assertDimension(embedding, this.dimension);

        return this.documents
            .filter((document) =>
                options.sourceType
                    ? document.sourceType === options.sourceType
                    : document.sourceType !== CHAT_SOURCE_TYPE
            )
            .map((document) => ({
                id: document.id,
                content: document.content,
                sourceType: document.sourceType,
                sourceId: document.sourceId,
                metadata: document.metadata ?? {},
                similarity: cosineSimilarity(embedding, document.embedding),
            }))
            .filter((result) => result.similarity >= options.threshold)
            .sort((a, b) => b.similarity - a.similarity)
            .slice(0, Math.max(0, options.topK));
    }

    async count(): Promise<number> {
        return this.documents.length;
    }

    async deleteAll(): Promise<void> {
        this.documents.length = 0;
    }

    async append(turn: NewConversationTurn): Promise<void> {
        this.turns.push({ ...turn, createdAt: new Date() });
    }

    async appendMany(turns: NewConversationTurn[]): Promise<void> {
        const createdAt = new Date();
        this.turns.push(...turns.map((turn) => ({ ...turn, createdAt })));
    }

    async recentBySession(sessionId: string, limit: number): Promise<ConversationTurn[]> {
        if (limit <= 0) {
            return [];
        }
        return this.turns.filter((turn) => turn.sessionId === sessionId).slice(-limit);
    }
}
