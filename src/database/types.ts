export const SOURCE_TYPES = [
    "CUSTOMER_PROFILE",
    "ACCOUNT_SUMMARY",
    "TRANSACTION_PATTERN",
    "POLICY",
    "CHAT_HISTORY",
] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

/** Conversational turns; never returned by an unfiltered search. */
export const CHAT_SOURCE_TYPE: SourceType = "CHAT_HISTORY";

export type DocumentMetadata = Record<string, string | number | boolean | null>;

export interface NewDocument {
    content: string;
    sourceType: SourceType;
    sourceId: string;
    metadata?: DocumentMetadata;
    embedding: number[];
}

export interface RankedResult {
    id: string;
    content: string;
    sourceType: SourceType;
    sourceId: string;
    metadata: DocumentMetadata;
    similarity: number;
}

export interface SearchOptions {
    topK: number;
    threshold: number;
    sourceType?: SourceType;
}

/**
 * Vector-capable document store. Similarity is cosine similarity over
 * unit-normalized vectors of the store's fixed dimension.
 */
export interface DocumentStore {
    insert(document: NewDocument): Promise<void>;
    batchInsert(documents: NewDocument[]): Promise<void>;
    search(embedding: number[], options: SearchOptions): Promise<RankedResult[]>;
    count(): Promise<number>;
    deleteAll(): Promise<void>;
}

export type ConversationRole = "user" | "assistant" | "system";

export interface NewConversationTurn {
    sessionId: string;
    role: ConversationRole;
    content: string;
}

export interface ConversationTurn extends NewConversationTurn {
    createdAt: Date;
}

/** Append-only conversation log. */
export interface ConversationStore {
    append(turn: NewConversationTurn): Promise<void>;
    /** Records all turns or none of them, in the given order. */
    appendMany(turns: NewConversationTurn[]): Promise<void>;
    /** The `limit` most recent turns of a session, oldest first. */
    recentBySession(sessionId: string, limit: number): Promise<ConversationTurn[]>;
}

export function isSourceType(value: string): value is SourceType {
    return SOURCE_TYPES.some((type) => type === value);
}

export function assertDimension(embedding: number[], dimension: number): void {
    if (embedding.length !== dimension) {
        throw new Error(`Embedding has ${embedding.length} dimensions, store expects ${dimension}.`);
    }
}
