import pino from "pino";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { DatabaseConfig } from "../config/types";
import { PostgresVectorStore } from "./client";
import type { Queryable } from "./queryable";
import type { NewDocument } from "./types";

const config: DatabaseConfig = {
    databaseUrl: "postgres://localhost/bankrag_test",
    documentsTable: "document_embeddings",
    conversationsTable: "chat_history",
    queryTimeoutMs: 1000,
};

const query = vi.fn();
const pool: Queryable = { query };
let store: PostgresVectorStore;

function sqlOf(call: number): string {
    return String(query.mock.calls[call][0]).replace(/\s+/g, " ").trim();
}

function paramsOf(call: number): unknown[] {
    return query.mock.calls[call][1];
}

beforeEach(() => {
    query.mockReset();
    query.mockResolvedValue({ rows: [] });
    store = new PostgresVectorStore(config, 2, { pool, logger: pino({ level: "silent" }) });
});

describe("PostgresVectorStore documents", () => {
    const documents: NewDocument[] = [
        { content: "Overdraft fee is $35.", sourceType: "POLICY", sourceId: "overdraft-policy", metadata: { policy_id: "overdraft-policy" }, embedding: [1, 0] },
        { content: "Customer C1", sourceType: "CUSTOMER_PROFILE", sourceId: "C1", embedding: [0.6, 0.8] },
    ];

    it("inserts a batch with one multi-row statement", async () => {
        await store.batchInsert(documents);

        expect(query).toHaveBeenCalledTimes(1);
        expect(sqlOf(0)).toBe(
            "INSERT INTO document_embeddings (content, source_type, source_id, metadata, embedding, created_at) VALUES "
            + "($1, $2, $3, $4::jsonb, $5::vector, NOW()), ($6, $7, $8, $9::jsonb, $10::vector, NOW())"
        );
        expect(paramsOf(0)).toEqual([
            "Overdraft fee is $35.", "POLICY", "overdraft-policy", '{"policy_id":"overdraft-policy"}', "[1,0]",
            "Customer C1", "CUSTOMER_PROFILE", "C1", "{}", "[0.6,0.8]",
        ]);
    });

    it("splits large batches into statements of 500 rows", async () => {
        const many = Array.from({ length: 501 }, (_, i): NewDocument => ({
            content: `doc ${i}`,
            sourceType: "POLICY",
            sourceId: `p${i}`,
            embedding: [1, 0],
        }));

        await store.batchInsert(many);

        expect(query).toHaveBeenCalledTimes(2);
        expect(paramsOf(0)).toHaveLength(2500);
        expect(paramsOf(1)).toEqual(["doc 500", "POLICY", "p500", "{}", "[1,0]"]);
    });

    it("rejects a batch holding an embedding of another dimension", async () => {
        await expect(store.batchInsert([{ ...documents[0], embedding: [1, 0, 0] }])).rejects.toThrow(
            "Embedding has 3 dimensions, store expects 2."
        );
        expect(query).not.toHaveBeenCalled();
    });

    it("excludes conversational documents from an unfiltered search", async () => {
        query.mockResolvedValueOnce({
            rows: [
                {
                    id: "7",
                    content: "Overdraft fee is $35.",
                    source_type: "POLICY",
                    source_id: "overdraft-policy",
                    metadata: null,
                    similarity: 0.91,
                },
            ],
        });

        const results = await store.search([1, 0], { topK: 5, threshold: 0.3 });

        expect(results).toEqual([
            {
                id: "7",
                content: "Overdraft fee is $35.",
                sourceType: "POLICY",
                sourceId: "overdraft-policy",
                metadata: {},
                similarity: 0.91,
            },
        ]);
        expect(sqlOf(0)).toContain("WHERE d.source_type <> $2 AND 1 - (d.embedding <=> q.vec) >= $3");
        expect(sqlOf(0)).toContain("ORDER BY d.embedding <=> q.vec LIMIT $4");
        expect(paramsOf(0)).toEqual(["[1,0]", "CHAT_HISTORY", 0.3, 5]);
    });

    it("matches exactly the requested source type", async () => {
        await store.search([0, 1], { topK: 3, threshold: 0, sourceType: "ACCOUNT_SUMMARY" });

        expect(sqlOf(0)).toContain("WHERE d.source_type = $2");
        expect(paramsOf(0)).toEqual(["[0,1]", "ACCOUNT_SUMMARY", 0, 3]);
    });

    it("rejects rows with an unknown source type", async () => {
        query.mockResolvedValueOnce({
            rows: [{ id: "1", content: "?", source_type: "LEGACY", source_id: "x", metadata: {}, similarity: 0.5 }],
        });

        await expect(store.search([1, 0], { topK: 1, threshold: 0 })).rejects.toThrow(
            'Document 1 has unknown source type "LEGACY"'
        );
    });

    it("counts and deletes documents", async () => {
        query.mockResolvedValueOnce({ rows: [{ count: "42" }] });

        await expect(store.count()).resolves.toBe(42);
        await store.deleteAll();

        expect(sqlOf(0)).toBe("SELECT COUNT(*) AS count FROM document_embeddings");
        expect(sqlOf(1)).toBe("DELETE FROM document_embeddings");
    });
});

describe("PostgresVectorStore conversations", () => {
    it("stores roles upper-cased", async () => {
        await store.append({ sessionId: "s1", role: "assistant", content: "The fee is $35." });

        expect(sqlOf(0)).toBe("INSERT INTO chat_history (session_id, role, content, created_at) VALUES ($1, $2, $3, NOW())");
        expect(paramsOf(0)).toEqual(["s1", "ASSISTANT", "The fee is $35."]);
    });

    it("writes several turns in one statement", async () => {
        await store.appendMany([
            { sessionId: "s1", role: "user", content: "What is the fee?" },
            { sessionId: "s1", role: "assistant", content: "$35." },
        ]);

        expect(query).toHaveBeenCalledTimes(1);
        expect(sqlOf(0)).toBe(
            "INSERT INTO chat_history (session_id, role, content, created_at) VALUES ($1, $2, $3, NOW()), ($4, $5, $6, NOW())"
        );
        expect(paramsOf(0)).toEqual(["s1", "USER", "What is the fee?", "s1", "ASSISTANT", "$35."]);
    });

    it("skips the write for no turns", async () => {
        await store.appendMany([]);

        expect(query).not.toHaveBeenCalled();
    });

    it("reads the latest turns back in chronological order", async () => {
        const createdAt = new Date("2024-05-01T10:00:00Z");
        query.mockResolvedValueOnce({
            rows: [
                { session_id: "s1", role: "USER", content: "What is the fee?", created_at: createdAt },
                { session_id: "s1", role: "ASSISTANT", content: "$35.", created_at: createdAt },
            ],
        });

        const turns = await store.recentBySession("s1", 6);

        expect(turns).toEqual([
            { sessionId: "s1", role: "user", content: "What is the fee?", createdAt },
            { sessionId: "s1", role: "assistant", content: "$35.", createdAt },
        ]);
        expect(sqlOf(0)).toContain("ORDER BY created_at DESC, id DESC LIMIT $2 ) recent ORDER BY created_at ASC, id ASC");
        expect(paramsOf(0)).toEqual(["s1", 6]);
    });
});

describe("PostgresVectorStore.verifyConnection", () => {
    it("tolerates tables that do not exist yet", async () => {
        query.mockRejectedValueOnce(Object.assign(new Error('relation "document_embeddings" does not exist'), { code: "42P01" }));

        await expect(store.verifyConnection()).resolves.toBeUndefined();
        expect(query).toHaveBeenCalledTimes(2);
    });

    it("fails on other errors", async () => {
        query.mockRejectedValueOnce(new Error("password authentication failed"));

        await expect(store.verifyConnection()).rejects.toThrow(
            'Failed to connect to PostgreSQL table "document_embeddings": password authentication failed'
        );
    });
});
