import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { InMemoryVectorStore } from "../database/memory";
import type { DocumentStore, RankedResult } from "../database/types";
import { fingerprint } from "../llm/fingerprint/fingerprint";
import { SimilaritySearchGateway } from "./searchGateway";

const logger = pino({ level: "silent" });

function ranked(sourceId: string, similarity: number, sourceType: RankedResult["sourceType"] = "POLICY"): RankedResult {
    return { id: sourceId, content: sourceId, sourceType, sourceId, metadata: {}, similarity };
}

function storeReturning(search: DocumentStore["search"]): DocumentStore {
    return {
        insert: vi.fn(),
        batchInsert: vi.fn(),
        search: vi.fn(search),
        count: vi.fn(async () => 0),
        deleteAll: vi.fn(),
    };
}

describe("SimilaritySearchGateway", () => {
    it("orders, thresholds and bounds whatever the store returns", async () => {
        const store = storeReturning(async () => [
            ranked("low", 0.2),
            ranked("mid", 0.5),
            ranked("chat", 0.99, "CHAT_HISTORY"),
            ranked("high", 0.9),
            ranked("also-mid", 0.4),
        ]);
        const gateway = new SimilaritySearchGateway(store, logger);

        const results = await gateway.search([1, 0], { topK: 2, threshold: 0.3 });

        expect(results.map((result) => result.sourceId)).toEqual(["high", "mid"]);
    });

    it("keeps only the requested type when filtering", async () => {
        const store = storeReturning(async () => [ranked("chat", 0.8, "CHAT_HISTORY"), ranked("policy", 0.9)]);
        const gateway = new SimilaritySearchGateway(store, logger);

        const results = await gateway.search([1, 0], { topK: 5, threshold: 0, sourceType: "CHAT_HISTORY" });

        expect(results.map((result) => result.sourceId)).toEqual(["chat"]);
    });

    it("degrades to no results when the store fails", async () => {
        const store = storeReturning(async () => {
            throw new Error("connection terminated");
        });
        const gateway = new SimilaritySearchGateway(store, logger);

        await expect(gateway.search([1, 0], { topK: 5, threshold: 0 })).resolves.toEqual([]);
    });

    it("skips the store for a zero vector or a zero bound", async () => {
        const store = storeReturning(async () => [ranked("policy", 0.9)]);
        const gateway = new SimilaritySearchGateway(store, logger);

        await expect(gateway.search([0, 0], { topK: 5, threshold: 0 })).resolves.toEqual([]);
        await expect(gateway.search([1, 0], { topK: 0, threshold: 0 })).resolves.toEqual([]);
        expect(store.search).not.toHaveBeenCalled();
    });

    it("returns fewer results as the threshold rises", async () => {
        const store = new InMemoryVectorStore(128);
        const texts = [
            "Overdraft fee is $35 per occurrence.",
            "Wire transfers cost $25 for outgoing domestic wires.",
            "Savings accounts earn interest compounded daily.",
            "Customer C1 lives in Austin, TX.",
        ];
        await store.batchInsert(
            texts.map((text, i) => ({ content: text, sourceType: "POLICY", sourceId: `p${i}`, embedding: fingerprint(text, 128) }))
        );
        const gateway = new SimilaritySearchGateway(store, logger);
        const query = fingerprint("What is the overdraft fee?", 128);

        const thresholds = [-1, 0, 0.1, 0.2, 0.5, 1];
        const sizes: number[] = [];
        let previous: string[] | undefined;
        for (const threshold of thresholds) {
            const ids = (await gateway.search(query, { topK: 10, threshold })).map((result) => result.sourceId);
            if (previous) {
                expect(previous).toEqual(expect.arrayContaining(ids));
            }
            sizes.push(ids.length);
            previous = ids;
        }

        expect(sizes[0]).toBe(4);
        expect([...sizes].sort((a, b) => b - a)).toEqual(sizes);
    });
});
