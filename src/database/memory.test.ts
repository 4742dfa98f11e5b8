import { beforeEach, describe, expect, it } from "vitest";
import { InMemoryVectorStore } from "./memory";

let store: InMemoryVectorStore;

beforeEach(async () => {
    store = new InMemoryVectorStore(2);
    await store.batchInsert([
        { content: "Overdraft fee is $35.", sourceType: "POLICY", sourceId: "overdraft-policy", embedding: [1, 0] },
        { content: "CHECKING account ACC1", sourceType: "ACCOUNT_SUMMARY", sourceId: "ACC1", embedding: [0.8, 0.6] },
        { content: "USER: what is the fee?", sourceType: "CHAT_HISTORY", sourceId: "session-1", embedding: [1, 0] },
        { content: "Customer C1", sourceType: "CUSTOMER_PROFILE", sourceId: "C1", embedding: [0, 1] },
    ]);
});

describe("InMemoryVectorStore documents", () => {
    it("ranks by cosine similarity and leaves out conversational documents", async () => {
        const results = await store.search([1, 0], { topK: 5, threshold: 0 });

        expect(results.map((result) => [result.id, result.sourceId, result.similarity])).toEqual([
            ["1", "overdraft-policy", 1],
            ["2", "ACC1", 0.8],
            ["4", "C1", 0],
        ]);
    });

    it("applies the threshold and the result bound", async () => {
        const aboveHalf = await store.search([1, 0], { topK: 5, threshold: 0.5 });
        expect(aboveHalf.map((result) => result.sourceId)).toEqual(["overdraft-policy", "ACC1"]);

        const top = await store.search([1, 0], { topK: 1, threshold: 0 });
        expect(top.map((result) => result.sourceId)).toEqual(["overdraft-policy"]);
    });

    it("returns only the requested source type", async () => {
        const chat = await store.search([1, 0], { topK: 5, threshold: 0, sourceType: "CHAT_HISTORY" });
        expect(chat.map((result) => result.sourceId)).toEqual(["session-1"]);

        const policies = await store.search([1, 0], { topK: 5, threshold: 0, sourceType: "POLICY" });
        expect(policies.map((result) => result.sourceId)).toEqual(["overdraft-policy"]);
    });

    it("counts and clears documents", async () => {
        await expect(store.count()).resolves.toBe(4);
        await store.deleteAll();
        await expect(store.count()).resolves.toBe(0);
    });

    it("rejects embeddings of another dimension", async () => {
        await expect(
            store.insert({ content: "x", sourceType: "POLICY", sourceId: "x", embedding: [1, 0, 0] })
        ).rejects.toThrow("Embedding has 3 dimensions, store expects 2.");
        await expect(store.count()).resolves.toBe(4);
    });
});

describe("InMemoryVectorStore conversations", () => {
    it("returns the most recent turns of a session, oldest first", async () => {
        await store.append({ sessionId: "s1", role: "user", content: "first" });
        await store.append({ sessionId: "s1", role: "assistant", content: "second" });
        await store.append({ sessionId: "s2", role: "user", content: "other" });
        await store.append({ sessionId: "s1", role: "user", content: "third" });

        const turns = await store.recentBySession("s1", 2);

        expect(turns.map((turn) => [turn.role, turn.content])).toEqual([
            ["assistant", "second"],
            ["user", "third"],
        ]);
        await expect(store.recentBySession("s1", 0)).resolves.toEqual([]);
        await expect(store.recentBySession("unknown", 6)).resolves.toEqual([]);
    });
});
