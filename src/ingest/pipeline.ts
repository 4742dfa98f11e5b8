import type { Logger } from "pino";
import type { Account, BankingDataSource } from "../database/banking";
import type { DocumentStore } from "../database/types";
import type { EmbeddingProvider } from "../llm/types";
import { moduleLogger } from "../utils/logger";
import {
    BANKING_POLICIES,
    accountSummaryDocument,
    customerProfileDocument,
    policyDocument,
    transactionPatternDocument,
    type PendingDocument,
} from "./documents";

export interface IndexStats {
    profiles: number;
    accounts: number;
    patterns: number;
    policies: number;
    total: number;
    skipped: boolean;
}

export interface IndexingOptions {
    pageSize: number;
    /** Index even when the store already holds documents. */
    force?: boolean;
    logger?: Logger;
}

interface IndexingContext {
    source: BankingDataSource;
    store: DocumentStore;
    embedding: EmbeddingProvider;
    pageSize: number;
    logger: Logger;
}

async function embedAndStore(ctx: IndexingContext, documents: PendingDocument[]): Promise<number> {
    if (documents.length === 0) {
        return 0;
    }

    const embeddings = await ctx.embedding.embedBatch(documents.map((document) => document.content));
    await ctx.store.batchInsert(
        documents.map((document, index) => ({ ...document, embedding: embeddings[index] }))
    );
    return documents.length;
}

async function indexPages<T>(
    ctx: IndexingContext,
    label: string,
    fetchPage: (page: number, pageSize: number) => Promise<T[]>,
    toDocuments: (items: T[]) => Promise<PendingDocument[]>
): Promise<number> {
    ctx.logger.info(`Indexing ${label}...`);
    let indexed = 0;

    for (let page = 0; ; page += 1) {
        const items = await fetchPage(page, ctx.pageSize);
        if (items.length === 0) {
            break;
        }

        indexed += await embedAndStore(ctx, await toDocuments(items));
        ctx.logger.debug({ page, indexed }, `Indexed page of ${label}`);

        if (items.length < ctx.pageSize) {
            break;
        }
    }

    return indexed;
}

async function patternDocuments(ctx: IndexingContext, accounts: Account[]): Promise<PendingDocument[]> {
    const documents: PendingDocument[] = [];
    for (const account of accounts) {
        const transactions = await ctx.source.transactionsForAccount(account.id);
        if (transactions.length > 0) {
            documents.push(transactionPatternDocument(account, transactions));
        }
    }
    return documents;
}

/**
 * Embeds customer profiles, account summaries, per-account transaction
 * patterns and the static banking policies into the document store. Skips
 * when the store already has documents unless `force` is set.
 */
export async function runIndexingPipeline(
    source: BankingDataSource,
    store: DocumentStore,
    embedding: EmbeddingProvider,
    options: IndexingOptions
): Promise<IndexStats> {
    const logger = moduleLogger("indexer", options.logger);

    if (!options.force) {
        const existing = await store.count();
        if (existing > 0) {
            logger.info(`Embeddings already exist (${existing}), skipping indexing.`);
            return { profiles: 0, accounts: 0, patterns: 0, policies: 0, total: 0, skipped: true };
        }
    }

    const ctx: IndexingContext = {
        source,
        store,
        embedding,
        pageSize: Math.max(1, options.pageSize),
        logger,
    };

    const startedAt = Date.now();
    logger.info("Starting document indexing...");

    const profiles = await indexPages(
        ctx,
        "customer profiles",
        (page, size) => source.customers(page, size),
        async (customers) => customers.map(customerProfileDocument)
    );
    const accounts = await indexPages(
        ctx,
        "account summaries",
        (page, size) => source.accounts(page, size),
        async (items) => items.map(accountSummaryDocument)
    );
    const patterns = await indexPages(
        ctx,
        "transaction patterns",
        (page, size) => source.accounts(page, size),
        (items) => patternDocuments(ctx, items)
    );

    logger.info("Indexing banking policies...");
    const policies = await embedAndStore(ctx, BANKING_POLICIES.map(policyDocument));

    const total = profiles + accounts + patterns + policies;
    logger.info(
        { durationMs: Date.now() - startedAt },
        `Indexing complete: ${profiles} profiles, ${accounts} accounts, ${patterns} patterns, ${policies} policies`
    );

    return { profiles, accounts, patterns, policies, total, skipped: false };
}

/** Deletes every document, then indexes from scratch. */
export async function reindex(
    source: BankingDataSource,
    store: DocumentStore,
    embedding: EmbeddingProvider,
    options: IndexingOptions
): Promise<IndexStats> {
    moduleLogger("indexer", options.logger).info("Deleting all existing embeddings for re-index...");
    await store.deleteAll();
    return runIndexingPipeline(source, store, embedding, { ...options, force: true });
}
