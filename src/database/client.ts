import { Pool } from "pg";
import type { Logger } from "pino";
import type { DatabaseConfig } from "../config/types";
import { getLogger } from "../utils/logger";
import * as conversations from "./conversations";
import * as documents from "./documents";
import type { Queryable } from "./queryable";
import * as search from "./search";
import {
    assertDimension,
    type ConversationStore,
    type ConversationTurn,
    type DocumentStore,
    type NewConversationTurn,
    type NewDocument,
    type RankedResult,
    type SearchOptions,
} from "./types";

export interface PostgresStoreOptions {
    /** Shared pool; the store then leaves closing it to the caller. */
    pool?: Queryable;
    logger?: Logger;
}

function isUndefinedTableError(error: unknown): boolean {
    return typeof error === "object" && error !== null && "code" in error && error.code === "42P01";
}

export function createPostgresPool(config: DatabaseConfig, logger: Logger = getLogger()): Pool {
    const pool = new Pool({
        connectionString: config.databaseUrl,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        query_timeout: config.queryTimeoutMs,
    });

    pool.on("error", (err) => {
        logger.error({ err }, "Unexpected error on idle PostgreSQL client");
    });

    return pool;
}

export class PostgresVectorStore implements DocumentStore, ConversationStore {
    protected readonly logger: Logger;
    protected readonly pool: Queryable;
    private readonly ownedPool?: Pool;

    constructor(
        protected readonly config: DatabaseConfig,
        readonly dimension: number,
        options: PostgresStoreOptions = {}
    ) {
        this.logger = (options.logger ?? getLogger()).child({ module: "vector-store" });

        if (options.pool) {
            this.pool = options.pool;
        } else {
            this.ownedPool = createPostgresPool(config, this.logger);
            this.pool = this.ownedPool;
        }
    }

    async verifyConnection(): Promise<void> {
        for (const table of [this.config.documentsTable, this.config.conversationsTable]) {
            try {
                await this.pool.query(`SELECT id FROM ${table} LIMIT 1`);
                this.logger.info(`Connected to the table "${table}"`);
            } catch (error) {
                if (isUndefinedTableError(error)) {
                    this.logger.warn(`Table "${table}" does not exist yet, apply sql/schema.sql`);
                    continue;
                }
                this.logger.error({ err: error }, `Failed to connect to PostgreSQL table "${table}"`);
                throw new Error(
                    `Failed to connect to PostgreSQL table "${table}": ${error instanceof Error ? error.message : String(error)}`
                );
            }
        }
    }

    async close(): Promise<void> {
        await this.ownedPool?.end();
    }

    async insert(document: NewDocument): Promise<void> {
        return this.batchInsert([document]);
    }

    async batchInsert(docs: NewDocument[]): Promise<void> {
        if (docs.length === 0) {
            return;
        }
        docs.forEach((doc) => assertDimension(doc.embedding, this.dimension));
        return documents.insertDocuments(this.pool, this.logger, this.config.documentsTable, docs);
    }

    async search(embedding: number[], options: SearchOptions): Promise<RankedResult[]> {
        assertDimension(embedding, this.dimension);
        return search.matchDocuments(this.pool, this.config.documentsTable, embedding, options);
    }

    async count(): Promise<number> {
        return documents.countDocuments(this.pool, this.config.documentsTable);
    }

    async deleteAll(): Promise<void> {
        return documents.deleteAllDocuments(this.pool, this.logger, this.config.documentsTable);
    }

    async append(turn: NewConversationTurn): Promise<void> {
        return conversations.appendTurn(this.pool, this.config.conversationsTable, turn);
    }

    async appendMany(turns: NewConversationTurn[]): Promise<void> {
        return conversations.appendTurns(this.pool, this.config.conversationsTable, turns);
    }

    async recentBySession(sessionId: string, limit: number): Promise<ConversationTurn[]> {
        if (limit <= 0) {
            return [];
        }
        return conversations.fetchRecentTurns(this.pool, this.config.conversationsTable, sessionId, limit);
    }
}
