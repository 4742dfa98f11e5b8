#!/usr/bin/env node
import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { PostgresBankingDataSource } from "../database/banking";
import { PostgresVectorStore, createPostgresPool } from "../database/client";
import { reindex, runIndexingPipeline, type IndexStats } from "../ingest/pipeline";
import { createEmbeddingProvider } from "../llm/factory";
import { configureLogger, getLogger } from "../utils/logger";

export interface CliOptions {
    configPath: string;
    reindex: boolean;
}

function printHelp(): void {
    const lines = [
        "Usage: banking-rag-index [--reindex] [--config <path-to-env>]",
        "",
        "Options:",
        "  -r, --reindex  Delete every embedded document before indexing.",
        "  -c, --config   Path to the .env configuration file (defaults to .env in package root).",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

export function parseArgs(argv: string[]): CliOptions {
    let configPath: string | undefined;
    let reindexAll = false;

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        if (arg === "-h" || arg === "--help") {
            printHelp();
            process.exit(0);
        }

        if (arg === "-r" || arg === "--reindex") {
            reindexAll = true;
            continue;
        }

        if (arg === "-c" || arg === "--config") {
            configPath = argv[i + 1];
            i += 1;
            continue;
        }

        if (!configPath) {
            configPath = arg;
        }
    }

    return { configPath: resolveConfigPath(configPath), reindex: reindexAll };
}

function logStats(stats: IndexStats): void {
    const logger = getLogger();
    if (stats.skipped) {
        logger.info("Store already holds documents; nothing indexed. Use --reindex to rebuild.");
        return;
    }
    logger.info(`Customer profiles: ${stats.profiles}`);
    logger.info(`Account summaries: ${stats.accounts}`);
    logger.info(`Transaction patterns: ${stats.patterns}`);
    logger.info(`Policies: ${stats.policies}`);
    logger.info(`Total documents: ${stats.total}`);
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    const config = await loadAppConfig(options.configPath);

    const logger = configureLogger(config.logging);
    logger.info(`Loaded configuration from ${options.configPath}`);

    const embedding = createEmbeddingProvider(config.llm.embedding, logger);
    const pool = createPostgresPool(config.database, logger);
    const store = new PostgresVectorStore(config.database, config.llm.embedding.dimension, { pool, logger });

    try {
        await store.verifyConnection();

        const run = options.reindex ? reindex : runIndexingPipeline;
        const stats = await run(new PostgresBankingDataSource(pool), store, embedding, {
            pageSize: config.indexing.pageSize,
            logger,
        });

        logStats(stats);
        logger.info("Indexing completed.");
    } finally {
        await pool.end();
    }
}

if (require.main === module) {
    main().catch((error) => {
        getLogger().error({ err: error }, "Indexing failed.");
        process.exitCode = 1;
    });
}
