import type { Server } from "node:http";
import express from "express";
import { loadAppConfig } from "../config/loadConfig";
import { PostgresBankingDataSource } from "../database/banking";
import { PostgresVectorStore, createPostgresPool } from "../database/client";
import { runIndexingPipeline } from "../ingest/pipeline";
import { createLLMClient } from "../llm/factory";
import { configureLogger } from "../utils/logger";
import { createApiRouter } from "./routers/api";
import { createErrorHandler } from "./routes/errors";
import { type ServerContext, createRouterContext } from "./utils/context";

export interface ServerOptions {
    configPath?: string;
    port?: number;
}

type ExpressApp = ReturnType<typeof express>;

export interface RunningServer {
    app: ExpressApp;
    port: number;
    close(): Promise<void>;
}

async function createContext(configPath?: string): Promise<ServerContext> {
    const config = await loadAppConfig(configPath);

    const logger = configureLogger(config.logging);
    logger.info("Loaded server configuration.");

    if (!config.server.apiKey) {
        logger.warn("BANKRAG_SERVER_API_KEY is not set; admin routes are open.");
    }

    const llm = createLLMClient(config.llm, logger);
    const pool = createPostgresPool(config.database, logger);
    const store = new PostgresVectorStore(config.database, config.llm.embedding.dimension, { pool, logger });
    await store.verifyConnection();

    logger.info(
        { embeddingProvider: llm.embedding.name, llmProvider: llm.chat.name, dimension: llm.embedding.dimension },
        "Providers initialised."
    );

    return {
        config,
        llm,
        store,
        banking: new PostgresBankingDataSource(pool),
        logger,
        indexingBusy: false,
        pool,
    };
}

export function createApp(context: ServerContext): ExpressApp {
    const app = express();
    app.use(express.json());
    app.use(createApiRouter(createRouterContext(context), context.logger));
    app.use(createErrorHandler(context.logger));
    return app;
}

/** Runs the indexing pipeline in the background, holding the busy flag meanwhile. */
export async function indexOnStartup(context: ServerContext): Promise<void> {
    context.indexingBusy = true;
    try {
        const stats = await runIndexingPipeline(context.banking, context.store, context.llm.embedding, {
            pageSize: context.config.indexing.pageSize,
            logger: context.logger,
        });
        context.logger.info({ stats }, "Startup indexing finished.");
    } catch (error) {
        context.logger.error({ err: error }, "Startup indexing failed.");
    } finally {
        context.indexingBusy = false;
    }
}

export async function createServer(options: ServerOptions = {}): Promise<{ app: ExpressApp; context: ServerContext }> {
    const context = await createContext(options.configPath);
    return { app: createApp(context), context };
}

export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
    const { app, context } = await createServer(options);
    const logger = context.logger;
    const port = options.port ?? context.config.server.port;

    const server: Server = await new Promise((resolve, reject) => {
        const listener = app
            .listen(port, () => {
                listener.off("error", reject);
                resolve(listener);
            })
            .on("error", reject);
    });

    logger.info({ port }, "Server listening.");

    if (context.config.indexing.onStartup) {
        void indexOnStartup(context);
    }

    return {
        app,
        port,
        close: async () => {
            await new Promise<void>((resolve, reject) => {
                server.close((error) => {
                    if (error) {
                        reject(error);
                    } else {
                        resolve();
                    }
                });
            });
            await context.pool?.end();
        },
    };
}
