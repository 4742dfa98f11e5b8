import type { Request, Response } from "express";
import type { Logger } from "pino";
import { reindex, runIndexingPipeline } from "../../ingest/pipeline";
import type { RouterContext } from "../utils/context";
import { sendError } from "./errors";

export type AdminRouteContext = RouterContext;

export type IndexingMode = "index" | "reindex";

export async function triggerIndexing(
    res: Response,
    context: AdminRouteContext,
    logger: Logger,
    mode: IndexingMode
): Promise<void> {
    if (context.isIndexingBusy()) {
        res.status(409).json({ status: "error", message: "Indexing already running." });
        return;
    }

    context.setIndexingBusy(true);
    const startedAt = Date.now();

    try {
        logger.info({ mode }, "Starting indexing.");
        const run = mode === "reindex" ? reindex : runIndexingPipeline;
        const stats = await run(context.banking, context.store, context.llm.embedding, {
            pageSize: context.config.indexing.pageSize,
            logger,
        });
        res.json({ status: "ok", mode, durationMs: Date.now() - startedAt, stats });
    } catch (error) {
        sendError(res, error, logger, "Indexing");
    } finally {
        context.setIndexingBusy(false);
    }
}

export async function handleStatusRequest(
    _req: Request,
    res: Response,
    context: AdminRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const [entities, embeddings] = await Promise.all([context.banking.counts(), context.store.count()]);
        res.json({
            ...entities,
            embeddings,
            embeddingProvider: context.llm.embedding.name,
            llmProvider: context.llm.chat.name,
            embeddingDimension: context.llm.embedding.dimension,
            indexingBusy: context.isIndexingBusy(),
        });
    } catch (error) {
        sendError(res, error, logger, "Status endpoint");
    }
}
