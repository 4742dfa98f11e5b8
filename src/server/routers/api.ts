import { Router } from "express";
import type { Logger } from "pino";
import { createApiKeyMiddleware } from "../middleware/apiKey";
import { handleStatusRequest, triggerIndexing } from "../routes/admin";
import { handleHealthRequest } from "../routes/health";
import { handleAskRequest, handleQueryRequest } from "../routes/query";
import type { RouterContext } from "../utils/context";

export function createApiRouter(context: RouterContext, logger: Logger): Router {
    const router = Router();
    const requireApiKey = createApiKeyMiddleware(context.config.server.apiKey);

    router.get("/health", (req, res) => {
        handleHealthRequest(req, res, { indexingBusy: context.isIndexingBusy() });
    });

    router.post("/api/rag/query", async (req, res) => {
        await handleQueryRequest(req, res, context, logger);
    });

    router.get("/api/rag/ask", async (req, res) => {
        await handleAskRequest(req, res, context, logger);
    });

    router.get("/api/admin/status", requireApiKey, async (req, res) => {
        await handleStatusRequest(req, res, context, logger);
    });

    router.post("/api/admin/index", requireApiKey, async (_req, res) => {
        await triggerIndexing(res, context, logger, "index");
    });

    router.post("/api/admin/reindex", requireApiKey, async (_req, res) => {
        await triggerIndexing(res, context, logger, "reindex");
    });

    return router;
}
