import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { AppConfig } from "../../config/types";
import { SOURCE_TYPES } from "../../database/types";
import type { LLMClientBundle } from "../../llm/types";
import { askAi, MAX_SESSION_ID_LENGTH, type AskAiOptions } from "../../query/askAi";
import type { RagStore } from "../utils/context";
import { sendError } from "./errors";

export interface QueryRouteContext {
    config: AppConfig;
    llm: LLMClientBundle;
    store: RagStore;
}

const optionalSessionId = z
    .string()
    .trim()
    .max(MAX_SESSION_ID_LENGTH, `must be at most ${MAX_SESSION_ID_LENGTH} characters`)
    .optional()
    .transform((value) => (value ? value : undefined));

export const queryRequestSchema = z.object({
    query: z.string({ required_error: "query is required" }),
    sessionId: optionalSessionId,
    sourceType: z.enum(SOURCE_TYPES).optional(),
});

export const askQuerySchema = z.object({
    q: z.string({ required_error: "q is required" }),
    sessionId: optionalSessionId,
    sourceType: z.enum(SOURCE_TYPES).optional(),
});

async function respondWithAnswer(
    res: Response,
    context: QueryRouteContext,
    logger: Logger,
    options: AskAiOptions
): Promise<void> {
    const response = await askAi(
        {
            llm: context.llm,
            documents: context.store,
            conversations: context.store,
            retrieval: context.config.retrieval,
            logger,
        },
        options
    );
    res.json(response);
}

export async function handleQueryRequest(
    req: Request,
    res: Response,
    context: QueryRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const body = queryRequestSchema.parse(req.body ?? {});
        await respondWithAnswer(res, context, logger, body);
    } catch (error) {
        sendError(res, error, logger, "Query endpoint");
    }
}

export async function handleAskRequest(
    req: Request,
    res: Response,
    context: QueryRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const params = askQuerySchema.parse(req.query);
        await respondWithAnswer(res, context, logger, {
            query: params.q,
            sessionId: params.sessionId,
            sourceType: params.sourceType,
        });
    } catch (error) {
        sendError(res, error, logger, "Ask endpoint");
    }
}
