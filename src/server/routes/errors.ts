import type { ErrorRequestHandler, Response } from "express";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { InvalidQueryError } from "../../query/errors";

/** 400 for rejected input, 500 with the message only for anything else. */
export function sendError(res: Response, error: unknown, logger: Logger, action: string): void {
    if (error instanceof InvalidQueryError) {
        res.status(400).json({ status: "error", message: error.message });
        return;
    }

    if (error instanceof ZodError) {
        const message = error.issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
            .join("; ");
        res.status(400).json({ status: "error", message });
        return;
    }

    logger.error({ err: error }, `${action} failed.`);
    res.status(500).json({
        status: "error",
        message: error instanceof Error ? error.message : "Internal server error.",
    });
}

function clientErrorStatus(error: unknown): number | undefined {
    if (typeof error !== "object" || error === null || !("status" in error)) {
        return undefined;
    }
    const { status } = error;
    return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

function isJsonParseFailure(error: unknown): boolean {
    return typeof error === "object" && error !== null && "type" in error && error.type === "entity.parse.failed";
}

/** Final middleware: body-parser rejections keep their 4xx status, the rest goes through {@link sendError}. */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
    return (error, _req, res, next) => {
        if (res.headersSent) {
            next(error);
            return;
        }

        if (isJsonParseFailure(error)) {
            res.status(400).json({ status: "error", message: "Request body is not valid JSON." });
            return;
        }

        const status = clientErrorStatus(error);
        if (status !== undefined) {
            res.status(status).json({
                status: "error",
                message: error instanceof Error ? error.message : "Bad request.",
            });
            return;
        }

        sendError(res, error, logger, "Request");
    };
}
