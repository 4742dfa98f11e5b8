import type { Request, Response } from "express";

export interface HealthRouteContext {
    indexingBusy: boolean;
}

export function handleHealthRequest(_req: Request, res: Response, context: HealthRouteContext): void {
    res.json({ status: "ok", indexingBusy: context.indexingBusy });
}
