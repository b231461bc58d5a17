// src/app.ts
import express from "express";
import type { NextFunction, Request, Response } from "express";
import { createLookupHandler, readTopic, requirePost } from "./api/lookup";
import { createVersionHandler, healthHandler } from "./api/status";
import { DEFAULT_BODY_LIMIT } from "./config";
import { isBodyReadError } from "./errors";
import type { SummaryFetcher } from "./types";
import { sendTextError } from "./utils/respond";

export type AppDeps = {
  fetchSummary: SummaryFetcher;
  version: string;
  bodyLimit?: string;
  /** One console line per finished request (default on) */
  logRequests?: boolean;
};

function requestLog(req: Request, res: Response, next: NextFunction) {
  const started = Date.now();
  res.on("finish", () => {
    console.log(`[http] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - started}ms)`);
  });
  next();
}

function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err);
  if (isBodyReadError(err)) {
    console.warn(`[${req.method} ${req.path}] body read failed:`, err);
    return sendTextError(res, 400, "cannot read body");
  }
  console.error(`[${req.method} ${req.path}]`, err);
  sendTextError(res, 500, "internal error");
}

export function createApp(deps: AppDeps) {
  const app = express();
  app.disable("x-powered-by");
  // exact paths only: /health/ and /Health are not /health
  app.set("strict routing", true);
  app.set("case sensitive routing", true);

  if (deps.logRequests !== false) app.use(requestLog);

  app.all("/health", healthHandler);
  app.all("/version", createVersionHandler(deps.version));
  app.all(
    "/lookup",
    requirePost,
    readTopic(deps.bodyLimit ?? DEFAULT_BODY_LIMIT),
    createLookupHandler(deps.fetchSummary)
  );

  app.use(errorHandler);
  return app;
}
