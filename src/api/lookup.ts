// src/api/lookup.ts
// POST /lookup: body is the topic, response is the summary text
import express from "express";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { errorMessage } from "../errors";
import type { SummaryFetcher } from "../types";
import { sendText, sendTextError } from "../utils/respond";

export function requirePost(req: Request, res: Response, next: NextFunction) {
  if (req.method !== "POST") {
    res.setHeader("Allow", "POST");
    return sendTextError(res, 405, "POST required");
  }
  next();
}

// Any content type is read as text; the topic is taken verbatim
export function readTopic(limit: string): RequestHandler {
  return express.text({ type: () => true, limit, defaultCharset: "utf-8" });
}

export function createLookupHandler(fetchSummary: SummaryFetcher): RequestHandler {
  return async (req, res) => {
    const topic = typeof req.body === "string" ? req.body : "";
    try {
      const result = await fetchSummary(topic);
      if (!result.ok) {
        console.warn(`[POST /lookup] ${result.error.kind}: ${result.error.message}`);
        return sendTextError(res, 500, `lookup error: ${result.error.message}`);
      }
      sendText(res, result.summary);
    } catch (e) {
      console.error("[POST /lookup]", e);
      sendTextError(res, 500, `lookup error: ${errorMessage(e)}`);
    }
  };
}
