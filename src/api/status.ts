// src/api/status.ts
import type { Request, RequestHandler, Response } from "express";
import { versionInfo } from "../version";

export function healthHandler(_req: Request, res: Response) {
  res.json({ status: "ok" });
}

export function createVersionHandler(version: string): RequestHandler {
  const body = versionInfo(version);
  return (_req, res) => {
    res.json(body);
  };
}
