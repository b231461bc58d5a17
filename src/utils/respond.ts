// src/utils/respond.ts
import type { Response } from "express";

// Plain text error: message + newline, never sniffed as HTML
export function sendTextError(res: Response, status: number, message: string) {
  res.status(status);
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.type("text/plain").send(`${message}\n`);
}

export function sendText(res: Response, text: string) {
  res.type("text/plain").send(text);
}
