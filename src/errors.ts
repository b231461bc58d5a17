import type { LookupErrorKind } from "./types";

export class LookupError extends Error {
  readonly kind: LookupErrorKind;
  readonly topic: string;

  constructor(kind: LookupErrorKind, topic: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LookupError";
    this.kind = kind;
    this.topic = topic;
  }
}

export function isLookupError(e: unknown): e is LookupError {
  return e instanceof LookupError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// body-parser tags its errors with `type` and a 4xx `status`
export function isBodyReadError(e: unknown): boolean {
  if (typeof e !== "object" || e === null) return false;
  const type = "type" in e ? e.type : undefined;
  const status = "status" in e ? e.status : undefined;
  return typeof type === "string" && typeof status === "number" && status >= 400 && status < 500;
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}
