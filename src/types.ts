// wikipedia-agent/src/types.ts
// Shared types: provider capability, lookup results, config

import type { LookupError } from "./errors";

/* ------------------------------------------------------------------ */
/* 1. Encyclopedia page / provider                                     */
/* ------------------------------------------------------------------ */

export interface WikiPage {
  pageId: number;
  /** Title after normalisation */
  title: string;
  language: string;
  isDisambiguation: boolean;
}

/**
 * The encyclopedia as seen by the lookup handler. Implementations throw
 * `LookupError` for every failure they can classify.
 */
export interface EncyclopediaProvider {
  resolvePage(title: string, language: string): Promise<WikiPage>;
  getSummary(page: WikiPage): Promise<string>;
}

/* ------------------------------------------------------------------ */
/* 2. Lookup results                                                   */
/* ------------------------------------------------------------------ */

export type LookupErrorKind =
  | "PageNotFound"        // no page under that title
  | "SummaryUnavailable"  // page exists, no lead extract (disambiguation, empty)
  | "TransportFailure";   // network, HTTP status, unreadable response

export type LookupResult =
  | { ok: true; summary: string }
  | { ok: false; error: LookupError };

export type SummaryFetcher = (topic: string) => Promise<LookupResult>;

/* ------------------------------------------------------------------ */
/* 3. Config                                                           */
/* ------------------------------------------------------------------ */

export interface AppConfig {
  host: string;
  port: number;
  language: string;
  /** MediaWiki endpoint, `{lang}` is replaced by the language code */
  apiUrlTemplate: string;
  userAgent: string;
  /** Body read limit for /lookup, in body-parser notation ("1gb") */
  bodyLimit: string;
}

export interface VersionInfo {
  name: string;
  version: string;
}
