// src/api/summary.ts
import { LookupError, errorMessage, isLookupError } from "../errors";
import type { EncyclopediaProvider, LookupResult, SummaryFetcher } from "../types";

// One resolve + one summary request per call. No retry, no cache.
export function createSummaryFetcher(
  provider: EncyclopediaProvider,
  language: string
): SummaryFetcher {
  return async function fetchSummary(topic: string): Promise<LookupResult> {
    try {
      const page = await provider.resolvePage(topic, language);
      const summary = await provider.getSummary(page);
      return { ok: true, summary };
    } catch (e) {
      if (isLookupError(e)) return { ok: false, error: e };
      return {
        ok: false,
        error: new LookupError("TransportFailure", topic, errorMessage(e), { cause: e }),
      };
    }
  };
}
