#!/usr/bin/env node
import "dotenv/config";
import { createSummaryFetcher } from "./api/summary";
import { createWikipediaProvider } from "./api/wikiSummary";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import type { AppConfig } from "./types";
import { closeServer, listen } from "./utils/listen";
import { resolveVersion } from "./version";

// -----------------------------
// 1) config / version
// -----------------------------
const VERSION = resolveVersion();

let config: AppConfig;
try {
  config = loadConfig(process.argv.slice(2), process.env, VERSION);
} catch (e) {
  console.error(`[wikipedia-agent] ${errorMessage(e)}`);
  process.exit(1);
}
const { host, port, language } = config;

// -----------------------------
// 2) wiring
// -----------------------------
const provider = createWikipediaProvider({
  apiUrlTemplate: config.apiUrlTemplate,
  userAgent: config.userAgent,
});

const app = createApp({
  fetchSummary: createSummaryFetcher(provider, language),
  version: VERSION,
  bodyLimit: config.bodyLimit,
});

// -----------------------------
// 3) listen
// -----------------------------
listen(app, port, host)
  .then((server) => {
    console.log(`[wikipedia-agent] v${VERSION} listening on http://${host}:${port} (lang=${language})`);

    function shutdown(signal: string) {
      console.log(`[wikipedia-agent] ${signal} received, closing`);
      closeServer(server)
        .then(() => process.exit(0))
        .catch((err) => {
          console.error("[wikipedia-agent] close failed:", err);
          process.exit(1);
        });
    }

    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
  })
  .catch((err) => {
    console.error(`[wikipedia-agent] cannot listen on ${host}:${port}:`, err);
    process.exit(1);
  });
