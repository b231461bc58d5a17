// src/config.ts
// Flags win over env, env over defaults. `.env` is loaded by the entry point.
import { parseArgs } from "util";
import { z } from "zod";
import { DEFAULT_API_URL_TEMPLATE, apiEndpoint } from "./api/wikiSummary";
import { ConfigError, errorMessage } from "./errors";
import type { AppConfig } from "./types";

export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 8080;
export const DEFAULT_LANGUAGE = "en";
export const DEFAULT_BODY_LIMIT = "1gb";

type Env = Record<string, string | undefined>;

const ConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  language: z
    .string()
    .regex(/^[a-z][a-z0-9-]*$/, "must be a lowercase language code such as en or de"),
  apiUrlTemplate: z.string().refine(
    (t) => {
      try {
        new URL(apiEndpoint(t, DEFAULT_LANGUAGE));
        return true;
      } catch {
        return false;
      }
    },
    { message: "must be an absolute URL, {lang} marks the language" }
  ),
  userAgent: z.string().min(1),
  bodyLimit: z.string().regex(/^\d+(\.\d+)?\s*(b|kb|mb|gb)?$/i, "must look like 512kb or 10mb"),
});

// single dash long flags (-lang=fr) are accepted too
function normalizeArgs(argv: string[]) {
  return argv.map((a) => (/^-[a-z]{2,}(=|$)/.test(a) ? `-${a}` : a));
}

function pick(...values: Array<string | undefined>) {
  return values.find((v) => v !== undefined && v.trim() !== "");
}

export function loadConfig(argv: string[], env: Env, version: string): AppConfig {
  let flags: { addr?: string; port?: string; lang?: string };
  try {
    flags = parseArgs({
      args: normalizeArgs(argv),
      options: {
        addr: { type: "string" },
        port: { type: "string" },
        lang: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (e) {
    throw new ConfigError(`invalid arguments: ${errorMessage(e)}`, { cause: e });
  }

  const parsed = ConfigSchema.safeParse({
    host: pick(flags.addr, env.HOST) ?? DEFAULT_HOST,
    port: pick(flags.port, env.PORT) ?? DEFAULT_PORT,
    language: pick(flags.lang, env.WIKI_LANG) ?? DEFAULT_LANGUAGE,
    apiUrlTemplate: pick(env.WIKI_API_URL) ?? DEFAULT_API_URL_TEMPLATE,
    userAgent: pick(env.WIKI_USER_AGENT) ?? `wikipedia-agent/${version}`,
    bodyLimit: pick(env.BODY_LIMIT) ?? DEFAULT_BODY_LIMIT,
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid configuration: ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}
