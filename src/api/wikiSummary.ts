// src/api/wikiSummary.ts
// MediaWiki Action API client: title -> page -> lead extract
import fetch, { type Response } from "node-fetch";
import { z } from "zod";
import { LookupError, errorMessage } from "../errors";
import type { EncyclopediaProvider, WikiPage } from "../types";

export const DEFAULT_API_URL_TEMPLATE = "https://{lang}.wikipedia.org/w/api.php";

const PageSchema = z.object({
  pageid: z.number().optional(),
  title: z.string().optional(),
  missing: z.boolean().optional(),
  invalid: z.boolean().optional(),
  invalidreason: z.string().optional(),
  pageprops: z.record(z.unknown()).optional(),
  extract: z.string().optional(),
});

const QueryResponseSchema = z.object({
  query: z
    .object({
      pages: z.array(PageSchema).optional(),
      redirects: z.array(z.object({ from: z.string(), to: z.string() })).optional(),
    })
    .optional(),
  error: z
    .object({
      code: z.string(),
      info: z.string(),
    })
    .optional(),
});

type QueryResponse = z.infer<typeof QueryResponseSchema>;

export type WikipediaProviderOptions = {
  apiUrlTemplate?: string;
  userAgent: string;
};

export function apiEndpoint(template: string, language: string) {
  return template.split("{lang}").join(language);
}

// "|" separates titles; a leading U+001F switches the separator so the whole topic stays one title
function titlesParam(topic: string) {
  return topic.includes("|") ? `\u001f${topic}` : topic;
}

export function createWikipediaProvider(options: WikipediaProviderOptions): EncyclopediaProvider {
  const template = options.apiUrlTemplate ?? DEFAULT_API_URL_TEMPLATE;

  async function query(
    language: string,
    topic: string,
    params: Record<string, string>
  ): Promise<QueryResponse> {
    const endpoint = apiEndpoint(template, language);
    const url =
      `${endpoint}?` +
      new URLSearchParams({
        action: "query",
        format: "json",
        formatversion: "2",
        ...params,
      }).toString();

    let res: Response;
    try {
      res = await fetch(url, {
        headers: { "User-Agent": options.userAgent, Accept: "application/json" },
      });
    } catch (e) {
      throw new LookupError(
        "TransportFailure",
        topic,
        `request to ${endpoint} failed: ${errorMessage(e)}`,
        { cause: e }
      );
    }

    if (!res.ok) {
      throw new LookupError("TransportFailure", topic, `wikipedia responded with status ${res.status}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (e) {
      throw new LookupError("TransportFailure", topic, "wikipedia returned an unreadable response", {
        cause: e,
      });
    }

    const parsed = QueryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LookupError("TransportFailure", topic, "wikipedia returned an unexpected response", {
        cause: parsed.error,
      });
    }
    if (parsed.data.error) {
      const { code, info } = parsed.data.error;
      throw new LookupError("TransportFailure", topic, `wikipedia api error (${code}): ${info}`);
    }
    return parsed.data;
  }

  async function resolvePage(title: string, language: string): Promise<WikiPage> {
    const data = await query(language, title, {
      prop: "info|pageprops",
      ppprop: "disambiguation",
      redirects: "1",
      titles: titlesParam(title),
    });

    // redirects=1 reports the hop; a redirecting title is not a page of its own
    const redirect = data.query?.redirects?.[0];
    if (redirect) {
      throw new LookupError("PageNotFound", title, `"${title}" redirects to "${redirect.to}"`);
    }

    const page = data.query?.pages?.[0];
    if (!page || page.invalid || page.missing || page.pageid === undefined) {
      const reason = page?.invalidreason ? ` (${page.invalidreason})` : "";
      throw new LookupError("PageNotFound", title, `page "${title}" does not exist${reason}`);
    }

    return {
      pageId: page.pageid,
      title: page.title ?? title,
      language,
      isDisambiguation: page.pageprops !== undefined && "disambiguation" in page.pageprops,
    };
  }

  async function getSummary(page: WikiPage): Promise<string> {
    if (page.isDisambiguation) {
      throw new LookupError(
        "SummaryUnavailable",
        page.title,
        `"${page.title}" is a disambiguation page`
      );
    }

    const data = await query(page.language, page.title, {
      prop: "extracts",
      exintro: "1",
      explaintext: "1",
      pageids: String(page.pageId),
    });

    const extract = (data.query?.pages?.[0]?.extract ?? "").trim();
    if (!extract) {
      throw new LookupError("SummaryUnavailable", page.title, `no summary available for "${page.title}"`);
    }
    return extract;
  }

  return { resolvePage, getSummary };
}
