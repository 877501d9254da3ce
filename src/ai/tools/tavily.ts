/**
 * Tavily Web Search API wrapper.
 *
 * Docs: https://docs.tavily.com/documentation/api-reference/endpoint/search
 *
 * Used by the researcher for grounded web search. `topic: 'news'` narrows
 * results to recent articles.
 */

export type TavilySearchDepth = 'basic' | 'advanced';
export type TavilyTopic = 'general' | 'news';

export interface TavilySearchOptions {
  /** API key; an empty key yields empty results */
  readonly apiKey: string;
  readonly searchDepth?: TavilySearchDepth;
  readonly topic?: TavilyTopic;
  readonly maxResults?: number;
  readonly includeAnswer?: boolean;
  readonly timeoutMs?: number;
  /** Caller's cancellation; combined with the request timeout */
  readonly signal?: AbortSignal;
  readonly endpoint?: string;
}

export interface TavilySearchResult {
  readonly title: string;
  readonly url: string;
  readonly content?: string;
  readonly score?: number;
  readonly publishedDate?: string;
}

export interface TavilySearchResponse {
  readonly query: string;
  readonly answer: string | null;
  readonly results: readonly TavilySearchResult[];
}

export const TAVILY_SEARCH_ENDPOINT = 'https://api.tavily.com/search';

/**
 * Raised for non-2xx responses so the caller's retry policy can classify
 * the status (429 and 5xx are retryable).
 */
export class TavilyRequestError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'TavilyRequestError';
  }
}

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

function safeString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseResult(raw: unknown): TavilySearchResult | null {
  if (!isRecord(raw)) return null;
  const title = safeString(raw.title);
  const url = safeString(raw.url);
  if (!title || !url) return null;

  const content = safeString(raw.content);
  const publishedDate = safeString(raw.published_date);
  const score = typeof raw.score === 'number' ? raw.score : undefined;

  return {
    title,
    url,
    ...(content ? { content } : {}),
    ...(publishedDate ? { publishedDate } : {}),
    ...(score !== undefined ? { score } : {}),
  };
}

export function parseTavilyResponse(query: string, raw: unknown): TavilySearchResponse {
  if (!isRecord(raw)) {
    return { query, answer: null, results: [] };
  }

  const resultsRaw = Array.isArray(raw.results) ? raw.results : [];
  const results = resultsRaw
    .map(parseResult)
    .filter((r): r is TavilySearchResult => r !== null);

  return { query, answer: safeString(raw.answer) ?? null, results };
}

/**
 * Tavily search wrapper.
 *
 * Empty queries and a missing API key return empty results without a request.
 * HTTP failures throw `TavilyRequestError`; network failures and aborts
 * propagate from fetch.
 */
export async function tavilySearch(
  query: string,
  options: TavilySearchOptions
): Promise<TavilySearchResponse> {
  const cleanedQuery = query.trim();
  if (cleanedQuery.length === 0 || options.apiKey.length === 0) {
    return { query: cleanedQuery, answer: null, results: [] };
  }

  const timeoutMs = clampInt(options.timeoutMs ?? 15_000, 1_000, 60_000);
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const res = await fetch(options.endpoint ?? TAVILY_SEARCH_ENDPOINT, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
      body: JSON.stringify({
        query: cleanedQuery,
        search_depth: options.searchDepth ?? 'basic',
        topic: options.topic ?? 'general',
        max_results: clampInt(options.maxResults ?? 5, 1, 20), // Tavily allows up to 20
        include_answer: options.includeAnswer ?? false,
      }),
      signal: controller.signal,
    });

    if (!res.ok) {
      throw new TavilyRequestError(res.status, `Tavily search failed with status ${res.status}`);
    }

    const json: unknown = await res.json();
    return parseTavilyResponse(cleanedQuery, json);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
  }
}
