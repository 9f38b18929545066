import axios, { AxiosInstance } from 'axios';
import { JSDOM } from 'jsdom';
import { z } from 'zod';
import { TaskPilotError } from '../utils/errors';

export interface SearchHit {
  url: string;
  title: string;
  snippet: string;
}

export interface SearchEngine {
  readonly name: string;
  search(query: string, limit: number): Promise<SearchHit[]>;
}

export class SearchEngineError extends TaskPilotError {
  constructor(engine: string, message: string, originalError?: unknown) {
    super(`${engine}: ${message}`, 'SEARCH_FAILED', originalError);
    this.name = 'SearchEngineError';
  }
}

const USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

// ── DuckDuckGo ──────────────────────────────────────────────────────────

/** Scrapes the JavaScript-free DuckDuckGo results page */
export class DuckDuckGoEngine implements SearchEngine {
  readonly name = 'duckduckgo';
  private http: AxiosInstance;

  constructor(timeoutMs = 30_000) {
    this.http = axios.create({ baseURL: 'https://html.duckduckgo.com', timeout: timeoutMs, headers: { 'User-Agent': USER_AGENT } });
  }

  async search(query: string, limit: number): Promise<SearchHit[]> {
    let html: string;
    try {
      const response = await this.http.get<string>('/html/', { params: { q: query }, responseType: 'text' });
      html = response.data;
    } catch (err) {
      throw new SearchEngineError(this.name, `request failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }
    return parseDuckDuckGoResults(html).slice(0, limit);
  }
}

export function parseDuckDuckGoResults(html: string): SearchHit[] {
  const document = new JSDOM(html).window.document;
  const hits: SearchHit[] = [];

  document.querySelectorAll('.result').forEach((result) => {
    const anchor = result.querySelector('a.result__a');
    const href = anchor?.getAttribute('href');
    if (!anchor || !href) return;

    const url = unwrapRedirect(href);
    if (!url) return;

    hits.push({
      url,
      title: anchor.textContent?.trim() ?? url,
      snippet: result.querySelector('.result__snippet')?.textContent?.trim() ?? '',
    });
  });

  return hits;
}

/** DuckDuckGo links go through `/l/?uddg=<encoded target>` */
function unwrapRedirect(href: string): string | null {
  try {
    const url = new URL(href, 'https://duckduckgo.com');
    const target = url.searchParams.get('uddg');
    const resolved = target ?? url.toString();
    return /^https?:\/\//.test(resolved) ? resolved : null;
  } catch {
    return null;
  }
}

// ── SearxNG ─────────────────────────────────────────────────────────────

const SearxngResponseSchema = z.object({
  results: z.array(z.object({ url: z.string(), title: z.string().optional(), content: z.string().optional() })),
});

/** Self-hosted SearxNG instance with the JSON output format enabled */
export class SearxngEngine implements SearchEngine {
  readonly name = 'searxng';
  private http: AxiosInstance;

  constructor(baseURL: string, timeoutMs = 30_000) {
    this.http = axios.create({ baseURL, timeout: timeoutMs });
  }

  async search(query: string, limit: number): Promise<SearchHit[]> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>('/search', { params: { q: query, format: 'json' } });
      data = response.data;
    } catch (err) {
      throw new SearchEngineError(this.name, `request failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }

    const parsed = SearxngResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SearchEngineError(this.name, 'unexpected response (is format=json enabled?)');
    }

    return parsed.data.results.slice(0, limit).map((r) => ({ url: r.url, title: r.title ?? r.url, snippet: r.content ?? '' }));
  }
}

// ── Page fetching ───────────────────────────────────────────────────────

export interface PageFetcher {
  fetch(url: string): Promise<string>;
}

export class HttpPageFetcher implements PageFetcher {
  private http: AxiosInstance;

  constructor(timeoutMs = 30_000) {
    this.http = axios.create({ timeout: timeoutMs, maxRedirects: 5, headers: { 'User-Agent': USER_AGENT, Accept: 'text/html,application/xhtml+xml' } });
  }

  async fetch(url: string): Promise<string> {
    const response = await this.http.get<string>(url, { responseType: 'text' });
    return response.data;
  }
}
