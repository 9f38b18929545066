import type { PageFetcher, SearchEngine, SearchHit } from '../search/engines';
import { extractPageText } from '../search/content-extractor';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

// ── Types ───────────────────────────────────────────────────────────────

export interface WebSource {
  url: string;
  title: string;
  snippet: string;
  content: string;
  /** Keyword relevance to the original query, 0.0-1.0 */
  relevance: number;
  iteration: number;
}

export interface WebSearchOptions {
  maxIterations: number;
  maxSourcesPerIteration: number;
  minConfidence: number;
}

export interface WebSearchResult {
  query: string;
  sources: WebSource[];
  confidence: number;
  iterations: number;
  queries: string[];
  summary: string;
  followUps: string[];
}

/** What the tool dispatcher needs from a web searcher */
export interface WebSearcher {
  search(query: string, options?: Partial<WebSearchOptions>): Promise<WebSearchResult>;
}

/** Scoring policy: relevance per source and confidence over the aggregate */
export interface ConfidencePolicy {
  relevance(query: string, text: string): number;
  confidence(sources: readonly WebSource[]): number;
}

const RELEVANT = 0.7;

// ── Default policy ──────────────────────────────────────────────────────

export function keywordsOf(query: string): string[] {
  return [...new Set(query.toLowerCase().split(/[^\p{L}\p{N}]+/u))].filter((w) => w.length >= 3);
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

/**
 * Share of query keywords present in the text, boosted by 20% when more than
 * one keyword matches. Confidence weighs average relevance (50%), source count
 * against five sources (30%) and average content depth against 2000 chars (20%).
 */
export const weightedConfidencePolicy: ConfidencePolicy = {
  relevance(query, text) {
    if (!text.trim()) return 0;
    const keywords = keywordsOf(query);
    if (keywords.length === 0) return 0.5;

    const haystack = text.toLowerCase();
    const matches = keywords.filter((k) => haystack.includes(k)).length;
    let score = matches / keywords.length;
    if (matches > 1) score = Math.min(1, score * 1.2);
    return round2(score);
  },

  confidence(sources) {
    if (sources.length === 0) return 0;
    const avgRelevance = sources.reduce((sum, s) => sum + s.relevance, 0) / sources.length;
    const avgLength = sources.reduce((sum, s) => sum + s.content.length, 0) / sources.length;
    const countFactor = Math.min(1, sources.length / 5);
    const depthFactor = Math.min(1, avgLength / 2000);
    return round2(avgRelevance * 0.5 + countFactor * 0.3 + depthFactor * 0.2);
  },
};

// ── Agent ───────────────────────────────────────────────────────────────

export interface WebSearchAgentOptions {
  defaults?: Partial<WebSearchOptions>;
  maxContentLength?: number;
  policy?: ConfidencePolicy;
  logger?: Logger;
}

const DEFAULT_OPTIONS: WebSearchOptions = { maxIterations: 5, maxSourcesPerIteration: 5, minConfidence: 0.7 };

/**
 * Iterative web search: query, fetch a bounded batch of pages in parallel,
 * score them, and refine the query until the aggregate confidence reaches the
 * threshold or the iteration budget runs out.
 */
export class WebSearchAgent implements WebSearcher {
  private defaults: WebSearchOptions;
  private maxContentLength: number;
  private policy: ConfidencePolicy;
  private logger: Logger;

  constructor(
    private engine: SearchEngine,
    private fetcher: PageFetcher,
    options: WebSearchAgentOptions = {},
  ) {
    this.defaults = { ...DEFAULT_OPTIONS, ...options.defaults };
    this.maxContentLength = options.maxContentLength ?? 10_000;
    this.policy = options.policy ?? weightedConfidencePolicy;
    this.logger = options.logger ?? silentLogger;
  }

  async search(query: string, overrides: Partial<WebSearchOptions> = {}): Promise<WebSearchResult> {
    const options = { ...this.defaults, ...overrides };
    const seen = new Set<string>();
    const sources: WebSource[] = [];
    const queries: string[] = [];
    let current = query;
    let confidence = 0;
    let iterations = 0;

    while (iterations < options.maxIterations) {
      iterations++;
      queries.push(current);

      let hits: SearchHit[];
      try {
        hits = await this.engine.search(current, options.maxSourcesPerIteration * 2);
      } catch (err) {
        // Nothing gathered yet: the caller must hear about the failure
        if (sources.length === 0) throw err;
        this.logger.warn('Search iteration failed, keeping earlier sources', { iteration: iterations, error: errorMessage(err) });
        break;
      }

      const fresh = hits.filter((h) => !seen.has(h.url)).slice(0, options.maxSourcesPerIteration);
      fresh.forEach((h) => seen.add(h.url));

      const iteration = iterations;
      const fetched = await Promise.all(fresh.map((hit) => this.collect(query, hit, iteration)));
      sources.push(...fetched);

      confidence = this.policy.confidence(sources);
      this.logger.debug('Search iteration complete', { iteration, query: current, newSources: fetched.length, confidence });

      if (confidence >= options.minConfidence) break;

      const next = refineQuery(query, sources);
      if (fresh.length === 0 && queries.includes(next)) break;
      current = next;
    }

    const ranked = [...sources].sort((a, b) => b.relevance - a.relevance);
    return {
      query,
      sources: ranked,
      confidence,
      iterations,
      queries,
      summary: summarize(ranked),
      followUps: suggestFollowUps(query, ranked),
    };
  }

  private async collect(query: string, hit: SearchHit, iteration: number): Promise<WebSource> {
    let content = '';
    let title = hit.title;
    try {
      const html = await this.fetcher.fetch(hit.url);
      const page = extractPageText(html, hit.url, this.maxContentLength);
      content = page.text;
      if (!title && page.title) title = page.title;
    } catch (err) {
      this.logger.debug('Page fetch failed, using snippet', { url: hit.url, error: errorMessage(err) });
      content = hit.snippet;
    }

    const relevance = this.policy.relevance(query, `${title}\n${hit.snippet}\n${content}`);
    return { url: hit.url, title, snippet: hit.snippet, content, relevance, iteration };
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────

/**
 * No relevant source yet: broaden toward tutorials. Otherwise add the most
 * frequent new title word (4+ letters) of the relevant sources.
 */
export function refineQuery(query: string, sources: readonly WebSource[]): string {
  const relevant = sources.filter((s) => s.relevance >= RELEVANT);
  if (relevant.length === 0) return `${query} guide tutorial`;

  const queryWords = new Set(query.toLowerCase().split(/\s+/));
  const counts = new Map<string, number>();
  for (const source of relevant) {
    for (const word of source.title.toLowerCase().match(/\b\w{4,}\b/g) ?? []) {
      if (!queryWords.has(word)) counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }

  let best: string | undefined;
  let bestCount = 0;
  for (const [word, count] of counts) {
    if (count > bestCount) {
      best = word;
      bestCount = count;
    }
  }

  return best ? `${query} ${best}` : query;
}

export function summarize(sources: readonly WebSource[]): string {
  if (sources.length === 0) return 'No relevant sources found.';
  const lines = [`Found ${sources.length} sources.`];
  sources.slice(0, 3).forEach((s, i) => lines.push(`${i + 1}. ${s.title} (relevance: ${Math.round(s.relevance * 100)}%)`));
  return lines.join('\n');
}

export function suggestFollowUps(query: string, sources: readonly WebSource[]): string[] {
  const titles = sources.map((s) => s.title.toLowerCase()).join(' ');
  const suggestions: Array<[string, string]> = [
    ['tutorial', `${query} tutorial`],
    ['example', `${query} examples`],
    ['documentation', `${query} official documentation`],
  ];
  return suggestions.filter(([keyword]) => !titles.includes(keyword)).map(([, suggestion]) => suggestion);
}
