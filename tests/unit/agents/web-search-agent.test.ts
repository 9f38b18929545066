import { WebSearchAgent, refineQuery, suggestFollowUps, summarize, weightedConfidencePolicy } from '../../../src/agents/web-search-agent';
import type { ConfidencePolicy, WebSource } from '../../../src/agents/web-search-agent';
import type { PageFetcher, SearchEngine, SearchHit } from '../../../src/search/engines';

const HITS: SearchHit[] = [
  { url: 'https://a.example/1', title: 'Nginx install guide', snippet: 'install nginx on ubuntu' },
  { url: 'https://b.example/2', title: 'Nginx config guide', snippet: 'configure server blocks' },
];

const source = (overrides: Partial<WebSource>): WebSource => ({ url: 'u', title: 't', snippet: '', content: '', relevance: 0, iteration: 1, ...overrides });

describe('WebSearchAgent', () => {
  let engine: jest.Mocked<SearchEngine>;
  let fetcher: jest.Mocked<PageFetcher>;

  const fixedPolicy = (confidence: number): ConfidencePolicy => ({ relevance: () => 0.9, confidence: () => confidence });

  beforeEach(() => {
    engine = { name: 'stub', search: jest.fn() };
    fetcher = { fetch: jest.fn().mockRejectedValue(new Error('offline')) };
  });

  it('stops once the confidence threshold is met', async () => {
    engine.search.mockResolvedValue(HITS);
    const agent = new WebSearchAgent(engine, fetcher, { policy: fixedPolicy(0.8) });

    const result = await agent.search('nginx setup');

    expect(result.iterations).toBe(1);
    expect(result.queries).toEqual(['nginx setup']);
    expect(result.confidence).toBe(0.8);
    expect(result.sources.map((s) => s.content)).toEqual(['install nginx on ubuntu', 'configure server blocks']);
    expect(engine.search).toHaveBeenCalledWith('nginx setup', 10);
  });

  it('refines the query from relevant titles while confidence is low', async () => {
    engine.search.mockResolvedValue(HITS);
    const agent = new WebSearchAgent(engine, fetcher, { policy: fixedPolicy(0.1) });

    const result = await agent.search('nginx setup', { maxIterations: 2 });

    expect(result.iterations).toBe(2);
    expect(result.queries).toEqual(['nginx setup', 'nginx setup guide']);
    expect(result.sources).toHaveLength(2);
  });

  it('fails when the first search fails', async () => {
    engine.search.mockRejectedValue(new Error('engine down'));
    await expect(new WebSearchAgent(engine, fetcher).search('q')).rejects.toThrow('engine down');
  });

  it('keeps earlier sources when a later search fails', async () => {
    engine.search.mockResolvedValueOnce(HITS).mockRejectedValueOnce(new Error('engine down'));
    const agent = new WebSearchAgent(engine, fetcher, { policy: fixedPolicy(0.1) });

    const result = await agent.search('nginx setup');

    expect(result.iterations).toBe(2);
    expect(result.sources).toHaveLength(2);
  });
});

describe('weightedConfidencePolicy', () => {
  it('scores keyword overlap with a multi-match boost', () => {
    expect(weightedConfidencePolicy.relevance('nginx reverse proxy', 'How to set up an Nginx reverse proxy')).toBe(1);
    expect(weightedConfidencePolicy.relevance('nginx reverse proxy', 'nginx basics')).toBe(0.33);
    expect(weightedConfidencePolicy.relevance('nginx', '   ')).toBe(0);
    expect(weightedConfidencePolicy.relevance('a b', 'anything')).toBe(0.5);
  });

  it('weighs relevance, source count and content depth', () => {
    expect(weightedConfidencePolicy.confidence([])).toBe(0);
    expect(weightedConfidencePolicy.confidence([source({ relevance: 0.5, content: 'x'.repeat(1000) })])).toBe(0.41);
    const strong = Array.from({ length: 5 }, () => source({ relevance: 1, content: 'x'.repeat(2000) }));
    expect(weightedConfidencePolicy.confidence(strong)).toBe(1);
  });
});

describe('helpers', () => {
  it('broadens the query when nothing is relevant', () => {
    expect(refineQuery('nginx', [source({ relevance: 0.2 })])).toBe('nginx guide tutorial');
  });

  it('summarizes the top sources', () => {
    expect(summarize([])).toBe('No relevant sources found.');
    expect(summarize([source({ title: 'Docs', relevance: 0.875 })])).toBe('Found 1 sources.\n1. Docs (relevance: 88%)');
  });

  it('suggests follow-ups not already covered', () => {
    expect(suggestFollowUps('nginx', [source({ title: 'Nginx Tutorial' })])).toEqual(['nginx examples', 'nginx official documentation']);
  });
});
