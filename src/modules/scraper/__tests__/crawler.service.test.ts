/**
 * Crawler Service Tests
 */

import { CrawlerService } from '../crawler.service';
import { createMockFetcher, createMockSleeper, htmlWithLinks } from '../../../__tests__/helpers/mocks';

const SEED = 'https://x.test/a';

describe('CrawlerService', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should only enqueue links prefixed by the seed URL', async () => {
    const fetcher = createMockFetcher({
      [SEED]: htmlWithLinks('Home', ['https://x.test/a/b', 'https://y.test/c']),
      'https://x.test/a/b': htmlWithLinks('B', []),
    });
    const crawler = new CrawlerService({ fetcher, sleeper: createMockSleeper() });

    const result = await crawler.crawlSite('1', SEED, { delayBetweenRequests: 0 });

    expect(fetcher.mock.calls.map(([url]) => url)).toEqual([SEED, 'https://x.test/a/b']);
    expect(result.pages.map((page) => page.id)).toEqual(['1-1', '1-2']);
    expect(result.pages[0].title).toBe('Home');
  });

  it('should stop at maxPages distinct URLs', async () => {
    const children = ['1', '2', '3', '4', '5'].map((n) => `${SEED}/${n}`);
    const pages: Record<string, string> = { [SEED]: htmlWithLinks('Home', children) };
    for (const child of children) pages[child] = htmlWithLinks(child, []);
    const fetcher = createMockFetcher(pages);
    const crawler = new CrawlerService({ fetcher });

    const result = await crawler.crawlSite('s', SEED, { maxPages: 3, delayBetweenRequests: 0 });

    expect(fetcher).toHaveBeenCalledTimes(3);
    expect(result.visitedUrls).toEqual([SEED, `${SEED}/1`, `${SEED}/2`]);
    expect(result.pages).toHaveLength(3);
  });

  it('should count a failed fetch as visited and skip its sequence number', async () => {
    const fetcher = createMockFetcher({
      [SEED]: htmlWithLinks('Home', [`${SEED}/1`, `${SEED}/2`]),
      [`${SEED}/2`]: htmlWithLinks('Two', []),
    });
    const crawler = new CrawlerService({ fetcher });

    const result = await crawler.crawlSite('s', SEED, { delayBetweenRequests: 0 });

    expect(result.pages.map((page) => page.id)).toEqual(['s-1', 's-3']);
    expect(result.visitedUrls).toEqual([SEED, `${SEED}/1`, `${SEED}/2`]);
  });

  it('should never fetch a visited URL twice', async () => {
    const fetcher = createMockFetcher({
      [SEED]: htmlWithLinks('Home', [`${SEED}/b`, `${SEED}/b`]),
      [`${SEED}/b`]: htmlWithLinks('B', [SEED, `${SEED}/b`]),
    });
    const crawler = new CrawlerService({ fetcher });

    const result = await crawler.crawlSite('s', SEED, { delayBetweenRequests: 0 });

    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(result.pages.map((page) => page.url)).toEqual([SEED, `${SEED}/b`]);
  });

  it('should produce the same pages with the pending-URL check enabled', async () => {
    const fetcher = createMockFetcher({
      [SEED]: htmlWithLinks('Home', [`${SEED}/b`, `${SEED}/b`, `${SEED}/c`]),
      [`${SEED}/b`]: htmlWithLinks('B', [`${SEED}/c`]),
      [`${SEED}/c`]: htmlWithLinks('C', []),
    });
    const crawler = new CrawlerService({ fetcher });

    const result = await crawler.crawlSite('s', SEED, { delayBetweenRequests: 0, dedupePending: true });

    expect(result.pages.map((page) => page.id)).toEqual(['s-1', 's-2', 's-3']);
    expect(fetcher).toHaveBeenCalledTimes(3);
  });

  it('should sleep after every fetch attempt, failed ones included', async () => {
    const fetcher = createMockFetcher({ [SEED]: htmlWithLinks('Home', [`${SEED}/missing`]) });
    const sleeper = createMockSleeper();
    const crawler = new CrawlerService({ fetcher, sleeper });

    await crawler.crawlSite('s', SEED, { delayBetweenRequests: 1000 });

    expect(sleeper.mock.calls).toEqual([[1000], [1000]]);
  });

  it('should treat a seed without a trailing slash and its root link as one page', async () => {
    const fetcher = createMockFetcher({
      'https://school.test/': htmlWithLinks('Home', ['https://school.test', '/about']),
      'https://school.test/about': htmlWithLinks('About', []),
    });
    const crawler = new CrawlerService({ fetcher });

    const result = await crawler.crawlSite('1', 'https://school.test', { delayBetweenRequests: 0 });

    expect(fetcher.mock.calls.map(([url]) => url)).toEqual(['https://school.test/', 'https://school.test/about']);
    expect(result.pages.map((page) => page.id)).toEqual(['1-1', '1-2']);
  });

  it('should log link counts when a site is done', async () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const fetcher = createMockFetcher({
      [SEED]: htmlWithLinks('Home', [`${SEED}/b`, 'https://y.test/c']),
      [`${SEED}/b`]: htmlWithLinks('B', []),
    });
    const crawler = new CrawlerService({ fetcher });

    await crawler.crawlSite('1', SEED, { delayBetweenRequests: 0 });

    expect(logSpy).toHaveBeenCalledWith(
      expect.stringMatching(
        /^✅ Site 1: 2 page\(s\) scraped, 0 failed, 0 duplicate\(s\) skipped, 1\/2 link\(s\) enqueued in \d+ms$/
      )
    );
  });

  it('should crawl seeds in order into one batch', async () => {
    const fetcher = createMockFetcher({
      'https://one.test/': htmlWithLinks('One', []),
      'https://two.test/': htmlWithLinks('Two', []),
    });
    const crawler = new CrawlerService({ fetcher });

    const pages = await crawler.crawlSeeds(
      [
        { id: '1', url: 'https://one.test/' },
        { id: '2', url: 'https://two.test/' },
      ],
      { delayBetweenRequests: 0 }
    );

    expect(pages.map((page) => page.id)).toEqual(['1-1', '2-1']);
  });
});
