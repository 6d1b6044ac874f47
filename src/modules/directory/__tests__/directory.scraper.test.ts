/**
 * Directory Scraper Tests
 */

import {
  enrichWithDetails,
  fetchSchoolDetails,
  parseSchoolCards,
  parseSchoolDetails,
  scrapeDirectory,
} from '../directory.scraper';
import { getJapanLocations } from '../locations';
import type { SchoolCard, SchoolDetails } from '../directory.types';
import { detailHtml, listingHtml } from '../../../__tests__/helpers/fixtures';
import { createMockFetcher, createMockResponse, createMockSleeper } from '../../../__tests__/helpers/mocks';

describe('directory scraper', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('parseSchoolCards', () => {
    it('should read every card with its labelled properties', () => {
      expect(parseSchoolCards(listingHtml, 'Tokyo', 'https://d.test')).toEqual([
        {
          name: 'AIS Tokyo',
          url: 'https://d.test/schools/ais-tokyo',
          description: 'An international school.',
          curriculum: 'IB',
          language: 'English',
          ages: '3 - 18',
          fees: '2,000,000 JPY',
          location: 'Tokyo',
        },
        {
          name: 'Bay School',
          url: 'https://other.test/schools/bay',
          location: 'Tokyo',
        },
      ]);
    });

    it('should return nothing for a page without cards', () => {
      expect(parseSchoolCards('<html><body><p>No schools</p></body></html>', 'Kofu')).toEqual([]);
    });
  });

  describe('parseSchoolDetails', () => {
    it('should read question and answer pairs per section', () => {
      expect(parseSchoolDetails(detailHtml)).toEqual({
        General: { Founded: '1990', Students: '500' },
        Admissions: { 'Waiting list': 'Yes' },
      });
    });

    it('should return null without a detail panel group', () => {
      expect(parseSchoolDetails('<html><body></body></html>')).toBeNull();
    });
  });

  describe('fetchSchoolDetails', () => {
    let fetchSpy: jest.SpyInstance;

    beforeEach(() => {
      fetchSpy = jest.spyOn(global, 'fetch');
    });

    it('should parse the fetched detail page', async () => {
      fetchSpy.mockImplementation(() => Promise.resolve(createMockResponse(detailHtml)));

      const details = await fetchSchoolDetails('https://d.test/schools/ais-tokyo');

      expect(details?.General).toEqual({ Founded: '1990', Students: '500' });
    });

    it('should not retry a missing page', async () => {
      fetchSpy.mockImplementation(() => Promise.resolve(createMockResponse('gone', 404, 'Not Found')));

      await expect(fetchSchoolDetails('https://d.test/schools/gone')).resolves.toBeNull();
      expect(fetchSpy).toHaveBeenCalledTimes(1);
    });

    it('should give up after three server errors', async () => {
      fetchSpy.mockImplementation(() => Promise.resolve(createMockResponse('down', 503, 'Service Unavailable')));

      await expect(fetchSchoolDetails('https://d.test/schools/down')).resolves.toBeNull();
      expect(fetchSpy).toHaveBeenCalledTimes(3);
    });
  });

  describe('scrapeDirectory', () => {
    it('should collect cards from every reachable location', async () => {
      const fetcher = createMockFetcher({ 'https://d.test/in/tokyo': listingHtml });
      const sleeper = createMockSleeper();
      const locations = getJapanLocations('https://d.test').slice(0, 2);

      const cards = await scrapeDirectory(locations, {
        fetcher,
        sleeper,
        delayBetweenRequests: 5,
        baseUrl: 'https://d.test',
      });

      expect(fetcher.mock.calls.map(([url]) => url)).toEqual([
        'https://d.test/in/tokyo',
        'https://d.test/in/kyoto-osaka-kobe',
      ]);
      expect(cards.map((card) => card.name)).toEqual(['AIS Tokyo', 'Bay School']);
      expect(sleeper.mock.calls).toEqual([[5]]);
    });
  });

  describe('enrichWithDetails', () => {
    const fetched: SchoolDetails = { General: { Founded: '2001' } };

    it('should fetch missing details and persist periodically', async () => {
      const cards: SchoolCard[] = [
        { name: 'A', url: 'https://d.test/a' },
        { name: 'B' },
        { name: 'C', url: 'https://d.test/c', details: { General: { Founded: '1980' } } },
        { name: 'D', url: 'https://d.test/d' },
      ];
      const fetchDetails = jest.fn((url: string) =>
        Promise.resolve(url === 'https://d.test/a' ? fetched : null)
      );
      const persist = jest.fn((_cards: SchoolCard[]) => Promise.resolve());
      const sleeper = createMockSleeper();

      const result = await enrichWithDetails(cards, {
        persist,
        fetchDetails,
        sleeper,
        saveEvery: 2,
        delayBetweenRequests: 7,
      });

      expect(result).toBe(cards);
      expect(fetchDetails.mock.calls.map(([url]) => url)).toEqual(['https://d.test/a', 'https://d.test/d']);
      expect(cards[0].details).toEqual(fetched);
      expect(cards[2].details).toEqual({ General: { Founded: '1980' } });
      expect(cards[3].details).toBeUndefined();
      expect(persist).toHaveBeenCalledTimes(3);
      expect(sleeper.mock.calls).toEqual([[7], [7]]);
    });

    it('should persist once when saving periodically is off', async () => {
      const persist = jest.fn((_cards: SchoolCard[]) => Promise.resolve());

      await enrichWithDetails([{ name: 'A' }], { persist, saveEvery: 0, delayBetweenRequests: 0 });

      expect(persist).toHaveBeenCalledTimes(1);
    });
  });
});
