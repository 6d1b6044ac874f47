/**
 * Directory Scraper
 * School cards from city listing pages and Q&A sections from school detail
 * pages of the international-schools directory
 */

import * as cheerio from 'cheerio';
import { isText } from 'domhandler';
import { env } from '../../config/env';
import { fetchPage, fetchPageOrThrow } from '../scraper/scrapers/http.scraper';
import { retryWithBackoff, sleep } from '../scraper/utils';
import type {
  DirectoryLocation,
  DirectoryScrapeOptions,
  EnrichOptions,
  SchoolCard,
  SchoolDetails,
} from './directory.types';

const DETAIL_TIMEOUT = 30000;

/**
 * Parse the "card-row" listing format. The property list pairs each <dd>
 * (label) with the <dt> (value) at the same index.
 */
export function parseSchoolCards(
  html: string,
  location: string,
  baseUrl: string = env.DIRECTORY_BASE_URL
): SchoolCard[] {
  const $ = cheerio.load(html);
  const schools: SchoolCard[] = [];

  $('div.card-row').each((_, row) => {
    const school: SchoolCard = {};
    const $row = $(row);

    const link = $row.find('h2.card-row-title').first().find('a').first();
    if (link.length > 0) {
      school.name = link.text().trim();
      const href = link.attr('href') ?? '';
      school.url = href.startsWith('http') ? href : baseUrl + href;
    }

    const description = $row.find('div.card-row-content').first();
    if (description.length > 0) {
      school.description = description.text().trim();
    }

    const dl = $row.find('div.card-row-properties').first().find('dl').first();
    const labels = dl.find('dd').toArray();
    const values = dl.find('dt').toArray();
    const pairs = Math.min(labels.length, values.length);

    for (let i = 0; i < pairs; i++) {
      const key = $(labels[i]).text().trim().toLowerCase();
      const value = $(values[i]).text().trim();

      if (key.includes('curriculum')) {
        school.curriculum = value;
      } else if (key.includes('language')) {
        school.language = value;
      } else if (key.includes('ages')) {
        school.ages = value;
      } else if (key.includes('fees') && !value.toLowerCase().includes('not')) {
        school.fees = value;
      }
    }

    if (Object.keys(school).length > 0) {
      school.location = location;
      schools.push(school);
    }
  });

  return schools;
}

/**
 * Null when the page has no #detailed-answers panel group
 */
export function parseSchoolDetails(html: string): SchoolDetails | null {
  const $ = cheerio.load(html);
  const panelGroup = $('div#detailed-answers').first();
  if (panelGroup.length === 0) {
    return null;
  }

  const details: SchoolDetails = {};

  panelGroup.find('div.panel').each((_, panel) => {
    const heading = $(panel).find('div.panel-heading').first();
    if (heading.length === 0) return;

    // Section name is the text right after the heading icon
    const icon = heading.find('i').get(0);
    const afterIcon = icon?.nextSibling;
    const sectionName = afterIcon && isText(afterIcon) ? afterIcon.data.trim() : heading.text().trim();

    const body = $(panel).find('div.panel-body').first();
    if (body.length === 0) return;

    const answers: Record<string, string> = {};
    body.find('tr').each((_, row) => {
      const question = $(row).find('td.question').first();
      const answer = $(row).find('td.answer').first();
      if (question.length > 0 && answer.length > 0) {
        answers[question.text().trim()] = answer.text().trim();
      }
    });

    details[sectionName] = answers;
  });

  return details;
}

/**
 * Fetch and parse one detail page with retries. Null when every attempt
 * failed or the page has no detail panels.
 */
export async function fetchSchoolDetails(url: string): Promise<SchoolDetails | null> {
  try {
    const html = await retryWithBackoff(() => fetchPageOrThrow(url, { timeout: DETAIL_TIMEOUT }));
    return parseSchoolDetails(html);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    console.error(`❌ All attempts failed for ${url}: ${detail}`);
    return null;
  }
}

export async function scrapeDirectory(
  locations: DirectoryLocation[],
  options: DirectoryScrapeOptions = {}
): Promise<SchoolCard[]> {
  const fetcher = options.fetcher ?? ((url: string) => fetchPage(url));
  const wait = options.sleeper ?? sleep;
  const delay = options.delayBetweenRequests ?? env.DIRECTORY_DELAY_MS;
  const allSchools: SchoolCard[] = [];

  for (const location of locations) {
    console.log(`🔍 Scraping schools in ${location.name}...`);
    const html = await fetcher(location.url);
    if (html === null) continue;

    const schools = parseSchoolCards(html, location.name, options.baseUrl);
    allSchools.push(...schools);
    console.log(`Found ${schools.length} schools in ${location.name}`);

    if (delay > 0) {
      await wait(delay);
    }
  }

  return allSchools;
}

function hasDetails(card: SchoolCard): boolean {
  return card.details !== undefined && Object.keys(card.details).length > 0;
}

/**
 * Attach detail sections to every card that has a URL and no details yet.
 * Cards are updated in place; progress is persisted periodically so an
 * interrupted run keeps what it fetched.
 */
export async function enrichWithDetails(cards: SchoolCard[], options: EnrichOptions): Promise<SchoolCard[]> {
  const fetchDetails = options.fetchDetails ?? fetchSchoolDetails;
  const wait = options.sleeper ?? sleep;
  const delay = options.delayBetweenRequests ?? env.DETAIL_DELAY_MS;
  const saveEvery = options.saveEvery ?? env.DETAIL_SAVE_EVERY;

  let remaining = cards.filter((card) => card.url && !hasDetails(card)).length;
  console.log(`Found ${remaining} schools that still need details`);

  for (let i = 0; i < cards.length; i++) {
    const card = cards[i];

    if (card.url) {
      if (hasDetails(card)) {
        console.log(`Skipping ${card.name ?? card.url} - already has details`);
      } else {
        console.log(`Fetching details for: ${card.name ?? card.url} (${i + 1}/${cards.length}, remaining: ${remaining})`);
        const details = await fetchDetails(card.url);
        if (details) {
          card.details = details;
          remaining--;
          console.log('✅ Fetched details');
        } else {
          console.log('⚠️  Failed to fetch details');
        }

        if (delay > 0) {
          await wait(delay);
        }
      }
    }

    if (saveEvery > 0 && (i + 1) % saveEvery === 0) {
      console.log('💾 Saving progress...');
      await options.persist(cards);
    }
  }

  await options.persist(cards);
  return cards;
}
