/**
 * Directory Jobs
 * Listing pages -> school cards, then detail enrichment of the saved cards
 */

import { env } from '../config/env';
import { InputMissingError, readJsonArray, writeJson } from '../lib/storage';
import { isPlainObject } from '../lib/validation';
import { enrichWithDetails, getJapanLocations, scrapeDirectory } from '../modules/directory';
import type { DirectoryLocation, DirectoryScrapeOptions, EnrichOptions, SchoolCard } from '../modules/directory';

export interface DirectoryJobOptions extends DirectoryScrapeOptions {
  locations?: DirectoryLocation[];
  outputFile?: string;
}

export interface DetailsJobOptions extends Omit<EnrichOptions, 'persist'> {
  file?: string;
}

export async function runDirectoryJob(options: DirectoryJobOptions = {}): Promise<SchoolCard[]> {
  const outputFile = options.outputFile ?? env.DIRECTORY_EN_FILE;
  const locations = options.locations ?? getJapanLocations(options.baseUrl);

  const schools = await scrapeDirectory(locations, options);
  await writeJson(outputFile, schools);
  console.log(`✅ Scraped ${schools.length} schools total. Data saved to ${outputFile}`);
  return schools;
}

function toSchoolCard(entry: Record<string, unknown>): SchoolCard {
  const card: SchoolCard = {};
  for (const key of ['name', 'url', 'description', 'curriculum', 'language', 'ages', 'fees', 'location'] as const) {
    const value = entry[key];
    if (typeof value === 'string') card[key] = value;
  }

  const details = entry.details;
  if (isPlainObject(details)) {
    card.details = {};
    for (const [section, answers] of Object.entries(details)) {
      if (!isPlainObject(answers)) continue;
      const pairs: Record<string, string> = {};
      for (const [question, answer] of Object.entries(answers)) {
        if (typeof answer === 'string') pairs[question] = answer;
      }
      card.details[section] = pairs;
    }
  }
  return card;
}

/**
 * Enrich the saved card file in place. Returns null when the file is missing.
 */
export async function runDetailsJob(options: DetailsJobOptions = {}): Promise<SchoolCard[] | null> {
  const file = options.file ?? env.DIRECTORY_EN_FILE;

  let entries: unknown[];
  try {
    entries = await readJsonArray(file);
  } catch (error: unknown) {
    if (error instanceof InputMissingError) {
      console.error(`❌ ${error.message}`);
      return null;
    }
    throw error;
  }

  const cards = entries.filter(isPlainObject).map(toSchoolCard);
  const enriched = await enrichWithDetails(cards, {
    ...options,
    persist: (current) => writeJson(file, current),
  });
  console.log('✅ Finished updating schools');
  return enriched;
}
