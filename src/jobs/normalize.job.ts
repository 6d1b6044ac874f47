/**
 * Normalize Jobs
 * Page batch -> one school record per site, and the bilingual directory merge
 */

import { env } from '../config/env';
import { InputMissingError, readJsonArray, writeJson } from '../lib/storage';
import {
  aggregateBilingual,
  aggregatePages,
  getSiteKeyStrategy,
  idPrefixStrategy,
  toFlatRecord,
} from '../modules/aggregator';
import type { SchoolRecord, SiteKeyStrategy } from '../modules/aggregator';

export interface NormalizeJobOptions {
  inputFile?: string;
  outputFile?: string;
  siteKeyStrategy?: SiteKeyStrategy | string;
}

export interface BilingualNormalizeJobOptions {
  englishFile?: string;
  japaneseFile?: string;
  outputFile?: string;
}

function resolveStrategy(strategy: SiteKeyStrategy | string | undefined): SiteKeyStrategy {
  if (strategy === undefined) return idPrefixStrategy;
  return typeof strategy === 'string' ? getSiteKeyStrategy(strategy) : strategy;
}

/**
 * Read inputs in order. Logs and returns null when any file is missing.
 */
async function readInputs(files: string[]): Promise<unknown[][] | null> {
  const contents: unknown[][] = [];
  try {
    for (const file of files) {
      contents.push(await readJsonArray(file));
    }
  } catch (error: unknown) {
    if (error instanceof InputMissingError) {
      console.error(`❌ ${error.message}`);
      return null;
    }
    throw error;
  }
  return contents;
}

export async function runNormalizeJob(options: NormalizeJobOptions = {}): Promise<SchoolRecord[] | null> {
  const inputFile = options.inputFile ?? env.SCRAPED_OUTPUT_FILE;
  const outputFile = options.outputFile ?? env.NORMALIZED_OUTPUT_FILE;

  const inputs = await readInputs([inputFile]);
  if (!inputs) return null;
  const [rawPages] = inputs;

  const aggregated = aggregatePages(rawPages, { siteKeyStrategy: resolveStrategy(options.siteKeyStrategy) });
  const normalized = Array.from(aggregated.values());

  await writeJson(outputFile, normalized);
  console.log(`✅ Aggregation complete: ${normalized.length} site(s). See ${outputFile}`);
  return normalized;
}

export async function runBilingualNormalizeJob(
  options: BilingualNormalizeJobOptions = {}
): Promise<Record<string, unknown>[] | null> {
  const englishFile = options.englishFile ?? env.DIRECTORY_EN_FILE;
  const japaneseFile = options.japaneseFile ?? env.DIRECTORY_JP_FILE;
  const outputFile = options.outputFile ?? env.BILINGUAL_OUTPUT_FILE;

  console.log(`📖 Reading ${englishFile} and ${japaneseFile}...`);
  const inputs = await readInputs([englishFile, japaneseFile]);
  if (!inputs) return null;
  const [en, jp] = inputs;
  console.log(`Loaded ${en.length + jp.length} raw pages (${en.length} English, ${jp.length} Japanese)`);

  const aggregated = aggregateBilingual({ en, jp });
  const normalized = Array.from(aggregated.values()).map(toFlatRecord);

  await writeJson(outputFile, normalized);
  console.log(`✅ Aggregated into ${normalized.length} unique schools. See ${outputFile}`);
  return normalized;
}
