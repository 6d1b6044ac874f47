/**
 * Site Aggregator
 * Folds crawled page records into one school record per site key
 */

import { HEADER_LEVELS } from '../../lib/crawling';
import { DEFAULT_MAX_INVALID_RATIO } from '../../lib/validation';
import type { RawPage, SchoolRecord } from './aggregator.types';
import { addStaffMember, addSubPage, unionInto } from './merge.utils';
import { parseRawPage, pickSubPageTitle } from './page.parser';
import { createEmptyStructuredData, overlayStructuredData } from './school.schema';
import { idPrefixStrategy, type SiteKeyStrategy } from './site-key.strategy';

export interface AggregateOptions {
  siteKeyStrategy?: SiteKeyStrategy;
  maxInvalidRatio?: number;
}

function createSchoolRecord(schoolId: number, siteKey: string, page: RawPage): SchoolRecord {
  return {
    school_id: schoolId,
    site_id: siteKey,
    source: {
      id: siteKey,
      url: page.url,
      title: page.title,
      scrapedAt: page.scrapedAt,
    },
    content: {
      headers: { h1: [], h2: [], h3: [] },
      sub_pages: [],
      structured_data: createEmptyStructuredData(),
    },
    links: [],
  };
}

/**
 * The earliest non-empty scrapedAt wins. ISO strings of one format compare
 * correctly as strings; on a tie the record seen first stays.
 */
function updateSource(record: SchoolRecord, page: RawPage): void {
  const current = page.scrapedAt;
  const existing = record.source.scrapedAt;

  if (current && (!existing || current < existing)) {
    record.source.url = page.url;
    record.source.title = page.title;
    record.source.scrapedAt = current;
  }
}

function foldPage(record: SchoolRecord, page: RawPage, maxInvalidRatio: number): void {
  updateSource(record, page);

  for (const level of HEADER_LEVELS) {
    unionInto(record.content.headers[level], page.headers[level]);
  }

  const title = pickSubPageTitle(page.headers, page.title);
  addSubPage(record.content.sub_pages, title, page.data, maxInvalidRatio);

  unionInto(record.links, page.links);

  const structuredData = record.content.structured_data;
  if (page.structuredData) {
    overlayStructuredData(structuredData, page.structuredData);
  }
  for (const member of page.staff) {
    addStaffMember(structuredData.staff.staff_list, member);
  }
}

/**
 * Single pass in input order. Accepts PageRecord objects or page JSON read
 * from disk; entries that are not objects or yield no site key are skipped.
 * The map iterates in first-seen key order.
 */
export function aggregatePages(
  rawPages: readonly unknown[],
  options: AggregateOptions = {}
): Map<string, SchoolRecord> {
  const strategy = options.siteKeyStrategy ?? idPrefixStrategy;
  const maxInvalidRatio = options.maxInvalidRatio ?? DEFAULT_MAX_INVALID_RATIO;
  const aggregated = new Map<string, SchoolRecord>();

  rawPages.forEach((raw, index) => {
    const page = parseRawPage(raw);
    if (!page) {
      console.warn(`⚠️  Skipping page #${index}: not an object`);
      return;
    }

    const siteKey = strategy.deriveKey(page);
    if (!siteKey) {
      console.warn(`⚠️  Skipping page #${index}: no ${strategy.name} site key (id="${page.id}", url="${page.url}")`);
      return;
    }

    let record = aggregated.get(siteKey);
    if (!record) {
      record = createSchoolRecord(aggregated.size + 1, siteKey, page);
      aggregated.set(siteKey, record);
    }

    foldPage(record, page, maxInvalidRatio);
  });

  return aggregated;
}
