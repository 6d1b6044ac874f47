/**
 * Raw Page Parser
 * Normalizes page records read from disk. Files written by older crawls store
 * a single-match header level as a bare string; it becomes a one-element list.
 */

import { HEADER_LEVELS } from '../../lib/crawling';
import { isPlainObject, isStringArray } from '../../lib/validation';
import type { AggregatedHeaders, RawPage } from './aggregator.types';
import { parseStaffList, readString } from './merge.utils';

function toHeaderList(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === 'string');
  return [];
}

export function normalizeHeaders(value: unknown): AggregatedHeaders {
  const headers: AggregatedHeaders = { h1: [], h2: [], h3: [] };
  if (!isPlainObject(value)) return headers;

  for (const level of HEADER_LEVELS) {
    headers[level] = toHeaderList(value[level]);
  }
  return headers;
}

/**
 * Null when the value is not an object
 */
export function parseRawPage(value: unknown): RawPage | null {
  if (!isPlainObject(value)) return null;

  const links = value.links;
  const structuredData = value.structured_data;

  return {
    id: readString(value, 'id') ?? '',
    url: readString(value, 'url') ?? '',
    title: readString(value, 'title') ?? '',
    headers: normalizeHeaders(value.headers),
    data: readString(value, 'data') ?? '',
    links: isStringArray(links) ? links : [],
    scrapedAt: readString(value, 'scrapedAt') ?? '',
    structuredData: isPlainObject(structuredData) ? structuredData : undefined,
    staff: parseStaffList(value.staff),
  };
}

/**
 * Sub-page title: first non-empty header text in h1, h2, h3 order, then the
 * page title, then "Untitled"
 */
export function pickSubPageTitle(headers: AggregatedHeaders, fallbackTitle: string): string {
  for (const level of HEADER_LEVELS) {
    const text = headers[level].find((header) => header.trim());
    if (text !== undefined) return text;
  }
  return fallbackTitle ? fallbackTitle : 'Untitled';
}
