/**
 * Bilingual Aggregator
 * Merges the English and Japanese directory exports into one record per
 * school. Cards are grouped by the last path segment of their URL, so the two
 * language editions of a detail page land on the same record.
 */

import { DEFAULT_MAX_INVALID_RATIO, isPlainObject } from '../../lib/validation';
import {
  CARD_FIELDS,
  LANGUAGES,
  createEmptyLocalizedFields,
  type BilingualSchoolRecord,
  type Language,
} from './bilingual.schema';
import { addStaffMember, addSubPage, parseStaffList, readString } from './merge.utils';
import { urlPathSegmentStrategy, type SiteKeyStrategy } from './site-key.strategy';

export type BilingualInput = Record<Language, readonly unknown[]>;

export interface BilingualAggregateOptions {
  siteKeyStrategy?: SiteKeyStrategy;
  maxInvalidRatio?: number;
}

function createBilingualRecord(schoolId: number, siteKey: string): BilingualSchoolRecord {
  return {
    school_id: schoolId,
    site_id: siteKey,
    localized: {
      en: createEmptyLocalizedFields(),
      jp: createEmptyLocalizedFields(),
    },
    structured_data: {},
    logo_id: '',
    image_id: '',
    content: { sub_pages: [] },
  };
}

/**
 * Unsuffixed card fields belong to the card's own language; "<field>_en"
 * keys always belong to English. Only string values overwrite.
 */
function foldCard(
  record: BilingualSchoolRecord,
  card: Record<string, unknown>,
  language: Language,
  maxInvalidRatio: number
): void {
  const own = record.localized[language];
  const english = record.localized.en;

  for (const field of CARD_FIELDS) {
    const value = readString(card, field);
    if (value !== undefined) own[field] = value;

    const englishValue = readString(card, `${field}_en`);
    if (englishValue !== undefined) english[field] = englishValue;
  }

  const details = card.details;
  if (isPlainObject(details)) {
    record.structured_data = structuredClone(details);
  }

  const data = readString(card, 'data') ?? '';
  const title = readString(card, 'title') || 'Untitled';
  addSubPage(record.content.sub_pages, title, data, maxInvalidRatio);

  for (const member of parseStaffList(card.staff)) {
    addStaffMember(own.staff_staff_list, member);
  }
}

/**
 * English cards first, then Japanese; later values win per field
 */
export function aggregateBilingual(
  input: BilingualInput,
  options: BilingualAggregateOptions = {}
): Map<string, BilingualSchoolRecord> {
  const strategy = options.siteKeyStrategy ?? urlPathSegmentStrategy;
  const maxInvalidRatio = options.maxInvalidRatio ?? DEFAULT_MAX_INVALID_RATIO;
  const aggregated = new Map<string, BilingualSchoolRecord>();

  for (const language of LANGUAGES) {
    input[language].forEach((card, index) => {
      if (!isPlainObject(card)) {
        console.warn(`⚠️  Skipping ${language} entry #${index}: not an object`);
        return;
      }

      const siteKey = strategy.deriveKey({
        id: readString(card, 'id') ?? '',
        url: readString(card, 'url') ?? '',
      });
      if (!siteKey) {
        console.warn(`⚠️  Skipping entry with no URL: ${readString(card, 'name') ?? 'Unknown'}`);
        return;
      }

      let record = aggregated.get(siteKey);
      if (!record) {
        record = createBilingualRecord(aggregated.size + 1, siteKey);
        aggregated.set(siteKey, record);
      }

      foldCard(record, card, language, maxInvalidRatio);
    });
  }

  return aggregated;
}
