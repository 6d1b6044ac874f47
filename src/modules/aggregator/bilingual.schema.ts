/**
 * Bilingual School Schema
 * One set of localized fields per language; serialized as "<field>_en" and
 * "<field>_jp" keys.
 */

import type { StaffMember, SubPage } from './aggregator.types';

export type Language = 'en' | 'jp';

export const LANGUAGES: readonly Language[] = ['en', 'jp'];

export type LocalizedFields = {
  name: string;
  location: string;
  phone: string;
  email: string;
  address: string;
  curriculum: string;
  url: string;
  language: string;
  ages: string;
  fees: string;
  affiliations: string[];
  accreditation: string[];
  education_programs_offered: string[];
  education_curriculum: string;
  education_academic_support: string[];
  education_extracurricular_activities: string[];
  admissions_acceptance_policy: string;
  admissions_application_guidelines: string;
  admissions_age_requirements: string;
  admissions_fees: string;
  events: string[];
  campus_facilities: string[];
  campus_virtual_tour: string;
  student_life_counseling: string;
  student_life_support_services: string[];
  student_life_library: string;
  student_life_calendar: string;
  student_life_tour: string;
  employment_open_positions: string[];
  employment_application_process: string;
  policies_privacy_policy: string;
  policies_terms_of_use: string;
  staff_staff_list: StaffMember[];
  staff_board_members: string[];
  short_description: string;
  description: string;
  country: string;
  region: string;
  geography: string;
};

/**
 * Card fields copied onto the localized slot of the card's language
 */
export const CARD_FIELDS = ['name', 'description', 'curriculum', 'language', 'ages', 'fees', 'location', 'url'] as const;

export function createEmptyLocalizedFields(): LocalizedFields {
  return {
    name: '',
    location: '',
    phone: '',
    email: '',
    address: '',
    curriculum: '',
    url: '',
    language: '',
    ages: '',
    fees: '',
    affiliations: [],
    accreditation: [],
    education_programs_offered: [],
    education_curriculum: '',
    education_academic_support: [],
    education_extracurricular_activities: [],
    admissions_acceptance_policy: '',
    admissions_application_guidelines: '',
    admissions_age_requirements: '',
    admissions_fees: '',
    events: [],
    campus_facilities: [],
    campus_virtual_tour: '',
    student_life_counseling: '',
    student_life_support_services: [],
    student_life_library: '',
    student_life_calendar: '',
    student_life_tour: '',
    employment_open_positions: [],
    employment_application_process: '',
    policies_privacy_policy: '',
    policies_terms_of_use: '',
    staff_staff_list: [],
    staff_board_members: [],
    short_description: '',
    description: '',
    country: '',
    region: '',
    geography: '',
  };
}

export interface BilingualSchoolRecord {
  school_id: number;
  site_id: string;
  localized: Record<Language, LocalizedFields>;
  structured_data: Record<string, unknown>;
  logo_id: string;
  image_id: string;
  content: {
    sub_pages: SubPage[];
  };
}

/**
 * Output shape: each localized field as an "_en"/"_jp" pair, in schema order
 */
export function toFlatRecord(record: BilingualSchoolRecord): Record<string, unknown> {
  const flat: Record<string, unknown> = {
    school_id: record.school_id,
    site_id: record.site_id,
  };

  const jpFields = new Map<string, unknown>(Object.entries(record.localized.jp));
  for (const [field, enValue] of Object.entries(record.localized.en)) {
    flat[`${field}_en`] = enValue;
    flat[`${field}_jp`] = jpFields.get(field);
  }

  flat.structured_data = record.structured_data;
  flat.logo_id = record.logo_id;
  flat.image_id = record.image_id;
  flat.content = record.content;
  return flat;
}
