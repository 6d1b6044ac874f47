/**
 * Aggregator Types
 */

import type { HeaderLevel } from '../../lib/crawling';

export interface SubPage {
  title: string;
  data: string;
}

export interface StaffMember {
  name: string;
  role: string;
}

// Schema sections are type aliases (not interfaces) so they satisfy the
// index signature of SchemaObject in school.schema.ts.

export type FeeBand = {
  tuition: string;
  registration_fee: string;
  maintenance_fee: string;
};

export type FeeBreakdown = {
  application_fee: string;
  day_care_fee: FeeBand;
  kindergarten: FeeBand;
  grade_elementary: FeeBand;
  grade_junior_high: FeeBand;
  grade_high_school: FeeBand;
  summer_school: FeeBand;
  other: FeeBand;
};

export type SchoolInfo = {
  name: string;
  location: string;
  contact: {
    phone: string;
    email: string;
    address: string;
  };
  affiliations: string[];
  accreditation: string[];
};

export type Education = {
  programs_offered: string[];
  curriculum: string;
  academic_support: string[];
  extracurricular_activities: string[];
};

export type Admissions = {
  acceptance_policy: string;
  application_guidelines: string;
  age_requirements: string;
  fees: string;
  breakdown_fees: FeeBreakdown;
  procedure: string;
};

export type StructuredFields = {
  school_info: SchoolInfo;
  education: Education;
  admissions: Admissions;
  events: string[];
  campus: {
    facilities: string[];
    virtual_tour: string;
  };
  student_life: {
    counseling: string;
    support_services: string[];
    library: string;
    calendar: string;
    tour: string;
  };
  employment: {
    open_positions: string[];
    application_process: string;
  };
  policies: {
    privacy_policy: string;
    terms_of_use: string;
  };
};

export type StaffSection = {
  staff_list: StaffMember[];
  board_members: string[];
};

export type StructuredData = StructuredFields & {
  staff: StaffSection;
};

export type AggregatedHeaders = Record<HeaderLevel, string[]>;

export interface SourceSnapshot {
  id: string;
  url: string;
  title: string;
  scrapedAt: string;
}

/**
 * One aggregated school per site key
 */
export interface SchoolRecord {
  school_id: number;
  site_id: string;
  source: SourceSnapshot;
  content: {
    headers: AggregatedHeaders;
    sub_pages: SubPage[];
    structured_data: StructuredData;
  };
  links: string[];
}

/**
 * Page record after input normalization. Missing fields are empty.
 */
export interface RawPage {
  id: string;
  url: string;
  title: string;
  headers: AggregatedHeaders;
  data: string;
  links: string[];
  scrapedAt: string;
  structuredData?: Record<string, unknown>;
  staff: StaffMember[];
}
