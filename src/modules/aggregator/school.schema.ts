/**
 * School Schema
 * Empty structured-data template and the overlay of raw values onto it
 */

import { isPlainObject, isStringArray } from '../../lib/validation';
import type { FeeBand, StructuredData } from './aggregator.types';
import { addStaffMember, parseStaffList, unionInto } from './merge.utils';

export type SchemaValue = string | string[] | SchemaObject;

export interface SchemaObject {
  [key: string]: SchemaValue;
}

function emptyFeeBand(): FeeBand {
  return { tuition: '', registration_fee: '', maintenance_fee: '' };
}

/**
 * A fresh template; callers own and may mutate the result
 */
export function createEmptyStructuredData(): StructuredData {
  return {
    school_info: {
      name: '',
      location: '',
      contact: { phone: '', email: '', address: '' },
      affiliations: [],
      accreditation: [],
    },
    education: {
      programs_offered: [],
      curriculum: '',
      academic_support: [],
      extracurricular_activities: [],
    },
    admissions: {
      acceptance_policy: '',
      application_guidelines: '',
      age_requirements: '',
      fees: '',
      breakdown_fees: {
        application_fee: '',
        day_care_fee: emptyFeeBand(),
        kindergarten: emptyFeeBand(),
        grade_elementary: emptyFeeBand(),
        grade_junior_high: emptyFeeBand(),
        grade_high_school: emptyFeeBand(),
        summer_school: emptyFeeBand(),
        other: emptyFeeBand(),
      },
      procedure: '',
    },
    events: [],
    campus: { facilities: [], virtual_tour: '' },
    student_life: {
      counseling: '',
      support_services: [],
      library: '',
      calendar: '',
      tour: '',
    },
    employment: { open_positions: [], application_process: '' },
    policies: { privacy_policy: '', terms_of_use: '' },
    staff: { staff_list: [], board_members: [] },
  };
}

/**
 * Copy leaves of `incoming` whose shape matches the template: strings onto
 * strings, string lists onto lists, objects recursed. Unknown keys are ignored.
 */
export function overlaySchema(target: SchemaObject, incoming: unknown): void {
  if (!isPlainObject(incoming)) return;

  for (const [key, current] of Object.entries(target)) {
    const value = incoming[key];
    if (typeof current === 'string') {
      if (typeof value === 'string') target[key] = value;
    } else if (Array.isArray(current)) {
      if (isStringArray(value)) target[key] = [...value];
    } else {
      overlaySchema(current, value);
    }
  }
}

export function overlayStructuredData(data: StructuredData, incoming: unknown): void {
  if (!isPlainObject(incoming)) return;

  const { staff, ...fields } = data;
  overlaySchema(fields, incoming);
  Object.assign(data, fields);

  const incomingStaff = incoming.staff;
  if (isPlainObject(incomingStaff)) {
    for (const member of parseStaffList(incomingStaff.staff_list)) {
      addStaffMember(staff.staff_list, member);
    }
    if (isStringArray(incomingStaff.board_members)) {
      unionInto(staff.board_members, incomingStaff.board_members);
    }
  }
}
