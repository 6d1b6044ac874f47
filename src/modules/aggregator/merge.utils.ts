/**
 * Merge helpers shared by both aggregators
 */

import { isCleanText, isPlainObject } from '../../lib/validation';
import type { StaffMember, SubPage } from './aggregator.types';

/**
 * Append values missing from target, keeping first-seen order
 */
export function unionInto(target: string[], values: readonly string[]): void {
  const seen = new Set(target);
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      target.push(value);
    }
  }
}

/**
 * Append a sub-page unless its data is blank, unclean, or already stored.
 * Returns whether it was added.
 */
export function addSubPage(subPages: SubPage[], title: string, data: string, maxInvalidRatio?: number): boolean {
  if (!data.trim()) return false;
  if (!isCleanText(data, maxInvalidRatio)) return false;
  if (subPages.some((page) => page.data === data)) return false;

  subPages.push({ title, data });
  return true;
}

/**
 * Append a staff member unless name or role is blank or the pair is present
 */
export function addStaffMember(staffList: StaffMember[], member: StaffMember): boolean {
  if (!member.name.trim() || !member.role.trim()) return false;
  if (staffList.some((staff) => staff.name === member.name && staff.role === member.role)) return false;

  staffList.push({ name: member.name, role: member.role });
  return true;
}

export function parseStaffList(value: unknown): StaffMember[] {
  if (!Array.isArray(value)) return [];

  return value.filter(isPlainObject).map((entry) => ({
    name: typeof entry.name === 'string' ? entry.name : '',
    role: typeof entry.role === 'string' ? entry.role : '',
  }));
}

export function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}
