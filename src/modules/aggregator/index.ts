/**
 * Aggregator module exports
 */

export * from './aggregator.types';
export * from './aggregator.service';
export * from './bilingual.aggregator';
export * from './bilingual.schema';
export * from './site-key.strategy';
export { createEmptyStructuredData, overlayStructuredData } from './school.schema';
export { parseRawPage, normalizeHeaders, pickSubPageTitle } from './page.parser';
export { addSubPage, addStaffMember } from './merge.utils';
