/**
 * Directory module exports
 */

export * from './directory.types';
export * from './directory.scraper';
export { getJapanLocations } from './locations';
