export * from './crawl.job';
export * from './normalize.job';
export * from './directory.job';
