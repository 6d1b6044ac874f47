export * from './json-store';
