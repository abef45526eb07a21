export * from './json-parse.util';
export * from './timestamp.util';
