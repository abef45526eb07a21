export * from './analyzer.errors';
