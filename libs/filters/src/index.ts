export * from './analyzer-exception.filter';
