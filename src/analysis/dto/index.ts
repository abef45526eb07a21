export * from './brand-analysis.dto';
