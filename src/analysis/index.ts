export * from './analysis.constants';
export * from './analysis.module';
export * from './analysis.service';
export * from './interfaces';
export * from './prompt/prompt-template.provider';
export * from './schemas/brand-analysis.schema';
