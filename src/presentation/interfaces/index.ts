export * from './chart-spec.interface';
export * from './report-block.interface';
