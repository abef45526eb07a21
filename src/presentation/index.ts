export * from './charts/charts.builder';
export * from './interfaces';
export * from './presentation.module';
export * from './presentation.service';
export * from './report/pdf-report.renderer';
export * from './report/report-layout';
