import { Injectable, Logger } from '@nestjs/common';

import { BrandAnalysis } from '../analysis';
import { MetricsService } from '../metrics';
import { buildAnalysisCharts } from './charts/charts.builder';
import { AnalysisCharts } from './interfaces';
import { renderReportPdf } from './report/pdf-report.renderer';
import { buildReportLayout } from './report/report-layout';

export const REPORT_FILE_NAME = 'brand_compatibility_analysis.pdf';

@Injectable()
export class PresentationService {
  private readonly logger = new Logger(PresentationService.name);

  constructor(private readonly metricsService: MetricsService) {}

  public buildCharts(analysis: BrandAnalysis): AnalysisCharts {
    return buildAnalysisCharts(analysis);
  }

  /**
   * @param {Date} createdAt - Pinned per analysis so repeated downloads match.
   */
  public renderReport(analysis: BrandAnalysis, createdAt: Date): Buffer {
    const pdf = renderReportPdf(buildReportLayout(analysis), { createdAt });

    this.metricsService.recordReportGenerated();
    this.logger.log(`Rendered ${REPORT_FILE_NAME} (${pdf.length} bytes)`);

    return pdf;
  }
}
