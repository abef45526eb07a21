import { brandAnalysisFixture } from '../../../test/fixtures/brand-analysis.fixture';
import { ReportBlock } from '../interfaces';
import { renderReportPdf, reportFileId } from './pdf-report.renderer';
import { buildReportLayout } from './report-layout';

const CREATED_AT = new Date('2024-06-01T12:00:00Z');

describe('renderReportPdf', () => {
  const layout = buildReportLayout(brandAnalysisFixture());

  it('produces a PDF document', () => {
    const pdf = renderReportPdf(layout, { createdAt: CREATED_AT });

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(pdf.toString('latin1')).toContain(
      '(Brand Compatibility Analysis Report) Tj',
    );
  });

  it('writes text Helvetica cannot draw in its WinAnsi spelling', () => {
    const blocks: ReportBlock[] = [
      { type: 'paragraph', text: 'Growth → reach 日本' },
    ];

    const pdf = renderReportPdf(blocks, { createdAt: CREATED_AT });

    expect(pdf.toString('latin1')).toContain('(Growth -> reach ??) Tj');
  });

  it('renders identical bytes for identical input', () => {
    const first = renderReportPdf(layout, { createdAt: CREATED_AT });
    const second = renderReportPdf(buildReportLayout(brandAnalysisFixture()), {
      createdAt: new Date(CREATED_AT.getTime()),
    });

    expect(first.equals(second)).toBe(true);
  });

  it('renders different bytes for a different analysis', () => {
    const first = renderReportPdf(layout, { createdAt: CREATED_AT });
    const other = renderReportPdf(
      buildReportLayout(brandAnalysisFixture({ estilo_conteudo: 'educational' })),
      { createdAt: CREATED_AT },
    );

    expect(first.equals(other)).toBe(false);
  });

  it('embeds the content-derived file id', () => {
    const pdf = renderReportPdf(layout, { createdAt: CREATED_AT });

    expect(pdf.toString('latin1')).toContain(reportFileId(layout, CREATED_AT));
  });

  it('breaks long reports across pages', () => {
    const manyBullets: ReportBlock[] = Array.from({ length: 120 }, (_, i) => ({
      type: 'bullet',
      text: `point ${i}`,
    }));

    const pdf = renderReportPdf(manyBullets, { createdAt: CREATED_AT });

    expect(pdf.toString('latin1').match(/\/Type \/Page\b/g)?.length).toBe(3);
  });
});

describe('reportFileId', () => {
  it('is 32 upper-case hex characters', () => {
    expect(reportFileId([], CREATED_AT)).toMatch(/^[0-9A-F]{32}$/);
  });
});
