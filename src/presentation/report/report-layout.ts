import { BrandAnalysis } from '../../analysis';
import { ReportBlock } from '../interfaces';

export const REPORT_TITLE = 'Brand Compatibility Analysis Report';

const SECTION_GAP: ReportBlock = { type: 'spacer', height: 12 };

/**
 * Lays the analysis out as an ordered list of blocks: overview, values and
 * tone, audience table, then one subsection per brand match.
 */
export function buildReportLayout(analysis: BrandAnalysis): ReportBlock[] {
  const audience = analysis.publico_alvo_estimado;
  const blocks: ReportBlock[] = [
    { type: 'title', text: REPORT_TITLE },
    SECTION_GAP,

    { type: 'heading', text: 'Content Overview' },
    { type: 'paragraph', text: `Style: ${analysis.estilo_conteudo}` },
    SECTION_GAP,
    { type: 'paragraph', text: 'Main Themes:' },
    ...bullets(analysis.temas_abordados),
    SECTION_GAP,

    { type: 'heading', text: 'Values & Tone' },
    { type: 'paragraph', text: 'Values:' },
    ...bullets(analysis.valores_e_tom.valores),
    { type: 'paragraph', text: `Tone: ${analysis.valores_e_tom.tom}` },
    SECTION_GAP,

    { type: 'heading', text: 'Audience Analysis' },
    {
      type: 'table',
      rows: [
        ['Age Range', audience.faixa_etaria],
        ['Gender', audience.genero],
        ['Location', audience.localizacao_geografica],
      ],
    },
    SECTION_GAP,

    { type: 'heading', text: 'Brand Matches' },
  ];

  for (const match of analysis.marcas_match) {
    blocks.push(
      { type: 'paragraph', text: `Type: ${match.tipo_marca}` },
      { type: 'paragraph', text: 'Examples:' },
      ...bullets(match.exemplos),
      { type: 'paragraph', text: `Justification: ${match.justificativa}` },
      SECTION_GAP,
    );
  }

  return blocks;
}

function bullets(items: string[]): ReportBlock[] {
  return items.map((text): ReportBlock => ({ type: 'bullet', text }));
}
