import { BrandAnalysis } from '../../src/analysis';

/**
 * A complete, schema-valid analysis as the model would return it.
 */
export function brandAnalysisFixture(
  overrides: Partial<BrandAnalysis> = {},
): BrandAnalysis {
  return {
    temas_abordados: ['comedy', 'lifestyle'],
    estilo_conteudo: 'humorous',
    publico_alvo_estimado: {
      faixa_etaria: '18-24',
      genero: 'mixed',
      interesses: ['memes', 'street food'],
      localizacao_geografica: 'Brazil',
    },
    engajamento: 'High comment activity driven by running jokes',
    valores_e_tom: {
      valores: ['authenticity', 'friendship'],
      tom: 'informal',
    },
    plataformas_principais: ['TikTok', 'Instagram Reels'],
    colaboracoes_anteriores: 'Nenhuma',
    nichos_de_mercado: ['snacks', 'mobile games'],
    marcas_match: [
      {
        tipo_marca: 'Snack brands',
        exemplos: ['Crunchy Co', 'Snackery'],
        justificativa: 'Food bits recur in most sketches',
      },
      {
        tipo_marca: 'Casual mobile games',
        exemplos: ['Puzzle Pop'],
        justificativa: 'Audience overlaps with casual gamers',
      },
    ],
    tipos_de_colaboracao: ['sponsored sketch', 'discount code'],
    consideracoes_imagem_marca: 'Occasional crude humor; review scripts',
    ...overrides,
  };
}
