import { Schema, Type } from '@google/genai';

const stringList = (description: string): Schema => ({
  type: Type.ARRAY,
  items: { type: Type.STRING },
  description,
});

/**
 * Response schema for the brand-fit analysis. Sent verbatim as
 * `responseSchema`; `BrandAnalysisDTO` mirrors it for validation.
 *
 * `video_url` is required of the model but optional in the DTO: the session
 * overwrites it with the stored upload's public URL.
 */
export const BRAND_ANALYSIS_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    video_url: {
      type: Type.STRING,
      description: 'URL do vídeo analisado.',
    },
    temas_abordados: stringList(
      'Lista dos principais temas abordados pelo criador no vídeo.',
    ),
    estilo_conteudo: {
      type: Type.STRING,
      description:
        'Estilo do conteúdo do criador (ex: humorístico, informativo, etc.).',
    },
    publico_alvo_estimado: {
      type: Type.OBJECT,
      properties: {
        faixa_etaria: {
          type: Type.STRING,
          description: 'Faixa etária estimada do público.',
        },
        genero: {
          type: Type.STRING,
          description:
            'Gênero predominante do público (ex: masculino, feminino, misto).',
        },
        interesses: stringList('Lista dos principais interesses do público.'),
        localizacao_geografica: {
          type: Type.STRING,
          description: 'Localização geográfica predominante do público.',
        },
      },
      required: [
        'faixa_etaria',
        'genero',
        'interesses',
        'localizacao_geografica',
      ],
      description: 'Informações sobre o público-alvo estimado do criador.',
    },
    engajamento: {
      type: Type.STRING,
      description:
        'Descrição do engajamento do público com o conteúdo do criador.',
    },
    valores_e_tom: {
      type: Type.OBJECT,
      properties: {
        valores: stringList('Lista dos valores que o criador parece promover.'),
        tom: {
          type: Type.STRING,
          description:
            'Tom geral do conteúdo do criador (ex: formal, informal, etc.).',
        },
      },
      required: ['valores', 'tom'],
      description: 'Valores e tom do conteúdo do criador.',
    },
    plataformas_principais: stringList(
      'Lista das plataformas principais onde o criador atua.',
    ),
    colaboracoes_anteriores: {
      type: Type.STRING,
      description:
        "Descrição das colaborações anteriores do criador com marcas (ou 'Nenhuma' se não houver).",
    },
    nichos_de_mercado: stringList(
      'Lista dos nichos de mercado com maior relevância para o criador.',
    ),
    marcas_match: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        properties: {
          tipo_marca: {
            type: Type.STRING,
            description:
              'Tipo de marca (ex: moda feminina, produtos de beleza veganos, etc.).',
          },
          exemplos: stringList('Lista de exemplos de marcas específicas.'),
          justificativa: {
            type: Type.STRING,
            description: "Justificativa para o 'match' com o criador.",
          },
        },
        required: ['tipo_marca', 'exemplos', 'justificativa'],
      },
      description:
        "Lista dos tipos de marcas que seriam um bom 'match' com o criador.",
    },
    tipos_de_colaboracao: stringList(
      'Lista dos tipos de colaboração mais eficazes com o criador.',
    ),
    consideracoes_imagem_marca: {
      type: Type.STRING,
      description:
        "Considerações sobre a imagem do criador para garantir um 'match' positivo com a marca.",
    },
  },
  required: [
    'video_url',
    'temas_abordados',
    'estilo_conteudo',
    'publico_alvo_estimado',
    'engajamento',
    'valores_e_tom',
    'plataformas_principais',
    'colaboracoes_anteriores',
    'nichos_de_mercado',
    'marcas_match',
    'tipos_de_colaboracao',
    'consideracoes_imagem_marca',
  ],
};
