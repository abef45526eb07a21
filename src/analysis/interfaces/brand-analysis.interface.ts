/**
 * Structured answer the model returns for one video. Keys match the
 * response schema sent with the request.
 */
export interface BrandAnalysis {
  video_url?: string;
  temas_abordados: string[];
  estilo_conteudo: string;
  publico_alvo_estimado: TargetAudience;
  engajamento: string;
  valores_e_tom: ValuesAndTone;
  plataformas_principais: string[];
  colaboracoes_anteriores: string;
  nichos_de_mercado: string[];
  marcas_match: BrandMatch[];
  tipos_de_colaboracao: string[];
  consideracoes_imagem_marca: string;
}

export interface TargetAudience {
  faixa_etaria: string;
  genero: string;
  interesses: string[];
  localizacao_geografica: string;
}

export interface ValuesAndTone {
  valores: string[];
  tom: string;
}

export interface BrandMatch {
  tipo_marca: string;
  exemplos: string[];
  justificativa: string;
}
