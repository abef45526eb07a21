export type SessionStatus =
  | 'no_upload'
  | 'uploading'
  | 'uploaded'
  | 'analyzing'
  | 'displayed'
  | 'error';

export type UploadRecord = {
  publicUrl: string;
  locator: string;
  objectKey: string;
  fileName: string;
  contentType: string;
  sizeBytes: number;
  uploadedAt: string;
};

export type SessionFailure = {
  stage: 'upload' | 'analysis';
  kind: string;
  message: string;
};

export type SessionView = {
  status: SessionStatus;
  upload: UploadRecord | null;
  failure: SessionFailure | null;
  hasAnalysis: boolean;
  maxUploadBytes: number;
};

export type BrandMatch = {
  tipo_marca: string;
  exemplos: string[];
  justificativa: string;
};

export type BrandAnalysis = {
  video_url?: string;
  temas_abordados: string[];
  estilo_conteudo: string;
  publico_alvo_estimado: {
    faixa_etaria: string;
    genero: string;
    interesses: string[];
    localizacao_geografica: string;
  };
  engajamento: string;
  valores_e_tom: { valores: string[]; tom: string };
  plataformas_principais: string[];
  colaboracoes_anteriores: string;
  nichos_de_mercado: string[];
  marcas_match: BrandMatch[];
  tipos_de_colaboracao: string[];
  consideracoes_imagem_marca: string;
};

export type ChartPoint = { label: string; value: number };

export type AnalysisCharts = {
  engagement: { title: string; range: [number, number]; axes: ChartPoint[] };
  themes: {
    title: string;
    xAxisTitle: string;
    yAxisTitle: string;
    color: string;
    bars: ChartPoint[];
  };
  audience: {
    title: string;
    hole: number;
    slices: Array<ChartPoint & { detail: string }>;
  };
};

export type AnalysisView = {
  analysis: BrandAnalysis;
  charts: AnalysisCharts;
  upload: UploadRecord;
};
