import { Type } from 'class-transformer';
import {
  IsArray,
  IsDefined,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

import {
  BrandAnalysis,
  BrandMatch,
  TargetAudience,
  ValuesAndTone,
} from '../interfaces';

export class TargetAudienceDTO implements TargetAudience {
  @IsString()
  faixa_etaria!: string;

  @IsString()
  genero!: string;

  @IsArray()
  @IsString({ each: true })
  interesses!: string[];

  @IsString()
  localizacao_geografica!: string;
}

export class ValuesAndToneDTO implements ValuesAndTone {
  @IsArray()
  @IsString({ each: true })
  valores!: string[];

  @IsString()
  tom!: string;
}

export class BrandMatchDTO implements BrandMatch {
  @IsString()
  tipo_marca!: string;

  @IsArray()
  @IsString({ each: true })
  exemplos!: string[];

  @IsString()
  justificativa!: string;
}

export class BrandAnalysisDTO implements BrandAnalysis {
  @IsOptional()
  @IsString()
  video_url?: string;

  @IsArray()
  @IsString({ each: true })
  temas_abordados!: string[];

  @IsString()
  estilo_conteudo!: string;

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => TargetAudienceDTO)
  publico_alvo_estimado!: TargetAudienceDTO;

  @IsString()
  engajamento!: string;

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => ValuesAndToneDTO)
  valores_e_tom!: ValuesAndToneDTO;

  @IsArray()
  @IsString({ each: true })
  plataformas_principais!: string[];

  @IsString()
  colaboracoes_anteriores!: string;

  @IsArray()
  @IsString({ each: true })
  nichos_de_mercado!: string[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BrandMatchDTO)
  marcas_match!: BrandMatchDTO[];

  @IsArray()
  @IsString({ each: true })
  tipos_de_colaboracao!: string[];

  @IsString()
  consideracoes_imagem_marca!: string;
}
