import type { BrandAnalysis } from '../types';
import { BulletList } from './BulletList';

type Props = {
  analysis: BrandAnalysis;
};

export function AudienceTab({ analysis }: Props) {
  const audience = analysis.publico_alvo_estimado;

  return (
    <section>
      <h2>Audience Analysis</h2>
      <div className="columns">
        <div>
          <h3>Demographics</h3>
          <p>
            <strong>Age Range:</strong> {audience.faixa_etaria}
          </p>
          <p>
            <strong>Gender:</strong> {audience.genero}
          </p>
          <p>
            <strong>Location:</strong> {audience.localizacao_geografica}
          </p>
        </div>
        <div>
          <h3>Interests</h3>
          <BulletList items={audience.interesses} />
        </div>
      </div>

      <h3>Engagement</h3>
      <p>{analysis.engajamento}</p>

      <h3>Market Niches</h3>
      <BulletList items={analysis.nichos_de_mercado} />
    </section>
  );
}
