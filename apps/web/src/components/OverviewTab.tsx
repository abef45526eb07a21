import type { BrandAnalysis } from '../types';
import { BulletList } from './BulletList';

type Props = {
  analysis: BrandAnalysis;
};

export function OverviewTab({ analysis }: Props) {
  return (
    <section>
      <h2>Content Overview</h2>
      <div className="columns">
        <div>
          <h3>Content Style</h3>
          <p>{analysis.estilo_conteudo}</p>
          <h3>Main Themes</h3>
          <BulletList items={analysis.temas_abordados} />
        </div>
        <div>
          <h3>Values &amp; Tone</h3>
          <p>
            <strong>Values:</strong>
          </p>
          <BulletList items={analysis.valores_e_tom.valores} />
          <p>
            <strong>Tone:</strong> {analysis.valores_e_tom.tom}
          </p>
        </div>
      </div>

      <h3>Platforms &amp; Collaborations</h3>
      <div className="columns">
        <div>
          <p>
            <strong>Main Platforms:</strong>
          </p>
          <BulletList items={analysis.plataformas_principais} />
        </div>
        <div>
          <p>
            <strong>Previous Collaborations:</strong>
          </p>
          <p>{analysis.colaboracoes_anteriores}</p>
        </div>
      </div>
    </section>
  );
}
