import type { BrandAnalysis } from '../types';
import { BulletList } from './BulletList';

type Props = {
  analysis: BrandAnalysis;
};

export function BrandMatchesTab({ analysis }: Props) {
  return (
    <section>
      <h2>Brand Match Analysis</h2>

      {analysis.marcas_match.map((match, index) => (
        <details key={`${index}-${match.tipo_marca}`} className="expander">
          <summary>🎯 {match.tipo_marca}</summary>
          <p>
            <strong>Example Brands:</strong>
          </p>
          <BulletList items={match.exemplos} />
          <p>
            <strong>Match Justification:</strong>
          </p>
          <p>{match.justificativa}</p>
        </details>
      ))}

      <h3>Recommended Collaboration Types</h3>
      <BulletList items={analysis.tipos_de_colaboracao} />

      <h3>Brand Image Considerations</h3>
      <div className="info">{analysis.consideracoes_imagem_marca}</div>
    </section>
  );
}
