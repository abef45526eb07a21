import { formatMegabytes } from '../upload';

type Props = {
  maxUploadBytes: number;
};

export function WelcomeScreen({ maxUploadBytes }: Props) {
  const limit = formatMegabytes(maxUploadBytes);

  return (
    <section className="card">
      <h2>Welcome to Brand Media Analyzer! 👋</h2>
      <p>
        This tool helps brands find the perfect content creator match by
        analyzing videos and providing detailed insights about audience
        compatibility, brand alignment, and collaboration opportunities.
      </p>
      <h3>To get started:</h3>
      <ol>
        <li>Upload a content creator&apos;s video using the sidebar (max {limit})</li>
        <li>Click &quot;Analyze Brand Compatibility&quot;</li>
        <li>View the detailed analysis across different categories</li>
      </ol>
      <h3>The AI will analyze the content and provide insights about:</h3>
      <ul>
        <li>Content themes and style</li>
        <li>Audience demographics and engagement</li>
        <li>Brand compatibility and collaboration opportunities</li>
        <li>Market niches and potential matches</li>
      </ul>
    </section>
  );
}
