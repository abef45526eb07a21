import { useEffect, useState } from 'react';

import { apiGetBlob } from '../api';

export const REPORT_PATH = '/api/v1/session/report.pdf';
export const REPORT_FILE_NAME = 'brand_compatibility_analysis.pdf';

/**
 * Fetches the PDF once per mount; the parent remounts it for a new analysis.
 */
export function ReportTab() {
  const [reportUrl, setReportUrl] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    let objectUrl: string | null = null;

    void (async () => {
      try {
        const blob = await apiGetBlob(REPORT_PATH);
        if (cancelled) return;
        objectUrl = URL.createObjectURL(blob);
        setReportUrl(objectUrl);
      } catch (e) {
        if (!cancelled) setError(e instanceof Error ? e.message : String(e));
      }
    })();

    return () => {
      cancelled = true;
      if (objectUrl) URL.revokeObjectURL(objectUrl);
    };
  }, []);

  return (
    <section>
      <h2>Analysis Report</h2>

      {error ? <div className="errorBox">{error}</div> : null}
      {!reportUrl && !error ? <p className="muted">Rendering report…</p> : null}

      {reportUrl ? (
        <>
          <a className="primaryBtn" href={reportUrl} download={REPORT_FILE_NAME}>
            Download PDF Report
          </a>
          <h3>Report Preview</h3>
          <iframe
            className="reportPreview"
            src={reportUrl}
            title="Report Preview"
          />
        </>
      ) : null}
    </section>
  );
}
