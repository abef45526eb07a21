import type { ChangeEvent } from 'react';

import type { UploadRecord } from '../types';
import { formatMegabytes } from '../upload';

type Props = {
  maxUploadBytes: number;
  upload: UploadRecord | null;
  uploading: boolean;
  analyzing: boolean;
  onSelectFile: (file: File) => void;
  onAnalyze: () => void;
};

export function UploadPanel({
  maxUploadBytes,
  upload,
  uploading,
  analyzing,
  onSelectFile,
  onAnalyze,
}: Props) {
  function handleChange(e: ChangeEvent<HTMLInputElement>) {
    const file = e.target.files?.[0];
    if (file) onSelectFile(file);
    // allow picking the same file again after an error
    e.target.value = '';
  }

  return (
    <aside className="sidebar">
      <h3>Upload Content</h3>
      <p>Upload a video to analyze for brand compatibility.</p>
      <p>
        <strong>Note:</strong> Maximum file size is{' '}
        {formatMegabytes(maxUploadBytes)}
      </p>

      <input
        type="file"
        accept="video/mp4,.mp4"
        aria-label="Video file"
        disabled={uploading || analyzing}
        onChange={handleChange}
      />

      {uploading ? <p className="muted">Uploading…</p> : null}

      {upload ? (
        <>
          <video
            className="preview"
            src={upload.publicUrl}
            controls
            preload="metadata"
          />
          <p className="muted">{upload.fileName}</p>
          <button
            className="primaryBtn"
            type="button"
            disabled={uploading || analyzing}
            onClick={onAnalyze}
          >
            {analyzing ? 'Analyzing your content…' : 'Analyze Brand Compatibility'}
          </button>
        </>
      ) : null}
    </aside>
  );
}
