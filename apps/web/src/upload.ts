export const DEFAULT_MAX_UPLOAD_BYTES = 200 * 1024 * 1024;

const BYTES_PER_MB = 1024 * 1024;

export type FileCheck = { ok: true } | { ok: false; message: string };

type FileLike = Pick<File, 'name' | 'size' | 'type'>;

export function formatMegabytes(bytes: number): string {
  return `${Math.floor(bytes / BYTES_PER_MB)}MB`;
}

/**
 * Same size and type rules the server applies, checked before sending.
 */
export function validateVideoFile(
  file: FileLike,
  maxBytes: number = DEFAULT_MAX_UPLOAD_BYTES,
): FileCheck {
  if (file.size > maxBytes) {
    return {
      ok: false,
      message: `File size exceeds ${formatMegabytes(maxBytes)} limit!`,
    };
  }
  if (file.size === 0) {
    return { ok: false, message: 'The selected video is empty' };
  }
  if (file.type !== 'video/mp4' && !file.name.toLowerCase().endsWith('.mp4')) {
    return { ok: false, message: 'Only MP4 videos are supported' };
  }
  return { ok: true };
}
