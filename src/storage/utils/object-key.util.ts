import { formatCompactTimestamp } from '@libs/utils';

/**
 * Strips any directory part a browser may have sent along with the file name.
 */
export function sanitizeFileName(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? '';
  const cleaned = base.replace(/[\u0000-\u001f\u007f]/g, '').trim();
  return cleaned || 'video.mp4';
}

export function buildObjectKey(
  prefix: string,
  fileName: string,
  at: Date,
): string {
  const folder = prefix.replace(/^\/+|\/+$/g, '');
  const name = `${formatCompactTimestamp(at)}_${sanitizeFileName(fileName)}`;
  return folder ? `${folder}/${name}` : name;
}

export function buildLocator(bucketName: string, objectKey: string): string {
  return `gs://${bucketName}/${objectKey}`;
}
