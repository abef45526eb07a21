/**
 * Busboy reads multipart `filename` parameters as latin1, while browsers send
 * the raw UTF-8 bytes. Re-reading those bytes as UTF-8 restores the name; a
 * name that is not valid UTF-8 that way is returned unchanged.
 */
export function decodeMultipartFileName(raw: string): string {
  const decoded = Buffer.from(raw, 'latin1').toString('utf8');
  return decoded.includes('\uFFFD') ? raw : decoded;
}
