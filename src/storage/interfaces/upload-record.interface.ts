/**
 * Result of one successful video upload. `locator` is the `gs://` URI handed
 * to the model; `publicUrl` is what the browser plays back.
 */
export interface UploadRecord {
  publicUrl: string;
  locator: string;
  objectKey: string;
  fileName: string;
  contentType: string;
  sizeBytes: number;
  uploadedAt: string;
}

export interface IncomingVideo {
  originalName: string;
  contentType: string;
  sizeBytes: number;
  buffer: Buffer;
}
