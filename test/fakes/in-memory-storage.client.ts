import {
  ObjectStorageClient,
  StorageBucketHandle,
  StorageObjectHandle,
} from '../../src/storage';

export interface StoredObject {
  bucket: string;
  key: string;
  data: Buffer;
  contentType: string;
  isPublic: boolean;
}

/**
 * In-process stand-in for `@google-cloud/storage`.
 */
export class InMemoryStorageClient implements ObjectStorageClient {
  public readonly objects: StoredObject[] = [];
  public failWith: Error | null = null;
  /** When set, `save` waits for it before writing. */
  public gate: Promise<unknown> | null = null;
  public bucketCalls = 0;

  public bucket(bucket: string): StorageBucketHandle {
    this.bucketCalls += 1;

    return {
      file: (key: string): StorageObjectHandle => ({
        save: async (data, options) => {
          if (this.gate) {
            await this.gate;
          }
          if (this.failWith) {
            throw this.failWith;
          }
          this.objects.push({
            bucket,
            key,
            data,
            contentType: options.contentType,
            isPublic: false,
          });
        },
        makePublic: async () => {
          const stored = this.objects.find(
            (o) => o.bucket === bucket && o.key === key,
          );
          if (stored) {
            stored.isPublic = true;
          }
          return [{}];
        },
        publicUrl: () =>
          `https://storage.googleapis.com/${bucket}/${encodeURIComponent(key)}`,
      }),
    };
  }
}
