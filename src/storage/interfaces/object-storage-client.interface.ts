/**
 * The slice of `@google-cloud/storage` the upload adapter relies on. The real
 * `Storage` client satisfies it; tests pass an in-memory fake.
 */
export interface StorageObjectHandle {
  save(
    data: Buffer,
    options: { contentType: string; resumable: boolean },
  ): Promise<void>;
  makePublic(): Promise<unknown>;
  publicUrl(): string;
}

export interface StorageBucketHandle {
  file(name: string): StorageObjectHandle;
}

export interface ObjectStorageClient {
  bucket(name: string): StorageBucketHandle;
}
