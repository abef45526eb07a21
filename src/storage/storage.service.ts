import { Inject, Injectable, Logger } from '@nestjs/common';

import { GcpConfigService, UploadConfigService } from '@libs/config';
import { UploadError } from '@libs/exceptions';
import { SentryClientService } from '@libs/sentry';

import { MetricsService } from '../metrics';
import { IncomingVideo, ObjectStorageClient, UploadRecord } from './interfaces';
import { GCS_CLIENT } from './storage.constants';
import { buildLocator, buildObjectKey } from './utils/object-key.util';

@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name);

  constructor(
    @Inject(GCS_CLIENT) private readonly client: ObjectStorageClient,
    private readonly gcpConfig: GcpConfigService,
    private readonly uploadConfig: UploadConfigService,
    private readonly sentry: SentryClientService,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * Writes the video as a new public object and returns where it lives.
   *
   * Each call creates a fresh key, so earlier uploads are never overwritten.
   *
   * @throws {UploadError} when the bucket is unreachable or rejects the write.
   */
  public async uploadVideo(
    video: IncomingVideo,
    now: Date = new Date(),
  ): Promise<UploadRecord> {
    const { bucketName } = this.gcpConfig.requireTarget();
    const objectKey = buildObjectKey(
      this.uploadConfig.prefix,
      video.originalName,
      now,
    );

    this.logger.log(
      `Uploading ${video.originalName} (${video.sizeBytes} bytes) to gs://${bucketName}/${objectKey}`,
    );

    const startTime = Date.now();

    try {
      const file = this.client.bucket(bucketName).file(objectKey);
      await file.save(video.buffer, {
        contentType: video.contentType,
        resumable: false,
      });
      await file.makePublic();

      const duration = (Date.now() - startTime) / 1000;
      this.metricsService.recordUpload(video.sizeBytes, duration, 'success');

      return {
        publicUrl: file.publicUrl(),
        locator: buildLocator(bucketName, objectKey),
        objectKey,
        fileName: video.originalName,
        contentType: video.contentType,
        sizeBytes: video.sizeBytes,
        uploadedAt: now.toISOString(),
      };
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      this.metricsService.recordUpload(video.sizeBytes, duration, 'error');

      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error uploading to GCS: ${reason}`);
      this.sentry.sendException(error, { bucketName, objectKey });

      throw new UploadError(`Error uploading to GCS: ${reason}`, {
        cause: error,
      });
    }
  }
}
