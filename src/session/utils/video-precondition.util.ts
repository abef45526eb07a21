import { extname } from 'node:path';

import {
  UnsupportedVideoTypeError,
  VideoTooLargeError,
} from '@libs/exceptions';

import { IncomingVideo } from '../../storage';

const MP4_CONTENT_TYPE = 'video/mp4';
const MP4_EXTENSION = '.mp4';

export interface VideoRejection {
  reason: 'too_large' | 'empty' | 'unsupported_type';
  error: VideoTooLargeError | UnsupportedVideoTypeError;
}

export function isMp4(
  video: Pick<IncomingVideo, 'originalName' | 'contentType'>,
): boolean {
  return (
    video.contentType.toLowerCase() === MP4_CONTENT_TYPE ||
    extname(video.originalName).toLowerCase() === MP4_EXTENSION
  );
}

/**
 * Size and type checks that run before anything leaves the process.
 * Returns `null` for an acceptable video.
 */
export function checkUploadableVideo(
  video: IncomingVideo,
  maxBytes: number,
): VideoRejection | null {
  if (video.sizeBytes > maxBytes) {
    return {
      reason: 'too_large',
      error: new VideoTooLargeError(video.sizeBytes, maxBytes),
    };
  }

  if (video.sizeBytes === 0) {
    return {
      reason: 'empty',
      error: new UnsupportedVideoTypeError('The uploaded video is empty'),
    };
  }

  if (!isMp4(video)) {
    return {
      reason: 'unsupported_type',
      error: new UnsupportedVideoTypeError(
        `Only MP4 videos are supported, got ${video.contentType || 'an unknown type'}`,
      ),
    };
  }

  return null;
}
