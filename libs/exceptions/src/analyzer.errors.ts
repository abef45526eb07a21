import { HttpStatus } from '@nestjs/common';

export type AnalyzerErrorKind =
  | 'configuration'
  | 'upload'
  | 'analysis'
  | 'validation'
  | 'video_too_large'
  | 'unsupported_video_type'
  | 'invalid_session_state';

/**
 * Base class for every failure the analyzer reports to the user.
 *
 * `kind` is the stable identifier the web client switches on, `httpStatus`
 * is what `AnalyzerExceptionFilter` answers with.
 */
export abstract class AnalyzerError extends Error {
  public abstract readonly kind: AnalyzerErrorKind;
  public abstract readonly httpStatus: HttpStatus;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends AnalyzerError {
  public readonly kind = 'configuration';
  public readonly httpStatus = HttpStatus.SERVICE_UNAVAILABLE;

  constructor(
    message: string,
    public readonly missing: string[] = [],
  ) {
    super(message);
  }
}

export class UploadError extends AnalyzerError {
  public readonly kind = 'upload';
  public readonly httpStatus = HttpStatus.BAD_GATEWAY;
}

export type AnalysisFailureReason =
  | 'unreachable'
  | 'quota'
  | 'permission'
  | 'endpoint'
  | 'parse'
  | 'validation';

export class AnalysisError extends AnalyzerError {
  public readonly kind: AnalyzerErrorKind = 'analysis';
  public readonly httpStatus: HttpStatus = HttpStatus.BAD_GATEWAY;

  constructor(
    message: string,
    public readonly reason: AnalysisFailureReason,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The model answered with JSON that does not match the response schema.
 */
export class AnalysisValidationError extends AnalysisError {
  public readonly kind: AnalyzerErrorKind = 'validation';
  public readonly httpStatus: HttpStatus = HttpStatus.UNPROCESSABLE_ENTITY;

  constructor(public readonly issues: string[]) {
    super(
      `Analysis response does not match the expected schema: ${issues.join('; ')}`,
      'validation',
    );
  }
}

export class VideoTooLargeError extends AnalyzerError {
  public readonly kind = 'video_too_large';
  public readonly httpStatus = HttpStatus.PAYLOAD_TOO_LARGE;

  constructor(
    public readonly sizeBytes: number,
    public readonly maxBytes: number,
  ) {
    super(
      `File size exceeds ${Math.floor(maxBytes / (1024 * 1024))}MB limit!`,
    );
  }
}

export class UnsupportedVideoTypeError extends AnalyzerError {
  public readonly kind = 'unsupported_video_type';
  public readonly httpStatus = HttpStatus.UNSUPPORTED_MEDIA_TYPE;
}

export class InvalidSessionStateError extends AnalyzerError {
  public readonly kind = 'invalid_session_state';
  public readonly httpStatus = HttpStatus.CONFLICT;
}
