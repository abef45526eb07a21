import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';

import { UploadConfigService } from '@libs/config';
import { AnalyzerError, InvalidSessionStateError } from '@libs/exceptions';

import { AnalysisService, BrandAnalysis } from '../analysis';
import { MetricsService } from '../metrics';
import { PresentationService } from '../presentation';
import { IncomingVideo, StorageService, UploadRecord } from '../storage';
import {
  AnalysisView,
  FailureStage,
  SessionEvent,
  SessionFailure,
  SessionState,
  SessionView,
} from './interfaces';
import {
  currentUpload,
  INITIAL_SESSION_STATE,
  transition,
} from './session.machine';
import { SessionStore } from './session.store';
import { checkUploadableVideo } from './utils/video-precondition.util';

type DisplayedState = Extract<SessionState, { status: 'displayed' }>;

function toFailure(stage: FailureStage, error: unknown): SessionFailure {
  if (error instanceof AnalyzerError) {
    return { stage, kind: error.kind, message: error.message };
  }
  return { stage, kind: 'internal', message: 'An unexpected error occurred' };
}

/**
 * Drives one session through upload, analysis and report. Every step goes
 * through `transition`, and the store only ever holds a state it returned.
 */
@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);

  constructor(
    private readonly store: SessionStore,
    private readonly storageService: StorageService,
    private readonly analysisService: AnalysisService,
    private readonly presentationService: PresentationService,
    private readonly uploadConfig: UploadConfigService,
    private readonly metricsService: MetricsService,
  ) {}

  public async getSession(sessionId: string): Promise<SessionView> {
    return this.toView(await this.store.load(sessionId));
  }

  /**
   * Stores a new video for the session, replacing any earlier upload and
   * analysis.
   *
   * @throws {VideoTooLargeError} before the storage client is touched.
   * @throws {UnsupportedVideoTypeError} for an empty or non-MP4 file.
   * @throws {UploadError} when the bucket write fails; the session keeps no upload.
   * @throws {InvalidSessionStateError} when the session was reset or a newer
   * upload started before this one finished.
   */
  public async uploadVideo(
    sessionId: string,
    video: IncomingVideo,
  ): Promise<SessionView> {
    const rejection = checkUploadableVideo(video, this.uploadConfig.maxBytes);
    if (rejection) {
      this.metricsService.recordUploadRejected(rejection.reason);
      this.logger.warn(
        `Rejected ${video.originalName} for session ${sessionId}: ${rejection.reason}`,
      );
      throw rejection.error;
    }

    const attemptId = randomUUID();
    await this.store.save(
      sessionId,
      transition(await this.store.load(sessionId), {
        type: 'upload_started',
        fileName: video.originalName,
        attemptId,
      }),
    );
    const isSameAttempt = (state: SessionState): boolean =>
      state.status === 'uploading' && state.attemptId === attemptId;

    let upload: UploadRecord;
    try {
      upload = await this.storageService.uploadVideo(video);
    } catch (error) {
      await this.completeIfCurrent(sessionId, isSameAttempt, {
        type: 'upload_failed',
        failure: toFailure('upload', error),
      });
      throw error;
    }

    const uploaded = await this.completeIfCurrent(sessionId, isSameAttempt, {
      type: 'upload_succeeded',
      upload,
    });
    if (!uploaded) {
      throw this.superseded();
    }
    return this.toView(uploaded);
  }

  /**
   * Runs the analysis for the session's current upload. A failure keeps the
   * upload so the user can try again.
   *
   * @throws {InvalidSessionStateError} when the session was reset or moved on
   * while the model was answering; the late result is dropped.
   */
  public async analyze(sessionId: string): Promise<AnalysisView> {
    const analyzing = transition(await this.store.load(sessionId), {
      type: 'analysis_started',
    });
    await this.store.save(sessionId, analyzing);

    const upload = currentUpload(analyzing);
    if (!upload) {
      throw new InvalidSessionStateError('No uploaded video to analyze');
    }
    const isSameAnalysis = (state: SessionState): boolean =>
      state.status === 'analyzing' && state.upload.locator === upload.locator;

    let analysis: BrandAnalysis;
    try {
      analysis = await this.analysisService.analyze(upload.locator);
    } catch (error) {
      await this.completeIfCurrent(sessionId, isSameAnalysis, {
        type: 'analysis_failed',
        failure: toFailure('analysis', error),
      });
      throw error;
    }

    const displayed = await this.completeIfCurrent(sessionId, isSameAnalysis, {
      type: 'analysis_succeeded',
      analysis: { ...analysis, video_url: upload.publicUrl },
      analyzedAt: new Date().toISOString(),
    });
    if (!displayed) {
      throw this.superseded();
    }
    return this.toAnalysisView(this.requireDisplayed(displayed));
  }

  public async getAnalysis(sessionId: string): Promise<AnalysisView> {
    const state = this.requireDisplayed(await this.store.load(sessionId));
    return this.toAnalysisView(state);
  }

  /**
   * PDF for the displayed analysis. Repeated calls return identical bytes.
   */
  public async getReport(sessionId: string): Promise<Buffer> {
    const state = this.requireDisplayed(await this.store.load(sessionId));
    return this.presentationService.renderReport(
      state.analysis,
      new Date(state.analyzedAt),
    );
  }

  public async reset(sessionId: string): Promise<SessionView> {
    await this.store.clear(sessionId);
    return this.toView(INITIAL_SESSION_STATE);
  }

  /**
   * Applies a completion event to the state as it is now, not as it was when
   * the slow call started. Returns null, and saves nothing, when a reset or a
   * newer attempt has replaced that state in the meantime.
   */
  private async completeIfCurrent(
    sessionId: string,
    isCurrent: (state: SessionState) => boolean,
    event: SessionEvent,
  ): Promise<SessionState | null> {
    const fresh = await this.store.load(sessionId);
    if (!isCurrent(fresh)) {
      this.logger.warn(
        `Dropping ${event.type} for session ${sessionId}: it is now ${fresh.status}`,
      );
      return null;
    }

    const next = transition(fresh, event);
    await this.store.save(sessionId, next);
    return next;
  }

  private superseded(): InvalidSessionStateError {
    return new InvalidSessionStateError(
      'The session was reset or replaced while the request was running',
    );
  }

  private requireDisplayed(state: SessionState): DisplayedState {
    if (state.status !== 'displayed') {
      throw new InvalidSessionStateError(
        `No analysis is available while the session is ${state.status}`,
      );
    }
    return state;
  }

  private toAnalysisView(state: DisplayedState): AnalysisView {
    return {
      analysis: state.analysis,
      charts: this.presentationService.buildCharts(state.analysis),
      upload: state.upload,
    };
  }

  private toView(state: SessionState): SessionView {
    return {
      status: state.status,
      upload: currentUpload(state),
      failure: state.status === 'error' ? state.failure : null,
      hasAnalysis: state.status === 'displayed',
      maxUploadBytes: this.uploadConfig.maxBytes,
    };
  }
}
