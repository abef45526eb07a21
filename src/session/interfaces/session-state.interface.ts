import { AnalyzerErrorKind } from '@libs/exceptions';

import { BrandAnalysis } from '../../analysis';
import { AnalysisCharts } from '../../presentation';
import { UploadRecord } from '../../storage';

export type SessionStatus =
  | 'no_upload'
  | 'uploading'
  | 'uploaded'
  | 'analyzing'
  | 'displayed'
  | 'error';

export type FailureStage = 'upload' | 'analysis';

export interface SessionFailure {
  stage: FailureStage;
  kind: AnalyzerErrorKind | 'internal';
  message: string;
}

export type SessionState =
  | { status: 'no_upload' }
  | { status: 'uploading'; fileName: string; attemptId: string }
  | { status: 'uploaded'; upload: UploadRecord }
  | { status: 'analyzing'; upload: UploadRecord }
  | {
      status: 'displayed';
      upload: UploadRecord;
      analysis: BrandAnalysis;
      /** ISO time the analysis finished; pins the report's creation date. */
      analyzedAt: string;
    }
  | { status: 'error'; upload: UploadRecord | null; failure: SessionFailure };

export type SessionEvent =
  | { type: 'upload_started'; fileName: string; attemptId: string }
  | { type: 'upload_succeeded'; upload: UploadRecord }
  | { type: 'upload_failed'; failure: SessionFailure }
  | { type: 'analysis_started' }
  | {
      type: 'analysis_succeeded';
      analysis: BrandAnalysis;
      analyzedAt: string;
    }
  | { type: 'analysis_failed'; failure: SessionFailure }
  | { type: 'reset' };

/**
 * What the web client sees of a session.
 */
export interface SessionView {
  status: SessionStatus;
  upload: UploadRecord | null;
  failure: SessionFailure | null;
  hasAnalysis: boolean;
  maxUploadBytes: number;
}

export interface AnalysisView {
  analysis: BrandAnalysis;
  charts: AnalysisCharts;
  upload: UploadRecord;
}
