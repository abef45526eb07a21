import { InvalidSessionStateError } from '@libs/exceptions';

import { UploadRecord } from '../storage';
import { SessionEvent, SessionState } from './interfaces';

export const INITIAL_SESSION_STATE: SessionState = { status: 'no_upload' };

function reject(state: SessionState, event: SessionEvent): never {
  throw new InvalidSessionStateError(
    `Cannot apply ${event.type} while the session is ${state.status}`,
  );
}

/**
 * The upload an analysis can run against, if the state holds one.
 */
export function currentUpload(state: SessionState): UploadRecord | null {
  switch (state.status) {
    case 'uploaded':
    case 'analyzing':
    case 'displayed':
    case 'error':
      return state.upload;
    default:
      return null;
  }
}

/**
 * Pure session transition. Returns the next state or throws
 * `InvalidSessionStateError` when the event is not allowed.
 */
export function transition(
  state: SessionState,
  event: SessionEvent,
): SessionState {
  switch (event.type) {
    case 'reset':
      return INITIAL_SESSION_STATE;

    case 'upload_started':
      if (state.status === 'uploading' || state.status === 'analyzing') {
        return reject(state, event);
      }
      return {
        status: 'uploading',
        fileName: event.fileName,
        attemptId: event.attemptId,
      };

    case 'upload_succeeded':
      if (state.status !== 'uploading') {
        return reject(state, event);
      }
      return { status: 'uploaded', upload: event.upload };

    case 'upload_failed':
      if (state.status !== 'uploading') {
        return reject(state, event);
      }
      return { status: 'error', upload: null, failure: event.failure };

    case 'analysis_started': {
      if (state.status === 'analyzing') {
        return reject(state, event);
      }
      const upload = currentUpload(state);
      if (!upload) {
        return reject(state, event);
      }
      return { status: 'analyzing', upload };
    }

    case 'analysis_succeeded':
      if (state.status !== 'analyzing') {
        return reject(state, event);
      }
      return {
        status: 'displayed',
        upload: state.upload,
        analysis: event.analysis,
        analyzedAt: event.analyzedAt,
      };

    case 'analysis_failed':
      if (state.status !== 'analyzing') {
        return reject(state, event);
      }
      return { status: 'error', upload: state.upload, failure: event.failure };
  }
}
