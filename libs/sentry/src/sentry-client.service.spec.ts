import {
  AnalysisError,
  ConfigurationError,
  UploadError,
} from '@libs/exceptions';

import { analyzerErrorTags } from './sentry-client.service';

describe('analyzerErrorTags', () => {
  it('tags analysis failures with kind and reason', () => {
    expect(analyzerErrorTags(new AnalysisError('quota hit', 'quota'))).toEqual({
      error_kind: 'analysis',
      analysis_reason: 'quota',
    });
  });

  it('tags other analyzer errors with their kind only', () => {
    expect(analyzerErrorTags(new UploadError('denied'))).toEqual({
      error_kind: 'upload',
    });
    expect(
      analyzerErrorTags(new ConfigurationError('missing', ['GCP_PROJECT'])),
    ).toEqual({ error_kind: 'configuration' });
  });

  it('returns no tags for unknown errors', () => {
    expect(analyzerErrorTags(new Error('boom'))).toEqual({});
    expect(analyzerErrorTags('boom')).toEqual({});
  });
});
