import { formatMegabytes, validateVideoFile } from './upload';

const MB = 1024 * 1024;

describe('validateVideoFile', () => {
  it('accepts an MP4 up to the limit', () => {
    expect(
      validateVideoFile({ name: 'clip.mp4', size: 200 * MB, type: 'video/mp4' }),
    ).toEqual({ ok: true });
  });

  it('rejects a file over the limit before anything is sent', () => {
    expect(
      validateVideoFile({ name: 'clip.mp4', size: 200 * MB + 1, type: 'video/mp4' }),
    ).toEqual({ ok: false, message: 'File size exceeds 200MB limit!' });
  });

  it('uses the limit the server reports', () => {
    expect(
      validateVideoFile({ name: 'clip.mp4', size: 11 * MB, type: 'video/mp4' }, 10 * MB),
    ).toEqual({ ok: false, message: 'File size exceeds 10MB limit!' });
  });

  it('accepts an .mp4 name when the browser reports no type', () => {
    expect(validateVideoFile({ name: 'CLIP.MP4', size: MB, type: '' })).toEqual({
      ok: true,
    });
  });

  it('rejects other formats', () => {
    expect(
      validateVideoFile({ name: 'clip.mov', size: MB, type: 'video/quicktime' }),
    ).toEqual({ ok: false, message: 'Only MP4 videos are supported' });
  });
});

describe('formatMegabytes', () => {
  it('rounds down to whole megabytes', () => {
    expect(formatMegabytes(5.9 * MB)).toBe('5MB');
  });
});
