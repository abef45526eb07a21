import {
  buildLocator,
  buildObjectKey,
  sanitizeFileName,
} from './object-key.util';

describe('object key helpers', () => {
  const at = new Date('2024-06-01T12:34:56Z');

  it('prefixes the timestamp and keeps the original name', () => {
    expect(buildObjectKey('uploads', 'clip.mp4', at)).toBe(
      'uploads/20240601_123456_clip.mp4',
    );
  });

  it('trims slashes around the prefix', () => {
    expect(buildObjectKey('/videos/raw/', 'clip.mp4', at)).toBe(
      'videos/raw/20240601_123456_clip.mp4',
    );
  });

  it('omits the folder when the prefix is empty', () => {
    expect(buildObjectKey('', 'clip.mp4', at)).toBe('20240601_123456_clip.mp4');
  });

  it('drops directories from the file name', () => {
    expect(sanitizeFileName('C:\\Users\\me\\clip.mp4')).toBe('clip.mp4');
    expect(sanitizeFileName('../../etc/clip.mp4')).toBe('clip.mp4');
  });

  it('keeps spaces inside the name', () => {
    expect(sanitizeFileName('my clip.mp4')).toBe('my clip.mp4');
  });

  it('falls back to a default name', () => {
    expect(sanitizeFileName('folder/')).toBe('video.mp4');
  });

  it('builds a gs:// locator', () => {
    expect(buildLocator('creator-videos', 'uploads/x.mp4')).toBe(
      'gs://creator-videos/uploads/x.mp4',
    );
  });
});
