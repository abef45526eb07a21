import { decodeMultipartFileName } from './multipart-file-name.util';

describe('decodeMultipartFileName', () => {
  it('restores an accented name that arrived as latin1', () => {
    const received = Buffer.from('vídeo_ação.mp4', 'utf8').toString('latin1');

    expect(received).not.toBe('vídeo_ação.mp4');
    expect(decodeMultipartFileName(received)).toBe('vídeo_ação.mp4');
  });

  it('leaves plain ASCII names alone', () => {
    expect(decodeMultipartFileName('clip.mp4')).toBe('clip.mp4');
  });

  it('keeps a name whose bytes are not UTF-8', () => {
    expect(decodeMultipartFileName('café.mp4')).toBe('café.mp4');
  });
});
