import { describe, it, expect } from 'vitest';
import {
  TRACK_ID_NAMESPACE,
  audioArtifactPath,
  plainTextCachePath,
  resolveTrackId,
  transcriptCachePath
} from '../trackIdentity';
import { MetadataError } from '../errors';

describe('resolveTrackId', () => {
  it('uses the standard URL namespace', () => {
    expect(TRACK_ID_NAMESPACE).toBe('6ba7b811-9dad-11d1-80b4-00c04fd430c8');
  });

  it('returns the version-5 UUID of the URL', () => {
    expect(resolveTrackId('https://x/a')).toBe('26215388-0298-5ed3-a7b3-6841442944f2');
    expect(resolveTrackId('https://x/b')).toBe('0d2fb5bf-1416-5650-88da-ffe6cd9ae6fb');
    expect(resolveTrackId('https://soundcloud.com/artist/track-one')).toBe('1c942ffb-73be-564c-968e-c1fbecfe46e5');
  });

  it('is stable across calls', () => {
    const url = 'https://x/c';
    expect(resolveTrackId(url)).toBe(resolveTrackId(url));
    expect(resolveTrackId(url)).toBe('e22b2e46-9585-5b1d-8998-78179faad5af');
  });

  it('hashes the URL byte-for-byte', () => {
    expect(resolveTrackId('https://x/a/')).not.toBe(resolveTrackId('https://x/a'));
    expect(resolveTrackId('HTTPS://x/a')).not.toBe(resolveTrackId('https://x/a'));
  });

  it('rejects an empty URL', () => {
    expect(() => resolveTrackId('')).toThrow(MetadataError);
  });
});

describe('derived paths', () => {
  const id = '26215388-0298-5ed3-a7b3-6841442944f2';

  it('names every artifact after the track id only', () => {
    expect(audioArtifactPath('/data/audio', id, 'wav')).toBe(`/data/audio/${id}.wav`);
    expect(transcriptCachePath('/data/transcripts', id)).toBe(`/data/transcripts/${id}.json`);
    expect(plainTextCachePath('/data/transcripts', id)).toBe(`/data/transcripts/${id}.txt`);
  });
});
