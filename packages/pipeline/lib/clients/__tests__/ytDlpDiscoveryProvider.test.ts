/**
 * Unit tests for the yt-dlp discovery adapter
 * yt-dlp-wrap is mocked, so no binary is spawned.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';

const { mockExec, mockExecPromise, mockConstructor } = vi.hoisted(() => ({
  mockExec: vi.fn(),
  mockExecPromise: vi.fn(),
  mockConstructor: vi.fn()
}));

vi.mock('yt-dlp-wrap', () => ({
  default: class {
    exec = mockExec;
    execPromise = mockExecPromise;
    constructor(binaryPath: string) {
      mockConstructor(binaryPath);
    }
  }
}));

import { YtDlpDiscoveryProvider } from '../ytDlpDiscoveryProvider';
import { Logger } from '../../logger';

const METADATA_ARGS = ['--dump-single-json', '--ignore-errors', '--format', 'bestaudio/best', '--quiet', '--no-warnings'];

/**
 * Stand-in for the event emitter yt-dlp-wrap's exec() returns: prints `stdout`,
 * then closes cleanly or fails with `failure` like a non-zero exit
 */
function metadataRun(stdout: string, failure?: Error) {
  const run = Object.assign(new EventEmitter(), { ytDlpProcess: { stdout: new EventEmitter() } });
  setImmediate(() => {
    if (stdout) run.ytDlpProcess.stdout.emit('data', Buffer.from(stdout));
    if (failure) {
      run.emit('error', failure);
    } else {
      run.emit('close', 0);
    }
  });
  return run;
}

function createProvider(): YtDlpDiscoveryProvider {
  return new YtDlpDiscoveryProvider({
    binaryPath: '/usr/local/bin/yt-dlp',
    audioFormat: 'mp3',
    logger: new Logger({ enableConsoleLogging: false })
  });
}

describe('YtDlpDiscoveryProvider', () => {
  beforeEach(() => {
    mockExec.mockReset();
    mockExecPromise.mockReset();
    mockConstructor.mockReset();
  });

  it('uses the configured binary', () => {
    createProvider();
    expect(mockConstructor).toHaveBeenCalledWith('/usr/local/bin/yt-dlp');
  });

  it('maps playlist entries and keeps missing fields as null', async () => {
    mockExec.mockImplementation(() => metadataRun(JSON.stringify({
      title: 'Mix',
      entries: [
        { title: 'A', webpage_url: 'https://x/a', url: 'https://m/a', uploader: 'Artist', duration: 120 },
        { title: 'B', url: 'https://m/b', duration: 'long' },
        null
      ]
    })));

    const playlist = await createProvider().resolvePlaylist('https://x/sets/mix');

    expect(mockExec).toHaveBeenCalledWith(['https://x/sets/mix', '--yes-playlist', ...METADATA_ARGS], undefined, null);
    expect(playlist).toEqual({
      title: 'Mix',
      entries: [
        { title: 'A', webpageUrl: 'https://x/a', mediaUrl: 'https://m/a', uploader: 'Artist', duration: 120 },
        { title: 'B', webpageUrl: null, mediaUrl: 'https://m/b', uploader: null, duration: null },
        { title: null, webpageUrl: null, mediaUrl: null, uploader: null, duration: null }
      ]
    });
  });

  it('resolves a single track without expanding playlists', async () => {
    mockExec.mockImplementation(() => metadataRun(JSON.stringify({
      title: 'Track One',
      webpage_url: 'https://soundcloud.com/artist/track-one',
      url: 'https://media.example/one.mp3'
    })));

    const entry = await createProvider().resolveTrack('https://soundcloud.com/artist/track-one');

    expect(mockExec.mock.calls[0][0]).toEqual(['https://soundcloud.com/artist/track-one', '--no-playlist', ...METADATA_ARGS]);
    expect(entry).toEqual({
      title: 'Track One',
      webpageUrl: 'https://soundcloud.com/artist/track-one',
      mediaUrl: 'https://media.example/one.mp3',
      uploader: null,
      duration: null
    });
  });

  it('rejects metadata that is not a JSON object', async () => {
    mockExec.mockImplementation(() => metadataRun('[]'));

    await expect(createProvider().resolveTrack('https://x/a'))
      .rejects.toThrow('yt-dlp returned metadata that is not a JSON object');
  });

  it('keeps the playlist when yt-dlp exits with errors for unavailable entries', async () => {
    mockExec.mockImplementation(() => metadataRun(
      JSON.stringify({
        title: 'Mix',
        entries: [null, { title: 'B', webpage_url: 'https://x/b', url: 'https://m/b' }]
      }),
      new Error('ERROR: [soundcloud] 123: Video unavailable')
    ));

    const playlist = await createProvider().resolvePlaylist('https://x/sets/mix');

    expect(playlist.entries).toEqual([
      { title: null, webpageUrl: null, mediaUrl: null, uploader: null, duration: null },
      { title: 'B', webpageUrl: 'https://x/b', mediaUrl: 'https://m/b', uploader: null, duration: null }
    ]);
  });

  it('fails when yt-dlp exits with an error and printed no metadata', async () => {
    mockExec.mockImplementation(() => metadataRun('', new Error('ERROR: Unsupported URL: https://x/nothing')));

    await expect(createProvider().resolvePlaylist('https://x/nothing'))
      .rejects.toThrow('ERROR: Unsupported URL: https://x/nothing');
  });

  it('extracts audio into the id-named destination', async () => {
    mockExecPromise.mockResolvedValue('');
    const controller = new AbortController();

    const result = await createProvider().fetchToPath('https://m/a', '/data/audio/track-id.mp3', controller.signal);

    expect(result).toEqual({ success: true });
    expect(mockExecPromise).toHaveBeenCalledWith([
      'https://m/a',
      '--no-playlist',
      '--format', 'bestaudio/best',
      '--extract-audio',
      '--audio-format', 'mp3',
      '--no-overwrites',
      '--quiet',
      '--no-warnings',
      '--output', '/data/audio/track-id.%(ext)s'
    ], undefined, controller.signal);
  });

  it('reports a failed download instead of throwing', async () => {
    mockExecPromise.mockRejectedValue(new Error('ERROR: HTTP Error 403: Forbidden'));

    const result = await createProvider().fetchToPath('https://m/a', '/data/audio/track-id.mp3');

    expect(result).toEqual({ success: false, error: 'ERROR: HTTP Error 403: Forbidden' });
  });
});
