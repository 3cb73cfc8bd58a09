import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { Track } from '@trackscribe/shared';
import { FetchStage } from '../FetchStage';
import { FetchFailedError, FetchProducedNoArtifactError, MetadataError, TrackTimeoutError } from '../../lib/errors';
import { Logger } from '../../lib/logger';
import { FakeDiscoveryProvider } from '../../tests/fakeProviders';

const ID_A = '26215388-0298-5ed3-a7b3-6841442944f2';

function pendingTrack(overrides: Partial<Track> = {}): Track {
  return {
    id: ID_A,
    title: 'A',
    webpageUrl: 'https://x/a',
    downloadUrl: 'https://m/a',
    uploader: null,
    durationSeconds: null,
    playlistTitle: null,
    playlistUrl: null,
    trackNumberInPlaylist: null,
    status: 'PENDING',
    audioFilePath: null,
    ...overrides
  };
}

describe('FetchStage', () => {
  let dir: string;
  let audioDir: string;
  let expectedPath: string;
  const logger = new Logger({ enableConsoleLogging: false });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'trackscribe-fetch-'));
    audioDir = path.join(dir, 'audio');
    expectedPath = path.join(audioDir, `${ID_A}.wav`);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function createStage(provider: FakeDiscoveryProvider): FetchStage {
    return new FetchStage({ audioDir, audioFormat: 'wav' }, provider, logger);
  }

  it('downloads into the path derived from the track id', async () => {
    const provider = new FakeDiscoveryProvider();

    const fetched = await createStage(provider).fetchTrack(pendingTrack());

    expect(provider.fetchToPath).toHaveBeenCalledWith('https://m/a', expectedPath, undefined);
    expect(fetched.status).toBe('DOWNLOADED');
    expect(fetched.audioFilePath).toBe(expectedPath);
    expect(await fs.readFile(expectedPath, 'utf-8')).toBe('audio:https://m/a');
  });

  it('skips the download when the artifact already exists', async () => {
    await fs.mkdir(audioDir, { recursive: true });
    await fs.writeFile(expectedPath, 'existing');
    const provider = new FakeDiscoveryProvider();

    const fetched = await createStage(provider).fetchTrack(pendingTrack({ downloadUrl: null }));

    expect(provider.fetchToPath).not.toHaveBeenCalled();
    expect(fetched.status).toBe('DOWNLOADED');
    expect(fetched.audioFilePath).toBe(expectedPath);
    expect(await fs.readFile(expectedPath, 'utf-8')).toBe('existing');
  });

  it('never moves a later status backwards', async () => {
    await fs.mkdir(audioDir, { recursive: true });
    await fs.writeFile(expectedPath, 'existing');

    const fetched = await createStage(new FakeDiscoveryProvider()).fetchTrack(pendingTrack({ status: 'TRANSCRIBED' }));

    expect(fetched.status).toBe('TRANSCRIBED');
  });

  it('requires a media locator when a download is needed', async () => {
    const provider = new FakeDiscoveryProvider();

    await expect(createStage(provider).fetchTrack(pendingTrack({ downloadUrl: null }))).rejects.toBeInstanceOf(MetadataError);
    expect(provider.fetchToPath).not.toHaveBeenCalled();
  });

  it('does not start a download once the signal is aborted', async () => {
    const provider = new FakeDiscoveryProvider();
    const controller = new AbortController();
    controller.abort(new TrackTimeoutError(ID_A, 50));

    await expect(createStage(provider).fetchTrack(pendingTrack(), controller.signal))
      .rejects.toBeInstanceOf(TrackTimeoutError);
    expect(provider.fetchToPath).not.toHaveBeenCalled();
  });

  it('raises FetchFailedError when the engine reports failure', async () => {
    const provider = new FakeDiscoveryProvider({ failFor: ['https://m/a'] });

    const error = await createStage(provider).fetchTrack(pendingTrack()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchFailedError);
    expect(error).toMatchObject({
      code: 'FETCH_FAILED',
      trackId: ID_A,
      message: 'Fetch failed for https://x/a: HTTP Error 403: Forbidden'
    });
  });

  it('raises FetchProducedNoArtifactError when success leaves no file', async () => {
    const provider = new FakeDiscoveryProvider({ noArtifactFor: ['https://m/a'] });

    const error = await createStage(provider).fetchTrack(pendingTrack()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchProducedNoArtifactError);
    expect(error).toMatchObject({
      code: 'FETCH_NO_ARTIFACT',
      expectedPath,
      message: `Fetch produced no artifact at ${expectedPath}`
    });
  });
});
