import { laterStatus, type Track } from '@trackscribe/shared';
import type { PipelineConfig } from '../config/pipelineConfig';
import type { DiscoveryProvider } from '../lib/clients/types';
import { FetchFailedError, FetchProducedNoArtifactError, MetadataError } from '../lib/errors';
import { Logger, createLogger } from '../lib/logger';
import { audioArtifactPath, resolveTrackId } from '../lib/trackIdentity';
import { ensureDir, fileExists } from '../lib/utils/fs';

export type FetchStageConfig = Pick<PipelineConfig, 'audioDir' | 'audioFormat'>;

/**
 * Produces the local audio artifact for a track, at most once per track id.
 *
 * The artifact path comes from the resolved id only. An existing file at that
 * path counts as downloaded and is never overwritten; the first successful
 * download wins for the lifetime of the id.
 */
export class FetchStage {
  private readonly config: FetchStageConfig;
  private readonly provider: DiscoveryProvider;
  private readonly logger: Logger;

  constructor(config: FetchStageConfig, provider: DiscoveryProvider, logger?: Logger) {
    this.config = config;
    this.provider = provider;
    this.logger = logger || createLogger();
  }

  /**
   * @returns The track with `audioFilePath` set and status at least DOWNLOADED
   * @throws MetadataError when a download is needed and there is no media locator
   * @throws FetchFailedError when the engine reports failure
   * @throws FetchProducedNoArtifactError when the engine reports success but wrote nothing
   */
  async fetchTrack(track: Track, signal?: AbortSignal): Promise<Track> {
    const trackId = resolveTrackId(track.webpageUrl);
    const artifactPath = audioArtifactPath(this.config.audioDir, trackId, this.config.audioFormat);

    if (await fileExists(artifactPath)) {
      this.logger.debug('fetch', 'Audio artifact already present, skipping download', {
        track_id: trackId,
        metadata: { path: artifactPath }
      });
      return this.downloaded(track, trackId, artifactPath);
    }

    if (!track.downloadUrl) {
      throw new MetadataError(`Track ${track.webpageUrl} has no media locator to download from`, trackId);
    }

    await ensureDir(this.config.audioDir);
    signal?.throwIfAborted();
    const result = await this.provider.fetchToPath(track.downloadUrl, artifactPath, signal);
    if (!result.success) {
      throw new FetchFailedError(
        `Fetch failed for ${track.webpageUrl}: ${result.error ?? 'unknown error'}`,
        trackId
      );
    }

    if (!(await fileExists(artifactPath))) {
      throw new FetchProducedNoArtifactError(trackId, artifactPath);
    }

    this.logger.debug('fetch', 'Audio artifact downloaded', {
      track_id: trackId,
      metadata: { path: artifactPath }
    });
    return this.downloaded(track, trackId, artifactPath);
  }

  private downloaded(track: Track, trackId: string, artifactPath: string): Track {
    return {
      ...track,
      id: trackId,
      audioFilePath: artifactPath,
      status: laterStatus(track.status, 'DOWNLOADED')
    };
  }
}
