import path from 'path';
import YTDlpWrap from 'yt-dlp-wrap';
import type { AudioFormat } from '../../config/pipelineConfig';
import { errorMessage } from '../errors';
import { Logger, createLogger } from '../logger';
import type { DiscoveredEntry, DiscoveredPlaylist, DiscoveryProvider, FetchResult } from './types';

export interface YtDlpDiscoveryOptions {
  binaryPath: string;
  audioFormat: AudioFormat;
  logger?: Logger;
}

// Metadata only, best audio stream selected so that `url` is the media locator.
// Unavailable playlist entries come back as null instead of ending discovery.
const METADATA_ARGS = [
  '--dump-single-json',
  '--ignore-errors',
  '--format', 'bestaudio/best',
  '--quiet',
  '--no-warnings'
];

/**
 * Discovery and download through the yt-dlp binary
 */
export class YtDlpDiscoveryProvider implements DiscoveryProvider {
  private readonly ytdlp: YTDlpWrap;
  private readonly audioFormat: AudioFormat;
  private readonly logger: Logger;

  constructor(options: YtDlpDiscoveryOptions) {
    this.ytdlp = new YTDlpWrap(options.binaryPath);
    this.audioFormat = options.audioFormat;
    this.logger = options.logger || createLogger();
  }

  async resolvePlaylist(url: string, signal?: AbortSignal): Promise<DiscoveredPlaylist> {
    const info = await this.dumpJson([url, '--yes-playlist', ...METADATA_ARGS], signal);
    const rawEntries = Array.isArray(info.entries) ? info.entries : [];
    const entries = rawEntries.map((entry) => toEntry(isRecord(entry) ? entry : {}));

    this.logger.debug('discovery', 'Playlist resolved', {
      metadata: { url, entries: entries.length }
    });
    return { title: readString(info, 'title'), entries };
  }

  async resolveTrack(url: string, signal?: AbortSignal): Promise<DiscoveredEntry> {
    const info = await this.dumpJson([url, '--no-playlist', ...METADATA_ARGS], signal);
    return toEntry(info);
  }

  /**
   * Extract audio into `destinationPath`. yt-dlp picks the extension itself,
   * so the output template swaps the path's extension for `%(ext)s`.
   */
  async fetchToPath(mediaUrl: string, destinationPath: string, signal?: AbortSignal): Promise<FetchResult> {
    const parsed = path.parse(destinationPath);
    const outputTemplate = path.join(parsed.dir, `${parsed.name}.%(ext)s`);
    const args = [
      mediaUrl,
      '--no-playlist',
      '--format', 'bestaudio/best',
      '--extract-audio',
      '--audio-format', this.audioFormat,
      '--no-overwrites',
      '--quiet',
      '--no-warnings',
      '--output', outputTemplate
    ];

    try {
      await this.ytdlp.execPromise(args, undefined, signal ?? null);
      return { success: true };
    } catch (error) {
      this.logger.warn('fetch', 'yt-dlp download failed', {
        error: errorMessage(error),
        metadata: { destination: destinationPath }
      });
      return { success: false, error: errorMessage(error) };
    }
  }

  private async dumpJson(args: string[], signal?: AbortSignal): Promise<Record<string, unknown>> {
    const stdout = await this.runMetadata(args, signal);
    signal?.throwIfAborted();
    const parsed: unknown = JSON.parse(stdout);
    if (!isRecord(parsed)) {
      throw new Error('yt-dlp returned metadata that is not a JSON object');
    }
    return parsed;
  }

  /**
   * Collect yt-dlp's stdout. Under `--ignore-errors` a playlist with unavailable
   * entries still prints its JSON but exits non-zero; that JSON is kept.
   */
  private runMetadata(args: string[], signal?: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
      let stdout = '';
      const run = this.ytdlp.exec(args, undefined, signal ?? null);
      run.ytDlpProcess?.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      run.once('close', () => resolve(stdout));
      run.once('error', (error) => {
        if (!stdout.trimStart().startsWith('{')) {
          reject(error);
          return;
        }
        this.logger.warn('discovery', 'yt-dlp reported errors; keeping the metadata it printed', {
          error: error.message,
          metadata: { url: args[0] }
        });
        resolve(stdout);
      });
    });
  }
}

function toEntry(info: Record<string, unknown>): DiscoveredEntry {
  return {
    title: readString(info, 'title'),
    webpageUrl: readString(info, 'webpage_url'),
    mediaUrl: readString(info, 'url'),
    uploader: readString(info, 'uploader'),
    duration: readNumber(info, 'duration')
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function readNumber(record: Record<string, unknown>, key: string): number | null {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
