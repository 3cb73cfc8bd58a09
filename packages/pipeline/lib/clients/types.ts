/**
 * Capabilities the pipeline depends on. One adapter per engine, chosen when
 * the job is wired; the stages and orchestrator only see these interfaces.
 */

import type { AlignedWord, RawSegment } from '@trackscribe/shared';

/**
 * One entry as reported by the discovery engine. Any field may be missing;
 * the orchestrator decides whether an entry is usable.
 */
export interface DiscoveredEntry {
  title: string | null;
  /** Canonical page URL, the dedup key */
  webpageUrl: string | null;
  /** Ephemeral direct media locator, re-resolved on every run */
  mediaUrl: string | null;
  uploader: string | null;
  /** Seconds */
  duration: number | null;
}

export interface DiscoveredPlaylist {
  title: string | null;
  entries: DiscoveredEntry[];
}

export interface FetchResult {
  success: boolean;
  error?: string;
}

export interface DiscoveryProvider {
  resolvePlaylist(url: string, signal?: AbortSignal): Promise<DiscoveredPlaylist>;
  resolveTrack(url: string, signal?: AbortSignal): Promise<DiscoveredEntry>;
  /**
   * Download the media into exactly `destinationPath`. Reports failure in the
   * result instead of throwing.
   */
  fetchToPath(mediaUrl: string, destinationPath: string, signal?: AbortSignal): Promise<FetchResult>;
}

export interface TranscriptionOutput {
  languageCode: string;
  segments: RawSegment[];
}

export interface AlignmentOutput {
  segments: Array<RawSegment & { words: AlignedWord[] }>;
}

export interface TranscriptionProvider {
  transcribe(audioPath: string, signal?: AbortSignal): Promise<TranscriptionOutput>;
  align(
    segments: RawSegment[],
    languageCode: string,
    audioPath: string,
    signal?: AbortSignal
  ): Promise<AlignmentOutput>;
}
