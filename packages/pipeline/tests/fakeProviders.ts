/**
 * Fake discovery and speech engines for stage and orchestrator tests.
 *
 * The fake download writes `audio:<mediaUrl>` to the destination; the fake
 * transcription reads the file back and returns its contents as one segment,
 * so every transcript can be traced to the entry it came from.
 */

import { promises as fs } from 'fs';
import type { AlignedWord, RawSegment } from '@trackscribe/shared';
import { vi } from 'vitest';
import type {
  AlignmentOutput,
  DiscoveredEntry,
  DiscoveredPlaylist,
  DiscoveryProvider,
  FetchResult,
  TranscriptionOutput,
  TranscriptionProvider
} from '../lib/clients/types';

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function entry(overrides: Partial<DiscoveredEntry> = {}): DiscoveredEntry {
  return {
    title: 'Untitled',
    webpageUrl: null,
    mediaUrl: null,
    uploader: null,
    duration: null,
    ...overrides
  };
}

export interface FakeDiscoveryOptions {
  playlist?: DiscoveredPlaylist;
  tracks?: Record<string, DiscoveredEntry>;
  /** Media URLs whose download reports failure */
  failFor?: string[];
  /** Media URLs whose download reports success but writes nothing */
  noArtifactFor?: string[];
  /** Delay before each download completes */
  fetchDelayMs?: number;
}

export class FakeDiscoveryProvider implements DiscoveryProvider {
  private readonly options: FakeDiscoveryOptions;

  constructor(options: FakeDiscoveryOptions = {}) {
    this.options = options;
  }

  resolvePlaylist = vi.fn(async (url: string): Promise<DiscoveredPlaylist> => {
    if (!this.options.playlist) {
      throw new Error(`No playlist at ${url}`);
    }
    return this.options.playlist;
  });

  resolveTrack = vi.fn(async (url: string): Promise<DiscoveredEntry> => {
    const found = this.options.tracks?.[url];
    if (!found) {
      throw new Error(`No track at ${url}`);
    }
    return found;
  });

  fetchToPath = vi.fn(async (mediaUrl: string, destinationPath: string, signal?: AbortSignal): Promise<FetchResult> => {
    if (this.options.fetchDelayMs) {
      await sleep(this.options.fetchDelayMs, signal);
    }
    if (this.options.failFor?.includes(mediaUrl)) {
      return { success: false, error: 'HTTP Error 403: Forbidden' };
    }
    if (!this.options.noArtifactFor?.includes(mediaUrl)) {
      await fs.writeFile(destinationPath, `audio:${mediaUrl}`, 'utf-8');
    }
    return { success: true };
  });
}

export interface FakeTranscriptionOptions {
  languageCode?: string;
  /** Audio contents that make the engine throw */
  failFor?: string[];
  /** Delay inside each transcribe call */
  delayMs?: number;
  /** Return no segments at all */
  silent?: boolean;
}

export class FakeTranscriptionProvider implements TranscriptionProvider {
  private readonly options: FakeTranscriptionOptions;
  private activeByPath = new Map<string, number>();
  private active = 0;
  /** Highest number of transcribe calls in flight at once, overall and for any single path */
  maxActive = 0;
  maxActiveForOnePath = 0;

  constructor(options: FakeTranscriptionOptions = {}) {
    this.options = options;
  }

  transcribe = vi.fn(async (audioPath: string, signal?: AbortSignal): Promise<TranscriptionOutput> => {
    this.enter(audioPath);
    try {
      const contents = await fs.readFile(audioPath, 'utf-8');
      if (this.options.delayMs) {
        await sleep(this.options.delayMs, signal);
      }
      if (this.options.failFor?.includes(contents)) {
        throw new Error('engine crashed');
      }
      const languageCode = this.options.languageCode ?? 'en';
      if (this.options.silent) {
        return { languageCode, segments: [] };
      }
      return { languageCode, segments: [{ start: 0, end: 2, text: ` ${contents} ` }] };
    } finally {
      this.leave(audioPath);
    }
  });

  align = vi.fn(async (segments: RawSegment[]): Promise<AlignmentOutput> => ({
    segments: segments.map((segment) => ({
      ...segment,
      words: [{ word: segment.text.trim(), start: segment.start, end: segment.end, score: 0.9 } satisfies AlignedWord]
    }))
  }));

  private enter(audioPath: string): void {
    this.active += 1;
    const forPath = (this.activeByPath.get(audioPath) ?? 0) + 1;
    this.activeByPath.set(audioPath, forPath);
    this.maxActive = Math.max(this.maxActive, this.active);
    this.maxActiveForOnePath = Math.max(this.maxActiveForOnePath, forPath);
  }

  private leave(audioPath: string): void {
    this.active -= 1;
    this.activeByPath.set(audioPath, (this.activeByPath.get(audioPath) ?? 1) - 1);
  }
}
