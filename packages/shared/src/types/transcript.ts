/**
 * Transcript types for aligned speech-to-text output
 */

// Per-character timing, only produced by engines that align at character level
export interface AlignedChar {
  char: string;
  start?: number;
  end?: number;
  score?: number;
}

// Per-word timing after alignment. Offsets are seconds from the start of the audio.
export interface AlignedWord {
  word: string;
  start?: number;
  end?: number;
  score?: number;
  speaker?: string;
}

// Timed segment as returned by the recognition pass
export interface RawSegment {
  start: number;
  end: number;
  text: string;
  words?: AlignedWord[];
}

// Normalized segment. `words` and `chars` are always present.
export interface AlignedSegment {
  start: number;
  end: number;
  text: string;
  words: AlignedWord[];
  chars: AlignedChar[] | null;
}

export interface AlignedResult {
  languageCode: string;
  segments: AlignedSegment[];
}

// Transcript for exactly one track. `id` and `trackId` are both the track's id.
export interface Transcript {
  id: string;
  trackId: string;
  alignedResult: AlignedResult;
  embedding: number[] | null;
}

export interface StoredTranscript extends Transcript {
  createdAt: string;
  updatedAt: string;
}
