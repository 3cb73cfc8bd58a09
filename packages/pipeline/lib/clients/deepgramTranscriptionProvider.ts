import fs from 'fs';
import { createClient, DeepgramClient } from '@deepgram/sdk';
import type { AlignedWord, RawSegment } from '@trackscribe/shared';
import { ConfigError, TranscriptionError, errorMessage } from '../errors';
import { Logger, createLogger } from '../logger';
import type { AlignmentOutput, TranscriptionOutput, TranscriptionProvider } from './types';

export interface DeepgramTranscriptionOptions {
  apiKey: string | undefined;
  model: string;
  /** Language hint; detected when null */
  language: string | null;
  logger?: Logger;
}

// The parts of a pre-recorded response this adapter reads
interface DeepgramWordLike {
  word: string;
  start: number;
  end: number;
  confidence?: number;
  punctuated_word?: string;
  speaker?: number;
}

interface DeepgramResultLike {
  results?: {
    channels?: ReadonlyArray<{
      detected_language?: string;
      alternatives?: ReadonlyArray<{ transcript?: string; words?: ReadonlyArray<DeepgramWordLike> }>;
    }>;
    utterances?: ReadonlyArray<{
      start: number;
      end: number;
      transcript: string;
      words?: ReadonlyArray<DeepgramWordLike>;
    }>;
  };
}

const FALLBACK_LANGUAGE = 'en';

/**
 * Speech-to-text through Deepgram's pre-recorded API.
 * Utterances become segments; word timings come back in the same response.
 */
export class DeepgramTranscriptionProvider implements TranscriptionProvider {
  private readonly client: DeepgramClient;
  private readonly model: string;
  private readonly language: string | null;
  private readonly logger: Logger;

  constructor(options: DeepgramTranscriptionOptions) {
    if (!options.apiKey) {
      throw new ConfigError('DEEPGRAM_API_KEY is required.');
    }
    this.client = createClient(options.apiKey);
    this.model = options.model;
    this.language = options.language;
    this.logger = options.logger || createLogger();
  }

  async transcribe(audioPath: string, signal?: AbortSignal): Promise<TranscriptionOutput> {
    signal?.throwIfAborted();
    const audioStream = fs.createReadStream(audioPath);

    const { result, error } = await this.client.listen.prerecorded.transcribeFile(audioStream, {
      model: this.model,
      smart_format: true,
      punctuate: true,
      utterances: true,
      ...(this.language ? { language: this.language } : { detect_language: true })
    });
    signal?.throwIfAborted();

    if (error) {
      throw new TranscriptionError(`Deepgram transcription failed: ${errorMessage(error)}`, undefined, error);
    }
    if (!result) {
      throw new TranscriptionError('Deepgram transcription failed: empty response');
    }

    const output = extractTranscription(result, this.language);
    this.logger.debug('transcribe', 'Deepgram transcription received', {
      metadata: { language: output.languageCode, segments: output.segments.length }
    });
    return output;
  }

  /**
   * Deepgram already times every word, so alignment redistributes the words
   * carried by the input segments onto those segments by time window.
   */
  async align(
    segments: RawSegment[],
    languageCode: string,
    _audioPath: string,
    signal?: AbortSignal
  ): Promise<AlignmentOutput> {
    signal?.throwIfAborted();
    const words = segments.flatMap((segment) => segment.words ?? []);
    const aligned = assignWordsToSegments(segments, words);
    this.logger.debug('transcribe', 'Words aligned to segments', {
      metadata: { language: languageCode, segments: aligned.length, words: words.length }
    });
    return { segments: aligned };
  }
}

export function extractTranscription(result: DeepgramResultLike, languageHint: string | null): TranscriptionOutput {
  const channel = result.results?.channels?.[0];
  const languageCode = languageHint || channel?.detected_language || FALLBACK_LANGUAGE;
  const utterances = result.results?.utterances ?? [];

  if (utterances.length > 0) {
    return {
      languageCode,
      segments: utterances.map((utterance) => ({
        start: utterance.start,
        end: utterance.end,
        text: utterance.transcript,
        words: (utterance.words ?? []).map(toAlignedWord)
      }))
    };
  }

  // No utterances: fall back to the channel's single alternative as one segment
  const alternative = channel?.alternatives?.[0];
  const words = alternative?.words ?? [];
  const transcript = alternative?.transcript?.trim() ?? '';
  if (!transcript || words.length === 0) {
    return { languageCode, segments: [] };
  }
  return {
    languageCode,
    segments: [{
      start: words[0].start,
      end: words[words.length - 1].end,
      text: transcript,
      words: words.map(toAlignedWord)
    }]
  };
}

function toAlignedWord(word: DeepgramWordLike): AlignedWord {
  const aligned: AlignedWord = {
    word: word.punctuated_word ?? word.word,
    start: word.start,
    end: word.end
  };
  if (word.confidence !== undefined) aligned.score = word.confidence;
  if (word.speaker !== undefined) aligned.speaker = String(word.speaker);
  return aligned;
}

/**
 * A word belongs to the segment containing its midpoint; words without timing
 * or outside every segment are dropped.
 */
export function assignWordsToSegments(
  segments: RawSegment[],
  words: AlignedWord[]
): Array<RawSegment & { words: AlignedWord[] }> {
  return segments.map((segment) => ({
    start: segment.start,
    end: segment.end,
    text: segment.text,
    words: words.filter((word) => {
      if (word.start === undefined || word.end === undefined) return false;
      const midpoint = (word.start + word.end) / 2;
      return midpoint >= segment.start && midpoint <= segment.end;
    })
  }));
}
