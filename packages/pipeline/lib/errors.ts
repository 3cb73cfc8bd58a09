/**
 * Error types raised by the pipeline
 *
 * Every error carries a stable `code`. Only `MetadataError` is recoverable at
 * the batch level: the orchestrator skips the entry and moves on. The rest are
 * fatal for the track they were raised for.
 */

export type PipelineErrorCode =
  | 'CONFIG_INVALID'
  | 'METADATA_MISSING'
  | 'PRECONDITION_FAILED'
  | 'FETCH_FAILED'
  | 'FETCH_NO_ARTIFACT'
  | 'TRANSCRIPTION_FAILED'
  | 'STORE_ERROR'
  | 'TRACK_TIMEOUT'
  | 'PIPELINE_ABORTED';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly trackId?: string;

  constructor(code: PipelineErrorCode, message: string, options: { trackId?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.trackId = options.trackId;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

// Entry lacks a canonical page URL or media locator
export class MetadataError extends PipelineError {
  constructor(message: string, trackId?: string) {
    super('METADATA_MISSING', message, { trackId });
  }
}

// Transcription requested without a downloaded artifact
export class PreconditionError extends PipelineError {
  constructor(message: string, trackId?: string) {
    super('PRECONDITION_FAILED', message, { trackId });
  }
}

export class FetchFailedError extends PipelineError {
  constructor(message: string, trackId?: string, cause?: unknown) {
    super('FETCH_FAILED', message, { trackId, cause });
  }
}

// The fetch engine reported success but nothing exists at the expected path
export class FetchProducedNoArtifactError extends PipelineError {
  readonly expectedPath: string;

  constructor(trackId: string, expectedPath: string) {
    super('FETCH_NO_ARTIFACT', `Fetch produced no artifact at ${expectedPath}`, { trackId });
    this.expectedPath = expectedPath;
  }
}

export class TranscriptionError extends PipelineError {
  constructor(message: string, trackId?: string, cause?: unknown) {
    super('TRANSCRIPTION_FAILED', message, { trackId, cause });
  }
}

export class StoreError extends PipelineError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super('STORE_ERROR', `Store operation "${operation}" failed: ${errorMessage(cause)}`, { cause });
    this.operation = operation;
  }
}

export class TrackTimeoutError extends PipelineError {
  constructor(trackId: string, timeoutMs: number) {
    super('TRACK_TIMEOUT', `Track processing exceeded ${timeoutMs}ms`, { trackId });
  }
}

/**
 * Raised when a fatal track error stops a batch. `partial` is whatever the run
 * had produced by then (the orchestrator passes its summary).
 */
export class PipelineAbortedError<TPartial = unknown> extends PipelineError {
  readonly partial: TPartial;

  constructor(message: string, partial: TPartial, cause: unknown) {
    super('PIPELINE_ABORTED', message, { cause });
    this.partial = partial;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
