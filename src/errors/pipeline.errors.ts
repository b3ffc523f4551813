/**
 * Domain errors raised by the export pipeline. Each carries a stable `code`
 * that is persisted on the export record and mapped to an HTTP status.
 */
export type PipelineErrorCode =
  | 'INCOMPLETE_SPEECH'
  | 'SEGMENT_SEQUENCE'
  | 'TEXT_NOT_FOUND'
  | 'EXTERNAL_CALL_TIMEOUT'
  | 'ALIGNMENT_FAILED'
  | 'MIXING_FAILED'
  | 'PIPELINE_CANCELLED';

export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class IncompleteSpeechError extends PipelineError {
  constructor(public readonly missingIndices: number[]) {
    super(
      'INCOMPLETE_SPEECH',
      `Speech audio missing for segment(s) ${missingIndices.join(', ')}`
    );
  }
}

export class SegmentSequenceError extends PipelineError {
  constructor(
    message: string,
    public readonly duplicateIndices: number[] = [],
    public readonly gapIndices: number[] = []
  ) {
    super('SEGMENT_SEQUENCE', message);
  }
}

export class TextNotFoundError extends PipelineError {
  constructor(public readonly textId: string) {
    super('TEXT_NOT_FOUND', `Text ${textId} not found`);
  }
}

export class ExternalCallTimeoutError extends PipelineError {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super('EXTERNAL_CALL_TIMEOUT', `${operation} timed out after ${timeoutMs}ms`);
  }
}

export class AlignmentError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ALIGNMENT_FAILED', message, options);
  }
}

export class MixingError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MIXING_FAILED', message, options);
  }
}

export class PipelineCancelledError extends PipelineError {
  constructor(stage?: string) {
    super('PIPELINE_CANCELLED', stage ? `Export cancelled during ${stage}` : 'Export cancelled');
  }
}

export const isPipelineError = (error: unknown): error is PipelineError =>
  error instanceof PipelineError;

/** Throws PipelineCancelledError when the signal has been aborted. */
export function throwIfCancelled(signal: AbortSignal | undefined, stage?: string): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(stage);
  }
}
