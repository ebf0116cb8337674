/**
 * Error taxonomy of the editor core.
 * The session store turns ValidationError and SequenceIOError into status
 * messages; everything else propagates to the caller.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class DocumentFormatError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'DocumentFormatError';
  }
}

/** No explicit keyframe at the requested frame (the value there is interpolated). */
export class KeyframeNotFoundError extends Error {
  readonly frameIndex: number;

  constructor(frameIndex: number) {
    super(`No keyframe at frame ${frameIndex}`);
    this.name = 'KeyframeNotFoundError';
    this.frameIndex = frameIndex;
  }
}

export class SequenceIOError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SequenceIOError';
    this.path = path;
  }
}

export class TrackingFailureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrackingFailureError';
  }
}

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}
