import type { Point, Rect } from '@/types';
import { rectFromCorners } from '@/types';
import { TrackingFailureError } from '@/types/errors';
import type { KeyframeStore } from './KeyframeStore';
import type { Sequence } from './Sequence';
import type { VisualTracker } from './types';

export type TrackingPhase = 'idle' | 'selecting' | 'tracking' | 'failed';

export type TrackDirection = 'forward' | 'backward';

export type TrackStepResult =
  | { status: 'tracked'; frameIndex: number; delta: Point; position: Point }
  | { status: 'failed'; frameIndex: number; delta: Point; error: TrackingFailureError }
  | { status: 'out-of-range'; frameIndex: number };

const ZERO_DELTA: Point = { x: 0, y: 0 };

function centerOf(rect: Rect): Point {
  return { x: Math.floor(rect.x + rect.width / 2), y: Math.floor(rect.y + rect.height / 2) };
}

/**
 * Carries a text layer along with a moving subject: the user drags a region on
 * one frame, then each step follows it to the neighboring frame and writes a
 * position keyframe shifted by the region's motion.
 */
export class TrackingKeyframer {
  private _phase: TrackingPhase = 'idle';
  private begin: Point = { x: 0, y: 0 };
  private end: Point = { x: 0, y: 0 };
  private _activeFrameIndex = 0;

  constructor(private readonly tracker: VisualTracker) {}

  get phase(): TrackingPhase {
    return this._phase;
  }

  get activeFrameIndex(): number {
    return this._activeFrameIndex;
  }

  get hasRegion(): boolean {
    return this.begin.x !== this.end.x || this.begin.y !== this.end.y;
  }

  get region(): Rect | null {
    return this.hasRegion ? rectFromCorners(this.begin, this.end) : null;
  }

  /** Pointer down: starts a new region at `point`, discarding any previous one. */
  beginRegion(point: Point): void {
    this.begin = { ...point };
    this.end = { ...point };
    this._phase = 'selecting';
  }

  dragRegion(point: Point): void {
    if (this._phase !== 'selecting') return;
    this.end = { ...point };
  }

  /**
   * Pointer up: seeds the tracker with the region on `frameIndex`.
   * @returns whether tracking is now active
   */
  releaseRegion(point: Point, sequence: Sequence, frameIndex: number): boolean {
    if (this._phase !== 'selecting') return false;
    this.end = { ...point };
    const region = this.region;
    if (!region || !this.tracker.init(sequence.get(frameIndex).image, region)) {
      this.clearRegion();
      this._phase = 'idle';
      return false;
    }
    this._activeFrameIndex = frameIndex;
    this._phase = 'tracking';
    return true;
  }

  /**
   * Follows the region one frame in `direction` and writes the layer's
   * shifted position there.
   */
  step(direction: TrackDirection, keyframes: KeyframeStore, sequence: Sequence): TrackStepResult {
    const current = this._activeFrameIndex;
    const next = direction === 'forward' ? current + 1 : current - 1;
    if (this._phase !== 'tracking') {
      return {
        status: 'failed',
        frameIndex: current,
        delta: { ...ZERO_DELTA },
        error: new TrackingFailureError('No region is being tracked'),
      };
    }
    if (next < 0 || next >= sequence.length) {
      return { status: 'out-of-range', frameIndex: current };
    }

    const region = this.region;
    const update = this.tracker.update(sequence.get(next).image);
    if (!region || !update.ok) {
      this.clearRegion();
      this._phase = 'failed';
      return {
        status: 'failed',
        frameIndex: current,
        delta: { ...ZERO_DELTA },
        error: new TrackingFailureError(`Lost the tracked region on frame ${next}`),
      };
    }

    const reference = keyframes.find(current)?.position ?? keyframes.interpolate(current).position;
    const oldCenter = centerOf(region);
    const newCenter = centerOf(update.rect);
    const delta = { x: newCenter.x - oldCenter.x, y: newCenter.y - oldCenter.y };
    const position = { x: reference.x + delta.x, y: reference.y + delta.y };

    keyframes.insertOrMerge({ frameIndex: next, position, size: null });
    this.begin = { x: update.rect.x, y: update.rect.y };
    this.end = { x: update.rect.x + update.rect.width, y: update.rect.y + update.rect.height };
    this._activeFrameIndex = next;
    return { status: 'tracked', frameIndex: next, delta, position };
  }

  /** Back to idle; called when tracking mode is switched off. */
  reset(): void {
    this.clearRegion();
    this._phase = 'idle';
    this._activeFrameIndex = 0;
  }

  private clearRegion(): void {
    this.begin = { x: 0, y: 0 };
    this.end = { x: 0, y: 0 };
  }
}
