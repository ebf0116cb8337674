import { describe, it, expect, beforeEach } from 'vitest';
import { KeyframeStore } from '../KeyframeStore';
import { Sequence } from '../Sequence';
import { TrackingKeyframer } from '../TrackingKeyframer';
import { ScriptedTracker } from './fakes';
import { createRasterImage } from '@/types';
import { TrackingFailureError } from '@/types/errors';

function makeSequence(count: number): Sequence {
  return Sequence.repeat({ image: createRasterImage(100, 100), duration: 100 }, count);
}

function arm(keyframer: TrackingKeyframer, sequence: Sequence, frameIndex: number): boolean {
  keyframer.beginRegion({ x: 30, y: 40 });
  keyframer.dragRegion({ x: 20, y: 20 });
  return keyframer.releaseRegion({ x: 10, y: 10 }, sequence, frameIndex);
}

describe('TrackingKeyframer', () => {
  let keyframes: KeyframeStore;
  let sequence: Sequence;

  beforeEach(() => {
    keyframes = new KeyframeStore();
    keyframes.insertOrMerge({ frameIndex: 0, position: { x: 50, y: 50 }, size: 40 });
    sequence = makeSequence(5);
  });

  it('starts idle without a region', () => {
    const keyframer = new TrackingKeyframer(new ScriptedTracker([]));
    expect(keyframer.phase).toBe('idle');
    expect(keyframer.hasRegion).toBe(false);
  });

  it('records the region live while dragging', () => {
    const keyframer = new TrackingKeyframer(new ScriptedTracker([]));
    keyframer.beginRegion({ x: 30, y: 40 });
    expect(keyframer.phase).toBe('selecting');
    expect(keyframer.hasRegion).toBe(false);

    keyframer.dragRegion({ x: 20, y: 20 });
    expect(keyframer.region).toEqual({ x: 20, y: 20, width: 10, height: 20 });
  });

  it('initializes the tracker with the normalized rectangle on release', () => {
    const tracker = new ScriptedTracker([]);
    const keyframer = new TrackingKeyframer(tracker);

    expect(arm(keyframer, sequence, 1)).toBe(true);
    expect(tracker.initCalls).toEqual([{ x: 10, y: 10, width: 20, height: 30 }]);
    expect(keyframer.phase).toBe('tracking');
    expect(keyframer.activeFrameIndex).toBe(1);
  });

  it('does not start tracking an empty region', () => {
    const tracker = new ScriptedTracker([]);
    const keyframer = new TrackingKeyframer(tracker);
    keyframer.beginRegion({ x: 5, y: 5 });

    expect(keyframer.releaseRegion({ x: 5, y: 5 }, sequence, 0)).toBe(false);
    expect(tracker.initCalls).toEqual([]);
    expect(keyframer.phase).toBe('idle');
  });

  it('does not start tracking when the tracker rejects the region', () => {
    const keyframer = new TrackingKeyframer(new ScriptedTracker([], false));

    expect(arm(keyframer, sequence, 0)).toBe(false);
    expect(keyframer.phase).toBe('idle');
    expect(keyframer.hasRegion).toBe(false);
  });

  it('writes the reference position shifted by the motion of the region center', () => {
    const keyframer = new TrackingKeyframer(
      new ScriptedTracker([{ ok: true, rect: { x: 15, y: 12, width: 20, height: 30 } }]),
    );
    arm(keyframer, sequence, 1);

    const result = keyframer.step('forward', keyframes, sequence);

    // Center moves from (20, 25) to (25, 27); frame 1 interpolates to (50, 50)
    expect(result).toEqual({ status: 'tracked', frameIndex: 2, delta: { x: 5, y: 2 }, position: { x: 55, y: 52 } });
    expect(keyframes.get(2)).toEqual({ frameIndex: 2, position: { x: 55, y: 52 }, size: null });
    expect(keyframer.activeFrameIndex).toBe(2);
    expect(keyframer.region).toEqual({ x: 15, y: 12, width: 20, height: 30 });
  });

  it('prefers an explicit keyframe at the active frame as the reference', () => {
    keyframes.insertOrMerge({ frameIndex: 3, position: { x: 0, y: 0 }, size: null });
    const keyframer = new TrackingKeyframer(
      new ScriptedTracker([{ ok: true, rect: { x: 8, y: 10, width: 20, height: 30 } }]),
    );
    arm(keyframer, sequence, 3);

    const result = keyframer.step('backward', keyframes, sequence);

    expect(result).toEqual({ status: 'tracked', frameIndex: 2, delta: { x: -2, y: 0 }, position: { x: -2, y: 0 } });
  });

  it('a failed update writes nothing, clears the region and returns a zero delta', () => {
    const keyframer = new TrackingKeyframer(
      new ScriptedTracker([{ ok: true, rect: { x: 15, y: 12, width: 20, height: 30 } }, { ok: false }]),
    );
    arm(keyframer, sequence, 0);
    keyframer.step('forward', keyframes, sequence);
    const before = keyframes.toArray();

    const result = keyframer.step('forward', keyframes, sequence);

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.delta).toEqual({ x: 0, y: 0 });
    expect(result.error).toBeInstanceOf(TrackingFailureError);
    expect(keyframes.toArray()).toEqual(before);
    expect(keyframer.phase).toBe('failed');
    expect(keyframer.hasRegion).toBe(false);
  });

  it('refuses to step outside the sequence', () => {
    const tracker = new ScriptedTracker([{ ok: true, rect: { x: 0, y: 0, width: 5, height: 5 } }]);
    const keyframer = new TrackingKeyframer(tracker);
    arm(keyframer, sequence, 0);

    expect(keyframer.step('backward', keyframes, sequence)).toEqual({ status: 'out-of-range', frameIndex: 0 });
    expect(keyframer.phase).toBe('tracking');
    expect(keyframes.frameIndices).toEqual([0]);
  });

  it('can be re-armed after a failure', () => {
    const keyframer = new TrackingKeyframer(new ScriptedTracker([{ ok: false }]));
    arm(keyframer, sequence, 0);
    keyframer.step('forward', keyframes, sequence);

    expect(arm(keyframer, sequence, 2)).toBe(true);
    expect(keyframer.phase).toBe('tracking');
  });

  it('stepping without an armed region fails without writing', () => {
    const keyframer = new TrackingKeyframer(new ScriptedTracker([]));

    const result = keyframer.step('forward', keyframes, sequence);

    expect(result.status).toBe('failed');
    expect(keyframes.frameIndices).toEqual([0]);
  });

  it('reset returns to idle', () => {
    const keyframer = new TrackingKeyframer(new ScriptedTracker([]));
    arm(keyframer, sequence, 3);
    keyframer.reset();

    expect(keyframer.phase).toBe('idle');
    expect(keyframer.hasRegion).toBe(false);
    expect(keyframer.activeFrameIndex).toBe(0);
  });
});
