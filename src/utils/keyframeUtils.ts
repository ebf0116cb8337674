/**
 * Keyframe Animation Utilities
 */

import type { AnimatableChannel, ChannelSample, TextKeyframe } from '@/types/keyframes';

/**
 * Get interpolated value at a given frame.
 * Linear between the two bracketing samples, rounded to an integer;
 * flat outside the sampled range. Samples must be sorted by frame.
 */
export function getInterpolatedValue(
  samples: ChannelSample[],
  frameIndex: number,
  defaultValue: number,
): number {
  if (samples.length === 0) {
    return defaultValue;
  }

  // Before first keyframe
  if (frameIndex <= samples[0].frameIndex) {
    return samples[0].value;
  }

  // After last keyframe
  const last = samples[samples.length - 1];
  if (frameIndex >= last.frameIndex) {
    return last.value;
  }

  // Find surrounding keyframes
  for (let i = 0; i < samples.length - 1; i++) {
    const current = samples[i];
    const next = samples[i + 1];

    if (frameIndex >= current.frameIndex && frameIndex <= next.frameIndex) {
      const progress = (frameIndex - current.frameIndex) / (next.frameIndex - current.frameIndex);
      return Math.round(current.value + (next.value - current.value) * progress);
    }
  }

  return defaultValue;
}

/**
 * Collect the (frame, value) pairs of one channel from keyframes that define it.
 */
export function getChannelSamples(keyframes: readonly TextKeyframe[], channel: AnimatableChannel): ChannelSample[] {
  const samples: ChannelSample[] = [];
  for (const kf of keyframes) {
    if (channel === 'size') {
      if (kf.size !== null) samples.push({ frameIndex: kf.frameIndex, value: kf.size });
    } else if (kf.position !== null) {
      samples.push({ frameIndex: kf.frameIndex, value: kf.position[channel] });
    }
  }
  return samples;
}

/**
 * Lower-bound binary search: first slot whose frame index is >= frameIndex.
 */
export function findInsertionIndex(keyframes: readonly TextKeyframe[], frameIndex: number): number {
  let lo = 0;
  let hi = keyframes.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (keyframes[mid].frameIndex < frameIndex) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Overwrite the fields the update defines; keep the rest from the existing keyframe.
 */
export function mergeKeyframe(existing: TextKeyframe, update: TextKeyframe): TextKeyframe {
  return {
    frameIndex: existing.frameIndex,
    position: update.position !== null ? { ...update.position } : existing.position,
    size: update.size !== null ? update.size : existing.size,
  };
}

export function copyKeyframe(keyframe: TextKeyframe): TextKeyframe {
  return {
    frameIndex: keyframe.frameIndex,
    position: keyframe.position ? { ...keyframe.position } : null,
    size: keyframe.size,
  };
}

/**
 * Check if two keyframes carry the same frame and field values
 */
export function keyframesEqual(a: TextKeyframe, b: TextKeyframe): boolean {
  if (a.frameIndex !== b.frameIndex || a.size !== b.size) return false;
  if (a.position === null || b.position === null) return a.position === b.position;
  return a.position.x === b.position.x && a.position.y === b.position.y;
}
