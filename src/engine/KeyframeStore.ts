import type { KeyframeRecord } from '@/types/document';
import { KeyframeNotFoundError } from '@/types/errors';
import { CHANNEL_DEFAULTS, type ResolvedKeyframe, type TextKeyframe } from '@/types/keyframes';
import {
  copyKeyframe,
  findInsertionIndex,
  getChannelSamples,
  getInterpolatedValue,
  mergeKeyframe,
} from '@/utils/keyframeUtils';

/**
 * Sparse keyframes of one text layer, unique by frame index and kept sorted.
 * Position and size are independent channels: a keyframe may define either.
 */
export class KeyframeStore {
  private keyframes: TextKeyframe[] = [];

  get length(): number {
    return this.keyframes.length;
  }

  get frameIndices(): number[] {
    return this.keyframes.map((kf) => kf.frameIndex);
  }

  /**
   * Insert a keyframe, or merge its non-null fields into the one already at that frame.
   */
  insertOrMerge(keyframe: TextKeyframe): void {
    const index = findInsertionIndex(this.keyframes, keyframe.frameIndex);
    const existing = this.keyframes[index];
    if (existing && existing.frameIndex === keyframe.frameIndex) {
      this.keyframes[index] = mergeKeyframe(existing, keyframe);
    } else {
      this.keyframes.splice(index, 0, copyKeyframe(keyframe));
    }
  }

  remove(frameIndex: number): void {
    const index = findInsertionIndex(this.keyframes, frameIndex);
    if (this.keyframes[index]?.frameIndex === frameIndex) {
      this.keyframes.splice(index, 1);
    }
  }

  has(frameIndex: number): boolean {
    return this.find(frameIndex) !== undefined;
  }

  find(frameIndex: number): TextKeyframe | undefined {
    const index = findInsertionIndex(this.keyframes, frameIndex);
    const keyframe = this.keyframes[index];
    return keyframe?.frameIndex === frameIndex ? copyKeyframe(keyframe) : undefined;
  }

  /**
   * Explicit keyframe at `frameIndex`.
   * @throws KeyframeNotFoundError when the frame only has an interpolated value
   */
  get(frameIndex: number): TextKeyframe {
    const keyframe = this.find(frameIndex);
    if (!keyframe) throw new KeyframeNotFoundError(frameIndex);
    return keyframe;
  }

  interpolate(frameIndex: number): ResolvedKeyframe {
    return {
      frameIndex,
      position: {
        x: getInterpolatedValue(getChannelSamples(this.keyframes, 'x'), frameIndex, CHANNEL_DEFAULTS.x),
        y: getInterpolatedValue(getChannelSamples(this.keyframes, 'y'), frameIndex, CHANNEL_DEFAULTS.y),
      },
      size: getInterpolatedValue(getChannelSamples(this.keyframes, 'size'), frameIndex, CHANNEL_DEFAULTS.size),
    };
  }

  reset(): void {
    this.keyframes = [];
  }

  toArray(): TextKeyframe[] {
    return this.keyframes.map(copyKeyframe);
  }

  clone(): KeyframeStore {
    const store = new KeyframeStore();
    store.keyframes = this.toArray();
    return store;
  }

  serialize(): KeyframeRecord[] {
    return this.keyframes.map((kf): KeyframeRecord => ({
      frame_index: kf.frameIndex,
      position: kf.position ? [kf.position.x, kf.position.y] : null,
      size: kf.size,
    }));
  }

  static deserialize(records: readonly KeyframeRecord[]): KeyframeStore {
    const store = new KeyframeStore();
    for (const record of records) {
      store.insertOrMerge({
        frameIndex: record.frame_index,
        position: record.position ? { x: record.position[0], y: record.position[1] } : null,
        size: record.size,
      });
    }
    return store;
  }
}
