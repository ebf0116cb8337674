/**
 * Keyframe Animation Types
 */

import type { Point } from './index';

// Channels a text keyframe can animate; position is stored as one field but interpolates per axis
export type AnimatableChannel = 'x' | 'y' | 'size';

/**
 * Sparse keyframe anchored to one frame of the sequence.
 * A keyframe may pin only the position, only the size, or both.
 */
export interface TextKeyframe {
  frameIndex: number;
  position: Point | null;
  size: number | null;
}

/** Fully resolved placement of a layer at one frame. */
export interface ResolvedKeyframe {
  frameIndex: number;
  position: Point;
  size: number;
}

// Values used when no keyframe defines a channel
export const DEFAULT_POSITION: Readonly<Point> = { x: 20, y: 20 };
export const DEFAULT_TEXT_SIZE = 50;

export const CHANNEL_DEFAULTS: Record<AnimatableChannel, number> = {
  x: DEFAULT_POSITION.x,
  y: DEFAULT_POSITION.y,
  size: DEFAULT_TEXT_SIZE,
};

// Single (frame, value) sample of one channel
export interface ChannelSample {
  frameIndex: number;
  value: number;
}
