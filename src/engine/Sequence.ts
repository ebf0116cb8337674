import { editorConfig } from '@/config';
import { cloneRasterImage } from '@/types';
import { InvariantViolationError } from '@/types/errors';
import type { Frame, ImageCodec } from './types';

function copyFrame(frame: Frame): Frame {
  return { image: cloneRasterImage(frame.image), duration: frame.duration };
}

export interface SaveOptions {
  /** Overrides the sequence's own loop flag. */
  loop?: boolean;
}

/**
 * Ordered, index-addressable list of frames with per-frame durations.
 * Slicing and concatenation return new sequences; `set` replaces in place.
 */
export class Sequence implements Iterable<Frame> {
  private frames: Frame[];
  loop: boolean;

  private constructor(frames: Frame[], loop: boolean) {
    this.frames = frames;
    this.loop = loop;
  }

  /** Builds a sequence that owns deep copies of the given frames. */
  static fromFrames(frames: Iterable<Frame>, loop = editorConfig.loopByDefault): Sequence {
    return new Sequence(Array.from(frames, copyFrame), loop);
  }

  static repeat(frame: Frame, count: number, loop = editorConfig.loopByDefault): Sequence {
    const frames: Frame[] = [];
    for (let i = 0; i < count; i++) frames.push(copyFrame(frame));
    return new Sequence(frames, loop);
  }

  static async open(path: string, codec: ImageCodec): Promise<Sequence> {
    const decoded = await codec.decode(path);
    return new Sequence(decoded.frames, decoded.loop);
  }

  async save(path: string, codec: ImageCodec, options: SaveOptions = {}): Promise<void> {
    await codec.encode(path, this.frames, options.loop ?? this.loop);
  }

  get length(): number {
    return this.frames.length;
  }

  get totalDuration(): number {
    return this.frames.reduce((sum, frame) => sum + frame.duration, 0);
  }

  /** Live view of the frame: drawing into `image` edits the sequence. */
  get(index: number): Frame {
    return this.frames[this.checkIndex(index)];
  }

  set(index: number, frame: Frame): void {
    this.frames[this.checkIndex(index)] = { image: frame.image, duration: frame.duration };
  }

  copy(): Sequence {
    return new Sequence(this.frames.map(copyFrame), this.loop);
  }

  /** Frames `[start, end)`, same clamping rules as `Array.prototype.slice`. */
  slice(start?: number, end?: number): Sequence {
    return new Sequence(this.frames.slice(start, end).map(copyFrame), this.loop);
  }

  /**
   * New sequence with `other`'s frames after this one's.
   * @throws InvariantViolationError when the frame dimensions differ
   */
  concat(other: Sequence): Sequence {
    const reference = this.frames[0] ?? other.frames[0];
    if (reference) {
      for (const frame of [...this.frames, ...other.frames]) {
        if (frame.image.width !== reference.image.width || frame.image.height !== reference.image.height) {
          throw new InvariantViolationError(
            `Cannot concatenate ${frame.image.width}x${frame.image.height} frame onto ` +
              `${reference.image.width}x${reference.image.height} sequence`,
          );
        }
      }
    }
    return new Sequence([...this.frames, ...other.frames].map(copyFrame), this.loop);
  }

  append(frame: Frame): Sequence {
    return this.concat(Sequence.fromFrames([frame]));
  }

  [Symbol.iterator](): Iterator<Frame> {
    return this.frames[Symbol.iterator]();
  }

  private checkIndex(index: number): number {
    const resolved = index < 0 ? this.frames.length + index : index;
    if (!Number.isInteger(resolved) || resolved < 0 || resolved >= this.frames.length) {
      throw new RangeError(`Frame index ${index} out of range for sequence of length ${this.frames.length}`);
    }
    return resolved;
  }
}
