import { readFile, writeFile } from 'node:fs/promises';
import { SequenceIOError } from '@/types/errors';
import { decodeGif } from './gifDecoder';
import { encodeGif } from './gifEncoder';
import type { DecodedSequence, Frame, ImageCodec } from './types';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * File-backed GIF codec.
 * "Loop forever" maps to a NETSCAPE2.0 repeat count of 0; a sequence that plays
 * once is written without the block, and any other repeat count reads back as
 * not looping.
 */
export class GifCodec implements ImageCodec {
  async decode(path: string): Promise<DecodedSequence> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(path);
    } catch (err) {
      throw new SequenceIOError(path, `Cannot read ${path} (${describe(err)})`, { cause: err });
    }

    try {
      const gif = decodeGif(bytes);
      return {
        frames: gif.frames.map((frame) => ({ image: frame.image, duration: frame.delayMs })),
        loop: gif.loopCount === 0,
      };
    } catch (err) {
      throw new SequenceIOError(path, `Cannot decode ${path} (${describe(err)})`, { cause: err });
    }
  }

  async encode(path: string, frames: readonly Frame[], loopForever: boolean): Promise<void> {
    let bytes: Uint8Array;
    try {
      bytes = encodeGif(
        frames.map((frame) => ({ image: frame.image, delayMs: frame.duration })),
        { loop: loopForever },
      );
    } catch (err) {
      throw new SequenceIOError(path, `Cannot encode ${path} (${describe(err)})`, { cause: err });
    }
    try {
      await writeFile(path, bytes);
    } catch (err) {
      throw new SequenceIOError(path, `Cannot write ${path} (${describe(err)})`, { cause: err });
    }
  }
}
