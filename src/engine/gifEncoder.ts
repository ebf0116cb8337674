/**
 * Minimal GIF89a encoder.
 * Takes RGBA frames with per-frame delays and produces the bytes of an animated GIF.
 * Each frame gets its own 256-entry palette (median cut over a color histogram)
 * and LZW-compressed pixel indices.
 */

import type { RasterImage } from '@/types';

const PALETTE_SIZE = 256;
const MIN_CODE_SIZE = 8;
const MAX_CODES = 4096;
const MAX_SAMPLES = 10000;

// Colors are packed as 0xRRGGBB
const CHANNEL_SHIFTS = [16, 8, 0] as const;

function channel(rgb: number, shift: number): number {
  return (rgb >> shift) & 0xff;
}

interface ColorCount {
  rgb: number;
  count: number;
}

// ---------- Palette ----------

function histogram(image: RasterImage): ColorCount[] {
  const pixelCount = image.width * image.height;
  const step = Math.max(1, Math.floor(pixelCount / MAX_SAMPLES));
  const counts = new Map<number, number>();
  for (let i = 0; i < pixelCount; i += step) {
    const o = i * 4;
    const rgb = (image.data[o] << 16) | (image.data[o + 1] << 8) | image.data[o + 2];
    counts.set(rgb, (counts.get(rgb) ?? 0) + 1);
  }
  return Array.from(counts, ([rgb, count]) => ({ rgb, count }));
}

function widestChannel(bucket: readonly ColorCount[]): { shift: number; range: number } {
  let widest = { shift: 16, range: -1 };
  for (const shift of CHANNEL_SHIFTS) {
    let lo = 255;
    let hi = 0;
    for (const { rgb } of bucket) {
      const value = channel(rgb, shift);
      if (value < lo) lo = value;
      if (value > hi) hi = value;
    }
    if (hi - lo > widest.range) widest = { shift, range: hi - lo };
  }
  return widest;
}

// Splits at the pixel-weighted median along `shift`; both halves are non-empty
function splitBucket(bucket: readonly ColorCount[], shift: number): [ColorCount[], ColorCount[]] {
  const sorted = [...bucket].sort((a, b) => channel(a.rgb, shift) - channel(b.rgb, shift));
  const total = sorted.reduce((sum, entry) => sum + entry.count, 0);
  let seen = 0;
  let cut = 1;
  for (let i = 0; i < sorted.length - 1; i++) {
    seen += sorted[i].count;
    cut = i + 1;
    if (seen * 2 >= total) break;
  }
  return [sorted.slice(0, cut), sorted.slice(cut)];
}

function averageColor(bucket: readonly ColorCount[]): number {
  const sums = [0, 0, 0];
  let total = 0;
  for (const { rgb, count } of bucket) {
    CHANNEL_SHIFTS.forEach((shift, i) => {
      sums[i] += channel(rgb, shift) * count;
    });
    total += count;
  }
  const [r, g, b] = sums.map((sum) => Math.round(sum / total));
  return (r << 16) | (g << 8) | b;
}

/** Up to `maxColors` packed colors; exact when the image has no more distinct colors than that. */
export function buildPalette(image: RasterImage, maxColors = PALETTE_SIZE): number[] {
  const colors = histogram(image);
  if (colors.length <= maxColors) return colors.map((entry) => entry.rgb);

  const buckets: ColorCount[][] = [colors];
  while (buckets.length < maxColors) {
    let target = -1;
    let targetShift = 16;
    let targetRange = 0;
    buckets.forEach((bucket, i) => {
      if (bucket.length < 2) return;
      const { shift, range } = widestChannel(bucket);
      if (range > targetRange) {
        target = i;
        targetShift = shift;
        targetRange = range;
      }
    });
    if (target === -1) break;
    buckets.splice(target, 1, ...splitBucket(buckets[target], targetShift));
  }
  return buckets.map(averageColor);
}

function nearestIndex(palette: readonly number[], rgb: number): number {
  let best = 0;
  let bestDistance = Infinity;
  palette.forEach((candidate, i) => {
    let distance = 0;
    for (const shift of CHANNEL_SHIFTS) {
      const d = channel(rgb, shift) - channel(candidate, shift);
      distance += d * d;
    }
    if (distance < bestDistance) {
      bestDistance = distance;
      best = i;
    }
  });
  return best;
}

function toIndices(image: RasterImage, palette: readonly number[]): Uint8Array {
  const pixelCount = image.width * image.height;
  const indices = new Uint8Array(pixelCount);
  const cache = new Map<number, number>();
  for (let i = 0; i < pixelCount; i++) {
    const o = i * 4;
    const rgb = (image.data[o] << 16) | (image.data[o + 1] << 8) | image.data[o + 2];
    let index = cache.get(rgb);
    if (index === undefined) {
      index = nearestIndex(palette, rgb);
      cache.set(rgb, index);
    }
    indices[i] = index;
  }
  return indices;
}

// ---------- LZW ----------

/** Packs variable-width codes least significant bit first. */
class BitWriter {
  private readonly bytes: number[] = [];
  private pending = 0;
  private pendingBits = 0;

  write(code: number, width: number): void {
    this.pending |= code << this.pendingBits;
    this.pendingBits += width;
    while (this.pendingBits >= 8) {
      this.bytes.push(this.pending & 0xff);
      this.pending >>>= 8;
      this.pendingBits -= 8;
    }
  }

  finish(): Uint8Array {
    if (this.pendingBits > 0) this.bytes.push(this.pending & 0xff);
    return Uint8Array.from(this.bytes);
  }
}

export function lzwEncode(indices: Uint8Array, minCodeSize: number): Uint8Array {
  const clearCode = 1 << minCodeSize;
  const endCode = clearCode + 1;
  const writer = new BitWriter();

  // (prefix code, next index) -> code; single indices are their own codes
  let dictionary = new Map<number, number>();
  let nextCode = endCode + 1;
  let codeSize = minCodeSize + 1;

  writer.write(clearCode, codeSize);
  if (indices.length === 0) {
    writer.write(endCode, codeSize);
    return writer.finish();
  }

  let prefix = indices[0];
  for (let i = 1; i < indices.length; i++) {
    const index = indices[i];
    const key = prefix * 256 + index;
    const known = dictionary.get(key);
    if (known !== undefined) {
      prefix = known;
      continue;
    }

    writer.write(prefix, codeSize);
    if (nextCode < MAX_CODES) {
      dictionary.set(key, nextCode++);
      if (nextCode > 1 << codeSize && codeSize < 12) codeSize++;
    } else {
      writer.write(clearCode, codeSize);
      dictionary = new Map();
      nextCode = endCode + 1;
      codeSize = minCodeSize + 1;
    }
    prefix = index;
  }

  writer.write(prefix, codeSize);
  writer.write(endCode, codeSize);
  return writer.finish();
}

// ---------- Container ----------

class ByteSink {
  private readonly bytes: number[] = [];

  push(...values: number[]): void {
    for (const value of values) this.bytes.push(value);
  }

  u16(value: number): void {
    this.bytes.push(value & 0xff, (value >> 8) & 0xff);
  }

  ascii(text: string): void {
    for (let i = 0; i < text.length; i++) this.bytes.push(text.charCodeAt(i));
  }

  /** Data sub-blocks of at most 255 bytes, then the terminator. */
  subBlocks(data: Uint8Array): void {
    for (let pos = 0; pos < data.length; pos += 255) {
      const chunk = data.subarray(pos, Math.min(pos + 255, data.length));
      this.bytes.push(chunk.length);
      for (const byte of chunk) this.bytes.push(byte);
    }
    this.bytes.push(0x00);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}

export interface GifFrameInput {
  image: RasterImage;
  delayMs: number;
}

export interface GifEncodeOptions {
  /** Adds a NETSCAPE2.0 block with repeat count 0 (forever); omitted otherwise. */
  loop: boolean;
}

/**
 * Encode RGBA frames into an animated GIF.
 * Delays are stored in centiseconds, so durations round to 10 ms.
 */
export function encodeGif(frames: readonly GifFrameInput[], options: GifEncodeOptions): Uint8Array {
  if (frames.length === 0) {
    throw new Error('No frames to encode');
  }

  const { width, height } = frames[0].image;
  for (const frame of frames) {
    if (frame.image.width !== width || frame.image.height !== height) {
      throw new Error(`Frame size ${frame.image.width}x${frame.image.height} differs from ${width}x${height}`);
    }
  }

  const out = new ByteSink();
  out.ascii('GIF89a');

  // Logical screen: no global color table, every frame carries a local one
  out.u16(width);
  out.u16(height);
  out.push(0x00, 0x00, 0x00);

  if (options.loop) {
    out.push(0x21, 0xff, 0x0b);
    out.ascii('NETSCAPE2.0');
    out.push(0x03, 0x01);
    out.u16(0);
    out.push(0x00);
  }

  for (const frame of frames) {
    const palette = buildPalette(frame.image);
    const indices = toIndices(frame.image, palette);

    // Graphic control: no transparency, no disposal
    out.push(0x21, 0xf9, 0x04, 0x00);
    out.u16(Math.min(0xffff, Math.max(0, Math.round(frame.delayMs / 10))));
    out.push(0x00, 0x00);

    // Image descriptor covering the whole screen, with a 256-entry local table
    out.push(0x2c);
    out.u16(0);
    out.u16(0);
    out.u16(width);
    out.u16(height);
    out.push(0x80 | (MIN_CODE_SIZE - 1));
    for (let i = 0; i < PALETTE_SIZE; i++) {
      const rgb = palette[i] ?? 0;
      out.push(channel(rgb, 16), channel(rgb, 8), channel(rgb, 0));
    }

    out.push(MIN_CODE_SIZE);
    out.subBlocks(lzwEncode(indices, MIN_CODE_SIZE));
  }

  out.push(0x3b);
  return out.toBytes();
}
