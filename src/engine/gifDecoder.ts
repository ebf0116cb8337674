/**
 * GIF87a/GIF89a decoder.
 * Produces fully composited RGBA frames (disposal methods applied) with their
 * delays, plus the NETSCAPE2.0 repeat count when present.
 */

import type { RasterImage } from '@/types';

export interface DecodedGifFrame {
  image: RasterImage;
  delayMs: number;
}

export interface DecodedGif {
  width: number;
  height: number;
  /** NETSCAPE2.0 repeat count (0 = forever); null when the block is absent. */
  loopCount: number | null;
  frames: DecodedGifFrame[];
}

interface GraphicControl {
  disposal: number;
  delayMs: number;
  transparentIndex: number | null;
}

// ---------- Byte reader ----------

class ByteReader {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get offset(): number {
    return this.pos;
  }

  u8(): number {
    if (this.pos >= this.bytes.length) {
      throw new Error(`Unexpected end of GIF data at byte ${this.pos}`);
    }
    return this.bytes[this.pos++];
  }

  u16(): number {
    const lo = this.u8();
    const hi = this.u8();
    return lo | (hi << 8);
  }

  bytesOf(length: number): Uint8Array {
    if (this.pos + length > this.bytes.length) {
      throw new Error(`Unexpected end of GIF data at byte ${this.pos}`);
    }
    const slice = this.bytes.subarray(this.pos, this.pos + length);
    this.pos += length;
    return slice;
  }

  /** Concatenated payload of a run of data sub-blocks, consuming the terminator. */
  subBlocks(): Uint8Array {
    const chunks: Uint8Array[] = [];
    let total = 0;
    for (let size = this.u8(); size !== 0; size = this.u8()) {
      const chunk = this.bytesOf(size);
      chunks.push(chunk);
      total += size;
    }
    const joined = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      joined.set(chunk, offset);
      offset += chunk.length;
    }
    return joined;
  }
}

function readColorTable(reader: ByteReader, size: number): Uint8Array {
  return reader.bytesOf(size * 3);
}

// ---------- LZW decompression ----------

const MAX_TABLE_SIZE = 4096;

export function lzwDecode(data: Uint8Array, minCodeSize: number, pixelCount: number): Uint8Array {
  const clearCode = 1 << minCodeSize;
  const eoiCode = clearCode + 1;
  const output = new Uint8Array(pixelCount);
  let written = 0;

  let table: Uint8Array[] = [];
  let codeSize = minCodeSize + 1;

  function resetTable() {
    table = [];
    for (let i = 0; i < clearCode; i++) table.push(new Uint8Array([i]));
    table.push(new Uint8Array(0), new Uint8Array(0)); // clear, end of information
    codeSize = minCodeSize + 1;
  }

  resetTable();

  let bitPos = 0;
  const totalBits = data.length * 8;
  let prev: Uint8Array | null = null;

  while (bitPos + codeSize <= totalBits && written < pixelCount) {
    let code = 0;
    for (let i = 0; i < codeSize; i++) {
      const bit = (data[(bitPos + i) >> 3] >> ((bitPos + i) & 7)) & 1;
      code |= bit << i;
    }
    bitPos += codeSize;

    if (code === clearCode) {
      resetTable();
      prev = null;
      continue;
    }
    if (code === eoiCode) break;

    let entry: Uint8Array;
    if (code < table.length) {
      entry = table[code];
    } else if (code === table.length && prev !== null) {
      entry = new Uint8Array(prev.length + 1);
      entry.set(prev);
      entry[prev.length] = prev[0];
    } else {
      throw new Error(`Invalid LZW code ${code}`);
    }

    const count = Math.min(entry.length, pixelCount - written);
    output.set(entry.subarray(0, count), written);
    written += count;

    if (prev !== null && table.length < MAX_TABLE_SIZE) {
      const added = new Uint8Array(prev.length + 1);
      added.set(prev);
      added[prev.length] = entry[0];
      table.push(added);
      if (table.length === 1 << codeSize && codeSize < 12) {
        codeSize++;
      }
    }
    prev = entry;
  }

  return output;
}

// Row order of an interlaced image: every 8th row from 0, every 8th from 4, every 4th from 2, every 2nd from 1
function deinterlace(indices: Uint8Array, width: number, height: number): Uint8Array {
  const result = new Uint8Array(indices.length);
  const passes: Array<[number, number]> = [[0, 8], [4, 8], [2, 4], [1, 2]];
  let sourceRow = 0;
  for (const [start, step] of passes) {
    for (let y = start; y < height; y += step) {
      result.set(indices.subarray(sourceRow * width, (sourceRow + 1) * width), y * width);
      sourceRow++;
    }
  }
  return result;
}

// ---------- GIF parser ----------

export function decodeGif(bytes: Uint8Array): DecodedGif {
  const reader = new ByteReader(bytes);
  const signature = String.fromCharCode(...reader.bytesOf(6));
  if (signature !== 'GIF87a' && signature !== 'GIF89a') {
    throw new Error('Not a GIF file');
  }

  // -- Logical Screen Descriptor --
  const width = reader.u16();
  const height = reader.u16();
  const packed = reader.u8();
  reader.u8(); // background color index
  reader.u8(); // pixel aspect ratio

  const globalTable = packed & 0x80 ? readColorTable(reader, 1 << ((packed & 0x07) + 1)) : null;

  const canvas = new Uint8ClampedArray(width * height * 4);
  const frames: DecodedGifFrame[] = [];
  let loopCount: number | null = null;
  let control: GraphicControl | null = null;

  for (;;) {
    const introducer = reader.u8();

    if (introducer === 0x3b) break; // trailer

    if (introducer === 0x21) {
      const label = reader.u8();
      if (label === 0xf9) {
        const block = reader.subBlocks();
        const flags = block[0] ?? 0;
        control = {
          disposal: (flags >> 2) & 0x07,
          delayMs: ((block[1] ?? 0) | ((block[2] ?? 0) << 8)) * 10,
          transparentIndex: flags & 0x01 ? block[3] ?? 0 : null,
        };
      } else if (label === 0xff) {
        const appId = String.fromCharCode(...reader.bytesOf(reader.u8()));
        const payload = reader.subBlocks();
        if ((appId === 'NETSCAPE2.0' || appId === 'ANIMEXTS1.0') && payload[0] === 0x01 && payload.length >= 3) {
          loopCount = payload[1] | (payload[2] << 8);
        }
      } else {
        reader.subBlocks(); // comment, plain text: skipped
      }
      continue;
    }

    if (introducer !== 0x2c) {
      throw new Error(`Unknown GIF block 0x${introducer.toString(16)} at byte ${reader.offset - 1}`);
    }

    // -- Image Descriptor --
    const left = reader.u16();
    const top = reader.u16();
    const frameWidth = reader.u16();
    const frameHeight = reader.u16();
    const imagePacked = reader.u8();
    const localTable = imagePacked & 0x80 ? readColorTable(reader, 1 << ((imagePacked & 0x07) + 1)) : null;
    const palette = localTable ?? globalTable;
    if (!palette) throw new Error('GIF frame has no color table');

    const minCodeSize = reader.u8();
    const pixelCount = frameWidth * frameHeight;
    let indices = lzwDecode(reader.subBlocks(), minCodeSize, pixelCount);
    if (imagePacked & 0x40) indices = deinterlace(indices, frameWidth, frameHeight);

    const disposal = control?.disposal ?? 0;
    const previous = disposal === 3 ? new Uint8ClampedArray(canvas) : null;
    const transparentIndex = control?.transparentIndex ?? null;

    for (let y = 0; y < frameHeight; y++) {
      const cy = top + y;
      if (cy >= height) break;
      for (let x = 0; x < frameWidth; x++) {
        const cx = left + x;
        if (cx >= width) break;
        const index = indices[y * frameWidth + x];
        if (index === transparentIndex) continue;
        const p = index * 3;
        const o = (cy * width + cx) * 4;
        canvas[o] = palette[p] ?? 0;
        canvas[o + 1] = palette[p + 1] ?? 0;
        canvas[o + 2] = palette[p + 2] ?? 0;
        canvas[o + 3] = 255;
      }
    }

    // Snapshot as an opaque frame; never-painted pixels come out black
    const image = new Uint8ClampedArray(canvas);
    for (let i = 3; i < image.length; i += 4) image[i] = 255;
    frames.push({ image: { width, height, data: image }, delayMs: control?.delayMs ?? 0 });

    if (disposal === 2) {
      for (let y = top; y < Math.min(height, top + frameHeight); y++) {
        canvas.fill(0, (y * width + left) * 4, (y * width + Math.min(width, left + frameWidth)) * 4);
      }
    } else if (previous) {
      canvas.set(previous);
    }
    control = null;
  }

  return { width, height, loopCount, frames };
}
