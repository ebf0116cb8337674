import type { Point, RasterImage, Rect, Size } from '@/types';

/** One raster image of a sequence plus how long it stays on screen, in ms. */
export interface Frame {
  image: RasterImage;
  duration: number;
}

export interface DecodedSequence {
  frames: Frame[];
  loop: boolean;
}

/** Reads and writes animated image files. */
export interface ImageCodec {
  decode(path: string): Promise<DecodedSequence>;
  encode(path: string, frames: readonly Frame[], loopForever: boolean): Promise<void>;
}

export interface TextStrokeStyle {
  font: string;
  size: number;
  width: number;
  color: string;
}

export interface TextFillStyle {
  font: string;
  size: number;
  color: string;
}

/**
 * Drawing surface handed out by `TextRasterizer.paint`. Text is anchored at
 * the top center of the line.
 */
export interface TextPainter {
  fillRect(rect: Rect, color: string): void;
  strokeText(line: string, anchor: Point, style: TextStrokeStyle): void;
  fillText(line: string, anchor: Point, style: TextFillStyle): void;
}

/** Font metrics and glyph drawing. */
export interface TextRasterizer {
  /** Size of the (possibly multi-line) text block at the given font size. */
  measure(font: string, size: number, text: string): Size;
  /** Runs `draw` against a surface backed by `image`; pixels are written back when it returns. */
  paint(image: RasterImage, draw: (painter: TextPainter) => void): void;
}

export type TrackerUpdate =
  | { ok: true; rect: Rect }
  | { ok: false };

/** Single-object visual tracker. */
export interface VisualTracker {
  init(image: RasterImage, rect: Rect): boolean;
  update(image: RasterImage): TrackerUpdate;
}
