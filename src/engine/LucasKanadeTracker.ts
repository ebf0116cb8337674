/**
 * Region tracker built on pyramidal Lucas-Kanade optical flow.
 *
 * A 5x5 grid of feature points is seeded inside the region; each update moves
 * the points from the previous frame to the new one and shifts the region by
 * the median displacement. The region keeps its initial size.
 */

import { editorConfig } from '@/config';
import type { Point, RasterImage, Rect } from '@/types';
import type { TrackerUpdate, VisualTracker } from './types';

const BLUR_KERNEL = [0.25, 0.5, 0.25] as const;

/** Single-channel float image; one level of the tracking pyramid. */
class GrayImage {
  constructor(
    readonly width: number,
    readonly height: number,
    readonly pixels: Float32Array,
  ) {}

  static fromRaster({ width, height, data }: RasterImage): GrayImage {
    const pixels = new Float32Array(width * height);
    for (let i = 0; i < pixels.length; i++) {
      pixels[i] = 0.299 * data[i * 4] + 0.587 * data[i * 4 + 1] + 0.114 * data[i * 4 + 2];
    }
    return new GrayImage(width, height, pixels);
  }

  private at(x: number, y: number): number {
    const cx = Math.min(Math.max(x, 0), this.width - 1);
    const cy = Math.min(Math.max(y, 0), this.height - 1);
    return this.pixels[cy * this.width + cx];
  }

  /** Separable 3-tap blur with clamped edges. */
  blurred(): GrayImage {
    const { width, height } = this;
    const rows = new GrayImage(width, height, new Float32Array(width * height));
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        rows.pixels[y * width + x] =
          BLUR_KERNEL[0] * this.at(x - 1, y) + BLUR_KERNEL[1] * this.at(x, y) + BLUR_KERNEL[2] * this.at(x + 1, y);
      }
    }
    const out = new Float32Array(width * height);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        out[y * width + x] =
          BLUR_KERNEL[0] * rows.at(x, y - 1) + BLUR_KERNEL[1] * rows.at(x, y) + BLUR_KERNEL[2] * rows.at(x, y + 1);
      }
    }
    return new GrayImage(width, height, out);
  }

  /** Every second pixel in both directions. */
  halved(): GrayImage {
    const width = Math.max(1, Math.floor(this.width / 2));
    const height = Math.max(1, Math.floor(this.height / 2));
    const out = new Float32Array(width * height);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        out[y * width + x] = this.at(x * 2, y * 2);
      }
    }
    return new GrayImage(width, height, out);
  }

  /** Bilinear sample at a fractional position. */
  sample(x: number, y: number): number {
    const x0 = Math.floor(x);
    const y0 = Math.floor(y);
    const fx = x - x0;
    const fy = y - y0;
    const left = Math.max(x0, 0);
    const top = Math.max(y0, 0);
    const right = Math.min(x0 + 1, this.width - 1);
    const bottom = Math.min(y0 + 1, this.height - 1);
    const upper = (1 - fx) * this.pixels[top * this.width + left] + fx * this.pixels[top * this.width + right];
    const lower = (1 - fx) * this.pixels[bottom * this.width + left] + fx * this.pixels[bottom * this.width + right];
    return (1 - fy) * upper + fy * lower;
  }
}

/** Level 0 is the full-resolution frame; each further level is blurred and halved. */
function buildPyramid(image: RasterImage, levels: number): GrayImage[] {
  const pyramid = [GrayImage.fromRaster(image)];
  while (pyramid.length < levels) {
    pyramid.push(pyramid[pyramid.length - 1].blurred().halved());
  }
  return pyramid;
}

interface FlowStep {
  dx: number;
  dy: number;
  /** Smaller eigenvalue of the structure tensor. */
  minEigen: number;
}

// One Lucas-Kanade solve in a square window around (x, y), all in level coordinates
function solveFlow(
  prev: GrayImage,
  curr: GrayImage,
  x: number,
  y: number,
  guessX: number,
  guessY: number,
  windowHalf: number,
): FlowStep | null {
  let gxx = 0;
  let gxy = 0;
  let gyy = 0;
  let bx = 0;
  let by = 0;

  for (let wy = -windowHalf; wy <= windowHalf; wy++) {
    for (let wx = -windowHalf; wx <= windowHalf; wx++) {
      const sx = x + wx;
      const sy = y + wy;
      if (sx < 1 || sx >= prev.width - 1 || sy < 1 || sy >= prev.height - 1) continue;

      const cx = sx + guessX;
      const cy = sy + guessY;
      if (cx < 0 || cx >= curr.width || cy < 0 || cy >= curr.height) continue;

      const ix = (prev.sample(sx + 1, sy) - prev.sample(sx - 1, sy)) / 2;
      const iy = (prev.sample(sx, sy + 1) - prev.sample(sx, sy - 1)) / 2;
      const it = curr.sample(cx, cy) - prev.sample(sx, sy);

      gxx += ix * ix;
      gxy += ix * iy;
      gyy += iy * iy;
      bx += ix * it;
      by += iy * it;
    }
  }

  const det = gxx * gyy - gxy * gxy;
  if (Math.abs(det) < 1e-10) return null;

  const trace = gxx + gyy;
  return {
    dx: -(gyy * bx - gxy * by) / det,
    dy: -(gxx * by - gxy * bx) / det,
    minEigen: (trace - Math.sqrt(Math.max(0, trace * trace - 4 * det))) / 2,
  };
}

interface TrackedPoint extends Point {
  /** 0..1, from the texture under the window at full resolution. */
  confidence: number;
}

// Coarse to fine: each level refines the displacement found by the level above
function trackPoint(prev: GrayImage[], curr: GrayImage[], point: Point, windowHalf: number): TrackedPoint {
  let offsetX = 0;
  let offsetY = 0;
  let minEigen = 0;

  for (let level = prev.length - 1; level >= 0; level--) {
    const scale = 2 ** level;
    const step = solveFlow(
      prev[level],
      curr[level],
      point.x / scale,
      point.y / scale,
      offsetX / scale,
      offsetY / scale,
      windowHalf,
    );
    if (!step) continue;
    offsetX += step.dx * scale;
    offsetY += step.dy * scale;
    if (level === 0) minEigen = step.minEigen;
  }

  return {
    x: point.x + offsetX,
    y: point.y + offsetY,
    confidence: Math.min(1, Math.max(0, minEigen / 100)),
  };
}

function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = sorted.length >> 1;
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export class LucasKanadeTracker implements VisualTracker {
  private prevPyramid: GrayImage[] | null = null;
  private featurePoints: Point[] = [];
  private rect: Rect | null = null;
  private readonly options = editorConfig.tracker;

  init(image: RasterImage, rect: Rect): boolean {
    this.prevPyramid = null;
    this.featurePoints = [];
    this.rect = null;

    if (rect.width < 1 || rect.height < 1) return false;
    if (rect.x < 0 || rect.y < 0 || rect.x + rect.width > image.width || rect.y + rect.height > image.height) {
      return false;
    }

    const { gridSize } = this.options;
    for (let gy = 0; gy < gridSize; gy++) {
      for (let gx = 0; gx < gridSize; gx++) {
        this.featurePoints.push({
          x: rect.x + (gx + 0.5) * rect.width / gridSize,
          y: rect.y + (gy + 0.5) * rect.height / gridSize,
        });
      }
    }
    this.prevPyramid = buildPyramid(image, this.options.pyramidLevels);
    this.rect = { ...rect };
    return true;
  }

  update(image: RasterImage): TrackerUpdate {
    const prevPyramid = this.prevPyramid;
    const rect = this.rect;
    if (!prevPyramid || !rect) return { ok: false };
    if (image.width !== prevPyramid[0].width || image.height !== prevPyramid[0].height) return { ok: false };

    const currPyramid = buildPyramid(image, this.options.pyramidLevels);
    const dxs: number[] = [];
    const dys: number[] = [];

    this.featurePoints = this.featurePoints.map((pt) => {
      const tracked = trackPoint(prevPyramid, currPyramid, pt, this.options.windowHalf);
      // Points that lose texture or leave the frame keep their old position and do not vote
      if (
        tracked.confidence > this.options.minConfidence &&
        tracked.x >= 0 && tracked.x < image.width &&
        tracked.y >= 0 && tracked.y < image.height
      ) {
        dxs.push(tracked.x - pt.x);
        dys.push(tracked.y - pt.y);
        return { x: tracked.x, y: tracked.y };
      }
      return pt;
    });

    if (dxs.length === 0) return { ok: false };

    const moved: Rect = {
      x: Math.round(rect.x + median(dxs)),
      y: Math.round(rect.y + median(dys)),
      width: rect.width,
      height: rect.height,
    };
    if (moved.x + moved.width <= 0 || moved.y + moved.height <= 0 || moved.x >= image.width || moved.y >= image.height) {
      return { ok: false };
    }

    this.prevPyramid = currPyramid;
    this.rect = moved;
    return { ok: true, rect: { ...moved } };
  }
}
