export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/** Axis-aligned rectangle, top-left corner plus extent, in frame pixels. */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * RGBA pixel buffer, row-major, 4 bytes per pixel.
 * Same shape as canvas `ImageData` so it can be handed to a 2D context as is.
 */
export interface RasterImage {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

export function createRasterImage(width: number, height: number, fill?: [number, number, number]): RasterImage {
  const data = new Uint8ClampedArray(width * height * 4);
  const [r, g, b] = fill ?? [0, 0, 0];
  for (let i = 0; i < data.length; i += 4) {
    data[i] = r;
    data[i + 1] = g;
    data[i + 2] = b;
    data[i + 3] = 255;
  }
  return { width, height, data };
}

export function cloneRasterImage(image: RasterImage): RasterImage {
  return { width: image.width, height: image.height, data: new Uint8ClampedArray(image.data) };
}

export function rectContains(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.x &&
    point.x <= rect.x + rect.width &&
    point.y >= rect.y &&
    point.y <= rect.y + rect.height
  );
}

/** Normalizes two drag corners (in any order) into a rectangle. */
export function rectFromCorners(begin: Point, end: Point): Rect {
  return {
    x: Math.min(begin.x, end.x),
    y: Math.min(begin.y, end.y),
    width: Math.abs(end.x - begin.x),
    height: Math.abs(end.y - begin.y),
  };
}
