import { editorConfig } from '@/config';
import type { RasterImage, Size } from '@/types';
import type { TextPainter, TextRasterizer } from './types';

/**
 * Text measurement and painting for caption layers.
 * Measurements are called on every redraw and pointer hit-test, so they are
 * kept in a bounded LRU keyed by (font, size, text).
 */
export class TextRenderer {
  private cache = new Map<string, Size>();
  private maxEntries: number;

  constructor(
    private readonly rasterizer: TextRasterizer,
    maxEntries = editorConfig.measureCacheSize,
  ) {
    this.maxEntries = Math.max(1, maxEntries);
  }

  measure(font: string, size: number, text: string): Size {
    const key = `${font}\u0000${size}\u0000${text}`;
    const cached = this.cache.get(key);
    if (cached) {
      // Re-insert so Map order tracks recency
      this.cache.delete(key);
      this.cache.set(key, cached);
      return { ...cached };
    }

    const measured = this.rasterizer.measure(font, size, text);
    if (this.cache.size >= this.maxEntries) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey !== undefined) this.cache.delete(oldestKey);
    }
    this.cache.set(key, { width: measured.width, height: measured.height });
    return { ...measured };
  }

  paint(image: RasterImage, draw: (painter: TextPainter) => void): void {
    this.rasterizer.paint(image, draw);
  }

  get cachedEntries(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
