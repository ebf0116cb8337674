import { existsSync } from 'node:fs';
import { basename, extname, isAbsolute, join } from 'node:path';
import { createCanvas, GlobalFonts, ImageData } from '@napi-rs/canvas';
import type { SKRSContext2D } from '@napi-rs/canvas';
import { editorConfig } from '@/config';
import type { RasterImage, Size } from '@/types';
import type { TextPainter, TextRasterizer } from './types';

const FONT_FILE = /\.(ttf|otf|woff2?)$/i;

/**
 * TextRasterizer backed by a Skia canvas.
 *
 * A font given as a file name (`Montserrat-Regular.ttf`) is registered once
 * under its base name; anything else is used as a family name. Unknown
 * families fall back to the default sans-serif face.
 */
export class CanvasTextRasterizer implements TextRasterizer {
  private families = new Map<string, string>();
  private measureCtx: SKRSContext2D = createCanvas(1, 1).getContext('2d');

  constructor(
    private readonly fontDirectory = editorConfig.fontDirectory,
    private readonly lineHeight = editorConfig.lineHeight,
  ) {}

  measure(font: string, size: number, text: string): Size {
    const ctx = this.measureCtx;
    ctx.font = this.cssFont(font, size);

    const lines = text.split('\n');
    let maxWidth = 0;
    for (const line of lines) {
      maxWidth = Math.max(maxWidth, ctx.measureText(line).width);
    }
    return {
      width: Math.ceil(maxWidth),
      height: lines.length * Math.round(size * this.lineHeight),
    };
  }

  paint(image: RasterImage, draw: (painter: TextPainter) => void): void {
    const canvas = createCanvas(image.width, image.height);
    const ctx = canvas.getContext('2d');
    ctx.putImageData(new ImageData(image.data, image.width, image.height), 0, 0);
    ctx.textAlign = 'center';
    ctx.textBaseline = 'top';

    draw({
      fillRect: (rect, color) => {
        ctx.fillStyle = color;
        ctx.fillRect(rect.x, rect.y, rect.width, rect.height);
      },
      strokeText: (line, anchor, style) => {
        ctx.font = this.cssFont(style.font, style.size);
        ctx.strokeStyle = style.color;
        // Canvas strokes straddle the glyph edge, so double the width for an outline of `width` px
        ctx.lineWidth = style.width * 2;
        ctx.lineJoin = 'round';
        ctx.strokeText(line, anchor.x, anchor.y);
      },
      fillText: (line, anchor, style) => {
        ctx.font = this.cssFont(style.font, style.size);
        ctx.fillStyle = style.color;
        ctx.fillText(line, anchor.x, anchor.y);
      },
    });

    image.data.set(ctx.getImageData(0, 0, image.width, image.height).data);
  }

  private cssFont(font: string, size: number): string {
    return `${size}px "${this.family(font)}", sans-serif`;
  }

  private family(font: string): string {
    const known = this.families.get(font);
    if (known !== undefined) return known;

    let family = font;
    if (FONT_FILE.test(font)) {
      family = basename(font, extname(font));
      const candidates = isAbsolute(font) ? [font] : [font, join(this.fontDirectory, font)];
      const path = candidates.find((candidate) => existsSync(candidate));
      if (path === undefined || !GlobalFonts.registerFromPath(path, family)) {
        console.warn(`Font ${font} not found, using the default face`);
      }
    }
    this.families.set(font, family);
    return family;
  }
}
