import { editorConfig } from '@/config';
import type { LayerRecord } from '@/types/document';
import { parseLayerRecord } from '@/types/document';
import type { Point, Rect } from '@/types';
import { rectContains } from '@/types';
import { KeyframeStore } from './KeyframeStore';
import type { TextRenderer } from './TextRenderer';
import type { Frame } from './types';

export interface TextStyle {
  font: string;
  textColor: string | null;
  backgroundColor: string | null;
  strokeWidth: number;
  strokeColor: string | null;
}

/**
 * One styled, keyframe-animated caption.
 */
export class TextLayer {
  readonly id: string;
  keyframes: KeyframeStore;
  font: string;
  textColor: string | null;
  backgroundColor: string | null;
  strokeWidth: number;
  strokeColor: string | null;

  constructor(id: string, style: Partial<TextStyle> = {}, keyframes: KeyframeStore = new KeyframeStore()) {
    const defaults = editorConfig.style;
    this.id = id;
    this.keyframes = keyframes;
    this.font = style.font ?? defaults.font;
    this.textColor = style.textColor !== undefined ? style.textColor : defaults.textColor;
    this.backgroundColor = style.backgroundColor !== undefined ? style.backgroundColor : defaults.backgroundColor;
    this.strokeWidth = style.strokeWidth ?? defaults.strokeWidth;
    this.strokeColor = style.strokeColor !== undefined ? style.strokeColor : defaults.strokeColor;
  }

  get style(): TextStyle {
    return {
      font: this.font,
      textColor: this.textColor,
      backgroundColor: this.backgroundColor,
      strokeWidth: this.strokeWidth,
      strokeColor: this.strokeColor,
    };
  }

  /**
   * Box of `text` at `fontSize` centered on `center`.
   */
  boundingBox(center: Point, fontSize: number, text: string, renderer: TextRenderer): Rect {
    const { width, height } = renderer.measure(this.font, fontSize, text);
    return {
      x: center.x - Math.floor(width / 2),
      y: center.y - Math.floor(height / 2),
      width,
      height,
    };
  }

  boundingBoxAt(frameIndex: number, text: string, renderer: TextRenderer): Rect {
    const { position, size } = this.keyframes.interpolate(frameIndex);
    return this.boundingBox(position, size, text, renderer);
  }

  containsPoint(point: Point, frameIndex: number, text: string, renderer: TextRenderer): boolean {
    return rectContains(this.boundingBoxAt(frameIndex, text, renderer), point);
  }

  /**
   * Draws the caption into `frame.image` in place.
   * Outlines of every line go down first, fills on top; lines are visited from
   * the bottom of the box upward.
   */
  draw(frame: Frame, frameIndex: number, text: string, renderer: TextRenderer): void {
    const { position, size } = this.keyframes.interpolate(frameIndex);
    const box = this.boundingBox(position, size, text, renderer);
    const lines = text.split('\n');
    const lineHeight = box.height / lines.length;
    const centerX = box.x + box.width / 2;
    const { font, textColor, backgroundColor, strokeWidth, strokeColor } = this;

    renderer.paint(frame.image, (painter) => {
      if (backgroundColor !== null) {
        const margin = editorConfig.backgroundPadding;
        painter.fillRect(
          { x: box.x - margin, y: box.y - margin, width: box.width + 2 * margin, height: box.height + 2 * margin },
          backgroundColor,
        );
      }

      if (strokeWidth > 0 && strokeColor !== null) {
        for (let i = lines.length - 1; i >= 0; i--) {
          painter.strokeText(
            lines[i],
            { x: centerX, y: box.y + i * lineHeight },
            { font, size, width: strokeWidth, color: strokeColor },
          );
        }
      }

      if (textColor !== null) {
        for (let i = lines.length - 1; i >= 0; i--) {
          painter.fillText(lines[i], { x: centerX, y: box.y + i * lineHeight }, { font, size, color: textColor });
        }
      }
    });
  }

  clone(): TextLayer {
    return new TextLayer(this.id, this.style, this.keyframes.clone());
  }

  serialize(): LayerRecord {
    return {
      id: this.id,
      keyframes: this.keyframes.serialize(),
      font: this.font,
      text_color: this.textColor,
      background_color: this.backgroundColor,
      stroke_width: this.strokeWidth,
      stroke_color: this.strokeColor,
    };
  }

  /**
   * Builds a layer from an unchecked record.
   * @throws DocumentFormatError when `data` is not a valid layer record
   */
  static deserialize(data: unknown): TextLayer {
    return TextLayer.fromRecord(parseLayerRecord(data));
  }

  static fromRecord(record: LayerRecord): TextLayer {
    return new TextLayer(
      record.id,
      {
        font: record.font,
        textColor: record.text_color,
        backgroundColor: record.background_color,
        strokeWidth: record.stroke_width,
        strokeColor: record.stroke_color,
      },
      KeyframeStore.deserialize(record.keyframes),
    );
  }
}
