import { describe, it, expect, beforeEach } from 'vitest';
import { TextLayer } from '../TextLayer';
import { TextRenderer } from '../TextRenderer';
import type { Frame } from '../types';
import { FakeRasterizer } from './fakes';
import { editorConfig } from '@/config';
import { createRasterImage } from '@/types';
import { DocumentFormatError } from '@/types/errors';

function makeFrame(): Frame {
  return { image: createRasterImage(200, 100), duration: 100 };
}

describe('TextLayer', () => {
  let rasterizer: FakeRasterizer;
  let renderer: TextRenderer;

  beforeEach(() => {
    rasterizer = new FakeRasterizer();
    renderer = new TextRenderer(rasterizer);
  });

  it('uses the default caption style', () => {
    const layer = new TextLayer('Text 1');
    expect(layer.style).toEqual({
      font: editorConfig.style.font,
      textColor: '#FFF',
      backgroundColor: null,
      strokeWidth: 2,
      strokeColor: '#000',
    });
  });

  it('centers the bounding box on the point', () => {
    const layer = new TextLayer('Text 1');
    // 3 chars * 10 px wide, 25 px tall
    expect(layer.boundingBox({ x: 100, y: 50 }, 25, 'abc', renderer)).toEqual({
      x: 85,
      y: 38,
      width: 30,
      height: 25,
    });
  });

  it('hit-tests against the interpolated box', () => {
    const layer = new TextLayer('Text 1');
    layer.keyframes.insertOrMerge({ frameIndex: 0, position: { x: 100, y: 50 }, size: 20 });

    expect(layer.containsPoint({ x: 95, y: 45 }, 0, 'ab', renderer)).toBe(true);
    expect(layer.containsPoint({ x: 150, y: 45 }, 0, 'ab', renderer)).toBe(false);
  });

  it('strokes every line before filling, bottom line first', () => {
    const layer = new TextLayer('Text 1');
    layer.keyframes.insertOrMerge({ frameIndex: 0, position: { x: 100, y: 50 }, size: 20 });

    layer.draw(makeFrame(), 0, 'ab\ncd', renderer);

    expect(rasterizer.calls.map((call) => (call.op === 'fillRect' ? call.op : `${call.op}:${call.line}`))).toEqual([
      'strokeText:cd',
      'strokeText:ab',
      'fillText:cd',
      'fillText:ab',
    ]);
  });

  it('anchors each line at the top center of its slot', () => {
    const layer = new TextLayer('Text 1');
    layer.keyframes.insertOrMerge({ frameIndex: 0, position: { x: 100, y: 50 }, size: 20 });

    layer.draw(makeFrame(), 0, 'ab\ncd', renderer);

    const fills = rasterizer.calls.filter((call) => call.op === 'fillText');
    expect(fills).toEqual([
      { op: 'fillText', line: 'cd', anchor: { x: 100, y: 50 }, style: { font: editorConfig.style.font, size: 20, color: '#FFF' } },
      { op: 'fillText', line: 'ab', anchor: { x: 100, y: 30 }, style: { font: editorConfig.style.font, size: 20, color: '#FFF' } },
    ]);
  });

  it('draws a padded background under the text', () => {
    const layer = new TextLayer('Text 1', { backgroundColor: '#123456' });
    layer.keyframes.insertOrMerge({ frameIndex: 0, position: { x: 100, y: 50 }, size: 20 });

    layer.draw(makeFrame(), 0, 'ab\ncd', renderer);

    expect(rasterizer.calls[0]).toEqual({
      op: 'fillRect',
      rect: { x: 80, y: 20, width: 40, height: 60 },
      color: '#123456',
    });
  });

  it('skips the outline when the stroke is disabled', () => {
    const layer = new TextLayer('Text 1', { strokeWidth: 0 });
    layer.draw(makeFrame(), 0, 'ab', renderer);

    expect(rasterizer.calls.map((call) => call.op)).toEqual(['fillText']);
  });

  it('writes into the frame pixels', () => {
    const layer = new TextLayer('Text 1');
    layer.keyframes.insertOrMerge({ frameIndex: 0, position: { x: 100, y: 50 }, size: 20 });
    const frame = makeFrame();

    layer.draw(frame, 0, 'ab', renderer);

    // Single line: box top is 50 - 10 = 40
    const o = (40 * 200 + 100) * 4;
    expect(Array.from(frame.image.data.subarray(o, o + 4))).toEqual([255, 255, 255, 255]);
  });

  it('clone copies keyframes and style', () => {
    const layer = new TextLayer('Text 1', { textColor: '#F00' });
    layer.keyframes.insertOrMerge({ frameIndex: 0, position: { x: 1, y: 2 }, size: 3 });
    const copy = layer.clone();
    copy.keyframes.reset();
    copy.textColor = '#0F0';

    expect(layer.keyframes.length).toBe(1);
    expect(layer.textColor).toBe('#F00');
  });

  it('serializes field by field and back', () => {
    const layer = new TextLayer('Caption', {
      font: 'Impact.ttf',
      textColor: null,
      backgroundColor: '#000',
      strokeWidth: 4,
      strokeColor: '#FF0',
    });
    layer.keyframes.insertOrMerge({ frameIndex: 2, position: { x: 10, y: 20 }, size: 30 });

    const record = layer.serialize();
    expect(record).toEqual({
      id: 'Caption',
      keyframes: [{ frame_index: 2, position: [10, 20], size: 30 }],
      font: 'Impact.ttf',
      text_color: null,
      background_color: '#000',
      stroke_width: 4,
      stroke_color: '#FF0',
    });

    const restored = TextLayer.deserialize(record);
    expect(restored.style).toEqual(layer.style);
    expect(restored.keyframes.toArray()).toEqual(layer.keyframes.toArray());
  });

  it('deserialize rejects a record that does not match the document format', () => {
    const record = { ...new TextLayer('Caption').serialize(), stroke_width: 'thick' };
    expect(() => TextLayer.deserialize(record)).toThrow(DocumentFormatError);
  });
});
