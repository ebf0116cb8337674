import { describe, it, expect } from 'vitest';
import { parseLayerDocument, parseLayerRecord } from '../document';
import { DocumentFormatError } from '../errors';

function makeRecord(id: string) {
  return {
    id,
    keyframes: [{ frame_index: 0, position: [10, 20], size: 30 }],
    font: 'Montserrat-Regular.ttf',
    text_color: '#FFF',
    background_color: null,
    stroke_width: 2,
    stroke_color: '#000',
  };
}

describe('document schema', () => {
  it('accepts a well-formed document', () => {
    const document = parseLayerDocument([makeRecord('Text 1'), makeRecord('Text 2')]);
    expect(document.map((layer) => layer.id)).toEqual(['Text 1', 'Text 2']);
    expect(document[0].keyframes[0].position).toEqual([10, 20]);
  });

  it('rejects an empty layer list', () => {
    expect(() => parseLayerDocument([])).toThrow(DocumentFormatError);
  });

  it('rejects duplicate layer ids', () => {
    expect(() => parseLayerDocument([makeRecord('Text 1'), makeRecord('Text 1')])).toThrow(
      'Duplicate layer id Text 1',
    );
  });

  it('names the offending field', () => {
    const record = { ...makeRecord('Text 1'), stroke_width: -1 };
    expect(() => parseLayerDocument([record])).toThrow(/^Invalid document at 0\.stroke_width: /);
  });

  it('rejects non-integer keyframe values', () => {
    const record = { ...makeRecord('Text 1'), keyframes: [{ frame_index: 1.5, position: null, size: null }] };
    expect(() => parseLayerRecord(record)).toThrow(DocumentFormatError);
  });
});
