import { describe, it, expect } from 'vitest';
import { Sequence } from '../Sequence';
import type { Frame } from '../types';
import { createRasterImage } from '@/types';
import { InvariantViolationError } from '@/types/errors';

function makeFrame(shade: number, duration = 100, width = 4, height = 3): Frame {
  return { image: createRasterImage(width, height, [shade, shade, shade]), duration };
}

function makeSequence(count: number): Sequence {
  return Sequence.fromFrames(Array.from({ length: count }, (_, i) => makeFrame(i * 10, 100 + i * 10)));
}

function shades(sequence: Sequence): number[] {
  return Array.from(sequence, (frame) => frame.image.data[0]);
}

describe('Sequence', () => {
  it('reports length and total duration', () => {
    const sequence = makeSequence(3);
    expect(sequence.length).toBe(3);
    expect(sequence.totalDuration).toBe(100 + 110 + 120);
  });

  it('get returns a live frame and supports negative indices', () => {
    const sequence = makeSequence(3);
    sequence.get(0).image.data[0] = 77;

    expect(sequence.get(0).image.data[0]).toBe(77);
    expect(sequence.get(-1).image.data[0]).toBe(20);
  });

  it('get throws for an index out of range', () => {
    const sequence = makeSequence(2);
    expect(() => sequence.get(2)).toThrow(RangeError);
    expect(() => sequence.get(-3)).toThrow(RangeError);
  });

  it('set replaces a frame', () => {
    const sequence = makeSequence(2);
    sequence.set(1, makeFrame(200, 40));

    expect(sequence.get(1).duration).toBe(40);
    expect(sequence.get(1).image.data[0]).toBe(200);
  });

  it('copy does not share pixels with the source', () => {
    const sequence = makeSequence(2);
    const copy = sequence.copy();
    copy.get(0).image.data[0] = 250;

    expect(sequence.get(0).image.data[0]).toBe(0);
    expect(copy.loop).toBe(sequence.loop);
  });

  it('slice then concat reproduces the original frames', () => {
    const sequence = makeSequence(6);
    const rebuilt = sequence.slice(0, 2).concat(sequence.slice(2));

    expect(rebuilt.length).toBe(6);
    expect(shades(rebuilt)).toEqual(shades(sequence));
    expect(Array.from(rebuilt, (frame) => frame.duration)).toEqual(Array.from(sequence, (frame) => frame.duration));
  });

  it('concat rejects frames of different dimensions', () => {
    const small = Sequence.fromFrames([makeFrame(0)]);
    const large = Sequence.fromFrames([makeFrame(0, 100, 8, 8)]);

    expect(() => small.concat(large)).toThrow(InvariantViolationError);
  });

  it('append adds one frame at the end', () => {
    const sequence = makeSequence(2).append(makeFrame(99, 30));

    expect(sequence.length).toBe(3);
    expect(sequence.get(2).image.data[0]).toBe(99);
    expect(sequence.get(2).duration).toBe(30);
  });

  it('repeat builds independent copies of one frame', () => {
    const sequence = Sequence.repeat(makeFrame(5), 3, true);
    sequence.get(0).image.data[0] = 100;

    expect(sequence.length).toBe(3);
    expect(sequence.loop).toBe(true);
    expect(shades(sequence)).toEqual([100, 5, 5]);
  });
});
