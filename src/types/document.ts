/**
 * Wire format of the caption document saved next to the GIF.
 * Keys are snake_case; the list order is the layer stacking order.
 */

import * as v from 'valibot';
import { DocumentFormatError } from './errors';

const frameIndexSchema = v.pipe(v.number(), v.integer(), v.minValue(0));

export const keyframeRecordSchema = v.object({
  frame_index: frameIndexSchema,
  position: v.nullable(v.tuple([v.pipe(v.number(), v.integer()), v.pipe(v.number(), v.integer())])),
  size: v.nullable(v.pipe(v.number(), v.integer(), v.minValue(1))),
});

export const layerRecordSchema = v.object({
  id: v.pipe(v.string(), v.minLength(1)),
  keyframes: v.array(keyframeRecordSchema),
  font: v.string(),
  text_color: v.nullable(v.string()),
  background_color: v.nullable(v.string()),
  stroke_width: v.pipe(v.number(), v.integer(), v.minValue(0)),
  stroke_color: v.nullable(v.string()),
});

export const layerDocumentSchema = v.pipe(v.array(layerRecordSchema), v.minLength(1));

export type KeyframeRecord = v.InferOutput<typeof keyframeRecordSchema>;
export type LayerRecord = v.InferOutput<typeof layerRecordSchema>;
export type LayerDocument = v.InferOutput<typeof layerDocumentSchema>;

// Validation helpers
export function parseLayerDocument(data: unknown): LayerDocument {
  const result = v.safeParse(layerDocumentSchema, data);
  if (!result.success) {
    const issue = result.issues[0];
    const path = issue.path?.map((item) => String(item.key)).join('.') ?? '';
    throw new DocumentFormatError(path ? `Invalid document at ${path}: ${issue.message}` : `Invalid document: ${issue.message}`);
  }
  const ids = new Set<string>();
  for (const layer of result.output) {
    if (ids.has(layer.id)) throw new DocumentFormatError(`Duplicate layer id ${layer.id}`);
    ids.add(layer.id);
  }
  return result.output;
}

export function parseLayerRecord(data: unknown): LayerRecord {
  const result = v.safeParse(layerRecordSchema, data);
  if (!result.success) {
    throw new DocumentFormatError(`Invalid layer record: ${result.issues[0].message}`);
  }
  return result.output;
}
