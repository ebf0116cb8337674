import type { LayerDocument } from '@/types/document';
import { parseLayerDocument } from '@/types/document';
import type { Point } from '@/types';
import { spiralOrder } from '@/utils/spiralOrder';
import type { Sequence } from './Sequence';
import { TextLayer } from './TextLayer';
import type { TextRenderer } from './TextRenderer';

/** Caption text per layer id. Layers without an entry are not drawn. */
export type LayerContents = Readonly<Record<string, string>>;

/**
 * Ordered set of text layers composited onto a sequence.
 * Insertion order is the stacking order; the set is never empty.
 */
export class MemeComposition {
  private layers = new Map<string, TextLayer>();

  constructor(layers: Iterable<TextLayer> = [new TextLayer('Text 1')]) {
    for (const layer of layers) {
      this.layers.set(layer.id, layer);
    }
    if (this.layers.size === 0) {
      this.layers.set('Text 1', new TextLayer('Text 1'));
    }
  }

  get size(): number {
    return this.layers.size;
  }

  get layerIds(): string[] {
    return Array.from(this.layers.keys());
  }

  get layerList(): TextLayer[] {
    return Array.from(this.layers.values());
  }

  has(layerId: string): boolean {
    return this.layers.has(layerId);
  }

  get(layerId: string): TextLayer | undefined {
    return this.layers.get(layerId);
  }

  /**
   * Appends a default layer named "Text N" (N = count + 1, bumped past taken ids).
   */
  addLayer(): TextLayer {
    let n = this.layers.size + 1;
    while (this.layers.has(`Text ${n}`)) n++;
    const layer = new TextLayer(`Text ${n}`);
    this.layers.set(layer.id, layer);
    return layer;
  }

  /**
   * Removes a layer; refuses to remove the last one.
   * @returns whether a layer was removed
   */
  removeLayer(layerId: string): boolean {
    if (this.layers.size <= 1 || !this.layers.has(layerId)) return false;
    return this.layers.delete(layerId);
  }

  /** Topmost layer whose box at `frameIndex` contains `point`. */
  layerAt(point: Point, frameIndex: number, contents: LayerContents, renderer: TextRenderer): TextLayer | undefined {
    const candidates = this.layerList.reverse();
    return candidates.find((layer) => {
      const text = contents[layer.id];
      return text !== undefined && layer.containsPoint(point, frameIndex, text, renderer);
    });
  }

  renderFrame(sequence: Sequence, frameIndex: number, contents: LayerContents, renderer: TextRenderer): void {
    const frame = sequence.get(frameIndex);
    for (const layer of this.layers.values()) {
      const text = contents[layer.id];
      if (text === undefined) continue;
      layer.draw(frame, frameIndex, text, renderer);
    }
  }

  /** Draws every layer onto every frame, in place. */
  renderAll(sequence: Sequence, contents: LayerContents, renderer: TextRenderer): void {
    for (let i = 0; i < sequence.length; i++) {
      this.renderFrame(sequence, i, contents, renderer);
    }
  }

  /**
   * Draws every frame in place, starting at `activeIndex` and spiralling
   * outward so the frame on screen is ready first. `onActiveRendered` fires
   * once, right after the active frame and before any neighbor.
   */
  renderActiveFirst(
    sequence: Sequence,
    contents: LayerContents,
    activeIndex: number,
    renderer: TextRenderer,
    onActiveRendered?: () => void,
  ): void {
    const order = spiralOrder(activeIndex, sequence.length);
    order.forEach((frameIndex, position) => {
      this.renderFrame(sequence, frameIndex, contents, renderer);
      if (position === 0) onActiveRendered?.();
    });
  }

  /** Each layer's own id as its caption. */
  defaultContents(): Record<string, string> {
    const contents: Record<string, string> = {};
    for (const id of this.layers.keys()) contents[id] = id;
    return contents;
  }

  clone(): MemeComposition {
    return new MemeComposition(this.layerList.map((layer) => layer.clone()));
  }

  serialize(): LayerDocument {
    return this.layerList.map((layer) => layer.serialize());
  }

  /**
   * Rebuilds a composition from document data.
   * @throws DocumentFormatError when the data does not match the document schema
   */
  static deserialize(data: unknown): MemeComposition {
    const records = parseLayerDocument(data);
    return new MemeComposition(records.map((record) => TextLayer.fromRecord(record)));
  }
}
