export { Sequence } from './Sequence';
export type { SaveOptions } from './Sequence';
export { GifCodec } from './GifCodec';
export { encodeGif } from './gifEncoder';
export type { GifEncodeOptions, GifFrameInput } from './gifEncoder';
export { decodeGif } from './gifDecoder';
export type { DecodedGif, DecodedGifFrame } from './gifDecoder';
export { KeyframeStore } from './KeyframeStore';
export { TextLayer } from './TextLayer';
export type { TextStyle } from './TextLayer';
export { TextRenderer } from './TextRenderer';
export { CanvasTextRasterizer } from './CanvasTextRasterizer';
export { MemeComposition } from './MemeComposition';
export type { LayerContents } from './MemeComposition';
export { TrackingKeyframer } from './TrackingKeyframer';
export type { TrackDirection, TrackingPhase, TrackStepResult } from './TrackingKeyframer';
export { LucasKanadeTracker } from './LucasKanadeTracker';
export { documentPathFor, loadProject, readDocument, saveProject } from './projectFiles';
export type { LoadedProject } from './projectFiles';
export type {
  DecodedSequence,
  Frame,
  ImageCodec,
  TextFillStyle,
  TextPainter,
  TextRasterizer,
  TextStrokeStyle,
  TrackerUpdate,
  VisualTracker,
} from './types';
