import { createStore } from 'zustand/vanilla';
import { temporal } from 'zundo';
import type { LayerContents } from '@/engine/MemeComposition';
import { MemeComposition } from '@/engine/MemeComposition';
import type { LoadedProject } from '@/engine/projectFiles';
import { documentPathFor, loadProject, saveProject } from '@/engine/projectFiles';
import { Sequence } from '@/engine/Sequence';
import { TextRenderer } from '@/engine/TextRenderer';
import type { TrackDirection, TrackingPhase, TrackStepResult } from '@/engine/TrackingKeyframer';
import { TrackingKeyframer } from '@/engine/TrackingKeyframer';
import type { ImageCodec, TextRasterizer, VisualTracker } from '@/engine/types';
import type { Point } from '@/types';
import { SequenceIOError, ValidationError } from '@/types/errors';
import { keyframesEqual } from '@/utils/keyframeUtils';

export const INVALID_KEYFRAME_MESSAGE = 'Invalid values for keyframe. Please try again.';

export interface EditorDeps {
  rasterizer: TextRasterizer;
  codec: ImageCodec;
  createTracker: () => VisualTracker;
}

/** Raw text of the keyframe form; an empty field leaves that value unset. */
export interface KeyframeFormInput {
  x: string;
  y: string;
  size: string;
}

// Content state tracked by undo/redo
export interface EditorContentState {
  composition: MemeComposition;
  selectedLayerId: string;
  contents: LayerContents;
}

export interface EditorState extends EditorContentState {
  sequencePath: string | null;
  /** Frames as decoded, never drawn on. */
  original: Sequence | null;
  /** Copy of `original` with the captions drawn in. */
  rendered: Sequence | null;
  frameIndex: number;
  statusMessage: string;
  tracking: TrackingKeyframer | null;
  trackingPhase: TrackingPhase | null;

  // Files
  loadSequence: (path: string) => Promise<void>;
  loadProject: (path: string) => Promise<void>;
  saveProject: (path?: string) => Promise<void>;

  // Navigation & selection
  setFrameIndex: (index: number) => void;
  selectLayer: (layerId: string) => void;

  // Layers
  addLayer: () => void;
  removeSelectedLayer: () => void;
  setContent: (text: string) => void;

  // Keyframes
  pressAt: (point: Point) => void;
  editKeyframe: (input: KeyframeFormInput) => void;
  toggleKeyframe: () => void;
  resetKeyframes: () => void;

  // Style
  setTextColor: (color: string | null) => void;
  setBackgroundColor: (color: string | null) => void;
  setStrokeWidth: (width: string) => void;
  setStrokeColor: (color: string | null) => void;
  setFont: (font: string) => void;

  // Rendering
  renderSequence: (onActiveRendered?: () => void) => void;

  // Tracking
  toggleTracking: () => void;
  trackingPointerDown: (point: Point) => void;
  trackingPointerMove: (point: Point) => void;
  trackingPointerUp: (point: Point) => void;
  trackStep: (direction: TrackDirection) => TrackStepResult | null;
}

/**
 * Parses an integer form field; empty means "not set".
 * @throws ValidationError for anything that is not a whole number
 */
export function parseIntField(value: string, min = Number.MIN_SAFE_INTEGER): number | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;
  if (!/^[+-]?\d+$/.test(trimmed)) throw new ValidationError(INVALID_KEYFRAME_MESSAGE);
  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < min) throw new ValidationError(INVALID_KEYFRAME_MESSAGE);
  return parsed;
}

function initialContent(): EditorContentState {
  const composition = new MemeComposition();
  return {
    composition,
    selectedLayerId: composition.layerIds[0],
    contents: composition.defaultContents(),
  };
}

export function createEditorStore(deps: EditorDeps) {
  const renderer = new TextRenderer(deps.rasterizer);

  const store = createStore<EditorState>()(
    temporal(
      (set, get) => {
        // Turns expected failures into a status message; anything else is a bug and propagates
        const report = (context: string, error: unknown): void => {
          if (error instanceof SequenceIOError) {
            console.error(`${context}:`, error);
          } else if (!(error instanceof ValidationError)) {
            throw error;
          }
          set({ statusMessage: error.message });
        };

        /**
         * Copy-on-write edit of the selected layer: `edit` works on a clone and
         * the clone is committed only when it returns without throwing.
         */
        const editSelected = (context: string, edit: (composition: MemeComposition, layerId: string) => void) => {
          const { composition, selectedLayerId } = get();
          const next = composition.clone();
          try {
            edit(next, selectedLayerId);
          } catch (error) {
            report(context, error);
            return;
          }
          set({ composition: next, statusMessage: '' });
        };

        const selectedLayer = (composition: MemeComposition, layerId: string) => {
          const layer = composition.get(layerId);
          if (!layer) throw new ValidationError(`No layer named ${layerId}`);
          return layer;
        };

        return {
          ...initialContent(),
          sequencePath: null,
          original: null,
          rendered: null,
          frameIndex: 0,
          statusMessage: '',
          tracking: null,
          trackingPhase: null,

          loadSequence: async (path) => {
            let sequence: Sequence;
            try {
              sequence = await Sequence.open(path, deps.codec);
            } catch (error) {
              report('Failed to load sequence', error);
              return;
            }
            get().tracking?.reset();
            set({
              sequencePath: path,
              original: sequence,
              rendered: null,
              frameIndex: 0,
              statusMessage: `Loaded ${path}`,
              trackingPhase: get().tracking ? 'idle' : null,
            });
            get().renderSequence();
          },

          loadProject: async (path) => {
            let project: LoadedProject;
            try {
              project = await loadProject(path, deps.codec);
            } catch (error) {
              report('Failed to load project', error);
              return;
            }
            get().tracking?.reset();
            set({
              sequencePath: path,
              original: project.sequence,
              rendered: null,
              frameIndex: 0,
              composition: project.composition,
              selectedLayerId: project.composition.layerIds[0],
              contents: project.composition.defaultContents(),
              statusMessage: `Loaded ${path}`,
              trackingPhase: get().tracking ? 'idle' : null,
            });
            // Fresh project: nothing to undo into
            store.temporal.getState().clear();
          },

          saveProject: async (path) => {
            const { original, composition, sequencePath } = get();
            const target = path ?? sequencePath;
            if (!original || !target) {
              set({ statusMessage: 'File not saved' });
              return;
            }
            try {
              await saveProject(target, composition, original, deps.codec);
            } catch (error) {
              report('Failed to save project', error);
              return;
            }
            set({
              sequencePath: target,
              statusMessage: `Saved template to ${documentPathFor(target)} and ${target}`,
            });
          },

          setFrameIndex: (index) => {
            const { original } = get();
            const last = original ? original.length - 1 : 0;
            set({ frameIndex: Math.max(0, Math.min(last, Math.trunc(index))) });
          },

          selectLayer: (layerId) => {
            if (!get().composition.has(layerId)) return;
            set({ selectedLayerId: layerId });
          },

          addLayer: () => {
            const { composition, contents } = get();
            const next = composition.clone();
            const layer = next.addLayer();
            set({
              composition: next,
              selectedLayerId: layer.id,
              contents: { ...contents, [layer.id]: layer.id },
              statusMessage: '',
            });
          },

          removeSelectedLayer: () => {
            const { composition, contents, selectedLayerId } = get();
            const next = composition.clone();
            if (!next.removeLayer(selectedLayerId)) {
              set({ statusMessage: 'Cannot remove the last layer' });
              return;
            }
            const remaining = { ...contents };
            delete remaining[selectedLayerId];
            const ids = next.layerIds;
            set({
              composition: next,
              selectedLayerId: ids[ids.length - 1],
              contents: remaining,
              statusMessage: '',
            });
          },

          setContent: (text) => {
            const { contents, selectedLayerId } = get();
            set({ contents: { ...contents, [selectedLayerId]: text } });
          },

          pressAt: (point) => {
            const { composition, contents, frameIndex, selectedLayerId } = get();
            const hit = composition.layerAt(point, frameIndex, contents, renderer);
            if (hit && hit.id !== selectedLayerId) {
              set({ selectedLayerId: hit.id });
              return;
            }
            editSelected('Failed to move layer', (next, layerId) => {
              const { keyframes } = selectedLayer(next, layerId);
              // Size sticks to what is on screen so a move never resizes the caption
              const { size } = keyframes.interpolate(frameIndex);
              keyframes.insertOrMerge({ frameIndex, position: { x: point.x, y: point.y }, size });
            });
          },

          editKeyframe: (input) => {
            const { frameIndex } = get();
            editSelected('Invalid keyframe', (next, layerId) => {
              const x = parseIntField(input.x);
              const y = parseIntField(input.y);
              const size = parseIntField(input.size, 1);
              const position = x !== null && y !== null ? { x, y } : null;
              if (position === null && size === null) return;

              const { keyframes } = selectedLayer(next, layerId);
              const update = { frameIndex, position, size };
              const current = keyframes.find(frameIndex);
              if (current && keyframesEqual(current, update)) return;
              keyframes.insertOrMerge(update);
            });
          },

          toggleKeyframe: () => {
            const { frameIndex } = get();
            editSelected('Failed to toggle keyframe', (next, layerId) => {
              const { keyframes } = selectedLayer(next, layerId);
              if (keyframes.has(frameIndex)) {
                keyframes.remove(frameIndex);
              } else {
                keyframes.insertOrMerge(keyframes.interpolate(frameIndex));
              }
            });
          },

          resetKeyframes: () =>
            editSelected('Failed to reset keyframes', (next, layerId) => {
              selectedLayer(next, layerId).keyframes.reset();
            }),

          setTextColor: (color) =>
            editSelected('Failed to set text color', (next, layerId) => {
              selectedLayer(next, layerId).textColor = color;
            }),

          setBackgroundColor: (color) =>
            editSelected('Failed to set background color', (next, layerId) => {
              selectedLayer(next, layerId).backgroundColor = color;
            }),

          setStrokeWidth: (width) =>
            editSelected('Invalid stroke width', (next, layerId) => {
              const parsed = parseIntField(width, 0);
              if (parsed === null) throw new ValidationError(INVALID_KEYFRAME_MESSAGE);
              selectedLayer(next, layerId).strokeWidth = parsed;
            }),

          setStrokeColor: (color) =>
            editSelected('Failed to set stroke color', (next, layerId) => {
              selectedLayer(next, layerId).strokeColor = color;
            }),

          setFont: (font) =>
            editSelected('Failed to set font', (next, layerId) => {
              if (font.trim() === '') throw new ValidationError('Font must not be empty');
              selectedLayer(next, layerId).font = font;
            }),

          renderSequence: (onActiveRendered) => {
            const { original, composition, contents, frameIndex } = get();
            if (!original || original.length === 0) return;
            const rendered = original.copy();
            composition.renderActiveFirst(rendered, contents, frameIndex, renderer, onActiveRendered);
            set({ rendered });
          },

          toggleTracking: () => {
            const { tracking } = get();
            if (tracking) {
              tracking.reset();
              set({ tracking: null, trackingPhase: null });
              return;
            }
            const keyframer = new TrackingKeyframer(deps.createTracker());
            set({ tracking: keyframer, trackingPhase: keyframer.phase });
          },

          trackingPointerDown: (point) => {
            const { tracking } = get();
            if (!tracking) return;
            tracking.beginRegion(point);
            set({ trackingPhase: tracking.phase });
          },

          trackingPointerMove: (point) => {
            get().tracking?.dragRegion(point);
          },

          trackingPointerUp: (point) => {
            const { tracking, original, frameIndex } = get();
            if (!tracking || !original) return;
            const started = tracking.releaseRegion(point, original, frameIndex);
            set({
              trackingPhase: tracking.phase,
              statusMessage: started ? '' : 'Select a region inside the frame to track',
            });
          },

          trackStep: (direction) => {
            const { tracking, original, composition, selectedLayerId } = get();
            if (!tracking || !original) return null;

            const next = composition.clone();
            const layer = next.get(selectedLayerId);
            if (!layer) return null;

            const result = tracking.step(direction, layer.keyframes, original);
            switch (result.status) {
              case 'tracked':
                set({
                  composition: next,
                  frameIndex: result.frameIndex,
                  trackingPhase: tracking.phase,
                  statusMessage: '',
                });
                break;
              case 'failed':
                console.warn('Tracking failed:', result.error.message);
                set({ trackingPhase: tracking.phase, statusMessage: result.error.message });
                break;
              case 'out-of-range':
                set({ statusMessage: `No frame ${direction === 'forward' ? 'after' : 'before'} frame ${result.frameIndex}` });
                break;
            }
            return result;
          },
        };
      },
      {
        limit: 100,
        partialize: (state): EditorContentState => ({
          // Only content is undoable; frame position, renders, status and tracking are not
          composition: state.composition,
          selectedLayerId: state.selectedLayerId,
          contents: state.contents,
        }),
        // Edits replace these objects rather than mutate them, so identity is enough
        equality: (past, current) =>
          past.composition === current.composition &&
          past.selectedLayerId === current.selectedLayerId &&
          past.contents === current.contents,
      },
    ),
  );

  // The preview follows content changes, undo and redo included
  store.subscribe((state, prev) => {
    if (state.composition !== prev.composition || state.contents !== prev.contents) {
      state.renderSequence();
    }
  });

  return store;
}

export type EditorStore = ReturnType<typeof createEditorStore>;
