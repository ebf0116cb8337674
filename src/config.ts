function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export interface CaptionStyleDefaults {
  font: string;
  textColor: string;
  backgroundColor: string | null;
  strokeWidth: number;
  strokeColor: string;
}

export interface EditorConfig {
  style: CaptionStyleDefaults;
  /** Directory searched for font files named by bare file name. */
  fontDirectory: string;
  /** Entries kept by the text measurement LRU cache. */
  measureCacheSize: number;
  /** Padding in pixels around the text box when a background color is set. */
  backgroundPadding: number;
  /** Line advance as a multiple of the font size. */
  lineHeight: number;
  /** Default loop flag for sequences that are created rather than decoded. */
  loopByDefault: boolean;
  tracker: {
    pyramidLevels: number;
    windowHalf: number;
    gridSize: number;
    minConfidence: number;
  };
}

export const editorConfig: EditorConfig = {
  style: {
    font: process.env.MEME_FONT || 'Montserrat-Regular.ttf',
    textColor: '#FFF',
    backgroundColor: null,
    strokeWidth: 2,
    strokeColor: '#000',
  },
  fontDirectory: process.env.MEME_FONT_DIR || 'fonts',
  measureCacheSize: readInt(process.env.MEME_MEASURE_CACHE_SIZE, 32),
  backgroundPadding: 10,
  lineHeight: 1.2,
  loopByDefault: true,
  tracker: {
    pyramidLevels: 3,
    windowHalf: 10, // 21x21 window
    gridSize: 5,
    minConfidence: 1e-4,
  },
};
