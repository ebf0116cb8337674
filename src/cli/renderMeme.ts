/**
 * Batch render: fills a saved caption template with one text per layer.
 *
 *   renderMeme <template.gif> -t <text> [-t <text> ...] -o <output.gif>
 *
 * The template's caption document is the `.json` file next to the GIF.
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import {
  CanvasTextRasterizer,
  GifCodec,
  Sequence,
  TextRenderer,
  documentPathFor,
  readDocument,
} from '@/engine';
import type { ImageCodec, TextRasterizer } from '@/engine';
import { DocumentFormatError, SequenceIOError } from '@/types/errors';

const USAGE = 'Usage: renderMeme <template.gif> -t <text> [-t <text> ...] -o <output.gif>';

export interface RenderMemeDeps {
  codec: ImageCodec;
  rasterizer: TextRasterizer;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      text: { type: 'string', short: 't', multiple: true },
      output: { type: 'string', short: 'o' },
    },
  });
}

/** Runs the command and resolves to its exit code. */
export async function runRenderMeme(
  argv: string[],
  deps: RenderMemeDeps = { codec: new GifCodec(), rasterizer: new CanvasTextRasterizer() },
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }

  const [templatePath] = parsed.positionals;
  const texts = parsed.values.text ?? [];
  const outputPath = parsed.values.output;
  if (!templatePath || !outputPath) {
    console.error(USAGE);
    return 1;
  }

  try {
    const sequence = await Sequence.open(templatePath, deps.codec);
    const composition = await readDocument(documentPathFor(templatePath));

    const ids = composition.layerIds;
    if (texts.length !== ids.length) {
      console.error(`Template has ${ids.length} text layer(s) but ${texts.length} text(s) were given`);
      return 1;
    }

    const contents = Object.fromEntries(ids.map((id, i) => [id, texts[i]]));
    composition.renderAll(sequence, contents, new TextRenderer(deps.rasterizer));
    await sequence.save(outputPath, deps.codec, { loop: true });
    console.log(`Rendered ${sequence.length} frame(s) to ${outputPath}`);
    return 0;
  } catch (error) {
    if (error instanceof SequenceIOError || error instanceof DocumentFormatError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runRenderMeme(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
