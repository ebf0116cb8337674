import { access, readFile, writeFile } from 'node:fs/promises';
import { DocumentFormatError, SequenceIOError, ValidationError } from '@/types/errors';
import { MemeComposition } from './MemeComposition';
import { Sequence } from './Sequence';
import type { ImageCodec } from './types';

export interface LoadedProject {
  sequence: Sequence;
  composition: MemeComposition;
  /** Whether the caption document existed next to the sequence. */
  hasDocument: boolean;
}

/** `clip.gif` -> `clip.json`, in the same directory. */
export function documentPathFor(sequencePath: string): string {
  const slash = Math.max(sequencePath.lastIndexOf('/'), sequencePath.lastIndexOf('\\'));
  const dot = sequencePath.lastIndexOf('.');
  const stem = dot > slash + 1 ? sequencePath.slice(0, dot) : sequencePath;
  return `${stem}.json`;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads and validates the caption document at `path`.
 * @throws SequenceIOError when the file cannot be read
 * @throws DocumentFormatError when it is not a valid document
 */
export async function readDocument(path: string): Promise<MemeComposition> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    throw new SequenceIOError(path, `Cannot read ${path}`, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new DocumentFormatError(`${path} is not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  return MemeComposition.deserialize(data);
}

/**
 * Opens the sequence and, when present, its sibling caption document.
 * Without a document the composition holds a single default layer.
 */
export async function loadProject(sequencePath: string, codec: ImageCodec): Promise<LoadedProject> {
  const sequence = await Sequence.open(sequencePath, codec);
  const documentPath = documentPathFor(sequencePath);
  if (!(await exists(documentPath))) {
    return { sequence, composition: new MemeComposition(), hasDocument: false };
  }
  return { sequence, composition: await readDocument(documentPath), hasDocument: true };
}

/**
 * Writes the unrendered source sequence to `sequencePath`, then the caption
 * document beside it. The document is only written once the sequence is on disk.
 * @throws ValidationError for a sequence without frames, before anything is written
 */
export async function saveProject(
  sequencePath: string,
  composition: MemeComposition,
  sequence: Sequence,
  codec: ImageCodec,
  loop: boolean = sequence.loop,
): Promise<void> {
  if (sequence.length === 0) {
    throw new ValidationError('Cannot save a sequence without frames');
  }
  const documentPath = documentPathFor(sequencePath);
  const json = JSON.stringify(composition.serialize(), null, 4);
  await sequence.save(sequencePath, codec, { loop });
  try {
    await writeFile(documentPath, json, 'utf8');
  } catch (err) {
    throw new SequenceIOError(documentPath, `Cannot write ${documentPath}`, { cause: err });
  }
}
