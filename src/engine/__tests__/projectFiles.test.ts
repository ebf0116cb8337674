import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { GifCodec } from '../GifCodec';
import { MemeComposition } from '../MemeComposition';
import { documentPathFor, loadProject, saveProject } from '../projectFiles';
import { Sequence } from '../Sequence';
import { createRasterImage } from '@/types';
import { DocumentFormatError, SequenceIOError, ValidationError } from '@/types/errors';

function makeSequence(): Sequence {
  return Sequence.fromFrames(
    [
      { image: createRasterImage(6, 4, [255, 0, 0]), duration: 100 },
      { image: createRasterImage(6, 4, [0, 0, 255]), duration: 200 },
    ],
    true,
  );
}

describe('documentPathFor', () => {
  it('swaps the extension for .json', () => {
    expect(documentPathFor('/memes/clip.gif')).toBe('/memes/clip.json');
  });

  it('appends .json when there is no extension', () => {
    expect(documentPathFor('/memes/clip')).toBe('/memes/clip.json');
    expect(documentPathFor('/memes.v2/clip')).toBe('/memes.v2/clip.json');
    expect(documentPathFor('/memes/.hidden')).toBe('/memes/.hidden.json');
  });
});

describe('project files', () => {
  let dir: string;
  const codec = new GifCodec();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'project-files-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('saves the document beside the sequence and loads both back', async () => {
    const path = join(dir, 'clip.gif');
    const composition = new MemeComposition();
    composition.addLayer().textColor = '#0F0';
    composition.get('Text 1')?.keyframes.insertOrMerge({ frameIndex: 1, position: { x: 3, y: 2 }, size: 12 });

    await saveProject(path, composition, makeSequence(), codec);
    const project = await loadProject(path, codec);

    expect(project.hasDocument).toBe(true);
    expect(project.composition.serialize()).toEqual(composition.serialize());
    expect(project.sequence.length).toBe(2);
    expect(project.sequence.loop).toBe(true);
    expect(Array.from(project.sequence, (frame) => frame.duration)).toEqual([100, 200]);
  });

  it('writes the document as JSON indented by four spaces', async () => {
    const path = join(dir, 'clip.gif');
    const composition = new MemeComposition();
    await saveProject(path, composition, makeSequence(), codec);

    const text = await readFile(join(dir, 'clip.json'), 'utf8');
    expect(text).toBe(JSON.stringify(composition.serialize(), null, 4));
    expect(text.split('\n')[1]).toBe('    {');
  });

  it('falls back to a default composition without a document', async () => {
    const path = join(dir, 'bare.gif');
    await makeSequence().save(path, codec);

    const project = await loadProject(path, codec);
    expect(project.hasDocument).toBe(false);
    expect(project.composition.layerIds).toEqual(['Text 1']);
  });

  it('reports a missing sequence as SequenceIOError', async () => {
    await expect(loadProject(join(dir, 'missing.gif'), codec)).rejects.toBeInstanceOf(SequenceIOError);
  });

  it('reports a corrupt document as DocumentFormatError', async () => {
    const path = join(dir, 'clip.gif');
    await makeSequence().save(path, codec);
    await writeFile(join(dir, 'clip.json'), '{ not json');

    await expect(loadProject(path, codec)).rejects.toBeInstanceOf(DocumentFormatError);
  });

  it('refuses a sequence without frames before writing anything', async () => {
    const path = join(dir, 'empty.gif');
    await expect(saveProject(path, new MemeComposition(), Sequence.fromFrames([]), codec)).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(await readdir(dir)).toEqual([]);
  });

  it('reports a save into a missing directory as SequenceIOError', async () => {
    const path = join(dir, 'nowhere', 'clip.gif');
    await expect(saveProject(path, new MemeComposition(), makeSequence(), codec)).rejects.toBeInstanceOf(
      SequenceIOError,
    );
  });
});
