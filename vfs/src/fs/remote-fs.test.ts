import type { Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  CantShareDirectoriesError,
  DirNotFoundError,
  DirectoryNotEmptyError,
  NotFoundError,
  RootReservedError,
} from '../errors.js';
import { REGEX_RULES, createHarness, type Harness } from '../testing/harness.js';
import { RemoteFs, RemoteObject, cleanRemote } from './remote-fs.js';

async function readAll(stream: Readable): Promise<string> {
  let text = '';
  for await (const chunk of stream) {
    text += String(chunk);
  }
  return text;
}

describe('RemoteFs', () => {
  let h: Harness;
  let fs: RemoteFs;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    h = await createHarness();
    h.service.addTorrent({ id: 's1', name: 'Show.S01', files: ['E1', 'E2'] });
    h.service.addTorrent({ id: 'm1', name: 'Some.Movie.2019', files: ['M1'] });
    h.service.filenames.set('E1', 'Show.S01E01.mkv');
    fs = new RemoteFs(h.engine);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await h.cleanup();
  });

  it('cleans remote paths', () => {
    expect(cleanRemote('/shows//Show.S01/')).toBe('shows/Show.S01');
    expect(cleanRemote('/')).toBe('');
  });

  it('lists folders and files with their remote paths', async () => {
    const root = await fs.list('');
    expect(root).toEqual([
      { type: 'dir', remote: 'shows', id: '/shows/' },
      { type: 'dir', remote: 'movies', id: '/movies/' },
    ]);

    const entries = await fs.list('shows/Show.S01');
    expect(entries.map(entry => entry.remote)).toEqual(['shows/Show.S01/Show.S01E01.mkv', 'shows/Show.S01/E2.mkv']);
    expect(entries[0]).toBeInstanceOf(RemoteObject);
  });

  it('raises DirNotFoundError for unknown folders', async () => {
    await expect(fs.list('nope')).rejects.toBeInstanceOf(DirNotFoundError);
  });

  it('finds objects by path', async () => {
    await fs.list('shows/Show.S01');

    const object = await fs.newObject('shows/Show.S01/E2.mkv');

    expect(object.size).toBe(100);
    expect(object.mimeType()).toBe('video/x-matroska');
    expect(object.id()).toBe('E2');
    expect(object.modTime).toEqual(new Date(4_000));
    await expect(fs.newObject('shows/Show.S01/missing.mkv')).rejects.toBeInstanceOf(NotFoundError);
    await expect(fs.newObject('nope/file.mkv')).rejects.toBeInstanceOf(NotFoundError);
    await expect(fs.newObject('shows/Show.S01')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('creates folders below the top level only', async () => {
    await fs.mkdir('shows/new');

    expect(await h.readSortFile()).toBe(`${REGEX_RULES}/shows/new/\n`);
    await expect(fs.mkdir('top')).rejects.toBeInstanceOf(RootReservedError);
  });

  it('moves files and creates the destination folder', async () => {
    await fs.list('shows/Show.S01');
    const object = await fs.newObject('shows/Show.S01/Show.S01E01.mkv');

    const moved = await fs.move(object, 'shows/Show/episode 1.mkv');

    expect(moved.remote).toBe('shows/Show/episode 1.mkv');
    expect(moved.node.name).toBe('episode 1.mkv');
    expect(await h.readSortFile()).toBe(`${REGEX_RULES}/shows/Show/\n/Show.S01/E1 -> /shows/Show/episode 1.mkv\n`);
  });

  it('moves folders', async () => {
    await fs.dirMove('shows/Show.S01', 'movies/Show');

    expect(await h.readSortFile()).toBe(`${REGEX_RULES}/Show.S01/E1 -> /movies/Show/\n/Show.S01/E2 -> /movies/Show/\n`);
    expect((await fs.list('movies/Show')).map(entry => entry.remote)).toEqual([
      'movies/Show/Show.S01E01.mkv',
      'movies/Show/E2.mkv',
    ]);
  });

  it('shares files but not folders', async () => {
    await fs.list('shows/Show.S01');

    await expect(fs.publicLink('shows')).rejects.toBeInstanceOf(CantShareDirectoriesError);
    expect(await fs.publicLink('shows/Show.S01/E2.mkv')).toBe('https://cdn.fake.test/E2/E2.mkv');
  });

  it('opens and removes objects', async () => {
    await fs.list('shows/Show.S01');
    const object = await fs.newObject('shows/Show.S01/E2.mkv');

    expect(await readAll(await object.open({ range: { start: 5, end: 9 } }))).toBe('https://cdn.fake.test/E2/E2.mkv|5-9');

    await object.remove();
    expect(await h.readSortFile()).toBe(`${REGEX_RULES}/Show.S01/E2 -> /shows/Show.S01/E2.mkv.trashed\n`);
  });

  it('removes folders only when empty, purges otherwise', async () => {
    await expect(fs.rmdir('shows/Show.S01')).rejects.toBeInstanceOf(DirectoryNotEmptyError);

    await fs.purge('shows/Show.S01');

    expect(h.service.calls).toContain('deleteTorrent:s1');
    await expect(fs.list('shows/Show.S01')).rejects.toBeInstanceOf(DirNotFoundError);
  });
});
