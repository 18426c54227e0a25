import { describe, expect, it } from 'vitest';
import {
  ROOT,
  dirName,
  isRoot,
  joinDir,
  lastSegment,
  mappingKey,
  normalizeDir,
  parentDir,
  replacePrefix,
  splitTarget,
  torrentKey,
} from './path.js';

describe('normalizeDir', () => {
  it('adds leading and trailing slashes', () => {
    expect(normalizeDir('shows/some.show')).toBe('/shows/some.show/');
  });

  it('collapses empty segments', () => {
    expect(normalizeDir('//shows///season 1//')).toBe('/shows/season 1/');
  });

  it('maps empty input to the root', () => {
    expect(normalizeDir('')).toBe('/');
    expect(normalizeDir('///')).toBe(ROOT);
    expect(isRoot(normalizeDir(''))).toBe(true);
  });
});

describe('folder helpers', () => {
  it('joins a leaf onto a folder', () => {
    expect(joinDir(normalizeDir('/shows'), 'Show.S01')).toBe('/shows/Show.S01/');
  });

  it('returns the last segment and the parent', () => {
    const dir = normalizeDir('/shows/some.show/season 1');
    expect(dirName(dir)).toBe('season 1');
    expect(parentDir(dir)).toBe('/shows/some.show/');
    expect(parentDir(normalizeDir('/shows'))).toBe('/');
    expect(dirName(ROOT)).toBe('');
  });

  it('takes the leaf id of a link', () => {
    expect(lastSegment('https://real-debrid.com/d/ABCDEF123')).toBe('ABCDEF123');
  });

  it('builds mapping keys', () => {
    expect(mappingKey('Some.Movie.2019', 'ABC')).toBe('/Some.Movie.2019/ABC');
    expect(torrentKey('Some.Movie.2019')).toBe('/Some.Movie.2019/');
  });
});

describe('splitTarget', () => {
  it('treats a trailing slash as a plain folder', () => {
    expect(splitTarget('/movies/Some.Movie/')).toEqual({ dir: '/movies/Some.Movie/', leaf: null });
  });

  it('splits off an explicit leaf name', () => {
    expect(splitTarget('/movies/Some.Movie/movie.mkv')).toEqual({ dir: '/movies/Some.Movie/', leaf: 'movie.mkv' });
  });
});

describe('replacePrefix', () => {
  it('moves values below the old folder', () => {
    expect(replacePrefix('/shows/a/b.mkv', normalizeDir('/shows'), normalizeDir('/series'))).toBe('/series/a/b.mkv');
  });

  it('leaves other values alone', () => {
    expect(replacePrefix('/movies/a/', normalizeDir('/shows'), normalizeDir('/series'))).toBe('/movies/a/');
  });
});
