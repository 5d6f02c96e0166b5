import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { collectFiles, groupFilesByDirectory, normalizeExtensions } from './directory-walker';

describe('collectFiles', () => {
  let root: string;
  let music: string;

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'audiotool-walker-'));
    music = path.join(root, 'music');
    fs.mkdirSync(path.join(music, '@eaDir'), { recursive: true });
    fs.mkdirSync(path.join(music, 'subdir'), { recursive: true });

    for (const file of ['song1.mp3', 'song2.m4a', 'song3.flac', 'readme.txt', '@eaDir/thumb.jpg', 'subdir/song4.mp3']) {
      fs.writeFileSync(path.join(music, file), 'test');
    }
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('collects every file in name order', () => {
    expect(collectFiles(root)).toEqual([
      path.join(music, '@eaDir', 'thumb.jpg'),
      path.join(music, 'readme.txt'),
      path.join(music, 'song1.mp3'),
      path.join(music, 'song2.m4a'),
      path.join(music, 'song3.flac'),
      path.join(music, 'subdir', 'song4.mp3'),
    ]);
  });

  it('prunes excluded directories by name', () => {
    const files = collectFiles(root, { excludeDirs: ['@eaDir'] });

    expect(files).toHaveLength(5);
    expect(files).not.toContain(path.join(music, '@eaDir', 'thumb.jpg'));
  });

  it('does not match excluded names against paths', () => {
    expect(collectFiles(root, { excludeDirs: ['music/subdir'] })).toHaveLength(6);
  });

  it('filters by extension without regard to case or leading dot', () => {
    expect(collectFiles(root, { extensions: ['mp3', 'M4A', '.flac'] })).toEqual([
      path.join(music, 'song1.mp3'),
      path.join(music, 'song2.m4a'),
      path.join(music, 'song3.flac'),
      path.join(music, 'subdir', 'song4.mp3'),
    ]);
  });

  it('combines exclusions and extensions', () => {
    expect(collectFiles(root, { excludeDirs: ['@eaDir', 'subdir'], extensions: ['mp3'] })).toEqual([
      path.join(music, 'song1.mp3'),
    ]);
  });

  it('throws when the root cannot be read', () => {
    expect(() => collectFiles(path.join(root, 'missing'))).toThrow(/ENOENT/);
  });
});

describe('normalizeExtensions', () => {
  it('lowercases and adds a leading dot', () => {
    expect(normalizeExtensions(['MP3', '.Flac', ' m4a ', '', '.'])).toEqual(['.mp3', '.flac', '.m4a']);
  });
});

describe('groupFilesByDirectory', () => {
  it('groups files by parent directory in first-seen order', () => {
    const groups = groupFilesByDirectory([
      '/music/dir1/song1.mp3',
      '/music/dir1/song2.mp3',
      '/music/dir2/song3.mp3',
      '/music/dir3/song4.mp3',
      '/music/dir3/song5.mp3',
      '/music/dir3/song6.mp3',
    ]);

    expect([...groups.keys()]).toEqual(['/music/dir1', '/music/dir2', '/music/dir3']);
    expect(groups.get('/music/dir1')).toHaveLength(2);
    expect(groups.get('/music/dir2')).toHaveLength(1);
    expect(groups.get('/music/dir3')).toHaveLength(3);
  });
});
