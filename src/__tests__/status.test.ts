import { parsePorcelain, isUnderDirectory, normalizeDirectory, partitionByDirectory } from '../status';

describe('parsePorcelain', () => {
  it('returns no entries for empty output', () => {
    expect(parsePorcelain('')).toEqual([]);
  });

  it('parses modified and untracked files', () => {
    const output = ' M changelog.d/20240101_fix_login.md\0?? notes.txt\0';
    expect(parsePorcelain(output)).toEqual([
      { index: ' ', workTree: 'M', path: 'changelog.d/20240101_fix_login.md', originalPath: null },
      { index: '?', workTree: '?', path: 'notes.txt', originalPath: null },
    ]);
  });

  it('reads the source of a rename from the following field', () => {
    const entries = parsePorcelain('R  changelog.d/new.md\0changelog.d/old.md\0 M README.md\0');
    expect(entries).toEqual([
      { index: 'R', workTree: ' ', path: 'changelog.d/new.md', originalPath: 'changelog.d/old.md' },
      { index: ' ', workTree: 'M', path: 'README.md', originalPath: null },
    ]);
  });

  it('keeps an arrow in a path as part of the name', () => {
    const [entry] = parsePorcelain(' M a -> b.md\0');
    expect(entry.path).toBe('a -> b.md');
    expect(entry.originalPath).toBeNull();
  });

  it('keeps spaces in paths', () => {
    const [entry] = parsePorcelain('?? changelog.d/with space.md\0');
    expect(entry.path).toBe('changelog.d/with space.md');
  });

  it('keeps non-ASCII fragment names intact', () => {
    const [entry] = parsePorcelain(' M changelog.d/café.md\0');
    expect(entry.path).toBe('changelog.d/café.md');
  });
});

describe('normalizeDirectory', () => {
  it('strips leading ./ and trailing slashes', () => {
    expect(normalizeDirectory('./changelog.d/')).toBe('changelog.d');
    expect(normalizeDirectory('docs/changes//')).toBe('docs/changes');
  });
});

describe('isUnderDirectory', () => {
  it('matches files inside the directory', () => {
    expect(isUnderDirectory('changelog.d/123.md', 'changelog.d')).toBe(true);
    expect(isUnderDirectory('changelog.d/123.md', './changelog.d/')).toBe(true);
  });

  it('matches the directory itself as reported for untracked directories', () => {
    expect(isUnderDirectory('changelog.d/', 'changelog.d')).toBe(true);
  });

  it('does not match siblings sharing a prefix', () => {
    expect(isUnderDirectory('changelog.dx/123.md', 'changelog.d')).toBe(false);
    expect(isUnderDirectory('CHANGELOG.md', 'changelog.d')).toBe(false);
  });
});

describe('partitionByDirectory', () => {
  it('splits entries by location', () => {
    const entries = parsePorcelain(' M changelog.d/1.md\0 M README.md\0?? changelog.d/2.md\0');
    const { inside, outside } = partitionByDirectory(entries, 'changelog.d');
    expect(inside.map(e => e.path)).toEqual(['changelog.d/1.md', 'changelog.d/2.md']);
    expect(outside.map(e => e.path)).toEqual(['README.md']);
  });
});
