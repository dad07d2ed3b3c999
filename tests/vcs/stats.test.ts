import {
  countLines,
  isNewStatus,
  mergeFileStats,
  parseNameStatus,
  parseNumstat,
  parsePorcelainStatus,
  resolveRenamedPath,
} from '../../src/vcs/stats';

describe('resolveRenamedPath', () => {
  it('should resolve both rename notations to the new path', () => {
    expect(resolveRenamedPath('old.ts => new.ts')).toBe('new.ts');
    expect(resolveRenamedPath('src/{old => new}/file.ts')).toBe('src/new/file.ts');
  });

  it('should collapse the separator left by an empty side', () => {
    expect(resolveRenamedPath('src/{legacy => }/file.ts')).toBe('src/file.ts');
    expect(resolveRenamedPath('src/{ => nested}/file.ts')).toBe('src/nested/file.ts');
  });

  it('should leave plain paths alone', () => {
    expect(resolveRenamedPath('src/file.ts')).toBe('src/file.ts');
  });
});

describe('parseNumstat', () => {
  it('should parse counts and treat binary markers as zero', () => {
    expect(parseNumstat('3\t1\tsrc/a.ts\n-\t-\tlogo.png\n\n')).toEqual([
      { path: 'src/a.ts', additions: 3, deletions: 1 },
      { path: 'logo.png', additions: 0, deletions: 0 },
    ]);
  });

  it('should report renamed files under their new path', () => {
    expect(parseNumstat('1\t1\tlib/{a.py => b.py}')).toEqual([{ path: 'lib/b.py', additions: 1, deletions: 1 }]);
  });
});

describe('parseNameStatus', () => {
  it('should key statuses by the new-side path', () => {
    const statuses = parseNameStatus('M\tsrc/a.ts\nR100\tsrc/old.ts\tsrc/new.ts\nA\tsrc/added.ts\n');

    expect(Array.from(statuses)).toEqual([
      ['src/a.ts', 'M'],
      ['src/new.ts', 'R100'],
      ['src/added.ts', 'A'],
    ]);
  });
});

describe('parsePorcelainStatus', () => {
  it('should keep the two-letter code and follow renames', () => {
    const statuses = parsePorcelainStatus(' M src/a.ts\n?? new.ts\nR  a.ts -> b.ts\n');

    expect(Array.from(statuses)).toEqual([
      ['src/a.ts', ' M'],
      ['new.ts', '??'],
      ['b.ts', 'R '],
    ]);
  });
});

describe('isNewStatus', () => {
  it('should treat untracked and added files as new', () => {
    expect(isNewStatus('??')).toBe(true);
    expect(isNewStatus('A ')).toBe(true);
    expect(isNewStatus('AM')).toBe(true);
    expect(isNewStatus(' M')).toBe(false);
    expect(isNewStatus('')).toBe(false);
  });
});

describe('countLines', () => {
  it('should count a final line without a newline', () => {
    expect(countLines('')).toBe(0);
    expect(countLines('a')).toBe(1);
    expect(countLines('a\n')).toBe(1);
    expect(countLines('a\nb')).toBe(2);
  });
});

describe('mergeFileStats', () => {
  it('should combine counts with status codes under absolute paths', () => {
    const stats = mergeFileStats(
      '/repo',
      [{ path: 'a.ts', additions: 1, deletions: 2 }],
      new Map([
        ['a.ts', 'M'],
        ['n.ts', 'A'],
      ])
    );

    expect(Array.from(stats)).toEqual([
      ['/repo/a.ts', { additions: 1, deletions: 2, isNew: false }],
      ['/repo/n.ts', { additions: 0, deletions: 0, isNew: true }],
    ]);
  });
});
