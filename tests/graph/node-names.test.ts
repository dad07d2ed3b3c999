import { buildNodeNames } from '../../src/graph/node-names';

describe('buildNodeNames', () => {
  it('should keep unique base names and widen colliding ones', () => {
    const names = buildNodeNames([
      '/proj/test/res.send.js',
      '/proj/test/support/utils.js',
      '/proj/lib/utils.js',
    ]);

    expect(names.get('/proj/test/res.send.js')).toBe('res.send.js');
    expect(names.get('/proj/test/support/utils.js')).toBe('support/utils.js');
    expect(names.get('/proj/lib/utils.js')).toBe('lib/utils.js');
  });

  it('should widen the whole group until the suffixes differ', () => {
    const names = buildNodeNames(['/proj/a/x/index.ts', '/proj/b/x/index.ts', '/proj/c/index.ts']);

    expect(names.get('/proj/a/x/index.ts')).toBe('a/x/index.ts');
    expect(names.get('/proj/b/x/index.ts')).toBe('b/x/index.ts');
    expect(names.get('/proj/c/index.ts')).toBe('proj/c/index.ts');
  });

  it('should fall back to the full path when no suffix tells files apart', () => {
    const names = buildNodeNames(['/p/a.ts', 'p/a.ts']);

    expect(names.get('/p/a.ts')).toBe('/p/a.ts');
    expect(names.get('p/a.ts')).toBe('p/a.ts');
  });

  it('should produce pairwise distinct names', () => {
    const paths = [
      '/r/src/index.ts',
      '/r/lib/index.ts',
      '/r/src/util/index.ts',
      '/r/test/util/index.ts',
      '/r/main.c',
      '/r/src/main.c',
    ];

    const names = buildNodeNames(paths);

    expect(names.size).toBe(paths.length);
    expect(new Set(names.values()).size).toBe(paths.length);
  });

  it('should return an empty map for no paths', () => {
    expect(buildNodeNames([]).size).toBe(0);
  });
});
