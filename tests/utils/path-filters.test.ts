import { excludePaths, filterByExtensions, isUnderPath, normalizeExtension } from '../../src/utils/path-filters';

describe('path filters', () => {
  describe('normalizeExtension', () => {
    it('should lower-case and add the leading dot', () => {
      expect(normalizeExtension('TS')).toBe('.ts');
      expect(normalizeExtension(' .Py ')).toBe('.py');
    });
  });

  describe('filterByExtensions', () => {
    const files = ['/r/a.ts', '/r/b.PY', '/r/c.md'];

    it('should keep only included extensions', () => {
      expect(filterByExtensions(files, ['py', '.ts'])).toEqual(['/r/a.ts', '/r/b.PY']);
    });

    it('should drop excluded extensions', () => {
      expect(filterByExtensions(files, [], ['MD'])).toEqual(['/r/a.ts', '/r/b.PY']);
    });

    it('should apply exclusion after inclusion', () => {
      expect(filterByExtensions(files, ['.ts', '.md'], ['.md'])).toEqual(['/r/a.ts']);
    });

    it('should keep everything without filters', () => {
      expect(filterByExtensions(files)).toEqual(files);
    });
  });

  describe('isUnderPath', () => {
    it('should match on directory boundaries', () => {
      expect(isUnderPath('/r/src/a.ts', '/r/src')).toBe(true);
      expect(isUnderPath('/r/src/a.ts', '/r/src/')).toBe(true);
      expect(isUnderPath('/r/src', '/r/src')).toBe(true);
      expect(isUnderPath('/r/srcx/a.ts', '/r/src')).toBe(false);
    });
  });

  describe('excludePaths', () => {
    it('should remove files under any excluded prefix', () => {
      expect(
        excludePaths(['/r/src/a.ts', '/r/srcx/b.ts', '/r/lib/c.ts'], ['/r/src', '/r/lib/c.ts'])
      ).toEqual(['/r/srcx/b.ts']);
    });
  });
});
