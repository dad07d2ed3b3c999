import {
  createFormatter,
  DotFormatter,
  isOutputFormat,
  JsonFormatter,
  MermaidFormatter,
} from '../../src/formatters';
import { extensionColors, majorityExtension, nodeLabel, statsSummary } from '../../src/formatters/common';

describe('formatter helpers', () => {
  it('should break majority ties by extension order', () => {
    expect(majorityExtension(['/a.ts', '/b.py', '/c.py', '/d.ts'])).toBe('.py');
    expect(majorityExtension([])).toBeUndefined();
  });

  it('should assign palette colours in sorted extension order', () => {
    const colors = extensionColors(['/x/b.ts', '/x/a.py', '/x/Makefile']);

    expect(Array.from(colors)).toEqual([
      ['.py', 'lightblue'],
      ['.ts', 'lightyellow'],
    ]);
  });

  it('should summarise only non-zero counts', () => {
    expect(statsSummary({ additions: 3, deletions: 0, isNew: false })).toBe('+3');
    expect(statsSummary({ additions: 0, deletions: 0, isNew: false })).toBe('');
  });

  it('should mark new files in labels', () => {
    expect(nodeLabel('x.ts', { additions: 0, deletions: 0, isNew: true }, '\n')).toBe('🪴 x.ts');
    expect(nodeLabel('x.ts', { additions: 1, deletions: 2, isNew: false }, '<br/>')).toBe('x.ts<br/>+1 -2');
    expect(nodeLabel('x.ts', undefined, '\n')).toBe('x.ts');
  });
});

describe('createFormatter', () => {
  it('should create a formatter per output format', () => {
    expect(createFormatter('dot')).toBeInstanceOf(DotFormatter);
    expect(createFormatter('mermaid')).toBeInstanceOf(MermaidFormatter);
    expect(createFormatter('json')).toBeInstanceOf(JsonFormatter);
  });

  it('should reject unknown formats', () => {
    expect(isOutputFormat('svg')).toBe(false);
    expect(() => createFormatter('svg')).toThrow('Unknown output format: svg (expected one of dot, mermaid, json)');
  });
});
