/**
 * Unit tests for mapping V8 ranges onto lines
 */

import { describe, it, expect } from 'vitest';
import { isUnexecutableLine, lineStatusesFromFunctions } from '../../src/coverage/v8-line-mapper.js';

describe('isUnexecutableLine', () => {
  it('should flag blank, comment and punctuation-only lines', () => {
    expect(isUnexecutableLine('')).toBe(true);
    expect(isUnexecutableLine('    ')).toBe(true);
    expect(isUnexecutableLine('  // note')).toBe(true);
    expect(isUnexecutableLine('/**')).toBe(true);
    expect(isUnexecutableLine(' * @param x', true)).toBe(true);
    expect(isUnexecutableLine('  });')).toBe(true);
    expect(isUnexecutableLine('}')).toBe(true);
  });

  it('should keep statements executable', () => {
    expect(isUnexecutableLine('return 1;')).toBe(false);
    expect(isUnexecutableLine('} else {')).toBe(false);
    expect(isUnexecutableLine('const a = [];')).toBe(false);
  });

  it('should keep a multiplication continuing the previous line executable', () => {
    expect(isUnexecutableLine('  * factor;')).toBe(false);
  });
});

describe('lineStatusesFromFunctions', () => {
  // Offsets: line 0 at 0, line 1 at 16, line 2 at 27, line 4 at 45, line 6 at 59
  const source = [
    'function f(x) {',
    '  if (x) {',
    '    return 1;',
    '  }',
    '  return 2;',
    '}',
    'f(false);',
  ].join('\n');

  it('should let nested ranges override their enclosing function', () => {
    const statuses = lineStatusesFromFunctions(source, [
      {
        functionName:    '',
        isBlockCoverage: true,
        ranges:          [{ startOffset: 0, endOffset: 68, count: 1 }],
      },
      {
        functionName:    'f',
        isBlockCoverage: true,
        ranges:          [
          { startOffset: 0, endOffset: 58, count: 1 },
          { startOffset: 25, endOffset: 44, count: 0 },
        ],
      },
    ]);

    expect(statuses).toEqual([
      'covered',
      'covered',
      'uncovered',
      'unexecutable',
      'covered',
      'unexecutable',
      'covered',
    ]);
  });

  it('should tell comment bodies apart from expression continuations', () => {
    const statuses = lineStatusesFromFunctions([
      '/**',
      ' * Scale a value',
      ' */',
      'const scaled = base',
      '  * factor;',
      '/* one-liner */',
      'use(scaled);',
    ].join('\n'), []);

    expect(statuses).toEqual([
      'unexecutable',
      'unexecutable',
      'unexecutable',
      'uncovered',
      'uncovered',
      'unexecutable',
      'uncovered',
    ]);
  });

  it('should mark executable lines outside every range as uncovered', () => {
    expect(lineStatusesFromFunctions('a();\n\nb();', [])).toEqual(['uncovered', 'unexecutable', 'uncovered']);
  });

  it('should mark a function that never ran as uncovered', () => {
    const statuses = lineStatusesFromFunctions(source, [
      {
        functionName:    '',
        isBlockCoverage: false,
        ranges:          [{ startOffset: 0, endOffset: 68, count: 1 }],
      },
      {
        functionName:    'f',
        isBlockCoverage: false,
        ranges:          [{ startOffset: 0, endOffset: 58, count: 0 }],
      },
    ]);

    expect(statuses).toEqual([
      'uncovered',
      'uncovered',
      'uncovered',
      'unexecutable',
      'uncovered',
      'unexecutable',
      'covered',
    ]);
  });
});
