/**
 * Unit tests for caller-location
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { findCallerLocation } from '../../src/assertions/caller-location.js';

const srcDir = fileURLToPath(new URL('../../src/', import.meta.url));

describe('findCallerLocation', () => {
  it('should return the first frame outside the engine', () => {
    const stack = [
      'Error',
      `    at currentCallerLocation (${srcDir}assertions/caller-location.ts:40:12)`,
      `    at ParserTest.assertTrue (${srcDir}test-case.ts:47:9)`,
      '    at ParserTest.testParse (/home/dev/project/tests/parser.test.ts:12:14)',
    ].join('\n');

    expect(findCallerLocation(stack)).toBe('parser.test.ts:12');
  });

  it('should skip node internals', () => {
    const stack = [
      'Error',
      '    at process.processTicksAndRejections (node:internal/process/task_queues:95:5)',
      '    at async /home/dev/project/tests/async.test.ts:30:3',
    ].join('\n');

    expect(findCallerLocation(stack)).toBe('async.test.ts:30');
  });

  it('should accept file URLs', () => {
    const stack = 'Error\n    at file:///home/dev/project/tests/url.test.ts:7:3';

    expect(findCallerLocation(stack)).toBe('url.test.ts:7');
  });

  it('should return undefined without a usable frame', () => {
    expect(findCallerLocation(undefined)).toBeUndefined();
    expect(findCallerLocation('Error\n    at <anonymous>')).toBeUndefined();
  });
});
