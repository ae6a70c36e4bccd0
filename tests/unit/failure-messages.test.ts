/**
 * Unit tests for assertion failure messages
 */

import { describe, it, expect } from 'vitest';
import {
  NO_ASSERTIONS_MESSAGE,
  equalityFailure,
  exceptionFailure,
  expectedValueFailure,
  failureType,
} from '../../src/assertions/failure-messages.js';
import { ControlSignal } from '../../src/execution/signals.js';

describe('failure-messages', () => {
  describe('expectedValueFailure', () => {
    it('should include the location and the actual value', () => {
      expect(expectedValueFailure('true', false, 'parser.test.ts:12'))
        .toBe("Assertion failed, expected 'true' (at parser.test.ts:12).\n\nACTUAL VALUE\nfalse");
    });

    it('should append the user message', () => {
      expect(expectedValueFailure('false', 'yes', undefined, 'flag must be cleared'))
        .toBe("Assertion failed, expected 'false': flag must be cleared\n\nACTUAL VALUE\n'yes'");
    });
  });

  describe('equalityFailure', () => {
    it('should show single-line values side by side', () => {
      expect(equalityFailure(1, '1', undefined))
        .toBe("Assertion failed, expected values to be equal.\nExpected: 1\n  Actual: '1'");
    });

    it('should diff multi-line values', () => {
      expect(equalityFailure('a\nb', 'a\nc', 'x.test.ts:3', 'rendered output'))
        .toBe('Assertion failed, expected values to be equal (at x.test.ts:3): rendered output\n'
          + 'Expected vs Actual Output Diff\n a\n-b\n+c');
    });
  });

  describe('failureType', () => {
    class ParseError extends Error {}

    it('should name the class of errors and objects', () => {
      expect(failureType(new ParseError('bad'))).toBe('ParseError');
      expect(failureType(new TypeError('bad'))).toBe('TypeError');
      expect(failureType({})).toBe('Object');
      expect(failureType(new ControlSignal('terminated', 'x'))).toBe('ControlSignal');
    });

    it('should fall back to typeof for primitives', () => {
      expect(failureType(null)).toBe('null');
      expect(failureType('oops')).toBe('string');
      expect(failureType(7)).toBe('number');
    });
  });

  describe('exceptionFailure', () => {
    it('should render type, message and stack frames', () => {
      const error = new Error('boom');
      error.stack = 'Error: boom\n    at parse (/src/parser.ts:1:1)\n    at run (/src/run.ts:2:2)';

      expect(exceptionFailure(error))
        .toBe('EXCEPTION (Error): boom\n    at parse (/src/parser.ts:1:1)\n    at run (/src/run.ts:2:2)');
    });

    it('should render thrown non-errors without a trace', () => {
      expect(exceptionFailure('oops')).toBe('EXCEPTION (string): oops\n');
    });
  });

  it('should explain that a test made no assertions', () => {
    expect(NO_ASSERTIONS_MESSAGE).toBe(
      'This test case made no assertions. Test cases must make at least one assertion.'
    );
  });
});
