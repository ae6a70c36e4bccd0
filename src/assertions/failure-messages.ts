/**
 * Failure message formatting for the assertion primitives and the runner
 */

import { printableValue } from './printable-value.js';
import { renderDifferences } from './value-diff.js';
import { isControlSignal } from '../execution/signals.js';

export const NO_ASSERTIONS_MESSAGE
    = 'This test case made no assertions. Test cases must make at least one assertion.';

function headline(summary: string, location: string | undefined, message: string | undefined): string {
    const at = location ? ` (at ${location})` : '';
    return message !== undefined ? `${summary}${at}: ${message}` : `${summary}${at}.`;
}

/**
 * Message for assertTrue/assertFalse style checks against a fixed expectation
 */
export function expectedValueFailure(
    expectDescription: string,
    actual: unknown,
    location: string | undefined,
    message?: string
): string {
    const description = headline(`Assertion failed, expected '${expectDescription}'`, location, message);
    return `${description}\n\nACTUAL VALUE\n${printableValue(actual)}`;
}

/**
 * Message for a failed assertEqual. Multi-line renderings are shown as a diff.
 */
export function equalityFailure(
    expected: unknown,
    actual: unknown,
    location: string | undefined,
    message?: string
): string {
    const expectedText = printableValue(expected);
    const actualText = printableValue(actual);
    const output = headline('Assertion failed, expected values to be equal', location, message);

    if(!expectedText.includes('\n') && !actualText.includes('\n')) {
        return `${output}\nExpected: ${expectedText}\n  Actual: ${actualText}`;
    }

    return `${output}\nExpected vs Actual Output Diff\n${renderDifferences(expectedText, actualText)}`;
}

/**
 * Name of the class a thrown value was created from
 */
export function failureType(failure: unknown): string {
    if(failure instanceof Error) {
        return failure.constructor.name || failure.name;
    }
    if(failure === null) {
        return 'null';
    }
    if(typeof failure === 'object') {
        return failure.constructor?.name ?? 'Object';
    }
    return typeof failure;
}

/**
 * Stack frames of an Error, without the leading "Type: message" header
 */
function stackFrames(failure: Error): string {
    if(!failure.stack) {
        return '';
    }
    return failure.stack
        .split('\n')
        .filter(line => line.trimStart().startsWith('at '))
        .join('\n');
}

/**
 * Describe an unexpected failure: `EXCEPTION (Type): message` followed by its trace
 */
export function exceptionFailure(failure: unknown): string {
    const message = failure instanceof Error || isControlSignal(failure)
        ? failure.message
        : String(failure);
    const trace = failure instanceof Error ? stackFrames(failure) : '';

    return `EXCEPTION (${failureType(failure)}): ${message}\n${trace}`;
}
