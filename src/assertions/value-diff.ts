/**
 * Line diff between the expected and actual renderings
 */

import { diffLines } from 'diff';

function splitPart(value: string): string[] {
    const lines = value.split('\n');
    // A part ending in a newline yields a trailing empty element
    if(lines.length > 1 && lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

/**
 * Render a full-context unified diff: `-` lines are only in `expected`,
 * `+` lines only in `actual`, unchanged lines are prefixed with a space.
 */
export function renderDifferences(expected: string, actual: string): string {
    const output: string[] = [];

    for(const part of diffLines(expected, actual)) {
        const prefix = part.added ? '+' : part.removed ? '-' : ' ';
        for(const line of splitPart(part.value)) {
            output.push(`${prefix}${line}`);
        }
    }

    return output.join('\n');
}
