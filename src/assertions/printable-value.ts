/**
 * Human-readable rendering of assertion operands
 */

import { inspect } from 'node:util';

/**
 * Render a value for an assertion message.
 * Multi-line strings are returned verbatim so they can be diffed line by line.
 */
export function printableValue(value: unknown): string {
    if(typeof value === 'string' && value.includes('\n')) {
        return value;
    }

    return inspect(value, {
        depth:       6,
        breakLength: 80,
        sorted:      true,
    });
}
