/**
 * Locate the user code that made a failing assertion
 */

import { basename, dirname, sep } from 'node:path';
import { fileURLToPath } from 'node:url';

// Frames inside the engine itself (src/ or dist/) are skipped
const engineRoot = dirname(dirname(fileURLToPath(import.meta.url)));

const FRAME_PATTERN = /(?:\(|\s)((?:file:\/\/)?[^\s()]+):(\d+):\d+\)?$/;

function toFilePath(location: string): string {
    return location.startsWith('file://') ? fileURLToPath(location) : location;
}

/**
 * Find the first stack frame outside the engine and describe it as `file:line`
 *
 * @param stack - A V8 stack trace, such as `new Error().stack`
 * @returns `basename:line` of the calling frame, or undefined when no frame qualifies
 */
export function findCallerLocation(stack: string | undefined): string | undefined {
    if(!stack) {
        return undefined;
    }

    for(const line of stack.split('\n').slice(1)) {
        const match = FRAME_PATTERN.exec(line.trim());
        if(!match) {
            continue;
        }

        const file = toFilePath(match[1]);
        if(file.startsWith('node:') || file.startsWith(engineRoot + sep)) {
            continue;
        }

        return `${basename(file)}:${match[2]}`;
    }

    return undefined;
}

/**
 * Location of the code currently calling into the engine
 */
export function currentCallerLocation(): string | undefined {
    return findCallerLocation(new Error().stack);
}
