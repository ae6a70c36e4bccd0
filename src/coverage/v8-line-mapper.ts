/**
 * Map V8 block coverage ranges onto source lines
 */

import type { Profiler } from 'node:inspector';
import type { LineStatus } from './types.js';

const PUNCTUATION_ONLY = /^[{}()[\];,]+$/;

/**
 * Whether a line can never execute on its own: blank, comment or bracket punctuation
 *
 * @param inBlockComment - The line starts inside an unterminated block comment
 */
export function isUnexecutableLine(text: string, inBlockComment = false): boolean {
    const trimmed = text.trim();
    return inBlockComment
        || trimmed === ''
        || trimmed.startsWith('//')
        || trimmed.startsWith('/*')
        || PUNCTUATION_ONLY.test(trimmed);
}

/**
 * Whether a block comment is still open at the end of the line
 */
function blockCommentOpenAfter(trimmed: string, inBlockComment: boolean): boolean {
    const searchFrom = inBlockComment ? 0 : trimmed.startsWith('/*') ? 2 : -1;
    return searchFrom >= 0 && !trimmed.includes('*/', searchFrom);
}

interface SourceLine {
    /** Offset of the first non-whitespace character, or -1 for unexecutable lines */
    codeOffset: number
}

function indexLines(source: string): SourceLine[] {
    const lines: SourceLine[] = [];
    let offset = 0;
    let inBlockComment = false;

    for(const text of source.split('\n')) {
        const indent = text.length - text.trimStart().length;
        lines.push({ codeOffset: isUnexecutableLine(text, inBlockComment) ? -1 : offset + indent });
        inBlockComment = blockCommentOpenAfter(text.trim(), inBlockComment);
        offset += text.length + 1;
    }

    return lines;
}

/**
 * Classify every line of `source` from a script's V8 function coverage.
 *
 * Ranges are applied outermost first, so a nested block's count overrides
 * the count of the function around it. A line takes the count of the
 * innermost range containing its first non-whitespace character.
 */
export function lineStatusesFromFunctions(
    source: string,
    functions: readonly Profiler.FunctionCoverage[]
): LineStatus[] {
    const lines = indexLines(source);
    const statuses: LineStatus[] = lines.map(line => (line.codeOffset < 0 ? 'unexecutable' : 'uncovered'));

    const ranges = functions
        .flatMap(fn => fn.ranges)
        .map((range, order) => ({ range, order }))
        .sort((a, b) => {
            const widthDifference = (b.range.endOffset - b.range.startOffset) - (a.range.endOffset - a.range.startOffset);
            return widthDifference !== 0 ? widthDifference : a.order - b.order;
        });

    for(const { range } of ranges) {
        const status: LineStatus = range.count > 0 ? 'covered' : 'uncovered';
        lines.forEach((line, index) => {
            if(line.codeOffset >= range.startOffset && line.codeOffset < range.endOffset) {
                statuses[index] = status;
            }
        });
    }

    return statuses;
}
