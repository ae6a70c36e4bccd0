/**
 * Compact encoding and filtering of provider coverage
 */

import { isAbsolute, posix, relative, sep } from 'node:path';
import type { CoverageMap } from '../results/types.js';
import type { LineStatus, RawCoverage } from './types.js';

const LINE_CODES: Record<LineStatus, string> = {
    covered:      'C',
    uncovered:    'U',
    unexecutable: 'N',
};

/**
 * Encode per-line statuses as one character per line
 */
export function encodeLineStatuses(statuses: readonly LineStatus[]): string {
    return statuses.map(status => LINE_CODES[status]).join('');
}

export interface CoverageFilter {
    /** Only files below this directory are kept, keyed relative to it */
    projectRoot: string
    /** When non-empty, only these project-relative paths are kept */
    paths?:      readonly string[]
}

function toPosix(path: string): string {
    return path.split(sep).join('/');
}

/**
 * Project-relative, forward-slash form of a path, or undefined if it lies outside the project
 */
export function projectRelativePath(projectRoot: string, path: string): string | undefined {
    const rel = isAbsolute(path) ? relative(projectRoot, path) : path;
    if(rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
        return undefined;
    }
    return posix.normalize(toPosix(rel));
}

/**
 * Turn raw provider output into the map attached to a result
 */
export function toCoverageMap(raw: RawCoverage, filter: CoverageFilter): CoverageMap {
    const allowed = filter.paths && filter.paths.length > 0
        ? new Set(filter.paths
            .map(path => projectRelativePath(filter.projectRoot, path))
            .filter((path): path is string => path !== undefined))
        : undefined;

    const coverage: Record<string, string> = {};
    for(const [file, statuses] of Object.entries(raw)) {
        const key = projectRelativePath(filter.projectRoot, file);
        if(key === undefined || (allowed && !allowed.has(key))) {
            continue;
        }
        coverage[key] = encodeLineStatuses(statuses);
    }

    return coverage;
}
