/**
 * Reader for unit-engine.toml
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '@stryker-mutator/api/logging';
import { parse } from 'smol-toml';

export const CONFIG_FILE_NAME = 'unit-engine.toml';

export interface EngineConfigFile {
    coverage?: {
        enabled?: boolean
        paths?:   string[]
    }
    order?: {
        seed?: number
    }
    links?: {
        baseUri?: string
    }
}

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Pick the known keys out of a parsed TOML document.
 * Keys of the wrong type are reported through `onInvalid` and left out.
 */
export function toEngineConfig(document: unknown, onInvalid: (key: string) => void = () => undefined): EngineConfigFile {
    const config: EngineConfigFile = {};
    if(!isTable(document)) {
        return config;
    }

    const { coverage, order, links } = document;

    if(isTable(coverage)) {
        config.coverage = {};
        if(typeof coverage.enabled === 'boolean') {
            config.coverage.enabled = coverage.enabled;
        } else if(coverage.enabled !== undefined) {
            onInvalid('coverage.enabled');
        }
        if(isStringArray(coverage.paths)) {
            config.coverage.paths = coverage.paths;
        } else if(coverage.paths !== undefined) {
            onInvalid('coverage.paths');
        }
    }

    if(isTable(order)) {
        config.order = {};
        if(typeof order.seed === 'number' && Number.isInteger(order.seed) && order.seed >= 0) {
            config.order.seed = order.seed >>> 0;
        } else if(order.seed !== undefined) {
            onInvalid('order.seed');
        }
    }

    if(isTable(links)) {
        config.links = {};
        if(typeof links.base_uri === 'string') {
            config.links.baseUri = links.base_uri;
        } else if(links.base_uri !== undefined) {
            onInvalid('links.base_uri');
        }
    }

    return config;
}

/**
 * Read and parse unit-engine.toml from the given directory
 * @param cwd - Directory containing unit-engine.toml
 * @returns Parsed config, or undefined if the file doesn't exist or is not valid TOML
 */
export async function readEngineConfig(cwd: string, logger: Logger): Promise<EngineConfigFile | undefined> {
    const configPath = join(cwd, CONFIG_FILE_NAME);

    if(!existsSync(configPath)) {
        return undefined;
    }

    let document: unknown;
    try {
        document = parse(await readFile(configPath, 'utf-8'));
    } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        logger.warn('Ignoring %s, it could not be parsed: %s', configPath, errorMsg);
        return undefined;
    }

    logger.debug('Read engine configuration from %s', configPath);
    return toEngineConfig(document, (key) => {
        logger.warn('Ignoring invalid value for "%s" in %s', key, configPath);
    });
}
