/**
 * Engine options and their resolution against the config file and environment
 */

import type { EngineConfigFile } from './config/engine-config-reader.js';
import type { ResultObserver } from './observers/types.js';

/**
 * Environment variable that fixes the shuffle seed, e.g. to replay a flaky order
 */
export const SEED_ENV_VARIABLE = 'UNIT_ENGINE_SEED';

/**
 * Configuration options accepted by the engine
 */
export interface EngineOptions {
    /**
     * Capture line coverage for every test method
     * @default false
     */
    enableCoverage?: boolean

    /**
     * Project-relative paths coverage is restricted to (e.g. the files of a change set).
     * Unset or empty keeps every file below the project root.
     */
    paths?: readonly string[]

    /**
     * Directory coverage paths are reported relative to
     * @default process.cwd()
     */
    projectRoot?: string

    /**
     * Seed for the execution order shuffle; a fresh one is drawn per run when unset
     */
    seed?: number

    /**
     * Base URI results link to; results carry no link when unset
     * @example 'https://code.example.test'
     */
    linkBaseUri?: string

    /**
     * Observers receiving each result as soon as it is produced
     */
    observers?: readonly ResultObserver[]
}

/**
 * Options with every default applied
 */
export interface ResolvedEngineOptions {
    enableCoverage: boolean
    paths:          readonly string[]
    projectRoot:    string
    seed?:          number
    linkBaseUri?:   string
    observers:      readonly ResultObserver[]
}

/**
 * Parse a seed from text; anything but a non-negative integer yields undefined
 */
export function parseSeed(value: string | undefined): number | undefined {
    if(value === undefined || !/^\d+$/.test(value.trim())) {
        return undefined;
    }
    return Number.parseInt(value.trim(), 10) >>> 0;
}

/**
 * Merge explicit options, environment and config file.
 * Explicit options win; the seed variable overrides the file's seed.
 */
export function resolveEngineOptions(
    options: EngineOptions = {},
    fileConfig?: EngineConfigFile,
    env: NodeJS.ProcessEnv = process.env
): ResolvedEngineOptions {
    return {
        enableCoverage: options.enableCoverage ?? fileConfig?.coverage?.enabled ?? false,
        paths:          options.paths ?? fileConfig?.coverage?.paths ?? [],
        projectRoot:    options.projectRoot ?? process.cwd(),
        seed:           options.seed ?? parseSeed(env[SEED_ENV_VARIABLE]) ?? fileConfig?.order?.seed,
        linkBaseUri:    options.linkBaseUri ?? fileConfig?.links?.baseUri,
        observers:      options.observers ?? [],
    };
}
