/**
 * Engine composition root
 * Wires the driver and its collaborators through typed-inject
 */

import type { Logger } from '@stryker-mutator/api/logging';
import { commonTokens } from '@stryker-mutator/api/plugin';
import { createInjector } from 'typed-inject';
import { readEngineConfig } from './config/engine-config-reader.js';
import type { CoverageProvider } from './coverage/types.js';
import { V8CoverageProvider } from './coverage/v8-coverage-provider.js';
import { TestCaseDriver, engineTokens } from './execution/test-case-driver.js';
import { createLogger } from './logging/logger.js';
import { resolveEngineOptions, type EngineOptions } from './options.js';
import type { UnitTestResult } from './results/types.js';
import type { TestCase } from './test-case.js';

export interface CreateDriverOptions extends EngineOptions {
    /** @default a log4js logger for the engine category */
    logger?: Logger

    /**
     * Coverage provider to use when coverage is enabled.
     * Defaults to V8 precise coverage of the current process.
     */
    coverageProvider?: CoverageProvider

    /**
     * Directory searched for unit-engine.toml; `false` skips the file
     * @default projectRoot
     */
    configDir?: string | false
}

/**
 * Build a driver from explicit options, unit-engine.toml and the environment
 */
export async function createTestCaseDriver(options: CreateDriverOptions = {}): Promise<TestCaseDriver> {
    const logger = options.logger ?? createLogger();
    const configDir = options.configDir ?? options.projectRoot ?? process.cwd();
    const fileConfig = configDir === false ? undefined : await readEngineConfig(configDir, logger);
    const resolved = resolveEngineOptions(options, fileConfig);

    let coverageProvider: CoverageProvider | null = null;
    if(resolved.enableCoverage) {
        coverageProvider = options.coverageProvider
            ?? new V8CoverageProvider(logger, { rootDir: resolved.projectRoot });
    }

    return createInjector()
        .provideValue(commonTokens.logger, logger)
        .provideValue(engineTokens.options, resolved)
        .provideValue(engineTokens.coverageProvider, coverageProvider)
        .injectClass(TestCaseDriver);
}

/**
 * Run a single test case with a throwaway driver
 */
export async function runTestCase(
    testCase: TestCase,
    options: CreateDriverOptions = {}
): Promise<readonly UnitTestResult[]> {
    const driver = await createTestCaseDriver(options);
    try {
        return await driver.run(testCase);
    } finally {
        await driver.dispose();
    }
}
