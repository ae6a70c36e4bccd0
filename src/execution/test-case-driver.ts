/**
 * Test case driver
 * Discovers the test methods of a test case, shuffles them and runs each one
 */

import type { Logger } from '@stryker-mutator/api/logging';
import { commonTokens, tokens } from '@stryker-mutator/api/plugin';
import { CoverageSession } from '../coverage/coverage-session.js';
import type { CoverageProvider } from '../coverage/types.js';
import { buildSymbolLink } from '../links.js';
import type { ResolvedEngineOptions } from '../options.js';
import type { UnitTestResult } from '../results/types.js';
import type { TestCase } from '../test-case.js';
import { discoverTestMethods } from './method-discovery.js';
import { createRandomSource, randomSeed, shuffle } from './shuffle.js';
import { runTestMethod } from './test-method-runner.js';

/**
 * Injection tokens for the engine's own dependencies
 */
export const engineTokens = Object.freeze({
    options:          'engineOptions',
    coverageProvider: 'coverageProvider',
} as const);

/**
 * Runs every test method of a test case, one at a time, in shuffled order.
 * The order changes on every run unless a seed is configured.
 */
export class TestCaseDriver {
    public static readonly inject = tokens(commonTokens.logger, engineTokens.options, engineTokens.coverageProvider);

    private readonly coverage: CoverageSession;

    constructor(
        private readonly logger: Logger,
        private readonly options: ResolvedEngineOptions,
        coverageProvider: CoverageProvider | null
    ) {
        this.coverage = new CoverageSession(logger, coverageProvider, {
            enabled:     options.enableCoverage,
            projectRoot: options.projectRoot,
            paths:       options.paths,
        });

        this.logger.debug('TestCaseDriver initialized with options: %o', {
            enableCoverage: options.enableCoverage,
            paths:          options.paths,
            projectRoot:    options.projectRoot,
            seed:           options.seed,
            linkBaseUri:    options.linkBaseUri,
            observers:      options.observers.length,
        });
    }

    /**
     * Run all test methods of `testCase`
     *
     * @returns One result per discovered method, in the order they ran
     * @throws {FatalEngineError} on configuration or declaration errors; the run stops there
     */
    async run(testCase: TestCase): Promise<readonly UnitTestResult[]> {
        const namespace = testCase.constructor.name;
        const methods = discoverTestMethods(testCase);
        const seed = this.options.seed ?? randomSeed();
        const order = shuffle(Array.from(methods.keys()), createRandomSource(seed));

        this.logger.debug('Running %d test method(s) of %s with seed %d', order.length, namespace, seed);
        this.coverage.assertAvailable();

        const results: UnitTestResult[] = [];
        testCase.setResults(results);

        const linkBaseUri = this.options.linkBaseUri;
        const linkFor = linkBaseUri !== undefined
            ? (name: string) => buildSymbolLink(linkBaseUri, name, namespace)
            : undefined;

        await testCase.willRunTests();

        for(const name of order) {
            const method = methods.get(name);
            if(!method) {
                continue;
            }

            const result = await runTestMethod({
                testCase,
                namespace,
                name,
                method,
                coverage: this.coverage,
                logger:   this.logger,
                linkFor,
            });

            results.push(result);
            await this.notify(result);
        }

        await testCase.didRunTests();

        const finished = Object.freeze([...results]);
        testCase.setResults(finished);
        return finished;
    }

    /**
     * Release the coverage provider
     */
    async dispose(): Promise<void> {
        this.logger.debug('Disposing TestCaseDriver');
        await this.coverage.dispose();
    }

    private async notify(result: UnitTestResult): Promise<void> {
        for(const observer of this.options.observers) {
            try {
                await observer.onResult(result);
            } catch (error) {
                const errorMsg = error instanceof Error ? error.message : String(error);
                this.logger.error('Result observer failed for %s::%s: %s', result.namespace, result.name, errorMsg);
            }
        }
    }
}
