/**
 * Scoped coverage capture around a single test method
 */

import type { Logger } from '@stryker-mutator/api/logging';
import type { CoverageMap } from '../results/types.js';
import { CoverageUnavailableError } from '../execution/signals.js';
import { toCoverageMap, type CoverageFilter } from './line-coverage.js';
import type { CoverageProvider } from './types.js';

export interface CoverageSessionOptions extends CoverageFilter {
    enabled: boolean
}

/**
 * Owns the provider for the duration of one test method: `begin()` before
 * the body, `end()` on every exit path. When coverage is disabled both are
 * no-ops and `end()` yields an empty map.
 */
export class CoverageSession {
    private active = false;

    constructor(
        private readonly logger: Logger,
        private readonly provider: CoverageProvider | null,
        private readonly options: CoverageSessionOptions
    ) {}

    get enabled(): boolean {
        return this.options.enabled;
    }

    get isActive(): boolean {
        return this.active;
    }

    /**
     * @throws {CoverageUnavailableError} if coverage is enabled without a usable provider
     */
    assertAvailable(): void {
        if(!this.options.enabled) {
            return;
        }
        if(!this.provider?.isAvailable()) {
            throw new CoverageUnavailableError(
                'Code coverage is enabled, but no coverage provider is available in this process.'
            );
        }
    }

    async begin(): Promise<void> {
        if(!this.options.enabled) {
            return;
        }

        this.assertAvailable();
        if(this.active) {
            throw new Error('A coverage capture is already active; end it before starting another.');
        }

        await this.requireProvider().start();
        this.active = true;
        this.logger.trace('Coverage capture started');
    }

    async end(): Promise<CoverageMap> {
        if(!this.options.enabled || !this.active) {
            return {};
        }

        this.active = false;
        const raw = await this.requireProvider().stop();
        const coverage = toCoverageMap(raw, this.options);
        this.logger.trace('Coverage capture stopped: %d of %d file(s) kept',
            Object.keys(coverage).length, Object.keys(raw).length);
        return coverage;
    }

    async dispose(): Promise<void> {
        if(this.provider?.dispose) {
            await this.provider.dispose();
        }
    }

    private requireProvider(): CoverageProvider {
        if(!this.provider) {
            throw new CoverageUnavailableError('No coverage provider configured.');
        }
        return this.provider;
    }
}
