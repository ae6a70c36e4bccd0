/**
 * Observer writing one log line per result
 */

import type { Logger } from '@stryker-mutator/api/logging';
import { ResultStatus, type UnitTestResult } from '../results/types.js';
import type { ResultObserver } from './types.js';

export class LoggingResultObserver implements ResultObserver {
    constructor(private readonly logger: Logger) {}

    onResult(result: UnitTestResult): void {
        const test = `${result.namespace}::${result.name}`;

        switch(result.status) {
            case ResultStatus.Pass:
                this.logger.info('PASS %s (%dms)', test, result.durationMs);
                break;
            case ResultStatus.Skip:
                this.logger.info('SKIP %s: %s', test, result.message);
                break;
            case ResultStatus.Fail:
                this.logger.warn('FAIL %s (%dms)\n%s', test, result.durationMs, result.message);
                break;
        }
    }
}
