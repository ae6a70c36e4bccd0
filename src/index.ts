/**
 * unit-case-engine
 * Public API
 */

export { TestCase } from './test-case.js';
export type { ErrorClass, TestMethodName } from './test-case.js';

export { TestCaseDriver, engineTokens } from './execution/test-case-driver.js';
export { runTestMethod, classifyOutcome } from './execution/test-method-runner.js';
export type { TestMethodRunContext } from './execution/test-method-runner.js';
export { discoverTestMethods, scanDeclaredTestMethods } from './execution/method-discovery.js';
export type { TestMethod } from './execution/method-discovery.js';
export { shuffle, createRandomSource, randomSeed } from './execution/shuffle.js';
export {
    ControlSignal,
    isControlSignal,
    TestAggregateError,
    FatalEngineError,
    CoverageUnavailableError,
    TestDeclarationError,
} from './execution/signals.js';
export type { ControlSignalKind } from './execution/signals.js';

export { AssertionTracker } from './assertions/assertion-tracker.js';
export type { AssertionVerdict } from './assertions/assertion-tracker.js';

export { ResultStatus } from './results/types.js';
export type { UnitTestResult, CoverageMap } from './results/types.js';

export { CoverageSession } from './coverage/coverage-session.js';
export { toCoverageMap, encodeLineStatuses } from './coverage/line-coverage.js';
export { V8CoverageProvider } from './coverage/v8-coverage-provider.js';
export type { V8CoverageProviderOptions } from './coverage/v8-coverage-provider.js';
export type { CoverageProvider, LineStatus, RawCoverage } from './coverage/types.js';
export { InspectorSession, InspectorSessionError } from './inspector/inspector-session.js';

export type { ResultObserver } from './observers/types.js';
export { LoggingResultObserver } from './observers/logging-observer.js';
export { ResultStreamServer } from './observers/result-stream-server.js';
export type { ResultStreamMessage, ResultStreamServerOptions } from './observers/result-stream-server.js';

export { readEngineConfig, CONFIG_FILE_NAME } from './config/engine-config-reader.js';
export type { EngineConfigFile } from './config/engine-config-reader.js';
export { resolveEngineOptions, SEED_ENV_VARIABLE } from './options.js';
export type { EngineOptions, ResolvedEngineOptions } from './options.js';

export { createLogger, configureLogging } from './logging/logger.js';
export type { LogLevel } from './logging/logger.js';
export { buildSymbolLink } from './links.js';
export { createTestCaseDriver, runTestCase } from './engine.js';
export type { CreateDriverOptions } from './engine.js';
