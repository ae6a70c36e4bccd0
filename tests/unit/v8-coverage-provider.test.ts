/**
 * Unit tests for V8CoverageProvider
 * The inspector is replaced by an in-memory double
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Profiler } from 'node:inspector';
import type { Logger } from '@stryker-mutator/api/logging';
import { V8CoverageProvider, scriptPath } from '../../src/coverage/v8-coverage-provider.js';
import type { CoverageInspector } from '../../src/inspector/inspector-session.js';
import { createMockLogger } from '../helpers/mock-logger.js';

function script(url: string, count = 1): Profiler.ScriptCoverage {
  return {
    scriptId:  url,
    url,
    functions: [{ functionName: '', isBlockCoverage: true, ranges: [{ startOffset: 0, endOffset: 13, count }] }],
  };
}

describe('scriptPath', () => {
  it('should convert file URLs to paths', () => {
    expect(scriptPath('file:///project/src/a.ts')).toBe('/project/src/a.ts');
  });

  it('should keep absolute paths', () => {
    expect(scriptPath('/project/src/a.js')).toBe('/project/src/a.js');
  });

  it('should ignore internal and evaluated scripts', () => {
    expect(scriptPath('node:internal/modules/run_main')).toBeUndefined();
    expect(scriptPath('')).toBeUndefined();
  });
});

describe('V8CoverageProvider', () => {
  let logger: Logger;
  let inspector: CoverageInspector;
  let scripts: Profiler.ScriptCoverage[];

  beforeEach(() => {
    logger = createMockLogger();
    scripts = [
      script('file:///project/src/a.ts'),
      script('/project/node_modules/lib/index.js'),
      script('node:internal/process/task_queues'),
      script('/elsewhere/b.ts'),
    ];
    inspector = {
      connect:              vi.fn(async () => undefined),
      startPreciseCoverage: vi.fn(async () => undefined),
      takePreciseCoverage:  vi.fn(async () => scripts),
      stopPreciseCoverage:  vi.fn(async () => undefined),
      getScriptSource:      vi.fn(async () => 'const a = 1;\n'),
      close:                vi.fn(async () => undefined),
    };
  });

  it('should report availability from the process features', () => {
    const provider = new V8CoverageProvider(logger, { inspector });

    expect(provider.isAvailable()).toBe(process.features.inspector);
  });

  it('should connect once and start a capture per start()', async () => {
    const provider = new V8CoverageProvider(logger, { inspector, rootDir: '/project' });

    await provider.start();
    await provider.stop();
    await provider.start();

    expect(inspector.connect).toHaveBeenCalledTimes(1);
    expect(inspector.startPreciseCoverage).toHaveBeenCalledTimes(2);
  });

  it('should report project scripts only', async () => {
    const provider = new V8CoverageProvider(logger, { inspector, rootDir: '/project' });

    await provider.start();
    const coverage = await provider.stop();

    expect(coverage).toEqual({ '/project/src/a.ts': ['covered', 'unexecutable'] });
    expect(inspector.stopPreciseCoverage).toHaveBeenCalledTimes(1);
  });

  it('should report scripts anywhere outside node_modules without a root', async () => {
    const provider = new V8CoverageProvider(logger, { inspector });

    await provider.start();
    const coverage = await provider.stop();

    expect(Object.keys(coverage)).toEqual(['/project/src/a.ts', '/elsewhere/b.ts']);
  });

  it('should fetch each source once by script id', async () => {
    const provider = new V8CoverageProvider(logger, { inspector, rootDir: '/project' });

    await provider.start();
    await provider.stop();
    await provider.start();
    await provider.stop();

    expect(inspector.getScriptSource).toHaveBeenCalledTimes(1);
    expect(inspector.getScriptSource).toHaveBeenCalledWith('file:///project/src/a.ts');
  });

  it('should skip scripts whose source is unavailable', async () => {
    vi.mocked(inspector.getScriptSource).mockRejectedValue(new Error('No script for id'));
    const provider = new V8CoverageProvider(logger, { inspector, rootDir: '/project' });

    await provider.start();
    const coverage = await provider.stop();

    expect(coverage).toEqual({});
    expect(logger.debug).toHaveBeenCalledWith(
      'Skipping coverage for %s, source unavailable: %s',
      '/project/src/a.ts',
      'No script for id'
    );
  });

  it('should map offsets onto the executed source text', async () => {
    // A loader prepended a line the file on disk does not have
    scripts = [{
      scriptId:  '42',
      url:       'file:///project/src/b.ts',
      functions: [{
        functionName:    '',
        isBlockCoverage: true,
        ranges:          [{ startOffset: 0, endOffset: 23, count: 1 }, { startOffset: 11, endOffset: 23, count: 0 }],
      }],
    }];
    vi.mocked(inspector.getScriptSource).mockResolvedValue('init();\n\n  missed();');
    const provider = new V8CoverageProvider(logger, { inspector, rootDir: '/project' });

    await provider.start();

    expect(await provider.stop()).toEqual({ '/project/src/b.ts': ['covered', 'unexecutable', 'uncovered'] });
    expect(inspector.getScriptSource).toHaveBeenCalledWith('42');
  });

  it('should mark lines of a script that did not run as uncovered', async () => {
    scripts = [script('/project/src/a.ts', 0)];
    const provider = new V8CoverageProvider(logger, { inspector, rootDir: '/project' });

    await provider.start();

    expect(await provider.stop()).toEqual({ '/project/src/a.ts': ['uncovered', 'unexecutable'] });
  });

  it('should close the inspector on dispose only after connecting', async () => {
    const provider = new V8CoverageProvider(logger, { inspector });

    await provider.dispose();
    expect(inspector.close).not.toHaveBeenCalled();

    await provider.start();
    await provider.dispose();
    expect(inspector.close).toHaveBeenCalledTimes(1);
  });
});
