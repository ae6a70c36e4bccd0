/**
 * Unit tests for InspectorSession
 * Runs against the in-process inspector of the test worker
 */

import { describe, it, expect, afterEach } from 'vitest';
import { InspectorSession, InspectorSessionError } from '../../src/inspector/inspector-session.js';

describe('InspectorSession', () => {
  let session: InspectorSession;

  afterEach(async () => {
    await session.close();
  });

  it('should reject requests before connecting', async () => {
    session = new InspectorSession();

    await expect(session.startPreciseCoverage()).rejects.toThrow(InspectorSessionError);
    expect(session.isConnected).toBe(false);
  });

  it('should allow closing without connecting, repeatedly', async () => {
    session = new InspectorSession();

    await session.close();
    await session.close();

    expect(session.isConnected).toBe(false);
  });

  it.skipIf(!process.features.inspector)('should capture precise coverage of this process', async () => {
    session = new InspectorSession();
    await session.connect();
    expect(session.isConnected).toBe(true);

    await session.startPreciseCoverage();
    const scripts = await session.takePreciseCoverage();
    await session.stopPreciseCoverage();

    expect(Array.isArray(scripts)).toBe(true);
    expect(scripts.length).toBeGreaterThan(0);
  });

  it.skipIf(!process.features.inspector)('should return the source of a covered script', async () => {
    session = new InspectorSession();
    await session.connect();
    await session.startPreciseCoverage();
    const scripts = await session.takePreciseCoverage();
    await session.stopPreciseCoverage();

    const script = scripts.find(candidate => candidate.url.startsWith('file://'));
    expect(script).toBeDefined();
    const source = await session.getScriptSource(script?.scriptId ?? '');

    expect(source.length).toBeGreaterThan(0);
  });

  it('should reject a source request before connecting', async () => {
    session = new InspectorSession();

    await expect(session.getScriptSource('1')).rejects.toThrow('Inspector session not connected: Debugger.getScriptSource');
  });

  it.skipIf(!process.features.inspector)('should refuse to connect twice', async () => {
    session = new InspectorSession();
    await session.connect();

    await expect(session.connect()).rejects.toThrow('Already connected');
  });
});
