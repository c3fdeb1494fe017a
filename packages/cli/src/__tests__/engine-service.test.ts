import { afterEach, describe, it, expect } from 'vitest';

import { EngineBridge, EngineUnavailableError } from '@chesslens/engine';
import { parseFen, STARTING_FEN } from '@chesslens/rules';
import { createFakeEngineFactory, searchOutput } from '@chesslens/test-utils';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { Reporter } from '../progress/reporter.js';
import {
  bridgeConfigFrom,
  createEngineBridge,
  waitForFinalResult,
} from '../services/engine-service.js';

const bridges: EngineBridge[] = [];

afterEach(async () => {
  await Promise.all(bridges.splice(0).map((bridge) => bridge.close()));
});

describe('bridgeConfigFrom', () => {
  it('should carry the search budget and engine options', () => {
    const { factory } = createFakeEngineFactory();

    const config = bridgeConfigFrom(
      { ...DEFAULT_CONFIG, analysis: { ...DEFAULT_CONFIG.analysis, depth: 18, movetimeMs: 400 } },
      factory,
    );

    expect(config.budget).toEqual({ depth: 18, movetimeMs: 400 });
    expect(config.options).toEqual({ threads: 1, hashMb: 16, multiPv: 1 });
    expect(config.handshakeTimeoutMs).toBe(5000);
    expect(config.responseTimeoutMs).toBe(10000);
    expect(config.logger).toBeUndefined();
  });

  it('should leave depth out when unset', () => {
    const { factory } = createFakeEngineFactory();

    expect(bridgeConfigFrom(DEFAULT_CONFIG, factory).budget).toEqual({ movetimeMs: 100 });
  });
});

describe('createEngineBridge', () => {
  it('should return null when the engine is disabled', () => {
    const config = { ...DEFAULT_CONFIG, engine: { ...DEFAULT_CONFIG.engine, enabled: false } };

    expect(createEngineBridge(config, new Reporter({ silent: true }))).toBeNull();
  });
});

describe('waitForFinalResult', () => {
  function bridgeWith(engines: ReturnType<typeof createFakeEngineFactory>): EngineBridge {
    const bridge = new EngineBridge({
      ...bridgeConfigFrom(DEFAULT_CONFIG, engines.factory),
      budget: { movetimeMs: 10 },
      handshakeTimeoutMs: 50,
      responseTimeoutMs: 50,
      closeGraceMs: 20,
    });
    bridges.push(bridge);
    return bridge;
  }

  it('should resolve with the bestmove result', async () => {
    const bridge = bridgeWith(
      createFakeEngineFactory({ onGo: () => searchOutput('cp 35', ['e2e4', 'e7e5'], 14) }),
    );

    const done = waitForFinalResult(bridge, 1);
    bridge.requestAnalysis({ positionId: 1, board: parseFen(STARTING_FEN).unwrap() });
    const result = await done;

    expect(result.positionId).toBe(1);
    expect(result.isFinal).toBe(true);
    expect(result.depth).toBe(14);
    expect(result.score).toEqual({ kind: 'cp', value: 35 });
  });

  it('should reject when the search ends without a score', async () => {
    const bridge = bridgeWith(createFakeEngineFactory({ onGo: () => ['bestmove e2e4'] }));

    const done = waitForFinalResult(bridge, 1);
    bridge.requestAnalysis({ positionId: 1, board: parseFen(STARTING_FEN).unwrap() });

    await expect(done).rejects.toThrow(
      'Engine unavailable: malformed response (Malformed engine response "bestmove e2e4": no score before bestmove)',
    );
    expect(bridge.status).toBe('unavailable');
  });

  it('should reject when the engine cannot start', async () => {
    const bridge = bridgeWith(createFakeEngineFactory({ startError: new Error('spawn ENOENT') }));

    const done = waitForFinalResult(bridge, 1);
    bridge.requestAnalysis({ positionId: 1, board: parseFen(STARTING_FEN).unwrap() });

    await expect(done).rejects.toBeInstanceOf(EngineUnavailableError);
  });
});
