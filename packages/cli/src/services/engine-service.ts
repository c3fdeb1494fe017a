/**
 * Engine bridge construction from the resolved configuration
 */

import {
  type EngineBridgeConfig,
  type EvaluationResult,
  type TransportFactory,
  EngineBridge,
  EngineUnavailableError,
  ProcessTransport,
} from '@chesslens/engine';

import type { ChesslensConfig } from '../config/schema.js';
import type { Reporter } from '../progress/reporter.js';

/**
 * Bridge settings derived from the configuration. Kept separate from the
 * transport so tests can swap the process for an in-process engine.
 */
export function bridgeConfigFrom(
  config: ChesslensConfig,
  transportFactory: TransportFactory,
  reporter?: Reporter,
): EngineBridgeConfig {
  const { engine, analysis } = config;
  const bridgeConfig: EngineBridgeConfig = {
    transportFactory,
    budget:
      analysis.depth !== undefined
        ? { depth: analysis.depth, movetimeMs: analysis.movetimeMs }
        : { movetimeMs: analysis.movetimeMs },
    options: { threads: engine.threads, hashMb: engine.hashMb, multiPv: engine.multiPv },
    handshakeTimeoutMs: engine.handshakeTimeoutMs,
    responseTimeoutMs: engine.responseTimeoutMs,
  };
  if (reporter) {
    bridgeConfig.logger = reporter.engineLogger();
  }
  return bridgeConfig;
}

/**
 * Create the engine bridge, or null when analysis is switched off
 */
export function createEngineBridge(config: ChesslensConfig, reporter: Reporter): EngineBridge | null {
  if (!config.engine.enabled) {
    return null;
  }
  const logger = reporter.engineLogger();
  const factory: TransportFactory = () =>
    new ProcessTransport({ command: config.engine.path, args: config.engine.args, logger });
  return new EngineBridge(bridgeConfigFrom(config, factory, reporter));
}

/**
 * Wait for the engine's final answer for one position
 *
 * @throws EngineUnavailableError when the engine fails first
 */
export function waitForFinalResult(bridge: EngineBridge, positionId: number): Promise<EvaluationResult> {
  return new Promise((resolve, reject) => {
    const unsubscribe = bridge.onUpdate((event) => {
      if (event.type === 'result') {
        if (event.result.positionId === positionId && event.result.isFinal) {
          unsubscribe();
          resolve(event.result);
        }
        return;
      }
      if (event.status === 'unavailable' || event.status === 'closed') {
        unsubscribe();
        reject(bridge.lastError ?? new EngineUnavailableError(`engine ${event.status}`));
      }
    });
  });
}
