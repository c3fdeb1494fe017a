/**
 * Fake UCI engine transport for testing
 *
 * Stands in for an engine process: answers the handshake, records every
 * command and lets the test push output lines or kill the process.
 */

import type { EngineTransport, TransportExit } from '@chesslens/engine';
import { vi } from 'vitest';

export interface FakeEngineConfig {
  /** Answer `uci` and `isready` (default true) */
  handshake?: boolean;
  /** Lines sent back after `go`, given the FEN of the last `position` */
  onGo?: (fen: string) => readonly string[];
  /** Line sent back after `stop` while a search is running */
  stopReply?: string;
  /** Exit when `quit` arrives (default true) */
  exitOnQuit?: boolean;
  /** Make `start` reject, as when the executable is missing */
  startError?: Error;
}

/**
 * Default engine name reported in the handshake
 */
export const FAKE_ENGINE_NAME = 'FakeFish 1.0';

/**
 * Create a fake engine that implements the transport interface
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createFakeEngine(config: FakeEngineConfig = {}) {
  const { handshake = true, onGo, stopReply = 'bestmove 0000', exitOnQuit = true, startError } = config;

  const lineListeners: Array<(line: string) => void> = [];
  const exitListeners: Array<(exit: TransportExit) => void> = [];
  const sent: string[] = [];
  let running = false;
  let exited = false;
  let searching = false;
  let lastFen = '';

  const deliver = (lines: readonly string[]): void => {
    queueMicrotask(() => {
      for (const line of lines) {
        if (exited) return;
        if (line.startsWith('bestmove')) searching = false;
        for (const listener of lineListeners) listener(line);
      }
    });
  };

  const exit = (info: TransportExit = { code: 0, signal: null }): void => {
    if (exited) return;
    exited = true;
    running = false;
    searching = false;
    for (const listener of exitListeners) listener(info);
  };

  const handle = (line: string): void => {
    const [command = ''] = line.split(' ');
    switch (command) {
      case 'uci':
        if (handshake) deliver([`id name ${FAKE_ENGINE_NAME}`, 'id author Test', 'uciok']);
        break;
      case 'isready':
        if (handshake) deliver(['readyok']);
        break;
      case 'position':
        lastFen = line.replace(/^position fen /, '');
        break;
      case 'go':
        searching = true;
        if (onGo) deliver(onGo(lastFen));
        break;
      case 'stop':
        if (searching) deliver([stopReply]);
        break;
      case 'quit':
        if (exitOnQuit) queueMicrotask(() => exit({ code: 0, signal: null }));
        break;
      default:
        break;
    }
  };

  const start = vi.fn(async (): Promise<void> => {
    if (startError) {
      throw startError;
    }
    running = true;
  });

  const send = vi.fn((line: string): void => {
    if (!running || exited) {
      throw new Error(`fake engine is not running (sent "${line}")`);
    }
    sent.push(line);
    handle(line);
  });

  const close = vi.fn((): void => {
    exit({ code: null, signal: 'SIGTERM' });
  });

  const transport: EngineTransport = {
    start,
    send,
    onLine: (listener) => {
      lineListeners.push(listener);
    },
    onExit: (listener) => {
      exitListeners.push(listener);
    },
    close,
  };

  return {
    transport,
    start,
    send,
    close,
    /** Every command received, in order */
    sent,
    /** Push output lines as if the engine printed them */
    emit: (...lines: string[]): void => {
      for (const line of lines) {
        if (line.startsWith('bestmove')) searching = false;
        for (const listener of lineListeners) listener(line);
      }
    },
    /** Simulate the process going away */
    crash: (info: TransportExit = { code: 1, signal: null }): void => exit(info),
    get exited(): boolean {
      return exited;
    },
    get searching(): boolean {
      return searching;
    },
    get lastFen(): string {
      return lastFen;
    },
  };
}

export type FakeEngine = ReturnType<typeof createFakeEngine>;

/**
 * Create a transport factory that hands out a fresh fake engine per start
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createFakeEngineFactory(
  config: FakeEngineConfig | ((index: number) => FakeEngineConfig) = {},
) {
  const engines: FakeEngine[] = [];

  const factory = vi.fn((): EngineTransport => {
    const engine = createFakeEngine(typeof config === 'function' ? config(engines.length) : config);
    engines.push(engine);
    return engine.transport;
  });

  return {
    factory,
    engines,
    /** Most recently created engine */
    latest: (): FakeEngine => {
      const engine = engines[engines.length - 1];
      if (!engine) {
        throw new Error('no fake engine has been created');
      }
      return engine;
    },
  };
}

export type FakeEngineFactory = ReturnType<typeof createFakeEngineFactory>;

/**
 * Output of a short search: one scored info line and its bestmove
 */
export function searchOutput(score: string, pv: readonly string[], depth = 12): string[] {
  const [best = '0000'] = pv;
  return [`info depth ${depth} multipv 1 score ${score} nodes 1000 pv ${pv.join(' ')}`, `bestmove ${best}`];
}
