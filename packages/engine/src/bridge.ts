/**
 * Engine Bridge
 *
 * Keeps one UCI engine process busy with the most recently requested
 * position. Requests never block: a newer position stops the running search,
 * the stale output is drained and dropped, and the new search starts once the
 * engine has answered the old one. Results land in a single slot tagged with
 * the position they belong to.
 */

import {
  type Board,
  type Move,
  findLegalMove,
  legalMoves,
  parseCoordinateMove,
  toFen,
} from '@chesslens/rules';

import {
  EngineError,
  EngineTimeoutError,
  EngineUnavailableError,
  MalformedResponseError,
  toError,
} from './errors.js';
import { normalizeScore } from './score.js';
import type { EngineTransport, TransportExit, TransportFactory } from './transport/types.js';
import type {
  AnalysisBudget,
  BridgeEvent,
  EngineLogger,
  EngineOptions,
  EngineStatus,
  EvaluationResult,
  PositionSnapshot,
} from './types.js';
import {
  IS_READY,
  QUIT,
  STOP,
  UCI,
  type UciBestMove,
  type UciInfo,
  goCommand,
  parseEngineLine,
  positionCommand,
  setOptionCommand,
} from './uci/protocol.js';

/**
 * Configuration for the engine bridge
 */
export interface EngineBridgeConfig {
  /** Creates a fresh transport for every (re)start */
  transportFactory: TransportFactory;
  budget?: AnalysisBudget;
  options?: EngineOptions;
  /** Time allowed for each handshake step */
  handshakeTimeoutMs?: number;
  /** Time allowed for bestmove beyond the search budget */
  responseTimeoutMs?: number;
  /** Time between `quit` and killing the process on close */
  closeGraceMs?: number;
  logger?: EngineLogger;
  now?: () => number;
}

export const DEFAULT_BRIDGE_CONFIG = {
  budget: { movetimeMs: 100 },
  handshakeTimeoutMs: 5000,
  responseTimeoutMs: 10000,
  closeGraceMs: 1000,
} as const;

/**
 * A position prepared for the engine
 */
interface AnalysisRequest {
  readonly positionId: number;
  readonly board: Board;
  readonly fen: string;
  readonly legal: readonly Move[];
}

interface HandshakeWaiter {
  token: 'uciok' | 'readyok';
  resolve: () => void;
  reject: (error: Error) => void;
}

type Timer = ReturnType<typeof setTimeout>;

function prepare(snapshot: PositionSnapshot): AnalysisRequest {
  return {
    positionId: snapshot.positionId,
    board: snapshot.board,
    fen: toFen(snapshot.board),
    legal: legalMoves(snapshot.board),
  };
}

export class EngineBridge {
  private readonly transportFactory: TransportFactory;
  private readonly budget: AnalysisBudget;
  private readonly options: EngineOptions;
  private readonly handshakeTimeoutMs: number;
  private readonly responseTimeoutMs: number;
  private readonly closeGraceMs: number;
  private readonly logger: EngineLogger | undefined;
  private readonly now: () => number;

  private transport: EngineTransport | null = null;
  private statusValue: EngineStatus = 'idle';
  private error: EngineError | null = null;
  private startPromise: Promise<void> | null = null;
  private waiter: HandshakeWaiter | null = null;
  private responseTimer: Timer | null = null;

  /** Most recently requested position */
  private requested: AnalysisRequest | null = null;
  /** Position the engine is searching until its bestmove arrives */
  private active: AnalysisRequest | null = null;
  private stopSent = false;
  private slot: EvaluationResult | null = null;
  private discarded = 0;
  private readonly listeners = new Set<(event: BridgeEvent) => void>();

  constructor(config: EngineBridgeConfig) {
    this.transportFactory = config.transportFactory;
    this.budget = config.budget ?? DEFAULT_BRIDGE_CONFIG.budget;
    this.options = config.options ?? {};
    this.handshakeTimeoutMs = config.handshakeTimeoutMs ?? DEFAULT_BRIDGE_CONFIG.handshakeTimeoutMs;
    this.responseTimeoutMs = config.responseTimeoutMs ?? DEFAULT_BRIDGE_CONFIG.responseTimeoutMs;
    this.closeGraceMs = config.closeGraceMs ?? DEFAULT_BRIDGE_CONFIG.closeGraceMs;
    this.logger = config.logger;
    this.now = config.now ?? Date.now;
  }

  get status(): EngineStatus {
    return this.statusValue;
  }

  /**
   * Error behind the current `unavailable` status, if any
   */
  get lastError(): EngineError | null {
    return this.error;
  }

  /**
   * Number of results dropped because their position was superseded
   */
  get discardedCount(): number {
    return this.discarded;
  }

  get isAvailable(): boolean {
    return this.statusValue === 'ready' || this.statusValue === 'analysing';
  }

  /**
   * Launch the engine and complete the UCI handshake
   *
   * @throws EngineUnavailableError when the process cannot be started or
   *   does not complete the handshake in time
   */
  start(): Promise<void> {
    if (this.statusValue === 'closed') {
      return Promise.reject(new EngineError('engine bridge is closed'));
    }
    if (this.isAvailable) {
      return Promise.resolve();
    }
    if (!this.startPromise) {
      this.startPromise = this.launch().finally(() => {
        this.startPromise = null;
      });
    }
    return this.startPromise;
  }

  /**
   * Ask for analysis of a position. Returns immediately; results arrive
   * through `readLatest` and `onUpdate`.
   */
  requestAnalysis(snapshot: PositionSnapshot): void {
    if (this.statusValue === 'closed') return;

    const sameTag = this.requested?.positionId === snapshot.positionId;
    const needsStart = this.statusValue === 'idle' || this.statusValue === 'unavailable';
    if (sameTag && !needsStart) return;

    if (!sameTag) {
      this.requested = prepare(snapshot);
    }

    if (needsStart) {
      void this.startInBackground();
      return;
    }
    if (this.statusValue === 'starting') {
      // dispatched once the handshake completes
      return;
    }
    if (this.active) {
      this.stopActiveSearch();
      return;
    }
    this.dispatchPending();
  }

  /**
   * Latest result for the currently requested position, or null
   */
  readLatest(): EvaluationResult | null {
    const slot = this.slot;
    if (!slot || !this.requested || slot.positionId !== this.requested.positionId) {
      return null;
    }
    return slot;
  }

  /**
   * Subscribe to status changes and new results
   *
   * @returns unsubscribe function
   */
  onUpdate(listener: (event: BridgeEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Send `quit` and give the process a grace period before killing it
   */
  close(): Promise<void> {
    if (this.statusValue === 'closed') {
      return Promise.resolve();
    }

    const transport = this.transport;
    this.transport = null;
    this.clearResponseTimer();
    this.rejectWaiter(new EngineError('engine bridge closed'));
    this.active = null;
    this.requested = null;
    this.slot = null;
    this.setStatus('closed');

    if (!transport) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        transport.close();
        resolve();
      }, this.closeGraceMs);

      transport.onExit(() => {
        clearTimeout(timer);
        resolve();
      });

      try {
        transport.send(STOP);
        transport.send(QUIT);
      } catch (error) {
        this.logger?.debug(`Could not send quit: ${toError(error).message}`);
        clearTimeout(timer);
        transport.close();
        resolve();
      }
    });
  }

  private async launch(): Promise<void> {
    this.setStatus('starting');
    this.error = null;

    const transport = this.transportFactory();
    this.transport = transport;
    transport.onLine((line) => this.handleLine(transport, line));
    transport.onExit((exit) => this.handleExit(transport, exit));

    try {
      await transport.start();
      this.send(UCI);
      await this.waitFor('uciok');
      for (const command of this.optionCommands()) {
        this.send(command);
      }
      this.send(IS_READY);
      await this.waitFor('readyok');
    } catch (error) {
      throw this.fail('engine failed to start', toError(error));
    }

    if (this.transport !== transport) {
      throw this.error ?? new EngineUnavailableError('engine stopped during start');
    }

    this.logger?.debug('Engine ready');
    this.setStatus('ready');
    this.dispatchPending();
  }

  private async startInBackground(): Promise<void> {
    try {
      await this.start();
    } catch (error) {
      // Held as lastError; the next request retries
      this.logger?.debug(`Analysis disabled: ${toError(error).message}`);
    }
  }

  private optionCommands(): string[] {
    const commands: string[] = [];
    if (this.options.threads !== undefined) {
      commands.push(setOptionCommand('Threads', this.options.threads));
    }
    if (this.options.hashMb !== undefined) {
      commands.push(setOptionCommand('Hash', this.options.hashMb));
    }
    if (this.options.multiPv !== undefined) {
      commands.push(setOptionCommand('MultiPV', this.options.multiPv));
    }
    return commands;
  }

  private send(line: string): void {
    if (!this.transport) {
      throw new EngineError(`cannot send "${line}": no engine process`);
    }
    this.logger?.debug(`→ ${line}`);
    this.transport.send(line);
  }

  private waitFor(token: 'uciok' | 'readyok'): Promise<void> {
    const timeoutMs = this.handshakeTimeoutMs;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new EngineTimeoutError(token === 'uciok' ? UCI : IS_READY, timeoutMs));
      }, timeoutMs);

      this.waiter = {
        token,
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
    });
  }

  private rejectWaiter(error: Error): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(error);
  }

  private dispatchPending(): void {
    const request = this.requested;
    if (!request || !this.transport || this.active) return;

    const slot = this.slot;
    if (slot?.positionId === request.positionId && slot.isFinal) {
      this.setStatus('ready');
      return;
    }

    try {
      this.send(positionCommand(request.fen));
      this.send(goCommand(this.budget));
    } catch (error) {
      this.fail('could not send the position', toError(error));
      return;
    }
    this.active = request;
    this.stopSent = false;
    this.setStatus('analysing');
    this.armResponseTimer('go', (this.budget.movetimeMs ?? 0) + this.responseTimeoutMs);
  }

  private stopActiveSearch(): void {
    if (this.stopSent) return;
    try {
      this.send(STOP);
    } catch (error) {
      this.fail('could not stop the search', toError(error));
      return;
    }
    this.stopSent = true;
    this.armResponseTimer(STOP, this.responseTimeoutMs);
  }

  private handleLine(transport: EngineTransport, line: string): void {
    if (transport !== this.transport) return;
    this.logger?.debug(`← ${line}`);

    const parsed = parseEngineLine(line);
    if (parsed.isErr) {
      this.fail('malformed response', parsed.error);
      return;
    }

    const message = parsed.value;
    switch (message.type) {
      case 'uciok':
      case 'readyok':
        if (this.waiter?.token === message.type) {
          const waiter = this.waiter;
          this.waiter = null;
          waiter.resolve();
        }
        break;
      case 'info':
        this.handleInfo(message.info, line);
        break;
      case 'bestmove':
        this.handleBestMove(message.bestMove, line);
        break;
      default:
        break;
    }
  }

  private handleInfo(info: UciInfo, line: string): void {
    const active = this.active;
    if (!active || info.score === undefined || (info.multipv ?? 1) !== 1) return;

    if (active !== this.requested) {
      this.discarded++;
      return;
    }

    let bestMove: Move | null = null;
    const first = info.pv[0];
    if (first !== undefined) {
      bestMove = this.resolveMove(active, first);
      if (!bestMove) {
        this.fail('malformed response', new MalformedResponseError(line, `${first} is not legal here`));
        return;
      }
    }

    const previous = this.slot?.positionId === active.positionId ? this.slot : null;
    this.publish({
      positionId: active.positionId,
      fen: active.fen,
      score: normalizeScore(info.score, active.board.turn),
      bestMove: bestMove ?? previous?.bestMove ?? null,
      pv: info.pv.length > 0 ? info.pv : previous?.pv ?? [],
      depth: info.depth ?? previous?.depth ?? 0,
      isFinal: false,
      receivedAt: this.now(),
    });
  }

  private handleBestMove(best: UciBestMove, line: string): void {
    const active = this.active;
    if (!active) {
      this.logger?.debug(`Ignoring unexpected "${line}"`);
      return;
    }

    this.clearResponseTimer();
    this.active = null;
    this.stopSent = false;

    if (active !== this.requested) {
      this.discarded++;
      this.logger?.debug(`Discarded stale result for position ${active.positionId}`);
      this.dispatchPending();
      return;
    }

    let bestMove: Move | null = null;
    if (best.move !== null) {
      bestMove = this.resolveMove(active, best.move);
      if (!bestMove) {
        this.fail('malformed response', new MalformedResponseError(line, `${best.move} is not legal here`));
        return;
      }
    }

    const previous = this.slot?.positionId === active.positionId ? this.slot : null;
    if (!previous) {
      // Every search ends in a final result; without a score there is none to give
      this.fail('malformed response', new MalformedResponseError(line, 'no score before bestmove'));
      return;
    }
    this.publish({ ...previous, bestMove, isFinal: true, receivedAt: this.now() });
    this.setStatus('ready');
  }

  private handleExit(transport: EngineTransport, exit: TransportExit): void {
    if (transport !== this.transport) return;
    const signal = exit.signal ? `, signal ${exit.signal}` : '';
    const cause = exit.error ?? new EngineError(`process exited (code ${exit.code ?? 'none'}${signal})`);
    this.fail('engine process ended', cause);
  }

  private resolveMove(request: AnalysisRequest, text: string): Move | null {
    const parsed = parseCoordinateMove(text);
    return parsed ? findLegalMove(request.legal, parsed) : null;
  }

  private publish(result: EvaluationResult): void {
    this.slot = result;
    this.emit({ type: 'result', result });
  }

  private armResponseTimer(operation: string, timeoutMs: number): void {
    this.clearResponseTimer();
    this.responseTimer = setTimeout(() => {
      this.responseTimer = null;
      this.fail('engine stopped responding', new EngineTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  }

  private clearResponseTimer(): void {
    if (this.responseTimer) {
      clearTimeout(this.responseTimer);
      this.responseTimer = null;
    }
  }

  /**
   * Drop the process and mark the engine unavailable. Play continues; the
   * next request starts a new process.
   */
  private fail(reason: string, cause: Error): EngineUnavailableError {
    if (cause instanceof EngineUnavailableError) {
      return cause;
    }
    const error = new EngineUnavailableError(reason, cause);
    if (this.statusValue === 'closed') {
      return error;
    }

    this.error = error;
    this.logger?.warn(error.message);

    const transport = this.transport;
    this.transport = null;
    this.active = null;
    this.stopSent = false;
    this.clearResponseTimer();
    this.rejectWaiter(error);
    transport?.close();

    this.setStatus('unavailable');
    return error;
  }

  private setStatus(status: EngineStatus): void {
    if (this.statusValue === status) return;
    this.statusValue = status;
    this.emit({ type: 'status', status });
  }

  private emit(event: BridgeEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
