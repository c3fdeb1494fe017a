/**
 * Engine transport over a child process's stdin/stdout
 */

import { type ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import { createInterface } from 'node:readline';

import { EngineError } from '../errors.js';
import type { EngineLogger } from '../types.js';

import type { EngineTransport, TransportExit } from './types.js';

export interface ProcessTransportConfig {
  /** Engine executable */
  command: string;
  args?: readonly string[];
  /** Receives the engine's stderr output */
  logger?: EngineLogger;
}

export class ProcessTransport implements EngineTransport {
  private child: ChildProcessWithoutNullStreams | null = null;
  private readonly lineListeners: Array<(line: string) => void> = [];
  private readonly exitListeners: Array<(exit: TransportExit) => void> = [];
  private exited = false;

  constructor(private readonly config: ProcessTransportConfig) {}

  start(): Promise<void> {
    if (this.child) {
      return Promise.reject(new EngineError('engine process already started'));
    }

    return new Promise((resolve, reject) => {
      const child = spawn(this.config.command, [...(this.config.args ?? [])], {
        windowsHide: true,
      });
      this.child = child;
      let spawned = false;

      child.once('spawn', () => {
        spawned = true;
        resolve();
      });

      child.once('error', (error: Error) => {
        if (!spawned) {
          reject(error);
        }
        this.emitExit({ code: null, signal: null, error });
      });

      child.once('exit', (code, signal) => {
        this.emitExit({ code, signal });
      });

      child.stdin.on('error', (error: Error) => {
        this.emitExit({ code: null, signal: null, error });
      });

      createInterface({ input: child.stdout }).on('line', (line) => {
        const trimmed = line.trim();
        if (!trimmed) return;
        for (const listener of this.lineListeners) listener(trimmed);
      });

      createInterface({ input: child.stderr }).on('line', (line) => {
        if (line.trim()) this.config.logger?.warn(`Engine stderr: ${line.trim()}`);
      });
    });
  }

  send(line: string): void {
    if (!this.child || this.exited || !this.child.stdin.writable) {
      throw new EngineError(`cannot send "${line}": engine process is not running`);
    }
    this.child.stdin.write(`${line}\n`);
  }

  onLine(listener: (line: string) => void): void {
    this.lineListeners.push(listener);
  }

  onExit(listener: (exit: TransportExit) => void): void {
    this.exitListeners.push(listener);
  }

  close(): void {
    if (this.child && !this.exited) {
      this.child.kill();
    }
  }

  private emitExit(exit: TransportExit): void {
    if (this.exited) return;
    this.exited = true;
    for (const listener of this.exitListeners) listener(exit);
  }
}
