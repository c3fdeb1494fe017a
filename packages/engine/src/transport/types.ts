/**
 * Line transport between the bridge and an engine process
 */

/**
 * How the engine process went away
 */
export interface TransportExit {
  code: number | null;
  signal: string | null;
  /** Set when the process could not be started or its pipes failed */
  error?: Error;
}

/**
 * A bidirectional line channel to one engine process. A transport is used
 * once: after it exits, the bridge asks its factory for a new one.
 */
export interface EngineTransport {
  /** Launch the process; resolves once it is running */
  start(): Promise<void>;
  /** Write one command line */
  send(line: string): void;
  /** Subscribe to trimmed, non-empty output lines */
  onLine(listener: (line: string) => void): void;
  /** Subscribe to process exit (called at most once) */
  onExit(listener: (exit: TransportExit) => void): void;
  /** Terminate the process if it is still running */
  close(): void;
}

export type TransportFactory = () => EngineTransport;
