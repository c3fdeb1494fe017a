/**
 * Configuration schema types for the chesslens CLI
 */

/**
 * Analysis profile presets
 */
export type AnalysisProfile = 'quick' | 'standard' | 'deep';

/**
 * Which side is drawn at the bottom of the board
 */
export type BoardOrientation = 'white' | 'black';

/**
 * Engine process configuration
 */
export interface EngineConfigSchema {
  /** Engine executable (looked up on PATH when not absolute) */
  path: string;
  /** Extra command-line arguments for the engine */
  args: string[];
  /** UCI Threads option */
  threads: number;
  /** UCI Hash option in megabytes */
  hashMb: number;
  /** UCI MultiPV option */
  multiPv: number;
  /** Time allowed for each handshake step (ms) */
  handshakeTimeoutMs: number;
  /** Time allowed for bestmove beyond the search budget (ms) */
  responseTimeoutMs: number;
  /** Run without an engine when false */
  enabled: boolean;
}

/**
 * Analysis configuration
 */
export interface AnalysisConfigSchema {
  /** Analysis profile preset */
  profile: AnalysisProfile;
  /** Search depth in plies; unlimited when absent */
  depth?: number;
  /** Search time per position (ms) */
  movetimeMs: number;
  /** Highlight forced mates for the side to move */
  mateHunt: boolean;
  /** Minimum gap between interim evaluation updates on screen (ms) */
  throttleMs: number;
}

/**
 * Board display configuration
 */
export interface DisplayConfigSchema {
  orientation: BoardOrientation;
  /** Draw pieces with chess glyphs instead of letters */
  unicode: boolean;
  /** Colored output */
  color: boolean;
}

/**
 * Complete chesslens configuration
 */
export interface ChesslensConfig {
  engine: EngineConfigSchema;
  analysis: AnalysisConfigSchema;
  display: DisplayConfigSchema;
}

/**
 * Options accepted on the command line
 */
export interface CliOptions {
  /** Path to a config file */
  config?: string;
  /** Print the resolved configuration and exit */
  showConfig?: boolean;
  /** Starting position */
  fen?: string;
  /** Engine executable */
  engine?: string;
  /** Commander sets this false for --no-engine */
  engineEnabled?: boolean;
  depth?: number;
  movetime?: number;
  profile?: AnalysisProfile;
  mateHunt?: boolean;
  /** View the board from Black's side */
  black?: boolean;
  /** Commander sets this false for --no-color */
  color?: boolean;
  verbose?: boolean;
  debug?: boolean;
}
