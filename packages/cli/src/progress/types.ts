/**
 * Shared types for progress reporter components
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
  blue: ColorFn;
  /** Background for highlighted squares */
  highlight: ColorFn;
}

/**
 * Reporter options
 */
export interface ReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Show engine status changes and warnings (default: false) */
  verbose?: boolean;
  /** Show raw engine traffic (default: false) */
  debug?: boolean;
  /** Line sink (default: console.log) */
  write?: (line: string) => void;
}
