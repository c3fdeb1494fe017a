/**
 * Default configuration values and profile presets
 */

import type {
  AnalysisConfigSchema,
  AnalysisProfile,
  ChesslensConfig,
  DisplayConfigSchema,
  EngineConfigSchema,
} from './schema.js';

/**
 * Analysis profile presets
 * Maps profile names to search budget overrides
 */
export const ANALYSIS_PROFILES: Record<AnalysisProfile, Pick<AnalysisConfigSchema, 'depth' | 'movetimeMs'>> = {
  quick: {
    movetimeMs: 50,
  },
  standard: {
    movetimeMs: 100,
  },
  deep: {
    depth: 22,
    movetimeMs: 1000, // 1 second max per position
  },
};

/**
 * Default engine configuration
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfigSchema = {
  path: 'stockfish',
  args: [],
  threads: 1,
  hashMb: 16,
  multiPv: 1,
  handshakeTimeoutMs: 5000,
  responseTimeoutMs: 10000,
  enabled: true,
};

/**
 * Default analysis configuration (standard profile)
 */
export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfigSchema = {
  profile: 'standard',
  movetimeMs: 100,
  mateHunt: false,
  throttleMs: 100,
};

/**
 * Default display configuration
 */
export const DEFAULT_DISPLAY_CONFIG: DisplayConfigSchema = {
  orientation: 'white',
  unicode: true,
  color: true,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: ChesslensConfig = {
  engine: DEFAULT_ENGINE_CONFIG,
  analysis: DEFAULT_ANALYSIS_CONFIG,
  display: DEFAULT_DISPLAY_CONFIG,
};

/**
 * Apply profile presets to analysis configuration
 */
export function applyProfile(
  config: AnalysisConfigSchema,
  profile: AnalysisProfile,
): AnalysisConfigSchema {
  const profilePreset = ANALYSIS_PROFILES[profile];
  return {
    ...config,
    ...profilePreset,
    profile,
  };
}
