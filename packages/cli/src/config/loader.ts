/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { ANALYSIS_PROFILES, DEFAULT_CONFIG, applyProfile } from './defaults.js';
import type { AnalysisProfile, ChesslensConfig, CliOptions } from './schema.js';
import { type PartialConfig, validateConfig, validatePartialConfig } from './validation.js';

type ConfigSection = keyof ChesslensConfig;
type EnvValueKind = 'string' | 'number' | 'boolean' | 'list';

interface EnvBinding {
  section: ConfigSection;
  key: string;
  kind: EnvValueKind;
}

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
const ENV_VAR_MAP: Record<string, EnvBinding> = {
  // Engine
  CHESSLENS_ENGINE: { section: 'engine', key: 'path', kind: 'string' },
  CHESSLENS_ENGINE_ARGS: { section: 'engine', key: 'args', kind: 'list' },
  CHESSLENS_ENGINE_ENABLED: { section: 'engine', key: 'enabled', kind: 'boolean' },
  CHESSLENS_THREADS: { section: 'engine', key: 'threads', kind: 'number' },
  CHESSLENS_HASH_MB: { section: 'engine', key: 'hashMb', kind: 'number' },
  CHESSLENS_MULTIPV: { section: 'engine', key: 'multiPv', kind: 'number' },

  // Analysis
  CHESSLENS_PROFILE: { section: 'analysis', key: 'profile', kind: 'string' },
  CHESSLENS_DEPTH: { section: 'analysis', key: 'depth', kind: 'number' },
  CHESSLENS_MOVETIME: { section: 'analysis', key: 'movetimeMs', kind: 'number' },
  CHESSLENS_MATE_HUNT: { section: 'analysis', key: 'mateHunt', kind: 'boolean' },
  CHESSLENS_THROTTLE_MS: { section: 'analysis', key: 'throttleMs', kind: 'number' },

  // Display
  CHESSLENS_ORIENTATION: { section: 'display', key: 'orientation', kind: 'string' },
  CHESSLENS_UNICODE: { section: 'display', key: 'unicode', kind: 'boolean' },
  CHESSLENS_COLOR: { section: 'display', key: 'color', kind: 'boolean' },
};

/**
 * Merge a partial configuration over a complete one
 * Source values override target values
 */
function deepMerge(target: ChesslensConfig, source: PartialConfig): ChesslensConfig {
  return {
    engine: { ...target.engine, ...source.engine },
    analysis: { ...target.analysis, ...source.analysis },
    display: { ...target.display, ...source.display },
  };
}

/**
 * Parse environment variable value based on expected type
 */
function parseEnvValue(value: string, kind: EnvValueKind): unknown {
  switch (kind) {
    case 'boolean':
      return value.toLowerCase() === 'true' || value === '1';
    case 'number': {
      const num = Number(value);
      return Number.isNaN(num) ? value : num;
    }
    case 'list':
      return value.split(/\s+/).filter((part) => part.length > 0);
    case 'string':
      return value;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const config: Record<string, Record<string, unknown>> = {};

  for (const [envVar, binding] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      const section = (config[binding.section] ??= {});
      section[binding.key] = parseEnvValue(value, binding.kind);
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 */
async function loadConfigFile(configPath?: string): Promise<PartialConfig | null> {
  const explorer = cosmiconfig('chesslens', {
    searchPlaces: [
      'package.json',
      '.chesslensrc',
      '.chesslensrc.json',
      '.chesslensrc.yaml',
      '.chesslensrc.yml',
      '.chesslensrc.js',
      '.chesslensrc.cjs',
      'chesslens.config.js',
      'chesslens.config.cjs',
    ],
  });

  // A missing file is only an error when it was named explicitly
  const result = configPath ? await explorer.load(configPath) : await explorer.search();
  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialConfig {
  const engine: NonNullable<PartialConfig['engine']> = {};
  const analysis: NonNullable<PartialConfig['analysis']> = {};
  const display: NonNullable<PartialConfig['display']> = {};

  if (options.engine !== undefined) engine.path = options.engine;
  if (options.engineEnabled === false) engine.enabled = false;

  if (options.profile !== undefined) analysis.profile = options.profile;
  if (options.depth !== undefined) analysis.depth = options.depth;
  if (options.movetime !== undefined) analysis.movetimeMs = options.movetime;
  if (options.mateHunt !== undefined) analysis.mateHunt = options.mateHunt;

  if (options.black) display.orientation = 'black';
  if (options.color === false) display.color = false;

  return { engine, analysis, display };
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Profile presets
 * 5. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ChesslensConfig> {
  const fileConfig = await loadConfigFile(cliOptions.config);
  const envConfig = loadEnvConfig(env);
  const cliConfig = mapCliToConfig(cliOptions);

  // Presets sit under every explicit source, so --depth beats --profile deep
  const profile: AnalysisProfile =
    cliConfig.analysis?.profile ??
    envConfig.analysis?.profile ??
    fileConfig?.analysis?.profile ??
    DEFAULT_CONFIG.analysis.profile;

  let config: ChesslensConfig = {
    ...DEFAULT_CONFIG,
    analysis: applyProfile(DEFAULT_CONFIG.analysis, profile),
  };
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }
  config = deepMerge(config, envConfig);
  config = deepMerge(config, cliConfig);

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: ChesslensConfig): string {
  return JSON.stringify(config, null, 2);
}

export { ANALYSIS_PROFILES };
