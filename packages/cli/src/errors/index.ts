/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  EngineServiceError,
} from './cli-errors.js';

export { formatError, handleError, createEngineError } from './handler.js';
