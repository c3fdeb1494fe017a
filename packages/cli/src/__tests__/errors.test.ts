import { describe, it, expect } from 'vitest';

import { ConfigValidationError } from '../config/validation.js';
import {
  CliError,
  ConfigError,
  EngineServiceError,
  InputError,
  createEngineError,
  formatError,
} from '../errors/index.js';

describe('CLI errors', () => {
  it('should format a message with its suggestion', () => {
    const error = new CliError('Something broke', 'Try again');

    expect(error.exitCode).toBe(1);
    expect(error.format()).toBe('Error: Something broke\n\nSuggestion: Try again');
  });

  it('should use distinct exit codes', () => {
    expect(new ConfigError('bad config').exitCode).toBe(1);
    expect(new InputError('bad fen').exitCode).toBe(2);
    expect(new EngineServiceError('stockfish', 'gone').exitCode).toBe(3);
  });

  it('should name the engine in engine errors', () => {
    const error = createEngineError('/opt/engine', new Error('spawn ENOENT'));

    expect(error).toBeInstanceOf(EngineServiceError);
    expect(error.format()).toBe(
      'Error [/opt/engine]: Engine could not be started (spawn ENOENT)\n\n' +
        'Suggestion: Install a UCI engine such as Stockfish, or pass --engine <path>',
    );
  });

  it('should include every validation problem when formatted', () => {
    const text = formatError(
      new ConfigValidationError([{ path: 'engine.threads', message: 'Expected number' }]),
    );

    expect(text).toContain('  engine.threads: Expected number');
  });

  it('should format unknown throwables', () => {
    expect(formatError('plain string')).toContain('Error: plain string');
  });
});
