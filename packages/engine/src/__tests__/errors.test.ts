import { describe, it, expect } from 'vitest';

import {
  EngineError,
  EngineTimeoutError,
  EngineUnavailableError,
  MalformedResponseError,
  toError,
} from '../errors.js';

describe('engine errors', () => {
  it('builds unavailable errors with their cause', () => {
    const cause = new EngineTimeoutError('isready', 5000);
    const error = new EngineUnavailableError('engine failed to start', cause);

    expect(error).toBeInstanceOf(EngineError);
    expect(error.name).toBe('EngineUnavailableError');
    expect(error.reason).toBe('engine failed to start');
    expect(error.cause).toBe(cause);
    expect(error.message).toBe(
      "Engine unavailable: engine failed to start (Engine did not answer 'isready' within 5000ms)",
    );
  });

  it('leaves the cause out of the message when there is none', () => {
    expect(new EngineUnavailableError('disabled').message).toBe('Engine unavailable: disabled');
  });

  it('keeps the offending line on malformed responses', () => {
    const error = new MalformedResponseError('bestmove ??', 'bad move "??"');
    expect(error.line).toBe('bestmove ??');
    expect(error.message).toBe('Malformed engine response "bestmove ??": bad move "??"');
  });

  it('wraps thrown values as errors', () => {
    const original = new Error('boom');
    expect(toError(original)).toBe(original);
    expect(toError('text').message).toBe('text');
  });
});
