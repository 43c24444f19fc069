import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  FetchError,
  IngestError,
  PipelineError,
  TypeCoercionError,
  errorMessage,
} from '../../../src/domain/errors.js';

describe('errors', () => {
  it('should name each error after its class and expose a code', () => {
    const error = new FetchError('https://example.test/zones.csv', 'HTTP 404 Not Found', { status: 404 });

    expect(error).toBeInstanceOf(IngestError);
    expect(error.name).toBe('FetchError');
    expect(error.code).toBe('FETCH_FAILED');
    expect(error.status).toBe(404);
    expect(error.location).toBe('https://example.test/zones.csv');
  });

  it('should name the dataset and stage of a pipeline failure', () => {
    const cause = new Error('socket hang up');
    const error = new PipelineError('yellow-trips', 'fetch', cause);

    expect(error.message).toBe("Dataset 'yellow-trips' failed during fetch: socket hang up");
    expect(error.dataset).toBe('yellow-trips');
    expect(error.stage).toBe('fetch');
    expect(error.cause).toBe(cause);
  });

  it('should describe a failure before any dataset started', () => {
    expect(new PipelineError(null, 'connect', 'refused').message).toBe('Pipeline failed during connect: refused');
  });

  it('should describe the first cast error of a coerced row', () => {
    const error = new TypeCoercionError(3, [
      { field: 'pickup', code: 'TYPE_MISMATCH', message: "Column 'pickup' must be a valid timestamp", value: 'later' },
      { field: 'fare', code: 'TYPE_MISMATCH', message: "Column 'fare' must be a decimal number", value: 'x' },
    ]);

    expect(error.message).toBe("Row 3: Column 'pickup' must be a valid timestamp (value: 'later')");
    expect(error.rowIndex).toBe(3);
    expect(error.errors).toHaveLength(2);
  });

  it('should list every configuration issue', () => {
    const error = new ConfigError(['PG_PORT: Expected number', 'LOG_LEVEL: Invalid enum value']);

    expect(error.message).toBe('Invalid configuration:\n  - PG_PORT: Expected number\n  - LOG_LEVEL: Invalid enum value');
  });

  it('should extract messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
