import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../config/configuration-error.js';
import { EngineUnavailableError, StackValidationError, formatErrorForCli } from '../errors.js';

describe('formatErrorForCli', () => {
  it('prints a validation error with its details and suggestion', () => {
    const error = new StackValidationError(
      'Backup is incomplete',
      'Create a new backup',
      ['volume archive: model_data']
    );

    expect(formatErrorForCli(error)).toBe(
      'Backup is incomplete\n   - volume archive: model_data\n   Suggestion: Create a new backup'
    );
  });

  it('prints a configuration error with the file', () => {
    const error = new ConfigurationError('Failed to save configuration', '/tmp/x.json', 'Check permissions');

    expect(formatErrorForCli(error)).toBe(
      'Failed to save configuration\n   File: /tmp/x.json\n   Suggestion: Check permissions'
    );
  });

  it('tells the operator to start the engine', () => {
    const output = formatErrorForCli(new EngineUnavailableError('Cannot connect to the docker daemon'));

    expect(output.split('\n')[0]).toBe('Cannot connect to the docker daemon');
    expect(output).toContain('Start Docker Desktop');
  });

  it('prints only the message for other errors', () => {
    expect(formatErrorForCli(new Error('boom'))).toBe('boom');
    expect(formatErrorForCli('plain')).toBe('plain');
  });
});
